/**
 * SCEP service
 *
 * Answers the three SCEP operations for one RA identity. Enrollment requests
 * are authorized by the CSR verifier and issued by the certificate source;
 * nothing is minted locally.
 */

import type { KeyObject } from 'node:crypto';
import type { X509Certificate } from '@peculiar/x509';
import { nopLogger, type Logger } from '../../logger.js';
import type { Depot } from '../depot/chain-depot.js';
import type { CertificateSource } from '../issuance/acme-certificate-source.js';
import { parseCertificateRequest } from '../crypto/csr.js';
import type { CsrVerifier } from '../whitelist/csr-password-verifier.js';
import { debugScep } from '../utils/debug.js';
import { CONTENT_TYPE, DEFAULT_CA_CAPS, FAIL_INFO, MESSAGE_TYPE, PKI_STATUS } from './constants.js';
import { decryptEnvelope, encryptEnvelope } from './envelope.js';
import { buildCertRep, failure, parsePkiMessage, type CertRep, type PkiRequest } from './pki-message.js';
import { buildCertsOnly } from './signed-data.js';

export interface CaCertResponse {
  body: Buffer;
  contentType: string;
}

export interface ScepService {
  /** Newline-delimited capability list */
  getCACaps(): Promise<string>;
  getCACert(message?: string): Promise<CaCertResponse>;
  /** Handle a DER pkiMessage and return the DER CertRep */
  pkiOperation(data: Buffer): Promise<Buffer>;
}

export interface ScepServiceOptions {
  verifier: CsrVerifier;
  certificateSource: CertificateSource;
  logger?: Logger;
}

class DepotScepService implements ScepService {
  constructor(
    private readonly depot: Depot,
    private readonly verifier: CsrVerifier,
    private readonly source: CertificateSource,
    private readonly logger: Logger,
  ) {}

  async getCACaps(): Promise<string> {
    return DEFAULT_CA_CAPS;
  }

  async getCACert(): Promise<CaCertResponse> {
    const { chain } = await this.depot.ca();
    const ders = chain.map((cert) => Buffer.from(cert.rawData));
    const [only] = ders;
    if (ders.length === 1 && only) {
      return { body: only, contentType: CONTENT_TYPE.CA_CERT };
    }
    return { body: buildCertsOnly(ders), contentType: CONTENT_TYPE.CA_RA_CERT };
  }

  async pkiOperation(data: Buffer): Promise<Buffer> {
    const { chain, key } = await this.depot.ca();
    const [raCert] = chain;
    if (!raCert) throw new Error('RA chain is empty');
    const ra = { certificate: Buffer.from(raCert.rawData), key };

    const request = parsePkiMessage(data);
    debugScep('pkiMessage type=%d transaction=%s', request.messageType, request.transactionId);

    const rep = await this.answer(request, ra.key);
    return buildCertRep(request, rep, ra);
  }

  private async answer(request: PkiRequest, raKey: KeyObject): Promise<CertRep> {
    switch (request.messageType) {
      case MESSAGE_TYPE.PKCS_REQ:
        return this.enroll(request, raKey);
      case MESSAGE_TYPE.RENEWAL_REQ:
        return failure(FAIL_INFO.BAD_REQUEST);
      case MESSAGE_TYPE.CERT_POLL:
      case MESSAGE_TYPE.GET_CERT:
      case MESSAGE_TYPE.GET_CRL:
        return failure(FAIL_INFO.BAD_CERT_ID);
      default:
        this.logger.warn('unsupported message type', { message_type: request.messageType });
        return failure(FAIL_INFO.BAD_REQUEST);
    }
  }

  private async enroll(request: PkiRequest, raKey: KeyObject): Promise<CertRep> {
    const { content: csrDer, cipher } = decryptEnvelope(request.envelope, raKey);

    if (!(await this.verifier.verify(csrDer))) {
      return failure(FAIL_INFO.BAD_REQUEST);
    }

    const commonName = parseCertificateRequest(csrDer).commonName ?? '';
    if (await this.depot.hasCN(commonName, 0, false)) {
      this.logger.info('certificate already issued', { cn: commonName });
      return failure(FAIL_INFO.BAD_REQUEST);
    }

    let issued: X509Certificate;
    try {
      issued = await this.source.obtain(csrDer);
    } catch (e) {
      this.logger.error('obtaining certificate', { cn: commonName, err: e });
      return failure(FAIL_INFO.BAD_REQUEST);
    }

    await this.depot.put(commonName, issued);
    const degenerate = buildCertsOnly([Buffer.from(issued.rawData)]);
    return {
      status: PKI_STATUS.SUCCESS,
      envelope: encryptEnvelope(degenerate, request.signerCertificate, cipher),
    };
  }
}

/** SCEP service backed by `depot` for the RA identity. */
export function createScepService(depot: Depot, opts: ScepServiceOptions): ScepService {
  return new DepotScepService(depot, opts.verifier, opts.certificateSource, opts.logger ?? nopLogger);
}
