/**
 * CA issuance adapter
 *
 * Turns a device's certificate request into an ACME order through one
 * long-lived account, and the issued PEM back into a certificate object.
 */

import { X509Certificate } from '@peculiar/x509';
import { nopLogger, type Logger } from '../../logger.js';
import { createDns01Provider, type ProviderEnv } from '../challenges/dns-01-provider.js';
import type { PropagationCheck } from '../challenges/dns-propagation.js';
import { AcmeAccount, type PollingOptions } from '../core/acme-account.js';
import { AcmeClient } from '../core/acme-client.js';
import { CertificateObtainer } from '../core/certificate-obtainer.js';
import { loadAccountKey } from '../crypto/account-key.js';
import { IssuanceError } from '../errors/bridge-errors.js';
import '../crypto/x509-provider.js';
import { decodeFirstPemBlock } from '../utils/pem.js';

/** Certificate source capability consumed by the SCEP engine. */
export interface CertificateSource {
  obtain(csrDer: Uint8Array): Promise<X509Certificate>;
}

/** The part of {@link CertificateObtainer} the adapter drives. */
export interface CsrObtainer {
  obtainForCsr(request: { csr: Uint8Array; bundle: boolean }): Promise<{ certificate: string }>;
}

export interface AcmeCertificateSourceOptions {
  directoryUrl: string;
  email: string;
  accountKeyPath: string;
  /** Registered DNS-01 provider name */
  dnsProvider: string;
  /** Provider configuration; defaults to process.env */
  env?: ProviderEnv;
  propagationCheck?: PropagationCheck;
  polling?: PollingOptions;
  logger?: Logger;
}

/**
 * Decode the first PEM block of a CA response. Later blocks are never tried.
 * @throws {IssuanceError} when there is no block or it is not a certificate
 */
export function decodeIssuedCertificate(pem: string): X509Certificate {
  const block = decodeFirstPemBlock(pem);
  if (!block) throw IssuanceError.parse(new Error('no PEM block in CA response'));
  try {
    return new X509Certificate(block.der);
  } catch (e) {
    throw IssuanceError.parse(e);
  }
}

export class AcmeCertificateSource implements CertificateSource {
  constructor(
    private readonly obtainer: CsrObtainer,
    private readonly logger: Logger = nopLogger,
  ) {}

  /**
   * Build the ACME client, select the DNS-01 provider and register the
   * account with the terms of service accepted. Any failure rejects.
   */
  static async create(opts: AcmeCertificateSourceOptions): Promise<AcmeCertificateSource> {
    const logger = opts.logger ?? nopLogger;
    const client = new AcmeClient(opts.directoryUrl);
    const provider = createDns01Provider(opts.dnsProvider, opts.env ?? process.env, logger);
    const key = await loadAccountKey(opts.accountKeyPath);

    const account = new AcmeAccount(client, key, opts.polling ? { polling: opts.polling } : {});
    const { accountUrl } = await account.register({
      contact: opts.email,
      termsOfServiceAgreed: true,
    });
    logger.info('ACME account ready', { account: accountUrl, directory: opts.directoryUrl });

    const obtainer = new CertificateObtainer(account, provider, {
      logger: logger.with({ component: 'acme' }),
      ...(opts.propagationCheck && { propagationCheck: opts.propagationCheck }),
    });
    return new AcmeCertificateSource(obtainer, logger);
  }

  /**
   * Obtain a leaf certificate for the unmodified CSR bytes.
   * @throws {IssuanceError} when the CA flow fails or its answer cannot be decoded
   */
  async obtain(csrDer: Uint8Array): Promise<X509Certificate> {
    let pem: string;
    try {
      ({ certificate: pem } = await this.obtainer.obtainForCsr({ csr: csrDer, bundle: false }));
    } catch (e) {
      throw IssuanceError.obtain(e);
    }

    const certificate = decodeIssuedCertificate(pem);
    this.logger.debug('certificate obtained', { subject: certificate.subject, serial: certificate.serialNumber });
    return certificate;
  }
}
