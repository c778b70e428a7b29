import { randomBytes } from 'node:crypto';
import { octets, printable } from '../../src/lib/scep/asn1.js';
import { OID } from '../../src/lib/scep/constants.js';
import { encryptEnvelope } from '../../src/lib/scep/envelope.js';
import { attribute, buildSignedData } from '../../src/lib/scep/signed-data.js';
import type { TestCertificate } from './pki.js';

export interface PkiMessageOptions {
  /** Signed content, usually an EnvelopedData */
  content: Buffer;
  signer: TestCertificate;
  messageType?: number;
  transactionId?: string;
  senderNonce?: Buffer;
}

/** A client-side pkiMessage signed by `signer`. */
export function buildPkiMessage(opts: PkiMessageOptions): Buffer {
  return buildSignedData(opts.content, [opts.signer.der], {
    certificate: opts.signer.der,
    key: opts.signer.keys.privateKey,
    attributes: [
      attribute(OID.messageType, printable(String(opts.messageType ?? 19))),
      attribute(OID.transactionId, printable(opts.transactionId ?? 'tx-1')),
      attribute(OID.senderNonce, octets(opts.senderNonce ?? randomBytes(16))),
    ],
  });
}

/** PKCSReq carrying `csrDer` enveloped to `ra`. */
export function buildPkcsReq(
  csrDer: Buffer,
  ra: TestCertificate,
  signer: TestCertificate,
  extra: Omit<PkiMessageOptions, 'content' | 'signer'> = {},
  cipher: string = OID.aes128CBC,
): Buffer {
  return buildPkiMessage({ ...extra, content: encryptEnvelope(csrDer, ra.der, cipher), signer });
}
