/**
 * SCEP constants (RFC 8894)
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8894#section-3.2.1
 */

export const OID = {
  // CMS content types
  data: '1.2.840.113549.1.7.1',
  signedData: '1.2.840.113549.1.7.2',
  envelopedData: '1.2.840.113549.1.7.3',

  // PKCS#9 attributes
  contentType: '1.2.840.113549.1.9.3',
  messageDigest: '1.2.840.113549.1.9.4',
  signingTime: '1.2.840.113549.1.9.5',

  // SCEP attributes
  messageType: '2.16.840.1.113733.1.9.2',
  pkiStatus: '2.16.840.1.113733.1.9.3',
  failInfo: '2.16.840.1.113733.1.9.4',
  senderNonce: '2.16.840.1.113733.1.9.5',
  recipientNonce: '2.16.840.1.113733.1.9.6',
  transactionId: '2.16.840.1.113733.1.9.7',

  rsaEncryption: '1.2.840.113549.1.1.1',
  sha256WithRSAEncryption: '1.2.840.113549.1.1.11',

  // Digests
  md5: '1.2.840.113549.2.5',
  sha1: '1.3.14.3.2.26',
  sha256: '2.16.840.1.101.3.4.2.1',
  sha384: '2.16.840.1.101.3.4.2.2',
  sha512: '2.16.840.1.101.3.4.2.3',

  // Content encryption
  aes128CBC: '2.16.840.1.101.3.4.1.2',
  aes192CBC: '2.16.840.1.101.3.4.1.22',
  aes256CBC: '2.16.840.1.101.3.4.1.42',
  desEDE3CBC: '1.2.840.113549.3.7',
  desCBC: '1.3.14.3.2.7',
} as const;

export const MESSAGE_TYPE = {
  CERT_REP: 3,
  RENEWAL_REQ: 17,
  PKCS_REQ: 19,
  CERT_POLL: 20,
  GET_CERT: 21,
  GET_CRL: 22,
} as const;

export type MessageType = (typeof MESSAGE_TYPE)[keyof typeof MESSAGE_TYPE];

export const PKI_STATUS = {
  SUCCESS: 0,
  FAILURE: 2,
  PENDING: 3,
} as const;

export type PkiStatus = (typeof PKI_STATUS)[keyof typeof PKI_STATUS];

export const FAIL_INFO = {
  BAD_ALG: 0,
  BAD_MESSAGE_CHECK: 1,
  BAD_REQUEST: 2,
  BAD_TIME: 3,
  BAD_CERT_ID: 4,
} as const;

export type FailInfo = (typeof FAIL_INFO)[keyof typeof FAIL_INFO];

/** Newline-delimited capability list advertised by GetCACaps. */
export const DEFAULT_CA_CAPS = [
  'Renewal',
  'SHA-1',
  'SHA-256',
  'AES',
  'DES3',
  'SCEPStandard',
  'POSTPKIOperation',
].join('\n');

export const CONTENT_TYPE = {
  CA_CERT: 'application/x-x509-ca-cert',
  CA_RA_CERT: 'application/x-x509-ca-ra-cert',
  PKI_MESSAGE: 'application/x-pki-message',
  TEXT: 'text/plain',
} as const;
