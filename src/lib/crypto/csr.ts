/**
 * PKCS#10 certificate request parsing
 *
 * Extracts the parts of a device's signing request the bridge cares about:
 * the subject Common Name, the DNS Subject Alternative Names and the
 * challenge password attribute (PKCS#9, 1.2.840.113549.1.9.7).
 */

import {
  ChallengePasswordAttribute,
  Pkcs10CertificateRequest,
  SubjectAlternativeNameExtension,
} from '@peculiar/x509';
import forge from 'node-forge';
import { CsrError } from '../errors/bridge-errors.js';
import './x509-provider.js';

export const SUBJECT_ALT_NAME_OID = '2.5.29.17';

export const CHALLENGE_PASSWORD_OID = '1.2.840.113549.1.9.7';

/** The fields of a certificate request that authorization and issuance need. */
export interface CertificateRequestInfo {
  /** Original DER bytes, passed to the CA unmodified */
  der: Uint8Array;
  commonName?: string;
  dnsNames: string[];
  challengePassword?: string;
}

function decodeDirectoryString(raw: ArrayBuffer): string {
  const node = forge.asn1.fromDer(forge.util.createBuffer(Buffer.from(raw).toString('binary')));
  if (typeof node.value !== 'string') {
    throw new Error('challenge password is not a string value');
  }
  return forge.util.decodeUtf8(node.value);
}

function readChallengePassword(csr: Pkcs10CertificateRequest): string | undefined {
  const attribute = csr.getAttribute(CHALLENGE_PASSWORD_OID);
  if (!attribute) return undefined;
  if (attribute instanceof ChallengePasswordAttribute) return attribute.password;

  const [first] = attribute.values;
  return first ? decodeDirectoryString(first) : undefined;
}

/**
 * Parse a DER-encoded PKCS#10 request.
 * @throws {CsrError} when the bytes are not a certificate request
 */
export function parseCertificateRequest(der: Uint8Array): CertificateRequestInfo {
  try {
    const csr = new Pkcs10CertificateRequest(der);
    const [commonName] = csr.subjectName.getField('CN');
    const san = csr.getExtension(SUBJECT_ALT_NAME_OID);
    const dnsNames =
      san instanceof SubjectAlternativeNameExtension
        ? san.names.items.filter((name) => name.type === 'dns').map((name) => name.value)
        : [];
    const challengePassword = readChallengePassword(csr);

    return {
      der,
      ...(commonName !== undefined && { commonName }),
      dnsNames,
      ...(challengePassword !== undefined && { challengePassword }),
    };
  } catch (e) {
    throw CsrError.parse(e);
  }
}

/** The challenge password of `request`, or a {@link CsrError} when it has none. */
export function requireChallengePassword(request: CertificateRequestInfo): string {
  if (request.challengePassword === undefined) throw CsrError.missingChallengePassword();
  return request.challengePassword;
}

/** CN followed by DNS SANs, in request order. */
export function requestedNames(request: CertificateRequestInfo): string[] {
  return request.commonName !== undefined ? [request.commonName, ...request.dnsNames] : [...request.dnsNames];
}
