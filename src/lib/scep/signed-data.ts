/**
 * CMS SignedData (RFC 5652 Section 5) as SCEP uses it: one signer, signed
 * attributes always present, signer identified by issuer and serial number.
 */

import { createHash, sign, verify, X509Certificate as NodeX509Certificate, type KeyObject } from 'node:crypto';
import forge from 'node-forge';
import { ScepError } from '../errors/bridge-errors.js';
import {
  algorithmIdentifier,
  asUniversalSet,
  child,
  children,
  encodeDer,
  tagged,
  fromBinary,
  int,
  isContext,
  isUniversal,
  issuerAndSerialNumber,
  octets,
  oid,
  parseDer,
  primitiveBytes,
  readOid,
  seq,
  set,
  utcTime,
  type Asn1Node,
} from './asn1.js';
import { OID } from './constants.js';
import { unwrapContentInfo } from './envelope.js';

const DIGESTS: Record<string, string> = {
  [OID.md5]: 'md5',
  [OID.sha1]: 'sha1',
  [OID.sha256]: 'sha256',
  [OID.sha384]: 'sha384',
  [OID.sha512]: 'sha512',
};

/** Attribute OID -> the first value of its SET. */
export type SignedAttributes = ReadonlyMap<string, Asn1Node>;

export interface ParsedSignedData {
  /** eContent octets; empty when the content is detached or absent */
  content: Buffer;
  contentType: string;
  certificates: Buffer[];
  signerCertificate: Buffer;
  digestAlgorithm: string;
  attributes: SignedAttributes;
}

export interface SignerOptions {
  certificate: Uint8Array;
  key: KeyObject;
  /** Extra signed attributes; contentType, signingTime and messageDigest are added */
  attributes: Asn1Node[];
  signingTime?: Date;
}

function hashName(digestOid: string): string {
  const name = DIGESTS[digestOid];
  if (!name) throw ScepError.unsupportedAlgorithm('digest', digestOid);
  return name;
}

export function attribute(type: string, value: Asn1Node): Asn1Node {
  return seq([oid(type), set([value])]);
}

function readAttributes(node: Asn1Node): Map<string, Asn1Node> {
  const attributes = new Map<string, Asn1Node>();
  for (const attr of children(node, 'signedAttrs')) {
    const type = readOid(child(attr, 0, 'attribute'), 'attribute type');
    attributes.set(type, child(child(attr, 1, 'attribute values'), 0, `attribute ${type}`));
  }
  return attributes;
}

function sameDer(a: Asn1Node, b: Asn1Node): boolean {
  return encodeDer(a).equals(encodeDer(b));
}

function findSigner(certificates: Buffer[], signerId: Asn1Node): Buffer {
  if (!isUniversal(signerId, forge.asn1.Type.SEQUENCE)) {
    throw ScepError.malformed('signer is not identified by issuer and serial number');
  }
  const found = certificates.find((der) => sameDer(issuerAndSerialNumber(der), signerId));
  if (!found) throw ScepError.malformed('signer certificate not included');
  return found;
}

/**
 * Parse a SignedData ContentInfo and verify its single signer: the
 * messageDigest attribute against the content, then the signature over the
 * DER SET of signed attributes.
 * @throws {ScepError} when the structure is malformed or verification fails
 */
export function parseAndVerifySignedData(der: Uint8Array): ParsedSignedData {
  const signedData = unwrapContentInfo(der, OID.signedData, 'SignedData');
  const fields = children(signedData, 'SignedData');

  const encap = child(signedData, 2, 'encapContentInfo');
  const contentType = readOid(child(encap, 0, 'encapContentInfo'), 'eContentType');
  const eContent = children(encap, 'encapContentInfo')[1];
  const content = eContent
    ? fromBinary(primitiveBytes(child(eContent, 0, 'eContent'), 'eContent'))
    : Buffer.alloc(0);

  const certificates = fields
    .filter((node) => isContext(node, 0))
    .flatMap((node) => children(node, 'certificates'))
    .filter((node) => isUniversal(node, forge.asn1.Type.SEQUENCE))
    .map(encodeDer);

  const signerInfos = fields[fields.length - 1];
  if (!signerInfos || !isUniversal(signerInfos, forge.asn1.Type.SET)) {
    throw ScepError.malformed('SignedData has no signerInfos');
  }
  const [signerInfo] = children(signerInfos, 'signerInfos');
  if (!signerInfo) throw ScepError.malformed('SignedData has no signer');

  const signerFields = children(signerInfo, 'SignerInfo');
  const signerCertificate = findSigner(certificates, child(signerInfo, 1, 'sid'));
  const digestAlgorithm = readOid(child(child(signerInfo, 2, 'digestAlgorithm'), 0, 'digestAlgorithm'), 'digest');
  const signedAttrs = signerFields.find((node) => isContext(node, 0));
  if (!signedAttrs) throw ScepError.malformed('SignerInfo has no signed attributes');
  const signatureNode = signerFields.find(
    (node, i) => i > 3 && isUniversal(node, forge.asn1.Type.OCTETSTRING),
  );
  if (!signatureNode) throw ScepError.malformed('SignerInfo has no signature');

  const attributes = readAttributes(signedAttrs);
  const hash = hashName(digestAlgorithm);

  const messageDigest = attributes.get(OID.messageDigest);
  if (!messageDigest) throw ScepError.malformed('messageDigest attribute missing');
  const expected = fromBinary(primitiveBytes(messageDigest, 'messageDigest'));
  if (!createHash(hash).update(content).digest().equals(expected)) {
    throw ScepError.signature('message digest mismatch');
  }

  const signedBytes = encodeDer(asUniversalSet(signedAttrs, 'signedAttrs'));
  const signature = fromBinary(primitiveBytes(signatureNode, 'signature'));
  const publicKey = new NodeX509Certificate(signerCertificate).publicKey;
  if (!verify(hash, signedBytes, publicKey, signature)) {
    throw ScepError.signature('signature does not match the signer certificate');
  }

  return { content, contentType, certificates, signerCertificate, digestAlgorithm, attributes };
}

/**
 * Build a SignedData ContentInfo over `content` (omitted when undefined),
 * signed with SHA-256 and carrying `certificates`.
 */
export function buildSignedData(
  content: Uint8Array | undefined,
  certificates: Uint8Array[],
  signer: SignerOptions,
): Buffer {
  const digest = createHash('sha256').update(content ?? Buffer.alloc(0)).digest();
  const attrs = [
    attribute(OID.contentType, oid(OID.data)),
    attribute(OID.signingTime, utcTime(signer.signingTime ?? new Date())),
    attribute(OID.messageDigest, octets(digest)),
    ...signer.attributes,
  ];

  // DER orders SET OF by encoding
  const sorted = attrs
    .map((node) => ({ node, der: encodeDer(node) }))
    .sort((a, b) => Buffer.compare(a.der, b.der))
    .map(({ node }) => node);

  const signature = sign('sha256', encodeDer(set(sorted)), signer.key);

  const signerInfo = seq([
    int(1),
    issuerAndSerialNumber(signer.certificate),
    algorithmIdentifier(OID.sha256),
    tagged(0, sorted),
    algorithmIdentifier(OID.rsaEncryption),
    octets(signature),
  ]);

  const encap = content === undefined
    ? seq([oid(OID.data)])
    : seq([oid(OID.data), tagged(0, [octets(content)])]);

  const signedData = seq([
    int(1),
    set([algorithmIdentifier(OID.sha256)]),
    encap,
    tagged(0, certificates.map((der) => parseDer(der, 'certificate'))),
    set([signerInfo]),
  ]);

  return encodeDer(seq([oid(OID.signedData), tagged(0, [signedData])]));
}

/** Degenerate certs-only SignedData: no content, no signers. */
export function buildCertsOnly(certificates: Uint8Array[]): Buffer {
  const signedData = seq([
    int(1),
    set([]),
    seq([oid(OID.data)]),
    tagged(0, certificates.map((der) => parseDer(der, 'certificate'))),
    set([]),
  ]);
  return encodeDer(seq([oid(OID.signedData), tagged(0, [signedData])]));
}
