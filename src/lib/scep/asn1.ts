/**
 * ASN.1 helpers over node-forge for the CMS structures SCEP uses.
 * forge works on binary strings; conversions to Buffer happen at the edges.
 */

import forge from 'node-forge';
import { ScepError } from '../errors/bridge-errors.js';

const { asn1 } = forge;

export type Asn1Node = forge.asn1.Asn1;

export const toBinary = (bytes: Uint8Array): string => Buffer.from(bytes).toString('binary');
export const fromBinary = (bytes: string): Buffer => Buffer.from(bytes, 'binary');

export function parseDer(der: Uint8Array, what: string): Asn1Node {
  try {
    return asn1.fromDer(forge.util.createBuffer(toBinary(der)));
  } catch (e) {
    throw ScepError.malformed(`${what}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export function encodeDer(node: Asn1Node): Buffer {
  return fromBinary(asn1.toDer(node).getBytes());
}

export function children(node: Asn1Node, what: string): Asn1Node[] {
  if (!Array.isArray(node.value)) throw ScepError.malformed(`${what} is not constructed`);
  return node.value;
}

export function child(node: Asn1Node, index: number, what: string): Asn1Node {
  const found = children(node, what)[index];
  if (!found) throw ScepError.malformed(`${what} has no element ${index}`);
  return found;
}

/** Contents of a primitive node, or of a constructed (BER) string joined. */
export function primitiveBytes(node: Asn1Node, what: string): string {
  if (typeof node.value === 'string') return node.value;
  return node.value.map((part) => primitiveBytes(part, what)).join('');
}

export function readOid(node: Asn1Node, what: string): string {
  if (node.type !== asn1.Type.OID || typeof node.value !== 'string') {
    throw ScepError.malformed(`${what} is not an OID`);
  }
  return asn1.derToOid(forge.util.createBuffer(node.value));
}

export function isContext(node: Asn1Node, tag: number): boolean {
  return node.tagClass === asn1.Class.CONTEXT_SPECIFIC && node.type === tag;
}

export function isUniversal(node: Asn1Node, type: forge.asn1.Type): boolean {
  return node.tagClass === asn1.Class.UNIVERSAL && node.type === type;
}

// Builders

export const seq = (items: Asn1Node[]): Asn1Node =>
  asn1.create(asn1.Class.UNIVERSAL, asn1.Type.SEQUENCE, true, items);

export const set = (items: Asn1Node[]): Asn1Node =>
  asn1.create(asn1.Class.UNIVERSAL, asn1.Type.SET, true, items);

export const oid = (value: string): Asn1Node =>
  asn1.create(asn1.Class.UNIVERSAL, asn1.Type.OID, false, asn1.oidToDer(value).getBytes());

export const int = (value: number): Asn1Node =>
  asn1.create(asn1.Class.UNIVERSAL, asn1.Type.INTEGER, false, asn1.integerToDer(value).getBytes());

export const octets = (bytes: Uint8Array): Asn1Node =>
  asn1.create(asn1.Class.UNIVERSAL, asn1.Type.OCTETSTRING, false, toBinary(bytes));

export const printable = (text: string): Asn1Node =>
  asn1.create(asn1.Class.UNIVERSAL, asn1.Type.PRINTABLESTRING, false, text);

export const utcTime = (date: Date): Asn1Node =>
  asn1.create(asn1.Class.UNIVERSAL, asn1.Type.UTCTIME, false, asn1.dateToUtcTime(date));

export const nullNode = (): Asn1Node => asn1.create(asn1.Class.UNIVERSAL, asn1.Type.NULL, false, '');

/** Constructed `[tag]`: an EXPLICIT wrapper, or an IMPLICIT SET OF `items`. */
export const tagged = (tag: number, items: Asn1Node[]): Asn1Node =>
  asn1.create(asn1.Class.CONTEXT_SPECIFIC, tag, true, items);

/** `[tag]` IMPLICIT primitive. */
export const implicitPrimitive = (tag: number, bytes: string): Asn1Node =>
  asn1.create(asn1.Class.CONTEXT_SPECIFIC, tag, false, bytes);

export const algorithmIdentifier = (algorithm: string, params: Asn1Node = nullNode()): Asn1Node =>
  seq([oid(algorithm), params]);

/** Re-tag the contents of an IMPLICIT `[n]` SET OF as a universal SET (signed attributes). */
export const asUniversalSet = (node: Asn1Node, what: string): Asn1Node => set(children(node, what));

/**
 * IssuerAndSerialNumber of a certificate, taken from its TBSCertificate.
 * @see https://datatracker.ietf.org/doc/html/rfc5652#section-10.2.4
 */
export function issuerAndSerialNumber(certDer: Uint8Array): Asn1Node {
  const cert = parseDer(certDer, 'certificate');
  const tbs = child(cert, 0, 'TBSCertificate');
  const fields = children(tbs, 'TBSCertificate');
  const offset = fields[0] && isContext(fields[0], 0) ? 1 : 0;
  const serial = child(tbs, offset, 'serialNumber');
  const issuer = child(tbs, offset + 2, 'issuer');
  return seq([issuer, serial]);
}
