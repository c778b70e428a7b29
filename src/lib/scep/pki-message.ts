/**
 * SCEP pkiMessage: the signed envelope of every PKIOperation request and
 * of the CertRep answer.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8894#section-3.2
 */

import { randomBytes, type KeyObject } from 'node:crypto';
import { ScepError } from '../errors/bridge-errors.js';
import { fromBinary, octets, primitiveBytes, printable } from './asn1.js';
import { FAIL_INFO, MESSAGE_TYPE, OID, PKI_STATUS, type FailInfo, type PkiStatus } from './constants.js';
import { attribute, buildSignedData, parseAndVerifySignedData, type SignedAttributes } from './signed-data.js';

export const SENDER_NONCE_LENGTH = 16;

export interface PkiRequest {
  messageType: number;
  transactionId: string;
  senderNonce: Buffer;
  /** Certificate that signed the request; CertRep content is enveloped to it */
  signerCertificate: Buffer;
  /** Signed content: the DER EnvelopedData for PKCSReq */
  envelope: Buffer;
}

function textAttribute(attributes: SignedAttributes, type: string, name: string): string {
  const node = attributes.get(type);
  if (!node) throw ScepError.malformed(`${name} attribute missing`);
  return primitiveBytes(node, name);
}

/**
 * Verify a pkiMessage and read its SCEP attributes.
 * @throws {ScepError} on a bad signature or a missing attribute
 */
export function parsePkiMessage(der: Uint8Array): PkiRequest {
  const signed = parseAndVerifySignedData(der);

  const rawType = textAttribute(signed.attributes, OID.messageType, 'messageType');
  const messageType = Number.parseInt(rawType, 10);
  if (!Number.isInteger(messageType)) throw ScepError.malformed(`messageType "${rawType}"`);

  const transactionId = textAttribute(signed.attributes, OID.transactionId, 'transactionID');
  const senderNonce = fromBinary(textAttribute(signed.attributes, OID.senderNonce, 'senderNonce'));

  return {
    messageType,
    transactionId,
    senderNonce,
    signerCertificate: signed.signerCertificate,
    envelope: signed.content,
  };
}

export interface RaSigner {
  certificate: Uint8Array;
  key: KeyObject;
}

export type CertRep =
  | { status: typeof PKI_STATUS.SUCCESS; envelope: Buffer }
  | { status: typeof PKI_STATUS.FAILURE; failInfo: FailInfo };

/** CertRep answering `request`, signed by the RA. */
export function buildCertRep(request: PkiRequest, rep: CertRep, ra: RaSigner): Buffer {
  const status: PkiStatus = rep.status;
  const attributes = [
    attribute(OID.messageType, printable(String(MESSAGE_TYPE.CERT_REP))),
    attribute(OID.pkiStatus, printable(String(status))),
    attribute(OID.transactionId, printable(request.transactionId)),
    attribute(OID.recipientNonce, octets(request.senderNonce)),
    attribute(OID.senderNonce, octets(randomBytes(SENDER_NONCE_LENGTH))),
  ];
  if (rep.status === PKI_STATUS.FAILURE) {
    attributes.push(attribute(OID.failInfo, printable(String(rep.failInfo))));
  }

  const content = rep.status === PKI_STATUS.SUCCESS ? rep.envelope : undefined;
  return buildSignedData(content, [ra.certificate], { ...ra, attributes });
}

export const failure = (failInfo: FailInfo = FAIL_INFO.BAD_REQUEST): CertRep => ({
  status: PKI_STATUS.FAILURE,
  failInfo,
});
