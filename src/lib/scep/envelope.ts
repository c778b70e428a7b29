/**
 * CMS EnvelopedData with RSA key transport (RFC 5652 Section 6)
 *
 * Key transport is RSAES-PKCS1-v1_5, as SCEP clients use it; content
 * ciphers are the CBC modes SCEP advertises (AES, 3DES) plus single DES.
 */

import { randomBytes, X509Certificate as NodeX509Certificate, type KeyObject } from 'node:crypto';
import forge from 'node-forge';
import { ScepError } from '../errors/bridge-errors.js';
import {
  algorithmIdentifier,
  child,
  children,
  encodeDer,
  tagged,
  fromBinary,
  implicitPrimitive,
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
  toBinary,
  type Asn1Node,
} from './asn1.js';
import { OID } from './constants.js';

interface ContentCipher {
  algorithm: forge.cipher.Algorithm;
  keyLength: number;
  ivLength: number;
}

const CONTENT_CIPHERS: Record<string, ContentCipher> = {
  [OID.aes128CBC]: { algorithm: 'AES-CBC', keyLength: 16, ivLength: 16 },
  [OID.aes192CBC]: { algorithm: 'AES-CBC', keyLength: 24, ivLength: 16 },
  [OID.aes256CBC]: { algorithm: 'AES-CBC', keyLength: 32, ivLength: 16 },
  [OID.desEDE3CBC]: { algorithm: '3DES-CBC', keyLength: 24, ivLength: 8 },
  [OID.desCBC]: { algorithm: 'DES-CBC', keyLength: 8, ivLength: 8 },
};

export const SUPPORTED_CONTENT_CIPHERS: readonly string[] = Object.keys(CONTENT_CIPHERS);

export interface DecryptedEnvelope {
  content: Buffer;
  /** Content-encryption algorithm OID of the envelope */
  cipher: string;
}

function cipherFor(oidValue: string): ContentCipher {
  const cipher = CONTENT_CIPHERS[oidValue];
  if (!cipher) throw ScepError.unsupportedAlgorithm('content encryption', oidValue);
  return cipher;
}

function toForgePrivateKey(key: KeyObject): forge.pki.rsa.PrivateKey {
  return forge.pki.privateKeyFromPem(key.export({ type: 'pkcs1', format: 'pem' }).toString());
}

function toForgePublicKey(certDer: Uint8Array): forge.pki.rsa.PublicKey {
  const spki = new NodeX509Certificate(certDer).publicKey.export({ type: 'spki', format: 'pem' });
  return forge.pki.publicKeyFromPem(spki.toString());
}

function runCipher(
  mode: 'encrypt' | 'decrypt',
  cipher: ContentCipher,
  key: string,
  iv: string,
  data: string,
): string {
  const engine =
    mode === 'encrypt'
      ? forge.cipher.createCipher(cipher.algorithm, key)
      : forge.cipher.createDecipher(cipher.algorithm, key);
  engine.start({ iv });
  engine.update(forge.util.createBuffer(data));
  if (!engine.finish()) throw new Error('bad padding');
  return engine.output.getBytes();
}

/** Unwrap `content [0] EXPLICIT` of a ContentInfo of the expected type. */
export function unwrapContentInfo(der: Uint8Array, expectedType: string, what: string): Asn1Node {
  const contentInfo = parseDer(der, what);
  const type = readOid(child(contentInfo, 0, what), `${what} contentType`);
  if (type !== expectedType) {
    throw ScepError.malformed(`${what} has content type ${type}, expected ${expectedType}`);
  }
  const wrapper = child(contentInfo, 1, what);
  if (!isContext(wrapper, 0)) throw ScepError.malformed(`${what} content is not [0]`);
  return child(wrapper, 0, what);
}

/**
 * Decrypt an EnvelopedData ContentInfo with the RA key. Each key transport
 * recipient is tried until one decrypts.
 */
export function decryptEnvelope(der: Uint8Array, key: KeyObject): DecryptedEnvelope {
  const envelope = unwrapContentInfo(der, OID.envelopedData, 'EnvelopedData');
  const fields = children(envelope, 'EnvelopedData');
  // [0] originatorInfo is optional
  const offset = fields[1] && isContext(fields[1], 0) ? 1 : 0;
  const recipientInfos = child(envelope, 1 + offset, 'recipientInfos');
  const encryptedContentInfo = child(envelope, 2 + offset, 'encryptedContentInfo');

  const algorithm = child(encryptedContentInfo, 1, 'contentEncryptionAlgorithm');
  const cipherOid = readOid(child(algorithm, 0, 'contentEncryptionAlgorithm'), 'content cipher');
  const cipher = cipherFor(cipherOid);
  const iv = primitiveBytes(child(algorithm, 1, 'cipher parameters'), 'iv');

  const encrypted = children(encryptedContentInfo, 'encryptedContentInfo').find((n) => isContext(n, 0));
  if (!encrypted) throw ScepError.malformed('EnvelopedData carries no encrypted content');

  const forgeKey = toForgePrivateKey(key);
  let lastError: unknown = new Error('no key transport recipient');

  for (const recipient of children(recipientInfos, 'recipientInfos')) {
    // KeyTransRecipientInfo is the only untagged choice
    if (!isUniversal(recipient, forge.asn1.Type.SEQUENCE)) continue;
    const encryptedKey = primitiveBytes(child(recipient, 3, 'encryptedKey'), 'encryptedKey');

    try {
      const contentKey = forgeKey.decrypt(encryptedKey, 'RSAES-PKCS1-V1_5');
      const content = runCipher('decrypt', cipher, contentKey, iv, primitiveBytes(encrypted, 'encryptedContent'));
      return { content: fromBinary(content), cipher: cipherOid };
    } catch (e) {
      lastError = e;
    }
  }

  throw ScepError.decrypt(lastError);
}

/** Encrypt `content` to the holder of `recipientCertDer`, as an EnvelopedData ContentInfo. */
export function encryptEnvelope(
  content: Uint8Array,
  recipientCertDer: Uint8Array,
  cipherOid: string,
): Buffer {
  const cipher = cipherFor(cipherOid);
  const contentKey = toBinary(randomBytes(cipher.keyLength));
  const iv = toBinary(randomBytes(cipher.ivLength));
  const encrypted = runCipher('encrypt', cipher, contentKey, iv, toBinary(content));
  const encryptedKey = toForgePublicKey(recipientCertDer).encrypt(contentKey, 'RSAES-PKCS1-V1_5');

  const envelope = seq([
    int(0),
    set([
      seq([
        int(0),
        issuerAndSerialNumber(recipientCertDer),
        algorithmIdentifier(OID.rsaEncryption),
        octets(fromBinary(encryptedKey)),
      ]),
    ]),
    seq([
      oid(OID.data),
      algorithmIdentifier(cipherOid, octets(fromBinary(iv))),
      implicitPrimitive(0, encrypted),
    ]),
  ]);

  return encodeDer(seq([oid(OID.envelopedData), tagged(0, [envelope])]));
}
