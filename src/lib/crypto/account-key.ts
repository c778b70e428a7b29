/**
 * ACME account key loading
 *
 * The account key authenticates JWS requests to the CA (RFC 8555 Section 6.2).
 * RSA keys sign with RS256, EC keys with the ES algorithm of their curve.
 */

import { createPrivateKey, createPublicKey, type KeyObject } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { exportJWK, type JWK } from 'jose';
import { AccountError } from '../errors/bridge-errors.js';
import { decodeFirstPemBlock } from '../utils/pem.js';

export type AccountKeyAlgorithm = 'RS256' | 'ES256' | 'ES384';

export interface AccountKey {
  privateKey: KeyObject;
  publicJwk: JWK;
  alg: AccountKeyAlgorithm;
}

const PEM_KEY_TYPES: Record<string, 'pkcs1' | 'sec1'> = {
  'RSA PRIVATE KEY': 'pkcs1',
  'EC PRIVATE KEY': 'sec1',
};

function algorithmFor(key: KeyObject): AccountKeyAlgorithm {
  if (key.asymmetricKeyType === 'rsa') return 'RS256';
  if (key.asymmetricKeyType === 'ec') {
    const curve = key.asymmetricKeyDetails?.namedCurve;
    if (curve === 'prime256v1') return 'ES256';
    if (curve === 'secp384r1') return 'ES384';
    throw AccountError.unsupportedKey(`EC curve ${curve ?? 'unknown'}`);
  }
  throw AccountError.unsupportedKey(`key type ${key.asymmetricKeyType ?? 'unknown'}`);
}

/** Parse a PEM account key (PKCS#1, SEC 1 or PKCS#8). */
export async function parseAccountKey(pem: string): Promise<AccountKey> {
  const block = decodeFirstPemBlock(pem);
  if (!block) throw AccountError.unsupportedKey('PEM decode failed');

  let privateKey: KeyObject;
  try {
    privateKey = createPrivateKey({
      key: block.der,
      format: 'der',
      type: PEM_KEY_TYPES[block.label] ?? 'pkcs8',
    });
  } catch (e) {
    throw AccountError.unsupportedKey(e instanceof Error ? e.message : String(e));
  }

  const alg = algorithmFor(privateKey);
  const publicJwk = await exportJWK(createPublicKey(privateKey));
  return { privateKey, publicJwk, alg };
}

export async function loadAccountKey(path: string): Promise<AccountKey> {
  return parseAccountKey(await readFile(path, 'utf8'));
}
