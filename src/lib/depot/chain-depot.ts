/**
 * Chain depot
 *
 * Supplies the bridge's own RA identity: the certificate chain (leaf first)
 * and the RSA key of the leaf. Both files are read again on every call.
 */

import { createPrivateKey, createPublicKey, type KeyObject } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { X509Certificate } from '@peculiar/x509';
import '../crypto/x509-provider.js';
import { DepotError } from '../errors/bridge-errors.js';
import { debugDepot } from '../utils/debug.js';
import { decodeFirstPemBlock, decodePemBlocks } from '../utils/pem.js';

/** RA certificate chain and the private key of its first certificate. */
export interface CaIdentity {
  chain: X509Certificate[];
  key: KeyObject;
}

/** Identity and storage capability the SCEP engine consumes. */
export interface Depot {
  ca(): Promise<CaIdentity>;
  serial(): Promise<bigint>;
  /** Whether a certificate for `commonName` was already issued */
  hasCN(commonName: string, allowTime: number, revokeOldCertificate: boolean): Promise<boolean>;
  put(name: string, certificate: X509Certificate): Promise<void>;
}

export interface ChainDepotOptions {
  /** Reject a key whose public half differs from the leaf's public key */
  verifyKeyPair?: boolean;
}

/**
 * Decode every PEM block of `text` as a certificate, in order.
 * @throws {DepotError} when there is no block or a block is not a certificate
 */
export function loadCerts(text: string): X509Certificate[] {
  const blocks = decodePemBlocks(text);
  if (blocks.length === 0) throw DepotError.pemDecodeFailed();

  const certs: X509Certificate[] = [];
  for (const block of blocks) {
    try {
      certs.push(new X509Certificate(block.der));
    } catch (e) {
      throw DepotError.certificateParse(certs.length, e);
    }
  }
  return certs;
}

/**
 * Decode the first PEM block of `text` as an RSA private key.
 * `RSA PRIVATE KEY` blocks are PKCS#1, every other label is read as PKCS#8.
 */
export function loadKey(text: string): KeyObject {
  const block = decodeFirstPemBlock(text);
  if (!block) throw DepotError.pemDecodeFailed();

  let key: KeyObject;
  try {
    key = createPrivateKey({
      key: block.der,
      format: 'der',
      type: block.label === 'RSA PRIVATE KEY' ? 'pkcs1' : 'pkcs8',
    });
  } catch (e) {
    throw DepotError.keyParse(e);
  }

  if (key.asymmetricKeyType !== 'rsa') throw DepotError.notRsa(key.asymmetricKeyType);
  return key;
}

/** True when `key` is the private half of the public key in `leaf`. */
export function keyMatchesCertificate(key: KeyObject, leaf: X509Certificate): boolean {
  const fromKey = createPublicKey(key).export({ type: 'spki', format: 'der' });
  return Buffer.from(leaf.publicKey.rawData).equals(fromKey);
}

/** File-backed {@link Depot}; never mints or stores certificates. */
export class ChainDepot implements Depot {
  constructor(
    private readonly certPath: string,
    private readonly keyPath: string,
    private readonly options: ChainDepotOptions = {},
  ) {}

  async ca(): Promise<CaIdentity> {
    const chain = loadCerts(await readFile(this.certPath, 'utf8'));
    const key = loadKey(await readFile(this.keyPath, 'utf8'));
    debugDepot('loaded chain: certs=%d path=%s', chain.length, this.certPath);

    const [leaf] = chain;
    if (this.options.verifyKeyPair && leaf && !keyMatchesCertificate(key, leaf)) {
      throw DepotError.keyMismatch();
    }
    return { chain, key };
  }

  async serial(): Promise<bigint> {
    throw DepotError.cannotCreateCertificates();
  }

  async hasCN(_commonName: string, _allowTime: number, _revokeOldCertificate: boolean): Promise<boolean> {
    return false;
  }

  async put(_name: string, _certificate: X509Certificate): Promise<void> {
    // Issued certificates are not kept.
  }
}
