import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { nopLogger, type Logger } from '../../logger.js';
import { parseCertificateRequest, requireChallengePassword } from '../crypto/csr.js';
import { WhitelistError } from '../errors/bridge-errors.js';
import { AuthorizationTable, buildAuthorizationTable } from './authorization-table.js';

/** Decides whether a certificate request may be forwarded to the CA. */
export interface CsrVerifier {
  verify(csrDer: Uint8Array): Promise<boolean>;
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Authorizes a CSR by its challenge password.
 *
 * The CN (empty when absent) and each DNS SAN must match a rule of the
 * presented secret. A request naming nothing is rejected.
 */
export class CsrPasswordVerifier implements CsrVerifier {
  constructor(
    private readonly table: AuthorizationTable,
    private readonly logger: Logger = nopLogger,
  ) {}

  /**
   * Load the YAML whitelist at `path`.
   * @throws {WhitelistError} when the file cannot be read or parsed, or holds a bad entry
   */
  static async fromFile(path: string, logger: Logger = nopLogger): Promise<CsrPasswordVerifier> {
    let document: unknown;
    try {
      document = parseYaml(await readFile(path, 'utf8'));
    } catch (e) {
      throw WhitelistError.load(path, e);
    }
    // An empty file parses to null and authorizes nothing.
    if (document === null || document === undefined) document = {};
    if (!isMapping(document)) throw WhitelistError.notAMapping(path);

    return new CsrPasswordVerifier(buildAuthorizationTable(document), logger);
  }

  allows(secret: string, hostname: string): boolean {
    return this.table.allows(secret, hostname);
  }

  /**
   * @returns false for a well-formed request naming something the secret does not cover
   * @throws {CsrError} when the request or its challenge password cannot be parsed
   */
  async verify(csrDer: Uint8Array): Promise<boolean> {
    const request = parseCertificateRequest(csrDer);
    const secret = requireChallengePassword(request);

    if (request.commonName === undefined && request.dnsNames.length === 0) {
      this.logger.info('CSR names no hostname');
      return false;
    }

    // A request without a CN is checked as CN ""
    const commonName = request.commonName ?? '';
    if (!this.allows(secret, commonName)) {
      this.logger.info('Subject CN not allowed', { cn: commonName });
      return false;
    }

    for (const name of request.dnsNames) {
      if (!this.allows(secret, name)) {
        this.logger.info('SAN not allowed', { san: name });
        return false;
      }
    }

    this.logger.info('CSR passed verification', {
      cn: request.commonName,
      sans: request.dnsNames,
    });
    return true;
  }
}
