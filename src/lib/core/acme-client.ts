import { AcmeHttpClient } from '../transport/http-client.js';
import { AcmeDirectorySchema, type AcmeDirectory } from '../types/directory.js';
import { NonceManager, type NonceManagerOptions } from '../managers/nonce-manager.js';
import { createErrorFromProblem } from '../errors/factory.js';
import { MalformedError } from '../errors/acme-server-errors.js';
import { debugAcme } from '../utils/debug.js';

export interface AcmeClientOptions {
  /**
   * Options of the NonceManager created once the directory is known.
   *
   * @see {@link https://datatracker.ietf.org/doc/html/rfc8555#section-6.5 | RFC 8555 Section 6.5 - Replay Protection}
   */
  nonce?: Partial<Omit<NonceManagerOptions, 'newNonceUrl' | 'fetch'>>;
}

/**
 * RFC 8555 ACME client
 *
 * Entry point bound to one directory URL. Fetches the directory once and
 * caches it, and owns the HTTP client and the nonce pool that every account
 * of this client shares.
 *
 * @example
 * ```typescript
 * const client = new AcmeClient('https://acme-staging-v02.api.letsencrypt.org/directory');
 * const directory = await client.getDirectory();
 * ```
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc8555 | RFC 8555 - ACME Protocol}
 */
export class AcmeClient {
  public readonly directoryUrl: string;
  private readonly opts: AcmeClientOptions;
  private readonly http = new AcmeHttpClient();

  private directory?: AcmeDirectory;
  private nonce?: NonceManager;

  constructor(directoryUrl: string, opts: AcmeClientOptions = {}) {
    this.directoryUrl = directoryUrl;
    this.opts = opts;
  }

  /**
   * Fetch and cache the server directory.
   *
   * @throws {AcmeError} when the server answers with an error or an unusable directory
   * @see {@link https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.1 | RFC 8555 Section 7.1.1 - Directory}
   */
  public async getDirectory(): Promise<AcmeDirectory> {
    if (this.directory) return this.directory;

    const res = await this.http.get(this.directoryUrl);
    if (res.statusCode !== 200) {
      throw createErrorFromProblem(res.body);
    }

    const parsed = AcmeDirectorySchema.safeParse(res.body);
    if (!parsed.success) {
      throw new MalformedError(`invalid ACME directory at ${this.directoryUrl}`);
    }
    debugAcme('directory loaded: %s', this.directoryUrl);

    const directory = parsed.data;
    this.directory = directory;
    this.nonce = new NonceManager({
      newNonceUrl: directory.newNonce,
      fetch: (url: string) => this.http.head(url),
      ...this.opts.nonce,
    });

    return directory;
  }

  public getHttp(): AcmeHttpClient {
    return this.http;
  }

  /** Shared nonce pool. Resolves the directory first when needed. */
  public async getNonceManager(): Promise<NonceManager> {
    await this.getDirectory();
    if (!this.nonce) {
      throw new Error('NonceManager not initialized');
    }
    return this.nonce;
  }

  /** Namespace the nonce pool keys requests by. */
  public get nonceNamespace(): string {
    return new URL(this.directoryUrl).host;
  }
}
