/**
 * RFC 8555 ACME Nonce Manager
 *
 * Pools anti-replay nonces per namespace (usually the ACME server host).
 * Every response's `Replay-Nonce` is harvested; a HEAD to newNonce is made
 * only when the pool is empty.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.5
 */

import { NONCE_MAX_AGE_MS, NONCE_MAX_ATTEMPTS, NONCE_MAX_POOL_SIZE } from '../constants/defaults.js';
import { BadNonceError } from '../errors/acme-server-errors.js';
import { createErrorFromProblem } from '../errors/factory.js';
import { headerValue, type AcmeResponse } from '../transport/http-client.js';
import { debugNonce } from '../utils/debug.js';

/** HEAD-like request against the newNonce URL. */
export type FetchLike = (url: string) => Promise<AcmeResponse>;

export interface NonceManagerOptions {
  /** Absolute URL of the newNonce endpoint */
  newNonceUrl: string;
  fetch: FetchLike;
  /** Nonces older than this are discarded. Defaults to 2 minutes. */
  maxAgeMs?: number;
  /** Cap per namespace; the oldest nonce is evicted first. Defaults to 32. */
  maxPool?: number;
}

export interface NonceEntry {
  value: string;
  timestamp: number;
}

function isProblemResponse(res: AcmeResponse): boolean {
  return (headerValue(res.headers, 'content-type') ?? '').toLowerCase().includes('application/problem+json');
}

export class NonceManager {
  private readonly opts: Required<NonceManagerOptions>;
  private readonly pool = new Map<string, NonceEntry[]>();

  constructor(opts: NonceManagerOptions) {
    this.opts = {
      maxAgeMs: NONCE_MAX_AGE_MS,
      maxPool: NONCE_MAX_POOL_SIZE,
      ...opts,
    };
  }

  /**
   * Newest non-stale nonce of `namespace`, fetching one when the pool is empty.
   * @throws {BadNonceError} when newNonce answers without a Replay-Nonce header
   * @throws {AcmeError} when newNonce answers with a problem document
   */
  async get(namespace = 'default'): Promise<string> {
    this.cleanStale(namespace);

    const entry = this.pool.get(namespace)?.pop();
    if (entry) {
      debugNonce('returning pooled nonce: namespace=%s', namespace);
      return entry.value;
    }

    return this.fetchNewNonce(namespace);
  }

  /** Pool size of `namespace`. */
  getStats(namespace = 'default'): { poolSize: number } {
    return { poolSize: this.pool.get(namespace)?.length ?? 0 };
  }

  clear(): void {
    this.pool.clear();
    debugNonce('cleared all pools');
  }

  /**
   * Run an ACME request, retrying with a fresh nonce when the server answers
   * `badNonce`. The last response is returned once attempts are exhausted;
   * any other response, successful or not, is returned as is.
   */
  async withNonceRetry(
    namespace: string,
    fn: (nonce: string) => Promise<AcmeResponse>,
    maxAttempts = NONCE_MAX_ATTEMPTS,
  ): Promise<AcmeResponse> {
    let res: AcmeResponse | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const nonce = await this.get(namespace);
      res = await fn(nonce);
      this.putFromResponse(namespace, res);

      debugNonce('attempt %d: HTTP %d', attempt, res.statusCode);

      if (res.statusCode < 400 || !isProblemResponse(res)) return res;
      if (!(createErrorFromProblem(res.body) instanceof BadNonceError)) return res;

      debugNonce('badNonce on attempt %d of %d', attempt, maxAttempts);
    }

    if (!res) throw new BadNonceError('Nonce retry exhausted');
    return res;
  }

  private async fetchNewNonce(namespace: string): Promise<string> {
    debugNonce('fetching new nonce: namespace=%s', namespace);
    const response = await this.opts.fetch(this.opts.newNonceUrl);

    if (response.statusCode !== 200 && response.statusCode !== 204) {
      throw createErrorFromProblem(response.body);
    }

    const nonce = headerValue(response.headers, 'replay-nonce');
    if (!nonce) {
      throw new BadNonceError('No replay-nonce header in response');
    }
    return nonce;
  }

  private cleanStale(namespace: string): void {
    const pool = this.pool.get(namespace);
    if (!pool) return;

    const cutoff = Date.now() - this.opts.maxAgeMs;
    const fresh = pool.filter((entry) => entry.timestamp >= cutoff);
    if (fresh.length !== pool.length) {
      debugNonce('dropped %d stale nonces: namespace=%s', pool.length - fresh.length, namespace);
      this.pool.set(namespace, fresh);
    }
  }

  private putFromResponse(namespace: string, res: AcmeResponse): void {
    const nonce = headerValue(res.headers, 'replay-nonce');
    if (nonce) this.putNonce(namespace, nonce);
  }

  private putNonce(namespace: string, nonce: string): void {
    const pool = this.pool.get(namespace) ?? [];
    if (pool.some((entry) => entry.value === nonce)) return;

    if (pool.length >= this.opts.maxPool) pool.shift();
    pool.push({ value: nonce, timestamp: Date.now() });
    this.pool.set(namespace, pool);
    debugNonce('stored nonce: namespace=%s pool size=%d', namespace, pool.length);
  }
}
