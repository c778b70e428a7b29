import { createHash } from 'node:crypto';
import * as jose from 'jose';
import type { z } from 'zod';

import type { AcmeClient } from './acme-client.js';
import type { AccountKey } from '../crypto/account-key.js';
import { POLL_INTERVAL_MS, POLL_MAX_ATTEMPTS } from '../constants/defaults.js';
import { MalformedError } from '../errors/acme-server-errors.js';
import { AccountError, AuthorizationError, OrderError } from '../errors/bridge-errors.js';
import { createErrorFromProblem } from '../errors/factory.js';
import { headerValue, type AcmeResponse, type ResponseHeaders } from '../transport/http-client.js';
import {
  AcmeAuthorizationSchema,
  AcmeChallengeSchema,
  AcmeOrderSchema,
  type AcmeAuthorization,
  type AcmeChallenge,
  type AcmeOrder,
} from '../types/order.js';
import { AUTHORIZATION_STATUS, ORDER_STATUS, type AcmeOrderStatus } from '../types/status.js';
import { debugAcme } from '../utils/debug.js';

export interface AcmeAccountRegistrationPayload {
  contact: string | string[];
  termsOfServiceAgreed: true;
}

export interface PollingOptions {
  /** Delay between polls when the server sends no Retry-After. Defaults to 2 seconds. */
  intervalMs?: number;
  maxAttempts?: number;
}

export interface AcmeAccountOptions {
  /** Account URL of an already registered account */
  kid?: string;
  polling?: PollingOptions;
}

type JsonPayload = Record<string, unknown>;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Retry-After as milliseconds; accepts delay-seconds and HTTP dates. */
export function parseRetryAfter(headers: ResponseHeaders): number | undefined {
  const raw = headerValue(headers, 'retry-after');
  if (raw === undefined) return undefined;
  if (/^\d+$/.test(raw.trim())) return Number(raw) * 1000;
  const at = Date.parse(raw);
  return Number.isNaN(at) ? undefined : Math.max(0, at - Date.now());
}

/**
 * RFC 8555 ACME Account
 *
 * Signs every request with the account key (JWS, RFC 7515) and covers the
 * part of the certificate lifecycle the bridge drives:
 *
 * - Account registration (Section 7.3)
 * - Order creation, finalization and polling (Section 7.4)
 * - Authorization and challenge handling (Section 7.5, Section 8)
 * - Certificate download (Section 7.4.2)
 *
 * Requests carry a `jwk` header until the account URL is known and a `kid`
 * header afterwards.
 *
 * @example
 * ```typescript
 * const account = new AcmeAccount(client, await loadAccountKey('account.pem'));
 * await account.register({ contact: 'admin@example.com', termsOfServiceAgreed: true });
 * const order = await account.newOrder(['device.example.com']);
 * ```
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555
 */
export class AcmeAccount {
  public readonly key: AccountKey;
  public kid?: string;

  private readonly client: AcmeClient;
  private readonly polling: Required<PollingOptions>;

  constructor(client: AcmeClient, key: AccountKey, opts: AcmeAccountOptions = {}) {
    this.client = client;
    this.key = key;
    if (opts.kid !== undefined) this.kid = opts.kid;
    this.polling = {
      intervalMs: opts.polling?.intervalMs ?? POLL_INTERVAL_MS,
      maxAttempts: opts.polling?.maxAttempts ?? POLL_MAX_ATTEMPTS,
    };
  }

  /**
   * Register (or look up) the account and remember its URL as `kid`.
   * Addresses without a scheme get `mailto:`.
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.3
   */
  async register({ contact, termsOfServiceAgreed }: AcmeAccountRegistrationPayload): Promise<{
    accountUrl: string;
    account: unknown;
  }> {
    const directory = await this.client.getDirectory();
    const contacts = Array.isArray(contact) ? contact : [contact];
    const payload = {
      contact: contacts.map((email) => (email.startsWith('mailto:') ? email : `mailto:${email}`)),
      termsOfServiceAgreed,
    };

    const response = await this.signedPost(directory.newAccount, payload, true);
    if (response.statusCode !== 200 && response.statusCode !== 201) {
      throw createErrorFromProblem(response.body);
    }

    const accountUrl = headerValue(response.headers, 'location');
    if (!accountUrl) {
      throw AccountError.noAccountUrl();
    }

    this.kid = accountUrl;
    debugAcme('account registered: %s', accountUrl);
    return { accountUrl, account: response.body };
  }

  /**
   * POST-as-GET `url` and validate the body with `schema`.
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.3
   */
  async fetch<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const response = await this.signedPost(url, null);
    if (response.statusCode !== 200) {
      throw createErrorFromProblem(response.body);
    }
    return this.parse(schema, response.body, url);
  }

  /** @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.4 */
  async newOrder(identifiers: string[]): Promise<AcmeOrder> {
    const directory = await this.client.getDirectory();
    const payload = {
      identifiers: identifiers.map((value) => ({ type: 'dns', value })),
    };

    const response = await this.signedPost(directory.newOrder, payload);
    if (response.statusCode !== 201) {
      throw createErrorFromProblem(response.body);
    }

    const url = headerValue(response.headers, 'location');
    if (!url) {
      throw new MalformedError('newOrder response has no Location header');
    }
    const order = this.parse(AcmeOrderSchema, response.body, directory.newOrder);
    debugAcme('order created: %s status=%s', url, order.status);
    return { ...order, url };
  }

  async getAuthorization(authzUrl: string): Promise<AcmeAuthorization> {
    return this.fetch(authzUrl, AcmeAuthorizationSchema);
  }

  async getOrder(orderUrl: string): Promise<AcmeOrder> {
    const order = await this.fetch(orderUrl, AcmeOrderSchema);
    return { ...order, url: orderUrl };
  }

  /**
   * Tell the server the challenge response is in place (empty JSON object).
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.5.1
   */
  async completeChallenge(challenge: AcmeChallenge): Promise<AcmeChallenge> {
    const response = await this.signedPost(challenge.url, {});
    if (response.statusCode !== 200) {
      throw createErrorFromProblem(response.body);
    }
    return this.parse(AcmeChallengeSchema, response.body, challenge.url);
  }

  /**
   * Key Authorization: token || '.' || base64url(JWK_Thumbprint(accountKey))
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-8.1
   */
  async keyAuthorization(token: string): Promise<string> {
    const thumbprint = await jose.calculateJwkThumbprint(this.key.publicJwk, 'sha256');
    return `${token}.${thumbprint}`;
  }

  /**
   * TXT record value for a dns-01 challenge: base64url(SHA-256(keyAuthorization)).
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-8.4
   */
  async dns01Value(token: string): Promise<string> {
    const keyAuth = await this.keyAuthorization(token);
    return createHash('sha256').update(keyAuth).digest('base64url');
  }

  /**
   * Submit the DER CSR to the order's finalize URL.
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.4
   */
  async finalize(order: AcmeOrder, csrDer: Uint8Array): Promise<AcmeOrder> {
    const payload = { csr: Buffer.from(csrDer).toString('base64url') };
    const response = await this.signedPost(order.finalize, payload);
    if (response.statusCode !== 200) {
      throw createErrorFromProblem(response.body);
    }
    return { ...this.parse(AcmeOrderSchema, response.body, order.finalize), url: order.url };
  }

  /**
   * Poll the order until it reaches one of `targetStatuses`.
   * @throws {OrderError} when the order turns invalid or attempts run out
   */
  async waitForOrder(order: AcmeOrder, targetStatuses: AcmeOrderStatus[]): Promise<AcmeOrder> {
    let current = order;
    let delay = this.polling.intervalMs;

    for (let attempt = 0; attempt < this.polling.maxAttempts; attempt++) {
      if (targetStatuses.includes(current.status)) return current;
      if (current.status === ORDER_STATUS.INVALID) throw OrderError.invalid(current.url);

      await sleep(delay);
      const response = await this.signedPost(current.url, null);
      if (response.statusCode !== 200) {
        throw createErrorFromProblem(response.body);
      }
      current = { ...this.parse(AcmeOrderSchema, response.body, current.url), url: current.url };
      delay = parseRetryAfter(response.headers) ?? this.polling.intervalMs;
      debugAcme('order %s status=%s', current.url, current.status);
    }

    if (targetStatuses.includes(current.status)) return current;
    if (current.status === ORDER_STATUS.INVALID) throw OrderError.invalid(current.url);
    throw OrderError.timeout(targetStatuses, current.status, this.polling.maxAttempts);
  }

  /**
   * Poll an authorization until it leaves `pending`.
   * @throws {AuthorizationError} when it ends in any state but valid
   */
  async waitForAuthorization(authzUrl: string): Promise<AcmeAuthorization> {
    let delay = this.polling.intervalMs;

    for (let attempt = 1; attempt <= this.polling.maxAttempts; attempt++) {
      const response = await this.signedPost(authzUrl, null);
      if (response.statusCode !== 200) {
        throw createErrorFromProblem(response.body);
      }
      const authz = this.parse(AcmeAuthorizationSchema, response.body, authzUrl);
      debugAcme('authorization %s status=%s', authzUrl, authz.status);

      if (authz.status === AUTHORIZATION_STATUS.VALID) return authz;
      if (authz.status !== AUTHORIZATION_STATUS.PENDING) {
        throw AuthorizationError.invalid(authz.identifier.value, challengeErrorDetail(authz));
      }
      if (attempt === this.polling.maxAttempts) {
        throw AuthorizationError.timeout(authz.identifier.value, authz.status, attempt);
      }

      delay = parseRetryAfter(response.headers) ?? this.polling.intervalMs;
      await sleep(delay);
    }

    throw AuthorizationError.timeout(authzUrl, AUTHORIZATION_STATUS.PENDING, this.polling.maxAttempts);
  }

  /**
   * Download the PEM chain of a valid order.
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.4.2
   */
  async downloadCertificate(order: AcmeOrder): Promise<string> {
    if (!order.certificate) {
      throw OrderError.noCertificateUrl();
    }

    const response = await this.signedPost(order.certificate, null, false, {
      Accept: 'application/pem-certificate-chain',
    });
    if (response.statusCode !== 200) {
      throw createErrorFromProblem(response.body);
    }

    const { body } = response;
    if (typeof body === 'string') return body;
    if (Buffer.isBuffer(body)) return body.toString('utf8');
    throw new MalformedError('certificate download did not return a PEM chain');
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, url: string): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      throw new MalformedError(
        `unexpected response from ${url}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`,
      );
    }
    return parsed.data;
  }

  /**
   * JWS-signed POST with nonce retry.
   *
   * @param payload - JSON object, or null for POST-as-GET (empty payload)
   * @param forceJwk - Use the `jwk` header even when `kid` is known (newAccount)
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.2
   */
  private async signedPost(
    url: string,
    payload: JsonPayload | null,
    forceJwk = false,
    headers: Record<string, string> = {},
  ): Promise<AcmeResponse> {
    const nonceManager = await this.client.getNonceManager();

    return nonceManager.withNonceRetry(this.client.nonceNamespace, async (nonce) => {
      const protectedHeader: jose.JWSHeaderParameters = { alg: this.key.alg, nonce, url };

      if (forceJwk || !this.kid) {
        protectedHeader.jwk = this.key.publicJwk;
      } else {
        protectedHeader.kid = this.kid;
      }

      const encodedPayload =
        payload === null ? new Uint8Array(0) : new TextEncoder().encode(JSON.stringify(payload));

      const jws = await new jose.FlattenedSign(encodedPayload)
        .setProtectedHeader(protectedHeader)
        .sign(this.key.privateKey);

      return this.client.getHttp().post(url, jws, {
        ...headers,
        'Content-Type': 'application/jose+json',
      });
    });
  }
}

function challengeErrorDetail(authz: AcmeAuthorization): string | undefined {
  for (const challenge of authz.challenges) {
    if (challenge.error !== undefined) {
      return createErrorFromProblem(challenge.error).detail;
    }
  }
  return undefined;
}
