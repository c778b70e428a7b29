import { jest } from '@jest/globals';
import { z } from 'zod';
import { ACME_ERROR } from '../../src/lib/errors/codes.js';
import { AcmeHttpClient, type AcmeResponse } from '../../src/lib/transport/http-client.js';

export const ACME_BASE = 'https://acme.test';
export const DIRECTORY_URL = `${ACME_BASE}/directory`;

const JwsSchema = z.object({ protected: z.string(), payload: z.string(), signature: z.string() });

const ProtectedHeaderSchema = z.object({
  alg: z.string(),
  nonce: z.string(),
  url: z.string(),
  kid: z.string().optional(),
  jwk: z.record(z.unknown()).optional(),
});

const NewOrderSchema = z.object({ identifiers: z.array(z.object({ type: z.string(), value: z.string() })) });
const FinalizeSchema = z.object({ csr: z.string() });

export interface RecordedRequest {
  url: string;
  header: z.infer<typeof ProtectedHeaderSchema>;
  /** Parsed JSON payload; undefined for POST-as-GET */
  payload: unknown;
}

export interface FakeAcmeOptions {
  /** PEM served by the certificate URL */
  chainPem?: string;
  /** Authorization status before the challenge is answered */
  initialAuthzStatus?: string;
  /** Fail the authorization once its challenge is answered */
  rejectChallenge?: boolean;
}

const decode = (segment: string): unknown => {
  const text = Buffer.from(segment, 'base64url').toString('utf8');
  return text === '' ? undefined : JSON.parse(text);
};

/**
 * In-process ACME CA answering one order. Installs spies on
 * {@link AcmeHttpClient}; restore them with `jest.restoreAllMocks()`.
 */
export class FakeAcmeServer {
  readonly requests: RecordedRequest[] = [];
  finalizedCsr: Buffer | undefined;

  private nonce = 0;
  private names: string[] = [];
  private readonly answered = new Set<string>();

  constructor(private readonly opts: FakeAcmeOptions = {}) {}

  install(): this {
    jest.spyOn(AcmeHttpClient.prototype, 'get').mockImplementation(async (url) => this.handleGet(url));
    jest.spyOn(AcmeHttpClient.prototype, 'head').mockImplementation(async () => this.reply(200, undefined));
    jest.spyOn(AcmeHttpClient.prototype, 'post').mockImplementation(async (url, body) => this.handlePost(url, body));
    return this;
  }

  /** URLs of every signed request, in order. */
  get urls(): string[] {
    return this.requests.map((r) => r.url.replace(ACME_BASE, ''));
  }

  private reply(statusCode: number, body: unknown, headers: Record<string, string> = {}): AcmeResponse {
    return {
      statusCode,
      headers: { 'content-type': 'application/json', 'replay-nonce': `nonce-${++this.nonce}`, ...headers },
      body,
    };
  }

  private problem(statusCode: number, type: string, detail: string): AcmeResponse {
    return this.reply(statusCode, { type, detail, status: statusCode }, { 'content-type': 'application/problem+json' });
  }

  private handleGet(url: string): AcmeResponse {
    if (url !== DIRECTORY_URL) return this.problem(404, ACME_ERROR.malformed, `no resource ${url}`);
    return this.reply(200, {
      newNonce: `${ACME_BASE}/new-nonce`,
      newAccount: `${ACME_BASE}/new-account`,
      newOrder: `${ACME_BASE}/new-order`,
      meta: { termsOfService: `${ACME_BASE}/terms` },
    });
  }

  private handlePost(url: string, body: string | object): AcmeResponse {
    const jws = JwsSchema.parse(typeof body === 'string' ? JSON.parse(body) : body);
    const header = ProtectedHeaderSchema.parse(decode(jws.protected));
    const payload = decode(jws.payload);
    this.requests.push({ url, header, payload });

    if (header.url !== url) return this.problem(400, ACME_ERROR.unauthorized, 'url mismatch');
    const path = url.slice(ACME_BASE.length);

    if (path === '/new-account') {
      return this.reply(201, { status: 'valid' }, { location: `${ACME_BASE}/acct/1` });
    }
    if (path === '/new-order') {
      this.names = NewOrderSchema.parse(payload).identifiers.map((id) => id.value);
      return this.reply(201, this.order('pending'), { location: `${ACME_BASE}/order/1` });
    }
    if (path === '/order/1') {
      const ready = this.names.every((name) => this.authorized(name));
      return this.reply(200, this.order(this.finalizedCsr ? 'valid' : ready ? 'ready' : 'pending'));
    }
    if (path === '/order/1/finalize') {
      this.finalizedCsr = Buffer.from(FinalizeSchema.parse(payload).csr, 'base64url');
      return this.reply(200, this.order('processing'));
    }
    if (path === '/cert/1') {
      return this.reply(200, this.opts.chainPem ?? '', { 'content-type': 'application/pem-certificate-chain' });
    }
    if (path.startsWith('/authz/')) {
      return this.reply(200, this.authorization(path.slice('/authz/'.length)));
    }
    if (path.startsWith('/chall/')) {
      const name = path.slice('/chall/'.length);
      this.answered.add(name);
      return this.reply(200, { ...this.dnsChallenge(name), status: 'processing' });
    }
    return this.problem(404, ACME_ERROR.malformed, `no resource ${url}`);
  }

  private authorized(name: string): boolean {
    return this.answered.has(name) || this.opts.initialAuthzStatus === 'valid';
  }

  private order(status: string) {
    return {
      status,
      identifiers: this.names.map((value) => ({ type: 'dns', value })),
      authorizations: this.names.map((name) => `${ACME_BASE}/authz/${name}`),
      finalize: `${ACME_BASE}/order/1/finalize`,
      ...(status === 'valid' && { certificate: `${ACME_BASE}/cert/1` }),
    };
  }

  private dnsChallenge(name: string) {
    return {
      type: 'dns-01',
      url: `${ACME_BASE}/chall/${name}`,
      status: 'pending',
      token: `token-${name.replace(/\./g, '-')}`,
    };
  }

  private authorization(name: string) {
    const identifier = { type: 'dns', value: name };
    const httpChallenge = { type: 'http-01', url: `${ACME_BASE}/chall-http/${name}`, status: 'pending', token: 'http' };

    if (!this.answered.has(name)) {
      return {
        identifier,
        status: this.opts.initialAuthzStatus ?? 'pending',
        challenges: [httpChallenge, this.dnsChallenge(name)],
      };
    }
    if (this.opts.rejectChallenge) {
      return {
        identifier,
        status: 'invalid',
        challenges: [
          {
            ...this.dnsChallenge(name),
            status: 'invalid',
            error: { type: ACME_ERROR.incorrectResponse, detail: 'no TXT record found' },
          },
        ],
      };
    }
    return { identifier, status: 'valid', challenges: [{ ...this.dnsChallenge(name), status: 'valid' }] };
  }
}
