import { request } from 'undici';
import { debugHttp } from '../utils/debug.js';
import { buildUserAgent } from '../utils/user-agent.js';

export type ResponseHeaders = Record<string, string | string[] | undefined>;

/** Status, headers and a body parsed by content type. */
export interface AcmeResponse {
  statusCode: number;
  headers: ResponseHeaders;
  /** JSON value, text (PEM chains, text/*), Buffer otherwise; undefined for HEAD */
  body: unknown;
}

type BodyMixin = {
  json(): Promise<unknown>;
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
};

/** Last value of a header, case-insensitively. */
export function headerValue(headers: ResponseHeaders, name: string): string | undefined {
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
  const raw = key === undefined ? undefined : headers[key];
  return Array.isArray(raw) ? raw[raw.length - 1] : raw;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * RFC 8555 HTTP transport
 *
 * Thin undici wrapper used for every call to the ACME server:
 * - User-Agent injection
 * - content-type aware body parsing (JSON, problem+json, PEM chain text, binary)
 * - request/response tracing on the `http` debug namespace
 */
export class AcmeHttpClient {
  private static userAgent = buildUserAgent();

  private withUserAgent(headers: Record<string, string>): Record<string, string> {
    const hasUA = Object.keys(headers).some((k) => k.toLowerCase() === 'user-agent');
    return hasUA ? { ...headers } : { ...headers, 'User-Agent': AcmeHttpClient.userAgent };
  }

  async get(url: string, headers: Record<string, string> = {}): Promise<AcmeResponse> {
    return this.send('GET', url, this.withUserAgent(headers));
  }

  async head(url: string, headers: Record<string, string> = {}): Promise<AcmeResponse> {
    return this.send('HEAD', url, this.withUserAgent(headers));
  }

  /** POST a JOSE object (serialized as JSON) or a raw string body. */
  async post(
    url: string,
    body: string | object,
    headers: Record<string, string> = {},
  ): Promise<AcmeResponse> {
    const payload = typeof body === 'string' ? body : JSON.stringify(body);
    debugHttp('POST %s body length=%d', url, payload.length);
    return this.send('POST', url, this.withUserAgent(headers), payload);
  }

  private async send(
    method: 'GET' | 'HEAD' | 'POST',
    url: string,
    headers: Record<string, string>,
    body?: string,
  ): Promise<AcmeResponse> {
    debugHttp('%s %s init headers=%j', method, url, headers);
    const start = Date.now();

    try {
      const res = await request(url, { method, headers, body: body ?? null });
      debugHttp(
        '%s %s response status=%d durationMs=%d content-type=%s',
        method,
        url,
        res.statusCode,
        Date.now() - start,
        res.headers['content-type'],
      );

      this.logRateLimit(method, url, res.statusCode, res.headers);

      if (method === 'HEAD') {
        await res.body.dump();
        return { statusCode: res.statusCode, headers: res.headers, body: undefined };
      }

      const data = await this.parseResponseBody(res.headers, res.body);
      return { statusCode: res.statusCode, headers: res.headers, body: data };
    } catch (err) {
      debugHttp('%s %s error: %s', method, url, errorMessage(err));
      throw err;
    }
  }

  private async parseResponseBody(headers: ResponseHeaders, body: BodyMixin): Promise<unknown> {
    const ct = headerValue(headers, 'content-type')?.toLowerCase() ?? '';

    if (ct.includes('application/json') || ct.includes('application/problem+json')) {
      return body.json();
    }
    if (ct.startsWith('text/') || ct.includes('application/pem-certificate-chain')) {
      return body.text();
    }
    return Buffer.from(await body.arrayBuffer());
  }

  private logRateLimit(method: string, url: string, statusCode: number, headers: ResponseHeaders) {
    if (statusCode === 429 || statusCode === 503) {
      debugHttp(
        'RATE LIMIT DETECTED: %s %s status=%d retry-after=%s',
        method,
        url,
        statusCode,
        headerValue(headers, 'retry-after') ?? 'NOT_SET',
      );
    }
  }
}
