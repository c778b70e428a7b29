/**
 * SCEP over HTTP
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8894#section-4.1
 */

import type { IncomingMessage, RequestListener, ServerResponse } from 'node:http';
import type { Logger } from '../../logger.js';
import { MAX_PKI_MESSAGE_BYTES, SCEP_PATH } from '../constants/defaults.js';
import { debugScep } from '../utils/debug.js';
import { CONTENT_TYPE } from './constants.js';
import type { ScepService } from './scep-service.js';

/** Status-carrying failure raised while reading the request. */
class HttpProblem extends Error {
  constructor(
    readonly statusCode: number,
    message: string,
  ) {
    super(message);
  }
}

interface Reply {
  statusCode: number;
  contentType: string;
  body: Buffer | string;
}

const text = (statusCode: number, body: string): Reply => ({
  statusCode,
  contentType: CONTENT_TYPE.TEXT,
  body: `${body}\n`,
});

async function readBody(req: IncomingMessage, limit: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    // keep reading past the limit so the socket stays usable for the reply
    if (size <= limit) chunks.push(buf);
  }
  if (size > limit) throw new HttpProblem(413, `message exceeds ${limit} bytes`);
  return Buffer.concat(chunks);
}

/** `message` query parameter of a GET PKIOperation; a `+` may arrive as a space. */
function decodeMessageParam(value: string | null): Buffer {
  const compact = (value ?? '').replace(/ /g, '+').replace(/\s+/g, '');
  if (compact === '' || !/^[A-Za-z0-9+/]*={0,2}$/.test(compact)) {
    throw new HttpProblem(400, 'missing or invalid message parameter');
  }
  return Buffer.from(compact, 'base64');
}

async function route(service: ScepService, req: IncomingMessage, url: URL): Promise<Reply> {
  const method = req.method ?? 'GET';
  if (url.pathname !== SCEP_PATH) return text(404, 'not found');
  if (method !== 'GET' && method !== 'POST') return text(405, 'method not allowed');

  const operation = url.searchParams.get('operation');
  switch (operation) {
    case 'GetCACaps':
      if (method !== 'GET') return text(405, 'method not allowed');
      return { statusCode: 200, contentType: CONTENT_TYPE.TEXT, body: await service.getCACaps() };

    case 'GetCACert': {
      if (method !== 'GET') return text(405, 'method not allowed');
      const { body, contentType } = await service.getCACert(url.searchParams.get('message') ?? undefined);
      return { statusCode: 200, contentType, body };
    }

    case 'PKIOperation': {
      const message =
        method === 'POST'
          ? await readBody(req, MAX_PKI_MESSAGE_BYTES)
          : decodeMessageParam(url.searchParams.get('message'));
      if (message.length === 0) return text(400, 'empty PKI message');
      return {
        statusCode: 200,
        contentType: CONTENT_TYPE.PKI_MESSAGE,
        body: await service.pkiOperation(message),
      };
    }

    case null:
      return text(400, 'missing operation');
    default:
      return text(400, `unknown operation ${operation}`);
  }
}

/** Request listener serving `service` under the SCEP path. */
export function createScepHttpHandler(service: ScepService, logger: Logger): RequestListener {
  const log = logger.with({ component: 'http' });

  return (req: IncomingMessage, res: ServerResponse) => {
    const startedAt = Date.now();
    const url = new URL(req.url ?? '/', 'http://localhost');
    const operation = url.searchParams.get('operation') ?? '';

    const respond = (reply: Reply) => {
      res.writeHead(reply.statusCode, {
        'content-type': reply.contentType,
        'content-length': Buffer.byteLength(reply.body),
      });
      res.end(reply.body);
      log.info('request', {
        method: req.method,
        path: url.pathname,
        operation,
        status: reply.statusCode,
        took: `${Date.now() - startedAt}ms`,
      });
    };

    const handle = async (): Promise<void> => {
      try {
        respond(await route(service, req, url));
      } catch (e) {
        if (e instanceof HttpProblem) {
          respond(text(e.statusCode, e.message));
          return;
        }
        log.error('request failed', { operation, err: e });
        debugScep('request failed: %O', e);
        respond(text(500, 'internal server error'));
      }
    };
    void handle();
  };
}
