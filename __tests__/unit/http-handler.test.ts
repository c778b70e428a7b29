import { describe, it, expect, jest, beforeAll, afterAll, beforeEach } from '@jest/globals';
import { createServer, type Server } from 'node:http';
import { request } from 'undici';
import { MAX_PKI_MESSAGE_BYTES } from '../../src/lib/constants/defaults.js';
import { createScepHttpHandler } from '../../src/lib/scep/http-handler.js';
import type { ScepService } from '../../src/lib/scep/scep-service.js';
import { recordingLogger, type LogEntry } from '../utils/logger.js';

const service = {
  getCACaps: jest.fn<ScepService['getCACaps']>(),
  getCACert: jest.fn<ScepService['getCACert']>(),
  pkiOperation: jest.fn<ScepService['pkiOperation']>(),
};

const entries: LogEntry[] = [];
let server: Server;
let base: string;

beforeAll(async () => {
  server = createServer(createScepHttpHandler(service, recordingLogger(entries)));
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const addr = server.address();
  if (!addr || typeof addr === 'string') throw new Error('server is not listening');
  base = `http://127.0.0.1:${addr.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

beforeEach(() => {
  entries.length = 0;
  service.getCACaps.mockReset().mockResolvedValue('SHA-256\nAES');
  service.getCACert.mockReset().mockResolvedValue({ body: Buffer.from([0x30, 0x03]), contentType: 'application/x-x509-ca-cert' });
  service.pkiOperation.mockReset().mockImplementation(async (data) => Buffer.concat([Buffer.from('rep:'), data]));
});

async function call(path: string, init: { method?: 'GET' | 'POST' | 'PUT'; body?: Buffer } = {}) {
  const res = await request(`${base}${path}`, { method: init.method ?? 'GET', body: init.body ?? null });
  const body = Buffer.from(await res.body.arrayBuffer());
  return { status: res.statusCode, contentType: res.headers['content-type'], body };
}

describe('SCEP HTTP handler', () => {
  it('serves GetCACaps as text', async () => {
    const res = await call('/scep?operation=GetCACaps');
    expect(res).toEqual({ status: 200, contentType: 'text/plain', body: Buffer.from('SHA-256\nAES') });
  });

  it('serves GetCACert with the content type of the service', async () => {
    const res = await call('/scep?operation=GetCACert&message=ca');
    expect(res).toEqual({ status: 200, contentType: 'application/x-x509-ca-cert', body: Buffer.from([0x30, 0x03]) });
    expect(service.getCACert).toHaveBeenCalledWith('ca');
  });

  it('passes a POSTed PKI message through unchanged', async () => {
    const message = Buffer.from([0x30, 0x80, 0x00, 0xff]);
    const res = await call('/scep?operation=PKIOperation', { method: 'POST', body: message });

    expect(res.status).toBe(200);
    expect(res.contentType).toBe('application/x-pki-message');
    expect(res.body).toEqual(Buffer.concat([Buffer.from('rep:'), message]));
    expect(service.pkiOperation).toHaveBeenCalledWith(message);
  });

  it('decodes a GET PKI message, reading spaces as plus signs', async () => {
    const message = Buffer.from([0xfb, 0xef, 0xff]);
    expect(message.toString('base64')).toBe('++//');

    const res = await call('/scep?operation=PKIOperation&message=%20%2B//');

    expect(res.status).toBe(200);
    expect(service.pkiOperation).toHaveBeenCalledWith(message);
  });

  it('rejects a GET PKI message that is not base64', async () => {
    const res = await call('/scep?operation=PKIOperation&message=***');
    expect(res).toEqual({
      status: 400,
      contentType: 'text/plain',
      body: Buffer.from('missing or invalid message parameter\n'),
    });
    expect(service.pkiOperation).not.toHaveBeenCalled();
  });

  it('rejects an empty POST body', async () => {
    const res = await call('/scep?operation=PKIOperation', { method: 'POST', body: Buffer.alloc(0) });
    expect(res.status).toBe(400);
    expect(res.body.toString()).toBe('empty PKI message\n');
  });

  it('answers 413 for a POSTed message over the size limit', async () => {
    const res = await call('/scep?operation=PKIOperation', {
      method: 'POST',
      body: Buffer.alloc(MAX_PKI_MESSAGE_BYTES + 1, 0x30),
    });

    expect(res.status).toBe(413);
    expect(res.body.toString()).toBe(`message exceeds ${MAX_PKI_MESSAGE_BYTES} bytes\n`);
    expect(service.pkiOperation).not.toHaveBeenCalled();
  });

  it('accepts a POSTed message of exactly the size limit', async () => {
    const res = await call('/scep?operation=PKIOperation', {
      method: 'POST',
      body: Buffer.alloc(MAX_PKI_MESSAGE_BYTES, 0x30),
    });

    expect(res.status).toBe(200);
    expect(service.pkiOperation.mock.calls[0]?.[0]).toHaveLength(MAX_PKI_MESSAGE_BYTES);
  });

  it('answers 400 for a missing or unknown operation', async () => {
    expect((await call('/scep')).body.toString()).toBe('missing operation\n');
    const res = await call('/scep?operation=GetNextCACert');
    expect(res.status).toBe(400);
    expect(res.body.toString()).toBe('unknown operation GetNextCACert\n');
  });

  it('answers 404 outside the SCEP path', async () => {
    const res = await call('/other?operation=GetCACaps');
    expect(res.status).toBe(404);
    expect(res.body.toString()).toBe('not found\n');
  });

  it('answers 405 for other methods and for POSTed GET-only operations', async () => {
    expect((await call('/scep?operation=GetCACaps', { method: 'PUT', body: Buffer.from('x') })).status).toBe(405);
    expect((await call('/scep?operation=GetCACaps', { method: 'POST', body: Buffer.from('x') })).status).toBe(405);
    expect((await call('/scep?operation=GetCACert', { method: 'POST', body: Buffer.from('x') })).status).toBe(405);
  });

  it('answers 500 and logs when the service fails', async () => {
    const failure = new Error('RA chain is empty');
    service.pkiOperation.mockRejectedValue(failure);

    const res = await call('/scep?operation=PKIOperation', { method: 'POST', body: Buffer.from([1]) });

    expect(res.status).toBe(500);
    expect(res.body.toString()).toBe('internal server error\n');
    expect(entries).toContainEqual({
      level: 'error',
      msg: 'request failed',
      fields: { component: 'http', operation: 'PKIOperation', err: failure },
    });
  });

  it('logs every request', async () => {
    await call('/scep?operation=GetCACaps');

    expect(entries).toHaveLength(1);
    expect(entries[0]).toEqual({
      level: 'info',
      msg: 'request',
      fields: {
        component: 'http',
        method: 'GET',
        path: '/scep',
        operation: 'GetCACaps',
        status: 200,
        took: expect.stringMatching(/^\d+ms$/),
      },
    });
  });
});
