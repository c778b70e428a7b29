import { describe, it, expect } from '@jest/globals';
import { decodeFirstPemBlock, decodePemBlocks, encodePem } from '../../src/lib/utils/pem.js';

describe('PEM utilities', () => {
  it('encodes with 64-character lines', () => {
    const pem = encodePem('CERTIFICATE', Buffer.alloc(49, 0xff));
    const lines = pem.trimEnd().split('\n');

    expect(lines[0]).toBe('-----BEGIN CERTIFICATE-----');
    expect(lines[1]).toHaveLength(64);
    expect(lines[2]).toBe('/w==');
    expect(lines[3]).toBe('-----END CERTIFICATE-----');
  });

  it('decodes every block with its label', () => {
    const text = encodePem('CERTIFICATE', Buffer.from([1, 2, 3])) + encodePem('RSA PRIVATE KEY', Buffer.from([4, 5]));
    const blocks = decodePemBlocks(text);

    expect(blocks.map((b) => b.label)).toEqual(['CERTIFICATE', 'RSA PRIVATE KEY']);
    expect([...(blocks[0]?.der ?? [])]).toEqual([1, 2, 3]);
    expect([...(blocks[1]?.der ?? [])]).toEqual([4, 5]);
  });

  it('accepts CRLF line endings', () => {
    const text = encodePem('CERTIFICATE', Buffer.from([9, 9, 9])).replace(/\n/g, '\r\n');
    expect([...(decodeFirstPemBlock(text)?.der ?? [])]).toEqual([9, 9, 9]);
  });

  it('skips blocks whose body is not base64', () => {
    const bad = '-----BEGIN CERTIFICATE-----\nProc-Type: 4,ENCRYPTED\n\nAAAA\n-----END CERTIFICATE-----\n';
    const good = encodePem('CERTIFICATE', Buffer.from([7]));
    expect(decodePemBlocks(bad + good)).toHaveLength(1);
  });

  it('requires matching BEGIN and END labels', () => {
    const mismatched = '-----BEGIN CERTIFICATE-----\nAAAA\n-----END PRIVATE KEY-----\n';
    expect(decodePemBlocks(mismatched)).toEqual([]);
  });

  it('returns undefined when there is no block', () => {
    expect(decodeFirstPemBlock('nothing to see')).toBeUndefined();
  });
});
