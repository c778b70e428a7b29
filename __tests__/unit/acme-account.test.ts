import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as jose from 'jose';
import { AcmeAccount, parseRetryAfter } from '../../src/lib/core/acme-account.js';
import { AcmeClient } from '../../src/lib/core/acme-client.js';
import { parseAccountKey, type AccountKey } from '../../src/lib/crypto/account-key.js';
import { AccountError, OrderError } from '../../src/lib/errors/bridge-errors.js';
import { AcmeHttpClient } from '../../src/lib/transport/http-client.js';
import { ORDER_STATUS } from '../../src/lib/types/status.js';
import { DIRECTORY_URL, FakeAcmeServer } from '../utils/fake-acme.js';
import { ecPkcs8Pem, rsaKeyPair } from '../utils/pki.js';

describe('AcmeAccount', () => {
  let client: AcmeClient;
  let account: AcmeAccount;
  let key: AccountKey;

  beforeEach(async () => {
    key = await parseAccountKey(ecPkcs8Pem());
    client = new AcmeClient(DIRECTORY_URL);
    account = new AcmeAccount(client, key, { polling: { intervalMs: 1, maxAttempts: 3 } });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('keyAuthorization', () => {
    test('should generate valid key authorization per RFC 8555 Section 8.1', async () => {
      const token = 'evaGxfADs6pSRb2LAv9IZf17Dt3juxGJ-PCt92wr-oA';

      const keyAuth = await account.keyAuthorization(token);

      expect(keyAuth).toMatch(/^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/);
      const parts = keyAuth.split('.');
      expect(parts).toHaveLength(2);
      expect(parts[0]).toBe(token);
    });

    test('should match jose library thumbprint calculation', async () => {
      const keyAuth = await account.keyAuthorization('verification-token');
      const expectedThumbprint = await jose.calculateJwkThumbprint(key.publicJwk, 'sha256');

      expect(keyAuth).toBe(`verification-token.${expectedThumbprint}`);
    });

    test('should handle tokens with dots correctly', async () => {
      const token = 'token.with.dots.123';

      const keyAuth = await account.keyAuthorization(token);

      expect(keyAuth.startsWith(token + '.')).toBe(true);
      const thumbprint = keyAuth.substring(token.length + 1);
      expect(jose.base64url.decode(thumbprint)).toHaveLength(32);
    });
  });

  describe('dns01Value', () => {
    test('is the base64url SHA-256 of the key authorization', async () => {
      const keyAuth = await account.keyAuthorization('tok');
      const digest = await globalThis.crypto.subtle.digest('SHA-256', new TextEncoder().encode(keyAuth));

      await expect(account.dns01Value('tok')).resolves.toBe(Buffer.from(digest).toString('base64url'));
    });
  });

  describe('account keys', () => {
    test('picks RS256 for RSA keys', async () => {
      await expect(parseAccountKey(rsaKeyPair().pkcs1Pem)).resolves.toMatchObject({ alg: 'RS256' });
    });

    test('picks ES256 for P-256 keys', () => {
      expect(key.alg).toBe('ES256');
      expect(key.publicJwk).toMatchObject({ kty: 'EC', crv: 'P-256' });
    });

    test('rejects text without a key', async () => {
      await expect(parseAccountKey('no key here')).rejects.toThrow('unsupported ACME account key: PEM decode failed');
    });
  });

  describe('register', () => {
    test('stores the account URL as kid', async () => {
      new FakeAcmeServer().install();

      const { accountUrl } = await account.register({
        contact: 'mailto:admin@example.com',
        termsOfServiceAgreed: true,
      });

      expect(accountUrl).toBe('https://acme.test/acct/1');
      expect(account.kid).toBe(accountUrl);
    });

    test('fails without a Location header', async () => {
      new FakeAcmeServer().install();
      jest.spyOn(AcmeHttpClient.prototype, 'post').mockResolvedValue({
        statusCode: 201,
        headers: { 'replay-nonce': 'n' },
        body: { status: 'valid' },
      });

      await expect(
        account.register({ contact: 'admin@example.com', termsOfServiceAgreed: true }),
      ).rejects.toBeInstanceOf(AccountError);
    });
  });

  describe('waitForOrder', () => {
    const order = {
      status: ORDER_STATUS.PENDING,
      identifiers: [{ type: 'dns', value: 'device1.example.com' }],
      authorizations: [],
      finalize: 'https://acme.test/order/9/finalize',
      url: 'https://acme.test/order/9',
    };

    test('returns at once when the order already has a target status', async () => {
      await expect(account.waitForOrder({ ...order, status: ORDER_STATUS.READY }, [ORDER_STATUS.READY])).resolves.toEqual({
        ...order,
        status: ORDER_STATUS.READY,
      });
    });

    test('fails fast on an invalid order', async () => {
      await expect(
        account.waitForOrder({ ...order, status: ORDER_STATUS.INVALID }, [ORDER_STATUS.VALID]),
      ).rejects.toThrow('Order https://acme.test/order/9 became invalid');
    });

    test('times out after maxAttempts polls', async () => {
      new FakeAcmeServer().install();
      jest.spyOn(AcmeHttpClient.prototype, 'post').mockImplementation(async () => ({
        statusCode: 200,
        headers: { 'content-type': 'application/json', 'replay-nonce': 'n' },
        body: { ...order, url: undefined },
      }));

      await expect(account.waitForOrder(order, [ORDER_STATUS.VALID])).rejects.toThrow(
        'Order did not reach status valid after 3 attempts. Current status: pending',
      );
    });
  });

  describe('downloadCertificate', () => {
    test('requires a certificate URL', async () => {
      await expect(
        account.downloadCertificate({
          status: ORDER_STATUS.VALID,
          identifiers: [],
          authorizations: [],
          finalize: 'https://acme.test/order/9/finalize',
          url: 'https://acme.test/order/9',
        }),
      ).rejects.toBeInstanceOf(OrderError);
    });
  });
});

describe('parseRetryAfter', () => {
  test('reads delay-seconds', () => {
    expect(parseRetryAfter({ 'Retry-After': '3' })).toBe(3000);
  });

  test('reads an HTTP date in the past as zero', () => {
    expect(parseRetryAfter({ 'retry-after': 'Wed, 21 Oct 2015 07:28:00 GMT' })).toBe(0);
  });

  test('ignores a missing or garbled header', () => {
    expect(parseRetryAfter({})).toBeUndefined();
    expect(parseRetryAfter({ 'retry-after': 'soon' })).toBeUndefined();
  });
});
