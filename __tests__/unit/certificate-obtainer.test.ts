import { describe, it, expect, jest, beforeAll, afterEach } from '@jest/globals';
import type { Dns01Provider } from '../../src/lib/challenges/dns-01-provider.js';
import type { PropagationCheck } from '../../src/lib/challenges/dns-propagation.js';
import { AcmeAccount } from '../../src/lib/core/acme-account.js';
import { AcmeClient } from '../../src/lib/core/acme-client.js';
import { CertificateObtainer, identifiersForCsr } from '../../src/lib/core/certificate-obtainer.js';
import { parseAccountKey } from '../../src/lib/crypto/account-key.js';
import { AuthorizationError, Dns01ProviderError, OrderError } from '../../src/lib/errors/bridge-errors.js';
import { ACME_BASE, DIRECTORY_URL, FakeAcmeServer, type FakeAcmeOptions } from '../utils/fake-acme.js';
import { recordingLogger } from '../utils/logger.js';
import { createCertificate, createCsr, ecPkcs8Pem, rsaKeyPair, type TestCertificate } from '../utils/pki.js';

let issuer: TestCertificate;
let leaf: TestCertificate;
let csr: Buffer;

beforeAll(() => {
  issuer = createCertificate(rsaKeyPair(), { commonName: 'Fake ACME Issuer', isCa: true, serial: '10' });
  const deviceKeys = rsaKeyPair();
  leaf = createCertificate(deviceKeys, { commonName: 'device1.example.com', serial: '11', issuer });
  csr = createCsr(deviceKeys, {
    commonName: 'device1.example.com',
    dnsNames: ['device1.example.com', 'alt.example.com'],
    challengePassword: 'testpass',
  });
});

afterEach(() => {
  jest.restoreAllMocks();
});

function fakeProvider(timeout = { timeoutMs: 50, intervalMs: 1 }) {
  return {
    present: jest.fn<Dns01Provider['present']>(async () => undefined),
    cleanUp: jest.fn<Dns01Provider['cleanUp']>(async () => undefined),
    timeout: () => timeout,
  };
}

async function setup(
  serverOpts: FakeAcmeOptions = {},
  provider: Dns01Provider = fakeProvider(),
  propagationCheck: PropagationCheck = async () => true,
) {
  const server = new FakeAcmeServer({ chainPem: leaf.pem + issuer.pem, ...serverOpts }).install();
  const account = new AcmeAccount(new AcmeClient(DIRECTORY_URL), await parseAccountKey(ecPkcs8Pem()), {
    polling: { intervalMs: 1, maxAttempts: 5 },
  });
  await account.register({ contact: 'admin@example.com', termsOfServiceAgreed: true });
  const logger = recordingLogger();
  const obtainer = new CertificateObtainer(account, provider, { propagationCheck, logger });
  return { server, account, obtainer, logger };
}

describe('identifiersForCsr', () => {
  it('lists the CN first and drops duplicate SANs', () => {
    expect(identifiersForCsr(csr)).toEqual(['device1.example.com', 'alt.example.com']);
  });
});

describe('CertificateObtainer', () => {
  it('runs the order through dns-01 and returns the leaf', async () => {
    const provider = fakeProvider();
    const check = jest.fn<PropagationCheck>(async () => true);
    const { server, account, obtainer } = await setup({}, provider, check);

    const res = await obtainer.obtainForCsr({ csr, bundle: false });

    expect(res).toEqual({
      domain: 'device1.example.com',
      certUrl: `${ACME_BASE}/cert/1`,
      certificate: leaf.pem,
      issuerCertificate: issuer.pem,
    });
    expect(server.finalizedCsr?.equals(csr)).toBe(true);
    expect(server.urls).toEqual([
      '/new-account',
      '/new-order',
      '/authz/device1.example.com',
      '/chall/device1.example.com',
      '/authz/device1.example.com',
      '/authz/alt.example.com',
      '/chall/alt.example.com',
      '/authz/alt.example.com',
      '/order/1',
      '/order/1/finalize',
      '/order/1',
      '/cert/1',
    ]);

    const keyAuth = await account.keyAuthorization('token-device1-example-com');
    expect(provider.present).toHaveBeenCalledWith('device1.example.com', 'token-device1-example-com', keyAuth);
    expect(provider.cleanUp).toHaveBeenCalledWith('device1.example.com', 'token-device1-example-com', keyAuth);
    expect(provider.cleanUp).toHaveBeenCalledTimes(2);
    expect(check).toHaveBeenCalledWith(
      '_acme-challenge.device1.example.com.',
      await account.dns01Value('token-device1-example-com'),
    );
  });

  it('signs with the account URL once registered', async () => {
    const { server, obtainer } = await setup();
    await obtainer.obtainForCsr({ csr, bundle: false });

    const [registration, order] = server.requests;
    expect(registration?.header.jwk).toBeDefined();
    expect(registration?.header.kid).toBeUndefined();
    expect(registration?.payload).toEqual({ contact: ['mailto:admin@example.com'], termsOfServiceAgreed: true });
    expect(order?.header.kid).toBe(`${ACME_BASE}/acct/1`);
    expect(order?.header.jwk).toBeUndefined();
    expect(order?.payload).toEqual({
      identifiers: [
        { type: 'dns', value: 'device1.example.com' },
        { type: 'dns', value: 'alt.example.com' },
      ],
    });
  });

  it('includes the issuer chain when bundling', async () => {
    const { obtainer } = await setup();
    const res = await obtainer.obtainForCsr({ csr, bundle: true });
    expect(res.certificate).toBe(leaf.pem + issuer.pem);
  });

  it('skips authorizations that are already valid', async () => {
    const provider = fakeProvider();
    const { server, obtainer } = await setup({ initialAuthzStatus: 'valid' }, provider);

    await obtainer.obtainForCsr({ csr, bundle: false });

    expect(provider.present).not.toHaveBeenCalled();
    expect(server.urls.filter((url) => url.startsWith('/chall/'))).toEqual([]);
  });

  it('fails on an authorization that is neither pending nor valid', async () => {
    const { obtainer } = await setup({ initialAuthzStatus: 'deactivated' });
    await expect(obtainer.obtainForCsr({ csr, bundle: false })).rejects.toThrow(
      'Authorization for device1.example.com is invalid: deactivated',
    );
  });

  it('reports the challenge error and still removes the record', async () => {
    const provider = fakeProvider();
    const { obtainer } = await setup({ rejectChallenge: true }, provider);

    const failure = obtainer.obtainForCsr({ csr, bundle: false });

    await expect(failure).rejects.toBeInstanceOf(AuthorizationError);
    await expect(failure).rejects.toThrow('Authorization for device1.example.com is invalid: no TXT record found');
    expect(provider.cleanUp).toHaveBeenCalledTimes(1);
  });

  it('gives up when the record does not propagate in time', async () => {
    const provider = fakeProvider({ timeoutMs: 5, intervalMs: 10 });
    const { server, obtainer } = await setup({}, provider, async () => false);

    const failure = obtainer.obtainForCsr({ csr, bundle: false });

    await expect(failure).rejects.toBeInstanceOf(Dns01ProviderError);
    await expect(failure).rejects.toThrow(
      'TXT record for _acme-challenge.device1.example.com. not visible at authoritative servers after 5ms',
    );
    expect(provider.cleanUp).toHaveBeenCalledTimes(1);
    expect(server.urls).not.toContain('/chall/device1.example.com');
  });

  it('logs a failing cleanup without failing the order', async () => {
    const provider = fakeProvider();
    const cleanupError = new Error('zone is read-only');
    provider.cleanUp.mockRejectedValue(cleanupError);
    const { obtainer, logger } = await setup({}, provider);

    await expect(obtainer.obtainForCsr({ csr, bundle: false })).resolves.toMatchObject({ certificate: leaf.pem });
    expect(logger.entries).toContainEqual({
      level: 'warn',
      msg: 'dns-01 cleanup failed',
      fields: { domain: 'alt.example.com', err: cleanupError },
    });
  });

  it('rejects a request naming nothing before contacting the CA', async () => {
    const { server, obtainer } = await setup();
    const anonymous = createCsr(rsaKeyPair(), { challengePassword: 'testpass' });

    await expect(obtainer.obtainForCsr({ csr: anonymous, bundle: false })).rejects.toBeInstanceOf(OrderError);
    expect(server.urls).toEqual(['/new-account']);
  });
});
