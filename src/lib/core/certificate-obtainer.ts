import { nopLogger, type Logger } from '../../logger.js';
import type { Dns01Provider } from '../challenges/dns-01-provider.js';
import { dns01Record } from '../challenges/dns-01-record.js';
import {
  checkTxtPropagation,
  waitForPropagation,
  type PropagationCheck,
} from '../challenges/dns-propagation.js';
import { PROPAGATION_INTERVAL_MS, PROPAGATION_TIMEOUT_MS } from '../constants/defaults.js';
import { parseCertificateRequest, requestedNames } from '../crypto/csr.js';
import { AuthorizationError, ChallengeError, OrderError } from '../errors/bridge-errors.js';
import type { AcmeAuthorization, AcmeOrder } from '../types/order.js';
import { AUTHORIZATION_STATUS, CHALLENGE_TYPE, ORDER_STATUS } from '../types/status.js';
import { debugChallenge } from '../utils/debug.js';
import { decodePemBlocks, encodePem } from '../utils/pem.js';
import type { AcmeAccount } from './acme-account.js';

export interface ObtainForCsrRequest {
  /** DER CSR, submitted to the CA unmodified */
  csr: Uint8Array;
  /** Include the issuer chain in `certificate` */
  bundle: boolean;
}

export interface CertificateResource {
  /** First requested name */
  domain: string;
  certUrl: string;
  /** PEM: the leaf, or the whole chain when bundled */
  certificate: string;
  /** PEM of the certificates after the leaf */
  issuerCertificate: string;
}

export interface CertificateObtainerOptions {
  /** Defaults to a query of the zone's authoritative name servers */
  propagationCheck?: PropagationCheck;
  logger?: Logger;
}

/** CN first, then DNS SANs, without duplicates. */
export function identifiersForCsr(csr: Uint8Array): string[] {
  return [...new Set(requestedNames(parseCertificateRequest(csr)))];
}

/**
 * Obtains a certificate for an existing CSR through dns-01 validation.
 *
 * For every pending authorization of the order the TXT record is published,
 * checked for propagation, the challenge answered and the authorization
 * polled; the record is removed again whatever the outcome.
 */
export class CertificateObtainer {
  private readonly propagationCheck: PropagationCheck;
  private readonly logger: Logger;

  constructor(
    private readonly account: AcmeAccount,
    private readonly provider: Dns01Provider,
    opts: CertificateObtainerOptions = {},
  ) {
    this.propagationCheck = opts.propagationCheck ?? checkTxtPropagation;
    this.logger = opts.logger ?? nopLogger;
  }

  async obtainForCsr({ csr, bundle }: ObtainForCsrRequest): Promise<CertificateResource> {
    const domains = identifiersForCsr(csr);
    const [domain] = domains;
    if (domain === undefined) throw OrderError.noIdentifiers();

    this.logger.info('obtaining certificate', { domains });
    let order = await this.account.newOrder(domains);

    for (const authzUrl of order.authorizations) {
      await this.solve(authzUrl);
    }

    order = await this.account.waitForOrder(order, [ORDER_STATUS.READY, ORDER_STATUS.VALID]);
    if (order.status === ORDER_STATUS.READY) {
      order = await this.account.finalize(order, csr);
      order = await this.account.waitForOrder(order, [ORDER_STATUS.VALID]);
    }

    return this.download(order, domain, bundle);
  }

  private async solve(authzUrl: string): Promise<void> {
    const authz = await this.account.getAuthorization(authzUrl);
    const name = authz.identifier.value;

    if (authz.status === AUTHORIZATION_STATUS.VALID) {
      debugChallenge('authorization for %s already valid', name);
      return;
    }
    if (authz.status !== AUTHORIZATION_STATUS.PENDING) {
      throw AuthorizationError.invalid(name, authz.status);
    }

    const { token, challenge } = this.pickDns01(authz);
    const keyAuth = await this.account.keyAuthorization(token);
    const { fqdn, value } = dns01Record(name, keyAuth);

    await this.provider.present(name, token, keyAuth);
    try {
      const timing = this.provider.timeout?.() ?? {
        timeoutMs: PROPAGATION_TIMEOUT_MS,
        intervalMs: PROPAGATION_INTERVAL_MS,
      };
      await waitForPropagation(this.propagationCheck, fqdn, value, timing);
      await this.account.completeChallenge(challenge);
      await this.account.waitForAuthorization(authzUrl);
      this.logger.info('authorization valid', { domain: name });
    } finally {
      await this.cleanUp(name, token, keyAuth);
    }
  }

  private pickDns01(authz: AcmeAuthorization) {
    const challenge = authz.challenges.find((ch) => ch.type === CHALLENGE_TYPE.DNS_01);
    if (!challenge?.token) {
      throw ChallengeError.notFound(CHALLENGE_TYPE.DNS_01, authz.identifier.value);
    }
    return { token: challenge.token, challenge };
  }

  private async cleanUp(domain: string, token: string, keyAuth: string): Promise<void> {
    try {
      await this.provider.cleanUp(domain, token, keyAuth);
    } catch (e) {
      this.logger.warn('dns-01 cleanup failed', { domain, err: e });
    }
  }

  private async download(order: AcmeOrder, domain: string, bundle: boolean): Promise<CertificateResource> {
    const chainPem = await this.account.downloadCertificate(order);
    const blocks = decodePemBlocks(chainPem).map((block) => encodePem(block.label, block.der));
    const [leaf = '', ...issuers] = blocks;
    const issuerCertificate = issuers.join('');

    return {
      domain,
      certUrl: order.certificate ?? '',
      certificate: bundle ? leaf + issuerCertificate : leaf,
      issuerCertificate,
    };
  }
}
