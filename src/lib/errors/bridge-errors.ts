/**
 * Bridge errors
 *
 * Typed errors raised by the bridge itself, as opposed to {@link AcmeError}
 * which represents problem documents sent by the ACME server. Each class
 * exposes static factories so call sites never assemble messages by hand.
 */

import { types } from 'node:util';

export abstract class BridgeError extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

function reason(cause: unknown): string {
  return cause instanceof Error || types.isNativeError(cause) ? cause.message : String(cause);
}

/** Invalid or missing process configuration. */
export class ConfigError extends BridgeError {
  readonly code = 'CONFIG_ERROR';

  static mandatory(flag: string): ConfigError {
    return new ConfigError(`--${flag} is mandatory, use --help for help`, { flag });
  }

  static invalid(flag: string, detail: string): ConfigError {
    return new ConfigError(`--${flag}: ${detail}`, { flag });
  }
}

/** The whitelist source cannot be turned into an authorization table. */
export class WhitelistError extends BridgeError {
  readonly code = 'WHITELIST_ERROR';

  static unknownItem(secret: string, item: unknown): WhitelistError {
    const type = item === null ? 'null' : Array.isArray(item) ? 'array' : typeof item;
    return new WhitelistError(
      `unknown item for secret "${secret}": ${JSON.stringify(item)} (type ${type})`,
      { secret, type },
    );
  }

  static notAMapping(path: string): WhitelistError {
    return new WhitelistError(`whitelist ${path} must be a mapping of secret to hostnames`, {
      path,
    });
  }

  static load(path: string, cause: unknown): WhitelistError {
    return new WhitelistError(`loading whitelist ${path}: ${reason(cause)}`, { path }, { cause });
  }
}

/** A certificate signing request or its challenge password cannot be parsed. */
export class CsrError extends BridgeError {
  readonly code = 'CSR_ERROR';

  static parse(cause: unknown): CsrError {
    return new CsrError(`parsing certificate request: ${reason(cause)}`, undefined, { cause });
  }

  static missingChallengePassword(): CsrError {
    return new CsrError('certificate request carries no challenge password');
  }
}

/** Identity material could not be loaded, or the depot was asked to mint. */
export class DepotError extends BridgeError {
  readonly code = 'DEPOT_ERROR';

  static pemDecodeFailed(path?: string): DepotError {
    return new DepotError('PEM decode failed', path ? { path } : undefined);
  }

  static certificateParse(index: number, cause: unknown): DepotError {
    return new DepotError(`parsing cert ${index}: ${reason(cause)}`, { index }, { cause });
  }

  static keyParse(cause: unknown): DepotError {
    return new DepotError(`parsing key: ${reason(cause)}`, undefined, { cause });
  }

  static notRsa(keyType: string | undefined): DepotError {
    return new DepotError('key is not an RSA private key', { keyType });
  }

  static keyMismatch(): DepotError {
    return new DepotError('certificate key does not match the leaf certificate');
  }

  static cannotCreateCertificates(): DepotError {
    return new DepotError('depot cannot create certificates');
  }
}

/** The ACME side failed to produce a usable certificate. */
export class IssuanceError extends BridgeError {
  readonly code = 'ISSUANCE_ERROR';

  static obtain(cause: unknown): IssuanceError {
    return new IssuanceError(`ObtainForCSR: ${reason(cause)}`, undefined, { cause });
  }

  static parse(cause: unknown): IssuanceError {
    return new IssuanceError(`parsing obtained cert: ${reason(cause)}`, undefined, { cause });
  }
}

/** Malformed or unverifiable SCEP PKI message. */
export class ScepError extends BridgeError {
  readonly code = 'SCEP_ERROR';

  static malformed(what: string): ScepError {
    return new ScepError(`malformed PKI message: ${what}`, { what });
  }

  static signature(detail: string): ScepError {
    return new ScepError(`PKI message signature verification failed: ${detail}`);
  }

  static unsupportedAlgorithm(kind: string, oid: string): ScepError {
    return new ScepError(`unsupported ${kind} algorithm ${oid}`, { kind, oid });
  }

  static decrypt(cause: unknown): ScepError {
    return new ScepError(`decrypting PKI envelope: ${reason(cause)}`, undefined, { cause });
  }
}

/** DNS-01 provider selection or execution failed. */
export class Dns01ProviderError extends BridgeError {
  readonly code = 'DNS01_PROVIDER_ERROR';

  static unknown(name: string): Dns01ProviderError {
    return new Dns01ProviderError(`unrecognized DNS provider: ${name}`, { name });
  }

  static misconfigured(name: string, detail: string): Dns01ProviderError {
    return new Dns01ProviderError(`${name}: ${detail}`, { name });
  }

  static propagationTimeout(fqdn: string, timeoutMs: number): Dns01ProviderError {
    return new Dns01ProviderError(
      `TXT record for ${fqdn} not visible at authoritative servers after ${timeoutMs}ms`,
      { fqdn, timeoutMs },
    );
  }
}

/** Authorization object of an order ended in a state other than valid. */
export class AuthorizationError extends BridgeError {
  readonly code = 'AUTHORIZATION_ERROR';

  static invalid(domain: string, detail?: string): AuthorizationError {
    return new AuthorizationError(
      `Authorization for ${domain} is invalid${detail ? `: ${detail}` : ''}`,
      { domain },
    );
  }

  static timeout(domain: string, status: string, attempts: number): AuthorizationError {
    return new AuthorizationError(
      `Authorization for ${domain} still ${status} after ${attempts} attempts`,
      { domain, status, attempts },
    );
  }
}

/** No usable challenge was offered for an identifier. */
export class ChallengeError extends BridgeError {
  readonly code = 'CHALLENGE_ERROR';

  static notFound(challengeType: string, domain: string): ChallengeError {
    return new ChallengeError(`Challenge type ${challengeType} not found for ${domain}`, {
      challengeType,
      domain,
    });
  }
}

/** Order lifecycle errors. */
export class OrderError extends BridgeError {
  readonly code = 'ORDER_ERROR';

  static noIdentifiers(): OrderError {
    return new OrderError('Certificate request names no identifiers');
  }

  static noCertificateUrl(): OrderError {
    return new OrderError('Order does not have certificate URL', { missing: 'certificate' });
  }

  static invalid(url: string): OrderError {
    return new OrderError(`Order ${url} became invalid`, { url });
  }

  static timeout(targetStatuses: string[], currentStatus: string, attempts: number): OrderError {
    return new OrderError(
      `Order did not reach status ${targetStatuses.join(', ')} after ${attempts} attempts. Current status: ${currentStatus}`,
      { targetStatuses, currentStatus, attempts },
    );
  }
}

/** Account registration problems. */
export class AccountError extends BridgeError {
  readonly code = 'ACCOUNT_ERROR';

  static notRegistered(): AccountError {
    return new AccountError('Account not registered. Call register() first.');
  }

  static noAccountUrl(): AccountError {
    return new AccountError('No account URL in registration response', {
      missing: 'location_header',
    });
  }

  static unsupportedKey(detail: string): AccountError {
    return new AccountError(`unsupported ACME account key: ${detail}`);
  }
}
