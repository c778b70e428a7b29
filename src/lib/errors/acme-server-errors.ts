/**
 * RFC 8555 server errors
 *
 * Typed representation of the problem documents an ACME server returns. The
 * bridge only reacts to a few of them (badNonce drives retries, the rest are
 * surfaced to the SCEP engine as issuance failures) but keeps the type and
 * detail intact for logs.
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc8555#section-6.7 | RFC 8555 Section 6.7 - Errors}
 */
import { ACME_ERROR } from './codes.js';

export class AcmeError extends Error {
  type: string;
  detail: string;
  subproblems?: AcmeError[] | undefined;
  status?: number | undefined;
  instance: string | undefined;
  /** Identifier a subproblem refers to, when the server sent one */
  identifier?: { type: string; value: string } | undefined;

  constructor(
    detail: string,
    status?: number,
    opts?: { type?: string; instance?: string; cause?: unknown },
  ) {
    super(detail, { cause: opts?.cause });
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = new.target.name;
    this.detail = detail;
    this.status = status ?? 500;
    this.type = opts?.type ?? ACME_ERROR.serverInternal;
    this.instance = opts?.instance;
  }

  toJSON(): Record<string, unknown> {
    const res: Record<string, unknown> = { type: this.type, detail: this.detail };

    if (this.status !== undefined) {
      res.status = this.status;
    }
    if (this.instance) {
      res.instance = this.instance;
    }
    if (this.identifier) {
      res.identifier = this.identifier;
    }
    if (this.subproblems?.length) {
      res.subproblems = this.subproblems.map((p) => p.toJSON());
    }

    return res;
  }

  addSubproblem(error: AcmeError): this {
    (this.subproblems ??= []).push(error);
    return this;
  }
}

export class AccountDoesNotExistError extends AcmeError {
  constructor(detail = 'The request specified an account that does not exist', status = 400) {
    super(detail, status, { type: ACME_ERROR.accountDoesNotExist });
  }
}

export class BadCSRError extends AcmeError {
  constructor(detail = 'The CSR is unacceptable', status = 400) {
    super(detail, status, { type: ACME_ERROR.badCSR });
  }
}

/**
 * The server rejected the anti-replay nonce. {@link NonceManager.withNonceRetry}
 * retries the request with a fresh nonce when it sees this type.
 */
export class BadNonceError extends AcmeError {
  constructor(detail = 'The client sent an unacceptable anti-replay nonce', status = 400) {
    super(detail, status, { type: ACME_ERROR.badNonce });
  }
}

export class BadSignatureAlgorithmError extends AcmeError {
  /** Algorithms the server accepts */
  algorithms: string[];

  constructor(
    detail = 'The JWS was signed with an algorithm the server does not support',
    status = 400,
    algorithms: string[] = [],
  ) {
    super(detail, status, { type: ACME_ERROR.badSignatureAlgorithm });
    this.algorithms = algorithms;
  }

  override toJSON(): Record<string, unknown> {
    const result = super.toJSON();
    if (this.algorithms.length > 0) {
      result.algorithms = this.algorithms;
    }
    return result;
  }
}

export class CompoundError extends AcmeError {
  constructor(detail = 'Specific error conditions are indicated in subproblems', status = 400) {
    super(detail, status, { type: ACME_ERROR.compound });
  }
}

export class DNSError extends AcmeError {
  constructor(detail = 'There was a problem with a DNS query during identifier validation', status = 400) {
    super(detail, status, { type: ACME_ERROR.dns });
  }
}

export class IncorrectResponseError extends AcmeError {
  constructor(detail = "Response received didn't match the challenge's requirements", status = 403) {
    super(detail, status, { type: ACME_ERROR.incorrectResponse });
  }
}

export class MalformedError extends AcmeError {
  constructor(detail = 'The request message was malformed', status = 400) {
    super(detail, status, { type: ACME_ERROR.malformed });
  }
}

export class RateLimitedError extends AcmeError {
  retryAfter?: Date | undefined;

  constructor(detail = 'The request exceeds a rate limit', status = 429, retryAfter?: Date) {
    super(detail, status, { type: ACME_ERROR.rateLimited });
    this.retryAfter = retryAfter;
  }

  /** Seconds until the limit resets, or undefined when the server did not say. */
  getRetryAfterSeconds(): number | undefined {
    if (!this.retryAfter) return undefined;
    return Math.max(0, Math.ceil((this.retryAfter.getTime() - Date.now()) / 1000));
  }
}

export class RejectedIdentifierError extends AcmeError {
  constructor(detail = 'The server will not issue certificates for the identifier', status = 400) {
    super(detail, status, { type: ACME_ERROR.rejectedIdentifier });
  }
}

export class ServerInternalError extends AcmeError {
  constructor(detail = 'The server experienced an internal error', status = 500) {
    super(detail, status, { type: ACME_ERROR.serverInternal });
  }
}

export class UnauthorizedError extends AcmeError {
  constructor(detail = 'The client lacks sufficient authorization', status = 403) {
    super(detail, status, { type: ACME_ERROR.unauthorized });
  }
}

export class UserActionRequiredError extends AcmeError {
  constructor(
    detail = 'Visit the "instance" URL and take actions specified there',
    status = 403,
    instance?: string,
  ) {
    super(detail, status, {
      type: ACME_ERROR.userActionRequired,
      ...(instance !== undefined && { instance }),
    });
  }
}
