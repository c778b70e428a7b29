import {
  AccountDoesNotExistError,
  AcmeError,
  BadCSRError,
  BadNonceError,
  BadSignatureAlgorithmError,
  CompoundError,
  DNSError,
  IncorrectResponseError,
  MalformedError,
  RateLimitedError,
  RejectedIdentifierError,
  ServerInternalError,
  UnauthorizedError,
  UserActionRequiredError,
} from './acme-server-errors.js';
import { ACME_ERROR, isAcmeErrorType, type AcmeErrorType } from './codes.js';

type SimpleCtor = new (detail?: string, status?: number) => AcmeError;

const FACTORY: Partial<Record<AcmeErrorType, SimpleCtor>> = {
  [ACME_ERROR.accountDoesNotExist]: AccountDoesNotExistError,
  [ACME_ERROR.badCSR]: BadCSRError,
  [ACME_ERROR.badNonce]: BadNonceError,
  [ACME_ERROR.compound]: CompoundError,
  [ACME_ERROR.dns]: DNSError,
  [ACME_ERROR.incorrectResponse]: IncorrectResponseError,
  [ACME_ERROR.malformed]: MalformedError,
  [ACME_ERROR.rejectedIdentifier]: RejectedIdentifierError,
  [ACME_ERROR.serverInternal]: ServerInternalError,
  [ACME_ERROR.unauthorized]: UnauthorizedError,
};

/** RFC 7807 problem document as far as the bridge reads it. */
interface Problem {
  type?: string;
  detail?: string;
  title?: string;
  status?: number;
  instance?: string;
  algorithms?: string[];
  retryAfter?: string | number;
  identifier?: { type: string; value: string };
  subproblems?: unknown[];
}

function readProblem(value: object): Problem {
  const field = (key: string): unknown => (key in value ? Reflect.get(value, key) : undefined);
  const str = (key: string) => {
    const v = field(key);
    return typeof v === 'string' ? v : undefined;
  };

  const problem: Problem = {};
  const type = str('type');
  const detail = str('detail');
  const title = str('title');
  const instance = str('instance');
  const status = field('status');
  const algorithms = field('algorithms');
  const retryAfter = field('retryAfter');
  const identifier = field('identifier');
  const subproblems = field('subproblems');

  if (type !== undefined) problem.type = type;
  if (detail !== undefined) problem.detail = detail;
  if (title !== undefined) problem.title = title;
  if (instance !== undefined) problem.instance = instance;
  if (typeof status === 'number') problem.status = status;
  if (Array.isArray(algorithms)) {
    problem.algorithms = algorithms.filter((a): a is string => typeof a === 'string');
  }
  if (typeof retryAfter === 'string' || typeof retryAfter === 'number') {
    problem.retryAfter = retryAfter;
  }
  if (
    typeof identifier === 'object' &&
    identifier !== null &&
    'type' in identifier &&
    'value' in identifier &&
    typeof identifier.type === 'string' &&
    typeof identifier.value === 'string'
  ) {
    problem.identifier = { type: identifier.type, value: identifier.value };
  }
  if (Array.isArray(subproblems)) problem.subproblems = subproblems;
  return problem;
}

/**
 * Map an ACME problem document onto the matching {@link AcmeError} subclass.
 * Unknown types keep their URN on a plain AcmeError.
 */
export function createErrorFromProblem(problem: unknown): AcmeError {
  if (!problem || typeof problem !== 'object') {
    return new AcmeError('Unknown error shape');
  }

  const p = readProblem(problem);
  const type = p.type ?? ACME_ERROR.serverInternal;
  const detail = p.detail ?? p.title ?? 'Unknown error';
  const status = p.status;

  let err: AcmeError;
  if (type === ACME_ERROR.badSignatureAlgorithm) {
    err = new BadSignatureAlgorithmError(detail, status, p.algorithms);
  } else if (type === ACME_ERROR.rateLimited) {
    const retryAfter = p.retryAfter !== undefined ? new Date(p.retryAfter) : undefined;
    err = new RateLimitedError(detail, status ?? 429, retryAfter);
  } else if (type === ACME_ERROR.userActionRequired) {
    err = new UserActionRequiredError(detail, status ?? 403, p.instance);
  } else {
    const ctor = isAcmeErrorType(type) ? FACTORY[type] : undefined;
    err = ctor
      ? new ctor(detail, status)
      : new AcmeError(detail, status, {
          type,
          ...(p.instance !== undefined && { instance: p.instance }),
        });
  }

  err.identifier = p.identifier;
  for (const sub of p.subproblems ?? []) {
    err.addSubproblem(createErrorFromProblem(sub));
  }

  return err;
}
