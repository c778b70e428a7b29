import { describe, it, expect } from '@jest/globals';
import {
  createErrorFromProblem,
  BadNonceError,
  BadSignatureAlgorithmError,
  RateLimitedError,
  UserActionRequiredError,
  AcmeError,
  ACME_ERROR,
} from '../../src/index.js';

describe('createErrorFromProblem', () => {
  it('creates specific error type', () => {
    const err = createErrorFromProblem({
      type: ACME_ERROR.badSignatureAlgorithm,
      detail: 'algo bad',
      status: 400,
      algorithms: ['ES256', 'RS256'],
    });
    expect(err).toBeInstanceOf(BadSignatureAlgorithmError);
    if (err instanceof BadSignatureAlgorithmError) {
      expect(err.algorithms).toEqual(['ES256', 'RS256']);
      expect(err.toJSON()).toEqual({
        type: ACME_ERROR.badSignatureAlgorithm,
        detail: 'algo bad',
        status: 400,
        algorithms: ['ES256', 'RS256'],
      });
    }
  });

  it('maps badNonce so the transport can retry', () => {
    const err = createErrorFromProblem({ type: ACME_ERROR.badNonce, detail: 'stale nonce', status: 400 });
    expect(err).toBeInstanceOf(BadNonceError);
    expect(err.message).toBe('stale nonce');
  });

  it('parses rate limited error with retryAfter', () => {
    const retryIso = new Date(Date.now() + 5000).toISOString();
    const err = createErrorFromProblem({
      type: ACME_ERROR.rateLimited,
      detail: 'Too many',
      retryAfter: retryIso,
    });
    expect(err).toBeInstanceOf(RateLimitedError);
    expect(err.status).toBe(429);
    if (err instanceof RateLimitedError) {
      expect(err.getRetryAfterSeconds()).toBeGreaterThanOrEqual(4);
    }
  });

  it('keeps the instance URL of userActionRequired', () => {
    const err = createErrorFromProblem({
      type: ACME_ERROR.userActionRequired,
      detail: 'accept the new terms',
      instance: 'https://acme.example.com/terms',
    });
    expect(err).toBeInstanceOf(UserActionRequiredError);
    expect(err.status).toBe(403);
    expect(err.instance).toBe('https://acme.example.com/terms');
  });

  it('attaches subproblems recursively with their identifiers', () => {
    const err = createErrorFromProblem({
      type: ACME_ERROR.compound,
      detail: 'multiple',
      subproblems: [
        { type: ACME_ERROR.badCSR, detail: 'csr bad' },
        {
          type: ACME_ERROR.unauthorized,
          detail: 'no auth',
          identifier: { type: 'dns', value: 'device1.example.com' },
        },
      ],
    });
    expect(err.subproblems).toHaveLength(2);
    expect(err.subproblems?.map((e) => e.type)).toEqual([ACME_ERROR.badCSR, ACME_ERROR.unauthorized]);
    expect(err.subproblems?.[1]?.identifier).toEqual({ type: 'dns', value: 'device1.example.com' });
  });

  it('falls back to generic AcmeError with unknown type', () => {
    const err = createErrorFromProblem({ type: 'urn:custom:unknown:error', detail: 'x' });
    expect(err).toBeInstanceOf(AcmeError);
    expect(err.type).toBe('urn:custom:unknown:error');
  });

  it('uses the title when there is no detail', () => {
    expect(createErrorFromProblem({ type: ACME_ERROR.malformed, title: 'Bad JWS' }).detail).toBe('Bad JWS');
  });

  it('handles values that are not problem documents', () => {
    expect(createErrorFromProblem('oops').message).toBe('Unknown error shape');
    expect(createErrorFromProblem(null).message).toBe('Unknown error shape');
  });
});
