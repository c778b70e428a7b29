/**
 * ACME status values
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.6
 */

/**
 * Order status: pending -> ready -> processing -> valid, or invalid
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.3
 */
export const ORDER_STATUS = {
  PENDING: 'pending',
  READY: 'ready',
  PROCESSING: 'processing',
  VALID: 'valid',
  INVALID: 'invalid',
} as const;

export type AcmeOrderStatus = (typeof ORDER_STATUS)[keyof typeof ORDER_STATUS];

/** @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.4 */
export const AUTHORIZATION_STATUS = {
  PENDING: 'pending',
  VALID: 'valid',
  INVALID: 'invalid',
  DEACTIVATED: 'deactivated',
  EXPIRED: 'expired',
  REVOKED: 'revoked',
} as const;

/** @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.5 */
export const CHALLENGE_STATUS = {
  PENDING: 'pending',
  PROCESSING: 'processing',
  VALID: 'valid',
  INVALID: 'invalid',
} as const;

export const CHALLENGE_TYPE = {
  DNS_01: 'dns-01',
} as const;
