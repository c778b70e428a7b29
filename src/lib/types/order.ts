/**
 * RFC 8555 ACME order, authorization and challenge objects
 *
 * Server responses are validated with these schemas before use; unknown
 * fields are kept.
 */

import { z } from 'zod';
import { AUTHORIZATION_STATUS, CHALLENGE_STATUS, ORDER_STATUS } from './status.js';

export const AcmeIdentifierSchema = z.object({
  type: z.string(),
  value: z.string(),
});

export type AcmeIdentifier = z.infer<typeof AcmeIdentifierSchema>;

/** @see https://datatracker.ietf.org/doc/html/rfc8555#section-8 */
export const AcmeChallengeSchema = z
  .object({
    type: z.string(),
    url: z.string(),
    status: z.nativeEnum(CHALLENGE_STATUS),
    token: z.string().optional(),
    validated: z.string().optional(),
    error: z.unknown().optional(),
  })
  .passthrough();

export type AcmeChallenge = z.infer<typeof AcmeChallengeSchema>;

/** @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.4 */
export const AcmeAuthorizationSchema = z
  .object({
    identifier: AcmeIdentifierSchema,
    status: z.nativeEnum(AUTHORIZATION_STATUS),
    expires: z.string().optional(),
    challenges: z.array(AcmeChallengeSchema),
    wildcard: z.boolean().optional(),
  })
  .passthrough();

export type AcmeAuthorization = z.infer<typeof AcmeAuthorizationSchema>;

/** @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.3 */
export const AcmeOrderSchema = z
  .object({
    status: z.nativeEnum(ORDER_STATUS),
    expires: z.string().optional(),
    identifiers: z.array(AcmeIdentifierSchema),
    authorizations: z.array(z.string()),
    finalize: z.string(),
    certificate: z.string().optional(),
    error: z.unknown().optional(),
  })
  .passthrough();

/** Order object plus the URL it was fetched from (the Location of newOrder). */
export type AcmeOrder = z.infer<typeof AcmeOrderSchema> & { url: string };
