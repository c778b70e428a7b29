/**
 * RFC 8555 ACME Directory
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.1
 */

import { z } from 'zod';

export const AcmeDirectoryMetaSchema = z
  .object({
    termsOfService: z.string().optional(),
    website: z.string().optional(),
    caaIdentities: z.array(z.string()).optional(),
    externalAccountRequired: z.boolean().optional(),
  })
  .passthrough();

/**
 * URLs for every ACME operation the bridge uses, plus optional server metadata.
 * `revokeCert` and `keyChange` are read but never called.
 */
export const AcmeDirectorySchema = z
  .object({
    newNonce: z.string().url(),
    newAccount: z.string().url(),
    newOrder: z.string().url(),
    newAuthz: z.string().url().optional(),
    revokeCert: z.string().url().optional(),
    keyChange: z.string().url().optional(),
    meta: AcmeDirectoryMetaSchema.optional(),
  })
  .passthrough();

export type AcmeDirectory = z.infer<typeof AcmeDirectorySchema>;
export type AcmeDirectoryMeta = z.infer<typeof AcmeDirectoryMetaSchema>;
