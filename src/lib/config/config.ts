import { z } from 'zod';
import { ConfigError } from '../errors/bridge-errors.js';

export const LETS_ENCRYPT_STAGING = 'https://acme-staging-v02.api.letsencrypt.org/directory';
export const LETS_ENCRYPT_PRODUCTION = 'https://acme-v02.api.letsencrypt.org/directory';
export const DEFAULT_LISTEN = '127.0.0.1:8383';

/** Immutable process configuration, built once at startup. */
export interface BridgeConfig {
  readonly listen: { readonly host: string; readonly port: number };
  readonly certPath: string;
  readonly certKeyPath: string;
  readonly acmeKeyPath: string;
  readonly acmeEmail: string;
  readonly acmeUrl: string;
  readonly whitelistPath: string;
  readonly dnsProvider: string;
  readonly debug: boolean;
}

/** Raw option values as commander hands them over (keys follow the flag names). */
export interface RawBridgeOptions {
  listen?: string | undefined;
  cert?: string | undefined;
  certkey?: string | undefined;
  acmekey?: string | undefined;
  acmeemail?: string | undefined;
  acmeurl?: string | undefined;
  whitelist?: string | undefined;
  dnsprovider?: string | undefined;
  debug?: boolean | string | undefined;
}

// Checked in this order; the first missing one is reported.
const MANDATORY = ['cert', 'certkey', 'acmeemail', 'acmekey', 'dnsprovider', 'whitelist'] as const;

const BoolFromString = z
  .union([z.enum(['true', 'false', '1', '0']), z.boolean()])
  .transform((value) => value === true || value === 'true' || value === '1');

const ListenSchema = z
  .string()
  .trim()
  .regex(/^(\[[0-9a-fA-F:.]+\]|[^:\s]*):(\d{1,5})$/, { message: 'must be host:port' })
  .transform((value, ctx) => {
    const idx = value.lastIndexOf(':');
    const host = value.slice(0, idx).replace(/^\[(.*)\]$/, '$1');
    const port = Number(value.slice(idx + 1));
    if (port < 1 || port > 65535) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'port must be between 1 and 65535' });
      return z.NEVER;
    }
    return { host: host === '' ? '0.0.0.0' : host, port };
  });

const OptionsSchema = z.object({
  listen: ListenSchema.default(DEFAULT_LISTEN),
  cert: z.string().trim().min(1),
  certkey: z.string().trim().min(1),
  acmekey: z.string().trim().min(1),
  acmeemail: z.string().trim().email({ message: 'must be an email address' }),
  acmeurl: z
    .string()
    .trim()
    .url()
    .refine((value) => /^https?:\/\//.test(value), { message: 'must be an http(s) URL' })
    .default(LETS_ENCRYPT_STAGING),
  whitelist: z.string().trim().min(1),
  dnsprovider: z.string().trim().min(1),
  debug: BoolFromString.default(false),
});

function isBlank(value: unknown): boolean {
  return value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Validate raw options and build the frozen {@link BridgeConfig}.
 * @throws {ConfigError} naming the first missing mandatory flag, or the first invalid one
 */
export function buildConfig(raw: RawBridgeOptions): BridgeConfig {
  for (const flag of MANDATORY) {
    if (isBlank(raw[flag])) throw ConfigError.mandatory(flag);
  }

  const parsed = OptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const flag = String(issue?.path[0] ?? 'options');
    throw ConfigError.invalid(flag, issue?.message ?? 'invalid value');
  }

  const o = parsed.data;
  return Object.freeze({
    listen: Object.freeze(o.listen),
    certPath: o.cert,
    certKeyPath: o.certkey,
    acmeKeyPath: o.acmekey,
    acmeEmail: o.acmeemail,
    acmeUrl: o.acmeurl,
    whitelistPath: o.whitelist,
    dnsProvider: o.dnsprovider,
    debug: o.debug,
  });
}

/** `host:port` form of the listen address, with IPv6 hosts bracketed. */
export function formatListen(listen: BridgeConfig['listen']): string {
  return listen.host.includes(':') ? `[${listen.host}]:${listen.port}` : `${listen.host}:${listen.port}`;
}
