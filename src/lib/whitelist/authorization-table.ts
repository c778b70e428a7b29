import { WhitelistError } from '../errors/bridge-errors.js';
import { debugWhitelist } from '../utils/debug.js';
import { ExactHostnameRule, type HostnameRule } from './hostname-rule.js';

/** Declarative whitelist: secret -> hostname or list of hostnames. */
export type WhitelistSource = Readonly<Record<string, unknown>>;

/**
 * Shared secret -> hostname rules. Built once, read-only afterwards, so it can
 * be queried from concurrent requests without locking.
 */
export class AuthorizationTable {
  private readonly rules: ReadonlyMap<string, readonly HostnameRule[]>;

  constructor(rules: Map<string, HostnameRule[]>) {
    this.rules = new Map([...rules].map(([secret, list]) => [secret, Object.freeze([...list])]));
  }

  /** Rules registered for `secret`; empty for unknown secrets. */
  rulesFor(secret: string): readonly HostnameRule[] {
    return this.rules.get(secret) ?? [];
  }

  /** True when some rule of `secret` matches `hostname`. Unknown secrets allow nothing. */
  allows(secret: string, hostname: string): boolean {
    return this.rulesFor(secret).some((rule) => rule.matches(hostname));
  }

  get size(): number {
    return this.rules.size;
  }
}

function rulesFromItem(secret: string, item: unknown): HostnameRule[] {
  if (typeof item === 'string') {
    return [new ExactHostnameRule(item)];
  }
  if (Array.isArray(item)) {
    return item.map((hostname: unknown) => {
      if (typeof hostname !== 'string') throw WhitelistError.unknownItem(secret, hostname);
      return new ExactHostnameRule(hostname);
    });
  }
  throw WhitelistError.unknownItem(secret, item);
}

/**
 * Parse the declarative source into an {@link AuthorizationTable}.
 * @throws {WhitelistError} when a secret maps to anything but a string or a list of strings
 */
export function buildAuthorizationTable(source: WhitelistSource): AuthorizationTable {
  const rules = new Map<string, HostnameRule[]>();
  for (const [secret, item] of Object.entries(source)) {
    rules.set(secret, rulesFromItem(secret, item));
  }
  debugWhitelist('authorization table built: secrets=%d', rules.size);
  return new AuthorizationTable(rules);
}
