/**
 * RFC 8555 DNS-01 propagation checks (Section 8.4)
 *
 * Before the CA is told to validate, the TXT record must be visible at the
 * zone's authoritative name servers:
 * - walk labels to the right until a name with NS records is found
 * - resolve those NS hosts to IPs (A and AAAA)
 * - query TXT there, joining record fragments
 */

import { Resolver, resolve4, resolve6, resolveNs } from 'node:dns/promises';
import { DNS_QUERY_TIMEOUT_MS } from '../constants/defaults.js';
import { Dns01ProviderError } from '../errors/bridge-errors.js';
import { debugChallenge } from '../utils/debug.js';

export interface TxtValidationResult {
  ok: boolean;
  matched?: string;
  /** All values with fragments joined */
  allValues: string[];
  reasons?: string[];
}

/** DNS queries the checker needs; swapped out in tests. */
export interface DnsLookup {
  resolveNs(name: string): Promise<string[]>;
  resolve4(host: string): Promise<string[]>;
  resolve6(host: string): Promise<string[]>;
  resolveTxtAt(servers: string[], name: string): Promise<string[][]>;
}

/** Resolves to true once `value` is published at `fqdn`. */
export type PropagationCheck = (fqdn: string, value: string) => Promise<boolean>;

export interface PropagationOptions {
  timeoutMs: number;
  intervalMs: number;
}

const systemLookup: DnsLookup = {
  resolveNs,
  resolve4,
  resolve6,
  async resolveTxtAt(servers, name) {
    const resolver = new Resolver({ timeout: DNS_QUERY_TIMEOUT_MS, tries: 2 });
    resolver.setServers(servers);
    return resolver.resolveTxt(name);
  },
};

/** DNS TXT can come as ["part1","part2"]; they are one value. */
export function normalizeTxtFragments(fragments: ReadonlyArray<string>): string {
  return fragments.join('');
}

/** Succeeds when some TXT value equals `expected` exactly. */
export function validateAcmeTxtSet(
  records: ReadonlyArray<ReadonlyArray<string>>,
  expected: string,
): TxtValidationResult {
  const allValues = records.map(normalizeTxtFragments);
  const matched = allValues.find((value) => value === expected);
  if (matched !== undefined) return { ok: true, matched, allValues };

  return {
    ok: false,
    allValues,
    reasons: allValues.map((value) => `'${value}' doesn't match the expected value`),
  };
}

/** The closest enclosing name of `fqdn` that has NS records, or null. */
export async function findZoneWithNs(
  fqdn: string,
  lookup: DnsLookup = systemLookup,
): Promise<string | null> {
  const parts = fqdn.replace(/\.$/, '').split('.');
  for (let i = 0; i < parts.length; i++) {
    const candidate = parts.slice(i).join('.');
    try {
      const ns = await lookup.resolveNs(candidate);
      if (ns.length > 0) return candidate;
    } catch (e) {
      debugChallenge('no NS for %s: %s', candidate, e instanceof Error ? e.message : String(e));
    }
  }
  return null;
}

/** Unique A and AAAA addresses of the given name servers. */
export async function resolveNsToIPs(
  nsHosts: string[],
  lookup: DnsLookup = systemLookup,
): Promise<string[]> {
  const ips = new Set<string>();
  await Promise.all(
    nsHosts.map(async (ns) => {
      const [v4, v6] = await Promise.allSettled([lookup.resolve4(ns), lookup.resolve6(ns)]);
      if (v4.status === 'fulfilled') v4.value.forEach((ip) => ips.add(ip));
      if (v6.status === 'fulfilled') v6.value.forEach((ip) => ips.add(ip));
    }),
  );
  return Array.from(ips);
}

/** Look `fqdn` up at its zone's authoritative servers and compare with `expected`. */
export async function resolveAndValidateTxtAuthoritative(
  fqdn: string,
  expected: string,
  lookup: DnsLookup = systemLookup,
): Promise<TxtValidationResult> {
  const name = fqdn.replace(/\.$/, '');
  const zone = await findZoneWithNs(name, lookup);
  if (!zone) {
    return { ok: false, allValues: [], reasons: [`Failed to find zone with NS for ${name}`] };
  }

  let nsHosts: string[];
  try {
    nsHosts = await lookup.resolveNs(zone);
  } catch (e) {
    return { ok: false, allValues: [], reasons: [`Failed to resolve NS for ${zone}: ${String(e)}`] };
  }

  const nsIPs = await resolveNsToIPs(nsHosts, lookup);
  if (nsIPs.length === 0) {
    return {
      ok: false,
      allValues: [],
      reasons: [`No IPs for NS of ${zone} (hosts: ${nsHosts.join(', ')})`],
    };
  }
  debugChallenge('querying %s at authoritative servers %j', name, nsIPs);

  try {
    return validateAcmeTxtSet(await lookup.resolveTxtAt(nsIPs, name), expected);
  } catch (e) {
    return {
      ok: false,
      allValues: [],
      reasons: [`Failed to resolve TXT at authoritative servers for ${name}: ${String(e)}`],
    };
  }
}

/** {@link PropagationCheck} against authoritative servers. */
export function authoritativeTxtCheck(lookup: DnsLookup = systemLookup): PropagationCheck {
  return async (fqdn, value) => {
    const result = await resolveAndValidateTxtAuthoritative(fqdn, value, lookup);
    if (!result.ok) debugChallenge('%s not yet propagated: %j', fqdn, result.reasons);
    return result.ok;
  };
}

export const checkTxtPropagation: PropagationCheck = authoritativeTxtCheck();

/**
 * Poll `check` until it succeeds.
 * @throws {Dns01ProviderError} when `timeoutMs` passes first
 */
export async function waitForPropagation(
  check: PropagationCheck,
  fqdn: string,
  value: string,
  { timeoutMs, intervalMs }: PropagationOptions,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    if (await check(fqdn, value)) return;
    if (Date.now() + intervalMs > deadline) {
      throw Dns01ProviderError.propagationTimeout(fqdn, timeoutMs);
    }
    await new Promise<void>((resolve) => setTimeout(resolve, intervalMs));
  }
}
