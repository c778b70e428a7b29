/**
 * DNS-01 challenge providers
 *
 * A provider publishes and removes the `_acme-challenge` TXT record of a
 * domain. Providers are selected by name through a registry, the way the
 * command line names them.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-8.4
 */

import { nopLogger, type Logger } from '../../logger.js';
import { Dns01ProviderError } from '../errors/bridge-errors.js';
import type { PropagationOptions } from './dns-propagation.js';
import { ExecDns01Provider, execConfigFromEnv } from './providers/exec.js';
import { ManualDns01Provider } from './providers/manual.js';

export interface Dns01Provider {
  present(domain: string, token: string, keyAuth: string): Promise<void>;
  cleanUp(domain: string, token: string, keyAuth: string): Promise<void>;
  /** Propagation timeout and polling interval; defaults apply when absent */
  timeout?(): PropagationOptions;
}

export type ProviderEnv = Readonly<Record<string, string | undefined>>;

export type Dns01ProviderFactory = (env: ProviderEnv, logger: Logger) => Dns01Provider;

const registry = new Map<string, Dns01ProviderFactory>([
  ['manual', (_env, logger) => new ManualDns01Provider(logger)],
  ['exec', (env, logger) => new ExecDns01Provider(execConfigFromEnv(env), logger, env)],
]);

/** Make a provider selectable by `name`; replaces an existing one. */
export function registerDns01Provider(name: string, factory: Dns01ProviderFactory): void {
  registry.set(name, factory);
}

export function registeredDns01Providers(): string[] {
  return [...registry.keys()].sort();
}

/**
 * Build the provider registered as `name`, configured from `env`.
 * @throws {Dns01ProviderError} for unknown names or a provider rejecting its configuration
 */
export function createDns01Provider(
  name: string,
  env: ProviderEnv = process.env,
  logger: Logger = nopLogger,
): Dns01Provider {
  const factory = registry.get(name);
  if (!factory) throw Dns01ProviderError.unknown(name);
  return factory(env, logger.with({ dns_provider: name }));
}
