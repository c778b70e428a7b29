/**
 * DNS-01 challenge support (RFC 8555 Section 8.4)
 *
 * Provider registry with the built-in `manual` and `exec` providers, and
 * propagation checks against authoritative name servers.
 */

export {
  createDns01Provider,
  registerDns01Provider,
  registeredDns01Providers,
  type Dns01Provider,
  type Dns01ProviderFactory,
  type ProviderEnv,
} from './dns-01-provider.js';
export { dns01Record, type Dns01Record } from './dns-01-record.js';

export { ExecDns01Provider, execConfigFromEnv, type ExecProviderConfig } from './providers/exec.js';
export { ManualDns01Provider } from './providers/manual.js';

export {
  authoritativeTxtCheck,
  checkTxtPropagation,
  findZoneWithNs,
  normalizeTxtFragments,
  resolveAndValidateTxtAuthoritative,
  resolveNsToIPs,
  validateAcmeTxtSet,
  waitForPropagation,
  type DnsLookup,
  type PropagationCheck,
  type PropagationOptions,
  type TxtValidationResult,
} from './dns-propagation.js';
