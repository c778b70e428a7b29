/**
 * Debug tracing for the bridge
 *
 * Namespaced tracing built on the `debug` package. Enable it with the DEBUG
 * environment variable or by calling {@link enableDebugNamespaces}:
 *
 * DEBUG=scep-acme-bridge:* - All debug output
 * DEBUG=scep-acme-bridge:nonce - Only nonce manager debug
 * DEBUG=scep-acme-bridge:scep - Only SCEP message handling
 */

import debug from 'debug';

export const DEBUG_PREFIX = 'scep-acme-bridge';

const createDebugger = (namespace: string): debug.Debugger => debug(`${DEBUG_PREFIX}:${namespace}`);

/** Turn on every namespace of this project, keeping whatever DEBUG already enabled. */
export function enableDebugNamespaces(): void {
  const current = debug.disable();
  const ours = `${DEBUG_PREFIX}:*`;
  debug.enable(current ? `${current},${ours}` : ours);
}

export const debugNonce = createDebugger('nonce');
export const debugHttp = createDebugger('http');
export const debugAcme = createDebugger('acme');
export const debugChallenge = createDebugger('challenge');
export const debugScep = createDebugger('scep');
export const debugWhitelist = createDebugger('whitelist');
export const debugDepot = createDebugger('depot');
export const debugServer = createDebugger('server');
