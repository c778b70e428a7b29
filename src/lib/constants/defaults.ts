/**
 * Default timing and sizing constants
 *
 * Fallbacks used when no explicit option is provided.
 */

// Nonce manager
export const NONCE_MAX_AGE_MS = 120_000; // 2 minutes
export const NONCE_MAX_POOL_SIZE = 32;
export const NONCE_MAX_ATTEMPTS = 3;

// Order and authorization polling
export const POLL_MAX_ATTEMPTS = 60;
export const POLL_INTERVAL_MS = 2_000;

// DNS-01 propagation
export const PROPAGATION_TIMEOUT_MS = 60_000;
export const PROPAGATION_INTERVAL_MS = 2_000;
export const MANUAL_PROPAGATION_TIMEOUT_MS = 10 * 60_000;
export const DNS_QUERY_TIMEOUT_MS = 4_000;

// HTTP transport of the SCEP endpoint
export const SCEP_PATH = '/scep';
export const MAX_PKI_MESSAGE_BYTES = 1024 * 1024;

// Server supervisor
export const HEADER_TIMEOUT_MS = 30_000;
export const REQUEST_TIMEOUT_MS = 60_000;
export const WRITE_TIMEOUT_MS = 60_000;
export const IDLE_TIMEOUT_MS = 120_000;
export const SHUTDOWN_GRACE_MS = 30_000;
