/**
 * Library exports: SCEP engine, authorization, RA depot and the ACME
 * issuance path.
 */

// SCEP engine and HTTP transport
export * from './scep/index.js';

// Server supervisor
export { ScepServer, type ScepServerOptions, type ServerState, type RunOptions } from './server/scep-server.js';
export { TaskGroup, type Task, type TaskOutcome } from './server/task-group.js';

// Authorization
export { CsrPasswordVerifier, type CsrVerifier } from './whitelist/csr-password-verifier.js';
export { AuthorizationTable, buildAuthorizationTable, type WhitelistSource } from './whitelist/authorization-table.js';
export { ExactHostnameRule, type HostnameRule } from './whitelist/hostname-rule.js';

// RA identity
export { ChainDepot, loadCerts, loadKey, keyMatchesCertificate } from './depot/chain-depot.js';
export type { CaIdentity, ChainDepotOptions, Depot } from './depot/chain-depot.js';

// CA issuance
export {
  AcmeCertificateSource,
  decodeIssuedCertificate,
  type AcmeCertificateSourceOptions,
  type CertificateSource,
} from './issuance/acme-certificate-source.js';
export { CertificateObtainer, identifiersForCsr, type CertificateResource } from './core/certificate-obtainer.js';
export { AcmeClient, type AcmeClientOptions } from './core/acme-client.js';
export { AcmeAccount, type AcmeAccountOptions, type PollingOptions } from './core/acme-account.js';
export { parseAccountKey, loadAccountKey, type AccountKey } from './crypto/account-key.js';
export { parseCertificateRequest, requestedNames, type CertificateRequestInfo } from './crypto/csr.js';
export * from './challenges/index.js';

// Configuration
export { buildConfig, formatListen, LETS_ENCRYPT_PRODUCTION, LETS_ENCRYPT_STAGING } from './config/config.js';
export type { BridgeConfig, RawBridgeOptions } from './config/config.js';

// Errors
export * from './errors/bridge-errors.js';
export * from './errors/acme-server-errors.js';
export { createErrorFromProblem } from './errors/factory.js';
export { ACME_ERROR, type AcmeErrorType } from './errors/codes.js';
