export { createScepService } from './scep-service.js';
export type { CaCertResponse, ScepService, ScepServiceOptions } from './scep-service.js';
export { ServiceWithoutRenewal, removeRenewal } from './service-without-renewal.js';
export { LoggingScepService } from './logging-service.js';
export { createScepHttpHandler } from './http-handler.js';
export { parsePkiMessage, buildCertRep } from './pki-message.js';
export type { PkiRequest, CertRep, RaSigner } from './pki-message.js';
export { decryptEnvelope, encryptEnvelope, SUPPORTED_CONTENT_CIPHERS } from './envelope.js';
export { parseAndVerifySignedData, buildSignedData, buildCertsOnly } from './signed-data.js';
export { CONTENT_TYPE, DEFAULT_CA_CAPS, FAIL_INFO, MESSAGE_TYPE, OID, PKI_STATUS } from './constants.js';
