import type { AddressInfo } from 'node:net';
import { createLogger, type Logger } from '../logger.js';
import type { BridgeConfig } from '../lib/config/config.js';
import { formatListen } from '../lib/config/config.js';
import { ChainDepot } from '../lib/depot/chain-depot.js';
import {
  AcmeCertificateSource,
  type CertificateSource,
} from '../lib/issuance/acme-certificate-source.js';
import { createScepService } from '../lib/scep/scep-service.js';
import { LoggingScepService } from '../lib/scep/logging-service.js';
import { ServiceWithoutRenewal } from '../lib/scep/service-without-renewal.js';
import { ScepServer } from '../lib/server/scep-server.js';
import type { TaskOutcome } from '../lib/server/task-group.js';
import { enableDebugNamespaces } from '../lib/utils/debug.js';
import { CsrPasswordVerifier } from '../lib/whitelist/csr-password-verifier.js';

export interface BridgeOverrides {
  /** Used instead of registering an ACME account */
  certificateSource?: CertificateSource;
  logger?: Logger;
  /** Stops the server when aborted */
  signal?: AbortSignal;
  /** Called once the listener is bound */
  onListening?: (address: AddressInfo) => void;
}

/**
 * Wire every component from `config` and serve until the server terminates.
 * Rejects when any startup step fails.
 */
export async function startBridge(config: BridgeConfig, overrides: BridgeOverrides = {}): Promise<TaskOutcome[]> {
  if (config.debug) enableDebugNamespaces();
  const logger = overrides.logger ?? createLogger(config.debug ? 'debug' : 'info');

  const certificateSource =
    overrides.certificateSource ??
    (await AcmeCertificateSource.create({
      directoryUrl: config.acmeUrl,
      email: config.acmeEmail,
      accountKeyPath: config.acmeKeyPath,
      dnsProvider: config.dnsProvider,
      logger,
    }));

  const verifier = await CsrPasswordVerifier.fromFile(config.whitelistPath, logger.with({ component: 'whitelist' }));

  const depot = new ChainDepot(config.certPath, config.certKeyPath, { verifyKeyPair: true });
  const { chain } = await depot.ca();
  logger.info('RA identity loaded', { certs: chain.length, subject: chain[0]?.subject });

  const service = new LoggingScepService(
    new ServiceWithoutRenewal(createScepService(depot, { verifier, certificateSource, logger })),
    logger.with({ component: 'scep_service' }),
  );

  const server = new ScepServer(
    config.listen,
    logger,
    overrides.onListening ? { onListening: overrides.onListening } : {},
  );
  logger.info('starting SCEP server', { listen: formatListen(config.listen) });

  return server.run(service, overrides.signal ? { signal: overrides.signal } : {});
}
