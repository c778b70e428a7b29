import type { Logger } from '../../../logger.js';
import { MANUAL_PROPAGATION_TIMEOUT_MS, PROPAGATION_INTERVAL_MS } from '../../constants/defaults.js';
import type { Dns01Provider } from '../dns-01-provider.js';
import { dns01Record } from '../dns-01-record.js';
import type { PropagationOptions } from '../dns-propagation.js';

/**
 * Operator-driven provider: logs the record to create and to remove.
 * Issuance proceeds once the record shows up at the authoritative servers.
 */
export class ManualDns01Provider implements Dns01Provider {
  constructor(private readonly logger: Logger) {}

  async present(domain: string, _token: string, keyAuth: string): Promise<void> {
    const { fqdn, value } = dns01Record(domain, keyAuth);
    this.logger.warn('create DNS TXT record', { fqdn, value, ttl: 120 });
  }

  async cleanUp(domain: string, _token: string, keyAuth: string): Promise<void> {
    const { fqdn } = dns01Record(domain, keyAuth);
    this.logger.warn('remove DNS TXT record', { fqdn });
  }

  timeout(): PropagationOptions {
    return { timeoutMs: MANUAL_PROPAGATION_TIMEOUT_MS, intervalMs: PROPAGATION_INTERVAL_MS };
  }
}
