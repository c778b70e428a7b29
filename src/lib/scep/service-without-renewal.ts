import type { CaCertResponse, ScepService } from './scep-service.js';

const RENEWAL = 'Renewal';

/**
 * Drop every `Renewal` line from a newline-delimited capability list.
 * Other tokens keep their order; applying it twice changes nothing.
 */
export function removeRenewal(caps: string): string {
  return caps
    .split('\n')
    .filter((token) => token !== RENEWAL)
    .join('\n');
}

/** Advertises the wrapped service's capabilities without renewal. */
export class ServiceWithoutRenewal implements ScepService {
  constructor(private readonly inner: ScepService) {}

  async getCACaps(): Promise<string> {
    return removeRenewal(await this.inner.getCACaps());
  }

  getCACert(message?: string): Promise<CaCertResponse> {
    return this.inner.getCACert(message);
  }

  pkiOperation(data: Buffer): Promise<Buffer> {
    return this.inner.pkiOperation(data);
  }
}
