import type { Logger } from '../../logger.js';
import type { CaCertResponse, ScepService } from './scep-service.js';

/** Logs method, error and duration of every call, then hands the outcome back unchanged. */
export class LoggingScepService implements ScepService {
  constructor(
    private readonly inner: ScepService,
    private readonly logger: Logger,
  ) {}

  getCACaps(): Promise<string> {
    return this.observe('GetCACaps', () => this.inner.getCACaps());
  }

  getCACert(message?: string): Promise<CaCertResponse> {
    return this.observe('GetCACert', () => this.inner.getCACert(message));
  }

  pkiOperation(data: Buffer): Promise<Buffer> {
    return this.observe('PKIOperation', () => this.inner.pkiOperation(data));
  }

  private async observe<T>(method: string, call: () => Promise<T>): Promise<T> {
    const started = process.hrtime.bigint();
    const took = () => `${Number(process.hrtime.bigint() - started) / 1e6}ms`;
    try {
      const result = await call();
      this.logger.info('scep call', { method, err: null, took: took() });
      return result;
    } catch (e) {
      this.logger.info('scep call', { method, err: e, took: took() });
      throw e;
    }
  }
}
