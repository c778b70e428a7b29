/**
 * Server supervisor
 *
 * Runs the SCEP HTTP listener next to a shutdown watcher and a SIGTERM
 * watcher. The first of them to finish stops the other two; the listener
 * then drains for a grace period before open connections are dropped.
 */

import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { types } from 'node:util';
import type { Logger } from '../../logger.js';
import {
  HEADER_TIMEOUT_MS,
  IDLE_TIMEOUT_MS,
  REQUEST_TIMEOUT_MS,
  SHUTDOWN_GRACE_MS,
  WRITE_TIMEOUT_MS,
} from '../constants/defaults.js';
import { createScepHttpHandler } from '../scep/http-handler.js';
import type { ScepService } from '../scep/scep-service.js';
import { debugServer } from '../utils/debug.js';
import { aborted, TaskGroup, type TaskOutcome } from './task-group.js';

export type ServerState = 'idle' | 'running' | 'draining' | 'stopped';

export interface ListenAddress {
  host: string;
  port: number;
}

export interface ScepServerOptions {
  /** Drain period before remaining connections are destroyed */
  graceMs?: number;
  /** Process signals that stop the server */
  signals?: NodeJS.Signals[];
  onListening?: (address: AddressInfo) => void;
}

export interface RunOptions {
  /** Aborting it drains and stops the server */
  signal?: AbortSignal;
}

// isNativeError also recognises errors raised in another realm
function describe(value: unknown): string {
  return value instanceof Error || types.isNativeError(value) ? value.message : String(value);
}

export class ScepServer {
  private current: ServerState = 'idle';
  private server: Server | undefined;
  private readonly graceMs: number;
  private readonly signals: NodeJS.Signals[];
  private readonly onListening: ((address: AddressInfo) => void) | undefined;

  constructor(
    private readonly listen: ListenAddress,
    private readonly logger: Logger,
    opts: ScepServerOptions = {},
  ) {
    this.graceMs = opts.graceMs ?? SHUTDOWN_GRACE_MS;
    this.signals = opts.signals ?? ['SIGTERM'];
    this.onListening = opts.onListening;
  }

  get state(): ServerState {
    return this.current;
  }

  /** Bound address once listening. */
  address(): AddressInfo | undefined {
    const addr = this.server?.address();
    return addr && typeof addr === 'object' ? addr : undefined;
  }

  /**
   * Serve `service` until a watcher or the listener finishes. The outcome
   * of every task is logged once as `terminated` and returned.
   */
  async run(service: ScepService, opts: RunOptions = {}): Promise<TaskOutcome[]> {
    if (this.current !== 'idle') throw new Error(`server is ${this.current}`);

    const server = createServer(createScepHttpHandler(service, this.logger));
    server.headersTimeout = HEADER_TIMEOUT_MS;
    server.requestTimeout = REQUEST_TIMEOUT_MS;
    server.keepAliveTimeout = IDLE_TIMEOUT_MS;
    server.timeout = WRITE_TIMEOUT_MS;
    this.server = server;
    this.current = 'running';

    const group = new TaskGroup(opts.signal)
      .add('listen', (signal) => this.serve(server, signal))
      .add('shutdown', (signal) => this.drainOnAbort(server, signal))
      .add('signals', (signal) => this.watchSignals(signal));

    const outcomes = await group.run();
    this.current = 'stopped';

    this.logger.info('terminated', {
      tasks: outcomes.map((o) =>
        o.status === 'fulfilled' ? `${o.name}:${describe(o.value)}` : `${o.name}:error:${describe(o.reason)}`,
      ),
    });
    return outcomes;
  }

  private serve(server: Server, signal: AbortSignal): Promise<string> {
    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.once('close', () => resolve('closed'));
      server.listen(this.listen.port, this.listen.host, () => {
        // stopped before the socket was bound; nothing will drain it
        if (signal.aborted) {
          server.close();
          return;
        }
        const addr = this.address();
        if (!addr) return;
        this.logger.info('listening', { addr: `${addr.address}:${addr.port}` });
        this.onListening?.(addr);
      });
    });
  }

  private async drainOnAbort(server: Server, signal: AbortSignal): Promise<string> {
    await aborted(signal);
    this.current = 'draining';
    debugServer('draining: grace=%dms reason=%s', this.graceMs, describe(signal.reason));

    if (!server.listening) return 'not listening';

    const timer = setTimeout(() => {
      debugServer('grace period over, destroying connections');
      server.closeAllConnections();
    }, this.graceMs);
    timer.unref();

    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeIdleConnections();
      });
    } finally {
      clearTimeout(timer);
    }
    return 'drained';
  }

  private watchSignals(signal: AbortSignal): Promise<string> {
    return new Promise((resolve) => {
      const onSignal = (name: NodeJS.Signals) => {
        cleanup();
        resolve(`signal: ${name}`);
      };
      const onAbort = () => {
        cleanup();
        resolve('cancelled');
      };
      const cleanup = () => {
        for (const name of this.signals) process.off(name, onSignal);
        signal.removeEventListener('abort', onAbort);
      };

      for (const name of this.signals) process.on(name, onSignal);
      if (signal.aborted) onAbort();
      else signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
