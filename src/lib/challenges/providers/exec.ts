import { spawn } from 'node:child_process';
import type { Logger } from '../../../logger.js';
import { PROPAGATION_INTERVAL_MS, PROPAGATION_TIMEOUT_MS } from '../../constants/defaults.js';
import { Dns01ProviderError } from '../../errors/bridge-errors.js';
import { debugChallenge } from '../../utils/debug.js';
import type { Dns01Provider, ProviderEnv } from '../dns-01-provider.js';
import { dns01Record } from '../dns-01-record.js';
import type { PropagationOptions } from '../dns-propagation.js';

export interface ExecProviderConfig {
  /** Program run for every present and cleanup */
  program: string;
  /** Pass `<domain> <token> <keyAuth>` instead of `<fqdn> <value>` */
  raw: boolean;
  propagation: PropagationOptions;
}

interface CommandResult {
  code: number | null;
  out: string;
  err: string;
}

function runCmd(cmd: string, args: string[], env: ProviderEnv): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const p = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'], env: { ...env } });
    const out: string[] = [];
    const err: string[] = [];
    p.stdout.on('data', (c: Buffer) => out.push(c.toString()));
    p.stderr.on('data', (c: Buffer) => err.push(c.toString()));
    p.on('error', reject);
    p.on('close', (code) => resolve({ code, out: out.join(''), err: err.join('') }));
  });
}

function seconds(env: ProviderEnv, key: string, fallbackMs: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallbackMs;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw Dns01ProviderError.misconfigured('exec', `${key} must be a positive number of seconds`);
  }
  return value * 1000;
}

/** Read EXEC_PATH, EXEC_MODE, EXEC_PROPAGATION_TIMEOUT and EXEC_POLLING_INTERVAL. */
export function execConfigFromEnv(env: ProviderEnv): ExecProviderConfig {
  const program = env.EXEC_PATH;
  if (!program) throw Dns01ProviderError.misconfigured('exec', 'EXEC_PATH is not set');
  return {
    program,
    raw: env.EXEC_MODE === 'RAW',
    propagation: {
      timeoutMs: seconds(env, 'EXEC_PROPAGATION_TIMEOUT', PROPAGATION_TIMEOUT_MS),
      intervalMs: seconds(env, 'EXEC_POLLING_INTERVAL', PROPAGATION_INTERVAL_MS),
    },
  };
}

/**
 * Delegates record changes to an external program:
 * `<program> present|cleanup <fqdn> <value>`.
 */
export class ExecDns01Provider implements Dns01Provider {
  constructor(
    private readonly config: ExecProviderConfig,
    private readonly logger: Logger,
    private readonly env: ProviderEnv = process.env,
  ) {}

  async present(domain: string, token: string, keyAuth: string): Promise<void> {
    await this.run('present', domain, token, keyAuth);
  }

  async cleanUp(domain: string, token: string, keyAuth: string): Promise<void> {
    await this.run('cleanup', domain, token, keyAuth);
  }

  timeout(): PropagationOptions {
    return this.config.propagation;
  }

  private async run(action: 'present' | 'cleanup', domain: string, token: string, keyAuth: string) {
    const record = dns01Record(domain, keyAuth);
    const args = this.config.raw
      ? [action, domain, token, keyAuth]
      : [action, record.fqdn, record.value];

    debugChallenge('exec %s %j', this.config.program, args);
    const result = await runCmd(this.config.program, args, this.env);
    if (result.code !== 0) {
      throw Dns01ProviderError.misconfigured(
        'exec',
        `${action} exited with ${result.code ?? 'signal'}: ${(result.err || result.out).trim()}`,
      );
    }
    this.logger.debug('exec provider done', { action, domain });
  }
}
