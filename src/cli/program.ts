import { Command, CommanderError, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { buildConfig, DEFAULT_LISTEN, LETS_ENCRYPT_STAGING, type RawBridgeOptions } from '../lib/config/config.js';
import { startBridge } from './bootstrap.js';
import { handleError } from './utils/errors.js';

export const ENV_PREFIX = 'SCEP_BRIDGE_';

export interface CliHooks {
  /** Replaces {@link startBridge}; receives the validated configuration */
  start?: typeof startBridge;
  /** Throw commander exits instead of leaving the process */
  exitOverride?: boolean;
}

function readVersion(): string {
  let pkg: unknown;
  try {
    pkg = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8'));
  } catch {
    return '0.0.0';
  }
  return pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
}

const flag = (flags: string, description: string, env: string) =>
  new Option(flags, description).env(`${ENV_PREFIX}${env}`);

/** Build the commander program; `action` resolves with the server outcome. */
export function createCli(hooks: CliHooks = {}): Command {
  const start = hooks.start ?? startBridge;
  const program = new Command();

  program
    .name('scep-acme-bridge')
    .description('SCEP enrollment endpoint that obtains certificates from an ACME CA')
    .version(readVersion())
    .addOption(flag('--listen <addr>', 'address to listen on', 'LISTEN').default(DEFAULT_LISTEN))
    .addOption(flag('--cert <path>', 'PEM chain of the RA certificate, leaf first', 'CERT'))
    .addOption(flag('--certkey <path>', 'PEM RSA key of the RA certificate', 'CERTKEY'))
    .addOption(flag('--acmekey <path>', 'PEM key of the ACME account', 'ACMEKEY'))
    .addOption(flag('--acmeemail <email>', 'contact email of the ACME account', 'ACMEEMAIL'))
    .addOption(flag('--acmeurl <url>', 'ACME directory URL', 'ACMEURL').default(LETS_ENCRYPT_STAGING))
    .addOption(flag('--whitelist <path>', 'YAML map of challenge password to hostnames', 'WHITELIST'))
    .addOption(flag('--dnsprovider <name>', 'DNS-01 provider (manual, exec)', 'DNSPROVIDER'))
    .addOption(flag('--debug', 'verbose logging', 'DEBUG'))
    .action(async (opts: RawBridgeOptions) => {
      await start(buildConfig(opts));
    });

  if (hooks.exitOverride) program.exitOverride();
  return program;
}

/**
 * Parse `argv` (user arguments only) and run the bridge.
 * @returns the process exit code
 */
export async function runCli(argv: string[], hooks: CliHooks = {}): Promise<number> {
  const program = createCli(hooks);
  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (err: unknown) {
    if (err instanceof CommanderError && (err.code === 'commander.helpDisplayed' || err.code === 'commander.version')) {
      return 0;
    }
    handleError(err);
    return 1;
  }
}
