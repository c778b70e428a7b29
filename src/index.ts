/**
 * SCEP-to-ACME certificate bridge
 */

export * from './lib/index.js';
export { createLogger, nopLogger, setLogSink, type Logger, type LogLevel } from './logger.js';
export { startBridge, type BridgeOverrides } from './cli/bootstrap.js';
export { createCli, runCli } from './cli/program.js';
