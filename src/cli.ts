#!/usr/bin/env node

import { runCli } from './cli/program.js';
import { handleError } from './cli/utils/errors.js';

process.on('unhandledRejection', (err) => {
  handleError(err);
  process.exit(1);
});

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    handleError(err);
    process.exit(1);
  },
);
