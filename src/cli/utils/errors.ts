import chalk from 'chalk';
import { AcmeError } from '../../lib/errors/acme-server-errors.js';

/** First ACME problem in the cause chain of `error`. */
function findAcmeProblem(error: unknown): AcmeError | undefined {
  let current: unknown = error;
  for (let depth = 0; current instanceof Error && depth < 8; depth++) {
    if (current instanceof AcmeError) return current;
    current = current.cause;
  }
  return undefined;
}

/** Central error reporter for the CLI. */
export function handleError(error: unknown): void {
  if (error instanceof Error) {
    console.error(chalk.red('Error:'), error.message);
    const problem = findAcmeProblem(error);
    if (problem) console.error(chalk.gray(`ACME problem: ${problem.type}`));
  } else {
    console.error(chalk.red('Error:'), String(error));
  }
}
