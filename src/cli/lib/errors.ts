import chalk from 'chalk';
import { SchedulerError } from '../../scheduler/index.js';
import { formatIssues } from './format.js';

function hasIssues(data: unknown): data is { errors: Array<{ path: string; message: string }> } {
  return (
    typeof data === 'object' &&
    data !== null &&
    'errors' in data &&
    Array.isArray(data.errors)
  );
}

/**
 * Print a command failure and exit. SchedulerErrors show their code and any
 * schema issues; values that are not Errors are re-thrown.
 */
export function exitWithError(error: unknown): never {
  if (!(error instanceof SchedulerError)) {
    if (error instanceof Error) {
      console.error(chalk.red(`✗ ${error.message}`));
      process.exit(1);
    }
    throw error;
  }

  console.error(chalk.red(`✗ ${error.code}: ${error.message}`));
  if (hasIssues(error.data) && error.data.errors.length > 0) {
    for (const line of formatIssues(error.data.errors)) {
      console.error(chalk.yellow(line));
    }
  }
  process.exit(1);
}
