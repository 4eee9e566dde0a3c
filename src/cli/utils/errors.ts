import chalk from 'chalk';
import { isTransportIntegrationError } from '../../index.js';

/** Central error handler for CLI commands. */
export function handleError(error: unknown): void {
  if (isTransportIntegrationError(error)) {
    console.error(chalk.red(`Error [${error.code}]:`), error.message);
  } else if (error instanceof Error) {
    console.error(chalk.red('Error:'), error.message);
  } else {
    console.error('Unknown error:', error);
  }
}
