import chalk from 'chalk';
import { EXIT_CODES, type ExitCode } from '../../domain/loop/types.js';
import { ProviderError } from '../../infra/llm/llm-provider.js';
import { ConfigValidationError } from '../../infra/config/runtime-config.js';
import { CredentialsValidationError } from '../../infra/config/credentials-loader.js';
import { RiskTableValidationError } from '../../infra/risk/risk-table-loader.js';
import { UsageError } from './usage-error.js';

export function describeError(error: unknown): string {
  if (error instanceof ProviderError) {
    return `${error.message}${error.recoverable ? '' : ' (not retried)'}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Print an error that escaped a command and pick the exit code for it.
 */
export function reportFatalError(error: unknown): ExitCode {
  if (error instanceof UsageError) {
    console.error(chalk.red(error.message));
    console.error(chalk.yellow('Run `cmdwise --help` for usage'));
    return EXIT_CODES.usage;
  }

  if (
    error instanceof ConfigValidationError ||
    error instanceof CredentialsValidationError ||
    error instanceof RiskTableValidationError
  ) {
    console.error(chalk.red(`Configuration error: ${error.message}`));
    return EXIT_CODES.aborted;
  }

  console.error(chalk.red(`✗ ${describeError(error)}`));
  return EXIT_CODES.aborted;
}
