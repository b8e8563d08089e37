/**
 * Shared CLI result handling.
 *
 * - Commands return a CliResult; nothing prints inside a command
 * - Output is single-line JSON by default, `--pretty` for colored text
 * - Exit codes: 0 = success, 1 = partial failure, 2 = fatal error
 */

import chalk from 'chalk';
import { errorMessage, isAggregateFailure, isBrRealtyError } from '@brrealty/contracts';

export const EXIT_CODES = {
  success: 0,
  partial: 1,
  fatal: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/** Line sink; `console.log` unless a test captures output. */
export type Output = (line: string) => void;

/**
 * Standard result object structure returned by all commands
 */
export interface CliResult {
  success: boolean; // Overall operation success status
  command: string; // Name of the command that ran
  timestamp: string; // ISO 8601 timestamp of execution
  exitCode: ExitCode;
  data: unknown; // Command-specific data
  warnings?: string[]; // Non-fatal warnings
  errors?: string[]; // Fatal errors
}

/**
 * Create a standard result object. The exit code follows from `success`
 * and warnings unless given.
 *
 * @example
 * const result = createResult('fetch', true, { rows: 120 }, { warnings: ['1 series failed: 189'] });
 * result.exitCode; // 1
 */
export function createResult(
  command: string,
  success: boolean,
  data: unknown,
  options: {
    warnings?: string[];
    errors?: string[];
    exitCode?: ExitCode;
    now?: Date;
  } = {}
): CliResult {
  const partial = (options.warnings?.length ?? 0) > 0;
  return {
    success,
    command,
    timestamp: (options.now ?? new Date()).toISOString(),
    exitCode: options.exitCode ?? (success ? (partial ? EXIT_CODES.partial : EXIT_CODES.success) : EXIT_CODES.fatal),
    data,
    warnings: options.warnings,
    errors: options.errors,
  };
}

/**
 * Result for a command that threw. Typed errors keep their code and data.
 */
export function errorResult(command: string, error: unknown, now?: Date): CliResult {
  const data = isBrRealtyError(error)
    ? { code: error.code, ...error.data }
    : { code: 'INTERNAL_ERROR' };
  const errors = [errorMessage(error)];
  if (isAggregateFailure(error)) {
    errors.push(`${error.failed} of ${error.attempted} series failed`);
  }
  return createResult(command, false, data, { errors, exitCode: EXIT_CODES.fatal, now });
}

/**
 * Output result in JSON or pretty format
 *
 * JSON mode: Single-line JSON for machine parsing
 * Pretty mode: Multi-line formatted output with colors
 */
export function outputResult(result: CliResult, pretty: boolean, out: Output = console.log): void {
  if (!pretty) {
    out(JSON.stringify(result));
    return;
  }

  const status = result.success
    ? result.exitCode === EXIT_CODES.partial
      ? chalk.yellow('PARTIAL')
      : chalk.green('SUCCESS')
    : chalk.red('FAILED');

  out('='.repeat(60));
  out(`${chalk.bold('Command:')} ${result.command}`);
  out(`${chalk.bold('Status:')} ${status}`);
  out(`${chalk.bold('Timestamp:')} ${result.timestamp}`);
  out('='.repeat(60));
  out(chalk.bold('Data:'));
  out(JSON.stringify(result.data, null, 2));

  if (result.warnings && result.warnings.length > 0) {
    out(chalk.yellow.bold('Warnings:'));
    result.warnings.forEach((warning) => out(chalk.yellow(`  - ${warning}`)));
  }

  if (result.errors && result.errors.length > 0) {
    out(chalk.red.bold('Errors:'));
    result.errors.forEach((error) => out(chalk.red(`  - ${error}`)));
  }
}
