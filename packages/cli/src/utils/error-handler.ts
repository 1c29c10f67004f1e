import chalk from 'chalk';
import { PanewardError } from '@paneward/core';

/** Exit codes for the CLI. */
export const ExitCode = {
  Success: 0,
  GeneralError: 1,
  ValidationError: 2,
  TmuxError: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** CLI-specific error with exit code. */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCode = ExitCode.GeneralError,
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

/** Maps a domain error onto the exit code the shell sees. */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof CLIError) return error.exitCode;
  if (error instanceof PanewardError) {
    switch (error.code) {
      case 'VALIDATION':
      case 'DUPLICATE_NAME':
      case 'NOT_FOUND':
        return ExitCode.ValidationError;
      case 'LIST_UNAVAILABLE':
      case 'CAPTURE_FAILED':
      case 'ALREADY_EXISTS':
      case 'TIMEOUT':
      case 'NO_CLIENT':
      case 'EXTERNAL_COMMAND':
        return ExitCode.TmuxError;
      default:
        return ExitCode.GeneralError;
    }
  }
  return ExitCode.GeneralError;
}

/** Handles errors at the top level and exits with the appropriate code. */
export function handleError(error: unknown): never {
  if (error instanceof Error) {
    if (process.env['PANEWARD_VERBOSE'] === '1') {
      console.error(chalk.red(error.stack ?? error.message));
    } else {
      console.error(chalk.red(`Error: ${error.message}`));
    }
    process.exit(exitCodeFor(error));
  }

  console.error(chalk.red(`Error: ${String(error)}`));
  process.exit(ExitCode.GeneralError);
}
