// =============================================================================
// Centralized Error Handler
// =============================================================================

import chalk from 'chalk';
import { NotFoundError } from '@relayq/engine';

export class CLIError extends Error {
  readonly exitCode: number;
  readonly shouldReport: boolean;

  constructor(message: string, exitCode = 1, shouldReport = true) {
    super(message);
    this.name = 'CLIError';
    this.exitCode = exitCode;
    this.shouldReport = shouldReport;
  }
}

export function createError(message: string, exitCode = 1, shouldReport = true): CLIError {
  return new CLIError(message, exitCode, shouldReport);
}

/** Exit status for an error: 2 for an unknown task, the CLIError's own code, else 1. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof CLIError) return err.exitCode;
  if (err instanceof NotFoundError) return 2;
  return 1;
}

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return `Error: ${err.message}`;
  }
  return `Unknown error: ${String(err)}`;
}

export function handleError(err: unknown): never {
  const shouldReport = !(err instanceof CLIError) || err.shouldReport;
  if (shouldReport) {
    console.error(chalk.red(formatErrorMessage(err)));
  }

  process.exit(exitCodeFor(err));
}

/** Wrap a command action so thrown errors become a red message and an exit code. */
export function withErrorHandling<A extends unknown[]>(
  fn: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A): Promise<void> => {
    try {
      await fn(...args);
    } catch (err) {
      handleError(err);
    }
  };
}

// Validation helpers

export function parseIntegerOption(value: string | undefined, name: string, min?: number, max?: number): number | undefined {
  if (value === undefined) return undefined;

  const num = Number(value);
  if (!Number.isInteger(num)) {
    throw createError(`${name} must be a whole number`);
  }
  if (min !== undefined && num < min) {
    throw createError(`${name} must be at least ${min}`);
  }
  if (max !== undefined && num > max) {
    throw createError(`${name} must be at most ${max}`);
  }
  return num;
}

export function parseBooleanOption(value: string | undefined, name: string): boolean | undefined {
  if (value === undefined) return undefined;
  const lower = value.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  throw createError(`${name} must be "true" or "false"`);
}
