/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { isEngineError, isStorageError, ConfigError } from '../core/errors.js';

export type CliErrorCode =
  | 'UNKNOWN_COMMAND'
  | 'INVALID_ARGUMENT'
  | 'CONFIG_INVALID'
  | 'STORAGE_LOCKED'
  | 'STORAGE_ERROR';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  UNKNOWN_COMMAND: 'Run `action-engine help` to list the available commands.',
  INVALID_ARGUMENT: 'Run `action-engine help <command>` for usage information.',
  CONFIG_INVALID: 'Fix the listed fields in the config file or ACTION_ENGINE_* variables.',
  STORAGE_LOCKED: 'Another process holds the database. Stop it or pass a different --db path.',
  STORAGE_ERROR: 'Check that the --db path is writable, or remove the file to start fresh.',
};

export const EXIT_CODES: Record<CliErrorCode, number> = {
  UNKNOWN_COMMAND: 2,
  INVALID_ARGUMENT: 2,
  CONFIG_INVALID: 3,
  STORAGE_LOCKED: 4,
  STORAGE_ERROR: 4,
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/**
 * Map engine errors onto CLI codes; anything else passes through unchanged.
 */
export function classifyError(error: unknown): unknown {
  if (error instanceof CliError) return error;
  if (error instanceof ConfigError) {
    return createError('CONFIG_INVALID', error.message, { issues: error.issues });
  }
  if (isStorageError(error)) {
    return createError(error.operation === 'lock' ? 'STORAGE_LOCKED' : 'STORAGE_ERROR', error.message, {
      operation: error.operation,
      retryable: error.retryable,
    });
  }
  return error;
}

export function formatError(error: unknown): string {
  if (error instanceof CliError) {
    const lines = [`Error [${error.code}]: ${error.message}`];
    if (error.suggestion) lines.push('', `Suggestion: ${error.suggestion}`);
    return lines.join('\n');
  }
  if (isEngineError(error)) {
    return `Error [${error.code}]: ${error.message}`;
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

export function getExitCode(error: unknown): number {
  return error instanceof CliError ? EXIT_CODES[error.code] : 1;
}
