/**
 * @fileoverview Engine error hierarchy
 *
 * Typed, structured errors for the few conditions that are genuinely
 * exceptional (I/O, provider and configuration failures). Abstention is never
 * an error: strategies return `null` when they have no confident answer.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class EngineError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// STORAGE ERRORS
// ============================================================================

export type StorageOperation = 'read' | 'write' | 'delete' | 'lock' | 'migrate' | 'query';

export class StorageError extends EngineError {
  readonly code = 'STORAGE_ERROR';

  constructor(
    readonly operation: StorageOperation,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Storage ${operation} failed: ${message}`);
    this.name = 'StorageError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// EMBEDDING PROVIDER ERRORS
// ============================================================================

export type EmbeddingErrorReason =
  | 'unavailable'
  | 'timeout'
  | 'invalid_response'
  | 'network_error';

export class EmbeddingError extends EngineError {
  readonly code = 'EMBEDDING_ERROR';

  constructor(
    readonly provider: string,
    readonly reason: EmbeddingErrorReason,
    readonly retryable: boolean,
    message: string,
  ) {
    super(`Embedding provider ${provider} ${reason}: ${message}`);
    this.name = 'EmbeddingError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        provider: this.provider,
        reason: this.reason,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigError extends EngineError {
  readonly code = 'CONFIG_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { issues: this.issues },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

export function isEmbeddingError(error: unknown): error is EmbeddingError {
  return error instanceof EmbeddingError;
}
