/**
 * Error taxonomy
 *
 * Every error carries a stable `code` that tool results report back to the
 * caller. `fatal` errors must stop the process (or the test) instead of being
 * reported and retried.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'ALREADY_RUNNING'
  | 'INVALID_STATE'
  | 'NO_ACTIVE_ENTRY'
  | 'UNIQUE_CONSTRAINT'
  | 'STORAGE_ERROR'
  | 'MIGRATION_FAILED'
  | 'REENTRANT_MUTATION';

export class TimeLedgerError extends Error {
  readonly fatal: boolean = false;

  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TimeLedgerError';
  }
}

export class ValidationError extends TimeLedgerError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends TimeLedgerError {
  constructor(
    public readonly entity: string,
    public readonly id: number
  ) {
    super(`${entity} not found: ${id}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends TimeLedgerError {
  constructor(message: string, code: ErrorCode = 'CONFLICT', options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = 'ConflictError';
  }
}

/**
 * Raised by the timer when a start is attempted while an entry is open
 */
export class AlreadyRunningError extends ConflictError {
  constructor(options?: { cause?: unknown }) {
    super('A timer is already running', 'ALREADY_RUNNING', options);
    this.name = 'AlreadyRunningError';
  }
}

export class InvalidStateError extends TimeLedgerError {
  constructor(message: string, code: ErrorCode = 'INVALID_STATE') {
    super(message, code);
    this.name = 'InvalidStateError';
  }
}

export class NoActiveEntryError extends InvalidStateError {
  constructor() {
    super('No timer is running', 'NO_ACTIVE_ENTRY');
    this.name = 'NoActiveEntryError';
  }
}

export class UniqueConstraintError extends TimeLedgerError {
  constructor(
    public readonly entity: string,
    public readonly value: string,
    options?: { cause?: unknown }
  ) {
    super(`${entity} already exists: ${value}`, 'UNIQUE_CONSTRAINT', options);
    this.name = 'UniqueConstraintError';
  }
}

export class StorageError extends TimeLedgerError {
  constructor(message: string, options?: { cause?: unknown }, code: ErrorCode = 'STORAGE_ERROR') {
    super(message, code, options);
    this.name = 'StorageError';
  }
}

export class MigrationError extends StorageError {
  override readonly fatal = true;

  constructor(
    message: string,
    public readonly fromVersion: number,
    options?: { cause?: unknown }
  ) {
    super(message, options, 'MIGRATION_FAILED');
    this.name = 'MigrationError';
  }
}

/**
 * An observer tried to mutate state while a notification was being delivered
 */
export class ReentrantMutationError extends TimeLedgerError {
  override readonly fatal = true;

  constructor(operation: string, event: string) {
    super(
      `Re-entrant state mutation: ${operation} called while delivering '${event}'`,
      'REENTRANT_MUTATION'
    );
    this.name = 'ReentrantMutationError';
  }
}

export function isFatalError(error: unknown): boolean {
  return error instanceof TimeLedgerError && error.fatal;
}

/**
 * Flatten an unknown thrown value into a tool-facing message and code
 */
export function describeError(error: unknown): { error: string; code: string } {
  if (error instanceof TimeLedgerError) {
    return { error: error.message, code: error.code };
  }
  return {
    error: error instanceof Error ? error.message : String(error),
    code: 'INTERNAL_ERROR',
  };
}
