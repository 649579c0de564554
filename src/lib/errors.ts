/**
 * txscope Error Types
 * Structured error handling
 */

export interface DatabaseErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class DatabaseError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    statusCode: number = 500,
    options: DatabaseErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DatabaseError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = options.details;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration Errors (fatal, no retry)
// ============================================================================

export class ConfigurationError extends DatabaseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, 500, { details });
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Transient Errors (503, caller may retry with backoff)
// ============================================================================

export class ConnectivityError extends DatabaseError {
  constructor(message: string, options: DatabaseErrorOptions = {}) {
    super('CONNECTIVITY_ERROR', message, 503, options);
    this.name = 'ConnectivityError';
  }
}

export class PoolExhaustedError extends DatabaseError {
  constructor(timeoutMs: number, maxSize: number) {
    super(
      'POOL_EXHAUSTED',
      `No connection available within ${timeoutMs}ms (pool max ${maxSize})`,
      503,
      { details: { timeoutMs, maxSize } }
    );
    this.name = 'PoolExhaustedError';
  }
}

export class StatementTimeoutError extends DatabaseError {
  constructor(options: DatabaseErrorOptions = {}) {
    super('STATEMENT_TIMEOUT', 'Statement exceeded its timeout', 503, options);
    this.name = 'StatementTimeoutError';
  }
}

// ============================================================================
// Statement Errors
// ============================================================================

export class QueryError extends DatabaseError {
  /** SQLSTATE or backend-specific code, when the backend reports one */
  public readonly sqlState?: string;

  constructor(message: string, sqlState?: string, options: DatabaseErrorOptions = {}) {
    super('QUERY_ERROR', message, sqlState?.startsWith('23') ? 409 : 500, {
      ...options,
      details: { sqlState, ...options.details },
    });
    this.name = 'QueryError';
    this.sqlState = sqlState;
  }
}

// ============================================================================
// Transaction Errors
// ============================================================================

export class TransactionError extends DatabaseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('TRANSACTION_ERROR', message, 500, { details });
    this.name = 'TransactionError';
  }
}

export class SessionClosedError extends DatabaseError {
  constructor(reason: string = 'Session is closed') {
    super('SESSION_CLOSED', reason, 500);
    this.name = 'SessionClosedError';
  }
}

/**
 * Commit failed and the transaction was rolled back. `cause` is the backend
 * failure; `rollbackError` is set when the follow-up rollback failed too.
 */
export class CommitError extends DatabaseError {
  public rollbackError?: unknown;

  constructor(cause: unknown, rollbackError?: unknown) {
    super('COMMIT_FAILED', `Commit failed: ${describeError(cause)}`, 500, { cause });
    this.name = 'CommitError';
    this.rollbackError = rollbackError;
  }
}

export class RollbackError extends DatabaseError {
  constructor(cause: unknown) {
    super('ROLLBACK_FAILED', `Rollback failed: ${describeError(cause)}`, 500, { cause });
    this.name = 'RollbackError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Attach a secondary failure to the primary one without replacing it.
 */
export function attachRollbackError(primary: unknown, rollbackError: unknown): void {
  if (primary instanceof CommitError) {
    primary.rollbackError = rollbackError;
    return;
  }
  if (typeof primary === 'object' && primary !== null) {
    Object.defineProperty(primary, 'rollbackError', {
      value: rollbackError,
      enumerable: false,
      configurable: true,
      writable: true,
    });
  }
}
