/**
 * Backend Capability
 * The only surface the engine, pool and unit of work depend on
 */

import type { ConnectionSettings } from '../types.js';

export interface StatementResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number;
}

/**
 * One physical connection. Implementations map backend failures to the
 * typed errors in lib/errors (ConnectivityError, StatementTimeoutError,
 * QueryError) and keep the original error as `cause`.
 */
export interface DriverConnection {
  execute<T extends Record<string, unknown> = Record<string, unknown>>(
    statement: string,
    params?: readonly unknown[]
  ): Promise<StatementResult<T>>;
  begin(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}

export interface DatabaseDriver {
  readonly name: string;
  connect(settings: ConnectionSettings): Promise<DriverConnection>;
}
