/**
 * txscope Core Types
 * Connection settings, pool statistics and health reporting
 */

// ============================================================================
// Settings
// ============================================================================

/**
 * Immutable connection parameters for one engine. Produced by
 * `createConnectionSettings` or `loadDatabaseSettings`.
 */
export interface ConnectionSettings {
  readonly dsn: string;
  readonly poolMinSize: number;
  readonly poolMaxSize: number;
  /** Upper bound for opening a single backend connection */
  readonly connectTimeoutMs: number;
  /** Upper bound for waiting on a pool checkout */
  readonly acquireTimeoutMs: number;
  readonly statementTimeoutMs?: number;
  /** Idle connections above poolMinSize are closed after this long */
  readonly idleTimeoutMs: number;
  readonly applicationName?: string;
  /** Log every statement at debug level */
  readonly echo: boolean;
}

export type ConnectionSettingsInput = Pick<ConnectionSettings, 'dsn'> &
  Partial<Omit<ConnectionSettings, 'dsn'>>;

// ============================================================================
// Pool
// ============================================================================

export interface PoolStats {
  total: number;
  idle: number;
  checkedOut: number;
  waiting: number;
  max: number;
}

// ============================================================================
// Unit of Work
// ============================================================================

export type UnitOfWorkState = 'idle' | 'open' | 'committed' | 'rolled_back' | 'closed';

// ============================================================================
// Health
// ============================================================================

export interface HealthStatus {
  healthy: boolean;
  latencyMs?: number;
  error?: string;
  errorCode?: string;
  pool?: PoolStats;
  checkedAt: Date;
}
