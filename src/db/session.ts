/**
 * Sessions
 * One checked-out connection per logical task
 */

import type { Engine } from './engine.js';
import type { DriverConnection, StatementResult } from './driver.js';
import { ConnectivityError, SessionClosedError, TransactionError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

// ============================================================================
// Session
// ============================================================================

/**
 * A connection checked out of an engine's pool. Statements run in
 * autocommit mode until a transaction is begun (normally by a UnitOfWork).
 * Must not be shared between concurrent tasks.
 */
export class Session {
  private connection: DriverConnection | null;
  private transactionOpen = false;
  private broken = false;

  constructor(
    readonly engine: Engine,
    connection: DriverConnection
  ) {
    this.connection = connection;
  }

  get closed(): boolean {
    return this.connection === null;
  }

  get inTransaction(): boolean {
    return this.transactionOpen;
  }

  async execute<T extends Record<string, unknown> = Record<string, unknown>>(
    statement: string,
    params?: readonly unknown[]
  ): Promise<StatementResult<T>> {
    const connection = this.active();
    if (this.engine.settings.echo) {
      logger.debug({ statement, params }, 'Executing statement');
    }
    return this.track(connection.execute<T>(statement, params));
  }

  async begin(): Promise<void> {
    const connection = this.active();
    if (this.transactionOpen) {
      throw new TransactionError('A transaction is already open on this session');
    }
    await this.track(connection.begin());
    this.transactionOpen = true;
  }

  async commit(): Promise<void> {
    const connection = this.active();
    if (!this.transactionOpen) {
      throw new TransactionError('No transaction is open on this session');
    }
    // left open on failure so the caller can still roll back
    await this.track(connection.commit());
    this.transactionOpen = false;
  }

  async rollback(): Promise<void> {
    const connection = this.active();
    if (!this.transactionOpen) {
      throw new TransactionError('No transaction is open on this session');
    }
    try {
      await this.track(connection.rollback());
    } finally {
      this.transactionOpen = false;
    }
  }

  /**
   * Return the connection to the pool. Only the first call has an effect.
   * A connection left mid-transaction is rolled back first; one that saw a
   * connectivity failure is discarded instead of reused.
   */
  async close(): Promise<void> {
    const connection = this.connection;
    if (!connection) return;
    this.connection = null;

    if (this.transactionOpen && !this.broken) {
      this.transactionOpen = false;
      try {
        await connection.rollback();
      } catch (error) {
        logger.warn({ err: error }, 'Rollback on session close failed');
        this.broken = true;
      }
    }

    await this.engine.pool.release(connection, { discard: this.broken });
  }

  private active(): DriverConnection {
    if (!this.connection) {
      throw new SessionClosedError();
    }
    if (this.engine.disposed) {
      throw new SessionClosedError('Engine has been disposed');
    }
    return this.connection;
  }

  private async track<T>(operation: Promise<T>): Promise<T> {
    try {
      return await operation;
    } catch (error) {
      if (error instanceof ConnectivityError) this.broken = true;
      throw error;
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export class SessionFactory {
  constructor(readonly engine: Engine) {}

  /**
   * Check out a new session.
   *
   * @throws PoolExhaustedError when no connection frees up within the timeout
   * @throws ConnectivityError when the backend cannot be reached
   */
  async newSession(timeoutMs?: number): Promise<Session> {
    const connection = await this.engine.pool.acquire(timeoutMs);
    return new Session(this.engine, connection);
  }
}

/**
 * Run `fn` with a fresh session and release it on every exit path.
 */
export async function withSession<T>(
  factory: SessionFactory,
  fn: (session: Session) => Promise<T>
): Promise<T> {
  const session = await factory.newSession();
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
