/**
 * Unit of Work
 * A single transaction boundary around one session
 */

import type { UnitOfWorkState } from '../types.js';
import type { StatementResult } from './driver.js';
import { Session, type SessionFactory } from './session.js';
import {
  CommitError,
  RollbackError,
  SessionClosedError,
  TransactionError,
  attachRollbackError,
} from '../lib/errors.js';
import { logger } from '../lib/logger.js';

/**
 * Where a UnitOfWork gets its session: a factory (the unit owns the session
 * and releases it on close) or an existing session (borrowed, left open).
 */
export type SessionSource = SessionFactory | Session;

export class UnitOfWork {
  private currentState: UnitOfWorkState = 'idle';
  private heldSession: Session | null = null;
  private readonly log = logger.child({ component: 'unit-of-work' });

  constructor(private readonly source: SessionSource) {}

  /**
   * Begin a transaction, commit if `work` resolves, roll back and rethrow if
   * it throws. The session is released on every path.
   *
   * If the rollback itself fails, the caller still sees the original error,
   * with the rollback failure on its `rollbackError` property.
   */
  static async run<T>(source: SessionSource, work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    const uow = new UnitOfWork(source);
    await uow.begin();

    try {
      let result: T;
      try {
        result = await work(uow);
      } catch (error) {
        if (uow.state === 'open') {
          try {
            await uow.rollback();
          } catch (rollbackError) {
            attachRollbackError(error, rollbackError);
          }
        }
        throw error;
      }

      // work may have rolled back on purpose
      if (uow.state === 'open') {
        await uow.commit();
      }
      return result;
    } finally {
      await uow.close();
    }
  }

  get state(): UnitOfWorkState {
    return this.currentState;
  }

  get ownsSession(): boolean {
    return !(this.source instanceof Session);
  }

  /**
   * The session the transaction runs on. Only available while open.
   */
  get session(): Session {
    return this.requireOpen();
  }

  async begin(): Promise<void> {
    if (this.currentState !== 'idle') {
      throw new TransactionError(`Cannot begin a unit of work in state "${this.currentState}"`, {
        state: this.currentState,
      });
    }

    const session = this.source instanceof Session ? this.source : await this.source.newSession();

    if (session.inTransaction) {
      throw new TransactionError('Session already has an open transaction; units of work do not nest');
    }

    try {
      await session.begin();
    } catch (error) {
      this.currentState = 'closed';
      if (this.ownsSession) await session.close();
      throw error;
    }

    this.heldSession = session;
    this.currentState = 'open';
  }

  execute<T extends Record<string, unknown> = Record<string, unknown>>(
    statement: string,
    params?: readonly unknown[]
  ): Promise<StatementResult<T>> {
    return this.requireOpen().execute<T>(statement, params);
  }

  /**
   * Commit the transaction. When the backend refuses the commit, the
   * transaction is rolled back and a CommitError wrapping the refusal is
   * thrown; nothing of the transaction should be assumed to persist.
   */
  async commit(): Promise<void> {
    const session = this.requireOpen();

    try {
      await session.commit();
      this.currentState = 'committed';
    } catch (error) {
      let rollbackError: unknown;
      try {
        await session.rollback();
      } catch (secondary) {
        rollbackError = secondary;
        this.log.warn({ err: secondary }, 'Rollback after failed commit also failed');
      }
      this.currentState = 'rolled_back';
      throw new CommitError(error, rollbackError);
    }
  }

  async rollback(): Promise<void> {
    const session = this.requireOpen();

    try {
      await session.rollback();
    } catch (error) {
      this.log.warn({ err: error }, 'Rollback failed');
      throw new RollbackError(error);
    } finally {
      this.currentState = 'rolled_back';
    }
  }

  /**
   * Release the session. An open transaction is rolled back first. Only the
   * first call has an effect.
   */
  async close(): Promise<void> {
    if (this.currentState === 'closed') return;

    if (this.currentState === 'open') {
      try {
        await this.rollback();
      } catch (error) {
        // already logged by rollback(); the session is still released below
        this.log.debug({ err: error }, 'Closing after failed rollback');
      }
    }

    const session = this.heldSession;
    this.heldSession = null;
    this.currentState = 'closed';

    if (session && this.ownsSession) {
      await session.close();
    }
  }

  private requireOpen(): Session {
    if (this.currentState === 'closed') {
      throw new SessionClosedError('Unit of work is closed');
    }
    if (this.currentState !== 'open' || !this.heldSession) {
      throw new TransactionError(`Unit of work is not open (state "${this.currentState}")`, {
        state: this.currentState,
      });
    }
    return this.heldSession;
  }
}
