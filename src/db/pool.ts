/**
 * Connection Pool
 * Bounded FIFO pool of driver connections
 */

import type { ConnectionSettings, PoolStats } from '../types.js';
import type { DatabaseDriver, DriverConnection } from './driver.js';
import { ConnectivityError, PoolExhaustedError, describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

// ============================================================================
// Types
// ============================================================================

interface Waiter {
  resolve: (connection: DriverConnection) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

interface IdleEntry {
  connection: DriverConnection;
  timer?: NodeJS.Timeout;
}

export interface ReleaseOptions {
  /** Close the connection instead of returning it, e.g. after a connection failure */
  discard?: boolean;
}

// ============================================================================
// Pool
// ============================================================================

export class ConnectionPool {
  private readonly idle: IdleEntry[] = [];
  private readonly checkedOut = new Set<DriverConnection>();
  private readonly waiters: Waiter[] = [];
  /** Slots reserved by connects still in progress */
  private connecting = 0;
  /** Slots held by discarded connections until their close finishes */
  private closing = 0;
  private closed = false;
  private readonly log = logger.child({ component: 'pool' });

  constructor(
    private readonly driver: DatabaseDriver,
    private readonly settings: ConnectionSettings
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  stats(): PoolStats {
    return {
      total: this.idle.length + this.checkedOut.size + this.connecting + this.closing,
      idle: this.idle.length,
      checkedOut: this.checkedOut.size,
      waiting: this.waiters.length,
      max: this.settings.poolMaxSize,
    };
  }

  /**
   * Check out a connection. Waits up to `timeoutMs` when every slot is taken;
   * callers already waiting are served first.
   *
   * @throws PoolExhaustedError when the deadline passes first
   * @throws ConnectivityError when the pool is closed or the backend refuses the connection
   */
  async acquire(timeoutMs: number = this.settings.acquireTimeoutMs): Promise<DriverConnection> {
    if (this.closed) {
      throw new ConnectivityError('Connection pool is closed');
    }

    if (this.waiters.length === 0) {
      const entry = this.idle.pop();
      if (entry) {
        if (entry.timer) clearTimeout(entry.timer);
        this.checkedOut.add(entry.connection);
        this.log.debug(this.stats(), 'Reused idle connection');
        return entry.connection;
      }

      if (this.hasCapacity()) {
        const connection = await this.openForCheckout();
        this.log.debug(this.stats(), 'Opened new connection');
        return connection;
      }
    }

    return new Promise<DriverConnection>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          this.log.warn(this.stats(), 'Pool checkout timed out');
          reject(new PoolExhaustedError(timeoutMs, this.settings.poolMaxSize));
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Return a checked-out connection. Releasing the same connection twice is a no-op.
   */
  async release(connection: DriverConnection, options: ReleaseOptions = {}): Promise<void> {
    if (!this.checkedOut.delete(connection)) return;

    if (this.closed || options.discard) {
      // the slot stays taken until the backend has let go of the connection
      this.closing++;
      try {
        await this.destroy(connection);
      } finally {
        this.closing--;
      }
      this.dispatch();
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      this.checkedOut.add(connection);
      waiter.resolve(connection);
      return;
    }

    this.park(connection);
  }

  /**
   * Close idle connections and reject waiters. Connections still checked out
   * are closed when they come back.
   */
  async end(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new ConnectivityError('Connection pool closed while waiting'));
    }

    const idle = this.idle.splice(0);
    await Promise.all(
      idle.map((entry) => {
        if (entry.timer) clearTimeout(entry.timer);
        return this.destroy(entry.connection);
      })
    );
    this.log.debug({ closedIdle: idle.length, inFlight: this.checkedOut.size }, 'Pool ended');
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private hasCapacity(): boolean {
    return this.stats().total < this.settings.poolMaxSize;
  }

  /**
   * Open a connection in a reserved slot and mark it checked out. A failed
   * connect gives the slot to the next waiter before rethrowing.
   */
  private async openForCheckout(): Promise<DriverConnection> {
    this.connecting++;
    let connection: DriverConnection;
    try {
      connection = await this.driver.connect(this.settings);
    } catch (error) {
      this.connecting--;
      this.dispatch();
      if (error instanceof ConnectivityError) throw error;
      throw new ConnectivityError(`Connect failed: ${describeError(error)}`, { cause: error });
    }
    this.connecting--;

    if (this.closed) {
      await this.destroy(connection);
      throw new ConnectivityError('Connection pool closed while connecting');
    }

    this.checkedOut.add(connection);
    return connection;
  }

  /**
   * Hand idle connections or free slots to waiters, oldest first.
   */
  private dispatch(): void {
    while (!this.closed) {
      const waiter = this.waiters[0];
      if (!waiter) return;

      const entry = this.idle.pop();
      if (!entry && !this.hasCapacity()) return;

      this.waiters.shift();
      clearTimeout(waiter.timer);

      if (entry) {
        if (entry.timer) clearTimeout(entry.timer);
        this.checkedOut.add(entry.connection);
        waiter.resolve(entry.connection);
        continue;
      }

      this.openForCheckout().then(
        (connection) => waiter.resolve(connection),
        (error: Error) => waiter.reject(error)
      );
    }
  }

  /**
   * Keep a released connection idle. When its idle timer fires it is closed
   * if the pool holds more than poolMinSize connections.
   */
  private park(connection: DriverConnection): void {
    const entry: IdleEntry = { connection };

    entry.timer = setTimeout(() => {
      const index = this.idle.indexOf(entry);
      if (index === -1) return;
      if (this.stats().total <= this.settings.poolMinSize) return;
      this.idle.splice(index, 1);
      void this.destroy(connection);
    }, this.settings.idleTimeoutMs);
    entry.timer.unref();

    this.idle.push(entry);
  }

  private async destroy(connection: DriverConnection): Promise<void> {
    try {
      await connection.close();
    } catch (error) {
      this.log.warn({ err: error }, 'Failed to close connection');
    }
  }
}
