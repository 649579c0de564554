/**
 * Database Health
 * Round-trip probe that reports failures instead of throwing them
 */

import type { HealthStatus } from '../types.js';
import type { SessionFactory } from './session.js';
import { DatabaseError, describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

export interface HealthCheckOptions {
  /** Statement used for the round trip */
  statement?: string;
  /** Checkout deadline; defaults to the engine's acquireTimeoutMs */
  timeoutMs?: number;
}

/**
 * Check out a session outside any unit of work, run a trivial statement and
 * report latency. Never rejects.
 */
export async function checkDatabaseHealth(
  factory: SessionFactory,
  options: HealthCheckOptions = {}
): Promise<HealthStatus> {
  const start = Date.now();

  try {
    const session = await factory.newSession(options.timeoutMs);
    try {
      await session.execute(options.statement ?? 'SELECT 1');
    } finally {
      await session.close();
    }

    return {
      healthy: true,
      latencyMs: Date.now() - start,
      pool: factory.engine.stats(),
      checkedAt: new Date(),
    };
  } catch (error) {
    logger.warn({ err: error }, 'Database health check failed');

    return {
      healthy: false,
      error: describeError(error),
      errorCode: error instanceof DatabaseError ? error.code : undefined,
      pool: factory.engine.stats(),
      checkedAt: new Date(),
    };
  }
}

