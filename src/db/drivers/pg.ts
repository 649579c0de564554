/**
 * PostgreSQL Driver
 * Adapter from pg.Client to the backend capability
 */

import pg from 'pg';
import type { ConnectionSettings } from '../../types.js';
import type { DatabaseDriver, DriverConnection, StatementResult } from '../driver.js';
import {
  ConnectivityError,
  QueryError,
  StatementTimeoutError,
  describeError,
} from '../../lib/errors.js';
import { redactDsn } from '../../lib/config.js';
import { logger } from '../../lib/logger.js';

const { Client } = pg;

// SQLSTATE classes that mean the connection itself is gone
const CONNECTION_EXCEPTION_CLASS = '08';
const QUERY_CANCELED = '57014';
const ADMIN_SHUTDOWN = '57P01';

function sqlStateOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

export function mapPgError(error: unknown): Error {
  const sqlState = sqlStateOf(error);

  if (sqlState === QUERY_CANCELED) {
    return new StatementTimeoutError({ cause: error });
  }
  if (
    sqlState === ADMIN_SHUTDOWN ||
    sqlState?.startsWith(CONNECTION_EXCEPTION_CLASS) ||
    sqlState === 'ECONNRESET' ||
    sqlState === 'ECONNREFUSED'
  ) {
    return new ConnectivityError(describeError(error), { cause: error });
  }
  return new QueryError(describeError(error), sqlState, { cause: error });
}

class PgConnection implements DriverConnection {
  constructor(private readonly client: pg.Client) {}

  async execute<T extends Record<string, unknown> = Record<string, unknown>>(
    statement: string,
    params?: readonly unknown[]
  ): Promise<StatementResult<T>> {
    try {
      const result = await this.client.query<T>(statement, params ? [...params] : undefined);
      return { rows: result.rows, rowCount: result.rowCount ?? result.rows.length };
    } catch (error) {
      throw mapPgError(error);
    }
  }

  async begin(): Promise<void> {
    await this.execute('BEGIN');
  }

  async commit(): Promise<void> {
    await this.execute('COMMIT');
  }

  async rollback(): Promise<void> {
    await this.execute('ROLLBACK');
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

export class PgDriver implements DatabaseDriver {
  readonly name = 'pg';

  async connect(settings: ConnectionSettings): Promise<DriverConnection> {
    const client = new Client({
      connectionString: settings.dsn,
      connectionTimeoutMillis: settings.connectTimeoutMs,
      statement_timeout: settings.statementTimeoutMs,
      application_name: settings.applicationName,
    });

    client.on('error', (err) => {
      logger.error({ err }, 'Unexpected error on idle pg client');
    });

    try {
      await client.connect();
    } catch (error) {
      await client.end().catch((err: unknown) => {
        logger.debug({ err }, 'Failed to end pg client after connect failure');
      });
      throw new ConnectivityError(`Could not connect to ${redactDsn(settings.dsn)}`, {
        cause: error,
      });
    }

    return new PgConnection(client);
  }
}
