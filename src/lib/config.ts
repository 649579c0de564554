/**
 * txscope Configuration
 * Connection settings validation and environment-based loading
 */

import type { ConnectionSettings, ConnectionSettingsInput } from '../types.js';
import { ConfigurationError } from './errors.js';

type Env = Record<string, string | undefined>;

export const DEFAULT_SETTINGS = {
  poolMinSize: 0,
  poolMaxSize: 10,
  connectTimeoutMs: 5000,
  acquireTimeoutMs: 5000,
  idleTimeoutMs: 30000,
  echo: false,
} as const;

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${name}`, {
      variable: name,
    });
  }
  return value;
}

function optionalIntEnv(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ConfigurationError(`Environment variable ${name} must be an integer`, {
      variable: name,
      value: raw,
    });
  }
  return parseInt(raw, 10);
}

function assertInteger(field: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${field} must be an integer >= ${min}`, { field, value });
  }
}

function assertPositive(field: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${field} must be a positive number of milliseconds`, {
      field,
      value,
    });
  }
}

function assertDsn(dsn: string): void {
  if (!dsn || !dsn.trim()) {
    throw new ConfigurationError('dsn must not be empty');
  }
  let parsed: URL;
  try {
    parsed = new URL(dsn);
  } catch (error) {
    throw new ConfigurationError('dsn is not a valid connection URL', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  if (!parsed.protocol || parsed.protocol === ':') {
    throw new ConfigurationError('dsn must include a scheme');
  }
}

/**
 * Validate connection parameters and freeze them.
 *
 * @throws ConfigurationError when the dsn is unusable or pool sizing is inconsistent
 */
export function createConnectionSettings(input: ConnectionSettingsInput): ConnectionSettings {
  const settings: ConnectionSettings = {
    dsn: input.dsn,
    poolMinSize: input.poolMinSize ?? DEFAULT_SETTINGS.poolMinSize,
    poolMaxSize: input.poolMaxSize ?? DEFAULT_SETTINGS.poolMaxSize,
    connectTimeoutMs: input.connectTimeoutMs ?? DEFAULT_SETTINGS.connectTimeoutMs,
    acquireTimeoutMs: input.acquireTimeoutMs ?? DEFAULT_SETTINGS.acquireTimeoutMs,
    statementTimeoutMs: input.statementTimeoutMs,
    idleTimeoutMs: input.idleTimeoutMs ?? DEFAULT_SETTINGS.idleTimeoutMs,
    applicationName: input.applicationName,
    echo: input.echo ?? DEFAULT_SETTINGS.echo,
  };

  assertDsn(settings.dsn);
  assertInteger('poolMinSize', settings.poolMinSize, 0);
  assertInteger('poolMaxSize', settings.poolMaxSize, 1);
  if (settings.poolMinSize > settings.poolMaxSize) {
    throw new ConfigurationError('poolMinSize must not exceed poolMaxSize', {
      poolMinSize: settings.poolMinSize,
      poolMaxSize: settings.poolMaxSize,
    });
  }
  assertPositive('connectTimeoutMs', settings.connectTimeoutMs);
  assertPositive('acquireTimeoutMs', settings.acquireTimeoutMs);
  assertPositive('statementTimeoutMs', settings.statementTimeoutMs);
  assertPositive('idleTimeoutMs', settings.idleTimeoutMs);

  return Object.freeze(settings);
}

/**
 * Stable key for "same configuration": two settings objects with equal
 * fields map to the same engine.
 */
export function settingsIdentity(settings: ConnectionSettings): string {
  return JSON.stringify([
    settings.dsn,
    settings.poolMinSize,
    settings.poolMaxSize,
    settings.connectTimeoutMs,
    settings.acquireTimeoutMs,
    settings.statementTimeoutMs ?? null,
    settings.idleTimeoutMs,
    settings.applicationName ?? null,
    settings.echo,
  ]);
}

/**
 * Strip the password from a dsn for logging.
 */
export function redactDsn(dsn: string): string {
  try {
    const url = new URL(dsn);
    if (url.password) url.password = '***';
    return url.toString();
  } catch {
    return '<unparsable dsn>';
  }
}

export function loadDatabaseSettings(env: Env = process.env): ConnectionSettings {
  return createConnectionSettings({
    dsn: requireEnv(env, 'DATABASE_URL'),
    poolMinSize: optionalIntEnv(env, 'DB_POOL_MIN'),
    poolMaxSize: optionalIntEnv(env, 'DB_POOL_MAX'),
    connectTimeoutMs: optionalIntEnv(env, 'DB_CONNECT_TIMEOUT_MS'),
    acquireTimeoutMs: optionalIntEnv(env, 'DB_ACQUIRE_TIMEOUT_MS'),
    statementTimeoutMs: optionalIntEnv(env, 'DB_STATEMENT_TIMEOUT_MS'),
    idleTimeoutMs: optionalIntEnv(env, 'DB_IDLE_TIMEOUT_MS'),
    applicationName: env['DB_APPLICATION_NAME'] || undefined,
    echo: (env['DB_ECHO'] ?? 'false') === 'true',
  });
}

export interface ServerConfig {
  port: number;
  host: string;
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: optionalIntEnv(env, 'PORT') ?? 3000,
    host: env['HOST'] ?? '0.0.0.0',
  };
}
