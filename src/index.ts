/**
 * txscope - Database Connectivity Layer
 *
 * Pooled engines per configuration, request-scoped sessions, unit-of-work
 * transaction boundaries and a health probe over a pluggable backend.
 *
 * @packageDocumentation
 */

// Types
export * from './types.js';

// Errors
export * from './lib/errors.js';

// Config
export {
  createConnectionSettings,
  loadDatabaseSettings,
  loadServerConfig,
  settingsIdentity,
  redactDsn,
  DEFAULT_SETTINGS,
  type ServerConfig,
} from './lib/config.js';

// Database
export * from './db/index.js';

// HTTP
export { createServer, startServer, type ServerOptions } from './api/server.js';
export { registerDbSession } from './api/middleware/index.js';
