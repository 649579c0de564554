/**
 * Database Layer
 */

// Engine
export {
  Engine,
  EngineRegistry,
  getEngine,
  getSessionmaker,
  disposeEngine,
  getDefaultRegistry,
  setDefaultRegistry,
  type EngineRegistryOptions,
} from './engine.js';

// Sessions
export { Session, SessionFactory, withSession } from './session.js';
export { UnitOfWork, type SessionSource } from './unitOfWork.js';

// Health
export { checkDatabaseHealth, type HealthCheckOptions } from './health.js';

// Backend
export { ConnectionPool, type ReleaseOptions } from './pool.js';
export type { DatabaseDriver, DriverConnection, StatementResult } from './driver.js';
export { PgDriver, mapPgError } from './drivers/pg.js';
