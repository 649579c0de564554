/**
 * Engine Registry
 * Lazily built, per-configuration connection engines
 */

import type { ConnectionSettings, PoolStats } from '../types.js';
import type { DatabaseDriver } from './driver.js';
import { ConnectionPool } from './pool.js';
import { SessionFactory } from './session.js';
import { PgDriver } from './drivers/pg.js';
import { createConnectionSettings, redactDsn, settingsIdentity } from '../lib/config.js';
import { logger } from '../lib/logger.js';

// ============================================================================
// Engine
// ============================================================================

/**
 * Owns one connection pool for one configuration. Building an engine does
 * not connect; the first session does.
 */
export class Engine {
  readonly identity: string;
  readonly pool: ConnectionPool;
  private disposing: Promise<void> | null = null;

  constructor(
    readonly settings: ConnectionSettings,
    readonly driver: DatabaseDriver
  ) {
    this.identity = settingsIdentity(settings);
    this.pool = new ConnectionPool(driver, settings);
  }

  get disposed(): boolean {
    return this.disposing !== null;
  }

  stats(): PoolStats {
    return this.pool.stats();
  }

  /**
   * Close the pool. Safe to call more than once.
   */
  dispose(): Promise<void> {
    if (!this.disposing) {
      this.disposing = this.pool.end();
    }
    return this.disposing;
  }
}

// ============================================================================
// Registry
// ============================================================================

export interface EngineRegistryOptions {
  /** Backend used for engines built by this registry (default: PgDriver) */
  driver?: DatabaseDriver;
}

export class EngineRegistry {
  private readonly engines = new Map<string, Engine>();
  private readonly driver: DatabaseDriver;
  private lock: Promise<void> = Promise.resolve();
  private readonly log = logger.child({ component: 'engine' });

  constructor(options: EngineRegistryOptions = {}) {
    this.driver = options.driver ?? new PgDriver();
  }

  get size(): number {
    return this.engines.size;
  }

  /**
   * Return the live engine for these settings, building it on first demand.
   *
   * @throws ConfigurationError when the settings do not validate
   */
  async getEngine(settings: ConnectionSettings): Promise<Engine> {
    return this.serialize(() => this.lookupOrCreate(settings));
  }

  async getSessionmaker(settings: ConnectionSettings): Promise<SessionFactory> {
    return new SessionFactory(await this.getEngine(settings));
  }

  /**
   * Dispose the engine for `settings`, or every engine when omitted.
   * No-op when nothing matches. Sessions still checked out fail on their
   * next statement.
   */
  async disposeEngine(settings?: ConnectionSettings): Promise<void> {
    await this.serialize(async () => {
      const targets: Engine[] = [];
      if (settings) {
        const engine = this.engines.get(settingsIdentity(settings));
        if (engine) targets.push(engine);
      } else {
        targets.push(...this.engines.values());
      }

      for (const engine of targets) {
        this.engines.delete(engine.identity);
      }
      await Promise.all(targets.map((engine) => engine.dispose()));

      if (targets.length > 0) {
        this.log.info({ disposed: targets.length }, 'Engine disposed');
      }
    });
  }

  private lookupOrCreate(settings: ConnectionSettings): Engine {
    const validated = createConnectionSettings(settings);
    const identity = settingsIdentity(validated);
    const existing = this.engines.get(identity);
    if (existing) return existing;

    const engine = new Engine(validated, this.driver);
    this.engines.set(identity, engine);
    this.log.info(
      { dsn: redactDsn(settings.dsn), driver: this.driver.name, poolMaxSize: settings.poolMaxSize },
      'Engine created'
    );
    return engine;
  }

  /** Run registry read-modify-write steps one at a time. */
  private serialize<T>(step: () => T | Promise<T>): Promise<T> {
    const run = this.lock.then(step);
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

// ============================================================================
// Default Registry
// ============================================================================

let defaultRegistry: EngineRegistry | null = null;

export function getDefaultRegistry(): EngineRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new EngineRegistry();
  }
  return defaultRegistry;
}

/**
 * Replace the process-wide registry, e.g. to plug in another driver.
 * The previous registry is not disposed.
 */
export function setDefaultRegistry(registry: EngineRegistry): void {
  defaultRegistry = registry;
}

export function getEngine(settings: ConnectionSettings): Promise<Engine> {
  return getDefaultRegistry().getEngine(settings);
}

export function getSessionmaker(settings: ConnectionSettings): Promise<SessionFactory> {
  return getDefaultRegistry().getSessionmaker(settings);
}

export function disposeEngine(settings?: ConnectionSettings): Promise<void> {
  return getDefaultRegistry().disposeEngine(settings);
}
