/**
 * Session Tests
 */

import { EngineRegistry } from '../../src/db/engine.js';
import { withSession, type SessionFactory } from '../../src/db/session.js';
import {
  ConnectivityError,
  PoolExhaustedError,
  SessionClosedError,
  TransactionError,
} from '../../src/lib/errors.js';
import { MemoryDriver } from '../support/memoryDriver.js';
import { testUtils } from '../setup.js';

describe('SessionFactory', () => {
  let driver: MemoryDriver;
  let registry: EngineRegistry;
  let factory: SessionFactory;

  beforeEach(async () => {
    driver = new MemoryDriver();
    registry = new EngineRegistry({ driver });
    factory = await registry.getSessionmaker(testUtils.settings({ poolMaxSize: 2, acquireTimeoutMs: 50 }));
  });

  afterEach(async () => {
    await registry.disposeEngine();
  });

  it('should check out a session without starting a transaction', async () => {
    const session = await factory.newSession();

    expect(session.inTransaction).toBe(false);
    expect(driver.calls.begin).toBe(0);
    await session.close();
  });

  it('should autocommit statements outside a transaction', async () => {
    const session = await factory.newSession();
    await session.execute('INSERT INTO users', [1, 'ada']);
    await session.close();

    expect(driver.rows('users')).toEqual([{ id: 1, value: 'ada' }]);
  });

  it('should never hand the same connection to two open sessions', async () => {
    const a = await factory.newSession();
    const b = await factory.newSession();

    await expect(factory.newSession()).rejects.toBeInstanceOf(PoolExhaustedError);
    expect(driver.connections).toHaveLength(2);

    await a.close();
    await b.close();
  });

  it('should honor a per-call timeout', async () => {
    const held = [await factory.newSession(), await factory.newSession()];

    await expect(factory.newSession(10)).rejects.toThrow('No connection available within 10ms (pool max 2)');

    await Promise.all(held.map((session) => session.close()));
  });

  it('should surface connect failures as ConnectivityError', async () => {
    driver.failures.connect = new Error('connection refused');
    await expect(factory.newSession()).rejects.toBeInstanceOf(ConnectivityError);
  });

  it('should release exactly once', async () => {
    const session = await factory.newSession();

    await session.close();
    await session.close();

    expect(session.closed).toBe(true);
    expect(factory.engine.stats()).toEqual({ total: 1, idle: 1, checkedOut: 0, waiting: 0, max: 2 });
  });

  it('should refuse statements after close', async () => {
    const session = await factory.newSession();
    await session.close();

    await expect(session.execute('SELECT 1')).rejects.toBeInstanceOf(SessionClosedError);
  });

  it('should refuse a second begin', async () => {
    const session = await factory.newSession();
    await session.begin();

    await expect(session.begin()).rejects.toBeInstanceOf(TransactionError);
    await session.close();
  });

  it('should roll back a transaction left open at close', async () => {
    const session = await factory.newSession();
    await session.begin();
    await session.execute('INSERT INTO users', [1, 'ada']);
    await session.close();

    expect(driver.calls.rollback).toBe(1);
    expect(driver.rows('users')).toEqual([]);
  });

  it('should discard a connection that reported a connectivity failure', async () => {
    const session = await factory.newSession();
    await driver.connections[0]?.close();

    await expect(session.execute('SELECT 1')).rejects.toBeInstanceOf(ConnectivityError);
    await session.close();

    expect(factory.engine.stats().total).toBe(0);
  });
});

describe('withSession', () => {
  let driver: MemoryDriver;
  let registry: EngineRegistry;

  beforeEach(() => {
    driver = new MemoryDriver();
    registry = new EngineRegistry({ driver });
  });

  afterEach(async () => {
    await registry.disposeEngine();
  });

  it('should return the callback result and release the session', async () => {
    const factory = await registry.getSessionmaker(testUtils.settings());

    const result = await withSession(factory, async (session) => {
      const { rowCount } = await session.execute('SELECT 1');
      return rowCount;
    });

    expect(result).toBe(1);
    expect(factory.engine.stats().checkedOut).toBe(0);
  });

  it('should release the session when the callback throws', async () => {
    const factory = await registry.getSessionmaker(testUtils.settings());

    await expect(
      withSession(factory, async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(factory.engine.stats().checkedOut).toBe(0);
  });
});
