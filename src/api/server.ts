/**
 * txscope API Server
 * Fastify server exposing database health and request-scoped sessions
 */

import Fastify, { type FastifyInstance } from 'fastify';

import { loadDatabaseSettings, loadServerConfig } from '../lib/config.js';
import { DatabaseError } from '../lib/errors.js';
import { loggerOptions } from '../lib/logger.js';
import { disposeEngine, getSessionmaker } from '../db/engine.js';
import { checkDatabaseHealth } from '../db/health.js';
import type { SessionFactory } from '../db/session.js';
import { registerDbSession } from './middleware/index.js';

export interface ServerOptions {
  sessionFactory: SessionFactory;
}

export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const { sessionFactory } = options;
  const server = Fastify({ logger: loggerOptions() });

  registerDbSession(server, sessionFactory);

  // ============================================================================
  // Error Handler
  // ============================================================================

  server.setErrorHandler((error, request, reply) => {
    if (error instanceof DatabaseError) {
      request.log.warn({ err: error }, 'Database error');
      return reply.status(error.statusCode).send(error.toJSON());
    }

    request.log.error({ err: error }, 'Unexpected error');
    return reply.status(500).send({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
  });

  // ============================================================================
  // Health Check
  // ============================================================================

  server.get('/health', async () => {
    return {
      status: 'ok',
      service: 'txscope',
      timestamp: new Date().toISOString(),
    };
  });

  server.get('/health/ready', async (request, reply) => {
    const database = await checkDatabaseHealth(sessionFactory);

    return reply.status(database.healthy ? 200 : 503).send({
      status: database.healthy ? 'ready' : 'degraded',
      checks: { database },
      timestamp: new Date().toISOString(),
    });
  });

  return server;
}

export async function startServer(): Promise<void> {
  const { port, host } = loadServerConfig();
  const sessionFactory = await getSessionmaker(loadDatabaseSettings());
  const server = await createServer({ sessionFactory });

  server.addHook('onClose', async () => {
    await disposeEngine();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      server.close().then(
        () => process.exit(0),
        (err: unknown) => {
          server.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        }
      );
    });
  }

  try {
    await server.listen({ port, host });
    server.log.info(`txscope server listening on ${host}:${port}`);
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

// Run if executed directly
if (require.main === module) {
  startServer().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
