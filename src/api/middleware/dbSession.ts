/**
 * Request-scoped Sessions
 * One lazily acquired session per request, released before the response goes out
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

import type { Session, SessionFactory } from '../../db/session.js';

declare module 'fastify' {
  interface FastifyRequest {
    dbSession: Promise<Session> | null;
    /** Check out this request's session, or return the one already checked out */
    getDbSession(): Promise<Session>;
  }
}

async function releaseRequestSession(request: FastifyRequest): Promise<void> {
  const pending = request.dbSession;
  if (!pending) return;
  request.dbSession = null;

  try {
    const session = await pending;
    await session.close();
  } catch (err) {
    // checkout failed; the route already reported it
    request.log.debug({ err }, 'No session to release');
  }
}

/**
 * Install the session hooks directly on `server` (not encapsulated), so
 * every route registered afterwards can call `request.getDbSession()`.
 */
export function registerDbSession(server: FastifyInstance, factory: SessionFactory): void {
  server.decorateRequest('dbSession', null);
  server.decorateRequest('getDbSession', function (this: FastifyRequest): Promise<Session> {
    if (!this.dbSession) {
      this.dbSession = factory.newSession();
    }
    return this.dbSession;
  });

  // onSend covers normal and error replies; onResponse catches hijacked ones
  server.addHook('onSend', async (request, _reply, payload) => {
    await releaseRequestSession(request);
    return payload;
  });

  server.addHook('onResponse', async (request) => {
    await releaseRequestSession(request);
  });

  server.addHook('onRequestAbort', async (request) => {
    await releaseRequestSession(request);
  });
}
