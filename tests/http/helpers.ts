import Fastify from 'fastify';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { Redis } from 'ioredis';
import { vi } from 'vitest';
import errorHandlerPlugin from '../../src/interfaces/http/error-handler.js';
import type { Database } from '../../src/infrastructure/db/index.js';

/** In-process stand-in for the ioredis commands the routes use. */
export function fakeRedis() {
  return {
    xadd: vi.fn().mockResolvedValue('1-0'),
    publish: vi.fn().mockResolvedValue(1),
    ping: vi.fn().mockResolvedValue('PONG'),
    get: vi.fn().mockResolvedValue(null),
  };
}

export type FakeRedis = ReturnType<typeof fakeRedis>;

/**
 * Builds a Fastify app with the shared error handler and fake `db` and
 * `redis` plugins registered under the names the routes depend on.
 */
export async function buildTestApp(
  routes: FastifyPluginAsync,
  redis: FakeRedis = fakeRedis(),
): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });

  await app.register(errorHandlerPlugin);
  await app.register(fp(async (instance: FastifyInstance) => {
    instance.decorate('db', {} as Database);
  }, { name: 'db' }));
  await app.register(fp(async (instance: FastifyInstance) => {
    instance.decorate('redis', redis as unknown as Redis);
  }, { name: 'redis' }));
  await app.register(routes);
  await app.ready();

  return app;
}
