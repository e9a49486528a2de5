import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { AppConfig } from './config/env.js';
import { redisPlugin, dbPlugin } from './infrastructure/index.js';
import {
  errorHandlerPlugin,
  eventRoutes,
  queryRoutes,
  definitionRoutes,
  activationRoutes,
  auditRoutes,
} from './interfaces/http/index.js';

/**
 * Builds the Fastify server without listening.
 *
 * Order:
 * 1) Error handler
 * 2) Infrastructure plugins
 * 3) HTTP routes
 */
export async function buildServer(config: AppConfig): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
  });

  await fastify.register(errorHandlerPlugin);

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin, { redisUrl: config.REDIS_URL });
  await fastify.register(dbPlugin, { databaseUrl: config.DATABASE_URL });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(eventRoutes);
  await fastify.register(queryRoutes);
  await fastify.register(definitionRoutes);
  await fastify.register(activationRoutes);
  await fastify.register(auditRoutes);

  return fastify;
}
