import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ActivationError, ValidationError } from '../../domain/index.js';

/**
 * Maps errors thrown by route handlers to JSON replies.
 *
 * - ActivationError subclasses answer with their own status and code;
 *   ValidationError adds the offending `field`.
 * - Fastify's own client errors (malformed JSON, oversized body) keep
 *   their 4xx status.
 * - Anything else is logged and answered with 500.
 */
export function handleError(error: Error, request: FastifyRequest, reply: FastifyReply): FastifyReply {
  if (error instanceof ValidationError) {
    return reply.status(error.statusCode).send({ error: error.message, code: error.code, field: error.field });
  }
  if (error instanceof ActivationError) {
    return reply.status(error.statusCode).send({ error: error.message, code: error.code });
  }
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return reply.status(error.statusCode).send({ error: error.message });
  }

  request.log.error({ err: error }, 'Unhandled route error');
  return reply.status(500).send({ error: 'Internal server error' });
}

async function errorHandlerPlugin(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler(handleError);
}

export default fp(errorHandlerPlugin, {
  name: 'error-handler',
  fastify: '5.x',
});
