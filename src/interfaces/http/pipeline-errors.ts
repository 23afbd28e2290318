import type { FastifyReply } from 'fastify';
import { ConfigurationError, ParseError } from '../../domain/index.js';

/**
 * Maps user-correctable pipeline errors to 422.
 *
 * Anything else (including invariant violations) is rethrown and surfaces
 * through Fastify's default 500 handler.
 */
export function sendPipelineError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof ConfigurationError || err instanceof ParseError) {
    return reply.status(422).send({
      error: err.message,
      code: err.code,
      ...err.details(),
    });
  }
  throw err;
}
