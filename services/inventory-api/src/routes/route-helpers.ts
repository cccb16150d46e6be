import { FastifyReply, FastifyRequest } from 'fastify';
import type { StockEngine } from '@stockflow/shared/src/engine';
import { DomainError } from '@stockflow/shared/src/utils/errors';
import { logger } from '@stockflow/shared/src/utils/logger';

export interface EngineRouteOptions {
     engine: StockEngine;
}

export function actorOf(request: FastifyRequest): string {
     const header = request.headers['x-actor'];
     const actor = Array.isArray(header) ? header[0] : header;
     return actor && actor.trim() !== '' ? actor.trim() : 'api';
}

export function sendError(reply: FastifyReply, error: unknown, context: string): FastifyReply {
     if (error instanceof DomainError) {
          return reply.code(error.statusCode).send({
               error: error.code,
               message: error.message,
          });
     }

     logger.error({ err: error }, context);
     return reply.code(500).send({
          error: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
     });
}
