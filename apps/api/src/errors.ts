import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { isTodoError, type TodoErrorKind } from '@todo/database';

type ErrorKind = TodoErrorKind | 'internal';

/**
 * Error body returned by every failing route
 */
export interface ErrorBody {
  error: string;
  kind: ErrorKind;
  message: string;
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  validation: 400,
  not_found: 404,
  storage: 500,
  internal: 500,
};

const TITLE_BY_KIND: Record<ErrorKind, string> = {
  validation: 'Validation error',
  not_found: 'Not found',
  storage: 'Storage error',
  internal: 'Internal server error',
};

function errorBody(kind: ErrorKind, message: string): ErrorBody {
  return { error: TITLE_BY_KIND[kind], kind, message };
}

/**
 * Single error handler for the API
 *
 * - Schema failures and malformed bodies: 400
 * - Store errors: status by kind (storage failures are logged)
 * - Anything else: 500, logged, message hidden
 */
export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): FastifyReply {
  if (error.validation) {
    return reply.status(400).send(errorBody('validation', error.message));
  }

  if (isTodoError(error)) {
    if (error.kind === 'storage') {
      request.log.error({ err: error }, 'Todo store failure');
    }
    return reply.status(STATUS_BY_KIND[error.kind]).send(errorBody(error.kind, error.message));
  }

  // Fastify's own client errors (bad JSON, unsupported media type, ...)
  if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
    return reply.status(error.statusCode).send(errorBody('validation', error.message));
  }

  request.log.error({ err: error }, 'Unhandled error');
  return reply.status(500).send(errorBody('internal', 'An unexpected error occurred'));
}
