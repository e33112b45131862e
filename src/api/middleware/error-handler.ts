import type { FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import {
  AuthenticationError,
  SelectorValidationError,
  TableStoreError,
  UnknownFieldError,
  UnknownTableError,
} from '../../errors.js';

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, request, reply) => {
    // Ensure we always deal with an Error object
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    if (error instanceof AuthenticationError) {
      return reply.status(401).send({ error: error.name, message: error.message });
    }

    if (error instanceof UnknownTableError) {
      return reply.status(404).send({ error: error.name, message: error.message, table: error.table });
    }

    // The whole request is rejected; no partial filtering is attempted
    if (error instanceof UnknownFieldError) {
      return reply.status(400).send({ error: error.name, message: error.message, fields: error.fields });
    }

    if (error instanceof SelectorValidationError) {
      return reply.status(400).send({ error: error.name, message: error.message, path: error.path });
    }

    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'ValidationError',
        message: 'Request validation failed',
        issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
    }

    if (error instanceof TableStoreError) {
      request.log.error(error);
      return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
    }

    // Fastify built-in errors have a numeric `statusCode` — pass it through
    const isFastifyError = 'statusCode' in error &&
      typeof (error as Error & { statusCode?: unknown }).statusCode === 'number';
    if (isFastifyError) {
      const statusCode = (error as Error & { statusCode: number }).statusCode;
      return reply.status(statusCode).send({ error: error.name, message: error.message });
    }

    request.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
