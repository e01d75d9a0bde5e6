/**
 * Error handler
 *
 * Every failure leaves the server as `{"errors": [...]}`:
 * - RegistryError: status and default message from the error kind table
 * - ZodError: 400 with one message per issue
 * - Fastify's own client errors (body too large, bad content type): as raised
 * - anything else: 500 "Internal Error", logged with its stack
 */

import type { FastifyError, FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { ErrorCodes, ErrorKindTable, type ErrorEnvelope } from '@terrashelf/contracts';
import { RegistryError, logger } from '@terrashelf/core';

export interface ErrorResponse {
  status: number;
  body: ErrorEnvelope;
}

function issuePath(path: ReadonlyArray<string | number>): string {
  return path.length > 0 ? `${path.join('.')}: ` : '';
}

/**
 * Map a thrown value onto its status and wire body
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof RegistryError) {
    const entry = ErrorKindTable[error.kind];
    // Internal failures may carry a more specific 5xx (upstream IdP unreachable)
    const status =
      error.kind === ErrorCodes.INTERNAL_ERROR && error.statusCode >= 500 ? error.statusCode : entry.status;
    return {
      status,
      body: { errors: [entry.exposeMessage ? error.message : entry.message] },
    };
  }

  if (error instanceof ZodError) {
    const messages = error.issues.map(issue => `${issuePath(issue.path)}${issue.message}`);
    return {
      status: ErrorKindTable.INVALID_INPUT.status,
      body: { errors: messages.length > 0 ? messages : [ErrorKindTable.INVALID_INPUT.message] },
    };
  }

  if (isClientError(error)) {
    return { status: error.statusCode, body: { errors: [error.message] } };
  }

  return {
    status: ErrorKindTable.INTERNAL_ERROR.status,
    body: { errors: [ErrorKindTable.INTERNAL_ERROR.message] },
  };
}

function isClientError(error: unknown): error is { statusCode: number; message: string } {
  if (!(error instanceof Error) || !('statusCode' in error)) return false;
  const statusCode = error.statusCode;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500;
}

export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const response = toErrorResponse(error);
    if (response.status >= 500) {
      logger.error({ err: error }, `[http] ${request.method} ${request.url} failed`);
    } else {
      logger.debug(`[http] ${request.method} ${request.url} -> ${response.status}: ${error.message}`);
    }
    void reply.status(response.status).send(response.body);
  });

  fastify.setNotFoundHandler((_request, reply) => {
    void reply.status(ErrorKindTable.NOT_FOUND.status).send({ errors: [ErrorKindTable.NOT_FOUND.message] });
  });
}
