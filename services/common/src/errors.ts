import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

import { getLogger } from './logger';
import type { ErrorResponse } from './types';

export interface ServiceErrorOptions {
  statusCode?: number;
  code?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ServiceError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, { statusCode = 500, code = 'internal', details, cause }: ServiceErrorOptions = {}) {
    super(message);
    this.name = 'ServiceError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

type ErrorFactory = (message: string, details?: Record<string, unknown>) => ServiceError;

function errorFactory(statusCode: number, code: string): ErrorFactory {
  return (message: string, details?: Record<string, unknown>) => new ServiceError(message, { statusCode, code, details });
}

export const badRequestError = errorFactory(400, 'bad_request');
export const notFoundError = errorFactory(404, 'not_found');
export const internalError = errorFactory(500, 'internal');
export const serviceUnavailableError = errorFactory(503, 'temporarily_unavailable');

export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

interface SanitizedError {
  statusCode: number;
  payload: ErrorResponse;
}

interface FastifyValidationError extends Error {
  validation: unknown[];
}

function isValidationError(err: unknown): err is FastifyValidationError {
  return err instanceof Error && 'validation' in err && Array.isArray(err.validation);
}

export function sanitizeError(err: unknown): SanitizedError {
  if (err instanceof ServiceError) {
    // Server-side failures keep their code but never their message, unless the
    // message was written for callers.
    if (err.statusCode >= 500 && err.code !== 'temporarily_unavailable') {
      return {
        statusCode: err.statusCode,
        payload: {
          code: err.code,
          message: err.statusCode === 503 ? 'The service is temporarily unavailable.' : 'An unexpected error occurred.'
        }
      };
    }

    return {
      statusCode: err.statusCode,
      payload: {
        code: err.code,
        message: err.message,
        details: err.details
      }
    };
  }

  if (isValidationError(err)) {
    return {
      statusCode: 400,
      payload: {
        code: 'bad_request',
        message: err.message
      }
    };
  }

  if (err instanceof Error) {
    return {
      statusCode: 500,
      payload: {
        code: 'internal',
        message: 'An unexpected error occurred.'
      }
    };
  }

  return {
    statusCode: 500,
    payload: {
      code: 'internal',
      message: 'Unknown error.'
    }
  };
}

function shouldLogError(statusCode: number): boolean {
  return statusCode >= 500;
}

export const errorHandlerPlugin: FastifyPluginAsync = fp(async (fastify) => {
  const logger = getLogger({ module: 'error-handler' });

  fastify.setErrorHandler(async (err: unknown, request: FastifyRequest, reply: FastifyReply) => {
    const sanitized = sanitizeError(err);
    const requestId = request.requestContext?.requestId;

    if (shouldLogError(sanitized.statusCode)) {
      logger.error({ err, requestId, path: request.url }, 'Request failed with server error.');
    } else {
      logger.warn({ err, requestId, path: request.url }, 'Request failed with client error.');
    }

    if (!reply.sent) {
      reply.status(sanitized.statusCode).send(sanitized.payload);
    }
  });
});
