import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ZodError } from 'zod';
import { AppError, ProviderUnavailableError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { ApiErrorBody } from '../../types/api.js';
import type { AppEnv } from '../types.js';

const logger = createLogger('api:errors');

function toStatus(status: number): ContentfulStatusCode {
  switch (status) {
    case 400: return 400;
    case 401: return 401;
    case 403: return 403;
    case 404: return 404;
    case 409: return 409;
    case 413: return 413;
    case 429: return 429;
    case 502: return 502;
    case 503: return 503;
    default: return 500;
  }
}

export function errorBody(code: string, message: string, details?: unknown): ApiErrorBody {
  return { error: details === undefined ? { code, message } : { code, message, details } };
}

/**
 * Single exit for thrown errors: AppError subclasses keep their code and
 * status, zod failures become VALIDATION_ERROR, everything else is a
 * generic 500 with nothing internal exposed.
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof AppError) {
    const level = err.status >= 500 ? 'error' : 'warn';
    logger[level]('Request failed', { requestId, code: err.code, path: c.req.path, error: err.message });
    if (err instanceof ProviderUnavailableError) {
      c.header('Retry-After', String(err.retryAfterSeconds));
    }
    return c.json(errorBody(err.code, err.message, err.details), toStatus(err.status));
  }

  if (err instanceof ZodError) {
    return c.json(errorBody('VALIDATION_ERROR', 'Invalid request data', { fields: err.issues }), 400);
  }

  if (err instanceof HTTPException) {
    const status = toStatus(err.status);
    const code = status === 413 ? 'PAYLOAD_TOO_LARGE' : status === 401 ? 'UNAUTHENTICATED' : 'HTTP_ERROR';
    return c.json(errorBody(code, err.message || 'Request failed'), status);
  }

  logger.error('Unhandled error', {
    requestId,
    path: c.req.path,
    method: c.req.method,
    error: err,
  });
  return c.json(errorBody('INTERNAL_ERROR', 'An unexpected error occurred'), 500);
}

export function handleNotFound(c: Context<AppEnv>): Response {
  return c.json(errorBody('NOT_FOUND', `Route ${c.req.method} ${c.req.path} not found`), 404);
}
