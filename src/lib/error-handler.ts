/**
 * API Error Handling
 *
 * Maps thrown errors onto stable `{ success: false, error, code }` JSON
 * bodies and HTTP status codes for Hono handlers.
 *
 * @version 1.0.0
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { logger } from './logger';

export type ApiErrorCode =
  | 'AUTH_ERROR'
  | 'UNAUTHORIZED'
  | 'RATE_LIMIT'
  | 'TIMEOUT'
  | 'MODEL_ERROR'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

interface ClassifiedError {
  code: ApiErrorCode;
  status: ContentfulStatusCode;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return { code: 'TIMEOUT', status: 504 };
  }
  if (error instanceof Error && error.name === 'ZodError') {
    return { code: 'VALIDATION_ERROR', status: 400 };
  }

  const message = getErrorMessage(error).toLowerCase();

  if (message.includes('api key') || message.includes('unauthorized') || message.includes('authentication')) {
    return { code: 'AUTH_ERROR', status: 401 };
  }
  if (message.includes('rate limit') || message.includes('quota') || message.includes('too many requests')) {
    return { code: 'RATE_LIMIT', status: 429 };
  }
  if (message.includes('timeout') || message.includes('timed out')) {
    return { code: 'TIMEOUT', status: 504 };
  }
  if (message.includes('model') || message.includes('provider')) {
    return { code: 'MODEL_ERROR', status: 503 };
  }
  if (message.includes('required') || message.includes('invalid') || message.includes('validation')) {
    return { code: 'VALIDATION_ERROR', status: 400 };
  }
  if (message.includes('not found')) {
    return { code: 'NOT_FOUND', status: 404 };
  }

  return { code: 'INTERNAL_ERROR', status: 500 };
}

export function handleApiError(c: Context, error: unknown, operation = 'API') {
  const { code, status } = classifyError(error);
  const message = getErrorMessage(error);

  if (status >= 500) {
    logger.error({ err: error, operation, code }, `[${operation}] ${message}`);
  } else {
    logger.warn({ operation, code }, `[${operation}] ${message}`);
  }

  return c.json(
    {
      success: false,
      error: message,
      code,
      timestamp: new Date().toISOString(),
    },
    status
  );
}

export function handleValidationError(c: Context, message: string) {
  return c.json(
    {
      success: false,
      error: message,
      code: 'VALIDATION_ERROR',
      timestamp: new Date().toISOString(),
    },
    400
  );
}

export function handleUnauthorizedError(c: Context) {
  return c.json(
    {
      success: false,
      error: 'Unauthorized',
      code: 'UNAUTHORIZED',
      timestamp: new Date().toISOString(),
    },
    401
  );
}

export function jsonSuccess<T extends object>(c: Context, data: T) {
  return c.json(
    {
      success: true,
      ...data,
      timestamp: new Date().toISOString(),
    },
    200
  );
}

export function jsonSuccessData<T>(c: Context, data: T) {
  return c.json(
    {
      success: true,
      data,
      timestamp: new Date().toISOString(),
    },
    200
  );
}
