/**
 * Centralized Error Middleware - Production Safe
 * Prevents leaking raw upstream errors and stack traces to clients
 */

import type { Request, Response, NextFunction } from 'express';
import { logger } from '../lib/logger/structured-logger.js';
import { StoreError } from '../services/store/restaurant-store.types.js';
import { UpstreamFetchError } from '../utils/fetch-with-timeout.js';

/**
 * Application Error - Structured error with metadata
 * Use this for all known error cases
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: unknown,
    public readonly exposeMessage: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Standard error response format
 */
interface ErrorResponse {
  error: string;
  code: string;
  traceId: string;
  details?: unknown;
  stack?: string;
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app (after all routes)
 *
 * Production mode:
 * - No stack traces
 * - No raw upstream messages (unless exposeMessage=true)
 *
 * Development mode:
 * - Includes stack traces and details
 */
export function errorMiddleware(
  thrown: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    return next(thrown);
  }

  const err = toAppError(thrown);

  const isProd = process.env.NODE_ENV === 'production';
  const isAppError = err instanceof AppError;
  const headerTraceId = res.getHeader('x-trace-id');
  const traceId = req.traceId || (typeof headerTraceId === 'string' ? headerTraceId : 'unknown');

  // body-parser marks malformed JSON with a 4xx status
  const bodyParserStatus = 'status' in err && typeof err.status === 'number' && err.status < 500
    ? err.status
    : undefined;

  const statusCode = isAppError ? err.statusCode : bodyParserStatus ?? 500;
  const code = isAppError ? err.code : bodyParserStatus ? 'BAD_REQUEST' : 'INTERNAL_ERROR';

  let clientMessage: string;
  if (isAppError && err.exposeMessage) {
    clientMessage = err.message;
  } else if (isAppError || bodyParserStatus) {
    clientMessage = getGenericMessage(statusCode);
  } else if (isProd) {
    clientMessage = 'Internal server error';
  } else {
    clientMessage = err.message || 'Internal server error';
  }

  const logContext = {
    error: {
      name: thrown.name,
      message: thrown.message,
      stack: thrown.stack,
      code,
      statusCode,
    },
    traceId,
    method: req.method,
    path: req.path,
  };

  const log = req.log ?? logger;
  if (statusCode >= 500) {
    log.error(logContext, 'Request error');
  } else {
    log.warn(logContext, 'Request error');
  }

  const response: ErrorResponse = {
    error: clientMessage,
    code,
    traceId,
  };

  if (isAppError && err.exposeMessage && err.details !== undefined) {
    response.details = err.details;
  } else if (!isProd && isAppError && err.details !== undefined) {
    response.details = err.details;
  }
  if (!isProd && statusCode >= 500 && err.stack) {
    response.stack = err.stack;
  }

  res.status(statusCode).json(response);
}

/**
 * Catch-all for unmatched routes, registered before errorMiddleware
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'Not found',
    code: 'NOT_FOUND',
    traceId: req.traceId || 'unknown',
  });
}

/**
 * Get generic error message based on status code
 */
function getGenericMessage(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'Invalid request';
    case 404:
      return 'Not found';
    case 413:
      return 'Payload too large';
    case 422:
      return 'Validation failed';
    case 429:
      return 'Too many requests';
    case 500:
      return 'Internal server error';
    case 502:
      return 'Upstream service error';
    case 503:
      return 'Service unavailable';
    case 504:
      return 'Gateway timeout';
    default:
      return statusCode >= 500 ? 'Internal server error' : 'Bad request';
  }
}

/**
 * Helper: Create not found error
 */
export function createNotFoundError(message: string): AppError {
  return new AppError(message, 404, 'NOT_FOUND', undefined, true);
}

/**
 * Helper: Create service unavailable error (missing optional integration)
 */
export function createUnavailableError(message: string): AppError {
  return new AppError(message, 503, 'SERVICE_UNAVAILABLE', undefined, true);
}

/**
 * Helper: Create upstream provider error
 */
export function createUpstreamError(
  internalMessage: string,
  details?: unknown
): AppError {
  return new AppError(internalMessage, 502, 'UPSTREAM_ERROR', details, false);
}

/**
 * Datastore and upstream HTTP failures become 502s; their messages stay in the logs
 */
function toAppError(err: Error): Error {
  if (err instanceof StoreError) {
    return createUpstreamError(err.message, { operation: err.operation });
  }
  if (err instanceof UpstreamFetchError) {
    return createUpstreamError(err.message, { provider: err.provider, errorKind: err.errorKind });
  }
  return err;
}
