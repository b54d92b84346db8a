/**
 * Standardized Error Handling Middleware
 *
 * Provides consistent error responses across all endpoints
 *
 * @module middleware/error-handler
 */

import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { logger } from '../utils/logger';

export interface ApiError {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
  timestamp: number;
  path: string;
}

/**
 * Standard error codes
 */
export enum ErrorCode {
  INVALID_REQUEST = 'invalid_request',
  VALIDATION_ERROR = 'validation_error',
  NOT_FOUND = 'not_found',
  UNAUTHORIZED = 'unauthorized',
  FORBIDDEN = 'forbidden',
  RATE_LIMIT_EXCEEDED = 'rate_limit_exceeded',
  INTERNAL_ERROR = 'internal_error',
  SERVICE_UNAVAILABLE = 'service_unavailable'
}

/**
 * HTTP-boundary error carrying its own status.
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Whole seconds until `reopenAt` (ms since epoch), at least 1. Used for Retry-After. */
export function retryAfterSeconds(reopenAt: number, now: number = Date.now()): number {
  return Math.max(1, Math.ceil((reopenAt - now) / 1000));
}

/**
 * Error code for an HTTP status, for bodies that carry no more specific code.
 */
export function errorCodeForStatus(statusCode: number): ErrorCode {
  switch (statusCode) {
    case 400:
      return ErrorCode.INVALID_REQUEST;
    case 401:
      return ErrorCode.UNAUTHORIZED;
    case 403:
      return ErrorCode.FORBIDDEN;
    case 404:
      return ErrorCode.NOT_FOUND;
    case 422:
      return ErrorCode.VALIDATION_ERROR;
    case 429:
      return ErrorCode.RATE_LIMIT_EXCEEDED;
    case 503:
      return ErrorCode.SERVICE_UNAVAILABLE;
    default:
      return statusCode < 500 ? ErrorCode.INVALID_REQUEST : ErrorCode.INTERNAL_ERROR;
  }
}

const httpStatusOf = (error: Error): number | undefined => {
  // body-parser and http-errors set `status`
  if ('status' in error && typeof error.status === 'number' && error.status >= 400 && error.status < 600) {
    return error.status;
  }
  return undefined;
};

function formatErrorResponse(error: Error, req: Request): ApiError {
  if (error instanceof AppError) {
    return {
      error: error.code,
      message: error.message,
      statusCode: error.statusCode,
      details: error.details,
      timestamp: Date.now(),
      path: req.path
    };
  }

  const statusCode = httpStatusOf(error) ?? 500;
  return {
    error: errorCodeForStatus(statusCode),
    message: error.message || 'An unexpected error occurred',
    statusCode,
    timestamp: Date.now(),
    path: req.path
  };
}

/**
 * Global error handler middleware
 */
export const errorHandler: ErrorRequestHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const errorResponse = formatErrorResponse(err, req);

  if (errorResponse.statusCode >= 500) {
    logger.error('Server error', {
      error: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
      statusCode: errorResponse.statusCode
    });
  } else {
    logger.warn('Client error', {
      error: err.message,
      path: req.path,
      method: req.method,
      statusCode: errorResponse.statusCode
    });
  }

  res.status(errorResponse.statusCode).json(errorResponse);
};

/**
 * Async handler wrapper - catches async errors and passes to error middleware
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * 404 handler for undefined routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  const error: ApiError = {
    error: ErrorCode.NOT_FOUND,
    message: `Route ${req.method} ${req.path} not found`,
    statusCode: 404,
    timestamp: Date.now(),
    path: req.path
  };

  logger.warn('Route not found', {
    path: req.path,
    method: req.method
  });

  res.status(404).json(error);
}
