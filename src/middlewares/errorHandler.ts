/**
 * Error Handling Middleware
 *
 * Centralized error handling with a consistent error response format.
 * Client errors are expected traffic (throttling, conflicts) and are logged
 * at info level; only 5xx responses are logged as errors.
 */

import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  retryable?: boolean;
  validationErrors?: Record<string, string[]>;
  meta?: Record<string, unknown>;
}

export interface ApiErrorOptions {
  statusCode?: number;
  isOperational?: boolean;
  retryable?: boolean;
  validationErrors?: Record<string, string[]>;
  meta?: Record<string, unknown>;
}

/**
 * API Error class for operational errors
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  retryable: boolean;
  validationErrors?: Record<string, string[]>;
  meta?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, options?: ApiErrorOptions) {
    super(message);
    this.name = new.target.name;
    this.errorCode = code;
    this.statusCode = options?.statusCode || errorCodeToStatus[code] || 500;
    this.isOperational = options?.isOperational ?? true;
    this.retryable = options?.retryable ?? false;
    this.validationErrors = options?.validationErrors;
    this.meta = options?.meta;
    Error.captureStackTrace(this, this.constructor);
  }

  static validationError(message: string, validationErrors?: Record<string, string[]>): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, { validationErrors });
  }

  static notFound(resource: string): ApiError {
    return new ApiError(ErrorCode.RESOURCE_NOT_FOUND, `${resource} not found`);
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, { isOperational: false });
  }
}

/**
 * Serialize an error into the standard envelope
 */
export const toErrorResponse = (
  errorCode: ErrorCode,
  message: string,
  extras?: Pick<ErrorResponse['error'], 'details' | 'meta'>
): ErrorResponse => {
  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      correlationId: getCorrelationId() || 'unknown',
    },
  };

  if (extras?.details) {
    response.error.details = extras.details;
  }
  if (extras?.meta) {
    response.error.meta = extras.meta;
  }

  return response;
};

/**
 * Main error handler middleware
 */
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const errorCode = err.errorCode || ErrorCode.INTERNAL_ERROR;
  const statusCode = err.statusCode || errorCodeToStatus[errorCode] || 500;

  const logPayload = {
    correlationId: getCorrelationId() || 'unknown',
    errorCode,
    statusCode,
    error: err.message,
    stack: config.isDevelopment ? err.stack : undefined,
    path: req.path,
    method: req.method,
    isOperational: err.isOperational,
  };

  if (statusCode >= 500) {
    logger.error(logPayload, `Error: ${err.message}`);
  } else {
    logger.info(logPayload, `Request rejected: ${err.message}`);
  }

  // Sanitize unexpected 5xx errors in production
  const message =
    config.isProduction && statusCode >= 500 && !err.isOperational
      ? 'Internal server error'
      : err.message || 'An error occurred';

  if (err.retryable) {
    res.setHeader('X-Retryable', 'true');
  }

  res.status(statusCode).json(
    toErrorResponse(errorCode, message, {
      details: err.validationErrors,
      meta: err.meta,
    })
  );
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  res
    .status(404)
    .json(toErrorResponse(ErrorCode.RESOURCE_NOT_FOUND, `Route ${req.method} ${req.path} not found`));
};

/**
 * Async handler wrapper to catch errors in async route handlers
 */
export const asyncHandler = <Req extends Request = Request>(
  fn: (req: Req, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Req, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
