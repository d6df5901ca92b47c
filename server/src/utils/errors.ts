import { Request, Response, NextFunction } from 'express';
import type { Logger } from 'pino';
import defaultLogger from './logger';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 400 Bad Request - validation errors
 */
export class ValidationError extends AppError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 400);
    this.field = field;
  }
}

/**
 * 404 Not Found - resource not found
 */
export class NotFoundError extends AppError {
  public readonly resource: string;

  constructor(resource: string) {
    super(`${resource} not found`, 404);
    this.resource = resource;
  }
}

/**
 * 503 Service Unavailable - the status store cannot be reached.
 * Surfaced as-is; the core never retries.
 */
export class StoreUnavailableError extends AppError {
  constructor(message = 'Status store is unavailable', options?: { cause?: unknown }) {
    super(message, 503);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * 504 - a caller-supplied deadline expired before the operation finished
 */
export class DeadlineExceededError extends AppError {
  constructor(operation: string) {
    super(`${operation} exceeded its deadline`, 504);
  }
}

/**
 * Invalid startup configuration. Not an HTTP error; fatal at boot.
 */
export class ConfigError extends Error {
  public readonly key: string;

  constructor(key: string, message: string) {
    super(`${key}: ${message}`);
    this.key = key;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Standard error response shape
 */
export interface ErrorResponse {
  error: string;
  field?: string;
}

/**
 * Format an error for JSON response.
 * AppError subclasses are operational and their messages are safe to return
 * to clients. All other errors get a generic message.
 */
export function formatError(error: unknown): ErrorResponse {
  if (error instanceof ValidationError) {
    return {
      error: error.message,
      ...(error.field && { field: error.field }),
    };
  }

  if (error instanceof AppError) {
    return { error: error.message };
  }

  // body-parser rejects bodies with an error that carries `expose`
  if (isClientHttpError(error)) {
    return { error: error.status === 413 ? 'Request body too large' : 'Invalid JSON payload' };
  }

  return { error: 'Internal server error' };
}

/**
 * Get status code from error
 */
export function getErrorStatusCode(error: unknown): number {
  if (error instanceof AppError) {
    return error.statusCode;
  }
  if (isClientHttpError(error)) {
    return error.status;
  }
  return 500;
}

function isClientHttpError(error: unknown): error is { status: number; expose: true } {
  if (typeof error !== 'object' || error === null) return false;
  return (
    'expose' in error &&
    error.expose === true &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

/**
 * Express error handling middleware. Must be registered after all routes
 * (Express identifies error handlers by the 4-param signature).
 */
export function createErrorHandler(logger: Logger = defaultLogger) {
  return (error: Error, req: Request, res: Response, _next: NextFunction): void => {
    const statusCode = getErrorStatusCode(error);

    if (statusCode >= 500) {
      logger.error({ err: error, method: req.method, path: req.path }, 'request failed');
    }

    res.status(statusCode).json(formatError(error));
  };
}
