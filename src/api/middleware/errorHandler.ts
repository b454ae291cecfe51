/**
 * Error handling middleware
 */
import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { createChildLogger } from '../../core/Logger.js';
import {
  ApiError,
  ExternalIpError,
  TransportError,
  isZonekeeperError,
} from '../../core/errors.js';

/**
 * HTTP error with a status code, for request-level failures
 */
export class HttpError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'HttpError';
  }

  static badRequest(message: string, code?: string, details?: unknown): HttpError {
    return new HttpError(400, message, code ?? 'BAD_REQUEST', details);
  }

  static forbidden(message: string = 'Forbidden'): HttpError {
    return new HttpError(403, message, 'FORBIDDEN');
  }

  static internal(message: string = 'Internal server error'): HttpError {
    return new HttpError(500, message, 'INTERNAL_ERROR');
  }
}

/**
 * Format Zod validation errors
 */
function formatZodError(error: ZodError): { field: string; message: string }[] {
  return error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
  }));
}

/**
 * Status code for errors raised by the sync pass
 */
function statusForDomainError(err: Error): number {
  if (err instanceof ApiError || err instanceof TransportError || err instanceof ExternalIpError) {
    return 502;
  }
  return 500;
}

/**
 * Global error handler middleware
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const logger = createChildLogger({ service: 'API' });

  if (err instanceof HttpError) {
    logger.debug({ path: req.path, statusCode: err.statusCode }, err.message);
    res.status(err.statusCode).json({
      success: false,
      error: {
        code: err.code,
        message: err.message,
        details: err.details,
      },
    });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: formatZodError(err),
      },
    });
    return;
  }

  logger.error({ error: err.message, path: req.path, method: req.method }, 'Sync request failed');

  if (isZonekeeperError(err)) {
    res.status(statusForDomainError(err)).json({
      success: false,
      error: {
        code: err.code,
        message: err.message,
      },
    });
    return;
  }

  res.status(500).json({
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: process.env['NODE_ENV'] === 'production' ? 'Internal server error' : err.message,
    },
  });
}

/**
 * Not found handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: `Route not found: ${req.method} ${req.path}`,
    },
  });
}

/**
 * Async handler wrapper to catch errors in async route handlers
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
