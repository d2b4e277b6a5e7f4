/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Centralized error handling for all routes.
 *
 * SECURITY:
 * - Stack traces never reach clients
 * - Internal error messages are hidden in production
 * - All errors are logged server-side
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';
import { AppError, RateLimitError } from '../../core/errors/AppError';
import { ErrorCode, HTTP_STATUS } from '../../core/constants';
import { config } from '../../config/environment';

/**
 * Global error handler middleware
 * Must be the last middleware in the chain
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const logData = {
    error: error.message,
    path: req.path,
    method: req.method,
    callerId: req.caller?.id ?? 'anonymous'
  };

  // Known operational error: expected outcome, no stack needed
  if (error instanceof AppError) {
    if (error.statusCode >= HTTP_STATUS.INTERNAL_ERROR) {
      logger.error('Request error', { ...logData, code: error.code });
    } else {
      logger.warn('Request rejected', { ...logData, code: error.code });
    }

    if (error instanceof RateLimitError) {
      res.setHeader('Retry-After', String(error.retryAfter));
    }

    res.status(error.statusCode).json({
      success: false,
      error: {
        code: error.code,
        message: error.message,
        ...(error.details && { details: error.details })
      }
    });
    return;
  }

  // Malformed JSON body
  if (error instanceof SyntaxError && 'body' in error) {
    logger.warn('Malformed request body', logData);
    res.status(HTTP_STATUS.BAD_REQUEST).json({
      success: false,
      error: { code: ErrorCode.VALIDATION_ERROR, message: 'Malformed JSON body' }
    });
    return;
  }

  logger.error('Unhandled request error', { ...logData, stack: error.stack });

  // SECURITY: Never expose internal error details to client
  res.status(HTTP_STATUS.INTERNAL_ERROR).json({
    success: false,
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: config.isProduction
        ? 'An unexpected error occurred. Please try again later.'
        : error.message
    }
  });
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(HTTP_STATUS.NOT_FOUND).json({
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: `Cannot ${req.method} ${req.path}`
    }
  });
}
