/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In service
 * throw new NotFoundError('Booking not found', ErrorCode.BOOKING_NOT_FOUND);
 *
 * // In a transition guard
 * throw PreconditionError.invalidState(booking, 'complete');
 * ```
 *
 * Error kinds surfaced by the matching engine and the booking state machine:
 * - ValidationError   (malformed or missing input)
 * - PreconditionError (wrong state, caller not an owner, already rated)
 * - NotFoundError     (referenced record absent)
 * - DependencyError   (store, lock or cache unavailable)
 *
 * =============================================================================
 */

import type { ZodError } from 'zod';
import { BookingStatus, ErrorCode, HTTP_STATUS } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date().toISOString();

    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): ErrorResponse {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
        timestamp: this.timestamp,
        ...(process.env.NODE_ENV === 'development' && { stack: this.stack })
      }
    };
  }
}

/**
 * Error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: string;
    stack?: string;
  };
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * 400 Validation Error - Schema/input validation failed
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = [],
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, code, true, { errors });
    this.errors = errors;
  }

  static fromZodError(zodError: ZodError): ValidationError {
    const errors = zodError.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message
    }));
    const first = errors[0];
    const message = first ? `${first.field ? `${first.field}: ` : ''}${first.message}` : 'Validation failed';
    return new ValidationError(message, errors);
  }
}

/**
 * 401 Unauthorized - Authentication required or failed
 */
export class UnauthorizedError extends AppError {
  constructor(
    message: string = 'Authentication required',
    code: ErrorCode | string = ErrorCode.AUTH_REQUIRED
  ) {
    super(message, HTTP_STATUS.UNAUTHORIZED, code, true);
  }
}

/**
 * 403 Forbidden - Authenticated but the role may not use this route
 */
export class ForbiddenError extends AppError {
  constructor(
    message: string = 'Insufficient permissions',
    code: ErrorCode | string = ErrorCode.AUTH_FORBIDDEN
  ) {
    super(message, HTTP_STATUS.FORBIDDEN, code, true);
  }
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(
    message: string = 'Resource not found',
    code: ErrorCode | string = 'NOT_FOUND',
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.NOT_FOUND, code, true, details);
  }
}

/**
 * 409 Conflict - Resource already exists
 */
export class ConflictError extends AppError {
  constructor(
    message: string = 'Resource conflict',
    code: ErrorCode | string = 'CONFLICT',
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.CONFLICT, code, true, details);
  }
}

/**
 * 429 Too Many Requests - Rate limited
 */
export class RateLimitError extends AppError {
  public readonly retryAfter: number;

  constructor(
    message: string = 'Too many requests',
    retryAfter: number = 60
  ) {
    super(message, HTTP_STATUS.TOO_MANY_REQUESTS, ErrorCode.RATE_LIMIT_EXCEEDED, true, { retryAfter });
    this.retryAfter = retryAfter;
  }
}

/**
 * 503 Dependency Error - store, lock or cache unavailable
 */
export class DependencyError extends AppError {
  public readonly retryable: boolean;

  constructor(
    message: string = 'Dependency temporarily unavailable',
    code: ErrorCode | string = ErrorCode.DEPENDENCY_UNAVAILABLE,
    retryable: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.SERVICE_UNAVAILABLE, code, true, { ...details, retryable });
    this.retryable = retryable;
  }
}

// =============================================================================
// DOMAIN-SPECIFIC ERRORS
// =============================================================================

/**
 * Which transition guard rejected the call
 */
export type PreconditionReason = 'INVALID_STATE' | 'NOT_AUTHORIZED' | 'ALREADY_RATED';

const PRECONDITION_STATUS: Record<PreconditionReason, number> = {
  INVALID_STATE: HTTP_STATUS.CONFLICT,
  NOT_AUTHORIZED: HTTP_STATUS.FORBIDDEN,
  ALREADY_RATED: HTTP_STATUS.CONFLICT
};

const PRECONDITION_CODE: Record<PreconditionReason, ErrorCode> = {
  INVALID_STATE: ErrorCode.BOOKING_INVALID_STATE,
  NOT_AUTHORIZED: ErrorCode.BOOKING_NOT_AUTHORIZED,
  ALREADY_RATED: ErrorCode.BOOKING_ALREADY_RATED
};

/**
 * Booking transition attempted from the wrong state, by a caller that does
 * not own the booking, or as a second rating. State is left unchanged.
 */
export class PreconditionError extends AppError {
  public readonly reason: PreconditionReason;

  constructor(reason: PreconditionReason, message: string, details?: Record<string, unknown>) {
    super(message, PRECONDITION_STATUS[reason], PRECONDITION_CODE[reason], true, { reason, ...details });
    this.reason = reason;
  }

  static invalidState(
    booking: { id: string; status: BookingStatus },
    attemptedAction: string
  ): PreconditionError {
    return new PreconditionError(
      'INVALID_STATE',
      `Cannot ${attemptedAction} booking in status: ${booking.status}`,
      { bookingId: booking.id, currentStatus: booking.status, attemptedAction }
    );
  }

  static notAuthorized(bookingId: string, attemptedAction: string): PreconditionError {
    return new PreconditionError(
      'NOT_AUTHORIZED',
      `Caller may not ${attemptedAction} this booking`,
      { bookingId, attemptedAction }
    );
  }

  static alreadyRated(bookingId: string): PreconditionError {
    return new PreconditionError('ALREADY_RATED', 'Booking has already been rated', { bookingId });
  }
}

/**
 * Booking-specific errors
 */
export class BookingNotFoundError extends NotFoundError {
  constructor(bookingId: string) {
    super(`Booking not found: ${bookingId}`, ErrorCode.BOOKING_NOT_FOUND, { bookingId });
  }
}

export class OfferingNotFoundError extends NotFoundError {
  constructor(providerId: string, categoryId: string) {
    super(
      `Provider ${providerId} has no offering for category ${categoryId}`,
      ErrorCode.OFFERING_NOT_FOUND,
      { providerId, categoryId }
    );
  }
}
