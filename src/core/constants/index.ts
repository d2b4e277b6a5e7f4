/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 * Import from '../core/constants' in other modules.
 *
 * =============================================================================
 */

// =============================================================================
// CALLER ROLES
// =============================================================================

/**
 * Roles a caller can act under.
 * Carried explicitly with every state-machine call (see CallerContext).
 */
export enum CallerRole {
  CUSTOMER = 'customer',
  PROVIDER = 'provider'
}

// =============================================================================
// BOOKING STATUS
// =============================================================================

/**
 * Booking lifecycle states
 */
export enum BookingStatus {
  PENDING = 'pending',           // Created by customer, awaiting confirmation
  CONFIRMED = 'confirmed',       // Customer confirmed, payment recorded
  COMPLETED = 'completed',       // Provider finished the job
  CANCELLED = 'cancelled'        // Cancelled by customer or provider
}

/**
 * Allowed status transitions.
 * Rating is a sub-transition of COMPLETED and never changes status.
 */
export const BOOKING_STATUS_TRANSITIONS: Record<BookingStatus, BookingStatus[]> = {
  [BookingStatus.PENDING]: [BookingStatus.CONFIRMED, BookingStatus.CANCELLED],
  [BookingStatus.CONFIRMED]: [BookingStatus.COMPLETED, BookingStatus.CANCELLED],
  [BookingStatus.COMPLETED]: [],
  [BookingStatus.CANCELLED]: []
};

/**
 * Statuses that hold a provider's time slot
 */
export const SLOT_HOLDING_STATUSES: readonly BookingStatus[] = [
  BookingStatus.PENDING,
  BookingStatus.CONFIRMED
];

// =============================================================================
// PAYMENTS
// =============================================================================

export enum PaymentMethod {
  CASH = 'cash',
  CARD = 'card',
  BANK_TRANSFER = 'bank_transfer',
  WALLET = 'wallet'
}

export enum PaymentStatus {
  RECORDED = 'recorded'
}

// =============================================================================
// MATCHING & SCORING
// =============================================================================

/**
 * Score weights. Components are additive and the total is open-ended:
 * RATING_MAX + EXPERIENCE_MAX + PRICE_MAX + PROXIMITY bonus peaks at 115.
 */
export const SCORING = {
  RATING_MAX: 40,
  UNRATED_SCORE: 20,
  EXPERIENCE_MAX: 30,
  EXPERIENCE_PER_YEAR: 3,
  PRICE_MAX: 30,
  MAX_RATING_VALUE: 5
} as const;

/**
 * Proximity step bonus, checked in order (strictly-less-than thresholds)
 */
export const PROXIMITY_BONUS_STEPS: ReadonlyArray<{ maxKm: number; bonus: number }> = [
  { maxKm: 5, bonus: 15 },
  { maxKm: 10, bonus: 10 },
  { maxKm: 20, bonus: 5 }
];

// =============================================================================
// RATINGS
// =============================================================================

export const RATING = {
  MIN: 1,
  MAX: 5,
  COMMENT_MAX_LENGTH: 500,
  /** Decimal places kept on a provider's averageRating */
  AVERAGE_PRECISION: 2
} as const;

// =============================================================================
// API CONFIGURATION
// =============================================================================

/**
 * API versioning
 */
export const API_VERSION = 'v1';
export const API_PREFIX = `/api/${API_VERSION}`;

/**
 * Rate limiting tiers
 */
export const RATE_LIMITS = {
  // Rating submissions, per customer
  RATING: { windowSeconds: 60, max: 10 }
} as const;

// =============================================================================
// HTTP STATUS
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR CODES (Hierarchical Structure)
// =============================================================================
/**
 * Application-specific error codes
 *
 * - 1xxx: Authentication & Authorization
 * - 2xxx: Validation errors
 * - 3xxx: Booking state machine
 * - 4xxx: Resource errors (Provider, Category, Offering, Address)
 * - 9xxx: System/Infrastructure errors
 */
export enum ErrorCode {
  // AUTHENTICATION & AUTHORIZATION (1xxx)
  AUTH_REQUIRED = 'AUTH_1001',
  AUTH_TOKEN_EXPIRED = 'AUTH_1002',
  AUTH_TOKEN_INVALID = 'AUTH_1003',
  AUTH_FORBIDDEN = 'AUTH_1004',

  // VALIDATION ERRORS (2xxx)
  VALIDATION_ERROR = 'VAL_2001',
  VALIDATION_LOCATION_INVALID = 'VAL_2002',
  VALIDATION_DATE_INVALID = 'VAL_2003',

  // BOOKING STATE MACHINE (3xxx)
  BOOKING_NOT_FOUND = 'BOOK_3001',
  BOOKING_INVALID_STATE = 'BOOK_3002',
  BOOKING_NOT_AUTHORIZED = 'BOOK_3003',
  BOOKING_ALREADY_RATED = 'BOOK_3004',
  BOOKING_SLOT_TAKEN = 'BOOK_3005',
  PAYMENT_ALREADY_RECORDED = 'BOOK_3006',
  PAYMENT_NOT_FOUND = 'BOOK_3007',

  // RESOURCE ERRORS (4xxx)
  PROVIDER_NOT_FOUND = 'RES_4001',
  CUSTOMER_NOT_FOUND = 'RES_4002',
  CATEGORY_NOT_FOUND = 'RES_4003',
  OFFERING_NOT_FOUND = 'RES_4004',
  OFFERING_ALREADY_EXISTS = 'RES_4005',
  ADDRESS_NOT_FOUND = 'RES_4006',

  // SYSTEM ERRORS (9xxx)
  INTERNAL_ERROR = 'SYS_9001',
  DEPENDENCY_UNAVAILABLE = 'SYS_9002',
  RATE_LIMIT_EXCEEDED = 'SYS_9003',
  LOCK_NOT_ACQUIRED = 'SYS_9004'
}
