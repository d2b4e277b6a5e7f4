/**
 * =============================================================================
 * BOOKING MODULE - SERVICE
 * =============================================================================
 *
 * Booking lifecycle state machine.
 *
 *   pending ──confirm──> confirmed ──complete──> completed (+ one rating)
 *      │                     │
 *      └──────cancel─────────┴──> cancelled
 *
 * Every transition:
 * 1. Loads the booking (missing -> BookingNotFoundError)
 * 2. Checks the caller owns it in the right role (NOT_AUTHORIZED)
 * 3. Checks the current status (INVALID_STATE)
 * 4. Applies the write as a compare-and-swap on status inside a store
 *    transaction, so a lost race fails with INVALID_STATE and a failed side
 *    effect leaves nothing behind
 *
 * Rating lives in the rating module; it shares these guards.
 * =============================================================================
 */

import { db } from '../../shared/database/db';
import type {
  BookingRecord,
  MarketplaceStore,
  PaymentRecord
} from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { config } from '../../config/environment';
import {
  BookingStatus,
  BOOKING_STATUS_TRANSITIONS,
  CallerRole,
  ErrorCode,
  PaymentMethod
} from '../../core/constants';
import {
  BookingNotFoundError,
  ConflictError,
  NotFoundError,
  OfferingNotFoundError,
  PreconditionError,
  ValidationError
} from '../../core/errors/AppError';
import type { CallerContext } from '../../shared/middleware/auth.middleware';
import { validateSchema } from '../../shared/utils/validation.utils';
import { createBookingSchema, CreateBookingInput } from './booking.schema';

export interface BookingServiceOptions {
  /** Reject a second pending/confirmed booking for the same provider slot */
  slotGuard: boolean;
  /** Clock used for the "date not in the past" check */
  now: () => Date;
}

export interface ConfirmedBooking {
  booking: BookingRecord;
  payment: PaymentRecord;
}

// =============================================================================
// OWNERSHIP GUARDS
// =============================================================================

export function isOwningCustomer(caller: CallerContext, booking: BookingRecord): boolean {
  return caller.role === CallerRole.CUSTOMER && caller.id === booking.customerId;
}

export function isOwningProvider(caller: CallerContext, booking: BookingRecord): boolean {
  return caller.role === CallerRole.PROVIDER && caller.id === booking.providerId;
}

export function isOwner(caller: CallerContext, booking: BookingRecord): boolean {
  return isOwningCustomer(caller, booking) || isOwningProvider(caller, booking);
}

/**
 * YYYY-MM-DD of the given instant, UTC
 */
function toDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class BookingService {
  private readonly options: BookingServiceOptions;

  constructor(
    private readonly store: MarketplaceStore,
    options: Partial<BookingServiceOptions> = {}
  ) {
    this.options = {
      slotGuard: options.slotGuard ?? config.booking.slotGuard,
      now: options.now ?? (() => new Date())
    };
  }

  // ==========================================================================
  // CREATE
  // ==========================================================================

  /**
   * Create a pending booking for the calling customer
   */
  async createBooking(caller: CallerContext, input: CreateBookingInput): Promise<BookingRecord> {
    if (caller.role !== CallerRole.CUSTOMER) {
      throw new PreconditionError('NOT_AUTHORIZED', 'Only customers can create bookings', {
        attemptedAction: 'create'
      });
    }

    const data = validateSchema(createBookingSchema, input);

    if (!this.store.getCustomerById(caller.id)) {
      throw new NotFoundError(`Customer not found: ${caller.id}`, ErrorCode.CUSTOMER_NOT_FOUND, { customerId: caller.id });
    }
    if (!this.store.getProviderById(data.providerId)) {
      throw new NotFoundError(`Provider not found: ${data.providerId}`, ErrorCode.PROVIDER_NOT_FOUND, { providerId: data.providerId });
    }
    if (!this.store.getCategoryById(data.categoryId)) {
      throw new NotFoundError(`Category not found: ${data.categoryId}`, ErrorCode.CATEGORY_NOT_FOUND, { categoryId: data.categoryId });
    }

    const address = this.store.getAddressById(data.addressId);
    if (!address || address.ownerId !== caller.id || address.ownerRole !== CallerRole.CUSTOMER) {
      throw new NotFoundError(`Address not found: ${data.addressId}`, ErrorCode.ADDRESS_NOT_FOUND, { addressId: data.addressId });
    }

    if (!this.store.getOffering(data.providerId, data.categoryId)) {
      throw new OfferingNotFoundError(data.providerId, data.categoryId);
    }

    const today = toDateKey(this.options.now());
    if (data.date < today) {
      throw new ValidationError(
        'date: Booking date cannot be in the past',
        [{ field: 'date', message: 'Booking date cannot be in the past' }],
        ErrorCode.VALIDATION_DATE_INVALID
      );
    }

    const booking = this.store.transaction(() => {
      if (this.options.slotGuard) {
        const holder = this.store.findSlotHoldingBooking(data.providerId, data.date, data.timeSlot);
        if (holder) {
          throw new ConflictError(
            'Provider is already booked for this slot',
            ErrorCode.BOOKING_SLOT_TAKEN,
            { providerId: data.providerId, date: data.date, timeSlot: data.timeSlot }
          );
        }
      }

      return this.store.createBooking({
        customerId: caller.id,
        providerId: data.providerId,
        categoryId: data.categoryId,
        addressId: data.addressId,
        date: data.date,
        timeSlot: data.timeSlot
      });
    });

    logger.info('[BOOKING] Booking created', {
      bookingId: booking.id,
      customerId: booking.customerId,
      providerId: booking.providerId,
      categoryId: booking.categoryId,
      date: booking.date,
      timeSlot: booking.timeSlot
    });

    return booking;
  }

  // ==========================================================================
  // TRANSITIONS
  // ==========================================================================

  /**
   * pending -> confirmed, recording one payment at the offering's price
   */
  async confirmBooking(
    caller: CallerContext,
    bookingId: string,
    method: PaymentMethod = PaymentMethod.CASH
  ): Promise<ConfirmedBooking> {
    const booking = this.loadBooking(bookingId);

    if (!isOwningCustomer(caller, booking)) {
      throw PreconditionError.notAuthorized(bookingId, 'confirm');
    }
    this.assertTransition(booking, BookingStatus.CONFIRMED, 'confirm');

    const result = this.store.transaction(() => {
      const offering = this.store.getOffering(booking.providerId, booking.categoryId);
      if (!offering) {
        throw new OfferingNotFoundError(booking.providerId, booking.categoryId);
      }

      this.compareAndSwap(bookingId, BookingStatus.PENDING, BookingStatus.CONFIRMED, 'confirm');
      const payment = this.store.createPayment(bookingId, offering.priceRate, method);

      return { booking: this.loadBooking(bookingId), payment };
    });

    logger.info('[BOOKING] Booking confirmed', {
      bookingId,
      paymentId: result.payment.id,
      amount: result.payment.amount,
      method
    });

    return result;
  }

  /**
   * pending/confirmed -> cancelled, by either owner. No payment reversal.
   */
  async cancelBooking(caller: CallerContext, bookingId: string): Promise<BookingRecord> {
    const booking = this.loadBooking(bookingId);

    if (!isOwner(caller, booking)) {
      throw PreconditionError.notAuthorized(bookingId, 'cancel');
    }
    this.assertTransition(booking, BookingStatus.CANCELLED, 'cancel');

    const updated = this.store.transaction(() => {
      this.compareAndSwap(bookingId, booking.status, BookingStatus.CANCELLED, 'cancel');
      return this.loadBooking(bookingId);
    });

    logger.info('[BOOKING] Booking cancelled', {
      bookingId,
      previousStatus: booking.status,
      cancelledBy: caller.role
    });

    return updated;
  }

  /**
   * confirmed -> completed, by the owning provider
   */
  async completeBooking(caller: CallerContext, bookingId: string): Promise<BookingRecord> {
    const booking = this.loadBooking(bookingId);

    if (!isOwningProvider(caller, booking)) {
      throw PreconditionError.notAuthorized(bookingId, 'complete');
    }
    this.assertTransition(booking, BookingStatus.COMPLETED, 'complete');

    const updated = this.store.transaction(() => {
      this.compareAndSwap(bookingId, BookingStatus.CONFIRMED, BookingStatus.COMPLETED, 'complete');
      return this.loadBooking(bookingId);
    });

    logger.info('[BOOKING] Booking completed', { bookingId, providerId: booking.providerId });

    return updated;
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  async getBooking(caller: CallerContext, bookingId: string): Promise<BookingRecord> {
    const booking = this.loadBooking(bookingId);
    if (!isOwner(caller, booking)) {
      throw PreconditionError.notAuthorized(bookingId, 'view');
    }
    return booking;
  }

  /**
   * The caller's bookings, newest first
   */
  async listBookings(caller: CallerContext, status?: BookingStatus): Promise<BookingRecord[]> {
    const bookings = caller.role === CallerRole.CUSTOMER
      ? this.store.getBookingsByCustomer(caller.id, status)
      : this.store.getBookingsByProvider(caller.id, status);

    return bookings.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async getPayment(caller: CallerContext, bookingId: string): Promise<PaymentRecord> {
    const booking = this.loadBooking(bookingId);
    if (!isOwner(caller, booking)) {
      throw PreconditionError.notAuthorized(bookingId, 'view payment for');
    }

    const payment = this.store.getPaymentByBooking(bookingId);
    if (!payment) {
      throw new NotFoundError(`No payment recorded for booking ${bookingId}`, ErrorCode.PAYMENT_NOT_FOUND, { bookingId });
    }
    return payment;
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  private loadBooking(bookingId: string): BookingRecord {
    const booking = this.store.getBooking(bookingId);
    if (!booking) {
      throw new BookingNotFoundError(bookingId);
    }
    return booking;
  }

  private assertTransition(booking: BookingRecord, next: BookingStatus, action: string): void {
    if (!BOOKING_STATUS_TRANSITIONS[booking.status].includes(next)) {
      throw PreconditionError.invalidState(booking, action);
    }
  }

  /**
   * Status write that only lands if nobody moved the booking first
   */
  private compareAndSwap(bookingId: string, expected: BookingStatus, next: BookingStatus, action: string): void {
    if (!this.store.updateBookingStatus(bookingId, expected, next)) {
      throw PreconditionError.invalidState(this.loadBooking(bookingId), action);
    }
  }
}

export const bookingService = new BookingService(db);
