/**
 * Booking lifecycle: creation rules, every transition, ownership and atomicity
 */

jest.mock('../shared/services/logger.service', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
  logError: jest.fn()
}));

import { DatabaseService } from '../shared/database/db';
import type { BookingRecord } from '../shared/database/repository.interface';
import { BookingService } from '../modules/booking/booking.service';
import type { CreateBookingInput } from '../modules/booking/booking.schema';
import {
  BookingStatus,
  CallerRole,
  ErrorCode,
  PaymentMethod,
  PaymentStatus
} from '../core/constants';
import {
  BookingNotFoundError,
  ConflictError,
  OfferingNotFoundError,
  PreconditionError,
  ValidationError
} from '../core/errors/AppError';

const customer = { role: CallerRole.CUSTOMER, id: 'cust-1' };
const otherCustomer = { role: CallerRole.CUSTOMER, id: 'cust-2' };
const provider = { role: CallerRole.PROVIDER, id: 'prov-1' };
const otherProvider = { role: CallerRole.PROVIDER, id: 'prov-2' };

describe('BookingService', () => {
  let store: DatabaseService;
  let service: BookingService;
  let homeId: string;

  function request(overrides: Partial<CreateBookingInput> = {}): CreateBookingInput {
    return {
      providerId: 'prov-1',
      categoryId: 'plumbing',
      addressId: homeId,
      date: '2026-03-05',
      timeSlot: '09:00-11:00',
      ...overrides
    };
  }

  async function bookingIn(status: BookingStatus): Promise<BookingRecord> {
    const booking = await service.createBooking(customer, request());
    if (status === BookingStatus.PENDING) return booking;
    if (status === BookingStatus.CANCELLED) return service.cancelBooking(customer, booking.id);

    const { booking: confirmed } = await service.confirmBooking(customer, booking.id);
    if (status === BookingStatus.CONFIRMED) return confirmed;
    return service.completeBooking(provider, booking.id);
  }

  beforeEach(() => {
    store = new DatabaseService({ filePath: '' });
    store.createCustomer({ id: 'cust-1', name: 'Casey', email: 'casey@example.com' });
    store.createCustomer({ id: 'cust-2', name: 'Robin', email: 'robin@example.com' });
    store.createProvider({ id: 'prov-1', name: 'Pat Pipes', email: 'pat@example.com', experienceYears: 6, isVerified: true });
    store.createProvider({ id: 'prov-2', name: 'Sam Sparks', email: 'sam@example.com', experienceYears: 3, isVerified: true });
    store.createOffering('prov-1', 'plumbing', 120);
    store.createOffering('prov-2', 'electrical', 90);
    homeId = store.createAddress({
      ownerId: 'cust-1',
      ownerRole: CallerRole.CUSTOMER,
      line: '2 Elm Street',
      city: 'Springfield',
      state: 'IL',
      postalCode: '62702',
      location: { latitude: 39.78, longitude: -89.65 }
    }).id;

    service = new BookingService(store, {
      slotGuard: false,
      now: () => new Date('2026-03-01T12:00:00.000Z')
    });
  });

  // ==========================================================================
  // CREATE
  // ==========================================================================

  describe('createBooking', () => {
    it('creates a pending, unrated booking for the caller', async () => {
      const booking = await service.createBooking(customer, request());

      expect(booking).toMatchObject({
        customerId: 'cust-1',
        providerId: 'prov-1',
        categoryId: 'plumbing',
        addressId: homeId,
        date: '2026-03-05',
        timeSlot: '09:00-11:00',
        status: BookingStatus.PENDING,
        rating: null
      });
      expect(store.getBooking(booking.id)).toEqual(booking);
    });

    it('accepts a booking for today', async () => {
      const booking = await service.createBooking(customer, request({ date: '2026-03-01' }));
      expect(booking.status).toBe(BookingStatus.PENDING);
    });

    it('rejects a date in the past', async () => {
      await expect(service.createBooking(customer, request({ date: '2026-02-28' }))).rejects.toMatchObject({
        code: ErrorCode.VALIDATION_DATE_INVALID
      });
    });

    it('rejects malformed input', async () => {
      await expect(service.createBooking(customer, request({ timeSlot: '11:00-09:00' })))
        .rejects.toBeInstanceOf(ValidationError);
      await expect(service.createBooking(customer, request({ date: '2026-02-30' })))
        .rejects.toBeInstanceOf(ValidationError);
    });

    it('only lets customers create bookings', async () => {
      const attempt = service.createBooking(provider, request());

      await expect(attempt).rejects.toBeInstanceOf(PreconditionError);
      await expect(service.createBooking(provider, request())).rejects.toMatchObject({
        reason: 'NOT_AUTHORIZED',
        statusCode: 403
      });
    });

    it('requires a registered customer', async () => {
      await expect(
        service.createBooking({ role: CallerRole.CUSTOMER, id: 'cust-ghost' }, request())
      ).rejects.toMatchObject({ code: ErrorCode.CUSTOMER_NOT_FOUND });
    });

    it('requires a known provider', async () => {
      await expect(service.createBooking(customer, request({ providerId: 'prov-ghost' })))
        .rejects.toMatchObject({ code: ErrorCode.PROVIDER_NOT_FOUND });
    });

    it('requires the provider to offer the category', async () => {
      await expect(service.createBooking(customer, request({ categoryId: 'electrical' })))
        .rejects.toBeInstanceOf(OfferingNotFoundError);
    });

    it('requires an address the caller owns', async () => {
      const theirs = store.createAddress({
        ownerId: 'cust-2',
        ownerRole: CallerRole.CUSTOMER,
        line: '3 Oak Street',
        city: 'Springfield',
        state: 'IL',
        postalCode: '62703',
        location: null
      });

      await expect(service.createBooking(customer, request({ addressId: theirs.id })))
        .rejects.toMatchObject({ code: ErrorCode.ADDRESS_NOT_FOUND });
    });

    it('allows overlapping bookings while the slot guard is off', async () => {
      await service.createBooking(customer, request());
      await service.createBooking(customer, request());

      expect(store.getBookingsByProvider('prov-1')).toHaveLength(2);
    });

    it('holds a slot while the slot guard is on, until the holder is cancelled', async () => {
      const guarded = new BookingService(store, {
        slotGuard: true,
        now: () => new Date('2026-03-01T12:00:00.000Z')
      });

      const first = await guarded.createBooking(customer, request());
      await expect(guarded.createBooking(customer, request())).rejects.toMatchObject({
        code: ErrorCode.BOOKING_SLOT_TAKEN
      });
      await expect(guarded.createBooking(customer, request())).rejects.toBeInstanceOf(ConflictError);

      await guarded.createBooking(customer, request({ timeSlot: '13:00-15:00' }));

      await guarded.cancelBooking(customer, first.id);
      const again = await guarded.createBooking(customer, request());
      expect(again.status).toBe(BookingStatus.PENDING);
    });
  });

  // ==========================================================================
  // CONFIRM
  // ==========================================================================

  describe('confirmBooking', () => {
    it('confirms and records one payment at the offering price', async () => {
      const booking = await service.createBooking(customer, request());

      const result = await service.confirmBooking(customer, booking.id, PaymentMethod.CARD);

      expect(result.booking.status).toBe(BookingStatus.CONFIRMED);
      expect(result.payment).toMatchObject({
        bookingId: booking.id,
        amount: 120,
        method: PaymentMethod.CARD,
        status: PaymentStatus.RECORDED
      });
      expect(result.payment.transactionId).toMatch(/^TXN-[0-9A-F]{16}$/);
      expect(store.getPaymentByBooking(booking.id)).toEqual(result.payment);
    });

    it('defaults to cash', async () => {
      const booking = await service.createBooking(customer, request());

      const { payment } = await service.confirmBooking(customer, booking.id);

      expect(payment.method).toBe(PaymentMethod.CASH);
    });

    it('only lets the owning customer confirm', async () => {
      const booking = await service.createBooking(customer, request());

      for (const caller of [provider, otherCustomer]) {
        await expect(service.confirmBooking(caller, booking.id)).rejects.toMatchObject({
          reason: 'NOT_AUTHORIZED'
        });
      }
      expect(store.getBooking(booking.id)?.status).toBe(BookingStatus.PENDING);
      expect(store.getPaymentByBooking(booking.id)).toBeUndefined();
    });

    it('fails from any state but pending', async () => {
      for (const status of [BookingStatus.CONFIRMED, BookingStatus.COMPLETED, BookingStatus.CANCELLED]) {
        const booking = await bookingIn(status);

        await expect(service.confirmBooking(customer, booking.id)).rejects.toMatchObject({
          reason: 'INVALID_STATE',
          code: ErrorCode.BOOKING_INVALID_STATE
        });
        expect(store.getBooking(booking.id)?.status).toBe(status);
      }
      expect(store.getStats().payments).toBe(2);
    });

    it('records exactly one payment when two confirms race', async () => {
      const booking = await service.createBooking(customer, request());

      const results = await Promise.allSettled([
        service.confirmBooking(customer, booking.id),
        service.confirmBooking(customer, booking.id)
      ]);

      expect(results.filter(r => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(rejected?.reason).toBeInstanceOf(PreconditionError);
      expect(store.getStats().payments).toBe(1);
    });

    it('leaves the booking pending when the offering has been withdrawn', async () => {
      const booking = await service.createBooking(customer, request());
      store.deleteOffering('prov-1', 'plumbing');

      await expect(service.confirmBooking(customer, booking.id)).rejects.toBeInstanceOf(OfferingNotFoundError);
      expect(store.getBooking(booking.id)?.status).toBe(BookingStatus.PENDING);
      expect(store.getPaymentByBooking(booking.id)).toBeUndefined();
    });

    it('rolls the status back when the payment cannot be recorded', async () => {
      const booking = await service.createBooking(customer, request());
      jest.spyOn(store, 'createPayment').mockImplementationOnce(() => {
        throw new Error('payment ledger unavailable');
      });

      await expect(service.confirmBooking(customer, booking.id)).rejects.toThrow('payment ledger unavailable');
      expect(store.getBooking(booking.id)?.status).toBe(BookingStatus.PENDING);

      const retried = await service.confirmBooking(customer, booking.id);
      expect(retried.booking.status).toBe(BookingStatus.CONFIRMED);
    });

    it('reports an unknown booking', async () => {
      await expect(service.confirmBooking(customer, 'missing')).rejects.toBeInstanceOf(BookingNotFoundError);
      await expect(service.confirmBooking(customer, 'missing')).rejects.toMatchObject({
        code: ErrorCode.BOOKING_NOT_FOUND
      });
    });
  });

  // ==========================================================================
  // CANCEL
  // ==========================================================================

  describe('cancelBooking', () => {
    it('lets the customer cancel a pending booking', async () => {
      const booking = await bookingIn(BookingStatus.PENDING);

      const cancelled = await service.cancelBooking(customer, booking.id);

      expect(cancelled.status).toBe(BookingStatus.CANCELLED);
    });

    it('lets the provider cancel a confirmed booking and keeps its payment', async () => {
      const booking = await bookingIn(BookingStatus.CONFIRMED);

      const cancelled = await service.cancelBooking(provider, booking.id);

      expect(cancelled.status).toBe(BookingStatus.CANCELLED);
      expect(store.getPaymentByBooking(booking.id)?.amount).toBe(120);
    });

    it('fails from completed and cancelled', async () => {
      for (const status of [BookingStatus.COMPLETED, BookingStatus.CANCELLED]) {
        const booking = await bookingIn(status);

        await expect(service.cancelBooking(customer, booking.id)).rejects.toMatchObject({
          reason: 'INVALID_STATE'
        });
        expect(store.getBooking(booking.id)?.status).toBe(status);
      }
    });

    it('rejects callers who do not own the booking', async () => {
      const booking = await bookingIn(BookingStatus.PENDING);

      for (const caller of [otherCustomer, otherProvider]) {
        await expect(service.cancelBooking(caller, booking.id)).rejects.toMatchObject({
          reason: 'NOT_AUTHORIZED'
        });
      }
      expect(store.getBooking(booking.id)?.status).toBe(BookingStatus.PENDING);
    });
  });

  // ==========================================================================
  // COMPLETE
  // ==========================================================================

  describe('completeBooking', () => {
    it('moves a confirmed booking to completed', async () => {
      const booking = await bookingIn(BookingStatus.CONFIRMED);

      const completed = await service.completeBooking(provider, booking.id);

      expect(completed.status).toBe(BookingStatus.COMPLETED);
    });

    it('succeeds only from confirmed', async () => {
      for (const status of [BookingStatus.PENDING, BookingStatus.COMPLETED, BookingStatus.CANCELLED]) {
        const booking = await bookingIn(status);

        await expect(service.completeBooking(provider, booking.id)).rejects.toMatchObject({
          reason: 'INVALID_STATE',
          statusCode: 409
        });
        expect(store.getBooking(booking.id)?.status).toBe(status);
      }
    });

    it('only lets the owning provider complete', async () => {
      const booking = await bookingIn(BookingStatus.CONFIRMED);

      for (const caller of [customer, otherProvider]) {
        await expect(service.completeBooking(caller, booking.id)).rejects.toMatchObject({
          reason: 'NOT_AUTHORIZED'
        });
      }
      expect(store.getBooking(booking.id)?.status).toBe(BookingStatus.CONFIRMED);
    });
  });

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  describe('queries', () => {
    it('shows a booking to its owners only', async () => {
      const booking = await bookingIn(BookingStatus.PENDING);

      await expect(service.getBooking(customer, booking.id)).resolves.toEqual(booking);
      await expect(service.getBooking(provider, booking.id)).resolves.toEqual(booking);
      await expect(service.getBooking(otherCustomer, booking.id)).rejects.toMatchObject({
        reason: 'NOT_AUTHORIZED'
      });
    });

    it('lists the caller bookings filtered by status', async () => {
      const pending = await bookingIn(BookingStatus.PENDING);
      const confirmed = await bookingIn(BookingStatus.CONFIRMED);

      const all = await service.listBookings(customer);
      expect(all.map(b => b.id).sort()).toEqual([pending.id, confirmed.id].sort());

      const onlyConfirmed = await service.listBookings(provider, BookingStatus.CONFIRMED);
      expect(onlyConfirmed.map(b => b.id)).toEqual([confirmed.id]);

      await expect(service.listBookings(otherCustomer)).resolves.toEqual([]);
    });

    it('returns the payment once the booking is confirmed', async () => {
      const booking = await bookingIn(BookingStatus.PENDING);

      await expect(service.getPayment(customer, booking.id)).rejects.toMatchObject({
        code: ErrorCode.PAYMENT_NOT_FOUND
      });

      await service.confirmBooking(customer, booking.id);
      const payment = await service.getPayment(provider, booking.id);
      expect(payment.amount).toBe(120);
    });
  });
});
