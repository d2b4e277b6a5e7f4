/**
 * Ratings: one per completed booking, average recompute and rollback
 */

jest.mock('../shared/services/logger.service', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
  logError: jest.fn()
}));

import { DatabaseService } from '../shared/database/db';
import { RedisService } from '../shared/services/redis.service';
import { BookingService } from '../modules/booking/booking.service';
import { averageOf, RatingService } from '../modules/rating/rating.service';
import { sanitizeComment } from '../modules/rating/rating.schema';
import { BookingStatus, CallerRole, ErrorCode } from '../core/constants';
import { DependencyError, PreconditionError, ValidationError } from '../core/errors/AppError';

const customer = { role: CallerRole.CUSTOMER, id: 'cust-1' };
const provider = { role: CallerRole.PROVIDER, id: 'prov-1' };

describe('averageOf', () => {
  it('rounds to two decimals', () => {
    expect(averageOf([5, 4, 4])).toBe(4.33);
    expect(averageOf([5, 5, 4])).toBe(4.67);
    expect(averageOf([3])).toBe(3);
  });

  it('is null with no ratings', () => {
    expect(averageOf([])).toBeNull();
  });
});

describe('sanitizeComment', () => {
  it('strips markup and surrounding whitespace', () => {
    expect(sanitizeComment('  <b>Great</b> job <script>x</script> ')).toBe('Great job x');
    expect(sanitizeComment('fast > slow')).toBe('fast  slow');
  });
});

describe('RatingService', () => {
  let store: DatabaseService;
  let kv: RedisService;
  let bookings: BookingService;
  let ratings: RatingService;
  let homeId: string;

  async function completedBooking(): Promise<string> {
    const booking = await bookings.createBooking(customer, {
      providerId: 'prov-1',
      categoryId: 'cleaning',
      addressId: homeId,
      date: '2026-04-10',
      timeSlot: '14:00-16:00'
    });
    await bookings.confirmBooking(customer, booking.id);
    await bookings.completeBooking(provider, booking.id);
    return booking.id;
  }

  beforeEach(() => {
    store = new DatabaseService({ filePath: '' });
    store.createCustomer({ id: 'cust-1', name: 'Casey', email: 'casey@example.com' });
    store.createProvider({ id: 'prov-1', name: 'Tidy Tam', email: 'tam@example.com', experienceYears: 2, isVerified: true });
    store.createOffering('prov-1', 'cleaning', 60);
    homeId = store.createAddress({
      ownerId: 'cust-1',
      ownerRole: CallerRole.CUSTOMER,
      line: '2 Elm Street',
      city: 'Springfield',
      state: 'IL',
      postalCode: '62702',
      location: null
    }).id;

    kv = new RedisService();
    bookings = new BookingService(store, { slotGuard: false, now: () => new Date('2026-04-01T08:00:00.000Z') });
    ratings = new RatingService(store, kv, {
      lockTtlSeconds: 5,
      lockRetries: 5,
      lockRetryDelayMs: 1,
      summaryCacheTtlSeconds: 60
    });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await kv.disconnect();
  });

  describe('rateBooking', () => {
    it('records the rating and recomputes the provider average', async () => {
      const ids = [await completedBooking(), await completedBooking(), await completedBooking()];

      await ratings.rateBooking(customer, ids[0], { rating: 5 });
      await ratings.rateBooking(customer, ids[1], { rating: 4 });
      const result = await ratings.rateBooking(customer, ids[2], { rating: 4, comment: ' Spotless ' });

      expect(result.providerAverageRating).toBe(4.33);
      expect(result.totalRatings).toBe(3);
      expect(result.booking).toMatchObject({ rating: 4, ratingComment: 'Spotless' });
      expect(result.booking.ratedAt).not.toBeNull();
      expect(store.getProviderById('prov-1')?.averageRating).toBe(4.33);
    });

    it('stores an empty comment as null', async () => {
      const id = await completedBooking();

      const result = await ratings.rateBooking(customer, id, { rating: 3, comment: '<br>' });

      expect(result.booking.ratingComment).toBeNull();
    });

    it('rejects a second rating and leaves the average unchanged', async () => {
      const id = await completedBooking();
      await ratings.rateBooking(customer, id, { rating: 2 });

      await expect(ratings.rateBooking(customer, id, { rating: 5 })).rejects.toMatchObject({
        reason: 'ALREADY_RATED',
        code: ErrorCode.BOOKING_ALREADY_RATED
      });
      expect(store.getBooking(id)?.rating).toBe(2);
      expect(store.getProviderById('prov-1')?.averageRating).toBe(2);
    });

    it('rejects bookings that are not completed', async () => {
      const booking = await bookings.createBooking(customer, {
        providerId: 'prov-1',
        categoryId: 'cleaning',
        addressId: homeId,
        date: '2026-04-10',
        timeSlot: '14:00-16:00'
      });

      await expect(ratings.rateBooking(customer, booking.id, { rating: 5 })).rejects.toMatchObject({
        reason: 'INVALID_STATE'
      });

      await bookings.confirmBooking(customer, booking.id);
      await expect(ratings.rateBooking(customer, booking.id, { rating: 5 })).rejects.toMatchObject({
        reason: 'INVALID_STATE'
      });
      expect(store.getBooking(booking.id)?.status).toBe(BookingStatus.CONFIRMED);
    });

    it('only lets the owning customer rate', async () => {
      const id = await completedBooking();

      await expect(ratings.rateBooking(provider, id, { rating: 5 })).rejects.toBeInstanceOf(PreconditionError);
      await expect(
        ratings.rateBooking({ role: CallerRole.CUSTOMER, id: 'cust-2' }, id, { rating: 5 })
      ).rejects.toMatchObject({ reason: 'NOT_AUTHORIZED' });
      expect(store.getBooking(id)?.rating).toBeNull();
    });

    it('rejects ratings outside whole 1..5 stars', async () => {
      const id = await completedBooking();

      for (const rating of [0, 6, 3.5]) {
        await expect(ratings.rateBooking(customer, id, { rating })).rejects.toBeInstanceOf(ValidationError);
      }
      expect(store.getBooking(id)?.rating).toBeNull();
    });

    it('reports an unknown booking', async () => {
      await expect(ratings.rateBooking(customer, 'missing', { rating: 4 })).rejects.toMatchObject({
        code: ErrorCode.BOOKING_NOT_FOUND
      });
    });

    it('rolls the rating back when the average cannot be written', async () => {
      const id = await completedBooking();
      jest.spyOn(store, 'updateProviderRating').mockImplementationOnce(() => {
        throw new DependencyError('store unavailable');
      });

      await expect(ratings.rateBooking(customer, id, { rating: 5 })).rejects.toBeInstanceOf(DependencyError);
      expect(store.getBooking(id)?.rating).toBeNull();
      expect(store.getProviderById('prov-1')?.averageRating).toBeNull();

      const retried = await ratings.rateBooking(customer, id, { rating: 5 });
      expect(retried.providerAverageRating).toBe(5);
    });

    it('serializes concurrent ratings for the same provider', async () => {
      const first = await completedBooking();
      const second = await completedBooking();

      await Promise.all([
        ratings.rateBooking(customer, first, { rating: 5 }),
        ratings.rateBooking(customer, second, { rating: 3 })
      ]);

      expect(store.getProviderById('prov-1')?.averageRating).toBe(4);
    });

    it('gives up when the provider lock stays taken', async () => {
      const id = await completedBooking();
      await kv.acquireLock('rating:provider:prov-1', 'someone-else', 30);

      await expect(ratings.rateBooking(customer, id, { rating: 5 })).rejects.toMatchObject({
        code: ErrorCode.LOCK_NOT_ACQUIRED
      });
      expect(store.getBooking(id)?.rating).toBeNull();
    });
  });

  describe('getRatingSummary', () => {
    it('reports average, count and distribution', async () => {
      for (const stars of [5, 4, 4]) {
        await ratings.rateBooking(customer, await completedBooking(), { rating: stars });
      }

      const summary = await ratings.getRatingSummary('prov-1');

      expect(summary).toEqual({
        providerId: 'prov-1',
        averageRating: 4.33,
        totalRatings: 3,
        distribution: { '1': 0, '2': 0, '3': 0, '4': 2, '5': 1 }
      });
    });

    it('serves from cache until a new rating invalidates it', async () => {
      await ratings.rateBooking(customer, await completedBooking(), { rating: 5 });
      const before = await ratings.getRatingSummary('prov-1');
      expect(before.totalRatings).toBe(1);

      store.updateProviderRating('prov-1', 1);
      await expect(ratings.getRatingSummary('prov-1')).resolves.toEqual(before);

      await ratings.rateBooking(customer, await completedBooking(), { rating: 3 });
      const after = await ratings.getRatingSummary('prov-1');
      expect(after.totalRatings).toBe(2);
      expect(after.averageRating).toBe(4);
    });

    it('rejects an unknown provider', async () => {
      await expect(ratings.getRatingSummary('prov-ghost')).rejects.toMatchObject({
        code: ErrorCode.PROVIDER_NOT_FOUND
      });
    });
  });
});
