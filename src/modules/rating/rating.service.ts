import { v4 as uuidv4 } from 'uuid';
import { db } from '../../shared/database/db';
import type { BookingRecord, MarketplaceStore } from '../../shared/database/repository.interface';
import { redisService, RedisService } from '../../shared/services/redis.service';
import { logger } from '../../shared/services/logger.service';
import { config } from '../../config/environment';
import { BookingStatus, ErrorCode, RATING } from '../../core/constants';
import { BookingNotFoundError, NotFoundError, PreconditionError } from '../../core/errors/AppError';
import type { CallerContext } from '../../shared/middleware/auth.middleware';
import { validateSchema } from '../../shared/utils/validation.utils';
import { isOwningCustomer } from '../booking/booking.service';
import { rateBookingSchema, ratingSummarySchema, RateBookingInput, RatingSummary } from './rating.schema';

// =============================================================================
// REDIS KEYS
// =============================================================================
const PROVIDER_RATING_LOCK = (providerId: string) => `rating:provider:${providerId}`;
const PROVIDER_RATING_SUMMARY_KEY = (providerId: string) => `provider:rating:summary:${providerId}`;

export interface RatingServiceOptions {
  lockTtlSeconds: number;
  lockRetries: number;
  lockRetryDelayMs: number;
  summaryCacheTtlSeconds: number;
}

export interface RatedBooking {
  booking: BookingRecord;
  providerAverageRating: number | null;
  totalRatings: number;
}

/**
 * Arithmetic mean rounded to RATING.AVERAGE_PRECISION decimals; null when empty
 */
export function averageOf(ratings: number[]): number | null {
  if (ratings.length === 0) return null;
  const factor = 10 ** RATING.AVERAGE_PRECISION;
  const mean = ratings.reduce((sum, r) => sum + r, 0) / ratings.length;
  return Math.round(mean * factor) / factor;
}

// =============================================================================
// RATING SERVICE
// =============================================================================

export class RatingService {
  private readonly options: RatingServiceOptions;

  constructor(
    private readonly store: MarketplaceStore,
    private readonly kv: RedisService,
    options: Partial<RatingServiceOptions> = {}
  ) {
    this.options = { ...config.rating, ...options };
  }

  /**
   * Record the one rating of a completed booking and recompute the
   * provider's average from every completed, rated booking.
   *
   * ATOMICITY: the rating write and the recompute share one store
   * transaction, so a failed recompute leaves the booking unrated.
   * CONCURRENCY: ratings for the same provider serialize on a per-provider
   * lock; the rating write itself only lands while the rating is still null.
   */
  async rateBooking(caller: CallerContext, bookingId: string, input: RateBookingInput): Promise<RatedBooking> {
    const { rating, comment } = validateSchema(rateBookingSchema, input);

    const booking = this.store.getBooking(bookingId);
    if (!booking) {
      throw new BookingNotFoundError(bookingId);
    }
    if (!isOwningCustomer(caller, booking)) {
      throw PreconditionError.notAuthorized(bookingId, 'rate');
    }
    if (booking.status !== BookingStatus.COMPLETED) {
      throw PreconditionError.invalidState(booking, 'rate');
    }
    if (booking.rating !== null) {
      throw PreconditionError.alreadyRated(bookingId);
    }

    const providerId = booking.providerId;

    const result = await this.kv.withLock(
      PROVIDER_RATING_LOCK(providerId),
      uuidv4(),
      this.options.lockTtlSeconds,
      async () => this.store.transaction(() => {
        if (!this.store.setBookingRating(bookingId, rating, comment || null)) {
          // Lost a race for this booking
          throw PreconditionError.alreadyRated(bookingId);
        }

        const rated = this.store.getCompletedRatedBookingsForProvider(providerId);
        const average = averageOf(rated.flatMap(b => (b.rating === null ? [] : [b.rating])));

        if (!this.store.updateProviderRating(providerId, average)) {
          throw new NotFoundError(`Provider not found: ${providerId}`, ErrorCode.PROVIDER_NOT_FOUND, { providerId });
        }

        return { average, count: rated.length };
      }),
      { retries: this.options.lockRetries, retryDelayMs: this.options.lockRetryDelayMs }
    );

    // Cache invalidation is best-effort; the store is the source of truth
    try {
      await this.kv.del(PROVIDER_RATING_SUMMARY_KEY(providerId));
    } catch (cacheError: unknown) {
      logger.warn('[RATING] Summary cache invalidation failed', {
        providerId,
        error: cacheError instanceof Error ? cacheError.message : String(cacheError)
      });
    }

    logger.info('[RATING] Rating submitted', {
      bookingId,
      customerId: caller.id,
      providerId,
      rating,
      newAverage: result.average,
      totalRatings: result.count
    });

    const updated = this.store.getBooking(bookingId);
    if (!updated) {
      throw new BookingNotFoundError(bookingId);
    }

    return {
      booking: updated,
      providerAverageRating: result.average,
      totalRatings: result.count
    };
  }

  /**
   * Average, count and 1-5 distribution for a provider (cached)
   */
  async getRatingSummary(providerId: string): Promise<RatingSummary> {
    const key = PROVIDER_RATING_SUMMARY_KEY(providerId);

    try {
      const cached = await this.kv.getJSON(key, ratingSummarySchema);
      if (cached) return cached;
    } catch (cacheError: unknown) {
      logger.warn('[RATING] Summary cache read failed', {
        providerId,
        error: cacheError instanceof Error ? cacheError.message : String(cacheError)
      });
    }

    const provider = this.store.getProviderById(providerId);
    if (!provider) {
      throw new NotFoundError(`Provider not found: ${providerId}`, ErrorCode.PROVIDER_NOT_FOUND, { providerId });
    }

    const distribution: Record<string, number> = {};
    for (let stars = RATING.MIN; stars <= RATING.MAX; stars++) {
      distribution[String(stars)] = 0;
    }

    const ratings = this.store
      .getCompletedRatedBookingsForProvider(providerId)
      .flatMap(b => (b.rating === null ? [] : [b.rating]));
    for (const r of ratings) {
      distribution[String(r)] = (distribution[String(r)] ?? 0) + 1;
    }

    const summary: RatingSummary = {
      providerId,
      averageRating: provider.averageRating,
      totalRatings: ratings.length,
      distribution
    };

    try {
      await this.kv.setJSON(key, summary, this.options.summaryCacheTtlSeconds);
    } catch (cacheError: unknown) {
      logger.warn('[RATING] Summary cache write failed', {
        providerId,
        error: cacheError instanceof Error ? cacheError.message : String(cacheError)
      });
    }

    return summary;
  }
}

export const ratingService = new RatingService(db, redisService);
