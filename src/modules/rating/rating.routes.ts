import { Router, Request, Response, NextFunction } from 'express';
import { ratingService } from './rating.service';
import { rateBookingSchema } from './rating.schema';
import { authMiddleware, requireCaller, roleGuard } from '../../shared/middleware/auth.middleware';
import { idParamSchema, validateRequest, validateSchema } from '../../shared/utils/validation.utils';
import { AppError, RateLimitError } from '../../core/errors/AppError';
import { CallerRole, RATE_LIMITS } from '../../core/constants';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { logger } from '../../shared/services/logger.service';
import { redisService } from '../../shared/services/redis.service';

const router = Router();

// All rating routes require authentication
router.use(authMiddleware);

// =============================================================================
// RATE LIMITER: Max 10 rating submissions per minute per customer
// Redis-backed across instances. Lets the request through if Redis is down.
// =============================================================================
export async function ratingRateLimit(customerId: string): Promise<void> {
  try {
    const result = await redisService.checkRateLimit(
      `ratelimit:rating:${customerId}`,
      RATE_LIMITS.RATING.max,
      RATE_LIMITS.RATING.windowSeconds
    );
    if (!result.allowed) {
      throw new RateLimitError('Too many rating submissions. Please try again later.', result.resetIn);
    }
  } catch (error: unknown) {
    if (error instanceof AppError) throw error;
    logger.warn('[RATING] Rate limiter Redis error, allowing request', {
      error: error instanceof Error ? error.message : String(error)
    });
  }
}

// =============================================================================
// POST /api/v1/bookings/:id/rating - Rate a completed booking
// Role: Owning customer
// =============================================================================
router.post(
  '/bookings/:id/rating',
  roleGuard([CallerRole.CUSTOMER]),
  validateRequest(rateBookingSchema),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = requireCaller(req);
      const { id } = validateSchema(idParamSchema, req.params);

      await ratingRateLimit(caller.id);

      const result = await ratingService.rateBooking(caller, id, req.body);
      ApiResponse.created(res, result, 'Thank you for your feedback!');
    } catch (error) {
      next(error);
    }
  }
);

// =============================================================================
// GET /api/v1/providers/:id/ratings - Average, count and distribution
// =============================================================================
router.get('/providers/:id/ratings', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { id } = validateSchema(idParamSchema, req.params);
    const summary = await ratingService.getRatingSummary(id);
    ApiResponse.success(res, summary);
  } catch (error) {
    next(error);
  }
});

export { router as ratingRouter };
