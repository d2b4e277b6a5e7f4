/**
 * =============================================================================
 * MATCHING MODULE - ROUTES
 * =============================================================================
 *
 * GET /matching?categoryId=plumbing&latitude=..&longitude=..&limit=5
 * GET /matching?categoryId=plumbing&addressId=..
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { matchingService } from './matching.service';
import { matchQuerySchema } from './matching.schema';
import { authMiddleware, requireCaller, roleGuard } from '../../shared/middleware/auth.middleware';
import { validateSchema } from '../../shared/utils/validation.utils';
import { CallerRole } from '../../core/constants';
import { ApiResponse } from '../../core/responses/ApiResponse';

const router = Router();

/**
 * @route   GET /matching
 * @desc    Ranked providers for a category, best first
 * @access  Customer only
 */
router.get(
  '/',
  authMiddleware,
  roleGuard([CallerRole.CUSTOMER]),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = validateSchema(matchQuerySchema, req.query);
      const customerLocation = query.latitude !== undefined && query.longitude !== undefined
        ? { latitude: query.latitude, longitude: query.longitude }
        : null;

      const result = await matchingService.rankProviders(
        {
          categoryId: query.categoryId,
          customerLocation,
          addressId: query.addressId,
          limit: query.limit
        },
        requireCaller(req)
      );

      ApiResponse.success(res, {
        categoryId: result.categoryId,
        categoryAvgPrice: result.categoryAvgPrice,
        located: result.customerLocation !== null,
        matches: result.matches.map(m => ({
          provider: m.provider,
          priceRate: m.priceRate,
          score: Math.round(m.score * 100) / 100,
          distanceKm: m.breakdown.distanceKm === null ? null : Math.round(m.breakdown.distanceKm * 100) / 100,
          breakdown: {
            rating: m.breakdown.rating,
            experience: m.breakdown.experience,
            price: m.breakdown.price,
            proximity: m.breakdown.proximity
          }
        }))
      }, undefined, { count: result.matches.length });
    } catch (error) {
      next(error);
    }
  }
);

export { router as matchingRouter };
