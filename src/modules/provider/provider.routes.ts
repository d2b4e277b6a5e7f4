/**
 * =============================================================================
 * PROVIDER MODULE - ROUTES
 * =============================================================================
 *
 * - GET    /categories
 * - GET    /providers/me/offerings              (provider)
 * - POST   /providers/me/offerings              (provider)
 * - PATCH  /providers/me/offerings/:categoryId  (provider)
 * - DELETE /providers/me/offerings/:categoryId  (provider)
 * - PATCH  /providers/me/availability           (provider)
 * - GET    /providers/:id
 *
 * /providers/me routes are registered before /providers/:id.
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { providerService } from './provider.service';
import {
  addOfferingSchema,
  categoryParamSchema,
  setAvailabilitySchema,
  updateOfferingSchema
} from './provider.schema';
import { authMiddleware, requireCaller, roleGuard } from '../../shared/middleware/auth.middleware';
import { idParamSchema, validateRequest, validateSchema } from '../../shared/utils/validation.utils';
import { CallerRole } from '../../core/constants';
import { ApiResponse } from '../../core/responses/ApiResponse';

const router = Router();

router.use(authMiddleware);

const providerOnly = roleGuard([CallerRole.PROVIDER]);

router.get('/categories', async (_req: Request, res: Response, next: NextFunction) => {
  try {
    ApiResponse.list(res, await providerService.listCategories());
  } catch (error) {
    next(error);
  }
});

router.get('/providers/me/offerings', providerOnly, async (req: Request, res: Response, next: NextFunction) => {
  try {
    ApiResponse.list(res, await providerService.listOfferings(requireCaller(req).id));
  } catch (error) {
    next(error);
  }
});

router.post(
  '/providers/me/offerings',
  providerOnly,
  validateRequest(addOfferingSchema),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const offering = await providerService.addOffering(requireCaller(req).id, req.body);
      ApiResponse.created(res, { offering }, 'Offering added');
    } catch (error) {
      next(error);
    }
  }
);

router.patch(
  '/providers/me/offerings/:categoryId',
  providerOnly,
  validateRequest(updateOfferingSchema),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { categoryId } = validateSchema(categoryParamSchema, req.params);
      const { priceRate } = validateSchema(updateOfferingSchema, req.body);
      const offering = await providerService.updateOfferingPrice(requireCaller(req).id, categoryId, priceRate);
      ApiResponse.success(res, { offering }, 'Offering updated');
    } catch (error) {
      next(error);
    }
  }
);

router.delete(
  '/providers/me/offerings/:categoryId',
  providerOnly,
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { categoryId } = validateSchema(categoryParamSchema, req.params);
      await providerService.removeOffering(requireCaller(req).id, categoryId);
      ApiResponse.noContent(res);
    } catch (error) {
      next(error);
    }
  }
);

router.patch(
  '/providers/me/availability',
  providerOnly,
  validateRequest(setAvailabilitySchema),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { isAvailable } = validateSchema(setAvailabilitySchema, req.body);
      const provider = await providerService.setAvailability(requireCaller(req).id, isAvailable);
      ApiResponse.success(res, { provider });
    } catch (error) {
      next(error);
    }
  }
);

router.get('/providers/:id', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { id } = validateSchema(idParamSchema, req.params);
    ApiResponse.success(res, { provider: await providerService.getProvider(id) });
  } catch (error) {
    next(error);
  }
});

export { router as providerRouter };
