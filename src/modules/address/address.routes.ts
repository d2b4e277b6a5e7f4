import { Router, Request, Response, NextFunction } from 'express';
import { addressService } from './address.service';
import { createAddressSchema } from './address.schema';
import { authMiddleware, requireCaller } from '../../shared/middleware/auth.middleware';
import { validateRequest } from '../../shared/utils/validation.utils';
import { ApiResponse } from '../../core/responses/ApiResponse';

const router = Router();

router.use(authMiddleware);

/**
 * @route   POST /addresses
 * @desc    Register an address for the caller (geocoded when no coordinates)
 */
router.post(
  '/',
  validateRequest(createAddressSchema),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const address = await addressService.createAddress(requireCaller(req), req.body);
      ApiResponse.created(res, { address }, 'Address saved');
    } catch (error) {
      next(error);
    }
  }
);

/**
 * @route   GET /addresses
 * @desc    Caller's addresses
 */
router.get('/', async (req: Request, res: Response, next: NextFunction) => {
  try {
    ApiResponse.list(res, await addressService.listAddresses(requireCaller(req)));
  } catch (error) {
    next(error);
  }
});

export { router as addressRouter };
