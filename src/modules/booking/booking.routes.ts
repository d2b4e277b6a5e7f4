/**
 * =============================================================================
 * BOOKING MODULE - ROUTES
 * =============================================================================
 *
 * Booking lifecycle endpoints. All routes require authentication.
 *
 * - POST /bookings               - Create (customer)
 * - GET  /bookings               - Caller's bookings
 * - GET  /bookings/:id           - Detail (either owner)
 * - POST /bookings/:id/confirm   - Confirm + record payment (customer)
 * - POST /bookings/:id/cancel    - Cancel (either owner)
 * - POST /bookings/:id/complete  - Complete (provider)
 * - GET  /bookings/:id/payment   - Payment record (either owner)
 *
 * Rating a completed booking lives in the rating module.
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { bookingService } from './booking.service';
import { authMiddleware, requireCaller, roleGuard } from '../../shared/middleware/auth.middleware';
import { idParamSchema, validateRequest, validateSchema } from '../../shared/utils/validation.utils';
import { createBookingSchema, confirmBookingSchema, listBookingsQuerySchema } from './booking.schema';
import { CallerRole } from '../../core/constants';
import { ApiResponse } from '../../core/responses/ApiResponse';

const router = Router();

router.use(authMiddleware);

/**
 * @route   POST /bookings
 * @desc    Create a pending booking
 * @access  Customer only
 */
router.post(
  '/',
  roleGuard([CallerRole.CUSTOMER]),
  validateRequest(createBookingSchema),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const booking = await bookingService.createBooking(requireCaller(req), req.body);
      ApiResponse.created(res, { booking }, 'Booking created');
    } catch (error) {
      next(error);
    }
  }
);

/**
 * @route   GET /bookings
 * @desc    Caller's bookings, newest first, optionally by status
 * @access  Customer or provider
 */
router.get('/', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { status } = validateSchema(listBookingsQuerySchema, req.query);
    const bookings = await bookingService.listBookings(requireCaller(req), status);
    ApiResponse.list(res, bookings);
  } catch (error) {
    next(error);
  }
});

/**
 * @route   GET /bookings/:id
 * @access  Owning customer or provider
 */
router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { id } = validateSchema(idParamSchema, req.params);
    const booking = await bookingService.getBooking(requireCaller(req), id);
    ApiResponse.success(res, { booking });
  } catch (error) {
    next(error);
  }
});

/**
 * @route   POST /bookings/:id/confirm
 * @desc    pending -> confirmed; records the payment at the offering price
 * @access  Owning customer
 */
router.post(
  '/:id/confirm',
  roleGuard([CallerRole.CUSTOMER]),
  validateRequest(confirmBookingSchema),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = validateSchema(idParamSchema, req.params);
      const { paymentMethod } = validateSchema(confirmBookingSchema, req.body);
      const result = await bookingService.confirmBooking(requireCaller(req), id, paymentMethod);
      ApiResponse.success(res, result, 'Booking confirmed');
    } catch (error) {
      next(error);
    }
  }
);

/**
 * @route   POST /bookings/:id/cancel
 * @access  Owning customer or provider
 */
router.post('/:id/cancel', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { id } = validateSchema(idParamSchema, req.params);
    const booking = await bookingService.cancelBooking(requireCaller(req), id);
    ApiResponse.success(res, { booking }, 'Booking cancelled');
  } catch (error) {
    next(error);
  }
});

/**
 * @route   POST /bookings/:id/complete
 * @access  Owning provider
 */
router.post(
  '/:id/complete',
  roleGuard([CallerRole.PROVIDER]),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = validateSchema(idParamSchema, req.params);
      const booking = await bookingService.completeBooking(requireCaller(req), id);
      ApiResponse.success(res, { booking }, 'Booking completed');
    } catch (error) {
      next(error);
    }
  }
);

/**
 * @route   GET /bookings/:id/payment
 * @access  Owning customer or provider
 */
router.get('/:id/payment', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { id } = validateSchema(idParamSchema, req.params);
    const payment = await bookingService.getPayment(requireCaller(req), id);
    ApiResponse.success(res, { payment });
  } catch (error) {
    next(error);
  }
});

export { router as bookingRouter };
