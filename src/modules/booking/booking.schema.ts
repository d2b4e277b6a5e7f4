/**
 * =============================================================================
 * BOOKING MODULE - VALIDATION SCHEMAS
 * =============================================================================
 *
 * A booking names a provider, a category the provider offers, one of the
 * customer's own addresses, a date and a time slot. The customer comes from
 * the caller, never from the body.
 * =============================================================================
 */

import { z } from 'zod';
import {
  idSchema,
  dateSchema,
  timeSlotSchema,
  bookingStatusSchema,
  paymentMethodSchema
} from '../../shared/utils/validation.utils';
import { PaymentMethod } from '../../core/constants';

/**
 * Create booking request
 */
export const createBookingSchema = z.object({
  providerId: idSchema,
  categoryId: idSchema,
  addressId: idSchema,
  date: dateSchema,
  timeSlot: timeSlotSchema
}).strict();

/**
 * Confirm booking request. The amount always comes from the offering.
 */
export const confirmBookingSchema = z.object({
  paymentMethod: paymentMethodSchema.default(PaymentMethod.CASH)
}).strict();

/**
 * Booking list query
 */
export const listBookingsQuerySchema = z.object({
  status: bookingStatusSchema.optional()
});

export type CreateBookingInput = z.infer<typeof createBookingSchema>;
export type ConfirmBookingInput = z.infer<typeof confirmBookingSchema>;
export type ListBookingsQuery = z.infer<typeof listBookingsQuerySchema>;
