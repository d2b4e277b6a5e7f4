/**
 * =============================================================================
 * VALIDATION UTILITIES
 * =============================================================================
 *
 * Shared validation schemas and utilities.
 * Used across all modules for consistent validation.
 *
 * SECURITY:
 * - Strict schema validation
 * - Reject unknown fields
 * =============================================================================
 */

import { z } from 'zod';
import { Request, Response, NextFunction } from 'express';
import { ValidationError } from '../../core/errors/AppError';
import { BookingStatus, PaymentMethod } from '../../core/constants';

// ============================================================
// COMMON SCHEMAS
// ============================================================

/**
 * Identifier schema (uuid or seeded slug)
 */
export const idSchema = z.string().trim().min(1, 'Required').max(64);

/**
 * Coordinates schema
 */
export const coordinateSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180)
});

/**
 * Calendar date, YYYY-MM-DD
 */
export const dateSchema = z.string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD')
  .refine(val => {
    const parsed = new Date(`${val}T00:00:00.000Z`);
    return !isNaN(parsed.getTime()) && parsed.toISOString().startsWith(val);
  }, { message: 'Invalid calendar date' });

/**
 * Time slot, HH:MM-HH:MM with start before end
 */
export const timeSlotSchema = z.string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d-([01]\d|2[0-3]):[0-5]\d$/, 'Time slot must be HH:MM-HH:MM')
  .refine(val => {
    const [start, end] = val.split('-');
    return start < end;
  }, { message: 'Time slot must end after it starts' });

export const bookingStatusSchema = z.nativeEnum(BookingStatus);

export const paymentMethodSchema = z.nativeEnum(PaymentMethod);

/**
 * Positive price with at most 2 decimals
 */
export const priceRateSchema = z.number()
  .positive('Price must be positive')
  .max(1_000_000)
  .refine(val => Number(val.toFixed(2)) === val, { message: 'Price allows at most 2 decimals' });

export const idParamSchema = z.object({ id: idSchema });

// ============================================================
// VALIDATION MIDDLEWARE
// ============================================================

/**
 * Synchronous schema validation - validates data and returns parsed result
 * Throws ValidationError on failure
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @returns Validated and transformed data
 */
export function validateSchema<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return result.data;
}

/**
 * Request validation middleware
 * Validates request body against a Zod schema
 *
 * @param schema - Zod schema to validate against
 */
export function validateRequest<T extends z.ZodTypeAny>(schema: T) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      next(ValidationError.fromZodError(result.error));
      return;
    }

    // Replace body with validated data (includes transforms)
    req.body = result.data;
    next();
  };
}
