import { z } from 'zod';
import { idSchema, priceRateSchema } from '../../shared/utils/validation.utils';

// =============================================================================
// PROVIDER VALIDATION SCHEMAS
// =============================================================================

export const addOfferingSchema = z.object({
  categoryId: idSchema,
  priceRate: priceRateSchema
}).strict();

export const updateOfferingSchema = z.object({
  priceRate: priceRateSchema
}).strict();

export const setAvailabilitySchema = z.object({
  isAvailable: z.boolean()
}).strict();

export const categoryParamSchema = z.object({ categoryId: idSchema });

export type AddOfferingInput = z.infer<typeof addOfferingSchema>;
