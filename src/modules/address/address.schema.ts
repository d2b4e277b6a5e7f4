import { z } from 'zod';
import { coordinateSchema } from '../../shared/utils/validation.utils';

// =============================================================================
// ADDRESS VALIDATION SCHEMAS
// =============================================================================

/**
 * New address. Coordinates are optional; without them the address is
 * geocoded, and stays unlocated if that fails.
 */
export const createAddressSchema = z.object({
  line: z.string().trim().min(1, 'Street address is required').max(500),
  city: z.string().trim().min(1, 'City is required').max(100),
  state: z.string().trim().min(1, 'State is required').max(100),
  postalCode: z.string().trim().min(1, 'Postal code is required').max(20),
  location: coordinateSchema.optional()
}).strict();

export type CreateAddressInput = z.infer<typeof createAddressSchema>;
