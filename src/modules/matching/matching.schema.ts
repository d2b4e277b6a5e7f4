import { z } from 'zod';
import { idSchema } from '../../shared/utils/validation.utils';

// =============================================================================
// MATCHING VALIDATION SCHEMAS
// =============================================================================

/**
 * Numeric query value. A blank value is rejected rather than read as 0.
 */
const queryNumber = <T extends z.ZodTypeAny>(schema: T) =>
  z.string().trim().min(1, 'Must not be empty').pipe(schema);

/**
 * GET /matching query. Latitude and longitude come as a pair; addressId is
 * the alternative to raw coordinates.
 */
export const matchQuerySchema = z.object({
  categoryId: idSchema,
  latitude: queryNumber(z.coerce.number().min(-90).max(90)).optional(),
  longitude: queryNumber(z.coerce.number().min(-180).max(180)).optional(),
  addressId: idSchema.optional(),
  limit: queryNumber(z.coerce.number().int().min(1)).optional()
})
  .refine(q => (q.latitude === undefined) === (q.longitude === undefined), {
    message: 'latitude and longitude must be given together',
    path: ['latitude']
  })
  .refine(q => !(q.latitude !== undefined && q.addressId !== undefined), {
    message: 'Give either coordinates or addressId, not both',
    path: ['addressId']
  });

export type MatchQuery = z.infer<typeof matchQuerySchema>;
