import { z } from 'zod';
import { RATING } from '../../core/constants';

// =============================================================================
// RATING VALIDATION SCHEMAS
// =============================================================================

/**
 * Sanitize user input: strip HTML tags, trim whitespace.
 * The comment is shown on the provider's public profile.
 */
export function sanitizeComment(input: string): string {
  return input
    .replace(/<[^>]*>/g, '')      // Strip HTML tags
    .replace(/[<>]/g, '')         // Remove any remaining angle brackets
    .trim();
}

/**
 * Rate a completed booking.
 */
export const rateBookingSchema = z.object({
  rating: z.number()
    .int('Rating must be a whole number')
    .min(RATING.MIN, `Minimum ${RATING.MIN} star`)
    .max(RATING.MAX, `Maximum ${RATING.MAX} stars`),
  comment: z.string()
    .max(RATING.COMMENT_MAX_LENGTH, `Comment must be ${RATING.COMMENT_MAX_LENGTH} characters or less`)
    .transform(sanitizeComment)
    .optional()
    .nullable()
}).strict();

export type RateBookingInput = z.input<typeof rateBookingSchema>;

/**
 * Cached provider rating summary
 */
export const ratingSummarySchema = z.object({
  providerId: z.string(),
  averageRating: z.number().nullable(),
  totalRatings: z.number().int(),
  distribution: z.record(z.string(), z.number().int())
});

export type RatingSummary = z.infer<typeof ratingSummarySchema>;
