/**
 * =============================================================================
 * MATCHING MODULE - PROVIDER SCORING
 * =============================================================================
 *
 * Fitness score of one provider for one match request. Four additive parts:
 *
 *   rating      (averageRating / 5) * 40, or 20 when unrated
 *   experience  min(30, years * 3)
 *   price       ratio r = price / categoryAvgPrice
 *                 r < 1  -> 30 * (1 - r/2)
 *                 r >= 1 -> max(0, 30 * (2 - r))
 *   proximity   +15 under 5 km, +10 under 10 km, +5 under 20 km
 *
 * The total is open-ended: with every part at its peak it reaches 115.
 * Pure functions, no I/O.
 * =============================================================================
 */

import { PROXIMITY_BONUS_STEPS, SCORING } from '../../core/constants';
import { distanceKm } from '../../shared/utils/geospatial.utils';
import type { Coordinate, ProviderProfile } from '../../shared/database/repository.interface';

/**
 * A provider in the scoring pool, with its price for the requested category
 * (null when it has no offering there)
 */
export interface ScoringCandidate {
  provider: ProviderProfile;
  priceRate: number | null;
}

export interface RequestContext {
  categoryId: string;
  customerLocation: Coordinate | null;
}

export interface ScoreBreakdown {
  rating: number;
  experience: number;
  price: number;
  proximity: number;
  total: number;
  /** Null when either location is unknown */
  distanceKm: number | null;
}

export function ratingComponent(averageRating: number | null): number {
  if (averageRating === null) {
    return SCORING.UNRATED_SCORE;
  }
  return (averageRating / SCORING.MAX_RATING_VALUE) * SCORING.RATING_MAX;
}

export function experienceComponent(experienceYears: number): number {
  return Math.min(SCORING.EXPERIENCE_MAX, experienceYears * SCORING.EXPERIENCE_PER_YEAR);
}

export function priceComponent(priceRate: number | null, categoryAvgPrice: number): number {
  if (priceRate === null || !(categoryAvgPrice > 0)) {
    return 0;
  }

  const ratio = priceRate / categoryAvgPrice;
  if (ratio < 1) {
    return SCORING.PRICE_MAX * (1 - ratio / 2);
  }
  return Math.max(0, SCORING.PRICE_MAX * (2 - ratio));
}

export function proximityBonus(km: number | null): number {
  if (km === null) {
    return 0;
  }
  const step = PROXIMITY_BONUS_STEPS.find(s => km < s.maxKm);
  return step ? step.bonus : 0;
}

/**
 * Per-component score for one candidate
 */
export function scoreBreakdown(
  candidate: ScoringCandidate,
  context: RequestContext,
  categoryAvgPrice: number
): ScoreBreakdown {
  const { provider, priceRate } = candidate;

  const km = provider.location && context.customerLocation
    ? distanceKm(context.customerLocation, provider.location)
    : null;

  const rating = ratingComponent(provider.averageRating);
  const experience = experienceComponent(provider.experienceYears);
  const price = priceComponent(priceRate, categoryAvgPrice);
  const proximity = proximityBonus(km);

  return {
    rating,
    experience,
    price,
    proximity,
    total: rating + experience + price + proximity,
    distanceKm: km
  };
}

export function score(
  candidate: ScoringCandidate,
  context: RequestContext,
  categoryAvgPrice: number
): number {
  return scoreBreakdown(candidate, context, categoryAvgPrice).total;
}
