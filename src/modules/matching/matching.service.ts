/**
 * =============================================================================
 * MATCHING MODULE - SERVICE
 * =============================================================================
 *
 * Ranks the providers that can serve a category request.
 *
 * FLOW:
 * 1. Offerings for the category (none -> empty result)
 * 2. Distinct providers behind them, available AND verified only
 * 3. Category average price over the offerings from step 1, once per call
 * 4. Score each provider against its own registered location
 * 5. Sort by score desc, provider id asc on ties; truncate to limit
 *
 * Read-only: concurrent match requests never contend.
 * =============================================================================
 */

import { db } from '../../shared/database/db';
import type {
  AddressStore,
  CatalogStore,
  Coordinate,
  ProviderProfile,
  ProviderStore
} from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { config } from '../../config/environment';
import { ErrorCode } from '../../core/constants';
import { NotFoundError, ValidationError } from '../../core/errors/AppError';
import { isValidCoordinate } from '../../shared/utils/geospatial.utils';
import type { CallerContext } from '../../shared/middleware/auth.middleware';
import { scoreBreakdown, ScoreBreakdown, ScoringCandidate } from './provider-scoring';

export type MatchingStore = CatalogStore & ProviderStore & AddressStore;

export interface RankedProvider {
  provider: ProviderProfile;
  priceRate: number;
  score: number;
  breakdown: ScoreBreakdown;
}

export interface MatchRequest {
  categoryId: string;
  customerLocation?: Coordinate | null;
  /** Stored customer address to match from, instead of raw coordinates */
  addressId?: string;
  limit?: number;
}

export interface MatchResult {
  categoryId: string;
  categoryAvgPrice: number;
  customerLocation: Coordinate | null;
  matches: RankedProvider[];
}

export class MatchingService {
  constructor(
    private readonly store: MatchingStore,
    private readonly limits: { defaultLimit: number; maxLimit: number } = config.matching
  ) {}

  /**
   * Ranked provider profiles for a category, best first
   */
  async findMatches(
    categoryId: string,
    customerLocation?: Coordinate | null,
    limit: number = this.limits.defaultLimit
  ): Promise<ProviderProfile[]> {
    const result = await this.rankProviders({ categoryId, customerLocation, limit });
    return result.matches.map(m => m.provider);
  }

  /**
   * Same ordering as findMatches, with scores and the component breakdown.
   * A caller passing `addressId` must own that address.
   */
  async rankProviders(request: MatchRequest, caller?: CallerContext): Promise<MatchResult> {
    const categoryId = request.categoryId.trim();
    if (!categoryId) {
      throw new ValidationError('categoryId: Required', [{ field: 'categoryId', message: 'Required' }]);
    }

    const limit = this.resolveLimit(request.limit);
    const customerLocation = this.resolveCustomerLocation(request, caller);

    if (!this.store.getCategoryById(categoryId)) {
      throw new NotFoundError(`Category not found: ${categoryId}`, ErrorCode.CATEGORY_NOT_FOUND, { categoryId });
    }

    const empty: MatchResult = { categoryId, categoryAvgPrice: 0, customerLocation, matches: [] };

    // 1. Offerings
    const offerings = this.store.getOfferingsByCategory(categoryId);
    if (offerings.length === 0) {
      logger.debug('[MATCHING] No offerings for category', { categoryId });
      return empty;
    }

    // 2. Eligible providers
    const priceByProvider = new Map(offerings.map(o => [o.providerId, o.priceRate]));
    const providers = this.store.getProvidersByIds(
      [...priceByProvider.keys()],
      { isAvailable: true, isVerified: true }
    );
    if (providers.length === 0) {
      logger.debug('[MATCHING] No eligible providers for category', { categoryId, offerings: offerings.length });
      return empty;
    }

    // 3. Category average over every offering, eligible or not
    const categoryAvgPrice = offerings.reduce((sum, o) => sum + o.priceRate, 0) / offerings.length;

    // 4. Score
    const context = { categoryId, customerLocation };
    const ranked: RankedProvider[] = providers.map(provider => {
      const priceRate = priceByProvider.get(provider.id) ?? 0;
      const candidate: ScoringCandidate = { provider, priceRate };
      const breakdown = scoreBreakdown(candidate, context, categoryAvgPrice);
      return { provider, priceRate, score: breakdown.total, breakdown };
    });

    // 5. Order and truncate
    ranked.sort(compareRanked);
    const matches = ranked.slice(0, limit);

    logger.info('[MATCHING] Providers ranked', {
      categoryId,
      eligible: ranked.length,
      returned: matches.length,
      located: customerLocation !== null
    });

    return { categoryId, categoryAvgPrice, customerLocation, matches };
  }

  private resolveLimit(limit: number | undefined): number {
    const value = limit ?? this.limits.defaultLimit;
    if (!Number.isInteger(value) || value < 1 || value > this.limits.maxLimit) {
      throw new ValidationError(
        `limit: Must be an integer between 1 and ${this.limits.maxLimit}`,
        [{ field: 'limit', message: `Must be an integer between 1 and ${this.limits.maxLimit}` }]
      );
    }
    return value;
  }

  private resolveCustomerLocation(request: MatchRequest, caller?: CallerContext): Coordinate | null {
    if (request.customerLocation) {
      if (!isValidCoordinate(request.customerLocation)) {
        throw new ValidationError(
          'customerLocation: Coordinates out of range',
          [{ field: 'customerLocation', message: 'Coordinates out of range' }],
          ErrorCode.VALIDATION_LOCATION_INVALID
        );
      }
      return { ...request.customerLocation };
    }

    if (!request.addressId) {
      return null;
    }

    const address = this.store.getAddressById(request.addressId);
    const visible = address && (
      !caller || (address.ownerId === caller.id && address.ownerRole === caller.role)
    );
    if (!address || !visible) {
      throw new NotFoundError(
        `Address not found: ${request.addressId}`,
        ErrorCode.ADDRESS_NOT_FOUND,
        { addressId: request.addressId }
      );
    }

    // An address that never geocoded matches without proximity
    return address.location;
  }
}

function compareRanked(a: RankedProvider, b: RankedProvider): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.provider.id === b.provider.id) return 0;
  return a.provider.id < b.provider.id ? -1 : 1;
}

export const matchingService = new MatchingService(db);
