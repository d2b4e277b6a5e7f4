/**
 * =============================================================================
 * PROVIDER MODULE - SERVICE
 * =============================================================================
 *
 * Service catalog and provider self-administration:
 * - Categories (seeded reference data, read-only)
 * - Offerings: one price per (provider, category)
 * - Availability toggle (unavailable providers drop out of matching)
 * =============================================================================
 */

import { db } from '../../shared/database/db';
import type {
  CatalogStore,
  CategoryRecord,
  OfferingRecord,
  ProviderProfile,
  ProviderRecord,
  ProviderStore
} from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { ErrorCode } from '../../core/constants';
import { NotFoundError, OfferingNotFoundError } from '../../core/errors/AppError';
import { validateSchema } from '../../shared/utils/validation.utils';
import { addOfferingSchema, AddOfferingInput, updateOfferingSchema } from './provider.schema';

export class ProviderService {
  constructor(private readonly store: CatalogStore & ProviderStore) {}

  // ==========================================================================
  // CATEGORIES
  // ==========================================================================

  async listCategories(): Promise<CategoryRecord[]> {
    return this.store.listCategories();
  }

  async getCategory(categoryId: string): Promise<CategoryRecord> {
    const category = this.store.getCategoryById(categoryId);
    if (!category) {
      throw new NotFoundError(`Category not found: ${categoryId}`, ErrorCode.CATEGORY_NOT_FOUND, { categoryId });
    }
    return category;
  }

  // ==========================================================================
  // PROVIDERS
  // ==========================================================================

  /**
   * Public profile with location and offerings
   */
  async getProvider(providerId: string): Promise<ProviderProfile & { offerings: OfferingRecord[] }> {
    const [profile] = this.store.getProvidersByIds([providerId]);
    if (!profile) {
      throw this.providerNotFound(providerId);
    }
    return { ...profile, offerings: this.store.getOfferingsByProvider(providerId) };
  }

  async setAvailability(providerId: string, isAvailable: boolean): Promise<ProviderRecord> {
    const provider = this.store.updateProvider(providerId, { isAvailable });
    if (!provider) {
      throw this.providerNotFound(providerId);
    }
    logger.info('Provider availability changed', { providerId, isAvailable });
    return provider;
  }

  // ==========================================================================
  // OFFERINGS
  // ==========================================================================

  async listOfferings(providerId: string): Promise<OfferingRecord[]> {
    this.requireProvider(providerId);
    return this.store.getOfferingsByProvider(providerId);
  }

  /**
   * Duplicate (provider, category) -> ConflictError from the store
   */
  async addOffering(providerId: string, input: AddOfferingInput): Promise<OfferingRecord> {
    const { categoryId, priceRate } = validateSchema(addOfferingSchema, input);
    this.requireProvider(providerId);
    await this.getCategory(categoryId);

    const offering = this.store.createOffering(providerId, categoryId, priceRate);
    logger.info('Offering added', { providerId, categoryId, priceRate });
    return offering;
  }

  async updateOfferingPrice(providerId: string, categoryId: string, priceRate: number): Promise<OfferingRecord> {
    const data = validateSchema(updateOfferingSchema, { priceRate });
    const offering = this.store.updateOfferingPrice(providerId, categoryId, data.priceRate);
    if (!offering) {
      throw new OfferingNotFoundError(providerId, categoryId);
    }
    logger.info('Offering price updated', { providerId, categoryId, priceRate: data.priceRate });
    return offering;
  }

  /**
   * Existing bookings keep their category; confirming one afterwards fails
   * until the offering is added back.
   */
  async removeOffering(providerId: string, categoryId: string): Promise<void> {
    if (!this.store.deleteOffering(providerId, categoryId)) {
      throw new OfferingNotFoundError(providerId, categoryId);
    }
    logger.info('Offering removed', { providerId, categoryId });
  }

  private requireProvider(providerId: string): ProviderRecord {
    const provider = this.store.getProviderById(providerId);
    if (!provider) {
      throw this.providerNotFound(providerId);
    }
    return provider;
  }

  private providerNotFound(providerId: string): NotFoundError {
    return new NotFoundError(`Provider not found: ${providerId}`, ErrorCode.PROVIDER_NOT_FOUND, { providerId });
  }
}

export const providerService = new ProviderService(db);
