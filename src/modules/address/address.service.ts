/**
 * =============================================================================
 * ADDRESS MODULE - SERVICE
 * =============================================================================
 *
 * Addresses belong to one customer or provider. A provider's first located
 * address is where the matcher measures proximity from; a customer's
 * addresses are where bookings take place.
 * =============================================================================
 */

import { db } from '../../shared/database/db';
import type { AddressRecord, AddressStore } from '../../shared/database/repository.interface';
import { geocodingService, GeocodingService } from '../../shared/services/geocoding.service';
import { logger } from '../../shared/services/logger.service';
import type { CallerContext } from '../../shared/middleware/auth.middleware';
import { validateSchema } from '../../shared/utils/validation.utils';
import { createAddressSchema, CreateAddressInput } from './address.schema';

export class AddressService {
  constructor(
    private readonly store: AddressStore,
    private readonly geocoder: Pick<GeocodingService, 'geocode'>
  ) {}

  async createAddress(caller: CallerContext, input: CreateAddressInput): Promise<AddressRecord> {
    const data = validateSchema(createAddressSchema, input);

    const location = data.location
      ?? await this.geocoder.geocode([data.line, data.city, data.state, data.postalCode].join(', '));

    if (!location) {
      logger.warn('Address saved without location', { ownerId: caller.id, city: data.city });
    }

    const address = this.store.createAddress({
      ownerId: caller.id,
      ownerRole: caller.role,
      line: data.line,
      city: data.city,
      state: data.state,
      postalCode: data.postalCode,
      location
    });

    logger.info('Address created', { addressId: address.id, ownerId: caller.id, located: location !== null });
    return address;
  }

  async listAddresses(caller: CallerContext): Promise<AddressRecord[]> {
    return this.store
      .getAddressesByOwner(caller.id)
      .filter(a => a.ownerRole === caller.role);
  }
}

export const addressService = new AddressService(db, geocodingService);
