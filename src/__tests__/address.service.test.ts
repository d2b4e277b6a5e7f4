jest.mock('../shared/services/logger.service', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
  logError: jest.fn()
}));

import { DatabaseService } from '../shared/database/db';
import type { Coordinate } from '../shared/database/repository.interface';
import { AddressService } from '../modules/address/address.service';
import { CallerRole } from '../core/constants';
import { ValidationError } from '../core/errors/AppError';

describe('AddressService', () => {
  const customer = { role: CallerRole.CUSTOMER, id: 'cust-1' };
  const elmStreet = { line: '2 Elm Street', city: 'Springfield', state: 'IL', postalCode: '62702' };

  let store: DatabaseService;
  let geocode: jest.Mock<Promise<Coordinate | null>, [string]>;
  let service: AddressService;

  beforeEach(() => {
    store = new DatabaseService({ filePath: '' });
    geocode = jest.fn<Promise<Coordinate | null>, [string]>().mockResolvedValue({ latitude: 39.78, longitude: -89.65 });
    service = new AddressService(store, { geocode });
  });

  it('keeps coordinates given by the caller', async () => {
    const address = await service.createAddress(customer, {
      ...elmStreet,
      location: { latitude: 40, longitude: -89 }
    });

    expect(address.location).toEqual({ latitude: 40, longitude: -89 });
    expect(geocode).not.toHaveBeenCalled();
  });

  it('geocodes the joined address text otherwise', async () => {
    const address = await service.createAddress(customer, elmStreet);

    expect(geocode).toHaveBeenCalledWith('2 Elm Street, Springfield, IL, 62702');
    expect(address).toMatchObject({
      ownerId: 'cust-1',
      ownerRole: CallerRole.CUSTOMER,
      location: { latitude: 39.78, longitude: -89.65 }
    });
  });

  it('stores the address unlocated when geocoding finds nothing', async () => {
    geocode.mockResolvedValueOnce(null);

    const address = await service.createAddress(customer, elmStreet);

    expect(address.location).toBeNull();
    expect(store.getLocation('cust-1')).toBeNull();
  });

  it('rejects blank fields', async () => {
    await expect(service.createAddress(customer, { ...elmStreet, city: '  ' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('lists only the caller addresses in the caller role', async () => {
    await service.createAddress(customer, elmStreet);
    await service.createAddress({ role: CallerRole.CUSTOMER, id: 'cust-2' }, elmStreet);
    await service.createAddress({ role: CallerRole.PROVIDER, id: 'cust-1' }, elmStreet);

    const mine = await service.listAddresses(customer);

    expect(mine).toHaveLength(1);
    expect(mine[0]?.ownerRole).toBe(CallerRole.CUSTOMER);
  });
});
