jest.mock('../shared/services/logger.service', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
  logError: jest.fn()
}));

import { GeocodingService } from '../shared/services/geocoding.service';
import { RedisService } from '../shared/services/redis.service';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const springfield = {
  status: 'OK',
  results: [{
    formatted_address: '2 Elm St, Springfield, IL 62702, USA',
    geometry: { location: { lat: 39.78, lng: -89.65 } }
  }]
};

describe('GeocodingService', () => {
  let cache: RedisService;
  let fetchSpy: jest.SpyInstance;

  beforeEach(() => {
    cache = new RedisService();
    fetchSpy = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(async () => {
    fetchSpy.mockRestore();
    await cache.disconnect();
  });

  function service(apiKey = 'test-key') {
    return new GeocodingService({ apiKey, enabled: apiKey.length > 0, timeoutMs: 1000 }, cache);
  }

  it('resolves an address and caches it by normalized text', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse(springfield));
    const geocoder = service();

    const first = await geocoder.geocode('  2 Elm St,   Springfield ');
    const second = await geocoder.geocode('2 elm st, springfield');

    expect(first).toEqual({ latitude: 39.78, longitude: -89.65 });
    expect(second).toEqual(first);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('returns null when nothing matches', async () => {
    fetchSpy.mockImplementation(async () => jsonResponse({ status: 'ZERO_RESULTS', results: [] }));

    await expect(service().geocode('Nowhere Lane')).resolves.toBeNull();
  });

  it('returns null on HTTP errors, bad payloads and network failures', async () => {
    const geocoder = service();

    fetchSpy.mockImplementationOnce(async () => jsonResponse({ error: 'boom' }, 500));
    await expect(geocoder.geocode('a')).resolves.toBeNull();

    fetchSpy.mockImplementationOnce(async () => jsonResponse({ results: 'nope' }));
    await expect(geocoder.geocode('b')).resolves.toBeNull();

    fetchSpy.mockImplementationOnce(async () => {
      throw new TypeError('fetch failed');
    });
    await expect(geocoder.geocode('c')).resolves.toBeNull();
  });

  it('never calls out without an API key', async () => {
    const geocoder = service('');

    expect(geocoder.isAvailable()).toBe(false);
    await expect(geocoder.geocode('2 Elm St')).resolves.toBeNull();
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});
