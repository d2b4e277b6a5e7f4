/**
 * =============================================================================
 * GEOCODING SERVICE - Google Geocoding API
 * =============================================================================
 *
 * Forward geocoding of street addresses to coordinates.
 *
 * Failures are never fatal: every error path logs and returns null, and the
 * caller stores the address with an unknown location.
 *
 * SCALABILITY:
 * - Results cached for 24 hours (addresses are stable)
 * - Disabled entirely when no API key is configured
 * =============================================================================
 */

import { z } from 'zod';
import { logger } from './logger.service';
import { redisService, RedisService } from './redis.service';
import { config as appConfig } from '../../config/environment';
import type { Coordinate } from '../database/repository.interface';
import { coordinateSchema } from '../utils/validation.utils';

export interface GeocodingConfig {
  apiKey: string;
  enabled: boolean;
  timeoutMs: number;
}

const GEOCODING_URL = 'https://maps.googleapis.com/maps/api/geocode/json';
const CACHE_TTL_SECONDS = 24 * 60 * 60;

const geocodingResponseSchema = z.object({
  status: z.string(),
  results: z.array(z.object({
    formatted_address: z.string().optional(),
    geometry: z.object({
      location: z.object({ lat: z.number(), lng: z.number() })
    })
  }))
});

export class GeocodingService {
  constructor(
    private readonly settings: GeocodingConfig,
    private readonly cache: RedisService
  ) {}

  isAvailable(): boolean {
    return this.settings.enabled && this.settings.apiKey.length > 0;
  }

  /**
   * Coordinates for a free-text address, or null when unknown
   */
  async geocode(addressText: string): Promise<Coordinate | null> {
    const query = addressText.trim().replace(/\s+/g, ' ');
    if (!query || !this.isAvailable()) {
      return null;
    }

    const cacheKey = `geocode:${query.toLowerCase()}`;
    try {
      const cached = await this.cache.getJSON(cacheKey, coordinateSchema);
      if (cached) {
        logger.debug('Geocoding cache HIT', { query });
        return cached;
      }
    } catch (error: unknown) {
      logger.warn('Geocoding cache read failed', { error: error instanceof Error ? error.message : String(error) });
    }

    const startTime = Date.now();
    try {
      const params = new URLSearchParams({ address: query, key: this.settings.apiKey });
      const response = await fetch(`${GEOCODING_URL}?${params.toString()}`, {
        signal: AbortSignal.timeout(this.settings.timeoutMs)
      });

      if (!response.ok) {
        logger.error(`Google Geocoding HTTP error: ${response.status}`);
        return null;
      }

      const parsed = geocodingResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        logger.error('Google Geocoding returned an unexpected payload');
        return null;
      }

      const first = parsed.data.results[0];
      if (parsed.data.status !== 'OK' || !first) {
        logger.warn(`Google Geocoding: no result (${parsed.data.status})`, { query });
        return null;
      }

      const location: Coordinate = {
        latitude: first.geometry.location.lat,
        longitude: first.geometry.location.lng
      };

      logger.debug(`Google Geocoding: ${first.formatted_address ?? query} - ${Date.now() - startTime}ms`);

      await this.cache.setJSON(cacheKey, location, CACHE_TTL_SECONDS).catch((error: unknown) => {
        logger.warn('Geocoding cache write failed', { error: error instanceof Error ? error.message : String(error) });
      });

      return location;
    } catch (error: unknown) {
      logger.error(`Google Geocoding failed: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }
}

export const geocodingService = new GeocodingService(appConfig.geocoding, redisService);
