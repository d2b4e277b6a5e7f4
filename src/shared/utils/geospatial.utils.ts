/**
 * =============================================================================
 * GEOSPATIAL UTILITIES - Haversine Distance Calculations
 * =============================================================================
 *
 * Pure functions, no I/O. Single source of truth for customer/provider
 * distances used by the matcher's proximity bonus.
 *
 * =============================================================================
 */

import type { Coordinate } from '../database/repository.interface';

/**
 * Earth's radius constants
 */
export const EARTH_RADIUS = {
  KM: 6371,
};

/**
 * Great-circle distance between two coordinates, in kilometers.
 *
 * Symmetric, and zero when both points are the same.
 */
export function distanceKm(a: Coordinate, b: Coordinate): number {
  const dLat = toRadians(b.latitude - a.latitude);
  const dLng = toRadians(b.longitude - a.longitude);

  const h =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(a.latitude)) *
      Math.cos(toRadians(b.latitude)) *
      Math.sin(dLng / 2) *
      Math.sin(dLng / 2);

  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));

  return EARTH_RADIUS.KM * c;
}

/**
 * Latitude in [-90, 90], longitude in [-180, 180], both finite
 */
export function isValidCoordinate(point: Coordinate): boolean {
  return (
    Number.isFinite(point.latitude) &&
    Number.isFinite(point.longitude) &&
    point.latitude >= -90 &&
    point.latitude <= 90 &&
    point.longitude >= -180 &&
    point.longitude <= 180
  );
}

/**
 * Convert degrees to radians
 */
function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}
