import { Location } from '../types';

/**
 * Distance units per degree of latitude/longitude on the flat plane.
 * Roughly kilometres at the equator; kept fixed so fares are reproducible.
 */
export const DISTANCE_UNITS_PER_DEGREE = 111;

/**
 * Straight-line distance in raw degrees
 * Time Complexity: O(1)
 */
export function planarDistance(point1: Location, point2: Location): number {
  const latDiff = point1.latitude - point2.latitude;
  const lngDiff = point1.longitude - point2.longitude;
  return Math.sqrt(latDiff * latDiff + lngDiff * lngDiff);
}

/**
 * Trip distance used for settlement: planar distance scaled to distance units
 */
export function tripDistance(pickup: Location, dropoff: Location): number {
  return planarDistance(pickup, dropoff) * DISTANCE_UNITS_PER_DEGREE;
}

export function sameCoordinates(point1: Location, point2: Location): boolean {
  return point1.latitude === point2.latitude && point1.longitude === point2.longitude;
}

export function createLocation(latitude: number, longitude: number, address: string = ''): Location {
  return Object.freeze({ latitude, longitude, address });
}
