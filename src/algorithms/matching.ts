import { Driver, Location, VehicleClass } from '../types';
import { planarDistance } from './distance';
import { InvalidConfigError } from '../utils/errors';

/**
 * Picks one driver out of a candidate set for a pickup.
 *
 * Implementations must treat their inputs as read-only. Ties go to the
 * first candidate in iteration order; the coordinator hands candidates
 * over in driver registration order.
 */
export interface MatchingPolicy {
  readonly name: string;
  selectDriver(
    candidates: ReadonlyArray<Readonly<Driver>>,
    pickup: Location,
    requestedClass: VehicleClass
  ): Readonly<Driver> | undefined;
}

/**
 * Nearest driver of the requested class
 * Time Complexity: O(n) where n = number of candidates
 * Space Complexity: O(1)
 */
export class NearestDriverPolicy implements MatchingPolicy {
  readonly name = 'nearest';

  selectDriver(
    candidates: ReadonlyArray<Readonly<Driver>>,
    pickup: Location,
    requestedClass: VehicleClass
  ): Readonly<Driver> | undefined {
    let best: Readonly<Driver> | undefined;
    let minDistance = Infinity;

    for (const driver of candidates) {
      if (driver.vehicle.vehicleClass !== requestedClass) continue;

      const distance = planarDistance(driver.location, pickup);
      // strict comparison keeps the first of equally distant drivers
      if (distance < minDistance) {
        minDistance = distance;
        best = driver;
      }
    }

    return best;
  }
}

/**
 * Highest-rated driver of the requested class
 * Time Complexity: O(n)
 */
export class HighestRatedPolicy implements MatchingPolicy {
  readonly name = 'highest-rated';

  selectDriver(
    candidates: ReadonlyArray<Readonly<Driver>>,
    _pickup: Location,
    requestedClass: VehicleClass
  ): Readonly<Driver> | undefined {
    let best: Readonly<Driver> | undefined;

    for (const driver of candidates) {
      if (driver.vehicle.vehicleClass !== requestedClass) continue;

      if (!best || driver.rating > best.rating) {
        best = driver;
      }
    }

    return best;
  }
}

export const MATCHING_POLICY_NAMES = ['nearest', 'highest-rated'] as const;

export type MatchingPolicyName = (typeof MATCHING_POLICY_NAMES)[number];

export function createMatchingPolicy(name: string): MatchingPolicy {
  switch (name) {
    case 'nearest':
      return new NearestDriverPolicy();
    case 'highest-rated':
      return new HighestRatedPolicy();
    default:
      throw new InvalidConfigError(`Unknown matching policy: ${name}`, {
        allowed: MATCHING_POLICY_NAMES
      });
  }
}
