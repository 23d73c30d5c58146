import { VehicleClass } from '../types';
import { baseFare, perDistanceRate } from './vehicleCatalog';
import { InvalidConfigError, InvalidInputError } from '../utils/errors';

/**
 * Fare Pipeline
 * Time Complexity: O(k) where k = number of stages
 *
 * Base  = max(baseFare + distance × rate, baseFare)
 * Surge = inner × multiplier            (0 < multiplier ≤ 5)
 * Disc. = max(inner × (1 − pct/100), 0.5 × baseFare)   (0 ≤ pct ≤ 100)
 * Toll  = inner + surcharge             (surcharge ≥ 0)
 *
 * Stages wrap each other in whatever order the caller picks, so
 * discount(surge(base)) and surge(discount(base)) are both legal and
 * generally give different fares.
 */
export interface FareStage {
  computeFare(distance: number, vehicleClass: VehicleClass): number;
  describe(): string;
}

export const MAX_SURGE_MULTIPLIER = 5;

export type FareModifier =
  | { kind: 'surge'; multiplier: number }
  | { kind: 'discount'; percent: number }
  | { kind: 'toll'; surcharge: number };

export function baseFareStage(): FareStage {
  return {
    computeFare(distance, vehicleClass) {
      if (!Number.isFinite(distance) || distance < 0) {
        throw new InvalidInputError(`Distance must be a non-negative number, got ${distance}`);
      }
      const base = baseFare(vehicleClass);
      return Math.max(base + distance * perDistanceRate(vehicleClass), base);
    },
    describe: () => 'base'
  };
}

export function withSurge(inner: FareStage, multiplier: number): FareStage {
  if (!Number.isFinite(multiplier) || multiplier <= 0 || multiplier > MAX_SURGE_MULTIPLIER) {
    throw new InvalidConfigError(
      `Surge multiplier must be in (0, ${MAX_SURGE_MULTIPLIER}], got ${multiplier}`
    );
  }

  return {
    computeFare: (distance, vehicleClass) => inner.computeFare(distance, vehicleClass) * multiplier,
    describe: () => `surge(${multiplier}x, ${inner.describe()})`
  };
}

export function withDiscount(inner: FareStage, percent: number): FareStage {
  if (!Number.isFinite(percent) || percent < 0 || percent > 100) {
    throw new InvalidConfigError(`Discount percent must be in [0, 100], got ${percent}`);
  }

  return {
    computeFare(distance, vehicleClass) {
      const discounted = inner.computeFare(distance, vehicleClass) * (1 - percent / 100);
      return Math.max(discounted, 0.5 * baseFare(vehicleClass));
    },
    describe: () => `discount(${percent}%, ${inner.describe()})`
  };
}

export function withToll(inner: FareStage, surcharge: number): FareStage {
  if (!Number.isFinite(surcharge) || surcharge < 0) {
    throw new InvalidConfigError(`Toll surcharge must be non-negative, got ${surcharge}`);
  }

  return {
    computeFare: (distance, vehicleClass) => inner.computeFare(distance, vehicleClass) + surcharge,
    describe: () => `toll(+${surcharge}, ${inner.describe()})`
  };
}

/**
 * Build a pipeline from an ordered modifier list.
 * The first modifier wraps the base stage; each later one wraps the result.
 */
export function buildFarePipeline(modifiers: readonly FareModifier[] = []): FareStage {
  return modifiers.reduce<FareStage>((stage, modifier) => {
    switch (modifier.kind) {
      case 'surge':
        return withSurge(stage, modifier.multiplier);
      case 'discount':
        return withDiscount(stage, modifier.percent);
      case 'toll':
        return withToll(stage, modifier.surcharge);
    }
  }, baseFareStage());
}

/**
 * Flat reduction applied to shared rides after the pipeline
 */
export const CARPOOL_FARE_FACTOR = 0.8;

export function applyCarpoolReduction(fare: number): number {
  return fare * CARPOOL_FARE_FACTOR;
}
