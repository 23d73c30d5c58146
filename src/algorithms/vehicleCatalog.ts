import { VehicleClass } from '../types';

interface VehicleClassEntry {
  displayName: string;
  baseFare: number;
  perDistanceRate: number;
}

/**
 * Fare constants per vehicle class (Rs.)
 *
 * Fixed at build time. Nothing at runtime overrides these; pricing stages
 * read them through the functions below.
 */
const CATALOG: Readonly<Record<VehicleClass, Readonly<VehicleClassEntry>>> = {
  [VehicleClass.TWO_WHEELER]: { displayName: 'Bike', baseFare: 15, perDistanceRate: 6 },
  [VehicleClass.SEDAN]: { displayName: 'Sedan', baseFare: 40, perDistanceRate: 10 },
  [VehicleClass.SUV]: { displayName: 'SUV', baseFare: 60, perDistanceRate: 12 },
  [VehicleClass.AUTO_RICKSHAW]: { displayName: 'Auto-Rickshaw', baseFare: 25, perDistanceRate: 8 }
};

function entryFor(vehicleClass: VehicleClass): Readonly<VehicleClassEntry> {
  const entry: Readonly<VehicleClassEntry> | undefined = CATALOG[vehicleClass];
  if (!entry) {
    throw new Error(`Unknown vehicle class: ${String(vehicleClass)}`);
  }
  return entry;
}

export function baseFare(vehicleClass: VehicleClass): number {
  return entryFor(vehicleClass).baseFare;
}

export function perDistanceRate(vehicleClass: VehicleClass): number {
  return entryFor(vehicleClass).perDistanceRate;
}

export function displayName(vehicleClass: VehicleClass): string {
  return entryFor(vehicleClass).displayName;
}

export const VEHICLE_CLASSES: readonly VehicleClass[] = Object.values(VehicleClass);
