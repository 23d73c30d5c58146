import { Driver, DriverStatus } from '../types';
import { InvalidInputError } from '../utils/errors';

/**
 * Tracks which shared rides each driver is carrying.
 *
 * A group exists only while it has members. Occupancy never exceeds the
 * driver's seat capacity: `join` refuses once the group is full.
 */
export class CarpoolTracker {
  private readonly groups = new Map<string, string[]>();

  /**
   * Available drivers can open a group; on-trip drivers can only add to
   * one they already have. A driver on a solo trip has no group.
   */
  canAccept(driver: Readonly<Driver>): boolean {
    const capacity = driver.vehicle.capacity;

    if (driver.status === DriverStatus.AVAILABLE) {
      return this.occupancy(driver.id) < capacity;
    }
    if (driver.status === DriverStatus.ON_TRIP) {
      const group = this.groups.get(driver.id);
      return group !== undefined && group.length < capacity;
    }
    return false;
  }

  join(driver: Driver, rideId: string): void {
    if (!this.canAccept(driver)) {
      throw new InvalidInputError(
        `Driver ${driver.id} cannot take another shared ride (${this.occupancy(driver.id)}/${driver.vehicle.capacity})`
      );
    }

    let group = this.groups.get(driver.id);
    if (!group) {
      group = [];
      this.groups.set(driver.id, group);
    }
    group.push(rideId);

    if (driver.status === DriverStatus.AVAILABLE) {
      driver.status = DriverStatus.ON_TRIP;
    }
  }

  /**
   * Returns false when the ride was not in the driver's group.
   */
  leave(driver: Driver, rideId: string): boolean {
    const group = this.groups.get(driver.id);
    if (!group) return false;

    const idx = group.indexOf(rideId);
    if (idx === -1) return false;

    group.splice(idx, 1);
    if (group.length === 0) {
      this.groups.delete(driver.id);
      driver.status = DriverStatus.AVAILABLE;
    }
    return true;
  }

  occupancy(driverId: string): number {
    return this.groups.get(driverId)?.length ?? 0;
  }

  members(driverId: string): string[] {
    return [...(this.groups.get(driverId) ?? [])];
  }

  hasGroup(driverId: string): boolean {
    return this.groups.has(driverId);
  }

  activeGroupCount(): number {
    return this.groups.size;
  }
}
