import { Location, RideMode, RideSnapshot, RideStatus, VehicleClass } from '../types';
import { InvalidInputError } from '../utils/errors';

const LIFECYCLE_ORDER: readonly RideStatus[] = [
  RideStatus.REQUESTED,
  RideStatus.DRIVER_ASSIGNED,
  RideStatus.DRIVER_ENROUTE,
  RideStatus.IN_PROGRESS,
  RideStatus.COMPLETED
];

export function isTerminal(status: RideStatus): boolean {
  return status === RideStatus.COMPLETED || status === RideStatus.CANCELLED;
}

export interface RideInit {
  id: string;
  riderId: string;
  pickup: Location;
  dropoff: Location;
  vehicleClass: VehicleClass;
  mode: RideMode;
  requestedAt: Date;
}

/**
 * One trip, from request to completion or cancellation.
 *
 * Forward moves may skip states; there is no way back. Cancellation is
 * allowed from any non-terminal state. Distance and fare stay 0 until
 * `settle` runs once on a completed ride.
 */
export class Ride {
  readonly id: string;
  readonly riderId: string;
  readonly pickup: Location;
  readonly dropoff: Location;
  readonly vehicleClass: VehicleClass;
  readonly mode: RideMode;
  readonly requestedAt: Date;

  private _driverId: string | null = null;
  private _status: RideStatus = RideStatus.REQUESTED;
  private _distance = 0;
  private _fare = 0;
  private _settled = false;
  private _startedAt: Date | null = null;
  private _completedAt: Date | null = null;
  private _cancelledAt: Date | null = null;

  constructor(init: RideInit) {
    this.id = init.id;
    this.riderId = init.riderId;
    this.pickup = init.pickup;
    this.dropoff = init.dropoff;
    this.vehicleClass = init.vehicleClass;
    this.mode = init.mode;
    this.requestedAt = init.requestedAt;
  }

  get driverId(): string | null {
    return this._driverId;
  }

  get status(): RideStatus {
    return this._status;
  }

  get distance(): number {
    return this._distance;
  }

  get fare(): number {
    return this._fare;
  }

  get isSettled(): boolean {
    return this._settled;
  }

  get isShared(): boolean {
    return this.mode === RideMode.SHARED;
  }

  assignDriver(driverId: string): void {
    if (this._status !== RideStatus.REQUESTED || this._driverId !== null) {
      throw new InvalidInputError(`Ride ${this.id} cannot take a driver in status ${this._status}`);
    }
    this._driverId = driverId;
    this._status = RideStatus.DRIVER_ASSIGNED;
  }

  /**
   * Throws InvalidInputError when the move is not allowed; leaves the ride untouched.
   */
  assertCanTransition(next: RideStatus): void {
    const current = this._status;

    if (isTerminal(current)) {
      throw new InvalidInputError(`Ride ${this.id} is already ${current}`);
    }
    if (next === current) {
      throw new InvalidInputError(`Ride ${this.id} is already ${current}`);
    }
    if (next === RideStatus.CANCELLED) return;

    if (LIFECYCLE_ORDER.indexOf(next) < LIFECYCLE_ORDER.indexOf(current)) {
      throw new InvalidInputError(`Ride ${this.id} cannot move from ${current} back to ${next}`);
    }
    if (this._driverId === null) {
      throw new InvalidInputError(`Ride ${this.id} has no driver; cannot move to ${next}`);
    }
  }

  transitionTo(next: RideStatus, at: Date): void {
    this.assertCanTransition(next);

    switch (next) {
      case RideStatus.IN_PROGRESS:
        this._startedAt = at;
        break;
      case RideStatus.COMPLETED:
        this._startedAt = this._startedAt ?? at;
        this._completedAt = at;
        break;
      case RideStatus.CANCELLED:
        this._cancelledAt = at;
        break;
      default:
        break;
    }

    this._status = next;
  }

  settle(distance: number, fare: number): void {
    if (this._status !== RideStatus.COMPLETED) {
      throw new InvalidInputError(`Ride ${this.id} can only be settled once completed`);
    }
    if (this._settled) {
      throw new InvalidInputError(`Ride ${this.id} is already settled`);
    }
    this._distance = distance;
    this._fare = fare;
    this._settled = true;
  }

  toSnapshot(): RideSnapshot {
    return {
      id: this.id,
      riderId: this.riderId,
      driverId: this._driverId,
      pickup: this.pickup,
      dropoff: this.dropoff,
      vehicleClass: this.vehicleClass,
      mode: this.mode,
      status: this._status,
      distance: this._distance,
      fare: this._fare,
      requestedAt: this.requestedAt,
      startedAt: this._startedAt,
      completedAt: this._completedAt,
      cancelledAt: this._cancelledAt
    };
  }
}
