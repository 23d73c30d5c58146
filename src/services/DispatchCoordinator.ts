import {
  Driver,
  DriverRegistration,
  DriverStatus,
  Location,
  RideFilter,
  RideMode,
  RideSnapshot,
  RideStatus,
  Rider,
  RiderRegistration,
  SystemStatus,
  VehicleClass
} from '../types';
import { Ride, isTerminal } from '../models/Ride';
import { MatchingPolicy, NearestDriverPolicy } from '../algorithms/matching';
import { FareStage, applyCarpoolReduction, baseFareStage } from '../algorithms/pricing';
import { createLocation, sameCoordinates, tripDistance } from '../algorithms/distance';
import { displayName } from '../algorithms/vehicleCatalog';
import { CarpoolTracker } from './CarpoolTracker';
import { DispatchEventBus, DispatchEventKind, DispatchObserver, EmitContext } from './DispatchEventBus';
import { InvalidConfigError, InvalidInputError, NotFoundError } from '../utils/errors';
import { RandomSource, defaultRandom } from '../utils/random';
import { Logger, logger as defaultLogger } from '../utils/logger';

export interface AcceptanceSettings {
  initialProbability: number;
  decayPerAttempt: number;
  maxAttempts: number;
}

export const DEFAULT_ACCEPTANCE: Readonly<AcceptanceSettings> = {
  initialProbability: 0.85,
  decayPerAttempt: 0.1,
  maxAttempts: 3
};

export interface DispatchCoordinatorOptions {
  matchingPolicy?: MatchingPolicy;
  farePipeline?: FareStage;
  random?: RandomSource;
  clock?: () => Date;
  eventBus?: DispatchEventBus;
  acceptance?: Partial<AcceptanceSettings>;
  logger?: Logger;
}

const STATUS_MESSAGES: Record<RideStatus, string> = {
  [RideStatus.REQUESTED]: 'Ride has been requested',
  [RideStatus.DRIVER_ASSIGNED]: 'Driver has been assigned to the ride',
  [RideStatus.DRIVER_ENROUTE]: 'Driver is on the way to pickup location',
  [RideStatus.IN_PROGRESS]: 'Ride has started',
  [RideStatus.COMPLETED]: 'Ride completed successfully',
  [RideStatus.CANCELLED]: 'Ride has been cancelled'
};

const RIDE_STATUSES: readonly RideStatus[] = Object.values(RideStatus);
const RIDE_MODES: readonly RideMode[] = Object.values(RideMode);
const VEHICLE_CLASSES: readonly VehicleClass[] = Object.values(VehicleClass);

function cloneDriver(driver: Driver): Driver {
  return { ...driver, vehicle: { ...driver.vehicle } };
}

function cloneRider(rider: Rider): Rider {
  return { ...rider };
}

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim() === '';
}

function assertRating(rating: number, who: string): void {
  if (!Number.isFinite(rating) || rating < 0 || rating > 5) {
    throw new InvalidInputError(`Rating for ${who} must be between 0 and 5, got ${rating}`);
  }
}

function assertLocation(location: Location | undefined, label: string): Location {
  if (
    !location ||
    !Number.isFinite(location.latitude) ||
    !Number.isFinite(location.longitude)
  ) {
    throw new InvalidInputError(`${label} must have numeric latitude and longitude`);
  }
  return createLocation(location.latitude, location.longitude, location.address ?? '');
}

/**
 * Owns the driver, rider and ride registries and every state change on them.
 *
 * All operations are synchronous, so calls on one instance are serialized by
 * the event loop. Construct one per process (or per test) and pass it to
 * whatever needs it.
 */
export class DispatchCoordinator {
  private readonly drivers = new Map<string, Driver>();
  private readonly riders = new Map<string, Rider>();
  private readonly rides = new Map<string, Ride>();
  private readonly carpool = new CarpoolTracker();
  private readonly events: DispatchEventBus;
  private readonly random: RandomSource;
  private readonly clock: () => Date;
  private readonly acceptance: AcceptanceSettings;
  private readonly log: Logger;

  private matchingPolicy: MatchingPolicy;
  private farePipeline: FareStage;
  private rideCounter = 0;

  constructor(options: DispatchCoordinatorOptions = {}) {
    this.log = options.logger ?? defaultLogger;
    this.clock = options.clock ?? (() => new Date());
    this.random = options.random ?? defaultRandom;
    this.events = options.eventBus ?? new DispatchEventBus(this.log, this.clock);
    this.matchingPolicy = options.matchingPolicy ?? new NearestDriverPolicy();
    this.farePipeline = options.farePipeline ?? baseFareStage();
    this.acceptance = { ...DEFAULT_ACCEPTANCE, ...options.acceptance };
    this.validateAcceptance();
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  registerRider(input: RiderRegistration): Rider {
    if (!input || isBlank(input.id)) {
      throw new InvalidInputError('Rider id is required');
    }
    if (this.riders.has(input.id)) {
      throw new InvalidInputError(`Rider already registered: ${input.id}`);
    }
    const rating = input.rating ?? 5;
    assertRating(rating, `rider ${input.id}`);

    const rider: Rider = {
      id: input.id,
      name: input.name,
      phone: input.phone,
      defaultPickup: input.defaultPickup
        ? assertLocation(input.defaultPickup, 'Default pickup')
        : createLocation(0, 0),
      rating
    };
    this.riders.set(rider.id, rider);

    this.log.info('Rider registered', { riderId: rider.id });
    this.events.emit(DispatchEventKind.USER_REGISTERED, `Rider ${rider.name} registered`, {
      riderId: rider.id
    });
    return cloneRider(rider);
  }

  registerDriver(input: DriverRegistration): Driver {
    if (!input || isBlank(input.id)) {
      throw new InvalidInputError('Driver id is required');
    }
    if (this.drivers.has(input.id)) {
      throw new InvalidInputError(`Driver already registered: ${input.id}`);
    }
    const { vehicle } = input;
    if (!vehicle || !VEHICLE_CLASSES.includes(vehicle.vehicleClass)) {
      throw new InvalidInputError(`Driver ${input.id} needs a vehicle of a known class`);
    }
    if (!Number.isInteger(vehicle.capacity) || vehicle.capacity < 1) {
      throw new InvalidInputError(`Vehicle capacity must be a positive integer, got ${vehicle.capacity}`);
    }
    const status = input.status ?? DriverStatus.AVAILABLE;
    if (status !== DriverStatus.AVAILABLE && status !== DriverStatus.OFFLINE) {
      throw new InvalidInputError('A driver can only be registered as AVAILABLE or OFFLINE');
    }
    const rating = input.rating ?? 5;
    assertRating(rating, `driver ${input.id}`);

    const driver: Driver = {
      id: input.id,
      name: input.name,
      phone: input.phone,
      vehicle: { ...vehicle },
      location: assertLocation(input.location, 'Driver location'),
      status,
      rating
    };
    this.drivers.set(driver.id, driver);

    this.log.info('Driver registered', {
      driverId: driver.id,
      vehicleClass: vehicle.vehicleClass,
      capacity: vehicle.capacity
    });
    this.events.emit(
      DispatchEventKind.USER_REGISTERED,
      `Driver ${driver.name} registered with ${displayName(vehicle.vehicleClass)} ${vehicle.licensePlate}`,
      { driverId: driver.id }
    );
    return cloneDriver(driver);
  }

  // ---------------------------------------------------------------------------
  // Ride intake and assignment
  // ---------------------------------------------------------------------------

  /**
   * Admit a ride request and try to assign a driver.
   *
   * Returns the ride id whether or not a driver took it; an unserved ride
   * stays REQUESTED with no driver.
   */
  requestRide(
    riderId: string,
    pickup: Location,
    dropoff: Location,
    mode: RideMode,
    vehicleClass: VehicleClass
  ): string {
    const rider = this.riders.get(riderId);
    if (!rider) {
      throw new NotFoundError('Rider', riderId);
    }
    const from = assertLocation(pickup, 'Pickup');
    const to = assertLocation(dropoff, 'Dropoff');
    if (sameCoordinates(from, to)) {
      throw new InvalidInputError('Pickup and dropoff must be different locations');
    }
    if (!RIDE_MODES.includes(mode)) {
      throw new InvalidInputError(`Unknown ride mode: ${String(mode)}`);
    }
    if (!VEHICLE_CLASSES.includes(vehicleClass)) {
      throw new InvalidInputError(`Unknown vehicle class: ${String(vehicleClass)}`);
    }

    const ride = new Ride({
      id: `RIDE_${++this.rideCounter}`,
      riderId,
      pickup: from,
      dropoff: to,
      vehicleClass,
      mode,
      requestedAt: this.clock()
    });
    this.rides.set(ride.id, ride);

    this.events.emit(
      DispatchEventKind.RIDE_REQUESTED,
      `Ride ${ride.id} requested by ${rider.name} (${displayName(vehicleClass)}, ${mode.toLowerCase()})`,
      { rideId: ride.id, riderId }
    );

    const candidates = this.findCandidates(mode);
    if (candidates.length === 0) {
      this.log.info('No driver available', { rideId: ride.id, mode });
      this.events.emit(DispatchEventKind.NO_DRIVER_AVAILABLE, `No driver available for ride ${ride.id}`, {
        rideId: ride.id,
        riderId
      });
      return ride.id;
    }

    this.assignWithFallback(ride, candidates);
    return ride.id;
  }

  /**
   * Shared rides go to drivers with a free seat; solo rides need a strictly
   * available driver. Registration order is preserved.
   */
  private findCandidates(mode: RideMode): Driver[] {
    const candidates: Driver[] = [];
    for (const driver of this.drivers.values()) {
      const eligible =
        mode === RideMode.SHARED
          ? this.carpool.canAccept(driver)
          : driver.status === DriverStatus.AVAILABLE;
      if (eligible) candidates.push(driver);
    }
    return candidates;
  }

  private acceptanceProbability(attempt: number): number {
    const { initialProbability, decayPerAttempt } = this.acceptance;
    return Math.max(0, initialProbability - attempt * decayPerAttempt);
  }

  private assignWithFallback(ride: Ride, candidates: Driver[]): boolean {
    const remaining = [...candidates];
    const { maxAttempts } = this.acceptance;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const choice = this.matchingPolicy.selectDriver(
        remaining.map(cloneDriver),
        ride.pickup,
        ride.vehicleClass
      );
      const idx = choice ? remaining.findIndex((d) => d.id === choice.id) : -1;
      if (idx === -1) break;

      const driver = remaining[idx];
      const probability = this.acceptanceProbability(attempt);

      if (this.random() < probability) {
        if (ride.isShared) {
          this.carpool.join(driver, ride.id);
        } else {
          driver.status = DriverStatus.ON_TRIP;
        }
        ride.assignDriver(driver.id);

        this.log.debug('Driver accepted ride', {
          rideId: ride.id,
          driverId: driver.id,
          attempt: attempt + 1,
          occupancy: this.carpool.occupancy(driver.id)
        });
        this.events.emit(
          DispatchEventKind.DRIVER_ASSIGNED,
          `Driver ${driver.name} assigned to ride ${ride.id}`,
          { rideId: ride.id, riderId: ride.riderId, driverId: driver.id }
        );
        return true;
      }

      this.events.emit(
        DispatchEventKind.DRIVER_REJECTED,
        `Driver ${driver.name} declined ride ${ride.id} (attempt ${attempt + 1} of ${maxAttempts})`,
        { rideId: ride.id, riderId: ride.riderId, driverId: driver.id }
      );
      remaining.splice(idx, 1);
    }

    this.log.info('No driver accepted ride', { rideId: ride.id });
    this.events.emit(DispatchEventKind.NO_DRIVER_ASSIGNED, `No driver accepted ride ${ride.id}`, {
      rideId: ride.id,
      riderId: ride.riderId
    });
    return false;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  updateRideStatus(rideId: string, status: RideStatus): RideSnapshot {
    const ride = this.requireRide(rideId);
    if (!RIDE_STATUSES.includes(status)) {
      throw new InvalidInputError(`Unknown ride status: ${String(status)}`);
    }
    ride.assertCanTransition(status);

    // price before touching state so a pricing failure leaves the ride as it was
    const settlement = status === RideStatus.COMPLETED ? this.priceRide(ride) : undefined;

    ride.transitionTo(status, this.clock());

    if (settlement) {
      this.settle(ride, settlement.distance, settlement.fare);
    } else if (status === RideStatus.CANCELLED) {
      this.releaseDriver(ride);
    }

    this.events.emit(DispatchEventKind.RIDE_STATUS_UPDATE, STATUS_MESSAGES[status], this.rideContext(ride));
    return ride.toSnapshot();
  }

  private priceRide(ride: Ride): { distance: number; fare: number } {
    const distance = tripDistance(ride.pickup, ride.dropoff);
    const pipelineFare = this.farePipeline.computeFare(distance, ride.vehicleClass);
    const fare = ride.isShared ? applyCarpoolReduction(pipelineFare) : pipelineFare;
    return { distance, fare };
  }

  private settle(ride: Ride, distance: number, fare: number): void {
    ride.settle(distance, fare);

    const driver = this.releaseDriver(ride);
    if (driver) {
      driver.location = ride.dropoff;
    }

    this.log.info('Ride settled', { rideId: ride.id, distance, fare });
    this.events.emit(
      DispatchEventKind.PAYMENT_COMPLETED,
      `Payment of Rs.${fare.toFixed(2)} completed for ride ${ride.id}`,
      this.rideContext(ride)
    );
  }

  private releaseDriver(ride: Ride): Driver | undefined {
    if (ride.driverId === null) return undefined;
    const driver = this.drivers.get(ride.driverId);
    if (!driver) return undefined;

    if (ride.isShared) {
      this.carpool.leave(driver, ride.id);
    } else {
      driver.status = DriverStatus.AVAILABLE;
    }
    return driver;
  }

  // ---------------------------------------------------------------------------
  // Driver and rider maintenance
  // ---------------------------------------------------------------------------

  updateDriverLocation(driverId: string, location: Location): Driver {
    const driver = this.requireDriver(driverId);
    driver.location = assertLocation(location, 'Driver location');
    return cloneDriver(driver);
  }

  /**
   * Take a driver online or offline. ON_TRIP is only ever set by dispatch.
   */
  setDriverAvailability(driverId: string, status: DriverStatus): Driver {
    const driver = this.requireDriver(driverId);
    if (status !== DriverStatus.AVAILABLE && status !== DriverStatus.OFFLINE) {
      throw new InvalidInputError('Driver status can only be set to AVAILABLE or OFFLINE');
    }
    const active = this.activeRideCount(driverId);
    if (active > 0) {
      throw new InvalidInputError(`Driver ${driverId} has ${active} active ride(s)`);
    }

    driver.status = status;
    this.log.info('Driver availability changed', { driverId, status });
    return cloneDriver(driver);
  }

  rateDriver(driverId: string, rating: number): Driver {
    const driver = this.requireDriver(driverId);
    assertRating(rating, `driver ${driverId}`);
    driver.rating = rating;
    return cloneDriver(driver);
  }

  rateRider(riderId: string, rating: number): Rider {
    const rider = this.riders.get(riderId);
    if (!rider) throw new NotFoundError('Rider', riderId);
    assertRating(rating, `rider ${riderId}`);
    rider.rating = rating;
    return cloneRider(rider);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getRide(rideId: string): RideSnapshot | undefined {
    return this.rides.get(rideId)?.toSnapshot();
  }

  listRides(filter: RideFilter = {}): RideSnapshot[] {
    const result: RideSnapshot[] = [];
    for (const ride of this.rides.values()) {
      if (filter.status && ride.status !== filter.status) continue;
      if (filter.riderId && ride.riderId !== filter.riderId) continue;
      result.push(ride.toSnapshot());
    }
    return result;
  }

  getDriver(driverId: string): Driver | undefined {
    const driver = this.drivers.get(driverId);
    return driver ? cloneDriver(driver) : undefined;
  }

  getRider(riderId: string): Rider | undefined {
    const rider = this.riders.get(riderId);
    return rider ? cloneRider(rider) : undefined;
  }

  getAvailableDrivers(): Driver[] {
    const available: Driver[] = [];
    for (const driver of this.drivers.values()) {
      if (driver.status === DriverStatus.AVAILABLE) available.push(cloneDriver(driver));
    }
    return available;
  }

  getCarpoolMembers(driverId: string): string[] {
    return this.carpool.members(driverId);
  }

  getSystemStatus(): SystemStatus {
    const drivers = { total: this.drivers.size, available: 0, onTrip: 0, offline: 0 };
    for (const driver of this.drivers.values()) {
      if (driver.status === DriverStatus.AVAILABLE) drivers.available++;
      else if (driver.status === DriverStatus.ON_TRIP) drivers.onTrip++;
      else drivers.offline++;
    }

    const ridesByStatus: Record<RideStatus, number> = {
      [RideStatus.REQUESTED]: 0,
      [RideStatus.DRIVER_ASSIGNED]: 0,
      [RideStatus.DRIVER_ENROUTE]: 0,
      [RideStatus.IN_PROGRESS]: 0,
      [RideStatus.COMPLETED]: 0,
      [RideStatus.CANCELLED]: 0
    };
    for (const ride of this.rides.values()) {
      ridesByStatus[ride.status]++;
    }

    return {
      drivers,
      riders: this.riders.size,
      totalRides: this.rides.size,
      ridesByStatus,
      activeCarpoolGroups: this.carpool.activeGroupCount(),
      matchingPolicy: this.matchingPolicy.name,
      farePipeline: this.farePipeline.describe()
    };
  }

  // ---------------------------------------------------------------------------
  // Hot swap and observers
  // ---------------------------------------------------------------------------

  setMatchingPolicy(policy: MatchingPolicy): void {
    this.matchingPolicy = policy;
    this.log.info('Matching policy changed', { policy: policy.name });
  }

  setFarePipeline(pipeline: FareStage): void {
    this.farePipeline = pipeline;
    this.log.info('Fare pipeline changed', { pipeline: pipeline.describe() });
  }

  subscribe(observer: DispatchObserver): () => void {
    return this.events.subscribe(observer);
  }

  unsubscribe(observer: DispatchObserver): boolean {
    return this.events.unsubscribe(observer);
  }

  // ---------------------------------------------------------------------------

  private rideContext(ride: Ride): EmitContext {
    return {
      rideId: ride.id,
      riderId: ride.riderId,
      ...(ride.driverId !== null ? { driverId: ride.driverId } : {})
    };
  }

  private requireRide(rideId: string): Ride {
    const ride = this.rides.get(rideId);
    if (!ride) throw new NotFoundError('Ride', rideId);
    return ride;
  }

  private requireDriver(driverId: string): Driver {
    const driver = this.drivers.get(driverId);
    if (!driver) throw new NotFoundError('Driver', driverId);
    return driver;
  }

  private activeRideCount(driverId: string): number {
    let count = 0;
    for (const ride of this.rides.values()) {
      if (ride.driverId === driverId && !isTerminal(ride.status)) count++;
    }
    return count;
  }

  private validateAcceptance(): void {
    const { initialProbability, decayPerAttempt, maxAttempts } = this.acceptance;
    if (!(initialProbability >= 0 && initialProbability <= 1)) {
      throw new InvalidConfigError(`Initial acceptance probability must be in [0, 1], got ${initialProbability}`);
    }
    if (!(decayPerAttempt >= 0)) {
      throw new InvalidConfigError(`Acceptance decay must be non-negative, got ${decayPerAttempt}`);
    }
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new InvalidConfigError(`Max assignment attempts must be a positive integer, got ${maxAttempts}`);
    }
  }
}
