export interface Location {
  readonly latitude: number;
  readonly longitude: number;
  readonly address: string;
}

export enum VehicleClass {
  TWO_WHEELER = 'TWO_WHEELER',
  SEDAN = 'SEDAN',
  SUV = 'SUV',
  AUTO_RICKSHAW = 'AUTO_RICKSHAW'
}

export enum RideMode {
  SOLO = 'SOLO',
  SHARED = 'SHARED'
}

export enum RideStatus {
  REQUESTED = 'REQUESTED',
  DRIVER_ASSIGNED = 'DRIVER_ASSIGNED',
  DRIVER_ENROUTE = 'DRIVER_ENROUTE',
  IN_PROGRESS = 'IN_PROGRESS',
  COMPLETED = 'COMPLETED',
  CANCELLED = 'CANCELLED'
}

export enum DriverStatus {
  AVAILABLE = 'AVAILABLE',
  ON_TRIP = 'ON_TRIP',
  OFFLINE = 'OFFLINE'
}

export interface Vehicle {
  vehicleId: string;
  vehicleClass: VehicleClass;
  capacity: number; // seats offered to riders
  licensePlate: string;
  model: string;
}

export interface Driver {
  id: string;
  name: string;
  phone: string;
  vehicle: Vehicle;
  location: Location;
  status: DriverStatus;
  rating: number;
}

export interface Rider {
  id: string;
  name: string;
  phone: string;
  defaultPickup: Location;
  rating: number;
}

export interface DriverRegistration {
  id: string;
  name: string;
  phone: string;
  vehicle: Vehicle;
  location: Location;
  status?: DriverStatus;
  rating?: number;
}

export interface RiderRegistration {
  id: string;
  name: string;
  phone: string;
  defaultPickup?: Location;
  rating?: number;
}

/**
 * Plain snapshot of a ride, safe to hand to callers and to serialize.
 */
export interface RideSnapshot {
  id: string;
  riderId: string;
  driverId: string | null;
  pickup: Location;
  dropoff: Location;
  vehicleClass: VehicleClass;
  mode: RideMode;
  status: RideStatus;
  distance: number;
  fare: number;
  requestedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  cancelledAt: Date | null;
}

export interface SystemStatus {
  drivers: {
    total: number;
    available: number;
    onTrip: number;
    offline: number;
  };
  riders: number;
  totalRides: number;
  ridesByStatus: Record<RideStatus, number>;
  activeCarpoolGroups: number;
  matchingPolicy: string;
  farePipeline: string;
}

export interface RideFilter {
  status?: RideStatus;
  riderId?: string;
}
