import { z } from 'zod';
import { DriverStatus, RideMode, RideStatus, VehicleClass } from '../types';

export const locationSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  address: z.string().max(255).optional().default('')
});

export const ratingSchema = z.number().min(0).max(5);

export const vehicleClassSchema = z.nativeEnum(VehicleClass);
export const rideModeSchema = z.nativeEnum(RideMode);
export const rideStatusSchema = z.nativeEnum(RideStatus);

export const driverAvailabilitySchema = z.object({
  status: z.enum([DriverStatus.AVAILABLE, DriverStatus.OFFLINE])
});
