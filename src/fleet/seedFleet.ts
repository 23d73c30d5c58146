import { DispatchCoordinator } from '../services/DispatchCoordinator';
import { DriverRegistration, RiderRegistration, VehicleClass } from '../types';
import { createLocation } from '../algorithms/distance';
import { NotificationLogObserver } from '../services/observers';
import { logger } from '../utils/logger';

const DEMO_RIDERS: RiderRegistration[] = [
  { id: 'R001', name: 'Asha Rao', phone: '+910000000101', defaultPickup: createLocation(19.076, 72.8777, 'Bandra West') },
  { id: 'R002', name: 'Kabir Shah', phone: '+910000000102', defaultPickup: createLocation(19.0596, 72.8295, 'Juhu') },
  { id: 'R003', name: 'Meera Iyer', phone: '+910000000103', defaultPickup: createLocation(19.1136, 72.8697, 'Andheri East') }
];

const DEMO_DRIVERS: DriverRegistration[] = [
  {
    id: 'D001',
    name: 'Ravi Menon',
    phone: '+910000000201',
    vehicle: { vehicleId: 'V001', vehicleClass: VehicleClass.SEDAN, capacity: 4, licensePlate: 'MH-01-AA-0001', model: 'Compact Sedan' },
    location: createLocation(19.0728, 72.8826, 'Kurla')
  },
  {
    id: 'D002',
    name: 'Sunil Pawar',
    phone: '+910000000202',
    vehicle: { vehicleId: 'V002', vehicleClass: VehicleClass.SUV, capacity: 7, licensePlate: 'MH-01-AA-0002', model: 'Seven Seater' },
    location: createLocation(19.0825, 72.8417, 'Santacruz')
  },
  {
    id: 'D003',
    name: 'Imran Khan',
    phone: '+910000000203',
    vehicle: { vehicleId: 'V003', vehicleClass: VehicleClass.TWO_WHEELER, capacity: 1, licensePlate: 'MH-01-AA-0003', model: 'Commuter 125' },
    location: createLocation(19.0544, 72.8406, 'Khar')
  },
  {
    id: 'D004',
    name: 'Ganesh Patil',
    phone: '+910000000204',
    vehicle: { vehicleId: 'V004', vehicleClass: VehicleClass.AUTO_RICKSHAW, capacity: 3, licensePlate: 'MH-01-AA-0004', model: 'CNG Auto' },
    location: createLocation(19.1197, 72.8464, 'Versova')
  }
];

/**
 * Register a small demo fleet and log the notifications each demo user would
 * receive. Ids already present are skipped.
 */
export function seedDemoFleet(coordinator: DispatchCoordinator): { riders: number; drivers: number } {
  let riders = 0;
  let drivers = 0;

  for (const rider of DEMO_RIDERS) {
    if (coordinator.getRider(rider.id)) continue;
    coordinator.registerRider(rider);
    coordinator.subscribe(new NotificationLogObserver('rider', rider.id));
    riders++;
  }
  for (const driver of DEMO_DRIVERS) {
    if (coordinator.getDriver(driver.id)) continue;
    coordinator.registerDriver(driver);
    coordinator.subscribe(new NotificationLogObserver('driver', driver.id));
    drivers++;
  }

  logger.info('Demo fleet seeded', { riders, drivers });
  return { riders, drivers };
}
