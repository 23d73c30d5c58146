import { seedDemoFleet } from '../seedFleet';
import { DispatchCoordinator } from '../../services/DispatchCoordinator';
import { createLocation } from '../../algorithms/distance';
import { RideMode, VehicleClass } from '../../types';
import { Logger } from '../../utils/logger';

describe('seedDemoFleet', () => {
  let coordinator: DispatchCoordinator;

  beforeEach(() => {
    coordinator = new DispatchCoordinator({ random: () => 0, logger: new Logger('error') });
  });

  it('should register one driver per vehicle class and three riders', () => {
    expect(seedDemoFleet(coordinator)).toEqual({ riders: 3, drivers: 4 });

    const status = coordinator.getSystemStatus();
    expect(status.riders).toBe(3);
    expect(status.drivers).toEqual({ total: 4, available: 4, onTrip: 0, offline: 0 });
    expect(coordinator.getDriver('D002')?.vehicle.capacity).toBe(7);
  });

  it('should skip ids that are already registered', () => {
    seedDemoFleet(coordinator);

    expect(seedDemoFleet(coordinator)).toEqual({ riders: 0, drivers: 0 });
  });

  it('should give shared SUV requests to the seven-seat SUV', () => {
    seedDemoFleet(coordinator);

    const rideId = coordinator.requestRide(
      'R001',
      createLocation(19.076, 72.8777),
      createLocation(19.1136, 72.8697),
      RideMode.SHARED,
      VehicleClass.SUV
    );

    expect(coordinator.getRide(rideId)?.driverId).toBe('D002');
    expect(coordinator.getCarpoolMembers('D002')).toEqual([rideId]);
  });
});
