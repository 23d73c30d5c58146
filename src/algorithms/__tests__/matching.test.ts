import { NearestDriverPolicy, HighestRatedPolicy, createMatchingPolicy } from '../matching';
import { createLocation } from '../distance';
import { Driver, DriverStatus, VehicleClass } from '../../types';
import { InvalidConfigError } from '../../utils/errors';

describe('Matching policies', () => {
  const pickup = createLocation(19.0, 72.8, 'Pickup');

  const createMockDriver = (overrides: Partial<Driver> & { vehicleClass?: VehicleClass } = {}): Driver => {
    const { vehicleClass = VehicleClass.SEDAN, ...rest } = overrides;
    return {
      id: 'D1',
      name: 'Driver',
      phone: '+910000000000',
      vehicle: {
        vehicleId: 'V1',
        vehicleClass,
        capacity: 4,
        licensePlate: 'TEST-0001',
        model: 'Test Model'
      },
      location: createLocation(19.01, 72.8),
      status: DriverStatus.AVAILABLE,
      rating: 4.5,
      ...rest
    };
  };

  describe('NearestDriverPolicy', () => {
    let policy: NearestDriverPolicy;

    beforeEach(() => {
      policy = new NearestDriverPolicy();
    });

    it('should pick the closest driver of the requested class', () => {
      const far = createMockDriver({ id: 'far', location: createLocation(19.1, 72.8) });
      const near = createMockDriver({ id: 'near', location: createLocation(19.002, 72.8) });

      expect(policy.selectDriver([far, near], pickup, VehicleClass.SEDAN)?.id).toBe('near');
    });

    it('should never return a driver of another class', () => {
      const closeSuv = createMockDriver({
        id: 'suv',
        vehicleClass: VehicleClass.SUV,
        location: createLocation(19.0, 72.8)
      });
      const farSedan = createMockDriver({ id: 'sedan', location: createLocation(19.5, 73.2) });

      const chosen = policy.selectDriver([closeSuv, farSedan], pickup, VehicleClass.SEDAN);

      expect(chosen?.id).toBe('sedan');
      expect(chosen?.vehicle.vehicleClass).toBe(VehicleClass.SEDAN);
    });

    it('should return undefined when no candidate has the requested class', () => {
      const bike = createMockDriver({ vehicleClass: VehicleClass.TWO_WHEELER });

      expect(policy.selectDriver([bike], pickup, VehicleClass.SUV)).toBeUndefined();
      expect(policy.selectDriver([], pickup, VehicleClass.SUV)).toBeUndefined();
    });

    it('should keep the first candidate when two are equally distant', () => {
      const first = createMockDriver({ id: 'first', location: createLocation(19.01, 72.8) });
      const second = createMockDriver({ id: 'second', location: createLocation(19.01, 72.8) });

      expect(policy.selectDriver([first, second], pickup, VehicleClass.SEDAN)?.id).toBe('first');
      expect(policy.selectDriver([second, first], pickup, VehicleClass.SEDAN)?.id).toBe('second');
    });

    it('should not mutate candidates', () => {
      const driver = createMockDriver();
      const before = JSON.stringify(driver);

      policy.selectDriver([driver], pickup, VehicleClass.SEDAN);

      expect(JSON.stringify(driver)).toBe(before);
    });
  });

  describe('HighestRatedPolicy', () => {
    let policy: HighestRatedPolicy;

    beforeEach(() => {
      policy = new HighestRatedPolicy();
    });

    it('should pick the best rated driver of the requested class regardless of distance', () => {
      const nearAverage = createMockDriver({ id: 'near', rating: 3.9, location: createLocation(19.0, 72.8) });
      const farExcellent = createMockDriver({ id: 'far', rating: 4.9, location: createLocation(19.4, 73.0) });
      const bestButAuto = createMockDriver({ id: 'auto', rating: 5, vehicleClass: VehicleClass.AUTO_RICKSHAW });

      expect(policy.selectDriver([nearAverage, farExcellent, bestButAuto], pickup, VehicleClass.SEDAN)?.id).toBe(
        'far'
      );
    });

    it('should keep the first candidate on equal ratings', () => {
      const a = createMockDriver({ id: 'a', rating: 4.2 });
      const b = createMockDriver({ id: 'b', rating: 4.2 });

      expect(policy.selectDriver([a, b], pickup, VehicleClass.SEDAN)?.id).toBe('a');
    });

    it('should accept a zero-rated driver when it is the only match', () => {
      const unrated = createMockDriver({ id: 'zero', rating: 0 });

      expect(policy.selectDriver([unrated], pickup, VehicleClass.SEDAN)?.id).toBe('zero');
    });
  });

  describe('createMatchingPolicy', () => {
    it('should build policies by name', () => {
      expect(createMatchingPolicy('nearest')).toBeInstanceOf(NearestDriverPolicy);
      expect(createMatchingPolicy('highest-rated')).toBeInstanceOf(HighestRatedPolicy);
    });

    it('should reject unknown names', () => {
      expect(() => createMatchingPolicy('cheapest')).toThrow(InvalidConfigError);
    });
  });
});
