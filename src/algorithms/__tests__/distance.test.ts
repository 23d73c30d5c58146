import {
  DISTANCE_UNITS_PER_DEGREE,
  createLocation,
  planarDistance,
  sameCoordinates,
  tripDistance
} from '../distance';

describe('Distance', () => {
  it('should compute straight-line distance in degrees', () => {
    expect(planarDistance(createLocation(0, 0), createLocation(3, 4))).toBe(5);
  });

  it('should scale trip distance by the per-degree constant', () => {
    expect(DISTANCE_UNITS_PER_DEGREE).toBe(111);
    expect(tripDistance(createLocation(0, 0), createLocation(3, 4))).toBe(555);
  });

  it('should be symmetric', () => {
    const a = createLocation(19.07, 72.87);
    const b = createLocation(19.11, 72.84);

    expect(planarDistance(a, b)).toBe(planarDistance(b, a));
  });

  it('should compare coordinates only, ignoring addresses', () => {
    expect(sameCoordinates(createLocation(1, 2, 'Home'), createLocation(1, 2, 'Office'))).toBe(true);
    expect(sameCoordinates(createLocation(1, 2), createLocation(1, 2.0001))).toBe(false);
  });

  it('should create frozen locations with an empty default address', () => {
    const location = createLocation(10, 20);

    expect(location).toEqual({ latitude: 10, longitude: 20, address: '' });
    expect(Object.isFrozen(location)).toBe(true);
  });
});
