import { loadConfig } from '../index';
import { InvalidConfigError } from '../../utils/errors';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      nodeEnv: 'development',
      logLevel: 'debug',
      matchingPolicy: 'nearest',
      fareModifiers: [],
      acceptanceSeed: undefined,
      redis: undefined,
      rateLimit: { windowMs: 60000, maxRequests: 100 },
      seedDemoFleet: false
    });
  });

  it('should build fare modifiers in surge, discount, toll order', () => {
    const config = loadConfig({
      TOLL_SURCHARGE: '15',
      DISCOUNT_PERCENT: '10',
      SURGE_MULTIPLIER: '1.5'
    });

    expect(config.fareModifiers).toEqual([
      { kind: 'surge', multiplier: 1.5 },
      { kind: 'discount', percent: 10 },
      { kind: 'toll', surcharge: 15 }
    ]);
  });

  it('should read service settings', () => {
    const config = loadConfig({
      PORT: '8080',
      NODE_ENV: 'production',
      MATCHING_POLICY: 'highest-rated',
      ACCEPTANCE_SEED: '42',
      REDIS_URL: 'redis://localhost:6379',
      SEED_DEMO_FLEET: 'true'
    });

    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('info');
    expect(config.matchingPolicy).toBe('highest-rated');
    expect(config.acceptanceSeed).toBe(42);
    expect(config.redis).toEqual({ url: 'redis://localhost:6379', channel: 'dispatch:events' });
    expect(config.seedDemoFleet).toBe(true);
  });

  it('should treat blank values as unset', () => {
    const config = loadConfig({ SURGE_MULTIPLIER: '', REDIS_URL: '  ', LOG_LEVEL: '' });

    expect(config.fareModifiers).toEqual([]);
    expect(config.redis).toBeUndefined();
    expect(config.logLevel).toBe('debug');
  });

  it('should reject unknown matching policies with field details', () => {
    let caught: unknown;
    try {
      loadConfig({ MATCHING_POLICY: 'cheapest' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidConfigError);
    if (caught instanceof InvalidConfigError) {
      expect(caught.details).toEqual({ MATCHING_POLICY: [expect.any(String)] });
    }
  });

  it('should reject malformed numbers', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(InvalidConfigError);
    expect(() => loadConfig({ SURGE_MULTIPLIER: 'high' })).toThrow(InvalidConfigError);
  });
});
