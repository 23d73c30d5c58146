import dotenv from 'dotenv';
import { z } from 'zod';
import { MATCHING_POLICY_NAMES } from '../algorithms/matching';
import { FareModifier } from '../algorithms/pricing';
import { InvalidConfigError } from '../utils/errors';
import { DEFAULT_EVENTS_CHANNEL } from '../services/RedisEventRelay';

const optionalNumber = z.coerce.number().finite().optional();

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  MATCHING_POLICY: z.enum(MATCHING_POLICY_NAMES).default('nearest'),
  SURGE_MULTIPLIER: optionalNumber,
  DISCOUNT_PERCENT: optionalNumber,
  TOLL_SURCHARGE: optionalNumber,
  ACCEPTANCE_SEED: z.coerce.number().int().optional(),
  REDIS_URL: z.string().url().optional(),
  REDIS_EVENTS_CHANNEL: z.string().min(1).default(DEFAULT_EVENTS_CHANNEL),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  SEED_DEMO_FLEET: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true')
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  matchingPolicy: Env['MATCHING_POLICY'];
  fareModifiers: FareModifier[];
  acceptanceSeed?: number;
  redis?: {
    url: string;
    channel: string;
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
  seedDemoFleet: boolean;
}

// blank values in .env files mean "unset"
function dropBlank(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') result[key] = value;
  }
  return result;
}

/**
 * Surge wraps the base stage first, then discount, then toll.
 */
function fareModifiersFrom(env: Env): FareModifier[] {
  const modifiers: FareModifier[] = [];
  if (env.SURGE_MULTIPLIER !== undefined) {
    modifiers.push({ kind: 'surge', multiplier: env.SURGE_MULTIPLIER });
  }
  if (env.DISCOUNT_PERCENT !== undefined) {
    modifiers.push({ kind: 'discount', percent: env.DISCOUNT_PERCENT });
  }
  if (env.TOLL_SURCHARGE !== undefined) {
    modifiers.push({ kind: 'toll', surcharge: env.TOLL_SURCHARGE });
  }
  return modifiers;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    throw new InvalidConfigError('Invalid environment configuration', parsed.error.flatten().fieldErrors);
  }
  const values = parsed.data;

  return {
    port: values.PORT,
    nodeEnv: values.NODE_ENV,
    logLevel: values.LOG_LEVEL ?? (values.NODE_ENV === 'development' ? 'debug' : 'info'),
    matchingPolicy: values.MATCHING_POLICY,
    fareModifiers: fareModifiersFrom(values),
    acceptanceSeed: values.ACCEPTANCE_SEED,
    redis: values.REDIS_URL ? { url: values.REDIS_URL, channel: values.REDIS_EVENTS_CHANNEL } : undefined,
    rateLimit: {
      windowMs: values.RATE_LIMIT_WINDOW_MS,
      maxRequests: values.RATE_LIMIT_MAX_REQUESTS
    },
    seedDemoFleet: values.SEED_DEMO_FLEET
  };
}

/**
 * Reads `.env` (if present) into process.env, then parses it.
 */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
