// Shared configuration

import { z } from 'zod';

// Custom Redis URL validator (redis:// URLs may not pass standard URL validation)
const redisUrl = z.string().refine(
  (val) => {
    try {
      const url = new URL(val);
      return url.protocol === 'redis:' || url.protocol === 'rediss:';
    } catch {
      return false;
    }
  },
  { message: 'Invalid Redis URL (expected redis:// or rediss://)' }
);

// Decimal strings such as "0.5" or "1000"
const decimal = z.string().regex(/^\d+(\.\d{1,18})?$/, 'Expected a non-negative decimal');

const dayCount = z.coerce.number().int().min(0).max(65535);

const ConfigSchema = z.object({
  // Redis (governance event fan-out)
  REDIS_URL: redisUrl.default('redis://localhost:6379'),
  EVENT_SINK: z.enum(['redis', 'none']).default('none'),

  // Service ports
  BRIDGE_PORT: z.coerce.number().default(3030),
  BRIDGE_URL: z.string().url().default('http://localhost:3030'),

  // Privileged caller for elevation and parameter updates
  OWNER_ADDRESS: z.string().min(1),

  // Accepted clock skew / age of a signed presence claim
  PRESENCE_MAX_AGE_SECONDS: z.coerce.number().int().positive().default(300),

  // Initial governance parameters
  TEMPERATURE_CHECK_DAYS: dayCount.default(7),
  TEMPERATURE_CHECK_QUORUM: decimal.default('1000'),
  TEMPERATURE_CHECK_APPROVAL_THRESHOLD: decimal.default('0.5'),
  TEMPERATURE_CHECK_PROPOSE_THRESHOLD: decimal.default('100'),
  PROPOSAL_LENGTH_DAYS: dayCount.default(14),
  PROPOSAL_QUORUM: decimal.default('5000'),
  PROPOSAL_APPROVAL_THRESHOLD: decimal.default('0.5'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Config = z.infer<typeof ConfigSchema>;

let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    _config = ConfigSchema.parse(process.env);
  }
  return _config;
}

/** Parse configuration from an explicit environment, bypassing the cache */
export function parseConfig(env: Record<string, string | undefined>): Config {
  return ConfigSchema.parse(env);
}
