import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';
import { MAX_SUPPORTED_DEPTH } from '../services/trixel/locator.js';
import type { ContributionOptions, MeasurementType } from '../types/contribution.js';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const entityList = z
  .string()
  .default('')
  .transform((s) =>
    s
      .split(',')
      .map((id) => id.trim())
      .filter((id) => id.length > 0)
  );

const envSchema = z.object({
  // Home Assistant (host)
  HASS_URL: z.string().url(),
  HASS_TOKEN: z.string().min(1),
  HOME_LATITUDE: z.coerce.number().min(-90).max(90).optional(),
  HOME_LONGITUDE: z.coerce.number().min(-180).max(180).optional(),

  // Trixel lookup/measurement services
  TLS_HOST: z.string().min(1),
  TLS_USE_HTTPS: booleanFlag.default('true'),
  TMS_USE_HTTPS: booleanFlag.default('true'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  // Contribution
  PUBLISH_INTERVAL_SECONDS: z.coerce.number().int().min(15).max(900).default(60),
  K_REQUIREMENT: z.coerce.number().int().min(1).default(3),
  MAX_TRIXEL_DEPTH: z.coerce.number().int().min(0).max(MAX_SUPPORTED_DEPTH).default(24),
  INITIAL_TRIXEL_DEPTH: z.coerce.number().int().min(0).max(MAX_SUPPORTED_DEPTH).default(0),
  FAILURE_ESCALATION_CYCLES: z.coerce.number().int().positive().default(5),
  AMBIENT_TEMPERATURE_SENSORS: entityList,
  RELATIVE_HUMIDITY_SENSORS: entityList,

  // Registration persistence
  REDIS_URL: z.string().url().optional(),
  INSTANCE_ID: z.string().min(1).default('default'),

  // Server
  PORT: z.coerce.number().default(8088),
  HOST: z.string().default('0.0.0.0'),
  RATE_LIMIT_MAX: z.coerce.number().default(60),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

function loadConfig() {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('Invalid environment configuration:');
    console.error(result.error.format());
    throw new Error('Configuration validation failed');
  }

  return result.data;
}

export const config = loadConfig();

export type Config = z.infer<typeof envSchema>;

/**
 * Derived configuration values
 */
export const derivedConfig = {
  // Coordinate Home Assistant assigns during onboarding; not a real home
  onboardingHomeLatitude: 52.3731339,
  onboardingHomeLongitude: 4.8903147,

  // Host states that carry no reading
  unavailableStates: ['unavailable', 'unknown'] as readonly string[],
} as const;

/**
 * Host configuration schema consumed by the contribution core.
 */
export const contributionOptionsSchema = z
  .object({
    tlsHost: z.string().min(1),
    tlsUseHttps: z.boolean(),
    tmsUseHttps: z.boolean(),
    publishIntervalSeconds: z.number().int().min(15).max(900),
    kRequirement: z.number().int().min(1),
    maxTrixelDepth: z.number().int().min(0).max(MAX_SUPPORTED_DEPTH),
    initialTrixelDepth: z.number().int().min(0).max(MAX_SUPPORTED_DEPTH),
    sensorSelections: z.object({
      ambient_temperature: z.array(z.string().min(1)),
      relative_humidity: z.array(z.string().min(1)),
    }),
  })
  .refine((o) => o.initialTrixelDepth <= o.maxTrixelDepth, {
    message: 'initialTrixelDepth must not exceed maxTrixelDepth',
    path: ['initialTrixelDepth'],
  })
  .refine(
    (o) => Object.values(o.sensorSelections).some((ids) => ids.length > 0),
    { message: 'At least one sensor must be selected', path: ['sensorSelections'] }
  );

/**
 * Validate host options, raising ConfigurationError on the first problem.
 */
export function validateContributionOptions(input: unknown): ContributionOptions {
  const result = contributionOptionsSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.join('.') ?? '';
    throw new ConfigurationError(
      `Invalid contribution options${where ? ` (${where})` : ''}: ${issue?.message ?? 'unknown'}`,
      { cause: result.error }
    );
  }
  return result.data;
}

/**
 * Build contribution options from the environment configuration.
 */
export function buildContributionOptions(cfg: Config = config): ContributionOptions {
  const sensorSelections: Record<MeasurementType, string[]> = {
    ambient_temperature: cfg.AMBIENT_TEMPERATURE_SENSORS,
    relative_humidity: cfg.RELATIVE_HUMIDITY_SENSORS,
  };

  return validateContributionOptions({
    tlsHost: cfg.TLS_HOST,
    tlsUseHttps: cfg.TLS_USE_HTTPS,
    tmsUseHttps: cfg.TMS_USE_HTTPS,
    publishIntervalSeconds: cfg.PUBLISH_INTERVAL_SECONDS,
    kRequirement: cfg.K_REQUIREMENT,
    maxTrixelDepth: cfg.MAX_TRIXEL_DEPTH,
    initialTrixelDepth: cfg.INITIAL_TRIXEL_DEPTH,
    sensorSelections,
  });
}
