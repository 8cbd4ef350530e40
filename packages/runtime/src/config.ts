// Tracker configuration

import { z } from 'zod';
import { DEFAULT_SERVICE_NAME } from '@logitrace/protocol';
import { ConfigurationError } from './errors.js';

/** Watchlist scan cadence: once per second at 60 ticks/s */
export const DEFAULT_SCAN_INTERVAL_TICKS = 60;

/** Watchlist quiescence window: ten minutes at 60 ticks/s */
export const DEFAULT_QUIESCENCE_WINDOW_TICKS = 36_000;

const TrackerConfigSchema = z.object({
  scanIntervalTicks: z.number().int().positive().default(DEFAULT_SCAN_INTERVAL_TICKS),
  quiescenceWindowTicks: z.number().int().positive().default(DEFAULT_QUIESCENCE_WINDOW_TICKS),
  serviceName: z.string().trim().min(1).default(DEFAULT_SERVICE_NAME),
});

export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;

export type TrackerConfigInput = z.input<typeof TrackerConfigSchema>;

/**
 * Fill defaults and validate.
 *
 * @throws ConfigurationError naming the first invalid field
 */
export function resolveConfig(input: TrackerConfigInput = {}): TrackerConfig {
  const result = TrackerConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ConfigurationError(`Invalid tracker configuration at "${field}": ${issue.message}`, field);
  }
  return result.data;
}

const EnvSchema = z.object({
  LOGITRACE_SCAN_INTERVAL_TICKS: z.coerce.number().optional(),
  LOGITRACE_QUIESCENCE_TICKS: z.coerce.number().optional(),
  LOGITRACE_SERVICE_NAME: z.string().optional(),
});

/**
 * Read configuration from environment variables:
 * LOGITRACE_SCAN_INTERVAL_TICKS, LOGITRACE_QUIESCENCE_TICKS, LOGITRACE_SERVICE_NAME.
 * Unset variables take their defaults.
 *
 * @throws ConfigurationError for a value that is not a positive integer
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): TrackerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw new ConfigurationError(`Invalid environment variable ${field}: ${issue.message}`, field);
  }

  return resolveConfig({
    scanIntervalTicks: parsed.data.LOGITRACE_SCAN_INTERVAL_TICKS,
    quiescenceWindowTicks: parsed.data.LOGITRACE_QUIESCENCE_TICKS,
    serviceName: parsed.data.LOGITRACE_SERVICE_NAME,
  });
}
