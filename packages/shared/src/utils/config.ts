import msLib from 'ms';
import { MAX_REFRESH_INTERVAL } from '../constants.js';
import { collectorConfigSchema, logLevelSchema } from '../schemas/config.schema.js';
import type { CollectorConfigInput } from '../schemas/config.schema.js';
import type { LogLevel } from './logger.js';
import { ConfigValidationError } from './errors.js';

export interface CollectorConfig {
  source: string;
  prefix: string;
  /** Refresh interval in milliseconds. */
  interval: number;
  logging: {
    level: LogLevel;
  };
}

/**
 * Validate raw collector configuration and resolve durations.
 * Throws ConfigValidationError listing every problem found.
 */
export function resolveCollectorConfig(input: unknown = {}): CollectorConfig {
  const result = collectorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const { interval, ...rest } = result.data;

  return { ...rest, interval: toIntervalMillis(interval) };
}

/** Accepts milliseconds or an `ms` duration string such as '5s' or '1m'. */
function toIntervalMillis(interval: string | number): number {
  if (typeof interval === 'number') return interval;

  const millis = msLib(interval);
  if (millis === undefined) {
    throw new ConfigValidationError([`interval: invalid duration "${interval}"`]);
  }
  if (!Number.isFinite(millis) || millis <= 0) {
    throw new ConfigValidationError([`interval: must be a positive duration, got "${interval}"`]);
  }
  if (millis > MAX_REFRESH_INTERVAL) {
    throw new ConfigValidationError([
      `interval: must be at most ${MAX_REFRESH_INTERVAL} ms, got "${interval}"`,
    ]);
  }
  return millis;
}

/**
 * Map DISKPULSE_* environment variables onto collector configuration input.
 * Unset variables are left out so schema defaults apply.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): CollectorConfigInput {
  const input: CollectorConfigInput = {};

  if (env.DISKPULSE_SOURCE) input.source = env.DISKPULSE_SOURCE;
  if (env.DISKPULSE_PREFIX !== undefined) input.prefix = env.DISKPULSE_PREFIX;
  if (env.DISKPULSE_INTERVAL) input.interval = env.DISKPULSE_INTERVAL;

  if (env.DISKPULSE_LOG_LEVEL) {
    input.logging = { level: parseLogLevel(env.DISKPULSE_LOG_LEVEL) };
  }

  return input;
}

function parseLogLevel(value: string): LogLevel {
  const parsed = logLevelSchema.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new ConfigValidationError([`logging.level: unknown log level "${value}"`]);
  }
  return parsed.data;
}
