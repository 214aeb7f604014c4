import { z } from 'zod';
import {
  DEFAULT_DISKSTATS_SOURCE,
  DEFAULT_METRIC_PREFIX,
  DEFAULT_REFRESH_INTERVAL,
  MAX_REFRESH_INTERVAL,
} from '../constants.js';

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
});

export const collectorConfigSchema = z.object({
  source: z.string().min(1).default(DEFAULT_DISKSTATS_SOURCE),
  prefix: z
    .string()
    .regex(/^[^\s]*$/, 'prefix must not contain whitespace')
    .default(DEFAULT_METRIC_PREFIX),
  interval: z
    .union([
      z.string().min(1),
      z.number().int().positive().max(MAX_REFRESH_INTERVAL, `must be at most ${MAX_REFRESH_INTERVAL} ms`),
    ])
    .default(DEFAULT_REFRESH_INTERVAL),
  logging: loggingConfigSchema.default({}),
});

export type CollectorConfigInput = z.input<typeof collectorConfigSchema>;
