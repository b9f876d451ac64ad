import { z } from 'zod';

import { ConfigError } from '../errors.js';
import { getEnvString, isBoolEnv, parseBoolEnv, parseIntEnv } from './parseEnv.js';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_PORT = 9650;
export const DEFAULT_METRICS_NAMESPACE = 'platformvm';

// Prometheus metric names: [a-zA-Z_:][a-zA-Z0-9_:]*
const METRIC_NAME_PREFIX = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;

const booleanString = z
  .string()
  .refine(isBoolEnv, { message: 'expected one of true/false/1/0/yes/no' })
  .optional();

const integerString = z
  .string()
  .regex(/^\s*\d*\s*$/, { message: 'expected a non-negative integer' })
  .optional();

export const rawEnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  PORT: integerString,

  METRICS_NAMESPACE: z
    .string()
    .refine(v => v.trim() === '' || METRIC_NAME_PREFIX.test(v.trim()), {
      message: 'must be a valid Prometheus metric name prefix'
    })
    .optional(),
  COLLECT_DEFAULT_METRICS: booleanString,
  API_METRICS_ENABLED: booleanString,

  // Logging
  LOG_LEVEL: z
    .string()
    .transform(v => v.trim().toLowerCase() || undefined)
    .pipe(z.enum(LOG_LEVELS).optional())
    .optional(),
  LOG_FILE_ENABLED: booleanString,
  LOG_FILE_RETENTION_HOURS: integerString
});

export interface Env {
  nodeEnv: string;
  port: number;
  metricsNamespace: string;
  collectDefaultMetrics: boolean;
  apiMetricsEnabled: boolean;
  logLevel: LogLevel;
  logFileEnabled: boolean;
  logFileRetentionHours: number;
}

/**
 * Validate and normalize the environment.
 * @throws ConfigError listing every invalid variable
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = rawEnvSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const parsed = result.data;

  const port = parseIntEnv(parsed.PORT?.trim(), DEFAULT_PORT);
  if (port < 1 || port > 65535) {
    throw new ConfigError([`PORT: must be within 1-65535, got ${port}`]);
  }

  return {
    nodeEnv: getEnvString(parsed.NODE_ENV, 'development'),
    port,
    metricsNamespace: getEnvString(parsed.METRICS_NAMESPACE, DEFAULT_METRICS_NAMESPACE),
    collectDefaultMetrics: parseBoolEnv(parsed.COLLECT_DEFAULT_METRICS, true),
    apiMetricsEnabled: parseBoolEnv(parsed.API_METRICS_ENABLED, true),
    logLevel: parsed.LOG_LEVEL ?? 'info',
    logFileEnabled: parseBoolEnv(parsed.LOG_FILE_ENABLED, false),
    logFileRetentionHours: parseIntEnv(parsed.LOG_FILE_RETENTION_HOURS?.trim(), 24, 1)
  };
}
