import dotenv from 'dotenv';

import { loadEnv, type Env } from './envSchema.js';

dotenv.config();

let cached: Env | undefined;

function env(): Env {
  cached ??= loadEnv();
  return cached;
}

export const config = {
  get nodeEnv() { return env().nodeEnv; },
  get port() { return env().port; },

  get metricsNamespace() { return env().metricsNamespace; },
  get collectDefaultMetrics() { return env().collectDefaultMetrics; },
  get apiMetricsEnabled() { return env().apiMetricsEnabled; },

  get logLevel() { return env().logLevel; },
  get logFileEnabled() { return env().logFileEnabled; },
  get logFileRetentionHours() { return env().logFileRetentionHours; }
};
