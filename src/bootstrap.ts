import type { Express } from 'express';
import type { Registry } from 'prom-client';
import type { Logger } from 'winston';

import { BlockAcceptanceDispatcher } from './acceptance/BlockAcceptanceDispatcher.js';
import { createApiInterceptor } from './api/ApiInterceptor.js';
import { buildApp } from './api/app.js';
import type { Env } from './config/envSchema.js';
import { initializeMetrics, type MetricSet } from './metrics/MetricSet.js';
import { createMetricsRegistry } from './metrics/registry.js';

export type BootstrapConfig = Pick<Env, 'metricsNamespace' | 'collectDefaultMetrics' | 'apiMetricsEnabled'>;

export interface Bootstrapped {
  registry: Registry;
  metrics: MetricSet;
  /** Hand this to the consensus engine's block acceptance path */
  blocks: BlockAcceptanceDispatcher;
  app: Express;
}

/**
 * Wire registry, metric set, dispatcher and HTTP app together.
 * @throws RegistrationError if any metric failed to register
 */
export function bootstrap(config: BootstrapConfig, logger: Logger): Bootstrapped {
  const registry = createMetricsRegistry({ collectDefaults: config.collectDefaultMetrics });

  const metrics = initializeMetrics(config.metricsNamespace, registry, {
    apiInterceptorFactory: config.apiMetricsEnabled ? createApiInterceptor : undefined,
    logger
  });

  const blocks = new BlockAcceptanceDispatcher(metrics);
  const app = buildApp({ registry, interceptor: metrics.apiInterceptor });

  logger.info('[bootstrap] acceptance metrics ready', {
    namespace: config.metricsNamespace,
    apiMetrics: config.apiMetricsEnabled,
    defaultMetrics: config.collectDefaultMetrics
  });

  return { registry, metrics, blocks, app };
}
