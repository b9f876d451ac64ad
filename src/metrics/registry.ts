/**
 * Metrics Registry
 *
 * Builds the prom-client Registry the metric set and the API interceptor
 * register against. A fresh registry per process (or per test) keeps metric
 * names from colliding with prom-client's global default registry.
 */

import { Registry, collectDefaultMetrics } from 'prom-client';

export interface MetricsRegistryOptions {
  /** Also export prom-client's process/runtime metrics */
  collectDefaults?: boolean;
}

export function createMetricsRegistry(options: MetricsRegistryOptions = {}): Registry {
  const registry = new Registry();
  if (options.collectDefaults) {
    collectDefaultMetrics({ register: registry });
  }
  return registry;
}
