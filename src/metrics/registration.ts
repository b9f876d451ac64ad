import type { Metric } from 'prom-client';

import { ErrorCollector } from '../errors.js';

/**
 * Anything metrics can be attached to. prom-client's Registry satisfies this;
 * tests substitute fakes. Must throw when a metric cannot be registered.
 */
export interface MetricRegisterer {
  registerMetric(metric: Metric): void;
}

export interface NamedMetric {
  name: string;
  metric: Metric;
}

/**
 * Join non-empty name parts with underscores, e.g. ('platformvm', 'total_staked')
 * becomes 'platformvm_total_staked' and ('', 'total_staked') stays 'total_staked'.
 */
export function buildFQName(...parts: string[]): string {
  return parts.filter(part => part.length > 0).join('_');
}

/**
 * Attempt every registration; failures land in the collector.
 */
export function registerAll(
  registerer: MetricRegisterer,
  metrics: readonly NamedMetric[],
  errors: ErrorCollector
): void {
  for (const { name, metric } of metrics) {
    errors.attempt(name, () => registerer.registerMetric(metric));
  }
}
