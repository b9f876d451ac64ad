/**
 * Acceptance Metric Set
 *
 * One counter per block kind and per transaction kind, plus the two stake
 * gauges. Built and registered once at startup by initializeMetrics(); the
 * returned handle is passed to the acceptance dispatchers.
 *
 * The counter tables are typed as Record<BlockKind, ...> and Record<TxKind, ...>,
 * so a kind added to the block or transaction unions without a counter here
 * fails the build.
 */

import { Counter, Gauge } from 'prom-client';
import type { Logger } from 'winston';

import type { ApiInterceptor, ApiInterceptorFactory } from '../api/ApiInterceptor.js';
import { ErrorCollector, RegistrationError, causeMessage, type RegistrationFailure } from '../errors.js';
import type { BlockKind } from '../types/blocks.js';
import type { TxKind } from '../types/transactions.js';
import { buildFQName, registerAll, type MetricRegisterer, type NamedMetric } from './registration.js';

/** Metric-name fragment for each block kind */
export const BLOCK_METRIC_NAMES = {
  abort: 'abort',
  atomic: 'atomic',
  commit: 'commit',
  proposal: 'proposal',
  standard: 'standard'
} as const satisfies Record<BlockKind, string>;

/** Metric-name fragment for each transaction kind */
export const TX_METRIC_NAMES = {
  addDelegator: 'add_delegator',
  addSubnetValidator: 'add_subnet_validator',
  addValidator: 'add_validator',
  advanceTime: 'advance_time',
  createChain: 'create_chain',
  createSubnet: 'create_subnet',
  export: 'export',
  import: 'import',
  rewardValidator: 'reward_validator'
} as const satisfies Record<TxKind, string>;

export interface MetricSet {
  readonly percentConnected: Gauge;
  readonly totalStaked: Gauge;
  readonly blocksAccepted: Readonly<Record<BlockKind, Counter>>;
  readonly txsAccepted: Readonly<Record<TxKind, Counter>>;
  /** Present when an interceptor factory was supplied at initialization */
  readonly apiInterceptor?: ApiInterceptor;

  /**
   * Fraction of stake currently connected, in [0, 1].
   * @throws RangeError outside that range
   */
  setPercentConnected(fraction: number): void;

  /**
   * @throws RangeError if amount is negative
   */
  setTotalStaked(amount: bigint): void;
}

/**
 * Registration failed for some metrics. The set is still usable: metrics that
 * registered are exported, the others count without being scraped.
 */
export class MetricSetRegistrationError extends RegistrationError {
  constructor(
    failures: readonly RegistrationFailure[],
    public readonly metrics: MetricSet
  ) {
    super(failures);
    this.name = 'MetricSetRegistrationError';
  }
}

export interface InitializeMetricsOptions {
  apiInterceptorFactory?: ApiInterceptorFactory;
  logger?: Logger;
}

/**
 * Build every acceptance metric and register it with the registerer.
 *
 * Every registration is attempted even after one fails; the failures are
 * thrown together. Metrics that did register stay registered, and the error
 * carries the set so the caller can keep going with it.
 *
 * @throws MetricSetRegistrationError listing every metric that failed to register
 */
export function initializeMetrics(
  namespace: string,
  registerer: MetricRegisterer,
  options: InitializeMetricsOptions = {}
): MetricSet {
  const owned: NamedMetric[] = [];

  const newGauge = (name: string, help: string): Gauge => {
    const fqName = buildFQName(namespace, name);
    const gauge = new Gauge({ name: fqName, help, registers: [] });
    owned.push({ name: fqName, metric: gauge });
    return gauge;
  };

  const newCounter = (name: string, help: string): Counter => {
    const fqName = buildFQName(namespace, name);
    const counter = new Counter({ name: fqName, help, registers: [] });
    owned.push({ name: fqName, metric: counter });
    return counter;
  };

  const newBlockCounter = (kind: BlockKind): Counter => {
    const name = BLOCK_METRIC_NAMES[kind];
    return newCounter(`${name}_blks_accepted`, `Number of ${name} blocks accepted`);
  };

  const newTxCounter = (kind: TxKind): Counter => {
    const name = TX_METRIC_NAMES[kind];
    return newCounter(`${name}_txs_accepted`, `Number of ${name} transactions accepted`);
  };

  const percentConnected = newGauge('percent_connected', 'Percent of connected stake');
  const totalStaked = newGauge('total_staked', 'Total amount of AVAX staked');

  const blocksAccepted: Record<BlockKind, Counter> = {
    abort: newBlockCounter('abort'),
    atomic: newBlockCounter('atomic'),
    commit: newBlockCounter('commit'),
    proposal: newBlockCounter('proposal'),
    standard: newBlockCounter('standard')
  };

  const txsAccepted: Record<TxKind, Counter> = {
    addDelegator: newTxCounter('addDelegator'),
    addSubnetValidator: newTxCounter('addSubnetValidator'),
    addValidator: newTxCounter('addValidator'),
    advanceTime: newTxCounter('advanceTime'),
    createChain: newTxCounter('createChain'),
    createSubnet: newTxCounter('createSubnet'),
    export: newTxCounter('export'),
    import: newTxCounter('import'),
    rewardValidator: newTxCounter('rewardValidator')
  };

  const apiInterceptor = options.apiInterceptorFactory?.(namespace);

  const errors = new ErrorCollector();
  if (apiInterceptor) {
    registerAll(registerer, apiInterceptor.metrics, errors);
  }
  registerAll(registerer, owned, errors);

  const { logger } = options;
  if (logger) {
    for (const failure of errors.failed) {
      logger.error('[metrics] registration failed', {
        metric: failure.metric,
        error: causeMessage(failure.cause)
      });
    }
    logger.debug('[metrics] acceptance metrics initialized', {
      namespace,
      attempted: owned.length + (apiInterceptor?.metrics.length ?? 0),
      failed: errors.failed.length
    });
  }

  const metrics: MetricSet = {
    percentConnected,
    totalStaked,
    blocksAccepted,
    txsAccepted,
    apiInterceptor,

    setPercentConnected(fraction: number): void {
      if (!(fraction >= 0 && fraction <= 1)) {
        throw new RangeError(`percent connected must be within [0, 1], got ${fraction}`);
      }
      percentConnected.set(fraction);
    },

    setTotalStaked(amount: bigint): void {
      if (amount < 0n) {
        throw new RangeError(`total staked must be non-negative, got ${amount}`);
      }
      totalStaked.set(Number(amount));
    }
  };

  errors.throwIfAny(failures => new MetricSetRegistrationError(failures, metrics));

  return metrics;
}
