export { BlockAcceptanceDispatcher } from './acceptance/BlockAcceptanceDispatcher.js';
export { TransactionAcceptanceDispatcher } from './acceptance/TransactionAcceptanceDispatcher.js';
export {
  ApiInterceptor,
  createApiInterceptor,
  type ApiInterceptorFactory,
  type ApiInterceptorOptions
} from './api/ApiInterceptor.js';
export { PLATFORM_RPC_METHODS, UNKNOWN_RPC_METHOD, UNMATCHED_ROUTE } from './api/rpcMethods.js';
export { buildApp, type AppOptions } from './api/app.js';
export { bootstrap, type BootstrapConfig, type Bootstrapped } from './bootstrap.js';
export { loadEnv, type Env, type LogLevel } from './config/envSchema.js';
export {
  AcceptanceMetricsError,
  ConfigError,
  ErrorCollector,
  RegistrationError,
  UnknownBlockTypeError,
  UnknownTransactionTypeError,
  type AcceptanceMetricsErrorCode,
  type RegistrationFailure
} from './errors.js';
export { createAppLogger, type AppLoggerOptions } from './logging/logger.js';
export {
  BLOCK_METRIC_NAMES,
  MetricSetRegistrationError,
  TX_METRIC_NAMES,
  initializeMetrics,
  type InitializeMetricsOptions,
  type MetricSet
} from './metrics/MetricSet.js';
export { buildFQName, type MetricRegisterer, type NamedMetric } from './metrics/registration.js';
export { createMetricsRegistry, type MetricsRegistryOptions } from './metrics/registry.js';
export type * from './types/index.js';
