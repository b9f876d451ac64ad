// ApiInterceptor: per-method request accounting for the platform API
// Counts requests, accumulates handling time and counts error responses.

import type { Request, RequestHandler } from 'express';
import { Counter } from 'prom-client';

import { buildFQName, type NamedMetric } from '../metrics/registration.js';
import { PLATFORM_RPC_METHODS, UNKNOWN_RPC_METHOD, UNMATCHED_ROUTE } from './rpcMethods.js';

export type ApiInterceptorFactory = (namespace: string) => ApiInterceptor;

export interface ApiInterceptorOptions {
  /** JSON-RPC methods labelled by name; defaults to the platform API */
  rpcMethods?: Iterable<string>;
}

export class ApiInterceptor {
  readonly requestDurationCount: Counter<string>;
  readonly requestDurationSum: Counter<string>;
  readonly requestErrors: Counter<string>;

  /**
   * Built but not registered; the owner registers them alongside its own
   * metrics so failures are reported together.
   */
  readonly metrics: readonly NamedMetric[];

  private readonly rpcMethods: ReadonlySet<string>;

  constructor(namespace: string, options: ApiInterceptorOptions = {}) {
    this.rpcMethods = new Set(options.rpcMethods ?? PLATFORM_RPC_METHODS);

    const countName = buildFQName(namespace, 'request_duration_count');
    const sumName = buildFQName(namespace, 'request_duration_sum');
    const errorsName = buildFQName(namespace, 'request_error_count');

    this.requestDurationCount = new Counter<string>({
      name: countName,
      help: 'Number of times this type of request was made',
      labelNames: ['method'],
      registers: []
    });
    this.requestDurationSum = new Counter<string>({
      name: sumName,
      help: 'Amount of time in nanoseconds that has been spent handling this type of request',
      labelNames: ['method'],
      registers: []
    });
    this.requestErrors = new Counter<string>({
      name: errorsName,
      help: 'Number of request errors',
      labelNames: ['method'],
      registers: []
    });

    this.metrics = [
      { name: countName, metric: this.requestDurationCount },
      { name: sumName, metric: this.requestDurationSum },
      { name: errorsName, metric: this.requestErrors }
    ];
  }

  /**
   * Express middleware. Mount before the API routes; the request is recorded
   * once the response has been sent.
   */
  middleware(): RequestHandler {
    return (req, res, next) => {
      const startedAt = process.hrtime.bigint();
      res.on('finish', () => {
        this.record(methodLabel(req, this.rpcMethods), process.hrtime.bigint() - startedAt, res.statusCode);
      });
      next();
    };
  }

  record(method: string, durationNs: bigint, statusCode: number): void {
    this.requestDurationCount.inc({ method });
    this.requestDurationSum.inc({ method }, Number(durationNs));
    if (statusCode >= 400) {
      this.requestErrors.inc({ method });
    }
  }
}

export const createApiInterceptor: ApiInterceptorFactory = namespace => new ApiInterceptor(namespace);

/**
 * Label values stay bounded: JSON-RPC calls by a known method name, other
 * requests by verb and matched route pattern, never by the raw URL.
 * Read once the response has finished, when the route is known.
 */
export function methodLabel(req: Request, rpcMethods: ReadonlySet<string>): string {
  const body: unknown = req.body;
  if (isJsonRpcCall(body)) {
    return rpcMethods.has(body.method) ? body.method : UNKNOWN_RPC_METHOD;
  }

  // Express leaves req.route unset (and req.baseUrl undefined) for requests
  // that fell through to its final handler
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null && 'path' in route) {
    return `${req.method} ${req.baseUrl || ''}${String(route.path)}`;
  }
  return UNMATCHED_ROUTE;
}

function isJsonRpcCall(body: unknown): body is { method: string } {
  return typeof body === 'object' && body !== null && 'method' in body && typeof body.method === 'string';
}
