import express from 'express';
import type { Registry } from 'prom-client';

import type { ApiInterceptor } from './ApiInterceptor.js';
import buildRoutes from './routes.js';

export interface AppOptions {
  registry: Registry;
  interceptor?: ApiInterceptor;
}

export function buildApp({ registry, interceptor }: AppOptions): express.Express {
  const app = express();
  app.use(express.json());
  if (interceptor) {
    app.use(interceptor.middleware());
  }
  app.use(buildRoutes(registry));
  return app;
}
