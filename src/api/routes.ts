// API routes - health and Prometheus exposition
import { Router } from 'express';
import type { Registry } from 'prom-client';

export const SERVICE_NAME = 'platform-acceptance-metrics';

export default function buildRoutes(registry: Registry) {
  const router = Router();

  /**
   * GET /health - Health check endpoint
   */
  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME
    });
  });

  /**
   * GET /metrics - Prometheus text exposition of the registry
   */
  router.get('/metrics', (_req, res, next) => {
    registry.metrics()
      .then(body => {
        res.setHeader('Content-Type', registry.contentType);
        res.send(body);
      })
      .catch(next);
  });

  return router;
}
