import { Router, type Request, type Response } from 'express';
import type { Registry } from 'prom-client';

export function createMetricsRouter(registry: Registry): Router {
  const metricsRouter: ReturnType<typeof Router> = Router();

  metricsRouter.get('/', async (_req: Request, res: Response) => {
    try {
      const body = await registry.metrics();
      res.set('Content-Type', registry.contentType);
      res.send(body);
    } catch (error) {
      console.error('[metrics] scrape failed', error);
      res.status(500).json({ error: 'internal_error' });
    }
  });

  return metricsRouter;
}
