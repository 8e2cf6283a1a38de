// =============================================================================
// PUBLISHING DESK — Health Probe
// Unauthenticated; used by container and load balancer checks.
// =============================================================================

import { Router, Request, Response } from 'express';
import { AppContext } from '../context';

export function healthRoutes(ctx: AppContext): Router {
  const router = Router();
  const startTime = Date.now();

  router.get('/', async (_req: Request, res: Response) => {
    const checks: Record<string, { status: string; latencyMs?: number }> = {};

    const dbStart = Date.now();
    try {
      await ctx.store.ping();
      checks.database = { status: 'healthy', latencyMs: Date.now() - dbStart };
    } catch (err) {
      ctx.logger.warn({ err }, 'Database health check failed');
      checks.database = { status: 'unhealthy', latencyMs: Date.now() - dbStart };
    }

    checks.permissions = {
      status: ctx.evaluator.lastRefreshedAt ? 'loaded' : 'not_loaded',
    };

    const healthy = checks.database.status === 'healthy';

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'degraded',
      service: 'publishing-desk',
      uptime: Math.floor((Date.now() - startTime) / 1000),
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
