/**
 * routes/health.ts — Health check endpoints
 *
 * GET /api/health         — Quick liveness check
 * GET /api/health/ready   — Readiness: dataset loaded + memory
 */
import { Router, type Request, type Response } from 'express';
import { env } from '../config/env.ts';
import { getDataset, hasDataset } from '../services/state.ts';

const router = Router();

router.get('/', (_req: Request, res: Response) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    uptime: Math.round(process.uptime()),
    version: process.env.npm_package_version || '1.0.0',
  });
});

router.get('/ready', (_req: Request, res: Response) => {
  const ready = hasDataset();
  const mem = process.memoryUsage();
  const dataset = ready ? getDataset() : null;

  res.status(ready ? 200 : 503).json({
    status: ready ? 'ok' : 'loading',
    timestamp: new Date().toISOString(),
    uptime: Math.round(process.uptime()),
    checks: {
      dataset: dataset
        ? { status: 'ok', markets: dataset.markets.length, source: dataset.source, loadedAt: dataset.loadedAt }
        : { status: 'loading' },
      memory: {
        status: 'ok',
        heapUsedMB: Math.round(mem.heapUsed / 1024 / 1024),
        rssMB: Math.round(mem.rss / 1024 / 1024),
      },
    },
    config: { nodeEnv: env.NODE_ENV },
  });
});

export default router;
