/**
 * shared/metrics.ts — Prometheus metrics via prom-client
 *
 * Exposes: /api/metrics
 *
 * Metrics:
 *   market_http_requests_total            — Counter by method/route/status
 *   market_http_request_duration_seconds  — Histogram by method/route/status
 *   market_scoring_passes_total           — Counter by weighting mode
 *   market_scoring_pass_duration_seconds  — Histogram for full pipeline passes
 *   market_scoring_filtered_markets       — Gauge, markets left after the capital filter
 *   market_dataset_size                   — Gauge, markets in the loaded dataset
 */
import {
  Registry, Counter, Histogram, Gauge,
  collectDefaultMetrics,
} from 'prom-client';
import { logger } from './logger.ts';
import type { Request, Response, NextFunction } from 'express';

export const registry = new Registry();

// Node.js runtime metrics (event loop lag, GC, memory)
collectDefaultMetrics({ register: registry, prefix: 'market_' });

// ── HTTP Metrics ──

export const httpRequestsTotal = new Counter({
  name: 'market_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'market_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [registry],
});

// ── Scoring Metrics ──

export const scoringPasses = new Counter({
  name: 'market_scoring_passes_total',
  help: 'Full scoring pipeline passes',
  labelNames: ['mode'] as const, // theme, metric
  registers: [registry],
});

export const scoringPassDuration = new Histogram({
  name: 'market_scoring_pass_duration_seconds',
  help: 'Duration of one scoring pipeline pass in seconds',
  buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5],
  registers: [registry],
});

export const filteredMarkets = new Gauge({
  name: 'market_scoring_filtered_markets',
  help: 'Markets remaining after the capital filter on the last pass',
  registers: [registry],
});

export const datasetSize = new Gauge({
  name: 'market_dataset_size',
  help: 'Number of markets in the loaded dataset',
  registers: [registry],
});

/**
 * Normalize route for metric labels: the matched route pattern when Express
 * resolved one, else the path without its query string.
 */
function normalizeRoute(req: Request): string {
  const pattern: unknown = req.route?.path;
  if (typeof pattern === 'string') return req.baseUrl + pattern;
  return (req.originalUrl || req.url).split('?')[0] ?? req.url;
}

/**
 * Metrics collection middleware. Place early in the middleware chain.
 */
export function metricsMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.path.endsWith('/metrics')) return next();

    const end = httpRequestDuration.startTimer();
    res.on('finish', () => {
      const labels = { method: req.method, route: normalizeRoute(req), status_code: String(res.statusCode) };
      end(labels);
      httpRequestsTotal.inc(labels);
    });

    next();
  };
}

/**
 * Metrics endpoint handler. Returns Prometheus text format.
 */
export async function metricsEndpoint(_req: Request, res: Response): Promise<void> {
  try {
    res.set('Content-Type', registry.contentType);
    res.end(await registry.metrics());
  } catch (err) {
    logger.error({ err }, 'Metrics collection failed');
    res.status(500).end('Error collecting metrics');
  }
}
