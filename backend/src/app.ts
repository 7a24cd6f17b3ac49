/**
 * app.ts — Express application factory
 *
 * Middleware order: CORS → compression → JSON → metrics → request log →
 * security headers → rate limit → routes → Sentry → error handler.
 */
import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import compression from 'compression';
import { randomUUID } from 'crypto';
import { ZodError } from 'zod';
import { env } from './config/env.ts';
import { attachSentryErrorHandler, captureException } from './config/sentry.ts';
import healthRoutes from './routes/health.ts';
import { marketRoutes } from './routes/markets.ts';
import { ScoringError } from './services/errors.ts';
import { logger, requestLogger } from './shared/logger.ts';
import { metricsEndpoint, metricsMiddleware } from './shared/metrics.ts';

export interface AppOptions {
  apiBase?: string;
  renovationBuffer?: number;
  rateLimitMax?: number;
  rateLimitWindowMs?: number;
}

export function createApp(opts: AppOptions = {}): Express {
  const apiBase = opts.apiBase ?? env.API_BASE;
  const rateLimitMax = opts.rateLimitMax ?? env.RATE_LIMIT_MAX;

  const app = express();
  app.set('trust proxy', 1);

  // ─── Security & Performance ───

  const allowedOrigins = env.ALLOWED_ORIGINS
    ? env.ALLOWED_ORIGINS.split(',').map(s => s.trim())
    : ['*'];

  app.use(cors({ origin: allowedOrigins.includes('*') ? true : allowedOrigins }));
  app.use(compression({ threshold: 1024 }));
  app.use(express.json({ limit: '100kb' }));

  app.use(metricsMiddleware());
  app.use(requestLogger());

  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    next();
  });

  // ─── Rate limiting (in-memory, per IP) ───

  const ipHits = new Map<string, number>();
  setInterval(() => ipHits.clear(), opts.rateLimitWindowMs ?? env.RATE_LIMIT_WINDOW_MS).unref();

  app.use(apiBase, (req, res, next) => {
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    const hits = (ipHits.get(ip) || 0) + 1;
    ipHits.set(ip, hits);
    res.setHeader('X-RateLimit-Limit', String(rateLimitMax));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, rateLimitMax - hits)));
    if (hits > rateLimitMax) {
      res.status(429).json({ success: false, error: 'Rate limited', code: 'RATE_LIMITED' });
      return;
    }
    next();
  });

  // ─── API Routes ───

  app.get(`${apiBase}/metrics`, metricsEndpoint);
  app.use(`${apiBase}/health`, healthRoutes);
  app.use(apiBase, marketRoutes({ renovationBuffer: opts.renovationBuffer ?? env.RENOVATION_BUFFER }));

  app.use(apiBase, (_req, res) => {
    res.status(404).json({ success: false, error: 'Not found', code: 'NOT_FOUND' });
  });

  // ─── Error handling: Sentry first, then structured response ───

  attachSentryErrorHandler(app);

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const errId = req.id || randomUUID().slice(0, 8);

    if (err instanceof ScoringError) {
      const level = err.status >= 500 ? 'error' : 'warn';
      logger[level]({ err, reqId: errId, code: err.code }, err.message);
      res.status(err.status).json({ success: false, error: err.message, code: err.code, requestId: errId });
      return;
    }

    if (err instanceof ZodError) {
      const details = err.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      res.status(400).json({ success: false, error: 'Validation failed', details, requestId: errId });
      return;
    }

    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({ success: false, error: 'Malformed JSON body', requestId: errId });
      return;
    }

    const message = err instanceof Error ? err.message : String(err);
    logger.error({ err, reqId: errId, method: req.method, url: req.url }, `Unhandled error [${errId}]`);
    captureException(err, { requestId: errId, url: req.url });
    res.status(500).json({
      success: false,
      error: env.NODE_ENV === 'production' ? 'Internal server error' : message,
      requestId: errId,
    });
  });

  return app;
}
