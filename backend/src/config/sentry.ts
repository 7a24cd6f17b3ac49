/**
 * config/sentry.ts — Sentry error tracking (opt-in)
 *
 * Enable by setting SENTRY_DSN in environment.
 * When disabled, all functions are no-ops.
 */
import * as Sentry from '@sentry/node';
import type { Express } from 'express';
import { env } from './env.ts';
import { childLogger } from '../shared/logger.ts';

const log = childLogger({ module: 'sentry' });

let initialized = false;

/**
 * Initialize Sentry. Call once at server startup.
 * No-op if SENTRY_DSN is not set.
 */
export function initSentry(): void {
  if (!env.SENTRY_DSN) {
    log.info('Sentry disabled (no SENTRY_DSN)');
    return;
  }

  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    release: process.env.npm_package_version || 'unknown',
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
    beforeSend(event) {
      if (event.request?.headers) {
        delete event.request.headers.authorization;
        delete event.request.headers.cookie;
      }
      return event;
    },
  });

  initialized = true;
  log.info('Sentry initialized');
}

/**
 * Capture an exception manually.
 */
export function captureException(err: unknown, context?: Record<string, unknown>): void {
  if (!initialized) return;
  Sentry.captureException(err, context ? { extra: context } : undefined);
}

/**
 * Attach Sentry's Express error handler. Call after all routes, before the
 * application's own error handler.
 */
export function attachSentryErrorHandler(app: Express): void {
  if (!initialized) return;
  Sentry.setupExpressErrorHandler(app);
}

/**
 * Flush pending events before shutdown.
 */
export async function flushSentry(timeout = 2000): Promise<void> {
  if (!initialized) return;
  await Sentry.flush(timeout);
}
