/**
 * server.ts — Process entry point
 *
 * Loads the market dataset once, then serves the scoring API.
 * Every request recomputes the full pipeline against that dataset.
 */
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createApp } from './app.ts';
import { env } from './config/env.ts';
import { captureException, flushSentry, initSentry } from './config/sentry.ts';
import { loadMarketDataset } from './services/dataset.ts';
import { setDataset } from './services/state.ts';
import { logger } from './shared/logger.ts';
import { datasetSize } from './shared/metrics.ts';

const __dirname = dirname(fileURLToPath(import.meta.url));
const BOOT_TIME = Date.now();
const DEFAULT_DATASET = join(__dirname, '../data/markets.csv');

initSentry();

const app = createApp();

// ─── Graceful shutdown ───

let server: ReturnType<typeof app.listen> | undefined;

async function gracefulShutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down...');
  if (server) server.close(() => logger.info('HTTP server closed'));

  try {
    await flushSentry(2000);
  } catch (err) { logger.warn({ err }, 'Cleanup error'); }

  setTimeout(() => { logger.warn('Forced exit (10s timeout)'); process.exit(1); }, 10000).unref();
  process.exit(0);
}

process.on('SIGTERM', () => { void gracefulShutdown('SIGTERM'); });
process.on('SIGINT', () => { void gracefulShutdown('SIGINT'); });
process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
  captureException(reason);
});
process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  captureException(err);
  setTimeout(() => process.exit(1), 1000).unref();
});

// ─── Start ───

async function start(): Promise<void> {
  const path = env.DATASET_PATH ? resolve(env.DATASET_PATH) : DEFAULT_DATASET;
  const dataset = await loadMarketDataset(path);
  setDataset(dataset);
  datasetSize.set(dataset.markets.length);

  server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV, markets: dataset.markets.length, bootMs: Date.now() - BOOT_TIME }, 'Server started');
  });
}

start().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  captureException(err);
  process.exit(1);
});
