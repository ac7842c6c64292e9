import { serve } from '@hono/node-server';
import { app } from './app.js';
import { logger } from './lib/logger.js';
import { closeDb } from './lib/db.js';
import { env, validateProductionEnv } from './config/env.js';

// ─── Startup validation ──────────────────────────────────────────
validateProductionEnv();

const port = env.API_PORT;

logger.info(`Starting Bulletin API server on port ${port}`);

const server = serve({
  fetch: app.fetch,
  port,
  hostname: env.API_HOST,
}, (info) => {
  logger.info(`Bulletin API running at http://localhost:${info.port}`);
  logger.info(`Swagger UI at http://localhost:${info.port}/docs`);
});

// ─── Graceful Shutdown ──────────────────────────────────────────
// On SIGTERM/SIGINT: stop accepting new requests, let in-flight ones finish,
// close the database pool, and exit.

let shuttingDown = false;

async function gracefulShutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;

  logger.info({ signal }, 'Received shutdown signal, starting graceful shutdown');

  const SHUTDOWN_TIMEOUT_MS = 10_000;
  const shutdownTimer = setTimeout(() => {
    logger.error('Graceful shutdown timed out, forcing exit');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);

  try {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    logger.info('HTTP server closed');

    await closeDb();
    logger.info('Database pool closed');

    clearTimeout(shutdownTimer);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (err) {
    logger.error({ err }, 'Error during graceful shutdown');
    clearTimeout(shutdownTimer);
    process.exit(1);
  }
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

// Log unhandled rejections instead of crashing
process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

process.on('uncaughtException', (err) => {
  logger.error({ err }, 'Uncaught exception, shutting down');
  void gracefulShutdown('uncaughtException');
});
