import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { requestId } from 'hono/request-id';
import { swaggerUI } from '@hono/swagger-ui';
import { sql } from 'drizzle-orm';
import { announcementsRouter } from './routes/announcements.js';
import { errorHandler } from './middleware/error-handler.js';
import { env } from './config/env.js';
import { getDb } from './lib/db.js';
import { logger } from './lib/logger.js';
import { buildOpenApiDocument } from './lib/openapi.js';
import type { AppEnv } from './types.js';

export const app = new Hono<AppEnv>();

// ---- Global middleware ----
app.use('*', requestId());

// Support multiple origins via comma-separated CORS_ORIGIN env var
const allowedOrigins = env.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean);
app.use(
  '*',
  cors({
    origin: allowedOrigins,
  }),
);

app.onError(errorHandler);

// ---- Health check (with dependency probe) ----
app.get('/health', async (c) => {
  const checks: Record<string, 'ok' | 'error'> = {};

  try {
    const db = getDb();
    await db.execute(sql`SELECT 1`);
    checks.db = 'ok';
  } catch (err) {
    logger.debug({ err }, 'Health check: database probe failed');
    checks.db = 'error';
  }

  const allHealthy = Object.values(checks).every(v => v === 'ok');
  const status = allHealthy ? 'ok' : 'degraded';

  if (!allHealthy) {
    logger.warn({ checks }, 'Health check: some dependencies unhealthy');
  }

  return c.json(
    { status, timestamp: new Date().toISOString(), checks },
    allHealthy ? 200 : 503,
  );
});

// ---- OpenAPI + Swagger UI ----
const openApiDocument = buildOpenApiDocument();
app.get('/openapi.json', (c) => c.json(openApiDocument));
app.get('/docs', swaggerUI({ url: '/openapi.json' }));

// ---- API routes ----
app.route('/api/v1/announcements', announcementsRouter);

// ---- 404 fallback ----
app.notFound((c) =>
  c.json({ error: { code: 'NOT_FOUND', message: 'Route not found' } }, 404),
);
