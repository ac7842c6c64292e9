import { describe, it, expect, vi } from 'vitest';
import { Hono } from 'hono';
import { AppError, Errors } from '../lib/errors.js';

// Mock logger to avoid pino-pretty issues in tests
vi.mock('../lib/logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

const { errorHandler } = await import('./error-handler.js');
const { logger } = await import('../lib/logger.js');

function createTestApp() {
  const app = new Hono();
  app.onError(errorHandler);
  return app;
}

describe('Error Handler Middleware', () => {
  it('handles AppError with correct status and body', async () => {
    const app = createTestApp();
    app.get('/test', () => {
      throw new AppError('TEST_ERROR', 'Something went wrong', 400, { field: 'name' });
    });

    const res = await app.request('/test');
    expect(res.status).toBe(400);

    const body = await res.json() as { error: { code: string; message: string; details: { field: string } } };
    expect(body.error.code).toBe('TEST_ERROR');
    expect(body.error.message).toBe('Something went wrong');
    expect(body.error.details).toEqual({ field: 'name' });
  });

  it('handles unauthorized as 401 without logging an error', async () => {
    const app = createTestApp();
    app.get('/test', () => {
      throw Errors.unauthorized();
    });
    vi.mocked(logger.error).mockClear();

    const res = await app.request('/test');
    expect(res.status).toBe(401);

    const body = await res.json() as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code: 'UNAUTHORIZED', message: 'Authentication required' });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('handles announcement 404', async () => {
    const app = createTestApp();
    app.get('/test', () => {
      throw Errors.announcementNotFound();
    });

    const res = await app.request('/test');
    expect(res.status).toBe(404);

    const body = await res.json() as { error: { code: string } };
    expect(body.error.code).toBe('ANNOUNCEMENT_NOT_FOUND');
  });

  it('handles ZodError as 400', async () => {
    const app = createTestApp();
    app.get('/test', () => {
      const err = new Error('Zod validation');
      err.name = 'ZodError';
      throw err;
    });

    const res = await app.request('/test');
    expect(res.status).toBe(400);

    const body = await res.json() as { error: { code: string; message: string } };
    expect(body.error.code).toBe('INVALID_INPUT');
    expect(body.error.message).toBe('Invalid request data');
  });

  it('handles unknown errors as 500 without leaking the cause', async () => {
    const app = createTestApp();
    app.get('/test', () => {
      throw new Error('unexpected crash');
    });

    const res = await app.request('/test');
    expect(res.status).toBe(500);

    const body = await res.json() as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code: 'INTERNAL_ERROR', message: 'Internal server error' });
  });
});
