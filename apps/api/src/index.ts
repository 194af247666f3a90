import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';

import type { ApiErrorBody } from '@research-finder/shared';
import { createQueryRoutes } from './routes/query';
import { silentLogger, type Logger } from './services/logger';
import type { ResearchQueryRunner } from './services/research-query';

export const API_VERSION = '0.1.0';

export interface AppDeps {
  runQuery: ResearchQueryRunner;
  logger?: Logger;
  /** Request lines through hono/logger */
  requestLogging?: boolean;
}

function jsonError(code: string, message: string, status: number): Response {
  const body: ApiErrorBody = { error: { code, message } };
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function createApp(deps: AppDeps) {
  const app = new Hono();
  const log = deps.logger ?? silentLogger;

  // Middleware
  if (deps.requestLogging ?? true) {
    app.use('*', logger());
  }
  app.use('*', secureHeaders());
  app.use(
    '*',
    cors({
      origin: process.env.ALLOWED_ORIGINS?.split(',') || ['http://localhost:3000'],
    })
  );

  app.get('/', (c) => {
    return c.json({
      name: 'Research Finder API',
      version: API_VERSION,
      docs: '/api/health',
    });
  });

  // Health check
  app.get('/api/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
    });
  });

  app.route('/api/query', createQueryRoutes(deps.runQuery));

  app.notFound(() => jsonError('NOT_FOUND', 'Route not found', 404));

  app.onError((err) => {
    if (err instanceof HTTPException) {
      return jsonError('INVALID_REQUEST', err.message, err.status);
    }
    log.error(`Unhandled error: ${err.message}`);
    return jsonError(
      'INTERNAL_ERROR',
      process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
      500
    );
  });

  return app;
}
