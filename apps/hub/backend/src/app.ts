/**
 * Hub HTTP application
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { ResourceHub } from '@ephemera/core';
import type { HealthResponse } from '@ephemera/shared';
import { apiKeyAuth } from './middleware/auth.js';
import { createResourceRoutes } from './routes/resources.js';
import { createSearchRoutes } from './routes/search.js';

export interface AppOptions {
  /** Request logging; off in tests */
  requestLogging?: boolean;
}

export function createApp(hub: ResourceHub, options: AppOptions = {}): Hono {
  const app = new Hono();

  // Middleware
  if (options.requestLogging ?? true) {
    app.use('*', logger());
  }
  app.use('*', cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
  }));

  // Auth middleware for API routes
  app.use('/api/*', apiKeyAuth());

  // Health check endpoint
  app.get('/health', (c) => {
    const body: HealthResponse = {
      status: 'ok',
      service: 'resource-hub',
      resources: hub.store.size,
    };
    return c.json(body);
  });

  // API routes
  app.route('/api/resources', createResourceRoutes(hub));
  app.route('/api/search', createSearchRoutes(hub));

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  // Error handler
  app.onError((err, c) => {
    console.error('Server error:', err);
    return c.json({
      error: 'Internal server error',
      message: process.env.NODE_ENV === 'development' ? err.message : undefined,
    }, 500);
  });

  return app;
}
