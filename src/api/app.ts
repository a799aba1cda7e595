/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as requestLogger } from 'hono/logger';

import type { Logger } from '../lib/logger.js';
import type { SiteRequestService } from '../services/site-request.service.js';

import { createAdminMiddleware } from './middleware/admin.js';
import { createAuthMiddleware } from './middleware/auth.js';
import type { AuthMiddlewareDeps } from './middleware/auth.js';
import { createAdminRoutes } from './routes/admin.js';
import { createHealthRoutes } from './routes/health.js';
import { createSiteRequestRoutes } from './routes/site-requests.js';

/**
 * App configuration
 */
export interface AppConfig {
  siteRequestService: SiteRequestService;
  auth: AuthMiddlewareDeps['auth'];
  resolvePermissions: AuthMiddlewareDeps['resolvePermissions'];
  logger: Logger;
  networkDomain: string;
  allowedOrigins?: string[];
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { siteRequestService, logger, allowedOrigins } = config;
  const app = new Hono();

  // Global middleware
  app.use('*', requestLogger((line) => logger.info(line)));
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Public routes (no auth)
  app.route(
    '/api/v1',
    createHealthRoutes({ networkDomain: config.networkDomain })
  );

  const authMiddleware = createAuthMiddleware({
    auth: config.auth,
    resolvePermissions: config.resolvePermissions,
    logger,
  });
  const adminMiddleware = createAdminMiddleware();

  // Site request routes (authenticated users)
  app.use('/api/v1/site-requests', authMiddleware);
  app.use('/api/v1/site-requests/*', authMiddleware);
  app.route('/api/v1', createSiteRequestRoutes({ siteRequestService }));

  // Admin routes (require auth + review permission)
  app.use('/api/v1/admin/*', authMiddleware);
  app.use('/api/v1/admin/*', adminMiddleware);
  app.route('/api/v1', createAdminRoutes({ siteRequestService }));

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: c.get('requestId') ?? 'unknown',
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    const requestId = c.get('requestId') ?? 'unknown';
    logger.error('Unhandled error', { requestId, path: c.req.path }, err);

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId,
        },
      },
      500
    );
  });

  return app;
}
