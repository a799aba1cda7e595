/**
 * Health Route
 * Public endpoint for load balancer and uptime checks
 */

import { Hono } from 'hono';

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: { networkDomain: string }): Hono {
  const app = new Hono();

  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      network: deps.networkDomain,
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
