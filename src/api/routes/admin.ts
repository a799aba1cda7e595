/**
 * Admin Routes
 * Review endpoints for pending site requests
 */

import { Hono } from 'hono';
import type { Context } from 'hono';

import type { SiteRequestService } from '../../services/site-request.service.js';
import type { ActorContext } from '../../types/index.js';
import { errorResponse, successResponse } from '../utils/response.js';
import { toSiteRequestDto } from '../utils/site-request.dto.js';

/**
 * Admin route dependencies
 */
interface AdminRouteDeps {
  siteRequestService: Pick<
    SiteRequestService,
    'listPending' | 'getRequest' | 'approve' | 'reject'
  >;
}

function getActor(c: Context): ActorContext {
  return c.get('actor');
}

function getRequestId(c: Context): string {
  return c.get('requestId') || getActor(c).requestId;
}

/**
 * Create admin routes
 */
export function createAdminRoutes(deps: AdminRouteDeps): Hono {
  const { siteRequestService } = deps;
  const app = new Hono();

  /**
   * GET /admin/site-requests
   * List pending site requests, oldest first
   */
  app.get('/admin/site-requests', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await siteRequestService.listPending(actor);

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      { items: result.data.map(toSiteRequestDto) },
      requestId
    );
  });

  /**
   * GET /admin/site-requests/:id
   */
  app.get('/admin/site-requests/:id', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await siteRequestService.getRequest(
      actor,
      c.req.param('id')
    );

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, toSiteRequestDto(result.data), requestId);
  });

  /**
   * POST /admin/site-requests/:id/approve
   * Provision the requested site and notify the requester
   */
  app.post('/admin/site-requests/:id/approve', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await siteRequestService.approve(actor, c.req.param('id'));

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        request: toSiteRequestDto(result.data.request),
        siteId: result.data.siteId,
        url: result.data.url,
      },
      requestId
    );
  });

  /**
   * POST /admin/site-requests/:id/reject
   */
  app.post('/admin/site-requests/:id/reject', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await siteRequestService.reject(actor, c.req.param('id'));

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, toSiteRequestDto(result.data), requestId);
  });

  return app;
}
