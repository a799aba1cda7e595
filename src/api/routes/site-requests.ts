/**
 * Site Request Routes
 * Endpoints for users requesting a site of their own
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';

import type { SiteRequestService } from '../../services/site-request.service.js';
import type { ActorContext } from '../../types/index.js';
import { errorResponse, successResponse } from '../utils/response.js';
import { toSiteRequestDto } from '../utils/site-request.dto.js';

/**
 * Request body schema for submitting a site request
 */
const submitSiteRequestSchema = z.object({
  siteName: z.string().max(100),
});

/**
 * Site request route dependencies
 */
interface SiteRequestRouteDeps {
  siteRequestService: Pick<SiteRequestService, 'submitRequest'>;
}

function getActor(c: Context): ActorContext {
  return c.get('actor');
}

function getRequestId(c: Context): string {
  return c.get('requestId') || getActor(c).requestId;
}

/**
 * Create site request routes
 */
export function createSiteRequestRoutes(deps: SiteRequestRouteDeps): Hono {
  const { siteRequestService } = deps;
  const app = new Hono();

  /**
   * POST /site-requests
   * Request a site for the authenticated user
   */
  app.post('/site-requests', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    if (actor.userId === undefined) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'A user account is required' },
        requestId
      );
    }

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'Invalid JSON body' },
        requestId
      );
    }

    const parsed = submitSiteRequestSchema.safeParse(body);
    if (!parsed.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request body',
          details: parsed.error.flatten().fieldErrors,
        },
        requestId
      );
    }

    const result = await siteRequestService.submitRequest(actor, {
      requesterId: actor.userId,
      siteName: parsed.data.siteName,
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, toSiteRequestDto(result.data), requestId, 201);
  });

  return app;
}
