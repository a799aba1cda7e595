/**
 * Admin Middleware
 * Checks for site review permissions on protected routes
 */

import type { Context, Next } from 'hono';

import type { ActorContext } from '../../types/index.js';

import { isAdmin } from './auth.js';

/**
 * Admin middleware - verifies actor may review site requests
 */
export function createAdminMiddleware() {
  return async function adminMiddleware(
    c: Context,
    next: Next
  ): Promise<Response | void> {
    const actor: ActorContext | undefined = c.get('actor');
    const requestId = actor?.requestId ?? c.get('requestId') ?? 'unknown';

    if (actor === undefined) {
      return c.json(
        {
          error: {
            code: 'UNAUTHORIZED',
            message: 'Authentication required',
            requestId,
          },
        },
        401
      );
    }

    if (!isAdmin(actor.permissions)) {
      return c.json(
        {
          error: {
            code: 'FORBIDDEN',
            message: 'Site review permission required',
            requestId,
          },
        },
        403
      );
    }

    await next();
  };
}
