/**
 * Auth Middleware
 * Constructs ActorContext from a Supabase access token
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

import type { Logger } from '../../lib/logger.js';
import type { ActorContext } from '../../types/index.js';
import { SITE_REVIEW_PERMISSION } from '../../types/index.js';

/**
 * Auth middleware dependencies
 */
export interface AuthMiddlewareDeps {
  auth: Pick<SupabaseClient['auth'], 'getUser'>;
  resolvePermissions: (userId: string) => Promise<string[]>;
  logger: Logger;
}

/**
 * Generate a unique request ID
 */
export function generateRequestId(): string {
  return nanoid();
}

/**
 * Check if user has admin-level permissions
 */
export function isAdmin(permissions: string[]): boolean {
  return permissions.some(
    (p) => p === '*' || p === SITE_REVIEW_PERMISSION || p.startsWith('admin:')
  );
}

function unauthorized(c: Context, message: string, requestId: string) {
  return c.json(
    {
      error: {
        code: 'UNAUTHORIZED',
        message,
        requestId,
      },
    },
    401
  );
}

/**
 * Create auth middleware for protected routes
 * Extracts the bearer token, verifies it with Supabase Auth and resolves
 * the user's permissions
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const { auth, resolvePermissions, logger } = deps;

  return async function authMiddleware(
    c: Context,
    next: Next
  ): Promise<Response | void> {
    const requestId = generateRequestId();

    const authHeader = c.req.header('Authorization');
    if (authHeader === undefined || !authHeader.startsWith('Bearer ')) {
      return unauthorized(
        c,
        'Missing or invalid authorization header',
        requestId
      );
    }

    const token = authHeader.slice(7).trim();
    if (token === '') {
      return unauthorized(
        c,
        'Missing or invalid authorization header',
        requestId
      );
    }

    let actor: ActorContext;
    try {
      const {
        data: { user },
        error,
      } = await auth.getUser(token);

      if (error !== null || user === null) {
        return unauthorized(c, 'Invalid or expired token', requestId);
      }

      const permissions = await resolvePermissions(user.id);
      const ip = c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip');
      const userAgent = c.req.header('user-agent');

      actor = {
        type: isAdmin(permissions) ? 'admin' : 'user',
        userId: user.id,
        requestId,
        permissions,
        ...(ip !== undefined && { ip }),
        ...(userAgent !== undefined && { userAgent }),
      };
    } catch (err) {
      logger.error('Auth middleware error', { requestId }, err);
      return c.json(
        {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'Authentication failed',
            requestId,
          },
        },
        500
      );
    }

    c.set('actor', actor);
    c.set('requestId', requestId);

    await next();
  };
}
