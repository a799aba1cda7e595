/**
 * Actor Types
 */

/**
 * Actor Context - Who is performing the action
 * Every service method receives this context
 */
export interface ActorContext {
  type: 'user' | 'admin' | 'system' | 'anonymous';
  userId?: string;
  requestId: string;
  permissions: string[];
  ip?: string;
  userAgent?: string;
}

/**
 * System actor for scripts and internal operations
 */
export const SYSTEM_ACTOR: ActorContext = {
  type: 'system',
  requestId: 'system',
  permissions: ['*'],
};

/**
 * Permission required to review site requests
 */
export const SITE_REVIEW_PERMISSION = 'sites:review';
