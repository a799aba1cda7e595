/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ActorContext } from '../types/index.js';

/**
 * Extended Hono context with actor
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 500 | 502;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<string, ErrorStatus> = {
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  VALIDATION_ERROR: 400,
  EMPTY_NAME: 400,
  INVALID_FORMAT: 400,
  UNKNOWN_REQUESTER: 404,
  NOT_FOUND: 404,
  NAME_TAKEN: 409,
  DUPLICATE_REQUEST: 409,
  NOT_PENDING: 409,
  DOMAIN_EXISTS: 409,
  PROVISION_FAILED: 502,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: string): ErrorStatus {
  return ERROR_STATUS_MAP[code] ?? 500;
}
