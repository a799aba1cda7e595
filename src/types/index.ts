/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type { ActorContext } from './auth.js';
export { SYSTEM_ACTOR, SITE_REVIEW_PERMISSION } from './auth.js';
export type { Identity } from './identity.js';
export type { SiteRole, CreateSiteParams, ProvisionErrorCode } from './site.js';
export type {
  SiteRequestStatus,
  SiteRequest,
  SubmitSiteRequestParams,
  CreateSiteRequestParams,
  StatusTransitionPatch,
  ApprovedSite,
  ValidationErrorCode,
  WorkflowErrorCode,
} from './site-request.js';
export { SITE_REQUEST_STATUSES } from './site-request.js';
export type { EmailMessage, NotifyErrorCode } from './notification.js';
