/**
 * Site Request Domain Types
 *
 * SCOPE: Site request approval workflow
 *
 * Owns: site_requests table
 */

/**
 * Site request status. pending is the only non-terminal state.
 */
export type SiteRequestStatus = 'pending' | 'approved' | 'rejected';

export const SITE_REQUEST_STATUSES = [
  'pending',
  'approved',
  'rejected',
] as const satisfies readonly SiteRequestStatus[];

/**
 * Site request entity
 */
export interface SiteRequest {
  id: string;
  requesterId: string;
  requestedName: string;
  domain: string;
  status: SiteRequestStatus;
  reviewerId: string | null;
  siteId: string | null;
  createdAt: Date;
  reviewedAt: Date | null;
}

/**
 * Parameters for submitting a site request
 */
export interface SubmitSiteRequestParams {
  requesterId: string;
  siteName: string;
}

/**
 * Row data for inserting a new request
 */
export interface CreateSiteRequestParams {
  requesterId: string;
  requestedName: string;
  domain: string;
}

/**
 * Fields written alongside a status transition
 */
export interface StatusTransitionPatch {
  reviewerId: string | null;
  reviewedAt: Date | null;
}

/**
 * Outcome of a successful approval
 */
export interface ApprovedSite {
  request: SiteRequest;
  siteId: string;
  url: string;
}

/**
 * Errors surfaced to the submitter
 */
export type ValidationErrorCode =
  | 'EMPTY_NAME'
  | 'INVALID_FORMAT'
  | 'NAME_TAKEN'
  | 'UNKNOWN_REQUESTER'
  | 'DUPLICATE_REQUEST';

/**
 * Errors surfaced to the administrator
 */
export type WorkflowErrorCode =
  | 'NOT_FOUND'
  | 'NOT_PENDING'
  | 'DOMAIN_EXISTS'
  | 'PROVISION_FAILED';
