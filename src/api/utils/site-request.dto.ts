/**
 * Site request response shape
 */

import type { SiteRequest, SiteRequestStatus } from '../../types/index.js';

export interface SiteRequestDto {
  id: string;
  requesterId: string;
  requestedName: string;
  domain: string;
  status: SiteRequestStatus;
  reviewerId: string | null;
  siteId: string | null;
  createdAt: string;
  reviewedAt: string | null;
}

export function toSiteRequestDto(request: SiteRequest): SiteRequestDto {
  return {
    id: request.id,
    requesterId: request.requesterId,
    requestedName: request.requestedName,
    domain: request.domain,
    status: request.status,
    reviewerId: request.reviewerId,
    siteId: request.siteId,
    createdAt: request.createdAt.toISOString(),
    reviewedAt:
      request.reviewedAt !== null ? request.reviewedAt.toISOString() : null,
  };
}
