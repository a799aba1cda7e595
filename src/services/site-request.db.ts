/**
 * SiteRequestService Database Adapter
 * Implements SiteRequestServiceDb interface using Supabase
 *
 * SCOPE: Site request approval workflow
 */

import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type {
  CreateSiteRequestParams,
  SiteRequest,
  SiteRequestStatus,
  StatusTransitionPatch,
} from '../types/index.js';
import { SITE_REQUEST_STATUSES } from '../types/index.js';

import type {
  CreateRequestOutcome,
  SiteRequestServiceDb,
} from './site-request.service.js';

const TABLE = 'site_requests';

/** Postgres unique_violation */
const UNIQUE_VIOLATION = '23505';

/**
 * Database row type for site_requests
 */
const siteRequestRowSchema = z.object({
  id: z.string(),
  requester_id: z.string(),
  requested_name: z.string(),
  domain: z.string(),
  status: z.enum(SITE_REQUEST_STATUSES),
  reviewer_id: z.string().nullable(),
  site_id: z.string().nullable(),
  created_at: z.string(),
  reviewed_at: z.string().nullable(),
});

type SiteRequestRow = z.infer<typeof siteRequestRowSchema>;

/**
 * Map database row to SiteRequest entity
 */
function mapRowToSiteRequest(row: SiteRequestRow): SiteRequest {
  return {
    id: row.id,
    requesterId: row.requester_id,
    requestedName: row.requested_name,
    domain: row.domain,
    status: row.status,
    reviewerId: row.reviewer_id,
    siteId: row.site_id,
    createdAt: new Date(row.created_at),
    reviewedAt: row.reviewed_at !== null ? new Date(row.reviewed_at) : null,
  };
}

function parseRow(data: unknown): SiteRequest {
  return mapRowToSiteRequest(siteRequestRowSchema.parse(data));
}

function parseOptionalRow(data: unknown): SiteRequest | null {
  return data === null ? null : parseRow(data);
}

function conflictTarget(error: PostgrestError): 'requester' | 'name' {
  const text = `${error.message} ${error.details}`;
  return text.includes('requester') ? 'requester' : 'name';
}

/**
 * Create SiteRequestServiceDb implementation using Supabase
 */
export function createSiteRequestServiceDb(
  supabase: SupabaseClient
): SiteRequestServiceDb {
  return {
    /**
     * Insert a pending request; uniqueness collisions are reported, not thrown
     */
    async createRequest(
      params: CreateSiteRequestParams
    ): Promise<CreateRequestOutcome> {
      const { data, error } = await supabase
        .from(TABLE)
        .insert({
          requester_id: params.requesterId,
          requested_name: params.requestedName,
          domain: params.domain,
          status: 'pending',
        })
        .select('*')
        .single();

      if (error !== null) {
        if (error.code === UNIQUE_VIOLATION) {
          return { created: false, conflict: conflictTarget(error) };
        }
        throw new Error(`Failed to create site request: ${error.message}`);
      }

      return { created: true, request: parseRow(data) };
    },

    async getRequest(requestId: string): Promise<SiteRequest | null> {
      const { data, error } = await supabase
        .from(TABLE)
        .select('*')
        .eq('id', requestId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get site request: ${error.message}`);
      }

      return parseOptionalRow(data);
    },

    async findByRequester(requesterId: string): Promise<SiteRequest | null> {
      const { data, error } = await supabase
        .from(TABLE)
        .select('*')
        .eq('requester_id', requesterId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(
          `Failed to find site request by requester: ${error.message}`
        );
      }

      return parseOptionalRow(data);
    },

    /**
     * Pending or approved request holding a name; rejected names are free
     */
    async findActiveByName(requestedName: string): Promise<SiteRequest | null> {
      const { data, error } = await supabase
        .from(TABLE)
        .select('*')
        .eq('requested_name', requestedName)
        .in('status', ['pending', 'approved'])
        .limit(1)
        .maybeSingle();

      if (error !== null) {
        throw new Error(
          `Failed to find site request by name: ${error.message}`
        );
      }

      return parseOptionalRow(data);
    },

    async listPendingRequests(): Promise<SiteRequest[]> {
      const { data, error } = await supabase
        .from(TABLE)
        .select('*')
        .eq('status', 'pending')
        .order('created_at', { ascending: true })
        .order('id', { ascending: true });

      if (error !== null) {
        throw new Error(
          `Failed to list pending site requests: ${error.message}`
        );
      }

      return z.array(siteRequestRowSchema).parse(data).map(mapRowToSiteRequest);
    },

    /**
     * Single UPDATE ... WHERE id = ? AND status = ?; no row means the
     * request had already left `expected`
     */
    async updateStatusIf(
      requestId: string,
      expected: SiteRequestStatus,
      next: SiteRequestStatus,
      patch: StatusTransitionPatch
    ): Promise<SiteRequest | null> {
      const { data, error } = await supabase
        .from(TABLE)
        .update({
          status: next,
          reviewer_id: patch.reviewerId,
          reviewed_at:
            patch.reviewedAt !== null ? patch.reviewedAt.toISOString() : null,
        })
        .eq('id', requestId)
        .eq('status', expected)
        .select('*')
        .maybeSingle();

      if (error !== null) {
        throw new Error(
          `Failed to update site request status: ${error.message}`
        );
      }

      return parseOptionalRow(data);
    },

    async recordSite(requestId: string, siteId: string): Promise<SiteRequest> {
      const { data, error } = await supabase
        .from(TABLE)
        .update({ site_id: siteId })
        .eq('id', requestId)
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to record provisioned site: ${error.message}`);
      }

      return parseRow(data);
    },
  };
}
