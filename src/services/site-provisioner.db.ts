/**
 * Site Provisioner Database Adapter
 * Creates network sites in Supabase; the sites table's unique
 * (domain, path) index is the final word on domain ownership.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type {
  CreateSiteParams,
  ProvisionErrorCode,
  Result,
  SiteRole,
} from '../types/index.js';
import { failure, success } from '../types/index.js';

import type { SiteProvisioner } from './site-request.service.js';

const SITES_TABLE = 'sites';
const MEMBERS_TABLE = 'site_members';

/** Postgres unique_violation */
const UNIQUE_VIOLATION = '23505';

const siteIdRowSchema = z.object({ id: z.string() });

/**
 * Create SiteProvisioner implementation using Supabase
 */
export function createSiteProvisionerDb(
  supabase: SupabaseClient
): SiteProvisioner {
  return {
    async domainExists(domain: string, path: string): Promise<boolean> {
      const { count, error } = await supabase
        .from(SITES_TABLE)
        .select('id', { count: 'exact', head: true })
        .eq('domain', domain)
        .eq('path', path);

      if (error !== null) {
        throw new Error(`Failed to check domain: ${error.message}`);
      }

      return (count ?? 0) > 0;
    },

    async createSite(
      params: CreateSiteParams
    ): Promise<Result<string, ProvisionErrorCode>> {
      const { data, error } = await supabase
        .from(SITES_TABLE)
        .insert({
          domain: params.domain,
          path: params.path,
          title: params.title,
          owner_id: params.ownerId,
        })
        .select('id')
        .single();

      if (error !== null) {
        if (error.code === UNIQUE_VIOLATION) {
          return failure(
            'DOMAIN_EXISTS',
            'A site with that domain already exists'
          );
        }
        return failure(
          'PROVISION_FAILED',
          `Failed to create site: ${error.message}`
        );
      }

      return success(siteIdRowSchema.parse(data).id);
    },

    async assignOwner(
      siteId: string,
      identityId: string,
      role: SiteRole
    ): Promise<Result<void>> {
      const { error } = await supabase
        .from(MEMBERS_TABLE)
        .upsert(
          { site_id: siteId, user_id: identityId, role },
          { onConflict: 'site_id,user_id' }
        );

      if (error !== null) {
        return failure(
          'ASSIGN_FAILED',
          `Failed to add user to site: ${error.message}`
        );
      }

      return success(undefined);
    },
  };
}
