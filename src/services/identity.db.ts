/**
 * Identity Store Database Adapter
 * Read-only access to user accounts in Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type { Identity } from '../types/index.js';

import type { IdentityStore } from './site-request.service.js';

const TABLE = 'users';

const identityRowSchema = z.object({
  id: z.string(),
  login: z.string(),
  email: z.string(),
});

const permissionsRowSchema = z.object({
  permissions: z.array(z.string()).nullable(),
});

/**
 * Identity store plus the permission lookup used by the auth middleware
 */
export interface IdentityStoreDb extends IdentityStore {
  resolvePermissions: (identityId: string) => Promise<string[]>;
}

/**
 * Create IdentityStoreDb implementation using Supabase
 */
export function createIdentityStoreDb(
  supabase: SupabaseClient
): IdentityStoreDb {
  return {
    async getIdentity(identityId: string): Promise<Identity | null> {
      const { data, error } = await supabase
        .from(TABLE)
        .select('id, login, email')
        .eq('id', identityId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get identity: ${error.message}`);
      }

      return data === null ? null : identityRowSchema.parse(data);
    },

    async identityExists(identityId: string): Promise<boolean> {
      const { count, error } = await supabase
        .from(TABLE)
        .select('id', { count: 'exact', head: true })
        .eq('id', identityId);

      if (error !== null) {
        throw new Error(`Failed to check identity: ${error.message}`);
      }

      return (count ?? 0) > 0;
    },

    async resolvePermissions(identityId: string): Promise<string[]> {
      const { data, error } = await supabase
        .from(TABLE)
        .select('permissions')
        .eq('id', identityId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to resolve permissions: ${error.message}`);
      }

      if (data === null) {
        return [];
      }

      return permissionsRowSchema.parse(data).permissions ?? [];
    },
  };
}
