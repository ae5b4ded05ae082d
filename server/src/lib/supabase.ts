import { createClient, type SupabaseClient } from '@supabase/supabase-js';

/**
 * Service-role client for the assessment tables and resume storage. Built
 * once at startup and injected into the repository and object store.
 */
export function createSupabaseAdmin(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
