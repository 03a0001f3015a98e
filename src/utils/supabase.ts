import { createClient, SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseSettings {
  url?: string;
  serviceKey?: string;
}

/**
 * Service-role client for storage access. Built by the entry point and
 * handed to whatever needs it.
 */
export function createSupabaseClient(settings: SupabaseSettings): SupabaseClient {
  if (!settings.url || !settings.serviceKey) {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_KEY are required');
  }

  return createClient(settings.url, settings.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}
