import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { ConfigError } from '../config/config-validator.js';

let client: SupabaseClient | null = null;

/**
 * Lazily created service client. Server side: no session persistence.
 */
export function getSupabaseClient(url: string | undefined, key: string | undefined): SupabaseClient {
  if (client) return client;

  if (!url || !key) {
    throw new ConfigError('SUPABASE_URL and SUPABASE_KEY are required for the Supabase store');
  }

  client = createClient(url, key, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
    global: {
      headers: {
        'x-application-name': 'macromap-server',
      },
    },
  });
  return client;
}
