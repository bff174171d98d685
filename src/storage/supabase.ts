import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { SupabaseEnv } from '../config/env.js';

let client: SupabaseClient | null = null;

export function getSupabaseClient(env: Pick<SupabaseEnv, 'SUPABASE_URL' | 'SUPABASE_SERVICE_KEY'>): SupabaseClient {
  if (!client) {
    client = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_KEY, {
      auth: { persistSession: false, autoRefreshToken: false }
    });
  }

  return client;
}
