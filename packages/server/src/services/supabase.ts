import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';
import type { ServerConfig } from '../config.js';

export function createSupabase(config: ServerConfig): SupabaseClient | null {
  if (!config.supabaseUrl || !config.supabaseServiceKey) {
    console.warn('Supabase credentials not configured - snapshots are kept in memory only');
    return null;
  }

  return createClient(config.supabaseUrl, config.supabaseServiceKey, {
    auth: { persistSession: false },
  });
}
