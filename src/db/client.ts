import { createClient } from '@supabase/supabase-js';
import { env } from '../config/index.js';

/**
 * Supabase client configured with the SERVICE ROLE key.
 *
 * This client bypasses Row Level Security and must only be used in trusted
 * server-side code. All access goes through the relational store adapter.
 */
export const supabase = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
  auth: { persistSession: false, autoRefreshToken: false },
});
