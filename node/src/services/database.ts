import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { appConfig } from '@/config/app.config';

let adminClient: SupabaseClient | null = null;

/** Service-role client, created on first use so a missing key only fails the caller that needs it. */
export function supabaseAdmin(): SupabaseClient {
  if (adminClient) return adminClient;
  const { url, serviceRoleKey } = appConfig.supabase;
  if (!url) {
    throw new Error('Missing SUPABASE_URL. Set it in .env or pass it when starting the server.');
  }
  if (!serviceRoleKey) {
    throw new Error('Missing SUPABASE_SERVICE_ROLE_KEY. Set it in .env or pass it when starting the server.');
  }
  adminClient = createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return adminClient;
}
