/**
 * Newswire Relay — Supabase Client
 *
 * One service-role client, built on first use so modules that never touch
 * storage (parser, tests) load without credentials.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';

export const DEDUP_TABLE = 'processed_items';

// Postgres unique_violation
export const UNIQUE_VIOLATION = '23505';

export interface StorageHealth {
  healthy: boolean;
  latencyMs: number;
  error?: string;
}

let serviceClient: SupabaseClient | null = null;

export function getAdminClient(env: NodeJS.ProcessEnv = process.env): SupabaseClient {
  if (serviceClient) return serviceClient;

  const missing = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY'].filter(name => !env[name]);
  const url = env.SUPABASE_URL;
  const key = env.SUPABASE_SERVICE_ROLE_KEY;
  if (!url || !key) {
    throw new Error(`Dedup storage is not configured: missing ${missing.join(', ')}`);
  }

  // Server-side only: no session to persist or refresh
  serviceClient = createClient(url, key, {
    auth: { autoRefreshToken: false, persistSession: false },
  });
  return serviceClient;
}

/**
 * Round-trip a one-row read of the dedup table.
 */
export async function checkDatabaseHealth(client: SupabaseClient = getAdminClient()): Promise<StorageHealth> {
  const started = Date.now();
  const elapsed = () => Date.now() - started;

  try {
    const { error } = await client.from(DEDUP_TABLE).select('item_id').limit(1);
    return error ? { healthy: false, latencyMs: elapsed(), error: error.message } : { healthy: true, latencyMs: elapsed() };
  } catch (err) {
    return { healthy: false, latencyMs: elapsed(), error: err instanceof Error ? err.message : String(err) };
  }
}

export function handleSupabaseError(error: { message: string; code?: string }): Error {
  const code = error.code ? ` [${error.code}]` : '';
  return new Error(`Dedup storage error${code}: ${error.message}`);
}
