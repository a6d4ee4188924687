/**
 * Signal Digest — Supabase Client
 *
 * Service-role client for the record store. Background jobs only: the
 * service role bypasses Row Level Security.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { StoreConfig } from '../config';
import { StoreError } from '../lib/errors';

export function createAdminClient(config: StoreConfig): SupabaseClient {
  if (!config.supabaseUrl) {
    throw new StoreError('Missing SUPABASE_URL environment variable');
  }
  if (!config.supabaseKey) {
    throw new StoreError('SUPABASE_SERVICE_ROLE_KEY is required for the record store');
  }

  return createClient(config.supabaseUrl, config.supabaseKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

/**
 * Handle Supabase errors consistently
 */
export function handleSupabaseError(error: unknown, operation: string): StoreError {
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return new StoreError(`Supabase ${operation} failed: ${error.message}`, code, { cause: error });
  }
  return new StoreError(`Supabase ${operation} failed: unknown error`, undefined, { cause: error });
}

/**
 * Check that the records table answers.
 */
export async function checkDatabaseHealth(
  client: SupabaseClient,
  table: string
): Promise<{ healthy: boolean; latencyMs: number; error?: string }> {
  const start = Date.now();
  try {
    const { error } = await client.from(table).select('identity').limit(1);
    const latencyMs = Date.now() - start;

    if (error) {
      return { healthy: false, latencyMs, error: error.message };
    }

    return { healthy: true, latencyMs };
  } catch (err) {
    return {
      healthy: false,
      latencyMs: Date.now() - start,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}
