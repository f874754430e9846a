/**
 * Supabase Client - Lazy Creation
 *
 * The client is built on first use from the resolved runtime config, so a
 * host that never goes online never constructs one. Sessions are not
 * persisted: there is no browser storage under Node, and the host hands
 * the engine an authenticated client (or a service key) when it has one.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { ResolvedConfig } from '../config';
import { debugLog, debugWarn } from '../debug';

export type SupabaseClientConfig = Pick<ResolvedConfig, 'prefix' | 'supabase' | 'supabaseUrl' | 'supabaseAnonKey'>;

/**
 * Returns a getter that creates the client on first call and reuses it
 * afterwards. A client passed in `config.supabase` is returned as-is.
 *
 * @throws {Error} On first call when neither a client nor url/key are configured.
 */
export function createLazySupabaseClient(config: SupabaseClientConfig): () => SupabaseClient {
  let realClient: SupabaseClient | null = config.supabase ?? null;

  return () => {
    if (realClient) return realClient;

    const url = config.supabaseUrl;
    const key = config.supabaseAnonKey;
    if (!url || !key) {
      debugWarn('[REMOTE] Supabase url/key missing from config');
      throw new Error('Supabase is not configured: pass supabaseUrl and supabaseAnonKey');
    }

    realClient = createClient(url, key, {
      auth: {
        persistSession: false,
        autoRefreshToken: false,
        detectSessionInUrl: false
      },
      global: {
        headers: {
          'x-client-info': `${config.prefix}-node`
        }
      }
    });
    debugLog(`[REMOTE] Supabase client created for ${new URL(url).host}`);
    return realClient;
  };
}
