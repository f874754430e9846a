import type { SupabaseClient } from '@supabase/supabase-js';
import { PermanentRemoteError, TransientNetworkError } from '../errors';
import type { EntitlementSource, Tier } from '../usage';

export const ENTITLEMENTS_TABLE = 'satchel_entitlements';

/**
 * Reads the signed-in user's tier from `satchel_entitlements`. A missing
 * row means the free tier.
 */
export class SupabaseEntitlementSource implements EntitlementSource {
  private readonly getClient: () => SupabaseClient;

  constructor(getClient: () => SupabaseClient) {
    this.getClient = getClient;
  }

  async fetch(): Promise<{ tier: Tier }> {
    const { data, error, status } = await this.getClient()
      .from(ENTITLEMENTS_TABLE)
      .select('tier')
      .maybeSingle();

    if (error) {
      if (status === 0 || status >= 500) {
        throw new TransientNetworkError(`Entitlement fetch failed: ${error.message}`, status || null);
      }
      throw new PermanentRemoteError(`Entitlement fetch failed: ${error.message}`, status);
    }

    const row: unknown = data;
    const tier = typeof row === 'object' && row !== null && 'tier' in row ? row.tier : undefined;
    return { tier: tier === 'pro' ? 'pro' : 'free' };
  }
}
