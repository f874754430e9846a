/**
 * @fileoverview Usage Limit Gate
 *
 * Free accounts may keep a bounded number of bookmarks and categories; pro
 * accounts are unlimited. The decision itself ({@link decideUsage}) is a
 * pure function of the collection, the current count and the cached
 * entitlement, so it can run inside the create transaction without I/O.
 *
 * The entitlement is fetched from an {@link EntitlementSource} and cached
 * in the `meta` table together with its fetch time. A stale cache is
 * refreshed in the background ({@link EntitlementCache.refreshIfStale});
 * the gate always answers from the last cached value and never waits on
 * the network.
 */

import type Dexie from 'dexie';
import type { ResolvedConfig } from './config';
import { readMeta, writeMeta } from './database';
import { debugLog, debugWarn } from './debug';
import { QuotaExceededError } from './errors';
import type { CreateGate } from './repository';
import type { CollectionName } from './types';

// =============================================================================
// Types
// =============================================================================

export type Tier = 'free' | 'pro';

export interface Entitlement {
  tier: Tier;
  fetchedAt: string | null; // ISO timestamp of the last successful fetch
}

export interface EntitlementSource {
  fetch(): Promise<{ tier: Tier }>;
}

export interface UsageDecision {
  allowed: boolean;
  /** `null` when unlimited. */
  limit: number | null;
  remaining: number | null;
}

const ENTITLEMENT_META_KEY = 'entitlement';

const DEFAULT_ENTITLEMENT: Entitlement = { tier: 'free', fetchedAt: null };

function isEntitlement(value: unknown): value is Entitlement {
  if (typeof value !== 'object' || value === null) return false;
  const tier = 'tier' in value ? value.tier : undefined;
  const fetchedAt = 'fetchedAt' in value ? value.fetchedAt : undefined;
  return (tier === 'free' || tier === 'pro') && (fetchedAt === null || typeof fetchedAt === 'string');
}

// =============================================================================
// Decision
// =============================================================================

/**
 * Whether one more record of `kind` may be created.
 *
 * @example
 * decideUsage('bookmarks', 49, 'free', { bookmarks: 50, categories: 10 });
 * // { allowed: true, limit: 50, remaining: 1 }
 */
export function decideUsage(
  kind: CollectionName,
  currentCount: number,
  tier: Tier,
  limits: Record<CollectionName, number>
): UsageDecision {
  if (tier === 'pro') return { allowed: true, limit: null, remaining: null };
  const limit = limits[kind];
  return {
    allowed: currentCount < limit,
    limit,
    remaining: Math.max(limit - currentCount, 0)
  };
}

// =============================================================================
// Entitlement Cache
// =============================================================================

export type EntitlementCacheConfig = Pick<ResolvedConfig, 'entitlementMaxAgeMs' | 'clock'>;

export class EntitlementCache {
  private readonly db: Dexie;
  private readonly source: EntitlementSource | null;
  private readonly config: EntitlementCacheConfig;
  private current: Entitlement = DEFAULT_ENTITLEMENT;
  private inflight: Promise<Entitlement> | null = null;

  constructor(db: Dexie, source: EntitlementSource | null, config: EntitlementCacheConfig) {
    this.db = db;
    this.source = source;
    this.config = config;
  }

  /** Load the persisted entitlement into memory. */
  async load(): Promise<Entitlement> {
    this.current = await readMeta(this.db, ENTITLEMENT_META_KEY, isEntitlement, DEFAULT_ENTITLEMENT);
    return this.current;
  }

  snapshot(): Entitlement {
    return this.current;
  }

  isStale(): boolean {
    if (this.current.fetchedAt === null) return true;
    return this.config.clock() - Date.parse(this.current.fetchedAt) > this.config.entitlementMaxAgeMs;
  }

  /**
   * Fetch the entitlement from the source and persist it. Concurrent calls
   * share one fetch.
   *
   * @throws Whatever the source throws; the cached value is kept.
   */
  async refresh(): Promise<Entitlement> {
    if (!this.source) return this.current;
    if (this.inflight) return this.inflight;

    const source = this.source;
    this.inflight = (async () => {
      try {
        const { tier } = await source.fetch();
        return await this.set(tier);
      } finally {
        this.inflight = null;
      }
    })();
    return this.inflight;
  }

  /**
   * Refresh when stale; failures are logged and the cached value stays in
   * effect.
   */
  async refreshIfStale(): Promise<Entitlement> {
    if (!this.isStale()) return this.current;
    try {
      return await this.refresh();
    } catch (error) {
      debugWarn('[USAGE] Entitlement refresh failed, keeping cached tier:', this.current.tier, error);
      return this.current;
    }
  }

  /** Record a tier learned out of band (e.g. right after a purchase). */
  async set(tier: Tier): Promise<Entitlement> {
    const next: Entitlement = { tier, fetchedAt: new Date(this.config.clock()).toISOString() };
    await writeMeta(this.db, ENTITLEMENT_META_KEY, next);
    if (next.tier !== this.current.tier) {
      debugLog(`[USAGE] Entitlement ${this.current.tier} -> ${next.tier}`);
    }
    this.current = next;
    return next;
  }
}

// =============================================================================
// Gate
// =============================================================================

export class UsageLimitGate implements CreateGate {
  private readonly entitlements: Pick<EntitlementCache, 'snapshot'>;
  private readonly limits: Record<CollectionName, number>;

  constructor(entitlements: Pick<EntitlementCache, 'snapshot'>, limits: Record<CollectionName, number>) {
    this.entitlements = entitlements;
    this.limits = limits;
  }

  decide(kind: CollectionName, currentCount: number): UsageDecision {
    return decideUsage(kind, currentCount, this.entitlements.snapshot().tier, this.limits);
  }

  assertCanCreate(kind: CollectionName, currentCount: number): void {
    const decision = this.decide(kind, currentCount);
    if (!decision.allowed) {
      debugWarn(`[USAGE] ${kind} limit reached (${currentCount}/${decision.limit})`);
      throw new QuotaExceededError(kind, decision.limit ?? currentCount);
    }
  }
}
