/**
 * Healing Cache - healed locators keyed by (original locator, page context)
 *
 * Every operation is synchronous, so a call never interleaves with another
 * resolution on the event loop.
 */

import type { Locator } from '../element-location/types.js';
import { locatorEquals, locatorFingerprint } from '../element-location/locator.js';
import type { HealingCacheEntry, HealingStrategyName } from './types.js';
import { createModuleLogger } from '../../utils/logger.js';

const logger = createModuleLogger('healing-cache');

/**
 * Consecutive failures after which an entry is no longer served
 */
export const MAX_CONSECUTIVE_FAILURES = 2;

function cacheKey(original: Locator, pageContextFingerprint: string): string {
  return `${locatorFingerprint(original)}::${pageContextFingerprint}`;
}

function copyEntry(entry: HealingCacheEntry): HealingCacheEntry {
  return { ...entry };
}

export class HealingCache {
  private store = new Map<string, HealingCacheEntry>();

  /**
   * @param ttl - milliseconds an entry stays live after its last validation; 0 keeps it forever
   */
  constructor(
    private readonly ttl = 0,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Healed locator for the key, or null. Evicts the entry when it has failed
   * twice in a row or outlived the TTL.
   */
  lookup(original: Locator, pageContextFingerprint: string): Locator | null {
    return this.get(original, pageContextFingerprint)?.healedLocator ?? null;
  }

  /**
   * Live entry for the key, same eviction rules as lookup
   */
  get(original: Locator, pageContextFingerprint: string): HealingCacheEntry | null {
    const key = cacheKey(original, pageContextFingerprint);
    const entry = this.store.get(key);
    if (!entry) {
      return null;
    }
    if (this.isStale(entry)) {
      this.store.delete(key);
      logger.debug('Evicted stale cache entry', {
        locator: locatorFingerprint(original),
        consecutiveFailures: entry.consecutiveFailures,
      });
      return null;
    }
    return copyEntry(entry);
  }

  recordSuccess(
    original: Locator,
    pageContextFingerprint: string,
    healed: Locator,
    confidence: number,
    strategy?: HealingStrategyName
  ): HealingCacheEntry {
    const key = cacheKey(original, pageContextFingerprint);
    const existing = this.store.get(key);
    const sameLocator = existing !== undefined && locatorEquals(existing.healedLocator, healed);

    const entry: HealingCacheEntry = {
      originalLocator: original,
      pageContextFingerprint,
      healedLocator: healed,
      confidence,
      strategy: strategy ?? (sameLocator ? existing.strategy : undefined),
      hitCount: sameLocator ? existing.hitCount + 1 : 1,
      lastValidatedAt: this.now(),
      lastFailedAt: sameLocator ? existing.lastFailedAt : undefined,
      consecutiveFailures: 0,
    };
    this.store.set(key, entry);
    return copyEntry(entry);
  }

  /**
   * Count a hit for the entry, but only while it still holds `expected`.
   * Returns null when the entry is gone or was replaced since it was read.
   */
  recordHit(original: Locator, pageContextFingerprint: string, expected: Locator): HealingCacheEntry | null {
    const entry = this.store.get(cacheKey(original, pageContextFingerprint));
    if (!entry || !locatorEquals(entry.healedLocator, expected)) {
      return null;
    }
    return this.recordSuccess(original, pageContextFingerprint, expected, entry.confidence, entry.strategy);
  }

  /**
   * Add a strike. With `expected`, the strike only lands while the entry
   * still holds that healed locator.
   */
  recordFailure(original: Locator, pageContextFingerprint: string, expected?: Locator): void {
    const entry = this.store.get(cacheKey(original, pageContextFingerprint));
    if (!entry || (expected && !locatorEquals(entry.healedLocator, expected))) {
      return;
    }
    entry.lastFailedAt = this.now();
    entry.consecutiveFailures++;
    logger.debug('Cached locator failed to resolve', {
      locator: locatorFingerprint(original),
      consecutiveFailures: entry.consecutiveFailures,
    });
  }

  /**
   * Number of live entries
   */
  size(): number {
    let live = 0;
    for (const entry of this.store.values()) {
      if (!this.isStale(entry)) live++;
    }
    return live;
  }

  clear(): void {
    this.store.clear();
  }

  /**
   * Copies of the live entries, for persistence
   */
  entries(): HealingCacheEntry[] {
    return [...this.store.values()].filter((entry) => !this.isStale(entry)).map(copyEntry);
  }

  /**
   * Replace the contents with previously saved entries
   */
  load(entries: readonly HealingCacheEntry[]): void {
    this.store.clear();
    for (const entry of entries) {
      this.store.set(cacheKey(entry.originalLocator, entry.pageContextFingerprint), copyEntry(entry));
    }
    logger.debug('Loaded cache entries', { loaded: entries.length, live: this.size() });
  }

  private isStale(entry: HealingCacheEntry): boolean {
    if (entry.consecutiveFailures >= MAX_CONSECUTIVE_FAILURES) {
      return true;
    }
    return this.ttl > 0 && this.now() - entry.lastValidatedAt > this.ttl;
  }
}

export function createHealingCache(ttl?: number, now?: () => number): HealingCache {
  return new HealingCache(ttl, now);
}
