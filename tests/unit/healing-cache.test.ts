/**
 * Healing Cache
 * Keying, two-strikes eviction and TTL
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { HealingCache, MAX_CONSECUTIVE_FAILURES } from '../../src/services/self-healing-locator/healing-cache.js';
import { byCss, byId } from '../../src/services/element-location/index.js';

const ORIGINAL = byId('old-button-id');
const HEALED = byId('new-button-id');
const PAGE = 'page-a';

describe('HealingCache', () => {
  let now: number;
  let cache: HealingCache;

  beforeEach(() => {
    now = 1000;
    cache = new HealingCache(0, () => now);
  });

  it('should return null for an unknown key', () => {
    assert.strictEqual(cache.lookup(ORIGINAL, PAGE), null);
    assert.strictEqual(cache.size(), 0);
  });

  it('should serve a recorded healing for the same locator and page only', () => {
    cache.recordSuccess(ORIGINAL, PAGE, HEALED, 0.95, 'text-content');

    assert.deepStrictEqual(cache.lookup(ORIGINAL, PAGE), HEALED);
    assert.strictEqual(cache.lookup(ORIGINAL, 'page-b'), null);
    assert.strictEqual(cache.lookup(byId('other'), PAGE), null);
    assert.strictEqual(cache.size(), 1);
  });

  it('should keep one entry per key and count hits', () => {
    cache.recordSuccess(ORIGINAL, PAGE, HEALED, 0.95, 'text-content');
    now = 2000;
    const entry = cache.recordSuccess(ORIGINAL, PAGE, HEALED, 0.95);

    assert.strictEqual(cache.size(), 1);
    assert.strictEqual(entry.hitCount, 2);
    assert.strictEqual(entry.lastValidatedAt, 2000);
    assert.strictEqual(entry.strategy, 'text-content');
  });

  it('should restart the hit count when the healed locator changes', () => {
    cache.recordSuccess(ORIGINAL, PAGE, HEALED, 0.95, 'text-content');
    cache.recordSuccess(ORIGINAL, PAGE, HEALED, 0.95);
    const entry = cache.recordSuccess(ORIGINAL, PAGE, byCss('button.btn'), 0.7, 'position');

    assert.strictEqual(entry.hitCount, 1);
    assert.strictEqual(entry.strategy, 'position');
    assert.deepStrictEqual(cache.lookup(ORIGINAL, PAGE), byCss('button.btn'));
  });

  it('should keep serving an entry after a single failure', () => {
    cache.recordSuccess(ORIGINAL, PAGE, HEALED, 0.95);
    now = 1500;
    cache.recordFailure(ORIGINAL, PAGE);

    assert.deepStrictEqual(cache.lookup(ORIGINAL, PAGE), HEALED);
    const entry = cache.get(ORIGINAL, PAGE);
    assert.strictEqual(entry?.consecutiveFailures, 1);
    assert.strictEqual(entry?.lastFailedAt, 1500);
  });

  it('should evict an entry after two consecutive failures', () => {
    cache.recordSuccess(ORIGINAL, PAGE, HEALED, 0.95);
    cache.recordFailure(ORIGINAL, PAGE);
    cache.recordFailure(ORIGINAL, PAGE);

    assert.strictEqual(MAX_CONSECUTIVE_FAILURES, 2);
    assert.strictEqual(cache.size(), 0);
    assert.strictEqual(cache.lookup(ORIGINAL, PAGE), null);
    assert.strictEqual(cache.get(ORIGINAL, PAGE), null);
  });

  it('should reset the strikes on success', () => {
    cache.recordSuccess(ORIGINAL, PAGE, HEALED, 0.95);
    cache.recordFailure(ORIGINAL, PAGE);
    cache.recordSuccess(ORIGINAL, PAGE, HEALED, 0.95);
    cache.recordFailure(ORIGINAL, PAGE);

    assert.deepStrictEqual(cache.lookup(ORIGINAL, PAGE), HEALED);
  });

  it('should not strike an entry replaced since it was read', () => {
    cache.recordSuccess(ORIGINAL, PAGE, HEALED, 0.95);
    cache.recordSuccess(ORIGINAL, PAGE, byCss('button.btn'), 0.7, 'position');
    cache.recordFailure(ORIGINAL, PAGE, HEALED);

    assert.strictEqual(cache.get(ORIGINAL, PAGE)?.consecutiveFailures, 0);
  });

  it('should count a hit only for the locator that was read', () => {
    cache.recordSuccess(ORIGINAL, PAGE, HEALED, 0.95, 'text-content');

    const replaced = cache.recordHit(ORIGINAL, PAGE, byCss('button.btn'));
    assert.strictEqual(replaced, null);
    assert.strictEqual(cache.get(ORIGINAL, PAGE)?.hitCount, 1);

    const hit = cache.recordHit(ORIGINAL, PAGE, HEALED);
    assert.strictEqual(hit?.hitCount, 2);
    assert.strictEqual(hit?.strategy, 'text-content');
    assert.strictEqual(hit?.confidence, 0.95);
  });

  it('should not bring back a cleared entry on a hit', () => {
    cache.recordSuccess(ORIGINAL, PAGE, HEALED, 0.95);
    cache.clear();

    assert.strictEqual(cache.recordHit(ORIGINAL, PAGE, HEALED), null);
    assert.strictEqual(cache.size(), 0);
  });

  it('should ignore failures for unknown keys', () => {
    cache.recordFailure(ORIGINAL, PAGE);
    assert.strictEqual(cache.size(), 0);
  });

  it('should drop entries older than the TTL', () => {
    const expiring = new HealingCache(1000, () => now);
    expiring.recordSuccess(ORIGINAL, PAGE, HEALED, 0.95);

    now = 2000;
    assert.deepStrictEqual(expiring.lookup(ORIGINAL, PAGE), HEALED);
    now = 2001;
    assert.strictEqual(expiring.size(), 0);
    assert.strictEqual(expiring.lookup(ORIGINAL, PAGE), null);
  });

  it('should hand out copies of its entries', () => {
    cache.recordSuccess(ORIGINAL, PAGE, HEALED, 0.95);
    const [entry] = cache.entries();
    entry.hitCount = 99;

    assert.strictEqual(cache.get(ORIGINAL, PAGE)?.hitCount, 1);
  });

  it('should replace its contents on load', () => {
    cache.recordSuccess(byId('stale'), PAGE, HEALED, 0.5);
    cache.load([
      {
        originalLocator: ORIGINAL,
        pageContextFingerprint: PAGE,
        healedLocator: HEALED,
        confidence: 0.95,
        strategy: 'text-content',
        hitCount: 3,
        lastValidatedAt: 900,
        consecutiveFailures: 0,
      },
    ]);

    assert.strictEqual(cache.size(), 1);
    assert.strictEqual(cache.lookup(byId('stale'), PAGE), null);
    assert.strictEqual(cache.get(ORIGINAL, PAGE)?.hitCount, 3);
  });

  it('should empty on clear', () => {
    cache.recordSuccess(ORIGINAL, PAGE, HEALED, 0.95);
    cache.clear();
    assert.strictEqual(cache.size(), 0);
    assert.deepStrictEqual(cache.entries(), []);
  });
});
