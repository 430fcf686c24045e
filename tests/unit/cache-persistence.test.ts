/**
 * Cache Persistence
 * File and in-memory stores for healed locators
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  FileCachePersistence,
  MemoryCachePersistence,
  parsePersistedCache,
  toPersistedCache,
  SelfHealingErrorType,
  SelfHealingLocatorError,
  type HealingCacheEntry,
} from '../../src/services/self-healing-locator/index.js';
import { byCss, byId } from '../../src/services/element-location/index.js';

function entry(original: string, healed: string, hitCount = 1): HealingCacheEntry {
  return {
    originalLocator: byId(original),
    pageContextFingerprint: 'page-a',
    healedLocator: byCss(healed),
    confidence: 0.75,
    strategy: 'text-content',
    hitCount,
    lastValidatedAt: 1000,
    consecutiveFailures: 0,
  };
}

function isCorruption(error: unknown): boolean {
  return error instanceof SelfHealingLocatorError && error.type === SelfHealingErrorType.CACHE_CORRUPTION;
}

describe('parsePersistedCache', () => {
  it('should treat a missing document as empty', () => {
    assert.deepStrictEqual(parsePersistedCache(null), []);
  });

  it('should read back what toPersistedCache wrote', () => {
    const document = JSON.parse(JSON.stringify(toPersistedCache([entry('old', '#new')], new Date(0))));
    assert.strictEqual(document.savedAt, '1970-01-01T00:00:00.000Z');

    const [loaded] = parsePersistedCache(document);
    assert.deepStrictEqual(loaded.originalLocator, byId('old'));
    assert.deepStrictEqual(loaded.healedLocator, byCss('#new'));
    assert.ok(Object.isFrozen(loaded.healedLocator));
    assert.strictEqual(loaded.lastFailedAt, undefined);
  });

  it('should reject documents of another version', () => {
    assert.throws(() => parsePersistedCache({ version: 2, savedAt: 'x', entries: [] }), isCorruption);
  });

  it('should reject entries with unknown locator types', () => {
    const document = toPersistedCache([entry('old', '#new')]);
    const tampered = {
      ...document,
      entries: [{ ...document.entries[0], healedLocator: { type: 'accessibility_id', value: 'x' } }],
    };
    assert.throws(() => parsePersistedCache(tampered), isCorruption);
  });
});

describe('FileCachePersistence', () => {
  let dir: string;

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'healing-cache-'));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load null when no file exists', async () => {
    const persistence = new FileCachePersistence(join(dir, 'missing.json'));
    assert.strictEqual(await persistence.load(), null);
  });

  it('should save and load entries', async () => {
    const filePath = join(dir, 'nested', 'healing_cache.json');
    const persistence = new FileCachePersistence(filePath);
    await persistence.save([entry('old', '#new', 4)]);

    const loaded = parsePersistedCache(await persistence.load());
    assert.strictEqual(loaded.length, 1);
    assert.strictEqual(loaded[0].hitCount, 4);
    assert.deepStrictEqual(await readdir(join(dir, 'nested')), ['healing_cache.json']);
  });

  it('should apply overlapping saves in call order', async () => {
    const filePath = join(dir, 'ordered.json');
    const persistence = new FileCachePersistence(filePath);

    await Promise.all([
      persistence.save([entry('first', '#a')]),
      persistence.save([entry('second', '#b'), entry('third', '#c')]),
    ]);

    const document = JSON.parse(await readFile(filePath, 'utf-8'));
    assert.strictEqual(document.version, 1);
    assert.strictEqual(document.entries.length, 2);
    assert.strictEqual(document.entries[0].originalLocator.value, 'second');
  });

  it('should report a file that is not JSON as corrupt', async () => {
    const filePath = join(dir, 'broken.json');
    await writeFile(filePath, '{ not json', 'utf-8');

    await assert.rejects(new FileCachePersistence(filePath).load(), isCorruption);
  });
});

describe('MemoryCachePersistence', () => {
  it('should keep the last saved document', async () => {
    const persistence = new MemoryCachePersistence();
    assert.strictEqual(await persistence.load(), null);

    await persistence.save([entry('old', '#new')]);
    assert.strictEqual(persistence.saves, 1);
    assert.strictEqual(parsePersistedCache(await persistence.load()).length, 1);
  });
});
