/**
 * Cache Persistence - keeps healed locators between runs. Loaded once at
 * start-up and saved at shutdown, never while a resolution is running.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createLocator } from '../element-location/locator.js';
import { LocatorType } from '../element-location/types.js';
import type { HealingCacheEntry } from './types.js';
import { SelfHealingErrorType, SelfHealingLocatorError } from './types.js';
import { createModuleLogger } from '../../utils/logger.js';

const logger = createModuleLogger('cache-persistence');

export const CACHE_FILE_VERSION = 1;

const locatorSchema = z.object({
  type: z.nativeEnum(LocatorType),
  value: z.string().min(1),
});

const cacheEntrySchema = z.object({
  originalLocator: locatorSchema,
  pageContextFingerprint: z.string().min(1),
  healedLocator: locatorSchema,
  confidence: z.number().min(0).max(1),
  strategy: z
    .enum(['text-content', 'attribute-similarity', 'nearby-element', 'position', 'visual-similarity'])
    .optional(),
  hitCount: z.number().int().min(0),
  lastValidatedAt: z.number(),
  lastFailedAt: z.number().optional(),
  consecutiveFailures: z.number().int().min(0),
});

export const persistedCacheSchema = z.object({
  version: z.literal(CACHE_FILE_VERSION),
  savedAt: z.string(),
  entries: z.array(cacheEntrySchema),
});

export type PersistedCache = z.infer<typeof persistedCacheSchema>;

/**
 * Where the cache lives between runs
 */
export interface CachePersistence {
  /**
   * The stored document, or null when nothing has been saved yet
   */
  load(): Promise<unknown>;
  save(entries: readonly HealingCacheEntry[]): Promise<void>;
}

export function toPersistedCache(entries: readonly HealingCacheEntry[], savedAt = new Date()): PersistedCache {
  return {
    version: CACHE_FILE_VERSION,
    savedAt: savedAt.toISOString(),
    entries: entries.map((entry) => ({
      ...entry,
      originalLocator: { type: entry.originalLocator.type, value: entry.originalLocator.value },
      healedLocator: { type: entry.healedLocator.type, value: entry.healedLocator.value },
    })),
  };
}

/**
 * Validate a loaded document. Null means nothing was stored.
 *
 * @throws SelfHealingLocatorError CACHE_CORRUPTION when the document does not match
 */
export function parsePersistedCache(document: unknown): HealingCacheEntry[] {
  if (document === null || document === undefined) {
    return [];
  }

  const result = persistedCacheSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || 'document'}: ${issue.message}`)
      .join('; ');
    throw new SelfHealingLocatorError(
      SelfHealingErrorType.CACHE_CORRUPTION,
      `Persisted cache is invalid (${issues})`,
      undefined,
      result.error
    );
  }

  return result.data.entries.map((entry) => ({
    ...entry,
    originalLocator: createLocator(entry.originalLocator.type, entry.originalLocator.value),
    healedLocator: createLocator(entry.healedLocator.type, entry.healedLocator.value),
  }));
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * JSON file persistence. Saves run one at a time and replace the file
 * atomically through a temporary file.
 */
export class FileCachePersistence implements CachePersistence {
  private queue: Promise<void> = Promise.resolve();
  private writes = 0;

  constructor(readonly filePath: string) {}

  async load(): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.debug('No persisted cache found', { filePath: this.filePath });
        return null;
      }
      throw error;
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new SelfHealingLocatorError(
        SelfHealingErrorType.CACHE_CORRUPTION,
        `Cache file ${this.filePath} is not valid JSON`,
        undefined,
        error
      );
    }
  }

  save(entries: readonly HealingCacheEntry[]): Promise<void> {
    const document = toPersistedCache(entries);
    const run = this.queue.then(() => this.write(document));
    // later saves wait for this one whatever its outcome; the caller gets the outcome from `run`
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async write(document: PersistedCache): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.${++this.writes}.tmp`;
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(tempPath, JSON.stringify(document, null, 2), 'utf-8');
    await rename(tempPath, this.filePath);
    logger.debug('Persisted healing cache', { filePath: this.filePath, entries: document.entries.length });
  }
}

/**
 * In-memory persistence, for tests and short-lived processes
 */
export class MemoryCachePersistence implements CachePersistence {
  saves = 0;

  constructor(private document: unknown = null) {}

  async load(): Promise<unknown> {
    return this.document;
  }

  async save(entries: readonly HealingCacheEntry[]): Promise<void> {
    this.saves++;
    this.document = toPersistedCache(entries);
  }

  /**
   * What the last save stored
   */
  stored(): unknown {
    return this.document;
  }
}

export function createFileCachePersistence(filePath: string): FileCachePersistence {
  return new FileCachePersistence(filePath);
}
