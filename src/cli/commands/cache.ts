/**
 * CLI Command: Cache
 * Inspect or empty the persisted healing cache
 */

import { config } from '../../config/env.js';
import {
  FileCachePersistence,
  parsePersistedCache,
} from '../../services/self-healing-locator/cache-persistence.js';
import { HealingCache } from '../../services/self-healing-locator/healing-cache.js';
import type { HealingCacheEntry } from '../../services/self-healing-locator/types.js';

/**
 * Display help for the cache command
 */
export function displayCacheHelp(): void {
  console.log(`
Healing Cache
=============

Usage:
  healing-cli cache <stats|clear> [options]

Subcommands:
  stats                   Show how many healed locators are stored
  clear                   Remove every stored healed locator

Options:
  -f, --file <path>       Cache file (default: ${config.HEALING_CACHE_FILE})
  -h, --help              Show this help message
`);
}

interface CacheCommandArgs {
  action: 'stats' | 'clear' | null;
  filePath: string;
  help: boolean;
}

export function parseCacheArgs(args: string[], defaultFile = config.HEALING_CACHE_FILE): CacheCommandArgs {
  const parsed: CacheCommandArgs = { action: null, filePath: defaultFile, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        parsed.help = true;
        break;

      case '-f':
      case '--file': {
        const fileValue = args[++i];
        if (fileValue) {
          parsed.filePath = fileValue;
        }
        break;
      }

      case 'stats':
      case 'clear':
        parsed.action = arg;
        break;

      default:
        break;
    }
  }

  return parsed;
}

export interface CacheSummary {
  stored: number;
  live: number;
  byStrategy: Record<string, number>;
}

/**
 * Count stored entries and the ones a lookup would still serve
 */
export function summarizeCache(entries: readonly HealingCacheEntry[], ttl: number, now = Date.now): CacheSummary {
  const cache = new HealingCache(ttl, now);
  cache.load(entries);

  const byStrategy: Record<string, number> = {};
  for (const entry of entries) {
    const key = entry.strategy ?? 'unknown';
    byStrategy[key] = (byStrategy[key] ?? 0) + 1;
  }
  return { stored: entries.length, live: cache.size(), byStrategy };
}

/**
 * Execute the cache command
 */
export async function executeCacheCommand(args: string[]): Promise<void> {
  const parsed = parseCacheArgs(args);

  if (parsed.help || !parsed.action) {
    displayCacheHelp();
    return;
  }

  const persistence = new FileCachePersistence(parsed.filePath);

  if (parsed.action === 'clear') {
    await persistence.save([]);
    console.log(`Cleared healing cache at ${parsed.filePath}`);
    return;
  }

  const entries = parsePersistedCache(await persistence.load());
  const summary = summarizeCache(entries, config.HEALING_CACHE_TTL_MS);

  console.log(`Cache file:   ${parsed.filePath}`);
  console.log(`Stored:       ${summary.stored}`);
  console.log(`Live:         ${summary.live}`);
  for (const [strategy, count] of Object.entries(summary.byStrategy)) {
    console.log(`  ${strategy}: ${count}`);
  }
}
