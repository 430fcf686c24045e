/**
 * Self-Healing Locator Service
 * Element location that adapts to UI changes: when a locator stops resolving,
 * the element is found again through a cache of earlier healings and a fixed
 * chain of fallback strategies.
 */

import type {
  ElementHints,
  HealingCacheEntry,
  HealingRecord,
  HealingReport,
  HealingSource,
  HealingStatisticsSummary,
  ImageComparator,
  ResolutionFailure,
  ResolutionOutcome,
  ResolutionStep,
  ResolutionSuccess,
  ResolveOptions,
  SelfHealingLocatorConfig,
  SelfHealingLocatorOptions,
  SelfHealingStats,
  StrategyContext,
} from './types.js';
import { SelfHealingErrorType, SelfHealingLocatorError } from './types.js';
import type { ElementSnapshot, Locator, NodeHandle, SnapshotProvider } from '../element-location/types.js';
import { ElementLocationError, LocationErrorType } from '../element-location/types.js';
import { formatLocator } from '../element-location/locator.js';
import { toLocator } from '../element-location/selector-parser.js';
import { getSnapshotQueryEngine, type SnapshotQueryEngine } from '../element-location/snapshot-query.js';
import { describeSnapshotIssues } from '../element-location/snapshot-schema.js';
import { computePageFingerprint } from '../element-location/page-fingerprint.js';
import { Deadline, isTimeoutError } from '../element-location/timeout-handler.js';
import { DEFAULT_STRATEGY_THRESHOLDS, HEALING_STRATEGIES } from './strategies.js';
import { ElementMemory } from './element-memory.js';
import { HealingCache } from './healing-cache.js';
import { HealingStatistics } from './healing-statistics.js';
import { FileCachePersistence, parsePersistedCache, type CachePersistence } from './cache-persistence.js';
import { PngImageComparator } from './image-comparator.js';
import { config as envConfig, type Env } from '../../config/env.js';
import { createModuleLogger } from '../../utils/logger.js';

const logger = createModuleLogger('self-healing-locator');

/**
 * Default configuration for self-healing locator
 */
const DEFAULT_CONFIG: SelfHealingLocatorConfig = {
  enabled: true,
  enableCaching: true,
  cacheTTL: 30 * 24 * 60 * 60 * 1000, // 30 days
  defaultTimeout: 10000,
  recentHistoryCapacity: 50,
  thresholds: DEFAULT_STRATEGY_THRESHOLDS,
};

/**
 * Collaborators of the orchestrator, all optional
 */
export interface SelfHealingLocatorDependencies {
  persistence?: CachePersistence;
  imageComparator?: ImageComparator;
  engine?: SnapshotQueryEngine;
  now?: () => number;
}

/**
 * Self-Healing Locator class
 * Owns the healing cache, element memory and statistics of the process
 */
export class SelfHealingLocator {
  private config: SelfHealingLocatorConfig;
  private readonly cache: HealingCache;
  private readonly memory = new ElementMemory();
  private readonly statistics: HealingStatistics;
  private readonly persistence?: CachePersistence;
  private readonly imageComparator: ImageComparator;
  private readonly engine: SnapshotQueryEngine;
  private readonly now: () => number;

  constructor(config: SelfHealingLocatorOptions = {}, dependencies: SelfHealingLocatorDependencies = {}) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      thresholds: {
        ...DEFAULT_CONFIG.thresholds,
        ...config.thresholds,
        attributeWeights: {
          ...DEFAULT_CONFIG.thresholds.attributeWeights,
          ...config.thresholds?.attributeWeights,
        },
      },
    };
    this.now = dependencies.now ?? Date.now;
    this.cache = new HealingCache(this.config.cacheTTL, this.now);
    this.statistics = new HealingStatistics(this.config.recentHistoryCapacity);
    this.persistence = dependencies.persistence;
    this.imageComparator = dependencies.imageComparator ?? new PngImageComparator();
    this.engine = dependencies.engine ?? getSnapshotQueryEngine();

    logger.info('Self-Healing Locator initialized', {
      enabled: this.config.enabled,
      caching: this.config.enableCaching,
      persistence: !!this.persistence,
      defaultTimeout: this.config.defaultTimeout,
    });
  }

  /**
   * Load the persisted cache. A corrupt cache is logged and replaced by an
   * empty one.
   *
   * @returns number of entries loaded
   */
  async initialize(): Promise<number> {
    if (!this.persistence || !this.config.enableCaching) {
      return 0;
    }

    try {
      const entries = parsePersistedCache(await this.persistence.load());
      this.cache.load(entries);
      logger.info('Healing cache loaded', { entries: entries.length, live: this.cache.size() });
      return entries.length;
    } catch (error) {
      if (error instanceof SelfHealingLocatorError && error.type === SelfHealingErrorType.CACHE_CORRUPTION) {
        logger.error(error, 'Persisted healing cache is corrupt, starting with an empty cache');
        this.cache.clear();
        return 0;
      }
      throw error;
    }
  }

  /**
   * Save the cache through the persistence collaborator, if any
   */
  async persist(): Promise<void> {
    if (!this.persistence || !this.config.enableCaching) {
      return;
    }
    await this.persistence.save(this.cache.entries());
  }

  async shutdown(): Promise<void> {
    await this.persist();
    logger.info('Self-Healing Locator shut down', { cachedLocators: this.cache.size() });
  }

  /**
   * Resolve a locator, healing it when it no longer matches.
   *
   * @param locator - locator or "strategy=value" string
   * @param pageContextFingerprint - scope of cache entries; computed from the snapshot when null
   */
  async resolve(
    locator: Locator | string,
    pageContextFingerprint: string | null,
    snapshotProvider: SnapshotProvider,
    options: ResolveOptions = {}
  ): Promise<ResolutionOutcome> {
    const original = toLocator(locator);
    const deadline = new Deadline(options.timeout ?? this.config.defaultTimeout, this.now);
    const attempted: ResolutionStep[] = [];
    let fingerprint = pageContextFingerprint;
    let healing = false;

    try {
      const snapshot = await this.acquireSnapshot(original, snapshotProvider, deadline);
      const fp = fingerprint ?? computePageFingerprint(snapshot);
      fingerprint = fp;

      attempted.push('exact-match');
      const direct = await this.probe(snapshotProvider, original, snapshot, deadline, 'Exact match');
      if (direct) {
        this.ensureTimeLeft(deadline, original);
        this.memory.remember(original, fp, direct.node);
        return this.resolved(original, original, 'direct', 1, fp, deadline.elapsed());
      }

      if (!this.config.enabled) {
        return this.failed(SelfHealingErrorType.NOT_FOUND, original, attempted, deadline.elapsed(), fp, 'Locator did not resolve and healing is disabled');
      }

      healing = true;
      this.statistics.recordAttempt();
      logger.debug('Primary locator failed, healing', { locator: formatLocator(original), pageContextFingerprint: fp });

      const cached = this.config.enableCaching ? this.cache.get(original, fp) : null;
      if (cached) {
        attempted.push('cache');
        const outcome = await this.tryCached(original, cached, snapshotProvider, snapshot, deadline);
        if (outcome) {
          return outcome;
        }
      }

      const hints = this.memory.hintsFor(original, fp, options.hints);
      if (options.hints?.anchor) {
        this.memory.rememberAnchor(original, fp, options.hints.anchor);
      }
      const outcome = await this.runStrategies(original, fp, hints, snapshotProvider, snapshot, deadline, attempted);
      if (outcome) {
        return outcome;
      }

      const elapsed = deadline.elapsed();
      this.statistics.recordFailure(elapsed);
      logger.warn('Self-healing failed', { locator: formatLocator(original), attemptedStrategies: attempted, elapsed });
      return this.failed(SelfHealingErrorType.NOT_FOUND, original, attempted, elapsed, fp, 'No strategy found the element');
    } catch (error) {
      const elapsed = deadline.elapsed();
      if (isTimeoutError(error)) {
        if (healing) {
          this.statistics.recordFailure(elapsed, true);
        }
        logger.warn('Resolution timed out', { locator: formatLocator(original), attemptedStrategies: attempted, elapsed });
        return this.failed(SelfHealingErrorType.TIMEOUT, original, attempted, elapsed, fingerprint, error.message);
      }
      if (healing) {
        this.statistics.recordFailure(elapsed);
      }
      throw error;
    }
  }

  /**
   * Like resolve, but a failure is thrown as SelfHealingLocatorError
   */
  async resolveOrThrow(
    locator: Locator | string,
    pageContextFingerprint: string | null,
    snapshotProvider: SnapshotProvider,
    options?: ResolveOptions
  ): Promise<Locator> {
    const outcome = await this.resolve(locator, pageContextFingerprint, snapshotProvider, options);
    if (outcome.status === 'failed') {
      throw new SelfHealingLocatorError(outcome.reason, outcome.message, outcome.originalLocator);
    }
    return outcome.locator;
  }

  private async acquireSnapshot(
    original: Locator,
    provider: SnapshotProvider,
    deadline: Deadline
  ): Promise<ElementSnapshot> {
    let snapshot: ElementSnapshot;
    try {
      snapshot = await deadline.run(
        Promise.resolve().then(() => provider.getSnapshot()),
        'Snapshot acquisition'
      );
    } catch (error) {
      if (isTimeoutError(error)) {
        throw error;
      }
      throw new SelfHealingLocatorError(
        SelfHealingErrorType.SNAPSHOT_UNAVAILABLE,
        `Driver could not produce a snapshot: ${error instanceof Error ? error.message : String(error)}`,
        original,
        error
      );
    }

    const issues = describeSnapshotIssues(snapshot);
    if (issues.length > 0) {
      throw new SelfHealingLocatorError(
        SelfHealingErrorType.MALFORMED_SNAPSHOT,
        `Snapshot does not match the expected shape: ${issues.slice(0, 5).join('; ')}`,
        original
      );
    }
    return snapshot;
  }

  /**
   * Ask the driver whether a locator resolves in the snapshot
   */
  private async probe(
    provider: SnapshotProvider,
    locator: Locator,
    snapshot: ElementSnapshot,
    deadline: Deadline,
    description: string
  ): Promise<NodeHandle | null> {
    try {
      return await deadline.run(
        Promise.resolve().then(() => provider.tryResolve(locator, snapshot)),
        description
      );
    } catch (error) {
      if (isTimeoutError(error)) {
        throw error;
      }
      throw new SelfHealingLocatorError(
        SelfHealingErrorType.SNAPSHOT_UNAVAILABLE,
        `Driver failed while resolving ${formatLocator(locator)}: ${error instanceof Error ? error.message : String(error)}`,
        locator,
        error
      );
    }
  }

  private async tryCached(
    original: Locator,
    cached: HealingCacheEntry,
    provider: SnapshotProvider,
    snapshot: ElementSnapshot,
    deadline: Deadline
  ): Promise<ResolutionSuccess | null> {
    const fp = cached.pageContextFingerprint;
    const handle = await this.probe(provider, cached.healedLocator, snapshot, deadline, 'Cached locator check');
    this.ensureTimeLeft(deadline, original);
    if (!handle) {
      this.cache.recordFailure(original, fp, cached.healedLocator);
      logger.info('Cached healed locator no longer resolves', {
        locator: formatLocator(original),
        cached: formatLocator(cached.healedLocator),
      });
      return null;
    }

    if (!this.cache.recordHit(original, fp, cached.healedLocator)) {
      logger.debug('Cache entry changed while it was being checked', { locator: formatLocator(original) });
    }
    this.memory.remember(original, fp, handle.node);
    const duration = deadline.elapsed();
    const record = this.buildRecord(original, cached.healedLocator, 'cache-hit', cached.confidence, fp, duration);
    this.statistics.recordSuccess(record);

    logger.info('Locator healed from cache', {
      locator: formatLocator(original),
      healed: formatLocator(cached.healedLocator),
    });
    return { ...this.resolved(original, cached.healedLocator, 'cache', cached.confidence, fp, duration), record };
  }

  /**
   * Strategies in priority order; the first match the driver confirms wins
   */
  private async runStrategies(
    original: Locator,
    fp: string,
    hints: ElementHints,
    provider: SnapshotProvider,
    snapshot: ElementSnapshot,
    deadline: Deadline,
    attempted: ResolutionStep[]
  ): Promise<ResolutionSuccess | null> {
    const context: StrategyContext = {
      hints,
      thresholds: this.config.thresholds,
      engine: this.engine,
      imageComparator: this.imageComparator,
    };

    for (const strategy of HEALING_STRATEGIES) {
      this.ensureTimeLeft(deadline, original);
      attempted.push(strategy.name);

      const match = strategy.attempt(original, snapshot, context);
      this.ensureTimeLeft(deadline, original);
      if (!match) {
        logger.debug('Strategy found no match', { strategy: strategy.name, locator: formatLocator(original) });
        continue;
      }

      const confirmed = await this.probe(provider, match.locator, snapshot, deadline, `Verifying ${strategy.name} match`);
      this.ensureTimeLeft(deadline, original);
      if (!confirmed || confirmed.index !== match.nodeIndex) {
        logger.debug('Driver did not confirm strategy match', {
          strategy: strategy.name,
          candidate: formatLocator(match.locator),
        });
        continue;
      }

      const duration = deadline.elapsed();
      const record = this.buildRecord(original, match.locator, match.strategy, match.confidence, fp, duration);
      if (this.config.enableCaching) {
        this.cache.recordSuccess(original, fp, match.locator, match.confidence, match.strategy);
      }
      this.memory.remember(original, fp, confirmed.node);
      this.statistics.recordSuccess(record);

      logger.info('Locator healed', {
        locator: formatLocator(original),
        healed: formatLocator(match.locator),
        strategy: match.strategy,
        confidence: match.confidence,
        duration,
      });
      return { ...this.resolved(original, match.locator, 'strategy', match.confidence, fp, duration), strategy: match.strategy, record };
    }

    this.ensureTimeLeft(deadline, original);
    return null;
  }

  /**
   * Throw TIMEOUT once the deadline has passed, so a result that arrives late
   * is discarded
   */
  private ensureTimeLeft(deadline: Deadline, original: Locator): void {
    if (deadline.expired()) {
      throw new ElementLocationError(
        LocationErrorType.TIMEOUT,
        `Healing did not finish within ${deadline.timeout}ms`,
        original
      );
    }
  }

  private buildRecord(
    original: Locator,
    healed: Locator,
    strategyUsed: HealingSource,
    confidence: number,
    pageContextFingerprint: string,
    duration: number
  ): HealingRecord {
    return {
      originalLocator: original,
      healedLocator: healed,
      strategyUsed,
      confidence,
      timestamp: this.now(),
      pageContextFingerprint,
      duration,
    };
  }

  private resolved(
    original: Locator,
    locator: Locator,
    source: ResolutionSuccess['source'],
    confidence: number,
    pageContextFingerprint: string,
    duration: number
  ): ResolutionSuccess {
    return {
      status: 'resolved',
      locator,
      originalLocator: original,
      source,
      healed: source !== 'direct',
      confidence,
      pageContextFingerprint,
      duration,
    };
  }

  private failed(
    reason: ResolutionFailure['reason'],
    original: Locator,
    attempted: ResolutionStep[],
    elapsed: number,
    pageContextFingerprint: string | null,
    message: string
  ): ResolutionFailure {
    return {
      status: 'failed',
      reason,
      originalLocator: original,
      attemptedStrategies: [...attempted],
      elapsed,
      pageContextFingerprint,
      message,
    };
  }

  /**
   * Published statistics shape
   */
  getHealingStatistics(): HealingStatisticsSummary {
    const report = this.getReport();
    return {
      total_healings: report.totalHealings,
      cached_locators: report.cachedLocators,
      recent_healings: report.recentHealings,
    };
  }

  getReport(): HealingReport {
    return this.statistics.report(this.cache.size());
  }

  /**
   * Get current statistics
   */
  getStats(): SelfHealingStats {
    return this.statistics.getStats();
  }

  /**
   * Reset statistics
   */
  resetStats(): void {
    this.statistics.reset();
  }

  /**
   * Clear the cache and the remembered element profiles
   */
  clearCache(): void {
    this.cache.clear();
    this.memory.clear();
    logger.debug('Self-healing cache cleared');
  }

  /**
   * Cache entry for a key, without touching it
   */
  getCacheEntry(locator: Locator | string, pageContextFingerprint: string): HealingCacheEntry | null {
    return this.cache.get(toLocator(locator), pageContextFingerprint);
  }

  /**
   * Get current configuration
   */
  getConfig(): Readonly<SelfHealingLocatorConfig> {
    return { ...this.config };
  }
}

/**
 * Create a self-healing locator instance
 */
export function createSelfHealingLocator(
  config?: SelfHealingLocatorOptions,
  dependencies?: SelfHealingLocatorDependencies
): SelfHealingLocator {
  return new SelfHealingLocator(config, dependencies);
}

/**
 * Create a self-healing locator configured from HEALING_* environment
 * variables, with file persistence when caching is on
 */
export function createSelfHealingLocatorFromEnv(
  env: Env = envConfig,
  dependencies: Omit<SelfHealingLocatorDependencies, 'persistence'> = {}
): SelfHealingLocator {
  return new SelfHealingLocator(
    {
      enabled: env.HEALING_ENABLED,
      enableCaching: env.HEALING_CACHE_ENABLED,
      cacheTTL: env.HEALING_CACHE_TTL_MS,
      defaultTimeout: env.HEALING_DEFAULT_TIMEOUT_MS,
      recentHistoryCapacity: env.HEALING_RECENT_CAPACITY,
      thresholds: {
        attributeThreshold: env.HEALING_ATTRIBUTE_THRESHOLD,
        nearbyRadius: env.HEALING_NEARBY_RADIUS,
        positionMaxDistance: env.HEALING_POSITION_MAX_DISTANCE,
        visualThreshold: env.HEALING_VISUAL_THRESHOLD,
      },
    },
    {
      ...dependencies,
      persistence: env.HEALING_CACHE_ENABLED ? new FileCachePersistence(env.HEALING_CACHE_FILE) : undefined,
    }
  );
}
