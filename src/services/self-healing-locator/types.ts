/**
 * Self-Healing Locator Types
 * Defines types for element location that adapts to UI changes
 */

import type {
  BoundingBox,
  ElementSnapshot,
  Locator,
} from '../element-location/types.js';
import type { SnapshotQueryEngine } from '../element-location/snapshot-query.js';

/**
 * Healing strategies, in priority order
 */
export type HealingStrategyName =
  | 'text-content'
  | 'attribute-similarity'
  | 'nearby-element'
  | 'position'
  | 'visual-similarity';

/**
 * Steps a resolution can go through before it gives up
 */
export type ResolutionStep = 'exact-match' | 'cache' | HealingStrategyName;

/**
 * How a healed locator was obtained
 */
export type HealingSource = HealingStrategyName | 'cache-hit';

/**
 * What is known about an element from earlier runs or from the caller
 */
export interface ElementHints {
  text?: string;
  id?: string;
  name?: string;
  tag?: string;
  classList?: string[];
  attributes?: Record<string, string>;
  boundingBox?: BoundingBox;

  /**
   * PNG crop of the element from a previous run
   */
  screenshotRegion?: Buffer;

  /**
   * A stable neighbour the element sits close to in the DOM
   */
  anchor?: Locator;
}

/**
 * Scores a pair of PNG regions in [0, 1]
 */
export interface ImageComparator {
  compare(reference: Buffer, candidate: Buffer): number;
}

/**
 * Thresholds and confidences of the strategies
 */
export interface StrategyThresholds {
  textExactConfidence: number;
  textPartialConfidence: number;

  /**
   * Minimum weighted Jaccard score for an attribute match
   */
  attributeThreshold: number;
  attributeWeights: {
    id: number;
    name: number;
    class: number;
    tag: number;
  };

  /**
   * Maximum DOM distance from the anchor
   */
  nearbyRadius: number;
  nearbyConfidence: number;

  /**
   * Maximum distance in pixels between box centres
   */
  positionMaxDistance: number;
  positionMaxConfidence: number;
  positionMinConfidence: number;

  visualThreshold: number;
}

/**
 * What a strategy gets besides the failed locator and the snapshot
 */
export interface StrategyContext {
  hints: ElementHints;
  thresholds: StrategyThresholds;
  engine: SnapshotQueryEngine;
  imageComparator?: ImageComparator;
}

/**
 * A node a strategy believes is the lost element
 */
export interface StrategyMatch {
  strategy: HealingStrategyName;
  locator: Locator;
  confidence: number;
  nodeIndex: number;
}

/**
 * A healing strategy. Returns null when it finds nothing; never mutates the
 * snapshot.
 */
export interface HealingStrategy {
  readonly name: HealingStrategyName;
  attempt(original: Locator, snapshot: ElementSnapshot, context: StrategyContext): StrategyMatch | null;
}

/**
 * One successful healing event
 */
export interface HealingRecord {
  originalLocator: Locator;
  healedLocator: Locator;
  strategyUsed: HealingSource;
  confidence: number;
  timestamp: number;
  pageContextFingerprint: string;

  /**
   * Time the resolution took (milliseconds)
   */
  duration: number;
}

/**
 * Cache entry for a healed locator
 */
export interface HealingCacheEntry {
  originalLocator: Locator;
  pageContextFingerprint: string;
  healedLocator: Locator;
  confidence: number;
  strategy?: HealingStrategyName;

  /**
   * Successful uses of this healed locator
   */
  hitCount: number;
  lastValidatedAt: number;
  lastFailedAt?: number;

  /**
   * Failures since the last success; two evict the entry
   */
  consecutiveFailures: number;
}

/**
 * Configuration for the self-healing locator
 */
export interface SelfHealingLocatorConfig {
  /**
   * Whether healing is attempted at all when the primary locator fails
   */
  enabled: boolean;

  /**
   * Whether to cache successful self-healing results
   */
  enableCaching: boolean;

  /**
   * Age after which an entry that has not been validated is dropped
   * (milliseconds, 0 disables)
   */
  cacheTTL: number;

  /**
   * Timeout for a whole resolution (milliseconds)
   */
  defaultTimeout: number;

  /**
   * Number of recent healing records kept for reporting
   */
  recentHistoryCapacity: number;

  thresholds: StrategyThresholds;
}

/**
 * Options accepted by the constructor: everything optional, thresholds merged
 * field by field
 */
export type SelfHealingLocatorOptions = Partial<Omit<SelfHealingLocatorConfig, 'thresholds'>> & {
  thresholds?: Partial<StrategyThresholds>;
};

/**
 * Self-healing statistics
 */
export interface SelfHealingStats {
  totalHealingAttempts: number;
  totalHealingSuccesses: number;
  totalHealingFailures: number;
  cacheHits: number;
  timeouts: number;

  /**
   * Success rate (0-1)
   */
  successRate: number;
  strategySuccesses: Record<HealingStrategyName, number>;

  /**
   * Average time for a healing attempt (milliseconds)
   */
  averageHealTime: number;
  totalHealTime: number;
}

/**
 * Point-in-time statistics report
 */
export interface HealingReport {
  totalHealings: number;
  cachedLocators: number;

  /**
   * Newest first
   */
  recentHealings: HealingRecord[];
  stats: SelfHealingStats;
}

/**
 * Stable shape published to reporting and dashboards
 */
export interface HealingStatisticsSummary {
  total_healings: number;
  cached_locators: number;
  recent_healings: HealingRecord[];
}

export interface ResolveOptions {
  /**
   * Overrides the configured timeout for this call (milliseconds)
   */
  timeout?: number;

  /**
   * Caller knowledge about the element; wins over remembered values
   */
  hints?: ElementHints;
}

export interface ResolutionSuccess {
  status: 'resolved';
  locator: Locator;
  originalLocator: Locator;
  source: 'direct' | 'cache' | 'strategy';
  healed: boolean;
  strategy?: HealingStrategyName;
  confidence: number;
  pageContextFingerprint: string;
  duration: number;
  record?: HealingRecord;
}

export interface ResolutionFailure {
  status: 'failed';
  reason: SelfHealingErrorType.NOT_FOUND | SelfHealingErrorType.TIMEOUT;
  originalLocator: Locator;
  attemptedStrategies: ResolutionStep[];
  elapsed: number;
  pageContextFingerprint: string | null;
  message: string;
}

export type ResolutionOutcome = ResolutionSuccess | ResolutionFailure;

/**
 * Self-healing error types
 */
export enum SelfHealingErrorType {
  /**
   * No strategy found the element
   */
  NOT_FOUND = 'NOT_FOUND',

  /**
   * The resolution deadline passed
   */
  TIMEOUT = 'TIMEOUT',

  /**
   * The driver could not produce a snapshot
   */
  SNAPSHOT_UNAVAILABLE = 'SNAPSHOT_UNAVAILABLE',

  /**
   * Persisted cache could not be read back
   */
  CACHE_CORRUPTION = 'CACHE_CORRUPTION',

  /**
   * The driver produced a snapshot of the wrong shape
   */
  MALFORMED_SNAPSHOT = 'MALFORMED_SNAPSHOT',

  /**
   * Unknown error
   */
  UNKNOWN = 'UNKNOWN',
}

/**
 * Custom error class for self-healing failures
 */
export class SelfHealingLocatorError extends Error {
  constructor(
    public type: SelfHealingErrorType,
    message: string,
    public originalLocator?: Locator,
    public cause?: unknown
  ) {
    super(
      `[SelfHealingLocator] ${type}: ${message}${originalLocator ? ` (locator: ${originalLocator.type}="${originalLocator.value}")` : ''}`
    );
    this.name = 'SelfHealingLocatorError';
  }
}
