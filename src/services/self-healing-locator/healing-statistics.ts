/**
 * Healing Statistics - process-lifetime counters and a bounded history of
 * recent healings
 */

import type { HealingRecord, HealingReport, HealingStrategyName, SelfHealingStats } from './types.js';

function emptyStats(): SelfHealingStats {
  return {
    totalHealingAttempts: 0,
    totalHealingSuccesses: 0,
    totalHealingFailures: 0,
    cacheHits: 0,
    timeouts: 0,
    successRate: 0,
    strategySuccesses: {
      'text-content': 0,
      'attribute-similarity': 0,
      'nearby-element': 0,
      position: 0,
      'visual-similarity': 0,
    },
    averageHealTime: 0,
    totalHealTime: 0,
  };
}

function copyRecord(record: HealingRecord): HealingRecord {
  return { ...record };
}

export class HealingStatistics {
  private stats: SelfHealingStats = emptyStats();
  private ring: HealingRecord[] = [];
  private next = 0;

  constructor(readonly capacity = 50) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * The primary locator failed and healing starts
   */
  recordAttempt(): void {
    this.stats.totalHealingAttempts++;
  }

  recordSuccess(record: HealingRecord): void {
    this.stats.totalHealingSuccesses++;
    if (record.strategyUsed === 'cache-hit') {
      this.stats.cacheHits++;
    } else {
      this.stats.strategySuccesses[record.strategyUsed]++;
    }
    this.addHealTime(record.duration);
    this.push(record);
  }

  recordFailure(duration: number, timedOut = false): void {
    this.stats.totalHealingFailures++;
    if (timedOut) {
      this.stats.timeouts++;
    }
    this.addHealTime(duration);
  }

  /**
   * Deep point-in-time copy
   */
  report(cachedLocators: number): HealingReport {
    return {
      totalHealings: this.stats.totalHealingSuccesses,
      cachedLocators,
      recentHealings: this.recent(),
      stats: this.getStats(),
    };
  }

  getStats(): SelfHealingStats {
    const completed = this.stats.totalHealingSuccesses + this.stats.totalHealingFailures;
    return {
      ...this.stats,
      successRate: this.stats.totalHealingAttempts > 0 ? this.stats.totalHealingSuccesses / this.stats.totalHealingAttempts : 0,
      averageHealTime: completed > 0 ? this.stats.totalHealTime / completed : 0,
      strategySuccesses: { ...this.stats.strategySuccesses },
    };
  }

  /**
   * Recent healings, newest first
   */
  recent(): HealingRecord[] {
    const ordered: HealingRecord[] = [];
    for (let i = 1; i <= this.ring.length; i++) {
      const index = (this.next - i + this.capacity) % this.capacity;
      ordered.push(copyRecord(this.ring[index]));
    }
    return ordered;
  }

  strategySuccesses(strategy: HealingStrategyName): number {
    return this.stats.strategySuccesses[strategy];
  }

  reset(): void {
    this.stats = emptyStats();
    this.ring = [];
    this.next = 0;
  }

  private addHealTime(duration: number): void {
    this.stats.totalHealTime += Math.max(0, duration);
  }

  private push(record: HealingRecord): void {
    this.ring[this.next] = copyRecord(record);
    this.next = (this.next + 1) % this.capacity;
  }
}

export function createHealingStatistics(capacity?: number): HealingStatistics {
  return new HealingStatistics(capacity);
}
