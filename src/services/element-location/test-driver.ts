/**
 * Test Driver Implementation for Element Location
 * An in-memory SnapshotProvider: serves a swappable snapshot, counts driver
 * calls and can simulate a lost connection or a slow page.
 */

import type { ElementSnapshot, Locator, NodeHandle, SnapshotProvider } from './types.js';
import { getSnapshotQueryEngine } from './snapshot-query.js';

/**
 * Mock snapshot provider for testing
 */
export class MockSnapshotProvider implements SnapshotProvider {
  private snapshot: ElementSnapshot;
  private failure: Error | null = null;
  private delayMs = 0;
  private readonly engine = getSnapshotQueryEngine();

  /** Number of getSnapshot calls */
  snapshotCalls = 0;

  /** Every locator passed to tryResolve, in call order */
  readonly resolveCalls: Locator[] = [];

  constructor(snapshot: ElementSnapshot) {
    this.snapshot = snapshot;
  }

  /**
   * Replace the page the provider serves
   */
  setSnapshot(snapshot: ElementSnapshot): void {
    this.snapshot = snapshot;
  }

  /**
   * Make getSnapshot reject until cleared with null
   */
  failWith(error: Error | null): void {
    this.failure = error;
  }

  /**
   * Delay every getSnapshot by the given milliseconds
   */
  setDelay(ms: number): void {
    this.delayMs = ms;
  }

  async getSnapshot(): Promise<ElementSnapshot> {
    this.snapshotCalls++;
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.failure) {
      throw this.failure;
    }
    return this.snapshot;
  }

  async tryResolve(locator: Locator, snapshot: ElementSnapshot): Promise<NodeHandle | null> {
    this.resolveCalls.push(locator);
    return this.engine.resolve(locator, snapshot);
  }
}

export function createMockSnapshotProvider(snapshot: ElementSnapshot): MockSnapshotProvider {
  return new MockSnapshotProvider(snapshot);
}
