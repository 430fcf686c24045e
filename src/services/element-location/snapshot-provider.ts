/**
 * Snapshot-backed provider - pairs any capture function with the in-process
 * query engine, for bindings that can dump the page but not query it
 */

import type { ElementSnapshot, Locator, NodeHandle, SnapshotProvider } from './types.js';
import { getSnapshotQueryEngine, type SnapshotQueryEngine } from './snapshot-query.js';

export class QueryEngineSnapshotProvider implements SnapshotProvider {
  constructor(
    private readonly capture: () => Promise<ElementSnapshot>,
    private readonly engine: SnapshotQueryEngine = getSnapshotQueryEngine()
  ) {}

  getSnapshot(): Promise<ElementSnapshot> {
    return this.capture();
  }

  async tryResolve(locator: Locator, snapshot: ElementSnapshot): Promise<NodeHandle | null> {
    return this.engine.resolve(locator, snapshot);
  }
}

export function createSnapshotProvider(
  capture: () => Promise<ElementSnapshot>,
  engine?: SnapshotQueryEngine
): SnapshotProvider {
  return new QueryEngineSnapshotProvider(capture, engine);
}
