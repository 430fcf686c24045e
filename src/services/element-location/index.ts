/**
 * Element Location Service - Index
 *
 * Exports the locator model and the snapshot plumbing the healing engine
 * resolves against:
 * - Locators and locator-string parsing
 * - Snapshot types, validation and in-process querying
 * - Page context fingerprints
 * - Locator generation and strength analysis
 * - Deadline handling
 */

// Types
export {
  LocatorType,
  type Locator,
  type BoundingBox,
  type SnapshotNode,
  type ElementSnapshot,
  type NodeHandle,
  type SnapshotProvider,
  LocationErrorType,
  ElementLocationError,
} from './types.js';

// Locator model
export {
  createLocator,
  isLocatorType,
  locatorEquals,
  locatorFingerprint,
  formatLocator,
  byId,
  byName,
  byCss,
  byXPath,
  byText,
  byPartialText,
  byClassName,
  byTagName,
} from './locator.js';

// Selector Parser
export {
  SelectorParser,
  getSelectorParser,
  parseSelector,
  toLocator,
} from './selector-parser.js';

// Snapshot querying
export {
  SnapshotQueryEngine,
  getSnapshotQueryEngine,
  normalizeText,
  readAttribute,
  ancestorsOf,
  nodeDepth,
  domDistance,
} from './snapshot-query.js';
export { elementSnapshotSchema, describeSnapshotIssues } from './snapshot-schema.js';
export { QueryEngineSnapshotProvider, createSnapshotProvider } from './snapshot-provider.js';
export { MockSnapshotProvider, createMockSnapshotProvider } from './test-driver.js';

// Page fingerprint
export {
  computePageFingerprint,
  structuralSignature,
  type PageContext,
} from './page-fingerprint.js';

// Locator Advisor
export {
  generateSmartLocators,
  generateHealedLocator,
  validateLocatorStrength,
  elementInfoFromNode,
  type ElementInfo,
  type LocatorStrength,
  type LocatorStrengthReport,
} from './locator-advisor.js';

// Timeout Handler
export {
  Deadline,
  createDeadline,
  isTimeoutError,
} from './timeout-handler.js';
