/**
 * Element Location Types
 * Locators, page snapshots and the driver capability the healing engine
 * resolves them against.
 */

/**
 * Supported locator types for element identification
 */
export enum LocatorType {
  /** Element ID attribute */
  ID = 'id',

  /** Element name attribute */
  NAME = 'name',

  /** CSS selector */
  CSS = 'css',

  /** XPath expression */
  XPATH = 'xpath',

  /** Exact (trimmed) visible text */
  TEXT = 'text',

  /** Substring of the visible text */
  PARTIAL_TEXT = 'partial_text',

  /** A single class token */
  CLASS_NAME = 'class_name',

  /** Element tag name */
  TAG_NAME = 'tag_name',
}

/**
 * A rule for finding one element. Locators are frozen once created; two
 * locators are equal when type and value match exactly.
 */
export interface Locator {
  readonly type: LocatorType;
  readonly value: string;
}

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * One node of a page or screen, as captured by the automation driver
 */
export interface SnapshotNode {
  tag: string;
  id?: string;
  classList: string[];
  attributes: Record<string, string>;

  /**
   * Visible text content
   */
  text: string;

  boundingBox: BoundingBox;

  /**
   * PNG-encoded crop of the node, when the driver captured one
   */
  screenshotRegion?: Buffer;

  /**
   * Index of the parent node in the same snapshot; absent or null for roots
   */
  parentIndex?: number | null;
}

/**
 * Point-in-time view of a page. Nodes are in document order. The engine
 * never mutates a snapshot.
 */
export interface ElementSnapshot {
  url?: string;
  title?: string;
  capturedAt: number;
  nodes: SnapshotNode[];
}

/**
 * A node of a snapshot that a locator resolved to
 */
export interface NodeHandle {
  index: number;
  node: SnapshotNode;
}

/**
 * Driver capability supplied by whichever browser or mobile binding is in use
 */
export interface SnapshotProvider {
  /**
   * Capture the current page state
   */
  getSnapshot(): Promise<ElementSnapshot>;

  /**
   * Resolve a locator against a snapshot; null when nothing matches
   */
  tryResolve(locator: Locator, snapshot: ElementSnapshot): Promise<NodeHandle | null>;
}

/**
 * Location error types
 */
export enum LocationErrorType {
  /** Deadline passed while waiting on the driver */
  TIMEOUT = 'TIMEOUT',

  /** Element not found */
  NOT_FOUND = 'NOT_FOUND',

  /** Locator cannot be built or parsed */
  INVALID_LOCATOR = 'INVALID_LOCATOR',

  /** Unknown error */
  UNKNOWN = 'UNKNOWN',
}

/**
 * Custom error class for element location failures
 */
export class ElementLocationError extends Error {
  constructor(
    public type: LocationErrorType,
    message: string,
    public locator?: Locator,
    public originalError?: unknown
  ) {
    super(`[ElementLocation] ${type}: ${message}${locator ? ` (using ${locator.type}=${locator.value})` : ''}`);
    this.name = 'ElementLocationError';
  }
}
