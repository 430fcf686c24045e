/**
 * Locator Advisor - builds resilient locators for an element and rates how
 * brittle a locator is
 */

import type { ElementSnapshot, Locator, SnapshotNode } from './types.js';
import { LocatorType } from './types.js';
import { byCss, byId, byName, byXPath, locatorFingerprint } from './locator.js';
import { getSnapshotQueryEngine, normalizeText, type SnapshotQueryEngine } from './snapshot-query.js';
import { createModuleLogger } from '../../utils/logger.js';

const logger = createModuleLogger('locator-advisor');

/**
 * Element attributes a locator can be built from
 */
export interface ElementInfo {
  tag?: string;
  id?: string;
  name?: string;
  classList?: string[];
  type?: string;
  text?: string;
  testId?: string;
  ariaLabel?: string;
}

export type LocatorStrength = 'Strong' | 'Medium' | 'Weak';

export interface LocatorStrengthReport {
  locator: string;
  score: number;
  strength: LocatorStrength;
  issues: string[];
  recommendations: string[];
}

const CSS_IDENT = /^-?[a-zA-Z_][a-zA-Z0-9_-]*$/;

/**
 * Longest text that is still worth turning into a text locator
 */
const MAX_TEXT_LOCATOR_LENGTH = 60;

function quoteCss(value: string): string | null {
  if (!value.includes('"')) return `"${value}"`;
  if (!value.includes("'")) return `'${value}'`;
  return null;
}

function quoteXPath(value: string): string | null {
  if (!value.includes("'")) return `'${value}'`;
  if (!value.includes('"')) return `"${value}"`;
  return null;
}

function nonEmpty(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

export function elementInfoFromNode(node: SnapshotNode): ElementInfo {
  return {
    tag: node.tag.toLowerCase(),
    id: node.id ?? node.attributes.id,
    name: node.attributes.name,
    classList: node.classList,
    type: node.attributes.type,
    text: normalizeText(node.text),
    testId: node.attributes['data-testid'],
    ariaLabel: node.attributes['aria-label'],
  };
}

/**
 * Locators for an element, most reliable first
 */
export function generateSmartLocators(info: ElementInfo): Locator[] {
  const locators: Locator[] = [];
  const tag = info.tag ?? '';
  const classes = (info.classList ?? []).filter((cls) => CSS_IDENT.test(cls));
  const classChain = classes.map((cls) => `.${cls}`).join('');

  if (nonEmpty(info.id)) {
    locators.push(byId(info.id));
  }

  if (nonEmpty(info.testId)) {
    const quoted = quoteCss(info.testId);
    if (quoted) locators.push(byCss(`[data-testid=${quoted}]`));
  }

  if (nonEmpty(info.name)) {
    locators.push(byName(info.name));
  }

  if (classChain && nonEmpty(info.type)) {
    const quoted = quoteCss(info.type);
    if (quoted) locators.push(byCss(`${tag}${classChain}[type=${quoted}]`));
  }

  if (classChain) {
    locators.push(byCss(`${tag}${classChain}`));
  }

  if (nonEmpty(info.text) && info.text.length <= MAX_TEXT_LOCATOR_LENGTH) {
    const quoted = quoteXPath(info.text);
    if (quoted) locators.push(byXPath(`//${tag || '*'}[normalize-space()=${quoted}]`));
  }

  if (nonEmpty(info.ariaLabel)) {
    const quoted = quoteCss(info.ariaLabel);
    if (quoted) locators.push(byCss(`[aria-label=${quoted}]`));
  }

  logger.debug({ count: locators.length }, 'Generated smart locators');
  return locators;
}

/**
 * Score a locator 0-100 for resilience against UI changes
 */
export function validateLocatorStrength(locator: Locator): LocatorStrengthReport {
  const text = locatorFingerprint(locator);
  let score = 50;
  const issues: string[] = [];
  const recommendations: string[] = [];

  if (text.includes('data-testid') || text.includes('data-test')) {
    score += 30;
  } else if (locator.type === LocatorType.ID) {
    score += 25;
  } else if (locator.type === LocatorType.NAME) {
    score += 15;
  }

  if (text.includes('//*') && text.includes('[') && !text.includes('@')) {
    score -= 20;
    issues.push('Wildcard XPath without an attribute predicate');
    recommendations.push('Use a relative XPath with attributes or a CSS selector');
  }

  if (text.includes('contains(@class')) {
    score -= 10;
    issues.push('Class-based locator may be unstable');
    recommendations.push('Consider using data-testid or ID');
  }

  if (/\[\d+\]/.test(text)) {
    score -= 15;
    issues.push('Index-based selector detected');
    recommendations.push('Use unique attributes instead');
  }

  score = Math.max(0, Math.min(100, score));

  return {
    locator: text,
    score,
    strength: score >= 75 ? 'Strong' : score >= 50 ? 'Medium' : 'Weak',
    issues,
    recommendations,
  };
}

/**
 * First locator that resolves to exactly this node of the snapshot: the smart
 * locators, then the node's position among elements of its tag
 */
export function generateHealedLocator(
  snapshot: ElementSnapshot,
  index: number,
  engine: SnapshotQueryEngine = getSnapshotQueryEngine()
): Locator | null {
  const node = snapshot.nodes[index];
  if (!node) {
    return null;
  }

  for (const candidate of generateSmartLocators(elementInfoFromNode(node))) {
    if (engine.resolve(candidate, snapshot)?.index === index) {
      return candidate;
    }
  }

  const tag = node.tag.toLowerCase();
  const position = snapshot.nodes.slice(0, index).filter((other) => other.tag.toLowerCase() === tag).length + 1;
  const positional = byXPath(`(//${tag})[${position}]`);
  return engine.resolve(positional, snapshot)?.index === index ? positional : null;
}
