/**
 * Snapshot Query Engine - resolves locators against a captured snapshot
 * without a live driver. Covers the CSS and XPath forms that locator
 * generation and hand-written test locators use; anything outside that
 * subset resolves to nothing.
 */

import type { ElementSnapshot, Locator, NodeHandle, SnapshotNode } from './types.js';
import { LocatorType } from './types.js';
import { createModuleLogger } from '../../utils/logger.js';

const logger = createModuleLogger('snapshot-query');

/**
 * Collapse whitespace and trim
 */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Read an attribute the way selectors see it: `id` and `class` come from the
 * dedicated node fields when present
 */
export function readAttribute(node: SnapshotNode, name: string): string | undefined {
  if (name === 'id') {
    return node.id ?? node.attributes.id;
  }
  if (name === 'class') {
    return node.classList.length > 0 ? node.classList.join(' ') : node.attributes.class;
  }
  return node.attributes[name];
}

function parentOf(snapshot: ElementSnapshot, index: number): number | null {
  const parent = snapshot.nodes[index]?.parentIndex;
  if (parent === undefined || parent === null || parent < 0 || parent >= snapshot.nodes.length || parent === index) {
    return null;
  }
  return parent;
}

/**
 * Ancestor chain of a node, nearest first. Bounded by the node count so a
 * malformed parent cycle cannot loop forever.
 */
export function ancestorsOf(snapshot: ElementSnapshot, index: number): number[] {
  const ancestors: number[] = [];
  let current = parentOf(snapshot, index);
  while (current !== null && ancestors.length < snapshot.nodes.length) {
    ancestors.push(current);
    current = parentOf(snapshot, current);
  }
  return ancestors;
}

export function nodeDepth(snapshot: ElementSnapshot, index: number): number {
  return ancestorsOf(snapshot, index).length;
}

/**
 * Number of tree edges between two nodes; Infinity when they are in
 * different trees
 */
export function domDistance(snapshot: ElementSnapshot, a: number, b: number): number {
  if (a === b) {
    return 0;
  }
  const fromA = new Map<number, number>([[a, 0]]);
  ancestorsOf(snapshot, a).forEach((ancestor, i) => fromA.set(ancestor, i + 1));

  const chainB = [b, ...ancestorsOf(snapshot, b)];
  for (let i = 0; i < chainB.length; i++) {
    const up = fromA.get(chainB[i]);
    if (up !== undefined) {
      return up + i;
    }
  }
  return Infinity;
}

/**
 * Split on a separator that is not inside quotes, brackets or parentheses
 */
function splitTopLevel(input: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let start = 0;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    if (quote) {
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '[' || ch === '(') {
      depth++;
    } else if (ch === ']' || ch === ')') {
      depth--;
    } else if (depth === 0 && input.startsWith(separator, i)) {
      parts.push(input.slice(start, i));
      start = i + separator.length;
      i += separator.length - 1;
    }
  }
  parts.push(input.slice(start));
  return parts;
}

/**
 * Index of the bracket closing the one at `open`, or -1
 */
function findClosing(input: string, open: number): number {
  const opening = input[open];
  const closing = opening === '[' ? ']' : ')';
  let depth = 0;
  let quote: string | null = null;

  for (let i = open; i < input.length; i++) {
    const ch = input[i];
    if (quote) {
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === opening) {
      depth++;
    } else if (ch === closing) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

// ---------------------------------------------------------------------------
// CSS
// ---------------------------------------------------------------------------

type AttributeOperator = 'exists' | '=' | '*=' | '^=' | '$=';

interface CssAttributeTest {
  name: string;
  operator: AttributeOperator;
  value: string;
}

interface CssCompound {
  tag?: string;
  id?: string;
  classes: string[];
  attributes: CssAttributeTest[];
}

interface CssPart {
  compound: CssCompound;
  combinator: 'descendant' | 'child' | null;
}

const IDENT = /^-?[a-zA-Z_][a-zA-Z0-9_-]*/;
const CSS_ATTRIBUTE = /^\s*([a-zA-Z_:][-a-zA-Z0-9_:.]*)\s*(?:([*^$]?=)\s*(?:"([^"]*)"|'([^']*)'|([^\s"'\]]+)))?\s*$/;

function parseCompound(input: string, start: number): { compound: CssCompound; end: number } | null {
  const compound: CssCompound = { classes: [], attributes: [] };
  let i = start;

  if (input[i] === '*') {
    i++;
  } else {
    const tag = IDENT.exec(input.slice(i));
    if (tag) {
      compound.tag = tag[0].toLowerCase();
      i += tag[0].length;
    }
  }

  while (i < input.length) {
    const ch = input[i];
    if (ch === '#' || ch === '.') {
      const ident = IDENT.exec(input.slice(i + 1));
      if (!ident) return null;
      if (ch === '#') {
        compound.id = ident[0];
      } else {
        compound.classes.push(ident[0]);
      }
      i += ident[0].length + 1;
    } else if (ch === '[') {
      const close = findClosing(input, i);
      if (close < 0) return null;
      const match = CSS_ATTRIBUTE.exec(input.slice(i + 1, close));
      if (!match) return null;
      const operator: AttributeOperator =
        match[2] === '=' || match[2] === '*=' || match[2] === '^=' || match[2] === '$=' ? match[2] : 'exists';
      compound.attributes.push({
        name: match[1],
        operator,
        value: match[3] ?? match[4] ?? match[5] ?? '',
      });
      i = close + 1;
    } else if (/\s/.test(ch) || ch === '>') {
      break;
    } else {
      // pseudo-classes, sibling combinators and the like are not supported
      return null;
    }
  }

  return i === start ? null : { compound, end: i };
}

function parseCssChain(selector: string): CssPart[] | null {
  const input = selector.trim();
  const parts: CssPart[] = [];
  let combinator: CssPart['combinator'] = null;
  let i = 0;

  while (i < input.length) {
    let sawSpace = false;
    while (i < input.length && /\s/.test(input[i])) {
      i++;
      sawSpace = true;
    }
    if (i >= input.length) break;

    if (input[i] === '>') {
      if (parts.length === 0 || combinator !== null) return null;
      combinator = 'child';
      i++;
      continue;
    }
    if (parts.length > 0 && combinator === null) {
      if (!sawSpace) return null;
      combinator = 'descendant';
    }

    const parsed = parseCompound(input, i);
    if (!parsed) return null;
    parts.push({ compound: parsed.compound, combinator: parts.length === 0 ? null : combinator });
    combinator = null;
    i = parsed.end;
  }

  return parts.length === 0 || combinator !== null ? null : parts;
}

function matchesAttribute(node: SnapshotNode, test: CssAttributeTest): boolean {
  const actual = readAttribute(node, test.name);
  if (actual === undefined) return false;
  switch (test.operator) {
    case 'exists':
      return true;
    case '=':
      return actual === test.value;
    case '*=':
      return actual.includes(test.value);
    case '^=':
      return actual.startsWith(test.value);
    case '$=':
      return actual.endsWith(test.value);
  }
}

function matchesCompound(node: SnapshotNode, compound: CssCompound): boolean {
  if (compound.tag && node.tag.toLowerCase() !== compound.tag) return false;
  if (compound.id !== undefined && readAttribute(node, 'id') !== compound.id) return false;
  if (!compound.classes.every((cls) => node.classList.includes(cls))) return false;
  return compound.attributes.every((test) => matchesAttribute(node, test));
}

function matchesCssChain(snapshot: ElementSnapshot, index: number, parts: CssPart[], partIndex: number): boolean {
  const part = parts[partIndex];
  if (!matchesCompound(snapshot.nodes[index], part.compound)) return false;
  if (partIndex === 0) return true;

  const ancestors = ancestorsOf(snapshot, index);
  if (part.combinator === 'child') {
    return ancestors.length > 0 && matchesCssChain(snapshot, ancestors[0], parts, partIndex - 1);
  }
  return ancestors.some((ancestor) => matchesCssChain(snapshot, ancestor, parts, partIndex - 1));
}

// ---------------------------------------------------------------------------
// XPath
// ---------------------------------------------------------------------------

type XPathCondition =
  | { kind: 'attrEquals'; name: string; value: string }
  | { kind: 'attrExists'; name: string }
  | { kind: 'attrContains'; name: string; value: string }
  | { kind: 'attrStartsWith'; name: string; value: string }
  | { kind: 'textEquals'; value: string }
  | { kind: 'textContains'; value: string };

type XPathPredicate =
  | { kind: 'position'; position: number }
  | { kind: 'last' }
  | { kind: 'conditions'; conditions: XPathCondition[] };

interface XPathStep {
  axis: 'child' | 'descendant';
  nodeTest: string;
  predicates: XPathPredicate[];
}

interface XPathExpression {
  steps: XPathStep[];
  groupPosition: number | null;
}

const TEXT_OPERAND = String.raw`(?:text\(\)|\.|normalize-space\(\s*(?:text\(\)|\.)?\s*\))`;
const QUOTED = String.raw`(?:"([^"]*)"|'([^']*)')`;
const XPATH_CONDITIONS: Array<{ pattern: RegExp; build: (m: RegExpExecArray) => XPathCondition }> = [
  {
    pattern: new RegExp(String.raw`^@([\w:.-]+)\s*=\s*${QUOTED}$`),
    build: (m) => ({ kind: 'attrEquals', name: m[1], value: m[2] ?? m[3] ?? '' }),
  },
  {
    pattern: /^@([\w:.-]+)$/,
    build: (m) => ({ kind: 'attrExists', name: m[1] }),
  },
  {
    pattern: new RegExp(String.raw`^${TEXT_OPERAND}\s*=\s*${QUOTED}$`),
    build: (m) => ({ kind: 'textEquals', value: m[1] ?? m[2] ?? '' }),
  },
  {
    pattern: new RegExp(String.raw`^contains\(\s*${TEXT_OPERAND}\s*,\s*${QUOTED}\s*\)$`),
    build: (m) => ({ kind: 'textContains', value: m[1] ?? m[2] ?? '' }),
  },
  {
    pattern: new RegExp(String.raw`^contains\(\s*@([\w:.-]+)\s*,\s*${QUOTED}\s*\)$`),
    build: (m) => ({ kind: 'attrContains', name: m[1], value: m[2] ?? m[3] ?? '' }),
  },
  {
    pattern: new RegExp(String.raw`^starts-with\(\s*@([\w:.-]+)\s*,\s*${QUOTED}\s*\)$`),
    build: (m) => ({ kind: 'attrStartsWith', name: m[1], value: m[2] ?? m[3] ?? '' }),
  },
];

function parseCondition(input: string): XPathCondition | null {
  const trimmed = input.trim();
  for (const { pattern, build } of XPATH_CONDITIONS) {
    const match = pattern.exec(trimmed);
    if (match) return build(match);
  }
  return null;
}

function parsePredicate(input: string): XPathPredicate | null {
  const trimmed = input.trim();
  if (/^\d+$/.test(trimmed)) {
    const position = Number(trimmed);
    return position >= 1 ? { kind: 'position', position } : null;
  }
  if (trimmed === 'last()') {
    return { kind: 'last' };
  }

  const conditions: XPathCondition[] = [];
  for (const part of splitTopLevel(trimmed, ' and ')) {
    const condition = parseCondition(part);
    if (!condition) return null;
    conditions.push(condition);
  }
  return { kind: 'conditions', conditions };
}

function parseSteps(input: string): XPathStep[] | null {
  const steps: XPathStep[] = [];
  let i = 0;

  while (i < input.length) {
    let axis: XPathStep['axis'];
    if (input.startsWith('//', i)) {
      axis = 'descendant';
      i += 2;
    } else if (input[i] === '/') {
      axis = 'child';
      i += 1;
    } else {
      return null;
    }

    let nodeTest: string;
    if (input[i] === '*') {
      nodeTest = '*';
      i++;
    } else {
      const name = /^[a-zA-Z_][\w:.-]*/.exec(input.slice(i));
      if (!name) return null;
      nodeTest = name[0].toLowerCase();
      i += name[0].length;
    }

    const predicates: XPathPredicate[] = [];
    while (input[i] === '[') {
      const close = findClosing(input, i);
      if (close < 0) return null;
      const predicate = parsePredicate(input.slice(i + 1, close));
      if (!predicate) return null;
      predicates.push(predicate);
      i = close + 1;
    }

    steps.push({ axis, nodeTest, predicates });
  }

  return steps.length > 0 ? steps : null;
}

function parseXPath(expression: string): XPathExpression | null {
  let input = expression.trim();
  let groupPosition: number | null = null;

  if (input.startsWith('(')) {
    const close = findClosing(input, 0);
    if (close < 0) return null;
    const rest = input.slice(close + 1).trim();
    const position = /^\[(\d+)\]$/.exec(rest);
    if (!position || Number(position[1]) < 1) return null;
    groupPosition = Number(position[1]);
    input = input.slice(1, close).trim();
  }

  const steps = parseSteps(input);
  return steps ? { steps, groupPosition } : null;
}

function matchesCondition(node: SnapshotNode, condition: XPathCondition): boolean {
  switch (condition.kind) {
    case 'attrEquals':
      return readAttribute(node, condition.name) === condition.value;
    case 'attrExists':
      return readAttribute(node, condition.name) !== undefined;
    case 'attrContains':
      return readAttribute(node, condition.name)?.includes(condition.value) ?? false;
    case 'attrStartsWith':
      return readAttribute(node, condition.name)?.startsWith(condition.value) ?? false;
    case 'textEquals':
      return normalizeText(node.text) === normalizeText(condition.value);
    case 'textContains':
      return node.text.includes(condition.value);
  }
}

const DOCUMENT_ROOT = -1;

/**
 * Snapshot Query Engine class
 */
export class SnapshotQueryEngine {
  /**
   * Resolve a locator to the first matching node in document order
   */
  resolve(locator: Locator, snapshot: ElementSnapshot): NodeHandle | null {
    const matches = this.matchAll(locator, snapshot);
    if (matches.length === 0) {
      return null;
    }
    return { index: matches[0], node: snapshot.nodes[matches[0]] };
  }

  /**
   * Indices of every node the locator matches, in document order
   */
  matchAll(locator: Locator, snapshot: ElementSnapshot): number[] {
    const value = locator.value;

    switch (locator.type) {
      case LocatorType.ID:
        return this.filter(snapshot, (node) => readAttribute(node, 'id') === value);
      case LocatorType.NAME:
        return this.filter(snapshot, (node) => node.attributes.name === value);
      case LocatorType.CLASS_NAME: {
        const tokens = value.trim().split(/\s+/);
        return this.filter(snapshot, (node) => tokens.every((token) => node.classList.includes(token)));
      }
      case LocatorType.TAG_NAME:
        return this.filter(snapshot, (node) => node.tag.toLowerCase() === value.trim().toLowerCase());
      case LocatorType.TEXT: {
        const expected = normalizeText(value);
        return this.filter(snapshot, (node) => expected.length > 0 && normalizeText(node.text) === expected);
      }
      case LocatorType.PARTIAL_TEXT: {
        const expected = normalizeText(value);
        return this.filter(snapshot, (node) => expected.length > 0 && normalizeText(node.text).includes(expected));
      }
      case LocatorType.CSS:
        return this.matchCss(value, snapshot);
      case LocatorType.XPATH:
        return this.matchXPath(value, snapshot);
    }
  }

  private filter(snapshot: ElementSnapshot, predicate: (node: SnapshotNode) => boolean): number[] {
    const matches: number[] = [];
    snapshot.nodes.forEach((node, index) => {
      if (predicate(node)) matches.push(index);
    });
    return matches;
  }

  private matchCss(selector: string, snapshot: ElementSnapshot): number[] {
    const chains: CssPart[][] = [];
    for (const alternative of splitTopLevel(selector, ',')) {
      const chain = parseCssChain(alternative);
      if (!chain) {
        logger.debug({ selector }, 'Unsupported CSS selector');
        return [];
      }
      chains.push(chain);
    }

    return snapshot.nodes
      .map((_node, index) => index)
      .filter((index) => chains.some((chain) => matchesCssChain(snapshot, index, chain, chain.length - 1)));
  }

  private matchXPath(expression: string, snapshot: ElementSnapshot): number[] {
    const parsed = parseXPath(expression);
    if (!parsed) {
      logger.debug({ expression }, 'Unsupported XPath expression');
      return [];
    }

    const children = new Map<number, number[]>([[DOCUMENT_ROOT, []]]);
    snapshot.nodes.forEach((_node, index) => {
      const parent = parentOf(snapshot, index) ?? DOCUMENT_ROOT;
      const siblings = children.get(parent) ?? [];
      siblings.push(index);
      children.set(parent, siblings);
    });

    const descendantsOrSelf = (context: number): number[] => {
      const result: number[] = [];
      const stack = [context];
      while (stack.length > 0 && result.length <= snapshot.nodes.length) {
        const current = stack.pop();
        if (current === undefined) break;
        result.push(current);
        stack.push(...(children.get(current) ?? []));
      }
      return result;
    };

    let context: number[] = [DOCUMENT_ROOT];
    for (const step of parsed.steps) {
      const next = new Set<number>();
      for (const ctx of context) {
        const bases = step.axis === 'child' ? [ctx] : descendantsOrSelf(ctx);
        for (const base of bases) {
          let candidates = (children.get(base) ?? []).filter(
            (index) => step.nodeTest === '*' || snapshot.nodes[index].tag.toLowerCase() === step.nodeTest
          );
          for (const predicate of step.predicates) {
            candidates = this.applyPredicate(snapshot, candidates, predicate);
          }
          candidates.forEach((index) => next.add(index));
        }
      }
      context = [...next].sort((a, b) => a - b);
    }

    if (parsed.groupPosition !== null) {
      const picked = context[parsed.groupPosition - 1];
      return picked === undefined ? [] : [picked];
    }
    return context;
  }

  private applyPredicate(snapshot: ElementSnapshot, candidates: number[], predicate: XPathPredicate): number[] {
    switch (predicate.kind) {
      case 'position': {
        const picked = candidates[predicate.position - 1];
        return picked === undefined ? [] : [picked];
      }
      case 'last':
        return candidates.length > 0 ? [candidates[candidates.length - 1]] : [];
      case 'conditions':
        return candidates.filter((index) =>
          predicate.conditions.every((condition) => matchesCondition(snapshot.nodes[index], condition))
        );
    }
  }
}

let engineInstance: SnapshotQueryEngine | null = null;

export function getSnapshotQueryEngine(): SnapshotQueryEngine {
  if (!engineInstance) {
    engineInstance = new SnapshotQueryEngine();
  }
  return engineInstance;
}
