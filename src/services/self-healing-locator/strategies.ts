/**
 * Healing Strategies
 *
 * Each strategy looks for the lost element in one snapshot and proposes a
 * locator for it. The set is closed and its order is the priority order:
 * the orchestrator takes the first strategy that finds something.
 */

import type { ElementSnapshot, Locator, SnapshotNode } from '../element-location/types.js';
import { LocatorType } from '../element-location/types.js';
import { generateHealedLocator } from '../element-location/locator-advisor.js';
import { ancestorsOf, domDistance, normalizeText } from '../element-location/snapshot-query.js';
import type {
  HealingStrategy,
  HealingStrategyName,
  StrategyContext,
  StrategyMatch,
  StrategyThresholds,
} from './types.js';
import { centerDistance, humanizeIdentifier, normalizedLevenshtein, weightedJaccard } from './similarity.js';
import { createModuleLogger } from '../../utils/logger.js';

const logger = createModuleLogger('healing-strategies');

/**
 * Default strategy thresholds
 */
export const DEFAULT_STRATEGY_THRESHOLDS: StrategyThresholds = {
  textExactConfidence: 0.95,
  textPartialConfidence: 0.75,
  attributeThreshold: 0.6,
  attributeWeights: { id: 1, name: 2, class: 1, tag: 1 },
  nearbyRadius: 3,
  nearbyConfidence: 0.6,
  positionMaxDistance: 150,
  positionMaxConfidence: 0.7,
  positionMinConfidence: 0.3,
  visualThreshold: 0.8,
};

interface ScoredCandidate {
  index: number;
  confidence: number;
}

/**
 * Walk ranked candidates and return the first one a locator can be built for
 */
function firstLocatable(
  strategy: HealingStrategyName,
  ranked: ScoredCandidate[],
  snapshot: ElementSnapshot,
  context: StrategyContext
): StrategyMatch | null {
  for (const candidate of ranked) {
    const locator = generateHealedLocator(snapshot, candidate.index, context.engine);
    if (locator) {
      return { strategy, locator, confidence: candidate.confidence, nodeIndex: candidate.index };
    }
    logger.debug('No unique locator for candidate', { strategy, index: candidate.index });
  }
  return null;
}

function sameTag(node: SnapshotNode, tag: string | undefined): boolean {
  return tag === undefined || node.tag.toLowerCase() === tag.toLowerCase();
}

/**
 * Values a node can be told apart by: id, name, classes and attribute values
 */
function identifyingValues(node: SnapshotNode): string[] {
  const values = [node.id, node.attributes.name, ...node.classList, ...Object.values(node.attributes)];
  return values.filter((value): value is string => value !== undefined && value.length > 0);
}

// ---------------------------------------------------------------------------
// Text content
// ---------------------------------------------------------------------------

function expectedText(original: Locator, context: StrategyContext): string | null {
  const candidates = [context.hints.text];
  if (original.type === LocatorType.TEXT || original.type === LocatorType.PARTIAL_TEXT) {
    candidates.push(original.value);
  }
  if (original.type === LocatorType.ID || original.type === LocatorType.NAME) {
    candidates.push(humanizeIdentifier(original.value));
  }
  for (const candidate of candidates) {
    const text = candidate === undefined ? '' : normalizeText(candidate).toLowerCase();
    if (text.length > 0) return text;
  }
  return null;
}

export const textContentStrategy: HealingStrategy = {
  name: 'text-content',

  attempt(original, snapshot, context) {
    const expected = expectedText(original, context);
    if (!expected) {
      return null;
    }
    const { textExactConfidence, textPartialConfidence } = context.thresholds;

    const ranked = snapshot.nodes
      .map((node, index) => {
        const text = normalizeText(node.text).toLowerCase();
        const confidence =
          text === expected ? textExactConfidence : text.includes(expected) ? textPartialConfidence : 0;
        const values = identifyingValues(node);
        const difference =
          values.length === 0 ? 1 : Math.min(...values.map((value) => normalizedLevenshtein(original.value, value)));
        return { index, confidence, difference };
      })
      .filter((candidate) => candidate.confidence > 0)
      .sort((a, b) => b.confidence - a.confidence || a.difference - b.difference || a.index - b.index);

    return firstLocatable('text-content', ranked, snapshot, context);
  },
};

// ---------------------------------------------------------------------------
// Attribute similarity
// ---------------------------------------------------------------------------

type Weights = StrategyThresholds['attributeWeights'];

function attributeTokens(
  profile: { id?: string; name?: string; classList?: string[]; tag?: string },
  weights: Weights
): Map<string, number> {
  const tokens = new Map<string, number>();
  if (profile.id) tokens.set(`id:${profile.id}`, weights.id);
  if (profile.name) tokens.set(`name:${profile.name}`, weights.name);
  for (const cls of profile.classList ?? []) {
    if (cls) tokens.set(`class:${cls}`, weights.class);
  }
  if (profile.tag) tokens.set(`tag:${profile.tag.toLowerCase()}`, weights.tag);
  return tokens;
}

/**
 * Last known attribute set, falling back to what the locator itself says
 */
function knownAttributes(original: Locator, context: StrategyContext): Map<string, number> {
  const { hints, thresholds } = context;
  const known = attributeTokens(
    { id: hints.id, name: hints.name, classList: hints.classList, tag: hints.tag },
    thresholds.attributeWeights
  );
  if (known.size > 0) {
    return known;
  }

  switch (original.type) {
    case LocatorType.ID:
      return attributeTokens({ id: original.value }, thresholds.attributeWeights);
    case LocatorType.NAME:
      return attributeTokens({ name: original.value }, thresholds.attributeWeights);
    case LocatorType.CLASS_NAME:
      return attributeTokens({ classList: original.value.trim().split(/\s+/) }, thresholds.attributeWeights);
    case LocatorType.TAG_NAME:
      return attributeTokens({ tag: original.value.trim() }, thresholds.attributeWeights);
    default:
      return known;
  }
}

export const attributeSimilarityStrategy: HealingStrategy = {
  name: 'attribute-similarity',

  attempt(original, snapshot, context) {
    const known = knownAttributes(original, context);
    if (known.size === 0) {
      return null;
    }
    const weights = context.thresholds.attributeWeights;

    const ranked = snapshot.nodes
      .map((node, index) => ({
        index,
        confidence: weightedJaccard(
          known,
          attributeTokens(
            { id: node.id ?? node.attributes.id, name: node.attributes.name, classList: node.classList, tag: node.tag },
            weights
          )
        ),
      }))
      .filter((candidate) => candidate.confidence >= context.thresholds.attributeThreshold)
      .sort((a, b) => b.confidence - a.confidence || a.index - b.index);

    return firstLocatable('attribute-similarity', ranked, snapshot, context);
  },
};

// ---------------------------------------------------------------------------
// Nearby element
// ---------------------------------------------------------------------------

export const nearbyElementStrategy: HealingStrategy = {
  name: 'nearby-element',

  attempt(_original, snapshot, context) {
    const { anchor, tag, classList } = context.hints;
    const knownClasses = classList ?? [];
    if (!anchor || (tag === undefined && knownClasses.length === 0)) {
      return null;
    }

    const anchorHandle = context.engine.resolve(anchor, snapshot);
    if (!anchorHandle) {
      logger.debug('Anchor no longer resolves', { anchor: `${anchor.type}=${anchor.value}` });
      return null;
    }

    // siblings and descendants only; the anchor's containers are not neighbours
    const containers = new Set(ancestorsOf(snapshot, anchorHandle.index));
    const ranked = snapshot.nodes
      .map((node, index) => ({ node, index, distance: domDistance(snapshot, anchorHandle.index, index) }))
      .filter(
        ({ node, index, distance }) =>
          index !== anchorHandle.index &&
          !containers.has(index) &&
          distance <= context.thresholds.nearbyRadius &&
          sameTag(node, tag) &&
          (knownClasses.length === 0 || knownClasses.some((cls) => node.classList.includes(cls)))
      )
      .sort((a, b) => a.distance - b.distance || a.index - b.index)
      .map(({ index }) => ({ index, confidence: context.thresholds.nearbyConfidence }));

    return firstLocatable('nearby-element', ranked, snapshot, context);
  },
};

// ---------------------------------------------------------------------------
// Position
// ---------------------------------------------------------------------------

export const positionStrategy: HealingStrategy = {
  name: 'position',

  attempt(_original, snapshot, context) {
    const { boundingBox, tag } = context.hints;
    if (!boundingBox) {
      return null;
    }
    const { positionMaxDistance, positionMaxConfidence, positionMinConfidence } = context.thresholds;

    const ranked = snapshot.nodes
      .map((node, index) => ({ node, index, distance: centerDistance(boundingBox, node.boundingBox) }))
      .filter(
        ({ node, distance }) =>
          node.boundingBox.width > 0 &&
          node.boundingBox.height > 0 &&
          sameTag(node, tag) &&
          distance <= positionMaxDistance
      )
      .sort((a, b) => a.distance - b.distance || a.index - b.index)
      .map(({ index, distance }) => ({
        index,
        confidence:
          positionMaxDistance === 0
            ? positionMaxConfidence
            : positionMaxConfidence - ((positionMaxConfidence - positionMinConfidence) * distance) / positionMaxDistance,
      }));

    return firstLocatable('position', ranked, snapshot, context);
  },
};

// ---------------------------------------------------------------------------
// Visual similarity
// ---------------------------------------------------------------------------

export const visualSimilarityStrategy: HealingStrategy = {
  name: 'visual-similarity',

  attempt(_original, snapshot, context) {
    const reference = context.hints.screenshotRegion;
    const comparator = context.imageComparator;
    if (!reference || !comparator) {
      return null;
    }

    const scored: ScoredCandidate[] = [];
    snapshot.nodes.forEach((node, index) => {
      if (!node.screenshotRegion) return;
      try {
        scored.push({ index, confidence: comparator.compare(reference, node.screenshotRegion) });
      } catch (error) {
        logger.warn('Could not compare screenshot region', {
          index,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });

    const ranked = scored
      .filter((candidate) => candidate.confidence >= context.thresholds.visualThreshold)
      .sort((a, b) => b.confidence - a.confidence || a.index - b.index);

    return firstLocatable('visual-similarity', ranked, snapshot, context);
  },
};

/**
 * Healing strategies in priority order
 */
export const HEALING_STRATEGIES: readonly HealingStrategy[] = [
  textContentStrategy,
  attributeSimilarityStrategy,
  nearbyElementStrategy,
  positionStrategy,
  visualSimilarityStrategy,
];
