/**
 * Similarity measures used by the healing strategies
 */

import type { BoundingBox } from '../element-location/types.js';

/**
 * Edit distance between two strings
 */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Levenshtein distance scaled to [0, 1] by the longer string
 */
export function normalizedLevenshtein(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  return longest === 0 ? 0 : levenshtein(a, b) / longest;
}

/**
 * Weighted Jaccard similarity of two token sets. Each token carries its own
 * weight; the score is the weight of the intersection over the weight of the
 * union, 0 when both sets are empty.
 */
export function weightedJaccard(a: ReadonlyMap<string, number>, b: ReadonlyMap<string, number>): number {
  let intersection = 0;
  let union = 0;

  for (const [token, weight] of a) {
    union += weight;
    if (b.has(token)) intersection += weight;
  }
  for (const [token, weight] of b) {
    if (!a.has(token)) union += weight;
  }

  return union === 0 ? 0 : intersection / union;
}

export function boxCenter(box: BoundingBox): { x: number; y: number } {
  return { x: box.x + box.width / 2, y: box.y + box.height / 2 };
}

/**
 * Euclidean distance between the centres of two boxes
 */
export function centerDistance(a: BoundingBox, b: BoundingBox): number {
  const ca = boxCenter(a);
  const cb = boxCenter(b);
  return Math.hypot(ca.x - cb.x, ca.y - cb.y);
}

const FLAT_VARIANCE = 1e-9;

/**
 * Normalized cross-correlation of two equally sized samples, clamped to
 * [0, 1]. Two flat samples count as identical when their levels match.
 */
export function normalizedCrossCorrelation(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const n = Math.min(a.length, b.length);
  if (n === 0) return 0;

  let sumA = 0;
  let sumB = 0;
  for (let i = 0; i < n; i++) {
    sumA += a[i];
    sumB += b[i];
  }
  const meanA = sumA / n;
  const meanB = sumB / n;

  let covariance = 0;
  let varianceA = 0;
  let varianceB = 0;
  for (let i = 0; i < n; i++) {
    const da = a[i] - meanA;
    const db = b[i] - meanB;
    covariance += da * db;
    varianceA += da * da;
    varianceB += db * db;
  }

  // rounding leaves a trace of variance in flat samples
  const flatA = varianceA < FLAT_VARIANCE * n;
  const flatB = varianceB < FLAT_VARIANCE * n;
  if (flatA && flatB) {
    return Math.abs(meanA - meanB) < 1e-6 ? 1 : 0;
  }
  if (flatA || flatB) {
    return 0;
  }

  const score = covariance / Math.sqrt(varianceA * varianceB);
  return Math.max(0, Math.min(1, score));
}

/**
 * Turn an identifier such as `submit-button` or `loginForm_email` into words
 */
export function humanizeIdentifier(value: string): string {
  return value
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/[-_.]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}
