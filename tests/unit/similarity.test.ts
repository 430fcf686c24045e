/**
 * Similarity measures
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  levenshtein,
  normalizedLevenshtein,
  weightedJaccard,
  centerDistance,
  normalizedCrossCorrelation,
  humanizeIdentifier,
} from '../../src/services/self-healing-locator/similarity.js';

describe('levenshtein', () => {
  it('should count edits', () => {
    assert.strictEqual(levenshtein('kitten', 'sitting'), 3);
    assert.strictEqual(levenshtein('', 'abc'), 3);
    assert.strictEqual(levenshtein('same', 'same'), 0);
  });

  it('should normalise by the longer string', () => {
    assert.strictEqual(normalizedLevenshtein('abc', 'abd'), 1 / 3);
    assert.strictEqual(normalizedLevenshtein('', ''), 0);
    assert.strictEqual(normalizedLevenshtein('abc', ''), 1);
  });
});

describe('weightedJaccard', () => {
  it('should weigh the intersection against the union', () => {
    const known = new Map([
      ['id:old', 1],
      ['name:email', 2],
      ['tag:input', 1],
    ]);
    const candidate = new Map([
      ['id:new', 1],
      ['name:email', 2],
      ['tag:input', 1],
    ]);
    assert.strictEqual(weightedJaccard(known, candidate), 3 / 5);
  });

  it('should be 1 for identical sets and 0 for empty ones', () => {
    const tokens = new Map([['tag:a', 1]]);
    assert.strictEqual(weightedJaccard(tokens, tokens), 1);
    assert.strictEqual(weightedJaccard(new Map(), new Map()), 0);
  });
});

describe('centerDistance', () => {
  it('should measure between box centres', () => {
    assert.strictEqual(
      centerDistance({ x: 0, y: 0, width: 10, height: 10 }, { x: 30, y: 40, width: 10, height: 10 }),
      50
    );
  });
});

describe('normalizedCrossCorrelation', () => {
  it('should be 1 for linearly related samples', () => {
    assert.strictEqual(normalizedCrossCorrelation([1, 2, 3], [2, 4, 6]), 1);
  });

  it('should clamp anti-correlation to 0', () => {
    assert.strictEqual(normalizedCrossCorrelation([1, 2, 3], [3, 2, 1]), 0);
  });

  it('should compare flat samples by level', () => {
    assert.strictEqual(normalizedCrossCorrelation([5, 5], [5, 5]), 1);
    assert.strictEqual(normalizedCrossCorrelation([5, 5], [6, 6]), 0);
    assert.strictEqual(normalizedCrossCorrelation([5, 5], [1, 2]), 0);
  });

  it('should be 0 for empty samples', () => {
    assert.strictEqual(normalizedCrossCorrelation([], []), 0);
  });
});

describe('humanizeIdentifier', () => {
  it('should split separators and camel case', () => {
    assert.strictEqual(humanizeIdentifier('old-button-id'), 'old button id');
    assert.strictEqual(humanizeIdentifier('loginForm_email'), 'login Form email');
  });
});
