/**
 * Healing Strategies
 * Each strategy on its own, against crafted snapshots
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  SnapshotQueryEngine,
  byId,
  byName,
  byText,
  byCss,
  byClassName,
  byXPath,
} from '../../src/services/element-location/index.js';
import {
  DEFAULT_STRATEGY_THRESHOLDS,
  HEALING_STRATEGIES,
  PngImageComparator,
  textContentStrategy,
  attributeSimilarityStrategy,
  nearbyElementStrategy,
  positionStrategy,
  visualSimilarityStrategy,
  type ElementHints,
  type StrategyContext,
  type StrategyThresholds,
} from '../../src/services/self-healing-locator/index.js';
import { buildSnapshot, el, loginPage } from '../fixtures/snapshots.js';
import { invertedSplitPng, splitPng } from '../fixtures/images.js';

const engine = new SnapshotQueryEngine();

function contextWith(hints: ElementHints, thresholds: Partial<StrategyThresholds> = {}): StrategyContext {
  return {
    hints,
    thresholds: { ...DEFAULT_STRATEGY_THRESHOLDS, ...thresholds },
    engine,
    imageComparator: new PngImageComparator(),
  };
}

describe('HEALING_STRATEGIES', () => {
  it('should list the strategies in priority order', () => {
    assert.deepStrictEqual(
      HEALING_STRATEGIES.map((strategy) => strategy.name),
      ['text-content', 'attribute-similarity', 'nearby-element', 'position', 'visual-similarity']
    );
  });

  it('should leave the snapshot untouched', () => {
    const page = loginPage();
    const copy = structuredClone(page);
    const context = contextWith({
      text: 'Submit',
      id: 'old-button-id',
      tag: 'button',
      anchor: byId('login-form'),
      boundingBox: { x: 100, y: 200, width: 80, height: 30 },
    });
    for (const strategy of HEALING_STRATEGIES) {
      strategy.attempt(byId('old-button-id'), page, context);
    }
    assert.deepStrictEqual(page, copy);
  });
});

describe('textContentStrategy', () => {
  it('should find the node whose text equals the remembered text', () => {
    const match = textContentStrategy.attempt(byId('old-button-id'), loginPage(), contextWith({ text: 'Submit' }));
    assert.deepStrictEqual(match, {
      strategy: 'text-content',
      locator: byId('new-button-id'),
      confidence: 0.95,
      nodeIndex: 5,
    });
  });

  it('should fall back to the text of a text locator', () => {
    const match = textContentStrategy.attempt(byText('Need help'), loginPage(), contextWith({}));
    assert.strictEqual(match?.nodeIndex, 6);
    assert.strictEqual(match?.confidence, 0.75);
    assert.deepStrictEqual(match?.locator, byId('help-link'));
  });

  it('should fall back to the words of an id or name', () => {
    const match = textContentStrategy.attempt(byName('submit'), loginPage(), contextWith({}));
    assert.strictEqual(match?.nodeIndex, 5);
    assert.strictEqual(match?.confidence, 0.95);
  });

  it('should prefer equal text over contained text', () => {
    const snapshot = buildSnapshot([
      el({ tag: 'div' }),
      el({ tag: 'span', text: 'Submit your order', parent: 0 }),
      el({ tag: 'button', id: 'order', text: 'Submit', parent: 0 }),
    ]);
    const match = textContentStrategy.attempt(byId('gone'), snapshot, contextWith({ text: 'Submit' }));
    assert.strictEqual(match?.nodeIndex, 2);
    assert.strictEqual(match?.confidence, 0.95);
  });

  it('should break ties by closeness to the original locator value', () => {
    const snapshot = buildSnapshot([
      el({ tag: 'div' }),
      el({ tag: 'button', id: 'save-draft', text: 'Save', parent: 0 }),
      el({ tag: 'button', id: 'save-button-v2', text: 'Save', parent: 0 }),
    ]);
    const match = textContentStrategy.attempt(byId('save-button'), snapshot, contextWith({ text: 'Save' }));
    assert.strictEqual(match?.nodeIndex, 2);
    assert.deepStrictEqual(match?.locator, byId('save-button-v2'));
  });

  it('should find nothing without any text to look for', () => {
    assert.strictEqual(textContentStrategy.attempt(byCss('.gone'), loginPage(), contextWith({})), null);
  });
});

describe('attributeSimilarityStrategy', () => {
  it('should pick the candidate with the highest weighted score', () => {
    const match = attributeSimilarityStrategy.attempt(
      byId('email-address'),
      loginPage(),
      contextWith({ id: 'email-address', name: 'email', tag: 'input', classList: ['input'] })
    );
    assert.deepStrictEqual(match, {
      strategy: 'attribute-similarity',
      locator: byId('email'),
      confidence: 4 / 6,
      nodeIndex: 4,
    });
  });

  it('should ignore candidates below the threshold', () => {
    const match = attributeSimilarityStrategy.attempt(
      byId('x'),
      loginPage(),
      contextWith({ id: 'x', name: 'y', tag: 'input' })
    );
    assert.strictEqual(match, null);
  });

  it('should use the locator itself when nothing is remembered', () => {
    const original = byClassName('btn btn-primary btn-lg');
    assert.strictEqual(attributeSimilarityStrategy.attempt(original, loginPage(), contextWith({})), null);

    const match = attributeSimilarityStrategy.attempt(original, loginPage(), contextWith({}, { attributeThreshold: 0.4 }));
    assert.strictEqual(match?.nodeIndex, 5);
    assert.strictEqual(match?.confidence, 2 / 5);
  });
});

describe('nearbyElementStrategy', () => {
  it('should find a matching node close to the anchor', () => {
    const match = nearbyElementStrategy.attempt(
      byId('old-button-id'),
      loginPage(),
      contextWith({ anchor: byId('login-form'), tag: 'button' })
    );
    assert.deepStrictEqual(match, {
      strategy: 'nearby-element',
      locator: byId('new-button-id'),
      confidence: 0.6,
      nodeIndex: 5,
    });
  });

  it('should filter by shared class', () => {
    const match = nearbyElementStrategy.attempt(
      byId('old-email'),
      loginPage(),
      contextWith({ anchor: byId('login-form'), classList: ['input'] })
    );
    assert.strictEqual(match?.nodeIndex, 4);
  });

  it('should respect the radius', () => {
    const hints = { anchor: byId('help-link'), tag: 'button' };
    assert.strictEqual(nearbyElementStrategy.attempt(byId('old'), loginPage(), contextWith(hints))?.nodeIndex, 5);
    assert.strictEqual(nearbyElementStrategy.attempt(byId('old'), loginPage(), contextWith(hints, { nearbyRadius: 2 })), null);
  });

  it('should need an anchor that still resolves', () => {
    const hints = { anchor: byId('missing-anchor'), tag: 'button' };
    assert.strictEqual(nearbyElementStrategy.attempt(byId('old'), loginPage(), contextWith(hints)), null);
    assert.strictEqual(nearbyElementStrategy.attempt(byId('old'), loginPage(), contextWith({ tag: 'button' })), null);
  });

  it('should not return a container of the anchor', () => {
    const page = buildSnapshot([
      el({ tag: 'body' }),
      el({ tag: 'div', id: 'panel', classes: ['card'], parent: 0 }),
      el({ tag: 'span', id: 'anchor', parent: 1 }),
      el({ tag: 'div', id: 'other', classes: ['card'], parent: 0 }),
    ]);
    const match = nearbyElementStrategy.attempt(
      byId('old-card'),
      page,
      contextWith({ anchor: byId('anchor'), tag: 'div', classList: ['card'] })
    );

    assert.strictEqual(match?.nodeIndex, 3);
    assert.deepStrictEqual(match?.locator, byId('other'));
  });

  it('should need a tag or classes to match against', () => {
    const match = nearbyElementStrategy.attempt(byId('old'), loginPage(), contextWith({ anchor: byId('login-form') }));
    assert.strictEqual(match, null);
  });
});

describe('positionStrategy', () => {
  it('should pick the nearest node of the known tag', () => {
    const match = positionStrategy.attempt(
      byId('old-button-id'),
      loginPage(),
      contextWith({ boundingBox: { x: 100, y: 190, width: 80, height: 30 }, tag: 'button' })
    );
    assert.strictEqual(match?.nodeIndex, 5);
    assert.deepStrictEqual(match?.locator, byId('new-button-id'));
    // centres are 10px apart
    assert.ok(Math.abs((match?.confidence ?? 0) - (0.7 - (0.4 * 10) / 150)) < 1e-9);
  });

  it('should give full confidence at the same spot', () => {
    const match = positionStrategy.attempt(
      byId('old-label'),
      loginPage(),
      contextWith({ boundingBox: { x: 60, y: 60, width: 100, height: 20 } })
    );
    assert.strictEqual(match?.nodeIndex, 3);
    assert.strictEqual(match?.confidence, 0.7);
    assert.deepStrictEqual(match?.locator, byXPath("//label[normalize-space()='Email']"));
  });

  it('should find nothing beyond the maximum distance', () => {
    const match = positionStrategy.attempt(
      byId('old-button-id'),
      loginPage(),
      contextWith({ boundingBox: { x: 700, y: 500, width: 10, height: 10 }, tag: 'button' })
    );
    assert.strictEqual(match, null);
  });

  it('should skip nodes without a box', () => {
    const snapshot = buildSnapshot([el({ tag: 'div' }), el({ tag: 'button', id: 'hidden', parent: 0 })]);
    const match = positionStrategy.attempt(
      byId('old'),
      snapshot,
      contextWith({ boundingBox: { x: 0, y: 0, width: 0, height: 0 } })
    );
    assert.strictEqual(match, null);
  });
});

describe('visualSimilarityStrategy', () => {
  function iconPage(regions: Array<Buffer | undefined>) {
    return buildSnapshot([
      el({ tag: 'div' }),
      ...regions.map((region, i) => el({ tag: 'img', id: `icon-${i}`, region, parent: 0 })),
    ]);
  }

  it('should pick the region that looks most like the remembered one', () => {
    const snapshot = iconPage([invertedSplitPng(8, 8), splitPng(16, 16)]);
    const match = visualSimilarityStrategy.attempt(byId('old-icon'), snapshot, contextWith({ screenshotRegion: splitPng(8, 8) }));
    assert.strictEqual(match?.nodeIndex, 2);
    assert.deepStrictEqual(match?.locator, byId('icon-1'));
    assert.ok((match?.confidence ?? 0) > 0.99);
  });

  it('should skip regions that cannot be decoded', () => {
    const snapshot = iconPage([Buffer.from('garbage'), splitPng(8, 8)]);
    const match = visualSimilarityStrategy.attempt(byId('old-icon'), snapshot, contextWith({ screenshotRegion: splitPng(8, 8) }));
    assert.strictEqual(match?.nodeIndex, 2);
  });

  it('should find nothing below the threshold', () => {
    const snapshot = iconPage([invertedSplitPng(8, 8), undefined]);
    const match = visualSimilarityStrategy.attempt(byId('old-icon'), snapshot, contextWith({ screenshotRegion: splitPng(8, 8) }));
    assert.strictEqual(match, null);
  });

  it('should need a comparator and a remembered region', () => {
    const snapshot = iconPage([splitPng(8, 8)]);
    const withoutComparator: StrategyContext = { ...contextWith({ screenshotRegion: splitPng(8, 8) }), imageComparator: undefined };
    assert.strictEqual(visualSimilarityStrategy.attempt(byId('old-icon'), snapshot, withoutComparator), null);
    assert.strictEqual(visualSimilarityStrategy.attempt(byId('old-icon'), snapshot, contextWith({})), null);
  });
});
