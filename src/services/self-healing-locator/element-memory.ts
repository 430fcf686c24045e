/**
 * Element Memory - the last known profile of each logical element, keyed by
 * its original locator and page context like the healing cache. Strategies
 * read it as hints.
 */

import type { Locator, SnapshotNode } from '../element-location/types.js';
import { locatorFingerprint } from '../element-location/locator.js';
import { normalizeText } from '../element-location/snapshot-query.js';
import type { ElementHints } from './types.js';

function profileKey(original: Locator, pageContextFingerprint: string): string {
  return `${locatorFingerprint(original)}::${pageContextFingerprint}`;
}

export class ElementMemory {
  private profiles = new Map<string, ElementHints>();

  /**
   * Remember what the element looked like when it last resolved. The anchor
   * is kept from earlier calls since a node knows nothing about its anchor.
   */
  remember(original: Locator, pageContextFingerprint: string, node: SnapshotNode): void {
    const key = profileKey(original, pageContextFingerprint);
    const previous = this.profiles.get(key);
    const text = normalizeText(node.text);

    this.profiles.set(key, {
      text: text.length > 0 ? text : undefined,
      id: node.id ?? node.attributes.id,
      name: node.attributes.name,
      tag: node.tag.toLowerCase(),
      classList: [...node.classList],
      attributes: { ...node.attributes },
      boundingBox: { ...node.boundingBox },
      screenshotRegion: node.screenshotRegion,
      anchor: previous?.anchor,
    });
  }

  /**
   * Remembered profile with caller hints laid over it field by field
   */
  hintsFor(original: Locator, pageContextFingerprint: string, overrides: ElementHints = {}): ElementHints {
    const remembered = this.profiles.get(profileKey(original, pageContextFingerprint)) ?? {};
    const merged: ElementHints = { ...remembered };
    for (const [field, value] of Object.entries(overrides)) {
      if (value !== undefined) {
        Object.assign(merged, { [field]: value });
      }
    }
    return merged;
  }

  /**
   * Keep an anchor from caller hints so later calls can use it without
   * passing it again
   */
  rememberAnchor(original: Locator, pageContextFingerprint: string, anchor: Locator): void {
    const key = profileKey(original, pageContextFingerprint);
    this.profiles.set(key, { ...this.profiles.get(key), anchor });
  }

  has(original: Locator, pageContextFingerprint: string): boolean {
    return this.profiles.has(profileKey(original, pageContextFingerprint));
  }

  size(): number {
    return this.profiles.size;
  }

  clear(): void {
    this.profiles.clear();
  }
}
