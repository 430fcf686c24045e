/**
 * Page context fingerprint - scopes healing cache entries to a page
 */

import { createHash } from 'node:crypto';
import type { ElementSnapshot } from './types.js';
import { nodeDepth } from './snapshot-query.js';

export interface PageContext {
  url?: string;
  title?: string;
}

/**
 * Origin + path; query string and fragment vary between visits of the same page
 */
function normalizeUrl(url: string | undefined): string {
  if (!url) {
    return '';
  }
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return url.split(/[?#]/)[0];
  }
}

/**
 * `depth:tag` per node. Ids, classes and text stay out so that renaming an
 * element does not move the page to a new fingerprint.
 */
export function structuralSignature(snapshot: ElementSnapshot): string {
  return snapshot.nodes
    .map((node, index) => `${nodeDepth(snapshot, index)}:${node.tag.toLowerCase()}`)
    .join('|');
}

/**
 * Stable 16-hex-char hash of URL, title and DOM structure. Explicit context
 * values take precedence over the ones carried by the snapshot.
 */
export function computePageFingerprint(snapshot: ElementSnapshot, context: PageContext = {}): string {
  const url = normalizeUrl(context.url ?? snapshot.url);
  const title = (context.title ?? snapshot.title ?? '').trim();

  return createHash('sha256')
    .update(url)
    .update('\n')
    .update(title)
    .update('\n')
    .update(structuralSignature(snapshot))
    .digest('hex')
    .slice(0, 16);
}
