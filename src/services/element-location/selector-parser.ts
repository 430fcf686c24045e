/**
 * Selector Parser - turns "strategy=value" strings from test data into
 * Locator objects.
 */

import { LocatorType, type Locator } from './types.js';
import { createLocator } from './locator.js';
import { createModuleLogger } from '../../utils/logger.js';

const logger = createModuleLogger('selector-parser');

/**
 * Recognised prefixes, lower-cased
 */
const PREFIX_TYPES: Readonly<Record<string, LocatorType>> = {
  id: LocatorType.ID,
  name: LocatorType.NAME,
  css: LocatorType.CSS,
  xpath: LocatorType.XPATH,
  text: LocatorType.TEXT,
  link: LocatorType.TEXT,
  partial_text: LocatorType.PARTIAL_TEXT,
  partial_link: LocatorType.PARTIAL_TEXT,
  class: LocatorType.CLASS_NAME,
  class_name: LocatorType.CLASS_NAME,
  tag: LocatorType.TAG_NAME,
  tag_name: LocatorType.TAG_NAME,
};

const PREFIX_PATTERN = /^([a-zA-Z_]+)\s*=\s*([\s\S]*)$/;

/**
 * Selector Parser class
 */
export class SelectorParser {
  /**
   * Parse a locator string such as `id=submit` or `//button[@type='submit']`
   */
  parse(input: string): Locator {
    const trimmed = input.trim();
    const match = PREFIX_PATTERN.exec(trimmed);

    if (match) {
      const type = PREFIX_TYPES[match[1].toLowerCase()];
      if (type) {
        return createLocator(type, match[2].trim());
      }
    }

    const guessed = this.guessLocatorType(trimmed);
    logger.debug({ input: trimmed, type: guessed }, 'No locator prefix, guessed type');
    return createLocator(guessed, trimmed);
  }

  /**
   * Accept either a ready locator or a locator string
   */
  toLocator(input: Locator | string): Locator {
    return typeof input === 'string' ? this.parse(input) : input;
  }

  private guessLocatorType(input: string): LocatorType {
    if (input.startsWith('/') || input.startsWith('(')) {
      return LocatorType.XPATH;
    }
    return LocatorType.CSS;
  }
}

let parserInstance: SelectorParser | null = null;

/**
 * Get the singleton selector parser instance
 */
export function getSelectorParser(): SelectorParser {
  if (!parserInstance) {
    parserInstance = new SelectorParser();
  }
  return parserInstance;
}

export function parseSelector(input: string): Locator {
  return getSelectorParser().parse(input);
}

export function toLocator(input: Locator | string): Locator {
  return getSelectorParser().toLocator(input);
}
