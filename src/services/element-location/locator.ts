/**
 * Locator value helpers
 */

import { ElementLocationError, LocationErrorType, LocatorType, type Locator } from './types.js';

const LOCATOR_TYPES: readonly LocatorType[] = Object.values(LocatorType);

export function isLocatorType(value: string): value is LocatorType {
  return LOCATOR_TYPES.some((type) => type === value);
}

/**
 * Build a frozen locator
 */
export function createLocator(type: LocatorType, value: string): Locator {
  if (value.trim().length === 0) {
    throw new ElementLocationError(
      LocationErrorType.INVALID_LOCATOR,
      `Locator value for "${type}" must not be empty`
    );
  }
  return Object.freeze({ type, value });
}

export function locatorEquals(a: Locator, b: Locator): boolean {
  return a.type === b.type && a.value === b.value;
}

/**
 * Stable string form, used as a cache key component
 */
export function locatorFingerprint(locator: Locator): string {
  return `${locator.type}=${locator.value}`;
}

export function formatLocator(locator: Locator): string {
  return locatorFingerprint(locator);
}

export const byId = (id: string): Locator => createLocator(LocatorType.ID, id);
export const byName = (name: string): Locator => createLocator(LocatorType.NAME, name);
export const byCss = (selector: string): Locator => createLocator(LocatorType.CSS, selector);
export const byXPath = (xpath: string): Locator => createLocator(LocatorType.XPATH, xpath);
export const byText = (text: string): Locator => createLocator(LocatorType.TEXT, text);
export const byPartialText = (text: string): Locator => createLocator(LocatorType.PARTIAL_TEXT, text);
export const byClassName = (className: string): Locator => createLocator(LocatorType.CLASS_NAME, className);
export const byTagName = (tagName: string): Locator => createLocator(LocatorType.TAG_NAME, tagName);
