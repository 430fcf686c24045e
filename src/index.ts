/**
 * Self-Healing Locator
 *
 * Finds UI elements again when their locators stop matching: a cache of
 * earlier healings per page, then a fixed chain of fallback strategies
 * (text, attributes, nearby elements, position, appearance), with statistics
 * on every healing.
 */

export * from './services/element-location/index.js';
export * from './services/self-healing-locator/index.js';

export { parseEnv, type Env } from './config/env.js';
export { createLogger, createModuleLogger, Logger, LogLevel, type LoggerConfig } from './utils/logger.js';
