#!/usr/bin/env node
/**
 * CLI entry point for the self-healing locator
 */

import { executeStrengthCommand } from './commands/strength.js';
import { executeCacheCommand } from './commands/cache.js';

const args = process.argv.slice(2);

async function main(): Promise<void> {
  if (args[0] === 'strength') {
    executeStrengthCommand(args.slice(1));
    return;
  }

  if (args[0] === 'cache') {
    await executeCacheCommand(args.slice(1));
    return;
  }

  displayMainHelp();
  if (args.length > 0 && !args.includes('--help') && !args.includes('-h')) {
    process.exitCode = 1;
  }
}

/**
 * Display main CLI help
 */
function displayMainHelp(): void {
  console.log(`
Self-Healing Locator
====================

Finds UI elements again after their locators break, and keeps a cache of the
locators it healed.

Usage:
  healing-cli <command> [options]

Commands:
  strength <locator>      Rate how resilient a locator is
  cache stats             Show the persisted healing cache
  cache clear             Empty the persisted healing cache

Options:
  -h, --help              Show this help message

Examples:
  healing-cli strength "id=login-button"
  healing-cli cache stats --file reports/healing_cache.json

For more information on a specific command, use:
  healing-cli cache --help
`);
}

main().catch(error => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
