/**
 * CLI Command: Strength
 * Rate how well a locator will survive UI changes
 */

import { parseSelector } from '../../services/element-location/selector-parser.js';
import { validateLocatorStrength, type LocatorStrengthReport } from '../../services/element-location/locator-advisor.js';

/**
 * Display help for the strength command
 */
export function displayStrengthHelp(): void {
  console.log(`
Locator Strength
================

Scores a locator from 0 to 100 for resilience against UI changes.

Usage:
  healing-cli strength [options] <locator>

Arguments:
  locator                 Locator string such as "id=submit" or "//button[1]"

Options:
  --json                  Print the report as JSON
  -h, --help              Show this help message

Examples:
  healing-cli strength "css=[data-testid='login']"
  healing-cli strength "xpath=//*[text()='Save']"
`);
}

interface StrengthCommandArgs {
  locator: string;
  json: boolean;
  help: boolean;
}

export function parseStrengthArgs(args: string[]): StrengthCommandArgs {
  const parsed: StrengthCommandArgs = { locator: '', json: false, help: false };

  for (const arg of args) {
    switch (arg) {
      case '-h':
      case '--help':
        parsed.help = true;
        break;

      case '--json':
        parsed.json = true;
        break;

      default:
        if (!arg.startsWith('-')) {
          parsed.locator = arg;
        }
        break;
    }
  }

  return parsed;
}

export function formatStrengthReport(report: LocatorStrengthReport): string {
  const lines = [`Locator:  ${report.locator}`, `Score:    ${report.score}/100 (${report.strength})`];
  if (report.issues.length > 0) {
    lines.push('Issues:', ...report.issues.map((issue) => `  - ${issue}`));
  }
  if (report.recommendations.length > 0) {
    lines.push('Recommendations:', ...report.recommendations.map((tip) => `  - ${tip}`));
  }
  return lines.join('\n');
}

/**
 * Execute the strength command
 */
export function executeStrengthCommand(args: string[]): void {
  const parsed = parseStrengthArgs(args);

  if (parsed.help || !parsed.locator) {
    displayStrengthHelp();
    return;
  }

  const report = validateLocatorStrength(parseSelector(parsed.locator));
  console.log(parsed.json ? JSON.stringify(report, null, 2) : formatStrengthReport(report));
}
