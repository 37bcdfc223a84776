/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { AttributeDrift } from '../reconcilers/instance/diff.js';
import type { AddressMap, ReconcileResult } from '../reconcilers/instance/types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print the ordered action log of a run
 */
export function printActions(result: ReconcileResult, dryRun: boolean): void {
  const verb = dryRun ? 'Would run' : result.ok ? 'Ran' : 'Completed before failure';

  if (result.actions.length === 0) {
    console.log(chalk.gray('No changes needed'));
    return;
  }

  console.log(chalk.bold(`\n${verb} ${result.actions.length} action(s):\n`));
  result.actions.forEach((action, index) => {
    console.log(`  ${chalk.gray(`${index + 1}.`)} ${chalk.cyan(action)}`);
  });
}

/**
 * Print attribute drifts between the declared and the observed instance
 */
export function printDrifts(drifts: AttributeDrift[]): void {
  if (drifts.length === 0) {
    return;
  }

  console.log(chalk.bold(`\n${drifts.length} attribute change(s):\n`));

  for (const drift of drifts) {
    console.log(chalk.yellow(`~ ${drift.attribute}`));
    console.log(chalk.red(`  - ${formatValue(drift.observed)}`));
    console.log(chalk.green(`  + ${formatValue(drift.desired)}`));
  }
}

/**
 * Print IPv4 addresses per device
 */
export function printAddresses(addresses: AddressMap): void {
  console.log(chalk.bold('\nAddresses:\n'));
  for (const [device, list] of Object.entries(addresses)) {
    console.log(`  ${chalk.gray(device + ':')} ${list.join(', ')}`);
  }
}

/**
 * Print a status table
 */
export function printStatus(status: Record<string, unknown>): void {
  console.log(chalk.bold('\nInstance Status:\n'));
  for (const [key, value] of Object.entries(status)) {
    console.log(`  ${chalk.gray(formatLabel(key) + ':')} ${formatValue(value)}`);
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}

// Helper functions

function formatValue(value: unknown): string {
  if (value === undefined || value === null) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'string') {
    return value.length > 60 ? value.slice(0, 60) + '...' : value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function formatLabel(key: string): string {
  // Convert camelCase to Title Case with spaces
  return key
    .replace(/([A-Z])/g, ' $1')
    .replace(/^./, (str) => str.toUpperCase())
    .trim();
}
