/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { ClaimOutcome, OwnershipVerification } from '../ownership/types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(
  result: CommandResult<T>,
  format: OutputFormat
): void {
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
 * Describe a resource as `Kind/name (namespace)`
 */
export function formatResource(resource: { kind: string; name: string; namespace: string }): string {
  const namespace = resource.namespace ? ` (${resource.namespace})` : '';
  return `${resource.kind}/${resource.name}${namespace}`;
}

/**
 * Print a verification result
 */
export function printVerification(verification: OwnershipVerification): void {
  switch (verification.status) {
    case 'unclaimed':
      console.log(chalk.green('✓'), 'Release resources are unclaimed');
      break;
    case 'owned':
      console.log(
        chalk.green('✓'),
        `Owned by ${chalk.bold(verification.antecedent)} (${formatResource(verification.resource)})`
      );
      break;
    case 'foreign':
      console.log(
        chalk.yellow('⚠'),
        `Claimed by ${chalk.bold(verification.antecedent)} (${formatResource(verification.resource)})`
      );
      break;
    case 'error':
      console.log(chalk.red('✗'), `Cannot determine ownership: ${verification.error.message}`);
      break;
  }
}

/**
 * Print per-resource claim outcomes
 */
export function printOutcomes(outcomes: ClaimOutcome[]): void {
  if (outcomes.length === 0) {
    console.log(chalk.gray('No resources in manifest'));
    return;
  }

  for (const outcome of outcomes) {
    const resource = formatResource(outcome.descriptor);
    if (outcome.success) {
      console.log(chalk.green('  ✓'), resource);
    } else {
      console.log(chalk.red('  ✗'), resource, chalk.gray(`(${outcome.reason})`));
    }
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
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
