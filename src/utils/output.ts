/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { ApplyResult, Plan } from '../reconcilers/variables/types.js';
import { formatPlanDetails, formatPlanSummary } from '../reconcilers/variables/diff.js';

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

  // Human-readable format
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
 * Report a command that threw before producing a result.
 * In JSON mode stdout carries only the failed CommandResult.
 */
export function printFailure(message: string, format: OutputFormat): void {
  if (format === 'json') {
    printResult({ success: false, message }, format);
    return;
  }
  error(message);
}

/**
 * Print a reconciliation plan: summary, warnings, then per-key details
 */
export function printPlan(plan: Plan, projectId?: string): void {
  console.log(colorize(formatPlanSummary(plan, projectId)));

  const details = formatPlanDetails(plan);
  if (details) {
    console.log('');
    console.log(colorize(details));
  }
}

/**
 * Print the outcome of applying a plan
 */
export function printApplyResult(result: ApplyResult): void {
  const { summary } = result;
  console.log(
    chalk.bold('\nApplied:'),
    `${summary.created} created, ${summary.updated} updated, ${summary.deleted} deleted`
  );
  if (summary.failed > 0) {
    console.log(chalk.red(`  ${summary.failed} failed`));
  }
  if (summary.notAttempted > 0) {
    console.log(chalk.yellow(`  ${summary.notAttempted} not attempted (stopped after first failure)`));
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
    // stdout stays clean for --json
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

function colorize(text: string): string {
  return text
    .split('\n')
    .map((line) => {
      const trimmed = line.trimStart();
      if (trimmed.startsWith('+ ')) return chalk.green(line);
      if (trimmed.startsWith('- ')) return chalk.red(line);
      if (trimmed.startsWith('~ ')) return chalk.yellow(line);
      if (trimmed.startsWith('! ')) return chalk.yellow(line);
      if (line.startsWith('===')) return chalk.bold(line);
      if (line === 'Status: IN SYNC') return chalk.green(line);
      if (line === 'Status: CHANGES NEEDED') return chalk.yellow(line);
      return line;
    })
    .join('\n');
}
