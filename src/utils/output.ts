/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { DirectoryError } from '../api/errors.js';
import type { EdgeResult, RelationshipPlan } from '../reconcilers/relationships/index.js';

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
 * Print the planned edge changes of one relation
 */
export function printPlan(label: string, plan: RelationshipPlan): void {
  const changes = plan.toAdd.length + plan.toRemove.length;
  const title = `${label} ${chalk.gray(plan.relation)}`;

  if (changes === 0 && plan.retained.length === 0) {
    console.log(`  ${title} ${chalk.gray('(no changes)')}`);
    return;
  }

  console.log(`  ${title}`);
  for (const id of plan.toAdd) {
    console.log(chalk.green(`    + ${id}`));
  }
  for (const id of plan.toRemove) {
    console.log(chalk.red(`    - ${id}`));
  }
  for (const id of plan.retained) {
    console.log(chalk.yellow(`    ~ ${id}`), chalk.gray('(not in manifest, kept: prune is off)'));
  }
}

/**
 * Print the outcome of each edge operation
 */
export function printEdges(edges: EdgeResult[]): void {
  for (const edge of edges) {
    const verb = edge.action === 'add' ? 'add' : 'remove';
    switch (edge.outcome) {
      case 'applied':
        console.log(chalk.green(`    ✓ ${verb} ${edge.targetId}`), chalk.gray(`(${edge.status ?? '-'})`));
        break;
      case 'already-satisfied':
        console.log(chalk.gray(`    = ${verb} ${edge.targetId} (already ${edge.action === 'add' ? 'present' : 'absent'})`));
        break;
      case 'failed':
        console.log(chalk.red(`    ✗ ${verb} ${edge.targetId}`), chalk.gray(`(${edge.status ?? '-'})`));
        break;
    }
  }
}

/**
 * One-line description of a client error
 */
export function describeError(err: DirectoryError): string {
  const where = err.operation ? `${err.operation}: ` : '';
  const status = err.status > 0 ? ` (HTTP ${err.status})` : '';
  return `${where}${err.message}${status}`;
}

/**
 * Print a list of entities as an aligned table
 */
export function printTable(rows: Array<Record<string, string | undefined>>, columns: string[]): void {
  if (rows.length === 0) {
    console.log(chalk.gray('  (none)'));
    return;
  }

  const widths = columns.map((column) =>
    Math.max(column.length, ...rows.map((row) => (row[column] ?? '').length))
  );

  console.log(chalk.bold(columns.map((column, i) => column.padEnd(widths[i] ?? 0)).join('  ')));
  for (const row of rows) {
    console.log(columns.map((column, i) => (row[column] ?? '').padEnd(widths[i] ?? 0)).join('  '));
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
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
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
