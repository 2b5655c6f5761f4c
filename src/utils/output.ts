/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult } from '../types.js';
import type { Parameter, ParameterGroup } from '../api/types.js';
import type { GroupPlan } from '../reconcilers/parameters/plan.js';
import { formatParameter } from '../reconcilers/parameters/diff.js';

/**
 * Print a command result for --json; human output is printed by each command
 */
export function printResult<T>(result: CommandResult<T>): void {
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Print a group plan: immutable changes, resets, then modifies
 */
export function printPlan(plan: GroupPlan): void {
  console.log(chalk.bold(`\nParameter group ${plan.groupName}: ${describeAction(plan)}\n`));

  for (const change of plan.forceNew) {
    console.log(
      chalk.yellow(`  ~ ${change.field}: ${formatValue(change.oldValue)} -> ${formatValue(change.newValue)}`),
      chalk.yellow('(forces replacement)')
    );
  }

  printParameterLines(plan.diff.toRemove, '-', chalk.red);
  printParameterLines(plan.diff.toAdd, '+', chalk.green);

  if (plan.action !== 'none') {
    console.log(
      chalk.gray(
        `\n  ${plan.batches.reset.length} reset call(s), ${plan.batches.modify.length} modify call(s)`
      )
    );
  }
}

/**
 * Print an observed group
 */
export function printGroup(group: ParameterGroup): void {
  console.log(chalk.bold(`\nParameter group ${group.name}:\n`));
  console.log(`  ${chalk.gray('Family:')} ${group.family}`);
  console.log(`  ${chalk.gray('Description:')} ${formatValue(group.description)}`);
  console.log(`  ${chalk.gray('User parameters:')} ${group.parameters.length}`);
  for (const parameter of group.parameters) {
    console.log(`    ${parameter.name} = ${parameter.value}`);
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

// Helper functions

function describeAction(plan: GroupPlan): string {
  switch (plan.action) {
    case 'create':
      return 'will be created';
    case 'replace':
      return 'must be replaced';
    case 'update':
      return 'will be updated';
    case 'none':
      return 'up to date';
  }
}

function printParameterLines(
  parameters: Parameter[],
  icon: string,
  color: typeof chalk.green
): void {
  for (const parameter of parameters) {
    console.log(color(`  ${icon} ${formatParameter(parameter)}`));
  }
}

function formatValue(value: string): string {
  if (value === '') {
    return chalk.gray('(empty)');
  }
  return value.length > 50 ? value.slice(0, 50) + '...' : value;
}
