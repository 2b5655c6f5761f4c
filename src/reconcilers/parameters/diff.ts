/**
 * Parameter diff algorithm
 *
 * Compares the current user-set parameters of a group with the desired ones
 * and works out which to reset and which to modify. Output order follows
 * input order so repeated runs issue identical remote calls.
 */

import type { Parameter } from '../../api/types.js';
import type { ParameterDiffResult } from './types.js';
import { identityKey, indexByIdentity } from './identity.js';

/**
 * Diff two parameter collections
 *
 * @param current - Parameters the group has now
 * @param desired - Parameters the group should have
 * @returns Removals in current casing, additions in desired casing
 */
export function diffParameters(
  current: readonly Parameter[],
  desired: readonly Parameter[]
): ParameterDiffResult {
  const currentIndex = indexByIdentity(current);
  const desiredIndex = indexByIdentity(desired);

  // Find parameters to remove (in current but not in desired)
  const toRemove = current.filter((p) => !desiredIndex.has(identityKey(p)));

  // Find parameters to add (in desired but not in current)
  const toAdd = desired.filter((p) => !currentIndex.has(identityKey(p)));

  // Find unchanged parameters (in both)
  const unchanged = desired.filter((p) => currentIndex.has(identityKey(p)));

  return {
    toRemove,
    toAdd,
    unchanged,
    hasChanges: toAdd.length > 0 || toRemove.length > 0,
  };
}

/**
 * Whether two collections hold the same set of identities
 */
export function parametersEqual(
  a: readonly Parameter[],
  b: readonly Parameter[]
): boolean {
  const left = indexByIdentity(a);
  const right = indexByIdentity(b);
  if (left.size !== right.size) return false;
  for (const key of left.keys()) {
    if (!right.has(key)) return false;
  }
  return true;
}

/**
 * Render a parameter as name=value
 */
export function formatParameter(parameter: Parameter): string {
  const suffix = parameter.applyMethod ? ` (${parameter.applyMethod})` : '';
  return `${parameter.name}=${parameter.value}${suffix}`;
}

/**
 * Format a parameter diff for display
 */
export function formatParameterDiffSummary(
  groupName: string,
  result: ParameterDiffResult
): string {
  const lines: string[] = [];

  lines.push(`Parameter Diff for group: ${groupName}`);
  lines.push('='.repeat(50));
  lines.push('');

  if (!result.hasChanges) {
    lines.push('Status: NO CHANGES');
    lines.push(`Parameters in sync: ${result.unchanged.length}`);
    return lines.join('\n');
  }

  lines.push('Status: CHANGES NEEDED');
  lines.push('');

  if (result.toRemove.length > 0) {
    lines.push('Parameters to RESET:');
    for (const parameter of result.toRemove) {
      lines.push(`  - ${formatParameter(parameter)}`);
    }
    lines.push('');
  }

  if (result.toAdd.length > 0) {
    lines.push('Parameters to SET:');
    for (const parameter of result.toAdd) {
      lines.push(`  + ${formatParameter(parameter)}`);
    }
    lines.push('');
  }

  if (result.unchanged.length > 0) {
    lines.push(`Unchanged: ${result.unchanged.length} parameters`);
  }

  return lines.join('\n');
}
