/**
 * Group change planning
 *
 * Decides what converging a group to its desired state takes:
 * - create: the group does not exist yet
 * - replace: an immutable attribute (name, family, description) differs,
 *   so the group is deleted and created again
 * - update: only parameters differ
 * - none: nothing to do
 */

import type { ParameterGroup } from '../../api/types.js';
import type { ParameterDiffResult, DesiredGroup } from './types.js';
import { MAX_PARAMETERS_PER_CALL } from './types.js';
import { diffParameters } from './diff.js';
import { planBatches, type BatchPlan } from './apply.js';

// =============================================================================
// Types
// =============================================================================

export type GroupAction = 'create' | 'update' | 'replace' | 'none';

/**
 * An immutable attribute that differs between observed and desired
 */
export interface ForceNewChange {
  field: 'name' | 'family' | 'description';
  oldValue: string;
  newValue: string;
}

/**
 * Plan for converging one group
 */
export interface GroupPlan {
  groupName: string;
  action: GroupAction;
  /** Immutable attribute changes that force a replace */
  forceNew: ForceNewChange[];
  diff: ParameterDiffResult;
  batches: BatchPlan;
}

// =============================================================================
// Planning
// =============================================================================

/**
 * Immutable attributes that differ
 */
export function findForceNewChanges(
  observed: Omit<ParameterGroup, 'parameters'>,
  desired: Omit<DesiredGroup, 'parameters'>
): ForceNewChange[] {
  const changes: ForceNewChange[] = [];
  const fields: ForceNewChange['field'][] = ['name', 'family', 'description'];
  for (const field of fields) {
    if (observed[field] !== desired[field]) {
      changes.push({ field, oldValue: observed[field], newValue: desired[field] });
    }
  }
  return changes;
}

/**
 * Plan the changes needed to converge a group
 *
 * @param observed - Group as read from the remote, or null if absent
 * @param desired - Validated desired state
 */
export function planGroupChange(
  observed: ParameterGroup | null,
  desired: DesiredGroup,
  maxBatchSize: number = MAX_PARAMETERS_PER_CALL
): GroupPlan {
  if (!observed) {
    const diff = diffParameters([], desired.parameters);
    return {
      groupName: desired.name,
      action: 'create',
      forceNew: [],
      diff,
      batches: planBatches(diff, maxBatchSize),
    };
  }

  const forceNew = findForceNewChanges(observed, desired);
  if (forceNew.length > 0) {
    // The replacement starts from remote defaults
    const diff = diffParameters([], desired.parameters);
    return {
      groupName: desired.name,
      action: 'replace',
      forceNew,
      diff,
      batches: planBatches(diff, maxBatchSize),
    };
  }

  const diff = diffParameters(observed.parameters, desired.parameters);
  return {
    groupName: desired.name,
    action: diff.hasChanges ? 'update' : 'none',
    forceNew,
    diff,
    batches: planBatches(diff, maxBatchSize),
  };
}
