/**
 * Parameter group reconciler exports
 *
 * Provides identity, diff, batching, apply, delete and lifecycle handling
 * for the user-set parameters of a parameter group.
 */

// Types from types.ts
export type {
  ParameterIdentity,
  ParameterDiffResult,
  BatchOperation,
  AppliedBatch,
  ApplyOptions,
  ApplyResult,
  DeleteOptions,
  DeleteResult,
  LifecycleState,
  TransitionRecord,
  DesiredGroup,
  ControllerOptions,
  ControllerSnapshot,
} from './types.js';

export {
  MAX_PARAMETERS_PER_CALL,
  RESET_RETRY_TIMEOUT_MS,
  DELETE_RETRY_TIMEOUT_MS,
  DEFAULT_DESCRIPTION,
} from './types.js';

// Identity and diff
export { identityOf, identityKey, sameIdentity, indexByIdentity } from './identity.js';
export {
  diffParameters,
  parametersEqual,
  formatParameter,
  formatParameterDiffSummary,
} from './diff.js';
export { batch } from './batch.js';

// Apply and delete
export {
  applyParameterDiff,
  planBatches,
  resetBatch,
  modifyBatch,
  formatApplyResult,
  type BatchPlan,
} from './apply.js';
export { deleteParameterGroup } from './delete.js';

// Planning and lifecycle
export {
  planGroupChange,
  findForceNewChanges,
  type GroupAction,
  type GroupPlan,
  type ForceNewChange,
} from './plan.js';
export {
  ParameterGroupController,
  LIFECYCLE_TRANSITIONS,
  canTransition,
  projectApplied,
  type ConfigureResult,
  type ConvergeResult,
} from './lifecycle.js';

// Errors
export {
  ParameterApplyError,
  ParameterGroupError,
  LifecycleTransitionError,
  type GroupOperation,
} from './errors.js';
