/**
 * Types for parameter group reconciliation
 */

import type { Parameter, ParameterGroup } from '../../api/types.js';
import type { ApiLogger } from '../../api/logger.js';
import type { RetryConfig } from '../../api/types.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * The remote accepts at most this many parameters per reset/modify call
 */
export const MAX_PARAMETERS_PER_CALL = 20;

/**
 * Time budget for a reset batch racing a previous reset
 */
export const RESET_RETRY_TIMEOUT_MS = 30_000;

/**
 * Time budget for deleting a group that is still busy
 */
export const DELETE_RETRY_TIMEOUT_MS = 3 * 60_000;

/**
 * Description given to groups that declare none
 */
export const DEFAULT_DESCRIPTION = 'Managed by param-sync';

// =============================================================================
// Diff Types
// =============================================================================

/**
 * Identity of a parameter: name plus lower-cased value
 */
export type ParameterIdentity = readonly [name: string, value: string];

/**
 * Result of diffing current parameters against desired ones
 */
export interface ParameterDiffResult {
  /** Current parameters missing from the desired set (current casing) */
  toRemove: Parameter[];
  /** Desired parameters missing from the current set (desired casing) */
  toAdd: Parameter[];
  /** Desired parameters already present */
  unchanged: Parameter[];
  /** Whether anything needs to be applied */
  hasChanges: boolean;
}

// =============================================================================
// Apply Types
// =============================================================================

/**
 * Kind of remote call a batch is sent with
 */
export type BatchOperation = 'reset' | 'modify';

/**
 * A batch that was (or in dry-run, would be) sent to the remote
 */
export interface AppliedBatch {
  operation: BatchOperation;
  /** Zero-based index within its operation */
  index: number;
  parameters: Parameter[];
  /** Attempts made; 0 in dry-run */
  attempts: number;
}

/**
 * Options for applying a diff
 */
export interface ApplyOptions {
  /** Plan batches without calling the API */
  dryRun?: boolean;
  /** Maximum parameters per call (default: 20) */
  maxBatchSize?: number;
  /** Retry tuning for reset batches; timeoutMs defaults to 30s */
  resetRetry?: RetryConfig;
  /** Logger for batch progress */
  logger?: ApiLogger;
}

/**
 * Result of a fully applied diff
 */
export interface ApplyResult {
  groupName: string;
  /** Batches in the order they were issued */
  batches: AppliedBatch[];
  resetCount: number;
  modifyCount: number;
  dryRun: boolean;
}

// =============================================================================
// Delete Types
// =============================================================================

/**
 * Options for deleting a group
 */
export interface DeleteOptions {
  /** Retry tuning; timeoutMs defaults to 3 minutes */
  retry?: RetryConfig;
  logger?: ApiLogger;
}

/**
 * Result of an idempotent delete
 */
export interface DeleteResult {
  groupName: string;
  /** True when this call removed the group */
  deleted: boolean;
  /** True when the group was already gone */
  alreadyAbsent: boolean;
  attempts: number;
}

// =============================================================================
// Lifecycle Types
// =============================================================================

/**
 * Lifecycle states of a managed group
 */
export type LifecycleState =
  | 'non-existent'
  | 'creating'
  | 'configuring'
  | 'ready'
  | 'deleting';

/**
 * A recorded state change
 */
export interface TransitionRecord {
  from: LifecycleState;
  to: LifecycleState;
  reason: string;
  /** ISO 8601 timestamp */
  at: string;
}

/**
 * Desired state handed to the controller (already validated)
 */
export type DesiredGroup = ParameterGroup;

/**
 * Options for a lifecycle controller
 */
export interface ControllerOptions {
  /** Forwarded to every apply */
  apply?: Omit<ApplyOptions, 'dryRun' | 'logger'>;
  /** Forwarded to delete */
  delete?: Omit<DeleteOptions, 'logger'>;
  logger?: ApiLogger;
}

/**
 * Point-in-time view of a controller
 */
export interface ControllerSnapshot {
  /** Group identifier, or null when the group does not exist */
  id: string | null;
  state: LifecycleState;
  /** Last state read back from the remote */
  observed: ParameterGroup | null;
  history: TransitionRecord[];
}
