/**
 * Error classes for parameter group reconciliation
 */

import type { AppliedBatch, BatchOperation, LifecycleState } from './types.js';

/**
 * Lifecycle operations that can fail fatally
 */
export type GroupOperation = 'create' | 'read' | 'update' | 'delete' | 'import';

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * A reset or modify batch failed; earlier batches are already applied
 *
 * `readBackError` is set when reading the group afterwards failed too.
 */
export class ParameterApplyError extends Error {
  constructor(
    public readonly groupName: string,
    public readonly operation: BatchOperation,
    public readonly batchIndex: number,
    public readonly batchCount: number,
    public readonly completed: AppliedBatch[],
    cause: unknown,
    public readonly readBackError?: ParameterGroupError
  ) {
    const verb = operation === 'reset' ? 'resetting' : 'modifying';
    super(
      `Error ${verb} parameter group "${groupName}" (batch ${batchIndex + 1} of ${batchCount}): ${causeMessage(cause)}`,
      { cause }
    );
    this.name = 'ParameterApplyError';
  }

  /**
   * Whether any batch reached the remote before the failure
   */
  isPartial(): boolean {
    return this.completed.length > 0;
  }

  withReadBackError(readBackError: ParameterGroupError): ParameterApplyError {
    return new ParameterApplyError(
      this.groupName,
      this.operation,
      this.batchIndex,
      this.batchCount,
      this.completed,
      this.cause,
      readBackError
    );
  }
}

/**
 * A lifecycle operation failed
 */
export class ParameterGroupError extends Error {
  constructor(
    public readonly operation: GroupOperation,
    public readonly groupId: string,
    message: string,
    cause?: unknown
  ) {
    super(
      cause === undefined ? message : `${message}: ${causeMessage(cause)}`,
      { cause }
    );
    this.name = 'ParameterGroupError';
  }
}

/**
 * The controller was asked for a state change its state machine forbids
 */
export class LifecycleTransitionError extends Error {
  constructor(
    public readonly from: LifecycleState,
    public readonly to: LifecycleState
  ) {
    super(`Illegal lifecycle transition: ${from} -> ${to}`);
    this.name = 'LifecycleTransitionError';
  }
}
