/**
 * Parameter apply operations
 *
 * Sends a parameter diff to the remote in batches:
 * 1. Every removal batch is reset to defaults, in order
 * 2. Only then is every addition batch modified, in order
 *
 * A reset that races the remote's own bookkeeping for a previous reset is
 * retried within a short time budget. Modify calls are not retried. Any
 * failure aborts the remaining batches; nothing already applied is rolled
 * back.
 */

import type { ParameterGroupApi } from '../../api/client.js';
import type { Parameter } from '../../api/types.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import { withRetry } from '../../api/retry.js';
import { isPendingChangesError } from '../../api/errors.js';
import type {
  AppliedBatch,
  ApplyOptions,
  ApplyResult,
  BatchOperation,
  ParameterDiffResult,
} from './types.js';
import { MAX_PARAMETERS_PER_CALL, RESET_RETRY_TIMEOUT_MS } from './types.js';
import { batch } from './batch.js';
import { ParameterApplyError } from './errors.js';

/**
 * Batches planned for a diff, removals first
 */
export interface BatchPlan {
  reset: Parameter[][];
  modify: Parameter[][];
}

/**
 * Split a diff into the batches that would be sent
 */
export function planBatches(
  diff: Pick<ParameterDiffResult, 'toRemove' | 'toAdd'>,
  maxBatchSize: number = MAX_PARAMETERS_PER_CALL
): BatchPlan {
  return {
    reset: batch(diff.toRemove, maxBatchSize),
    modify: batch(diff.toAdd, maxBatchSize),
  };
}

/**
 * Reset one batch, retrying while the remote reports pending changes
 *
 * @returns Attempts made
 */
export async function resetBatch(
  api: ParameterGroupApi,
  groupName: string,
  parameters: Parameter[],
  options: Pick<ApplyOptions, 'resetRetry' | 'logger'> = {}
): Promise<number> {
  const result = await withRetry(() => api.resetParameters(groupName, parameters), {
    ...options.resetRetry,
    timeoutMs: options.resetRetry?.timeoutMs ?? RESET_RETRY_TIMEOUT_MS,
    isRetryable: isPendingChangesError,
    operation: `reset of ${parameters.length} parameter(s) on ${groupName}`,
    logger: options.logger,
  });

  if (!result.success) {
    throw result.error ?? new Error('Reset failed');
  }
  return result.attempts;
}

/**
 * Modify one batch; no retry
 */
export async function modifyBatch(
  api: ParameterGroupApi,
  groupName: string,
  parameters: Parameter[]
): Promise<number> {
  await api.modifyParameters(groupName, parameters);
  return 1;
}

/**
 * Apply a parameter diff to a group
 *
 * @param api - Remote API
 * @param groupName - Canonical group name
 * @param diff - Output of diffParameters
 * @param options - Apply options
 * @throws ParameterApplyError when a batch fails
 */
export async function applyParameterDiff(
  api: ParameterGroupApi,
  groupName: string,
  diff: Pick<ParameterDiffResult, 'toRemove' | 'toAdd'>,
  options: ApplyOptions = {}
): Promise<ApplyResult> {
  const { dryRun = false, maxBatchSize = MAX_PARAMETERS_PER_CALL } = options;
  const log = (options.logger ?? defaultLogger).child({ group: groupName });
  const plan = planBatches(diff, maxBatchSize);

  log.debug('Parameters to reset', { parameters: diff.toRemove });
  log.debug('Parameters to modify', { parameters: diff.toAdd });

  if (dryRun) {
    const batches: AppliedBatch[] = [
      ...plan.reset.map((parameters, index) => planned('reset', index, parameters)),
      ...plan.modify.map((parameters, index) => planned('modify', index, parameters)),
    ];
    return {
      groupName,
      batches,
      resetCount: plan.reset.length,
      modifyCount: plan.modify.length,
      dryRun: true,
    };
  }

  const completed: AppliedBatch[] = [];

  const run = async (
    operation: BatchOperation,
    batches: Parameter[][],
    send: (parameters: Parameter[]) => Promise<number>
  ): Promise<void> => {
    for (const [index, parameters] of batches.entries()) {
      log.debug(`Issuing ${operation} batch ${index + 1}/${batches.length}`, {
        parameters: parameters.map((p) => p.name),
      });

      let attempts: number;
      try {
        attempts = await send(parameters);
      } catch (error) {
        const failure = new ParameterApplyError(
          groupName,
          operation,
          index,
          batches.length,
          [...completed],
          error
        );
        if (failure.isPartial()) {
          log.warn('Parameter group partially updated', {
            completedBatches: completed.length,
            failedOperation: operation,
            failedBatch: index + 1,
          });
        }
        throw failure;
      }

      completed.push({ operation, index, parameters, attempts });
    }
  };

  await run('reset', plan.reset, (parameters) =>
    resetBatch(api, groupName, parameters, { resetRetry: options.resetRetry, logger: log })
  );
  await run('modify', plan.modify, (parameters) => modifyBatch(api, groupName, parameters));

  return {
    groupName,
    batches: completed,
    resetCount: plan.reset.length,
    modifyCount: plan.modify.length,
    dryRun: false,
  };
}

function planned(operation: BatchOperation, index: number, parameters: Parameter[]): AppliedBatch {
  return { operation, index, parameters, attempts: 0 };
}

/**
 * Format an apply result for display
 */
export function formatApplyResult(result: ApplyResult): string {
  const prefix = result.dryRun ? '[DRY RUN] Would apply' : 'Applied';
  if (result.batches.length === 0) {
    return `${prefix} no parameter changes to ${result.groupName}`;
  }
  const lines = [
    `${prefix} ${result.resetCount} reset batch(es) and ${result.modifyCount} modify batch(es) to ${result.groupName}`,
  ];
  for (const applied of result.batches) {
    const retries = applied.attempts > 1 ? ` after ${applied.attempts} attempts` : '';
    lines.push(
      `  ${applied.operation} #${applied.index + 1}: ${applied.parameters.length} parameter(s)${retries}`
    );
  }
  return lines.join('\n');
}
