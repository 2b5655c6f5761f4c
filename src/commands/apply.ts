/**
 * apply command - Converge the remote group to the manifest
 *
 * A missing group is created, a changed family or description replaces
 * the group, anything else is an in-place parameter update.
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { ParameterGroup } from '../api/types.js';
import type { AppliedBatch, BatchOperation } from '../reconcilers/parameters/types.js';
import { ParameterGroupController } from '../reconcilers/parameters/lifecycle.js';
import { ParameterApplyError } from '../reconcilers/parameters/errors.js';
import type { GroupAction } from '../reconcilers/parameters/plan.js';
import { dryRunNotice, header, printPlan, success, verbose, warn } from '../utils/output.js';
import { planCommand, type PlanSummary } from './plan.js';
import { failureResult, loadDesiredGroup } from './shared.js';

/**
 * One call issued during apply
 */
export interface IssuedBatch {
  operation: BatchOperation;
  /** One-based, per operation */
  number: number;
  parameters: string[];
  attempts: number;
}

/**
 * Machine-readable apply outcome
 */
export interface ApplySummary {
  groupName: string;
  /** Null when apply failed before finishing */
  action: GroupAction | null;
  /** Whether the previous group was deleted for a replace */
  replaced: boolean;
  batches: IssuedBatch[];
  /** Group as read back afterwards */
  observed: ParameterGroup | null;
}

/**
 * Execute the apply command
 */
export async function applyCommand(
  ctx: CommandContext
): Promise<CommandResult<ApplySummary | PlanSummary>> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose('Executing apply command', globalOpts.verbose);

  if (globalOpts.dryRun) {
    if (outputFormat === 'human') {
      dryRunNotice();
    }
    return planCommand(ctx);
  }

  let controller: ParameterGroupController | undefined;
  let groupName = '';

  try {
    const { group: desired } = await loadDesiredGroup(ctx);
    groupName = desired.name;

    if (outputFormat === 'human') {
      header('Apply');
    }

    controller = new ParameterGroupController(ctx.createApi(), { logger: ctx.logger });
    const result = await controller.converge(desired);

    if (outputFormat === 'human') {
      printPlan(result.plan);
      console.log('');
    }

    const batches = toIssuedBatches(result.apply?.batches ?? []);

    const message =
      result.plan.action === 'none'
        ? `Parameter group ${desired.name} is up to date`
        : `Applied ${result.plan.action} to parameter group ${desired.name} (${batches.length} call(s))`;

    if (outputFormat === 'human') {
      success(message);
    }

    return {
      success: true,
      message,
      data: {
        groupName: desired.name,
        action: result.plan.action,
        replaced: result.deleted !== undefined,
        batches,
        observed: result.group,
      },
    };
  } catch (err) {
    if (err instanceof ParameterApplyError && err.isPartial() && outputFormat === 'human') {
      warn(`Parameter group ${err.groupName} was partially updated; run apply again to finish`);
    }
    // The controller reads the group back after a failed batch
    const data: ApplySummary = {
      groupName,
      action: null,
      replaced: false,
      batches: err instanceof ParameterApplyError ? toIssuedBatches(err.completed) : [],
      observed: controller?.observed ?? null,
    };
    return failureResult(ctx, 'Apply', err, data);
  }
}

function toIssuedBatches(applied: AppliedBatch[]): IssuedBatch[] {
  return applied.map((batch) => ({
    operation: batch.operation,
    number: batch.index + 1,
    parameters: batch.parameters.map((p) => p.name),
    attempts: batch.attempts,
  }));
}
