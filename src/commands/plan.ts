/**
 * plan command - Show what apply would change on the remote group
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { Parameter } from '../api/types.js';
import { ParameterGroupController } from '../reconcilers/parameters/lifecycle.js';
import {
  planGroupChange,
  type ForceNewChange,
  type GroupAction,
  type GroupPlan,
} from '../reconcilers/parameters/plan.js';
import { header, info, printPlan, success, verbose } from '../utils/output.js';
import { failureResult, loadDesiredGroup } from './shared.js';

/**
 * Machine-readable plan
 */
export interface PlanSummary {
  groupName: string;
  action: GroupAction;
  forceNew: ForceNewChange[];
  toRemove: Parameter[];
  toAdd: Parameter[];
  /** Parameter names per call, in issue order */
  batches: {
    reset: string[][];
    modify: string[][];
  };
}

export function summarizePlan(plan: GroupPlan): PlanSummary {
  const names = (batches: Parameter[][]): string[][] =>
    batches.map((parameters) => parameters.map((p) => p.name));

  return {
    groupName: plan.groupName,
    action: plan.action,
    forceNew: plan.forceNew,
    toRemove: plan.diff.toRemove,
    toAdd: plan.diff.toAdd,
    batches: {
      reset: names(plan.batches.reset),
      modify: names(plan.batches.modify),
    },
  };
}

export function describePlan(plan: GroupPlan): string {
  if (plan.action === 'none') {
    return `Parameter group ${plan.groupName} is up to date`;
  }
  return (
    `Plan: ${plan.action} parameter group ${plan.groupName} ` +
    `(${plan.diff.toRemove.length} to reset, ${plan.diff.toAdd.length} to set)`
  );
}

/**
 * Execute the plan command
 * Reads the remote group and diffs it against the manifest
 */
export async function planCommand(ctx: CommandContext): Promise<CommandResult<PlanSummary>> {
  const { outputFormat } = ctx;

  verbose('Executing plan command', ctx.options.verbose);

  try {
    const { group: desired } = await loadDesiredGroup(ctx);

    if (outputFormat === 'human') {
      header('Plan');
      info(`Reading parameter group ${desired.name}...`);
    }

    const controller = new ParameterGroupController(ctx.createApi(), { logger: ctx.logger });
    const observed = await controller.adopt(desired.name);
    const plan = planGroupChange(observed, desired);
    const message = describePlan(plan);

    if (outputFormat === 'human') {
      printPlan(plan);
      console.log('');
      success(message);
    }

    return {
      success: true,
      message,
      data: summarizePlan(plan),
    };
  } catch (err) {
    return failureResult(ctx, 'Plan', err);
  }
}
