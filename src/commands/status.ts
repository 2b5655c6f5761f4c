/**
 * status command - Show the observed state of a parameter group
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { ParameterGroup } from '../api/types.js';
import { ParameterGroupController } from '../reconcilers/parameters/lifecycle.js';
import { info, printGroup, verbose } from '../utils/output.js';
import { failureResult, resolveGroupName } from './shared.js';

export interface StatusOptions {
  /** Group to inspect; defaults to the manifest's group */
  group?: string;
}

export interface GroupStatus {
  groupName: string;
  exists: boolean;
  group: ParameterGroup | null;
}

/**
 * Execute the status command
 */
export async function statusCommand(
  ctx: CommandContext,
  options: StatusOptions = {}
): Promise<CommandResult<GroupStatus>> {
  const { outputFormat } = ctx;

  verbose('Executing status command', ctx.options.verbose);

  try {
    const groupName = await resolveGroupName(ctx, options.group);
    verbose(`Group: ${groupName}`, ctx.options.verbose);

    const controller = new ParameterGroupController(ctx.createApi(), { logger: ctx.logger });
    const group = await controller.adopt(groupName);

    if (outputFormat === 'human') {
      if (group) {
        printGroup(group);
      } else {
        info(`Parameter group ${groupName} does not exist`);
      }
    }

    return {
      success: true,
      message: group
        ? `Parameter group ${groupName} has ${group.parameters.length} user parameter(s)`
        : `Parameter group ${groupName} does not exist`,
      data: { groupName, exists: group !== null, group },
    };
  } catch (err) {
    return failureResult(ctx, 'Status', err);
  }
}
