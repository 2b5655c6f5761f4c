/**
 * destroy command - Delete a parameter group
 *
 * Deleting a group that is already gone succeeds.
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { DeleteResult } from '../reconcilers/parameters/types.js';
import { deleteParameterGroup } from '../reconcilers/parameters/delete.js';
import { dryRunNotice, info, success, verbose } from '../utils/output.js';
import { failureResult, resolveGroupName } from './shared.js';

export interface DestroyOptions {
  /** Group to delete; defaults to the manifest's group */
  group?: string;
}

/**
 * Execute the destroy command
 */
export async function destroyCommand(
  ctx: CommandContext,
  options: DestroyOptions = {}
): Promise<CommandResult<DeleteResult>> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose('Executing destroy command', globalOpts.verbose);

  try {
    const groupName = await resolveGroupName(ctx, options.group);

    if (globalOpts.dryRun) {
      if (outputFormat === 'human') {
        dryRunNotice();
        info(`Would delete parameter group ${groupName}`);
      }
      return {
        success: true,
        message: `[DRY RUN] Would delete parameter group ${groupName}`,
      };
    }

    const result = await deleteParameterGroup(ctx.createApi(), groupName, { logger: ctx.logger });
    const message = result.alreadyAbsent
      ? `Parameter group ${groupName} was already absent`
      : `Deleted parameter group ${groupName}`;

    if (outputFormat === 'human') {
      success(message);
    }

    return { success: true, message, data: result };
  } catch (err) {
    return failureResult(ctx, 'Destroy', err);
  }
}
