/**
 * import command - Turn an existing parameter group into a manifest
 */

import { writeFile } from 'node:fs/promises';
import type { CommandContext, CommandResult } from '../types.js';
import { ParameterGroupController } from '../reconcilers/parameters/lifecycle.js';
import { stringifyManifest, toManifestDocument, type ManifestDocument } from '../config/manifest.js';
import { success, verbose } from '../utils/output.js';
import { failureResult } from './shared.js';

export interface ImportOptions {
  /** Write the manifest here instead of printing it */
  out?: string;
}

/**
 * Execute the import command
 */
export async function importCommand(
  ctx: CommandContext,
  groupId: string,
  options: ImportOptions = {}
): Promise<CommandResult<ManifestDocument>> {
  const { outputFormat } = ctx;

  verbose(`Executing import command for ${groupId}`, ctx.options.verbose);

  try {
    const controller = new ParameterGroupController(ctx.createApi(), { logger: ctx.logger });
    const group = await controller.import(groupId);
    const document = toManifestDocument(group);

    if (options.out) {
      await writeFile(options.out, stringifyManifest(group), 'utf-8');
      if (outputFormat === 'human') {
        success(`Wrote manifest for ${group.name} to ${options.out}`);
      }
    } else if (outputFormat === 'human') {
      process.stdout.write(stringifyManifest(group));
    }

    return {
      success: true,
      message: `Imported parameter group ${group.name} (${group.parameters.length} user parameter(s))`,
      data: document,
    };
  } catch (err) {
    return failureResult(ctx, 'Import', err);
  }
}
