/**
 * Helpers shared by the group commands
 */

import type { CommandContext, CommandResult } from '../types.js';
import { loadManifest, type ManifestLoadResult } from '../config/manifest.js';
import { ManifestError } from '../config/errors.js';
import { ParameterApplyError } from '../reconcilers/parameters/errors.js';
import { RemoteApiError } from '../api/errors.js';
import { error as printError, warn, verbose } from '../utils/output.js';

/**
 * Load the manifest named by --manifest or PARAM_SYNC_MANIFEST
 *
 * @throws ManifestError when no manifest is configured or it is invalid
 */
export async function loadDesiredGroup(ctx: CommandContext): Promise<ManifestLoadResult> {
  const manifestPath = ctx.options.manifest;
  if (!manifestPath) {
    throw new ManifestError(
      'No manifest specified. Use --manifest <path> or set PARAM_SYNC_MANIFEST',
      'MANIFEST_NOT_FOUND'
    );
  }

  verbose(`Loading manifest ${manifestPath}`, ctx.options.verbose);
  const loaded = await loadManifest(manifestPath);

  if (ctx.outputFormat === 'human') {
    for (const issue of loaded.warnings) {
      warn(`${issue.path}: ${issue.message}`);
    }
  }
  return loaded;
}

/**
 * Group name given on the command line, else the manifest's
 */
export async function resolveGroupName(
  ctx: CommandContext,
  explicitName?: string
): Promise<string> {
  if (explicitName) {
    return explicitName.toLowerCase();
  }
  const { group } = await loadDesiredGroup(ctx);
  return group.name;
}

/**
 * Detail lines for a failed command
 */
export function describeFailure(err: unknown): string[] {
  if (err instanceof ManifestError) {
    return err.errors.map((issue) => `[${issue.code}] ${issue.path}: ${issue.message}`);
  }

  const lines: string[] = [];
  if (err instanceof ParameterApplyError) {
    for (const applied of err.completed) {
      lines.push(
        `${applied.operation} batch ${applied.index + 1} was applied (${applied.parameters.length} parameter(s))`
      );
    }
  }

  const cause = err instanceof Error ? err.cause : undefined;
  if (cause instanceof RemoteApiError) {
    const request = cause.requestId ? ` (request ${cause.requestId})` : '';
    lines.push(`Remote error ${cause.code}${request}`);
  }

  if (err instanceof ParameterApplyError && err.readBackError) {
    lines.push(`Read-back failed, state shown is projected: ${err.readBackError.message}`);
  }
  return lines;
}

/**
 * Build (and in human mode, print) a failed command result
 */
export function failureResult<T>(
  ctx: CommandContext,
  action: string,
  err: unknown,
  data?: T
): CommandResult<T> {
  const errorMsg = err instanceof Error ? err.message : String(err);
  const errors = describeFailure(err);

  if (ctx.outputFormat === 'human') {
    printError(`${action} failed: ${errorMsg}`);
    for (const line of errors) {
      console.log(`  • ${line}`);
    }
  }

  return {
    success: false,
    message: `${action} failed: ${errorMsg}`,
    data,
    errors: errors.length > 0 ? errors : undefined,
  };
}
