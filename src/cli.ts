#!/usr/bin/env node
/**
 * param-sync CLI - Reconcile Neptune DB parameter groups with a manifest
 *
 * Commands:
 * - plan: Show what would change on the remote group
 * - apply: Create, update or replace the group to match the manifest
 * - status: Show the observed group
 * - import: Write an existing group out as a manifest
 * - destroy: Delete the group
 */

import { Command, Option } from 'commander';
import type { GlobalOptions, CommandContext, CommandResult } from './types.js';
import {
  planCommand,
  applyCommand,
  statusCommand,
  importCommand,
  destroyCommand,
} from './commands/index.js';
import type { ImportOptions } from './commands/index.js';
import { createClient } from './api/client.js';
import { createLogger, logger } from './api/logger.js';
import { printResult, error } from './utils/output.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  const commandLogger = options.verbose
    ? createLogger({ ...logger.getConfig(), level: 'debug' })
    : logger;

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    createApi: () =>
      createClient({
        region: options.region,
        endpoint: options.endpoint,
        debug: options.verbose,
      }),
    logger: commandLogger,
  };
}

/**
 * Print a JSON result and exit with its status
 */
function finish<T>(ctx: CommandContext, result: CommandResult<T>): never {
  if (ctx.outputFormat === 'json') {
    printResult(result);
  }
  process.exit(result.success ? 0 : 1);
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('param-sync')
  .description('Reconcile Neptune DB parameter groups with a declarative manifest')
  .version(VERSION)
  // Global options available to all commands
  .addOption(
    new Option('-m, --manifest <path>', 'Desired-state manifest (YAML or JSON)')
      .env('PARAM_SYNC_MANIFEST')
  )
  .addOption(
    new Option('--region <region>', 'AWS region')
      .env('PARAM_SYNC_REGION')
  )
  .addOption(
    new Option('--endpoint <url>', 'Override the service endpoint')
      .env('PARAM_SYNC_ENDPOINT')
  )
  .addOption(
    new Option('--dry-run', 'Show what would happen without making changes')
      .default(false)
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * plan command - Show pending changes
 */
program
  .command('plan')
  .description('Show what apply would change')
  .action(async () => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      finish(ctx, await planCommand(ctx));
    } catch (err) {
      error(`Plan failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

/**
 * apply command - Converge the remote group
 */
program
  .command('apply')
  .description('Create, update or replace the parameter group to match the manifest')
  .action(async () => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      finish(ctx, await applyCommand(ctx));
    } catch (err) {
      error(`Apply failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

/**
 * status command - Show the observed group
 */
program
  .command('status')
  .description('Show the current state of the parameter group')
  .argument('[group]', 'Group name (defaults to the manifest group)')
  .action(async (group: string | undefined) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      finish(ctx, await statusCommand(ctx, { group }));
    } catch (err) {
      error(`Status failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

/**
 * import command - Adopt an existing group as a manifest
 */
program
  .command('import')
  .description('Read an existing parameter group and print it as a manifest')
  .argument('<group>', 'Group name')
  .option('-o, --out <path>', 'Write the manifest to a file')
  .action(async (group: string, cmdOpts: ImportOptions) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      finish(ctx, await importCommand(ctx, group, { out: cmdOpts.out }));
    } catch (err) {
      error(`Import failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

/**
 * destroy command - Delete the group
 */
program
  .command('destroy')
  .description('Delete the parameter group (succeeds if it is already gone)')
  .argument('[group]', 'Group name (defaults to the manifest group)')
  .action(async (group: string | undefined) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      finish(ctx, await destroyCommand(ctx, { group }));
    } catch (err) {
      error(`Destroy failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

// Parse and execute
await program.parseAsync(process.argv);
