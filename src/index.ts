/**
 * param-sync library entrypoint
 *
 * The CLI lives in cli.ts; this module exposes the reconciler for use from
 * other programs.
 */

export * from './api/index.js';
export * from './reconcilers/parameters/index.js';
export * from './config/index.js';
export * from './commands/index.js';
export type { GlobalOptions, CommandContext, CommandResult, OutputFormat } from './types.js';
