/**
 * Shared types and interfaces for the param-sync CLI
 */

import type { ParameterGroupApi } from './api/client.js';
import type { ApiLogger } from './api/logger.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Path to the desired-state manifest */
  manifest?: string;
  /** AWS region override */
  region?: string;
  /** Endpoint override (e.g. a local emulator) */
  endpoint?: string;
  /** Show what would change without applying */
  dryRun: boolean;
  /** Output as JSON */
  json: boolean;
  /** Enable verbose output */
  verbose: boolean;
}

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Execution context passed to commands
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  /** Builds the remote client; commands call it once they need the API */
  createApi: () => ParameterGroupApi;
  logger: ApiLogger;
}

// ============================================================================
// Command Results
// ============================================================================

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}
