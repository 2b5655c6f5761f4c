/**
 * Parameter group API module
 *
 * Provides:
 * - ParameterGroupApi backed by the AWS SDK Neptune client
 * - Time-budgeted retry
 * - JSON logging with secret redaction
 * - Error normalisation for remote failures
 */

// Main client
export {
  createClient,
  fromRemoteParameter,
  toRemoteParameter,
  USER_PARAMETER_SOURCE,
  DESCRIBE_PAGE_SIZE,
} from './client.js';

export type { ParameterGroupApi } from './client.js';

// Errors
export {
  RemoteApiError,
  ERROR_CODES,
  PENDING_CHANGES_MESSAGE,
  normalizeErrorCode,
  toRemoteApiError,
  isNotFoundError,
  isInvalidStateError,
  isPendingChangesError,
} from './errors.js';

// Retry utilities
export { withRetry, calculateDelay, sleep, DEFAULT_RETRY_CONFIG } from './retry.js';

export type { RetryOptions } from './retry.js';

// Logging
export {
  ApiLogger,
  logger,
  createLogger,
  parseLogLevel,
  redactString,
  redactPatterns,
  redactValue,
  redactObject,
} from './logger.js';

export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

// Types
export type {
  ApplyMethod,
  Parameter,
  ParameterSource,
  GroupDescription,
  ParameterGroup,
  CreateGroupRequest,
  ApiErrorInfo,
  ParameterGroupClientConfig,
  RetryConfig,
  RetryResult,
} from './types.js';

export { APPLY_METHODS } from './types.js';
