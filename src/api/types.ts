/**
 * Entity and configuration types for the parameter group API
 *
 * These mirror the subset of the Neptune DBParameterGroup model that the
 * reconciler reads and writes. The AWS SDK shapes stay inside client.ts.
 */

// =============================================================================
// Parameter Types
// =============================================================================

/**
 * How the remote service should apply a modified parameter
 */
export type ApplyMethod = 'immediate' | 'pending-reboot';

/**
 * All valid apply methods, in display order
 */
export const APPLY_METHODS: readonly ApplyMethod[] = ['immediate', 'pending-reboot'];

/**
 * A single tuning parameter
 *
 * `applyMethod` is a directive for the outgoing mutation call only. The
 * remote never reports it back, so observed parameters carry an empty
 * string there.
 */
export interface Parameter {
  /** Parameter name (case-sensitive) */
  name: string;
  /** Parameter value, compared case-insensitively */
  value: string;
  /** Apply method, or '' when read back from the remote */
  applyMethod: ApplyMethod | '';
}

/**
 * Where a remote parameter value came from
 */
export type ParameterSource = 'user' | 'system' | 'engine-default';

// =============================================================================
// Group Types
// =============================================================================

/**
 * Immutable attributes of a parameter group, as the remote describes them
 */
export interface GroupDescription {
  /** Canonical group name */
  name: string;
  /** Parameter group family (e.g. neptune1) */
  family: string;
  /** Free-form description */
  description: string;
  /** ARN, when the remote reports one */
  arn?: string;
}

/**
 * A parameter group with its user-set parameters
 */
export interface ParameterGroup {
  /** Canonical (lower-cased) group name; also the identifier */
  name: string;
  /** Parameter group family, selects the schema dialect */
  family: string;
  /** Description, fixed after creation */
  description: string;
  /** User-origin parameters, in remote order */
  parameters: Parameter[];
}

/**
 * Request to create a parameter group
 */
export interface CreateGroupRequest {
  name: string;
  family: string;
  description: string;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Serializable form of a remote failure
 */
export interface ApiErrorInfo {
  /** Remote error code (e.g. DBParameterGroupNotFound) */
  code: string;
  /** Error message from the remote */
  message: string;
  /** HTTP status code, when known */
  status?: number;
  /** Remote request id */
  requestId?: string;
}

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Parameter group client configuration options
 */
export interface ParameterGroupClientConfig {
  /** AWS region (defaults to PARAM_SYNC_REGION, then AWS_REGION) */
  region?: string;
  /** Endpoint override, e.g. for a local emulator */
  endpoint?: string;
  /** Maximum SDK-level attempts per call (default: 3) */
  maxAttempts?: number;
  /** Enable debug logging */
  debug?: boolean;
}

// =============================================================================
// Retry Configuration
// =============================================================================

/**
 * Retry configuration options
 */
export interface RetryConfig {
  /** Total time budget for all attempts in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs?: number;
  /** Maximum delay between attempts in milliseconds (default: 10000) */
  maxDelayMs?: number;
  /** Jitter factor (0-1) to add randomness (default: 0.1) */
  jitterFactor?: number;
}

/**
 * Result of a retry operation
 */
export interface RetryResult<T> {
  /** Whether the operation succeeded */
  success: boolean;
  /** The result data (if successful) */
  data?: T;
  /** The error (if failed) */
  error?: Error;
  /** Number of attempts made */
  attempts: number;
  /** Total time spent on retries (ms) */
  totalTimeMs: number;
  /** Whether the failure came from running out of time budget */
  timedOut?: boolean;
}
