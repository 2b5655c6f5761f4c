/**
 * Remote API error normalisation
 *
 * The AWS SDK throws service exceptions whose `name` is the modeled fault
 * (e.g. `DBParameterGroupNotFoundFault`). Everything above the client works
 * with RemoteApiError and its classifiers instead of SDK types.
 */

import type { ApiErrorInfo } from './types.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Remote error codes the reconciler distinguishes
 */
export const ERROR_CODES = {
  GROUP_NOT_FOUND: 'DBParameterGroupNotFound',
  INVALID_GROUP_STATE: 'InvalidDBParameterGroupState',
  GROUP_ALREADY_EXISTS: 'DBParameterGroupAlreadyExists',
} as const;

/**
 * Message fragment the remote uses when a reset races a previous one
 */
export const PENDING_CHANGES_MESSAGE = ' has pending changes';

const FAULT_SUFFIX = 'Fault';

// =============================================================================
// Error Class
// =============================================================================

/**
 * A failed call against the remote parameter group service
 */
export class RemoteApiError extends Error {
  /** Error code with any `Fault` suffix removed */
  public readonly code: string;
  /** HTTP status, when the transport reported one */
  public readonly status?: number;
  /** Remote request id for support tickets */
  public readonly requestId?: string;

  constructor(
    message: string,
    code: string,
    options?: {
      status?: number;
      requestId?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'RemoteApiError';
    this.code = code;
    this.status = options?.status;
    this.requestId = options?.requestId;
  }

  /**
   * Convert to a plain object for JSON output
   */
  toErrorInfo(): ApiErrorInfo {
    return {
      code: this.code,
      message: this.message,
      status: this.status,
      requestId: this.requestId,
    };
  }

  /**
   * The group does not exist
   */
  isNotFound(): boolean {
    return this.code === ERROR_CODES.GROUP_NOT_FOUND;
  }

  /**
   * The group is busy with another operation
   */
  isInvalidState(): boolean {
    return this.code === ERROR_CODES.INVALID_GROUP_STATE;
  }

  /**
   * A previous parameter reset has not finished yet
   */
  hasPendingChanges(): boolean {
    return this.isInvalidState() && this.message.includes(PENDING_CHANGES_MESSAGE);
  }
}

// =============================================================================
// Normalisation
// =============================================================================

function readMetadata(error: object): { status?: number; requestId?: string } {
  if (!('$metadata' in error)) return {};
  const metadata = error.$metadata;
  if (typeof metadata !== 'object' || metadata === null) return {};

  const status =
    'httpStatusCode' in metadata && typeof metadata.httpStatusCode === 'number'
      ? metadata.httpStatusCode
      : undefined;
  const requestId =
    'requestId' in metadata && typeof metadata.requestId === 'string'
      ? metadata.requestId
      : undefined;

  return { status, requestId };
}

/**
 * Strip the SDK's `Fault` suffix so codes match the wire error codes
 */
export function normalizeErrorCode(name: string): string {
  return name.endsWith(FAULT_SUFFIX) ? name.slice(0, -FAULT_SUFFIX.length) : name;
}

/**
 * Wrap anything thrown by the SDK into a RemoteApiError
 */
export function toRemoteApiError(error: unknown): RemoteApiError {
  if (error instanceof RemoteApiError) {
    return error;
  }

  if (error instanceof Error) {
    const { status, requestId } = readMetadata(error);
    const code =
      'Code' in error && typeof error.Code === 'string'
        ? error.Code
        : normalizeErrorCode(error.name);
    return new RemoteApiError(error.message, code, { status, requestId, cause: error });
  }

  return new RemoteApiError(String(error), 'Unknown', { cause: error });
}

/**
 * Whether an error reports a missing parameter group
 */
export function isNotFoundError(error: unknown): boolean {
  return toRemoteApiError(error).isNotFound();
}

/**
 * Whether an error reports a group in an invalid (busy) state
 */
export function isInvalidStateError(error: unknown): boolean {
  return toRemoteApiError(error).isInvalidState();
}

/**
 * Whether an error reports a reset still in progress
 */
export function isPendingChangesError(error: unknown): boolean {
  return toRemoteApiError(error).hasPendingChanges();
}
