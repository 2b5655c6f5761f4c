/**
 * Idempotent parameter group deletion
 *
 * A group still attached to a cluster, or still settling a previous change,
 * reports an invalid state; that is retried for up to three minutes. A group
 * that is already gone counts as deleted.
 */

import type { ParameterGroupApi } from '../../api/client.js';
import { logger as defaultLogger } from '../../api/logger.js';
import { withRetry } from '../../api/retry.js';
import { toRemoteApiError, isInvalidStateError } from '../../api/errors.js';
import type { DeleteOptions, DeleteResult } from './types.js';
import { DELETE_RETRY_TIMEOUT_MS } from './types.js';
import { ParameterGroupError } from './errors.js';

const ALREADY_ABSENT = Symbol('already-absent');

/**
 * Delete a parameter group
 *
 * @throws ParameterGroupError on any failure other than "not found"
 */
export async function deleteParameterGroup(
  api: ParameterGroupApi,
  groupName: string,
  options: DeleteOptions = {}
): Promise<DeleteResult> {
  const log = (options.logger ?? defaultLogger).child({ group: groupName });

  const result = await withRetry(
    async (): Promise<typeof ALREADY_ABSENT | undefined> => {
      try {
        await api.deleteGroup(groupName);
        return undefined;
      } catch (error) {
        if (toRemoteApiError(error).isNotFound()) {
          return ALREADY_ABSENT;
        }
        throw error;
      }
    },
    {
      ...options.retry,
      timeoutMs: options.retry?.timeoutMs ?? DELETE_RETRY_TIMEOUT_MS,
      isRetryable: isInvalidStateError,
      operation: `delete of ${groupName}`,
      logger: log,
    }
  );

  if (!result.success) {
    throw new ParameterGroupError(
      'delete',
      groupName,
      `Error deleting parameter group "${groupName}"`,
      result.error
    );
  }

  const alreadyAbsent = result.data === ALREADY_ABSENT;
  if (alreadyAbsent) {
    log.info('Parameter group already absent');
  } else {
    log.info('Parameter group deleted', { attempts: result.attempts });
  }

  return {
    groupName,
    deleted: !alreadyAbsent,
    alreadyAbsent,
    attempts: result.attempts,
  };
}
