/**
 * Split a sequence into order-preserving chunks of at most `maxSize` items
 */

import { MAX_PARAMETERS_PER_CALL } from './types.js';

export function batch<T>(
  items: readonly T[],
  maxSize: number = MAX_PARAMETERS_PER_CALL
): T[][] {
  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${maxSize}`);
  }

  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += maxSize) {
    batches.push(items.slice(start, start + maxSize));
  }
  return batches;
}
