/**
 * Unit Tests: Parameter Apply Operations
 *
 * Tests the batched apply of a parameter diff including:
 * - Every reset batch issued before any modify batch
 * - Retry of resets that race pending changes
 * - No retry of modifies
 * - Dry-run mode
 * - Partial failure reporting
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import {
  applyParameterDiff,
  formatApplyResult,
} from '../../src/reconcilers/parameters/apply.js';
import { ParameterApplyError } from '../../src/reconcilers/parameters/errors.js';
import type { ParameterGroupApi } from '../../src/api/client.js';
import type { Parameter } from '../../src/api/types.js';
import { RemoteApiError } from '../../src/api/errors.js';
import {
  invalidStateError,
  makeParameters,
  pendingChangesError,
} from '../helpers/fake-neptune.js';

// =============================================================================
// Mock Client Factory
// =============================================================================

type BatchCall = (groupName: string, parameters: Parameter[]) => Promise<void>;

interface MockApi {
  api: ParameterGroupApi;
  resetParameters: Mock<BatchCall>;
  modifyParameters: Mock<BatchCall>;
  /** Calls in issue order as "operation:size" */
  order: string[];
}

function createMockApi(): MockApi {
  const order: string[] = [];
  const resetParameters = vi.fn<BatchCall>(async (_group, parameters) => {
    order.push(`reset:${parameters.length}`);
  });
  const modifyParameters = vi.fn<BatchCall>(async (_group, parameters) => {
    order.push(`modify:${parameters.length}`);
  });

  const api: ParameterGroupApi = {
    createGroup: vi.fn(),
    describeGroup: vi.fn(),
    describeUserParameters: vi.fn(),
    resetParameters,
    modifyParameters,
    deleteGroup: vi.fn(),
    getConfig: () => ({}),
  };

  return { api, resetParameters, modifyParameters, order };
}

// =============================================================================
// Tests
// =============================================================================

describe('applyParameterDiff', () => {
  let mock: MockApi;

  beforeEach(() => {
    mock = createMockApi();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('issues every reset batch before any modify batch', async () => {
    const diff = { toRemove: makeParameters(25, 'old'), toAdd: makeParameters(23, 'new', 30) };

    const result = await applyParameterDiff(mock.api, 'g', diff);

    expect(mock.order).toEqual(['reset:20', 'reset:5', 'modify:20', 'modify:3']);
    expect(result.resetCount).toBe(2);
    expect(result.modifyCount).toBe(2);
    expect(result.dryRun).toBe(false);
    expect(result.batches.map((b) => [b.operation, b.index, b.attempts])).toEqual([
      ['reset', 0, 1],
      ['reset', 1, 1],
      ['modify', 0, 1],
      ['modify', 1, 1],
    ]);
  });

  it('sends batches in input order', async () => {
    const toAdd = makeParameters(21);

    await applyParameterDiff(mock.api, 'g', { toRemove: [], toAdd });

    expect(mock.modifyParameters).toHaveBeenNthCalledWith(1, 'g', toAdd.slice(0, 20));
    expect(mock.modifyParameters).toHaveBeenNthCalledWith(2, 'g', toAdd.slice(20));
  });

  it('makes no calls for an empty diff', async () => {
    const result = await applyParameterDiff(mock.api, 'g', { toRemove: [], toAdd: [] });

    expect(mock.order).toEqual([]);
    expect(result.batches).toEqual([]);
  });

  it('plans batches without calling the API in dry-run mode', async () => {
    const diff = { toRemove: makeParameters(2, 'old'), toAdd: makeParameters(22, 'new') };

    const result = await applyParameterDiff(mock.api, 'g', diff, { dryRun: true });

    expect(mock.order).toEqual([]);
    expect(result.dryRun).toBe(true);
    expect(result.batches.map((b) => [b.operation, b.parameters.length, b.attempts])).toEqual([
      ['reset', 2, 0],
      ['modify', 20, 0],
      ['modify', 2, 0],
    ]);
  });

  it('honours a smaller batch size', async () => {
    await applyParameterDiff(mock.api, 'g', { toRemove: [], toAdd: makeParameters(5) }, { maxBatchSize: 2 });

    expect(mock.order).toEqual(['modify:2', 'modify:2', 'modify:1']);
  });

  it('retries a reset that reports pending changes', async () => {
    vi.useFakeTimers();
    mock.resetParameters
      .mockRejectedValueOnce(pendingChangesError('g'))
      .mockRejectedValueOnce(pendingChangesError('g'));

    const promise = applyParameterDiff(mock.api, 'g', {
      toRemove: makeParameters(1, 'old'),
      toAdd: makeParameters(1, 'new'),
    });
    await vi.runAllTimersAsync();
    const result = await promise;

    expect(mock.resetParameters).toHaveBeenCalledTimes(3);
    expect(mock.modifyParameters).toHaveBeenCalledTimes(1);
    expect(result.batches[0]?.attempts).toBe(3);
  });

  it('gives up on a reset once its time budget is spent', async () => {
    vi.useFakeTimers();
    mock.resetParameters.mockRejectedValue(pendingChangesError('g'));

    const promise = applyParameterDiff(
      mock.api,
      'g',
      { toRemove: makeParameters(1, 'old'), toAdd: makeParameters(1, 'new') },
      { resetRetry: { timeoutMs: 1000, baseDelayMs: 100, jitterFactor: 0 } }
    );
    const assertion = expect(promise).rejects.toBeInstanceOf(ParameterApplyError);
    await vi.runAllTimersAsync();
    await assertion;

    expect(mock.resetParameters).toHaveBeenCalledTimes(5);
    expect(mock.modifyParameters).not.toHaveBeenCalled();
  });

  it('does not retry other reset failures', async () => {
    mock.resetParameters.mockRejectedValueOnce(invalidStateError('g'));

    const error = await applyParameterDiff(mock.api, 'g', {
      toRemove: makeParameters(1, 'old'),
      toAdd: makeParameters(1, 'new'),
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ParameterApplyError);
    expect(mock.resetParameters).toHaveBeenCalledTimes(1);
    expect(mock.modifyParameters).not.toHaveBeenCalled();
  });

  it('does not retry a failed modify, even for pending changes', async () => {
    mock.modifyParameters.mockRejectedValueOnce(pendingChangesError('g'));

    const error = await applyParameterDiff(mock.api, 'g', {
      toRemove: makeParameters(1, 'old'),
      toAdd: makeParameters(1, 'new'),
    }).catch((e: unknown) => e);

    expect(mock.modifyParameters).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(ParameterApplyError);
    if (!(error instanceof ParameterApplyError)) return;
    expect(error.message).toBe(
      'Error modifying parameter group "g" (batch 1 of 1): Parameter group g has pending changes'
    );
    expect(error.operation).toBe('modify');
    expect(error.completed.map((b) => b.operation)).toEqual(['reset']);
    expect(error.isPartial()).toBe(true);
  });

  it('stops at the failing batch and reports what was applied', async () => {
    mock.resetParameters
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(new RemoteApiError('denied', 'AccessDenied'));

    const error = await applyParameterDiff(mock.api, 'g', {
      toRemove: makeParameters(45, 'old'),
      toAdd: makeParameters(1, 'new', 50),
    }).catch((e: unknown) => e);

    expect(mock.resetParameters).toHaveBeenCalledTimes(2);
    expect(mock.modifyParameters).not.toHaveBeenCalled();
    expect(error).toBeInstanceOf(ParameterApplyError);
    if (!(error instanceof ParameterApplyError)) return;
    expect(error.message).toBe('Error resetting parameter group "g" (batch 2 of 3): denied');
    expect(error.batchIndex).toBe(1);
    expect(error.batchCount).toBe(3);
    expect(error.completed).toHaveLength(1);
    expect(error.cause).toBeInstanceOf(RemoteApiError);
  });
});

describe('formatApplyResult', () => {
  it('lists each batch with retries', () => {
    const text = formatApplyResult({
      groupName: 'g',
      batches: [
        { operation: 'reset', index: 0, parameters: makeParameters(2), attempts: 1 },
        { operation: 'modify', index: 0, parameters: makeParameters(1), attempts: 3 },
      ],
      resetCount: 1,
      modifyCount: 1,
      dryRun: false,
    });

    expect(text.split('\n')).toEqual([
      'Applied 1 reset batch(es) and 1 modify batch(es) to g',
      '  reset #1: 2 parameter(s)',
      '  modify #1: 1 parameter(s) after 3 attempts',
    ]);
  });

  it('reports an empty dry run', () => {
    expect(
      formatApplyResult({ groupName: 'g', batches: [], resetCount: 0, modifyCount: 0, dryRun: true })
    ).toBe('[DRY RUN] Would apply no parameter changes to g');
  });
});
