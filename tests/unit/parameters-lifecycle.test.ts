/**
 * Unit Tests: Parameter Group Lifecycle
 *
 * Drives the controller against the in-process fake service:
 * - create, update, read, delete, import and converge
 * - the state machine and its history
 * - read-back after partial failures
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  ParameterGroupController,
  canTransition,
  projectApplied,
} from '../../src/reconcilers/parameters/lifecycle.js';
import {
  LifecycleTransitionError,
  ParameterApplyError,
  ParameterGroupError,
} from '../../src/reconcilers/parameters/errors.js';
import type { ParameterGroupApi } from '../../src/api/client.js';
import type { ParameterGroup } from '../../src/api/types.js';
import { RemoteApiError } from '../../src/api/errors.js';
import {
  FakeNeptune,
  makeParameters,
  pendingChangesError,
  toPairs,
} from '../helpers/fake-neptune.js';

function desiredGroup(overrides: Partial<ParameterGroup> = {}): ParameterGroup {
  return {
    name: 'g',
    family: 'neptune1',
    description: 'Managed by param-sync',
    parameters: [],
    ...overrides,
  };
}

describe('canTransition', () => {
  it('allows the documented edges', () => {
    expect(canTransition('non-existent', 'creating')).toBe(true);
    expect(canTransition('creating', 'configuring')).toBe(true);
    expect(canTransition('configuring', 'ready')).toBe(true);
    expect(canTransition('ready', 'deleting')).toBe(true);
    expect(canTransition('deleting', 'non-existent')).toBe(true);
  });

  it('rejects shortcuts', () => {
    expect(canTransition('non-existent', 'deleting')).toBe(false);
    expect(canTransition('ready', 'creating')).toBe(false);
    expect(canTransition('creating', 'ready')).toBe(false);
  });
});

describe('ParameterGroupController', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  // ---------------------------------------------------------------------------
  // Create
  // ---------------------------------------------------------------------------

  describe('create', () => {
    it('creates a group with 25 parameters in two modify calls', async () => {
      const fake = new FakeNeptune();
      const controller = new ParameterGroupController(fake);

      const result = await controller.create(desiredGroup({ parameters: makeParameters(25) }));

      expect(fake.callsOf('resetParameters')).toEqual([]);
      expect(fake.callsOf('modifyParameters').map((c) => c.parameters?.length)).toEqual([20, 5]);
      expect(result.apply?.modifyCount).toBe(2);
      expect(result.group?.parameters).toHaveLength(25);
      expect(controller.id).toBe('g');
      expect(controller.state).toBe('ready');
      expect(controller.history.map((t) => `${t.from}->${t.to}`)).toEqual([
        'non-existent->creating',
        'creating->configuring',
        'configuring->ready',
      ]);
    });

    it('reads the group back after creating it', async () => {
      const fake = new FakeNeptune();
      const controller = new ParameterGroupController(fake);

      await controller.create(desiredGroup({ description: 'analytics' }));

      expect(fake.calls.map((c) => c.operation)).toEqual([
        'createGroup',
        'describeGroup',
        'describeUserParameters',
      ]);
      expect(controller.observed).toEqual({
        name: 'g',
        family: 'neptune1',
        description: 'analytics',
        parameters: [],
      });
    });

    it('exposes a snapshot that does not change with later transitions', async () => {
      const fake = new FakeNeptune();
      const controller = new ParameterGroupController(fake);
      await controller.create(desiredGroup());

      const snapshot = controller.snapshot();
      await controller.delete();

      expect(snapshot.id).toBe('g');
      expect(snapshot.state).toBe('ready');
      expect(snapshot.observed?.name).toBe('g');
      expect(snapshot.history).toHaveLength(3);
      expect(controller.snapshot().history).toHaveLength(5);
    });

    it('returns to non-existent when the create call fails', async () => {
      const fake = new FakeNeptune();
      fake.failNext('createGroup', new RemoteApiError('quota exceeded', 'DBParameterGroupQuotaExceeded'));
      const controller = new ParameterGroupController(fake);

      const error = await controller.create(desiredGroup()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ParameterGroupError);
      if (!(error instanceof ParameterGroupError)) return;
      expect(error.message).toBe('Error creating parameter group "g": quota exceeded');
      expect(controller.state).toBe('non-existent');
      expect(controller.id).toBeNull();
    });

    it('refuses to create while already managing a group', async () => {
      const fake = new FakeNeptune();
      fake.seed('g');
      const controller = new ParameterGroupController(fake);
      await controller.adopt('g');

      await expect(controller.create(desiredGroup())).rejects.toThrow(
        new LifecycleTransitionError('ready', 'creating')
      );
    });
  });

  // ---------------------------------------------------------------------------
  // Update
  // ---------------------------------------------------------------------------

  describe('update', () => {
    it('resets all removals before modifying additions', async () => {
      const fake = new FakeNeptune();
      fake.seed('g', toPairs(makeParameters(15, 'old')));
      const controller = new ParameterGroupController(fake);
      await controller.adopt('g');
      const desired = makeParameters(15, 'new', 15);

      await controller.update(desiredGroup({ parameters: desired }));

      const writes = fake.calls.filter(
        (c) => c.operation === 'resetParameters' || c.operation === 'modifyParameters'
      );
      expect(writes.map((c) => [c.operation, c.parameters?.length])).toEqual([
        ['resetParameters', 15],
        ['modifyParameters', 15],
      ]);
      expect(Object.keys(fake.parametersOf('g'))).toEqual(desired.map((p) => p.name));
      expect(controller.observed?.parameters.map((p) => p.name)).toEqual(desired.map((p) => p.name));
    });

    it('finishes after a reset reports pending changes twice', async () => {
      vi.useFakeTimers();
      const fake = new FakeNeptune();
      fake.seed('g', [['neptune_query_timeout', '20000']]);
      fake.failNext('resetParameters', pendingChangesError('g'), pendingChangesError('g'));
      const controller = new ParameterGroupController(fake);
      await controller.adopt('g');

      const promise = controller.update(
        desiredGroup({
          parameters: [{ name: 'neptune_query_timeout', value: '120000', applyMethod: 'immediate' }],
        })
      );
      await vi.runAllTimersAsync();
      const result = await promise;

      expect(fake.callsOf('resetParameters')).toHaveLength(3);
      expect(result.apply?.batches[0]?.attempts).toBe(3);
      expect(fake.parametersOf('g')).toEqual({ neptune_query_timeout: '120000' });
      expect(controller.state).toBe('ready');
    });

    it('makes no parameter calls when already in sync', async () => {
      const fake = new FakeNeptune();
      fake.seed('g', [['neptune_lab_mode', 'ObjectIndex=Enabled']]);
      const controller = new ParameterGroupController(fake);
      await controller.adopt('g');

      const result = await controller.update(
        desiredGroup({
          parameters: [{ name: 'neptune_lab_mode', value: 'objectindex=enabled', applyMethod: 'immediate' }],
        })
      );

      expect(result.apply).toBeNull();
      expect(fake.callsOf('resetParameters')).toEqual([]);
      expect(fake.callsOf('modifyParameters')).toEqual([]);
    });

    it('leaves the controller ready and observing the remote after a partial failure', async () => {
      const fake = new FakeNeptune();
      fake.seed('g', toPairs(makeParameters(45, 'old')));
      fake.failNext('resetParameters', null, new RemoteApiError('denied', 'AccessDenied'));
      const controller = new ParameterGroupController(fake);
      await controller.adopt('g');

      const error = await controller.update(desiredGroup()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ParameterApplyError);
      if (!(error instanceof ParameterApplyError)) return;
      expect(error.batchIndex).toBe(1);
      expect(error.completed).toHaveLength(1);
      expect(controller.state).toBe('ready');
      expect(controller.observed?.parameters).toHaveLength(25);
      expect(Object.keys(fake.parametersOf('g'))).toHaveLength(25);
    });

    it('keeps the batch failure when the read-back fails as well', async () => {
      const fake = new FakeNeptune();
      fake.seed('g', toPairs(makeParameters(45, 'old')));
      const controller = new ParameterGroupController(fake);
      await controller.adopt('g');
      fake.failNext('resetParameters', null, new RemoteApiError('denied', 'AccessDenied'));
      fake.failNext('describeGroup', new RemoteApiError('throttled', 'Throttling'));

      const error = await controller.update(desiredGroup()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ParameterApplyError);
      if (!(error instanceof ParameterApplyError)) return;
      expect(error.message).toBe('Error resetting parameter group "g" (batch 2 of 3): denied');
      expect(error.batchIndex).toBe(1);
      expect(error.completed.map((b) => b.parameters.length)).toEqual([20]);
      expect(error.readBackError).toBeInstanceOf(ParameterGroupError);
      expect(error.readBackError?.message).toBe('Error reading parameter group "g": throttled');
      expect(controller.state).toBe('ready');
      expect(controller.observed?.parameters.map((p) => p.name)).toEqual(
        Object.keys(fake.parametersOf('g'))
      );
      expect(controller.observed?.parameters).toHaveLength(25);
    });

    it('refuses to change the family in place', async () => {
      const fake = new FakeNeptune();
      fake.seed('g');
      const controller = new ParameterGroupController(fake);
      await controller.adopt('g');

      await expect(controller.update(desiredGroup({ family: 'neptune1.2' }))).rejects.toThrow(
        'Cannot change family of parameter group "g" in place; the group must be replaced'
      );
      expect(controller.state).toBe('ready');
    });

    it('requires a group to update', async () => {
      const controller = new ParameterGroupController(new FakeNeptune());

      await expect(controller.update(desiredGroup())).rejects.toThrow(
        'Parameter group has not been created'
      );
    });
  });

  // ---------------------------------------------------------------------------
  // Read
  // ---------------------------------------------------------------------------

  describe('read', () => {
    it('drains every page of user parameters', async () => {
      const fake = new FakeNeptune(10);
      fake.seed('g', toPairs(makeParameters(25)));
      const controller = new ParameterGroupController(fake);

      const group = await controller.adopt('g');

      expect(group?.parameters).toHaveLength(25);
      expect(group?.parameters[0]).toEqual({ name: 'p00', value: 'v00', applyMethod: '' });
    });

    it('clears the identifier when the group has disappeared', async () => {
      const fake = new FakeNeptune();
      fake.seed('g');
      const controller = new ParameterGroupController(fake);
      await controller.adopt('g');
      await fake.deleteGroup('g');

      const group = await controller.read();

      expect(group).toBeNull();
      expect(controller.id).toBeNull();
      expect(controller.observed).toBeNull();
      expect(controller.state).toBe('non-existent');
    });

    it('returns null without an identifier', async () => {
      const fake = new FakeNeptune();
      const controller = new ParameterGroupController(fake);

      expect(await controller.read()).toBeNull();
      expect(fake.calls).toEqual([]);
    });

    it('fails when describe returns a different group', async () => {
      const api: ParameterGroupApi = {
        createGroup: vi.fn(),
        describeGroup: vi.fn().mockResolvedValue([
          { name: 'other', family: 'neptune1', description: 'x' },
        ]),
        describeUserParameters: vi.fn(),
        resetParameters: vi.fn(),
        modifyParameters: vi.fn(),
        deleteGroup: vi.fn(),
        getConfig: () => ({}),
      };
      const controller = new ParameterGroupController(api);

      await expect(controller.adopt('g')).rejects.toThrow(
        'Unable to find parameter group "g" (describe returned 1 group(s))'
      );
    });

    it('wraps other describe failures', async () => {
      const fake = new FakeNeptune();
      fake.seed('g');
      fake.failNext('describeGroup', new RemoteApiError('slow down', 'Throttling'));
      const controller = new ParameterGroupController(fake);

      await expect(controller.adopt('g')).rejects.toThrow(
        new ParameterGroupError('read', 'g', 'Error reading parameter group "g"', new Error('slow down'))
      );
    });
  });

  // ---------------------------------------------------------------------------
  // Delete
  // ---------------------------------------------------------------------------

  describe('delete', () => {
    it('is idempotent', async () => {
      const fake = new FakeNeptune();
      fake.seed('g');
      const controller = new ParameterGroupController(fake);
      await controller.adopt('g');

      const first = await controller.delete();
      const second = await controller.delete();

      expect(first.deleted).toBe(true);
      expect(second).toEqual({ groupName: 'g', deleted: false, alreadyAbsent: true, attempts: 0 });
      expect(controller.state).toBe('non-existent');
      expect(controller.id).toBeNull();
      expect(fake.has('g')).toBe(false);
    });

    it('succeeds when the group was removed behind its back', async () => {
      const fake = new FakeNeptune();
      fake.seed('g');
      const controller = new ParameterGroupController(fake);
      await controller.adopt('g');
      await fake.deleteGroup('g');

      const result = await controller.delete();

      expect(result).toEqual({ groupName: 'g', deleted: false, alreadyAbsent: true, attempts: 1 });
      expect(controller.state).toBe('non-existent');
    });

    it('reports an empty name when it never managed a group', async () => {
      const fake = new FakeNeptune();
      const controller = new ParameterGroupController(fake);

      const result = await controller.delete();

      expect(result.groupName).toBe('');
      expect(fake.calls).toEqual([]);
    });

    it('returns to ready when deletion fails', async () => {
      const fake = new FakeNeptune();
      fake.seed('g');
      fake.failNext('deleteGroup', new RemoteApiError('denied', 'AccessDenied'));
      const controller = new ParameterGroupController(fake);
      await controller.adopt('g');

      await expect(controller.delete()).rejects.toBeInstanceOf(ParameterGroupError);
      expect(controller.state).toBe('ready');
      expect(controller.id).toBe('g');
    });
  });

  // ---------------------------------------------------------------------------
  // Import
  // ---------------------------------------------------------------------------

  describe('import', () => {
    it('adopts an existing group by lower-cased name', async () => {
      const fake = new FakeNeptune();
      fake.seed('my-group', [['neptune_query_timeout', '120000']]);
      const controller = new ParameterGroupController(fake);

      const group = await controller.import('My-Group');

      expect(group.name).toBe('my-group');
      expect(group.parameters).toEqual([
        { name: 'neptune_query_timeout', value: '120000', applyMethod: '' },
      ]);
      expect(controller.state).toBe('ready');
    });

    it('fails for a missing group', async () => {
      const controller = new ParameterGroupController(new FakeNeptune());

      await expect(controller.import('missing')).rejects.toThrow(
        'Cannot import non-existent parameter group "missing"'
      );
      expect(controller.state).toBe('non-existent');
      expect(controller.history).toEqual([]);
    });
  });

  // ---------------------------------------------------------------------------
  // Converge
  // ---------------------------------------------------------------------------

  describe('converge', () => {
    it('creates a missing group', async () => {
      const fake = new FakeNeptune();
      const controller = new ParameterGroupController(fake);

      const result = await controller.converge(desiredGroup({ parameters: makeParameters(3) }));

      expect(result.plan.action).toBe('create');
      expect(fake.parametersOf('g')).toEqual({ p00: 'v00', p01: 'v01', p02: 'v02' });
      expect(controller.history.map((t) => `${t.from}->${t.to}`)).toEqual([
        'non-existent->creating',
        'creating->configuring',
        'configuring->ready',
      ]);
    });

    it('replaces a group whose description changed', async () => {
      const fake = new FakeNeptune();
      fake.seed('g', [['stale', '1']], { description: 'old' });
      const controller = new ParameterGroupController(fake);

      const result = await controller.converge(
        desiredGroup({ description: 'new', parameters: makeParameters(1) })
      );

      expect(result.plan.action).toBe('replace');
      expect(result.deleted?.deleted).toBe(true);
      expect(result.group?.description).toBe('new');
      expect(fake.parametersOf('g')).toEqual({ p00: 'v00' });
      expect(controller.history.map((t) => t.to)).toEqual([
        'ready',
        'deleting',
        'non-existent',
        'creating',
        'configuring',
        'ready',
      ]);
    });

    it('does nothing for a group in sync', async () => {
      const fake = new FakeNeptune();
      fake.seed('g', toPairs(makeParameters(2)));
      const controller = new ParameterGroupController(fake);

      const result = await controller.converge(desiredGroup({ parameters: makeParameters(2) }));

      expect(result.plan.action).toBe('none');
      expect(result.apply).toBeNull();
      expect(fake.callsOf('modifyParameters')).toEqual([]);
    });
  });
});

describe('projectApplied', () => {
  it('drops reset names and sets modified values', () => {
    const base = desiredGroup({
      parameters: [
        { name: 'a', value: '1', applyMethod: '' },
        { name: 'c', value: 'x', applyMethod: '' },
      ],
    });

    const group = projectApplied(base, [
      { operation: 'reset', index: 0, parameters: [{ name: 'c', value: 'x', applyMethod: '' }], attempts: 1 },
      {
        operation: 'modify',
        index: 0,
        parameters: [
          { name: 'a', value: '2', applyMethod: 'immediate' },
          { name: 'b', value: '3', applyMethod: 'pending-reboot' },
        ],
        attempts: 1,
      },
    ]);

    expect(group.parameters).toEqual([
      { name: 'a', value: '2', applyMethod: '' },
      { name: 'b', value: '3', applyMethod: '' },
    ]);
    expect(base.parameters).toHaveLength(2);
  });
});
