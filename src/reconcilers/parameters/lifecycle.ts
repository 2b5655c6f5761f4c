/**
 * Parameter group lifecycle controller
 *
 * Drives one group through create, configure, read, update and delete:
 *
 *   non-existent -> creating -> configuring -> ready
 *   ready -> configuring -> ready                  (update)
 *   ready | configuring -> deleting -> non-existent
 *
 * Every state change is recorded in `history`. After any parameter pipeline,
 * including one that aborted part-way, the controller moves to `ready` and
 * reads the group back, so `observed` always reflects what the remote holds.
 * If that read fails after a partial apply, `observed` is projected from the
 * batches that completed instead.
 *
 * One controller per group. Calls on a controller must not overlap.
 */

import type { ParameterGroupApi } from '../../api/client.js';
import type { GroupDescription, Parameter, ParameterGroup } from '../../api/types.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import { toRemoteApiError } from '../../api/errors.js';
import type {
  AppliedBatch,
  ApplyResult,
  ControllerOptions,
  ControllerSnapshot,
  DeleteResult,
  DesiredGroup,
  LifecycleState,
  ParameterDiffResult,
  TransitionRecord,
} from './types.js';
import { diffParameters, parametersEqual } from './diff.js';
import { applyParameterDiff } from './apply.js';
import { deleteParameterGroup } from './delete.js';
import { planGroupChange, findForceNewChanges, type GroupPlan } from './plan.js';
import { LifecycleTransitionError, ParameterApplyError, ParameterGroupError } from './errors.js';

// =============================================================================
// State Machine
// =============================================================================

/**
 * Legal transitions out of each state
 */
export const LIFECYCLE_TRANSITIONS: Readonly<Record<LifecycleState, readonly LifecycleState[]>> = {
  'non-existent': ['creating', 'ready'],
  creating: ['configuring', 'non-existent'],
  configuring: ['ready', 'deleting', 'non-existent'],
  ready: ['configuring', 'deleting', 'non-existent'],
  deleting: ['non-existent', 'ready'],
};

/**
 * Whether the state machine allows a transition
 */
export function canTransition(from: LifecycleState, to: LifecycleState): boolean {
  return LIFECYCLE_TRANSITIONS[from].includes(to);
}

// =============================================================================
// Result Types
// =============================================================================

/**
 * Result of configuring a group's parameters
 */
export interface ConfigureResult {
  /** Group as read back afterwards; null if it vanished meanwhile */
  group: ParameterGroup | null;
  diff: ParameterDiffResult;
  /** Null when no parameter calls were needed */
  apply: ApplyResult | null;
}

/**
 * Result of converging a group to its desired state
 */
export interface ConvergeResult {
  plan: GroupPlan;
  group: ParameterGroup | null;
  apply: ApplyResult | null;
  /** Set when the plan replaced the group */
  deleted?: DeleteResult;
}

// =============================================================================
// Controller
// =============================================================================

export class ParameterGroupController {
  private currentState: LifecycleState = 'non-existent';
  private groupId: string | null = null;
  private lastName = '';
  private lastObserved: ParameterGroup | null = null;
  private readonly transitions: TransitionRecord[] = [];
  private readonly log: ApiLogger;

  constructor(
    private readonly api: ParameterGroupApi,
    private readonly options: ControllerOptions = {}
  ) {
    this.log = options.logger ?? defaultLogger;
  }

  get state(): LifecycleState {
    return this.currentState;
  }

  get id(): string | null {
    return this.groupId;
  }

  get observed(): ParameterGroup | null {
    return this.lastObserved;
  }

  get history(): readonly TransitionRecord[] {
    return this.transitions;
  }

  snapshot(): ControllerSnapshot {
    return {
      id: this.groupId,
      state: this.currentState,
      observed: this.lastObserved,
      history: [...this.transitions],
    };
  }

  private transition(to: LifecycleState, reason: string): void {
    const from = this.currentState;
    if (from === to) return;
    if (!canTransition(from, to)) {
      throw new LifecycleTransitionError(from, to);
    }
    this.currentState = to;
    this.transitions.push({ from, to, reason, at: new Date().toISOString() });
    this.log.debug(`Lifecycle ${from} -> ${to}`, { group: this.groupId, reason });
  }

  private manage(id: string): void {
    this.groupId = id;
    this.lastName = id;
  }

  private forget(reason: string): void {
    this.groupId = null;
    this.lastObserved = null;
    this.transition('non-existent', reason);
  }

  // ---------------------------------------------------------------------------
  // Create
  // ---------------------------------------------------------------------------

  /**
   * Create the group, then configure its parameters in the same step
   *
   * @throws ParameterGroupError if the create call fails
   * @throws ParameterApplyError if configuring fails (the group exists)
   */
  async create(desired: DesiredGroup): Promise<ConfigureResult> {
    this.transition('creating', `create ${desired.name}`);

    let id: string;
    try {
      id = await this.api.createGroup({
        name: desired.name,
        family: desired.family,
        description: desired.description,
      });
    } catch (error) {
      this.transition('non-existent', 'create failed');
      throw new ParameterGroupError(
        'create',
        desired.name,
        `Error creating parameter group "${desired.name}"`,
        error
      );
    }

    this.manage(id);
    this.log.info('Parameter group created', { group: id });
    this.transition('configuring', 'created');

    // A new group holds only remote defaults
    const base: ParameterGroup = {
      name: id,
      family: desired.family,
      description: desired.description,
      parameters: [],
    };
    return this.configure(base, desired.parameters);
  }

  // ---------------------------------------------------------------------------
  // Update
  // ---------------------------------------------------------------------------

  /**
   * Reconcile the group's parameters with the desired ones
   *
   * @throws ParameterGroupError if the group is unknown or an immutable
   *   attribute differs
   * @throws ParameterApplyError if a batch fails; `observed` is refreshed first
   */
  async update(desired: DesiredGroup): Promise<ConfigureResult> {
    const id = this.groupId;
    if (!id) {
      throw new ParameterGroupError('update', desired.name, 'Parameter group has not been created');
    }

    const current = this.lastObserved ?? (await this.read());
    if (!current) {
      throw new ParameterGroupError('update', id, `Parameter group "${id}" no longer exists`);
    }

    const forceNew = findForceNewChanges(current, desired);
    if (forceNew.length > 0) {
      const fields = forceNew.map((change) => change.field).join(', ');
      throw new ParameterGroupError(
        'update',
        id,
        `Cannot change ${fields} of parameter group "${id}" in place; the group must be replaced`
      );
    }

    this.transition('configuring', 'update');
    return this.configure(current, desired.parameters);
  }

  /**
   * Run diff, batch and apply from the configuring state, then read back
   */
  private async configure(base: ParameterGroup, desired: Parameter[]): Promise<ConfigureResult> {
    const id = base.name;
    const current = base.parameters;
    const diff = diffParameters(current, desired);

    let apply: ApplyResult | null = null;
    let failed = false;
    let failure: unknown;

    if (!parametersEqual(current, desired)) {
      try {
        apply = await applyParameterDiff(this.api, id, diff, {
          ...this.options.apply,
          logger: this.log,
        });
      } catch (error) {
        failed = true;
        failure = error;
      }
    }

    this.transition('ready', failed ? 'parameters partially applied' : 'parameters applied');
    if (!failed) {
      const group = await this.read();
      return { group, diff, apply };
    }

    try {
      await this.read();
    } catch (readError) {
      if (!(failure instanceof ParameterApplyError)) {
        throw failure;
      }
      this.lastObserved = projectApplied(base, failure.completed);
      this.log.warn(`Could not read parameter group ${id} back after a failed batch`, {
        error: readError instanceof Error ? readError.message : String(readError),
      });
      throw failure.withReadBackError(
        readError instanceof ParameterGroupError
          ? readError
          : new ParameterGroupError('read', id, `Error reading parameter group "${id}"`, readError)
      );
    }
    throw failure;
  }

  // ---------------------------------------------------------------------------
  // Read
  // ---------------------------------------------------------------------------

  /**
   * Refresh the observed state from the remote
   *
   * A group that no longer exists clears the identifier and returns null.
   *
   * @throws ParameterGroupError on any other failure
   */
  async read(): Promise<ParameterGroup | null> {
    const id = this.groupId;
    if (!id) {
      return null;
    }

    let groups: GroupDescription[];
    try {
      groups = await this.api.describeGroup(id);
    } catch (error) {
      if (toRemoteApiError(error).isNotFound()) {
        this.log.warn(`Parameter group (${id}) not found, removing from state`);
        this.forget('not found on read');
        return null;
      }
      throw new ParameterGroupError('read', id, `Error reading parameter group "${id}"`, error);
    }

    const [description] = groups;
    if (groups.length !== 1 || !description || description.name !== id) {
      throw new ParameterGroupError(
        'read',
        id,
        `Unable to find parameter group "${id}" (describe returned ${groups.length} group(s))`
      );
    }

    // Only user-set parameters; the remote has hundreds of defaults
    const parameters: Parameter[] = [];
    try {
      for await (const page of this.api.describeUserParameters(id)) {
        parameters.push(...page);
      }
    } catch (error) {
      throw new ParameterGroupError(
        'read',
        id,
        `Error reading parameters of group "${id}"`,
        error
      );
    }

    this.lastObserved = {
      name: description.name,
      family: description.family,
      description: description.description,
      parameters,
    };
    return this.lastObserved;
  }

  // ---------------------------------------------------------------------------
  // Delete
  // ---------------------------------------------------------------------------

  /**
   * Delete the group; succeeds if it is already gone
   *
   * Without a managed group nothing is called and `groupName` is the group
   * last managed, or empty if there never was one.
   *
   * @throws ParameterGroupError when deletion fails
   */
  async delete(): Promise<DeleteResult> {
    const id = this.groupId;
    if (!id) {
      return { groupName: this.lastName, deleted: false, alreadyAbsent: true, attempts: 0 };
    }

    this.transition('deleting', 'delete requested');

    let result: DeleteResult;
    try {
      result = await deleteParameterGroup(this.api, id, {
        ...this.options.delete,
        logger: this.log,
      });
    } catch (error) {
      this.transition('ready', 'delete failed');
      throw error;
    }

    this.forget(result.alreadyAbsent ? 'already absent' : 'deleted');
    return result;
  }

  // ---------------------------------------------------------------------------
  // Adopt / Import
  // ---------------------------------------------------------------------------

  /**
   * Take over an existing group by identifier
   *
   * A missing group leaves the controller in `non-existent` with no
   * transition recorded.
   *
   * @returns The observed group, or null if it does not exist
   */
  async adopt(id: string): Promise<ParameterGroup | null> {
    if (this.groupId) {
      throw new ParameterGroupError(
        'import',
        id,
        `Controller already manages parameter group "${this.groupId}"`
      );
    }
    this.manage(id.toLowerCase());

    let group: ParameterGroup | null;
    try {
      group = await this.read();
    } catch (error) {
      this.groupId = null;
      throw error;
    }

    if (group) {
      this.transition('ready', 'adopted');
    }
    return group;
  }

  /**
   * Import an existing group
   *
   * @throws ParameterGroupError if the group does not exist
   */
  async import(id: string): Promise<ParameterGroup> {
    const group = await this.adopt(id);
    if (!group) {
      throw new ParameterGroupError('import', id, `Cannot import non-existent parameter group "${id}"`);
    }
    return group;
  }

  // ---------------------------------------------------------------------------
  // Converge
  // ---------------------------------------------------------------------------

  /**
   * Bring the group to its desired state: create, update, or replace it
   */
  async converge(desired: DesiredGroup): Promise<ConvergeResult> {
    const observed = this.groupId ? await this.read() : await this.adopt(desired.name);
    const plan = planGroupChange(observed, desired, this.options.apply?.maxBatchSize);

    this.log.info(`Converging parameter group ${desired.name}: ${plan.action}`, {
      reset: plan.diff.toRemove.length,
      modify: plan.diff.toAdd.length,
    });

    switch (plan.action) {
      case 'none':
        return { plan, group: observed, apply: null };
      case 'create': {
        const result = await this.create(desired);
        return { plan, group: result.group, apply: result.apply };
      }
      case 'replace': {
        const deleted = await this.delete();
        const result = await this.create(desired);
        return { plan, group: result.group, apply: result.apply, deleted };
      }
      case 'update': {
        const result = await this.update(desired);
        return { plan, group: result.group, apply: result.apply };
      }
    }
  }
}

/**
 * Group as it stands after the given batches, when it cannot be read back
 *
 * A reset drops the parameter by name. A modify sets it; the remote never
 * reports an apply method, so none is kept.
 */
export function projectApplied(base: ParameterGroup, batches: AppliedBatch[]): ParameterGroup {
  const byName = new Map(base.parameters.map((p) => [p.name, p] as const));
  for (const applied of batches) {
    for (const parameter of applied.parameters) {
      byName.delete(parameter.name);
      if (applied.operation === 'modify') {
        byName.set(parameter.name, { name: parameter.name, value: parameter.value, applyMethod: '' });
      }
    }
  }
  return { ...base, parameters: [...byName.values()] };
}
