/**
 * Parameter group API client
 *
 * Provides a typed interface to the Neptune DBParameterGroup API with:
 * - Normalised RemoteApiError failures
 * - Fully drained pagination for user-set parameters
 * - JSON logging with secret redaction
 */

import {
  NeptuneClient,
  CreateDBParameterGroupCommand,
  DescribeDBParameterGroupsCommand,
  DescribeDBParametersCommand,
  ResetDBParameterGroupCommand,
  ModifyDBParameterGroupCommand,
  DeleteDBParameterGroupCommand,
  type DBParameterGroup,
  type Parameter as NeptuneParameter,
} from '@aws-sdk/client-neptune';
import type {
  CreateGroupRequest,
  GroupDescription,
  Parameter,
  ParameterSource,
  ParameterGroupClientConfig,
} from './types.js';
import { toRemoteApiError } from './errors.js';
import { logger, ApiLogger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Remote operations the reconciler depends on
 *
 * Every method targets a single group and is awaited before the next call is
 * issued; implementations need not be safe for concurrent calls on one group.
 */
export interface ParameterGroupApi {
  /** Create a group and return its canonical name */
  createGroup(request: CreateGroupRequest): Promise<string>;
  /** Describe a group; throws RemoteApiError(DBParameterGroupNotFound) if absent */
  describeGroup(groupName: string): Promise<GroupDescription[]>;
  /** Page through the user-set parameters of a group */
  describeUserParameters(groupName: string): AsyncIterable<Parameter[]>;
  /** Reset the named parameters to their defaults */
  resetParameters(groupName: string, parameters: Parameter[]): Promise<void>;
  /** Set the given parameters */
  modifyParameters(groupName: string, parameters: Parameter[]): Promise<void>;
  /** Delete a group */
  deleteGroup(groupName: string): Promise<void>;

  /** Get current configuration */
  getConfig(): { region?: string; endpoint?: string };
}

/**
 * Parameter origin used when reading back a group
 */
export const USER_PARAMETER_SOURCE: ParameterSource = 'user';

/**
 * Page size for DescribeDBParameters (the API maximum)
 */
export const DESCRIBE_PAGE_SIZE = 100;

// =============================================================================
// Configuration Resolution
// =============================================================================

/**
 * Resolve region from config or environment
 *
 * Returns undefined to let the SDK's own provider chain decide.
 */
function resolveRegion(configRegion?: string): string | undefined {
  return configRegion ?? process.env.PARAM_SYNC_REGION ?? process.env.AWS_REGION;
}

function resolveEndpoint(configEndpoint?: string): string | undefined {
  return configEndpoint ?? process.env.PARAM_SYNC_ENDPOINT;
}

// =============================================================================
// Mapping
// =============================================================================

/**
 * Translate a remote parameter into the local tuple
 *
 * The remote never reports the apply method, so it is left empty.
 */
export function fromRemoteParameter(remote: NeptuneParameter): Parameter | null {
  if (!remote.ParameterName) {
    return null;
  }
  return {
    name: remote.ParameterName,
    value: remote.ParameterValue ?? '',
    applyMethod: '',
  };
}

/**
 * Translate a local parameter into the remote shape
 */
export function toRemoteParameter(parameter: Parameter): NeptuneParameter {
  return {
    ParameterName: parameter.name,
    ParameterValue: parameter.value,
    ApplyMethod: parameter.applyMethod === '' ? undefined : parameter.applyMethod,
  };
}

function fromRemoteGroup(remote: DBParameterGroup): GroupDescription {
  return {
    name: remote.DBParameterGroupName ?? '',
    family: remote.DBParameterGroupFamily ?? '',
    description: remote.Description ?? '',
    arn: remote.DBParameterGroupArn,
  };
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create a parameter group client backed by the AWS SDK
 *
 * @param config - Client configuration options
 * @param sdkClient - Optional preconfigured SDK client
 */
export function createClient(
  config: ParameterGroupClientConfig = {},
  sdkClient?: NeptuneClient
): ParameterGroupApi {
  const region = resolveRegion(config.region);
  const endpoint = resolveEndpoint(config.endpoint);
  const log = config.debug ? logger : new ApiLogger({ level: 'warn' });

  const neptune =
    sdkClient ??
    new NeptuneClient({
      region,
      endpoint,
      maxAttempts: config.maxAttempts ?? 3,
    });

  /**
   * Send one SDK command, logging it and normalising any failure
   */
  async function call<T extends { $metadata: { requestId?: string } }>(
    operation: string,
    input: object,
    send: () => Promise<T>
  ): Promise<T> {
    log.call(operation, input);
    const startTime = Date.now();

    try {
      const output = await send();
      log.callResult(operation, {
        durationMs: Date.now() - startTime,
        requestId: output.$metadata.requestId,
      });
      return output;
    } catch (err) {
      const error = toRemoteApiError(err);
      log.callResult(operation, {
        durationMs: Date.now() - startTime,
        requestId: error.requestId,
        error,
      });
      throw error;
    }
  }

  return {
    async createGroup(request: CreateGroupRequest): Promise<string> {
      const input = {
        DBParameterGroupName: request.name,
        DBParameterGroupFamily: request.family,
        Description: request.description,
      };
      const output = await call('CreateDBParameterGroup', input, () =>
        neptune.send(new CreateDBParameterGroupCommand(input))
      );
      return output.DBParameterGroup?.DBParameterGroupName ?? request.name;
    },

    async describeGroup(groupName: string): Promise<GroupDescription[]> {
      const input = { DBParameterGroupName: groupName };
      const output = await call('DescribeDBParameterGroups', input, () =>
        neptune.send(new DescribeDBParameterGroupsCommand(input))
      );
      return (output.DBParameterGroups ?? []).map(fromRemoteGroup);
    },

    async *describeUserParameters(groupName: string): AsyncIterable<Parameter[]> {
      let marker: string | undefined;
      do {
        const input = {
          DBParameterGroupName: groupName,
          Source: USER_PARAMETER_SOURCE,
          MaxRecords: DESCRIBE_PAGE_SIZE,
          Marker: marker,
        };
        const output = await call('DescribeDBParameters', input, () =>
          neptune.send(new DescribeDBParametersCommand(input))
        );

        const page: Parameter[] = [];
        for (const remote of output.Parameters ?? []) {
          const parameter = fromRemoteParameter(remote);
          if (parameter) page.push(parameter);
        }
        yield page;

        marker = output.Marker;
      } while (marker);
    },

    async resetParameters(groupName: string, parameters: Parameter[]): Promise<void> {
      const input = {
        DBParameterGroupName: groupName,
        Parameters: parameters.map(toRemoteParameter),
      };
      await call('ResetDBParameterGroup', input, () =>
        neptune.send(new ResetDBParameterGroupCommand(input))
      );
    },

    async modifyParameters(groupName: string, parameters: Parameter[]): Promise<void> {
      const input = {
        DBParameterGroupName: groupName,
        Parameters: parameters.map(toRemoteParameter),
      };
      await call('ModifyDBParameterGroup', input, () =>
        neptune.send(new ModifyDBParameterGroupCommand(input))
      );
    },

    async deleteGroup(groupName: string): Promise<void> {
      const input = { DBParameterGroupName: groupName };
      await call('DeleteDBParameterGroup', input, () =>
        neptune.send(new DeleteDBParameterGroupCommand(input))
      );
    },

    getConfig() {
      return { region, endpoint };
    },
  };
}
