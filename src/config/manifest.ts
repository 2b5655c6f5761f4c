/**
 * Desired-state manifest loading
 *
 * Reads a YAML or JSON document declaring one parameter group and turns it
 * into a validated DesiredGroup. Nothing past this module inspects untyped
 * values.
 *
 * @example
 * ```yaml
 * apiVersion: param-sync/v1
 * kind: ParameterGroup
 * name: analytics-graph
 * family: neptune1
 * parameters:
 *   - name: neptune_query_timeout
 *     value: 120000
 *     applyMethod: pending-reboot
 * ```
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve, extname, isAbsolute } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ApplyMethod, Parameter, ParameterGroup } from '../api/types.js';
import { APPLY_METHODS } from '../api/types.js';
import type { DesiredGroup } from '../reconcilers/parameters/types.js';
import { DEFAULT_DESCRIPTION } from '../reconcilers/parameters/types.js';
import { identityKey } from '../reconcilers/parameters/identity.js';
import {
  ManifestError,
  type ManifestIssue,
  missingRequiredField,
  invalidField,
  duplicateParameter,
  conflictingParameterValues,
} from './errors.js';

// =============================================================================
// Constants
// =============================================================================

/** Supported API version */
export const MANIFEST_API_VERSION = 'param-sync/v1';

/** Supported resource kind */
export const MANIFEST_KIND = 'ParameterGroup';

/** Supported file extensions for manifest files */
const MANIFEST_EXTENSIONS = ['.yaml', '.yml', '.json'];

/** Apply method used when a parameter declares none */
export const DEFAULT_APPLY_METHOD: ApplyMethod = 'immediate';

// =============================================================================
// Types
// =============================================================================

/**
 * Options for manifest loading
 */
export interface ManifestLoadOptions {
  /** Base directory for resolving relative paths */
  basePath?: string;
}

/**
 * A validated manifest
 */
export interface ManifestLoadResult {
  group: DesiredGroup;
  /** Non-fatal issues */
  warnings: ManifestIssue[];
  sourcePath?: string;
}

/**
 * Serialized form of a manifest
 */
export interface ManifestDocument {
  apiVersion: string;
  kind: string;
  name: string;
  family: string;
  description: string;
  parameters: Array<{ name: string; value: string; applyMethod?: ApplyMethod }>;
}

// =============================================================================
// Field Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isApplyMethod(value: string): value is ApplyMethod {
  return APPLY_METHODS.some((method) => method === value);
}

/**
 * Scalars are accepted for values since YAML reads `100` as a number
 */
function scalarToString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

function readRequiredString(
  record: Record<string, unknown>,
  key: string,
  path: string,
  issues: ManifestIssue[]
): string {
  const value = record[key];
  if (value === undefined || value === null || value === '') {
    issues.push(missingRequiredField(path));
    return '';
  }
  if (typeof value !== 'string') {
    issues.push(invalidField(path, `Field "${path}" must be a string`));
    return '';
  }
  return value;
}

// =============================================================================
// Parsing
// =============================================================================

function parseParameter(
  entry: unknown,
  path: string,
  issues: ManifestIssue[]
): Parameter | null {
  if (!isRecord(entry)) {
    issues.push(invalidField(path, 'Each parameter must be a mapping with name and value'));
    return null;
  }

  const name = readRequiredString(entry, 'name', `${path}.name`, issues);

  let value = '';
  if (entry.value === undefined || entry.value === null) {
    issues.push(missingRequiredField(`${path}.value`));
  } else {
    const text = scalarToString(entry.value);
    if (text === undefined) {
      issues.push(invalidField(`${path}.value`, `Field "${path}.value" must be a string, number or boolean`));
    } else {
      value = text;
    }
  }

  // Both spellings are accepted; the snake_case one matches the remote API docs
  const rawMethod = entry.applyMethod ?? entry.apply_method;
  let applyMethod: ApplyMethod = DEFAULT_APPLY_METHOD;
  if (rawMethod !== undefined) {
    if (typeof rawMethod === 'string' && isApplyMethod(rawMethod)) {
      applyMethod = rawMethod;
    } else {
      issues.push(
        invalidField(
          `${path}.applyMethod`,
          `Invalid apply method "${String(rawMethod)}"`,
          [`Use one of: ${APPLY_METHODS.join(', ')}`]
        )
      );
    }
  }

  return name ? { name, value, applyMethod } : null;
}

/**
 * Validate parsed manifest data
 *
 * @param data - Output of a YAML/JSON parser
 * @param sourcePath - File the data came from, for messages
 * @throws ManifestError listing every error found
 */
export function parseManifest(data: unknown, sourcePath?: string): ManifestLoadResult {
  const source = sourcePath ?? 'manifest';

  if (!isRecord(data)) {
    throw new ManifestError(
      `Invalid manifest ${source}: expected a mapping at the top level`,
      'MANIFEST_PARSE_ERROR',
      [],
      sourcePath
    );
  }

  const issues: ManifestIssue[] = [];

  if (data.apiVersion !== undefined && data.apiVersion !== MANIFEST_API_VERSION) {
    issues.push({
      code: 'UNSUPPORTED_API_VERSION',
      severity: 'error',
      message: `Unsupported apiVersion "${String(data.apiVersion)}"`,
      path: 'apiVersion',
      suggestions: [`Use apiVersion: ${MANIFEST_API_VERSION}`],
    });
  }

  if (data.kind !== undefined && data.kind !== MANIFEST_KIND) {
    issues.push({
      code: 'UNSUPPORTED_KIND',
      severity: 'error',
      message: `Unsupported kind "${String(data.kind)}"`,
      path: 'kind',
      suggestions: [`Use kind: ${MANIFEST_KIND}`],
    });
  }

  const name = readRequiredString(data, 'name', 'name', issues);
  const family = readRequiredString(data, 'family', 'family', issues);

  let description = DEFAULT_DESCRIPTION;
  if (data.description !== undefined && data.description !== null) {
    if (typeof data.description === 'string') {
      description = data.description;
    } else {
      issues.push(invalidField('description', 'Field "description" must be a string'));
    }
  }

  const parameters: Parameter[] = [];
  const rawParameters = data.parameters ?? [];
  if (!Array.isArray(rawParameters)) {
    issues.push(invalidField('parameters', 'Field "parameters" must be a list'));
  } else {
    const seenIdentity = new Map<string, string>();
    const seenName = new Map<string, string>();

    rawParameters.forEach((entry: unknown, index: number) => {
      const path = `parameters[${index}]`;
      const parameter = parseParameter(entry, path, issues);
      if (!parameter) return;

      const key = identityKey(parameter);
      const firstIdentity = seenIdentity.get(key);
      if (firstIdentity !== undefined) {
        issues.push(duplicateParameter(path, parameter.name, firstIdentity));
        return;
      }
      seenIdentity.set(key, path);

      const firstName = seenName.get(parameter.name);
      if (firstName !== undefined) {
        issues.push(conflictingParameterValues(path, parameter.name, firstName));
      } else {
        seenName.set(parameter.name, path);
      }

      parameters.push(parameter);
    });
  }

  const errors = issues.filter((issue) => issue.severity === 'error');
  if (errors.length > 0) {
    throw new ManifestError(
      `Invalid manifest ${source}: ${errors.length} error(s)`,
      'INVALID_FIELD',
      issues,
      sourcePath
    );
  }

  return {
    group: {
      name: name.toLowerCase(),
      family,
      description,
      parameters,
    },
    warnings: issues.filter((issue) => issue.severity === 'warning'),
    sourcePath,
  };
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Load and validate a manifest file
 *
 * @param manifestPath - Path to a .yaml, .yml or .json file
 * @throws ManifestError when the file is missing, unparseable or invalid
 */
export async function loadManifest(
  manifestPath: string,
  options: ManifestLoadOptions = {}
): Promise<ManifestLoadResult> {
  const absolutePath = isAbsolute(manifestPath)
    ? manifestPath
    : resolve(options.basePath ?? process.cwd(), manifestPath);

  if (!existsSync(absolutePath)) {
    throw new ManifestError(
      `Manifest not found: ${absolutePath}`,
      'MANIFEST_NOT_FOUND',
      [],
      absolutePath
    );
  }

  const ext = extname(absolutePath).toLowerCase();
  if (!MANIFEST_EXTENSIONS.includes(ext)) {
    throw new ManifestError(
      `Unsupported manifest extension "${ext}" (expected ${MANIFEST_EXTENSIONS.join(', ')})`,
      'MANIFEST_PARSE_ERROR',
      [],
      absolutePath
    );
  }

  const content = await readFile(absolutePath, 'utf-8');

  let data: unknown;
  try {
    data = ext === '.json' ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new ManifestError(
      `Failed to parse manifest file: ${err instanceof Error ? err.message : String(err)}`,
      'MANIFEST_PARSE_ERROR',
      [],
      absolutePath,
      { cause: err }
    );
  }

  return parseManifest(data, absolutePath);
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * Build a manifest document from an observed group
 *
 * Observed parameters carry no apply method, so none is written.
 */
export function toManifestDocument(group: ParameterGroup): ManifestDocument {
  return {
    apiVersion: MANIFEST_API_VERSION,
    kind: MANIFEST_KIND,
    name: group.name,
    family: group.family,
    description: group.description,
    parameters: group.parameters.map((parameter) =>
      parameter.applyMethod
        ? { name: parameter.name, value: parameter.value, applyMethod: parameter.applyMethod }
        : { name: parameter.name, value: parameter.value }
    ),
  };
}

/**
 * Render an observed group as manifest YAML
 */
export function stringifyManifest(group: ParameterGroup): string {
  return stringifyYaml(toManifestDocument(group));
}
