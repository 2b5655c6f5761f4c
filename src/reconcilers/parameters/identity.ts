/**
 * Parameter identity
 *
 * Two parameters are the same member of a group's parameter set when their
 * names match exactly and their values match ignoring case. The apply method
 * never takes part: the remote does not report it.
 */

import type { Parameter } from '../../api/types.js';
import type { ParameterIdentity } from './types.js';

const KEY_SEPARATOR = '\u0000';

/**
 * Comparison key of a parameter
 */
export function identityOf(parameter: Parameter): ParameterIdentity {
  return [parameter.name, parameter.value.toLowerCase()];
}

/**
 * Identity flattened into a single map key
 */
export function identityKey(parameter: Parameter): string {
  const [name, value] = identityOf(parameter);
  return `${name}${KEY_SEPARATOR}${value}`;
}

/**
 * Whether two parameters share an identity
 */
export function sameIdentity(a: Parameter, b: Parameter): boolean {
  return identityKey(a) === identityKey(b);
}

/**
 * Index parameters by identity, keeping the first occurrence
 */
export function indexByIdentity(parameters: Iterable<Parameter>): Map<string, Parameter> {
  const index = new Map<string, Parameter>();
  for (const parameter of parameters) {
    const key = identityKey(parameter);
    if (!index.has(key)) {
      index.set(key, parameter);
    }
  }
  return index;
}
