import type { ParameterDefinition } from '../connectors/types.js';
import { ValidationError } from '../core/errors.js';
import { cloneJson, type JsonObject } from '../types/json.js';

function isMissing(value: JsonObject[string] | undefined): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Applies declared defaults and rejects missing required parameters. Keys the
 * definition does not declare are passed through untouched.
 */
export function resolveParameters(
  definitions: readonly ParameterDefinition[] | undefined,
  supplied: JsonObject,
  owner: string,
): JsonObject {
  const resolved: JsonObject = { ...supplied };
  const missing: string[] = [];

  for (const parameter of definitions ?? []) {
    if (isMissing(resolved[parameter.name]) && parameter.default !== undefined) {
      resolved[parameter.name] = cloneJson(parameter.default);
    }
    if (parameter.required && isMissing(resolved[parameter.name])) {
      missing.push(parameter.name);
    }
  }

  if (missing.length > 0) {
    throw new ValidationError(`${owner}: missing required parameter${missing.length > 1 ? 's' : ''} ${missing.join(', ')}`, {
      statusCode: null,
    });
  }
  return resolved;
}
