export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  // Tag check instead of instanceof so values built in another vm realm still qualify.
  return Object.prototype.toString.call(value) === '[object Object]';
}

/**
 * Normalises an arbitrary host value into the JSON value model used by templates.
 * `undefined`, functions and symbols become null, dates become ISO strings and
 * non-finite numbers become null.
 */
export function toJsonValue(input: unknown, depth = 0): JsonValue {
  if (depth > 64) {
    return null;
  }
  if (input === null || input === undefined) {
    return null;
  }
  switch (typeof input) {
    case 'string':
    case 'boolean':
      return input;
    case 'number':
      return Number.isFinite(input) ? input : null;
    case 'bigint':
      return Number(input);
    case 'object':
      break;
    default:
      return null;
  }
  if (input instanceof Date) {
    return Number.isNaN(input.getTime()) ? null : input.toISOString();
  }
  if (Array.isArray(input)) {
    return input.map(entry => toJsonValue(entry, depth + 1));
  }
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(input)) {
    if (value === undefined) {
      continue;
    }
    result[key] = toJsonValue(value, depth + 1);
  }
  return result;
}

export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/** Stable JSON encoding with sorted object keys, used for hashing and cursor comparison. */
export function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(entry => canonicalJson(entry)).join(',')}]`;
  }
  if (isJsonObject(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map(key => `${JSON.stringify(key)}:${canonicalJson(value[key])}`).join(',')}}`;
  }
  return JSON.stringify(value);
}
