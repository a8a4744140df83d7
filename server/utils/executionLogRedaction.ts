import { toJsonValue, type JsonValue } from '../types/json.js';
import { excisePaths, redactSecrets } from './redact.js';

function toSerializable(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
    };
  }
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  if (value instanceof Set) {
    return Array.from(value);
  }
  if (value instanceof URLSearchParams) {
    return Object.fromEntries(value);
  }
  return value;
}

/**
 * Prepare arbitrary data for logging: make it JSON-serializable, drop the
 * definition's `log.sanitize` paths, then redact secret-looking keys.
 */
export function sanitizeLogPayload(payload: unknown, sanitizePaths: readonly string[] = []): JsonValue {
  if (payload === undefined) {
    return null;
  }

  let serializable: JsonValue;
  try {
    const json = JSON.stringify(payload, (_key, value: unknown) => toSerializable(value));
    serializable = json === undefined ? null : toJsonValue(JSON.parse(json));
  } catch {
    serializable = toJsonValue(payload);
  }

  return redactSecrets(excisePaths(serializable, sanitizePaths));
}
