import { isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';

const SECRET_KEY_FRAGMENTS = ['token', 'secret', 'apikey', 'api_key', 'password', 'authorization', 'client_secret'];

export const REDACTED = '***';

export function isSecretKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return SECRET_KEY_FRAGMENTS.some(fragment => normalized.includes(fragment));
}

function maskValue(value: JsonValue): string {
  return typeof value === 'string' && value.length > 12 ? `${value.slice(0, 3)}${REDACTED}${value.slice(-2)}` : REDACTED;
}

export function redactSecrets(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(redactSecrets);
  }
  if (!isJsonObject(value)) {
    return value;
  }
  const out: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    if (isSecretKey(key) && (entry === null || typeof entry !== 'object')) {
      out[key] = entry === null ? null : maskValue(entry);
    } else {
      out[key] = redactSecrets(entry);
    }
  }
  return out;
}

/**
 * Removes the values at dotted paths (`request.headers.authorization`, `response.body.items.*.ssn`).
 * A `*` segment matches every key or index at that level. Key matching ignores case.
 */
export function excisePaths(value: JsonValue, paths: readonly string[]): JsonValue {
  let result = value;
  for (const path of paths) {
    const segments = path.split('.').filter(segment => segment.length > 0);
    if (segments.length > 0) {
      result = exciseSegments(result, segments);
    }
  }
  return result;
}

function exciseSegments(value: JsonValue, segments: readonly string[]): JsonValue {
  const [head, ...rest] = segments;
  if (Array.isArray(value)) {
    return value.map((entry, index) => {
      if (head !== '*' && head !== String(index)) {
        return entry;
      }
      return rest.length === 0 ? REDACTED : exciseSegments(entry, rest);
    });
  }
  if (!isJsonObject(value)) {
    return value;
  }
  const out: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    const matches = head === '*' || key.toLowerCase() === head.toLowerCase();
    if (!matches) {
      out[key] = entry;
    } else if (rest.length > 0) {
      out[key] = exciseSegments(entry, rest);
    }
  }
  return out;
}

/** Masks secret-looking query parameters (`?api_key=...`) in a URL. */
export function redactUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  let changed = false;
  for (const key of [...new Set(parsed.searchParams.keys())]) {
    if (isSecretKey(key)) {
      parsed.searchParams.set(key, REDACTED);
      changed = true;
    }
  }
  return changed ? parsed.toString() : url;
}
