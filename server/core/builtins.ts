import { createHash, createHmac, randomUUID } from 'node:crypto';
import {
  addDays,
  addHours,
  addMinutes,
  addSeconds,
  differenceInDays,
  differenceInHours,
  differenceInMilliseconds,
  differenceInMinutes,
  differenceInSeconds,
  format,
  isValid,
  parse,
  parseISO,
} from 'date-fns';

import { canonicalJson, isJsonObject, toJsonValue, type JsonObject, type JsonValue } from '../types/json.js';
import {
  compareValues,
  getOwn,
  getPath,
  isEmptyValue,
  isTruthy,
  strictEquals,
  toList,
  toNumber,
  toText,
} from './ExpressionValue.js';

export interface BuiltinContext {
  now(): Date;
}

export type BuiltinFunction = (args: readonly JsonValue[], context: BuiltinContext) => JsonValue;

const SECONDS_THRESHOLD = 1e11;

/**
 * Interprets a template value as a point in time. Numbers (and numeric strings)
 * below 1e11 are unix seconds, larger ones milliseconds; other strings are ISO 8601.
 */
export function parseDateValue(value: JsonValue): Date | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return null;
    }
    return new Date(Math.abs(value) < SECONDS_THRESHOLD ? value * 1000 : value);
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }
  const trimmed = value.trim();
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return parseDateValue(Number(trimmed));
  }
  const iso = parseISO(trimmed);
  if (isValid(iso)) {
    return iso;
  }
  const fallback = new Date(trimmed);
  return isValid(fallback) ? fallback : null;
}

function requireDate(value: JsonValue | undefined, fn: string): Date {
  const parsed = parseDateValue(value ?? null);
  if (!parsed) {
    throw new Error(`${fn}: ${JSON.stringify(value ?? null)} is not a valid date`);
  }
  return parsed;
}

function requireNumber(value: JsonValue | undefined, fn: string): number {
  const parsed = toNumber(value ?? null);
  if (Number.isNaN(parsed)) {
    throw new Error(`${fn}: ${JSON.stringify(value ?? null)} is not a number`);
  }
  return parsed;
}

function text(value: JsonValue | undefined): string {
  return toText(value ?? null);
}

// date-fns formats in local time; shift so that patterns render UTC wall-clock time.
function toUtcWallClock(date: Date): Date {
  return addMinutes(date, date.getTimezoneOffset());
}

function fromUtcWallClock(date: Date): Date {
  return addMinutes(date, -date.getTimezoneOffset());
}

function toSearchPattern(search: string): string | RegExp {
  const match = /^\/(.+)\/([gimsuy]*)$/.exec(search);
  if (!match) {
    return search;
  }
  const flags = match[2].includes('g') ? match[2] : `${match[2]}g`;
  return new RegExp(match[1], flags);
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

type DigestEncoding = 'hex' | 'base64' | 'base64url';

function digestEncoding(value: JsonValue | undefined): DigestEncoding {
  const encoding = value === undefined || value === null ? 'hex' : text(value);
  if (encoding === 'hex' || encoding === 'base64' || encoding === 'base64url') {
    return encoding;
  }
  throw new Error(`Unsupported digest encoding "${encoding}"`);
}

function digest(algorithm: string): BuiltinFunction {
  return ([value, encoding]) => createHash(algorithm).update(text(value)).digest(digestEncoding(encoding));
}

function keyList(args: readonly JsonValue[]): string[] {
  return args.flatMap(arg => toList(arg)).map(key => toText(key));
}

function numericArguments(args: readonly JsonValue[], fn: string): number[] {
  const values = args.length === 1 && Array.isArray(args[0]) ? args[0] : args;
  return values.map(value => requireNumber(value, fn));
}

function dateShift(shift: (date: Date, amount: number) => Date, fn: string): BuiltinFunction {
  return ([date, amount]) => shift(requireDate(date, fn), requireNumber(amount, fn)).toISOString();
}

const DIFFERENCE_UNITS: Record<string, (left: Date, right: Date) => number> = {
  milliseconds: differenceInMilliseconds,
  seconds: differenceInSeconds,
  minutes: differenceInMinutes,
  hours: differenceInHours,
  days: differenceInDays,
};

const stringFunctions: Record<string, BuiltinFunction> = {
  lower: ([value]) => text(value).toLowerCase(),
  upper: ([value]) => text(value).toUpperCase(),
  capitalize: ([value]) => {
    const source = text(value);
    return source.charAt(0).toUpperCase() + source.slice(1);
  },
  trim: ([value]) => text(value).trim(),
  replace: ([value, search, replacement]) =>
    text(value).replaceAll(toSearchPattern(text(search)), text(replacement)),
  substring: ([value, start, end]) =>
    text(value).substring(requireNumber(start, 'substring'), end === undefined ? undefined : requireNumber(end, 'substring')),
  indexOf: ([value, search, from]) =>
    text(value).indexOf(text(search), from === undefined ? 0 : requireNumber(from, 'indexOf')),
  split: ([value, separator]) => text(value).split(separator === undefined ? ',' : text(separator)),
  join: ([list, separator]) => toList(list ?? null).map(entry => toText(entry)).join(separator === undefined ? ',' : text(separator)),
  length: ([value]) => {
    if (value === undefined || value === null) {
      return 0;
    }
    if (Array.isArray(value)) {
      return value.length;
    }
    if (isJsonObject(value)) {
      return Object.keys(value).length;
    }
    return text(value).length;
  },
  toString: ([value]: readonly JsonValue[]) => text(value),
  encodeURL: ([value]) => encodeURIComponent(text(value)),
  decodeURL: ([value]) => decodeURIComponent(text(value)),
  escapeHTML: ([value]) => text(value).replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char),
  startsWith: ([value, prefix]) => text(value).startsWith(text(prefix)),
  endsWith: ([value, suffix]) => text(value).endsWith(text(suffix)),
};

const collectionFunctions: Record<string, BuiltinFunction> = {
  get: ([value, path]) => {
    if (value === undefined || path === undefined) {
      return null;
    }
    if (typeof path === 'number') {
      return Array.isArray(value) ? value[path] ?? null : null;
    }
    return getPath(value, text(path)) ?? null;
  },
  map: ([list, key, filterKey, filterValues]) => {
    const items = toList(list ?? null);
    const allowed = filterKey === undefined || filterKey === null
      ? null
      : new Set((Array.isArray(filterValues) ? filterValues : text(filterValues).split(',')).map(entry => toText(entry).trim()));
    return items
      .filter(item => !allowed || allowed.has(toText(getPath(item, text(filterKey)) ?? null)))
      .map(item => getPath(item, text(key)) ?? null);
  },
  contains: ([haystack, needle]) => {
    const target = needle ?? null;
    if (Array.isArray(haystack)) {
      return haystack.some(entry => strictEquals(entry, target));
    }
    if (isJsonObject(haystack)) {
      return getOwn(haystack, text(target)) !== undefined;
    }
    return text(haystack).includes(text(target));
  },
  first: ([list]) => (Array.isArray(list) ? list[0] ?? null : null),
  last: ([list]) => (Array.isArray(list) ? list[list.length - 1] ?? null : null),
  keys: ([map]) => (isJsonObject(map) ? Object.keys(map) : []),
  pick: ([map, ...keys]) => {
    if (!isJsonObject(map)) {
      return null;
    }
    const picked: JsonObject = {};
    for (const key of keyList(keys)) {
      const value = getOwn(map, key);
      if (value !== undefined) {
        picked[key] = value;
      }
    }
    return picked;
  },
  omit: ([map, ...keys]) => {
    if (!isJsonObject(map)) {
      return null;
    }
    const excluded = new Set(keyList(keys));
    const result: JsonObject = {};
    for (const [key, value] of Object.entries(map)) {
      if (!excluded.has(key)) {
        result[key] = value;
      }
    }
    return result;
  },
  merge: args => {
    const merged: JsonObject = {};
    for (const arg of args) {
      if (arg === null) {
        continue;
      }
      if (!isJsonObject(arg)) {
        throw new Error('merge: every argument must be a collection');
      }
      Object.assign(merged, arg);
    }
    return merged;
  },
  flatten: ([list]) => toList(list ?? null).flatMap(entry => (Array.isArray(entry) ? entry : [entry])),
  deduplicate: ([list]) => {
    const seen = new Set<string>();
    return toList(list ?? null).filter(entry => {
      const key = canonicalJson(entry);
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });
  },
  sort: ([list, order, key]) => {
    const direction = text(order).toLowerCase() === 'desc' ? -1 : 1;
    const keyPath = key === undefined || key === null ? null : text(key);
    const pickKey = (entry: JsonValue) => (keyPath === null ? entry : getPath(entry, keyPath) ?? null);
    return [...toList(list ?? null)].sort((left, right) => {
      const comparison = compareValues(pickKey(left), pickKey(right));
      return Number.isNaN(comparison) ? 0 : comparison * direction;
    });
  },
  slice: ([value, start, end]) => {
    const from = requireNumber(start ?? 0, 'slice');
    const to = end === undefined || end === null ? undefined : requireNumber(end, 'slice');
    if (Array.isArray(value)) {
      return value.slice(from, to);
    }
    return text(value).slice(from, to);
  },
  add: ([list, ...values]) => [...toList(list ?? null), ...values],
  toArray: ([value]) => {
    if (isJsonObject(value)) {
      return Object.entries(value).map(([key, entry]) => ({ key, value: entry }));
    }
    return toList(value ?? null);
  },
  emptyarray: () => [],
};

const logicFunctions: Record<string, BuiltinFunction> = {
  if: ([condition, whenTrue, whenFalse]) => (isTruthy(condition ?? null) ? whenTrue ?? null : whenFalse ?? null),
  ifempty: ([value, fallback]) => (isEmptyValue(value ?? null) ? fallback ?? null : value ?? null),
  isEmpty: ([value]) => isEmptyValue(value ?? null),
};

const numberFunctions: Record<string, BuiltinFunction> = {
  parseNumber: ([value, decimalSeparator]) => {
    const separator = decimalSeparator === undefined || decimalSeparator === null ? '.' : text(decimalSeparator);
    const cleaned = text(value)
      .split('')
      .filter(char => /[0-9-]/.test(char) || char === separator)
      .join('')
      .replace(separator, '.');
    const parsed = Number(cleaned);
    return cleaned === '' || Number.isNaN(parsed) ? null : parsed;
  },
  round: ([value, digits]) => {
    const factor = 10 ** (digits === undefined ? 0 : requireNumber(digits, 'round'));
    return Math.round(requireNumber(value, 'round') * factor) / factor;
  },
  floor: ([value]) => Math.floor(requireNumber(value, 'floor')),
  ceil: ([value]) => Math.ceil(requireNumber(value, 'ceil')),
  min: args => {
    const values = numericArguments(args, 'min');
    return values.length === 0 ? null : Math.min(...values);
  },
  max: args => {
    const values = numericArguments(args, 'max');
    return values.length === 0 ? null : Math.max(...values);
  },
  sum: args => numericArguments(args, 'sum').reduce((total, value) => total + value, 0),
};

const dateFunctions: Record<string, BuiltinFunction> = {
  now: (_args, context) => context.now().toISOString(),
  timestamp: (_args, context) => Math.floor(context.now().getTime() / 1000),
  formatDate: ([date, pattern]) => {
    const parsed = requireDate(date, 'formatDate');
    if (pattern === undefined || pattern === null) {
      return parsed.toISOString();
    }
    return format(toUtcWallClock(parsed), text(pattern));
  },
  parseDate: ([value, pattern], context) => {
    if (pattern === undefined || pattern === null) {
      return requireDate(value, 'parseDate').toISOString();
    }
    const parsed = parse(text(value), text(pattern), toUtcWallClock(context.now()));
    if (!isValid(parsed)) {
      throw new Error(`parseDate: "${text(value)}" does not match "${text(pattern)}"`);
    }
    return fromUtcWallClock(parsed).toISOString();
  },
  addSeconds: dateShift(addSeconds, 'addSeconds'),
  addMinutes: dateShift(addMinutes, 'addMinutes'),
  addHours: dateShift(addHours, 'addHours'),
  addDays: dateShift(addDays, 'addDays'),
  dateDifference: ([left, right, unit]) => {
    const name = unit === undefined || unit === null ? 'seconds' : text(unit);
    const difference = DIFFERENCE_UNITS[name];
    if (!difference) {
      throw new Error(`dateDifference: unsupported unit "${name}"`);
    }
    return difference(requireDate(left, 'dateDifference'), requireDate(right, 'dateDifference'));
  },
};

const cryptoFunctions: Record<string, BuiltinFunction> = {
  md5: digest('md5'),
  sha1: digest('sha1'),
  sha256: digest('sha256'),
  sha512: digest('sha512'),
  hmac: ([value, key, algorithm, encoding]) =>
    createHmac(algorithm === undefined || algorithm === null ? 'sha256' : text(algorithm), text(key))
      .update(text(value))
      .digest(digestEncoding(encoding)),
  base64: ([value]) => Buffer.from(text(value), 'utf8').toString('base64'),
  decodeBase64: ([value]) => Buffer.from(text(value), 'base64').toString('utf8'),
  uuid: () => randomUUID(),
};

const jsonFunctions: Record<string, BuiltinFunction> = {
  toJSON: ([value]) => JSON.stringify(value ?? null),
  parseJSON: ([value]) => {
    const source = text(value);
    return source === '' ? null : toJsonValue(JSON.parse(source));
  },
};

export const BUILTIN_FUNCTIONS: Readonly<Record<string, BuiltinFunction>> = Object.freeze({
  ...stringFunctions,
  ...collectionFunctions,
  ...logicFunctions,
  ...numberFunctions,
  ...dateFunctions,
  ...cryptoFunctions,
  ...jsonFunctions,
});

export function getBuiltin(name: string): BuiltinFunction | undefined {
  return Object.prototype.hasOwnProperty.call(BUILTIN_FUNCTIONS, name) ? BUILTIN_FUNCTIONS[name] : undefined;
}
