import { isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';

export type ValueKind = 'null' | 'bool' | 'number' | 'string' | 'list' | 'map';

export function kindOf(value: JsonValue): ValueKind {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'list';
  }
  switch (typeof value) {
    case 'boolean':
      return 'bool';
    case 'number':
      return 'number';
    case 'string':
      return 'string';
    default:
      return 'map';
  }
}

export function isTruthy(value: JsonValue): boolean {
  switch (kindOf(value)) {
    case 'null':
      return false;
    case 'bool':
      return value === true;
    case 'number':
      return typeof value === 'number' && value !== 0 && !Number.isNaN(value);
    case 'string':
      return value !== '';
    case 'list':
      return Array.isArray(value) && value.length > 0;
    case 'map':
      return true;
  }
}

/** Text form: null is empty, lists and maps are JSON. */
export function toText(value: JsonValue): string {
  if (value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

export function toNumber(value: JsonValue): number {
  if (value === null) {
    return 0;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? Number.NaN : Number(trimmed);
  }
  return Number.NaN;
}

export function toList(value: JsonValue): JsonValue[] {
  if (value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

export function isEmptyValue(value: JsonValue): boolean {
  if (value === null || value === '') {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  if (isJsonObject(value)) {
    return Object.keys(value).length === 0;
  }
  return false;
}

/** Numbers add, a string on either side concatenates, two lists join. */
export function addValues(left: JsonValue, right: JsonValue): JsonValue {
  if (Array.isArray(left) && Array.isArray(right)) {
    return [...left, ...right];
  }
  if (Array.isArray(left)) {
    return [...left, right];
  }
  if (typeof left === 'string' || typeof right === 'string') {
    return toText(left) + toText(right);
  }
  if (isJsonObject(left) || isJsonObject(right)) {
    return toText(left) + toText(right);
  }
  return toNumber(left) + toNumber(right);
}

export function strictEquals(left: JsonValue, right: JsonValue): boolean {
  if (left === right) {
    return true;
  }
  if (kindOf(left) !== kindOf(right)) {
    return false;
  }
  if (Array.isArray(left) && Array.isArray(right)) {
    return left.length === right.length && left.every((entry, index) => strictEquals(entry, right[index]));
  }
  if (isJsonObject(left) && isJsonObject(right)) {
    const leftKeys = Object.keys(left);
    const rightKeys = Object.keys(right);
    return (
      leftKeys.length === rightKeys.length &&
      leftKeys.every(key => Object.prototype.hasOwnProperty.call(right, key) && strictEquals(left[key], right[key]))
    );
  }
  return false;
}

/** Loose equality: numbers compare with numeric strings, null only equals null. */
export function looseEquals(left: JsonValue, right: JsonValue): boolean {
  if (strictEquals(left, right)) {
    return true;
  }
  if (left === null || right === null) {
    return false;
  }
  const leftKind = kindOf(left);
  const rightKind = kindOf(right);
  const scalar = (kind: ValueKind) => kind === 'number' || kind === 'string' || kind === 'bool';
  if (scalar(leftKind) && scalar(rightKind)) {
    if (leftKind === 'string' && rightKind === 'string') {
      return false;
    }
    const leftNumber = toNumber(left);
    const rightNumber = toNumber(right);
    return !Number.isNaN(leftNumber) && leftNumber === rightNumber;
  }
  return false;
}

/**
 * Ordering used by relational operators and `sort`. Two strings compare as text,
 * anything else numerically. Returns NaN when the operands are not comparable.
 */
export function compareValues(left: JsonValue, right: JsonValue): number {
  if (typeof left === 'string' && typeof right === 'string') {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  const leftNumber = toNumber(left);
  const rightNumber = toNumber(right);
  if (Number.isNaN(leftNumber) || Number.isNaN(rightNumber)) {
    return Number.NaN;
  }
  return leftNumber - rightNumber;
}

export function getOwn(map: JsonObject, key: string): JsonValue | undefined {
  return Object.prototype.hasOwnProperty.call(map, key) ? map[key] : undefined;
}

/** Defines `key` as an own data property, so `__proto__` is stored as a key instead of swapping the prototype. */
export function setOwn(map: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(map, key, { value, enumerable: true, writable: true, configurable: true });
}

/** Dotted path lookup (`a.b.0.c`), used by `get` and iterate containers. */
export function getPath(value: JsonValue, path: string): JsonValue | undefined {
  if (path === '') {
    return value;
  }
  let current: JsonValue | undefined = value;
  for (const segment of path.split('.')) {
    if (current === undefined || current === null) {
      return undefined;
    }
    if (Array.isArray(current)) {
      const index = Number(segment);
      current = Number.isInteger(index) ? current[index] : undefined;
      continue;
    }
    if (isJsonObject(current)) {
      current = getOwn(current, segment);
      continue;
    }
    return undefined;
  }
  return current;
}
