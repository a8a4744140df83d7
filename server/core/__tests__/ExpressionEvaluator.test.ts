import { describe, expect, it } from 'vitest';

import { createAppContext, Scope } from '../../runtime/Scope.js';
import { isJsonObject, type JsonObject } from '../../types/json.js';
import { ConfigurationError, EvaluationError } from '../errors.js';
import { evaluate, evaluateCondition, evaluateText } from '../ExpressionEvaluator.js';
import { setOwn } from '../ExpressionValue.js';

const clock = () => new Date('2024-01-02T03:04:05Z');

function scope(): Scope {
  return Scope.create(createAppContext({ clock, common: { apiVersion: 'v2' } }), {
    parameters: { count: 5, name: '', extra: { x: 1 }, tags: ['a', 'b'] },
    body: { items: [{ name: 'a', rank: 2 }, { name: 'b', rank: 1 }], total: '12' },
  });
}

describe('evaluate', () => {
  it('returns the raw value of a single expression and text for mixed strings', () => {
    expect(evaluate('{{parameters.count}}', scope())).toBe(5);
    expect(evaluate('id-{{parameters.count}}', scope())).toBe('id-5');
    expect(evaluate('{{parameters.tags}}', scope())).toEqual(['a', 'b']);
    expect(evaluate('tags={{parameters.tags}}', scope())).toBe('tags=["a","b"]');
  });

  it('keeps a __proto__ key as data instead of changing the prototype', () => {
    const template: JsonObject = { a: 1 };
    setOwn(template, '__proto__', { polluted: '{{parameters.count}}' });

    const result = evaluate(template, scope());

    expect(Object.getPrototypeOf(result)).toBe(Object.prototype);
    expect(isJsonObject(result) ? Object.keys(result) : null).toEqual(['a', '__proto__']);
    expect(Object.getOwnPropertyDescriptor(result, '__proto__')?.value).toEqual({ polluted: 5 });
    expect(evaluate({ '{{"__proto__"}}': { polluted: true } }, scope())).not.toHaveProperty('polluted');
  });

  it('leaves values without templates untouched', () => {
    expect(evaluate({ a: 1, b: [true, null], c: 'plain' }, scope())).toEqual({ a: 1, b: [true, null], c: 'plain' });
    expect(evaluate(undefined, scope())).toBeNull();
  });

  it('resolves missing references to null unless strict', () => {
    expect(evaluate('{{parameters.missing}}', scope())).toBeNull();
    expect(evaluate('x{{parameters.missing}}y', scope())).toBe('xy');
    expect(() => evaluate('{{parameters.missing}}', scope(), { strict: true, path: 'call.url' })).toThrow(
      ConfigurationError,
    );
  });

  it('reads common values, list indexes and projects properties over lists', () => {
    expect(evaluate('{{common.apiVersion}}', scope())).toBe('v2');
    expect(evaluate('{{body.items[1].name}}', scope())).toBe('b');
    expect(evaluate('{{body.items.length}}', scope())).toBe(2);
    expect(evaluate('{{body.items.name}}', scope())).toEqual(['a', 'b']);
  });

  it('splices a collection into an object and evaluates templated keys', () => {
    const template = { '{{...}}': '{{parameters.extra}}', fixed: 1, 'key_{{parameters.count}}': '{{body.total}}' };
    expect(evaluate(template, scope())).toEqual({ x: 1, fixed: 1, key_5: '12' });
  });

  it('applies operators with their coercions', () => {
    expect(evaluate('{{1 + 2 * 3}}', scope())).toBe(7);
    expect(evaluate('{{"a" + 1}}', scope())).toBe('a1');
    expect(evaluate('{{body.total = 12}}', scope())).toBe(true);
    expect(evaluate('{{body.total === 12}}', scope())).toBe(false);
    expect(evaluate('{{parameters.count > 3 ? "big" : "small"}}', scope())).toBe('big');
    expect(evaluate('{{parameters.name || "anon"}}', scope())).toBe('anon');
    expect(evaluate('{{!parameters.tags}}', scope())).toBe(false);
  });

  it('exposes the clock through now and timestamp', () => {
    expect(evaluate('{{now}}', scope())).toBe('2024-01-02T03:04:05.000Z');
    expect(evaluate('{{timestamp}}', scope())).toBe(1704164645);
    expect(evaluate('{{now()}}', scope())).toBe('2024-01-02T03:04:05.000Z');
  });

  it('raises EvaluationError for syntax errors and unknown functions', () => {
    expect(() => evaluate('{{ 1 + }}', scope(), { path: 'modules.list.qs.page' })).toThrow(EvaluationError);
    expect(() => evaluate('{{nope(1)}}', scope())).toThrow('Unknown function "nope"');
    expect(() => evaluate('{{ parameters.count', scope())).toThrow('Unterminated expression');
  });
});

describe('evaluateCondition / evaluateText', () => {
  it('falls back when the template is absent', () => {
    expect(evaluateCondition(undefined, scope(), true)).toBe(true);
    expect(evaluateCondition(undefined, scope(), false)).toBe(false);
  });

  it('uses template truthiness', () => {
    expect(evaluateCondition('{{0}}', scope(), true)).toBe(false);
    expect(evaluateCondition('{{body.items}}', scope(), false)).toBe(true);
    expect(evaluateCondition('{{parameters.name}}', scope(), true)).toBe(false);
    expect(evaluateCondition(true, scope(), false)).toBe(true);
  });

  it('renders null as empty text and collections as JSON', () => {
    expect(evaluateText('{{parameters.missing}}', scope())).toBe('');
    expect(evaluateText('{{parameters.extra}}', scope())).toBe('{"x":1}');
  });
});
