import { describe, expect, it } from 'vitest';

import { ConfigurationError, EvaluationError } from '../../core/errors.js';
import { evaluate } from '../../core/ExpressionEvaluator.js';
import { FunctionSandbox, SandboxTimeoutError } from '../FunctionSandbox.js';
import { createAppContext, Scope } from '../Scope.js';

const clock = () => new Date('2024-01-01T00:00:00Z');

describe('FunctionSandbox', () => {
  it('calls custom functions from templates', () => {
    const functions = new FunctionSandbox(
      [
        { name: 'double', code: 'function double(value) { return value * 2; }' },
        { name: 'label', code: 'function label(item) { return item.first + " " + item.last; }' },
      ],
      { timeoutMs: 500, clock },
    );
    const scope = Scope.create(createAppContext({ functions, clock }), {
      parameters: { n: 21, person: { first: 'Ada', last: 'Lovelace' } },
    });

    expect(evaluate('{{double(parameters.n)}}', scope)).toBe(42);
    expect(evaluate('{{label(parameters.person)}}', scope)).toBe('Ada Lovelace');
    expect(functions.names()).toEqual(['double', 'label']);
  });

  it('exposes builtins to custom code through iml', () => {
    const functions = new FunctionSandbox(
      [{ name: 'stamp', code: 'function stamp(days) { return iml.formatDate(iml.addDays(iml.now(), days), "yyyy-MM-dd"); }' }],
      { timeoutMs: 500, clock },
    );
    expect(functions.call('stamp', [3], '$')).toBe('2024-01-04');
  });

  it('returns null for undefined results and JSON-clones values', () => {
    const functions = new FunctionSandbox(
      [
        { name: 'nothing', code: 'function nothing() {}' },
        { name: 'withDate', code: 'function withDate() { return { at: new Date(0) }; }' },
      ],
      { timeoutMs: 500 },
    );
    expect(functions.call('nothing', [], '$')).toBeNull();
    expect(functions.call('withDate', [], '$')).toEqual({ at: '1970-01-01T00:00:00.000Z' });
  });

  it('has no access to host globals', () => {
    const functions = new FunctionSandbox(
      [{ name: 'reach', code: 'function reach() { return [typeof require, typeof process, typeof setTimeout]; }' }],
      { timeoutMs: 500 },
    );
    expect(functions.call('reach', [], '$')).toEqual(['undefined', 'undefined', 'undefined']);
  });

  it('starts every call from a clean global object', () => {
    const functions = new FunctionSandbox(
      [
        { name: 'counter', code: 'function counter() { globalThis.n = (globalThis.n || 0) + 1; return globalThis.n; }' },
        { name: 'peek', code: 'function peek() { return typeof globalThis.n; }' },
      ],
      { timeoutMs: 500 },
    );

    expect([functions.call('counter', [], '$'), functions.call('counter', [], '$')]).toEqual([1, 1]);
    expect(functions.call('peek', [], '$')).toBe('undefined');
  });

  it('rejects two sources declaring the same function', () => {
    expect(
      () =>
        new FunctionSandbox(
          [
            { name: 'twice', code: 'function twice() { return 1; }' },
            { name: 'twice', code: 'function twice() { return 2; }' },
          ],
          { timeoutMs: 500 },
        ),
    ).toThrow('functions.twice: function is declared twice');
  });

  it('stops functions that exceed the time limit', () => {
    const functions = new FunctionSandbox([{ name: 'spin', code: 'function spin() { while (true) {} }' }], {
      timeoutMs: 50,
    });
    let caught: unknown;
    try {
      functions.call('spin', [], 'modules.list.url');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(EvaluationError);
    expect(caught instanceof EvaluationError && caught.cause).toBeInstanceOf(SandboxTimeoutError);
    expect(caught instanceof EvaluationError && caught.expressionPath).toBe('modules.list.url');
  });

  it('wraps thrown errors in EvaluationError', () => {
    const functions = new FunctionSandbox([{ name: 'fail', code: 'function fail() { throw new Error("bad input"); }' }], {
      timeoutMs: 500,
    });
    expect(() => functions.call('fail', [], '$')).toThrow('Function fail() failed: bad input');
  });

  it('rejects sources that do not declare their function or shadow builtins', () => {
    expect(() => new FunctionSandbox([{ name: 'missing', code: 'var x = 1;' }], { timeoutMs: 500 })).toThrow(
      ConfigurationError,
    );
    expect(() => new FunctionSandbox([{ name: 'upper', code: 'function upper() {}' }], { timeoutMs: 500 })).toThrow(
      'functions.upper: function name shadows a builtin',
    );
    expect(() => new FunctionSandbox([{ name: 'broken', code: 'function broken( {' }], { timeoutMs: 500 })).toThrow(
      ConfigurationError,
    );
  });
});
