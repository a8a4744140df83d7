import vm from 'node:vm';

import { BUILTIN_FUNCTIONS } from '../core/builtins.js';
import { ConfigurationError, EvaluationError } from '../core/errors.js';
import { getErrorMessage } from '../types/common.js';
import { toJsonValue, type JsonValue } from '../types/json.js';
import type { FunctionCaller } from './Scope.js';

export interface FunctionSource {
  name: string;
  code: string;
}

export interface FunctionSandboxOptions {
  timeoutMs: number;
  clock?: () => Date;
}

const FUNCTION_NAME_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const PAYLOAD_GLOBAL = '__payload';

// Builds the frozen `iml` object inside the context. The host bridge only travels
// through this closure, so sandboxed code never holds a host-realm function.
const BOOTSTRAP = `(function (bridge, names) {
  const library = {};
  for (const name of JSON.parse(names)) {
    library[name] = function () {
      const reply = JSON.parse(bridge(name, JSON.stringify(Array.prototype.slice.call(arguments))));
      if (reply.error !== undefined) {
        throw new Error(reply.error);
      }
      return reply.value;
    };
  }
  Object.defineProperty(globalThis, 'iml', { value: Object.freeze(library), enumerable: false, writable: false });
})`;

const BOOTSTRAP_SCRIPT = new vm.Script(BOOTSTRAP, { filename: 'functions/bootstrap.js' });
const BUILTIN_NAMES = JSON.stringify(Object.keys(BUILTIN_FUNCTIONS));

export class SandboxTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SandboxTimeoutError';
  }
}

function isScriptTimeout(error: unknown): boolean {
  return Boolean(
    error &&
      typeof error === 'object' &&
      'code' in error &&
      error.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT',
  );
}

/**
 * Runs an integration's custom functions inside `node:vm` contexts. Every call
 * gets a fresh context seeded from the compiled sources, so nothing a function
 * leaves on `globalThis` is seen by a later call. Contexts have no `require`,
 * `process`, timers or string code generation; arguments and results cross the
 * boundary as JSON text. This limits what definition code can reach but is not
 * a security boundary against hostile code.
 */
export class FunctionSandbox implements FunctionCaller {
  private readonly sources: vm.Script[] = [];
  private readonly invokers = new Map<string, vm.Script>();
  private readonly timeoutMs: number;
  private readonly clock: () => Date;

  constructor(sources: readonly FunctionSource[], options: FunctionSandboxOptions) {
    this.timeoutMs = options.timeoutMs;
    this.clock = options.clock ?? (() => new Date());

    const issues: string[] = [];
    for (const source of sources) {
      try {
        this.compile(source);
      } catch (error) {
        issues.push(`functions.${source.name}: ${getErrorMessage(error)}`);
      }
    }
    if (issues.length > 0) {
      throw new ConfigurationError(`Invalid custom functions: ${issues.join('; ')}`, issues);
    }
  }

  has(name: string): boolean {
    return this.invokers.has(name);
  }

  names(): string[] {
    return [...this.invokers.keys()];
  }

  call(name: string, args: JsonValue[], expressionPath: string): JsonValue {
    const invoker = this.invokers.get(name);
    if (!invoker) {
      throw new EvaluationError(`Unknown function "${name}"`, { expressionPath, functionName: name });
    }

    try {
      const context = this.createContext();
      for (const script of this.sources) {
        script.runInContext(context, { timeout: this.timeoutMs });
      }
      context[PAYLOAD_GLOBAL] = JSON.stringify(args);
      const raw: unknown = invoker.runInContext(context, { timeout: this.timeoutMs });
      return typeof raw === 'string' ? toJsonValue(JSON.parse(raw)) : null;
    } catch (error) {
      const message = isScriptTimeout(error)
        ? `Function ${name}() exceeded ${this.timeoutMs}ms`
        : `Function ${name}() failed: ${getErrorMessage(error)}`;
      const cause = isScriptTimeout(error) ? new SandboxTimeoutError(message) : error;
      throw new EvaluationError(message, { expressionPath, functionName: name, cause });
    }
  }

  private createContext(): vm.Context {
    const context = vm.createContext(Object.create(null), {
      name: 'connector-functions',
      codeGeneration: { strings: false, wasm: false },
    });
    const bridge = (name: string, payload: string): string => {
      try {
        const builtin = BUILTIN_FUNCTIONS[name];
        const parsed = toJsonValue(JSON.parse(payload));
        const args = Array.isArray(parsed) ? parsed : [];
        return JSON.stringify({ value: builtin(args, { now: this.clock }) });
      } catch (error) {
        return JSON.stringify({ error: `iml.${name}: ${getErrorMessage(error)}` });
      }
    };
    const install: unknown = BOOTSTRAP_SCRIPT.runInContext(context);
    if (typeof install !== 'function') {
      throw new Error('Function sandbox bootstrap did not produce an installer');
    }
    install(bridge, BUILTIN_NAMES);
    return context;
  }

  private compile(source: FunctionSource): void {
    if (!FUNCTION_NAME_PATTERN.test(source.name)) {
      throw new Error('function name must be a valid identifier');
    }
    if (Object.prototype.hasOwnProperty.call(BUILTIN_FUNCTIONS, source.name)) {
      throw new Error('function name shadows a builtin');
    }
    if (this.invokers.has(source.name)) {
      throw new Error('function is declared twice');
    }

    const script = new vm.Script(source.code, { filename: `functions/${source.name}.js` });
    const context = this.createContext();
    script.runInContext(context, { timeout: this.timeoutMs });
    const declared: unknown = vm.runInContext(`typeof ${source.name} === 'function'`, context);
    if (declared !== true) {
      throw new Error(`source does not declare function ${source.name}`);
    }

    this.sources.push(script);
    this.invokers.set(
      source.name,
      new vm.Script(
        `(function () {
          const result = ${source.name}.apply(null, JSON.parse(${PAYLOAD_GLOBAL}));
          return JSON.stringify(result === undefined ? null : result);
        })()`,
        { filename: `functions/${source.name}.invoke.js` },
      ),
    );
  }
}
