import type { JsonObject, JsonValue } from '../types/json.js';

export const SCOPE_VARIABLES = [
  'parameters',
  'connection',
  'common',
  'body',
  'headers',
  'statusCode',
  'item',
  'temp',
  'data',
  'pagination',
  'oauth',
  'webhook',
  'output',
] as const;

export type ScopeVariable = (typeof SCOPE_VARIABLES)[number];

export function isScopeVariable(name: string): name is ScopeVariable {
  return SCOPE_VARIABLES.some(variable => variable === name);
}

export type ScopeLayer = Partial<Record<ScopeVariable, JsonValue>>;

/** Resolves names that are not builtins, i.e. the integration's custom functions. */
export interface FunctionCaller {
  has(name: string): boolean;
  call(name: string, args: JsonValue[], expressionPath: string): JsonValue;
}

export interface AppContext {
  common: JsonObject;
  functions: FunctionCaller;
  clock: () => Date;
}

const NO_FUNCTIONS: FunctionCaller = {
  has: () => false,
  call: name => {
    throw new Error(`Unknown function "${name}"`);
  },
};

/**
 * Immutable set of variables visible to expressions. Each `with` call returns a
 * new scope; only `temp` is expected to change between Call steps, and it is
 * threaded by the caller rather than mutated here.
 */
export class Scope {
  private constructor(
    readonly app: AppContext,
    private readonly variables: Readonly<ScopeLayer>,
  ) {}

  static create(app: AppContext, layer: ScopeLayer = {}): Scope {
    return new Scope(app, { common: app.common, temp: {}, ...layer });
  }

  with(layer: ScopeLayer): Scope {
    return new Scope(this.app, { ...this.variables, ...layer });
  }

  lookup(name: string): JsonValue | undefined {
    if (!isScopeVariable(name) || !Object.prototype.hasOwnProperty.call(this.variables, name)) {
      return undefined;
    }
    return this.variables[name];
  }

  get(name: ScopeVariable): JsonValue | undefined {
    return this.variables[name];
  }

  now(): Date {
    return this.app.clock();
  }
}

export function createAppContext(options: Partial<AppContext> = {}): AppContext {
  return {
    common: options.common ?? {},
    functions: options.functions ?? NO_FUNCTIONS,
    clock: options.clock ?? (() => new Date()),
  };
}
