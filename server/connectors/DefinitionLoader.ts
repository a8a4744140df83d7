import { readFile } from 'node:fs/promises';

import AjvModule, { type ErrorObject, type ValidateFunction } from 'ajv';

import { ConfigurationError, EvaluationError } from '../core/errors.js';
import { hasTemplate, parseTemplate } from '../core/ExpressionEvaluator.js';
import { FunctionSandbox } from '../runtime/FunctionSandbox.js';
import { getErrorMessage } from '../types/common.js';
import { deepFreeze, isJsonObject, toJsonValue, type JsonValue } from '../types/json.js';
import { INTEGRATION_DEFINITION_SCHEMA } from './schema.js';
import { toCallArray, type IntegrationDefinition, type RpcDefinition } from './types.js';

// ajv is published as CommonJS; under NodeNext the class sits on `.default`.
const Ajv = AjvModule.default;

let validator: ValidateFunction<IntegrationDefinition> | null = null;

function getValidator(): ValidateFunction<IntegrationDefinition> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true, strict: false });
    validator = ajv.compile<IntegrationDefinition>(INTEGRATION_DEFINITION_SCHEMA);
  }
  return validator;
}

function formatSchemaError(error: ErrorObject): string {
  const location = error.instancePath || '/';
  return `${location} ${error.message ?? 'is invalid'}`;
}

function collectTemplateIssues(value: JsonValue, path: string, issues: string[]): void {
  if (typeof value === 'string') {
    if (!hasTemplate(value)) {
      return;
    }
    try {
      parseTemplate(value, path);
    } catch (error) {
      issues.push(error instanceof EvaluationError ? `${path}: ${error.message}` : `${path}: ${getErrorMessage(error)}`);
    }
    return;
  }
  if (Array.isArray(value)) {
    value.forEach((entry, index) => collectTemplateIssues(entry, `${path}[${index}]`, issues));
    return;
  }
  if (isJsonObject(value)) {
    for (const [key, entry] of Object.entries(value)) {
      if (path === '$' && key === 'functions') {
        continue;
      }
      if (key !== '{{...}}') {
        collectTemplateIssues(key, `${path}.${key}`, issues);
      }
      collectTemplateIssues(entry, `${path}.${key}`, issues);
    }
  }
}

function findNestedCycle(rpcs: Record<string, RpcDefinition>, start: string): boolean {
  const seen = new Set<string>();
  let current: string | undefined = start;
  while (current) {
    if (seen.has(current)) {
      return true;
    }
    seen.add(current);
    current = rpcs[current]?.nested?.rpc;
  }
  return false;
}

function collectSemanticIssues(definition: IntegrationDefinition, issues: string[]): void {
  const connections = definition.connections ?? {};
  const webhooks = definition.webhooks ?? {};
  const rpcs = definition.rpcs ?? {};

  const requireConnection = (owner: string, connection: string | undefined) => {
    if (connection !== undefined && !Object.prototype.hasOwnProperty.call(connections, connection)) {
      issues.push(`${owner}: unknown connection "${connection}"`);
    }
  };

  for (const [name, connection] of Object.entries(connections)) {
    if ((connection.type === 'oauth' || connection.type === 'oauth-pkce') && (!connection.authorize || !connection.token)) {
      issues.push(`connections.${name}: OAuth connections need both authorize and token calls`);
    }
  }

  for (const [name, module] of Object.entries(definition.modules ?? {})) {
    const owner = `modules.${name}`;
    requireConnection(owner, module.connection);

    if (module.type === 'instant') {
      if (!module.webhook) {
        issues.push(`${owner}: instant triggers must reference a webhook`);
      } else if (!Object.prototype.hasOwnProperty.call(webhooks, module.webhook)) {
        issues.push(`${owner}: unknown webhook "${module.webhook}"`);
      }
      continue;
    }

    const calls = toCallArray(module.communication);
    if (calls.length === 0) {
      issues.push(`${owner}: communication is required`);
      continue;
    }
    if (module.type === 'trigger') {
      const last = calls[calls.length - 1];
      if (last.response?.trigger?.id === undefined) {
        issues.push(`${owner}: trigger modules must declare response.trigger.id`);
      }
    }
  }

  for (const [name, rpc] of Object.entries(rpcs)) {
    const owner = `rpcs.${name}`;
    requireConnection(owner, rpc.connection);
    if (rpc.nested) {
      if (!Object.prototype.hasOwnProperty.call(rpcs, rpc.nested.rpc)) {
        issues.push(`${owner}: nested parent "${rpc.nested.rpc}" is not a known RPC`);
      } else if (findNestedCycle(rpcs, name)) {
        issues.push(`${owner}: nested RPC chain forms a cycle`);
      }
    }
  }

  for (const [name, webhook] of Object.entries(webhooks)) {
    requireConnection(`webhooks.${name}`, webhook.connection);
  }

  const functionNames = new Set<string>();
  for (const fn of definition.functions ?? []) {
    if (functionNames.has(fn.name)) {
      issues.push(`functions.${fn.name}: declared more than once`);
    }
    functionNames.add(fn.name);
  }
}

export interface LoadDefinitionOptions {
  functionTimeoutMs?: number;
}

/**
 * Validates a raw definition (schema, template syntax, cross references, custom
 * function sources) and returns a deep-frozen copy. Every problem found is
 * reported in one `ConfigurationError`.
 */
export function loadIntegrationDefinition(input: unknown, options: LoadDefinitionOptions = {}): IntegrationDefinition {
  const validate = getValidator();
  if (!validate(input)) {
    const issues = (validate.errors ?? []).map(formatSchemaError);
    throw new ConfigurationError(`Invalid integration definition: ${issues.join('; ')}`, issues);
  }

  const definition = structuredClone(input);
  const issues: string[] = [];
  collectSemanticIssues(definition, issues);
  collectTemplateIssues(toJsonValue(definition), '$', issues);

  try {
    new FunctionSandbox(definition.functions ?? [], { timeoutMs: options.functionTimeoutMs ?? 1000 });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      issues.push(...error.issues);
    } else {
      throw error;
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(
      `Invalid integration definition "${definition.name}": ${issues.join('; ')}`,
      issues,
    );
  }

  return deepFreeze(definition);
}

export async function loadIntegrationDefinitionFromFile(
  path: string,
  options: LoadDefinitionOptions = {},
): Promise<IntegrationDefinition> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Unable to read integration definition at ${path}: ${getErrorMessage(error)}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Integration definition at ${path} is not valid JSON: ${getErrorMessage(error)}`);
  }
  return loadIntegrationDefinition(parsed, options);
}
