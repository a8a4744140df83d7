import { isIterateDirective, type BaseDefinition, type ResponseDirective } from '../connectors/types.js';
import { evaluate, evaluateCondition } from '../core/ExpressionEvaluator.js';
import type { Scope } from '../runtime/Scope.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';

/**
 * Items selected by `response.iterate`. A missing directive yields no items; a
 * container that is not a list is treated as a single item.
 */
export function extractItems(directive: ResponseDirective['iterate'], scope: Scope, path = 'response.iterate'): JsonValue[] {
  if (directive === undefined) {
    return [];
  }
  const containerTemplate = isIterateDirective(directive) ? directive.container : directive;
  const container = evaluate(containerTemplate, scope, { path });
  if (container === null) {
    return [];
  }
  const items = Array.isArray(container) ? container : [container];
  if (!isIterateDirective(directive) || directive.condition === undefined) {
    return items;
  }
  const condition = directive.condition;
  return items.filter(item =>
    evaluateCondition(condition, scope.with({ item }), true, { path: `${path}.condition` }),
  );
}

/** Maps one item (or the whole body when nothing is iterated) through `output`. */
export function mapOutput(
  response: ResponseDirective | undefined,
  base: BaseDefinition | undefined,
  scope: Scope,
  item?: JsonValue,
): JsonValue {
  const itemScope = item === undefined ? scope : scope.with({ item });
  const template = response?.output ?? base?.response?.output;
  if (template !== undefined) {
    return evaluate(template, itemScope, { path: 'response.output' });
  }
  return item ?? scope.get('body') ?? null;
}

/** New `temp` value: the prior one with this step's evaluated keys layered on top. */
export function computeTemp(directive: JsonObject | undefined, scope: Scope, prior: JsonObject): JsonObject {
  if (directive === undefined) {
    return prior;
  }
  const evaluated = evaluate(directive, scope, { path: 'response.temp' });
  return isJsonObject(evaluated) ? { ...prior, ...evaluated } : prior;
}

export function evaluateData(directive: JsonObject | undefined, scope: Scope): JsonObject {
  if (directive === undefined) {
    return {};
  }
  const evaluated = evaluate(directive, scope, { path: 'response.data' });
  return isJsonObject(evaluated) ? evaluated : {};
}
