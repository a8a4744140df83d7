import { toCallArray, type CallList } from '../connectors/types.js';
import { ConfigurationError } from '../core/errors.js';
import { evaluate, evaluateCondition } from '../core/ExpressionEvaluator.js';
import type { Scope } from '../runtime/Scope.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';
import type { PageEntry, PaginationEngine, PaginationOptions } from './PaginationEngine.js';
import type { RawResponse } from './RequestExecutor.js';

export interface ModuleRunResult {
  /** Bundles produced by the module, after `wrapper`. */
  outputs: JsonValue[];
  /** Entries of the step that produced `outputs`, before `wrapper`. */
  entries: PageEntry[];
  temp: JsonObject;
  response: RawResponse | null;
  executedSteps: number;
  truncated: boolean;
}

/** Options that shape the final step only; earlier steps always run to completion. */
export type ModuleRunOptions = Omit<PaginationOptions, 'label'>;

/**
 * Runs a module's Calls in order. `temp` flows from step to step; a step whose
 * `condition` is false is skipped and any failure aborts the remaining steps.
 */
export class ModuleExecutor {
  constructor(private readonly pagination: PaginationEngine) {}

  async run(calls: CallList | undefined, scope: Scope, options: ModuleRunOptions = {}): Promise<ModuleRunResult> {
    const steps = toCallArray(calls);
    if (steps.length === 0) {
      throw new ConfigurationError('Module has no Calls to execute');
    }

    const initialTemp = scope.get('temp');
    let temp: JsonObject = isJsonObject(initialTemp) ? initialTemp : {};
    let lastResponse: RawResponse | null = null;
    let selected: { entries: PageEntry[]; iterates: boolean } | null = null;
    let lastEntries: PageEntry[] = [];
    let wrapper: JsonValue | undefined;
    let executedSteps = 0;
    let truncated = false;

    for (const [index, call] of steps.entries()) {
      const stepScope = scope.with({ temp });
      if (!evaluateCondition(call.condition, stepScope, true, { path: `communication[${index}].condition` })) {
        continue;
      }

      const isLast = index === steps.length - 1;
      const sequence = this.pagination.iterate(call, stepScope, {
        ...(isLast ? options : { signal: options.signal, timeoutMs: options.timeoutMs, maxPages: options.maxPages }),
        label: `communication[${index}]`,
      });
      const entries = await sequence.collect();

      executedSteps += 1;
      temp = sequence.state.temp;
      lastResponse = sequence.state.lastResponse;
      truncated = truncated || sequence.state.truncated;

      lastEntries = entries;
      const iterates = call.response?.iterate !== undefined;
      if (iterates || call.response?.output !== undefined) {
        selected = { entries, iterates };
      }
      if (call.response?.wrapper !== undefined) {
        wrapper = call.response.wrapper;
      }
    }

    // Without an output-declaring step the last step's body (one entry per page) is the result.
    const entries = selected ? selected.entries : lastEntries;
    let outputs = entries.map(entry => entry.output);

    if (wrapper !== undefined) {
      const collected: JsonValue = selected?.iterates ? outputs : outputs[0] ?? null;
      const wrapped = evaluate(wrapper, scope.with({ temp, output: collected }), { path: 'response.wrapper' });
      outputs = Array.isArray(wrapped) ? wrapped : [wrapped];
    }

    return { outputs, entries, temp, response: lastResponse, executedSteps, truncated };
  }
}
