import { toCallArray, type ModuleDefinition, type TriggerDirective, type TriggerOrder } from '../connectors/types.js';
import { parseDateValue } from '../core/builtins.js';
import { ConfigurationError } from '../core/errors.js';
import { evaluate } from '../core/ExpressionEvaluator.js';
import { toText } from '../core/ExpressionValue.js';
import type { ModuleExecutor } from '../integrations/ModuleExecutor.js';
import { resolveLimit, type PageEntry } from '../integrations/PaginationEngine.js';
import { recordTriggerEmission, withSpan } from '../observability/index.js';
import type { Scope } from '../runtime/Scope.js';
import type { RuntimeLogger } from '../types/common.js';
import type { JsonValue } from '../types/json.js';
import { Deadline } from '../utils/deadline.js';
import type { TriggerState } from './TriggerStateStore.js';

export type TriggerPhase = 'bootstrap' | 'poll';

export interface TriggerPollOptions {
  /** Most items to emit in one cycle. */
  limit?: number | null;
  signal?: AbortSignal;
  timeoutMs: number;
}

export interface TriggerPollResult {
  phase: TriggerPhase;
  items: JsonValue[];
  state: TriggerState;
}

interface ItemKey {
  id: string;
  /** Epoch milliseconds, null when the trigger has no `date` template. */
  date: number | null;
}

interface KeyedEntry {
  key: ItemKey;
  entry: PageEntry;
}

function compareIds(left: string, right: string): number {
  const a = Number(left);
  const b = Number(right);
  if (left.trim() !== '' && right.trim() !== '' && Number.isFinite(a) && Number.isFinite(b)) {
    return a - b;
  }
  return left < right ? -1 : left > right ? 1 : 0;
}

function compareKeys(left: ItemKey, right: ItemKey): number {
  if (left.date !== null && right.date !== null && left.date !== right.date) {
    return left.date - right.date;
  }
  return compareIds(left.id, right.id);
}

/** Position used for order validation: the date when present, else the id. */
function compareOrder(left: ItemKey, right: ItemKey): number {
  if (left.date !== null && right.date !== null) {
    return left.date - right.date;
  }
  return compareIds(left.id, right.id);
}

function stateKey(state: TriggerState): ItemKey | null {
  if (state.id === null && state.date === null) {
    return null;
  }
  const date = state.date === null ? null : Date.parse(state.date);
  return { id: state.id ?? '', date: date === null || Number.isNaN(date) ? null : date };
}

function isNewer(key: ItemKey, state: TriggerState): boolean {
  const baseline = stateKey(state);
  if (!baseline) {
    return true;
  }
  if (key.date !== null && baseline.date !== null) {
    if (key.date !== baseline.date) {
      return key.date > baseline.date;
    }
    return !state.boundaryIds.includes(key.id);
  }
  return compareIds(key.id, baseline.id) > 0;
}

function isOlder(key: ItemKey, state: TriggerState): boolean {
  const baseline = stateKey(state);
  if (!baseline) {
    return false;
  }
  return compareOrder(key, baseline) < 0;
}

function toState(emitted: readonly ItemKey[], previous: TriggerState | null): TriggerState {
  const last = emitted[emitted.length - 1];
  const lastDate = last.date === null ? null : new Date(last.date).toISOString();
  const siblings = last.date === null ? [last.id] : emitted.filter(key => key.date === last.date).map(key => key.id);
  const boundaryIds =
    previous && lastDate !== null && previous.date === lastDate
      ? Array.from(new Set([...previous.boundaryIds, ...siblings]))
      : Array.from(new Set(siblings));
  return { id: last.id, date: lastDate, boundaryIds };
}

export const EMPTY_TRIGGER_STATE: TriggerState = Object.freeze({ id: null, date: null, boundaryIds: [] });

/**
 * Polling trigger cycle: Uninitialized → Bootstrapping → Polling. The first cycle
 * only records a baseline; later cycles emit items newer than the stored state,
 * oldest first.
 */
export class TriggerStateMachine {
  private readonly logger: RuntimeLogger;

  constructor(
    private readonly modules: ModuleExecutor,
    private readonly integration: string,
    logger?: RuntimeLogger,
  ) {
    this.logger = logger ?? console;
  }

  async poll(
    moduleId: string,
    module: ModuleDefinition,
    scope: Scope,
    lastState: TriggerState | null,
    options: TriggerPollOptions,
  ): Promise<TriggerPollResult> {
    const calls = toCallArray(module.communication);
    const trigger = calls[calls.length - 1]?.response?.trigger;
    if (!trigger) {
      throw new ConfigurationError(`modules.${moduleId}: trigger modules must declare response.trigger`);
    }

    const deadline = new Deadline(options.timeoutMs, options.signal, `Poll of ${moduleId}`);
    try {
      return await withSpan(
        'connector.trigger.poll',
        { 'connector.integration': this.integration, 'connector.module': moduleId, 'trigger.phase': lastState ? 'poll' : 'bootstrap' },
        async () => {
          if (!lastState) {
            return this.bootstrap(moduleId, module, trigger, scope, deadline);
          }
          const result = await this.fetchNew(moduleId, module, trigger, scope, lastState, options.limit ?? null, deadline);
          recordTriggerEmission(result.items.length, { integration: this.integration, module: moduleId });
          return result;
        },
      );
    } catch (error) {
      throw deadline.translate(error);
    } finally {
      deadline.dispose();
    }
  }

  private keyOf(trigger: TriggerDirective, scope: Scope, entry: PageEntry, moduleId: string): ItemKey {
    const itemScope = scope.with({ item: entry.item });
    const rawId = evaluate(trigger.id, itemScope, { path: `modules.${moduleId}.response.trigger.id` });
    if (rawId === null || rawId === '') {
      throw new ConfigurationError(`modules.${moduleId}: trigger id evaluated to an empty value`);
    }
    if (trigger.date === undefined) {
      return { id: toText(rawId), date: null };
    }
    const rawDate = evaluate(trigger.date, itemScope, { path: `modules.${moduleId}.response.trigger.date` });
    const date = parseDateValue(rawDate);
    if (!date) {
      throw new ConfigurationError(`modules.${moduleId}: trigger date ${JSON.stringify(rawDate)} is not a valid date`);
    }
    return { id: toText(rawId), date: date.getTime() };
  }

  private async bootstrap(
    moduleId: string,
    module: ModuleDefinition,
    trigger: TriggerDirective,
    scope: Scope,
    deadline: Deadline,
  ): Promise<TriggerPollResult> {
    const order: TriggerOrder = trigger.order ?? 'unordered';
    const usesEpoch = module.epoch !== undefined;
    const result = await this.modules.run(module.epoch ?? module.communication, scope, {
      signal: deadline.signal,
      limit: order === 'desc' && !usesEpoch ? 1 : null,
    });

    const keys = result.entries.map(entry => this.keyOf(trigger, scope, entry, moduleId));
    if (keys.length === 0) {
      this.logger.info(`[TriggerStateMachine] ${moduleId} bootstrapped with no items`);
      return { phase: 'bootstrap', items: [], state: { ...EMPTY_TRIGGER_STATE, boundaryIds: [] } };
    }
    const sorted = [...keys].sort(compareKeys);
    const newest = sorted[sorted.length - 1];
    const baseline = sorted.filter(key => compareOrder(key, newest) === 0);
    this.logger.info(`[TriggerStateMachine] ${moduleId} bootstrapped at ${newest.date === null ? `id ${newest.id}` : new Date(newest.date).toISOString()}`);
    return { phase: 'bootstrap', items: [], state: toState(baseline, null) };
  }

  private async fetchNew(
    moduleId: string,
    module: ModuleDefinition,
    trigger: TriggerDirective,
    scope: Scope,
    state: TriggerState,
    requestedLimit: number | null,
    deadline: Deadline,
  ): Promise<TriggerPollResult> {
    const order: TriggerOrder = trigger.order ?? 'unordered';
    const calls = toCallArray(module.communication);
    const lastCall = calls[calls.length - 1];
    const emitLimit = resolveLimit(lastCall, scope, requestedLimit);

    const seen = new Set<string>();
    let previous: ItemKey | null = null;
    const keys = new WeakMap<PageEntry, ItemKey>();

    // accept and stopAt may both see an entry; each entry is keyed and validated once.
    const inspect = (entry: PageEntry): ItemKey => {
      const known = keys.get(entry);
      if (known) {
        return known;
      }
      const key = this.keyOf(trigger, scope, entry, moduleId);
      if (seen.has(key.id)) {
        throw new ConfigurationError(`modules.${moduleId}: item id "${key.id}" appeared more than once in one poll`);
      }
      seen.add(key.id);
      if (previous && order !== 'unordered') {
        const direction = compareOrder(key, previous);
        if ((order === 'asc' && direction < 0) || (order === 'desc' && direction > 0)) {
          throw new ConfigurationError(`modules.${moduleId}: item "${key.id}" violates the declared ${order} order`);
        }
      }
      previous = key;
      keys.set(entry, key);
      return key;
    };

    const result = await this.modules.run(module.communication, scope, {
      signal: deadline.signal,
      applyResponseLimit: false,
      limit: order === 'asc' ? emitLimit : null,
      accept: entry => isNewer(inspect(entry), state),
      stopAt: order === 'desc' ? entry => isOlder(inspect(entry), state) : undefined,
    });

    const fresh: KeyedEntry[] = [];
    for (const [index, entry] of result.entries.entries()) {
      const key = keys.get(entry);
      if (!key) {
        throw new ConfigurationError(`modules.${moduleId}: missing trigger key for item ${index}`);
      }
      fresh.push({ key, entry });
    }
    fresh.sort((left, right) => compareKeys(left.key, right.key));
    const emitted = emitLimit === null ? fresh : fresh.slice(0, emitLimit);

    if (emitted.length === 0) {
      return { phase: 'poll', items: [], state };
    }
    return {
      phase: 'poll',
      items: emitted.map(({ entry }) => entry.output),
      state: toState(
        emitted.map(({ key }) => key),
        state,
      ),
    };
  }
}
