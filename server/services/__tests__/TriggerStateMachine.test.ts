import { beforeEach, describe, expect, it } from 'vitest';

import type { ModuleDefinition } from '../../connectors/types.js';
import { ConfigurationError } from '../../core/errors.js';
import { HttpTransport } from '../../integrations/HttpTransport.js';
import { ModuleExecutor } from '../../integrations/ModuleExecutor.js';
import { PaginationEngine } from '../../integrations/PaginationEngine.js';
import { RequestExecutor } from '../../integrations/RequestExecutor.js';
import { createAppContext, Scope } from '../../runtime/Scope.js';
import { createRecordingLogger } from '../../testing/logger.js';
import { ProviderSimulator } from '../../testing/ProviderSimulator.js';
import type { JsonObject } from '../../types/json.js';
import { TriggerStateMachine } from '../TriggerStateMachine.js';
import type { TriggerState } from '../TriggerStateStore.js';

const sim = new ProviderSimulator();
let records: JsonObject[] = [];
let machine: TriggerStateMachine;

const scope = Scope.create(createAppContext(), { parameters: {} });

function at(second: number): string {
  return new Date(Date.UTC(2024, 0, 1, 0, 0, second)).toISOString();
}

function event(id: string, second: number): JsonObject {
  return { id, updated: at(second) };
}

function triggerModule(order: 'asc' | 'desc', extra: Partial<ModuleDefinition> = {}): ModuleDefinition {
  return {
    type: 'trigger',
    communication: {
      url: '/events',
      response: {
        iterate: '{{body.items}}',
        output: '{{item.id}}',
        trigger: { id: '{{item.id}}', date: '{{item.updated}}', order },
      },
    },
    ...extra,
  };
}

function poll(module: ModuleDefinition, state: TriggerState | null, limit: number | null = null) {
  return machine.poll('newEvents', module, scope, state, { timeoutMs: 5000, limit });
}

beforeEach(() => {
  sim.reset();
  records = [];
  sim.on('GET', '/events', () => ({ body: { items: records } }));
  const logger = createRecordingLogger();
  const executor = new RequestExecutor({
    integration: 'tasks',
    base: { baseUrl: 'https://api.example.com' },
    transport: new HttpTransport({ fetch: sim.fetch }),
    logger,
  });
  machine = new TriggerStateMachine(new ModuleExecutor(new PaginationEngine(executor, { maxPages: 10, timeoutMs: 5000, logger })), 'tasks', logger);
});

describe('TriggerStateMachine ascending triggers', () => {
  it('emits nothing on bootstrap and splits same-timestamp siblings across polls without loss', async () => {
    const bootstrap = await poll(triggerModule('asc'), null);
    expect(bootstrap).toEqual({ phase: 'bootstrap', items: [], state: { id: null, date: null, boundaryIds: [] } });

    records = [event('a', 1), event('b', 2), event('c', 2), event('d', 3)];
    const first = await poll(triggerModule('asc'), bootstrap.state, 2);
    expect(first.items).toEqual(['a', 'b']);
    expect(first.state).toEqual({ id: 'b', date: at(2), boundaryIds: ['b'] });

    const second = await poll(triggerModule('asc'), first.state, 2);
    expect(second.items).toEqual(['c', 'd']);
    expect(second.state).toEqual({ id: 'd', date: at(3), boundaryIds: ['d'] });

    const third = await poll(triggerModule('asc'), second.state, 2);
    expect(third.items).toEqual([]);
    expect(third.state).toBe(second.state);
  });

  it('bootstraps at the newest existing item', async () => {
    records = [event('a', 1), event('b', 5), event('c', 5)];
    const bootstrap = await poll(triggerModule('asc'), null);
    expect(bootstrap.state).toEqual({ id: 'c', date: at(5), boundaryIds: ['b', 'c'] });
  });

  it('rejects items out of the declared order or repeated within a poll', async () => {
    const state: TriggerState = { id: null, date: null, boundaryIds: [] };

    records = [event('b', 2), event('a', 1)];
    await expect(poll(triggerModule('asc'), state)).rejects.toThrow(
      'modules.newEvents: item "a" violates the declared asc order',
    );

    records = [event('a', 1), event('a', 2)];
    await expect(poll(triggerModule('asc'), state)).rejects.toThrow(
      'modules.newEvents: item id "a" appeared more than once in one poll',
    );
  });
});

describe('TriggerStateMachine descending triggers', () => {
  it('bootstraps from the first item only and emits newer items oldest first', async () => {
    records = [event('c', 3), event('b', 2), event('a', 1)];
    const bootstrap = await poll(triggerModule('desc'), null);
    expect(bootstrap.state).toEqual({ id: 'c', date: at(3), boundaryIds: ['c'] });

    records = [event('e', 5), event('d', 4), event('c', 3), event('b', 2)];
    const next = await poll(triggerModule('desc'), bootstrap.state);
    expect(next.items).toEqual(['d', 'e']);
    expect(next.state).toEqual({ id: 'e', date: at(5), boundaryIds: ['e'] });
  });

  it('keeps siblings that share the stored timestamp', async () => {
    const state: TriggerState = { id: 'b', date: at(2), boundaryIds: ['b'] };
    records = [event('d', 3), event('c', 2), event('b', 2), event('a', 1)];

    const next = await poll(triggerModule('desc'), state);

    expect(next.items).toEqual(['c', 'd']);
  });

  it('uses the epoch calls for the baseline when declared', async () => {
    sim.on('GET', '/events/latest', { body: { items: [event('z', 9)] } });
    const module = triggerModule('desc', {
      epoch: { url: '/events/latest', response: { iterate: '{{body.items}}' } },
    });

    const bootstrap = await poll(module, null);

    expect(bootstrap.state).toEqual({ id: 'z', date: at(9), boundaryIds: ['z'] });
    expect(sim.callsTo('GET', '/events')).toHaveLength(0);
  });
});

describe('TriggerStateMachine configuration', () => {
  it('requires a trigger directive on the last call', async () => {
    const module: ModuleDefinition = { type: 'trigger', communication: { url: '/events' } };
    await expect(poll(module, null)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('orders by numeric id when no date is declared', async () => {
    records = [{ id: 9 }, { id: 10 }, { id: 11 }];
    const module: ModuleDefinition = {
      type: 'trigger',
      communication: { url: '/events', response: { iterate: '{{body.items}}', output: '{{item.id}}', trigger: { id: '{{item.id}}' } } },
    };

    const next = await poll(module, { id: '9', date: null, boundaryIds: [] });

    expect(next.items).toEqual([10, 11]);
    expect(next.state).toEqual({ id: '11', date: null, boundaryIds: ['11'] });
  });
});
