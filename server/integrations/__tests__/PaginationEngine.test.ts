import { beforeEach, describe, expect, it } from 'vitest';

import type { CallDefinition } from '../../connectors/types.js';
import { ConfigurationError, ExecutionTimeoutError } from '../../core/errors.js';
import { createAppContext, Scope } from '../../runtime/Scope.js';
import { createRecordingLogger, type RecordingLogger } from '../../testing/logger.js';
import { ProviderSimulator, type SimulatedRequest } from '../../testing/ProviderSimulator.js';
import { HttpTransport } from '../HttpTransport.js';
import { ModuleExecutor } from '../ModuleExecutor.js';
import { PaginationEngine, resolveLimit } from '../PaginationEngine.js';
import { RequestExecutor } from '../RequestExecutor.js';

const sim = new ProviderSimulator();
let logger: RecordingLogger;

function engine(maxPages = 10, timeoutMs = 5000): PaginationEngine {
  const executor = new RequestExecutor({
    integration: 'tasks',
    base: { baseUrl: 'https://api.example.com' },
    transport: new HttpTransport({ fetch: sim.fetch }),
    logger,
  });
  return new PaginationEngine(executor, { maxPages, timeoutMs, logger });
}

const scope = Scope.create(createAppContext(), { parameters: { max: 1 } });

const ids = ['a', 'b', 'c', 'd', 'e'];

function offsetPage(request: SimulatedRequest) {
  const offset = Number(request.url.searchParams.get('offset') ?? '0');
  return {
    body: {
      items: ids.slice(offset, offset + 2).map(id => ({ id })),
      hasMore: offset + 2 < ids.length,
    },
  };
}

function numberedPage(request: SimulatedRequest) {
  const page = Number(request.url.searchParams.get('page') ?? '1');
  const pages: string[][] = [['a', 'b'], ['c'], []];
  return { body: { items: (pages[page - 1] ?? []).map(id => ({ id })) } };
}

const offsetCall: CallDefinition = {
  url: '/items',
  qs: { offset: 0 },
  response: { iterate: '{{body.items}}', output: '{{item.id}}' },
  pagination: { qs: { offset: '{{pagination.count}}' }, condition: '{{body.hasMore}}' },
};

beforeEach(() => {
  sim.reset();
  logger = createRecordingLogger();
});

describe('PaginationEngine', () => {
  it('stops fetching once the limit is reached', async () => {
    sim.on('GET', '/items', offsetPage);
    const entries = await engine().iterate(offsetCall, scope, { limit: 3 }).collect();

    expect(entries.map(entry => entry.output)).toEqual(['a', 'b', 'c']);
    expect(sim.calls.map(call => call.url.searchParams.get('offset'))).toEqual(['0', '2']);
  });

  it('follows the condition until the provider reports no more pages', async () => {
    sim.on('GET', '/items', offsetPage);
    const sequence = engine().iterate(offsetCall, scope);
    const entries = await sequence.collect();

    expect(entries.map(entry => entry.output)).toEqual(ids);
    expect(sequence.state.pages).toBe(3);
    expect(sequence.state.truncated).toBe(false);
  });

  it('ends on an empty page when the condition is always true', async () => {
    sim.on('GET', '/pages', numberedPage);
    const call: CallDefinition = {
      url: '/pages',
      qs: { page: 1 },
      response: { iterate: '{{body.items}}', output: '{{item.id}}' },
      pagination: { qs: { page: '{{pagination.page + 1}}' } },
    };

    const entries = await engine().iterate(call, scope).collect();

    expect(entries.map(entry => entry.output)).toEqual(['a', 'b', 'c']);
    expect(sim.calls).toHaveLength(3);
  });

  it('rejects a cursor that does not advance', async () => {
    sim.on('GET', '/cursor', { body: { items: [1], next: 'abc' } });
    const call: CallDefinition = {
      url: '/cursor',
      response: { iterate: '{{body.items}}' },
      pagination: { qs: { cursor: '{{body.next}}' } },
    };

    await expect(engine().iterate(call, scope).collect()).rejects.toThrow(ConfigurationError);
    expect(sim.calls).toHaveLength(2);
  });

  it('marks the sequence truncated at the page cap', async () => {
    sim.on('GET', '/endless', request => ({ body: { items: [request.url.searchParams.get('page')] } }));
    const call: CallDefinition = {
      url: '/endless',
      qs: { page: 1 },
      response: { iterate: '{{body.items}}' },
      pagination: { qs: { page: '{{pagination.page + 1}}' } },
    };

    const sequence = engine(2).iterate(call, scope);
    const entries = await sequence.collect();

    expect(entries.map(entry => entry.item)).toEqual(['1', '2']);
    expect(sequence.state.truncated).toBe(true);
    expect(logger.lines.filter(line => line.level === 'warn').map(line => line.message)).toEqual([
      '[PaginationEngine] Pagination stopped after 2 pages with more results available',
    ]);
  });

  it('applies response.limit and makes no request for a limit of zero', async () => {
    sim.on('GET', '/items', offsetPage);
    const limited: CallDefinition = { ...offsetCall, response: { ...offsetCall.response, limit: '{{parameters.max}}' } };

    expect((await engine().iterate(limited, scope).collect()).map(entry => entry.output)).toEqual(['a']);
    expect(await engine().iterate(offsetCall, scope, { limit: 0 }).collect()).toEqual([]);
    expect(sim.calls).toHaveLength(1);
  });

  it('yields one entry per page with the body when nothing is iterated', async () => {
    sim.on('GET', '/me', { body: { id: 'u1' } });
    const entries = await engine().iterate({ url: '/me' }, scope).collect();
    expect(entries).toEqual([{ item: { id: 'u1' }, output: { id: 'u1' } }]);
  });

  it('cannot be iterated twice', async () => {
    sim.on('GET', '/me', { body: { id: 'u1' } });
    const sequence = engine().iterate({ url: '/me' }, scope);
    await sequence.collect();
    await expect(sequence.collect()).rejects.toThrow('Paginated sequence has already been consumed');
  });

  it('turns an exhausted budget into ExecutionTimeoutError', async () => {
    sim.on('GET', '/slow', async () => {
      await ProviderSimulator.delay(100);
      return { body: { ok: true } };
    });
    await expect(engine(10, 20).iterate({ url: '/slow' }, scope).collect()).rejects.toBeInstanceOf(ExecutionTimeoutError);
  });
});

describe('resolveLimit', () => {
  it('takes the smaller of the requested and declared limits', () => {
    const call: CallDefinition = { url: '/x', response: { limit: '{{parameters.max}}' } };
    expect(resolveLimit(call, scope, 5)).toBe(1);
    expect(resolveLimit(call, scope, null)).toBe(1);
    expect(resolveLimit(call, scope, 5, false)).toBe(5);
    expect(resolveLimit({ url: '/x' }, scope, undefined)).toBeNull();
    expect(() => resolveLimit({ url: '/x', response: { limit: 'many' } }, scope, null)).toThrow(ConfigurationError);
  });
});

describe('ModuleExecutor', () => {
  const modules = () => new ModuleExecutor(engine());

  it('threads temp between steps and returns the iterating step outputs', async () => {
    sim.on('GET', '/me', { body: { id: 'u1' } });
    sim.on('GET', '/users/u1/tasks', { body: [{ title: 'one' }, { title: 'two' }] });

    const result = await modules().run(
      [
        { url: '/me', response: { temp: { userId: '{{body.id}}' } } },
        { url: '/users/{{temp.userId}}/tasks', response: { iterate: '{{body}}', output: '{{item.title}}' } },
      ],
      scope,
    );

    expect(result.outputs).toEqual(['one', 'two']);
    expect(result.temp).toEqual({ userId: 'u1' });
    expect(result.executedSteps).toBe(2);
  });

  it('skips steps whose condition is false', async () => {
    sim.on('GET', '/a', { body: { step: 'a' } });
    const result = await modules().run(
      [{ url: '/a' }, { url: '/b', condition: '{{parameters.max > 5}}' }],
      scope,
    );
    expect(result.executedSteps).toBe(1);
    expect(result.outputs).toEqual([{ step: 'a' }]);
    expect(sim.callsTo('GET', '/b')).toHaveLength(0);
  });

  it('evaluates the wrapper over the collected outputs', async () => {
    sim.on('GET', '/list', { body: { data: [{ id: 1 }, { id: 2 }] } });
    const result = await modules().run(
      {
        url: '/list',
        response: { iterate: '{{body.data}}', output: '{{item.id}}', wrapper: { count: '{{length(output)}}', ids: '{{output}}' } },
      },
      scope,
    );
    expect(result.outputs).toEqual([{ count: 2, ids: [1, 2] }]);
  });

  it('keeps the output of an earlier step when later steps declare none', async () => {
    sim.on('POST', '/tasks', { status: 201, body: { id: 't9' } });
    sim.on('POST', '/tasks/t9/notify', { status: 204 });
    const result = await modules().run(
      [
        { url: '/tasks', method: 'POST', response: { output: { id: '{{body.id}}' }, temp: { id: '{{body.id}}' } } },
        { url: '/tasks/{{temp.id}}/notify', method: 'POST' },
      ],
      scope,
    );
    expect(result.outputs).toEqual([{ id: 't9' }]);
  });

  it('refuses a module without Calls', async () => {
    await expect(modules().run([], scope)).rejects.toThrow('Module has no Calls to execute');
  });
});
