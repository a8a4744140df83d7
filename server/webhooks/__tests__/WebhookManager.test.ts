import { beforeEach, describe, expect, it } from 'vitest';

import type { IntegrationDefinition } from '../../connectors/types.js';
import { UnknownHookError } from '../../core/errors.js';
import { HttpTransport } from '../../integrations/HttpTransport.js';
import { RequestExecutor } from '../../integrations/RequestExecutor.js';
import { InMemoryBundleQueue } from '../../queue/InMemoryQueue.js';
import { createAppContext } from '../../runtime/Scope.js';
import { ConnectionManager } from '../../services/ConnectionManager.js';
import { InMemoryConnectionStore } from '../../services/ConnectionStore.js';
import { createRecordingLogger } from '../../testing/logger.js';
import { ProviderSimulator } from '../../testing/ProviderSimulator.js';
import { InMemoryHookStore, type HookRef } from '../types.js';
import { InMemoryWebhookDedupeStore } from '../WebhookDedupeStore.js';
import { WebhookManager } from '../WebhookManager.js';

const definition: IntegrationDefinition = {
  name: 'payments',
  base: { baseUrl: 'https://api.example.com' },
  webhooks: {
    events: {
      parameters: [{ name: 'events', default: ['created'] }],
      attach: {
        url: '/hooks',
        method: 'POST',
        body: { url: '{{webhook.url}}', events: '{{parameters.events}}' },
        response: { data: { subscriptionId: '{{body.id}}' } },
      },
      update: {
        url: '/hooks/{{webhook.subscriptionId}}',
        method: 'PATCH',
        body: { events: '{{parameters.events}}' },
        response: { data: { revision: '{{body.revision}}' } },
      },
      detach: { url: '/hooks/{{webhook.subscriptionId}}', method: 'DELETE' },
      validator: '{{body.source = "stripe"}}',
      uid: '{{body.id}}',
      response: { iterate: '{{body.events}}', output: { kind: '{{item.kind}}', hook: '{{webhook.id}}' } },
    },
    forms: {
      validator: '{{contains(map(body.fields, "type"), "stripe")}}',
      response: { iterate: '{{body.fields}}' },
    },
  },
};

const sim = new ProviderSimulator();
let now = Date.parse('2024-03-01T00:00:00Z');
let hooks: InMemoryHookStore;
let dedupe: InMemoryWebhookDedupeStore;
let queue: InMemoryBundleQueue;
let manager: WebhookManager;

function createManager(bundleQueue: InMemoryBundleQueue): WebhookManager {
  const logger = createRecordingLogger();
  const executor = new RequestExecutor({
    integration: 'payments',
    base: definition.base,
    transport: new HttpTransport({ fetch: sim.fetch }),
    logger,
  });
  const app = createAppContext();
  return new WebhookManager({
    definition,
    executor,
    connections: new ConnectionManager({ definition, executor, app, store: new InMemoryConnectionStore(), logger }),
    hooks,
    dedupe,
    queue: bundleQueue,
    dedupeTtlMs: 60_000,
    clock: () => new Date(now),
    logger,
  });
}

async function registered(): Promise<HookRef> {
  sim.on('POST', '/hooks', { status: 201, body: { id: 'sub-1' } });
  return manager.register('events', 'hook-1', 'https://runtime.example.com/hooks/hook-1', null, {});
}

beforeEach(() => {
  sim.reset();
  now = Date.parse('2024-03-01T00:00:00Z');
  hooks = new InMemoryHookStore();
  dedupe = new InMemoryWebhookDedupeStore();
  queue = new InMemoryBundleQueue();
  manager = createManager(queue);
});

describe('WebhookManager registration', () => {
  it('attaches the hook and stores the subscription data', async () => {
    const hook = await registered();

    expect(hook.data).toEqual({ subscriptionId: 'sub-1' });
    expect(hook.createdAt).toBe('2024-03-01T00:00:00.000Z');
    expect(hook.parameters).toEqual({ events: ['created'] });
    expect(sim.calls[0].body).toEqual({ url: 'https://runtime.example.com/hooks/hook-1', events: ['created'] });
    expect(await hooks.get('hook-1')).toEqual(hook);
  });

  it('updates parameters through the update call and merges its data', async () => {
    const hook = await registered();
    sim.on('PATCH', '/hooks/sub-1', { body: { revision: 2 } });
    now = Date.parse('2024-03-02T00:00:00Z');

    const updated = await manager.update(hook, { events: ['created', 'deleted'] });

    expect(sim.callsTo('PATCH', '/hooks/sub-1')[0].body).toEqual({ events: ['created', 'deleted'] });
    expect(updated.parameters).toEqual({ events: ['created', 'deleted'] });
    expect(updated.data).toEqual({ subscriptionId: 'sub-1', revision: 2 });
    expect(updated.createdAt).toBe('2024-03-01T00:00:00.000Z');
    expect(updated.updatedAt).toBe('2024-03-02T00:00:00.000Z');
    expect(await hooks.get('hook-1')).toEqual(updated);
  });

  it('detaches with the stored data and forgets the hook', async () => {
    const hook = await registered();
    sim.on('DELETE', '/hooks/sub-1', { status: 204 });

    await manager.unregister(hook);

    expect(sim.callsTo('DELETE', '/hooks/sub-1')).toHaveLength(1);
    expect(await hooks.get('hook-1')).toBeNull();
  });
});

describe('WebhookManager.receive', () => {
  const delivery = {
    hookId: 'hook-1',
    headers: { 'content-type': 'application/json' },
    payload: { id: 'evt-1', source: 'stripe', events: [{ kind: 'charge' }, { kind: 'refund' }] },
  };

  it('queues one bundle per iterated item and ignores a repeated delivery', async () => {
    await registered();

    expect(await manager.receive(delivery)).toEqual({ accepted: true, duplicate: false, bundles: 2 });
    expect(await manager.receive(delivery)).toEqual({ accepted: true, duplicate: true, bundles: 0 });

    const jobs = queue.peek();
    expect(jobs.map(job => job.data.bundle)).toEqual([
      { kind: 'charge', hook: 'hook-1' },
      { kind: 'refund', hook: 'hook-1' },
    ]);
    expect(jobs.map(job => job.data.index)).toEqual([0, 1]);
    expect(jobs[0].id).toBe(`${jobs[0].data.deliveryId}-0`);
    expect(jobs[0].data.receivedAt).toBe('2024-03-01T00:00:00.000Z');
  });

  it('drops deliveries rejected by the validator before claiming a dedupe token', async () => {
    await registered();

    const result = await manager.receive({ ...delivery, payload: { id: 'evt-2', source: 'text', events: [{ kind: 'x' }] } });

    expect(result).toEqual({ accepted: true, duplicate: false, bundles: 0 });
    expect(dedupe.size).toBe(0);
    expect(queue.size).toBe(0);
  });

  it('accepts form deliveries only when a payment field is present', async () => {
    await manager.register('forms', 'form-1', 'https://runtime.example.com/hooks/form-1', null, {});

    expect((await manager.receive({ hookId: 'form-1', headers: {}, payload: { fields: [{ type: 'text' }] } })).bundles).toBe(0);
    expect((await manager.receive({ hookId: 'form-1', headers: {}, payload: { fields: [{ type: 'stripe' }] } })).bundles).toBe(1);
    expect(queue.peek().map(job => job.data.bundle)).toEqual([{ type: 'stripe' }]);
  });

  it('falls back to a payload hash when the uid is empty', async () => {
    await registered();
    const payload = { source: 'stripe', events: [{ kind: 'charge' }] };

    expect((await manager.receive({ ...delivery, payload })).bundles).toBe(1);
    expect((await manager.receive({ ...delivery, payload: { events: [{ kind: 'charge' }], source: 'stripe' } })).duplicate).toBe(true);
    expect((await manager.receive({ ...delivery, payload: { ...payload, events: [] } })).duplicate).toBe(false);
  });

  it('releases the dedupe token when the bundles cannot be queued', async () => {
    await registered();
    const closed = new InMemoryBundleQueue();
    await closed.close();
    const failing = createManager(closed);

    await expect(failing.receive(delivery)).rejects.toThrow('[Queue] in-memory bundle queue is closed');
    expect(dedupe.size).toBe(0);
    expect((await manager.receive(delivery)).bundles).toBe(2);
  });

  it('rejects unknown hooks', async () => {
    await expect(manager.receive({ ...delivery, hookId: 'missing' })).rejects.toBeInstanceOf(UnknownHookError);
  });
});

describe('InMemoryBundleQueue', () => {
  it('does not enqueue a waiting job id twice and forgets ids once drained', async () => {
    const job = {
      hookId: 'hook-1',
      integration: 'payments',
      webhook: 'events',
      deliveryId: 'abc',
      index: 0,
      bundle: { n: 1 },
      receivedAt: '2024-01-01T00:00:00.000Z',
    };

    const first = await queue.enqueue([job, { ...job, index: 1 }]);
    const again = await queue.enqueue([job]);

    expect(first).toEqual([{ jobId: 'abc-0' }, { jobId: 'abc-1' }]);
    expect(again).toEqual([{ jobId: 'abc-0' }]);
    expect(queue.drain().map(record => record.id)).toEqual(['abc-0', 'abc-1']);
    expect(queue.size).toBe(0);

    await queue.enqueue([job]);
    expect(queue.peek().map(record => record.id)).toEqual(['abc-0']);
  });
});

describe('InMemoryWebhookDedupeStore', () => {
  it('lets a token be claimed again once its window has passed', async () => {
    let now = 0;
    const store = new InMemoryWebhookDedupeStore(() => now);

    expect(await store.claim('t', 1000)).toBe(true);
    expect(await store.claim('t', 1000)).toBe(false);
    now = 1000;
    expect(await store.claim('t', 1000)).toBe(true);
  });
});
