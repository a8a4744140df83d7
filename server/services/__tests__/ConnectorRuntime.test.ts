import { beforeEach, describe, expect, it } from 'vitest';

import { ConfigurationError } from '../../core/errors.js';
import { InMemoryBundleQueue } from '../../queue/InMemoryQueue.js';
import { tasksIntegration } from '../../testing/fixtures.js';
import { createRecordingLogger } from '../../testing/logger.js';
import { ProviderSimulator } from '../../testing/ProviderSimulator.js';
import type { JsonObject } from '../../types/json.js';
import type { ConnectionStore } from '../ConnectionStore.js';
import { ConnectorRuntime } from '../ConnectorRuntime.js';
import { InMemoryTriggerStateStore } from '../TriggerStateStore.js';

const sim = new ProviderSimulator();
let tasks: JsonObject[] = [];
let queue: InMemoryBundleQueue;
let triggerStateStore: InMemoryTriggerStateStore;
let runtime: ConnectorRuntime;

async function connect(): Promise<string> {
  const instance = await runtime.connect('key', { apiKey: 'test-secret' });
  sim.reset();
  sim.on('GET', '/tasks', () => ({ body: { items: tasks } }));
  return instance.id;
}

beforeEach(() => {
  sim.reset();
  sim.on('GET', '/me', { body: { id: 'acc-1' } });
  tasks = [];
  queue = new InMemoryBundleQueue();
  triggerStateStore = new InMemoryTriggerStateStore();
  runtime = ConnectorRuntime.fromDefinition(tasksIntegration, {
    fetch: sim.fetch,
    logger: createRecordingLogger(),
    queue,
    triggerStateStore,
    retry: { maxAttempts: 1 },
  });
});

describe('ConnectorRuntime.invoke', () => {
  it('runs an action with custom functions and the connection credentials', async () => {
    const connectionId = await connect();
    sim.on('POST', '/tasks', { status: 201, body: { id: 't1', title: 'WRITE!' } });

    const result = await runtime.invoke('createTask', { title: 'write' }, connectionId);

    expect(result).toEqual({ bundles: [{ id: 't1', title: 'WRITE!' }], state: null });
    expect(sim.calls[0].body).toEqual({ title: 'WRITE!' });
    expect(sim.calls[0].headers.authorization).toBe('Bearer test-secret');
  });

  it('applies the caller limit to searches', async () => {
    const connectionId = await connect();
    tasks = [{ id: 'a' }, { id: 'b' }];

    const result = await runtime.invoke('listTasks', {}, connectionId, null, { limit: 1 });

    expect(result.bundles).toEqual([{ id: 'a' }]);
  });

  it('requires the declared connection and refuses instant modules', async () => {
    await expect(runtime.invoke('createTask', { title: 'write' }, null)).rejects.toThrow(
      'modules.createTask requires a "key" connection',
    );
    await expect(runtime.invoke('taskEvents', {}, null)).rejects.toThrow(
      'modules.taskEvents is an instant trigger; its bundles arrive through webhooks',
    );
    await expect(runtime.invoke('missing', {}, null)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('reports provider failures with the base error template', async () => {
    const connectionId = await connect();
    sim.on('POST', '/tasks', { status: 500, body: { message: 'database unavailable' } });

    await expect(runtime.invoke('createTask', { title: 'write' }, connectionId)).rejects.toThrow('database unavailable');
  });
});

describe('ConnectorRuntime.pollAndCommit', () => {
  it('bootstraps, then emits only tasks created after the stored state', async () => {
    const connectionId = await connect();
    tasks = [{ id: 1 }, { id: 2 }];

    const bootstrap = await runtime.pollAndCommit('scenario-1', 'newTasks', {}, connectionId);
    expect(bootstrap.bundles).toEqual([]);

    tasks = [{ id: 1 }, { id: 2 }, { id: 3 }];
    const next = await runtime.pollAndCommit('scenario-1', 'newTasks', {}, connectionId);

    expect(next.bundles).toEqual([3]);
    expect(await triggerStateStore.load('scenario-1:newTasks')).toEqual({ id: '3', date: null, boundaryIds: ['3'] });
  });
});

describe('ConnectorRuntime.fetchOptions', () => {
  it('maps RPC outputs to options', async () => {
    const connectionId = await connect();
    sim.on('GET', '/projects', { body: [{ id: 'p1', name: 'Inbox' }] });

    expect(await runtime.fetchOptions('projects', {}, connectionId)).toEqual({
      ok: true,
      options: [{ label: 'Inbox', value: 'p1' }],
    });
  });

  it('fails a nested RPC without its parent value before any request', async () => {
    const connectionId = await connect();

    const result = await runtime.fetchOptions('sections', {}, connectionId);

    expect(result.ok).toBe(false);
    expect(result.ok ? null : result.error.message).toBe('Select "projectId" before loading sections');
    expect(sim.calls).toHaveLength(0);
  });

  it('turns unknown RPCs and provider errors into failed resolutions', async () => {
    const connectionId = await connect();
    sim.on('GET', '/projects/p1/sections', { status: 503, body: { message: 'try later' } });

    const unknown = await runtime.fetchOptions('nope', {}, connectionId);
    const failed = await runtime.fetchOptions('sections', { projectId: 'p1' }, connectionId);

    expect(unknown.ok ? null : unknown.error.message).toBe('Unknown RPC "nope" in integration "tasks"');
    expect(failed.ok ? null : failed.error.message).toBe('try later');
    expect(failed.options).toEqual([]);
  });

  it('reports unexpected failures as failed resolutions too', async () => {
    const offline: ConnectionStore = {
      get: async () => {
        throw new Error('store offline');
      },
      save: async () => undefined,
      delete: async () => undefined,
    };
    const broken = ConnectorRuntime.fromDefinition(tasksIntegration, {
      fetch: sim.fetch,
      logger: createRecordingLogger(),
      connectionStore: offline,
    });

    const result = await broken.fetchOptions('projects', {}, 'conn-1');

    expect(result.ok ? null : result.error.message).toBe('store offline');
    expect(result.options).toEqual([]);
  });
});

describe('ConnectorRuntime webhooks', () => {
  it('registers a hook and queues bundles from deliveries', async () => {
    const connectionId = await connect();
    const hook = await runtime.registerWebhook('taskEvents', 'hook-9', 'https://runtime.example.com/hooks/hook-9', connectionId, {});

    const result = await runtime.receiveWebhook({
      hookId: hook.hookId,
      payload: { tasks: [{ id: 1 }, { id: 2 }] },
      headers: {},
    });

    expect(result).toEqual({ accepted: true, duplicate: false, bundles: 2 });
    expect(queue.peek().map(job => job.data.bundle)).toEqual([{ id: 1 }, { id: 2 }]);
    expect(sim.calls).toHaveLength(0);
  });

  it('stamps updated hooks with the runtime clock', async () => {
    const clocked = ConnectorRuntime.fromDefinition(tasksIntegration, {
      fetch: sim.fetch,
      logger: createRecordingLogger(),
      clock: () => new Date('2024-05-01T00:00:00Z'),
    });
    const instance = await clocked.connect('key', { apiKey: 'test-secret' });
    const hook = await clocked.registerWebhook('taskEvents', 'hook-5', 'https://runtime.example.com/hooks/hook-5', instance, {});

    const updated = await clocked.updateWebhook(hook, {});

    expect(updated.updatedAt).toBe('2024-05-01T00:00:00.000Z');
    expect(updated.hookId).toBe('hook-5');
  });
});
