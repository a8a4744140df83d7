import { createServer, type Server } from 'node:http';

import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { createApp, statusForError } from '../app.js';
import { ExecutionTimeoutError, ProviderError, RateLimitError, ValidationError } from '../core/errors.js';
import { InMemoryBundleQueue } from '../queue/InMemoryQueue.js';
import { ConnectorRuntime } from '../services/ConnectorRuntime.js';
import { tasksIntegration } from '../testing/fixtures.js';
import { createRecordingLogger } from '../testing/logger.js';
import { ProviderSimulator } from '../testing/ProviderSimulator.js';

const sim = new ProviderSimulator();
const queue = new InMemoryBundleQueue();
let server: Server;
let baseUrl = '';

beforeAll(async () => {
  sim.on('GET', '/me', { body: { id: 'acc-1' } });
  const runtime = ConnectorRuntime.fromDefinition(tasksIntegration, {
    fetch: sim.fetch,
    logger: createRecordingLogger(),
    queue,
  });
  const connection = await runtime.connect('key', { apiKey: 'test-secret' });
  await runtime.registerWebhook('taskEvents', 'hook-1', 'https://runtime.example.com/hooks/hook-1', connection.id, {});

  server = createServer(createApp(runtime));
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
});

describe('HTTP app', () => {
  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      success: true,
      app: { status: 'pass', build: process.env.GIT_SHA || 'dev', integration: 'tasks', queue: 'inmemory' },
    });
  });

  it('accepts deliveries for known hooks and echoes the request id', async () => {
    const response = await fetch(`${baseUrl}/hooks/hook-1`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-request-id': 'req-1' },
      body: JSON.stringify({ tasks: [{ id: 7 }] }),
    });

    expect(response.status).toBe(202);
    expect(response.headers.get('x-request-id')).toBe('req-1');
    expect(await response.json()).toEqual({ accepted: true, duplicate: false, bundles: 1 });
    expect(queue.peek().map(job => job.data.bundle)).toEqual([{ id: 7 }]);
  });

  it('answers 404 for unknown hooks and routes, 400 for malformed hook ids', async () => {
    const unknown = await fetch(`${baseUrl}/hooks/nobody`, { method: 'POST' });
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toEqual({ success: false, error: 'Unknown webhook "nobody"' });

    const malformed = await fetch(`${baseUrl}/hooks/bad%20id`, { method: 'POST' });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({
      success: false,
      error: 'hookId may only contain letters, digits, dot, dash and underscore',
    });

    const missing = await fetch(`${baseUrl}/nothing-here`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ message: 'Not Found' });
  });

  it('rejects malformed JSON bodies with 400', async () => {
    const response = await fetch(`${baseUrl}/hooks/hook-1`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{ nope',
    });
    expect(response.status).toBe(400);
  });
});

describe('statusForError', () => {
  it('maps runtime errors onto HTTP statuses', () => {
    expect(statusForError(new RateLimitError('slow', { statusCode: 429 }))).toBe(429);
    expect(statusForError(new ValidationError('bad', { statusCode: 400 }))).toBe(422);
    expect(statusForError(new ProviderError('down', { statusCode: 503 }))).toBe(502);
    expect(statusForError(new ExecutionTimeoutError('late', 10))).toBe(504);
  });
});
