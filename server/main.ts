// Load environment variables FIRST
import { env } from './env.js';

import { createServer } from 'node:http';

import { Redis } from 'ioredis';

import { createApp } from './app.js';
import { loadIntegrationDefinitionFromFile } from './connectors/DefinitionLoader.js';
import { createBundleQueue, getRedisConnectionOptions } from './queue/index.js';
import { ConnectorRuntime, type ConnectorRuntimeOptions } from './services/ConnectorRuntime.js';
import { RedisTriggerStateStore } from './services/TriggerStateStore.js';
import { getErrorMessage } from './types/common.js';
import { RedisWebhookDedupeStore } from './webhooks/WebhookDedupeStore.js';

async function main(): Promise<void> {
  if (!env.CONNECTOR_DEFINITION_PATH) {
    throw new Error('CONNECTOR_DEFINITION_PATH is required');
  }
  const definition = await loadIntegrationDefinitionFromFile(env.CONNECTOR_DEFINITION_PATH, {
    functionTimeoutMs: env.FUNCTION_TIMEOUT_MS,
  });

  const options: ConnectorRuntimeOptions = { queue: createBundleQueue() };
  let redis: Redis | null = null;
  if (env.STATE_STORE_DRIVER === 'redis') {
    redis = new Redis(getRedisConnectionOptions());
    options.triggerStateStore = new RedisTriggerStateStore(redis);
    options.dedupeStore = new RedisWebhookDedupeStore(redis);
  } else {
    console.warn('[main] STATE_STORE_DRIVER=memory: trigger state and webhook dedupe reset on restart.');
  }

  const runtime = ConnectorRuntime.fromDefinition(definition, options);
  const app = createApp(runtime, { logRequests: env.NODE_ENV !== 'test' });
  const server = createServer(app);

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      console.error(`❌ Port ${env.PORT} is already in use. Set PORT to a free port.`);
    } else {
      console.error('❌ Failed to start HTTP server:', error);
    }
    process.exit(1);
  });

  const shutdown = (signal: string) => {
    console.log(`[main] ${signal} received, shutting down`);
    server.close();
    runtime
      .close()
      .then(() => redis?.quit())
      .then(() => process.exit(0))
      .catch(error => {
        console.error(`[main] shutdown failed: ${getErrorMessage(error)}`);
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  server.listen(env.PORT, () => {
    console.log(`serving ${definition.name} on port ${env.PORT}`);
    if (env.SERVER_PUBLIC_URL) {
      console.log(`webhook base url: ${env.SERVER_PUBLIC_URL}/hooks/`);
    }
  });
}

main().catch(error => {
  console.error(`❌ ${getErrorMessage(error)}`);
  process.exit(1);
});
