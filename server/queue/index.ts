import { env, type QueueDriver } from '../env.js';
import { BullMQBundleQueue } from './BullMQFactory.js';
import { InMemoryBundleQueue } from './InMemoryQueue.js';
import type { BundleQueue } from './types.js';

export { getRedisConnectionOptions } from './BullMQFactory.js';
export { InMemoryBundleQueue } from './InMemoryQueue.js';
export type { BundleQueue, EnqueueResult, WebhookBundleJob } from './types.js';
export { WEBHOOK_BUNDLE_QUEUE } from './types.js';

export function createBundleQueue(driver: QueueDriver = env.QUEUE_DRIVER): BundleQueue {
  if (driver === 'inmemory') {
    console.warn('[Queue] QUEUE_DRIVER=inmemory detected. Bundles are kept in process memory only.');
    return new InMemoryBundleQueue();
  }
  return new BullMQBundleQueue();
}
