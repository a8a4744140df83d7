import { Queue, type RedisOptions } from 'bullmq';

import { env } from '../env.js';
import {
  bundleJobId,
  WEBHOOK_BUNDLE_QUEUE,
  type BundleQueue,
  type EnqueueResult,
  type WebhookBundleJob,
} from './types.js';

export function getRedisConnectionOptions(): RedisOptions {
  const options: RedisOptions = {
    host: env.QUEUE_REDIS_HOST,
    port: env.QUEUE_REDIS_PORT,
    db: env.QUEUE_REDIS_DB,
    // Required by BullMQ for blocking connections.
    maxRetriesPerRequest: null,
  };
  if (env.QUEUE_REDIS_USERNAME) {
    options.username = env.QUEUE_REDIS_USERNAME;
  }
  if (env.QUEUE_REDIS_PASSWORD) {
    options.password = env.QUEUE_REDIS_PASSWORD;
  }
  if (env.QUEUE_REDIS_TLS) {
    options.tls = {};
  }
  return options;
}

export function createQueue(connection: RedisOptions = getRedisConnectionOptions()): Queue<WebhookBundleJob> {
  return new Queue<WebhookBundleJob>(WEBHOOK_BUNDLE_QUEUE, {
    connection,
    defaultJobOptions: {
      removeOnComplete: true,
      removeOnFail: false,
      attempts: 3,
      backoff: { type: 'exponential', delay: 1000 },
    },
  });
}

export class BullMQBundleQueue implements BundleQueue {
  readonly driver = 'bullmq' as const;

  constructor(private readonly queue: Queue<WebhookBundleJob> = createQueue()) {}

  async enqueue(jobs: readonly WebhookBundleJob[]): Promise<EnqueueResult[]> {
    if (jobs.length === 0) {
      return [];
    }
    const added = await this.queue.addBulk(
      jobs.map(job => ({ name: WEBHOOK_BUNDLE_QUEUE, data: job, opts: { jobId: bundleJobId(job) } })),
    );
    return added.map((job, index) => ({ jobId: job.id ?? bundleJobId(jobs[index]) }));
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
