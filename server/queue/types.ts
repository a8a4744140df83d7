import type { JsonValue } from '../types/json.js';

export const WEBHOOK_BUNDLE_QUEUE = 'webhook.bundles';

export interface WebhookBundleJob {
  hookId: string;
  integration: string;
  webhook: string;
  /** Dedupe token of the delivery the bundle came from. */
  deliveryId: string;
  index: number;
  bundle: JsonValue;
  receivedAt: string;
}

export interface EnqueueResult {
  jobId: string;
}

/** Durable hand-off for bundles produced by instant triggers. */
export interface BundleQueue {
  readonly driver: 'inmemory' | 'bullmq';
  enqueue(jobs: readonly WebhookBundleJob[]): Promise<EnqueueResult[]>;
  close(): Promise<void>;
}

/** Colons are reserved in BullMQ custom job ids. */
export function bundleJobId(job: WebhookBundleJob): string {
  return `${job.deliveryId}-${job.index}`.replace(/:/g, '_');
}
