import { EventEmitter } from 'node:events';

import { bundleJobId, type BundleQueue, type EnqueueResult, type WebhookBundleJob } from './types.js';

export interface InMemoryBundleRecord {
  id: string;
  data: WebhookBundleJob;
  enqueuedAt: number;
}

/**
 * Process-local bundle queue for tests and single-node development. Jobs are
 * kept in arrival order; a job id already waiting is not enqueued twice.
 */
export class InMemoryBundleQueue extends EventEmitter implements BundleQueue {
  readonly driver = 'inmemory' as const;
  private readonly records: InMemoryBundleRecord[] = [];
  private readonly ids = new Set<string>();
  private closed = false;

  async enqueue(jobs: readonly WebhookBundleJob[]): Promise<EnqueueResult[]> {
    if (this.closed) {
      throw new Error('[Queue] in-memory bundle queue is closed');
    }
    const results: EnqueueResult[] = [];
    for (const job of jobs) {
      const id = bundleJobId(job);
      if (!this.ids.has(id)) {
        const record = { id, data: structuredClone(job), enqueuedAt: Date.now() };
        this.ids.add(id);
        this.records.push(record);
        this.emit('waiting', record);
      }
      results.push({ jobId: id });
    }
    return results;
  }

  /** Removes and returns every waiting job; drained ids may be enqueued again. */
  drain(): InMemoryBundleRecord[] {
    const drained = this.records.splice(0, this.records.length);
    for (const record of drained) {
      this.ids.delete(record.id);
    }
    return drained;
  }

  get size(): number {
    return this.records.length;
  }

  peek(): readonly InMemoryBundleRecord[] {
    return this.records;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.removeAllListeners();
  }
}
