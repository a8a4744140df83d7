import { randomUUID } from 'node:crypto';

import type { Redis } from 'ioredis';

import { ExecutionTimeoutError } from '../core/errors.js';
import { sleep } from '../core/RetryManager.js';
import { getErrorMessage } from '../types/common.js';
import { KeyedMutex } from '../utils/KeyedMutex.js';

export interface TriggerState {
  /** Id of the newest emitted item, as text. */
  id: string | null;
  /** ISO timestamp of the newest emitted item; null for id-ordered triggers. */
  date: string | null;
  /** Ids already emitted at `date`, so same-timestamp siblings are not lost. */
  boundaryIds: string[];
}

export interface TriggerStateStore {
  load(key: string): Promise<TriggerState | null>;
  commit(key: string, state: TriggerState): Promise<void>;
  /** Serializes load → poll → commit cycles for one key. */
  withLock<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

export function triggerStateKey(scenarioId: string, moduleId: string): string {
  return `${scenarioId}:${moduleId}`;
}

export function isTriggerState(value: unknown): value is TriggerState {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const id: unknown = Reflect.get(value, 'id');
  const date: unknown = Reflect.get(value, 'date');
  const boundaryIds: unknown = Reflect.get(value, 'boundaryIds');
  return (
    (id === null || typeof id === 'string') &&
    (date === null || typeof date === 'string') &&
    Array.isArray(boundaryIds) &&
    boundaryIds.every(entry => typeof entry === 'string')
  );
}

export class InMemoryTriggerStateStore implements TriggerStateStore {
  private readonly states = new Map<string, TriggerState>();
  private readonly mutex = new KeyedMutex();

  async load(key: string): Promise<TriggerState | null> {
    const state = this.states.get(key);
    return state ? structuredClone(state) : null;
  }

  async commit(key: string, state: TriggerState): Promise<void> {
    this.states.set(key, structuredClone(state));
  }

  withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(key, fn);
  }
}

const RELEASE_LOCK_SCRIPT =
  'if redis.call("get", KEYS[1]) == ARGV[1] then return redis.call("del", KEYS[1]) else return 0 end';

export interface RedisTriggerStateStoreOptions {
  prefix?: string;
  /** Lock lease; should cover a whole poll cycle. */
  lockTtlMs?: number;
  lockWaitMs?: number;
}

/**
 * Trigger state persisted as JSON strings. A process-local mutex plus a Redis
 * lease (SET NX PX, released by token) keep cycles for one key serialized across workers.
 */
export class RedisTriggerStateStore implements TriggerStateStore {
  private readonly mutex = new KeyedMutex();
  private readonly prefix: string;
  private readonly lockTtlMs: number;
  private readonly lockWaitMs: number;

  constructor(
    private readonly redis: Redis,
    options: RedisTriggerStateStoreOptions = {},
  ) {
    this.prefix = options.prefix ?? 'connector:trigger-state';
    this.lockTtlMs = options.lockTtlMs ?? 11 * 60 * 1000;
    this.lockWaitMs = options.lockWaitMs ?? 30_000;
  }

  async load(key: string): Promise<TriggerState | null> {
    const raw = await this.redis.get(this.stateKey(key));
    if (raw === null) {
      return null;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Stored trigger state for ${key} is not valid JSON: ${getErrorMessage(error)}`);
    }
    if (!isTriggerState(parsed)) {
      throw new Error(`Stored trigger state for ${key} has an unexpected shape`);
    }
    return parsed;
  }

  async commit(key: string, state: TriggerState): Promise<void> {
    await this.redis.set(this.stateKey(key), JSON.stringify(state));
  }

  withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(key, async () => {
      const lockKey = `${this.prefix}:lock:${key}`;
      const token = randomUUID();
      await this.acquire(lockKey, token);
      try {
        return await fn();
      } finally {
        await this.redis.eval(RELEASE_LOCK_SCRIPT, 1, lockKey, token);
      }
    });
  }

  private async acquire(lockKey: string, token: string): Promise<void> {
    const startedAt = Date.now();
    while (true) {
      const result = await this.redis.set(lockKey, token, 'PX', this.lockTtlMs, 'NX');
      if (result === 'OK') {
        return;
      }
      if (Date.now() - startedAt >= this.lockWaitMs) {
        throw new ExecutionTimeoutError(`Timed out waiting for trigger lock ${lockKey}`, this.lockWaitMs);
      }
      await sleep(100);
    }
  }

  private stateKey(key: string): string {
    return `${this.prefix}:${key}`;
  }
}
