import type { Redis } from 'ioredis';

/** Claims a dedupe token for a TTL window; false means the token was already claimed. */
export interface WebhookDedupeStore {
  claim(token: string, ttlMs: number): Promise<boolean>;
  /** Gives a claimed token back when the delivery could not be processed. */
  release(token: string): Promise<void>;
}

export class InMemoryWebhookDedupeStore implements WebhookDedupeStore {
  private readonly tokens = new Map<string, number>();

  constructor(private readonly clock: () => number = Date.now) {}

  async claim(token: string, ttlMs: number): Promise<boolean> {
    const now = this.clock();
    this.prune(now);
    const expiresAt = this.tokens.get(token);
    if (expiresAt !== undefined && expiresAt > now) {
      return false;
    }
    this.tokens.set(token, now + Math.max(1, ttlMs));
    return true;
  }

  async release(token: string): Promise<void> {
    this.tokens.delete(token);
  }

  get size(): number {
    return this.tokens.size;
  }

  private prune(now: number): void {
    for (const [token, expiresAt] of this.tokens) {
      if (expiresAt <= now) {
        this.tokens.delete(token);
      }
    }
  }
}

export class RedisWebhookDedupeStore implements WebhookDedupeStore {
  constructor(
    private readonly redis: Redis,
    private readonly prefix = 'connector:webhook-dedupe',
  ) {}

  async claim(token: string, ttlMs: number): Promise<boolean> {
    const result = await this.redis.set(`${this.prefix}:${token}`, '1', 'PX', Math.max(1, ttlMs), 'NX');
    return result === 'OK';
  }

  async release(token: string): Promise<void> {
    await this.redis.del(`${this.prefix}:${token}`);
  }
}
