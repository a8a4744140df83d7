import type { JsonObject } from '../types/json.js';

export interface OAuthPendingState {
  connection: string;
  redirectUri: string;
  parameters: JsonObject;
  /** PKCE verifier, present for `oauth-pkce` connections. */
  codeVerifier?: string;
  createdAt: number;
}

export interface OAuthStateStoreEntry {
  state: OAuthPendingState;
  expiresAt: number;
}

export interface OAuthStateConsumeResult {
  state?: OAuthPendingState;
  found: boolean;
  expired: boolean;
  expiresAt?: number;
}

export interface OAuthStateStore {
  set(stateKey: string, payload: OAuthPendingState, ttlSeconds: number): void;
  /** Removes the entry; an expired entry is reported but its payload withheld. */
  consume(stateKey: string): OAuthStateConsumeResult;
}

/** Process-local pending states; expired entries are pruned whenever a new one is stored. */
export class InMemoryOAuthStateStore implements OAuthStateStore {
  private readonly store = new Map<string, OAuthStateStoreEntry>();

  constructor(private readonly clock: () => number = Date.now) {}

  set(stateKey: string, payload: OAuthPendingState, ttlSeconds: number): void {
    const now = this.clock();
    this.clearExpired(now);
    const ttl = Math.max(1, ttlSeconds);
    this.store.set(stateKey, { state: payload, expiresAt: now + ttl * 1000 });
  }

  consume(stateKey: string): OAuthStateConsumeResult {
    const entry = this.store.get(stateKey);
    if (!entry) {
      return { found: false, expired: false };
    }
    this.store.delete(stateKey);
    if (this.clock() >= entry.expiresAt) {
      return { found: true, expired: true, expiresAt: entry.expiresAt };
    }
    return { found: true, expired: false, state: entry.state, expiresAt: entry.expiresAt };
  }

  get size(): number {
    return this.store.size;
  }

  private clearExpired(now: number): void {
    for (const [stateKey, entry] of this.store.entries()) {
      if (now >= entry.expiresAt) {
        this.store.delete(stateKey);
      }
    }
  }
}
