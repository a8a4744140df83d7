import type { JsonObject, JsonValue } from '../types/json.js';

/** Stored result of a webhook `attach`, needed later to update or detach it. */
export interface HookRef {
  hookId: string;
  /** Key of the webhook definition inside the integration. */
  webhook: string;
  url: string;
  connectionId: string | null;
  parameters: JsonObject;
  /** Values stored by `attach.response.data`, e.g. the provider's subscription id. */
  data: JsonObject;
  createdAt: string;
  updatedAt: string;
}

export interface HookStore {
  get(hookId: string): Promise<HookRef | null>;
  save(hook: HookRef): Promise<void>;
  delete(hookId: string): Promise<void>;
}

export interface WebhookReceiveResult {
  accepted: boolean;
  duplicate: boolean;
  bundles: number;
}

export interface WebhookDelivery {
  hookId: string;
  payload: JsonValue;
  headers: Record<string, string>;
  query?: JsonObject;
}

export class InMemoryHookStore implements HookStore {
  private readonly hooks = new Map<string, HookRef>();

  async get(hookId: string): Promise<HookRef | null> {
    const hook = this.hooks.get(hookId);
    return hook ? structuredClone(hook) : null;
  }

  async save(hook: HookRef): Promise<void> {
    this.hooks.set(hook.hookId, structuredClone(hook));
  }

  async delete(hookId: string): Promise<void> {
    this.hooks.delete(hookId);
  }
}
