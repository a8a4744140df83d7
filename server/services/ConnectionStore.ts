import type { JsonObject, JsonValue } from '../types/json.js';

export type ConnectionStatus = 'valid' | 'near_expiry' | 'refreshing' | 'expired' | 'disconnected';

export interface ConnectionInstance {
  id: string;
  integration: string;
  /** Key of the connection definition inside the integration. */
  connection: string;
  parameters: JsonObject;
  /** Values stored by `response.data`: tokens, expiry, account ids. */
  data: JsonObject;
  metadata: JsonValue;
  status: ConnectionStatus;
  createdAt: string;
  updatedAt: string;
}

export interface ConnectionStore {
  get(id: string): Promise<ConnectionInstance | null>;
  save(instance: ConnectionInstance): Promise<void>;
  delete(id: string): Promise<void>;
}

export class InMemoryConnectionStore implements ConnectionStore {
  private readonly instances = new Map<string, ConnectionInstance>();

  async get(id: string): Promise<ConnectionInstance | null> {
    const instance = this.instances.get(id);
    return instance ? structuredClone(instance) : null;
  }

  async save(instance: ConnectionInstance): Promise<void> {
    this.instances.set(instance.id, structuredClone(instance));
  }

  async delete(id: string): Promise<void> {
    this.instances.delete(id);
  }

  get size(): number {
    return this.instances.size;
  }
}
