import { createHash } from 'node:crypto';

import type { IntegrationDefinition, WebhookDefinition } from '../connectors/types.js';
import { ConfigurationError, UnknownHookError } from '../core/errors.js';
import { evaluate, evaluateCondition } from '../core/ExpressionEvaluator.js';
import { toText } from '../core/ExpressionValue.js';
import type { RequestExecutor } from '../integrations/RequestExecutor.js';
import { evaluateData, extractItems } from '../integrations/ResponseShaper.js';
import {
  recordWebhookBundles,
  recordWebhookDedupeHit,
  recordWebhookDedupeMiss,
  withSpan,
} from '../observability/index.js';
import type { BundleQueue, WebhookBundleJob } from '../queue/types.js';
import { resolveParameters } from '../runtime/parameters.js';
import type { Scope } from '../runtime/Scope.js';
import type { ConnectionManager } from '../services/ConnectionManager.js';
import type { ConnectionInstance } from '../services/ConnectionStore.js';
import { getErrorMessage, type RuntimeLogger } from '../types/common.js';
import { canonicalJson, type JsonObject, type JsonValue } from '../types/json.js';
import type { WebhookDedupeStore } from './WebhookDedupeStore.js';
import type { HookRef, HookStore, WebhookDelivery, WebhookReceiveResult } from './types.js';

export interface WebhookManagerOptions {
  definition: IntegrationDefinition;
  executor: RequestExecutor;
  connections: ConnectionManager;
  hooks: HookStore;
  dedupe: WebhookDedupeStore;
  queue: BundleQueue;
  dedupeTtlMs: number;
  clock?: () => Date;
  logger?: RuntimeLogger;
}

function sha256(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

/**
 * Instant trigger plumbing: attaches provider webhooks, and turns inbound
 * deliveries into queued bundles exactly once per dedupe window.
 */
export class WebhookManager {
  private readonly logger: RuntimeLogger;
  private readonly clock: () => Date;

  constructor(private readonly options: WebhookManagerOptions) {
    this.logger = options.logger ?? console;
    this.clock = options.clock ?? (() => new Date());
  }

  getDefinition(name: string): WebhookDefinition {
    const webhook = this.options.definition.webhooks?.[name];
    if (!webhook) {
      throw new ConfigurationError(`Unknown webhook "${name}" in integration "${this.options.definition.name}"`);
    }
    return webhook;
  }

  async register(
    webhookName: string,
    hookId: string,
    callbackUrl: string,
    connection: ConnectionInstance | null,
    parameters: JsonObject,
  ): Promise<HookRef> {
    const definition = this.getDefinition(webhookName);
    const resolved = resolveParameters(definition.parameters, parameters, `webhooks.${webhookName}`);
    const now = this.clock().toISOString();
    const hook: HookRef = {
      hookId,
      webhook: webhookName,
      url: callbackUrl,
      connectionId: connection?.id ?? null,
      parameters: resolved,
      data: {},
      createdAt: now,
      updatedAt: now,
    };

    if (definition.attach) {
      const scope = await this.callScope(hook, connection);
      const response = await this.options.executor.execute(definition.attach, scope, { label: `webhooks.${webhookName}.attach` });
      hook.data = evaluateData(definition.attach.response?.data, this.options.executor.responseScope(scope, response));
    }

    await this.options.hooks.save(hook);
    this.logger.info(`[WebhookManager] registered ${hookId} for ${this.options.definition.name}.${webhookName}`);
    return hook;
  }

  async update(hook: HookRef, parameters: JsonObject): Promise<HookRef> {
    const definition = this.getDefinition(hook.webhook);
    const updated: HookRef = {
      ...hook,
      parameters: resolveParameters(definition.parameters, parameters, `webhooks.${hook.webhook}`),
      updatedAt: this.clock().toISOString(),
    };
    if (definition.update) {
      const scope = await this.callScope(updated, await this.loadConnection(updated));
      const response = await this.options.executor.execute(definition.update, scope, { label: `webhooks.${hook.webhook}.update` });
      updated.data = {
        ...updated.data,
        ...evaluateData(definition.update.response?.data, this.options.executor.responseScope(scope, response)),
      };
    }
    await this.options.hooks.save(updated);
    this.logger.info(`[WebhookManager] updated ${hook.hookId}`);
    return updated;
  }

  async unregister(hook: HookRef): Promise<void> {
    const definition = this.getDefinition(hook.webhook);
    if (definition.detach) {
      const scope = await this.callScope(hook, await this.loadConnection(hook));
      await this.options.executor.execute(definition.detach, scope, { label: `webhooks.${hook.webhook}.detach` });
    }
    await this.options.hooks.delete(hook.hookId);
    this.logger.info(`[WebhookManager] unregistered ${hook.hookId}`);
  }

  async receive(delivery: WebhookDelivery): Promise<WebhookReceiveResult> {
    const hook = await this.options.hooks.get(delivery.hookId);
    if (!hook) {
      throw new UnknownHookError(delivery.hookId);
    }
    const definition = this.getDefinition(hook.webhook);
    const attributes = { integration: this.options.definition.name, webhook: hook.webhook };

    return withSpan('connector.webhook.receive', { 'connector.integration': attributes.integration, 'connector.webhook': hook.webhook }, async () => {
      const scope = this.deliveryScope(hook, await this.loadConnection(hook), delivery);

      if (!evaluateCondition(definition.validator, scope, true, { path: `webhooks.${hook.webhook}.validator` })) {
        this.logger.debug(`[WebhookManager] delivery for ${hook.hookId} rejected by validator`);
        return { accepted: true, duplicate: false, bundles: 0 };
      }

      const token = this.dedupeToken(hook, definition, scope, delivery.payload);
      if (!(await this.options.dedupe.claim(token, this.options.dedupeTtlMs))) {
        recordWebhookDedupeHit(attributes);
        this.logger.info(`[WebhookManager] duplicate delivery ignored for ${hook.hookId}`);
        return { accepted: true, duplicate: true, bundles: 0 };
      }
      recordWebhookDedupeMiss(attributes);

      try {
        const bundles = this.mapBundles(definition, scope, delivery.payload);
        const deliveryId = sha256(token).slice(0, 32);
        const receivedAt = this.clock().toISOString();
        const jobs: WebhookBundleJob[] = bundles.map((bundle, index) => ({
          hookId: hook.hookId,
          integration: this.options.definition.name,
          webhook: hook.webhook,
          deliveryId,
          index,
          bundle,
          receivedAt,
        }));
        await this.options.queue.enqueue(jobs);
        recordWebhookBundles(jobs.length, attributes);
        return { accepted: true, duplicate: false, bundles: jobs.length };
      } catch (error) {
        await this.options.dedupe.release(token);
        this.logger.error(`[WebhookManager] failed to process delivery for ${hook.hookId}: ${getErrorMessage(error)}`);
        throw error;
      }
    });
  }

  private dedupeToken(hook: HookRef, definition: WebhookDefinition, scope: Scope, payload: JsonValue): string {
    if (definition.uid !== undefined) {
      const uid = evaluate(definition.uid, scope, { path: `webhooks.${hook.webhook}.uid` });
      if (uid !== null && uid !== '') {
        return `${hook.hookId}:uid:${toText(uid)}`;
      }
    }
    return `${hook.hookId}:sha256:${sha256(canonicalJson(payload))}`;
  }

  private mapBundles(definition: WebhookDefinition, scope: Scope, payload: JsonValue): JsonValue[] {
    const response = definition.response;
    const items = response?.iterate === undefined ? [payload] : extractItems(response.iterate, scope, 'webhook.response.iterate');
    const output = response?.output;
    if (output === undefined) {
      return items;
    }
    return items.map(item => evaluate(output, scope.with({ item }), { path: 'webhook.response.output' }));
  }

  private async loadConnection(hook: HookRef): Promise<ConnectionInstance | null> {
    return hook.connectionId ? this.options.connections.get(hook.connectionId) : null;
  }

  private async callScope(hook: HookRef, connection: ConnectionInstance | null): Promise<Scope> {
    const fresh = connection ? await this.options.connections.ensureFresh(connection) : null;
    return this.options.connections.scopeFor(fresh, {
      parameters: hook.parameters,
      webhook: { id: hook.hookId, url: hook.url, ...hook.data },
    });
  }

  private deliveryScope(hook: HookRef, connection: ConnectionInstance | null, delivery: WebhookDelivery): Scope {
    return this.options.connections.scopeFor(connection, {
      parameters: hook.parameters,
      body: delivery.payload,
      headers: delivery.headers,
      webhook: { id: hook.hookId, url: hook.url, ...hook.data, query: delivery.query ?? {} },
    });
  }
}
