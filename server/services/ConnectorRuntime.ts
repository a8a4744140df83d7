import { loadIntegrationDefinition } from '../connectors/DefinitionLoader.js';
import type { IntegrationDefinition, ModuleDefinition } from '../connectors/types.js';
import { ConfigurationError } from '../core/errors.js';
import { RetryManager, type RetryPolicy, type Sleeper } from '../core/RetryManager.js';
import { env } from '../env.js';
import { HttpTransport } from '../integrations/HttpTransport.js';
import { ModuleExecutor } from '../integrations/ModuleExecutor.js';
import { PaginationEngine } from '../integrations/PaginationEngine.js';
import { RequestExecutor, type TraceSink } from '../integrations/RequestExecutor.js';
import { InMemoryBundleQueue } from '../queue/InMemoryQueue.js';
import type { BundleQueue } from '../queue/types.js';
import { FunctionSandbox } from '../runtime/FunctionSandbox.js';
import { resolveParameters } from '../runtime/parameters.js';
import { createAppContext, type AppContext } from '../runtime/Scope.js';
import type { RuntimeLogger } from '../types/common.js';
import type { JsonObject, JsonValue } from '../types/json.js';
import { InMemoryWebhookDedupeStore, type WebhookDedupeStore } from '../webhooks/WebhookDedupeStore.js';
import { WebhookManager } from '../webhooks/WebhookManager.js';
import { InMemoryHookStore, type HookRef, type HookStore, type WebhookDelivery, type WebhookReceiveResult } from '../webhooks/types.js';
import { ConnectionManager, type AuthorizationRequest } from './ConnectionManager.js';
import { InMemoryConnectionStore, type ConnectionInstance, type ConnectionStore } from './ConnectionStore.js';
import { RpcResolver, type RpcResolution } from './RpcResolver.js';
import { TriggerStateMachine } from './TriggerStateMachine.js';
import { InMemoryTriggerStateStore, triggerStateKey, type TriggerState, type TriggerStateStore } from './TriggerStateStore.js';

/** A stored instance id, the instance itself, or null for modules without a connection. */
export type ConnectionRef = string | ConnectionInstance | null;

export interface ConnectorRuntimeOptions {
  fetch?: typeof fetch;
  clock?: () => Date;
  logger?: RuntimeLogger;
  onTrace?: TraceSink;
  connectionStore?: ConnectionStore;
  triggerStateStore?: TriggerStateStore;
  hookStore?: HookStore;
  dedupeStore?: WebhookDedupeStore;
  queue?: BundleQueue;
  retry?: Partial<RetryPolicy>;
  sleeper?: Sleeper;
  allowPrivateNetworks?: boolean;
  requestTimeoutMs?: number;
  functionTimeoutMs?: number;
  paginationMaxPages?: number;
  paginationTimeoutMs?: number;
  pollTimeoutMs?: number;
  refreshSkewMs?: number;
  webhookDedupeTtlMs?: number;
}

export interface InvokeOptions {
  /** Most bundles to return (and, for triggers, to emit in this cycle). */
  limit?: number | null;
  signal?: AbortSignal;
}

export interface InvokeResult {
  bundles: JsonValue[];
  /** New trigger state; null for actions and searches. */
  state: TriggerState | null;
}

/**
 * Entry point for hosts: one instance per integration definition, wiring the
 * evaluator, request pipeline, connections, triggers, RPCs and webhooks.
 */
export class ConnectorRuntime {
  readonly definition: IntegrationDefinition;
  readonly connections: ConnectionManager;
  readonly webhooks: WebhookManager;
  readonly queue: BundleQueue;
  private readonly app: AppContext;
  private readonly modules: ModuleExecutor;
  private readonly triggers: TriggerStateMachine;
  private readonly rpcs: RpcResolver;
  private readonly triggerStates: TriggerStateStore;
  private readonly pollTimeoutMs: number;
  private readonly logger: RuntimeLogger;

  private constructor(definition: IntegrationDefinition, options: ConnectorRuntimeOptions) {
    this.definition = definition;
    this.logger = options.logger ?? console;
    const clock = options.clock ?? (() => new Date());

    const functions = new FunctionSandbox(definition.functions ?? [], {
      timeoutMs: options.functionTimeoutMs ?? env.FUNCTION_TIMEOUT_MS,
      clock,
    });
    this.app = createAppContext({ common: definition.common ?? {}, functions, clock });

    const executor = new RequestExecutor({
      integration: definition.name,
      base: definition.base,
      transport: new HttpTransport({
        fetch: options.fetch,
        timeoutMs: options.requestTimeoutMs ?? env.REQUEST_TIMEOUT_MS,
        allowPrivateNetworks: options.allowPrivateNetworks ?? env.ALLOW_PRIVATE_NETWORKS,
      }),
      retry: new RetryManager(
        {
          maxAttempts: env.RETRY_MAX_ATTEMPTS,
          initialDelayMs: env.RETRY_INITIAL_DELAY_MS,
          maxDelayMs: env.RETRY_MAX_DELAY_MS,
          ...options.retry,
        },
        options.sleeper,
      ),
      onTrace: options.onTrace,
      logger: this.logger,
    });
    const pagination = new PaginationEngine(executor, {
      maxPages: options.paginationMaxPages ?? env.PAGINATION_MAX_PAGES,
      timeoutMs: options.paginationTimeoutMs ?? env.PAGINATION_TIMEOUT_MS,
      logger: this.logger,
    });
    this.modules = new ModuleExecutor(pagination);

    this.connections = new ConnectionManager({
      definition,
      executor,
      app: this.app,
      store: options.connectionStore ?? new InMemoryConnectionStore(),
      refreshSkewMs: options.refreshSkewMs,
      logger: this.logger,
    });
    this.triggers = new TriggerStateMachine(this.modules, definition.name, this.logger);
    this.rpcs = new RpcResolver(definition, this.modules, this.logger);
    this.triggerStates = options.triggerStateStore ?? new InMemoryTriggerStateStore();
    this.pollTimeoutMs = options.pollTimeoutMs ?? env.POLL_TIMEOUT_MS;

    this.queue = options.queue ?? new InMemoryBundleQueue();
    this.webhooks = new WebhookManager({
      definition,
      executor,
      connections: this.connections,
      hooks: options.hookStore ?? new InMemoryHookStore(),
      dedupe: options.dedupeStore ?? new InMemoryWebhookDedupeStore(() => clock().getTime()),
      queue: this.queue,
      dedupeTtlMs: options.webhookDedupeTtlMs ?? env.WEBHOOK_DEDUPE_TTL_MS,
      clock,
      logger: this.logger,
    });
  }

  /** Validates `raw` (see `loadIntegrationDefinition`) and builds a runtime for it. */
  static fromDefinition(raw: unknown, options: ConnectorRuntimeOptions = {}): ConnectorRuntime {
    const definition = loadIntegrationDefinition(raw, { functionTimeoutMs: options.functionTimeoutMs });
    return new ConnectorRuntime(definition, options);
  }

  connect(connection: string, parameters: JsonObject): Promise<ConnectionInstance> {
    return this.connections.validate(connection, parameters);
  }

  authorize(connection: string, parameters: JsonObject, redirectUri: string): Promise<AuthorizationRequest> {
    return this.connections.authorize(connection, parameters, redirectUri);
  }

  exchange(state: string, code: string): Promise<ConnectionInstance> {
    return this.connections.exchange(state, code);
  }

  async disconnect(ref: ConnectionRef): Promise<ConnectionInstance | null> {
    const instance = await this.loadConnection(ref);
    return instance ? this.connections.disconnect(instance) : null;
  }

  async invoke(
    moduleId: string,
    parameters: JsonObject,
    connectionRef: ConnectionRef,
    priorTriggerState: TriggerState | null = null,
    options: InvokeOptions = {},
  ): Promise<InvokeResult> {
    const module = this.getModule(moduleId);
    if (module.type === 'instant') {
      throw new ConfigurationError(`modules.${moduleId} is an instant trigger; its bundles arrive through webhooks`);
    }
    const resolved = resolveParameters(module.parameters, parameters, `modules.${moduleId}`);
    const connection = await this.freshConnection(module.connection, connectionRef, `modules.${moduleId}`);
    const scope = this.connections.scopeFor(connection, { parameters: resolved });

    if (module.type === 'trigger') {
      const result = await this.triggers.poll(moduleId, module, scope, priorTriggerState, {
        limit: options.limit,
        signal: options.signal,
        timeoutMs: this.pollTimeoutMs,
      });
      return { bundles: result.items, state: result.state };
    }

    const result = await this.modules.run(module.communication, scope, { limit: options.limit, signal: options.signal });
    return { bundles: result.outputs, state: null };
  }

  /** Loads the stored trigger state, polls once and commits the new state under a per-key lock. */
  pollAndCommit(
    scenarioId: string,
    moduleId: string,
    parameters: JsonObject,
    connectionRef: ConnectionRef,
    options: InvokeOptions = {},
  ): Promise<InvokeResult> {
    const key = triggerStateKey(scenarioId, moduleId);
    return this.triggerStates.withLock(key, async () => {
      const prior = await this.triggerStates.load(key);
      const result = await this.invoke(moduleId, parameters, connectionRef, prior, options);
      if (result.state) {
        await this.triggerStates.commit(key, result.state);
      }
      return result;
    });
  }

  fetchOptions(rpcId: string, parameters: JsonObject, connectionRef: ConnectionRef): Promise<RpcResolution> {
    return this.rpcs.resolve(rpcId, parameters, async () => {
      const rpc = this.rpcs.getDefinition(rpcId);
      const connection = await this.freshConnection(rpc.connection, connectionRef, `rpcs.${rpcId}`);
      return this.connections.scopeFor(connection);
    });
  }

  async registerWebhook(
    webhook: string,
    hookId: string,
    callbackUrl: string,
    connectionRef: ConnectionRef,
    parameters: JsonObject,
  ): Promise<HookRef> {
    const definition = this.webhooks.getDefinition(webhook);
    const connection = await this.freshConnection(definition.connection, connectionRef, `webhooks.${webhook}`);
    return this.webhooks.register(webhook, hookId, callbackUrl, connection, parameters);
  }

  /** Re-resolves the hook's parameters and runs the webhook's `update` Call when it declares one. */
  updateWebhook(hook: HookRef, parameters: JsonObject): Promise<HookRef> {
    return this.webhooks.update(hook, parameters);
  }

  unregisterWebhook(hook: HookRef): Promise<void> {
    return this.webhooks.unregister(hook);
  }

  receiveWebhook(delivery: WebhookDelivery): Promise<WebhookReceiveResult> {
    return this.webhooks.receive(delivery);
  }

  /** Releases the bundle queue connection. */
  close(): Promise<void> {
    return this.queue.close();
  }

  private getModule(moduleId: string): ModuleDefinition {
    const module = this.definition.modules?.[moduleId];
    if (!module) {
      throw new ConfigurationError(`Unknown module "${moduleId}" in integration "${this.definition.name}"`);
    }
    return module;
  }

  private async loadConnection(ref: ConnectionRef): Promise<ConnectionInstance | null> {
    if (ref === null) {
      return null;
    }
    return typeof ref === 'string' ? this.connections.get(ref) : ref;
  }

  private async freshConnection(
    required: string | undefined,
    ref: ConnectionRef,
    owner: string,
  ): Promise<ConnectionInstance | null> {
    const instance = await this.loadConnection(ref);
    if (!instance) {
      if (required) {
        throw new ConfigurationError(`${owner} requires a "${required}" connection`);
      }
      return null;
    }
    if (required && instance.connection !== required) {
      throw new ConfigurationError(`${owner} requires a "${required}" connection, got "${instance.connection}"`);
    }
    return this.connections.ensureFresh(instance);
  }
}
