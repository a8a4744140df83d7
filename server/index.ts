export { createApp, statusForError, type CreateAppOptions } from './app.js';
export { loadIntegrationDefinition, loadIntegrationDefinitionFromFile } from './connectors/DefinitionLoader.js';
export type * from './connectors/types.js';
export * from './core/errors.js';
export { evaluate, evaluateCondition, evaluateText, parseTemplate } from './core/ExpressionEvaluator.js';
export { RetryManager, type RetryPolicy, type Sleeper } from './core/RetryManager.js';
export type { TraceSink } from './integrations/RequestExecutor.js';
export { createBundleQueue, InMemoryBundleQueue, WEBHOOK_BUNDLE_QUEUE } from './queue/index.js';
export type { BundleQueue, WebhookBundleJob } from './queue/index.js';
export { Scope } from './runtime/Scope.js';
export {
  ConnectorRuntime,
  type ConnectionRef,
  type ConnectorRuntimeOptions,
  type InvokeOptions,
  type InvokeResult,
} from './services/ConnectorRuntime.js';
export { InMemoryConnectionStore, type ConnectionInstance, type ConnectionStore } from './services/ConnectionStore.js';
export type { RpcOption, RpcResolution } from './services/RpcResolver.js';
export {
  InMemoryTriggerStateStore,
  RedisTriggerStateStore,
  type TriggerState,
  type TriggerStateStore,
} from './services/TriggerStateStore.js';
export type { JsonObject, JsonValue } from './types/json.js';
export {
  InMemoryWebhookDedupeStore,
  RedisWebhookDedupeStore,
  type WebhookDedupeStore,
} from './webhooks/WebhookDedupeStore.js';
export { InMemoryHookStore, type HookRef, type HookStore, type WebhookDelivery } from './webhooks/types.js';
