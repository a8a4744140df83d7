import { randomUUID } from 'node:crypto';

import type { CallDefinition, ConnectionDefinition, IntegrationDefinition } from '../connectors/types.js';
import { parseDateValue } from '../core/builtins.js';
import {
  ConfigurationError,
  InvalidCredentialsError,
  ProviderError,
  RateLimitedError,
  RateLimitError,
  RequestError,
} from '../core/errors.js';
import { evaluate, evaluateCondition } from '../core/ExpressionEvaluator.js';
import { env } from '../env.js';
import type { RawResponse, RequestExecutor } from '../integrations/RequestExecutor.js';
import { evaluateData } from '../integrations/ResponseShaper.js';
import { createCodeChallenge, createCodeVerifier, createOAuthState, PKCE_CHALLENGE_METHOD } from '../oauth/pkce.js';
import { InMemoryOAuthStateStore, type OAuthStateStore } from '../oauth/stateStore.js';
import { recordTokenRefresh } from '../observability/index.js';
import { resolveParameters } from '../runtime/parameters.js';
import { Scope, type AppContext, type ScopeLayer } from '../runtime/Scope.js';
import type { RuntimeLogger } from '../types/common.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';
import type { ConnectionInstance, ConnectionStore } from './ConnectionStore.js';

export interface ConnectionManagerOptions {
  definition: IntegrationDefinition;
  executor: RequestExecutor;
  app: AppContext;
  store: ConnectionStore;
  stateStore?: OAuthStateStore;
  refreshSkewMs?: number;
  stateTtlSeconds?: number;
  logger?: RuntimeLogger;
}

export interface AuthorizationRequest {
  url: string;
  state: string;
}

function isOAuth(definition: ConnectionDefinition): boolean {
  return definition.type === 'oauth' || definition.type === 'oauth-pkce';
}

/** Variables exposed as `connection` to every Call made on behalf of an instance. */
export function connectionVariables(instance: ConnectionInstance | null): JsonObject {
  if (!instance) {
    return {};
  }
  return { ...instance.parameters, ...instance.data };
}

/**
 * Failures of auth calls keep their status but are re-typed: anything the user
 * has to fix by reconnecting becomes `InvalidCredentialsError`.
 */
function toConnectionError(error: unknown, action: string): unknown {
  if (!(error instanceof RequestError)) {
    return error;
  }
  const details = { statusCode: error.statusCode, body: error.body, cause: error };
  switch (error.requestKind) {
    case 'Auth':
    case 'Validation':
      return new InvalidCredentialsError(`${action} failed: ${error.message}`, details);
    case 'RateLimit':
      return new RateLimitedError(`${action} was rate limited: ${error.message}`, {
        ...details,
        retryAfterMs: error instanceof RateLimitError ? error.retryAfterMs : undefined,
      });
    case 'Provider':
      return new ProviderError(`${action} failed: ${error.message}`, details);
  }
}

/**
 * Lifecycle of connection instances: validation of key-based connections, the
 * OAuth code flow (with optional PKCE), proactive token refresh and revocation.
 */
export class ConnectionManager {
  private readonly definition: IntegrationDefinition;
  private readonly executor: RequestExecutor;
  private readonly app: AppContext;
  private readonly store: ConnectionStore;
  private readonly stateStore: OAuthStateStore;
  private readonly refreshSkewMs: number;
  private readonly stateTtlSeconds: number;
  private readonly logger: RuntimeLogger;
  private readonly inflightRefreshes = new Map<string, Promise<ConnectionInstance>>();

  constructor(options: ConnectionManagerOptions) {
    this.definition = options.definition;
    this.executor = options.executor;
    this.app = options.app;
    this.store = options.store;
    this.stateStore = options.stateStore ?? new InMemoryOAuthStateStore(() => this.app.clock().getTime());
    this.refreshSkewMs = options.refreshSkewMs ?? env.OAUTH_REFRESH_SKEW_MS;
    this.stateTtlSeconds = options.stateTtlSeconds ?? env.OAUTH_STATE_TTL_SECONDS;
    this.logger = options.logger ?? console;
  }

  getDefinition(name: string): ConnectionDefinition {
    const connection = this.definition.connections?.[name];
    if (!connection) {
      throw new ConfigurationError(`Unknown connection "${name}" in integration "${this.definition.name}"`);
    }
    return connection;
  }

  async get(id: string): Promise<ConnectionInstance> {
    const instance = await this.store.get(id);
    if (!instance) {
      throw new ConfigurationError(`Connection instance "${id}" does not exist`);
    }
    return instance;
  }

  /** Creates an instance for a key-based connection, verifying it with the `info` Call. */
  async validate(name: string, parameters: JsonObject): Promise<ConnectionInstance> {
    const definition = this.getDefinition(name);
    if (isOAuth(definition)) {
      throw new ConfigurationError(`Connection "${name}" uses OAuth; start it with authorize()`);
    }
    const instance = this.newInstance(name, resolveParameters(definition.parameters, parameters, `connections.${name}`));
    const verified = await this.runInfo(definition, instance);
    await this.store.save(verified);
    this.logger.info(`[ConnectionManager] validated ${this.definition.name}/${name} as ${verified.id}`);
    return verified;
  }

  async authorize(name: string, parameters: JsonObject, redirectUri: string): Promise<AuthorizationRequest> {
    const definition = this.getDefinition(name);
    if (!isOAuth(definition) || !definition.authorize) {
      throw new ConfigurationError(`Connection "${name}" does not support the OAuth authorization flow`);
    }
    const resolved = resolveParameters(definition.parameters, parameters, `connections.${name}`);
    const state = createOAuthState();
    const pkce = definition.type === 'oauth-pkce';
    const codeVerifier = pkce ? createCodeVerifier() : undefined;
    const codeChallenge = codeVerifier ? createCodeChallenge(codeVerifier) : undefined;

    const oauth: JsonObject = {
      state,
      redirectUri,
      scope: (definition.scope ?? []).join(definition.scopeSeparator ?? ' '),
    };
    if (codeChallenge) {
      oauth.codeChallenge = codeChallenge;
      oauth.codeChallengeMethod = PKCE_CHALLENGE_METHOD;
    }

    const scope = this.scopeFor(null, { parameters: resolved, connection: resolved, oauth });
    const request = this.executor.resolveRequest(definition.authorize, scope, `connections.${name}.authorize`);
    if (codeChallenge) {
      request.qs.code_challenge ??= codeChallenge;
      request.qs.code_challenge_method ??= PKCE_CHALLENGE_METHOD;
    }

    this.stateStore.set(
      state,
      { connection: name, redirectUri, parameters: resolved, codeVerifier, createdAt: this.app.clock().getTime() },
      this.stateTtlSeconds,
    );
    return { url: this.executor.buildUrl(request), state };
  }

  /** Completes the OAuth flow: consumes `state`, trades `code` for tokens and runs `info`. */
  async exchange(state: string, code: string): Promise<ConnectionInstance> {
    const lookup = this.stateStore.consume(state);
    if (!lookup.found || !lookup.state) {
      throw new InvalidCredentialsError(
        lookup.expired ? 'OAuth state expired; restart the authorization' : 'Unknown OAuth state',
        { statusCode: null },
      );
    }
    const pending = lookup.state;
    const definition = this.getDefinition(pending.connection);
    if (!definition.token) {
      throw new ConfigurationError(`Connection "${pending.connection}" has no token Call`);
    }

    const oauth: JsonObject = { code, state, redirectUri: pending.redirectUri };
    let tokenCall: CallDefinition = definition.token;
    if (pending.codeVerifier) {
      oauth.codeVerifier = pending.codeVerifier;
      tokenCall = this.withCodeVerifier(tokenCall, pending.codeVerifier);
    }

    const instance = this.newInstance(pending.connection, pending.parameters);
    const scope = this.scopeFor(instance, { oauth });
    const response = await this.runAuthCall(tokenCall, scope, 'Token exchange');
    instance.data = { ...instance.data, ...this.extractData(tokenCall, scope, response) };

    const verified = await this.runInfo(definition, instance);
    await this.store.save(verified);
    this.logger.info(`[ConnectionManager] authorized ${this.definition.name}/${pending.connection} as ${verified.id}`);
    return verified;
  }

  /**
   * Returns an instance whose access token is usable. The stored copy wins over
   * an older one held by the caller. No request is made while `now + skew < expires`;
   * otherwise a single refresh is shared by concurrent callers.
   */
  async ensureFresh(held: ConnectionInstance): Promise<ConnectionInstance> {
    const instance = await this.latest(held);
    const inflight = this.inflightRefreshes.get(instance.id);
    if (inflight) {
      return inflight;
    }
    if (instance.status === 'disconnected') {
      throw new InvalidCredentialsError('Connection was disconnected; reconnect required', { statusCode: null });
    }
    const expires = parseDateValue(instance.data.expires ?? null);
    if (!expires) {
      return instance;
    }

    const now = this.app.clock().getTime();
    if (now + this.refreshSkewMs < expires.getTime()) {
      return instance;
    }

    const refresh = this.refresh(instance, now >= expires.getTime()).finally(() => {
      this.inflightRefreshes.delete(instance.id);
    });
    this.inflightRefreshes.set(instance.id, refresh);
    return refresh;
  }

  async disconnect(instance: ConnectionInstance): Promise<ConnectionInstance> {
    const definition = this.getDefinition(instance.connection);
    if (definition.invalidate && instance.status !== 'disconnected') {
      await this.runAuthCall(definition.invalidate, this.scopeFor(instance), 'Token revocation');
    }
    const disconnected = this.touch({ ...instance, status: 'disconnected' });
    await this.store.save(disconnected);
    return disconnected;
  }

  scopeFor(instance: ConnectionInstance | null, layer: ScopeLayer = {}): Scope {
    return Scope.create(this.app, {
      parameters: instance?.parameters ?? {},
      connection: connectionVariables(instance),
      data: instance?.data ?? {},
      ...layer,
    });
  }

  private async refresh(instance: ConnectionInstance, expired: boolean): Promise<ConnectionInstance> {
    const definition = this.getDefinition(instance.connection);
    const refreshCall = definition.refresh;
    const attributes = { integration: this.definition.name, connection: instance.connection };

    const scope = this.scopeFor(instance);
    if (!refreshCall || !evaluateCondition(refreshCall.condition, scope, true, { path: 'refresh.condition' })) {
      recordTokenRefresh({ ...attributes, outcome: 'skipped' });
      if (expired) {
        const failed = this.touch({ ...instance, status: 'expired' });
        await this.store.save(failed);
        throw new InvalidCredentialsError('Access token expired and cannot be refreshed; reconnect required', {
          statusCode: null,
        });
      }
      const nearExpiry = this.touch({ ...instance, status: 'near_expiry' });
      await this.store.save(nearExpiry);
      return nearExpiry;
    }

    await this.store.save(this.touch({ ...instance, status: 'refreshing' }));
    try {
      const response = await this.runAuthCall(refreshCall, scope, 'Token refresh');
      const fresh = this.extractData(refreshCall, scope, response);
      const data: JsonObject = { ...instance.data, ...fresh };
      const rotated = fresh.refreshToken;
      if (rotated === undefined || rotated === null || rotated === '') {
        data.refreshToken = instance.data.refreshToken ?? null;
      }
      const refreshed = this.touch({ ...instance, data, status: 'valid' });
      await this.store.save(refreshed);
      recordTokenRefresh({ ...attributes, outcome: 'success' });
      this.logger.info(`[ConnectionManager] refreshed tokens for ${instance.id}`);
      return refreshed;
    } catch (error) {
      recordTokenRefresh({ ...attributes, outcome: 'failure' });
      await this.store.save(this.touch({ ...instance, status: expired ? 'expired' : 'near_expiry' }));
      throw error;
    }
  }

  private async latest(held: ConnectionInstance): Promise<ConnectionInstance> {
    const stored = await this.store.get(held.id);
    return stored && stored.updatedAt >= held.updatedAt ? stored : held;
  }

  private async runInfo(definition: ConnectionDefinition, instance: ConnectionInstance): Promise<ConnectionInstance> {
    if (!definition.info) {
      return this.touch({ ...instance, status: 'valid' });
    }
    const scope = this.scopeFor(instance);
    const response = await this.runAuthCall(definition.info, scope, 'Connection verification');
    const responseScope = this.executor.responseScope(scope, response);
    const metadata: JsonValue =
      definition.info.response?.metadata === undefined
        ? instance.metadata
        : evaluate(definition.info.response.metadata, responseScope, { path: 'info.response.metadata' });
    return this.touch({
      ...instance,
      data: { ...instance.data, ...evaluateData(definition.info.response?.data, responseScope) },
      metadata,
      status: 'valid',
    });
  }

  private async runAuthCall(call: CallDefinition, scope: Scope, action: string): Promise<RawResponse> {
    try {
      return await this.executor.execute(call, scope, { retry: false, label: action });
    } catch (error) {
      throw toConnectionError(error, action);
    }
  }

  private extractData(call: CallDefinition, scope: Scope, response: RawResponse): JsonObject {
    if (call.response?.data === undefined) {
      return isJsonObject(response.body) ? response.body : {};
    }
    return evaluateData(call.response.data, this.executor.responseScope(scope, response));
  }

  private withCodeVerifier(call: CallDefinition, verifier: string): CallDefinition {
    if (call.body === undefined) {
      return { ...call, body: { code_verifier: verifier } };
    }
    if (isJsonObject(call.body) && !Object.prototype.hasOwnProperty.call(call.body, 'code_verifier')) {
      return { ...call, body: { ...call.body, code_verifier: verifier } };
    }
    return call;
  }

  private newInstance(connection: string, parameters: JsonObject): ConnectionInstance {
    const now = this.app.clock().toISOString();
    return {
      id: randomUUID(),
      integration: this.definition.name,
      connection,
      parameters,
      data: {},
      metadata: null,
      status: 'valid',
      createdAt: now,
      updatedAt: now,
    };
  }

  private touch(instance: ConnectionInstance): ConnectionInstance {
    return { ...instance, updatedAt: this.app.clock().toISOString() };
  }
}
