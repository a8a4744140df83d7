import {
  isValidDirective,
  type BaseDefinition,
  type BodyType,
  type CallDefinition,
  type ErrorDirective,
  type ErrorTemplate,
  type ValidDirective,
} from '../connectors/types.js';
import {
  classifyStatus,
  ConfigurationError,
  createRequestError,
  type RequestError,
  type RequestErrorKind,
} from '../core/errors.js';
import { evaluate, evaluateCondition, evaluateText } from '../core/ExpressionEvaluator.js';
import { toText } from '../core/ExpressionValue.js';
import { RetryManager } from '../core/RetryManager.js';
import { recordConnectorRequest, withSpan } from '../observability/index.js';
import type { Scope } from '../runtime/Scope.js';
import type { RuntimeLogger } from '../types/common.js';
import { isJsonObject, toJsonValue, type JsonObject, type JsonValue } from '../types/json.js';
import { sanitizeLogPayload } from '../utils/executionLogRedaction.js';
import { redactUrl } from '../utils/redact.js';
import { HttpTransport } from './HttpTransport.js';

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

function toHttpMethod(value: string): HttpMethod | null {
  const upper = value.toUpperCase();
  return HTTP_METHODS.find(method => method === upper) ?? null;
}

export interface ResolvedRequest {
  /** Absolute URL without the `qs` parameters. */
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  qs: JsonObject;
  body: JsonValue | undefined;
  type: BodyType;
}

export interface RawResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: JsonValue;
  url: string;
  method: HttpMethod;
}

/** Evaluated `pagination` directive applied on top of a resolved request. */
export interface RequestOverride {
  url?: string;
  qs?: JsonObject;
  body?: JsonValue;
  headers?: JsonObject;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Reuse an already-resolved request (pagination) instead of evaluating the call. */
  request?: ResolvedRequest;
  /** Set false for auth calls, which must not be retried. */
  retry?: boolean;
  label?: string;
}

export type TraceSink = (trace: JsonValue) => void;

export interface RequestExecutorOptions {
  integration: string;
  base?: BaseDefinition;
  transport?: HttpTransport;
  retry?: RetryManager;
  onTrace?: TraceSink;
  logger?: RuntimeLogger;
}

const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:\/\//i;

function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

function mergeMaps(base: JsonValue, override: JsonValue): JsonValue {
  if (isJsonObject(base) && isJsonObject(override)) {
    return { ...base, ...override };
  }
  return override;
}

function normalizeHeaders(values: JsonValue, into: Record<string, string>): void {
  if (!isJsonObject(values)) {
    return;
  }
  for (const [name, value] of Object.entries(values)) {
    if (value === null) {
      continue;
    }
    into[name.toLowerCase()] = toText(value);
  }
}

function applyQuery(url: URL, qs: JsonObject): void {
  for (const [key, value] of Object.entries(qs)) {
    if (value === null) {
      continue;
    }
    url.searchParams.delete(key);
    if (Array.isArray(value)) {
      for (const entry of value) {
        if (entry !== null) {
          url.searchParams.append(key, toText(entry));
        }
      }
      continue;
    }
    url.searchParams.set(key, toText(value));
  }
}

function parseRetryAfter(header: string | undefined, now: Date): number | undefined {
  if (!header) {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now.getTime());
}

function statusTemplate(directive: string | ErrorDirective | undefined, statusCode: number): ErrorTemplate | undefined {
  if (directive === undefined || typeof directive === 'string') {
    return undefined;
  }
  const key: `${number}` = `${statusCode}`;
  if (!Object.prototype.hasOwnProperty.call(directive, key)) {
    return undefined;
  }
  const entry = directive[key];
  return typeof entry === 'string' ? { message: entry } : entry;
}

function defaultTemplate(directive: string | ErrorDirective | undefined): ErrorTemplate | undefined {
  if (directive === undefined) {
    return undefined;
  }
  if (typeof directive === 'string') {
    return { message: directive };
  }
  return { message: directive.message, type: directive.type };
}

async function readBody(response: Response): Promise<JsonValue> {
  const text = await response.text();
  if (text.trim() === '') {
    return null;
  }
  const contentType = response.headers.get('content-type') ?? '';
  if (/json/i.test(contentType) || /^\s*[[{]/.test(text)) {
    try {
      return toJsonValue(JSON.parse(text));
    } catch {
      return text;
    }
  }
  return text;
}

/**
 * Turns a Call template into an HTTP request, sends it and decides whether the
 * response counts as success. Failures surface as `RequestError` subclasses
 * whose message comes from the most specific error template available.
 */
export class RequestExecutor {
  readonly integration: string;
  private readonly base: BaseDefinition;
  private readonly transport: HttpTransport;
  private readonly retry: RetryManager;
  private readonly onTrace?: TraceSink;
  private readonly logger: RuntimeLogger;

  constructor(options: RequestExecutorOptions) {
    this.integration = options.integration;
    this.base = options.base ?? {};
    this.transport = options.transport ?? new HttpTransport();
    this.retry = options.retry ?? RetryManager.none();
    this.onTrace = options.onTrace;
    this.logger = options.logger ?? console;
  }

  get baseDefinition(): BaseDefinition {
    return this.base;
  }

  get sanitizePaths(): readonly string[] {
    return this.base.log?.sanitize ?? [];
  }

  resolveRequest(call: CallDefinition, scope: Scope, path = 'call'): ResolvedRequest {
    const methodText = call.method === undefined ? 'GET' : evaluateText(call.method, scope, { path: `${path}.method`, strict: true });
    const method = toHttpMethod(methodText);
    if (!method) {
      throw new ConfigurationError(`Unsupported HTTP method "${methodText}" in ${path}.method`);
    }

    const rawUrl = evaluateText(call.url, scope, { path: `${path}.url`, strict: true });
    const url = this.resolveUrl(rawUrl, scope, `${path}.url`);

    const headers: Record<string, string> = {};
    normalizeHeaders(evaluate(this.base.headers, scope, { path: 'base.headers' }), headers);
    normalizeHeaders(evaluate(call.headers, scope, { path: `${path}.headers` }), headers);

    const baseQs = evaluate(this.base.qs, scope, { path: 'base.qs' });
    const callQs = evaluate(call.qs, scope, { path: `${path}.qs` });
    const qs = mergeMaps(isJsonObject(baseQs) ? baseQs : {}, isJsonObject(callQs) ? callQs : {});

    const baseBody = this.base.body === undefined ? undefined : evaluate(this.base.body, scope, { path: 'base.body' });
    const callBody = call.body === undefined ? undefined : evaluate(call.body, scope, { path: `${path}.body` });
    let body: JsonValue | undefined;
    if (baseBody !== undefined && callBody !== undefined) {
      body = mergeMaps(baseBody, callBody);
    } else {
      body = callBody ?? baseBody;
    }

    return {
      url,
      method,
      headers,
      qs: isJsonObject(qs) ? qs : {},
      body,
      type: call.type ?? 'json',
    };
  }

  /** Applies an evaluated pagination directive; `mergeWithParent: false` drops the parent's qs and body. */
  applyOverride(parent: ResolvedRequest, override: RequestOverride, mergeWithParent: boolean, scope: Scope): ResolvedRequest {
    const headers = { ...parent.headers };
    if (override.headers) {
      normalizeHeaders(override.headers, headers);
    }
    const qs = mergeWithParent ? { ...parent.qs, ...(override.qs ?? {}) } : { ...(override.qs ?? {}) };
    let body: JsonValue | undefined = mergeWithParent ? parent.body : undefined;
    if (override.body !== undefined) {
      body = body === undefined ? override.body : mergeMaps(body, override.body);
    }
    return {
      ...parent,
      url: override.url ? this.resolveUrl(override.url, scope, 'pagination.url') : parent.url,
      headers,
      qs,
      body,
    };
  }

  buildUrl(request: ResolvedRequest): string {
    const url = new URL(request.url);
    applyQuery(url, request.qs);
    return url.toString();
  }

  responseScope(scope: Scope, response: RawResponse): Scope {
    return scope.with({ body: response.body, headers: response.headers, statusCode: response.statusCode });
  }

  /**
   * Executes a call and returns the raw response. Throws a `RequestError` when the
   * status is not 2xx or `response.valid` rejects the response.
   */
  async execute(call: CallDefinition, scope: Scope, options: ExecuteOptions = {}): Promise<RawResponse> {
    const request = options.request ?? this.resolveRequest(call, scope, options.label);
    const retry = options.retry === false ? RetryManager.none() : this.retry;

    return retry.run(
      async () => {
        const response = await this.send(request, options.signal);
        this.assertValid(call, response, scope);
        return response;
      },
      {
        signal: options.signal,
        onRetry: event => {
          this.logger.warn(
            `[RequestExecutor] ${request.method} ${redactUrl(request.url)} failed (${event.error.toEnvelope()}); retry ${event.attempt} in ${event.waitMs}ms`,
          );
        },
      },
    );
  }

  async send(request: ResolvedRequest, signal?: AbortSignal): Promise<RawResponse> {
    const url = this.buildUrl(request);
    const { body, contentType } = this.encodeBody(request);
    const headers = { ...request.headers };
    if (contentType && headers['content-type'] === undefined) {
      headers['content-type'] = contentType;
    }

    return withSpan(
      'connector.request',
      { 'connector.integration': this.integration, 'http.method': request.method },
      async span => {
        let statusCode: number | null = null;
        const startedAt = performance.now();
        try {
          const { response, durationMs } = await this.transport.request({
            url,
            method: request.method,
            headers,
            body,
            signal,
          });
          statusCode = response.status;
          span.setAttribute('http.status_code', response.status);

          const responseHeaders: Record<string, string> = {};
          response.headers.forEach((value, key) => {
            responseHeaders[key.toLowerCase()] = value;
          });
          const raw: RawResponse = {
            statusCode: response.status,
            headers: responseHeaders,
            body: await readBody(response),
            url,
            method: request.method,
          };
          this.trace(request, headers, url, raw, durationMs);
          return raw;
        } finally {
          recordConnectorRequest(performance.now() - startedAt, {
            integration: this.integration,
            method: request.method,
            statusCode,
          });
        }
      },
    );
  }

  private resolveUrl(rawUrl: string, scope: Scope, path: string): string {
    let full = rawUrl;
    if (!ABSOLUTE_URL.test(rawUrl)) {
      const baseUrl = this.base.baseUrl === undefined ? '' : evaluateText(this.base.baseUrl, scope, { path: 'base.baseUrl', strict: true });
      if (!baseUrl) {
        throw new ConfigurationError(`Relative url "${rawUrl}" in ${path} requires base.baseUrl`);
      }
      full = `${baseUrl.replace(/\/+$/, '')}/${rawUrl.replace(/^\/+/, '')}`;
    }
    try {
      return new URL(full).toString();
    } catch {
      throw new ConfigurationError(`Invalid url "${full}" in ${path}`);
    }
  }

  private encodeBody(request: ResolvedRequest): { body: RequestInit['body'] | undefined; contentType?: string } {
    if (request.method === 'GET' || request.method === 'HEAD' || request.body === undefined || request.body === null) {
      return { body: undefined };
    }
    const payload = request.body;
    switch (request.type) {
      case 'json':
        return { body: JSON.stringify(payload), contentType: 'application/json' };
      case 'text':
        return { body: toText(payload), contentType: 'text/plain' };
      case 'urlencoded': {
        const params = new URLSearchParams();
        if (isJsonObject(payload)) {
          for (const [key, value] of Object.entries(payload)) {
            for (const entry of Array.isArray(value) ? value : [value]) {
              if (entry !== null) {
                params.append(key, toText(entry));
              }
            }
          }
        }
        return { body: params.toString(), contentType: 'application/x-www-form-urlencoded' };
      }
      case 'multipart': {
        // fetch sets the multipart boundary itself.
        const form = new FormData();
        if (isJsonObject(payload)) {
          for (const [key, value] of Object.entries(payload)) {
            if (isJsonObject(value) && typeof value.filename === 'string') {
              form.append(key, new Blob([toText(value.value ?? null)], { type: toText(value.contentType ?? 'application/octet-stream') }), value.filename);
            } else if (value !== null) {
              form.append(key, toText(value));
            }
          }
        }
        return { body: form };
      }
    }
  }

  private assertValid(call: CallDefinition, response: RawResponse, scope: Scope): void {
    const responseScope = this.responseScope(scope, response);
    let softFailure: ValidDirective | null = null;

    if (isSuccessStatus(response.statusCode)) {
      const valid = call.response?.valid ?? this.base.response?.valid;
      if (valid === undefined) {
        return;
      }
      const directive: ValidDirective = isValidDirective(valid) ? valid : { condition: valid };
      if (evaluateCondition(directive.condition, responseScope, true, { path: 'response.valid' })) {
        return;
      }
      softFailure = directive;
    }

    throw this.buildError(call, response, responseScope, softFailure);
  }

  private buildError(call: CallDefinition, response: RawResponse, responseScope: Scope, soft: ValidDirective | null): RequestError {
    const status = response.statusCode;
    const callError = call.response?.error;
    const baseError = this.base.response?.error;

    const candidates = [
      statusTemplate(callError, status),
      statusTemplate(baseError, status),
      soft ? { message: soft.message, type: soft.type } : undefined,
      defaultTemplate(callError),
      defaultTemplate(baseError),
    ].filter((candidate): candidate is ErrorTemplate => candidate !== undefined);

    const messageTemplate = candidates.find(candidate => candidate.message !== undefined)?.message;
    const explicitKind: RequestErrorKind | undefined = candidates.find(candidate => candidate.type !== undefined)?.type;

    let message = messageTemplate === undefined ? '' : evaluateText(messageTemplate, responseScope, { path: 'response.error' });
    if (message.trim() === '') {
      message = soft ? 'Response failed validation' : `Request failed with status code ${status}`;
    }

    const kind = explicitKind ?? (soft ? 'Validation' : classifyStatus(status));
    return createRequestError(kind, message, {
      statusCode: status,
      body: response.body,
      retryAfterMs: parseRetryAfter(response.headers['retry-after'], responseScope.now()),
    });
  }

  private trace(request: ResolvedRequest, headers: Record<string, string>, url: string, response: RawResponse, durationMs: number): void {
    this.logger.debug(`[RequestExecutor] ${request.method} ${redactUrl(url)} -> ${response.statusCode} (${Math.round(durationMs)}ms)`);
    if (!this.onTrace) {
      return;
    }
    this.onTrace(
      sanitizeLogPayload(
        {
          integration: this.integration,
          request: { method: request.method, url: redactUrl(url), headers, qs: request.qs, body: request.body ?? null },
          response: { statusCode: response.statusCode, headers: response.headers, body: response.body },
          durationMs: Math.round(durationMs),
        },
        this.sanitizePaths,
      ),
    );
  }
}
