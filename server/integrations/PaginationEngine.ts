import type { CallDefinition } from '../connectors/types.js';
import { ConfigurationError } from '../core/errors.js';
import { evaluate, evaluateCondition } from '../core/ExpressionEvaluator.js';
import { toNumber } from '../core/ExpressionValue.js';
import { recordPaginationPage } from '../observability/index.js';
import type { Scope } from '../runtime/Scope.js';
import type { RuntimeLogger } from '../types/common.js';
import { canonicalJson, isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';
import { Deadline } from '../utils/deadline.js';
import type { RawResponse, RequestExecutor, RequestOverride, ResolvedRequest } from './RequestExecutor.js';
import { computeTemp, extractItems, mapOutput } from './ResponseShaper.js';

export interface PageEntry {
  /** Raw element selected by `iterate` (the body when nothing is iterated). */
  item: JsonValue;
  /** `item` mapped through `response.output`. */
  output: JsonValue;
}

export interface PaginationOptions {
  /** Upper bound on yielded entries, combined with `response.limit`. */
  limit?: number | null;
  /** Set false when the caller applies `response.limit` itself after reordering. */
  applyResponseLimit?: boolean;
  /** Entries rejected here are skipped and do not count toward the limit. */
  accept?: (entry: PageEntry) => boolean;
  /** Returning true ends the sequence before the entry is yielded. */
  stopAt?: (entry: PageEntry) => boolean;
  signal?: AbortSignal;
  timeoutMs?: number;
  maxPages?: number;
  label?: string;
}

export interface PaginationState {
  pages: number;
  yielded: number;
  temp: JsonObject;
  lastResponse: RawResponse | null;
  /** True when the page cap ended the loop while the provider still reported more. */
  truncated: boolean;
}

export interface PaginationEngineOptions {
  maxPages: number;
  timeoutMs: number;
  logger?: RuntimeLogger;
}

function requestKey(request: ResolvedRequest): string {
  return canonicalJson({
    url: request.url,
    method: request.method,
    headers: request.headers,
    qs: request.qs,
    body: request.body ?? null,
  });
}

function evaluateOverride(call: CallDefinition, scope: Scope): RequestOverride {
  const directive = call.pagination;
  const override: RequestOverride = {};
  if (!directive) {
    return override;
  }
  if (directive.url !== undefined) {
    const url = evaluate(directive.url, scope, { path: 'pagination.url' });
    if (typeof url === 'string' && url !== '') {
      override.url = url;
    }
  }
  if (directive.qs !== undefined) {
    const qs = evaluate(directive.qs, scope, { path: 'pagination.qs' });
    override.qs = isJsonObject(qs) ? qs : {};
  }
  if (directive.body !== undefined) {
    override.body = evaluate(directive.body, scope, { path: 'pagination.body' });
  }
  if (directive.headers !== undefined) {
    const headers = evaluate(directive.headers, scope, { path: 'pagination.headers' });
    override.headers = isJsonObject(headers) ? headers : {};
  }
  return override;
}

export function resolveLimit(
  call: CallDefinition,
  scope: Scope,
  requested: number | null | undefined,
  applyResponseLimit = true,
): number | null {
  let limit: number | null = null;
  if (applyResponseLimit && call.response?.limit !== undefined) {
    const value = evaluate(call.response.limit, scope, { path: 'response.limit' });
    if (value !== null && value !== '') {
      const parsed = toNumber(value);
      if (Number.isNaN(parsed)) {
        throw new ConfigurationError(`response.limit evaluated to a non-numeric value: ${JSON.stringify(value)}`);
      }
      limit = Math.max(0, Math.floor(parsed));
    }
  }
  if (requested !== undefined && requested !== null) {
    limit = limit === null ? requested : Math.min(limit, requested);
  }
  return limit;
}

/**
 * Lazily fetches pages for one Call. Iterating a second time is an error because
 * requests already sent cannot be replayed.
 */
export class PaginatedSequence implements AsyncIterable<PageEntry> {
  readonly state: PaginationState;
  private started = false;

  constructor(
    private readonly engine: PaginationEngine,
    private readonly call: CallDefinition,
    private readonly scope: Scope,
    private readonly options: PaginationOptions,
  ) {
    const temp = scope.get('temp');
    this.state = {
      pages: 0,
      yielded: 0,
      temp: isJsonObject(temp) ? temp : {},
      lastResponse: null,
      truncated: false,
    };
  }

  [Symbol.asyncIterator](): AsyncIterator<PageEntry> {
    if (this.started) {
      throw new ConfigurationError('Paginated sequence has already been consumed');
    }
    this.started = true;
    return this.engine.run(this.call, this.scope, this.options, this.state);
  }

  async collect(): Promise<PageEntry[]> {
    const entries: PageEntry[] = [];
    for await (const entry of this) {
      entries.push(entry);
    }
    return entries;
  }
}

export class PaginationEngine {
  private readonly logger: RuntimeLogger;

  constructor(
    private readonly executor: RequestExecutor,
    private readonly options: PaginationEngineOptions,
  ) {
    this.logger = options.logger ?? console;
  }

  iterate(call: CallDefinition, scope: Scope, options: PaginationOptions = {}): PaginatedSequence {
    return new PaginatedSequence(this, call, scope, options);
  }

  async *run(call: CallDefinition, scope: Scope, options: PaginationOptions, state: PaginationState): AsyncGenerator<PageEntry> {
    const label = options.label ?? 'Pagination';
    const maxPages = options.maxPages ?? this.options.maxPages;
    const deadline = new Deadline(options.timeoutMs ?? this.options.timeoutMs, options.signal, label);
    const limit = resolveLimit(call, scope, options.limit, options.applyResponseLimit);
    const mergeWithParent = call.pagination?.mergeWithParent ?? true;

    try {
      if (limit === 0) {
        return;
      }
      const original = this.executor.resolveRequest(call, scope);
      let request = original;
      let previousKey = requestKey(request);

      while (true) {
        deadline.check();
        const response = await this.executor.execute(call, scope, { request, signal: deadline.signal });
        state.pages += 1;
        state.lastResponse = response;
        recordPaginationPage({ integration: this.executor.integration });

        const responseScope = this.executor.responseScope(scope.with({ temp: state.temp }), response);
        state.temp = computeTemp(call.response?.temp, responseScope, state.temp);
        const pageScope = responseScope.with({ temp: state.temp });

        const entries: PageEntry[] =
          call.response?.iterate === undefined
            ? [{ item: response.body, output: mapOutput(call.response, this.executor.baseDefinition, pageScope) }]
            : extractItems(call.response.iterate, pageScope).map(item => ({
                item,
                output: mapOutput(call.response, this.executor.baseDefinition, pageScope, item),
              }));

        for (const entry of entries) {
          if (options.stopAt?.(entry)) {
            return;
          }
          if (options.accept && !options.accept(entry)) {
            continue;
          }
          yield entry;
          state.yielded += 1;
          if (limit !== null && state.yielded >= limit) {
            return;
          }
        }

        if (!call.pagination || entries.length === 0) {
          return;
        }

        const paginationScope = pageScope.with({
          pagination: { page: state.pages, count: state.yielded, pageSize: entries.length },
        });
        if (!evaluateCondition(call.pagination.condition, paginationScope, true, { path: 'pagination.condition' })) {
          return;
        }
        if (state.pages >= maxPages) {
          state.truncated = true;
          this.logger.warn(`[PaginationEngine] ${label} stopped after ${maxPages} pages with more results available`);
          return;
        }

        const next = this.executor.applyOverride(
          mergeWithParent ? original : request,
          evaluateOverride(call, paginationScope),
          mergeWithParent,
          paginationScope,
        );
        const nextKey = requestKey(next);
        if (nextKey === previousKey) {
          throw new ConfigurationError(`${label}: pagination produced the same request twice; the cursor is not advancing`);
        }
        previousKey = nextKey;
        request = next;
      }
    } catch (error) {
      throw deadline.translate(error);
    } finally {
      deadline.dispose();
    }
  }
}
