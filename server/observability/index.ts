import { metrics, SpanStatusCode, trace, type Attributes, type Span } from '@opentelemetry/api';

import { getErrorMessage } from '../types/common.js';

type MetricAttributes = Record<string, string | number | boolean>;

// The library only talks to the OpenTelemetry API; the host process decides
// whether an SDK and exporters are registered.
export const tracer = trace.getTracer('connector.runtime');
export const meter = metrics.getMeter('connector.runtime');

const connectorRequestCounter = meter.createCounter('connector_requests_total', {
  description: 'Outbound provider requests by method and status class',
});

const connectorRequestDurationHistogram = meter.createHistogram('connector_request_duration_ms', {
  description: 'Duration of outbound provider requests',
  unit: 'ms',
});

const tokenRefreshCounter = meter.createCounter('connection_token_refresh_total', {
  description: 'OAuth token refresh attempts by outcome',
});

const paginationPagesCounter = meter.createCounter('pagination_pages_total', {
  description: 'Pages fetched by the pagination engine',
});

const triggerItemsCounter = meter.createCounter('trigger_items_emitted_total', {
  description: 'New items emitted by polling triggers',
});

const webhookDedupeCounter = meter.createCounter('webhook_dedupe_events_total', {
  description: 'Counts webhook deduplication hits and misses',
});

const httpRequestDurationHistogram = meter.createHistogram('http_request_duration_ms', {
  description: 'Duration of inbound HTTP requests',
  unit: 'ms',
});

const webhookBundleCounter = meter.createCounter('webhook_bundles_total', {
  description: 'Bundles enqueued from inbound webhooks',
});

function sanitizeAttributes(attributes: Record<string, unknown>): MetricAttributes {
  const sanitized: MetricAttributes = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      sanitized[key] = value;
    }
  }
  return sanitized;
}

function statusClass(statusCode: number | null): string {
  return statusCode === null ? 'network_error' : `${Math.floor(statusCode / 100)}xx`;
}

export function recordConnectorRequest(
  durationMs: number,
  attributes: { integration: string; method: string; statusCode: number | null },
): void {
  const attrs = sanitizeAttributes({
    integration: attributes.integration,
    method: attributes.method,
    status_class: statusClass(attributes.statusCode),
  });
  connectorRequestCounter.add(1, attrs);
  connectorRequestDurationHistogram.record(durationMs, attrs);
}

export function recordTokenRefresh(attributes: { integration: string; connection: string; outcome: 'success' | 'failure' | 'skipped' }): void {
  tokenRefreshCounter.add(1, sanitizeAttributes(attributes));
}

export function recordPaginationPage(attributes: { integration: string }): void {
  paginationPagesCounter.add(1, sanitizeAttributes(attributes));
}

export function recordTriggerEmission(count: number, attributes: { integration: string; module: string }): void {
  if (count > 0) {
    triggerItemsCounter.add(count, sanitizeAttributes(attributes));
  }
}

export function recordWebhookDedupeHit(attributes: Record<string, unknown>): void {
  webhookDedupeCounter.add(1, sanitizeAttributes({ ...attributes, outcome: 'hit' }));
}

export function recordWebhookDedupeMiss(attributes: Record<string, unknown>): void {
  webhookDedupeCounter.add(1, sanitizeAttributes({ ...attributes, outcome: 'miss' }));
}

export function recordWebhookBundles(count: number, attributes: Record<string, unknown>): void {
  if (count > 0) {
    webhookBundleCounter.add(count, sanitizeAttributes(attributes));
  }
}

export function recordHttpRequestDuration(
  durationMs: number,
  attributes: { http_method: string; http_route: string; http_status_code: number },
): void {
  httpRequestDurationHistogram.record(durationMs, sanitizeAttributes(attributes));
}

/** Runs `fn` inside an active span, marking the span failed when it throws. */
export function withSpan<T>(name: string, attributes: Attributes, fn: (span: Span) => Promise<T>): Promise<T> {
  return tracer.startActiveSpan(name, { attributes }, async span => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({ code: SpanStatusCode.ERROR, message: getErrorMessage(error) });
      if (error instanceof Error) {
        span.recordException(error);
      }
      throw error;
    } finally {
      span.end();
    }
  });
}
