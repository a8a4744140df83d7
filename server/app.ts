import { randomUUID } from 'node:crypto';

import {
  context as otelContext,
  propagation,
  SpanKind,
  SpanStatusCode,
  trace as otelTrace,
} from '@opentelemetry/api';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';

import { isConnectorRuntimeError, RequestError, type ConnectorRuntimeError } from './core/errors.js';
import { recordHttpRequestDuration, tracer } from './observability/index.js';
import { createHealthRouter } from './routes/health.js';
import { createWebhookRouter } from './routes/webhooks.js';
import type { ConnectorRuntime } from './services/ConnectorRuntime.js';
import { getErrorMessage } from './types/common.js';
import { getRequestContext, runWithRequestContext } from './utils/ExecutionContext.js';

export interface CreateAppOptions {
  /** Largest accepted webhook body, in express.json notation. */
  bodyLimit?: string;
  /** Log one line per request. */
  logRequests?: boolean;
}

export function statusForError(error: ConnectorRuntimeError): number {
  if (error instanceof RequestError) {
    switch (error.requestKind) {
      case 'Auth':
        return 401;
      case 'RateLimit':
        return 429;
      case 'Validation':
        return 422;
      default:
        return 502;
    }
  }
  switch (error.kind) {
    case 'timeout':
      return 504;
    case 'aborted':
      return 499;
    default:
      return 500;
  }
}

export function createApp(runtime: ConnectorRuntime, options: CreateAppOptions = {}): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use((req, res, next) => {
    const existing = req.get('x-request-id');
    const reqId = existing && existing.length > 0 ? existing : randomUUID();
    res.setHeader('x-request-id', reqId);
    runWithRequestContext({ requestId: reqId }, () => next());
  });

  app.use(express.json({ limit: options.bodyLimit ?? '1mb', type: ['application/json', 'application/*+json'] }));
  app.use(express.urlencoded({ extended: true, limit: options.bodyLimit ?? '1mb' }));
  app.use(express.text({ type: 'text/*', limit: options.bodyLimit ?? '1mb' }));

  app.use((req, res, next) => {
    const routeSnapshot = req.path;
    const parentContext = propagation.extract(otelContext.active(), req.headers);
    const span = tracer.startSpan(
      'http.server.request',
      {
        kind: SpanKind.SERVER,
        attributes: {
          'http.method': req.method,
          'http.target': req.originalUrl,
        },
      },
      parentContext,
    );
    const startTime = process.hrtime.bigint();
    let spanEnded = false;

    const endSpan = (status: { code: SpanStatusCode; message?: string }) => {
      if (spanEnded) {
        return;
      }
      spanEnded = true;
      const durationMs = Number(process.hrtime.bigint() - startTime) / 1_000_000;
      span.setAttributes({ 'http.route': routeSnapshot, 'http.status_code': res.statusCode });
      span.setStatus(status);
      recordHttpRequestDuration(durationMs, {
        http_method: req.method,
        http_route: routeSnapshot,
        http_status_code: res.statusCode,
      });
      span.end();

      if (options.logRequests) {
        const reqId = getRequestContext()?.requestId ?? 'unknown';
        console.log(`[${reqId}] ${req.method} ${routeSnapshot} ${res.statusCode} in ${Math.round(durationMs)}ms`);
      }
    };

    res.on('finish', () => {
      endSpan(
        res.statusCode >= 500
          ? { code: SpanStatusCode.ERROR, message: `HTTP ${res.statusCode}` }
          : { code: SpanStatusCode.OK },
      );
    });
    res.on('close', () => {
      endSpan({ code: SpanStatusCode.ERROR, message: 'connection closed before response finished' });
    });

    otelContext.with(otelTrace.setSpan(parentContext, span), () => next());
  });

  app.use(createHealthRouter({ integration: runtime.definition.name, queueDriver: runtime.queue.driver }));
  app.use(createWebhookRouter(delivery => runtime.receiveWebhook(delivery)));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ message: 'Not Found' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isConnectorRuntimeError(err)) {
      res.status(statusForError(err)).json({ message: err.message, kind: err.kind });
      return;
    }
    const status = readHttpStatus(err) ?? 500;
    res.status(status).json({ message: status >= 500 ? 'Internal Server Error' : getErrorMessage(err) });
  });

  return app;
}

// body-parser attaches `status` to its errors (malformed JSON, oversize bodies)
function readHttpStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  const status = Reflect.get(error, 'status');
  return typeof status === 'number' && status >= 400 && status < 600 ? status : null;
}
