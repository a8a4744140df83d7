import { AsyncLocalStorage } from 'node:async_hooks';

export interface RequestContext {
  requestId: string;
  hookId?: string;
}

const storage = new AsyncLocalStorage<RequestContext>();

export function runWithRequestContext<T>(ctx: RequestContext, fn: () => T): T {
  return storage.run(ctx, fn);
}

export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}

export function setRequestHook(hookId: string): void {
  const ctx = storage.getStore();
  if (ctx) {
    ctx.hookId = hookId;
  }
}

/** `[requestId]` prefix for log lines emitted while serving a request. */
export function requestLogPrefix(): string {
  const ctx = storage.getStore();
  if (!ctx) {
    return '';
  }
  return ctx.hookId ? `[${ctx.requestId} ${ctx.hookId}] ` : `[${ctx.requestId}] `;
}
