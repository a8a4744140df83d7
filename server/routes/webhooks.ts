import { Router, type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';

import { UnknownHookError } from '../core/errors.js';
import { getErrorMessage } from '../types/common.js';
import { toJsonValue, type JsonObject } from '../types/json.js';
import { requestLogPrefix, setRequestHook } from '../utils/ExecutionContext.js';
import type { WebhookDelivery, WebhookReceiveResult } from '../webhooks/types.js';

const hookParamsSchema = z.object({
  hookId: z
    .string()
    .min(1)
    .max(128)
    .regex(/^[A-Za-z0-9_.-]+$/, 'hookId may only contain letters, digits, dot, dash and underscore'),
});

export type WebhookReceiver = (delivery: WebhookDelivery) => Promise<WebhookReceiveResult>;

function flattenHeaders(headers: Request['headers']): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

function toQuery(query: Request['query']): JsonObject {
  const value = toJsonValue(query);
  return value !== null && typeof value === 'object' && !Array.isArray(value) ? value : {};
}

/** `POST /hooks/:hookId`: 202 with the receive summary, 404 for unknown hooks. */
export function createWebhookRouter(receive: WebhookReceiver): Router {
  const router = Router();

  router.post('/hooks/:hookId', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = hookParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: parsed.error.issues.map(issue => issue.message).join('; ') });
      return;
    }
    const { hookId } = parsed.data;
    setRequestHook(hookId);

    try {
      const result = await receive({
        hookId,
        payload: toJsonValue(req.body ?? null),
        headers: flattenHeaders(req.headers),
        query: toQuery(req.query),
      });
      res.status(202).json(result);
    } catch (error) {
      if (error instanceof UnknownHookError) {
        res.status(404).json({ success: false, error: error.message });
        return;
      }
      console.error(`${requestLogPrefix()}[webhooks] delivery failed: ${getErrorMessage(error)}`);
      next(error);
    }
  });

  return router;
}
