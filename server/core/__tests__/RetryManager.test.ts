import { describe, expect, it, vi } from 'vitest';

import { AuthError, ProviderError, RateLimitError, ValidationError } from '../errors.js';
import { RetryManager, type Sleeper } from '../RetryManager.js';

const noJitter = { jitterEnabled: false, initialDelayMs: 100, maxDelayMs: 1000, backoffMultiplier: 2 };

describe('RetryManager', () => {
  it('retries provider failures with exponential backoff', async () => {
    const waits: number[] = [];
    const sleeper: Sleeper = async ms => {
      waits.push(ms);
    };
    const manager = new RetryManager({ ...noJitter, maxAttempts: 3 }, sleeper);
    const operation = vi
      .fn<[number], Promise<string>>()
      .mockRejectedValueOnce(new ProviderError('boom', { statusCode: 502 }))
      .mockRejectedValueOnce(new ProviderError('boom', { statusCode: 503 }))
      .mockResolvedValueOnce('ok');

    await expect(manager.run(operation)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(waits).toEqual([100, 200]);
  });

  it('honours retry-after for rate limits, capped at maxDelayMs', async () => {
    const waits: number[] = [];
    const manager = new RetryManager({ ...noJitter, maxAttempts: 2 }, async ms => {
      waits.push(ms);
    });
    const operation = vi
      .fn<[number], Promise<string>>()
      .mockRejectedValueOnce(new RateLimitError('slow down', { statusCode: 429, retryAfterMs: 5000 }))
      .mockResolvedValueOnce('ok');

    await manager.run(operation);
    expect(waits).toEqual([1000]);
  });

  it('does not retry auth or validation failures', async () => {
    const manager = new RetryManager({ ...noJitter, maxAttempts: 5 }, async () => undefined);
    const auth = vi.fn<[number], Promise<never>>().mockRejectedValue(new AuthError('nope', { statusCode: 401 }));
    const invalid = vi.fn<[number], Promise<never>>().mockRejectedValue(new ValidationError('bad', { statusCode: 400 }));

    await expect(manager.run(auth)).rejects.toBeInstanceOf(AuthError);
    await expect(manager.run(invalid)).rejects.toBeInstanceOf(ValidationError);
    expect(auth).toHaveBeenCalledTimes(1);
    expect(invalid).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxAttempts and reports each retry', async () => {
    const events: string[] = [];
    const manager = new RetryManager({ ...noJitter, maxAttempts: 2 }, async () => undefined);
    const operation = vi.fn<[number], Promise<never>>().mockRejectedValue(new ProviderError('down', { statusCode: 500 }));

    await expect(
      manager.run(operation, { onRetry: event => events.push(`${event.attempt}:${event.reason}`) }),
    ).rejects.toBeInstanceOf(ProviderError);
    expect(operation).toHaveBeenCalledTimes(2);
    expect(events).toEqual(['1:provider_error']);
  });

  it('makes a single attempt when built with none()', async () => {
    const operation = vi.fn<[number], Promise<never>>().mockRejectedValue(new ProviderError('down', { statusCode: 500 }));
    await expect(RetryManager.none().run(operation)).rejects.toBeInstanceOf(ProviderError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
