import { describe, expect, it, vi } from 'vitest';

import { ConfigurationError, ExecutionAbortedError, ProviderError } from '../../core/errors.js';
import { assertSafeUrl, HttpTransport } from '../HttpTransport.js';

describe('assertSafeUrl', () => {
  it.each([
    ['http://127.0.0.1/x', 'Target not allowed: 127.0.0.1'],
    ['http://10.1.2.3/', 'Target not allowed: 10.1.2.3'],
    ['http://169.254.169.254/latest', 'Target not allowed: 169.254.169.254'],
    ['http://localhost:3000/', 'Target not allowed: localhost:3000'],
    ['http://[::1]/', 'Target not allowed: [::1]'],
    ['http://[fd00::1]/', 'Target not allowed: [fd00::1]'],
    ['ftp://files.example.com/', 'Protocol not allowed: ftp:'],
    ['not a url', 'Invalid URL "not a url"'],
  ])('rejects %s', async (url, message) => {
    await expect(assertSafeUrl(url)).rejects.toThrow(new ConfigurationError(message));
  });

  it('allows public addresses, hostnames and private targets when enabled', async () => {
    await expect(assertSafeUrl('https://8.8.8.8/')).resolves.toBeUndefined();
    await expect(assertSafeUrl('http://172.32.0.1/')).resolves.toBeUndefined();
    await expect(assertSafeUrl('https://api.example.com/v1')).resolves.toBeUndefined();
    await expect(assertSafeUrl('http://127.0.0.1:8080/', { allowPrivateNetworks: true })).resolves.toBeUndefined();
  });
});

describe('HttpTransport', () => {
  const hangingFetch: typeof fetch = (_input, init) =>
    new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });

  it('turns its own timeout into a provider error', async () => {
    const transport = new HttpTransport({ fetch: hangingFetch, timeoutMs: 10 });
    await expect(transport.request({ url: 'https://api.example.com/x', method: 'GET' })).rejects.toThrow(
      new ProviderError('Request to https://api.example.com/x timed out after 10ms', { statusCode: null }),
    );
  });

  it('reports caller aborts as aborted executions', async () => {
    const transport = new HttpTransport({ fetch: hangingFetch });
    const before = new AbortController();
    before.abort();
    await expect(
      transport.request({ url: 'https://api.example.com/x', method: 'GET', signal: before.signal }),
    ).rejects.toThrow('Request aborted before it was sent');

    const during = new AbortController();
    const pending = transport.request({ url: 'https://api.example.com/x', method: 'GET', signal: during.signal });
    during.abort();
    await expect(pending).rejects.toBeInstanceOf(ExecutionAbortedError);
  });

  it('wraps network failures and refuses blocked targets before fetching', async () => {
    const failingFetch = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>().mockRejectedValue(new TypeError('fetch failed'));
    const transport = new HttpTransport({ fetch: failingFetch });

    const failure = transport.request({ url: 'https://api.example.com/x', method: 'POST', body: '{}' });
    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toThrow('Request to https://api.example.com/x failed: fetch failed');

    await expect(transport.request({ url: 'http://192.168.1.10/', method: 'GET' })).rejects.toBeInstanceOf(ConfigurationError);
    expect(failingFetch).toHaveBeenCalledTimes(1);
  });
});
