import dns from 'node:dns/promises';
import net from 'node:net';

import { ConfigurationError, ExecutionAbortedError, ProviderError } from '../core/errors.js';
import { getErrorMessage } from '../types/common.js';

export interface TransportRequestOptions {
  url: string;
  method: string;
  headers?: Record<string, string>;
  body?: RequestInit['body'];
  fetch?: typeof fetch;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface TransportResult {
  response: Response;
  durationMs: number;
}

export interface HttpTransportOptions {
  fetch?: typeof fetch;
  timeoutMs?: number;
  /** Skip the private-network guard (local development against mock providers). */
  allowPrivateNetworks?: boolean;
  /** Resolve hostnames and check every resolved address, not only IP literals. */
  resolveHostnames?: boolean;
}

const DEFAULT_TIMEOUT_MS = 40000;

const BLOCKED_IPV4_RANGES: Array<{ base: string; bits: number }> = [
  { base: '0.0.0.0', bits: 8 },
  { base: '10.0.0.0', bits: 8 },
  { base: '100.64.0.0', bits: 10 },
  { base: '127.0.0.0', bits: 8 },
  { base: '169.254.0.0', bits: 16 },
  { base: '172.16.0.0', bits: 12 },
  { base: '192.168.0.0', bits: 16 },
];

const BLOCKED_IPV6_RANGES: Array<{ base: string; bits: number }> = [
  { base: '::', bits: 128 },
  { base: '::1', bits: 128 },
  { base: 'fc00::', bits: 7 },
  { base: 'fe80::', bits: 10 },
];

function ipv4ToInt(address: string): number | null {
  const parts = address.split('.');
  if (parts.length !== 4) {
    return null;
  }
  let value = 0;
  for (const part of parts) {
    const segment = Number(part);
    if (!Number.isInteger(segment) || segment < 0 || segment > 255) {
      return null;
    }
    value = (value << 8) + segment;
  }
  return value >>> 0;
}

function ipv4InRange(address: number, base: number, bits: number): boolean {
  if (bits <= 0) {
    return true;
  }
  const mask = bits >= 32 ? 0xffffffff : (~((1 << (32 - bits)) - 1) >>> 0);
  return (address & mask) === (base & mask);
}

function expandIpv6(address: string): string[] | null {
  const lower = address.toLowerCase();
  const parts = lower.split('::');
  if (parts.length > 2) {
    return null;
  }

  const head = parts[0] ? parts[0].split(':').filter(Boolean) : [];
  const tail = parts.length === 2 && parts[1] ? parts[1].split(':').filter(Boolean) : [];
  const missing = 8 - (head.length + tail.length);
  if (missing < 0) {
    return null;
  }

  const zeros = new Array<string>(missing).fill('0');
  return [...head, ...zeros, ...tail].map((segment) => segment.padStart(4, '0'));
}

function ipv6ToBigInt(address: string): bigint | null {
  const expanded = expandIpv6(address);
  if (!expanded || expanded.length !== 8) {
    return null;
  }
  const hex = expanded.join('');
  try {
    return BigInt(`0x${hex}`);
  } catch {
    return null;
  }
}

function ipv6InRange(target: bigint, base: bigint, bits: number): boolean {
  if (bits <= 0) {
    return true;
  }
  const shift = 128 - bits;
  return (target >> BigInt(shift)) === (base >> BigInt(shift));
}

function isBlockedAddress(address: string, family: number): boolean {
  if (family === 4) {
    const numeric = ipv4ToInt(address);
    if (numeric === null) {
      return true;
    }
    return BLOCKED_IPV4_RANGES.some((range) => {
      const baseNumeric = ipv4ToInt(range.base);
      return baseNumeric !== null && ipv4InRange(numeric, baseNumeric, range.bits);
    });
  }

  if (family === 6) {
    const numeric = ipv6ToBigInt(address);
    if (numeric === null) {
      return true;
    }
    return BLOCKED_IPV6_RANGES.some((range) => {
      const baseNumeric = ipv6ToBigInt(range.base);
      return baseNumeric !== null && ipv6InRange(numeric, baseNumeric, range.bits);
    });
  }

  return true;
}

export async function assertSafeUrl(
  urlStr: string,
  options: { allowPrivateNetworks?: boolean; resolveHostnames?: boolean } = {},
): Promise<void> {
  let parsed: URL;
  try {
    parsed = new URL(urlStr);
  } catch {
    throw new ConfigurationError(`Invalid URL "${urlStr}"`);
  }

  if (!['http:', 'https:'].includes(parsed.protocol)) {
    throw new ConfigurationError(`Protocol not allowed: ${parsed.protocol}`);
  }

  if (options.allowPrivateNetworks) {
    return;
  }

  // URL keeps IPv6 literals bracketed.
  const hostname = parsed.hostname.replace(/^\[|\]$/g, '');
  if (!hostname || hostname === 'localhost' || hostname.endsWith('.localhost')) {
    throw new ConfigurationError(`Target not allowed: ${parsed.host}`);
  }

  const literalFamily = net.isIP(hostname);
  const addresses: Array<{ address: string; family: number }> = [];

  if (literalFamily) {
    addresses.push({ address: hostname, family: literalFamily });
  } else if (options.resolveHostnames) {
    try {
      addresses.push(...(await dns.lookup(hostname, { all: true })));
    } catch (error) {
      throw new ProviderError(`Failed to resolve ${hostname}: ${getErrorMessage(error)}`, { statusCode: null, cause: error });
    }
  }

  for (const entry of addresses) {
    if (isBlockedAddress(entry.address, entry.family)) {
      throw new ConfigurationError(`Target not allowed: ${parsed.host}`);
    }
  }
}

/**
 * Single-attempt HTTP transport. Retries belong to the caller, which knows how a
 * failure was classified; the transport only guards targets and bounds time.
 */
export class HttpTransport {
  constructor(private readonly options: HttpTransportOptions = {}) {}

  public async request(options: TransportRequestOptions): Promise<TransportResult> {
    const fetchImpl = options.fetch ?? this.options.fetch ?? fetch;
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    await assertSafeUrl(options.url, this.options);

    if (options.signal?.aborted) {
      throw new ExecutionAbortedError('Request aborted before it was sent', { cause: options.signal.reason });
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const startedAt = performance.now();
    try {
      const response = await fetchImpl(options.url, {
        method: options.method,
        headers: { ...(options.headers ?? {}) },
        body: options.body ?? undefined,
        signal: controller.signal,
      });
      return { response, durationMs: performance.now() - startedAt };
    } catch (error) {
      if (timedOut) {
        throw new ProviderError(`Request to ${options.url} timed out after ${timeoutMs}ms`, { statusCode: null, cause: error });
      }
      if (options.signal?.aborted) {
        throw new ExecutionAbortedError('Request aborted', { cause: error });
      }
      throw new ProviderError(`Request to ${options.url} failed: ${getErrorMessage(error)}`, { statusCode: null, cause: error });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}
