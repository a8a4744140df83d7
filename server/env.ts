// Load environment variables as the very first thing
import dotenv from 'dotenv';
import { resolve } from 'node:path';

// Load .env and .env.local files (if present)
dotenv.config();

const envLocalPath = resolve(process.cwd(), '.env.local');
dotenv.config({ path: envLocalPath });

if (!process.env.NODE_ENV) {
  process.env.NODE_ENV = 'development';
}

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    console.warn(`⚠️ Ignoring invalid ${name}=${raw}; using ${fallback}`);
    return fallback;
  }
  return parsed;
}

function readChoice<T extends string>(name: string, choices: readonly T[], fallback: T): T {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  const match = choices.find(choice => choice === raw);
  if (!match) {
    console.warn(`⚠️ Unknown ${name}=${raw}; expected one of ${choices.join(', ')}. Using ${fallback}`);
    return fallback;
  }
  return match;
}

export const STATE_STORE_DRIVERS = ['memory', 'redis'] as const;
export type StateStoreDriver = (typeof STATE_STORE_DRIVERS)[number];

export const QUEUE_DRIVERS = ['inmemory', 'bullmq'] as const;
export type QueueDriver = (typeof QUEUE_DRIVERS)[number];

const CONNECTOR_DEFINITION_PATH = process.env.CONNECTOR_DEFINITION_PATH
  ? resolve(process.cwd(), process.env.CONNECTOR_DEFINITION_PATH)
  : '';

// Export environment variables for easy access
export const env = Object.freeze({
  NODE_ENV: process.env.NODE_ENV,
  PORT: readInt('PORT', 5000),
  SERVER_PUBLIC_URL: process.env.SERVER_PUBLIC_URL || '',
  CONNECTOR_DEFINITION_PATH,
  ALLOW_PRIVATE_NETWORKS: process.env.ALLOW_PRIVATE_NETWORKS === 'true',
  OAUTH_REFRESH_SKEW_MS: readInt('OAUTH_REFRESH_SKEW_MS', 5 * 60 * 1000),
  OAUTH_STATE_TTL_SECONDS: readInt('OAUTH_STATE_TTL_SECONDS', 12 * 60),
  PAGINATION_MAX_PAGES: readInt('PAGINATION_MAX_PAGES', 100),
  PAGINATION_TIMEOUT_MS: readInt('PAGINATION_TIMEOUT_MS', 5 * 60 * 1000),
  POLL_TIMEOUT_MS: readInt('POLL_TIMEOUT_MS', 10 * 60 * 1000),
  FUNCTION_TIMEOUT_MS: readInt('FUNCTION_TIMEOUT_MS', 1000),
  REQUEST_TIMEOUT_MS: readInt('REQUEST_TIMEOUT_MS', 40000),
  RETRY_MAX_ATTEMPTS: readInt('RETRY_MAX_ATTEMPTS', 3),
  RETRY_INITIAL_DELAY_MS: readInt('RETRY_INITIAL_DELAY_MS', 1000),
  RETRY_MAX_DELAY_MS: readInt('RETRY_MAX_DELAY_MS', 30000),
  WEBHOOK_DEDUPE_TTL_MS: readInt('WEBHOOK_DEDUPE_TTL_MS', 24 * 60 * 60 * 1000),
  STATE_STORE_DRIVER: readChoice('STATE_STORE_DRIVER', STATE_STORE_DRIVERS, 'memory'),
  QUEUE_DRIVER: readChoice('QUEUE_DRIVER', QUEUE_DRIVERS, 'inmemory'),
  QUEUE_REDIS_HOST: process.env.QUEUE_REDIS_HOST || '127.0.0.1',
  QUEUE_REDIS_PORT: readInt('QUEUE_REDIS_PORT', 6379),
  QUEUE_REDIS_DB: readInt('QUEUE_REDIS_DB', 0),
  QUEUE_REDIS_USERNAME: process.env.QUEUE_REDIS_USERNAME,
  QUEUE_REDIS_PASSWORD: process.env.QUEUE_REDIS_PASSWORD,
  QUEUE_REDIS_TLS: process.env.QUEUE_REDIS_TLS === 'true',
});

export type RuntimeEnv = typeof env;
