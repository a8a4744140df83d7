import type { JsonValue } from '../types/json.js';

export type ErrorKind =
  | 'configuration'
  | 'evaluation'
  | 'request'
  | 'rpc'
  | 'timeout'
  | 'aborted';

/** Classification of a failed HTTP call. */
export type RequestErrorKind = 'Auth' | 'RateLimit' | 'Provider' | 'Validation';

export const REQUEST_ERROR_KINDS: readonly RequestErrorKind[] = ['Auth', 'RateLimit', 'Provider', 'Validation'];

export abstract class ConnectorRuntimeError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get retryable(): boolean {
    return false;
  }
}

/** The definition itself is wrong: bad template, broken pagination, order violation. */
export class ConfigurationError extends ConnectorRuntimeError {
  readonly kind: ErrorKind = 'configuration';
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.issues = issues;
  }
}

/** A delivery addressed a hook id that is not registered. */
export class UnknownHookError extends ConfigurationError {
  constructor(readonly hookId: string) {
    super(`Unknown webhook "${hookId}"`);
  }
}

export interface EvaluationErrorDetails {
  expressionPath: string;
  expression?: string;
  functionName?: string;
  cause?: unknown;
}

export class EvaluationError extends ConfigurationError {
  override readonly kind: ErrorKind = 'evaluation';
  readonly expressionPath: string;
  readonly expression?: string;
  readonly functionName?: string;

  constructor(message: string, details: EvaluationErrorDetails) {
    super(message, [], { cause: details.cause });
    this.expressionPath = details.expressionPath;
    this.expression = details.expression;
    this.functionName = details.functionName;
  }
}

export interface RequestErrorDetails {
  statusCode: number | null;
  body?: JsonValue;
  retryAfterMs?: number;
  cause?: unknown;
}

export abstract class RequestError extends ConnectorRuntimeError {
  readonly kind: ErrorKind = 'request';
  abstract readonly requestKind: RequestErrorKind;
  readonly statusCode: number | null;
  readonly body: JsonValue;

  constructor(message: string, details: RequestErrorDetails) {
    super(message, { cause: details.cause });
    this.statusCode = details.statusCode;
    this.body = details.body ?? null;
  }

  override get retryable(): boolean {
    return this.requestKind === 'RateLimit' || this.requestKind === 'Provider';
  }

  /** User-visible `[<statusCode>] <message>` form. */
  toEnvelope(): string {
    return formatErrorEnvelope(this.statusCode, this.message);
  }
}

export class AuthError extends RequestError {
  readonly requestKind: RequestErrorKind = 'Auth';
}

/** Credentials are unusable and the user has to reconnect. */
export class InvalidCredentialsError extends AuthError {}

export class RateLimitError extends RequestError {
  readonly requestKind: RequestErrorKind = 'RateLimit';
  readonly retryAfterMs?: number;

  constructor(message: string, details: RequestErrorDetails) {
    super(message, details);
    this.retryAfterMs = details.retryAfterMs;
  }
}

export class RateLimitedError extends RateLimitError {}

export class ProviderError extends RequestError {
  readonly requestKind: RequestErrorKind = 'Provider';
}

export class ValidationError extends RequestError {
  readonly requestKind: RequestErrorKind = 'Validation';
}

export class RpcError extends ConnectorRuntimeError {
  readonly kind: ErrorKind = 'rpc';
  readonly rpc: string;

  constructor(rpc: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.rpc = rpc;
  }
}

export class ExecutionTimeoutError extends ConnectorRuntimeError {
  readonly kind: ErrorKind = 'timeout';
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.timeoutMs = timeoutMs;
  }

  override get retryable(): boolean {
    return true;
  }
}

export class ExecutionAbortedError extends ConnectorRuntimeError {
  readonly kind: ErrorKind = 'aborted';

  constructor(message = 'Execution aborted', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function classifyStatus(statusCode: number): RequestErrorKind {
  if (statusCode === 401 || statusCode === 403) {
    return 'Auth';
  }
  if (statusCode === 429) {
    return 'RateLimit';
  }
  if (statusCode >= 500) {
    return 'Provider';
  }
  return 'Validation';
}

export function createRequestError(kind: RequestErrorKind, message: string, details: RequestErrorDetails): RequestError {
  switch (kind) {
    case 'Auth':
      return new AuthError(message, details);
    case 'RateLimit':
      return new RateLimitError(message, details);
    case 'Provider':
      return new ProviderError(message, details);
    case 'Validation':
      return new ValidationError(message, details);
  }
}

export function formatErrorEnvelope(statusCode: number | null, message: string): string {
  if (statusCode === null) {
    return message;
  }
  const prefix = `[${statusCode}]`;
  return message.startsWith(prefix) ? message : `${prefix} ${message}`;
}

export function isConnectorRuntimeError(error: unknown): error is ConnectorRuntimeError {
  return error instanceof ConnectorRuntimeError;
}
