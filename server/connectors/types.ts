import type { RequestErrorKind } from '../core/errors.js';
import type { JsonObject, JsonValue } from '../types/json.js';

/** Any JSON value that may embed `{{ }}` expressions. */
export type Template = JsonValue;

export type BodyType = 'json' | 'urlencoded' | 'multipart' | 'text';

export type TriggerOrder = 'asc' | 'desc' | 'unordered';

export interface ValidDirective {
  condition: Template;
  message?: Template;
  type?: RequestErrorKind;
}

export interface ErrorTemplate {
  message?: Template;
  type?: RequestErrorKind;
}

/** Default message/type plus overrides keyed by HTTP status code. */
export interface ErrorDirective extends ErrorTemplate {
  [statusCode: `${number}`]: ErrorTemplate | string;
}

export interface IterateDirective {
  container: Template;
  condition?: Template;
}

export interface TriggerDirective {
  id: Template;
  date?: Template;
  order?: TriggerOrder;
}

export interface PaginationDirective {
  condition?: Template;
  url?: Template;
  qs?: JsonObject;
  body?: JsonValue;
  headers?: JsonObject;
  mergeWithParent?: boolean;
}

export interface ResponseDirective {
  output?: Template;
  iterate?: Template | IterateDirective;
  limit?: Template;
  temp?: JsonObject;
  data?: JsonObject;
  metadata?: Template;
  valid?: Template | ValidDirective;
  error?: string | ErrorDirective;
  trigger?: TriggerDirective;
  wrapper?: Template;
  uid?: Template;
}

export interface CallDefinition {
  url: Template;
  method?: Template;
  headers?: JsonObject;
  qs?: JsonObject;
  body?: JsonValue;
  type?: BodyType;
  condition?: Template;
  response?: ResponseDirective;
  pagination?: PaginationDirective;
}

/** `communication`-style value: one Call or an ordered list. */
export type CallList = CallDefinition | CallDefinition[];

export type ParameterType =
  | 'text'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'select'
  | 'date'
  | 'email'
  | 'url'
  | 'password'
  | 'array'
  | 'collection'
  | 'any';

export interface ParameterDefinition {
  name: string;
  type?: ParameterType;
  label?: string;
  required?: boolean;
  default?: JsonValue;
}

export interface BaseDefinition {
  baseUrl?: Template;
  headers?: JsonObject;
  qs?: JsonObject;
  body?: JsonValue;
  response?: Pick<ResponseDirective, 'valid' | 'error' | 'output'>;
  log?: { sanitize?: string[] };
}

export type ConnectionType = 'apikey' | 'basic' | 'oauth' | 'oauth-pkce' | 'custom';

export interface ConnectionDefinition {
  type: ConnectionType;
  label?: string;
  parameters?: ParameterDefinition[];
  scope?: string[];
  scopeSeparator?: string;
  authorize?: CallDefinition;
  token?: CallDefinition;
  refresh?: CallDefinition;
  info?: CallDefinition;
  invalidate?: CallDefinition;
}

export type ModuleType = 'action' | 'search' | 'trigger' | 'instant';

export interface ModuleDefinition {
  type: ModuleType;
  label?: string;
  connection?: string;
  webhook?: string;
  parameters?: ParameterDefinition[];
  communication?: CallList;
  epoch?: CallList;
}

export interface NestedRpcReference {
  rpc: string;
  parameter: string;
}

export interface RpcDefinition {
  label?: string;
  connection?: string;
  parameters?: ParameterDefinition[];
  communication: CallList;
  nested?: NestedRpcReference;
}

export interface WebhookDefinition {
  connection?: string;
  parameters?: ParameterDefinition[];
  attach?: CallDefinition;
  detach?: CallDefinition;
  update?: CallDefinition;
  validator?: Template;
  uid?: Template;
  response?: Pick<ResponseDirective, 'output' | 'iterate'>;
}

export interface FunctionDefinition {
  name: string;
  code: string;
}

export interface IntegrationDefinition {
  name: string;
  label?: string;
  base?: BaseDefinition;
  common?: JsonObject;
  connections?: Record<string, ConnectionDefinition>;
  modules?: Record<string, ModuleDefinition>;
  rpcs?: Record<string, RpcDefinition>;
  webhooks?: Record<string, WebhookDefinition>;
  functions?: FunctionDefinition[];
}

export function toCallArray(calls: CallList | undefined): CallDefinition[] {
  if (calls === undefined) {
    return [];
  }
  return Array.isArray(calls) ? calls : [calls];
}

export function isValidDirective(value: ResponseDirective['valid']): value is ValidDirective {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && 'condition' in value;
}

export function isIterateDirective(value: ResponseDirective['iterate']): value is IterateDirective {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && 'container' in value;
}
