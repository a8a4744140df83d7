import type { SchemaObject } from 'ajv';

import { REQUEST_ERROR_KINDS } from '../core/errors.js';

const template = {};

const stringMap = { type: 'object' };

const parameter = {
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string', minLength: 1 },
    type: {
      enum: ['text', 'number', 'integer', 'boolean', 'select', 'date', 'email', 'url', 'password', 'array', 'collection', 'any'],
    },
    label: { type: 'string' },
    required: { type: 'boolean' },
    default: template,
  },
};

const requestErrorKind = { enum: [...REQUEST_ERROR_KINDS] };

const errorTemplate = {
  oneOf: [
    { type: 'string' },
    {
      type: 'object',
      properties: { message: template, type: requestErrorKind },
      additionalProperties: false,
    },
  ],
};

const response = {
  type: 'object',
  properties: {
    output: template,
    iterate: {
      oneOf: [
        { type: ['string', 'array', 'null'] },
        {
          type: 'object',
          required: ['container'],
          properties: { container: template, condition: template },
          additionalProperties: false,
        },
      ],
    },
    limit: template,
    temp: stringMap,
    data: stringMap,
    metadata: template,
    valid: template,
    error: {
      oneOf: [
        { type: 'string' },
        {
          type: 'object',
          properties: { message: template, type: requestErrorKind },
          patternProperties: { '^[0-9]{3}$': errorTemplate },
          additionalProperties: false,
        },
      ],
    },
    trigger: {
      type: 'object',
      required: ['id'],
      properties: {
        id: template,
        date: template,
        order: { enum: ['asc', 'desc', 'unordered'] },
      },
      additionalProperties: false,
    },
    wrapper: template,
    uid: template,
  },
  additionalProperties: false,
};

const call = {
  type: 'object',
  required: ['url'],
  properties: {
    url: { type: 'string', minLength: 1 },
    method: { type: 'string' },
    headers: stringMap,
    qs: stringMap,
    body: template,
    type: { enum: ['json', 'urlencoded', 'multipart', 'text'] },
    condition: template,
    response,
    pagination: {
      type: 'object',
      properties: {
        condition: template,
        url: { type: 'string' },
        qs: stringMap,
        body: template,
        headers: stringMap,
        mergeWithParent: { type: 'boolean' },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

const callList = {
  oneOf: [call, { type: 'array', minItems: 1, items: call }],
};

const parameters = { type: 'array', items: parameter };

export const INTEGRATION_DEFINITION_SCHEMA: SchemaObject = {
  $id: 'connector-runtime/integration-definition',
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string', minLength: 1 },
    label: { type: 'string' },
    base: {
      type: 'object',
      properties: {
        baseUrl: { type: 'string' },
        headers: stringMap,
        qs: stringMap,
        body: template,
        response: {
          type: 'object',
          properties: {
            valid: template,
            error: response.properties.error,
            output: template,
          },
          additionalProperties: false,
        },
        log: {
          type: 'object',
          properties: { sanitize: { type: 'array', items: { type: 'string' } } },
          additionalProperties: false,
        },
      },
      additionalProperties: false,
    },
    common: stringMap,
    connections: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['type'],
        properties: {
          type: { enum: ['apikey', 'basic', 'oauth', 'oauth-pkce', 'custom'] },
          label: { type: 'string' },
          parameters,
          scope: { type: 'array', items: { type: 'string' } },
          scopeSeparator: { type: 'string' },
          authorize: call,
          token: call,
          refresh: call,
          info: call,
          invalidate: call,
        },
        additionalProperties: false,
      },
    },
    modules: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['type'],
        properties: {
          type: { enum: ['action', 'search', 'trigger', 'instant'] },
          label: { type: 'string' },
          connection: { type: 'string' },
          webhook: { type: 'string' },
          parameters,
          communication: callList,
          epoch: callList,
        },
        additionalProperties: false,
      },
    },
    rpcs: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['communication'],
        properties: {
          label: { type: 'string' },
          connection: { type: 'string' },
          parameters,
          communication: callList,
          nested: {
            type: 'object',
            required: ['rpc', 'parameter'],
            properties: { rpc: { type: 'string' }, parameter: { type: 'string' } },
            additionalProperties: false,
          },
        },
        additionalProperties: false,
      },
    },
    webhooks: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        properties: {
          connection: { type: 'string' },
          parameters,
          attach: call,
          detach: call,
          update: call,
          validator: template,
          uid: template,
          response: {
            type: 'object',
            properties: { output: template, iterate: response.properties.iterate },
            additionalProperties: false,
          },
        },
        additionalProperties: false,
      },
    },
    functions: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'code'],
        properties: { name: { type: 'string', minLength: 1 }, code: { type: 'string', minLength: 1 } },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
};
