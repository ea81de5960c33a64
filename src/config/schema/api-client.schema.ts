import { Static, Type } from '@sinclair/typebox';

import {
  DEFAULT_API_KEY_NAME,
  DEFAULT_REQUESTS_PER_SECOND,
  DEFAULT_TIMEOUT_MS,
} from '../constants';

const HTTP_URL_PATTERN = '^https?://.+';

export const requestsPerSecondSchema = Type.Integer({
  minimum: 1,
  default: DEFAULT_REQUESTS_PER_SECOND,
  description:
    'Maximum number of requests started per second. Also the size of the initial burst.',
});

export const baseUrlSchema = Type.String({
  pattern: HTTP_URL_PATTERN,
  description: 'Overrides the host of every endpoint the client calls',
  examples: ['https://api.example.com'],
});

export const proxyUrlSchema = Type.String({
  pattern: HTTP_URL_PATTERN,
  description:
    'Proxy URL (https recommended). Format: https://[user:pass@]host:port',
  examples: ['https://proxy.example.com:8080'],
});

export const apiClientSettingsSchema = Type.Object({
  requestsPerSecond: requestsPerSecondSchema,
  timeoutMs: Type.Integer({
    minimum: 1,
    default: DEFAULT_TIMEOUT_MS,
    description: 'HTTP request timeout in milliseconds',
  }),
  baseUrl: Type.Optional(baseUrlSchema),
  apiKeyName: Type.String({
    minLength: 1,
    default: DEFAULT_API_KEY_NAME,
    description: 'Query parameter carrying the API key',
  }),
  apiKeyValue: Type.Optional(
    Type.String({ description: 'API key injected into every request' }),
  ),
  proxyUrl: Type.Optional(proxyUrlSchema),
});

export type ApiClientSettings = Static<typeof apiClientSettingsSchema>;
