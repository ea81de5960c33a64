import { Type } from '@sinclair/typebox';

import {
  DEFAULT_API_KEY_NAME,
  DEFAULT_REQUESTS_PER_SECOND,
  DEFAULT_TIMEOUT_MS,
  LOGGER_LEVELS,
  NODE_ENVIRONMENTS,
} from '../constants';
import {
  booleanFromString,
  optionalString,
  positiveNumberFromString,
  variantsSchema,
} from '../utils/schema.util';

export const envValidationSchema = Type.Object({
  NODE_ENV: variantsSchema(NODE_ENVIRONMENTS, {
    default: 'development',
    description: 'Application environment mode',
  }),
  LOGGER_LEVEL: variantsSchema(LOGGER_LEVELS, {
    default: 'info',
    description:
      'Logging level for the application. Controls verbosity of log output.',
    examples: ['error', 'warn', 'info', 'debug'],
  }),
  LOGGER_PRETTY_ENABLED: booleanFromString('false', {
    description: 'Enable pretty printing for logs',
  }),
  API_CLIENT_REQUESTS_PER_SECOND: positiveNumberFromString(
    DEFAULT_REQUESTS_PER_SECOND,
    {
      description: 'Maximum number of outbound requests started per second',
    },
  ),
  API_CLIENT_TIMEOUT_MS: positiveNumberFromString(DEFAULT_TIMEOUT_MS, {
    description: 'HTTP request timeout in milliseconds',
  }),
  API_CLIENT_BASE_URL: optionalString({
    description: 'Overrides the host of every endpoint the client calls',
    pattern: '^https?://.+',
  }),
  API_CLIENT_KEY_NAME: Type.String({
    minLength: 1,
    default: DEFAULT_API_KEY_NAME,
    description: 'Query parameter carrying the API key',
  }),
  API_CLIENT_KEY_VALUE: optionalString({
    description: 'API key injected into every request',
  }),
  API_CLIENT_PROXY_URL: optionalString({
    description:
      'Proxy URL (https recommended). Format: https://[user:pass@]host:port',
    pattern: '^https?://.+',
    examples: ['https://proxy.example.com:8080'],
  }),
});
