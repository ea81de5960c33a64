import { TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { AxiosInstance } from 'axios';

import { baseUrlSchema, requestsPerSecondSchema } from '../config/schema';
import { MetricsService } from '../metrics';
import { decorateTransport } from './decorated-transport';
import { ClientConstructionException } from './exceptions';

/**
 * Mutable settings an {@link ClientOption} writes to while a client is
 * being assembled.
 */
export interface ClientDraft {
  httpClient: AxiosInstance;
  requestsPerSecond: number;
  baseUrl: string;
  apiKeyName: string;
  apiKeyValue: string;
  metrics?: MetricsService;
}

/**
 * Applied in order by `ApiClient.create`. Throwing aborts construction.
 */
export type ClientOption = (draft: ClientDraft) => void;

function assertOption(
  option: string,
  schema: TSchema,
  value: unknown,
): void {
  if (Value.Check(schema, value)) {
    return;
  }
  const error = Value.Errors(schema, value).First();
  const expected = error ? error.message : 'a valid value';
  throw new ClientConstructionException(
    `${option} expected ${expected} (received: ${JSON.stringify(value)})`,
  );
}

/**
 * Sends requests through `instance`. The instance is decorated with the
 * client's request interceptor unless an earlier client already did so.
 */
export function withHttpClient(instance: AxiosInstance): ClientOption {
  return (draft) => {
    draft.httpClient = decorateTransport(instance);
  };
}

/**
 * Injects `name=value` into the query of every request. An empty value
 * turns injection off.
 */
export function withApiKey(name: string, value: string): ClientOption {
  return (draft) => {
    if (value && !name) {
      throw new ClientConstructionException(
        'withApiKey expected a parameter name for a non-empty key',
      );
    }
    draft.apiKeyName = name;
    draft.apiKeyValue = value;
  };
}

/**
 * Caps the number of requests started per second. Defaults to 10.
 */
export function withRateLimit(requestsPerSecond: number): ClientOption {
  return (draft) => {
    assertOption('withRateLimit', requestsPerSecondSchema, requestsPerSecond);
    draft.requestsPerSecond = requestsPerSecond;
  };
}

/**
 * Sends every request to `baseUrl` instead of the endpoint's own host.
 * An empty string removes the override.
 */
export function withBaseUrl(baseUrl: string): ClientOption {
  return (draft) => {
    if (baseUrl !== '') {
      assertOption('withBaseUrl', baseUrlSchema, baseUrl);
    }
    draft.baseUrl = baseUrl;
  };
}

export function withMetrics(metrics: MetricsService): ClientOption {
  return (draft) => {
    draft.metrics = metrics;
  };
}
