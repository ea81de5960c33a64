export { ApiClient } from './api-client';
export { ApiClientBuilder } from './api-client.builder';
export { ApiClientModule } from './api-client.module';
export {
  withApiKey,
  withBaseUrl,
  withHttpClient,
  withMetrics,
  withRateLimit,
} from './api-client.options';
export { buildAuthQuery } from './auth-query';
export { TokenBucketRateLimiter } from './rate-limiter';
export { sanitizeUrlForLogging } from './url-sanitizer';
export * from './exceptions';

export type { ClientDraft, ClientOption } from './api-client.options';
export type { ApiKey } from './auth-query';
export type {
  ApiConfig,
  ApiRequest,
  BinaryResponse,
  QueryParams,
  QueryValue,
  RequestOptions,
} from './types';
