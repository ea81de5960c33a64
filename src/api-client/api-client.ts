import { Logger } from '@nestjs/common';
import { Static, TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import axios, { AxiosInstance, AxiosResponse, isAxiosError } from 'axios';
import { Readable } from 'stream';

import { DEFAULT_REQUESTS_PER_SECOND } from '../config/constants';
import { MetricsService, RequestOutcome } from '../metrics';
import { ClientDraft, ClientOption, withHttpClient } from './api-client.options';
import { buildAuthQuery } from './auth-query';
import {
  ApiClientException,
  ClientClosedException,
  ClientConstructionException,
  DecodeException,
  RequestCancelledException,
  TransportException,
} from './exceptions';
import { TokenBucketRateLimiter } from './rate-limiter';
import {
  ApiConfig,
  ApiRequest,
  BinaryResponse,
  RequestOptions,
} from './types';
import { sanitizeUrlForLogging } from './url-sanitizer';

type ClientSettings = Readonly<Omit<ClientDraft, 'httpClient' | 'metrics'>>;

async function readBody(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks);
}

function hostLabel(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return 'unknown';
  }
}

/**
 * Rate-limited GET client meant to be embedded in a concrete API client.
 *
 * Any number of callers may share one instance; the token bucket only
 * bounds how many requests start per second, not how many are in flight.
 *
 * @example
 * ```ts
 * const client = ApiClient.create(withApiKey('key', 'test-secret'), withRateLimit(5));
 * const body = await client.getJson(
 *   { host: 'https://api.example.com', path: '/v1/items' },
 *   { params: () => ({ q: 'lamp' }) },
 *   Type.Object({ items: Type.Array(Type.String()) }),
 * );
 * await client.close();
 * ```
 */
export class ApiClient {
  private readonly logger = new Logger(ApiClient.name);

  private constructor(
    private readonly settings: ClientSettings,
    private readonly http: AxiosInstance,
    private readonly rateLimiter: TokenBucketRateLimiter,
    private readonly metrics?: MetricsService,
  ) {}

  /**
   * Installs a default axios instance, applies `options` in order and starts
   * the rate limiter with the resulting requests-per-second.
   *
   * @throws ClientConstructionException when an option rejects its input
   */
  static create(...options: ClientOption[]): ApiClient {
    const draft: ClientDraft = {
      httpClient: axios.create(),
      requestsPerSecond: DEFAULT_REQUESTS_PER_SECOND,
      baseUrl: '',
      apiKeyName: '',
      apiKeyValue: '',
    };
    withHttpClient(draft.httpClient)(draft);

    for (const option of options) {
      try {
        option(draft);
      } catch (error) {
        if (error instanceof ClientConstructionException) {
          throw error;
        }
        throw new ClientConstructionException(
          error instanceof Error ? error.message : String(error),
          error,
        );
      }
    }

    const { httpClient, metrics, ...settings } = draft;
    return new ApiClient(
      settings,
      httpClient,
      new TokenBucketRateLimiter(settings.requestsPerSecond),
      metrics,
    );
  }

  get requestsPerSecond(): number {
    return this.settings.requestsPerSecond;
  }

  /**
   * Dispatches the request and parses the body as JSON checked against
   * `schema`. The body is released whether or not decoding succeeds.
   */
  async getJson<T extends TSchema>(
    config: ApiConfig,
    request: ApiRequest,
    schema: T,
    options: RequestOptions = {},
  ): Promise<Static<T>> {
    const { url, response } = await this.dispatch(config, request, options);

    let text: string;
    try {
      text = (await readBody(response.data)).toString('utf8');
    } catch (error) {
      if (options.signal?.aborted) {
        throw new RequestCancelledException('request', options.signal.reason);
      }
      throw new TransportException(this.redact(url), this.toError(error));
    } finally {
      response.data.destroy();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new DecodeException(
        this.redact(url),
        error instanceof Error ? error.message : 'invalid JSON',
        error,
      );
    }

    if (!Value.Check(schema, parsed)) {
      const mismatch = Value.Errors(schema, parsed).First();
      throw new DecodeException(
        this.redact(url),
        mismatch
          ? `${mismatch.message} at "${mismatch.path || '/'}"`
          : 'body does not match the expected shape',
      );
    }

    return parsed;
  }

  /**
   * Dispatches the request and hands back the open body stream; the caller
   * owns it from here on.
   */
  async getBinary(
    config: ApiConfig,
    request: ApiRequest,
    options: RequestOptions = {},
  ): Promise<BinaryResponse> {
    const { response } = await this.dispatch(config, request, options);
    const contentType = response.headers['content-type'];

    return {
      statusCode: response.status,
      contentType: typeof contentType === 'string' ? contentType : '',
      data: response.data,
    };
  }

  /**
   * Stops the token refill and rejects requests still waiting for a token.
   * Requests already in flight are left to finish.
   */
  async close(): Promise<void> {
    await this.rateLimiter.close();
  }

  private async dispatch(
    config: ApiConfig,
    request: ApiRequest,
    { signal }: RequestOptions,
  ): Promise<{ url: string; response: AxiosResponse<Readable> }> {
    if (this.rateLimiter.isClosed()) {
      throw new ClientClosedException();
    }

    const host = this.settings.baseUrl || config.host;
    const query = buildAuthQuery(request.params(), {
      name: this.settings.apiKeyName,
      value: this.settings.apiKeyValue,
    });
    const url = `${host}${config.path}${query ? `?${query}` : ''}`;
    const label = hostLabel(url);

    const waitStartedAt = performance.now();
    await this.rateLimiter.acquire(signal);
    this.metrics?.recordRateLimitWait(
      label,
      (performance.now() - waitStartedAt) / 1000,
    );

    this.logger.debug(`HTTP GET ${this.redact(url)}`);
    const startedAt = performance.now();
    const record = (outcome: RequestOutcome) =>
      this.metrics?.recordRequest(
        label,
        outcome,
        (performance.now() - startedAt) / 1000,
      );

    try {
      const response = await this.http.request<Readable>({
        method: 'GET',
        url,
        signal,
        responseType: 'stream',
        validateStatus: () => true,
      });
      record('success');
      return { url, response };
    } catch (error) {
      if (axios.isCancel(error) || signal?.aborted) {
        record('cancelled');
        throw new RequestCancelledException('request', signal?.reason);
      }
      record('transport_error');
      if (error instanceof ApiClientException) {
        throw error;
      }
      const transportError = new TransportException(
        this.redact(url),
        this.toError(error),
        isAxiosError(error) ? error.code : undefined,
      );
      this.logger.warn(transportError.message);
      throw transportError;
    }
  }

  private redact(url: string): string {
    return sanitizeUrlForLogging(
      url,
      this.settings.apiKeyName ? [this.settings.apiKeyName] : [],
    );
  }

  private toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
  }
}
