import { Type } from '@sinclair/typebox';
import { AxiosError } from 'axios';

import { MetricsService } from '../metrics';
import {
  StubHandler,
  StubReply,
  createStubTransport,
  readAll,
} from '../testing/stub-transport';
import { ApiClient } from './api-client';
import {
  ClientOption,
  withApiKey,
  withBaseUrl,
  withHttpClient,
  withMetrics,
  withRateLimit,
} from './api-client.options';
import { USER_AGENT } from './decorated-transport';
import {
  ClientClosedException,
  DecodeException,
  RequestCancelledException,
  TransportException,
} from './exceptions';
import { ApiConfig, ApiRequest } from './types';

class SearchRequest implements ApiRequest {
  constructor(private readonly query: string) {}

  params() {
    return { q: this.query };
  }
}

const searchEndpoint: ApiConfig = {
  host: 'https://api.example.com',
  path: '/v1/search',
};

const resultSchema = Type.Object({ a: Type.Number() });

describe('ApiClient', () => {
  const clients: ApiClient[] = [];

  const createClient = (handler: StubHandler, ...options: ClientOption[]) => {
    const transport = createStubTransport(handler);
    const client = ApiClient.create(
      withHttpClient(transport.instance),
      ...options,
    );
    clients.push(client);
    return { client, ...transport };
  };

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((client) => client.close()));
  });

  describe('getJson', () => {
    test('decodes the body into the schema type', async () => {
      const { client } = createClient(() => ({ body: '{"a":1}' }));

      const result = await client.getJson(
        searchEndpoint,
        new SearchRequest('1'),
        resultSchema,
      );

      expect(result).toEqual({ a: 1 });
    });

    test('injects the api key into the query', async () => {
      const { client, requests } = createClient(
        () => ({ body: '{"a":1}' }),
        withApiKey('key', 'abc'),
      );

      await client.getJson(searchEndpoint, new SearchRequest('1'), resultSchema);

      expect(requests).toHaveLength(1);
      expect(requests[0].method).toBe('get');
      expect(requests[0].url).toBe(
        'https://api.example.com/v1/search?key=abc&q=1',
      );
    });

    test('sends only the request parameters without a key value', async () => {
      const { client, requests } = createClient(
        () => ({ body: '{"a":1}' }),
        withApiKey('key', ''),
      );

      await client.getJson(searchEndpoint, new SearchRequest('1'), resultSchema);

      expect(requests[0].url).toBe('https://api.example.com/v1/search?q=1');
    });

    test('sends requests to the base url when one is set', async () => {
      const { client, requests } = createClient(
        () => ({ body: '{"a":1}' }),
        withBaseUrl('https://mirror.example.com'),
      );

      await client.getJson(searchEndpoint, new SearchRequest('1'), resultSchema);

      expect(requests[0].url).toBe('https://mirror.example.com/v1/search?q=1');
    });

    test('omits the query separator when there are no parameters', async () => {
      const { client, requests } = createClient(() => ({ body: '{"a":1}' }));

      await client.getJson(searchEndpoint, { params: () => ({}) }, resultSchema);

      expect(requests[0].url).toBe('https://api.example.com/v1/search');
    });

    test('stamps the user agent header', async () => {
      const { client, requests } = createClient(() => ({ body: '{"a":1}' }));

      await client.getJson(searchEndpoint, new SearchRequest('1'), resultSchema);

      expect(requests[0].headers.get('User-Agent')).toBe(USER_AGENT);
    });

    test('decodes bodies of non-2xx responses', async () => {
      const { client } = createClient(() => ({
        status: 404,
        body: '{"a":2}',
      }));

      await expect(
        client.getJson(searchEndpoint, new SearchRequest('1'), resultSchema),
      ).resolves.toEqual({ a: 2 });
    });

    test('fails with a decode error on malformed JSON and releases the body', async () => {
      const { client, bodies } = createClient(() => ({ body: '{"a":' }));

      await expect(
        client.getJson(searchEndpoint, new SearchRequest('1'), resultSchema),
      ).rejects.toBeInstanceOf(DecodeException);
      expect(bodies[0].destroyed).toBe(true);
    });

    test('fails with a decode error when the body does not fit the schema', async () => {
      const { client } = createClient(() => ({ body: '{"a":"x"}' }));

      await expect(
        client.getJson(searchEndpoint, new SearchRequest('1'), resultSchema),
      ).rejects.toThrow(
        'Failed to decode response from https://api.example.com/v1/search?q=1: Expected number at "/a"',
      );
    });
  });

  describe('getBinary', () => {
    test('hands back status, content type and the open body', async () => {
      const { client } = createClient(() => ({
        status: 200,
        headers: { 'content-type': 'application/octet-stream' },
        body: Buffer.from([0x01, 0x02]),
      }));

      const response = await client.getBinary(
        searchEndpoint,
        new SearchRequest('1'),
      );

      expect(response.statusCode).toBe(200);
      expect(response.contentType).toBe('application/octet-stream');
      expect(response.data.destroyed).toBe(false);
      expect(await readAll(response.data)).toEqual(Buffer.from([0x01, 0x02]));
    });

    test('reports an empty content type when the header is missing', async () => {
      const { client } = createClient(() => ({ headers: {}, body: 'x' }));

      const response = await client.getBinary(
        searchEndpoint,
        new SearchRequest('1'),
      );

      expect(response.contentType).toBe('');
      response.data.destroy();
    });
  });

  describe('cancellation', () => {
    test('does not dispatch or take a token when already cancelled', async () => {
      const { client, requests } = createClient(
        () => ({ body: '{"a":1}' }),
        withRateLimit(1),
      );
      const controller = new AbortController();
      controller.abort();

      await expect(
        client.getJson(searchEndpoint, new SearchRequest('1'), resultSchema, {
          signal: controller.signal,
        }),
      ).rejects.toMatchObject({
        name: 'RequestCancelledException',
        stage: 'acquire',
      });
      expect(requests).toHaveLength(0);

      const startedAt = Date.now();
      await client.getJson(searchEndpoint, new SearchRequest('1'), resultSchema);
      expect(Date.now() - startedAt).toBeLessThan(500);
      expect(requests).toHaveLength(1);
    });

    test('aborts a request in flight', async () => {
      const controller = new AbortController();
      const { client } = createClient(
        () =>
          new Promise<StubReply>((_, reject) => {
            controller.signal.addEventListener('abort', () =>
              reject(new Error('socket closed')),
            );
          }),
      );
      setTimeout(() => controller.abort(), 20);

      const error = await client
        .getBinary(searchEndpoint, new SearchRequest('1'), {
          signal: controller.signal,
        })
        .catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(RequestCancelledException);
      expect(error).toMatchObject({ stage: 'request' });
    });
  });

  test('wraps transport failures with the error code', async () => {
    const failure = new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED');
    const { client } = createClient(
      () => Promise.reject(failure),
      withApiKey('key', 'abc'),
    );

    const error = await client
      .getBinary(searchEndpoint, new SearchRequest('1'))
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(TransportException);
    expect(error).toMatchObject({
      code: 'ECONNREFUSED',
      url: 'https://api.example.com/v1/search?key=REDACTED&q=1',
      cause: failure,
    });
  });

  test('rejects requests after close', async () => {
    const { client, requests } = createClient(() => ({ body: '{"a":1}' }));

    await client.close();

    await expect(
      client.getJson(searchEndpoint, new SearchRequest('1'), resultSchema),
    ).rejects.toBeInstanceOf(ClientClosedException);
    expect(requests).toHaveLength(0);
  });

  test('starts a burst of requests without waiting', async () => {
    const { client, requests } = createClient(
      () => ({ body: '{"a":1}' }),
      withRateLimit(3),
    );
    const startedAt = Date.now();

    await Promise.all(
      ['1', '2', '3'].map((q) =>
        client.getJson(searchEndpoint, new SearchRequest(q), resultSchema),
      ),
    );

    expect(Date.now() - startedAt).toBeLessThan(300);
    expect(requests).toHaveLength(3);
  });

  test('records request metrics by host and outcome', async () => {
    const metrics = new MetricsService();
    const { client } = createClient(
      () => ({ body: '{"a":1}' }),
      withMetrics(metrics),
    );

    await client.getJson(searchEndpoint, new SearchRequest('1'), resultSchema);

    const { values } = await metrics.requestCount.get();
    expect(values).toEqual([
      expect.objectContaining({
        value: 1,
        labels: { host: 'api.example.com', outcome: 'success' },
      }),
    ]);
  });
});
