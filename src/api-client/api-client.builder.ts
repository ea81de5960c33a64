import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import axios from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';

import { AppConfigService } from '../config';
import { MetricsService } from '../metrics';
import { ApiClient } from './api-client';
import {
  ClientOption,
  withApiKey,
  withBaseUrl,
  withHttpClient,
  withMetrics,
  withRateLimit,
} from './api-client.options';

/**
 * Builds clients from the `apiClient` configuration section and closes them
 * when the application shuts down.
 */
@Injectable()
export class ApiClientBuilder implements OnApplicationShutdown {
  private readonly logger = new Logger(ApiClientBuilder.name);
  private readonly clients = new Set<ApiClient>();

  constructor(
    private readonly configService: AppConfigService,
    private readonly metricsService: MetricsService,
  ) {}

  /**
   * `options` are applied after the configured ones and win over them.
   */
  build(...options: ClientOption[]): ApiClient {
    const settings = this.configService.get('apiClient');

    const transport = axios.create({
      timeout: settings.timeoutMs,
      ...(settings.proxyUrl && {
        httpsAgent: new HttpsProxyAgent(settings.proxyUrl),
        proxy: false,
      }),
    });

    const configured: ClientOption[] = [
      withHttpClient(transport),
      withRateLimit(settings.requestsPerSecond),
      withMetrics(this.metricsService),
    ];
    if (settings.baseUrl) {
      configured.push(withBaseUrl(settings.baseUrl));
    }
    if (settings.apiKeyValue) {
      configured.push(withApiKey(settings.apiKeyName, settings.apiKeyValue));
    }

    const client = ApiClient.create(...configured, ...options);
    this.clients.add(client);
    this.logger.debug(
      `Built API client: ${client.requestsPerSecond} RPS${settings.proxyUrl ? ', via proxy' : ''}`,
    );

    return client;
  }

  async onApplicationShutdown(): Promise<void> {
    const clients = [...this.clients];
    this.clients.clear();
    await Promise.all(clients.map((client) => client.close()));
    if (clients.length) {
      this.logger.debug(`Closed ${clients.length} API client(s)`);
    }
  }
}
