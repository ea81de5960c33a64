import { Injectable } from '@nestjs/common';
import { Counter, Histogram, Registry } from 'prom-client';

export type RequestOutcome = 'success' | 'cancelled' | 'transport_error';

@Injectable()
export class MetricsService {
  readonly registry = new Registry();

  public readonly requestCount = new Counter({
    name: 'api_client_requests_total',
    help: 'Total number of dispatched API requests',
    labelNames: ['host', 'outcome'],
    registers: [this.registry],
  });

  public readonly requestLatency = new Histogram({
    name: 'api_client_request_duration_seconds',
    help: 'Duration of API requests in seconds, excluding rate limit wait',
    labelNames: ['host', 'outcome'],
    buckets: [
      0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 1.5, 2, 2.5, 3, 4, 5, 7.5, 10, 15,
      20, 30, 45, 60,
    ],
    registers: [this.registry],
  });

  public readonly rateLimitWait = new Histogram({
    name: 'api_client_rate_limit_wait_seconds',
    help: 'Time spent waiting for a rate limit token in seconds',
    labelNames: ['host'],
    buckets: [0, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
    registers: [this.registry],
  });

  recordRequest(host: string, outcome: RequestOutcome, seconds: number): void {
    this.requestCount.inc({ host, outcome });
    this.requestLatency.observe({ host, outcome }, seconds);
  }

  recordRateLimitWait(host: string, seconds: number): void {
    this.rateLimitWait.observe({ host }, seconds);
  }

  getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
