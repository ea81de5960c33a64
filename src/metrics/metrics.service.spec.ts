import { MetricsService } from './metrics.service';

describe('MetricsService', () => {
  test('keeps metrics of separate instances apart', async () => {
    const first = new MetricsService();
    const second = new MetricsService();

    first.recordRequest('api.example.com', 'success', 0.2);

    expect((await first.requestCount.get()).values).toHaveLength(1);
    expect((await second.requestCount.get()).values).toHaveLength(0);
  });

  test('renders the registry in the exposition format', async () => {
    const metrics = new MetricsService();
    metrics.recordRequest('api.example.com', 'transport_error', 0.05);
    metrics.recordRateLimitWait('api.example.com', 0);

    const text = await metrics.getMetrics();

    expect(text).toContain(
      'api_client_requests_total{host="api.example.com",outcome="transport_error"} 1',
    );
    expect(text).toContain(
      'api_client_rate_limit_wait_seconds_count{host="api.example.com"} 1',
    );
  });
});
