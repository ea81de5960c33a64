import 'reflect-metadata';

export * from './api-client';
export { ApiClientCoreModule } from './api-client-core.module';
export { AppConfigModule, AppConfigService, envLoader } from './config';
export type { ApiClientSettings, Config } from './config';
export { MetricsModule, MetricsService } from './metrics';
