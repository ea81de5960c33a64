export { AppConfigModule } from './config.module';
export { AppConfigService } from './config.service';
export { envLoader } from './loaders';
export * from './constants';
export type { Config } from './types';
export type { ApiClientSettings, LoggerConfig } from './schema';
