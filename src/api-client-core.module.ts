import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';

import { ApiClientModule } from './api-client';
import { AppConfigModule, AppConfigService } from './config';
import { MetricsModule } from './metrics';

/**
 * Configuration from the environment, pino logging, metrics and the
 * {@link ApiClientBuilder}. Call `app.useLogger(app.get(Logger))` with the
 * nestjs-pino `Logger` to route the client's log lines through pino.
 */
@Module({
  imports: [
    AppConfigModule,
    LoggerModule.forRootAsync({
      inject: [AppConfigService],
      useFactory: (configService: AppConfigService) => {
        const { level, isPrettyEnabled } = configService.get('logger');

        return {
          pinoHttp: {
            level,
            customLevels: {
              verbose: 10,
            },
            useOnlyCustomLevels: false,
            ...(isPrettyEnabled && { transport: { target: 'pino-pretty' } }),
          },
        };
      },
    }),
    MetricsModule,
    ApiClientModule,
  ],
  exports: [ApiClientModule, MetricsModule],
})
export class ApiClientCoreModule {}
