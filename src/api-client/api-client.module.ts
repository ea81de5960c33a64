import { Module } from '@nestjs/common';

import { MetricsModule } from '../metrics';
import { ApiClientBuilder } from './api-client.builder';

@Module({
  imports: [MetricsModule],
  providers: [ApiClientBuilder],
  exports: [ApiClientBuilder],
})
export class ApiClientModule {}
