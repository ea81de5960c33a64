export { MetricsModule } from './metrics.module';
export { MetricsService } from './metrics.service';
export type { RequestOutcome } from './metrics.service';
