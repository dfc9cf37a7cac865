import { Global, Module } from '@nestjs/common';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { MetricsService } from './metrics.service';

@Global()
@Module({
  imports: [PrometheusModule.register({ path: '/metrics' })],
  providers: [MetricsService],
  exports: [MetricsService],
})
export class MetricsModule {}
