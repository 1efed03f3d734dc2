import { Global, Module } from '@nestjs/common';
import { MetricsFactory } from '../../common/services/metrics.factory';
import { MetricsController } from './metrics.controller';

@Global()
@Module({
  controllers: [MetricsController],
  providers: [MetricsFactory],
  exports: [MetricsFactory],
})
export class MetricsModule {}
