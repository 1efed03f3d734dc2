import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { CurrencyModule } from '../currency/currency.module';
import { HealthController } from './health.controller';
import { RateUpdaterHealthIndicator } from './indicators';

@Module({
  imports: [TerminusModule, CurrencyModule],
  controllers: [HealthController],
  providers: [RateUpdaterHealthIndicator],
})
export class HealthModule {}
