import { Module } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import currencyConfig from '../../config/currency.config';
import { CurrencyController } from './controllers/currency.controller';
import { RatePruningCron } from './cron/rate-pruning.cron';
import { CurrencyMetrics } from './currency.metrics';
import { ExchangeRate } from './entities/exchange-rate.entity';
import { EXCHANGE_RATE_STORE } from './repositories/exchange-rate-store.interface';
import { ExchangeRateRepository } from './repositories/exchange-rate.repository';
import { CurrencyCacheService } from './services/currency-cache.service';
import { CurrencyService } from './services/currency.service';
import {
  EXCHANGE_RATE_PROVIDER,
  ExchangeRateProvider,
  FrankfurterExchangeRateService,
  MockExchangeRateService,
} from './services/exchange-rate';
import { RateUpdaterService } from './services/rate-updater.service';

@Module({
  imports: [TypeOrmModule.forFeature([ExchangeRate])],
  controllers: [CurrencyController],
  providers: [
    CurrencyMetrics,
    CurrencyCacheService,
    CurrencyService,
    RateUpdaterService,
    RatePruningCron,
    FrankfurterExchangeRateService,
    MockExchangeRateService,
    { provide: EXCHANGE_RATE_STORE, useClass: ExchangeRateRepository },
    {
      provide: EXCHANGE_RATE_PROVIDER,
      inject: [currencyConfig.KEY, FrankfurterExchangeRateService, MockExchangeRateService],
      useFactory: (
        config: ConfigType<typeof currencyConfig>,
        frankfurter: FrankfurterExchangeRateService,
        mock: MockExchangeRateService,
      ): ExchangeRateProvider => (config.provider.type === 'mock' ? mock : frankfurter),
    },
  ],
  exports: [CurrencyService, RateUpdaterService],
})
export class CurrencyModule {}
