import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { TypeOrmModule } from '@nestjs/typeorm';
import { join } from 'path';

// Config
import { currencyConfig, databaseConfig, redisConfig, validate } from './config';

// Common
import { LoggerModule } from './common/logger/logger.module';
import { CorrelationIdMiddleware } from './common/middleware/correlation-id.middleware';
import { RedisModule } from './common/redis/redis.module';

// Modules
import { CurrencyModule } from './modules/currency/currency.module';
import { HealthModule } from './modules/health/health.module';
import { MetricsModule } from './modules/metrics/metrics.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [currencyConfig, databaseConfig, redisConfig],
      validate,
    }),

    // Structured Logging with Winston
    LoggerModule,

    // Database
    TypeOrmModule.forRootAsync({
      inject: [databaseConfig.KEY],
      useFactory: (config: ConfigType<typeof databaseConfig>) => ({
        ...config,
        migrations: [join(__dirname, 'database', 'migrations', '*{.ts,.js}')],
      }),
    }),

    // Scheduler for the rate updater, pruning and cache sweeps
    ScheduleModule.forRoot(),

    // Shared rate cache tier (optional)
    RedisModule,

    // Prometheus
    MetricsModule,

    // Feature Modules
    CurrencyModule,
    HealthModule,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
