/**
 * Currency Configuration
 *
 * Settings for the exchange rate engine: the quoting currency used for
 * cross rates, the rate provider, both cache tiers, the background updater
 * and rate pruning.
 *
 * @example
 * ```typescript
 * constructor(
 *   @Inject(currencyConfig.KEY)
 *   private readonly config: ConfigType<typeof currencyConfig>,
 * ) {}
 *
 * const { intervalMs } = this.config.updater;
 * ```
 */
import { registerAs } from '@nestjs/config';

export type ExchangeRateProviderType = 'frankfurter' | 'mock';

export interface CurrencyConfig {
  /** Currency every cross rate is computed through (ISO 4217) */
  baseCurrency: string;

  provider: {
    type: ExchangeRateProviderType;
    baseUrl: string;
    /** Per-request timeout in milliseconds */
    timeoutMs: number;
  };

  cache: {
    /** In-process tier TTL (default: 5 minutes) */
    memoryTtlMs: number;
    /** Upper bound on in-process entries */
    memoryMaxEntries: number;
    /** Redis tier TTL (default: 1 hour) */
    redisTtlMs: number;
  };

  updater: {
    enabled: boolean;
    /** Refresh interval (default: 1 hour) */
    intervalMs: number;
    /** Delay before a failed refresh is retried (default: 5 minutes) */
    retryDelayMs: number;
    /** Consecutive failures tolerated before waiting for the next interval */
    maxRetries: number;
  };

  pruning: {
    enabled: boolean;
    /** Rates not refreshed for this many days are soft-deleted */
    retentionDays: number;
  };
}

function parseProvider(value: string | undefined): ExchangeRateProviderType {
  return value?.toLowerCase() === 'mock' ? 'mock' : 'frankfurter';
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export default registerAs(
  'currency',
  (): CurrencyConfig => ({
    baseCurrency: (process.env.CURRENCY_BASE || 'EUR').toUpperCase(),

    provider: {
      type: parseProvider(process.env.EXCHANGE_RATE_PROVIDER),
      baseUrl: process.env.EXCHANGE_RATE_BASE_URL || 'https://api.frankfurter.app',
      timeoutMs: parsePositiveInt(process.env.EXCHANGE_RATE_TIMEOUT_MS, 10_000),
    },

    cache: {
      memoryTtlMs: parsePositiveInt(process.env.CURRENCY_MEMORY_CACHE_TTL_MS, 5 * 60 * 1000),
      memoryMaxEntries: parsePositiveInt(process.env.CURRENCY_MEMORY_CACHE_MAX, 10_000),
      redisTtlMs: parsePositiveInt(process.env.CURRENCY_REDIS_CACHE_TTL_MS, 60 * 60 * 1000),
    },

    updater: {
      enabled: process.env.CURRENCY_UPDATER_ENABLED !== 'false',
      intervalMs: parsePositiveInt(process.env.CURRENCY_UPDATE_INTERVAL_MS, 60 * 60 * 1000),
      retryDelayMs: parsePositiveInt(process.env.CURRENCY_RETRY_DELAY_MS, 5 * 60 * 1000),
      maxRetries: parsePositiveInt(process.env.CURRENCY_MAX_RETRIES, 3),
    },

    pruning: {
      enabled: process.env.CURRENCY_PRUNE_ENABLED !== 'false',
      retentionDays: parsePositiveInt(process.env.CURRENCY_RETENTION_DAYS, 30),
    },
  }),
);
