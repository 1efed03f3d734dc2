import { Injectable } from '@nestjs/common';
import { Counter, Gauge } from 'prom-client';
import { MetricsFactory } from '../../common/services/metrics.factory';

/**
 * Prometheus instruments for the rate engine.
 */
@Injectable()
export class CurrencyMetrics {
  /** result: hit | miss | error */
  readonly cacheLookups: Counter<'tier' | 'result'>;

  /** status: success | failure */
  readonly rateRefreshes: Counter<'status'>;

  readonly lastSuccessfulRefresh: Gauge;

  /** outcome: success | failure */
  readonly providerRequests: Counter<'provider' | 'operation' | 'outcome'>;

  constructor(metricsFactory: MetricsFactory) {
    this.cacheLookups = metricsFactory.getOrCreateCounter({
      name: 'fx_cache_lookups_total',
      help: 'Exchange rate cache lookups by tier and result',
      labelNames: ['tier', 'result'] as const,
    });
    this.rateRefreshes = metricsFactory.getOrCreateCounter({
      name: 'fx_rate_refresh_total',
      help: 'Scheduled and forced exchange rate refresh attempts',
      labelNames: ['status'] as const,
    });
    this.lastSuccessfulRefresh = metricsFactory.getOrCreateGauge({
      name: 'fx_rate_last_refresh_timestamp_seconds',
      help: 'Unix time of the last successful exchange rate refresh',
    });
    this.providerRequests = metricsFactory.getOrCreateCounter({
      name: 'fx_provider_requests_total',
      help: 'Requests sent to the exchange rate provider',
      labelNames: ['provider', 'operation', 'outcome'] as const,
    });
  }
}
