import { Injectable } from '@nestjs/common';
import { Counter, Gauge, register } from 'prom-client';

export interface MetricConfig<T extends string> {
  name: string;
  help: string;
  labelNames?: readonly T[];
}

/**
 * Injectable factory for creating Prometheus metrics.
 * Registration is idempotent: asking for an existing name returns the
 * registered metric, so repeated module compilation in tests does not throw.
 *
 * @example
 * ```typescript
 * this.lookups = metricsFactory.getOrCreateCounter({
 *   name: 'fx_cache_lookups_total',
 *   help: 'Rate cache lookups',
 *   labelNames: ['tier', 'result'] as const,
 * });
 * ```
 */
@Injectable()
export class MetricsFactory {
  getOrCreateCounter<T extends string = string>(config: MetricConfig<T>): Counter<T> {
    const existing = register.getSingleMetric(config.name);
    if (existing instanceof Counter) {
      return existing;
    }
    if (existing) {
      throw new Error(`Metric ${config.name} is already registered with a different type`);
    }
    return new Counter<T>({
      name: config.name,
      help: config.help,
      labelNames: config.labelNames ?? [],
    });
  }

  getOrCreateGauge<T extends string = string>(config: MetricConfig<T>): Gauge<T> {
    const existing = register.getSingleMetric(config.name);
    if (existing instanceof Gauge) {
      return existing;
    }
    if (existing) {
      throw new Error(`Metric ${config.name} is already registered with a different type`);
    }
    return new Gauge<T>({
      name: config.name,
      help: config.help,
      labelNames: config.labelNames ?? [],
    });
  }
}
