import { Injectable } from '@nestjs/common';
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { RateUpdaterService } from '../../currency/services/rate-updater.service';

/** Intervals a failing updater may go without a successful refresh */
const STALE_AFTER_INTERVALS = 2;

@Injectable()
export class RateUpdaterHealthIndicator extends HealthIndicator {
  constructor(private readonly rateUpdater: RateUpdaterService) {
    super();
  }

  /**
   * Down once the updater has been failing and its last success is older
   * than two refresh intervals.
   */
  isHealthy(key: string): HealthIndicatorResult {
    const status = this.rateUpdater.getStatus();
    const lastUpdateAge = status.lastUpdate ? Date.now() - status.lastUpdate.getTime() : null;
    const stale = lastUpdateAge === null || lastUpdateAge > STALE_AFTER_INTERVALS * status.intervalMs;
    const isHealthy = status.lastError === null || !stale;

    const result = this.getStatus(key, isHealthy, {
      running: status.running,
      lastUpdate: status.lastUpdate?.toISOString() ?? null,
      lastError: status.lastError,
      retryCount: status.retryCount,
    });

    if (isHealthy) {
      return result;
    }

    throw new HealthCheckError('Exchange rates are stale', result);
  }
}
