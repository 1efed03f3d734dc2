import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { toError } from '../../../common/utils/async.utils';
import currencyConfig from '../../../config/currency.config';
import { RATE_UPDATER_INTERVAL_NAME, RATE_UPDATER_RETRY_TIMEOUT_NAME } from '../constants/currency.constants';
import { CurrencyMetrics } from '../currency.metrics';
import { RefreshResult, UpdaterStatus } from '../types/currency.types';
import { CurrencyService } from './currency.service';

/**
 * Periodic exchange rate refresh.
 *
 * Refreshes once at startup, then every `updater.intervalMs`. A failed
 * attempt schedules a retry after `updater.retryDelayMs`, up to
 * `updater.maxRetries` in a row; after that the updater waits for the next
 * tick. At most one attempt runs at a time.
 */
@Injectable()
export class RateUpdaterService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(RateUpdaterService.name);

  private running = false;
  private inFlight: Promise<void> | null = null;
  private lastUpdate: Date | null = null;
  private lastError: string | null = null;
  private retryCount = 0;
  private nextRetryAt: Date | null = null;

  constructor(
    @Inject(currencyConfig.KEY)
    private readonly config: ConfigType<typeof currencyConfig>,
    private readonly currencyService: CurrencyService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly metrics: CurrencyMetrics,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (!this.config.updater.enabled) {
      this.logger.log('Rate updater disabled');
      return;
    }
    await this.start();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    this.logger.log(`Starting rate updater (interval ${this.config.updater.intervalMs}ms)`);

    await this.trigger('startup');
    if (!this.running) {
      return;
    }

    const interval = setInterval(() => {
      void this.trigger('interval');
    }, this.config.updater.intervalMs);
    this.schedulerRegistry.addInterval(RATE_UPDATER_INTERVAL_NAME, interval);
  }

  /** Stop scheduling and wait for an attempt already running. */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    if (this.schedulerRegistry.doesExist('interval', RATE_UPDATER_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(RATE_UPDATER_INTERVAL_NAME);
    }
    this.clearRetry();

    if (this.inFlight) {
      await this.inFlight;
    }
    this.logger.log('Rate updater stopped');
  }

  /**
   * Refresh now, outside the schedule. Failures are recorded and rethrown;
   * the retry schedule is left alone.
   */
  async forceUpdate(): Promise<RefreshResult> {
    try {
      const result = await this.currencyService.refreshRates();
      this.recordSuccess(result);
      return result;
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }
  }

  getStatus(): UpdaterStatus {
    return {
      running: this.running,
      lastUpdate: this.lastUpdate,
      lastError: this.lastError,
      intervalMs: this.config.updater.intervalMs,
      retryCount: this.retryCount,
      nextRetryAt: this.nextRetryAt,
    };
  }

  private trigger(reason: string): Promise<void> {
    if (this.inFlight) {
      this.logger.debug(`Skipping ${reason} refresh: previous attempt still running`);
      return this.inFlight;
    }

    this.inFlight = this.attempt(reason).finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async attempt(reason: string): Promise<void> {
    try {
      const result = await this.currencyService.refreshRates();
      this.recordSuccess(result);
      this.retryCount = 0;
      this.clearRetry();
    } catch (error) {
      this.recordFailure(error);
      this.scheduleRetry(reason);
    }
  }

  private scheduleRetry(reason: string): void {
    if (!this.running) {
      return;
    }

    this.retryCount++;
    const { maxRetries, retryDelayMs } = this.config.updater;

    if (this.retryCount >= maxRetries) {
      this.logger.error(`Rate refresh failed ${this.retryCount} times in a row, waiting for the next interval`);
      this.retryCount = 0;
      this.clearRetry();
      return;
    }

    this.clearRetry();
    this.logger.warn(`Rate refresh (${reason}) failed, retry ${this.retryCount} in ${retryDelayMs}ms`);
    this.nextRetryAt = new Date(Date.now() + retryDelayMs);
    const timeout = setTimeout(() => {
      this.schedulerRegistry.deleteTimeout(RATE_UPDATER_RETRY_TIMEOUT_NAME);
      this.nextRetryAt = null;
      void this.trigger('retry');
    }, retryDelayMs);
    this.schedulerRegistry.addTimeout(RATE_UPDATER_RETRY_TIMEOUT_NAME, timeout);
  }

  private clearRetry(): void {
    if (this.schedulerRegistry.doesExist('timeout', RATE_UPDATER_RETRY_TIMEOUT_NAME)) {
      this.schedulerRegistry.deleteTimeout(RATE_UPDATER_RETRY_TIMEOUT_NAME);
    }
    this.nextRetryAt = null;
  }

  private recordSuccess(result: RefreshResult): void {
    this.lastUpdate = result.fetchedAt;
    this.lastError = null;
    this.metrics.rateRefreshes.inc({ status: 'success' });
    this.metrics.lastSuccessfulRefresh.set(Math.floor(result.fetchedAt.getTime() / 1000));
    this.logger.log(`Refreshed ${result.count} rates for ${result.base} (quote date ${result.date})`);
  }

  private recordFailure(error: unknown): void {
    const cause = toError(error);
    this.lastError = cause.message;
    this.metrics.rateRefreshes.inc({ status: 'failure' });
    this.logger.error(`Rate refresh failed: ${cause.message}`, cause.stack);
  }
}
