import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { toError } from '../../../common/utils/async.utils';
import { subtractDays } from '../../../common/utils/date.utils';
import currencyConfig from '../../../config/currency.config';
import { EXCHANGE_RATE_STORE, ExchangeRateStore } from '../repositories/exchange-rate-store.interface';

@Injectable()
export class RatePruningCron {
  private readonly logger = new Logger(RatePruningCron.name);

  constructor(
    @Inject(currencyConfig.KEY)
    private readonly config: ConfigType<typeof currencyConfig>,
    @Inject(EXCHANGE_RATE_STORE)
    private readonly store: ExchangeRateStore,
  ) {}

  /**
   * Soft-delete rates not refreshed within the retention window.
   * Runs daily at 03:00.
   */
  @Cron(CronExpression.EVERY_DAY_AT_3AM, { name: 'currency-rate-pruning' })
  async pruneOldRates(): Promise<number> {
    const { enabled, retentionDays } = this.config.pruning;
    if (!enabled) {
      this.logger.debug('Skipping rate pruning: disabled');
      return 0;
    }

    const cutoff = subtractDays(new Date(), retentionDays);
    try {
      const removed = await this.store.deleteOldRates(cutoff);
      this.logger.log(`Pruned ${removed} exchange rates fetched before ${cutoff.toISOString()}`);
      return removed;
    } catch (error) {
      const cause = toError(error);
      this.logger.error(`Rate pruning failed: ${cause.message}`, cause.stack);
      return 0;
    }
  }
}
