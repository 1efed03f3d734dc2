/**
 * Mock Exchange Rate Provider
 *
 * Serves a fixed EUR-quoted table for local development and demos.
 * Should NOT be used in production - select `frankfurter` instead.
 */
import { Injectable, Logger } from '@nestjs/common';
import { getDateString } from '../../../../common/utils/date.utils';
import { RateNotFoundError } from '../../../../common/exceptions';
import { ExchangeRateProvider, ProviderCurrency, ProviderRates } from './exchange-rate-provider.interface';

/** Approximate EUR reference rates */
const EUR_RATES: Record<string, number> = {
  EUR: 1,
  USD: 1.1,
  GBP: 0.85,
  JPY: 160,
  CHF: 0.95,
  AED: 4.04,
  SAR: 4.125,
};

const CURRENCY_NAMES: Record<string, string> = {
  EUR: 'Euro',
  USD: 'United States Dollar',
  GBP: 'British Pound',
  JPY: 'Japanese Yen',
  CHF: 'Swiss Franc',
  AED: 'UAE Dirham',
  SAR: 'Saudi Riyal',
};

@Injectable()
export class MockExchangeRateService implements ExchangeRateProvider {
  readonly name = 'mock';
  private readonly logger = new Logger(MockExchangeRateService.name);

  async getLatestRates(base: string): Promise<ProviderRates> {
    return this.table(base, Object.keys(EUR_RATES), 1);
  }

  async getLatestRatesForCurrencies(base: string, targets: readonly string[]): Promise<ProviderRates> {
    return this.table(base, targets, 1);
  }

  async getSupportedCurrencies(): Promise<ProviderCurrency[]> {
    return Object.entries(CURRENCY_NAMES).map(([code, name]) => ({ code, name }));
  }

  async convert(amount: number, from: string, to: string): Promise<ProviderRates> {
    return this.table(from, [to], amount);
  }

  async getHistoricalRates(date: string, base: string): Promise<ProviderRates> {
    return { ...this.table(base, Object.keys(EUR_RATES), 1), date };
  }

  private table(base: string, targets: readonly string[], amount: number): ProviderRates {
    const baseRate = EUR_RATES[base];
    if (baseRate === undefined) {
      this.logger.warn(`Unsupported base currency: ${base}`);
      throw new RateNotFoundError(base, targets.join(','));
    }

    const rates: Record<string, number> = {};
    for (const target of targets) {
      const targetRate = EUR_RATES[target];
      if (target !== base && targetRate !== undefined) {
        rates[target] = (amount * targetRate) / baseRate;
      }
    }

    return { amount, base, date: getDateString(new Date()), rates };
  }
}
