/**
 * Exchange Rate Provider Interface
 *
 * Contract for upstream rate sources. Implementations are stateless and do
 * not retry; any transport, HTTP or decoding failure surfaces as
 * `ProviderUnavailableError`.
 *
 * @example
 * ```typescript
 * const { rates } = await this.provider.getLatestRates('EUR', { signal });
 * const usd = rates['USD'];
 * ```
 */
import { RequestOptions } from '../../types/currency.types';

/** Quote table as returned by the provider: `amount` units of `base` buy `rates[target]`. */
export interface ProviderRates {
  amount: number;
  base: string;
  /** Quote date (YYYY-MM-DD) */
  date: string;
  rates: Record<string, number>;
}

export interface ProviderCurrency {
  code: string;
  name: string;
}

export interface ExchangeRateProvider {
  /** Short name used in logs and metrics */
  readonly name: string;

  getLatestRates(base: string, options?: RequestOptions): Promise<ProviderRates>;

  getLatestRatesForCurrencies(
    base: string,
    targets: readonly string[],
    options?: RequestOptions,
  ): Promise<ProviderRates>;

  getSupportedCurrencies(options?: RequestOptions): Promise<ProviderCurrency[]>;

  /** `rates[to]` holds `amount` converted into `to` */
  convert(amount: number, from: string, to: string, options?: RequestOptions): Promise<ProviderRates>;

  getHistoricalRates(date: string, base: string, options?: RequestOptions): Promise<ProviderRates>;
}

/**
 * Injection token for the active exchange rate provider
 */
export const EXCHANGE_RATE_PROVIDER = Symbol('EXCHANGE_RATE_PROVIDER');
