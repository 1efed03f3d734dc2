import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import {
  BulkConversionError,
  InvalidRateDateError,
  ProviderUnavailableError,
  RateNotFoundError,
} from '../../../common/exceptions';
import { raceWithSignal, toError } from '../../../common/utils/async.utils';
import { getDateString, isIsoDateString } from '../../../common/utils/date.utils';
import { SingleFlight } from '../../../common/utils/single-flight.util';
import currencyConfig from '../../../config/currency.config';
import {
  EXCHANGE_RATE_STORE,
  ExchangeRateStore,
  NewExchangeRate,
} from '../repositories/exchange-rate-store.interface';
import {
  BulkConvertItem,
  BulkConvertResult,
  CachedRate,
  ConvertedItem,
  HistoricalRates,
  RefreshResult,
  RequestOptions,
  SupportedCurrency,
} from '../types/currency.types';
import { normalizeCurrencyCode, pairKey } from '../utils/currency-code.util';
import { getCurrencyDecimalPlaces, getCurrencySymbol } from '../utils/currency-metadata.util';
import { CurrencyCacheService } from './currency-cache.service';
import { EXCHANGE_RATE_PROVIDER, ExchangeRateProvider, ProviderRates } from './exchange-rate';

/** A resolved rate with the fetch time of the quote it came from; identity legs have none. */
interface ResolvedRate {
  rate: number;
  fetchedAt: Date | null;
}

const IDENTITY: ResolvedRate = { rate: 1, fetchedAt: null };

const REFRESH_FLIGHT = 'refresh';

/** Upstream answers for a well-formed code the provider does not quote */
const UNKNOWN_PAIR_STATUSES: ReadonlySet<number> = new Set([404, 422]);

function isUnknownPairStatus(status: number | undefined): boolean {
  return status !== undefined && UNKNOWN_PAIR_STATUSES.has(status);
}

function olderOf(a: Date | null, b: Date | null): Date | null {
  if (!a) return b;
  if (!b) return a;
  return a <= b ? a : b;
}

/**
 * Currency conversion engine.
 *
 * A rate is resolved from the cache, then the rate store, then as a cross
 * rate through the configured base currency, and finally from the provider.
 * Every successful step populates the cache; a provider fetch is persisted
 * before it is cached.
 */
@Injectable()
export class CurrencyService {
  private readonly logger = new Logger(CurrencyService.name);
  private readonly rateFlights = new SingleFlight<number>();
  private readonly refreshFlights = new SingleFlight<RefreshResult>();

  constructor(
    @Inject(currencyConfig.KEY)
    private readonly config: ConfigType<typeof currencyConfig>,
    private readonly cache: CurrencyCacheService,
    @Inject(EXCHANGE_RATE_STORE)
    private readonly store: ExchangeRateStore,
    @Inject(EXCHANGE_RATE_PROVIDER)
    private readonly provider: ExchangeRateProvider,
  ) {}

  get baseCurrency(): string {
    return this.config.baseCurrency;
  }

  async convert(amount: number, from: string, to: string, options: RequestOptions = {}): Promise<number> {
    const source = normalizeCurrencyCode(from, 'from');
    const target = normalizeCurrencyCode(to, 'to');
    if (source === target) {
      return amount;
    }

    const rate = await this.getRate(source, target, options);
    return amount * rate;
  }

  /**
   * Rate that converts one unit of `from` into `to`. Concurrent calls for
   * the same pair share one resolution; aborting `options.signal` only ends
   * this caller's wait.
   */
  async getRate(from: string, to: string, options: RequestOptions = {}): Promise<number> {
    const source = normalizeCurrencyCode(from, 'from');
    const target = normalizeCurrencyCode(to, 'to');
    if (source === target) {
      return 1;
    }

    options.signal?.throwIfAborted();
    const flight = this.rateFlights.run(pairKey(source, target), () => this.resolveRate(source, target));
    return raceWithSignal(flight, options.signal);
  }

  async getAllRates(base: string, options: RequestOptions = {}): Promise<Record<string, number>> {
    const normalized = normalizeCurrencyCode(base, 'base');

    const cached = await this.cache.getAllRates(normalized);
    if (cached.found) {
      return this.plainRates(cached.value.rates);
    }

    const stored = await this.store.getRatesForBase(normalized);
    if (stored.length > 0) {
      const table: Record<string, CachedRate> = {};
      const now = new Date();
      for (const row of stored) {
        table[row.targetCurrency] = { rate: row.rate, fetchedAt: row.fetchedAt, cachedAt: now };
      }
      await this.cache.setAllRates(normalized, table);
      return this.plainRates(table);
    }

    const response = await this.callProvider(`latest ${normalized}`, () =>
      this.provider.getLatestRates(normalized, options),
    );
    const fetchedAt = new Date();
    const table: Record<string, CachedRate> = {};
    for (const [target, rate] of Object.entries(response.rates)) {
      if (rate > 0) {
        table[target] = { rate, fetchedAt, cachedAt: fetchedAt };
      }
    }
    await this.cache.setAllRates(normalized, table);
    return this.plainRates(table);
  }

  /**
   * Convert every item into `to`, in order. The first item whose rate
   * cannot be resolved fails the whole batch.
   */
  async bulkConvert(items: readonly BulkConvertItem[], to: string, options: RequestOptions = {}): Promise<BulkConvertResult> {
    const target = normalizeCurrencyCode(to, 'to');
    const normalized = items.map((item, index) => ({
      amount: item.amount,
      source: normalizeCurrencyCode(item.from, `items[${index}].from`),
    }));

    const conversions: ConvertedItem[] = [];
    let totalAmount = 0;

    for (const [index, { amount, source }] of normalized.entries()) {
      let rate: number;
      try {
        rate = await this.getRate(source, target, options);
      } catch (error) {
        throw new BulkConversionError(index, source, target, error);
      }

      const convertedAmount = amount * rate;
      totalAmount += convertedAmount;
      conversions.push({ originalAmount: amount, fromCurrency: source, convertedAmount, rate });
    }

    return { toCurrency: target, conversions, totalAmount, rateDate: await this.getRateDate() };
  }

  /**
   * Fetch the base currency's table and write forward and inverse rates to
   * the cache and the store. Overlapping calls share one run.
   */
  refreshRates(): Promise<RefreshResult> {
    return this.refreshFlights.run(REFRESH_FLIGHT, () => this.performRefresh());
  }

  async getSupportedCurrencies(options: RequestOptions = {}): Promise<SupportedCurrency[]> {
    const currencies = await this.callProvider('currencies', () => this.provider.getSupportedCurrencies(options));

    return currencies
      .map(({ code, name }) => ({
        code,
        name,
        symbol: getCurrencySymbol(code),
        decimalPlaces: getCurrencyDecimalPlaces(code),
      }))
      .sort((a, b) => a.code.localeCompare(b.code));
  }

  /**
   * Date (YYYY-MM-DD, UTC) of the newest stored rate; today when the store
   * is empty or unreachable.
   */
  async getRateDate(): Promise<string> {
    try {
      const latest = await this.store.getLatestFetchTime();
      return getDateString(latest ?? new Date());
    } catch (error) {
      this.logger.warn(`Could not read latest rate date, using today: ${toError(error).message}`);
      return getDateString(new Date());
    }
  }

  async getHistoricalRates(date: string, base: string, options: RequestOptions = {}): Promise<HistoricalRates> {
    const normalized = normalizeCurrencyCode(base, 'base');
    if (!isIsoDateString(date)) {
      throw new InvalidRateDateError(date);
    }

    const response = await this.callProvider(`historical ${date} ${normalized}`, () =>
      this.provider.getHistoricalRates(date, normalized, options),
    );
    return { base: response.base, date: response.date, rates: { ...response.rates } };
  }

  private async resolveRate(from: string, to: string): Promise<number> {
    const cached = await this.cache.getRate(from, to);
    if (cached.found) {
      return cached.value.rate;
    }

    const stored = await this.store.getRate(from, to);
    if (stored) {
      await this.cache.setRate(from, to, stored.rate, stored.fetchedAt);
      return stored.rate;
    }

    const cross = await this.calculateCrossRate(from, to);
    if (cross) {
      await this.cache.setRate(from, to, cross.rate, cross.fetchedAt ?? new Date());
      return cross.rate;
    }

    return this.fetchAndStoreRate(from, to);
  }

  /**
   * rate(from, BASE) * rate(BASE, to), each leg from cache, store or the
   * inverse of a stored row.
   */
  private async calculateCrossRate(from: string, to: string): Promise<ResolvedRate | null> {
    const base = this.baseCurrency;

    const fromLeg = from === base ? IDENTITY : await this.resolveLeg(from, base);
    if (!fromLeg) {
      return null;
    }
    const toLeg = to === base ? IDENTITY : await this.resolveLeg(base, to);
    if (!toLeg) {
      return null;
    }

    this.logger.debug(`Derived ${from}/${to} through ${base}`);
    return { rate: fromLeg.rate * toLeg.rate, fetchedAt: olderOf(fromLeg.fetchedAt, toLeg.fetchedAt) };
  }

  private async resolveLeg(from: string, to: string): Promise<ResolvedRate | null> {
    const cached = await this.cache.getRate(from, to);
    if (cached.found) {
      return { rate: cached.value.rate, fetchedAt: cached.value.fetchedAt };
    }

    const stored = await this.store.getRate(from, to);
    if (stored) {
      await this.cache.setRate(from, to, stored.rate, stored.fetchedAt);
      return { rate: stored.rate, fetchedAt: stored.fetchedAt };
    }

    const inverse = await this.store.getRate(to, from);
    if (inverse && inverse.rate !== 0) {
      const rate = 1 / inverse.rate;
      await this.cache.setRate(from, to, rate, inverse.fetchedAt);
      return { rate, fetchedAt: inverse.fetchedAt };
    }

    return null;
  }

  private async fetchAndStoreRate(from: string, to: string): Promise<number> {
    let response: ProviderRates;
    try {
      response = await this.callProvider(`convert ${from}/${to}`, () => this.provider.convert(1, from, to));
    } catch (error) {
      if (error instanceof ProviderUnavailableError && isUnknownPairStatus(error.upstreamStatus)) {
        throw new RateNotFoundError(from, to, { cause: error });
      }
      throw error;
    }

    const rate = response.rates[to];
    if (rate === undefined || !(rate > 0)) {
      throw new RateNotFoundError(from, to);
    }

    const fetchedAt = new Date();
    await this.store.upsertRate({ baseCurrency: from, targetCurrency: to, rate, fetchedAt });
    await this.cache.setRate(from, to, rate, fetchedAt);
    this.logger.log(`Fetched ${from}/${to} from ${this.provider.name}: ${rate}`);
    return rate;
  }

  private async performRefresh(): Promise<RefreshResult> {
    const base = this.baseCurrency;
    this.logger.log(`Refreshing exchange rates for ${base}`);

    const response = await this.callProvider(`latest ${base}`, () => this.provider.getLatestRates(base));
    const fetchedAt = new Date();

    const rows: NewExchangeRate[] = [];
    const table: Record<string, CachedRate> = {};

    for (const [code, rate] of Object.entries(response.rates)) {
      const target = code.toUpperCase();
      if (target === base) {
        continue;
      }
      if (!(rate > 0)) {
        this.logger.warn(`Skipping ${base}/${target}: provider quoted ${rate}`);
        continue;
      }

      rows.push(
        { baseCurrency: base, targetCurrency: target, rate, fetchedAt },
        { baseCurrency: target, targetCurrency: base, rate: 1 / rate, fetchedAt },
      );
      table[target] = { rate, fetchedAt, cachedAt: fetchedAt };
    }

    await Promise.all(
      rows.map((row) => this.cache.setRate(row.baseCurrency, row.targetCurrency, row.rate, row.fetchedAt)),
    );
    await this.cache.setAllRates(base, table);
    await this.store.bulkUpsertRates(rows);

    this.logger.log(`Refreshed ${rows.length} exchange rates for ${base} (quote date ${response.date})`);
    return { base, date: response.date, count: rows.length, fetchedAt };
  }

  private async callProvider<T>(context: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof RateNotFoundError) {
        throw error;
      }
      if (error instanceof ProviderUnavailableError) {
        throw new ProviderUnavailableError(context, error.detail, {
          upstreamStatus: error.upstreamStatus,
          cause: error,
        });
      }
      throw new ProviderUnavailableError(context, toError(error).message, { cause: error });
    }
  }

  private plainRates(table: Record<string, CachedRate>): Record<string, number> {
    const rates: Record<string, number> = {};
    for (const [target, entry] of Object.entries(table)) {
      rates[target] = entry.rate;
    }
    return rates;
  }
}
