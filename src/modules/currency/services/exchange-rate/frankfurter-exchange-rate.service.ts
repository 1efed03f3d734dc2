/**
 * Frankfurter Exchange Rate Provider
 *
 * Reads European Central Bank reference rates from the Frankfurter API.
 * Each request is bounded by the configured timeout and by the caller's
 * AbortSignal, whichever fires first.
 */
import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { IsNumber, IsObject, IsString, Matches, validateSync } from 'class-validator';
import { ProviderUnavailableError } from '../../../../common/exceptions';
import currencyConfig from '../../../../config/currency.config';
import { CurrencyMetrics } from '../../currency.metrics';
import { RequestOptions } from '../../types/currency.types';
import { ExchangeRateProvider, ProviderCurrency, ProviderRates } from './exchange-rate-provider.interface';

/** Longest upstream body excerpt kept in an error message */
const BODY_EXCERPT_LENGTH = 200;

class FrankfurterRatesResponse {
  @IsNumber()
  amount!: number;

  @IsString()
  @Matches(/^[A-Z]{3}$/)
  base!: string;

  @IsString()
  @Matches(/^\d{4}-\d{2}-\d{2}$/)
  date!: string;

  @IsObject()
  rates!: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

@Injectable()
export class FrankfurterExchangeRateService implements ExchangeRateProvider {
  readonly name = 'frankfurter';
  private readonly logger = new Logger(FrankfurterExchangeRateService.name);

  constructor(
    @Inject(currencyConfig.KEY)
    private readonly config: ConfigType<typeof currencyConfig>,
    private readonly metrics: CurrencyMetrics,
  ) {}

  async getLatestRates(base: string, options?: RequestOptions): Promise<ProviderRates> {
    const body = await this.request('latest', '/latest', { from: base }, options);
    return this.decodeRates('latest', body);
  }

  async getLatestRatesForCurrencies(
    base: string,
    targets: readonly string[],
    options?: RequestOptions,
  ): Promise<ProviderRates> {
    const body = await this.request('latest', '/latest', { from: base, to: targets.join(',') }, options);
    return this.decodeRates('latest', body);
  }

  async getSupportedCurrencies(options?: RequestOptions): Promise<ProviderCurrency[]> {
    const body = await this.request('currencies', '/currencies', {}, options);

    if (!isRecord(body)) {
      throw new ProviderUnavailableError('currencies', 'response is not a currency map');
    }

    const currencies: ProviderCurrency[] = [];
    for (const [code, name] of Object.entries(body)) {
      if (typeof name !== 'string') {
        throw new ProviderUnavailableError('currencies', `name of ${code} is not a string`);
      }
      currencies.push({ code, name });
    }
    return currencies;
  }

  async convert(amount: number, from: string, to: string, options?: RequestOptions): Promise<ProviderRates> {
    const body = await this.request('convert', '/latest', { amount: String(amount), from, to }, options);
    return this.decodeRates('convert', body);
  }

  async getHistoricalRates(date: string, base: string, options?: RequestOptions): Promise<ProviderRates> {
    const body = await this.request('historical', `/${encodeURIComponent(date)}`, { from: base }, options);
    return this.decodeRates('historical', body);
  }

  private buildUrl(path: string, query: Record<string, string>): URL {
    const url = new URL(`${this.config.provider.baseUrl.replace(/\/+$/, '')}${path}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  private async request(
    operation: string,
    path: string,
    query: Record<string, string>,
    options: RequestOptions = {},
  ): Promise<unknown> {
    const url = this.buildUrl(path, query);
    const { timeoutMs } = this.config.provider;
    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(new Error(`request timed out after ${timeoutMs}ms`)),
      timeoutMs,
    );
    const onCallerAbort = (): void => controller.abort(options.signal?.reason);

    if (options.signal?.aborted) {
      onCallerAbort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: { Accept: 'application/json' },
      });

      if (!response.ok) {
        const excerpt = (await response.text().catch((): string => '')).slice(0, BODY_EXCERPT_LENGTH);
        throw new ProviderUnavailableError(operation, `HTTP ${response.status} ${excerpt}`.trim(), {
          upstreamStatus: response.status,
        });
      }

      try {
        const body: unknown = await response.json();
        this.metrics.providerRequests.inc({ provider: this.name, operation, outcome: 'success' });
        return body;
      } catch (error) {
        throw new ProviderUnavailableError(operation, `invalid JSON body: ${describeError(error)}`, {
          upstreamStatus: response.status,
          cause: error,
        });
      }
    } catch (error) {
      this.metrics.providerRequests.inc({ provider: this.name, operation, outcome: 'failure' });
      const failure =
        error instanceof ProviderUnavailableError
          ? error
          : new ProviderUnavailableError(operation, describeError(controller.signal.reason ?? error), {
              cause: error,
            });
      this.logger.warn(`${operation} request to ${url.pathname} failed: ${failure.message}`);
      throw failure;
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private decodeRates(operation: string, body: unknown): ProviderRates {
    if (!isRecord(body)) {
      throw new ProviderUnavailableError(operation, 'response is not a JSON object');
    }

    const decoded = plainToInstance(FrankfurterRatesResponse, body);
    const errors = validateSync(decoded);
    if (errors.length > 0) {
      const properties = errors.map((error) => error.property).join(', ');
      throw new ProviderUnavailableError(operation, `unexpected response shape (${properties})`);
    }

    const rates: Record<string, number> = {};
    for (const [code, rate] of Object.entries(decoded.rates)) {
      if (typeof rate !== 'number' || !Number.isFinite(rate)) {
        throw new ProviderUnavailableError(operation, `rate for ${code} is not a number`);
      }
      rates[code] = rate;
    }

    return { amount: decoded.amount, base: decoded.base, date: decoded.date, rates };
  }
}
