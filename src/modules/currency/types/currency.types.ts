/**
 * Shared currency module types.
 */

export interface RequestOptions {
  /** Aborting rejects the caller's wait; shared work keeps running for others. */
  signal?: AbortSignal;
}

/** Cache entry for one direction of a currency pair. */
export interface CachedRate {
  rate: number;
  fetchedAt: Date;
  cachedAt: Date;
}

/** All cached targets of one base currency. */
export interface CachedRateTable {
  base: string;
  rates: Record<string, CachedRate>;
}

export type CacheTier = 'memory' | 'redis';

/**
 * Result of a cache read. A failing Redis tier or an undecodable payload is
 * reported as a miss carrying the error; reads never throw.
 */
export type CacheLookup<T> =
  | { found: true; value: T; tier: CacheTier }
  | { found: false; error?: Error };

export interface SupportedCurrency {
  code: string;
  name: string;
  symbol: string;
  decimalPlaces: number;
}

export interface BulkConvertItem {
  amount: number;
  from: string;
}

export interface ConvertedItem {
  originalAmount: number;
  fromCurrency: string;
  convertedAmount: number;
  rate: number;
}

export interface BulkConvertResult {
  toCurrency: string;
  conversions: ConvertedItem[];
  totalAmount: number;
  rateDate: string;
}

export interface RefreshResult {
  base: string;
  /** Quote date reported by the provider (YYYY-MM-DD) */
  date: string;
  /** Rows written, forward and inverse */
  count: number;
  fetchedAt: Date;
}

export interface HistoricalRates {
  base: string;
  date: string;
  rates: Record<string, number>;
}

export interface UpdaterStatus {
  running: boolean;
  lastUpdate: Date | null;
  lastError: string | null;
  intervalMs: number;
  retryCount: number;
  nextRetryAt: Date | null;
}
