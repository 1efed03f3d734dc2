/**
 * Durable rate storage used by the conversion engine.
 *
 * Implementations wrap every backend failure in `PersistenceFailureError`.
 * Soft-deleted rows are invisible to reads and revived by a later upsert of
 * the same pair.
 */
export interface NewExchangeRate {
  baseCurrency: string;
  targetCurrency: string;
  rate: number;
  fetchedAt: Date;
}

export interface StoredExchangeRate extends NewExchangeRate {
  id: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface ExchangeRateStore {
  getRate(base: string, target: string): Promise<StoredExchangeRate | null>;

  /** Ordered by target currency */
  getRatesForBase(base: string): Promise<StoredExchangeRate[]>;

  /** Ordered by base, then target currency */
  getAllRates(): Promise<StoredExchangeRate[]>;

  upsertRate(rate: NewExchangeRate): Promise<void>;

  /** All rows or none */
  bulkUpsertRates(rates: NewExchangeRate[]): Promise<void>;

  /** Soft-deletes rows last fetched before `olderThan`; returns the affected count */
  deleteOldRates(olderThan: Date): Promise<number>;

  getLatestFetchTime(): Promise<Date | null>;
}

export const EXCHANGE_RATE_STORE = Symbol('EXCHANGE_RATE_STORE');
