import type {
  ExchangeRateStore,
  NewExchangeRate,
  StoredExchangeRate,
} from '../../src/modules/currency/repositories/exchange-rate-store.interface';

/**
 * Map-backed ExchangeRateStore with the repository's upsert and soft-delete
 * semantics. Wrap methods with jest.spyOn to count calls or inject failures.
 */
export class InMemoryExchangeRateStore implements ExchangeRateStore {
  private readonly rows = new Map<string, StoredExchangeRate & { deletedAt: Date | null }>();
  private nextId = 1;

  async getRate(base: string, target: string): Promise<StoredExchangeRate | null> {
    const row = this.rows.get(this.key(base, target));
    return row && row.deletedAt === null ? row : null;
  }

  async getRatesForBase(base: string): Promise<StoredExchangeRate[]> {
    return this.live()
      .filter((row) => row.baseCurrency === base)
      .sort((a, b) => a.targetCurrency.localeCompare(b.targetCurrency));
  }

  async getAllRates(): Promise<StoredExchangeRate[]> {
    return this.live().sort(
      (a, b) => a.baseCurrency.localeCompare(b.baseCurrency) || a.targetCurrency.localeCompare(b.targetCurrency),
    );
  }

  async upsertRate(rate: NewExchangeRate): Promise<void> {
    const key = this.key(rate.baseCurrency, rate.targetCurrency);
    const now = new Date();
    const existing = this.rows.get(key);
    this.rows.set(key, {
      id: existing?.id ?? `rate-${this.nextId++}`,
      baseCurrency: rate.baseCurrency,
      targetCurrency: rate.targetCurrency,
      rate: rate.rate,
      fetchedAt: rate.fetchedAt,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
      deletedAt: null,
    });
  }

  async bulkUpsertRates(rates: NewExchangeRate[]): Promise<void> {
    for (const rate of rates) {
      await this.upsertRate(rate);
    }
  }

  async deleteOldRates(olderThan: Date): Promise<number> {
    let affected = 0;
    for (const row of this.live()) {
      if (row.fetchedAt < olderThan) {
        row.deletedAt = new Date();
        affected++;
      }
    }
    return affected;
  }

  async getLatestFetchTime(): Promise<Date | null> {
    let latest: Date | null = null;
    for (const row of this.live()) {
      if (!latest || row.fetchedAt > latest) {
        latest = row.fetchedAt;
      }
    }
    return latest;
  }

  /** Live and soft-deleted rows */
  get size(): number {
    return this.rows.size;
  }

  private live(): (StoredExchangeRate & { deletedAt: Date | null })[] {
    return [...this.rows.values()].filter((row) => row.deletedAt === null);
  }

  private key(base: string, target: string): string {
    return `${base}:${target}`;
  }
}
