import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, LessThan, Repository } from 'typeorm';
import { PersistenceFailureError } from '../../../common/exceptions';
import { chunk } from '../../../common/utils/async.utils';
import { UPSERT_BATCH_SIZE } from '../constants/currency.constants';
import { ExchangeRate } from '../entities/exchange-rate.entity';
import { ExchangeRateStore, NewExchangeRate } from './exchange-rate-store.interface';

/** Columns refreshed when a pair already exists (clearing deleted_at revives pruned rows) */
const UPSERT_OVERWRITE_COLUMNS = ['rate', 'fetched_at', 'updated_at', 'deleted_at'];
const UPSERT_CONFLICT_COLUMNS = ['base_currency', 'target_currency'];

@Injectable()
export class ExchangeRateRepository implements ExchangeRateStore {
  constructor(
    @InjectRepository(ExchangeRate)
    private readonly repository: Repository<ExchangeRate>,
  ) {}

  getRate(base: string, target: string): Promise<ExchangeRate | null> {
    return this.run('getRate', `${base}/${target}`, () =>
      this.repository.findOne({ where: { baseCurrency: base, targetCurrency: target } }),
    );
  }

  getRatesForBase(base: string): Promise<ExchangeRate[]> {
    return this.run('getRatesForBase', base, () =>
      this.repository.find({ where: { baseCurrency: base }, order: { targetCurrency: 'ASC' } }),
    );
  }

  getAllRates(): Promise<ExchangeRate[]> {
    return this.run('getAllRates', 'all pairs', () =>
      this.repository.find({ order: { baseCurrency: 'ASC', targetCurrency: 'ASC' } }),
    );
  }

  async upsertRate(rate: NewExchangeRate): Promise<void> {
    await this.run('upsertRate', `${rate.baseCurrency}/${rate.targetCurrency}`, () =>
      this.upsert(this.repository.manager, [rate]),
    );
  }

  async bulkUpsertRates(rates: NewExchangeRate[]): Promise<void> {
    if (rates.length === 0) {
      return;
    }

    await this.run('bulkUpsertRates', `${rates.length} rates`, () =>
      this.repository.manager.transaction(async (manager) => {
        for (const batch of chunk(rates, UPSERT_BATCH_SIZE)) {
          await this.upsert(manager, batch);
        }
      }),
    );
  }

  async deleteOldRates(olderThan: Date): Promise<number> {
    const result = await this.run('deleteOldRates', `rates fetched before ${olderThan.toISOString()}`, () =>
      this.repository.softDelete({ fetchedAt: LessThan(olderThan) }),
    );
    return result.affected ?? 0;
  }

  async getLatestFetchTime(): Promise<Date | null> {
    const [latest] = await this.run('getLatestFetchTime', 'all pairs', () =>
      this.repository.find({ order: { fetchedAt: 'DESC' }, take: 1 }),
    );
    return latest?.fetchedAt ?? null;
  }

  private async upsert(manager: EntityManager, rates: NewExchangeRate[]): Promise<void> {
    const updatedAt = new Date();
    await manager
      .createQueryBuilder()
      .insert()
      .into(ExchangeRate)
      .values(
        rates.map((rate) => ({
          baseCurrency: rate.baseCurrency,
          targetCurrency: rate.targetCurrency,
          rate: rate.rate,
          fetchedAt: rate.fetchedAt,
          updatedAt,
          deletedAt: null,
        })),
      )
      .orUpdate(UPSERT_OVERWRITE_COLUMNS, UPSERT_CONFLICT_COLUMNS)
      .execute();
  }

  private async run<T>(operation: string, subject: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new PersistenceFailureError(operation, subject, error);
    }
  }
}
