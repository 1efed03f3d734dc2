import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { FindOperator, Repository } from 'typeorm';
import { PersistenceFailureError } from '../../../common/exceptions';
import { ExchangeRate } from '../entities/exchange-rate.entity';
import { NewExchangeRate } from './exchange-rate-store.interface';
import { ExchangeRateRepository } from './exchange-rate.repository';

describe('ExchangeRateRepository', () => {
  let repository: ExchangeRateRepository;
  let queryBuilder: {
    insert: jest.Mock;
    into: jest.Mock;
    values: jest.Mock;
    orUpdate: jest.Mock;
    execute: jest.Mock;
  };
  let manager: { createQueryBuilder: jest.Mock; transaction: jest.Mock };
  let mockTypeOrmRepository: {
    find: jest.Mock;
    findOne: jest.Mock;
    softDelete: jest.Mock;
    manager: typeof manager;
  };

  const fetchedAt = new Date('2024-03-15T16:00:00.000Z');

  const buildRates = (count: number): NewExchangeRate[] =>
    Array.from({ length: count }, (_, i) => ({
      baseCurrency: 'EUR',
      targetCurrency: `C${String(i).padStart(2, '0')}`,
      rate: i + 1,
      fetchedAt,
    }));

  beforeEach(async () => {
    queryBuilder = {
      insert: jest.fn().mockReturnThis(),
      into: jest.fn().mockReturnThis(),
      values: jest.fn().mockReturnThis(),
      orUpdate: jest.fn().mockReturnThis(),
      execute: jest.fn().mockResolvedValue({ identifiers: [] }),
    };
    manager = {
      createQueryBuilder: jest.fn(() => queryBuilder),
      transaction: jest.fn(),
    };
    manager.transaction.mockImplementation((work: (m: typeof manager) => Promise<void>) => work(manager));
    mockTypeOrmRepository = {
      find: jest.fn(),
      findOne: jest.fn(),
      softDelete: jest.fn(),
      manager,
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ExchangeRateRepository,
        {
          provide: getRepositoryToken(ExchangeRate),
          useValue: mockTypeOrmRepository as unknown as Repository<ExchangeRate>,
        },
      ],
    }).compile();

    repository = module.get<ExchangeRateRepository>(ExchangeRateRepository);
  });

  describe('getRate', () => {
    it('should look up the pair', async () => {
      const row = { baseCurrency: 'USD', targetCurrency: 'EUR', rate: 0.92 };
      mockTypeOrmRepository.findOne.mockResolvedValue(row);

      await expect(repository.getRate('USD', 'EUR')).resolves.toBe(row);
      expect(mockTypeOrmRepository.findOne).toHaveBeenCalledWith({
        where: { baseCurrency: 'USD', targetCurrency: 'EUR' },
      });
    });

    it('should return null for an unknown pair', async () => {
      mockTypeOrmRepository.findOne.mockResolvedValue(null);

      await expect(repository.getRate('USD', 'XYZ')).resolves.toBeNull();
    });

    it('should wrap driver failures with the operation and pair', async () => {
      mockTypeOrmRepository.findOne.mockRejectedValue(new Error('connection refused'));

      const promise = repository.getRate('USD', 'EUR');

      await expect(promise).rejects.toBeInstanceOf(PersistenceFailureError);
      await expect(promise).rejects.toThrow('Rate store getRate failed for USD/EUR: connection refused');
    });
  });

  describe('reads', () => {
    it('should order rates for a base by target', async () => {
      mockTypeOrmRepository.find.mockResolvedValue([]);

      await repository.getRatesForBase('EUR');

      expect(mockTypeOrmRepository.find).toHaveBeenCalledWith({
        where: { baseCurrency: 'EUR' },
        order: { targetCurrency: 'ASC' },
      });
    });

    it('should order all rates by base and target', async () => {
      mockTypeOrmRepository.find.mockResolvedValue([]);

      await repository.getAllRates();

      expect(mockTypeOrmRepository.find).toHaveBeenCalledWith({
        order: { baseCurrency: 'ASC', targetCurrency: 'ASC' },
      });
    });
  });

  describe('upsertRate', () => {
    it('should insert with conflict update on the pair', async () => {
      await repository.upsertRate({ baseCurrency: 'USD', targetCurrency: 'JPY', rate: 149.5, fetchedAt });

      expect(queryBuilder.into).toHaveBeenCalledWith(ExchangeRate);
      expect(queryBuilder.values).toHaveBeenCalledWith([
        {
          baseCurrency: 'USD',
          targetCurrency: 'JPY',
          rate: 149.5,
          fetchedAt,
          updatedAt: expect.any(Date),
          deletedAt: null,
        },
      ]);
      expect(queryBuilder.orUpdate).toHaveBeenCalledWith(
        ['rate', 'fetched_at', 'updated_at', 'deleted_at'],
        ['base_currency', 'target_currency'],
      );
      expect(manager.transaction).not.toHaveBeenCalled();
    });

    it('should wrap insert failures', async () => {
      queryBuilder.execute.mockRejectedValue(new Error('deadlock detected'));

      await expect(
        repository.upsertRate({ baseCurrency: 'USD', targetCurrency: 'JPY', rate: 149.5, fetchedAt }),
      ).rejects.toThrow('Rate store upsertRate failed for USD/JPY: deadlock detected');
    });
  });

  describe('bulkUpsertRates', () => {
    it('should write batches of 100 rows inside one transaction', async () => {
      await repository.bulkUpsertRates(buildRates(250));

      expect(manager.transaction).toHaveBeenCalledTimes(1);
      expect(queryBuilder.execute).toHaveBeenCalledTimes(3);
      const batchSizes = queryBuilder.values.mock.calls.map((call: unknown[]) =>
        Array.isArray(call[0]) ? call[0].length : 0,
      );
      expect(batchSizes).toEqual([100, 100, 50]);
    });

    it('should skip the transaction for an empty list', async () => {
      await repository.bulkUpsertRates([]);

      expect(manager.transaction).not.toHaveBeenCalled();
    });

    it('should surface a failed batch as PersistenceFailureError', async () => {
      queryBuilder.execute.mockResolvedValueOnce({}).mockRejectedValueOnce(new Error('disk full'));

      await expect(repository.bulkUpsertRates(buildRates(150))).rejects.toThrow(
        'Rate store bulkUpsertRates failed for 150 rates: disk full',
      );
    });
  });

  describe('deleteOldRates', () => {
    it('should soft delete by fetch time and return the affected count', async () => {
      mockTypeOrmRepository.softDelete.mockResolvedValue({ affected: 7, raw: [], generatedMaps: [] });
      const cutoff = new Date('2024-02-14T03:00:00.000Z');

      await expect(repository.deleteOldRates(cutoff)).resolves.toBe(7);

      const [criteria] = mockTypeOrmRepository.softDelete.mock.calls[0] as [{ fetchedAt: FindOperator<Date> }];
      expect(criteria.fetchedAt.type).toBe('lessThan');
      expect(criteria.fetchedAt.value).toBe(cutoff);
    });

    it('should report zero when the driver returns no count', async () => {
      mockTypeOrmRepository.softDelete.mockResolvedValue({ raw: [], generatedMaps: [] });

      await expect(repository.deleteOldRates(new Date())).resolves.toBe(0);
    });
  });

  describe('getLatestFetchTime', () => {
    it('should return the newest fetchedAt', async () => {
      mockTypeOrmRepository.find.mockResolvedValue([{ fetchedAt }]);

      await expect(repository.getLatestFetchTime()).resolves.toBe(fetchedAt);
      expect(mockTypeOrmRepository.find).toHaveBeenCalledWith({ order: { fetchedAt: 'DESC' }, take: 1 });
    });

    it('should return null for an empty store', async () => {
      mockTypeOrmRepository.find.mockResolvedValue([]);

      await expect(repository.getLatestFetchTime()).resolves.toBeNull();
    });
  });
});
