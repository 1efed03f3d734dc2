import { Test, TestingModule } from '@nestjs/testing';
import { ProviderUnavailableError } from '../../../common/exceptions';
import { CurrencyService } from '../services/currency.service';
import { RateUpdaterService } from '../services/rate-updater.service';
import { CurrencyController } from './currency.controller';

describe('CurrencyController', () => {
  let controller: CurrencyController;
  const signal = new AbortController().signal;
  const fetchedAt = new Date('2024-03-15T16:00:00.000Z');

  const currencyService = {
    baseCurrency: 'EUR',
    convert: jest.fn(),
    getRate: jest.fn(),
    getAllRates: jest.fn(),
    bulkConvert: jest.fn(),
    getSupportedCurrencies: jest.fn(),
    getHistoricalRates: jest.fn(),
    getRateDate: jest.fn(),
  };
  const rateUpdater = {
    forceUpdate: jest.fn(),
    getStatus: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    currencyService.getRateDate.mockResolvedValue('2024-03-15');

    const module: TestingModule = await Test.createTestingModule({
      controllers: [CurrencyController],
      providers: [
        { provide: CurrencyService, useValue: currencyService },
        { provide: RateUpdaterService, useValue: rateUpdater },
      ],
    }).compile();

    controller = module.get<CurrencyController>(CurrencyController);
  });

  describe('convert', () => {
    it('should return the converted amount with the rate and its date', async () => {
      currencyService.convert.mockResolvedValue(92);
      currencyService.getRate.mockResolvedValue(0.92);

      const response = await controller.convert({ amount: 100, from: 'USD', to: 'EUR' }, signal);

      expect(response).toEqual({
        success: true,
        originalAmount: 100,
        convertedAmount: 92,
        fromCurrency: 'USD',
        toCurrency: 'EUR',
        rate: 0.92,
        rateDate: '2024-03-15',
      });
      expect(currencyService.convert).toHaveBeenCalledWith(100, 'USD', 'EUR', { signal });
    });
  });

  describe('bulkConvert', () => {
    it('should pass the items through to the engine', async () => {
      const result = {
        toCurrency: 'GBP',
        conversions: [{ originalAmount: 100, fromCurrency: 'USD', convertedAmount: 79, rate: 0.79 }],
        totalAmount: 79,
        rateDate: '2024-03-15',
      };
      currencyService.bulkConvert.mockResolvedValue(result);
      const items = [{ amount: 100, from: 'USD' }];

      await expect(controller.bulkConvert({ items, to: 'GBP' }, signal)).resolves.toEqual({
        success: true,
        ...result,
      });
      expect(currencyService.bulkConvert).toHaveBeenCalledWith(items, 'GBP', { signal });
    });
  });

  describe('getRates', () => {
    it('should default to the configured base currency', async () => {
      currencyService.getAllRates.mockResolvedValue({ USD: 1.1 });

      await expect(controller.getRates({}, signal)).resolves.toEqual({
        success: true,
        base: 'EUR',
        date: '2024-03-15',
        rates: { USD: 1.1 },
      });
      expect(currencyService.getAllRates).toHaveBeenCalledWith('EUR', { signal });
    });

    it('should use the requested base', async () => {
      currencyService.getAllRates.mockResolvedValue({ EUR: 0.92 });

      await controller.getRates({ base: 'USD' }, signal);

      expect(currencyService.getAllRates).toHaveBeenCalledWith('USD', { signal });
    });
  });

  describe('getRate', () => {
    it('should return the pair and its rate', async () => {
      currencyService.getRate.mockResolvedValue(160);

      await expect(controller.getRate({ from: 'EUR', to: 'JPY' }, signal)).resolves.toEqual({
        success: true,
        fromCurrency: 'EUR',
        toCurrency: 'JPY',
        rate: 160,
        date: '2024-03-15',
      });
    });

    it('should let engine errors reach the exception filter', async () => {
      currencyService.getRate.mockRejectedValue(new ProviderUnavailableError('convert EUR/JPY', 'timeout'));

      await expect(controller.getRate({ from: 'EUR', to: 'JPY' }, signal)).rejects.toBeInstanceOf(
        ProviderUnavailableError,
      );
    });
  });

  describe('getSupportedCurrencies', () => {
    it('should wrap the list', async () => {
      const currencies = [{ code: 'EUR', name: 'Euro', symbol: '€', decimalPlaces: 2 }];
      currencyService.getSupportedCurrencies.mockResolvedValue(currencies);

      await expect(controller.getSupportedCurrencies(signal)).resolves.toEqual({ success: true, currencies });
    });
  });

  describe('getHistoricalRates', () => {
    it('should default the base and forward the date', async () => {
      currencyService.getHistoricalRates.mockResolvedValue({ base: 'EUR', date: '2024-01-02', rates: { USD: 1.09 } });

      await expect(controller.getHistoricalRates({ date: '2024-01-02' }, signal)).resolves.toEqual({
        success: true,
        base: 'EUR',
        date: '2024-01-02',
        rates: { USD: 1.09 },
      });
      expect(currencyService.getHistoricalRates).toHaveBeenCalledWith('2024-01-02', 'EUR', { signal });
    });
  });

  describe('refresh', () => {
    it('should force an update', async () => {
      rateUpdater.forceUpdate.mockResolvedValue({ base: 'EUR', date: '2024-03-15', count: 60, fetchedAt });

      await expect(controller.refresh()).resolves.toEqual({
        success: true,
        message: 'Exchange rates refreshed successfully',
        base: 'EUR',
        date: '2024-03-15',
        count: 60,
        fetchedAt,
      });
    });
  });

  describe('getStatus', () => {
    it('should report the updater status', () => {
      const status = {
        running: true,
        lastUpdate: fetchedAt,
        lastError: null,
        intervalMs: 3_600_000,
        retryCount: 0,
        nextRetryAt: null,
      };
      rateUpdater.getStatus.mockReturnValue(status);

      expect(controller.getStatus()).toEqual({ success: true, status });
    });
  });
});
