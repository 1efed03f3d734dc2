import { HealthCheckService, HealthIndicatorFunction, TypeOrmHealthIndicator } from '@nestjs/terminus';
import { Test, TestingModule } from '@nestjs/testing';
import { HealthController } from './health.controller';
import { RateUpdaterHealthIndicator } from './indicators';

describe('HealthController', () => {
  let controller: HealthController;

  const healthCheckService = {
    check: jest.fn((checks: HealthIndicatorFunction[]) =>
      Promise.all(checks.map((check) => check())).then(() => ({ status: 'ok' })),
    ),
  };
  const db = { pingCheck: jest.fn().mockResolvedValue({ database: { status: 'up' } }) };
  const rateUpdater = { isHealthy: jest.fn().mockReturnValue({ rate_updater: { status: 'up' } }) };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: HealthCheckService, useValue: healthCheckService },
        { provide: TypeOrmHealthIndicator, useValue: db },
        { provide: RateUpdaterHealthIndicator, useValue: rateUpdater },
      ],
    }).compile();

    controller = module.get<HealthController>(HealthController);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('liveness', () => {
    it('should return status ok', () => {
      expect(controller.liveness()).toEqual({ status: 'ok' });
    });
  });

  describe('readiness', () => {
    it('should ping the database and check the rate updater', async () => {
      await expect(controller.readiness()).resolves.toEqual({ status: 'ok' });

      expect(db.pingCheck).toHaveBeenCalledWith('database');
      expect(rateUpdater.isHealthy).toHaveBeenCalledWith('rate_updater');
    });
  });
});
