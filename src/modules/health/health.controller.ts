import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { HealthCheck, HealthCheckService, TypeOrmHealthIndicator } from '@nestjs/terminus';
import { RateUpdaterHealthIndicator } from './indicators';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly db: TypeOrmHealthIndicator,
    private readonly rateUpdater: RateUpdaterHealthIndicator,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Liveness probe - is the app running?' })
  liveness() {
    return { status: 'ok' };
  }

  @Get('ready')
  @HealthCheck()
  @ApiOperation({ summary: 'Readiness probe - database reachable and rates fresh' })
  readiness() {
    return this.health.check([
      () => this.db.pingCheck('database'),
      () => this.rateUpdater.isHealthy('rate_updater'),
    ]);
  }
}
