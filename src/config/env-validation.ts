import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsIn,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  Min,
  validateSync,
} from 'class-validator';

enum NodeEnv {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

export class EnvironmentVariables {
  @IsEnum(NodeEnv)
  @IsOptional()
  NODE_ENV: NodeEnv = NodeEnv.Development;

  @IsNumber()
  @IsOptional()
  PORT: number = 3000;

  @IsString()
  @IsOptional()
  DB_HOST?: string;

  @IsNumber()
  @IsOptional()
  DB_PORT?: number;

  @IsString()
  @IsOptional()
  DB_USERNAME?: string;

  @IsString()
  @IsOptional()
  DB_PASSWORD?: string;

  @IsString()
  @IsOptional()
  DB_DATABASE?: string;

  @IsString()
  @IsOptional()
  REDIS_URL?: string;

  @IsNumber()
  @Min(1)
  @IsOptional()
  REDIS_COMMAND_TIMEOUT_MS?: number;

  @Matches(/^[A-Za-z]{3}$/, { message: 'CURRENCY_BASE must be a 3-letter ISO 4217 code' })
  @IsOptional()
  CURRENCY_BASE?: string;

  @IsIn(['frankfurter', 'mock'])
  @IsOptional()
  EXCHANGE_RATE_PROVIDER?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  EXCHANGE_RATE_BASE_URL?: string;

  @IsNumber()
  @Min(1)
  @IsOptional()
  EXCHANGE_RATE_TIMEOUT_MS?: number;

  @IsNumber()
  @Min(1000)
  @IsOptional()
  CURRENCY_UPDATE_INTERVAL_MS?: number;

  @IsNumber()
  @Min(1000)
  @IsOptional()
  CURRENCY_RETRY_DELAY_MS?: number;

  @IsNumber()
  @Min(1)
  @IsOptional()
  CURRENCY_MAX_RETRIES?: number;

  @IsIn(['true', 'false'])
  @IsOptional()
  CURRENCY_UPDATER_ENABLED?: string;

  @IsIn(['true', 'false'])
  @IsOptional()
  CURRENCY_PRUNE_ENABLED?: string;

  @IsNumber()
  @Min(1)
  @IsOptional()
  CURRENCY_RETENTION_DAYS?: number;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const isProd = config.NODE_ENV === 'production';

  // Production must not fall back to the development database credentials
  if (isProd && (typeof config.DB_PASSWORD !== 'string' || config.DB_PASSWORD.length === 0)) {
    throw new Error('DB_PASSWORD must be set in production environment');
  }

  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: true,
  });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }

  return validatedConfig;
}
