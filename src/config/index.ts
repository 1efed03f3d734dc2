export { default as currencyConfig } from './currency.config';
export type { CurrencyConfig, ExchangeRateProviderType } from './currency.config';
export { default as databaseConfig } from './database.config';
export { default as redisConfig } from './redis.config';
export { validate } from './env-validation';
