import 'dotenv/config';
import { join } from 'path';
import { DataSource, DataSourceOptions } from 'typeorm';
import { ExchangeRate } from '../modules/currency/entities/exchange-rate.entity';

/** Used by the TypeORM CLI (migration:run / migration:revert). */
export const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  username: process.env.DB_USERNAME || 'fx_rates',
  password: process.env.DB_PASSWORD || 'fx_rates',
  database: process.env.DB_DATABASE || 'fx_rates',
  entities: [ExchangeRate],
  migrations: [join(__dirname, 'migrations', '*{.ts,.js}')],
  logging: process.env.DB_LOGGING === 'true',
};

const dataSource = new DataSource(dataSourceOptions);

export default dataSource;
