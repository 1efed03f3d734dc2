import { registerAs } from '@nestjs/config';

export default registerAs('database', () => ({
  type: 'postgres' as const,
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  username: process.env.DB_USERNAME || 'fx_rates',
  password: process.env.DB_PASSWORD || 'fx_rates',
  database: process.env.DB_DATABASE || 'fx_rates',
  synchronize: process.env.DB_SYNCHRONIZE === 'true',
  migrationsRun: process.env.DB_MIGRATIONS_RUN === 'true',
  autoLoadEntities: true,
  logging: process.env.NODE_ENV === 'development',
}));
