/**
 * ExchangeRateTransformer
 *
 * TypeORM value transformer for `decimal(20,10)` rate columns. PostgreSQL
 * returns numeric columns as strings; rates are handled as numbers in the
 * application and written back through Decimal.js so the stored scale is
 * fixed at 10 places.
 *
 * @see https://typeorm.io/entities#column-options - transformer option
 */
import Decimal from 'decimal.js';
import { ValueTransformer } from 'typeorm';

/** Exclusive upper bound imposed by decimal(20,10) */
const MAX_EXCHANGE_RATE = 10_000_000_000;

export const RATE_SCALE = 10;

export const ExchangeRateTransformer: ValueTransformer = {
  to(value: number | null | undefined): string | null {
    if (value === null || value === undefined) {
      return null;
    }

    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new Error(`Invalid exchange rate value: ${value}. Expected a finite number.`);
    }

    if (value <= 0 || value >= MAX_EXCHANGE_RATE) {
      throw new Error(`Exchange rate ${value} out of range (0, ${MAX_EXCHANGE_RATE})`);
    }

    return new Decimal(value).toFixed(RATE_SCALE);
  },

  from(value: string | number | null | undefined): number | null {
    if (value === null || value === undefined) {
      return null;
    }

    const num = typeof value === 'number' ? value : new Decimal(value).toNumber();

    // A corrupt rate must fail loudly; a 1:1 default would convert silently wrong
    if (!Number.isFinite(num)) {
      throw new Error(`Stored exchange rate "${value}" is not a finite number`);
    }

    return num;
  },
};
