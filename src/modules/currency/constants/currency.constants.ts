/**
 * Redis keys and scheduler names used by the currency module.
 */

/** `currency:rate:{base}:{target}` holds one CachedRate */
export const RATE_CACHE_KEY_PREFIX = 'currency:rate:';

/** Aggregate table for the most recently cached base */
export const ALL_RATES_CACHE_KEY = 'currency:rates:all';

/** Reserved for the supported currency list; cleared with the rest */
export const SUPPORTED_CURRENCIES_CACHE_KEY = 'currency:supported';

/** Only a handful of bases are ever requested as aggregates */
export const MAX_CACHED_RATE_TABLES = 32;

export const RATE_UPDATER_INTERVAL_NAME = 'currency-rate-updater';
export const RATE_UPDATER_RETRY_TIMEOUT_NAME = 'currency-rate-updater-retry';

export const CACHE_SWEEP_INTERVAL_MS = 60 * 1000;

/** Rows per INSERT ... ON CONFLICT statement */
export const UPSERT_BATCH_SIZE = 100;

export function rateCacheKey(base: string, target: string): string {
  return `${RATE_CACHE_KEY_PREFIX}${base}:${target}`;
}
