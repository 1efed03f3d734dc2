import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { Interval } from '@nestjs/schedule';
import type Redis from 'ioredis';
import { LRUCache } from 'lru-cache';
import { REDIS_CLIENT } from '../../../common/redis/redis.constants';
import { toError } from '../../../common/utils/async.utils';
import currencyConfig from '../../../config/currency.config';
import {
  ALL_RATES_CACHE_KEY,
  CACHE_SWEEP_INTERVAL_MS,
  MAX_CACHED_RATE_TABLES,
  RATE_CACHE_KEY_PREFIX,
  SUPPORTED_CURRENCIES_CACHE_KEY,
  rateCacheKey,
} from '../constants/currency.constants';
import { CurrencyMetrics } from '../currency.metrics';
import { CacheLookup, CacheTier, CachedRate, CachedRateTable } from '../types/currency.types';

/** COUNT hint per SCAN page; each page is deleted before the next is read */
const SCAN_BATCH_SIZE = 500;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function reviveDate(value: unknown): Date | null {
  if (typeof value !== 'string') {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function decodeCachedRate(value: unknown): CachedRate | null {
  if (!isRecord(value) || typeof value.rate !== 'number' || !(value.rate > 0)) {
    return null;
  }
  const fetchedAt = reviveDate(value.fetchedAt);
  const cachedAt = reviveDate(value.cachedAt);
  if (!fetchedAt || !cachedAt) {
    return null;
  }
  return { rate: value.rate, fetchedAt, cachedAt };
}

function decodeRateTable(value: unknown): CachedRateTable | null {
  if (!isRecord(value) || typeof value.base !== 'string' || !isRecord(value.rates)) {
    return null;
  }
  const rates: Record<string, CachedRate> = {};
  for (const [target, entry] of Object.entries(value.rates)) {
    const decoded = decodeCachedRate(entry);
    if (!decoded) {
      return null;
    }
    rates[target] = decoded;
  }
  return { base: value.base, rates };
}

/**
 * Two-tier rate cache.
 *
 * The memory tier is a per-process LRU with a short TTL. The Redis tier is
 * shared between instances and outlives restarts; it is optional and every
 * failure in it degrades to a miss. Neither tier is authoritative: the rate
 * store is.
 */
@Injectable()
export class CurrencyCacheService {
  private readonly logger = new Logger(CurrencyCacheService.name);
  private readonly rates: LRUCache<string, CachedRate>;
  private readonly tables: LRUCache<string, CachedRateTable>;

  constructor(
    @Inject(currencyConfig.KEY)
    private readonly config: ConfigType<typeof currencyConfig>,
    @Inject(REDIS_CLIENT)
    private readonly redis: Redis | null,
    private readonly metrics: CurrencyMetrics,
  ) {
    this.rates = new LRUCache<string, CachedRate>({
      max: config.cache.memoryMaxEntries,
      ttl: config.cache.memoryTtlMs,
      updateAgeOnGet: false,
    });
    this.tables = new LRUCache<string, CachedRateTable>({
      max: MAX_CACHED_RATE_TABLES,
      ttl: config.cache.memoryTtlMs,
      updateAgeOnGet: false,
    });
  }

  async getRate(base: string, target: string): Promise<CacheLookup<CachedRate>> {
    const key = rateCacheKey(base, target);

    const local = this.rates.get(key);
    if (local) {
      this.record('memory', 'hit');
      return { found: true, value: local, tier: 'memory' };
    }
    this.record('memory', 'miss');

    const remote = await this.readRemote(key, decodeCachedRate);
    if (remote.found) {
      this.rates.set(key, remote.value);
    }
    return remote;
  }

  async setRate(base: string, target: string, rate: number, fetchedAt: Date): Promise<void> {
    const key = rateCacheKey(base, target);
    const entry: CachedRate = { rate, fetchedAt, cachedAt: new Date() };

    this.rates.set(key, entry);
    await this.writeRemote(key, entry);
  }

  /**
   * Aggregate lookup. The aggregate holds one base at a time, so a table
   * cached for another base is a miss.
   */
  async getAllRates(base: string): Promise<CacheLookup<CachedRateTable>> {
    const local = this.tables.get(base);
    if (local) {
      this.record('memory', 'hit');
      return { found: true, value: local, tier: 'memory' };
    }
    this.record('memory', 'miss');

    const remote = await this.readRemote(ALL_RATES_CACHE_KEY, decodeRateTable);
    if (!remote.found) {
      return remote;
    }
    if (remote.value.base !== base) {
      return { found: false };
    }
    this.tables.set(base, remote.value);
    return remote;
  }

  /**
   * Tables for any base stay in memory; only the configured base's table is
   * shared through Redis, so other bases never overwrite it.
   */
  async setAllRates(base: string, rates: Record<string, CachedRate>): Promise<void> {
    const table: CachedRateTable = { base, rates };

    this.tables.set(base, table);
    if (base === this.config.baseCurrency) {
      await this.writeRemote(ALL_RATES_CACHE_KEY, table);
    }
  }

  async invalidateAll(): Promise<void> {
    this.rates.clear();
    this.tables.clear();

    if (!this.redis) {
      return;
    }

    try {
      let cursor = '0';
      let removed = 0;
      do {
        const [next, keys] = await this.redis.scan(cursor, 'MATCH', `${RATE_CACHE_KEY_PREFIX}*`, 'COUNT', SCAN_BATCH_SIZE);
        cursor = next;
        if (keys.length > 0) {
          removed += await this.redis.del(...keys);
        }
      } while (cursor !== '0');

      await this.redis.del(ALL_RATES_CACHE_KEY, SUPPORTED_CURRENCIES_CACHE_KEY);
      this.logger.log(`Invalidated ${removed} shared rate cache entries`);
    } catch (error) {
      this.logger.warn(`Failed to invalidate shared rate cache: ${toError(error).message}`);
    }
  }

  /**
   * Drop expired memory entries. Redis expires its own keys.
   *
   * @returns the number of entries removed
   */
  @Interval(CACHE_SWEEP_INTERVAL_MS)
  sweepExpired(): number {
    const before = this.rates.size + this.tables.size;
    this.rates.purgeStale();
    this.tables.purgeStale();
    const removed = before - (this.rates.size + this.tables.size);
    if (removed > 0) {
      this.logger.debug(`Swept ${removed} expired rate cache entries`);
    }
    return removed;
  }

  /** Live entries in the memory tier */
  get memorySize(): number {
    return this.rates.size + this.tables.size;
  }

  private async readRemote<T>(key: string, decode: (value: unknown) => T | null): Promise<CacheLookup<T>> {
    if (!this.redis) {
      return { found: false };
    }

    try {
      const raw = await this.redis.get(key);
      if (raw === null) {
        this.record('redis', 'miss');
        return { found: false };
      }

      const value = decode(JSON.parse(raw));
      if (value === null) {
        throw new Error(`undecodable payload at ${key}`);
      }
      this.record('redis', 'hit');
      return { found: true, value, tier: 'redis' };
    } catch (error) {
      const cause = toError(error);
      this.record('redis', 'error');
      this.logger.debug(`Shared rate cache read failed for ${key}: ${cause.message}`);
      return { found: false, error: cause };
    }
  }

  private async writeRemote(key: string, value: CachedRate | CachedRateTable): Promise<void> {
    if (!this.redis) {
      return;
    }

    try {
      await this.redis.set(key, JSON.stringify(value), 'PX', this.config.cache.redisTtlMs);
    } catch (error) {
      this.logger.debug(`Shared rate cache write failed for ${key}: ${toError(error).message}`);
    }
  }

  private record(tier: CacheTier, result: 'hit' | 'miss' | 'error'): void {
    this.metrics.cacheLookups.inc({ tier, result });
  }
}
