// 시세 캐시. 업스트림 앞단에서 부하/지연을 흡수한다.
import { Inject, Injectable, Logger } from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import type { Cache } from 'cache-manager';
import type { ConfigType } from '@nestjs/config';
import { ratesConfig } from '../config/rates.config';
import { CLOCK, Clock } from '../common/clock';
import { CacheUnavailableError } from './cache.errors';
import { categoryPrefix } from './cache.keys';

export interface CacheEntry<T> {
  key: string;
  payload: T;
  insertedAt: number;
  ttlMs: number;
}

export type CacheStats = {
  hits: number;
  misses: number;
  evictions: number;
  sets: number;
  errors: number;
  hitRate: number;
};

function isEntry(v: unknown): v is CacheEntry<unknown> {
  return (
    typeof v === 'object' &&
    v !== null &&
    'key' in v &&
    typeof v.key === 'string' &&
    'insertedAt' in v &&
    typeof v.insertedAt === 'number' &&
    'ttlMs' in v &&
    typeof v.ttlMs === 'number' &&
    'payload' in v
  );
}

export type PayloadGuard<T> = (payload: unknown) => payload is T;

@Injectable()
export class RateCacheService {
  private readonly log = new Logger(RateCacheService.name);
  private counters = { hits: 0, misses: 0, evictions: 0, sets: 0, errors: 0 };
  // 키별 히트 수. 자주 조회되는 키일수록 TTL을 늘린다
  private readonly popularity = new Map<string, number>();

  constructor(
    @Inject(CACHE_MANAGER) private readonly cache: Cache,
    @Inject(ratesConfig.KEY) private readonly cfg: ConfigType<typeof ratesConfig>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /** 만료된 항목은 miss. 저장소 오류와 형태가 맞지 않는 payload도 miss */
  async get<T>(key: string, accept: PayloadGuard<T>): Promise<CacheEntry<T> | null> {
    let raw: unknown;
    try {
      raw = await this.cache.get<unknown>(key);
    } catch (e) {
      this.fail(new CacheUnavailableError('get', key, e));
      this.counters.misses++;
      return null;
    }

    if (!isEntry(raw) || raw.key !== key) {
      this.counters.misses++;
      return null;
    }
    const { payload, insertedAt, ttlMs } = raw;
    if (!accept(payload)) {
      this.counters.misses++;
      return null;
    }

    if (this.clock.now() - insertedAt >= ttlMs) {
      this.counters.misses++;
      this.counters.evictions++;
      await this.remove(key);
      return null;
    }

    this.counters.hits++;
    this.popularity.set(key, (this.popularity.get(key) ?? 0) + 1);
    return { key, payload, insertedAt, ttlMs };
  }

  /**
   * ttlMs를 생략하면 인기도 기반 TTL. 같은 키는 마지막 쓰기가 이긴다.
   */
  async set<T>(key: string, payload: T, ttlMs?: number): Promise<void> {
    const entry: CacheEntry<T> = {
      key,
      payload,
      insertedAt: this.clock.now(),
      ttlMs: ttlMs ?? this.effectiveTtl(key),
    };
    try {
      await this.cache.set(key, entry, entry.ttlMs);
      this.counters.sets++;
    } catch (e) {
      this.fail(new CacheUnavailableError('set', key, e));
    }
  }

  async invalidate(key: string): Promise<void> {
    this.popularity.delete(key);
    await this.remove(key);
  }

  /** prefix 단위 삭제. 삭제된 키 수 반환 */
  async invalidateCategory(prefix: string): Promise<number> {
    const p = categoryPrefix(prefix);
    let keys: string[];
    try {
      // 메모리 스토어는 pattern을 무시하므로 prefix로 한 번 더 거른다
      keys = (await this.cache.store.keys(`${p}*`)).filter(k => k.startsWith(p));
      if (keys.length) await this.cache.store.mdel(...keys);
    } catch (e) {
      this.fail(new CacheUnavailableError('invalidateCategory', p, e));
      return 0;
    }
    for (const k of keys) this.popularity.delete(k);
    this.counters.evictions += keys.length;
    this.log.log(`Invalidated ${keys.length} keys under ${p}`);
    return keys.length;
  }

  async clearAll(): Promise<void> {
    this.popularity.clear();
    try {
      await this.cache.reset();
      this.log.log('Cache cleared');
    } catch (e) {
      this.fail(new CacheUnavailableError('reset', '*', e));
    }
  }

  async healthCheck(): Promise<boolean> {
    const key = metaProbeKey;
    const value = `probe_${this.clock.now()}`;
    try {
      await this.cache.set(key, value, 10_000);
      const back = await this.cache.get<string>(key);
      await this.cache.del(key);
      return back === value;
    } catch (e) {
      this.log.warn(`Cache health check failed: ${String(e)}`);
      return false;
    }
  }

  effectiveTtl(key: string): number {
    const { ttlMs, maxTtlMs, popularityStep } = this.cfg.cache;
    const hits = this.popularity.get(key) ?? 0;
    return Math.min(maxTtlMs, ttlMs * (1 + Math.floor(hits / popularityStep)));
  }

  stats(): CacheStats {
    const { hits, misses } = this.counters;
    const lookups = hits + misses;
    return { ...this.counters, hitRate: lookups === 0 ? 0 : hits / lookups };
  }

  resetStats(): void {
    this.counters = { hits: 0, misses: 0, evictions: 0, sets: 0, errors: 0 };
  }

  private async remove(key: string): Promise<void> {
    try {
      await this.cache.del(key);
    } catch (e) {
      this.fail(new CacheUnavailableError('del', key, e));
    }
  }

  private fail(err: CacheUnavailableError): void {
    this.counters.errors++;
    this.log.warn(err.message);
  }
}

const metaProbeKey = 'meta:health_check';
