// 시세 캐시 모듈. 저장소는 설정에 따라 메모리 또는 Redis
import { Global, Logger, Module } from '@nestjs/common';
import { CacheModule } from '@nestjs/cache-manager';
import type { ConfigType } from '@nestjs/config';
import { redisStore } from 'cache-manager-redis-yet';
import { ratesConfig } from '../config/rates.config';
import { RateCacheService } from './rate-cache.service';

@Global()
@Module({
  imports: [
    CacheModule.registerAsync({
      inject: [ratesConfig.KEY],
      useFactory: async (cfg: ConfigType<typeof ratesConfig>) => {
        const { store, redisUrl, maxTtlMs } = cfg.cache;
        if (store === 'redis' && redisUrl) {
          new Logger(RateCacheModule.name).log('Using redis cache store');
          return { store: await redisStore({ url: redisUrl, ttl: maxTtlMs }) };
        }
        // 논리 TTL은 RateCacheService가 판단. 저장소 TTL은 상한으로만 둔다
        return { ttl: maxTtlMs, max: 10_000 };
      },
    }),
  ],
  providers: [RateCacheService],
  exports: [RateCacheService],
})
export class RateCacheModule {}
