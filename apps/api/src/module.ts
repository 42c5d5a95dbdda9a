// 2. 앱의 뼈대 역할. 구성 관리 파일에 해당.
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { ScheduleModule } from '@nestjs/schedule';
import { ratesConfig } from './config/rates.config';
import { ClockModule } from './common/clock.module';
import { RateCacheModule } from './cache/rate-cache.module';
import { RatesModule } from './rates/rates.module';
import { AdminModule } from './admin/admin.module';
import { HealthController } from './health/health.controller';

@Module({
  imports: [
    // .env 로딩 + 시세 설정 검증 (전역). 잘못된 값이면 부팅 실패
    ConfigModule.forRoot({ isGlobal: true, cache: true, load: [ratesConfig] }),
    ClockModule,
    // 시세 캐시 (전역). 메모리 또는 Redis
    RateCacheModule,
    // 간단 레이트리밋(전역)
    ThrottlerModule.forRoot([{
      ttl: 60_000, // 60s
      limit: 120, // 120번
    }]),
    // 캐시 워머 interval 등록용
    ScheduleModule.forRoot(),
    // 시세 모듈
    RatesModule,
    // 운영 API
    AdminModule,
  ],
  providers: [
    { provide: APP_GUARD, useClass: ThrottlerGuard }, // 전역 가드 활성화
  ],
  controllers: [HealthController],
})
export class AppModule {}
