// apps/api/src/health/health.controller.ts
import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';
import { QuoteClient } from '../quotes/quote.client';
import { RateCacheService } from '../cache/rate-cache.service';

@Controller()
export class HealthController {
  constructor(
    private readonly client: QuoteClient,
    private readonly cache: RateCacheService,
  ) {}

  @Get('/')
  root() {
    return { status: 'ok' };
  }

  // 업스트림은 호출하지 않는다. 캐시 왕복 + 브레이커 상태만
  @Get('/health')
  async health() {
    const cacheOk = await this.cache.healthCheck();
    const circuit = this.client.circuit();
    return {
      status: cacheOk && circuit.state === 'CLOSED' ? 'ok' : 'degraded',
      cache: cacheOk ? 'ok' : 'unavailable',
      circuit: circuit.state,
    };
  }

  @Get('/health/upstream')
  async upstream() {
    const ok = await this.client.healthCheck();
    if (!ok) {
      throw new ServiceUnavailableException({ error: 'UPSTREAM_UNHEALTHY', circuit: this.client.circuit().state });
    }
    return { status: 'ok', metrics: this.client.metrics() };
  }
}
