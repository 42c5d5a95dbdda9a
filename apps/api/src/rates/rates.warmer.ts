import { Inject, Injectable, Logger, OnApplicationBootstrap, OnApplicationShutdown } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import type { ConfigType } from '@nestjs/config';
import { ratesConfig } from '../config/rates.config';
import { RatesService } from './rates.service';

const JOB = 'rates-warm';

/**
 * 주기적으로 전체 시세를 받아 캐시를 미리 채운다.
 * 주기는 RATES_WARM_INTERVAL_S. 0이면 등록하지 않는다.
 */
@Injectable()
export class RatesWarmer implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly log = new Logger(RatesWarmer.name);
  private running = false;

  constructor(
    private readonly rates: RatesService,
    private readonly registry: SchedulerRegistry,
    @Inject(ratesConfig.KEY) private readonly cfg: ConfigType<typeof ratesConfig>,
  ) {}

  onApplicationBootstrap() {
    const every = this.cfg.warmIntervalMs;
    if (every <= 0) return;
    const timer = setInterval(() => void this.tick(), every);
    this.registry.addInterval(JOB, timer);
    this.log.log(`Warming rates every ${every / 1000}s`);
  }

  onApplicationShutdown() {
    if (this.registry.doesExist('interval', JOB)) this.registry.deleteInterval(JOB);
  }

  /** 이전 실행이 끝나지 않았으면 건너뛴다. 실패는 로그만 남긴다 */
  async tick(): Promise<boolean> {
    if (this.running) return false;
    this.running = true;
    try {
      await this.rates.warm();
      return true;
    } catch (e) {
      this.log.warn(`Rate warm-up failed: ${e instanceof Error ? e.message : String(e)}`);
      return false;
    } finally {
      this.running = false;
    }
  }
}
