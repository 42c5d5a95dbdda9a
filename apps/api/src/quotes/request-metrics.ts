import type { Clock } from '../common/clock';
import type { RequestMetricsSnapshot } from './types';

// 시도(attempt) 단위 집계. 프로세스 수명 동안 유지
export class RequestMetrics {
  private total = 0;
  private succeeded = 0;
  private failed = 0;
  private avgLatencyMs = 0;
  private lastRequestAt: number | null = null;
  private lastSuccessAt: number | null = null;

  constructor(private readonly clock: Clock) {}

  record(success: boolean, latencyMs: number): void {
    this.total++;
    this.lastRequestAt = this.clock.now();
    if (success) {
      this.succeeded++;
      this.lastSuccessAt = this.lastRequestAt;
    } else {
      this.failed++;
    }
    // 누적 이동 평균
    this.avgLatencyMs += (latencyMs - this.avgLatencyMs) / this.total;
  }

  reset(): void {
    this.total = this.succeeded = this.failed = 0;
    this.avgLatencyMs = 0;
    this.lastRequestAt = this.lastSuccessAt = null;
  }

  snapshot(): RequestMetricsSnapshot {
    return {
      total: this.total,
      succeeded: this.succeeded,
      failed: this.failed,
      avgLatencyMs: this.avgLatencyMs,
      successRate: this.total === 0 ? 0 : (this.succeeded / this.total) * 100,
      lastRequestAt: this.lastRequestAt,
      lastSuccessAt: this.lastSuccessAt,
    };
  }
}
