import { Logger } from '@nestjs/common';
import type { Clock } from '../common/clock';
import { CircuitOpenError } from './quote.errors';
import type { CircuitSnapshot, CircuitState } from './types';

export type CircuitOptions = { threshold: number; timeoutMs: number };

// acquire()가 돌려주는 통과 종류. probe면 HALF_OPEN 시험 요청
export type CircuitPermit = 'normal' | 'probe';

/**
 * 클라이언트 인스턴스 하나에 하나. 심볼별이 아니라 업스트림 전체 기준.
 *
 * 상태 전이는 await 사이의 동기 블록에서만 일어나므로 이벤트 루프 상에서 원자적이다.
 */
export class CircuitBreaker {
  private readonly log = new Logger(CircuitBreaker.name);
  private state: CircuitState = 'CLOSED';
  private failures = 0;
  private lastFailureAt: number | null = null;
  private probeInFlight = false;

  constructor(
    private readonly opts: CircuitOptions,
    private readonly clock: Clock,
  ) {}

  /** 요청 허용 여부. 막히면 CircuitOpenError */
  acquire(): CircuitPermit {
    if (this.state === 'CLOSED') return 'normal';

    if (this.state === 'OPEN') {
      const since = this.clock.now() - (this.lastFailureAt ?? 0);
      if (since < this.opts.timeoutMs) throw new CircuitOpenError(this.lastFailureAt);
      this.state = 'HALF_OPEN';
      this.log.log('Circuit half-open, sending trial request');
    }

    // HALF_OPEN: 시험 요청은 딱 하나만
    if (this.probeInFlight) throw new CircuitOpenError(this.lastFailureAt);
    this.probeInFlight = true;
    return 'probe';
  }

  onSuccess(): void {
    if (this.state !== 'CLOSED') this.log.log('Circuit closed after successful request');
    this.state = 'CLOSED';
    this.failures = 0;
    this.lastFailureAt = null;
    this.probeInFlight = false;
  }

  onFailure(): void {
    this.failures++;
    this.lastFailureAt = this.clock.now();
    this.probeInFlight = false;

    if (this.state === 'HALF_OPEN') {
      this.state = 'OPEN';
      this.log.warn('Trial request failed, circuit re-opened');
      return;
    }
    if (this.state === 'CLOSED' && this.failures >= this.opts.threshold) {
      this.state = 'OPEN';
      this.log.warn(`Circuit opened after ${this.failures} consecutive failures`);
    }
  }

  // 취소된 시험 요청: 상태는 그대로 두고 슬롯만 반환
  release(permit: CircuitPermit): void {
    if (permit === 'probe') this.probeInFlight = false;
  }

  reset(): void {
    this.state = 'CLOSED';
    this.failures = 0;
    this.lastFailureAt = null;
    this.probeInFlight = false;
    this.log.log('Circuit manually reset');
  }

  snapshot(): CircuitSnapshot {
    return { state: this.state, failures: this.failures, lastFailureAt: this.lastFailureAt };
  }
}
