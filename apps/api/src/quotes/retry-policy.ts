import type { RetryPolicy } from '../config/rates.config';
import type { QuoteApiError } from './quote.errors';

// 한 번의 시도 결과. 루프 드라이버가 재시도/백오프/전파를 결정한다
export type AttemptOutcome<T> =
  | { kind: 'success'; value: T }
  | { kind: 'retryable'; error: QuoteApiError }
  | { kind: 'fatal'; error: QuoteApiError };

export const sampleJitter = ([min, max]: readonly [number, number], random: () => number = Math.random) =>
  min + (max - min) * random();

/**
 * attempt 번째 재시도 전 대기시간(ms). attempt는 0부터.
 * base × factor^attempt × jitter
 */
export function retryDelayMs(policy: RetryPolicy, attempt: number, jitter = sampleJitter(policy.jitter)): number {
  return policy.baseDelayMs * Math.pow(policy.backoffFactor, attempt) * jitter;
}

// Retry-After: 초 단위 숫자 또는 HTTP-date
export function parseRetryAfter(header: unknown, now: number): number | undefined {
  if (typeof header !== 'string' || !header.trim()) return undefined;
  const secs = Number(header);
  if (Number.isFinite(secs)) return Math.max(0, secs * 1000);
  const at = Date.parse(header);
  return Number.isNaN(at) ? undefined : Math.max(0, at - now);
}
