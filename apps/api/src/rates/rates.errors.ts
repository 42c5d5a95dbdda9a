// 외부에 노출되는 시세 조회 실패 분류
export type RateLookupKind = 'INVALID' | 'UNAVAILABLE' | 'DEGRADED';

export class RateLookupError extends Error {
  constructor(
    public readonly kind: RateLookupKind,
    message: string,
    cause?: unknown,
  ) {
    super(`${kind}: ${message}`, { cause });
    this.name = 'RateLookupError';
  }
}
