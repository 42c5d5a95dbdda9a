// 캐시 저장소 장애. 호출자에게 던지지 않고 miss로 처리(fail-open)할 때 로그용으로 쓴다
export class CacheUnavailableError extends Error {
  constructor(
    public readonly operation: string,
    public readonly key: string,
    cause: unknown,
  ) {
    super(`CACHE_UNAVAILABLE: ${operation} ${key}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'CacheUnavailableError';
  }
}
