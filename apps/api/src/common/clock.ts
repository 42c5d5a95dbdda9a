// 시간 의존 로직(서킷 브레이커, 캐시 TTL)에서 현재 시각을 주입받기 위한 토큰
export interface Clock {
  now(): number;
}

export const CLOCK = 'CLOCK';

export const systemClock: Clock = { now: () => Date.now() };
