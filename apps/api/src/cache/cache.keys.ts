import type { CurrencySymbol } from '../common/symbol';

export type CacheCategory = 'rates' | 'meta';

// 계층형 키: <category>:<...>. 카테고리 무효화는 prefix 스캔 한 번
export const categoryPrefix = (c: string) => (c.endsWith(':') ? c : `${c}:`);

export const rateKey = (s: CurrencySymbol) => `rates:${s.base}:${s.quote}`;

export const metaKey = (name: string) => `meta:${name}`;
