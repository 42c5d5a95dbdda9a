import { toMoney } from '../common/money';
import { CurrencySymbol, formatSymbol } from '../common/symbol';
import { QuoteValidationError } from './quote.errors';

// 업스트림 시세 한 건. 가격은 모두 decimal string
export interface RawQuote {
  symbol: CurrencySymbol;
  askPrice: string;
  bidPrice: string;
  lastPrice: string;
  timestamp: number; // ms
  inverted?: boolean; // 역방향 쌍을 뒤집어 만든 시세
}

export type Direction = 'buy' | 'sell';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export type CircuitSnapshot = {
  state: CircuitState;
  failures: number;
  lastFailureAt: number | null;
};

export type RequestMetricsSnapshot = {
  total: number;
  succeeded: number;
  failed: number;
  avgLatencyMs: number;
  successRate: number; // 0~100
  lastRequestAt: number | null;
  lastSuccessAt: number | null;
};

const isPrice = (v: unknown): v is string => typeof v === 'string' && v.length > 0;

/** 캐시에서 읽은 값이 RawQuote 형태인지 */
export function isRawQuote(v: unknown): v is RawQuote {
  return (
    typeof v === 'object' &&
    v !== null &&
    'symbol' in v &&
    typeof v.symbol === 'object' &&
    v.symbol !== null &&
    'base' in v.symbol &&
    typeof v.symbol.base === 'string' &&
    'quote' in v.symbol &&
    typeof v.symbol.quote === 'string' &&
    'askPrice' in v &&
    isPrice(v.askPrice) &&
    'bidPrice' in v &&
    isPrice(v.bidPrice) &&
    'lastPrice' in v &&
    isPrice(v.lastPrice) &&
    'timestamp' in v &&
    typeof v.timestamp === 'number'
  );
}

/** ask ≥ bid ≥ 0 검증. 위반이면 QuoteValidationError */
export function assertSpread(q: RawQuote): RawQuote {
  const ask = toMoney(q.askPrice);
  const bid = toMoney(q.bidPrice);
  if (!ask.isFinite() || !bid.isFinite() || bid.isNegative() || ask.lessThan(bid)) {
    throw new QuoteValidationError(`INVALID_QUOTE: ${formatSymbol(q.symbol)} ask=${q.askPrice} bid=${q.bidPrice}`);
  }
  return q;
}
