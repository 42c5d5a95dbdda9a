// 시세 + 마크업 → 사용자 가격. 전부 decimal.js, number로 계산하지 않는다
import type { Decimal } from 'decimal.js';
import type { AmountLimit, MarkupConfig } from '../config/rates.config';
import { Money, toMoney } from '../common/money';
import { CurrencySymbol, formatSymbol, mirrorSymbol } from '../common/symbol';
import { QuoteValidationError } from '../quotes/quote.errors';
import { assertSpread, Direction, RawQuote } from '../quotes/types';
import precision from './currency-precision.json';

export type MarkupSource = 'pair' | 'mirror' | 'default';

export interface PricedQuote {
  symbol: CurrencySymbol;
  direction: Direction;
  marketRate: string;
  finalRate: string;
  markupPercent: string;
  markupSource: MarkupSource;
  markupAmount: string;
  inverted: boolean;
  quotedAt: number;
  computedAt: number;
}

export interface Conversion {
  symbol: CurrencySymbol;
  direction: Direction;
  amount: string;
  finalRate: string;
  convertedAmount: string;
  markupEarned: string;
  computedAt: number;
}

const fiatDecimals: Readonly<Record<string, number>> = precision.fiat;
const MAX_AMOUNT_DP = 8;

/** 정확히 일치 → 역방향 쌍 → 기본값 순서 */
export function resolveMarkupPercent(symbol: CurrencySymbol, config: MarkupConfig): { percent: string; source: MarkupSource } {
  const exact = config.pairs[formatSymbol(symbol)];
  if (exact !== undefined) return { percent: exact, source: 'pair' };
  const mirror = config.pairs[formatSymbol(mirrorSymbol(symbol))];
  if (mirror !== undefined) return { percent: mirror, source: 'mirror' };
  return { percent: config.defaultPercent, source: 'default' };
}

/**
 * 표시 통화 기준 반올림 (half-up).
 * 법정화폐는 통화별 자릿수(대부분 2), 그 외(코인, 모르는 코드)는 8자리.
 */
export function roundForCurrency(value: Decimal, currency: string): Decimal {
  const dp = fiatDecimals[currency] ?? precision.cryptoDecimals;
  return value.toDecimalPlaces(dp, Money.ROUND_HALF_UP);
}

// 법정화폐는 자릿수를 고정해서 보여준다 (102.50). 코인은 불필요한 0 제거
function display(value: Decimal, currency: string): string {
  const dp = fiatDecimals[currency];
  return dp === undefined ? value.toFixed() : value.toFixed(dp);
}

export function applyMarkup(
  quote: RawQuote,
  direction: Direction,
  config: MarkupConfig,
  computedAt: number,
): PricedQuote {
  assertSpread(quote);
  // ask ≥ bid 이므로 bid > 0 이면 양쪽 모두 양수
  if (toMoney(quote.bidPrice).isZero()) {
    throw new QuoteValidationError(`NON_POSITIVE_PRICE: ${formatSymbol(quote.symbol)} bid=${quote.bidPrice}`);
  }
  const market = toMoney(direction === 'buy' ? quote.askPrice : quote.bidPrice);

  const { percent, source } = resolveMarkupPercent(quote.symbol, config);
  const pct = toMoney(percent);
  if (!pct.isFinite() || pct.isNegative()) {
    throw new QuoteValidationError(`INVALID_MARKUP: ${percent}`);
  }

  const currency = quote.symbol.quote;
  const final = roundForCurrency(market.mul(pct.div(100).plus(1)), currency);

  return Object.freeze({
    symbol: quote.symbol,
    direction,
    marketRate: market.toFixed(),
    finalRate: display(final, currency),
    markupPercent: pct.toFixed(),
    markupSource: source,
    markupAmount: final.minus(market).toFixed(),
    inverted: quote.inverted === true,
    quotedAt: quote.timestamp,
    computedAt,
  });
}

/**
 * B/A 시세를 A/B로 뒤집는다. ask′ = 1/bid, bid′ = 1/ask.
 * 뒤집은 뒤 ask′ ≥ bid′를 다시 검사한다.
 */
export function invertQuote(quote: RawQuote): RawQuote {
  const ask = toMoney(quote.askPrice);
  const bid = toMoney(quote.bidPrice);
  const last = toMoney(quote.lastPrice);
  if (!ask.isPositive() || ask.isZero() || !bid.isPositive() || bid.isZero()) {
    throw new QuoteValidationError(`CANNOT_INVERT: ${formatSymbol(quote.symbol)} ask=${quote.askPrice} bid=${quote.bidPrice}`);
  }
  const one = new Money(1);
  return assertSpread({
    symbol: mirrorSymbol(quote.symbol),
    askPrice: one.div(bid).toFixed(),
    bidPrice: one.div(ask).toFixed(),
    lastPrice: last.isZero() ? '0' : one.div(last).toFixed(),
    timestamp: quote.timestamp,
    inverted: true,
  });
}

/** 사용자 금액 환산. amount는 양수, 소수 8자리 이하, 통화쌍 한도 안 */
export function convertAmount(priced: PricedQuote, amount: string, computedAt: number, limit?: AmountLimit): Conversion {
  let value: Decimal;
  try {
    value = toMoney(amount.trim());
  } catch {
    throw new QuoteValidationError(`INVALID_AMOUNT: ${amount}`);
  }
  if (!value.isFinite() || !value.isPositive() || value.isZero() || value.decimalPlaces() > MAX_AMOUNT_DP) {
    throw new QuoteValidationError(`INVALID_AMOUNT: ${amount}`);
  }
  const pair = formatSymbol(priced.symbol);
  if (limit?.min !== undefined && value.lessThan(limit.min)) {
    throw new QuoteValidationError(`AMOUNT_BELOW_MIN: ${value.toFixed()} < ${limit.min} for ${pair}`);
  }
  if (limit?.max !== undefined && value.greaterThan(limit.max)) {
    throw new QuoteValidationError(`AMOUNT_ABOVE_MAX: ${value.toFixed()} > ${limit.max} for ${pair}`);
  }

  const currency = priced.symbol.quote;
  const total = roundForCurrency(value.mul(priced.finalRate), currency);
  const atMarket = value.mul(priced.marketRate);

  return Object.freeze({
    symbol: priced.symbol,
    direction: priced.direction,
    amount: value.toFixed(),
    finalRate: priced.finalRate,
    convertedAmount: display(total, currency),
    markupEarned: display(roundForCurrency(total.minus(atMarket), currency), currency),
    computedAt,
  });
}
