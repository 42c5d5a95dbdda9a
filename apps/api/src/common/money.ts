import { Decimal } from 'decimal.js';

// 금액/환율 계산 전용 Decimal. 기본 설정을 건드리지 않도록 clone 사용
export const Money = Decimal.clone({ precision: 28, rounding: Decimal.ROUND_HALF_UP, toExpNeg: -30, toExpPos: 40 });

// 업스트림이 숫자로 내려준 값도 문자열을 거쳐 변환 (2진 부동소수 오차 방지)
export const toMoney = (v: string | number | Decimal): Decimal =>
  Decimal.isDecimal(v) ? new Money(v) : new Money(typeof v === 'number' ? String(v) : v);
