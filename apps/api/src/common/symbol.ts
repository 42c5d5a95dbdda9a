// 통화쌍 심볼. 업스트림 표기는 'BASE/QUOTE'
export type CurrencySymbol = Readonly<{ base: string; quote: string }>;

const CODE = /^[A-Z0-9]{2,10}$/;

export class InvalidSymbolError extends Error {
  constructor(public readonly raw: string) {
    super(`INVALID_SYMBOL: ${raw}`);
    this.name = 'InvalidSymbolError';
  }
}

export function makeSymbol(base: string, quote: string): CurrencySymbol {
  const b = base.trim().toUpperCase();
  const q = quote.trim().toUpperCase();
  if (!CODE.test(b) || !CODE.test(q) || b === q) {
    throw new InvalidSymbolError(`${base}/${quote}`);
  }
  return Object.freeze({ base: b, quote: q });
}

export function parseSymbol(raw: string): CurrencySymbol {
  const parts = raw.split('/');
  if (parts.length !== 2) throw new InvalidSymbolError(raw);
  return makeSymbol(parts[0], parts[1]);
}

export const formatSymbol = (s: CurrencySymbol) => `${s.base}/${s.quote}`;

export const mirrorSymbol = (s: CurrencySymbol): CurrencySymbol =>
  Object.freeze({ base: s.quote, quote: s.base });
