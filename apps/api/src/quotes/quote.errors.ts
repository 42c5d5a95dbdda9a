// 업스트림 호출 실패 분류. retryable 여부와 서킷 브레이커 집계 여부가 타입으로 결정된다.
export class QuoteApiError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly details?: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** 잘못된 입력/시세 (ask < bid, 0 이하 가격 등). 재시도하지 않음 */
export class QuoteValidationError extends QuoteApiError {}

/** 4xx. 업스트림은 살아있으므로 브레이커 실패로 세지 않음 */
export class QuoteClientError extends QuoteApiError {}

export class QuoteAuthError extends QuoteClientError {}

export class SymbolNotFoundError extends QuoteClientError {
  constructor(public readonly symbol: string) {
    super(`SYMBOL_NOT_FOUND: ${symbol}`, 404);
  }
}

/** 5xx, 타임아웃, 네트워크 오류, 깨진 응답 본문 */
export class QuoteServerError extends QuoteApiError {}

export class QuoteRateLimitError extends QuoteApiError {
  constructor(
    message: string,
    public readonly retryAfterMs?: number,
  ) {
    super(message, 429);
  }
}

export class CircuitOpenError extends QuoteApiError {
  constructor(public readonly lastFailureAt: number | null) {
    super('CIRCUIT_OPEN');
  }
}

export class RequestCancelledError extends QuoteApiError {
  constructor() {
    super('REQUEST_CANCELLED');
  }
}

// 브레이커 실패 카운트에 포함되는 오류인지
export const countsAgainstCircuit = (e: QuoteApiError) =>
  e instanceof QuoteServerError || e instanceof QuoteRateLimitError;
