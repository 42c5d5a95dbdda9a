// RateLookupError → HTTP 응답. 본문은 { error: 'RATE_*' }
import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from '@nestjs/common';
import type { Response } from 'express';
import { RequestCancelledError } from '../quotes/quote.errors';
import { RateLookupError, RateLookupKind } from './rates.errors';

const STATUS: Record<RateLookupKind, number> = {
  INVALID: HttpStatus.BAD_REQUEST,
  UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
  DEGRADED: HttpStatus.SERVICE_UNAVAILABLE,
};

// 클라이언트가 먼저 끊은 요청 (nginx 관례)
const CLIENT_CLOSED = 499;

@Catch(RateLookupError, RequestCancelledError)
export class RateLookupFilter implements ExceptionFilter {
  catch(err: RateLookupError | RequestCancelledError, host: ArgumentsHost) {
    const res = host.switchToHttp().getResponse<Response>();
    if (res.headersSent || res.writableEnded) return;

    if (err instanceof RequestCancelledError) {
      res.status(CLIENT_CLOSED).json({ error: 'RATE_CANCELLED' });
      return;
    }
    const body: Record<string, unknown> = { error: `RATE_${err.kind}` };
    if (err.kind === 'INVALID') body.message = err.message;
    if (err.kind === 'DEGRADED') res.setHeader('Retry-After', '60');
    res.status(STATUS[err.kind]).json(body);
  }
}
