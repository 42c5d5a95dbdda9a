import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { RequestCancelledError } from '../quotes/quote.errors';
import { RateLookupFilter } from './rate-lookup.filter';
import { RateLookupError } from './rates.errors';

const fakeResponse = () => {
  const res = {
    headersSent: false,
    writableEnded: false,
    status: jest.fn(),
    json: jest.fn(),
    setHeader: jest.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
};

describe('RateLookupFilter', () => {
  const filter = new RateLookupFilter();

  it('maps INVALID to 400', () => {
    const res = fakeResponse();
    filter.catch(new RateLookupError('INVALID', 'USD/USD'), new ExecutionContextHost([{}, res]));
    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ error: 'RATE_INVALID', message: 'INVALID: USD/USD' });
  });

  it('maps UNAVAILABLE to 503', () => {
    const res = fakeResponse();
    filter.catch(new RateLookupError('UNAVAILABLE', 'USD/RUB'), new ExecutionContextHost([{}, res]));
    expect(res.status).toHaveBeenCalledWith(503);
    expect(res.json).toHaveBeenCalledWith({ error: 'RATE_UNAVAILABLE' });
  });

  it('maps DEGRADED to 503 with Retry-After', () => {
    const res = fakeResponse();
    filter.catch(new RateLookupError('DEGRADED', 'USD/RUB'), new ExecutionContextHost([{}, res]));
    expect(res.setHeader).toHaveBeenCalledWith('Retry-After', '60');
    expect(res.json).toHaveBeenCalledWith({ error: 'RATE_DEGRADED' });
  });

  it('answers 499 for a cancelled request', () => {
    const res = fakeResponse();
    filter.catch(new RequestCancelledError(), new ExecutionContextHost([{}, res]));
    expect(res.status).toHaveBeenCalledWith(499);
  });

  it('leaves a closed response alone', () => {
    const res = { ...fakeResponse(), writableEnded: true };
    filter.catch(new RateLookupError('UNAVAILABLE', 'USD/RUB'), new ExecutionContextHost([{}, res]));
    expect(res.status).not.toHaveBeenCalled();
  });
});
