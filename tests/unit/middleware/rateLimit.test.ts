/**
 * Rate Limit Middleware Tests
 *
 * Interceptor binding, identifier extraction and 429 responses.
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { Request, Response } from 'express';
import { fromBody, getClientIp, rateLimitInterceptor } from '../../../src/middleware/rateLimit';
import { MissingRequiredFieldError, StoreUnavailableError } from '../../../src/errors/ApiError';
import type { IRateLimitCoordinator, RateLimitDecision } from '../../../src/services/rateLimiting';
import { requestContext, type RequestContextData } from '../../../src/utils/requestContext';

function makeReq(overrides: Partial<Request> = {}): Request {
  return {
    body: {},
    headers: {},
    ip: '203.0.113.7',
    socket: { remoteAddress: '10.0.0.1' },
    ...overrides,
  } as Request;
}

describe('Rate Limit Middleware', () => {
  let checkLimit: Mock<(subject: string, email: string, ip: string) => Promise<RateLimitDecision>>;
  let coordinator: IRateLimitCoordinator;
  let res: Response;
  let statusMock: Mock;
  let jsonMock: Mock;
  let setHeaderMock: Mock;
  let next: Mock<(err?: unknown) => void>;

  beforeEach(() => {
    checkLimit = vi.fn();
    coordinator = { checkLimit };
    jsonMock = vi.fn();
    statusMock = vi.fn().mockReturnValue({ json: jsonMock });
    setHeaderMock = vi.fn();
    res = { status: statusMock, setHeader: setHeaderMock } as unknown as Response;
    next = vi.fn();
  });

  const interceptor = () => rateLimitInterceptor({ coordinator, subject: 'otp', identifier: fromBody('email') });

  it('calls next when the coordinator allows', async () => {
    checkLimit.mockResolvedValueOnce({ allowed: true, attempt: 1 });

    await interceptor()(makeReq({ body: { email: ' Alice@Example.com ' } }), res, next);

    expect(checkLimit).toHaveBeenCalledWith('otp', 'alice@example.com', '203.0.113.7');
    expect(next).toHaveBeenCalledWith();
    expect(statusMock).not.toHaveBeenCalled();
  });

  it('answers 429 with the message and attempt', async () => {
    checkLimit.mockResolvedValueOnce({
      allowed: false,
      stage: 'progressive-delay',
      message: 'Please wait 30 seconds',
      attempt: 3,
    });

    await interceptor()(makeReq({ body: { email: 'alice@example.com' } }), res, next);

    expect(statusMock).toHaveBeenCalledWith(429);
    expect(jsonMock).toHaveBeenCalledWith({ message: 'Please wait 30 seconds', attempt: 3 });
    expect(setHeaderMock).not.toHaveBeenCalled();
    expect(next).not.toHaveBeenCalled();
  });

  it('sets Retry-After when the IP bucket supplies one', async () => {
    checkLimit.mockResolvedValueOnce({
      allowed: false,
      stage: 'ip',
      message: 'Too many requests from this IP. Retry after 360 seconds',
      retryAfter: 360,
    });

    await interceptor()(makeReq({ body: { email: 'alice@example.com' } }), res, next);

    expect(setHeaderMock).toHaveBeenCalledWith('Retry-After', '360');
    expect(jsonMock).toHaveBeenCalledWith({ message: 'Too many requests from this IP. Retry after 360 seconds' });
  });

  it('rejects a request without the identifier field', async () => {
    await interceptor()(makeReq({ body: { email: '   ' } }), res, next);

    expect(checkLimit).not.toHaveBeenCalled();
    expect(next).toHaveBeenCalledWith(expect.any(MissingRequiredFieldError));
  });

  it('forwards store failures to the error handler', async () => {
    const error = new StoreUnavailableError('zcard');
    checkLimit.mockRejectedValueOnce(error);

    await interceptor()(makeReq({ body: { email: 'alice@example.com' } }), res, next);

    expect(next).toHaveBeenCalledWith(error);
    expect(statusMock).not.toHaveBeenCalled();
  });

  it('records the client IP on the request context', async () => {
    checkLimit.mockResolvedValueOnce({ allowed: true, attempt: 1 });
    const context: RequestContextData = { requestId: 'req-1', startTime: 0 };

    await requestContext.run(context, () =>
      interceptor()(makeReq({ body: { email: 'alice@example.com' } }), res, next)
    );

    expect(context.clientIp).toBe('203.0.113.7');
  });

  describe('fromBody', () => {
    it('ignores non-string values', () => {
      const source = fromBody('email');

      expect(source.name).toBe('email');
      expect(source.from(makeReq({ body: { email: 42 } }))).toBeUndefined();
      expect(source.from(makeReq({ body: undefined }))).toBeUndefined();
    });
  });

  describe('getClientIp', () => {
    it('ignores a client-supplied X-Forwarded-For header', () => {
      const req = makeReq({ headers: { 'x-forwarded-for': '198.51.100.9, 10.0.0.2' } });

      expect(getClientIp(req)).toBe('203.0.113.7');
    });

    it('falls back to req.ip, then the socket address', () => {
      expect(getClientIp(makeReq())).toBe('203.0.113.7');
      expect(getClientIp(makeReq({ ip: undefined }))).toBe('10.0.0.1');
    });
  });
});
