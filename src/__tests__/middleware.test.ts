/**
 * HTTP middleware: error envelope, bearer auth, role guard and rate limiting
 */

import type { NextFunction, Request, Response } from 'express';
import jwt from 'jsonwebtoken';

jest.mock('../shared/services/logger.service', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
  logError: jest.fn()
}));

import { errorHandler, notFoundHandler } from '../shared/middleware/error.middleware';
import {
  authMiddleware,
  requireCaller,
  roleGuard,
  signCallerToken,
  verifyCallerToken
} from '../shared/middleware/auth.middleware';
import { RedisRateLimitStore } from '../shared/middleware/rate-limiter.middleware';
import {
  accessLogLevel,
  buildAccessLogEntry,
  maskQueryParams
} from '../shared/middleware/request-logger.middleware';
import { ratingRateLimit } from '../modules/rating/rating.routes';
import { CallerRole, ErrorCode } from '../core/constants';
import {
  ForbiddenError,
  PreconditionError,
  RateLimitError,
  UnauthorizedError,
  ValidationError
} from '../core/errors/AppError';

function mockRequest(overrides: Partial<Request> = {}): Request {
  const req: Partial<Request> = { method: 'POST', path: '/api/v1/bookings', headers: {}, ...overrides };
  return req as Request;
}

function mockResponse() {
  const res = { status: jest.fn(), json: jest.fn(), setHeader: jest.fn() };
  res.status.mockReturnValue(res);
  return res;
}

function asResponse(res: ReturnType<typeof mockResponse>): Response {
  return res as unknown as Response;
}

describe('errorHandler', () => {
  const next: NextFunction = jest.fn();

  it('renders a precondition failure with its reason', () => {
    const res = mockResponse();

    errorHandler(PreconditionError.notAuthorized('b-1', 'confirm'), mockRequest(), asResponse(res), next);

    expect(res.status).toHaveBeenCalledWith(403);
    expect(res.json).toHaveBeenCalledWith({
      success: false,
      error: {
        code: ErrorCode.BOOKING_NOT_AUTHORIZED,
        message: 'Caller may not confirm this booking',
        details: { reason: 'NOT_AUTHORIZED', bookingId: 'b-1', attemptedAction: 'confirm' }
      }
    });
  });

  it('lists the failing fields of a validation error', () => {
    const res = mockResponse();
    const error = new ValidationError('rating: Maximum 5 stars', [{ field: 'rating', message: 'Maximum 5 stars' }]);

    errorHandler(error, mockRequest(), asResponse(res), next);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      success: false,
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        message: 'rating: Maximum 5 stars',
        details: { errors: [{ field: 'rating', message: 'Maximum 5 stars' }] }
      }
    });
  });

  it('sets Retry-After on rate limiting', () => {
    const res = mockResponse();

    errorHandler(new RateLimitError('Slow down', 42), mockRequest(), asResponse(res), next);

    expect(res.setHeader).toHaveBeenCalledWith('Retry-After', '42');
    expect(res.status).toHaveBeenCalledWith(429);
  });

  it('answers a malformed JSON body with 400', () => {
    const res = mockResponse();
    const error = Object.assign(new SyntaxError('Unexpected token } in JSON'), { body: '{"rating":}' });

    errorHandler(error, mockRequest(), asResponse(res), next);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      success: false,
      error: { code: ErrorCode.VALIDATION_ERROR, message: 'Malformed JSON body' }
    });
  });

  it('maps anything else to 500', () => {
    const res = mockResponse();

    errorHandler(new Error('disk on fire'), mockRequest(), asResponse(res), next);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({
      success: false,
      error: { code: ErrorCode.INTERNAL_ERROR, message: 'disk on fire' }
    });
  });

  it('names the unmatched route', () => {
    const res = mockResponse();

    notFoundHandler(mockRequest({ method: 'GET', path: '/api/v1/nowhere' }), asResponse(res));

    expect(res.status).toHaveBeenCalledWith(404);
    expect(res.json).toHaveBeenCalledWith({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Cannot GET /api/v1/nowhere' }
    });
  });
});

describe('authMiddleware', () => {
  const customer = { role: CallerRole.CUSTOMER, id: 'cust-1' };

  function run(authorization?: string) {
    const req = mockRequest({ headers: authorization === undefined ? {} : { authorization } });
    const next = jest.fn();
    authMiddleware(req, asResponse(mockResponse()), next);
    return { req, next };
  }

  it('attaches the caller from a valid bearer token', () => {
    const { req, next } = run(`Bearer ${signCallerToken(customer)}`);

    expect(req.caller).toEqual(customer);
    expect(next).toHaveBeenCalledWith();
  });

  it('requires a bearer token', () => {
    const { next } = run();

    expect(next).toHaveBeenCalledWith(expect.any(UnauthorizedError));
    expect(next.mock.calls[0][0]).toMatchObject({ code: ErrorCode.AUTH_REQUIRED });
  });

  it('rejects an expired token', () => {
    const { next } = run(`Bearer ${signCallerToken(customer, -10)}`);

    expect(next.mock.calls[0][0]).toMatchObject({ code: ErrorCode.AUTH_TOKEN_EXPIRED });
  });

  it('rejects a token signed with another secret', () => {
    const forged = jwt.sign({ role: CallerRole.CUSTOMER }, 'other-secret', { subject: 'cust-1' });

    const { req, next } = run(`Bearer ${forged}`);

    expect(req.caller).toBeUndefined();
    expect(next.mock.calls[0][0]).toMatchObject({ code: ErrorCode.AUTH_TOKEN_INVALID });
  });

  it('rejects a token without a known role', () => {
    const token = jwt.sign({ role: 'admin' }, 'test-secret', { subject: 'cust-1' });

    expect(() => verifyCallerToken(token)).toThrow(UnauthorizedError);
    const { next } = run(`Bearer ${token}`);
    expect(next.mock.calls[0][0]).toMatchObject({ code: ErrorCode.AUTH_TOKEN_INVALID });
  });
});

describe('roleGuard', () => {
  it('admits listed roles only', () => {
    const guard = roleGuard([CallerRole.PROVIDER]);
    const allowed = jest.fn();
    const denied = jest.fn();

    guard(mockRequest({ caller: { role: CallerRole.PROVIDER, id: 'prov-1' } }), asResponse(mockResponse()), allowed);
    guard(mockRequest({ caller: { role: CallerRole.CUSTOMER, id: 'cust-1' } }), asResponse(mockResponse()), denied);

    expect(allowed).toHaveBeenCalledWith();
    expect(denied).toHaveBeenCalledWith(expect.any(ForbiddenError));
  });

  it('requires authentication first', () => {
    const next = jest.fn();

    roleGuard([CallerRole.CUSTOMER])(mockRequest(), asResponse(mockResponse()), next);

    expect(next).toHaveBeenCalledWith(expect.any(UnauthorizedError));
    expect(() => requireCaller(mockRequest())).toThrow(UnauthorizedError);
  });
});

describe('rate limiting', () => {
  it('allows ten rating submissions per customer per minute', async () => {
    for (let i = 0; i < 10; i++) {
      await ratingRateLimit('cust-burst');
    }

    await expect(ratingRateLimit('cust-burst')).rejects.toBeInstanceOf(RateLimitError);
    await expect(ratingRateLimit('cust-calm')).resolves.toBeUndefined();
  });

  it('counts hits in the shared store', async () => {
    const store = new RedisRateLimitStore(60_000, 'rl:test:');

    await expect(store.increment('1.2.3.4')).resolves.toMatchObject({ totalHits: 1 });
    await expect(store.increment('1.2.3.4')).resolves.toMatchObject({ totalHits: 2 });

    await store.decrement('1.2.3.4');
    await expect(store.increment('1.2.3.4')).resolves.toMatchObject({ totalHits: 2 });

    await store.resetKey('1.2.3.4');
    await expect(store.increment('1.2.3.4')).resolves.toMatchObject({ totalHits: 1 });
  });
});

describe('access log', () => {
  it('masks credentials and keeps the rest', () => {
    expect(maskQueryParams({ token: 'abc', apiKey: 'xyz', categoryId: 'plumbing' })).toEqual({
      token: '[MASKED]',
      apiKey: '[MASKED]',
      categoryId: 'plumbing'
    });
  });

  it('coarsens customer coordinates', () => {
    expect(maskQueryParams({ latitude: '40.712776', longitude: '-74.005974', limit: '3' })).toEqual({
      latitude: '40.71',
      longitude: '-74.01',
      limit: '3'
    });
  });

  it('picks the level from the status', () => {
    expect(accessLogLevel(200)).toBe('info');
    expect(accessLogLevel(409)).toBe('warn');
    expect(accessLogLevel(503)).toBe('error');
  });

  it('describes the request, caller and correlation id', () => {
    const req = mockRequest({
      method: 'GET',
      path: '/api/v1/matching',
      headers: { 'x-request-id': 'req-1' },
      query: { categoryId: 'plumbing', latitude: '40.712776' },
      caller: { role: CallerRole.CUSTOMER, id: 'cust-1' }
    });

    expect(buildAccessLogEntry(req, 200, 12)).toEqual({
      requestId: 'req-1',
      method: 'GET',
      path: '/api/v1/matching',
      status: 200,
      durationMs: 12,
      caller: 'customer:cust-1',
      query: { categoryId: 'plumbing', latitude: '40.71' }
    });
  });

  it('logs anonymous requests without a query', () => {
    expect(buildAccessLogEntry(mockRequest(), 401, 3)).toEqual({
      requestId: undefined,
      method: 'POST',
      path: '/api/v1/bookings',
      status: 401,
      durationMs: 3,
      caller: 'anonymous'
    });
  });
});
