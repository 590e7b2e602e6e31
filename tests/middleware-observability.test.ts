import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Request, Response } from 'express';

import {
  createErrorHandler,
  createRateLimiter,
  type RateLimitEntry,
  createRequestLogger,
  notFoundHandler,
  withRequestId,
} from '../src/middleware/observability.js';
import { apiKeysMatch, createAdminAuthMiddleware, presentedKey } from '../src/middleware/adminAuth.js';
import { NotAuthorizedError, StorageError } from '../src/errors.js';
import { createLogger, silentLogger } from '../src/logger.js';

function mockReq(init: Partial<Request> = {}): Request {
  return {
    method: 'GET',
    url: '/',
    headers: {},
    socket: { remoteAddress: '127.0.0.1' },
    ...init,
  } as Request;
}

function mockRes() {
  const res: Partial<Response & { body?: unknown }> & { headers: Record<string, string> } = {
    statusCode: 200,
    locals: {},
    headers: {},
    setHeader(key: string, value: string) {
      this.headers![key.toLowerCase()] = value;
      return this as Response;
    },
    status(code: number) {
      this.statusCode = code;
      return this as Response;
    },
    json(body: unknown) {
      this.body = body;
      return this as Response;
    },
    on: vi.fn(),
  };
  return res as Response & { body?: unknown; headers: Record<string, string> };
}

describe('createRequestLogger', () => {
  it('assigns requestId and sets response header', () => {
    const req = mockReq();
    const res = mockRes();
    const next = vi.fn();

    createRequestLogger(silentLogger)(req, res, next);

    expect(res.locals.requestId).toBeDefined();
    expect(res.headers['x-request-id']).toBe(res.locals.requestId);
    expect(next).toHaveBeenCalled();
  });

  it('reuses an incoming x-request-id', () => {
    const req = mockReq({ headers: { 'x-request-id': ' upstream-1 ' } });
    const res = mockRes();

    createRequestLogger(silentLogger)(req, res, vi.fn());

    expect(res.locals.requestId).toBe('upstream-1');
  });
});

describe('createRateLimiter', () => {
  let limiter: ReturnType<typeof createRateLimiter>;
  beforeEach(() => {
    limiter = createRateLimiter({ windowMs: 50, max: 2 });
  });

  it('allows requests under the limit', () => {
    const req = mockReq();
    const res = mockRes();
    const next = vi.fn();

    limiter(req, res, next);
    limiter(req, res, next);

    expect(next).toHaveBeenCalledTimes(2);
  });

  it('blocks when exceeding limit', () => {
    const req = mockReq();
    const res = mockRes();
    const next = vi.fn();

    limiter(req, res, next);
    limiter(req, res, next);
    limiter(req, res, next);

    expect(next).toHaveBeenCalledTimes(2);
    expect(res.statusCode).toBe(429);
    expect(res.headers['retry-after']).toBe('1');
    expect((res.body as { error?: string }).error).toBe('Too many requests');
  });

  describe('window bookkeeping', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('drops expired windows and never keys on the raw header', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2030-01-01T00:00:00.000Z'));
      const store = new Map<string, RateLimitEntry>();
      const limited = createRateLimiter({ windowMs: 1000, max: 5, store });

      for (const key of ['wrong-1', 'wrong-2', 'wrong-3']) {
        limited(mockReq({ headers: { authorization: `ApiKey ${key}` } }), mockRes(), vi.fn());
      }
      expect(store.size).toBe(3);
      expect([...store.keys()].some((key) => key.includes('wrong-'))).toBe(false);

      vi.setSystemTime(new Date('2030-01-01T00:00:01.500Z'));
      limited(mockReq({ headers: { authorization: 'ApiKey test-key' } }), mockRes(), vi.fn());

      expect(store.size).toBe(1);
    });
  });

  it('honours skip', () => {
    const skipping = createRateLimiter({ windowMs: 50, max: 1, skip: () => true });
    const next = vi.fn();

    skipping(mockReq(), mockRes(), next);
    skipping(mockReq(), mockRes(), next);

    expect(next).toHaveBeenCalledTimes(2);
  });
});

describe('withRequestId', () => {
  it('appends requestId to object bodies', () => {
    const res = mockRes();
    res.locals.requestId = 'req-123';
    expect(withRequestId(res, { ok: true })).toEqual({ ok: true, requestId: 'req-123' });
  });
});

describe('createAdminAuthMiddleware', () => {
  it('answers 503 when no key is configured', () => {
    const res = mockRes();
    const next = vi.fn();

    createAdminAuthMiddleware({ getApiKey: () => undefined })(mockReq(), res, next);

    expect(res.statusCode).toBe(503);
    expect(next).not.toHaveBeenCalled();
  });

  it('accepts ApiKey and Bearer schemes', () => {
    const auth = createAdminAuthMiddleware({ getApiKey: () => 'test-key' });
    const next = vi.fn();

    auth(mockReq({ headers: { authorization: 'ApiKey test-key' } }), mockRes(), next);
    auth(mockReq({ headers: { authorization: 'Bearer test-key' } }), mockRes(), next);

    expect(next).toHaveBeenCalledTimes(2);
  });

  it('rejects a wrong key of the same length', () => {
    const res = mockRes();
    const next = vi.fn();
    createAdminAuthMiddleware({ getApiKey: () => 'test-key' })(
      mockReq({ headers: { authorization: 'ApiKey test-kez' } }),
      res,
      next,
    );
    expect(res.statusCode).toBe(401);
    expect(res.headers['www-authenticate']).toBe('ApiKey');
    expect(next).not.toHaveBeenCalled();
  });

  it('rejects other schemes', () => {
    const res = mockRes();
    createAdminAuthMiddleware({ getApiKey: () => 'test-key' })(
      mockReq({ headers: { authorization: 'Basic test-key' } }),
      res,
      vi.fn(),
    );
    expect(res.statusCode).toBe(401);
  });
});

describe('api key helpers', () => {
  it('extracts the key after a known scheme', () => {
    expect(presentedKey('ApiKey test-key')).toBe('test-key');
    expect(presentedKey('  Bearer test-key ')).toBe('test-key');
    expect(presentedKey('Basic test-key')).toBeNull();
    expect(presentedKey('ApiKey')).toBeNull();
    expect(presentedKey(undefined)).toBeNull();
  });

  it('compares keys of any length', () => {
    expect(apiKeysMatch('test-key', 'test-key')).toBe(true);
    expect(apiKeysMatch('test-key', 'test')).toBe(false);
    expect(apiKeysMatch('test-key', 'test-key-longer')).toBe(false);
  });
});

describe('error and not-found handlers', () => {
  it('returns structured 404', () => {
    const res = mockRes();
    notFoundHandler(mockReq(), res);
    expect(res.statusCode).toBe(404);
    expect((res.body as { error?: string }).error).toBe('Not found');
  });

  it('uses the status of framework errors', () => {
    const res = mockRes();
    res.locals.requestId = 'abc';
    const err = Object.assign(new Error('Unexpected token } in JSON'), { status: 400 });

    createErrorHandler(silentLogger)(err, mockReq(), res, vi.fn());

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: 'Unexpected token } in JSON', requestId: 'abc' });
  });

  it('exposes the code of client-side domain errors', () => {
    const res = mockRes();
    createErrorHandler(silentLogger)(new NotAuthorizedError('alice@example.com'), mockReq(), res, vi.fn());

    expect(res.statusCode).toBe(401);
    expect(res.body).toEqual({
      error: 'Account alice@example.com has no stored credential',
      code: 'NOT_AUTHORIZED',
      requestId: undefined,
    });
  });

  it('masks server-side errors and logs them', () => {
    const lines: string[] = [];
    const res = mockRes();

    createErrorHandler(createLogger({ sink: (line) => lines.push(line) }))(
      new StorageError('Cannot write credential file /home/alice/.oauth2.alice@example.com.json'),
      mockReq(),
      res,
      vi.fn(),
    );

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: 'Internal server error', requestId: undefined });
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ level: 'error', msg: 'request_error', status: 500 });
  });
});
