import { createHash, randomUUID } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

import { OAuthManagerError } from '../errors.js';
import type { Logger } from '../logger.js';

export interface RateLimiterOptions {
  /** Length of each window in milliseconds. */
  windowMs: number;
  /** Maximum number of requests allowed per key within the window. */
  max: number;
  /**
   * Optional custom key generator. Defaults to a digest of the authorization
   * header (if set) or client IP as a fallback.
   */
  keyGenerator?: (req: Request) => string;
  /** Backing map for the windows; a fresh one when omitted. */
  store?: Map<string, RateLimitEntry>;
  /** Optional predicate to skip rate limiting for specific requests. */
  skip?: (req: Request) => boolean;
}

/** Attach a request ID and log the request lifecycle. */
export function createRequestLogger(logger: Logger) {
  return function requestLogger(req: Request, res: Response, next: NextFunction) {
    const headerId = req.headers['x-request-id'];
    const requestId =
      typeof headerId === 'string' && headerId.trim().length > 0
        ? headerId.trim()
        : randomUUID();

    res.locals.requestId = requestId;
    res.setHeader('x-request-id', requestId);

    const startedAt = process.hrtime.bigint();
    res.on('finish', () => {
      const durationMs = Number((process.hrtime.bigint() - startedAt) / BigInt(1_000_000));
      const client = req.ip || req.socket.remoteAddress;

      logger.info('request', {
        requestId,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs,
        ...(client ? { client } : {}),
      });
    });

    next();
  };
}

export interface RateLimitEntry {
  count: number;
  expiresAt: number;
}

/** Credentials never become map keys; only their digest does. */
function defaultRateLimitKey(req: Request): string {
  const authorization = req.headers.authorization;
  if (typeof authorization === 'string') {
    return `auth:${createHash('sha256').update(authorization, 'utf8').digest('base64url')}`;
  }
  return `ip:${req.ip ?? req.socket.remoteAddress ?? 'unknown'}`;
}

/**
 * Create an in-memory fixed-window rate limiter middleware. Expired windows
 * are swept at most once per window, so the map holds only keys seen within
 * the last window.
 */
export function createRateLimiter(options: RateLimiterOptions) {
  const { windowMs, max, keyGenerator, skip } = options;
  const limitWindowMs = Number.isFinite(windowMs) && windowMs > 0 ? windowMs : 60_000;
  const limitMax = Number.isFinite(max) && max > 0 ? max : 60;
  const hits = options.store ?? new Map<string, RateLimitEntry>();
  let nextSweepAt = 0;

  const sweep = (now: number) => {
    if (now < nextSweepAt) return;
    for (const [key, entry] of hits) {
      if (entry.expiresAt <= now) hits.delete(key);
    }
    nextSweepAt = now + limitWindowMs;
  };

  return function rateLimiter(req: Request, res: Response, next: NextFunction) {
    if (skip?.(req)) {
      next();
      return;
    }

    const key = keyGenerator?.(req) ?? defaultRateLimitKey(req);
    const now = Date.now();
    sweep(now);
    const existing = hits.get(key);

    if (!existing || existing.expiresAt <= now) {
      hits.set(key, { count: 1, expiresAt: now + limitWindowMs });
      next();
      return;
    }

    if (existing.count >= limitMax) {
      const retryAfterSeconds = Math.max(1, Math.ceil((existing.expiresAt - now) / 1000));
      res.setHeader('Retry-After', retryAfterSeconds.toString());
      res
        .status(429)
        .json(withRequestId(res, { error: 'Too many requests', retryAfter: retryAfterSeconds }));
      return;
    }

    existing.count += 1;
    next();
  };
}

/** Attach requestId to JSON bodies. */
export function withRequestId<T extends object>(res: Response, body: T): T & { requestId?: string } {
  const requestId: unknown = res.locals.requestId;
  return { ...body, requestId: typeof requestId === 'string' ? requestId : undefined };
}

/** 404 handler that returns a structured JSON response. */
export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json(withRequestId(res, { error: 'Not found' }));
}

function statusOf(err: unknown): number {
  if (err instanceof OAuthManagerError) {
    return err.status;
  }
  // body-parser and http-errors set `status` on what they throw
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

/** Central error handler that emits structured JSON responses. */
export function createErrorHandler(logger: Logger) {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars -- Express error handler signature requires all args
  return function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
    const status = statusOf(err);

    const message =
      status >= 500
        ? 'Internal server error'
        : err instanceof Error
          ? err.message
          : 'Request failed';

    const payload = withRequestId(res, {
      error: message,
      ...(err instanceof OAuthManagerError && status < 500 ? { code: err.code } : {}),
    });

    const fields = {
      status,
      requestId: res.locals.requestId,
      error: err,
      stack: err instanceof Error ? err.stack : undefined,
    };
    if (status >= 500) {
      logger.error('request_error', fields);
    } else {
      logger.warn('request_rejected', { status, requestId: res.locals.requestId, error: err });
    }

    res.status(status).json(payload);
  };
}
