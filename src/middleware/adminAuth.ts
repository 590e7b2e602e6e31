import { createHash, timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

import { withRequestId } from './observability.js';

const AUTH_SCHEME = /^(?:ApiKey|Bearer) +(\S+)$/;

export interface AdminAuthOptions {
  /** Read on every request so a rotated key takes effect without a restart. */
  getApiKey: () => string | undefined;
}

export function presentedKey(header: string | undefined): string | null {
  const match = header ? AUTH_SCHEME.exec(header.trim()) : null;
  return match?.[1] ?? null;
}

/** Digests have a fixed length, so neither content nor length of the key leaks through timing. */
export function apiKeysMatch(expected: string, presented: string): boolean {
  const a = createHash('sha256').update(expected, 'utf8').digest();
  const b = createHash('sha256').update(presented, 'utf8').digest();
  return timingSafeEqual(a, b);
}

/**
 * Guards every admin route: account listings, flow control and the token
 * endpoint. Without a configured key the API is closed.
 */
export function createAdminAuthMiddleware(options: AdminAuthOptions) {
  return (req: Request, res: Response, next: NextFunction) => {
    const apiKey = options.getApiKey();
    if (!apiKey) {
      res.status(503).json(
        withRequestId(res, {
          error: 'Admin API key not configured',
          hint: 'Set API_KEY to enable the admin API.',
        }),
      );
      return;
    }

    const presented = presentedKey(req.headers.authorization);
    if (presented !== null && apiKeysMatch(apiKey, presented)) {
      next();
      return;
    }

    res.setHeader('WWW-Authenticate', 'ApiKey');
    res.status(401).json(
      withRequestId(res, {
        error: 'Unauthorized',
        hint: 'Send Authorization: ApiKey <API_KEY>.',
      }),
    );
  };
}
