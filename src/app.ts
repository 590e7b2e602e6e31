/**
 * Admin HTTP API over the account manager.
 * Local processes use it to administer accounts and fetch access tokens.
 */

import express, { type Request, type RequestHandler, type Response } from 'express';
import { z } from 'zod';

import type { AccountManager } from './accountManager.js';
import type { Logger } from './logger.js';
import { createAdminAuthMiddleware } from './middleware/adminAuth.js';
import {
  createErrorHandler,
  createRateLimiter,
  createRequestLogger,
  notFoundHandler,
  withRequestId,
} from './middleware/observability.js';

export interface AppOptions {
  manager: AccountManager;
  logger: Logger;
  getApiKey: () => string | undefined;
  rateLimit?: { windowMs: number; max: number };
}

const UpdateAccountBody = z.object({
  accountType: z.string().min(1).optional(),
  extraInfo: z.string().optional(),
});

const BeginAuthorizationBody = z.object({
  force: z.boolean().optional(),
  accountType: z.string().min(1).optional(),
  extraInfo: z.string().optional(),
});

const CallbackBody = z.object({
  code: z.string().min(1),
  state: z.string().min(1),
});

type Handler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not forward rejected promises; route them to the error handler. */
function route(handler: Handler): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function parseBody<T>(schema: z.ZodType<T>, req: Request, res: Response): T | null {
  const result = schema.safeParse(req.body ?? {});
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  res.status(400).json(
    withRequestId(res, {
      error: `${issue?.path.join('.') || 'body'}: ${issue?.message ?? 'invalid request body'}`,
    }),
  );
  return null;
}

export function createApp(options: AppOptions): express.Express {
  const { manager, logger } = options;
  const app = express();
  app.disable('x-powered-by');
  app.use(createRequestLogger(logger));
  app.use(express.json());
  app.use(
    createRateLimiter({
      windowMs: options.rateLimit?.windowMs ?? 60_000,
      max: options.rateLimit?.max ?? 100,
      skip: (req) => req.path === '/health',
    }),
  );

  const adminAuth = createAdminAuthMiddleware({ getApiKey: options.getApiKey });

  app.get('/health', (_req, res) => {
    res.json(withRequestId(res, { status: 'ok' }));
  });

  app.get(
    '/accounts',
    adminAuth,
    route(async (_req, res) => {
      const accounts = await manager.listAccounts();
      res.json(withRequestId(res, { accounts }));
    }),
  );

  app.get(
    '/accounts/:email',
    adminAuth,
    route(async (req, res) => {
      const account = await manager.getAccount(req.params.email);
      if (!account) {
        res.status(404).json(withRequestId(res, { error: 'Account not found' }));
        return;
      }
      const authorized = await manager.isAccountAuthorized(account.email);
      res.json(withRequestId(res, { ...account, authorized }));
    }),
  );

  app.patch(
    '/accounts/:email',
    adminAuth,
    route(async (req, res) => {
      const body = parseBody(UpdateAccountBody, req, res);
      if (!body) return;
      const account = await manager.updateAccount(req.params.email, body);
      res.json(withRequestId(res, account));
    }),
  );

  app.delete(
    '/accounts/:email',
    adminAuth,
    route(async (req, res) => {
      const removed = await manager.removeAccount(req.params.email);
      if (!removed) {
        res.status(404).json(withRequestId(res, { error: 'Account not found' }));
        return;
      }
      res.status(204).end();
    }),
  );

  /** Start a flow; the caller opens the URL and later posts the callback. */
  app.post(
    '/accounts/:email/authorization',
    adminAuth,
    route(async (req, res) => {
      const body = parseBody(BeginAuthorizationBody, req, res);
      if (!body) return;
      const authorizationUrl = await manager.beginAuthorization(req.params.email, body);
      res.status(201).json(withRequestId(res, { authorizationUrl }));
    }),
  );

  app.post(
    '/accounts/:email/authorization/callback',
    adminAuth,
    route(async (req, res) => {
      const body = parseBody(CallbackBody, req, res);
      if (!body) return;
      const account = await manager.submitCallback(req.params.email, body);
      const { missingScopes } = manager.getFlowState(account.email);
      res.json(withRequestId(res, { ...account, ...(missingScopes ? { missingScopes } : {}) }));
    }),
  );

  app.delete('/accounts/:email/authorization', adminAuth, (req, res) => {
    manager.cancelAuthorization(req.params.email);
    res.status(204).end();
  });

  app.post(
    '/accounts/:email/token',
    adminAuth,
    route(async (req, res) => {
      const accessToken = await manager.getValidToken(req.params.email);
      res.setHeader('Cache-Control', 'no-store');
      res.json(withRequestId(res, { accessToken }));
    }),
  );

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
}
