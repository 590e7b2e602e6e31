/**
 * Single-use loopback listener for the OAuth redirect.
 *
 * `awaitRedirect` binds the redirect URI's port, accepts the first
 * well-formed callback on the expected path, answers it with a static page
 * and shuts down. The server is closed and its sockets are gone before the
 * returned promise settles, on every path.
 */

import type { Server } from 'node:http';
import express from 'express';

import { PortUnavailableError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

export type CallbackOutcome =
  | { type: 'code'; code: string; state: string }
  | { type: 'provider_error'; error: string; description?: string; state?: string }
  | { type: 'timeout' }
  | { type: 'cancelled' };

export type RedirectOutcome = Extract<CallbackOutcome, { type: 'code' | 'provider_error' }>;

export interface AwaitRedirectOptions {
  host: string;
  port: number;
  path: string;
  timeoutMs: number;
  /** Aborting stops the listener; the call resolves `cancelled`. */
  signal?: AbortSignal;
  onListening?: (address: { host: string; port: number }) => void;
  logger?: Logger;
}

export type AwaitRedirect = (options: AwaitRedirectOptions) => Promise<CallbackOutcome>;

const page = (title: string, body: string) =>
  '<!DOCTYPE html><html><head><meta charset="utf-8"><title>' +
  title +
  '</title></head>' +
  '<body style="font-family:sans-serif;text-align:center;padding:40px">' +
  `<h1>${title}</h1><p>${body}</p>` +
  '</body></html>';

const AUTHORIZED_PAGE = page(
  'Authorization received',
  'You can close this window and return to the application.',
);
const DENIED_PAGE = page(
  'Authorization not granted',
  'The provider reported an error. You can close this window and return to the application.',
);
const INVALID_PAGE = page('Invalid callback', 'This request did not carry an authorization response.');

function queryValue(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** Classify redirect query parameters; an `error` wins over a code. */
export function parseRedirectQuery(query: Record<string, unknown>): RedirectOutcome | null {
  const error = queryValue(query.error);
  const state = queryValue(query.state);

  if (error) {
    const outcome: RedirectOutcome = { type: 'provider_error', error };
    const description = queryValue(query.error_description);
    if (description) outcome.description = description;
    if (state) outcome.state = state;
    return outcome;
  }

  const code = queryValue(query.code);
  if (code && state) {
    return { type: 'code', code, state };
  }
  return null;
}

function isPortConflict(err: Error): boolean {
  return 'code' in err && (err.code === 'EADDRINUSE' || err.code === 'EACCES');
}

function listen(app: express.Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    const onError = (err: Error) => {
      server.off('listening', onListening);
      reject(isPortConflict(err) ? new PortUnavailableError(port, { cause: err }) : err);
    };
    const onListening = () => {
      server.off('error', onError);
      resolve(server);
    };
    server.once('error', onError);
    server.once('listening', onListening);
  });
}

/** Connections still open after this long are destroyed. */
const FORCE_CLOSE_MS = 1000;

function shutdown(server: Server): Promise<void> {
  return new Promise((resolve) => {
    const force = setTimeout(() => server.closeAllConnections(), FORCE_CLOSE_MS);
    // The callback also fires (with ERR_SERVER_NOT_RUNNING) if close() already ran.
    server.close(() => {
      clearTimeout(force);
      resolve();
    });
    server.closeIdleConnections();
  });
}

export async function awaitRedirect(options: AwaitRedirectOptions): Promise<CallbackOutcome> {
  const logger = options.logger ?? silentLogger;
  if (options.signal?.aborted) {
    return { type: 'cancelled' };
  }

  let settle!: (outcome: CallbackOutcome) => void;
  const outcome = new Promise<CallbackOutcome>((resolve) => {
    settle = resolve;
  });

  let server: Server | undefined;
  let accepted = false;

  const app = express();
  app.disable('x-powered-by');

  // Express routes HEAD to GET handlers; a prefetch must not consume the callback.
  app.head(options.path, (_req, res) => {
    res.status(405).set('Allow', 'GET').end();
  });

  app.get(options.path, (req, res) => {
    const redirect = accepted ? null : parseRedirectQuery(req.query);
    if (!redirect) {
      res.status(accepted ? 410 : 400).type('html').send(INVALID_PAGE);
      return;
    }

    accepted = true;
    server?.close();
    res.set('Connection', 'close');
    res.on('finish', () => settle(redirect));
    res.on('close', () => settle(redirect));
    res
      .status(200)
      .type('html')
      .send(redirect.type === 'code' ? AUTHORIZED_PAGE : DENIED_PAGE);
  });

  app.use((_req, res) => {
    res.status(404).type('text').send('Not found');
  });

  server = await listen(app, options.host, options.port);
  server.on('error', (err) => {
    logger.error('callback_listener_error', { error: err });
  });

  const address = server.address();
  const boundPort = address && typeof address === 'object' ? address.port : options.port;
  logger.info('callback_listener_started', { host: options.host, port: boundPort, path: options.path });

  const timer = setTimeout(() => settle({ type: 'timeout' }), options.timeoutMs);
  const onAbort = () => settle({ type: 'cancelled' });
  options.signal?.addEventListener('abort', onAbort, { once: true });
  if (options.signal?.aborted) {
    onAbort();
  }

  try {
    options.onListening?.({ host: options.host, port: boundPort });
    const result = await outcome;
    logger.info('callback_listener_finished', { outcome: result.type });
    return result;
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
    await shutdown(server);
  }
}
