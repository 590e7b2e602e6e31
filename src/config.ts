/**
 * Manager configuration.
 *
 * The manager only ever sees a `ManagerConfig` object; reading the
 * environment and the client-secrets file happens here, once, so tests can
 * build isolated configs without touching process state.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

import { ConfigError, errorMessage } from './errors.js';

export const DEFAULT_SCOPES = [
  'openid',
  'https://www.googleapis.com/auth/userinfo.email',
  'https://mail.google.com/',
  'https://www.googleapis.com/auth/analytics.readonly',
];

export const DEFAULT_REDIRECT_URI = 'http://localhost:8080/';
export const DEFAULT_CALLBACK_TIMEOUT_MS = 5 * 60 * 1000;
export const DEFAULT_FLOW_TTL_MS = 10 * 60 * 1000;
export const DEFAULT_EXPIRY_SKEW_MS = 60 * 1000;

export interface OAuthClientConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export interface ManagerConfig {
  /** Account registry file. */
  accountsFile: string;
  /** Directory holding one `.oauth2.<email>.json` per account. */
  credentialsDir: string;
  client: OAuthClientConfig;
  scopes: string[];
  callbackTimeoutMs: number;
  flowTtlMs: number;
  expirySkewMs: number;
}

export interface ManagerConfigInput {
  accountsFile: string;
  credentialsDir: string;
  client: OAuthClientConfig;
  scopes?: string[];
  callbackTimeoutMs?: number;
  flowTtlMs?: number;
  expirySkewMs?: number;
}

function isHttpUrl(value: string): boolean {
  try {
    return new URL(value).protocol === 'http:';
  } catch {
    return false;
  }
}

const RedirectUriSchema = z.string().refine(isHttpUrl, {
  message: 'redirect URI must be a plain http loopback URL',
});

const ClientBlockSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).default([]),
});

/** Google's downloadable client-secrets JSON: an `installed` or a `web` block. */
const ClientSecretsSchema = z.union([
  z.object({ installed: ClientBlockSchema }).transform((file) => file.installed),
  z.object({ web: ClientBlockSchema }).transform((file) => file.web),
]);

const ManagerConfigSchema = z.object({
  accountsFile: z.string().min(1),
  credentialsDir: z.string().min(1),
  client: z.object({
    clientId: z.string().min(1),
    clientSecret: z.string().min(1),
    redirectUri: RedirectUriSchema,
  }),
  scopes: z.array(z.string().min(1)).min(1).default(DEFAULT_SCOPES),
  callbackTimeoutMs: z.number().int().positive().default(DEFAULT_CALLBACK_TIMEOUT_MS),
  flowTtlMs: z.number().int().positive().default(DEFAULT_FLOW_TTL_MS),
  expirySkewMs: z.number().int().nonnegative().default(DEFAULT_EXPIRY_SKEW_MS),
});

/** Validate and fill defaults. Throws `ConfigError` naming the first bad field. */
export function createManagerConfig(input: ManagerConfigInput): ManagerConfig {
  const result = ManagerConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(
      `Invalid manager config at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'invalid'}`,
    );
  }
  return result.data;
}

/** Read a client-secrets file; the first listed redirect URI wins unless overridden. */
export function loadClientSecrets(filePath: string, redirectUri?: string): OAuthClientConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Cannot read OAuth client secrets ${filePath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const result = ClientSecretsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      `OAuth client secrets ${filePath} must contain an "installed" or "web" block with client_id and client_secret`,
    );
  }

  return {
    clientId: result.data.client_id,
    clientSecret: result.data.client_secret,
    redirectUri: redirectUri ?? result.data.redirect_uris[0] ?? DEFAULT_REDIRECT_URI,
  };
}

function optionalInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got ${JSON.stringify(raw)}`);
  }
  return value;
}

/**
 * Build a config from the environment:
 * `GAUTH_FILE` (./.gauth.json), `ACCOUNTS_FILE` (./.accounts.json),
 * `CREDENTIALS_DIR` (.), `OAUTH_REDIRECT_URI`, `OAUTH_SCOPES` (space
 * separated), `OAUTH_CALLBACK_TIMEOUT_MS`, `OAUTH_FLOW_TTL_MS`.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ManagerConfig {
  const gauthFile = resolve(cwd, env.GAUTH_FILE ?? '.gauth.json');
  const client = loadClientSecrets(gauthFile, env.OAUTH_REDIRECT_URI);
  const scopes = env.OAUTH_SCOPES?.split(/\s+/).filter((scope) => scope.length > 0);

  return createManagerConfig({
    accountsFile: resolve(cwd, env.ACCOUNTS_FILE ?? '.accounts.json'),
    credentialsDir: resolve(cwd, env.CREDENTIALS_DIR ?? '.'),
    client,
    scopes: scopes && scopes.length > 0 ? scopes : undefined,
    callbackTimeoutMs: optionalInt(env, 'OAUTH_CALLBACK_TIMEOUT_MS'),
    flowTtlMs: optionalInt(env, 'OAUTH_FLOW_TTL_MS'),
  });
}

export interface CallbackTarget {
  host: string;
  port: number;
  path: string;
}

/** Where the callback listener binds, derived from the redirect URI. */
export function callbackTargetFor(redirectUri: string): CallbackTarget {
  const url = new URL(redirectUri);
  const host = url.hostname.startsWith('[') ? url.hostname.slice(1, -1) : url.hostname;
  return {
    host,
    port: url.port ? Number(url.port) : 80,
    path: url.pathname || '/',
  };
}
