import { OAuth2Client, type Credentials } from 'google-auth-library';
import { z } from 'zod';

import type { OAuthClientConfig } from '../config.js';
import { TokenRejectedError } from '../errors.js';
import {
  DEFAULT_TOKEN_LIFETIME_MS,
  type AuthorizationUrlInput,
  type OAuthProvider,
  type TokenGrant,
} from '../oauthProvider.js';

/** Shape of a gaxios error carrying an RFC 6749 error body. */
const OAuthErrorResponseSchema = z.object({
  response: z.object({
    status: z.number(),
    data: z.object({
      error: z.string(),
      error_description: z.string().optional(),
    }),
  }),
});

/**
 * Map a token-endpoint failure to `TokenRejectedError`. Only 4xx answers
 * with an OAuth `error` field count; network failures and 5xx return null
 * and are rethrown as they are.
 */
export function toTokenRejection(err: unknown): TokenRejectedError | null {
  const result = OAuthErrorResponseSchema.safeParse(err);
  if (!result.success) {
    return null;
  }

  const { status, data } = result.data.response;
  if (status < 400 || status >= 500) {
    return null;
  }

  return new TokenRejectedError(data.error, data.error_description, { cause: err });
}

export interface GoogleOAuthProviderOptions {
  now?: () => number;
}

/**
 * Google implementation of the provider contract on top of
 * google-auth-library's `OAuth2Client`. A fresh client is created per call so
 * no token material lingers between accounts.
 */
export class GoogleOAuthProvider implements OAuthProvider {
  private readonly client: OAuthClientConfig;
  private readonly now: () => number;

  constructor(client: OAuthClientConfig, options: GoogleOAuthProviderOptions = {}) {
    this.client = client;
    this.now = options.now ?? Date.now;
  }

  buildAuthorizationUrl(input: AuthorizationUrlInput): string {
    return this.createClient().generateAuthUrl({
      access_type: 'offline',
      // Google only returns a refresh token on the consent screen.
      prompt: 'consent',
      scope: input.scopes,
      state: input.state,
      login_hint: input.loginHint,
      include_granted_scopes: true,
    });
  }

  async exchangeCode(code: string): Promise<TokenGrant> {
    const oauth = this.createClient();
    try {
      const { tokens } = await oauth.getToken(code);
      return this.toGrant(tokens);
    } catch (err) {
      throw toTokenRejection(err) ?? err;
    }
  }

  async refreshAccessToken(refreshToken: string): Promise<TokenGrant> {
    const oauth = this.createClient();
    oauth.setCredentials({ refresh_token: refreshToken });

    try {
      await oauth.getAccessToken();
    } catch (err) {
      throw toTokenRejection(err) ?? err;
    }

    const grant = this.toGrant(oauth.credentials);
    if (grant.refreshToken === refreshToken) {
      delete grant.refreshToken;
    }
    return grant;
  }

  private createClient(): OAuth2Client {
    return new OAuth2Client({
      clientId: this.client.clientId,
      clientSecret: this.client.clientSecret,
      redirectUri: this.client.redirectUri,
    });
  }

  private toGrant(tokens: Credentials): TokenGrant {
    if (!tokens.access_token) {
      throw new TokenRejectedError('invalid_response', 'token response carried no access_token');
    }

    const expiresAt = tokens.expiry_date ?? this.now() + DEFAULT_TOKEN_LIFETIME_MS;
    const grant: TokenGrant = {
      accessToken: tokens.access_token,
      expiresAt: new Date(expiresAt).toISOString(),
    };
    if (tokens.refresh_token) {
      grant.refreshToken = tokens.refresh_token;
    }
    if (tokens.scope) {
      grant.scopes = tokens.scope.split(' ').filter((scope) => scope.length > 0);
    }
    return grant;
  }
}
