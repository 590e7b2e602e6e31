/**
 * Provider adapter contract for the authorization-code grant.
 *
 * The flow controller and the credential accessor only talk to this
 * interface, so the Google implementation can be swapped for an in-process
 * fake in tests.
 */

export interface AuthorizationUrlInput {
  /** One-time state token bound to the pending flow. */
  state: string;
  scopes: string[];
  /** Pre-selects the account on the consent screen. */
  loginHint?: string;
}

/** Token material returned by the token endpoint. */
export interface TokenGrant {
  accessToken: string;
  /** Only present when the provider issued one in this response. */
  refreshToken?: string;
  /** ISO-8601 expiry of the access token. */
  expiresAt: string;
  /** Granted scopes, when the provider reports them. */
  scopes?: string[];
}

export interface OAuthProvider {
  /** Build the URL the user opens to grant consent; offline access is always requested. */
  buildAuthorizationUrl(input: AuthorizationUrlInput): string;

  /**
   * POST `grant_type=authorization_code`. Throws `TokenRejectedError` when the
   * endpoint answers with an OAuth error (invalid or reused code).
   */
  exchangeCode(code: string): Promise<TokenGrant>;

  /**
   * POST `grant_type=refresh_token`. Throws `TokenRejectedError` when the
   * endpoint answers with an OAuth error; `invalid_grant` means the refresh
   * token is revoked or expired.
   */
  refreshAccessToken(refreshToken: string): Promise<TokenGrant>;
}

/** Google access tokens live one hour; used when a response omits the expiry. */
export const DEFAULT_TOKEN_LIFETIME_MS = 60 * 60 * 1000;

export const REVOKED_GRANT = 'invalid_grant';
