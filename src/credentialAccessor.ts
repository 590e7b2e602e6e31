import { requireEmail, type AccountRegistry } from './accounts.js';
import { isCredentialFresh, type Credential, type CredentialStore } from './credentials.js';
import {
  NotAuthorizedError,
  ReauthorizationRequiredError,
  TokenRejectedError,
  UnknownAccountError,
} from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { REVOKED_GRANT, type OAuthProvider, type TokenGrant } from './oauthProvider.js';

export interface CredentialAccessorDeps {
  registry: AccountRegistry;
  credentials: CredentialStore;
  provider: OAuthProvider;
  expirySkewMs: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * The one place API clients get an access token from. Refreshes lazily and
 * never starts a browser flow: anything that needs the user surfaces as
 * `ReauthorizationRequiredError`.
 */
export class CredentialAccessor {
  private readonly registry: AccountRegistry;
  private readonly credentials: CredentialStore;
  private readonly provider: OAuthProvider;
  private readonly expirySkewMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly refreshing = new Map<string, Promise<string>>();

  constructor(deps: CredentialAccessorDeps) {
    this.registry = deps.registry;
    this.credentials = deps.credentials;
    this.provider = deps.provider;
    this.expirySkewMs = deps.expirySkewMs;
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger ?? silentLogger;
  }

  async getValidToken(email: string): Promise<string> {
    const normalized = requireEmail(email);

    const account = await this.registry.get(normalized);
    if (!account) {
      throw new UnknownAccountError(normalized);
    }

    const credential = await this.credentials.load(normalized);
    if (!credential) {
      throw new NotAuthorizedError(normalized);
    }

    if (isCredentialFresh(credential, this.now(), this.expirySkewMs)) {
      return credential.accessToken;
    }

    const inFlight = this.refreshing.get(normalized);
    if (inFlight) {
      return inFlight;
    }

    const refresh = this.refresh(normalized, credential).finally(() => {
      this.refreshing.delete(normalized);
    });
    this.refreshing.set(normalized, refresh);
    return refresh;
  }

  private async refresh(email: string, credential: Credential): Promise<string> {
    if (!credential.refreshToken) {
      await this.credentials.delete(email);
      this.logger.warn('credential_expired_without_refresh_token', { email });
      throw new ReauthorizationRequiredError(email, 'access token expired and no refresh token is stored');
    }

    let grant: TokenGrant;
    try {
      grant = await this.provider.refreshAccessToken(credential.refreshToken);
    } catch (err) {
      if (err instanceof TokenRejectedError && err.reason === REVOKED_GRANT) {
        await this.credentials.delete(email);
        this.logger.warn('refresh_token_revoked', { email });
        throw new ReauthorizationRequiredError(email, 'refresh token was rejected by the provider');
      }
      throw err;
    }

    // The account or its credential may have been removed while the refresh ran.
    if (!(await this.registry.get(email))) {
      throw new UnknownAccountError(email);
    }
    if (!(await this.credentials.load(email))) {
      throw new NotAuthorizedError(email);
    }

    await this.credentials.save(email, {
      accessToken: grant.accessToken,
      refreshToken: grant.refreshToken ?? credential.refreshToken,
      expiresAt: grant.expiresAt,
      scopes: grant.scopes ?? credential.scopes,
    });
    this.logger.info('access_token_refreshed', { email, expiresAt: grant.expiresAt });
    return grant.accessToken;
  }
}
