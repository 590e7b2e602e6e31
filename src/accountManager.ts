import {
  normalizeEmail,
  requireEmail,
  type Account,
  type AccountRegistry,
  type AccountUpdate,
} from './accounts.js';
import {
  AuthorizationFlowController,
  type AwaitCallbackOptions,
  type BeginOptions,
  type CallbackParams,
  type FlowState,
} from './authorizationFlow.js';
import type { AwaitRedirect } from './callbackListener.js';
import type { ManagerConfig } from './config.js';
import { CredentialAccessor } from './credentialAccessor.js';
import type { CredentialStore } from './credentials.js';
import { StorageError, UnknownAccountError } from './errors.js';
import { FileAccountRegistry } from './fileAccountRegistry.js';
import { FileCredentialStore } from './fileCredentialStore.js';
import { silentLogger, type Logger } from './logger.js';
import type { OAuthProvider } from './oauthProvider.js';
import { GoogleOAuthProvider } from './providers/googleOAuthProvider.js';

export interface AccountManagerDeps {
  provider?: OAuthProvider;
  registry?: AccountRegistry;
  credentials?: CredentialStore;
  awaitRedirect?: AwaitRedirect;
  now?: () => number;
  logger?: Logger;
}

/**
 * Owns the account registry and the credential store and keeps them
 * consistent. Everything that writes either store goes through here.
 */
export class AccountManager {
  readonly config: ManagerConfig;
  private readonly registry: AccountRegistry;
  private readonly credentials: CredentialStore;
  private readonly flows: AuthorizationFlowController;
  private readonly accessor: CredentialAccessor;
  private readonly logger: Logger;

  constructor(config: ManagerConfig, deps: AccountManagerDeps = {}) {
    this.config = config;
    this.logger = deps.logger ?? silentLogger;
    this.registry = deps.registry ?? new FileAccountRegistry(config.accountsFile);
    this.credentials =
      deps.credentials ?? new FileCredentialStore(config.credentialsDir, { logger: this.logger });

    const provider = deps.provider ?? new GoogleOAuthProvider(config.client, { now: deps.now });

    this.flows = new AuthorizationFlowController(config, {
      provider,
      registry: this.registry,
      credentials: this.credentials,
      awaitRedirect: deps.awaitRedirect,
      now: deps.now,
      logger: this.logger,
    });
    this.accessor = new CredentialAccessor({
      registry: this.registry,
      credentials: this.credentials,
      provider,
      expirySkewMs: config.expirySkewMs,
      now: deps.now,
      logger: this.logger,
    });
  }

  listAccounts(): Promise<Account[]> {
    return this.registry.list();
  }

  getAccount(email: string): Promise<Account | null> {
    return this.registry.get(email);
  }

  async updateAccount(email: string, update: AccountUpdate): Promise<Account> {
    const normalized = requireEmail(email);
    const account = await this.registry.get(normalized);
    if (!account) {
      throw new UnknownAccountError(normalized);
    }
    return this.registry.upsert({
      ...account,
      accountType: update.accountType ?? account.accountType,
      extraInfo: update.extraInfo ?? account.extraInfo,
    });
  }

  /**
   * Remove the account, then its credential. If the second step fails the
   * credential is left orphaned; the accessor already refuses it because the
   * account is gone.
   */
  async removeAccount(email: string): Promise<boolean> {
    const normalized = normalizeEmail(email);
    this.flows.cancel(normalized);

    const removed = await this.registry.remove(normalized);
    if (!removed) {
      return false;
    }

    try {
      await this.credentials.delete(normalized);
    } catch (err) {
      this.logger.error('credential_orphaned', { email: normalized, error: err });
      throw new StorageError(`Account ${normalized} removed but its credential could not be deleted`, {
        cause: err,
      });
    }

    this.logger.info('account_removed', { email: normalized });
    return true;
  }

  /** True when the account is registered and has a stored credential, expired or not. */
  async isAccountAuthorized(email: string): Promise<boolean> {
    const account = await this.registry.get(email);
    if (!account) {
      return false;
    }
    return (await this.credentials.load(account.email)) !== null;
  }

  beginAuthorization(email: string, options?: BeginOptions): Promise<string> {
    return this.flows.begin(email, options);
  }

  /** Wait on the loopback redirect for the pending flow and finish it. */
  completeAuthorization(email: string, options?: AwaitCallbackOptions): Promise<Account> {
    return this.flows.awaitCallback(email, options);
  }

  /** Finish the pending flow with a code and state captured elsewhere. */
  submitCallback(email: string, params: CallbackParams): Promise<Account> {
    return this.flows.complete(email, params);
  }

  cancelAuthorization(email: string): boolean {
    return this.flows.cancel(email);
  }

  getFlowState(email: string): FlowState {
    return this.flows.getState(email);
  }

  /**
   * Drop the stored credential of a registered account and start a forced
   * flow, e.g. after the scope list changed.
   */
  async reauthorize(email: string, options: Omit<BeginOptions, 'force'> = {}): Promise<string> {
    const normalized = requireEmail(email);
    const account = await this.registry.get(normalized);
    if (!account) {
      throw new UnknownAccountError(normalized);
    }

    this.flows.cancel(normalized);
    const deleted = await this.credentials.delete(normalized);
    this.logger.info('reauthorization_requested', { email: normalized, credentialDeleted: deleted });
    return this.flows.begin(normalized, { ...options, force: true });
  }

  getValidToken(email: string): Promise<string> {
    return this.accessor.getValidToken(email);
  }
}
