import { randomBytes, timingSafeEqual } from 'node:crypto';

import {
  DEFAULT_ACCOUNT_TYPE,
  normalizeEmail,
  requireEmail,
  type Account,
  type AccountRegistry,
} from './accounts.js';
import {
  awaitRedirect as defaultAwaitRedirect,
  type AwaitRedirect,
  type CallbackOutcome,
} from './callbackListener.js';
import { callbackTargetFor, type CallbackTarget, type ManagerConfig } from './config.js';
import { isCredentialFresh, type Credential, type CredentialStore } from './credentials.js';
import {
  AlreadyAuthorizedError,
  CallbackTimeoutError,
  ExchangeFailedError,
  FlowAlreadyInProgressError,
  FlowCancelledError,
  NoPendingFlowError,
  ProviderDeniedError,
  StateMismatchError,
  TokenRejectedError,
  errorMessage,
} from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { OAuthProvider, TokenGrant } from './oauthProvider.js';

export type FlowStatus =
  | 'not_started'
  | 'url_issued'
  | 'awaiting_callback'
  | 'exchanged'
  | 'complete'
  | 'failed';

export interface FlowState {
  status: FlowStatus;
  /** Set when `status` is `failed`. */
  reason?: string;
  /** Requested scopes the provider did not grant; set on `complete` when any are missing. */
  missingScopes?: string[];
}

export interface BeginOptions {
  /** Start a new flow even when a valid credential is already stored. */
  force?: boolean;
  accountType?: string;
  extraInfo?: string;
  /** Defaults to the account email. */
  loginHint?: string;
}

export interface CallbackParams {
  code: string;
  state: string;
}

export interface AwaitCallbackOptions {
  timeoutMs?: number;
  onListening?: (address: { host: string; port: number }) => void;
}

export interface AuthorizationFlowDeps {
  provider: OAuthProvider;
  registry: AccountRegistry;
  credentials: CredentialStore;
  awaitRedirect?: AwaitRedirect;
  now?: () => number;
  logger?: Logger;
}

interface PendingFlow {
  email: string;
  state: string;
  deadline: number;
  status: 'url_issued' | 'awaiting_callback' | 'exchanged';
  /** A code exchange is running; a second `complete` must not start. */
  exchanging: boolean;
  abort: AbortController;
  accountType?: string;
  extraInfo?: string;
}

const STATE_BYTES = 32;

function statesMatch(expected: string, received: string): boolean {
  const a = Buffer.from(expected, 'utf8');
  const b = Buffer.from(received, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Drives the authorization-code grant for each account.
 *
 * Per email: `not_started → url_issued → awaiting_callback → exchanged →
 * complete`, or `failed` with a reason. At most one pending flow per email
 * lives in memory; it is dropped on completion, failure, cancel or when its
 * deadline passes. Codes are single-use, so every failure after `begin`
 * requires a new `begin`.
 */
export class AuthorizationFlowController {
  private readonly config: ManagerConfig;
  private readonly provider: OAuthProvider;
  private readonly registry: AccountRegistry;
  private readonly credentials: CredentialStore;
  private readonly awaitRedirect: AwaitRedirect;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly target: CallbackTarget;
  private readonly flows = new Map<string, PendingFlow>();
  private readonly states = new Map<string, FlowState>();

  constructor(config: ManagerConfig, deps: AuthorizationFlowDeps) {
    this.config = config;
    this.provider = deps.provider;
    this.registry = deps.registry;
    this.credentials = deps.credentials;
    this.awaitRedirect = deps.awaitRedirect ?? defaultAwaitRedirect;
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger ?? silentLogger;
    this.target = callbackTargetFor(config.client.redirectUri);
  }

  getState(email: string): FlowState {
    return this.states.get(normalizeEmail(email)) ?? { status: 'not_started' };
  }

  hasPendingFlow(email: string): boolean {
    return this.liveFlow(normalizeEmail(email)) !== undefined;
  }

  /** Issue an authorization URL bound to a fresh state token. */
  async begin(email: string, options: BeginOptions = {}): Promise<string> {
    const normalized = requireEmail(email);
    if (this.liveFlow(normalized)) {
      throw new FlowAlreadyInProgressError(normalized);
    }

    if (!options.force && (await this.hasValidCredential(normalized))) {
      throw new AlreadyAuthorizedError(normalized);
    }

    // Re-check: another begin may have run while the stores were read.
    if (this.liveFlow(normalized)) {
      throw new FlowAlreadyInProgressError(normalized);
    }

    const state = randomBytes(STATE_BYTES).toString('base64url');
    const url = this.provider.buildAuthorizationUrl({
      state,
      scopes: this.config.scopes,
      loginHint: options.loginHint ?? normalized,
    });

    this.flows.set(normalized, {
      email: normalized,
      state,
      deadline: this.now() + this.config.flowTtlMs,
      status: 'url_issued',
      exchanging: false,
      abort: new AbortController(),
      accountType: options.accountType,
      extraInfo: options.extraInfo,
    });
    this.setState(normalized, { status: 'url_issued' });
    this.logger.info('authorization_started', { email: normalized, force: options.force === true });
    return url;
  }

  /**
   * Run the callback listener for the pending flow, then complete it with
   * whatever the redirect carried. The listener is torn down before this
   * returns or throws.
   */
  async awaitCallback(email: string, options: AwaitCallbackOptions = {}): Promise<Account> {
    const normalized = requireEmail(email);
    const flow = this.liveFlow(normalized);
    if (!flow) {
      throw new NoPendingFlowError(normalized);
    }
    if (flow.status !== 'url_issued' || flow.exchanging) {
      throw new FlowAlreadyInProgressError(normalized);
    }

    const timeoutMs =
      options.timeoutMs ??
      Math.max(1, Math.min(this.config.callbackTimeoutMs, flow.deadline - this.now()));

    flow.status = 'awaiting_callback';
    this.setState(normalized, { status: 'awaiting_callback' });

    let outcome: CallbackOutcome;
    try {
      outcome = await this.awaitRedirect({
        ...this.target,
        timeoutMs,
        signal: flow.abort.signal,
        onListening: options.onListening,
        logger: this.logger.child({ email: normalized }),
      });
    } catch (err) {
      // Setup failure (port busy): the flow stays usable once the port frees up.
      if (this.flows.get(normalized) === flow) {
        flow.status = 'url_issued';
        this.setState(normalized, { status: 'url_issued' });
      }
      throw err;
    }

    switch (outcome.type) {
      case 'code':
        return this.complete(normalized, outcome);
      case 'provider_error':
        if (outcome.state && !statesMatch(flow.state, outcome.state)) {
          this.fail(flow, 'state_mismatch');
          throw new StateMismatchError(normalized);
        }
        this.fail(flow, `provider_error:${outcome.error}`);
        throw new ProviderDeniedError(outcome.error, outcome.description);
      case 'timeout':
        this.fail(flow, 'timeout');
        throw new CallbackTimeoutError(normalized, timeoutMs);
      case 'cancelled':
        throw new FlowCancelledError(normalized);
    }
  }

  /** Exchange a received code and persist the credential, then the account. */
  async complete(email: string, params: CallbackParams): Promise<Account> {
    const normalized = requireEmail(email);
    const flow = this.liveFlow(normalized);
    if (!flow) {
      throw new NoPendingFlowError(normalized);
    }
    if (flow.exchanging) {
      throw new FlowAlreadyInProgressError(normalized);
    }
    if (!statesMatch(flow.state, params.state)) {
      this.fail(flow, 'state_mismatch');
      throw new StateMismatchError(normalized);
    }

    flow.exchanging = true;
    let grant: TokenGrant;
    try {
      grant = await this.provider.exchangeCode(params.code);
    } catch (err) {
      const reason = err instanceof TokenRejectedError ? err.reason : errorMessage(err);
      this.fail(flow, `exchange_failed:${reason}`);
      throw new ExchangeFailedError(reason, { cause: err });
    }

    if (this.flows.get(normalized) !== flow) {
      throw new FlowCancelledError(normalized);
    }
    flow.status = 'exchanged';
    this.setState(normalized, { status: 'exchanged' });

    let account: Account;
    try {
      account = await this.persist(flow, grant);
    } catch (err) {
      this.fail(flow, 'storage_failed');
      throw err;
    }

    this.discard(flow);
    const missingScopes = this.missingScopes(grant);
    if (missingScopes.length > 0) {
      this.setState(normalized, { status: 'complete', missingScopes });
      this.logger.warn('scopes_not_granted', { email: normalized, missingScopes });
    } else {
      this.setState(normalized, { status: 'complete' });
    }
    this.logger.info('authorization_completed', {
      email: normalized,
      hasRefreshToken: grant.refreshToken !== undefined,
    });
    return account;
  }

  /** Drop the pending flow and stop its listener. Safe to call at any time. */
  cancel(email: string): boolean {
    const normalized = normalizeEmail(email);
    const flow = this.flows.get(normalized);
    if (!flow) {
      return false;
    }
    this.fail(flow, 'cancelled');
    return true;
  }

  /** Providers that omit the granted scopes are taken to have granted all of them. */
  private missingScopes(grant: TokenGrant): string[] {
    if (!grant.scopes) {
      return [];
    }
    const granted = new Set(grant.scopes);
    return this.config.scopes.filter((scope) => !granted.has(scope));
  }

  private async hasValidCredential(email: string): Promise<boolean> {
    const account = await this.registry.get(email);
    if (!account) {
      return false;
    }
    const credential = await this.credentials.load(email);
    return credential !== null && isCredentialFresh(credential, this.now(), this.config.expirySkewMs);
  }

  /**
   * Credential first, then account. If the account write fails the new
   * credential is removed again, so no credential is left without an account.
   * A stored refresh token is carried over only for a registered account; a
   * credential left behind by a removed account is overwritten.
   */
  private async persist(flow: PendingFlow, grant: TokenGrant): Promise<Account> {
    const existing = await this.registry.get(flow.email);
    const previous = existing ? await this.credentials.load(flow.email) : null;
    const refreshToken = grant.refreshToken ?? previous?.refreshToken;
    const credential: Credential = {
      accessToken: grant.accessToken,
      expiresAt: grant.expiresAt,
      scopes: grant.scopes ?? this.config.scopes,
      ...(refreshToken ? { refreshToken } : {}),
    };

    await this.credentials.save(flow.email, credential);

    try {
      return await this.registry.upsert({
        email: flow.email,
        accountType: flow.accountType ?? existing?.accountType ?? DEFAULT_ACCOUNT_TYPE,
        extraInfo: flow.extraInfo ?? existing?.extraInfo ?? '',
      });
    } catch (err) {
      await this.rollbackCredential(flow.email);
      throw err;
    }
  }

  private async rollbackCredential(email: string): Promise<void> {
    try {
      await this.credentials.delete(email);
    } catch (err) {
      // Left behind as an orphan; the accessor refuses credentials without an account.
      this.logger.error('credential_rollback_failed', { email, error: err });
    }
  }

  private liveFlow(email: string): PendingFlow | undefined {
    const flow = this.flows.get(email);
    if (!flow) {
      return undefined;
    }
    if (flow.status === 'url_issued' && !flow.exchanging && this.now() > flow.deadline) {
      this.fail(flow, 'expired');
      return undefined;
    }
    return flow;
  }

  private fail(flow: PendingFlow, reason: string): void {
    if (this.flows.get(flow.email) !== flow) {
      return;
    }
    this.discard(flow);
    this.setState(flow.email, { status: 'failed', reason });
    this.logger.warn('authorization_failed', { email: flow.email, reason });
  }

  private discard(flow: PendingFlow): void {
    if (this.flows.get(flow.email) === flow) {
      this.flows.delete(flow.email);
    }
    flow.abort.abort();
  }

  private setState(email: string, state: FlowState): void {
    this.states.set(email, state);
  }
}
