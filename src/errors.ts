/**
 * Error taxonomy for the credential manager.
 *
 * Every failure a caller can act on has its own class and `code`, so "no
 * data" is never confused with "operation failed". `category` groups them
 * the way callers decide what to do next; `status` is what the admin API
 * answers with.
 */

export type ErrorCategory = 'setup' | 'protocol' | 'timeout' | 'credential' | 'input';

export type OAuthErrorCode =
  | 'CONFIG_INVALID'
  | 'STORAGE_FAILED'
  | 'PORT_UNAVAILABLE'
  | 'INVALID_EMAIL'
  | 'ALREADY_AUTHORIZED'
  | 'FLOW_ALREADY_IN_PROGRESS'
  | 'NO_PENDING_FLOW'
  | 'STATE_MISMATCH'
  | 'PROVIDER_DENIED'
  | 'EXCHANGE_FAILED'
  | 'TOKEN_REJECTED'
  | 'FLOW_CANCELLED'
  | 'CALLBACK_TIMEOUT'
  | 'UNKNOWN_ACCOUNT'
  | 'NOT_AUTHORIZED'
  | 'REAUTHORIZATION_REQUIRED';

export class OAuthManagerError extends Error {
  readonly code: OAuthErrorCode;
  readonly category: ErrorCategory;
  readonly status: number;

  constructor(
    code: OAuthErrorCode,
    category: ErrorCategory,
    status: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.category = category;
    this.status = status;
  }
}

export class ConfigError extends OAuthManagerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_INVALID', 'setup', 500, message, options);
  }
}

export class StorageError extends OAuthManagerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_FAILED', 'setup', 500, message, options);
  }
}

export class PortUnavailableError extends OAuthManagerError {
  readonly port: number;

  constructor(port: number, options?: { cause?: unknown }) {
    super('PORT_UNAVAILABLE', 'setup', 503, `Callback port ${port} is unavailable`, options);
    this.port = port;
  }
}

export class InvalidEmailError extends OAuthManagerError {
  constructor(email: string) {
    super('INVALID_EMAIL', 'input', 400, `Invalid account email: ${JSON.stringify(email)}`);
  }
}

export class AlreadyAuthorizedError extends OAuthManagerError {
  constructor(email: string) {
    super(
      'ALREADY_AUTHORIZED',
      'protocol',
      409,
      `Account ${email} already holds a valid credential; pass force to re-authorize`,
    );
  }
}

export class FlowAlreadyInProgressError extends OAuthManagerError {
  constructor(email: string) {
    super(
      'FLOW_ALREADY_IN_PROGRESS',
      'protocol',
      409,
      `An authorization flow is already in progress for ${email}`,
    );
  }
}

export class NoPendingFlowError extends OAuthManagerError {
  constructor(email: string) {
    super('NO_PENDING_FLOW', 'protocol', 409, `No pending authorization flow for ${email}`);
  }
}

export class StateMismatchError extends OAuthManagerError {
  constructor(email: string) {
    super(
      'STATE_MISMATCH',
      'protocol',
      400,
      `State token in the callback does not match the flow started for ${email}`,
    );
  }
}

export class ProviderDeniedError extends OAuthManagerError {
  readonly providerError: string;

  constructor(providerError: string, description?: string) {
    super(
      'PROVIDER_DENIED',
      'protocol',
      400,
      description
        ? `Provider returned ${providerError}: ${description}`
        : `Provider returned ${providerError}`,
    );
    this.providerError = providerError;
  }
}

export class ExchangeFailedError extends OAuthManagerError {
  readonly reason: string;

  constructor(reason: string, options?: { cause?: unknown }) {
    super('EXCHANGE_FAILED', 'protocol', 502, `Authorization code exchange failed: ${reason}`, options);
    this.reason = reason;
  }
}

/** Raised by provider adapters when the token endpoint answers with an OAuth error. */
export class TokenRejectedError extends OAuthManagerError {
  readonly reason: string;

  constructor(reason: string, description?: string, options?: { cause?: unknown }) {
    super(
      'TOKEN_REJECTED',
      'protocol',
      502,
      description ? `Token endpoint rejected the request: ${reason} (${description})` : `Token endpoint rejected the request: ${reason}`,
      options,
    );
    this.reason = reason;
  }
}

export class FlowCancelledError extends OAuthManagerError {
  constructor(email: string) {
    super('FLOW_CANCELLED', 'protocol', 409, `Authorization flow for ${email} was cancelled`);
  }
}

export class CallbackTimeoutError extends OAuthManagerError {
  constructor(email: string, timeoutMs: number) {
    super(
      'CALLBACK_TIMEOUT',
      'timeout',
      504,
      `No authorization callback for ${email} within ${timeoutMs}ms`,
    );
  }
}

export class UnknownAccountError extends OAuthManagerError {
  constructor(email: string) {
    super('UNKNOWN_ACCOUNT', 'credential', 404, `Account not found: ${email}`);
  }
}

export class NotAuthorizedError extends OAuthManagerError {
  constructor(email: string) {
    super('NOT_AUTHORIZED', 'credential', 401, `Account ${email} has no stored credential`);
  }
}

export class ReauthorizationRequiredError extends OAuthManagerError {
  constructor(email: string, reason: string) {
    super(
      'REAUTHORIZATION_REQUIRED',
      'credential',
      401,
      `Account ${email} must be re-authorized: ${reason}`,
    );
  }
}

export function isOAuthManagerError(err: unknown): err is OAuthManagerError {
  return err instanceof OAuthManagerError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
