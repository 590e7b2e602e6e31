/**
 * OAuth token material held for one account.
 *
 * `expiresAt` is an ISO-8601 timestamp for the access token. `refreshToken`
 * is absent when the provider never granted one.
 */
export interface Credential {
  accessToken: string;
  refreshToken?: string;
  expiresAt: string;
  scopes: string[];
}

export interface CredentialStore {
  load(email: string): Promise<Credential | null>;
  /** Replaces the whole record; readers never observe a partial one. */
  save(email: string, credential: Credential): Promise<void>;
  delete(email: string): Promise<boolean>;
}

/** True while the access token is still usable `skewMs` from `now`. */
export function isCredentialFresh(credential: Credential, now: number, skewMs: number): boolean {
  const expiresAt = Date.parse(credential.expiresAt);
  return Number.isFinite(expiresAt) && expiresAt - skewMs > now;
}
