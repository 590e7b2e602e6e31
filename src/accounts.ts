import { InvalidEmailError } from './errors.js';

/** Free-form tag such as "user" or "service". */
export type AccountType = string;

export interface Account {
  email: string;
  accountType: AccountType;
  extraInfo: string;
}

export interface AccountUpdate {
  accountType?: AccountType;
  extraInfo?: string;
}

export interface AccountRegistry {
  list(): Promise<Account[]>;
  get(email: string): Promise<Account | null>;
  upsert(account: Account): Promise<Account>;
  remove(email: string): Promise<boolean>;
}

export const DEFAULT_ACCOUNT_TYPE: AccountType = 'user';

const EMAIL_PATTERN = /^[^\s@/\\]+@[^\s@/\\]+\.[^\s@/\\]+$/;

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function isValidEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

/** Normalize and validate; emails also name credential files, so separators are refused. */
export function requireEmail(email: string): string {
  const normalized = normalizeEmail(email);
  if (!isValidEmail(normalized)) {
    throw new InvalidEmailError(email);
  }
  return normalized;
}
