import { promises as fs } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { z } from 'zod';

import {
  requireEmail,
  normalizeEmail,
  type Account,
  type AccountRegistry,
} from './accounts.js';
import { StorageError, errorMessage, isNotFound } from './errors.js';

const AccountRecordSchema = z.object({
  email: z.string(),
  account_type: z.string().default('user'),
  extra_info: z.string().default(''),
});

const AccountFileSchema = z.object({
  accounts: z.array(AccountRecordSchema),
});

type AccountRecord = z.infer<typeof AccountRecordSchema>;

function toAccount(record: AccountRecord): Account {
  return {
    email: normalizeEmail(record.email),
    accountType: record.account_type,
    extraInfo: record.extra_info,
  };
}

function toRecord(account: Account): AccountRecord {
  return {
    email: account.email,
    account_type: account.accountType,
    extra_info: account.extraInfo,
  };
}

/**
 * Account registry persisted as `{ "accounts": [...] }`, the same layout the
 * account file has always had, so existing files keep loading.
 *
 * A missing file is an empty registry. A file that exists but does not
 * parse is an error: treating it as empty would let the next upsert wipe it.
 */
export class FileAccountRegistry implements AccountRegistry {
  private readonly filePath: string;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async list(): Promise<Account[]> {
    const accounts = await this.readStore();
    return [...accounts];
  }

  async get(email: string): Promise<Account | null> {
    const normalized = normalizeEmail(email);
    const accounts = await this.readStore();
    return accounts.find((account) => account.email === normalized) ?? null;
  }

  async upsert(account: Account): Promise<Account> {
    const stored: Account = { ...account, email: requireEmail(account.email) };

    return this.withWriteLock(async () => {
      const accounts = await this.readStore();
      const index = accounts.findIndex((item) => item.email === stored.email);

      if (index === -1) {
        accounts.push(stored);
      } else {
        accounts[index] = stored;
      }

      await this.writeStore(accounts);
      return stored;
    });
  }

  async remove(email: string): Promise<boolean> {
    const normalized = normalizeEmail(email);

    return this.withWriteLock(async () => {
      const accounts = await this.readStore();
      const remaining = accounts.filter((account) => account.email !== normalized);

      if (remaining.length === accounts.length) {
        return false;
      }

      await this.writeStore(remaining);
      return true;
    });
  }

  private async withWriteLock<T>(operation: () => Promise<T>): Promise<T> {
    const previous = this.writeQueue;
    let release!: () => void;
    this.writeQueue = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await operation();
    } finally {
      release();
    }
  }

  private async readStore(): Promise<Account[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isNotFound(err)) {
        return [];
      }
      throw new StorageError(`Cannot read account registry ${this.filePath}`, { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new StorageError(
        `Account registry ${this.filePath} is not valid JSON: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    const result = AccountFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new StorageError(
        `Account registry ${this.filePath} has an unexpected shape: ${result.error.issues[0]?.message ?? 'invalid'}`,
      );
    }

    return result.data.accounts.map(toAccount);
  }

  private async writeStore(accounts: Account[]): Promise<void> {
    const tempPath = join(
      dirname(this.filePath),
      `${basename(this.filePath)}.${process.pid}.${Date.now()}.tmp`,
    );
    const payload = JSON.stringify({ accounts: accounts.map(toRecord) }, null, 2) + '\n';

    try {
      await fs.mkdir(dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, payload, 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (err) {
      await fs.rm(tempPath, { force: true });
      throw new StorageError(`Cannot write account registry ${this.filePath}`, { cause: err });
    }
  }
}
