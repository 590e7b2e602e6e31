import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

import { requireEmail } from './accounts.js';
import type { Credential, CredentialStore } from './credentials.js';
import { StorageError, errorMessage, isNotFound } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

const CredentialRecordSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expiry: z.string().refine((value) => Number.isFinite(Date.parse(value)), {
    message: 'expiry must be an ISO-8601 timestamp',
  }),
  scopes: z.array(z.string()).default([]),
});

type CredentialRecord = z.infer<typeof CredentialRecordSchema>;

const FILE_MODE = 0o600;
const DIR_MODE = 0o700;

export interface FileCredentialStoreOptions {
  logger?: Logger;
}

/**
 * One JSON file per account under `dir`, named `.oauth2.<email>.json`.
 *
 * Files are created with mode 0600 and replaced through a temp file and
 * rename. A record that fails to parse loads as absent so the accessor
 * fails closed; it is left on disk for inspection.
 */
export class FileCredentialStore implements CredentialStore {
  private readonly dir: string;
  private readonly logger: Logger;

  constructor(dir: string, options: FileCredentialStoreOptions = {}) {
    this.dir = dir;
    this.logger = options.logger ?? silentLogger;
  }

  pathFor(email: string): string {
    return join(this.dir, `.oauth2.${requireEmail(email)}.json`);
  }

  async load(email: string): Promise<Credential | null> {
    const filePath = this.pathFor(email);

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (err) {
      if (isNotFound(err)) {
        return null;
      }
      throw new StorageError(`Cannot read credential file ${filePath}`, { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.warn('credential_unreadable', { filePath, reason: errorMessage(err) });
      return null;
    }

    const result = CredentialRecordSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn('credential_unreadable', {
        filePath,
        reason: result.error.issues[0]?.message ?? 'invalid record',
      });
      return null;
    }

    return fromRecord(result.data);
  }

  async save(email: string, credential: Credential): Promise<void> {
    const filePath = this.pathFor(email);
    const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
    const payload = JSON.stringify(toRecord(credential), null, 2) + '\n';

    try {
      await fs.mkdir(this.dir, { recursive: true, mode: DIR_MODE });
      await fs.writeFile(tempPath, payload, { encoding: 'utf8', mode: FILE_MODE });
      await fs.rename(tempPath, filePath);
    } catch (err) {
      await fs.rm(tempPath, { force: true });
      throw new StorageError(`Cannot write credential file ${filePath}`, { cause: err });
    }

    this.logger.debug('credential_saved', { email: requireEmail(email), expiresAt: credential.expiresAt });
  }

  async delete(email: string): Promise<boolean> {
    const filePath = this.pathFor(email);
    try {
      await fs.unlink(filePath);
      return true;
    } catch (err) {
      if (isNotFound(err)) {
        return false;
      }
      throw new StorageError(`Cannot delete credential file ${filePath}`, { cause: err });
    }
  }
}

function fromRecord(record: CredentialRecord): Credential {
  const credential: Credential = {
    accessToken: record.access_token,
    expiresAt: new Date(Date.parse(record.expiry)).toISOString(),
    scopes: record.scopes,
  };
  if (record.refresh_token) {
    credential.refreshToken = record.refresh_token;
  }
  return credential;
}

function toRecord(credential: Credential): CredentialRecord {
  const record: CredentialRecord = {
    access_token: credential.accessToken,
    expiry: credential.expiresAt,
    scopes: credential.scopes,
  };
  if (credential.refreshToken) {
    record.refresh_token = credential.refreshToken;
  }
  return record;
}
