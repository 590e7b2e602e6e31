import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync, readdirSync, statSync, writeFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';

import type { Credential } from '../src/credentials.js';
import { isCredentialFresh } from '../src/credentials.js';
import { InvalidEmailError } from '../src/errors.js';
import { FileCredentialStore } from '../src/fileCredentialStore.js';
import { createLogger } from '../src/logger.js';
import { makeTempDir, removeDir } from './helpers/workspace.js';

const credential: Credential = {
  accessToken: 'access-1',
  refreshToken: 'refresh-1',
  expiresAt: '2030-01-01T00:00:00.000Z',
  scopes: ['openid', 'https://mail.google.com/'],
};

describe('FileCredentialStore', () => {
  let tempDir: string;
  let dir: string;
  let store: FileCredentialStore;

  beforeEach(() => {
    tempDir = makeTempDir();
    dir = join(tempDir, 'credentials');
    store = new FileCredentialStore(dir);
  });

  afterEach(() => {
    removeDir(tempDir);
  });

  it('names files after the normalized email', () => {
    expect(store.pathFor('Alice@Example.com')).toBe(join(dir, '.oauth2.alice@example.com.json'));
  });

  it('refuses emails that would leave the directory', () => {
    expect(() => store.pathFor('../../etc/passwd')).toThrow(InvalidEmailError);
  });

  it('returns null when nothing is stored', async () => {
    expect(await store.load('alice@example.com')).toBeNull();
  });

  it('saves and loads a credential', async () => {
    await store.save('alice@example.com', credential);
    expect(await store.load('ALICE@example.com')).toEqual(credential);
  });

  it('writes the snake_case record with an ISO expiry', async () => {
    await store.save('alice@example.com', credential);
    const raw: unknown = JSON.parse(readFileSync(store.pathFor('alice@example.com'), 'utf8'));
    expect(raw).toEqual({
      access_token: 'access-1',
      refresh_token: 'refresh-1',
      expiry: '2030-01-01T00:00:00.000Z',
      scopes: ['openid', 'https://mail.google.com/'],
    });
  });

  it('omits refresh_token when there is none', async () => {
    const { refreshToken: _dropped, ...withoutRefresh } = credential;
    await store.save('alice@example.com', withoutRefresh);

    const loaded = await store.load('alice@example.com');
    expect(loaded).toEqual(withoutRefresh);
    expect(loaded?.refreshToken).toBeUndefined();
  });

  it('creates the file readable by the owner only', async () => {
    await store.save('alice@example.com', credential);
    expect(statSync(store.pathFor('alice@example.com')).mode & 0o777).toBe(0o600);
  });

  it('replaces the record and leaves no temp files', async () => {
    await store.save('alice@example.com', credential);
    await store.save('alice@example.com', { ...credential, accessToken: 'access-2' });

    expect((await store.load('alice@example.com'))?.accessToken).toBe('access-2');
    expect(readdirSync(dir)).toEqual(['.oauth2.alice@example.com.json']);
  });

  it('loads a corrupt file as absent and logs a warning', async () => {
    const lines: string[] = [];
    const logged = new FileCredentialStore(dir, {
      logger: createLogger({ sink: (line) => lines.push(line) }),
    });
    mkdirSync(dir, { recursive: true });
    writeFileSync(logged.pathFor('alice@example.com'), '{"access_token":');

    expect(await logged.load('alice@example.com')).toBeNull();
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ level: 'warn', msg: 'credential_unreadable' });
  });

  it('loads a record without an expiry as absent', async () => {
    mkdirSync(dir, { recursive: true });
    writeFileSync(store.pathFor('alice@example.com'), JSON.stringify({ access_token: 'x' }));
    expect(await store.load('alice@example.com')).toBeNull();
  });

  it('delete reports whether a file was removed', async () => {
    await store.save('alice@example.com', credential);
    expect(await store.delete('alice@example.com')).toBe(true);
    expect(await store.delete('alice@example.com')).toBe(false);
    expect(await store.load('alice@example.com')).toBeNull();
  });

  it('keeps accounts isolated', async () => {
    await store.save('alice@example.com', credential);
    await store.save('bob@example.com', { ...credential, accessToken: 'bob-access' });
    await store.delete('alice@example.com');

    expect((await store.load('bob@example.com'))?.accessToken).toBe('bob-access');
  });
});

describe('isCredentialFresh', () => {
  const now = Date.parse('2030-01-01T00:00:00.000Z');

  it('is fresh when expiry is beyond the skew', () => {
    expect(isCredentialFresh({ ...credential, expiresAt: '2030-01-01T00:02:00.000Z' }, now, 60_000)).toBe(true);
  });

  it('is stale inside the skew window', () => {
    expect(isCredentialFresh({ ...credential, expiresAt: '2030-01-01T00:00:30.000Z' }, now, 60_000)).toBe(false);
  });

  it('is stale when the expiry does not parse', () => {
    expect(isCredentialFresh({ ...credential, expiresAt: 'soon' }, now, 0)).toBe(false);
  });
});
