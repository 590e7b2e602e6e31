import { describe, it, expect } from 'vitest';

import { createLogger, isLogLevel, redact } from '../src/logger.js';

function capture(level?: 'debug' | 'info' | 'warn' | 'error') {
  const lines: Array<Record<string, unknown>> = [];
  const logger = createLogger({
    level,
    sink: (line) => {
      lines.push(JSON.parse(line));
    },
  });
  return { logger, lines };
}

describe('createLogger', () => {
  it('writes one JSON object per line', () => {
    const { logger, lines } = capture();
    logger.info('account_removed', { email: 'alice@example.com' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 'info', msg: 'account_removed', email: 'alice@example.com' });
    expect(typeof lines[0]?.time).toBe('string');
  });

  it('drops lines below the threshold', () => {
    const { logger, lines } = capture('warn');
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');

    expect(lines.map((line) => line.msg)).toEqual(['c', 'd']);
  });

  it('redacts token material at any depth', () => {
    const { logger, lines } = capture();
    logger.info('tokens', {
      access_token: 'secret-a',
      grant: { refreshToken: 'secret-r', scopes: ['openid'] },
      params: [{ code: 'secret-c', state: 'secret-s' }],
      Authorization: 'ApiKey test-key',
    });

    expect(lines[0]).toMatchObject({
      access_token: '[redacted]',
      grant: { refreshToken: '[redacted]', scopes: ['openid'] },
      params: [{ code: '[redacted]', state: '[redacted]' }],
      Authorization: '[redacted]',
    });
    expect(JSON.stringify(lines[0])).not.toContain('secret-');
  });

  it('serializes errors as name and message', () => {
    const { logger, lines } = capture();
    logger.error('failed', { error: new TypeError('bad input') });
    expect(lines[0]?.error).toEqual({ name: 'TypeError', message: 'bad input' });
  });

  it('child loggers carry bound fields', () => {
    const { logger, lines } = capture();
    logger.child({ email: 'alice@example.com' }).warn('authorization_failed', { reason: 'timeout' });
    expect(lines[0]).toMatchObject({
      level: 'warn',
      email: 'alice@example.com',
      reason: 'timeout',
    });
  });
});

describe('redact', () => {
  it('leaves primitives untouched', () => {
    expect(redact('plain')).toBe('plain');
    expect(redact(42)).toBe(42);
    expect(redact(null)).toBeNull();
  });
});

describe('isLogLevel', () => {
  it('accepts the four levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
