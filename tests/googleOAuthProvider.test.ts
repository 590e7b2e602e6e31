import { describe, it, expect } from 'vitest';

import { TokenRejectedError } from '../src/errors.js';
import { GoogleOAuthProvider, toTokenRejection } from '../src/providers/googleOAuthProvider.js';

const client = {
  clientId: 'test-client.apps.example.test',
  clientSecret: 'test-secret',
  redirectUri: 'http://localhost:8080/',
};

describe('GoogleOAuthProvider.buildAuthorizationUrl', () => {
  const provider = new GoogleOAuthProvider(client);
  const url = new URL(
    provider.buildAuthorizationUrl({
      state: 'state-123',
      scopes: ['openid', 'https://mail.google.com/'],
      loginHint: 'alice@example.com',
    }),
  );

  it('targets the Google consent endpoint', () => {
    expect(url.origin).toBe('https://accounts.google.com');
  });

  it('requests offline access on the consent screen', () => {
    expect(url.searchParams.get('access_type')).toBe('offline');
    expect(url.searchParams.get('prompt')).toBe('consent');
    expect(url.searchParams.get('response_type')).toBe('code');
  });

  it('carries client, redirect, state, scopes and login hint', () => {
    expect(url.searchParams.get('client_id')).toBe('test-client.apps.example.test');
    expect(url.searchParams.get('redirect_uri')).toBe('http://localhost:8080/');
    expect(url.searchParams.get('state')).toBe('state-123');
    expect(url.searchParams.get('scope')).toBe('openid https://mail.google.com/');
    expect(url.searchParams.get('login_hint')).toBe('alice@example.com');
  });

  it('never puts the client secret in the URL', () => {
    expect(url.toString()).not.toContain('test-secret');
  });
});

describe('toTokenRejection', () => {
  it('maps a 400 OAuth error body to TokenRejectedError', () => {
    const rejection = toTokenRejection({
      message: 'invalid_grant',
      response: {
        status: 400,
        data: { error: 'invalid_grant', error_description: 'Token has been expired or revoked.' },
      },
    });

    expect(rejection).toBeInstanceOf(TokenRejectedError);
    expect(rejection?.reason).toBe('invalid_grant');
    expect(rejection?.message).toBe(
      'Token endpoint rejected the request: invalid_grant (Token has been expired or revoked.)',
    );
  });

  it('ignores server errors', () => {
    expect(
      toTokenRejection({ response: { status: 503, data: { error: 'backend_error' } } }),
    ).toBeNull();
  });

  it('ignores errors without a response body', () => {
    expect(toTokenRejection(new Error('socket hang up'))).toBeNull();
    expect(toTokenRejection({ response: { status: 400, data: 'Bad Request' } })).toBeNull();
  });
});
