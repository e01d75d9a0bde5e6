/**
 * OpenID Connect client tests
 *
 * The IdP is an in-process fake fetch; nothing leaves the process.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { OidcClient, oidcSessionClaims, type FetchFunction } from '../src/oidc.js';
import { pkceChallenge, generatePkcePair } from '../src/pkce.js';
import { UnauthorizedError } from '@terrashelf/core';

const ISSUER = 'https://idp.test';

interface RecordedCall {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string | null;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function fakeIdp(options: { rejectCode?: boolean } = {}): { fetch: FetchFunction; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fakeFetch: FetchFunction = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    calls.push({
      url,
      method: init?.method ?? 'GET',
      headers,
      body: typeof init?.body === 'string' ? init.body : null,
    });

    if (url === `${ISSUER}/.well-known/openid-configuration`) {
      return jsonResponse({
        issuer: ISSUER,
        authorization_endpoint: `${ISSUER}/authorize`,
        token_endpoint: `${ISSUER}/token`,
        userinfo_endpoint: `${ISSUER}/userinfo`,
      });
    }
    if (url === `${ISSUER}/token`) {
      if (options.rejectCode) {
        return jsonResponse({ error: 'invalid_grant' }, 400);
      }
      return jsonResponse({ access_token: 'test-access-token', token_type: 'Bearer', expires_in: 300 });
    }
    if (url === `${ISSUER}/userinfo`) {
      return jsonResponse({ sub: 'user-123', preferred_username: 'alice', groups: ['platform-team'] });
    }
    return jsonResponse({}, 404);
  };
  return { fetch: fakeFetch, calls };
}

function createClient(fetchImpl: FetchFunction): OidcClient {
  return new OidcClient({
    settings: {
      issuer: ISSUER,
      clientId: 'registry',
      clientSecret: 'test-secret',
      scopes: ['openid', 'profile', 'groups'],
      loginText: 'Login using OpenID Connect',
    },
    redirectUri: 'https://registry.test/openid/callback',
    timeoutMs: 1000,
    fetch: fetchImpl,
  });
}

describe('OidcClient', () => {
  let idp: ReturnType<typeof fakeIdp>;
  let client: OidcClient;

  beforeEach(() => {
    idp = fakeIdp();
    client = createClient(idp.fetch);
  });

  it('should build an authorization URL with PKCE and state', async () => {
    const url = new URL(await client.buildAuthorizationUrl({ state: 'opaque-state', codeChallenge: 'challenge' }));

    expect(url.origin + url.pathname).toBe(`${ISSUER}/authorize`);
    expect(url.searchParams.get('client_id')).toBe('registry');
    expect(url.searchParams.get('response_type')).toBe('code');
    expect(url.searchParams.get('redirect_uri')).toBe('https://registry.test/openid/callback');
    expect(url.searchParams.get('scope')).toBe('openid profile groups');
    expect(url.searchParams.get('state')).toBe('opaque-state');
    expect(url.searchParams.get('code_challenge')).toBe('challenge');
    expect(url.searchParams.get('code_challenge_method')).toBe('S256');
  });

  it('should fetch the discovery document once', async () => {
    await client.discover();
    await client.discover();

    const discoveryCalls = idp.calls.filter(call => call.url.endsWith('/.well-known/openid-configuration'));
    expect(discoveryCalls).toHaveLength(1);
  });

  it('should exchange the code with the verifier and load userinfo', async () => {
    const claims = await client.completeLogin('test-code', 'test-verifier');

    const tokenCall = idp.calls.find(call => call.url === `${ISSUER}/token`);
    const form = new URLSearchParams(tokenCall?.body ?? '');
    expect(tokenCall?.method).toBe('POST');
    expect(form.get('grant_type')).toBe('authorization_code');
    expect(form.get('code')).toBe('test-code');
    expect(form.get('code_verifier')).toBe('test-verifier');

    const userInfoCall = idp.calls.find(call => call.url === `${ISSUER}/userinfo`);
    expect(userInfoCall?.headers['authorization']).toBe('Bearer test-access-token');

    expect(claims).toEqual({
      type: 'oidc',
      subject: 'user-123',
      username: 'alice',
      groups: ['platform-team'],
      claims: { sub: 'user-123', preferred_username: 'alice', groups: ['platform-team'] },
    });
  });

  it('should reject a code the IdP refuses', async () => {
    const rejecting = createClient(fakeIdp({ rejectCode: true }).fetch);

    await expect(rejecting.completeLogin('bad-code', 'test-verifier')).rejects.toBeInstanceOf(UnauthorizedError);
  });
});

describe('oidcSessionClaims', () => {
  it('should fall back to email then subject for the username', () => {
    expect(oidcSessionClaims({ sub: 's1', email: 'bob@example.test' })).toMatchObject({ username: 'bob@example.test' });
    expect(oidcSessionClaims({ sub: 's2' })).toMatchObject({ username: 's2', groups: [] });
  });
});

describe('PKCE', () => {
  it('should compute the S256 challenge', () => {
    expect(pkceChallenge('dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk')).toBe(
      'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM'
    );
  });

  it('should pair a fresh verifier with its challenge', () => {
    const pair = generatePkcePair();

    expect(pair.codeVerifier).toMatch(/^[A-Za-z0-9_-]{86}$/);
    expect(pair.codeChallenge).toBe(pkceChallenge(pair.codeVerifier));
  });
});
