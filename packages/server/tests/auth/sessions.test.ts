import { afterEach, describe, expect, it } from 'vitest';
import { createUserGroup, getNamespaceByName, setNamespacePermission } from '@terrashelf/core';
import type { SamlVerifier } from '@terrashelf/authn-session';
import {
  ADMIN_TOKEN,
  OIDC_ENV,
  fakeIdp,
  loginWithOidc,
  moduleArchive,
  sessionCookieOf,
  startTestRegistry,
  stopTestRegistry,
  type TestRegistry,
} from '../helpers.js';

const SESSION_COOKIE = 'terrareg_session';

async function adminLogin(registry: TestRegistry): Promise<string> {
  const res = await registry.fastify.inject({
    method: 'POST',
    url: '/v1/terrareg/auth/admin/login',
    payload: { admin_token: ADMIN_TOKEN },
  });
  expect(res.statusCode).toBe(200);
  return sessionCookieOf(res, SESSION_COOKIE);
}

async function whoAmI(registry: TestRegistry, cookie?: string): Promise<Record<string, unknown>> {
  const res = await registry.fastify.inject({
    method: 'GET',
    url: '/v1/terrareg/auth/admin/is_authenticated',
    ...(cookie !== undefined ? { cookies: { [SESSION_COOKIE]: cookie } } : {}),
  });
  expect(res.statusCode).toBe(200);
  return res.json<Record<string, unknown>>();
}

describe('login sessions', () => {
  let registry: TestRegistry | undefined;

  afterEach(async () => {
    await stopTestRegistry(registry);
    registry = undefined;
  });

  describe('admin login', () => {
    it('should start an admin session for the admin token', async () => {
      registry = await startTestRegistry();
      const res = await registry.fastify.inject({
        method: 'POST',
        url: '/v1/terrareg/auth/admin/login',
        payload: { admin_token: ADMIN_TOKEN },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ authenticated: true });
      expect(sessionCookieOf(res, 'is_admin_authenticated')).toBe('True');

      const cookie = sessionCookieOf(res, SESSION_COOKIE);
      expect(await whoAmI(registry, cookie)).toEqual({
        authenticated: true,
        auth_method: 'admin_session',
        username: 'Built-in admin',
        read_access: true,
        site_admin: true,
        namespace_permissions: {},
      });
    });

    it('should accept the token in the API key header', async () => {
      registry = await startTestRegistry();
      const res = await registry.fastify.inject({
        method: 'POST',
        url: '/v1/terrareg/auth/admin/login',
        headers: { 'x-terrareg-apikey': ADMIN_TOKEN },
      });
      expect(res.statusCode).toBe(200);
    });

    it('should reject a wrong token', async () => {
      registry = await startTestRegistry();
      const res = await registry.fastify.inject({
        method: 'POST',
        url: '/v1/terrareg/auth/admin/login',
        payload: { admin_token: 'not-the-token' },
      });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ errors: ['Invalid admin authentication token'] });
    });

    it('should end the session on logout', async () => {
      registry = await startTestRegistry();
      const cookie = await adminLogin(registry);

      const res = await registry.fastify.inject({
        method: 'GET',
        url: '/v1/terrareg/auth/logout',
        cookies: { [SESSION_COOKIE]: cookie },
      });
      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe('/');

      expect(await whoAmI(registry, cookie)).toMatchObject({ authenticated: false, auth_method: 'anonymous' });
    });
  });

  describe('session cookie', () => {
    it('should treat a tampered cookie as anonymous', async () => {
      registry = await startTestRegistry();
      const cookie = await adminLogin(registry);
      const middle = Math.floor(cookie.length / 2);
      const tampered = `${cookie.slice(0, middle)}${cookie[middle] === 'A' ? 'B' : 'A'}${cookie.slice(middle + 1)}`;

      expect(await whoAmI(registry, tampered)).toMatchObject({ authenticated: false, site_admin: false });
      expect(await whoAmI(registry, 'not-a-session')).toMatchObject({ authenticated: false });
    });

    it('should expire with the admin session lifetime', async () => {
      registry = await startTestRegistry({ env: { ADMIN_SESSION_EXPIRY_MINS: '5' } });
      const cookie = await adminLogin(registry);

      registry.setNow(new Date(Date.now() + 4 * 60 * 1000));
      expect(await whoAmI(registry, cookie)).toMatchObject({ authenticated: true });

      registry.setNow(new Date(Date.now() + 6 * 60 * 1000));
      expect(await whoAmI(registry, cookie)).toMatchObject({ authenticated: false });
    });

    it('should extend a session on refresh', async () => {
      registry = await startTestRegistry({ env: { ADMIN_SESSION_EXPIRY_MINS: '5' } });
      const start = Date.now();
      registry.setNow(new Date(start));
      const cookie = await adminLogin(registry);

      registry.setNow(new Date(start + 4 * 60 * 1000));
      const refreshed = await registry.fastify.inject({
        method: 'POST',
        url: '/v1/terrareg/auth/session/refresh',
        cookies: { [SESSION_COOKIE]: cookie },
      });
      expect(refreshed.statusCode).toBe(200);
      expect(refreshed.json()).toEqual({ success: true });
      expect(sessionCookieOf(refreshed, SESSION_COOKIE)).toBe(cookie);

      registry.setNow(new Date(start + 8 * 60 * 1000));
      expect(await whoAmI(registry, cookie)).toMatchObject({ authenticated: true });

      registry.setNow(new Date(start + 10 * 60 * 1000));
      expect(await whoAmI(registry, cookie)).toMatchObject({ authenticated: false });
    });

    it('should need a live session to refresh', async () => {
      registry = await startTestRegistry();
      const missing = await registry.fastify.inject({ method: 'POST', url: '/v1/terrareg/auth/session/refresh' });
      expect(missing.statusCode).toBe(400);
      expect(missing.json()).toEqual({ errors: ['No session to refresh'] });

      const cookie = await adminLogin(registry);
      await registry.fastify.inject({
        method: 'POST',
        url: '/v1/terrareg/auth/logout',
        cookies: { [SESSION_COOKIE]: cookie },
      });
      const ended = await registry.fastify.inject({
        method: 'POST',
        url: '/v1/terrareg/auth/session/refresh',
        cookies: { [SESSION_COOKIE]: cookie },
      });
      expect(ended.statusCode).toBe(401);
    });
  });

  describe('single sign-on', () => {
    it('should grant group permissions to an OpenID Connect user', async () => {
      registry = await startTestRegistry({
        env: OIDC_ENV,
        oidcFetch: fakeIdp({ sub: 'user-1', preferred_username: 'alice', groups: ['platform-team'] }),
      });
      for (const name of ['platform', 'other']) {
        const created = await registry.fastify.inject({
          method: 'POST',
          url: '/v1/terrareg/namespaces',
          headers: { 'x-terrareg-apikey': ADMIN_TOKEN },
          payload: { name },
        });
        expect(created.statusCode).toBe(201);
      }
      const group = createUserGroup(registry.db, 'platform-team');
      const namespace = getNamespaceByName(registry.db, 'platform');
      expect(namespace).not.toBeNull();
      setNamespacePermission(registry.db, group.id, namespace?.id ?? -1, 'UPLOAD');

      const cookie = await loginWithOidc(registry);
      expect(await whoAmI(registry, cookie)).toEqual({
        authenticated: true,
        auth_method: 'oidc',
        username: 'alice',
        read_access: true,
        site_admin: false,
        namespace_permissions: { platform: 'UPLOAD' },
      });

      const archive = await moduleArchive({ 'main.tf': 'resource "aws_vpc" "this" {}\n' });
      const upload = (ns: string) =>
        registry?.fastify.inject({
          method: 'POST',
          url: `/v1/terrareg/modules/${ns}/vpc/aws/1.0.0/upload`,
          headers: { 'content-type': 'application/gzip' },
          cookies: { [SESSION_COOKIE]: cookie },
          payload: archive,
        });
      expect((await upload('platform'))?.statusCode).toBe(204);
      const denied = await upload('other');
      expect(denied?.statusCode).toBe(403);
      expect(denied?.json()).toEqual({ errors: ['Upload permission required on namespace other'] });
    });

    it('should redirect the OpenID Connect login back to a local path only', async () => {
      registry = await startTestRegistry({
        env: OIDC_ENV,
        oidcFetch: fakeIdp({ sub: 'user-1', preferred_username: 'alice', groups: [] }),
      });
      const start = await registry.fastify.inject({
        method: 'GET',
        url: `/openid/login?redirect=${encodeURIComponent('https://elsewhere.example.test/')}`,
      });
      expect(start.statusCode).toBe(302);
      const location = new URL(String(start.headers.location));
      expect(`${location.origin}${location.pathname}`).toBe('https://idp.example.test/authorize');
      expect(location.searchParams.get('code_challenge_method')).toBe('S256');

      const callback = await registry.fastify.inject({
        method: 'GET',
        url: `/openid/callback?code=test-code&state=${encodeURIComponent(location.searchParams.get('state') ?? '')}`,
      });
      expect(callback.statusCode).toBe(302);
      expect(callback.headers.location).toBe('/');
    });

    it('should not accept an OpenID Connect state twice', async () => {
      registry = await startTestRegistry({
        env: OIDC_ENV,
        oidcFetch: fakeIdp({ sub: 'user-1', preferred_username: 'alice', groups: [] }),
      });
      const start = await registry.fastify.inject({ method: 'GET', url: '/openid/login' });
      const state = new URL(String(start.headers.location)).searchParams.get('state') ?? '';
      const url = `/openid/callback?code=test-code&state=${encodeURIComponent(state)}`;

      expect((await registry.fastify.inject({ method: 'GET', url })).statusCode).toBe(302);
      const replay = await registry.fastify.inject({ method: 'GET', url });
      expect(replay.statusCode).toBe(401);
    });

    it('should sign in through an injected SAML verifier', async () => {
      const verifier: SamlVerifier = {
        buildLoginUrl: async relayState => `https://idp.example.test/saml?RelayState=${encodeURIComponent(relayState)}`,
        verifyResponse: async samlResponse => {
          if (samlResponse !== 'signed-response') throw new Error('signature mismatch');
          return { nameId: 'bob@example.test', attributes: { username: ['bob'], groups: ['ops'] } };
        },
      };
      registry = await startTestRegistry({
        env: {
          SAML2_ENTITY_ID: 'registry',
          SAML2_IDP_METADATA_URL: 'https://idp.example.test/saml/metadata',
          SAML2_PUBLIC_KEY: 'test-public-key',
          SAML2_PRIVATE_KEY: 'test-private-key',
        },
        samlVerifier: verifier,
      });

      const start = await registry.fastify.inject({ method: 'GET', url: '/saml/login?redirect=/modules' });
      expect(start.statusCode).toBe(302);
      const relayState = new URL(String(start.headers.location)).searchParams.get('RelayState') ?? '';

      const rejected = await registry.fastify.inject({
        method: 'POST',
        url: '/saml/acs',
        payload: { SAMLResponse: 'forged-response', RelayState: relayState },
      });
      expect(rejected.statusCode).toBe(401);

      const acs = await registry.fastify.inject({
        method: 'POST',
        url: '/saml/acs',
        payload: { SAMLResponse: 'signed-response', RelayState: relayState },
      });
      expect(acs.statusCode).toBe(302);
      expect(acs.headers.location).toBe('/modules');

      expect(await whoAmI(registry, sessionCookieOf(acs, SESSION_COOKIE))).toMatchObject({
        authenticated: true,
        auth_method: 'saml',
        username: 'bob',
      });

      const replay = await registry.fastify.inject({
        method: 'POST',
        url: '/saml/acs',
        payload: { SAMLResponse: 'signed-response', RelayState: relayState },
      });
      expect(replay.statusCode).toBe(401);
      expect(replay.json()).toEqual({ errors: ['Unknown or already used state parameter'] });

      const unsolicited = await registry.fastify.inject({
        method: 'POST',
        url: '/saml/acs',
        payload: { SAMLResponse: 'signed-response' },
      });
      expect(unsolicited.statusCode).toBe(401);
      expect(unsolicited.json()).toEqual({ errors: ['SAML RelayState is required'] });
      expect(unsolicited.headers['set-cookie']).toBeUndefined();
    });

    it('should answer 401 to SAML requests when no verifier is available', async () => {
      registry = await startTestRegistry();
      const res = await registry.fastify.inject({ method: 'GET', url: '/saml/login' });
      expect(res.statusCode).toBe(401);
    });
  });

  describe('cleanup', () => {
    it('should delete expired sessions and OAuth states once', async () => {
      registry = await startTestRegistry({
        env: OIDC_ENV,
        oidcFetch: fakeIdp({ sub: 'user-1', preferred_username: 'alice', groups: [] }),
      });
      await adminLogin(registry);
      const pending = await registry.fastify.inject({ method: 'GET', url: '/openid/login' });
      expect(pending.statusCode).toBe(302);

      expect(registry.server.runCleanup()).toEqual({
        sessions: 0,
        oauthStates: 0,
        authorizationCodes: 0,
        accessTokens: 0,
      });

      registry.setNow(new Date(Date.now() + 2 * 60 * 60 * 1000));
      expect(registry.server.runCleanup()).toEqual({
        sessions: 1,
        oauthStates: 1,
        authorizationCodes: 0,
        accessTokens: 0,
      });
      expect(registry.server.runCleanup()).toEqual({
        sessions: 0,
        oauthStates: 0,
        authorizationCodes: 0,
        accessTokens: 0,
      });
    });
  });
});
