/**
 * Login Routes
 *
 * Admin token login, OpenID Connect and SAML single sign-on, logout, session refresh, and the
 * authentication status check. Every login ends in a server-side session whose
 * id travels in the encrypted session cookie.
 */

import type { FastifyInstance, FastifyPluginCallback, FastifyReply } from 'fastify';
import { z } from 'zod';
import {
  InvalidInputError,
  NotFoundError,
  UnauthorizedError,
  RegistryError,
  insertAuditHistory,
  logger,
  type DatabaseClient,
  type InfraConfig,
  type SessionClaims,
  type SessionService,
} from '@terrashelf/core';
import { keysMatch, readApiKeyHeader } from '@terrashelf/authn-apikey';
import {
  generatePkcePair,
  samlSessionClaims,
  type OidcClient,
  type SamlAssertion,
  type SamlVerifier,
} from '@terrashelf/authn-session';
import { toAuthRequest } from '../http/auth-hook.js';
import { adminLoginBodySchema, oidcCallbackQuerySchema, samlAcsBodySchema } from './schemas.js';

export interface AuthRoutesConfig {
  db: DatabaseClient;
  infra: InfraConfig;
  sessions: SessionService;
  oidc: OidcClient | null;
  saml: SamlVerifier | null;
}

/** Presentation flag for browsers; never trusted by the server */
export const ADMIN_FLAG_COOKIE = 'is_admin_authenticated';

const redirectQuerySchema = z.object({
  redirect: z.string().optional(),
});

/**
 * Only same-site absolute paths are followed after a login
 */
export function safeRedirectPath(target: string | undefined): string {
  if (target === undefined || !target.startsWith('/') || target.startsWith('//') || target.includes('\\')) {
    return '/';
  }
  return target;
}

export const authRoutes: FastifyPluginCallback<AuthRoutesConfig> = (
  fastify: FastifyInstance,
  opts: AuthRoutesConfig,
  done
) => {
  const { db, infra, sessions, oidc, saml } = opts;
  const cookieName = infra.sessions.cookieName;
  const sessionTtlSeconds = infra.sessions.adminSessionExpiryMinutes * 60;

  function setSessionCookies(reply: FastifyReply, cookie: string, expiry: Date, claims: SessionClaims): void {
    void reply.setCookie(cookieName, cookie, {
      path: '/',
      httpOnly: true,
      secure: infra.sessions.secureCookies,
      sameSite: 'lax',
      expires: expiry,
    });
    if (claims.type === 'admin_session') {
      void reply.setCookie(ADMIN_FLAG_COOKIE, 'True', {
        path: '/',
        secure: infra.sessions.secureCookies,
        sameSite: 'lax',
        expires: expiry,
      });
    }
  }

  function startSession(reply: FastifyReply, claims: SessionClaims, username: string): void {
    const created = sessions.createSession(claims, sessionTtlSeconds);
    setSessionCookies(reply, created.cookie, created.expiry, claims);
    insertAuditHistory(db, {
      username,
      action: 'USER_LOGIN',
      object_type: 'user',
      object_id: username,
    });
  }

  // ==========================================================================
  // POST /v1/terrareg/auth/admin/login
  // ==========================================================================
  fastify.post('/v1/terrareg/auth/admin/login', async (request, reply) => {
    const body = adminLoginBodySchema.parse(request.body ?? undefined);
    const presented = body?.admin_token ?? readApiKeyHeader(toAuthRequest(request).headers);
    const expected = infra.adminAuthenticationToken;

    if (!expected || presented === null || !keysMatch(presented, expected)) {
      logger.warn('[auth] Rejected admin login');
      throw new UnauthorizedError('Invalid admin authentication token');
    }

    startSession(reply, { type: 'admin_session' }, 'Built-in admin');
    return reply.status(200).send({ authenticated: true });
  });

  // ==========================================================================
  // GET|POST /v1/terrareg/auth/logout
  // ==========================================================================
  const logout = (cookieValue: string | undefined, reply: FastifyReply): void => {
    if (cookieValue) {
      try {
        sessions.deleteSession(sessions.sessionIdFromCookie(cookieValue));
      } catch (err) {
        if (!(err instanceof RegistryError)) throw err;
        logger.debug(`[auth] Logout with an unusable session cookie: ${err.message}`);
      }
    }
    void reply.clearCookie(cookieName, { path: '/' });
    void reply.clearCookie(ADMIN_FLAG_COOKIE, { path: '/' });
  };

  fastify.get('/v1/terrareg/auth/logout', async (request, reply) => {
    logout(request.cookies[cookieName], reply);
    return reply.redirect(302, '/');
  });

  fastify.post('/v1/terrareg/auth/logout', async (request, reply) => {
    logout(request.cookies[cookieName], reply);
    return reply.status(200).send({ authenticated: false });
  });

  // ==========================================================================
  // POST /v1/terrareg/auth/session/refresh - extend the current session
  // ==========================================================================
  fastify.post('/v1/terrareg/auth/session/refresh', async (request, reply) => {
    const cookieValue = request.cookies[cookieName];
    if (!cookieValue) {
      throw new InvalidInputError('No session to refresh');
    }
    const loaded = await sessions.resolveCookie(cookieValue);
    const expiry = loaded ? sessions.refreshSession(loaded.id, sessionTtlSeconds) : null;
    if (!loaded || !expiry) {
      throw new UnauthorizedError('Session has expired');
    }
    setSessionCookies(reply, cookieValue, expiry, loaded.claims);
    return reply.status(200).send({ success: true });
  });

  // ==========================================================================
  // GET /v1/terrareg/auth/admin/is_authenticated
  // ==========================================================================
  fastify.get('/v1/terrareg/auth/admin/is_authenticated', async request => {
    const auth = request.auth;
    return {
      authenticated: auth.providerType !== 'anonymous',
      auth_method: auth.providerType,
      username: auth.username,
      read_access: auth.isAdmin || auth.capabilities.canAccessReadApi,
      site_admin: auth.isAdmin,
      namespace_permissions: Object.fromEntries(auth.namespacePermissions),
    };
  });

  // ==========================================================================
  // GET /openid/login
  // ==========================================================================
  fastify.get('/openid/login', async (request, reply) => {
    if (!oidc) {
      throw new NotFoundError('OpenID Connect is not configured');
    }
    const { redirect } = redirectQuerySchema.parse(request.query);
    const pkce = generatePkcePair();
    const state = sessions.createOAuthState({
      redirect_url: safeRedirectPath(redirect),
      auth_method: 'oidc',
      code_verifier: pkce.codeVerifier,
    });
    const url = await oidc.buildAuthorizationUrl({ state, codeChallenge: pkce.codeChallenge });
    return reply.redirect(302, url);
  });

  // ==========================================================================
  // GET /openid/callback
  // ==========================================================================
  fastify.get('/openid/callback', async (request, reply) => {
    if (!oidc) {
      throw new NotFoundError('OpenID Connect is not configured');
    }
    const { code, state } = oidcCallbackQuerySchema.parse(request.query);
    const stored = sessions.consumeOAuthState(state, 'oidc');
    if (!stored.code_verifier) {
      throw new InvalidInputError('OpenID Connect state carries no PKCE verifier');
    }

    const claims = await oidc.completeLogin(code, stored.code_verifier);
    const username = claims.type === 'oidc' ? claims.username : 'unknown';
    startSession(reply, claims, username);
    logger.info(`[auth] OpenID Connect login for ${username}`);
    return reply.redirect(302, safeRedirectPath(stored.redirect_url));
  });

  // ==========================================================================
  // GET /saml/login
  // ==========================================================================
  fastify.get('/saml/login', async (request, reply) => {
    if (!saml) {
      throw new UnauthorizedError('SAML is not configured');
    }
    const { redirect } = redirectQuerySchema.parse(request.query);
    const relayState = sessions.createOAuthState({ redirect_url: safeRedirectPath(redirect), auth_method: 'saml' });
    return reply.redirect(302, await saml.buildLoginUrl(relayState));
  });

  // ==========================================================================
  // POST /saml/acs
  // ==========================================================================
  fastify.post('/saml/acs', async (request, reply) => {
    if (!saml) {
      throw new UnauthorizedError('SAML is not configured');
    }
    const body = samlAcsBodySchema.parse(request.body);
    // Only responses to a login this registry started are accepted
    if (!body.RelayState) {
      throw new UnauthorizedError('SAML RelayState is required');
    }
    const relayState = body.RelayState;

    let assertion: SamlAssertion;
    try {
      assertion = await saml.verifyResponse(body.SAMLResponse);
    } catch (err) {
      logger.warn({ err }, '[auth] SAML response failed verification');
      throw new UnauthorizedError('SAML response could not be verified');
    }

    const redirectUrl = sessions.consumeOAuthState(relayState, 'saml').redirect_url;
    const claims = samlSessionClaims(assertion, { groupAttribute: infra.saml?.groupAttribute ?? 'groups' });
    const username = claims.type === 'saml' ? claims.username : assertion.nameId;
    startSession(reply, claims, username);
    logger.info(`[auth] SAML login for ${username}`);
    return reply.redirect(302, safeRedirectPath(redirectUrl));
  });

  done();
};
