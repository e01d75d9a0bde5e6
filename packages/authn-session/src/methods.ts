/**
 * Session recognizers
 *
 * Recognizers 2, 5 and 6 of the dispatch chain. They only see the session
 * the dispatcher already decrypted and loaded; each accepts the claims
 * variant it owns and declines every other.
 */

import type {
  AuthContext,
  AuthorizationProvider,
  LoadedSession,
  SessionAuthMethod,
} from '@terrashelf/core';
import { createAuthContext } from '@terrashelf/core';

/**
 * Admin login session (created by the admin token login route)
 */
export class AdminSessionMethod implements SessionAuthMethod {
  readonly type = 'admin_session';
  readonly capability = 'session';

  constructor(private readonly adminTokenConfigured: boolean) {}

  isEnabled(): boolean {
    return this.adminTokenConfigured;
  }

  async recognize(session: LoadedSession): Promise<AuthContext | null> {
    if (session.claims.type !== 'admin_session') return null;
    return createAuthContext({ type: 'admin_session', sessionId: session.id });
  }
}

/**
 * SAML session. Namespace permissions come from the user's group attribute.
 */
export class SamlSessionMethod implements SessionAuthMethod {
  readonly type = 'saml';
  readonly capability = 'session';

  constructor(
    private readonly enabled: boolean,
    private readonly authorization: AuthorizationProvider
  ) {}

  isEnabled(): boolean {
    return this.enabled;
  }

  async recognize(session: LoadedSession): Promise<AuthContext | null> {
    const claims = session.claims;
    if (claims.type !== 'saml') return null;
    const permissions = await this.authorization.resolveGroupPermissions(claims.groups);
    return createAuthContext({ ...claims, sessionId: session.id }, permissions);
  }
}

/**
 * OpenID Connect session. Namespace permissions come from the groups claim.
 */
export class OidcSessionMethod implements SessionAuthMethod {
  readonly type = 'oidc';
  readonly capability = 'session';

  constructor(
    private readonly enabled: boolean,
    private readonly authorization: AuthorizationProvider
  ) {}

  isEnabled(): boolean {
    return this.enabled;
  }

  async recognize(session: LoadedSession): Promise<AuthContext | null> {
    const claims = session.claims;
    if (claims.type !== 'oidc') return null;
    const permissions = await this.authorization.resolveGroupPermissions(claims.groups);
    return createAuthContext({ ...claims, sessionId: session.id }, permissions);
  }
}
