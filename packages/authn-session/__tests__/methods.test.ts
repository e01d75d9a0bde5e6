/**
 * Session recognizer tests
 */

import { describe, it, expect } from 'vitest';
import type { AuthorizationProvider, GroupPermissions, LoadedSession, Permission } from '@terrashelf/core';
import { AdminSessionMethod, SamlSessionMethod, OidcSessionMethod } from '../src/methods.js';
import { samlSessionClaims } from '../src/saml.js';

class StaticAuthorization implements AuthorizationProvider {
  readonly id = 'static';
  requested: string[][] = [];

  constructor(private readonly grants: Record<string, [string, Permission]>) {}

  async initialize(): Promise<void> {}

  async healthCheck() {
    return { status: 'healthy' as const, last_checked: new Date(0).toISOString() };
  }

  async resolveGroupPermissions(groups: readonly string[]): Promise<GroupPermissions> {
    this.requested.push([...groups]);
    const namespaces = new Map<string, Permission>();
    for (const group of groups) {
      const grant = this.grants[group];
      if (grant) namespaces.set(grant[0], grant[1]);
    }
    return { siteAdmin: groups.includes('admins'), namespaces };
  }
}

const expiry = new Date('2030-01-01T00:00:00Z');

const adminSession: LoadedSession = { id: 'session-admin', claims: { type: 'admin_session' }, expiry };

const oidcSession: LoadedSession = {
  id: 'session-oidc',
  claims: { type: 'oidc', subject: 'u1', username: 'alice', groups: ['platform-team'], claims: {} },
  expiry,
};

const samlSession: LoadedSession = {
  id: 'session-saml',
  claims: { type: 'saml', subject: 'u2', username: 'bob', groups: ['admins'], attributes: {} },
  expiry,
};

describe('AdminSessionMethod', () => {
  it('should be disabled without an admin token', () => {
    expect(new AdminSessionMethod(false).isEnabled()).toBe(false);
  });

  it('should accept only admin sessions', async () => {
    const method = new AdminSessionMethod(true);

    const context = await method.recognize(adminSession);

    expect(context?.providerType).toBe('admin_session');
    expect(context?.isAdmin).toBe(true);
    expect(await method.recognize(oidcSession)).toBeNull();
  });
});

describe('OidcSessionMethod', () => {
  it('should resolve namespace permissions from the groups claim', async () => {
    const authz = new StaticAuthorization({ 'platform-team': ['platform', 'PUBLISH'] });
    const method = new OidcSessionMethod(true, authz);

    const context = await method.recognize(oidcSession);

    expect(authz.requested).toEqual([['platform-team']]);
    expect(context?.username).toBe('alice');
    expect(context?.isAdmin).toBe(false);
    expect(context?.namespacePermissions.get('platform')).toBe('PUBLISH');
    expect(context?.capabilities.canAccessTerraformApi).toBe(true);
    expect(context?.claims).toMatchObject({ type: 'oidc', sessionId: 'session-oidc' });
  });

  it('should decline SAML sessions', async () => {
    const method = new OidcSessionMethod(true, new StaticAuthorization({}));

    expect(await method.recognize(samlSession)).toBeNull();
  });
});

describe('SamlSessionMethod', () => {
  it('should make members of a site admin group admins', async () => {
    const method = new SamlSessionMethod(true, new StaticAuthorization({}));

    const context = await method.recognize(samlSession);

    expect(context?.providerType).toBe('saml');
    expect(context?.isAdmin).toBe(true);
    expect(context?.capabilities.isBuiltInAdmin).toBe(false);
  });
});

describe('samlSessionClaims', () => {
  it('should read groups from the configured attribute', () => {
    const claims = samlSessionClaims(
      { nameId: 'name-id-1', attributes: { memberOf: ['team-a', 'team-b'], email: ['carol@example.test'] } },
      { groupAttribute: 'memberOf' }
    );

    expect(claims).toEqual({
      type: 'saml',
      subject: 'name-id-1',
      username: 'carol@example.test',
      groups: ['team-a', 'team-b'],
      attributes: { memberOf: ['team-a', 'team-b'], email: ['carol@example.test'] },
    });
  });
});
