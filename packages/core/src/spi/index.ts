/**
 * Service Provider Interface (SPI) definitions
 *
 * Interfaces implemented by the pluggable authentication recognizers and the
 * authorization provider, plus the immutable per-request AuthContext they
 * produce.
 */

import type { PermissionType } from '../schema/index.js';

// ===== Permissions =====

export type Permission = PermissionType;

/**
 * Total order: FULL ⊇ PUBLISH ⊇ UPLOAD ⊇ MODIFY ⊇ READ
 */
export const PERMISSION_LEVELS: Readonly<Record<Permission, number>> = Object.freeze({
  READ: 1,
  MODIFY: 2,
  UPLOAD: 3,
  PUBLISH: 4,
  FULL: 5,
});

/** Namespace key granting its permission on every namespace */
export const WILDCARD_NAMESPACE = '*';

// ===== Claims =====

/**
 * Claims persisted in a login session (JSON in session.provider_source_auth)
 */
export type SessionClaims =
  | { type: 'admin_session' }
  | {
      type: 'saml';
      subject: string;
      username: string;
      groups: string[];
      attributes: Record<string, string[]>;
    }
  | {
      type: 'oidc';
      subject: string;
      username: string;
      groups: string[];
      claims: Record<string, unknown>;
    };

/**
 * Tagged claims carried by an AuthContext, one variant per recognizer
 */
export type AuthClaims =
  | { type: 'admin_api_key' }
  | { type: 'upload_api_key' }
  | { type: 'publish_api_key' }
  | (SessionClaims & { sessionId: string })
  | { type: 'terraform_oidc'; tokenId: string; username: string; groups: string[] }
  | { type: 'terraform_analytics'; analyticsToken: string; environment: string | null }
  | { type: 'terraform_internal' }
  | { type: 'anonymous' };

export type AuthMethodType = AuthClaims['type'];

/**
 * What the authenticating method grants regardless of namespace
 */
export interface AuthCapabilities {
  /** Upload to any namespace */
  canUploadModuleVersion: boolean;
  /** Publish in any namespace */
  canPublishModuleVersion: boolean;
  canAccessReadApi: boolean;
  canAccessTerraformApi: boolean;
  /** Authenticated with the configured admin token (header or session) */
  isBuiltInAdmin: boolean;
}

/**
 * Immutable per-request authentication state. Never shared across requests.
 */
export interface AuthContext {
  readonly providerType: AuthMethodType;
  readonly username: string | null;
  /** Site admin: FULL on every namespace */
  readonly isAdmin: boolean;
  readonly userGroupNames: readonly string[];
  /** Keys are lower-cased namespace names or WILDCARD_NAMESPACE */
  readonly namespacePermissions: ReadonlyMap<string, Permission>;
  readonly capabilities: Readonly<AuthCapabilities>;
  readonly claims: Readonly<AuthClaims>;
  /** Bearer token presented by terraform, if any */
  readonly terraformAuthToken?: string;
}

// ===== Authentication SPI =====

/**
 * Request view handed to the dispatcher. Header names are lower-case.
 */
export interface AuthRequest {
  headers: Readonly<Record<string, string | undefined>>;
  cookies: Readonly<Record<string, string | undefined>>;
  query: Readonly<Record<string, string | undefined>>;
  /** URL path without query string */
  path: string;
}

/**
 * Login session resolved from the encrypted cookie
 */
export interface LoadedSession {
  id: string;
  claims: SessionClaims;
  expiry: Date;
}

/**
 * Resolves the session cookie once per request for session recognizers
 */
export interface SessionResolver {
  /**
   * @throws SessionExpiredError, InvalidSessionCookieError
   */
  resolveCookie(cookieValue: string): Promise<LoadedSession | null>;
}

export type AuthCapability = 'header' | 'session' | 'bearer' | 'token';

interface AuthMethodBase {
  readonly type: Exclude<AuthMethodType, 'anonymous'>;
  /** Disabled methods are skipped by the dispatcher */
  isEnabled(): boolean;
}

/** Recognizes a credential carried in request headers (X-Terrareg-ApiKey) */
export interface HeaderAuthMethod extends AuthMethodBase {
  readonly capability: 'header';
  recognize(headers: AuthRequest['headers']): Promise<AuthContext | null>;
}

/** Recognizes a decrypted login session */
export interface SessionAuthMethod extends AuthMethodBase {
  readonly capability: 'session';
  recognize(session: LoadedSession): Promise<AuthContext | null>;
}

/** Recognizes an `Authorization: Bearer` token */
export interface BearerAuthMethod extends AuthMethodBase {
  readonly capability: 'bearer';
  recognize(token: string): Promise<AuthContext | null>;
}

/** Recognizes a token that may appear in several request locations */
export interface TokenAuthMethod extends AuthMethodBase {
  readonly capability: 'token';
  recognize(request: AuthRequest): Promise<AuthContext | null>;
}

/**
 * A recognizer. Implementations hold only configuration and collaborators;
 * per-request state lives on the returned AuthContext.
 */
export type AuthMethod = HeaderAuthMethod | SessionAuthMethod | BearerAuthMethod | TokenAuthMethod;

// ===== Authorization SPI =====

/**
 * Permissions derived from a user's group memberships
 */
export interface GroupPermissions {
  siteAdmin: boolean;
  /** Keys are lower-cased namespace names */
  namespaces: Map<string, Permission>;
}

/**
 * Authorization Provider Interface
 *
 * Implementations: LocalGroupAuthorizationProvider (authz-local)
 */
export interface AuthorizationProvider extends ProviderLifecycle {
  readonly id: string;

  /** Resolve namespace permissions for a set of group names */
  resolveGroupPermissions(groups: readonly string[]): Promise<GroupPermissions>;
}

// ===== Common Provider Types =====

/**
 * Provider health status
 */
export interface ProviderHealth {
  status: 'healthy' | 'degraded' | 'unhealthy';
  message?: string;
  latency_ms?: number;
  last_checked: string;
}

/**
 * Provider lifecycle interface
 */
export interface ProviderLifecycle {
  initialize(): Promise<void>;

  healthCheck(): Promise<ProviderHealth>;

  shutdown?(): Promise<void>;
}
