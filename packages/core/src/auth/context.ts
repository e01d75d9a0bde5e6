/**
 * AuthContext construction
 *
 * Every recognizer builds its context through `createAuthContext` so that
 * capabilities derive from the claims variant in one place.
 */

import type {
  AuthCapabilities,
  AuthClaims,
  AuthContext,
  GroupPermissions,
  Permission,
} from '../spi/index.js';

const NO_CAPABILITIES: AuthCapabilities = {
  canUploadModuleVersion: false,
  canPublishModuleVersion: false,
  canAccessReadApi: false,
  canAccessTerraformApi: false,
  isBuiltInAdmin: false,
};

const ADMIN_CAPABILITIES: AuthCapabilities = {
  canUploadModuleVersion: true,
  canPublishModuleVersion: true,
  canAccessReadApi: true,
  canAccessTerraformApi: true,
  isBuiltInAdmin: true,
};

/**
 * Capabilities granted by the authentication method itself
 */
export function capabilitiesFor(claims: AuthClaims): AuthCapabilities {
  switch (claims.type) {
    case 'admin_api_key':
    case 'admin_session':
      return ADMIN_CAPABILITIES;
    case 'upload_api_key':
      return { ...NO_CAPABILITIES, canUploadModuleVersion: true };
    case 'publish_api_key':
      return { ...NO_CAPABILITIES, canPublishModuleVersion: true };
    case 'saml':
    case 'oidc':
      return { ...NO_CAPABILITIES, canAccessReadApi: true, canAccessTerraformApi: true };
    case 'terraform_oidc':
    case 'terraform_analytics':
      return { ...NO_CAPABILITIES, canAccessTerraformApi: true };
    case 'terraform_internal':
      return { ...NO_CAPABILITIES, canAccessReadApi: true, canAccessTerraformApi: true };
    case 'anonymous':
      return NO_CAPABILITIES;
  }
}

function usernameFor(claims: AuthClaims): string | null {
  switch (claims.type) {
    case 'admin_api_key':
    case 'admin_session':
      return 'Built-in admin';
    case 'upload_api_key':
      return 'Upload API key';
    case 'publish_api_key':
      return 'Publish API key';
    case 'saml':
    case 'oidc':
    case 'terraform_oidc':
      return claims.username;
    case 'terraform_analytics':
      return 'Terraform analytics token';
    case 'terraform_internal':
      return 'Terraform internal extraction';
    case 'anonymous':
      return null;
  }
}

/**
 * Build a frozen AuthContext
 *
 * @param claims Tagged claims of the recognizing method
 * @param permissions Group-derived permissions (SSO methods only)
 */
export function createAuthContext(
  claims: AuthClaims,
  permissions?: GroupPermissions,
  terraformAuthToken?: string
): AuthContext {
  const capabilities = capabilitiesFor(claims);
  const groups = 'groups' in claims ? Object.freeze([...claims.groups]) : Object.freeze([]);
  const namespacePermissions = new Map<string, Permission>();
  for (const [namespace, permission] of permissions?.namespaces ?? []) {
    namespacePermissions.set(namespace.toLowerCase(), permission);
  }

  return Object.freeze({
    providerType: claims.type,
    username: usernameFor(claims),
    isAdmin: capabilities.isBuiltInAdmin || (permissions?.siteAdmin ?? false),
    userGroupNames: groups,
    namespacePermissions,
    capabilities: Object.freeze({ ...capabilities }),
    claims: Object.freeze({ ...claims }),
    ...(terraformAuthToken !== undefined ? { terraformAuthToken } : {}),
  });
}

export function anonymousContext(): AuthContext {
  return createAuthContext({ type: 'anonymous' });
}
