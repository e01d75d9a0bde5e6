/**
 * Namespace permission checks
 */

import {
  PERMISSION_LEVELS,
  WILDCARD_NAMESPACE,
  type AuthContext,
  type Permission,
} from '../spi/index.js';
import { ForbiddenError, UnauthorizedError } from '../utils/errors.js';

/**
 * True iff `stored` is at least `required` in the total order
 */
export function permissionAllows(stored: Permission, required: Permission): boolean {
  return PERMISSION_LEVELS[stored] >= PERMISSION_LEVELS[required];
}

/**
 * Effective permission of a context on a namespace, or null
 */
export function effectivePermission(context: AuthContext, namespace: string): Permission | null {
  if (context.isAdmin) return 'FULL';
  if (context.namespacePermissions.has(WILDCARD_NAMESPACE)) return 'FULL';
  return context.namespacePermissions.get(namespace.toLowerCase()) ?? null;
}

export function checkNamespaceAccess(context: AuthContext, required: Permission, namespace: string): boolean {
  const permission = effectivePermission(context, namespace);
  return permission !== null && permissionAllows(permission, required);
}

export function canUploadToNamespace(context: AuthContext, namespace: string): boolean {
  return context.capabilities.canUploadModuleVersion || checkNamespaceAccess(context, 'UPLOAD', namespace);
}

export function canPublishInNamespace(context: AuthContext, namespace: string): boolean {
  return context.capabilities.canPublishModuleVersion || checkNamespaceAccess(context, 'PUBLISH', namespace);
}

/**
 * Throw Unauthorized for anonymous contexts, Forbidden otherwise
 */
export function denyAccess(context: AuthContext, message: string): never {
  if (context.providerType === 'anonymous') {
    throw new UnauthorizedError('Authentication required');
  }
  throw new ForbiddenError(message);
}

export function requireNamespacePermission(context: AuthContext, required: Permission, namespace: string): void {
  if (!checkNamespaceAccess(context, required, namespace)) {
    denyAccess(context, `${required} permission required on namespace ${namespace}`);
  }
}

export function requireUploadPermission(context: AuthContext, namespace: string): void {
  if (!canUploadToNamespace(context, namespace)) {
    denyAccess(context, `Upload permission required on namespace ${namespace}`);
  }
}

export function requirePublishPermission(context: AuthContext, namespace: string): void {
  if (!canPublishInNamespace(context, namespace)) {
    denyAccess(context, `Publish permission required on namespace ${namespace}`);
  }
}

export function requireSiteAdmin(context: AuthContext): void {
  if (!context.isAdmin) {
    denyAccess(context, 'Site admin permission required');
  }
}
