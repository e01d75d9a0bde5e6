/**
 * @terrashelf/authz-local
 *
 * Local group authorization provider
 *
 * Resolves the namespace permissions of an SSO user from the `user_group`
 * rows whose names match the user's group claims.
 */

import type { AuthorizationProvider, GroupPermissions, Permission, ProviderHealth } from '@terrashelf/core';
import {
  PERMISSION_LEVELS,
  getUserGroupsByNames,
  getNamespacePermissionsForGroups,
  listUserGroups,
  logger,
  type DatabaseExecutor,
} from '@terrashelf/core';

/**
 * Higher of two permissions in the total order
 */
export function strongerPermission(a: Permission, b: Permission): Permission {
  return PERMISSION_LEVELS[a] >= PERMISSION_LEVELS[b] ? a : b;
}

/**
 * Local group authorization provider
 *
 * Resolution:
 * 1. Look up groups named by the claims (unknown names are ignored)
 * 2. Any site-admin group makes the user a site admin
 * 3. Per namespace, the strongest permission across the groups wins
 */
export class LocalGroupAuthorizationProvider implements AuthorizationProvider {
  readonly id = 'local_groups';

  constructor(private readonly db: DatabaseExecutor) {}

  async initialize(): Promise<void> {
    logger.info(`[authz:local] Initialized: provider_id=${this.id}`);
  }

  /**
   * Verifies database connectivity by listing groups
   */
  async healthCheck(): Promise<ProviderHealth> {
    const startTime = Date.now();
    try {
      const groups = listUserGroups(this.db);
      return {
        status: 'healthy',
        message: `DB connected, ${groups.length} user groups defined`,
        latency_ms: Date.now() - startTime,
        last_checked: new Date().toISOString(),
      };
    } catch (error) {
      return {
        status: 'unhealthy',
        message: `DB error: ${error instanceof Error ? error.message : String(error)}`,
        latency_ms: Date.now() - startTime,
        last_checked: new Date().toISOString(),
      };
    }
  }

  async shutdown(): Promise<void> {
    logger.info('[authz:local] Shutdown complete');
  }

  async resolveGroupPermissions(groups: readonly string[]): Promise<GroupPermissions> {
    const namespaces = new Map<string, Permission>();
    if (groups.length === 0) {
      return { siteAdmin: false, namespaces };
    }

    const siteAdmin = getUserGroupsByNames(this.db, groups).some(group => group.site_admin);

    for (const grant of getNamespacePermissionsForGroups(this.db, groups)) {
      const key = grant.namespace.toLowerCase();
      const current = namespaces.get(key);
      namespaces.set(key, current ? strongerPermission(current, grant.permission) : grant.permission);
    }

    logger.debug(
      `[authz:local] Resolved ${namespaces.size} namespace permissions for ${groups.length} groups (site_admin=${siteAdmin})`
    );
    return { siteAdmin, namespaces };
  }
}
