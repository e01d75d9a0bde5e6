/**
 * User Group Repository
 *
 * Groups map SSO group claims onto namespace permissions.
 *
 * @see schema/index.ts user_group, user_group_namespace_permission tables
 */

import { asc, eq, inArray } from 'drizzle-orm';
import type { DatabaseExecutor } from '../client.js';
import {
  user_groups,
  user_group_namespace_permissions,
  namespaces,
  type UserGroup,
  type PermissionType,
} from '../../schema/index.js';
import { logger } from '../../utils/logger.js';

export interface GroupNamespacePermission {
  group: string;
  namespace: string;
  permission: PermissionType;
}

export function createUserGroup(db: DatabaseExecutor, name: string, siteAdmin = false): UserGroup {
  const row = db.insert(user_groups).values({ name, site_admin: siteAdmin }).returning().get();
  logger.info(`[db:user-groups] Created group: ${name} (site_admin=${siteAdmin})`);
  return row;
}

export function listUserGroups(db: DatabaseExecutor): UserGroup[] {
  return db.select().from(user_groups).orderBy(asc(user_groups.name)).all();
}

export function getUserGroupsByNames(db: DatabaseExecutor, names: readonly string[]): UserGroup[] {
  if (names.length === 0) return [];
  return db.select().from(user_groups).where(inArray(user_groups.name, [...names])).all();
}

/**
 * Grant (or replace) a group's permission on a namespace
 */
export function setNamespacePermission(
  db: DatabaseExecutor,
  groupId: number,
  namespaceId: number,
  permission: PermissionType
): void {
  db.insert(user_group_namespace_permissions)
    .values({ user_group_id: groupId, namespace_id: namespaceId, permission_type: permission })
    .onConflictDoUpdate({
      target: [user_group_namespace_permissions.user_group_id, user_group_namespace_permissions.namespace_id],
      set: { permission_type: permission },
    })
    .run();
}

/**
 * Namespace permissions held by any of the named groups
 */
export function getNamespacePermissionsForGroups(
  db: DatabaseExecutor,
  groupNames: readonly string[]
): GroupNamespacePermission[] {
  if (groupNames.length === 0) return [];
  return db
    .select({
      group: user_groups.name,
      namespace: namespaces.name,
      permission: user_group_namespace_permissions.permission_type,
    })
    .from(user_group_namespace_permissions)
    .innerJoin(user_groups, eq(user_group_namespace_permissions.user_group_id, user_groups.id))
    .innerJoin(namespaces, eq(user_group_namespace_permissions.namespace_id, namespaces.id))
    .where(inArray(user_groups.name, [...groupNames]))
    .all();
}
