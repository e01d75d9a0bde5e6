/**
 * Namespace Repository
 *
 * Data access layer for namespaces. Names are matched case-insensitively.
 *
 * @see schema/index.ts namespace table
 */

import { eq, sql, asc, count } from 'drizzle-orm';
import type { DatabaseExecutor } from '../client.js';
import { namespaces, module_providers, type Namespace } from '../../schema/index.js';
import { isoTimestamp } from '../../utils/time.js';
import { logger } from '../../utils/logger.js';

/**
 * Create a namespace
 *
 * @throws SqliteError (UNIQUE) when a namespace with the same folded name exists
 */
export function createNamespace(
  db: DatabaseExecutor,
  data: { name: string; display_name?: string | null; type?: Namespace['type'] }
): Namespace {
  const row = db
    .insert(namespaces)
    .values({
      name: data.name,
      display_name: data.display_name ?? null,
      type: data.type ?? 'organisation',
      created_at: isoTimestamp(),
    })
    .returning()
    .get();

  logger.info(`[db:namespaces] Created namespace: ${row.name} (${row.id})`);
  return row;
}

/**
 * Get namespace by name (case-insensitive)
 */
export function getNamespaceByName(db: DatabaseExecutor, name: string): Namespace | null {
  return (
    db
      .select()
      .from(namespaces)
      .where(sql`lower(${namespaces.name}) = ${name.toLowerCase()}`)
      .get() ?? null
  );
}

/**
 * Atomic find-or-create. Must run inside the caller's transaction.
 */
export function findOrCreateNamespace(db: DatabaseExecutor, name: string): { namespace: Namespace; created: boolean } {
  const existing = getNamespaceByName(db, name);
  if (existing) {
    return { namespace: existing, created: false };
  }
  return { namespace: createNamespace(db, { name }), created: true };
}

/**
 * List namespaces ordered by name
 */
export function listNamespaces(
  db: DatabaseExecutor,
  pagination: { offset: number; limit: number }
): { namespaces: Namespace[]; total: number } {
  const rows = db
    .select()
    .from(namespaces)
    .orderBy(asc(namespaces.name))
    .limit(pagination.limit)
    .offset(pagination.offset)
    .all();
  const [totalRow] = db.select({ value: count() }).from(namespaces).all();
  return { namespaces: rows, total: totalRow?.value ?? 0 };
}

/**
 * Delete a namespace that holds no module providers
 *
 * @returns false when the namespace still owns modules
 */
export function deleteNamespaceIfEmpty(db: DatabaseExecutor, id: number): boolean {
  const [usage] = db
    .select({ value: count() })
    .from(module_providers)
    .where(eq(module_providers.namespace_id, id))
    .all();
  if ((usage?.value ?? 0) > 0) {
    return false;
  }
  db.delete(namespaces).where(eq(namespaces.id, id)).run();
  logger.info(`[db:namespaces] Deleted namespace: ${id}`);
  return true;
}
