/**
 * Module Provider Repository
 *
 * Data access layer for (namespace, module, provider) triples.
 *
 * @see schema/index.ts module_provider table
 */

import { and, asc, eq, sql, type SQL } from 'drizzle-orm';
import type { DatabaseExecutor } from '../client.js';
import {
  module_providers,
  namespaces,
  type ModuleProvider,
  type Namespace,
} from '../../schema/index.js';
import { isoTimestamp } from '../../utils/time.js';
import { logger } from '../../utils/logger.js';

export interface ModuleProviderWithNamespace {
  namespace: Namespace;
  moduleProvider: ModuleProvider;
}

export type ModuleProviderSettings = Partial<
  Pick<
    ModuleProvider,
    | 'repo_base_url_template'
    | 'repo_clone_url_template'
    | 'repo_browse_url_template'
    | 'git_tag_format'
    | 'git_path'
    | 'verified'
  >
>;

export function createModuleProvider(
  db: DatabaseExecutor,
  namespaceId: number,
  moduleName: string,
  providerName: string,
  settings: ModuleProviderSettings = {}
): ModuleProvider {
  const row = db
    .insert(module_providers)
    .values({
      namespace_id: namespaceId,
      module_name: moduleName,
      provider_name: providerName,
      ...settings,
      created_at: isoTimestamp(),
    })
    .returning()
    .get();

  logger.info(`[db:module-providers] Created module provider ${moduleName}/${providerName} (${row.id})`);
  return row;
}

/**
 * Look up a module provider by its triple (namespace is case-insensitive)
 */
export function getModuleProvider(
  db: DatabaseExecutor,
  namespaceName: string,
  moduleName: string,
  providerName: string
): ModuleProviderWithNamespace | null {
  const row = db
    .select({ namespace: namespaces, moduleProvider: module_providers })
    .from(module_providers)
    .innerJoin(namespaces, eq(module_providers.namespace_id, namespaces.id))
    .where(
      and(
        sql`lower(${namespaces.name}) = ${namespaceName.toLowerCase()}`,
        eq(module_providers.module_name, moduleName),
        eq(module_providers.provider_name, providerName)
      )
    )
    .get();
  return row ?? null;
}

/**
 * Atomic find-or-create. Must run inside the caller's transaction.
 */
export function findOrCreateModuleProvider(
  db: DatabaseExecutor,
  namespace: Namespace,
  moduleName: string,
  providerName: string
): { moduleProvider: ModuleProvider; created: boolean } {
  const existing = db
    .select()
    .from(module_providers)
    .where(
      and(
        eq(module_providers.namespace_id, namespace.id),
        eq(module_providers.module_name, moduleName),
        eq(module_providers.provider_name, providerName)
      )
    )
    .get();
  if (existing) {
    return { moduleProvider: existing, created: false };
  }
  return {
    moduleProvider: createModuleProvider(db, namespace.id, moduleName, providerName),
    created: true,
  };
}

/**
 * List module providers with their namespaces, ordered by triple
 */
export function listModuleProviders(
  db: DatabaseExecutor,
  options: { namespaceId?: number; moduleName?: string; offset?: number; limit?: number } = {}
): ModuleProviderWithNamespace[] {
  const conditions: SQL[] = [];
  if (options.namespaceId !== undefined) {
    conditions.push(eq(module_providers.namespace_id, options.namespaceId));
  }
  if (options.moduleName !== undefined) {
    conditions.push(eq(module_providers.module_name, options.moduleName));
  }

  const query = db
    .select({ namespace: namespaces, moduleProvider: module_providers })
    .from(module_providers)
    .innerJoin(namespaces, eq(module_providers.namespace_id, namespaces.id))
    .where(conditions.length > 0 ? and(...conditions) : undefined)
    .orderBy(asc(namespaces.name), asc(module_providers.module_name), asc(module_providers.provider_name));

  if (options.limit !== undefined) {
    return query
      .limit(options.limit)
      .offset(options.offset ?? 0)
      .all();
  }
  return query.all();
}

export function updateModuleProviderSettings(
  db: DatabaseExecutor,
  id: number,
  settings: ModuleProviderSettings
): ModuleProvider | null {
  if (Object.keys(settings).length === 0) {
    return db.select().from(module_providers).where(eq(module_providers.id, id)).get() ?? null;
  }
  const row = db
    .update(module_providers)
    .set(settings)
    .where(eq(module_providers.id, id))
    .returning()
    .get();
  if (row) {
    logger.info(`[db:module-providers] Updated settings: ${id}`);
  }
  return row ?? null;
}

/**
 * Delete a module provider (versions, submodules, files and analytics cascade)
 */
export function deleteModuleProvider(db: DatabaseExecutor, id: number): boolean {
  const result = db.delete(module_providers).where(eq(module_providers.id, id)).run();
  if (result.changes > 0) {
    logger.info(`[db:module-providers] Deleted module provider: ${id}`);
  }
  return result.changes > 0;
}
