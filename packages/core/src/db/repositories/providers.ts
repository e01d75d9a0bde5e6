/**
 * Provider Repository
 *
 * Providers, their versions and platform binaries, GPG keys and categories.
 *
 * @see schema/index.ts provider, provider_version, provider_version_binary, gpg_key, provider_category tables
 */

import { and, asc, desc, eq, sql, inArray } from 'drizzle-orm';
import type { DatabaseExecutor } from '../client.js';
import {
  providers,
  provider_versions,
  provider_version_binaries,
  provider_categories,
  gpg_keys,
  namespaces,
  type Provider,
  type ProviderVersion,
  type ProviderVersionBinary,
  type ProviderCategory,
  type GpgKey,
  type NewGpgKey,
  type Namespace,
} from '../../schema/index.js';
import { isoTimestamp } from '../../utils/time.js';
import { logger } from '../../utils/logger.js';

// ==========================================================================
// Categories
// ==========================================================================

export function listProviderCategories(db: DatabaseExecutor): ProviderCategory[] {
  return db.select().from(provider_categories).orderBy(asc(provider_categories.id)).all();
}

// ==========================================================================
// GPG keys
// ==========================================================================

export function insertGpgKey(
  db: DatabaseExecutor,
  data: Omit<NewGpgKey, 'id' | 'created_at' | 'updated_at'>
): GpgKey {
  const now = isoTimestamp();
  const row = db
    .insert(gpg_keys)
    .values({ ...data, created_at: now, updated_at: now })
    .returning()
    .get();
  logger.info(`[db:gpg-keys] Added key ${row.key_id} to namespace ${row.namespace_id}`);
  return row;
}

export function getGpgKey(db: DatabaseExecutor, namespaceId: number, keyId: string): GpgKey | null {
  return (
    db
      .select()
      .from(gpg_keys)
      .where(and(eq(gpg_keys.namespace_id, namespaceId), eq(gpg_keys.key_id, keyId.toUpperCase())))
      .get() ?? null
  );
}

export function getGpgKeyById(db: DatabaseExecutor, id: number): GpgKey | null {
  return db.select().from(gpg_keys).where(eq(gpg_keys.id, id)).get() ?? null;
}

export function listGpgKeys(
  db: DatabaseExecutor,
  namespaceNames: readonly string[]
): Array<{ gpgKey: GpgKey; namespace: Namespace }> {
  return db
    .select({ gpgKey: gpg_keys, namespace: namespaces })
    .from(gpg_keys)
    .innerJoin(namespaces, eq(gpg_keys.namespace_id, namespaces.id))
    .where(
      namespaceNames.length > 0
        ? inArray(sql`lower(${namespaces.name})`, namespaceNames.map(name => name.toLowerCase()))
        : undefined
    )
    .orderBy(asc(namespaces.name), asc(gpg_keys.key_id))
    .all();
}

/**
 * @returns false when the key is still referenced by a provider version
 */
export function deleteGpgKey(db: DatabaseExecutor, id: number): boolean {
  const inUse = db
    .select({ id: provider_versions.id })
    .from(provider_versions)
    .where(eq(provider_versions.gpg_key_id, id))
    .limit(1)
    .get();
  if (inUse) return false;
  db.delete(gpg_keys).where(eq(gpg_keys.id, id)).run();
  logger.info(`[db:gpg-keys] Deleted key ${id}`);
  return true;
}

// ==========================================================================
// Providers
// ==========================================================================

export function getProvider(
  db: DatabaseExecutor,
  namespaceName: string,
  name: string
): { provider: Provider; namespace: Namespace } | null {
  return (
    db
      .select({ provider: providers, namespace: namespaces })
      .from(providers)
      .innerJoin(namespaces, eq(providers.namespace_id, namespaces.id))
      .where(and(sql`lower(${namespaces.name}) = ${namespaceName.toLowerCase()}`, eq(providers.name, name)))
      .get() ?? null
  );
}

export function findOrCreateProvider(
  db: DatabaseExecutor,
  namespace: Namespace,
  name: string,
  categoryId: number | null = null
): Provider {
  const existing = db
    .select()
    .from(providers)
    .where(and(eq(providers.namespace_id, namespace.id), eq(providers.name, name)))
    .get();
  if (existing) return existing;
  const row = db
    .insert(providers)
    .values({ namespace_id: namespace.id, name, category_id: categoryId, created_at: isoTimestamp() })
    .returning()
    .get();
  logger.info(`[db:providers] Created provider ${namespace.name}/${name} (${row.id})`);
  return row;
}

// ==========================================================================
// Versions and binaries
// ==========================================================================

export function insertProviderVersion(
  db: DatabaseExecutor,
  data: Omit<ProviderVersion, 'id' | 'published_at'>
): ProviderVersion {
  return db
    .insert(provider_versions)
    .values({ ...data, published_at: isoTimestamp() })
    .returning()
    .get();
}

export function getProviderVersion(
  db: DatabaseExecutor,
  providerId: number,
  version: string
): ProviderVersion | null {
  return (
    db
      .select()
      .from(provider_versions)
      .where(and(eq(provider_versions.provider_id, providerId), eq(provider_versions.version, version)))
      .get() ?? null
  );
}

export function listProviderVersions(db: DatabaseExecutor, providerId: number): ProviderVersion[] {
  return db
    .select()
    .from(provider_versions)
    .where(eq(provider_versions.provider_id, providerId))
    .orderBy(desc(provider_versions.id))
    .all();
}

export function insertProviderBinary(
  db: DatabaseExecutor,
  data: Omit<ProviderVersionBinary, 'id'>
): ProviderVersionBinary {
  return db.insert(provider_version_binaries).values(data).returning().get();
}

export function listProviderBinaries(db: DatabaseExecutor, providerVersionIds: readonly number[]): ProviderVersionBinary[] {
  if (providerVersionIds.length === 0) return [];
  return db
    .select()
    .from(provider_version_binaries)
    .where(inArray(provider_version_binaries.provider_version_id, [...providerVersionIds]))
    .orderBy(asc(provider_version_binaries.os), asc(provider_version_binaries.arch))
    .all();
}

export function getProviderBinary(
  db: DatabaseExecutor,
  providerVersionId: number,
  os: string,
  arch: string
): ProviderVersionBinary | null {
  return (
    db
      .select()
      .from(provider_version_binaries)
      .where(
        and(
          eq(provider_version_binaries.provider_version_id, providerVersionId),
          eq(provider_version_binaries.os, os),
          eq(provider_version_binaries.arch, arch)
        )
      )
      .get() ?? null
  );
}
