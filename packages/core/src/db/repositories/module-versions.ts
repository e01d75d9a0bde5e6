/**
 * Module Version Repository
 *
 * Version rows are never updated in place by re-ingestion: a new row is
 * inserted and the previously published row is unpublished.
 *
 * @see schema/index.ts module_version, submodule, module_version_file, example_file tables
 */

import { and, asc, desc, eq, inArray, ne } from 'drizzle-orm';
import type { DatabaseExecutor } from '../client.js';
import {
  module_versions,
  submodules,
  module_version_files,
  example_files,
  type ModuleVersion,
  type NewModuleVersion,
  type Submodule,
  type NewSubmodule,
  type ModuleVersionFile,
  type NewModuleVersionFile,
  type ExampleFile,
  type NewExampleFile,
} from '../../schema/index.js';
import { isoTimestamp } from '../../utils/time.js';
import { logger } from '../../utils/logger.js';

export function insertModuleVersion(
  db: DatabaseExecutor,
  data: Omit<NewModuleVersion, 'id' | 'created_at'>
): ModuleVersion {
  const row = db
    .insert(module_versions)
    .values({ ...data, created_at: isoTimestamp() })
    .returning()
    .get();
  logger.info(`[db:module-versions] Inserted version ${row.version} (${row.id}, published=${row.published})`);
  return row;
}

export function getModuleVersionById(db: DatabaseExecutor, id: number): ModuleVersion | null {
  return db.select().from(module_versions).where(eq(module_versions.id, id)).get() ?? null;
}

/**
 * Which of the given ids still name a version row
 */
export function existingModuleVersionIds(db: DatabaseExecutor, ids: readonly number[]): Set<number> {
  if (ids.length === 0) return new Set();
  const rows = db
    .select({ id: module_versions.id })
    .from(module_versions)
    .where(inArray(module_versions.id, [...new Set(ids)]))
    .all();
  return new Set(rows.map(row => row.id));
}

/**
 * The visible row for a version, if any
 */
export function getPublishedModuleVersion(
  db: DatabaseExecutor,
  moduleProviderId: number,
  version: string
): ModuleVersion | null {
  return (
    db
      .select()
      .from(module_versions)
      .where(
        and(
          eq(module_versions.module_provider_id, moduleProviderId),
          eq(module_versions.version, version),
          eq(module_versions.published, true)
        )
      )
      .get() ?? null
  );
}

/**
 * The most recently ingested row for a version, published or not
 */
export function getLatestModuleVersionRow(
  db: DatabaseExecutor,
  moduleProviderId: number,
  version: string
): ModuleVersion | null {
  return (
    db
      .select()
      .from(module_versions)
      .where(and(eq(module_versions.module_provider_id, moduleProviderId), eq(module_versions.version, version)))
      .orderBy(desc(module_versions.id))
      .limit(1)
      .get() ?? null
  );
}

/**
 * All rows of a module provider, newest id first
 */
export function listModuleVersions(
  db: DatabaseExecutor,
  moduleProviderId: number,
  options: { publishedOnly?: boolean } = {}
): ModuleVersion[] {
  const condition = options.publishedOnly
    ? and(eq(module_versions.module_provider_id, moduleProviderId), eq(module_versions.published, true))
    : eq(module_versions.module_provider_id, moduleProviderId);
  return db.select().from(module_versions).where(condition).orderBy(desc(module_versions.id)).all();
}

/**
 * Mark a row published, unpublishing any other row of the same version first
 * so the partial unique index holds.
 */
export function publishModuleVersion(db: DatabaseExecutor, id: number): ModuleVersion | null {
  const target = getModuleVersionById(db, id);
  if (!target) return null;

  db.update(module_versions)
    .set({ published: false })
    .where(
      and(
        eq(module_versions.module_provider_id, target.module_provider_id),
        eq(module_versions.version, target.version),
        ne(module_versions.id, id)
      )
    )
    .run();

  const row = db
    .update(module_versions)
    .set({ published: true, published_at: target.published_at ?? isoTimestamp() })
    .where(eq(module_versions.id, id))
    .returning()
    .get();
  logger.info(`[db:module-versions] Published version ${target.version} (${id})`);
  return row ?? null;
}

export function setModuleVersionPublished(db: DatabaseExecutor, id: number, published: boolean): void {
  db.update(module_versions).set({ published }).where(eq(module_versions.id, id)).run();
}

/**
 * Delete a version row (submodules, files and analytics cascade)
 */
export function deleteModuleVersion(db: DatabaseExecutor, id: number): boolean {
  const result = db.delete(module_versions).where(eq(module_versions.id, id)).run();
  if (result.changes > 0) {
    logger.info(`[db:module-versions] Deleted version row ${id}`);
  }
  return result.changes > 0;
}

// ==========================================================================
// Submodules and examples
// ==========================================================================

export function insertSubmodule(db: DatabaseExecutor, data: Omit<NewSubmodule, 'id'>): Submodule {
  return db.insert(submodules).values(data).returning().get();
}

export function listSubmodules(
  db: DatabaseExecutor,
  moduleVersionId: number,
  type: Submodule['type']
): Submodule[] {
  return db
    .select()
    .from(submodules)
    .where(and(eq(submodules.module_version_id, moduleVersionId), eq(submodules.type, type)))
    .orderBy(asc(submodules.path))
    .all();
}

export function getSubmodule(
  db: DatabaseExecutor,
  moduleVersionId: number,
  type: Submodule['type'],
  path: string
): Submodule | null {
  return (
    db
      .select()
      .from(submodules)
      .where(
        and(
          eq(submodules.module_version_id, moduleVersionId),
          eq(submodules.type, type),
          eq(submodules.path, path)
        )
      )
      .get() ?? null
  );
}

// ==========================================================================
// Files
// ==========================================================================

export function insertModuleVersionFile(
  db: DatabaseExecutor,
  data: Omit<NewModuleVersionFile, 'id'>
): ModuleVersionFile {
  return db.insert(module_version_files).values(data).returning().get();
}

export function listModuleVersionFiles(db: DatabaseExecutor, moduleVersionId: number): ModuleVersionFile[] {
  return db
    .select()
    .from(module_version_files)
    .where(eq(module_version_files.module_version_id, moduleVersionId))
    .orderBy(asc(module_version_files.path))
    .all();
}

export function getModuleVersionFile(
  db: DatabaseExecutor,
  moduleVersionId: number,
  path: string
): ModuleVersionFile | null {
  return (
    db
      .select()
      .from(module_version_files)
      .where(and(eq(module_version_files.module_version_id, moduleVersionId), eq(module_version_files.path, path)))
      .get() ?? null
  );
}

export function insertExampleFile(db: DatabaseExecutor, data: Omit<NewExampleFile, 'id'>): ExampleFile {
  return db.insert(example_files).values(data).returning().get();
}

export function listExampleFiles(db: DatabaseExecutor, submoduleId: number): ExampleFile[] {
  return db
    .select()
    .from(example_files)
    .where(eq(example_files.submodule_id, submoduleId))
    .orderBy(asc(example_files.path))
    .all();
}

export function getExampleFile(db: DatabaseExecutor, submoduleId: number, path: string): ExampleFile | null {
  return (
    db
      .select()
      .from(example_files)
      .where(and(eq(example_files.submodule_id, submoduleId), eq(example_files.path, path)))
      .get() ?? null
  );
}
