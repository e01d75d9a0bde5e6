/**
 * Search candidate queries
 *
 * Returns published, non-beta version rows with their module provider and
 * namespace. Choosing the latest version per module provider and scoring
 * happen in the search layer.
 */

import { and, eq, inArray, notInArray, sql, type SQL } from 'drizzle-orm';
import type { DatabaseExecutor } from '../client.js';
import {
  module_versions,
  module_providers,
  namespaces,
  type ModuleVersion,
  type ModuleProvider,
  type Namespace,
} from '../../schema/index.js';

export interface SearchCandidateFilters {
  namespaces?: readonly string[];
  providers?: readonly string[];
  verified?: boolean;
  /** Restrict to (true) or exclude (false) these namespaces */
  trusted?: { namespaces: readonly string[]; include: boolean };
}

export interface SearchCandidateRow {
  namespace: Namespace;
  moduleProvider: ModuleProvider;
  moduleVersion: ModuleVersion;
}

export function listSearchCandidates(
  db: DatabaseExecutor,
  filters: SearchCandidateFilters = {}
): SearchCandidateRow[] {
  const conditions: SQL[] = [eq(module_versions.published, true), eq(module_versions.beta, false)];

  if (filters.namespaces && filters.namespaces.length > 0) {
    conditions.push(
      inArray(
        sql`lower(${namespaces.name})`,
        filters.namespaces.map(name => name.toLowerCase())
      )
    );
  }
  if (filters.providers && filters.providers.length > 0) {
    conditions.push(inArray(module_providers.provider_name, [...filters.providers]));
  }
  if (filters.verified !== undefined) {
    conditions.push(eq(module_providers.verified, filters.verified));
  }
  if (filters.trusted) {
    const trusted = filters.trusted.namespaces.map(name => name.toLowerCase());
    if (filters.trusted.include) {
      // No trusted namespaces configured means nothing is trusted
      conditions.push(trusted.length > 0 ? inArray(sql`lower(${namespaces.name})`, trusted) : sql`0 = 1`);
    } else if (trusted.length > 0) {
      conditions.push(notInArray(sql`lower(${namespaces.name})`, trusted));
    }
  }

  return db
    .select({ namespace: namespaces, moduleProvider: module_providers, moduleVersion: module_versions })
    .from(module_versions)
    .innerJoin(module_providers, eq(module_versions.module_provider_id, module_providers.id))
    .innerJoin(namespaces, eq(module_providers.namespace_id, namespaces.id))
    .where(and(...conditions))
    .all();
}
