/**
 * Analytics Repository
 *
 * Append-only download records. Reads happen on admin endpoints only.
 *
 * @see schema/index.ts analytics table
 */

import { count, desc, eq, inArray } from 'drizzle-orm';
import type { DatabaseExecutor } from '../client.js';
import { analytics, module_versions, type NewAnalyticsRow } from '../../schema/index.js';

/**
 * Insert a batch of analytics rows in one statement
 */
export function insertAnalyticsBatch(db: DatabaseExecutor, rows: readonly NewAnalyticsRow[]): number {
  if (rows.length === 0) return 0;
  return db.insert(analytics).values([...rows]).run().changes;
}

/**
 * Download counts keyed by module provider id
 */
export function countDownloadsByModuleProvider(
  db: DatabaseExecutor,
  moduleProviderIds: readonly number[]
): Map<number, number> {
  const counts = new Map<number, number>();
  if (moduleProviderIds.length === 0) return counts;
  const rows = db
    .select({ moduleProviderId: module_versions.module_provider_id, value: count() })
    .from(analytics)
    .innerJoin(module_versions, eq(analytics.module_version_id, module_versions.id))
    .where(inArray(module_versions.module_provider_id, [...moduleProviderIds]))
    .groupBy(module_versions.module_provider_id)
    .all();
  for (const row of rows) {
    counts.set(row.moduleProviderId, row.value);
  }
  return counts;
}

export interface TokenUsageRow {
  analytics_token: string | null;
  environment: string | null;
  terraform_version: string | null;
  module_version: string;
  timestamp: string;
}

/**
 * Most recent download per (token, environment) for a module provider
 */
export function latestTokenUsage(db: DatabaseExecutor, moduleProviderId: number): TokenUsageRow[] {
  const rows = db
    .select({
      analytics_token: analytics.analytics_token,
      environment: analytics.environment,
      terraform_version: analytics.terraform_version,
      module_version: module_versions.version,
      timestamp: analytics.timestamp,
    })
    .from(analytics)
    .innerJoin(module_versions, eq(analytics.module_version_id, module_versions.id))
    .where(eq(module_versions.module_provider_id, moduleProviderId))
    .orderBy(desc(analytics.timestamp), desc(analytics.id))
    .all();

  const seen = new Set<string>();
  const latest: TokenUsageRow[] = [];
  for (const row of rows) {
    const key = `${row.analytics_token ?? ''}\u0000${row.environment ?? ''}`;
    if (seen.has(key)) continue;
    seen.add(key);
    latest.push(row);
  }
  return latest;
}
