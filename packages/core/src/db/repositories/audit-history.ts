/**
 * Audit History Repository
 *
 * Administrative actions (namespace and module changes, publishes, logins).
 *
 * @see schema/index.ts audit_history table
 */

import { count, desc } from 'drizzle-orm';
import type { DatabaseExecutor } from '../client.js';
import { audit_history, type AuditHistoryRow, type NewAuditHistoryRow } from '../../schema/index.js';
import { isoTimestamp } from '../../utils/time.js';

export type AuditAction =
  | 'NAMESPACE_CREATE'
  | 'NAMESPACE_DELETE'
  | 'MODULE_PROVIDER_CREATE'
  | 'MODULE_PROVIDER_DELETE'
  | 'MODULE_PROVIDER_UPDATE'
  | 'MODULE_VERSION_INDEX'
  | 'MODULE_VERSION_PUBLISH'
  | 'MODULE_VERSION_DELETE'
  | 'PROVIDER_VERSION_INDEX'
  | 'GPG_KEY_CREATE'
  | 'GPG_KEY_DELETE'
  | 'USER_LOGIN';

export function insertAuditHistory(
  db: DatabaseExecutor,
  entry: Omit<NewAuditHistoryRow, 'id' | 'timestamp' | 'action'> & { action: AuditAction }
): void {
  db.insert(audit_history)
    .values({ ...entry, timestamp: isoTimestamp() })
    .run();
}

/**
 * Newest first
 */
export function listAuditHistory(
  db: DatabaseExecutor,
  pagination: { offset: number; limit: number }
): { entries: AuditHistoryRow[]; total: number } {
  const entries = db
    .select()
    .from(audit_history)
    .orderBy(desc(audit_history.timestamp), desc(audit_history.id))
    .limit(pagination.limit)
    .offset(pagination.offset)
    .all();
  const [totalRow] = db.select({ value: count() }).from(audit_history).all();
  return { entries, total: totalRow?.value ?? 0 };
}
