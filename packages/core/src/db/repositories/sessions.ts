/**
 * Session Repository
 *
 * Login sessions and OAuth state records share the session table and are
 * told apart by `kind`.
 *
 * @see schema/index.ts session table
 */

import { and, eq, lte } from 'drizzle-orm';
import type { DatabaseExecutor } from '../client.js';
import { sessions, type SessionRow, type NewSessionRow } from '../../schema/index.js';
import { isoTimestamp } from '../../utils/time.js';
import { logger } from '../../utils/logger.js';

export function insertSession(db: DatabaseExecutor, data: NewSessionRow): SessionRow {
  const row = db.insert(sessions).values(data).returning().get();
  logger.debug(`[db:sessions] Created ${row.kind} session (expires ${row.expiry})`);
  return row;
}

export function getSessionById(db: DatabaseExecutor, id: string): SessionRow | null {
  return db.select().from(sessions).where(eq(sessions.id, id)).get() ?? null;
}

export function touchSession(db: DatabaseExecutor, id: string, now: Date = new Date()): void {
  db.update(sessions).set({ last_accessed_at: isoTimestamp(now) }).where(eq(sessions.id, id)).run();
}

export function updateSessionExpiry(db: DatabaseExecutor, id: string, expiry: string): boolean {
  const result = db
    .update(sessions)
    .set({ expiry, last_accessed_at: isoTimestamp() })
    .where(eq(sessions.id, id))
    .run();
  return result.changes > 0;
}

/**
 * Delete a session. Idempotent.
 */
export function deleteSession(db: DatabaseExecutor, id: string): boolean {
  return db.delete(sessions).where(eq(sessions.id, id)).run().changes > 0;
}

/**
 * Atomic get-and-delete for single-use records
 */
export function consumeSession(db: DatabaseExecutor, id: string): SessionRow | null {
  const row = getSessionById(db, id);
  if (!row) return null;
  const result = db.delete(sessions).where(eq(sessions.id, id)).run();
  // A concurrent consumer got there first
  return result.changes > 0 ? row : null;
}

/**
 * Delete sessions of a kind whose expiry is at or before `now`
 *
 * @returns Number of rows deleted
 */
export function deleteExpiredSessions(
  db: DatabaseExecutor,
  kind: SessionRow['kind'],
  now: Date = new Date()
): number {
  const result = db
    .delete(sessions)
    .where(and(eq(sessions.kind, kind), lte(sessions.expiry, isoTimestamp(now))))
    .run();
  if (result.changes > 0) {
    logger.debug(`[db:sessions] Deleted ${result.changes} expired ${kind} sessions`);
  }
  return result.changes;
}
