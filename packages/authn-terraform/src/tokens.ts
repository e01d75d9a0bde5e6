/**
 * Terraform login access tokens
 *
 * Format: tfoidc_{16 hex id}_{64 hex secret}
 * Only an Argon2id hash of the secret is stored; lookup is by id.
 */

import * as argon2 from 'argon2';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import {
  getAccessToken,
  insertAccessToken,
  isoTimestamp,
  addSeconds,
  logger,
  type DatabaseExecutor,
} from '@terrashelf/core';

/**
 * Argon2id parameters (OWASP minimum)
 */
const ARGON2_OPTIONS = {
  type: argon2.argon2id,
  memoryCost: 19456, // 19MB
  timeCost: 2,
  parallelism: 1,
};

export const ACCESS_TOKEN_PREFIX = 'tfoidc';

const ACCESS_TOKEN_FORMAT = /^tfoidc_([0-9a-f]{16})_([0-9a-f]{64})$/;

export const TokenSubjectSchema = z.object({
  username: z.string(),
  groups: z.array(z.string()),
});

export type TokenSubject = z.infer<typeof TokenSubjectSchema>;

export interface IssuedAccessToken {
  token: string;
  id: string;
  expiry: Date;
}

export interface VerifiedAccessToken {
  id: string;
  subject: TokenSubject;
}

/**
 * Parse a presented token into id and secret, or null if malformed
 */
export function parseAccessToken(token: string): { id: string; secret: string } | null {
  const match = ACCESS_TOKEN_FORMAT.exec(token);
  const id = match?.[1];
  const secret = match?.[2];
  if (id === undefined || secret === undefined) return null;
  return { id, secret };
}

/**
 * Create and store a new access token
 */
export async function issueAccessToken(
  db: DatabaseExecutor,
  subject: TokenSubject,
  lifetimeSeconds: number,
  now: Date = new Date()
): Promise<IssuedAccessToken> {
  const id = randomBytes(8).toString('hex');
  const secret = randomBytes(32).toString('hex');
  const expiry = addSeconds(now, lifetimeSeconds);

  insertAccessToken(db, {
    id,
    token_hash: await argon2.hash(secret, ARGON2_OPTIONS),
    subject: JSON.stringify(subject),
    expiry: isoTimestamp(expiry),
    created_at: isoTimestamp(now),
  });
  logger.info(`[authn-terraform] Issued Terraform access token ${id} for ${subject.username}`);

  return { token: `${ACCESS_TOKEN_PREFIX}_${id}_${secret}`, id, expiry };
}

/**
 * Verify a presented token. Malformed, unknown, expired and mismatched
 * tokens all yield null.
 */
export async function verifyAccessToken(
  db: DatabaseExecutor,
  token: string,
  now: Date = new Date()
): Promise<VerifiedAccessToken | null> {
  // Validate format before DB lookup and hashing
  const parsed = parseAccessToken(token);
  if (!parsed) return null;

  const row = getAccessToken(db, parsed.id);
  if (!row) return null;
  if (now.getTime() >= new Date(row.expiry).getTime()) return null;

  let matches: boolean;
  try {
    matches = await argon2.verify(row.token_hash, parsed.secret);
  } catch (err) {
    logger.warn({ err }, `[authn-terraform] Stored hash for token ${parsed.id} could not be verified`);
    return null;
  }
  if (!matches) return null;

  let subject: unknown;
  try {
    subject = JSON.parse(row.subject);
  } catch (err) {
    logger.warn({ err }, `[authn-terraform] Token ${parsed.id} has an unreadable subject`);
    return null;
  }
  const checked = TokenSubjectSchema.safeParse(subject);
  if (!checked.success) return null;

  return { id: row.id, subject: checked.data };
}
