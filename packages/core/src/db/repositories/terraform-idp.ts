/**
 * Terraform Login IdP Repository
 *
 * Authorization codes and access tokens issued to `terraform login`.
 *
 * @see schema/index.ts terraform_idp_authorization_code, terraform_idp_access_token tables
 */

import { eq, lte } from 'drizzle-orm';
import type { DatabaseExecutor } from '../client.js';
import {
  terraform_idp_authorization_codes,
  terraform_idp_access_tokens,
  type TerraformIdpAuthorizationCode,
  type TerraformIdpAccessToken,
} from '../../schema/index.js';
import { isoTimestamp } from '../../utils/time.js';

export function insertAuthorizationCode(
  db: DatabaseExecutor,
  data: TerraformIdpAuthorizationCode
): void {
  db.insert(terraform_idp_authorization_codes).values(data).run();
}

/**
 * Atomic get-and-delete; a code can only be redeemed once
 */
export function consumeAuthorizationCode(
  db: DatabaseExecutor,
  codeHash: string
): TerraformIdpAuthorizationCode | null {
  const row = db
    .select()
    .from(terraform_idp_authorization_codes)
    .where(eq(terraform_idp_authorization_codes.code_hash, codeHash))
    .get();
  if (!row) return null;
  const result = db
    .delete(terraform_idp_authorization_codes)
    .where(eq(terraform_idp_authorization_codes.code_hash, codeHash))
    .run();
  return result.changes > 0 ? row : null;
}

export function deleteExpiredAuthorizationCodes(db: DatabaseExecutor, now: Date = new Date()): number {
  return db
    .delete(terraform_idp_authorization_codes)
    .where(lte(terraform_idp_authorization_codes.expiry, isoTimestamp(now)))
    .run().changes;
}

export function insertAccessToken(db: DatabaseExecutor, data: TerraformIdpAccessToken): void {
  db.insert(terraform_idp_access_tokens).values(data).run();
}

export function getAccessToken(db: DatabaseExecutor, id: string): TerraformIdpAccessToken | null {
  return (
    db.select().from(terraform_idp_access_tokens).where(eq(terraform_idp_access_tokens.id, id)).get() ?? null
  );
}

export function deleteExpiredAccessTokens(db: DatabaseExecutor, now: Date = new Date()): number {
  return db
    .delete(terraform_idp_access_tokens)
    .where(lte(terraform_idp_access_tokens.expiry, isoTimestamp(now)))
    .run().changes;
}
