/**
 * Session service
 *
 * Creates, validates, refreshes and deletes login sessions, and stores the
 * short-lived OAuth state records used by the SSO flows.
 */

import crypto from 'crypto';
import { z } from 'zod';
import type { DatabaseExecutor } from '../db/client.js';
import {
  insertSession,
  getSessionById,
  touchSession,
  updateSessionExpiry,
  deleteSession,
  consumeSession,
} from '../db/repositories/sessions.js';
import type { LoadedSession, SessionClaims, SessionResolver } from '../spi/index.js';
import { CookieCipher } from './cookie.js';
import { InvalidInputError, SessionExpiredError, UnauthorizedError } from '../utils/errors.js';
import { addSeconds, isoTimestamp } from '../utils/time.js';
import { logger } from '../utils/logger.js';

export { CookieCipher, CookiePayloadSchema, type CookiePayload } from './cookie.js';

/** OAuth state records live for ten minutes */
export const OAUTH_STATE_TTL_SECONDS = 600;

export const SessionClaimsSchema: z.ZodType<SessionClaims> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('admin_session') }),
  z.object({
    type: z.literal('saml'),
    subject: z.string(),
    username: z.string(),
    groups: z.array(z.string()),
    attributes: z.record(z.array(z.string())),
  }),
  z.object({
    type: z.literal('oidc'),
    subject: z.string(),
    username: z.string(),
    groups: z.array(z.string()),
    claims: z.record(z.unknown()),
  }),
]);

export const OAuthStatePayloadSchema = z.object({
  state: z.string().min(1),
  redirect_url: z.string(),
  auth_method: z.enum(['oidc', 'saml', 'terraform_idp']),
  expires_at: z.string(),
  code_verifier: z.string().optional(),
  nonce: z.string().optional(),
});

export type OAuthStatePayload = z.infer<typeof OAuthStatePayloadSchema>;

export interface SessionServiceOptions {
  /** Upper bound applied to every requested TTL */
  maxTtlSeconds: number;
  clock?: () => Date;
}

export interface CreatedSession {
  id: string;
  expiry: Date;
  /** Encrypted cookie value carrying the session id */
  cookie: string;
}

function randomId(): string {
  return crypto.randomBytes(32).toString('base64url');
}

export class SessionService implements SessionResolver {
  private readonly clock: () => Date;

  constructor(
    private readonly db: DatabaseExecutor,
    private readonly cipher: CookieCipher,
    private readonly options: SessionServiceOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  private boundedTtl(ttlSeconds: number): number {
    return Math.max(0, Math.min(ttlSeconds, this.options.maxTtlSeconds));
  }

  /**
   * Create a login session; expiry is now + min(ttl, max ttl)
   */
  createSession(claims: SessionClaims, ttlSeconds: number): CreatedSession {
    const now = this.clock();
    const id = randomId();
    const expiry = addSeconds(now, this.boundedTtl(ttlSeconds));

    insertSession(this.db, {
      id,
      kind: 'user',
      expiry: isoTimestamp(expiry),
      provider_source_auth: JSON.stringify(claims),
      created_at: isoTimestamp(now),
      last_accessed_at: isoTimestamp(now),
    });
    logger.info(`[session] Created ${claims.type} session`);

    return { id, expiry, cookie: this.cipher.encrypt({ session_id: id }) };
  }

  /**
   * Look up a session without extending it
   *
   * @returns null when absent
   * @throws SessionExpiredError when past expiry (the row is deleted)
   */
  validateSession(id: string): LoadedSession | null {
    const row = getSessionById(this.db, id);
    if (!row || row.kind !== 'user') return null;

    const now = this.clock();
    const expiry = new Date(row.expiry);
    if (now.getTime() >= expiry.getTime()) {
      deleteSession(this.db, id);
      throw new SessionExpiredError();
    }

    let stored: unknown;
    try {
      stored = JSON.parse(row.provider_source_auth);
    } catch (err) {
      logger.warn({ err }, '[session] Stored session claims are not JSON; discarding session');
      deleteSession(this.db, id);
      return null;
    }
    const claims = SessionClaimsSchema.safeParse(stored);
    if (!claims.success) {
      logger.warn('[session] Stored session claims have an unexpected shape; discarding session');
      deleteSession(this.db, id);
      return null;
    }

    touchSession(this.db, id, now);
    return { id, claims: claims.data, expiry };
  }

  /**
   * Move expiry to now + min(ttl, max ttl)
   *
   * @returns the new expiry, or null when the session no longer exists
   */
  refreshSession(id: string, ttlSeconds: number): Date | null {
    const expiry = addSeconds(this.clock(), this.boundedTtl(ttlSeconds));
    return updateSessionExpiry(this.db, id, isoTimestamp(expiry)) ? expiry : null;
  }

  /** Idempotent */
  deleteSession(id: string): void {
    deleteSession(this.db, id);
  }

  async resolveCookie(cookieValue: string): Promise<LoadedSession | null> {
    const { session_id } = this.cipher.decrypt(cookieValue);
    return this.validateSession(session_id);
  }

  /**
   * Session id carried by a cookie, if it decrypts
   */
  sessionIdFromCookie(cookieValue: string): string {
    return this.cipher.decrypt(cookieValue).session_id;
  }

  // ==========================================================================
  // OAuth state
  // ==========================================================================

  /**
   * Store an OAuth state record
   *
   * @returns the state parameter for the IdP: base64url(session_id + ":" + state)
   */
  createOAuthState(input: Omit<OAuthStatePayload, 'state' | 'expires_at'>): string {
    const now = this.clock();
    const id = randomId();
    const state = randomId();
    const expiry = addSeconds(now, OAUTH_STATE_TTL_SECONDS);
    const payload: OAuthStatePayload = { ...input, state, expires_at: isoTimestamp(expiry) };

    insertSession(this.db, {
      id,
      kind: 'oauth_state',
      expiry: isoTimestamp(expiry),
      provider_source_auth: JSON.stringify(payload),
      created_at: isoTimestamp(now),
      last_accessed_at: isoTimestamp(now),
    });

    return Buffer.from(`${id}:${state}`, 'utf8').toString('base64url');
  }

  /**
   * Decode and single-consume a state parameter
   *
   * @throws InvalidInputError for malformed parameters
   * @throws UnauthorizedError for unknown, replayed, expired or mismatched state
   */
  consumeOAuthState(stateParam: string, authMethod: OAuthStatePayload['auth_method']): OAuthStatePayload {
    const decoded = Buffer.from(stateParam, 'base64url').toString('utf8');
    const separator = decoded.indexOf(':');
    if (separator <= 0 || separator === decoded.length - 1) {
      throw new InvalidInputError('Malformed state parameter');
    }
    const id = decoded.slice(0, separator);
    const state = decoded.slice(separator + 1);

    const row = consumeSession(this.db, id);
    if (!row || row.kind !== 'oauth_state') {
      throw new UnauthorizedError('Unknown or already used state parameter');
    }

    let stored: unknown;
    try {
      stored = JSON.parse(row.provider_source_auth);
    } catch (err) {
      logger.warn({ err }, '[session] OAuth state payload is not JSON');
      throw new UnauthorizedError('Invalid state parameter');
    }
    const payload = OAuthStatePayloadSchema.safeParse(stored);
    if (!payload.success) {
      throw new UnauthorizedError('Invalid state parameter');
    }

    const expected = Buffer.from(payload.data.state);
    const presented = Buffer.from(state);
    if (expected.length !== presented.length || !crypto.timingSafeEqual(expected, presented)) {
      throw new UnauthorizedError('State parameter mismatch');
    }
    if (payload.data.auth_method !== authMethod) {
      throw new UnauthorizedError('State parameter was issued for another login method');
    }
    if (this.clock().getTime() >= new Date(row.expiry).getTime()) {
      throw new UnauthorizedError('State parameter expired');
    }
    return payload.data;
  }
}
