/**
 * Session tests
 *
 * Cookie encryption and tamper detection, session lifetime and the
 * single-use OAuth state records.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { eq } from 'drizzle-orm';
import { initializeDatabase, runMigrations, closeDatabase, type DatabaseClient } from '../src/db/client.js';
import { getSessionById } from '../src/db/repositories/sessions.js';
import { sessions as sessionTable } from '../src/schema/index.js';
import { CookieCipher, SessionService } from '../src/session/index.js';
import {
  InvalidInputError,
  InvalidSessionCookieError,
  SessionExpiredError,
  UnauthorizedError,
} from '../src/utils/errors.js';

const SECRET = Buffer.from('test-secret-key-that-is-long-enough-for-tests');

describe('CookieCipher', () => {
  const cipher = new CookieCipher(SECRET);

  it('should round-trip a session id', () => {
    const cookie = cipher.encrypt({ session_id: 'abc123' });
    expect(cipher.decrypt(cookie)).toEqual({ session_id: 'abc123' });
  });

  it('should use a fresh nonce per cookie', () => {
    expect(cipher.encrypt({ session_id: 'same' })).not.toBe(cipher.encrypt({ session_id: 'same' }));
  });

  it('should reject every single-byte modification', () => {
    const raw = Buffer.from(cipher.encrypt({ session_id: 'abc123' }), 'base64url');
    for (let index = 0; index < raw.length; index++) {
      const tampered = Buffer.from(raw);
      tampered[index] = (tampered[index] ?? 0) ^ 0x01;
      expect(() => cipher.decrypt(tampered.toString('base64url'))).toThrow(InvalidSessionCookieError);
    }
  });

  it('should reject a cookie from another key', () => {
    const other = new CookieCipher(Buffer.from('another-test-secret-key-for-the-suite'));
    expect(() => cipher.decrypt(other.encrypt({ session_id: 'abc123' }))).toThrow(InvalidSessionCookieError);
  });

  it('should reject short and garbage values', () => {
    expect(() => cipher.decrypt('')).toThrow(InvalidSessionCookieError);
    expect(() => cipher.decrypt('c2hvcnQ')).toThrow(InvalidSessionCookieError);
    expect(() => cipher.decrypt('A'.repeat(80))).toThrow(InvalidSessionCookieError);
  });
});

describe('SessionService', () => {
  let db: DatabaseClient;
  let now: Date;
  let sessions: SessionService;

  beforeEach(() => {
    db = initializeDatabase({ sqliteFilePath: ':memory:' });
    runMigrations(db);
    now = new Date('2026-01-01T00:00:00Z');
    sessions = new SessionService(db, new CookieCipher(SECRET), {
      maxTtlSeconds: 3600,
      clock: () => now,
    });
  });

  afterEach(() => {
    closeDatabase(db);
  });

  it('should create and validate a session', () => {
    const created = sessions.createSession({ type: 'admin_session' }, 600);
    expect(created.expiry.toISOString()).toBe('2026-01-01T00:10:00.000Z');

    const loaded = sessions.validateSession(created.id);
    expect(loaded?.claims).toEqual({ type: 'admin_session' });
    expect(sessions.sessionIdFromCookie(created.cookie)).toBe(created.id);
  });

  it('should cap the ttl at the configured maximum', () => {
    const created = sessions.createSession({ type: 'admin_session' }, 86400);
    expect(created.expiry.toISOString()).toBe('2026-01-01T01:00:00.000Z');
  });

  it('should resolve a cookie to the stored claims', async () => {
    const claims = {
      type: 'oidc' as const,
      subject: 'user-1',
      username: 'alice',
      groups: ['platform-team'],
      claims: { sub: 'user-1' },
    };
    const created = sessions.createSession(claims, 600);
    const loaded = await sessions.resolveCookie(created.cookie);
    expect(loaded?.claims).toEqual(claims);
  });

  it('should expire and delete a session past its expiry', () => {
    const created = sessions.createSession({ type: 'admin_session' }, 60);
    now = new Date('2026-01-01T00:01:00Z');
    expect(() => sessions.validateSession(created.id)).toThrow(SessionExpiredError);
    expect(getSessionById(db, created.id)).toBeNull();
  });

  it('should refresh expiry within the cap', () => {
    const created = sessions.createSession({ type: 'admin_session' }, 60);
    now = new Date('2026-01-01T00:00:30Z');
    const expiry = sessions.refreshSession(created.id, 7200);
    expect(expiry?.toISOString()).toBe('2026-01-01T01:00:30.000Z');
    expect(sessions.refreshSession('missing', 60)).toBeNull();
  });

  it('should delete idempotently', () => {
    const created = sessions.createSession({ type: 'admin_session' }, 60);
    sessions.deleteSession(created.id);
    sessions.deleteSession(created.id);
    expect(sessions.validateSession(created.id)).toBeNull();
  });

  it('should discard sessions with unreadable claims', () => {
    const created = sessions.createSession({ type: 'admin_session' }, 60);
    db.update(sessionTable)
      .set({ provider_source_auth: '{"type":"bogus"}' })
      .where(eq(sessionTable.id, created.id))
      .run();
    expect(sessions.validateSession(created.id)).toBeNull();
    expect(getSessionById(db, created.id)).toBeNull();
  });

  describe('OAuth state', () => {
    it('should be consumable exactly once', () => {
      const state = sessions.createOAuthState({ redirect_url: '/modules', auth_method: 'oidc', code_verifier: 'v' });
      const payload = sessions.consumeOAuthState(state, 'oidc');
      expect(payload.redirect_url).toBe('/modules');
      expect(payload.code_verifier).toBe('v');
      expect(() => sessions.consumeOAuthState(state, 'oidc')).toThrow(UnauthorizedError);
    });

    it('should refuse a state issued for another method', () => {
      const state = sessions.createOAuthState({ redirect_url: '/', auth_method: 'saml' });
      expect(() => sessions.consumeOAuthState(state, 'oidc')).toThrow(UnauthorizedError);
    });

    it('should refuse an expired state', () => {
      const state = sessions.createOAuthState({ redirect_url: '/', auth_method: 'oidc' });
      now = new Date('2026-01-01T00:10:00Z');
      expect(() => sessions.consumeOAuthState(state, 'oidc')).toThrow(UnauthorizedError);
    });

    it('should refuse a state with the wrong secret half', () => {
      const state = sessions.createOAuthState({ redirect_url: '/', auth_method: 'oidc' });
      const [id] = Buffer.from(state, 'base64url').toString('utf8').split(':');
      const forged = Buffer.from(`${id ?? ''}:not-the-state`, 'utf8').toString('base64url');
      expect(() => sessions.consumeOAuthState(forged, 'oidc')).toThrow(UnauthorizedError);
    });

    it('should reject malformed parameters', () => {
      expect(() => sessions.consumeOAuthState('bm9jb2xvbg', 'oidc')).toThrow(InvalidInputError);
    });
  });
});
