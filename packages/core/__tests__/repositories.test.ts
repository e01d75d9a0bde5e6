/**
 * Repository tests against an in-memory database
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  initializeDatabase,
  runMigrations,
  closeDatabase,
  checkDatabaseHealth,
  parseDatabaseUrl,
  type DatabaseClient,
} from '../src/db/client.js';
import {
  createNamespace,
  deleteNamespaceIfEmpty,
  findOrCreateNamespace,
  getNamespaceByName,
  listNamespaces,
} from '../src/db/repositories/namespaces.js';
import {
  deleteModuleProvider,
  findOrCreateModuleProvider,
  getModuleProvider,
} from '../src/db/repositories/module-providers.js';
import {
  getModuleVersionById,
  getPublishedModuleVersion,
  insertModuleVersion,
  listModuleVersions,
  publishModuleVersion,
} from '../src/db/repositories/module-versions.js';
import {
  consumeSession,
  deleteExpiredSessions,
  getSessionById,
  insertSession,
} from '../src/db/repositories/sessions.js';
import { consumeAuthorizationCode, insertAuthorizationCode } from '../src/db/repositories/terraform-idp.js';
import { listProviderCategories } from '../src/db/repositories/providers.js';
import { RegistryError } from '../src/utils/errors.js';

describe('database', () => {
  let db: DatabaseClient;

  beforeEach(() => {
    db = initializeDatabase({ sqliteFilePath: ':memory:' });
    runMigrations(db);
  });

  afterEach(() => {
    closeDatabase(db);
  });

  it('should re-run migrations without changes', () => {
    runMigrations(db);
    expect(listProviderCategories(db)).toHaveLength(8);
    expect(checkDatabaseHealth(db)).toBe(true);
  });

  it('should parse sqlite URLs', () => {
    expect(parseDatabaseUrl('sqlite:///data/registry.db').sqliteFilePath).toBe('data/registry.db');
    expect(parseDatabaseUrl('sqlite:////var/lib/registry.db').sqliteFilePath).toBe('/var/lib/registry.db');
    expect(parseDatabaseUrl('sqlite:///:memory:').sqliteFilePath).toBe(':memory:');
    expect(() => parseDatabaseUrl('mysql://registry')).toThrow(RegistryError);
  });

  describe('namespaces', () => {
    it('should look up names case-insensitively', () => {
      createNamespace(db, { name: 'Platform' });
      expect(getNamespaceByName(db, 'platform')?.name).toBe('Platform');
      expect(findOrCreateNamespace(db, 'PLATFORM').created).toBe(false);
    });

    it('should refuse a name that differs only in case', () => {
      createNamespace(db, { name: 'platform' });
      expect(() => createNamespace(db, { name: 'Platform' })).toThrow(/UNIQUE/);
    });

    it('should page in name order', () => {
      for (const name of ['charlie', 'alpha', 'bravo']) {
        createNamespace(db, { name });
      }
      const page = listNamespaces(db, { offset: 1, limit: 1 });
      expect(page.total).toBe(3);
      expect(page.namespaces.map(ns => ns.name)).toEqual(['bravo']);
    });

    it('should only delete empty namespaces', () => {
      const { namespace } = findOrCreateNamespace(db, 'platform');
      findOrCreateModuleProvider(db, namespace, 'vpc', 'aws');
      expect(deleteNamespaceIfEmpty(db, namespace.id)).toBe(false);

      const empty = createNamespace(db, { name: 'empty' });
      expect(deleteNamespaceIfEmpty(db, empty.id)).toBe(true);
      expect(getNamespaceByName(db, 'empty')).toBeNull();
    });
  });

  describe('module versions', () => {
    function seedProvider() {
      const { namespace } = findOrCreateNamespace(db, 'platform');
      return findOrCreateModuleProvider(db, namespace, 'vpc', 'aws').moduleProvider;
    }

    it('should keep at most one published row per version', () => {
      const provider = seedProvider();
      const first = insertModuleVersion(db, {
        module_provider_id: provider.id,
        version: '1.0.0',
        published: true,
        published_at: '2026-01-01T00:00:00Z',
        extraction_version: 1,
      });
      const second = insertModuleVersion(db, {
        module_provider_id: provider.id,
        version: '1.0.0',
        extraction_version: 1,
      });

      publishModuleVersion(db, second.id);

      expect(getModuleVersionById(db, first.id)?.published).toBe(false);
      expect(getPublishedModuleVersion(db, provider.id, '1.0.0')?.id).toBe(second.id);
      expect(listModuleVersions(db, provider.id, { publishedOnly: true })).toHaveLength(1);
    });

    it('should refuse a second published row directly', () => {
      const provider = seedProvider();
      const row = { module_provider_id: provider.id, version: '1.0.0', published: true, extraction_version: 1 };
      insertModuleVersion(db, row);
      expect(() => insertModuleVersion(db, row)).toThrow(/UNIQUE/);
    });

    it('should cascade a module provider delete to its versions', () => {
      const provider = seedProvider();
      const version = insertModuleVersion(db, {
        module_provider_id: provider.id,
        version: '1.0.0',
        extraction_version: 1,
      });
      expect(deleteModuleProvider(db, provider.id)).toBe(true);
      expect(getModuleVersionById(db, version.id)).toBeNull();
      expect(getModuleProvider(db, 'platform', 'vpc', 'aws')).toBeNull();
    });
  });

  describe('sessions', () => {
    const base = { provider_source_auth: '{}', created_at: '2026-01-01T00:00:00Z', last_accessed_at: '2026-01-01T00:00:00Z' };

    it('should consume a record once', () => {
      insertSession(db, { ...base, id: 's1', kind: 'oauth_state', expiry: '2026-01-01T00:10:00Z' });
      expect(consumeSession(db, 's1')?.id).toBe('s1');
      expect(consumeSession(db, 's1')).toBeNull();
    });

    it('should delete expired rows of one kind only', () => {
      insertSession(db, { ...base, id: 'user-old', kind: 'user', expiry: '2026-01-01T00:00:00Z' });
      insertSession(db, { ...base, id: 'user-new', kind: 'user', expiry: '2026-01-02T00:00:00Z' });
      insertSession(db, { ...base, id: 'state-old', kind: 'oauth_state', expiry: '2026-01-01T00:00:00Z' });

      expect(deleteExpiredSessions(db, 'user', new Date('2026-01-01T00:00:00Z'))).toBe(1);
      expect(getSessionById(db, 'user-old')).toBeNull();
      expect(getSessionById(db, 'user-new')).not.toBeNull();
      expect(getSessionById(db, 'state-old')).not.toBeNull();
    });
  });

  it('should redeem an authorization code once', () => {
    insertAuthorizationCode(db, {
      code_hash: 'hash-1',
      client_id: 'terraform-cli',
      redirect_uri: 'http://localhost:10000/login',
      code_challenge: 'challenge',
      subject: '{"username":"alice","groups":[]}',
      expiry: '2026-01-01T00:10:00Z',
      created_at: '2026-01-01T00:00:00Z',
    });
    expect(consumeAuthorizationCode(db, 'hash-1')?.client_id).toBe('terraform-cli');
    expect(consumeAuthorizationCode(db, 'hash-1')).toBeNull();
  });
});
