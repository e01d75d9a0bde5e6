/**
 * Database Access Layer - Barrel Export
 *
 * Usage:
 * ```typescript
 * import { initializeDatabase, runMigrations, findOrCreateNamespace } from './db/index.js';
 *
 * const db = initializeDatabase(parseDatabaseUrl('sqlite:///data/registry.db'));
 * runMigrations(db);
 * const { namespace } = findOrCreateNamespace(db, 'platform');
 * ```
 */

// Database client setup
export {
  parseDatabaseUrl,
  initializeDatabase,
  runMigrations,
  closeDatabase,
  checkDatabaseHealth,
  type DatabaseClient,
  type DatabaseExecutor,
  type DatabaseConfig,
} from './client.js';

export * from './repositories/namespaces.js';
export * from './repositories/module-providers.js';
export * from './repositories/module-versions.js';
export * from './repositories/sessions.js';
export * from './repositories/terraform-idp.js';
export * from './repositories/user-groups.js';
export * from './repositories/analytics.js';
export * from './repositories/search.js';
export * from './repositories/providers.js';
export * from './repositories/audit-history.js';
