/**
 * Registry Database Schema
 *
 * Drizzle ORM schema definitions for SQLite.
 *
 * Design constraints:
 * - Primary keys are monotonic integers; a re-indexed module version always
 *   receives a new id
 * - JSON columns stored as TEXT with JSON serialization
 * - Timestamps as ISO 8601 UTC strings
 * - Enum types as constrained TEXT columns
 * - Version-owned rows cascade on delete
 */

import { sqliteTable, text, integer, blob, index, uniqueIndex, primaryKey } from 'drizzle-orm/sqlite-core';
import { relations, sql } from 'drizzle-orm';

/**
 * namespace table
 *
 * Top-level grouping for modules, providers and GPG keys. Lookups are
 * case-insensitive, so uniqueness is enforced on the lower-cased name.
 */
export const namespaces = sqliteTable(
  'namespace',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    name: text('name').notNull(),
    display_name: text('display_name'),
    type: text('type', { enum: ['user', 'organisation'] })
      .notNull()
      .default('organisation'),
    created_at: text('created_at').notNull(), // ISO 8601
  },
  (table) => ({
    nameIdx: uniqueIndex('unique_namespace_name').on(sql`lower(${table.name})`),
  })
);

/**
 * module_provider table
 *
 * The (namespace, module, provider) triple. Git URL templates accept
 * {namespace}, {module}, {provider} placeholders; the tag format accepts
 * {version}, {major}, {minor}, {patch}.
 */
export const module_providers = sqliteTable(
  'module_provider',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    namespace_id: integer('namespace_id')
      .notNull()
      .references(() => namespaces.id, { onDelete: 'cascade' }),
    module_name: text('module_name').notNull(),
    provider_name: text('provider_name').notNull(),

    repo_base_url_template: text('repo_base_url_template'),
    repo_clone_url_template: text('repo_clone_url_template'),
    repo_browse_url_template: text('repo_browse_url_template'),
    git_tag_format: text('git_tag_format').notNull().default('{version}'),
    git_path: text('git_path'), // Module root inside the repository, nullable

    verified: integer('verified', { mode: 'boolean' }).notNull().default(false),
    created_at: text('created_at').notNull(),
  },
  (table) => ({
    tripleIdx: uniqueIndex('unique_module_provider').on(
      table.namespace_id,
      table.module_name,
      table.provider_name
    ),
  })
);

/**
 * module_version table
 *
 * One row per ingestion. At most one published row exists per
 * (module_provider_id, version), enforced by a partial unique index.
 */
export const module_versions = sqliteTable(
  'module_version',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    module_provider_id: integer('module_provider_id')
      .notNull()
      .references(() => module_providers.id, { onDelete: 'cascade' }),
    version: text('version').notNull(),
    beta: integer('beta', { mode: 'boolean' }).notNull().default(false),
    published: integer('published', { mode: 'boolean' }).notNull().default(false),
    published_at: text('published_at'), // ISO 8601, set on publish

    source_archive_ref: text('source_archive_ref'), // Storage key of source.tar.gz
    extraction_version: integer('extraction_version').notNull(),

    readme_text: text('readme_text'),
    description: text('description'),
    owner: text('owner'),
    repo_clone_url: text('repo_clone_url'),
    repo_snapshot_sha: text('repo_snapshot_sha'),
    variable_template: text('variable_template'), // JSON array
    terraform_docs: text('terraform_docs'), // JSON, terraform-docs output for the root
    graph_json: text('graph_json'), // JSON, {nodes, edges}
    tfsec: text('tfsec'), // JSON, security scan results
    terraform_version: text('terraform_version'),

    created_at: text('created_at').notNull(),
  },
  (table) => ({
    providerIdx: index('idx_module_version_provider').on(table.module_provider_id),
    publishedIdx: uniqueIndex('unique_published_module_version')
      .on(table.module_provider_id, table.version)
      .where(sql`${table.published} = 1`),
  })
);

/**
 * submodule table
 *
 * Submodules (under modules/) and examples (under examples/) of a version.
 */
export const submodules = sqliteTable(
  'submodule',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    module_version_id: integer('module_version_id')
      .notNull()
      .references(() => module_versions.id, { onDelete: 'cascade' }),
    type: text('type', { enum: ['submodule', 'example'] }).notNull(),
    path: text('path').notNull(), // Repo-relative POSIX path, no leading slash
    readme_text: text('readme_text'),
    terraform_docs: text('terraform_docs'),
    graph_json: text('graph_json'),
    tfsec: text('tfsec'),
    infracost: text('infracost'), // Examples only
  },
  (table) => ({
    pathIdx: uniqueIndex('unique_submodule_path').on(table.module_version_id, table.type, table.path),
  })
);

/**
 * module_version_file table
 *
 * Additional root files (LICENSE, CHANGELOG.md...). Large content lives in a
 * blob referenced by blob_ref and content is NULL.
 */
export const module_version_files = sqliteTable(
  'module_version_file',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    module_version_id: integer('module_version_id')
      .notNull()
      .references(() => module_versions.id, { onDelete: 'cascade' }),
    path: text('path').notNull(),
    content: blob('content', { mode: 'buffer' }),
    content_type: text('content_type').notNull(),
    blob_ref: text('blob_ref'),
    size: integer('size').notNull(),
  },
  (table) => ({
    pathIdx: uniqueIndex('unique_module_version_file').on(table.module_version_id, table.path),
  })
);

/**
 * example_file table
 */
export const example_files = sqliteTable(
  'example_file',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    submodule_id: integer('submodule_id')
      .notNull()
      .references(() => submodules.id, { onDelete: 'cascade' }),
    path: text('path').notNull(),
    content: blob('content', { mode: 'buffer' }),
    content_type: text('content_type').notNull(),
    blob_ref: text('blob_ref'),
    size: integer('size').notNull(),
  },
  (table) => ({
    pathIdx: uniqueIndex('unique_example_file').on(table.submodule_id, table.path),
  })
);

/**
 * analytics table
 *
 * Append-only download records. Never updated.
 */
export const analytics = sqliteTable(
  'analytics',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    module_version_id: integer('module_version_id')
      .notNull()
      .references(() => module_versions.id, { onDelete: 'cascade' }),
    analytics_token: text('analytics_token'),
    environment: text('environment'),
    terraform_version: text('terraform_version'),
    auth_method: text('auth_method'),
    timestamp: text('timestamp').notNull(),
  },
  (table) => ({
    versionIdx: index('idx_analytics_module_version').on(table.module_version_id),
    tokenIdx: index('idx_analytics_token').on(table.analytics_token),
  })
);

/**
 * session table
 *
 * Login sessions and short-lived OAuth state records. provider_source_auth
 * holds the JSON-serialised claims (or OAuth state payload).
 */
export const sessions = sqliteTable(
  'session',
  {
    id: text('id').primaryKey().notNull(), // 256-bit random, base64url
    kind: text('kind', { enum: ['user', 'oauth_state'] })
      .notNull()
      .default('user'),
    expiry: text('expiry').notNull(),
    provider_source_auth: text('provider_source_auth').notNull().default('{}'),
    created_at: text('created_at').notNull(),
    last_accessed_at: text('last_accessed_at').notNull(),
  },
  (table) => ({
    expiryIdx: index('idx_session_expiry').on(table.expiry),
    kindIdx: index('idx_session_kind').on(table.kind),
  })
);

/**
 * terraform_idp_authorization_code table
 *
 * Single-use codes issued to `terraform login`. The code itself is stored
 * as a SHA-256 hex digest.
 */
export const terraform_idp_authorization_codes = sqliteTable(
  'terraform_idp_authorization_code',
  {
    code_hash: text('code_hash').primaryKey().notNull(),
    client_id: text('client_id').notNull(),
    redirect_uri: text('redirect_uri').notNull(),
    code_challenge: text('code_challenge').notNull(),
    subject: text('subject').notNull(), // JSON {username, groups}
    expiry: text('expiry').notNull(),
    created_at: text('created_at').notNull(),
  },
  (table) => ({
    expiryIdx: index('idx_tf_idp_code_expiry').on(table.expiry),
  })
);

/**
 * terraform_idp_access_token table
 *
 * Tokens look like tfoidc_<id>_<secret>; only an argon2id hash of the
 * secret is stored.
 */
export const terraform_idp_access_tokens = sqliteTable(
  'terraform_idp_access_token',
  {
    id: text('id').primaryKey().notNull(),
    token_hash: text('token_hash').notNull(),
    subject: text('subject').notNull(), // JSON {username, groups}
    expiry: text('expiry').notNull(),
    created_at: text('created_at').notNull(),
  },
  (table) => ({
    expiryIdx: index('idx_tf_idp_token_expiry').on(table.expiry),
  })
);

/**
 * user_group table
 *
 * Group names match the group claims of SAML / OIDC users.
 */
export const user_groups = sqliteTable(
  'user_group',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    name: text('name').notNull().unique(),
    site_admin: integer('site_admin', { mode: 'boolean' }).notNull().default(false),
  }
);

export const PermissionTypes = ['READ', 'MODIFY', 'UPLOAD', 'PUBLISH', 'FULL'] as const;

/**
 * user_group_namespace_permission table
 */
export const user_group_namespace_permissions = sqliteTable(
  'user_group_namespace_permission',
  {
    user_group_id: integer('user_group_id')
      .notNull()
      .references(() => user_groups.id, { onDelete: 'cascade' }),
    namespace_id: integer('namespace_id')
      .notNull()
      .references(() => namespaces.id, { onDelete: 'cascade' }),
    permission_type: text('permission_type', { enum: PermissionTypes }).notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.user_group_id, table.namespace_id] }),
  })
);

/**
 * provider_category table
 */
export const provider_categories = sqliteTable('provider_category', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  slug: text('slug').notNull().unique(),
  user_selectable: integer('user_selectable', { mode: 'boolean' }).notNull().default(true),
});

/**
 * gpg_key table
 *
 * Public keys used to sign provider SHA256SUMS files.
 */
export const gpg_keys = sqliteTable(
  'gpg_key',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    namespace_id: integer('namespace_id')
      .notNull()
      .references(() => namespaces.id, { onDelete: 'cascade' }),
    key_id: text('key_id').notNull(), // Upper-case hex key id
    ascii_armor: text('ascii_armor').notNull(),
    trust_signature: text('trust_signature').notNull().default(''),
    source: text('source').notNull().default(''),
    source_url: text('source_url'),
    created_at: text('created_at').notNull(),
    updated_at: text('updated_at').notNull(),
  },
  (table) => ({
    keyIdx: uniqueIndex('unique_gpg_key').on(table.namespace_id, table.key_id),
  })
);

/**
 * provider table
 */
export const providers = sqliteTable(
  'provider',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    namespace_id: integer('namespace_id')
      .notNull()
      .references(() => namespaces.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    description: text('description'),
    tier: text('tier', { enum: ['official', 'partner', 'community'] })
      .notNull()
      .default('community'),
    category_id: integer('category_id').references(() => provider_categories.id, {
      onDelete: 'set null',
    }),
    source_url: text('source_url'),
    created_at: text('created_at').notNull(),
  },
  (table) => ({
    nameIdx: uniqueIndex('unique_provider').on(table.namespace_id, table.name),
  })
);

/**
 * provider_version table
 */
export const provider_versions = sqliteTable(
  'provider_version',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    provider_id: integer('provider_id')
      .notNull()
      .references(() => providers.id, { onDelete: 'cascade' }),
    version: text('version').notNull(),
    beta: integer('beta', { mode: 'boolean' }).notNull().default(false),
    gpg_key_id: integer('gpg_key_id')
      .notNull()
      .references(() => gpg_keys.id),
    protocol_versions: text('protocol_versions').notNull().default('["5.0"]'), // JSON array
    shasums_blob_ref: text('shasums_blob_ref').notNull(),
    shasums_signature_blob_ref: text('shasums_signature_blob_ref').notNull(),
    published_at: text('published_at').notNull(),
  },
  (table) => ({
    versionIdx: uniqueIndex('unique_provider_version').on(table.provider_id, table.version),
  })
);

/**
 * provider_version_binary table
 */
export const provider_version_binaries = sqliteTable(
  'provider_version_binary',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    provider_version_id: integer('provider_version_id')
      .notNull()
      .references(() => provider_versions.id, { onDelete: 'cascade' }),
    os: text('os').notNull(),
    arch: text('arch').notNull(),
    filename: text('filename').notNull(),
    sha256: text('sha256').notNull(), // Hex digest
    blob_ref: text('blob_ref').notNull(),
  },
  (table) => ({
    platformIdx: uniqueIndex('unique_provider_binary').on(
      table.provider_version_id,
      table.os,
      table.arch
    ),
  })
);

/**
 * audit_history table
 */
export const audit_history = sqliteTable(
  'audit_history',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    timestamp: text('timestamp').notNull(),
    username: text('username'),
    action: text('action').notNull(),
    object_type: text('object_type').notNull(),
    object_id: text('object_id').notNull(),
    old_value: text('old_value'),
    new_value: text('new_value'),
  },
  (table) => ({
    timestampIdx: index('idx_audit_history_timestamp').on(table.timestamp),
  })
);

/**
 * Relations (for Drizzle relational queries)
 */
export const namespacesRelations = relations(namespaces, ({ many }) => ({
  module_providers: many(module_providers),
  providers: many(providers),
  gpg_keys: many(gpg_keys),
}));

export const moduleProvidersRelations = relations(module_providers, ({ one, many }) => ({
  namespace: one(namespaces, { fields: [module_providers.namespace_id], references: [namespaces.id] }),
  versions: many(module_versions),
}));

export const moduleVersionsRelations = relations(module_versions, ({ one, many }) => ({
  module_provider: one(module_providers, {
    fields: [module_versions.module_provider_id],
    references: [module_providers.id],
  }),
  submodules: many(submodules),
  files: many(module_version_files),
}));

export const submodulesRelations = relations(submodules, ({ one, many }) => ({
  module_version: one(module_versions, {
    fields: [submodules.module_version_id],
    references: [module_versions.id],
  }),
  files: many(example_files),
}));

export const providersRelations = relations(providers, ({ one, many }) => ({
  namespace: one(namespaces, { fields: [providers.namespace_id], references: [namespaces.id] }),
  category: one(provider_categories, {
    fields: [providers.category_id],
    references: [provider_categories.id],
  }),
  versions: many(provider_versions),
}));

export const providerVersionsRelations = relations(provider_versions, ({ one, many }) => ({
  provider: one(providers, { fields: [provider_versions.provider_id], references: [providers.id] }),
  gpg_key: one(gpg_keys, { fields: [provider_versions.gpg_key_id], references: [gpg_keys.id] }),
  binaries: many(provider_version_binaries),
}));

/**
 * TypeScript types derived from schema (for application code)
 */
export type Namespace = typeof namespaces.$inferSelect;
export type NewNamespace = typeof namespaces.$inferInsert;
export type ModuleProvider = typeof module_providers.$inferSelect;
export type NewModuleProvider = typeof module_providers.$inferInsert;
export type ModuleVersion = typeof module_versions.$inferSelect;
export type NewModuleVersion = typeof module_versions.$inferInsert;
export type Submodule = typeof submodules.$inferSelect;
export type NewSubmodule = typeof submodules.$inferInsert;
export type ModuleVersionFile = typeof module_version_files.$inferSelect;
export type NewModuleVersionFile = typeof module_version_files.$inferInsert;
export type ExampleFile = typeof example_files.$inferSelect;
export type NewExampleFile = typeof example_files.$inferInsert;
export type AnalyticsRow = typeof analytics.$inferSelect;
export type NewAnalyticsRow = typeof analytics.$inferInsert;
export type SessionRow = typeof sessions.$inferSelect;
export type NewSessionRow = typeof sessions.$inferInsert;
export type TerraformIdpAuthorizationCode = typeof terraform_idp_authorization_codes.$inferSelect;
export type TerraformIdpAccessToken = typeof terraform_idp_access_tokens.$inferSelect;
export type UserGroup = typeof user_groups.$inferSelect;
export type UserGroupNamespacePermission = typeof user_group_namespace_permissions.$inferSelect;
export type ProviderCategory = typeof provider_categories.$inferSelect;
export type GpgKey = typeof gpg_keys.$inferSelect;
export type NewGpgKey = typeof gpg_keys.$inferInsert;
export type Provider = typeof providers.$inferSelect;
export type ProviderVersion = typeof provider_versions.$inferSelect;
export type ProviderVersionBinary = typeof provider_version_binaries.$inferSelect;
export type AuditHistoryRow = typeof audit_history.$inferSelect;
export type NewAuditHistoryRow = typeof audit_history.$inferInsert;
export type PermissionType = (typeof PermissionTypes)[number];
