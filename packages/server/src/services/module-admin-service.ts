/**
 * Module Admin Service
 *
 * Write operations on namespaces, module providers and module versions
 * other than ingestion. Every change leaves an audit history row.
 */

import {
  ConflictError,
  InvalidInputError,
  NotFoundError,
  StorageLayout,
  createModuleProvider,
  createNamespace,
  deleteModuleProvider,
  deleteModuleVersion,
  findOrCreateNamespace,
  getLatestModuleVersionRow,
  getModuleProvider,
  getNamespaceByName,
  insertAuditHistory,
  listModuleVersions,
  logger,
  parseModuleVersion,
  publishModuleVersion,
  requireNamespacePermission,
  requirePublishPermission,
  requireSiteAdmin,
  safeJoinPaths,
  updateModuleProviderSettings,
  validateGitTagFormat,
  validateModuleAddress,
  validateNamespaceName,
  type AuthContext,
  type DatabaseClient,
  type DomainConfig,
  type ModuleProvider,
  type ModuleProviderSettings,
  type ModuleVersion,
  type Namespace,
  type StorageBackend,
} from '@terrashelf/core';
import type { ModuleAddress } from './module-registry-service.js';

export interface ModuleAdminDependencies {
  db: DatabaseClient;
  storage: StorageBackend;
  domain: DomainConfig;
}

function actorName(actor: AuthContext): string {
  return actor.username ?? actor.providerType;
}

function addressId(address: ModuleAddress, version?: string): string {
  const base = `${address.namespace}/${address.module}/${address.provider}`;
  return version === undefined ? base : `${base}/${version}`;
}

/**
 * Trim `git_path` and refuse one that climbs out of the repository
 */
export function normalizeSettings(settings: ModuleProviderSettings): ModuleProviderSettings {
  const normalized: ModuleProviderSettings = { ...settings };
  if (normalized.git_path !== undefined && normalized.git_path !== null) {
    const trimmed = normalized.git_path.replace(/^\/+|\/+$/g, '');
    if (trimmed.split('/').some(segment => segment === '..')) {
      throw new InvalidInputError('git_path may not leave the repository');
    }
    normalized.git_path = trimmed === '' ? null : trimmed;
  }
  return normalized;
}

export class ModuleAdminService {
  constructor(private readonly deps: ModuleAdminDependencies) {}

  createNamespace(name: string, displayName: string | null, actor: AuthContext): Namespace {
    requireSiteAdmin(actor);
    validateNamespaceName(name);
    if (getNamespaceByName(this.deps.db, name)) {
      throw new ConflictError(`Namespace already exists: ${name}`);
    }

    return this.deps.db.transaction(tx => {
      const namespace = createNamespace(tx, { name, display_name: displayName });
      insertAuditHistory(tx, {
        username: actorName(actor),
        action: 'NAMESPACE_CREATE',
        object_type: 'namespace',
        object_id: namespace.name,
      });
      return namespace;
    });
  }

  createModuleProvider(address: ModuleAddress, requested: ModuleProviderSettings, actor: AuthContext): ModuleProvider {
    const settings = normalizeSettings(requested);
    validateModuleAddress(address.namespace, address.module, address.provider);
    requireNamespacePermission(actor, 'MODIFY', address.namespace);
    if (settings.git_tag_format !== undefined) validateGitTagFormat(settings.git_tag_format);

    if (!getNamespaceByName(this.deps.db, address.namespace) && !this.deps.domain.autoCreateNamespace) {
      throw new NotFoundError(`Namespace does not exist: ${address.namespace}`);
    }
    if (getModuleProvider(this.deps.db, address.namespace, address.module, address.provider)) {
      throw new ConflictError(`Module provider already exists: ${addressId(address)}`);
    }

    return this.deps.db.transaction(tx => {
      const { namespace, created } = findOrCreateNamespace(tx, address.namespace);
      if (created) {
        insertAuditHistory(tx, {
          username: actorName(actor),
          action: 'NAMESPACE_CREATE',
          object_type: 'namespace',
          object_id: namespace.name,
        });
      }
      const moduleProvider = createModuleProvider(tx, namespace.id, address.module, address.provider, settings);
      insertAuditHistory(tx, {
        username: actorName(actor),
        action: 'MODULE_PROVIDER_CREATE',
        object_type: 'module_provider',
        object_id: addressId(address),
        new_value: JSON.stringify(settings),
      });
      return moduleProvider;
    });
  }

  private requireModuleProvider(address: ModuleAddress): { namespace: Namespace; moduleProvider: ModuleProvider } {
    const found = getModuleProvider(this.deps.db, address.namespace, address.module, address.provider);
    if (!found) {
      throw new NotFoundError(`Module provider not found: ${addressId(address)}`);
    }
    return found;
  }

  updateSettings(address: ModuleAddress, requested: ModuleProviderSettings, actor: AuthContext): ModuleProvider {
    requireNamespacePermission(actor, 'MODIFY', address.namespace);
    const settings = normalizeSettings(requested);
    const { moduleProvider } = this.requireModuleProvider(address);
    if (settings.git_tag_format !== undefined) validateGitTagFormat(settings.git_tag_format);
    // The verified flag is a site-wide decision
    if (settings.verified !== undefined && settings.verified !== moduleProvider.verified) {
      requireSiteAdmin(actor);
    }

    return this.deps.db.transaction(tx => {
      const updated = updateModuleProviderSettings(tx, moduleProvider.id, settings);
      if (!updated) {
        throw new NotFoundError(`Module provider not found: ${addressId(address)}`);
      }
      insertAuditHistory(tx, {
        username: actorName(actor),
        action: 'MODULE_PROVIDER_UPDATE',
        object_type: 'module_provider',
        object_id: addressId(address),
        old_value: JSON.stringify({
          repo_base_url_template: moduleProvider.repo_base_url_template,
          repo_clone_url_template: moduleProvider.repo_clone_url_template,
          repo_browse_url_template: moduleProvider.repo_browse_url_template,
          git_tag_format: moduleProvider.git_tag_format,
          git_path: moduleProvider.git_path,
          verified: moduleProvider.verified,
        }),
        new_value: JSON.stringify(settings),
      });
      return updated;
    });
  }

  async deleteModuleProvider(address: ModuleAddress, actor: AuthContext): Promise<void> {
    requireNamespacePermission(actor, 'MODIFY', address.namespace);
    const { namespace, moduleProvider } = this.requireModuleProvider(address);

    this.deps.db.transaction(tx => {
      deleteModuleProvider(tx, moduleProvider.id);
      insertAuditHistory(tx, {
        username: actorName(actor),
        action: 'MODULE_PROVIDER_DELETE',
        object_type: 'module_provider',
        object_id: addressId(address),
      });
    });

    const prefix = safeJoinPaths('modules', namespace.name, moduleProvider.module_name, moduleProvider.provider_name);
    await this.deps.storage.deletePrefix(prefix).catch(err => {
      logger.warn({ err }, `[module-admin] Could not remove stored files of ${addressId(address)}`);
    });
  }

  /**
   * Publish the most recently ingested row of a version
   */
  publishVersion(address: ModuleAddress, version: string, actor: AuthContext): ModuleVersion {
    requirePublishPermission(actor, address.namespace);
    const parsed = parseModuleVersion(version);
    const { moduleProvider } = this.requireModuleProvider(address);

    const row = getLatestModuleVersionRow(this.deps.db, moduleProvider.id, parsed.version);
    if (!row) {
      throw new NotFoundError(`Module version not found: ${addressId(address, parsed.version)}`);
    }

    return this.deps.db.transaction(tx => {
      const published = publishModuleVersion(tx, row.id);
      if (!published) {
        throw new NotFoundError(`Module version not found: ${addressId(address, parsed.version)}`);
      }
      insertAuditHistory(tx, {
        username: actorName(actor),
        action: 'MODULE_VERSION_PUBLISH',
        object_type: 'module_version',
        object_id: addressId(address, parsed.version),
        new_value: String(row.id),
      });
      return published;
    });
  }

  /**
   * Remove every row of a version and its stored files
   */
  async deleteVersion(address: ModuleAddress, version: string, actor: AuthContext): Promise<void> {
    requireNamespacePermission(actor, 'MODIFY', address.namespace);
    const parsed = parseModuleVersion(version);
    const { namespace, moduleProvider } = this.requireModuleProvider(address);

    const rows = listModuleVersions(this.deps.db, moduleProvider.id).filter(row => row.version === parsed.version);
    if (rows.length === 0) {
      throw new NotFoundError(`Module version not found: ${addressId(address, parsed.version)}`);
    }

    this.deps.db.transaction(tx => {
      for (const row of rows) {
        deleteModuleVersion(tx, row.id);
      }
      insertAuditHistory(tx, {
        username: actorName(actor),
        action: 'MODULE_VERSION_DELETE',
        object_type: 'module_version',
        object_id: addressId(address, parsed.version),
        old_value: rows.map(row => row.id).join(','),
      });
    });

    const prefix = StorageLayout.moduleVersionPrefix(
      namespace.name,
      moduleProvider.module_name,
      moduleProvider.provider_name,
      parsed.version
    );
    await this.deps.storage.deletePrefix(prefix).catch(err => {
      logger.warn({ err }, `[module-admin] Could not remove stored files of ${addressId(address, parsed.version)}`);
    });
  }
}
