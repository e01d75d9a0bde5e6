/**
 * Module Registry Service
 *
 * Read side of the Terraform module protocol: listing, detail, versions and
 * download resolution. Only published rows are visible.
 */

import {
  NotFoundError,
  UnauthorizedError,
  countDownloadsByModuleProvider,
  getModuleProvider,
  getPublishedModuleVersion,
  latestStableVersion,
  listModuleProviders,
  listModuleVersions,
  listSearchCandidates,
  listSubmodules,
  parseConstraint,
  renderGitTag,
  parseModuleVersion,
  resolveConstraint,
  logger,
  type AuthContext,
  type DatabaseClient,
  type DomainConfig,
  type InfraConfig,
  type ModuleProvider,
  type ModuleVersion,
  type Namespace,
  type SearchCandidateFilters,
  type SearchCandidateRow,
  type UrlSigner,
} from '@terrashelf/core';
import { splitAnalyticsNamespace } from '@terrashelf/authn-terraform';
import type {
  ModuleDetail,
  ModuleListResponse,
  ModuleSummary,
  ModuleVersionsResponse,
  PaginationMetaWire,
} from '@terrashelf/protocol';
import { buildModuleSpecs } from './module-specs.js';
import type { AnalyticsRecorder } from './analytics-recorder.js';
import { renderRepositoryUrl } from '../ingestion/git.js';

export interface ModuleAddress {
  namespace: string;
  module: string;
  provider: string;
}

export interface DownloadRequest extends ModuleAddress {
  version: string;
  auth: AuthContext;
  /** `X-Terraform-Version` header */
  terraformVersion: string | null;
}

export interface ModuleRegistryDependencies {
  db: DatabaseClient;
  domain: DomainConfig;
  infra: InfraConfig;
  signer: UrlSigner;
  analytics: AnalyticsRecorder;
}

export interface ListOptions {
  offset: number;
  limit: number;
  namespaces?: readonly string[];
  providers?: readonly string[];
  verified?: boolean;
}

/**
 * Offset pagination block of listing responses
 */
export function paginationMeta(offset: number, limit: number, total: number): PaginationMetaWire {
  const meta: PaginationMetaWire = { limit, current_offset: offset };
  if (offset + limit < total) meta.next_offset = offset + limit;
  if (offset > 0) meta.prev_offset = Math.max(0, offset - limit);
  return meta;
}

/**
 * Keep the highest version row of each module provider
 */
export function latestPerModuleProvider(rows: readonly SearchCandidateRow[]): SearchCandidateRow[] {
  const latest = new Map<number, SearchCandidateRow>();
  for (const row of rows) {
    const current = latest.get(row.moduleProvider.id);
    if (!current || latestStableVersion([current.moduleVersion.version, row.moduleVersion.version]) === row.moduleVersion.version) {
      latest.set(row.moduleProvider.id, row);
    }
  }
  return [...latest.values()];
}

export function moduleVersionPath(namespace: string, module: string, provider: string, version: string): string {
  return `${namespace}/${module}/${provider}/${version}`;
}

/**
 * Path of the canonical archive, signed for `X-Terraform-Get`
 */
export function moduleArchivePath(namespace: string, module: string, provider: string, version: string): string {
  return `/v1/terrareg/modules/${moduleVersionPath(namespace, module, provider, version)}/source.tar.gz`;
}

export class ModuleRegistryService {
  constructor(private readonly deps: ModuleRegistryDependencies) {}

  isTrusted(namespace: string): boolean {
    const name = namespace.toLowerCase();
    return this.deps.domain.trustedNamespaces.some(trusted => trusted.toLowerCase() === name);
  }

  isVerified(namespace: Namespace, moduleProvider: ModuleProvider): boolean {
    const name = namespace.name.toLowerCase();
    return (
      moduleProvider.verified ||
      this.deps.domain.verifiedModuleNamespaces.some(verified => verified.toLowerCase() === name)
    );
  }

  /**
   * Source URL shown to users: the repository base URL when known
   */
  private sourceUrl(namespace: Namespace, moduleProvider: ModuleProvider, moduleVersion: ModuleVersion): string {
    const template = moduleProvider.repo_base_url_template;
    if (template) {
      return renderRepositoryUrl(template, {
        namespace: namespace.name,
        module: moduleProvider.module_name,
        provider: moduleProvider.provider_name,
      });
    }
    return moduleVersion.repo_clone_url ?? '';
  }

  summarize(row: SearchCandidateRow, downloads: number): ModuleSummary {
    const { namespace, moduleProvider, moduleVersion } = row;
    return {
      id: moduleVersionPath(namespace.name, moduleProvider.module_name, moduleProvider.provider_name, moduleVersion.version),
      owner: moduleVersion.owner ?? '',
      namespace: namespace.name,
      name: moduleProvider.module_name,
      version: moduleVersion.version,
      provider: moduleProvider.provider_name,
      description: moduleVersion.description ?? '',
      source: this.sourceUrl(namespace, moduleProvider, moduleVersion),
      published_at: moduleVersion.published_at ?? moduleVersion.created_at,
      downloads,
      verified: this.isVerified(namespace, moduleProvider),
      trusted: this.isTrusted(namespace.name),
    };
  }

  /**
   * Summaries with download counts, in the given order
   */
  summarizeAll(rows: readonly SearchCandidateRow[]): ModuleSummary[] {
    const downloads = countDownloadsByModuleProvider(
      this.deps.db,
      rows.map(row => row.moduleProvider.id)
    );
    return rows.map(row => this.summarize(row, downloads.get(row.moduleProvider.id) ?? 0));
  }

  /**
   * Latest version of every module provider, ordered by address
   */
  listModules(options: ListOptions): ModuleListResponse {
    const filters: SearchCandidateFilters = {};
    if (options.namespaces && options.namespaces.length > 0) filters.namespaces = options.namespaces;
    if (options.providers && options.providers.length > 0) filters.providers = options.providers;

    const wanted = options.verified;
    const rows = latestPerModuleProvider(listSearchCandidates(this.deps.db, filters))
      .filter(row => wanted === undefined || this.isVerified(row.namespace, row.moduleProvider) === wanted)
      .sort(
        (a, b) =>
          compareText(a.namespace.name, b.namespace.name) ||
          compareText(a.moduleProvider.module_name, b.moduleProvider.module_name) ||
          compareText(a.moduleProvider.provider_name, b.moduleProvider.provider_name)
      );
    const page = rows.slice(options.offset, options.offset + options.limit);
    return {
      meta: paginationMeta(options.offset, options.limit, rows.length),
      modules: this.summarizeAll(page),
    };
  }

  /**
   * Latest version of each provider of a module
   */
  listModuleProviders(namespaceSegment: string, module: string, offset: number, limit: number): ModuleListResponse {
    const { namespace } = splitAnalyticsNamespace(namespaceSegment);
    const rows = latestPerModuleProvider(listSearchCandidates(this.deps.db, { namespaces: [namespace] })).filter(
      row => row.moduleProvider.module_name === module
    );
    if (rows.length === 0) {
      throw new NotFoundError(`Module not found: ${namespace}/${module}`);
    }
    rows.sort((a, b) => compareText(a.moduleProvider.provider_name, b.moduleProvider.provider_name));
    return {
      meta: paginationMeta(offset, limit, rows.length),
      modules: this.summarizeAll(rows.slice(offset, offset + limit)),
    };
  }

  private requireModuleProvider(address: ModuleAddress): { namespace: Namespace; moduleProvider: ModuleProvider } {
    const found = getModuleProvider(this.deps.db, address.namespace, address.module, address.provider);
    if (!found) {
      throw new NotFoundError(`Module provider not found: ${address.namespace}/${address.module}/${address.provider}`);
    }
    return found;
  }

  /**
   * Published version strings, stable and pre-release
   */
  private publishedVersions(moduleProviderId: number): ModuleVersion[] {
    return listModuleVersions(this.deps.db, moduleProviderId, { publishedOnly: true });
  }

  /**
   * Pick the version to serve: the highest match of a constraint, or the
   * latest stable version when none is given
   */
  resolveVersion(address: ModuleAddress, constraint: string | null): ModuleVersion {
    const { moduleProvider } = this.requireModuleProvider(address);
    const rows = this.publishedVersions(moduleProvider.id);
    const versions = rows.map(row => row.version);
    const chosen =
      constraint === null || constraint.trim() === ''
        ? latestStableVersion(versions)
        : resolveConstraint(versions, parseConstraint(constraint));
    const row = rows.find(candidate => candidate.version === chosen);
    if (!row) {
      throw new NotFoundError('No version matches the constraint');
    }
    return row;
  }

  /**
   * Published non-beta versions with their provider dependencies
   */
  getVersions(address: ModuleAddress): ModuleVersionsResponse {
    const { namespace, moduleProvider } = this.requireModuleProvider(address);
    const rows = this.publishedVersions(moduleProvider.id).filter(row => !row.beta);

    return {
      modules: [
        {
          source: `${namespace.name}/${moduleProvider.module_name}/${moduleProvider.provider_name}`,
          versions: rows.map(row => {
            const rootSpecs = buildModuleSpecs({ path: '', readme_text: null, terraform_docs: row.terraform_docs });
            return {
              version: row.version,
              root: { providers: rootSpecs.provider_dependencies, dependencies: rootSpecs.dependencies },
              submodules: listSubmodules(this.deps.db, row.id, 'submodule').map(submodule => {
                const specs = buildModuleSpecs(submodule);
                return {
                  path: submodule.path,
                  providers: specs.provider_dependencies,
                  dependencies: specs.dependencies,
                };
              }),
            };
          }),
        },
      ],
    };
  }

  /**
   * Detail of a specific version, or of the latest stable one
   */
  getModuleDetail(address: ModuleAddress, version: string | null): ModuleDetail {
    const { namespace, moduleProvider } = this.requireModuleProvider(address);
    const moduleVersion =
      version === null
        ? this.resolveVersion(address, null)
        : getPublishedModuleVersion(this.deps.db, moduleProvider.id, parseModuleVersion(version).version);
    if (!moduleVersion) {
      throw new NotFoundError(`Module version not found: ${version ?? 'latest'}`);
    }

    const row: SearchCandidateRow = { namespace, moduleProvider, moduleVersion };
    const [summary] = this.summarizeAll([row]);
    if (!summary) {
      throw new NotFoundError('Module version not found');
    }

    const providers = listModuleProviders(this.deps.db, {
      namespaceId: namespace.id,
      moduleName: moduleProvider.module_name,
    }).map(entry => entry.moduleProvider.provider_name);

    return {
      ...summary,
      root: buildModuleSpecs({
        path: '',
        readme_text: moduleVersion.readme_text,
        terraform_docs: moduleVersion.terraform_docs,
      }),
      submodules: listSubmodules(this.deps.db, moduleVersion.id, 'submodule').map(buildModuleSpecs),
      examples: listSubmodules(this.deps.db, moduleVersion.id, 'example').map(buildModuleSpecs),
      providers,
      versions: this.publishedVersions(moduleProvider.id)
        .filter(candidate => !candidate.beta)
        .map(candidate => candidate.version),
    };
  }

  /**
   * Resolve a download to its `X-Terraform-Get` location and record it
   *
   * @param namespaceSegment namespace path segment, possibly `<token>__<namespace>`
   */
  async resolveDownload(namespaceSegment: string, request: Omit<DownloadRequest, 'namespace'>): Promise<string> {
    const { domain, infra } = this.deps;
    const { token: pathToken, namespace } = splitAnalyticsNamespace(namespaceSegment);
    const address = { namespace, module: request.module, provider: request.provider };
    const { namespace: namespaceRow, moduleProvider } = this.requireModuleProvider(address);

    const moduleVersion = getPublishedModuleVersion(this.deps.db, moduleProvider.id, request.version);
    if (!moduleVersion) {
      throw new NotFoundError(`Module version not found: ${request.version}`);
    }

    const claims = request.auth.claims;
    const internal = claims.type === 'terraform_internal';
    let analyticsToken = pathToken;
    let environment: string | null = null;
    if (claims.type === 'terraform_analytics') {
      analyticsToken = analyticsToken ?? claims.analyticsToken;
      environment = claims.environment;
    }
    // The documented example token identifies nobody
    if (analyticsToken === domain.analytics.exampleToken) {
      analyticsToken = null;
    }
    if (analyticsToken === domain.analytics.internalExtractionToken) {
      analyticsToken = null;
    }

    if (analyticsToken === null && !internal && !domain.allowUnidentifiedDownloads) {
      throw new UnauthorizedError(
        `An ${domain.analytics.tokenPhrase} must be provided. Please update the module source to include ` +
          `an ${domain.analytics.tokenPhrase}, for example: ` +
          `${new URL(infra.publicUrl).host}/${domain.analytics.exampleToken}__${namespaceRow.name}/` +
          `${moduleProvider.module_name}/${moduleProvider.provider_name}`
      );
    }

    if (!internal && pathToken !== domain.analytics.internalExtractionToken) {
      await this.deps.analytics.record({
        moduleVersionId: moduleVersion.id,
        analyticsToken,
        environment,
        terraformVersion: request.terraformVersion,
        authMethod: request.auth.providerType,
        timestamp: new Date().toISOString(),
      });
    }

    return this.downloadLocation(namespaceRow, moduleProvider, moduleVersion);
  }

  /**
   * Storage key of the archive behind a signed source path
   */
  archiveRef(address: ModuleAddress, version: string): string {
    const { moduleProvider } = this.requireModuleProvider(address);
    const moduleVersion = getPublishedModuleVersion(this.deps.db, moduleProvider.id, version);
    if (!moduleVersion?.source_archive_ref) {
      throw new NotFoundError(`Module archive not found: ${version}`);
    }
    return moduleVersion.source_archive_ref;
  }

  private downloadLocation(namespace: Namespace, moduleProvider: ModuleProvider, moduleVersion: ModuleVersion): string {
    const { domain, infra } = this.deps;

    if (domain.allowModuleHosting === 'disallow' && moduleVersion.repo_clone_url) {
      const tag = renderGitTag(moduleProvider.git_tag_format, parseModuleVersion(moduleVersion.version));
      const subdirectory = moduleProvider.git_path ? `//${moduleProvider.git_path.replace(/^\/+/, '')}` : '';
      return `git::${moduleVersion.repo_clone_url}${subdirectory}?ref=${tag}`;
    }
    if (!moduleVersion.source_archive_ref) {
      logger.warn(`[registry] Module version ${moduleVersion.id} has no stored archive`);
      throw new NotFoundError('Module version has no archive');
    }

    const archivePath = moduleArchivePath(
      namespace.name,
      moduleProvider.module_name,
      moduleProvider.provider_name,
      moduleVersion.version
    );
    return `${infra.publicUrl}${this.deps.signer.signPath(archivePath)}`;
  }
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
