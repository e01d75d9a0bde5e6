/**
 * Module Ingestion Pipeline
 *
 * Turns an uploaded archive or a git tag into a module version:
 *
 * 1. validate the address, version and hosting policy
 * 2. materialize the source tree (staged upload or shallow clone)
 * 3. apply .terraformignore and catalog submodules and examples
 * 4. run the analyzers (failures degrade to warnings)
 * 5. build source.tar.gz (an uploaded tar.gz is kept as is) and source.zip
 * 6. commit every row change in one transaction
 * 7. write archives and file blobs, undoing the commit if that fails
 *
 * A re-ingested version always gets a new row; the previously published row
 * is unpublished, never updated in place.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  ConflictError,
  ExternalToolError,
  InvalidInputError,
  NotFoundError,
  StorageLayout,
  createTarGz,
  createZip,
  deleteModuleVersion,
  detectArchiveFormat,
  findOrCreateModuleProvider,
  findOrCreateNamespace,
  getModuleProvider,
  getNamespaceByName,
  getPublishedModuleVersion,
  insertAuditHistory,
  insertExampleFile,
  insertModuleVersion,
  insertModuleVersionFile,
  insertSubmodule,
  logger,
  parseModuleVersion,
  publishModuleVersion,
  readArchive,
  renderGitTag,
  requireUploadPermission,
  safeJoinPaths,
  setModuleVersionPublished,
  validateModuleAddress,
  type ArchiveEntry,
  type AuthContext,
  type DatabaseClient,
  type DomainConfig,
  type InfraConfig,
  type ModuleProvider,
  type ModuleVersion,
  type ParsedVersion,
  type StorageBackend,
} from '@terrashelf/core';
import type { SystemCommandService } from './command-service.js';
import { cloneRepository, readDirectoryTree, renderRepositoryUrl } from './git.js';
import {
  applyTerraformIgnore,
  catalogTree,
  descriptionFromReadme,
  exampleFiles,
  readMetadata,
  rerootTree,
  type ModuleDirectory,
} from './tree.js';
import {
  runInfracost,
  runTerraformDocs,
  runTerraformGraph,
  runTerraformVersion,
  runTfsec,
  terraformTokenVariable,
  valueOrWarn,
  type AnalyzerContext,
  type TerraformRunOptions,
} from './analyzers.js';

/**
 * Bumped whenever the stored analysis changes shape
 */
export const EXTRACTION_VERSION = 1;

/** Larger files are stored as blobs instead of inline */
export const MAX_INLINE_FILE_BYTES = 256 * 1024;

export type IngestionSource =
  | { kind: 'archive'; data: Buffer }
  | { kind: 'git'; gitTag?: string };

export interface IngestionRequest {
  namespace: string;
  module: string;
  provider: string;
  /** Required for archives; for git imports it may be derived from `gitTag` */
  version?: string;
  source: IngestionSource;
  actor: AuthContext;
}

export interface IngestionOutcome {
  moduleVersion: ModuleVersion;
  published: boolean;
  beta: boolean;
  warnings: string[];
}

export interface ModuleIngestionDependencies {
  db: DatabaseClient;
  storage: StorageBackend;
  commands: SystemCommandService;
  domain: DomainConfig;
  infra: InfraConfig;
}

interface DirectoryAnalysis {
  directory: ModuleDirectory;
  terraformDocs: string | null;
  graph: string | null;
  tfsec: string | null;
  infracost: string | null;
}

interface SourceTree {
  files: ArchiveEntry[];
  /** Uploaded tar.gz, served unchanged when no file was filtered out */
  uploadedTarGz: Buffer | null;
  cloneUrl: string | null;
  snapshotSha: string | null;
}

interface PendingBlob {
  key: string;
  data: Buffer;
}

const CONTENT_TYPES: Record<string, string> = {
  '.md': 'text/markdown',
  '.json': 'application/json',
  '.tf': 'text/plain',
  '.tfvars': 'text/plain',
};

function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[path.posix.extname(filePath).toLowerCase()] ?? 'text/plain';
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Recover a version from a git tag using the module provider's tag format
 */
export function versionFromGitTag(format: string, tag: string): string | null {
  if (!format.includes('{version}')) return null;
  const pattern = escapeRegExp(format).replace(escapeRegExp('{version}'), '(.+)');
  const match = new RegExp(`^${pattern}$`).exec(tag);
  return match?.[1] ?? null;
}

function jsonOrNull(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}

export class ModuleIngestionService {
  constructor(private readonly deps: ModuleIngestionDependencies) {}

  async ingest(request: IngestionRequest): Promise<IngestionOutcome> {
    const { domain, infra } = this.deps;
    const { namespace, module, provider, source, actor } = request;

    validateModuleAddress(namespace, module, provider);
    requireUploadPermission(actor, namespace);

    if (source.kind === 'archive' && domain.allowModuleHosting === 'disallow') {
      throw new InvalidInputError('Module upload is disabled by ALLOW_MODULE_HOSTING');
    }

    const existing = getModuleProvider(this.deps.db, namespace, module, provider);
    if (!existing) {
      if (!getNamespaceByName(this.deps.db, namespace) && !domain.autoCreateNamespace) {
        throw new NotFoundError(`Namespace does not exist: ${namespace}`);
      }
      if (!domain.autoCreateModuleProvider) {
        throw new NotFoundError(`Module provider does not exist: ${namespace}/${module}/${provider}`);
      }
      if (source.kind === 'git') {
        throw new NotFoundError(`Module provider does not exist: ${namespace}/${module}/${provider}`);
      }
    }

    const version = this.resolveVersion(request, existing?.moduleProvider ?? null);
    if (existing && !domain.allowModuleVersionReindex) {
      if (getPublishedModuleVersion(this.deps.db, existing.moduleProvider.id, version.version)) {
        throw new ConflictError(`Module version ${version.version} already exists and re-indexing is disabled`);
      }
    }

    // Storage keys use the stored spelling of the namespace
    const storageNamespace = existing?.namespace.name ?? getNamespaceByName(this.deps.db, namespace)?.name ?? namespace;
    const warnings: string[] = [];
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'terrashelf-ingest-'));
    const deadline = AbortSignal.timeout(infra.timeouts.moduleIndexingSeconds * 1000);
    let stagedUpload: string | null = null;

    logger.info(`[ingest] Indexing ${namespace}/${module}/${provider} ${version.version} from ${source.kind}`);

    try {
      let tree: SourceTree;
      if (source.kind === 'archive') {
        stagedUpload = StorageLayout.upload(uuidv4());
        tree = await this.readUploadedArchive(source.data, stagedUpload);
      } else {
        tree = await this.cloneSource(existing?.moduleProvider ?? null, request, version, workDir, deadline);
      }

      const gitPath = existing?.moduleProvider.git_path ?? null;
      const files = applyTerraformIgnore(rerootTree(tree.files, gitPath)).filter(file => file.type === 'file');
      if (files.length === 0) {
        throw new InvalidInputError('Module source contains no files');
      }

      const moduleDir = path.join(workDir, 'module');
      await this.writeTree(moduleDir, files);

      const catalog = catalogTree(files, {
        modulesDirectory: domain.modulesDirectory,
        examplesDirectory: domain.examplesDirectory,
      });
      const { metadata, warning } = readMetadata(files);
      if (warning) warnings.push(warning);

      const terraformOptions: TerraformRunOptions = {
        env: { [terraformTokenVariable(infra.publicUrl)]: infra.internalExtractionToken },
        lockTimeoutSeconds: infra.timeouts.terraformLockSeconds,
      };
      const context = (directory: ModuleDirectory): AnalyzerContext => ({
        commands: this.deps.commands,
        cwd: directory.path === '' ? moduleDir : safeJoinPaths(moduleDir, directory.path),
        timeoutMs: infra.timeouts.moduleIndexingSeconds * 1000,
        signal: deadline,
      });

      const root = await this.analyze(catalog.root, context(catalog.root), terraformOptions, false, warnings);
      const submoduleAnalyses: DirectoryAnalysis[] = [];
      for (const submodule of catalog.submodules) {
        submoduleAnalyses.push(await this.analyze(submodule, context(submodule), terraformOptions, false, warnings));
      }
      const exampleAnalyses: DirectoryAnalysis[] = [];
      for (const example of catalog.examples) {
        exampleAnalyses.push(await this.analyze(example, context(example), terraformOptions, true, warnings));
      }
      const terraformVersion = valueOrWarn(
        await runTerraformVersion(context(catalog.root), terraformOptions),
        'terraform version',
        warnings
      );

      if (deadline.aborted) {
        throw new ExternalToolError(
          `Module indexing exceeded ${infra.timeouts.moduleIndexingSeconds} seconds`
        );
      }

      const archiveFiles = files.map(file => ({ path: file.path, data: file.data, mode: file.mode }));
      const uploadedPaths = new Set(tree.files.filter(file => file.type === 'file').map(file => file.path));
      const unfiltered = files.length === uploadedPaths.size && files.every(file => uploadedPaths.has(file.path));
      const tarGz =
        tree.uploadedTarGz !== null && unfiltered ? tree.uploadedTarGz : await createTarGz(archiveFiles);
      const zip = createZip(archiveFiles);

      const published = source.kind === 'archive' || domain.autoPublishModuleVersions;
      const archiveKey = StorageLayout.moduleArchive(storageNamespace, module, provider, version.version, 'tar.gz');
      const zipKey = StorageLayout.moduleArchive(storageNamespace, module, provider, version.version, 'zip');
      const pending: PendingBlob[] = [];
      const username = actor.username ?? actor.providerType;

      // All row changes commit together
      const committed = this.deps.db.transaction(tx => {
        const { namespace: namespaceRow, created: namespaceCreated } = findOrCreateNamespace(tx, namespace);
        if (namespaceCreated) {
          insertAuditHistory(tx, {
            username,
            action: 'NAMESPACE_CREATE',
            object_type: 'namespace',
            object_id: namespaceRow.name,
          });
        }
        const { moduleProvider, created: providerCreated } = findOrCreateModuleProvider(
          tx,
          namespaceRow,
          module,
          provider
        );
        if (providerCreated) {
          insertAuditHistory(tx, {
            username,
            action: 'MODULE_PROVIDER_CREATE',
            object_type: 'module_provider',
            object_id: `${namespaceRow.name}/${module}/${provider}`,
          });
        }

        const previous = getPublishedModuleVersion(tx, moduleProvider.id, version.version);
        if (previous) {
          if (!domain.allowModuleVersionReindex) {
            throw new ConflictError(`Module version ${version.version} already exists and re-indexing is disabled`);
          }
          setModuleVersionPublished(tx, previous.id, false);
        }

        const row = insertModuleVersion(tx, {
          module_provider_id: moduleProvider.id,
          version: version.version,
          beta: version.beta,
          published: false,
          extraction_version: EXTRACTION_VERSION,
          source_archive_ref: archiveKey,
          readme_text: catalog.root.readme,
          description: metadata.description ?? descriptionFromReadme(catalog.root.readme),
          owner: metadata.owner ?? null,
          repo_clone_url: metadata.repo_clone_url ?? tree.cloneUrl,
          repo_snapshot_sha: tree.snapshotSha,
          variable_template: jsonOrNull(metadata.variable_template),
          terraform_docs: root.terraformDocs,
          graph_json: root.graph,
          tfsec: root.tfsec,
          terraform_version: terraformVersion,
        });
        const blobKey = (filePath: string) =>
          StorageLayout.moduleFileBlob(storageNamespace, module, provider, version.version, row.id, filePath);

        for (const analysis of submoduleAnalyses) {
          insertSubmodule(tx, {
            module_version_id: row.id,
            type: 'submodule',
            path: analysis.directory.path,
            readme_text: analysis.directory.readme,
            terraform_docs: analysis.terraformDocs,
            graph_json: analysis.graph,
            tfsec: analysis.tfsec,
          });
        }

        for (const analysis of exampleAnalyses) {
          const example = insertSubmodule(tx, {
            module_version_id: row.id,
            type: 'example',
            path: analysis.directory.path,
            readme_text: analysis.directory.readme,
            terraform_docs: analysis.terraformDocs,
            graph_json: analysis.graph,
            tfsec: analysis.tfsec,
            infracost: analysis.infracost,
          });
          for (const file of exampleFiles(files, analysis.directory.path)) {
            const inline = file.data.length <= MAX_INLINE_FILE_BYTES;
            if (!inline) pending.push({ key: blobKey(file.path), data: file.data });
            insertExampleFile(tx, {
              submodule_id: example.id,
              path: file.path,
              content: inline ? file.data : null,
              content_type: contentTypeFor(file.path),
              blob_ref: inline ? null : blobKey(file.path),
              size: file.data.length,
            });
          }
        }

        for (const name of domain.additionalModuleFiles) {
          const file = files.find(entry => entry.path === name);
          if (!file) continue;
          const inline = file.data.length <= MAX_INLINE_FILE_BYTES;
          if (!inline) pending.push({ key: blobKey(file.path), data: file.data });
          insertModuleVersionFile(tx, {
            module_version_id: row.id,
            path: file.path,
            content: inline ? file.data : null,
            content_type: contentTypeFor(file.path),
            blob_ref: inline ? null : blobKey(file.path),
            size: file.data.length,
          });
        }

        insertAuditHistory(tx, {
          username,
          action: 'MODULE_VERSION_INDEX',
          object_type: 'module_version',
          object_id: `${namespaceRow.name}/${module}/${provider}/${version.version}`,
          new_value: String(row.id),
        });

        let final = row;
        if (published) {
          final = publishModuleVersion(tx, row.id) ?? row;
          insertAuditHistory(tx, {
            username,
            action: 'MODULE_VERSION_PUBLISH',
            object_type: 'module_version',
            object_id: `${namespaceRow.name}/${module}/${provider}/${version.version}`,
            new_value: String(row.id),
          });
        }
        return { row: final, previous };
      });

      try {
        await this.deps.storage.putBlob(archiveKey, tarGz);
        await this.deps.storage.putBlob(zipKey, zip);
        for (const blob of pending) {
          await this.deps.storage.putBlob(blob.key, blob.data);
        }
      } catch (error) {
        logger.error({ err: error }, `[ingest] Storage write failed, reverting module version ${committed.row.id}`);
        this.revert(committed.row.id, committed.previous);
        await this.deleteFileBlobs(storageNamespace, request, version.version, committed.row.id);
        throw error;
      }

      if (committed.previous) {
        await this.deleteFileBlobs(storageNamespace, request, version.version, committed.previous.id);
      }

      logger.info(
        `[ingest] Indexed ${namespace}/${module}/${provider} ${version.version} as ${committed.row.id}` +
          ` (published=${committed.row.published}, warnings=${warnings.length})`
      );
      return { moduleVersion: committed.row, published: committed.row.published, beta: version.beta, warnings };
    } finally {
      await fs.rm(workDir, { recursive: true, force: true }).catch(err => {
        logger.warn({ err }, `[ingest] Could not remove work directory ${workDir}`);
      });
      if (stagedUpload) {
        const key = stagedUpload;
        await this.deps.storage.deletePrefix(key).catch(err => {
          logger.warn({ err }, `[ingest] Could not remove staged upload ${key}`);
        });
      }
    }
  }

  private resolveVersion(request: IngestionRequest, moduleProvider: ModuleProvider | null): ParsedVersion {
    if (request.version !== undefined) {
      return parseModuleVersion(request.version);
    }
    if (request.source.kind === 'git' && request.source.gitTag !== undefined && moduleProvider) {
      const derived = versionFromGitTag(moduleProvider.git_tag_format, request.source.gitTag);
      if (derived === null) {
        throw new InvalidInputError(
          `Git tag ${request.source.gitTag} does not match the tag format ${moduleProvider.git_tag_format}`
        );
      }
      return parseModuleVersion(derived);
    }
    throw new InvalidInputError('Either version or git_tag must be provided');
  }

  private async readUploadedArchive(data: Buffer, stagedKey: string): Promise<SourceTree> {
    const { infra } = this.deps;
    if (data.length === 0) {
      throw new InvalidInputError('Upload body is empty');
    }
    if (data.length > infra.maxArchiveBytes) {
      throw new InvalidInputError(`Archive exceeds the ${infra.maxArchiveBytes} byte limit`);
    }
    await this.deps.storage.putBlob(stagedKey, data);
    const entries = await readArchive(data, { maxBytes: infra.maxArchiveBytes });
    return {
      files: entries,
      uploadedTarGz: detectArchiveFormat(data) === 'tar.gz' ? data : null,
      cloneUrl: null,
      snapshotSha: null,
    };
  }

  private async cloneSource(
    moduleProvider: ModuleProvider | null,
    request: IngestionRequest,
    version: ParsedVersion,
    workDir: string,
    signal: AbortSignal
  ): Promise<SourceTree> {
    const template = moduleProvider?.repo_clone_url_template ?? null;
    if (!moduleProvider || !template) {
      throw new InvalidInputError('Module provider has no repository clone URL configured');
    }

    const url = renderRepositoryUrl(template, request);
    const tag =
      request.source.kind === 'git' && request.source.gitTag !== undefined
        ? request.source.gitTag
        : renderGitTag(moduleProvider.git_tag_format, version);
    const destination = path.join(workDir, 'clone');

    const sha = await cloneRepository(this.deps.commands, {
      url,
      ref: tag,
      destination,
      timeoutMs: this.deps.infra.timeouts.gitCloneSeconds * 1000,
      signal,
    });
    const files = await readDirectoryTree(destination, this.deps.infra.maxArchiveBytes);
    return { files, uploadedTarGz: null, cloneUrl: url, snapshotSha: sha };
  }

  private async writeTree(root: string, files: readonly ArchiveEntry[]): Promise<void> {
    for (const file of files) {
      const target = safeJoinPaths(root, file.path);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, file.data, { mode: 0o644 });
    }
  }

  private async analyze(
    directory: ModuleDirectory,
    context: AnalyzerContext,
    terraformOptions: TerraformRunOptions,
    isExample: boolean,
    warnings: string[]
  ): Promise<DirectoryAnalysis> {
    const subject = directory.path === '' ? 'root module' : directory.path;

    const docs = valueOrWarn(await runTerraformDocs(context), `${subject} terraform-docs`, warnings);
    const tfsec = this.deps.domain.enableSecurityScanning
      ? valueOrWarn(await runTfsec(context), `${subject} tfsec`, warnings)
      : null;
    const apiKey = this.deps.infra.infracostApiKey;
    const infracost =
      isExample && apiKey ? valueOrWarn(await runInfracost(context, apiKey), `${subject} infracost`, warnings) : null;
    const graph = valueOrWarn(await runTerraformGraph(context, terraformOptions), `${subject} graph`, warnings);

    return {
      directory,
      terraformDocs: jsonOrNull(docs),
      graph: jsonOrNull(graph),
      tfsec: jsonOrNull(tfsec),
      infracost: jsonOrNull(infracost),
    };
  }

  /**
   * Undo a committed ingestion whose storage writes failed
   */
  private revert(moduleVersionId: number, previous: ModuleVersion | null): void {
    this.deps.db.transaction(tx => {
      deleteModuleVersion(tx, moduleVersionId);
      if (previous) {
        publishModuleVersion(tx, previous.id);
      }
    });
  }

  private async deleteFileBlobs(
    storageNamespace: string,
    request: IngestionRequest,
    version: string,
    moduleVersionId: number
  ): Promise<void> {
    const prefix = StorageLayout.moduleFilePrefix(
      storageNamespace,
      request.module,
      request.provider,
      version,
      moduleVersionId
    );
    await this.deps.storage.deletePrefix(prefix).catch(err => {
      logger.warn({ err }, `[ingest] Could not remove file blobs of module version ${moduleVersionId}`);
    });
  }
}
