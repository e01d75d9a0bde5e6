/**
 * Module Content Service
 *
 * Serves what ingestion stored for a published version: submodules, examples
 * and their files, resource graphs, security and cost results, the variable
 * template and the source zip.
 */

import path from 'path';
import { z } from 'zod';
import {
  NotFoundError,
  StorageLayout,
  getExampleFile,
  getModuleProvider,
  getModuleVersionFile,
  getPublishedModuleVersion,
  getSubmodule,
  listExampleFiles,
  listModuleVersionFiles,
  listSubmodules,
  logger,
  parseModuleVersion,
  type DatabaseClient,
  type ModuleProvider,
  type ModuleVersion,
  type Namespace,
  type StorageBackend,
  type Submodule,
} from '@terrashelf/core';
import type {
  ExampleFileEntry,
  ModuleDetail,
  ModuleGraph,
  SubmoduleDetail,
  SubmoduleLink,
  TerraregModuleVersionDetail,
  VariableTemplateEntry,
} from '@terrashelf/protocol';
import { buildModuleSpecs } from './module-specs.js';
import { moduleVersionPath, type ModuleAddress } from './module-registry-service.js';
import { VariableTemplateSchema } from '../ingestion/tree.js';

export interface ModuleContentDependencies {
  db: DatabaseClient;
  storage: StorageBackend;
}

export type SubmoduleKind = Submodule['type'];

export interface FileContent {
  data: Buffer;
  contentType: string;
}

const GRAPH_NODE_TYPES = ['resource', 'data', 'module', 'provider', 'var', 'output', 'local', 'other'] as const;

const ModuleGraphSchema = z.object({
  nodes: z.array(z.object({ id: z.string(), label: z.string(), type: z.enum(GRAPH_NODE_TYPES) })),
  edges: z.array(z.object({ source: z.string(), target: z.string() })),
}) satisfies z.ZodType<ModuleGraph>;

const SecurityResultsSchema = z.array(z.record(z.unknown()));
const CostBreakdownSchema = z.record(z.unknown());

const EMPTY_GRAPH: ModuleGraph = { nodes: [], edges: [] };

/**
 * Read a JSON column written at ingestion; unreadable values count as absent
 */
function storedJson<T>(raw: string | null, schema: z.ZodType<T>, column: string): T | null {
  if (raw === null) return null;
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    logger.warn(`[content] Stored ${column} does not match its schema`);
  } catch (err) {
    logger.warn({ err }, `[content] Stored ${column} is not valid JSON`);
  }
  return null;
}

const LIST_PATHS: Record<SubmoduleKind, string> = { submodule: 'submodules', example: 'examples' };

interface ResolvedVersion {
  namespace: Namespace;
  moduleProvider: ModuleProvider;
  moduleVersion: ModuleVersion;
  /** `/v1/terrareg/modules/<ns>/<module>/<provider>/<version>` */
  basePath: string;
}

export class ModuleContentService {
  constructor(private readonly deps: ModuleContentDependencies) {}

  private resolve(address: ModuleAddress, version: string): ResolvedVersion {
    const found = getModuleProvider(this.deps.db, address.namespace, address.module, address.provider);
    if (!found) {
      throw new NotFoundError(`Module provider not found: ${address.namespace}/${address.module}/${address.provider}`);
    }
    const { version: parsed } = parseModuleVersion(version);
    const moduleVersion = getPublishedModuleVersion(this.deps.db, found.moduleProvider.id, parsed);
    if (!moduleVersion) {
      throw new NotFoundError(`Module version not found: ${version}`);
    }
    const basePath = `/v1/terrareg/modules/${moduleVersionPath(
      found.namespace.name,
      found.moduleProvider.module_name,
      found.moduleProvider.provider_name,
      moduleVersion.version
    )}`;
    return { ...found, moduleVersion, basePath };
  }

  private requireSubmodule(resolved: ResolvedVersion, kind: SubmoduleKind, submodulePath: string): Submodule {
    const row = getSubmodule(this.deps.db, resolved.moduleVersion.id, kind, submodulePath.replace(/^\/+|\/+$/g, ''));
    if (!row) {
      throw new NotFoundError(`${kind === 'example' ? 'Example' : 'Submodule'} not found: ${submodulePath}`);
    }
    return row;
  }

  /**
   * Protocol detail plus the stored analysis of the root module
   */
  getVersionDetail(address: ModuleAddress, version: string, detail: ModuleDetail): TerraregModuleVersionDetail {
    const resolved = this.resolve(address, version);
    const { moduleVersion, basePath } = resolved;
    const security = storedJson(moduleVersion.tfsec, SecurityResultsSchema, 'tfsec');
    const template: VariableTemplateEntry[] =
      storedJson(moduleVersion.variable_template, VariableTemplateSchema, 'variable_template') ?? [];

    return {
      ...detail,
      beta: moduleVersion.beta,
      terraform_version: moduleVersion.terraform_version,
      graph_url: `${basePath}/graph/data`,
      source_zip_url: `${basePath}/source.zip`,
      security_issues: security?.length ?? 0,
      security_results: security,
      variable_template: template,
      additional_files: listModuleVersionFiles(this.deps.db, moduleVersion.id).map(file => file.path),
    };
  }

  listSubmodules(address: ModuleAddress, version: string, kind: SubmoduleKind): SubmoduleLink[] {
    const resolved = this.resolve(address, version);
    return listSubmodules(this.deps.db, resolved.moduleVersion.id, kind).map(row => ({
      path: row.path,
      href: `${resolved.basePath}/${LIST_PATHS[kind]}/details/${row.path}`,
    }));
  }

  getSubmoduleDetail(
    address: ModuleAddress,
    version: string,
    kind: SubmoduleKind,
    submodulePath: string
  ): SubmoduleDetail {
    const resolved = this.resolve(address, version);
    const row = this.requireSubmodule(resolved, kind, submodulePath);
    const security = storedJson(row.tfsec, SecurityResultsSchema, 'tfsec');

    const detail: SubmoduleDetail = {
      ...buildModuleSpecs(row),
      graph_url: `${resolved.basePath}/graph/data/${kind}/${row.path}`,
      security_issues: security?.length ?? 0,
      security_results: security,
    };
    if (kind === 'example') {
      detail.cost_analysis = storedJson(row.infracost, CostBreakdownSchema, 'infracost');
    }
    return detail;
  }

  listExampleFiles(address: ModuleAddress, version: string, examplePath: string): ExampleFileEntry[] {
    const resolved = this.resolve(address, version);
    const example = this.requireSubmodule(resolved, 'example', examplePath);
    return listExampleFiles(this.deps.db, example.id).map(file => ({
      filename: path.posix.basename(file.path),
      path: file.path,
      content_href: `${resolved.basePath}/examples/file/${file.path}`,
    }));
  }

  /**
   * A file of an example, addressed by its repository path
   */
  async getExampleFile(address: ModuleAddress, version: string, filePath: string): Promise<FileContent> {
    const resolved = this.resolve(address, version);
    const example = this.requireSubmodule(resolved, 'example', path.posix.dirname(filePath));
    const file = getExampleFile(this.deps.db, example.id, filePath);
    if (!file) {
      throw new NotFoundError(`Example file not found: ${filePath}`);
    }
    return { data: file.content ?? (await this.readFileBlob(file.blob_ref)), contentType: file.content_type };
  }

  /**
   * One of the additional root files kept at ingestion (LICENSE, CHANGELOG.md...)
   */
  async getModuleFile(address: ModuleAddress, version: string, filePath: string): Promise<FileContent> {
    const resolved = this.resolve(address, version);
    const file = getModuleVersionFile(this.deps.db, resolved.moduleVersion.id, filePath);
    if (!file) {
      throw new NotFoundError(`Module file not found: ${filePath}`);
    }
    return { data: file.content ?? (await this.readFileBlob(file.blob_ref)), contentType: file.content_type };
  }

  /**
   * Resource graph of the root module, or of one submodule or example
   */
  getGraph(
    address: ModuleAddress,
    version: string,
    target: { kind: SubmoduleKind; path: string } | null = null
  ): ModuleGraph {
    const resolved = this.resolve(address, version);
    const raw = target
      ? this.requireSubmodule(resolved, target.kind, target.path).graph_json
      : resolved.moduleVersion.graph_json;
    return storedJson(raw, ModuleGraphSchema, 'graph') ?? EMPTY_GRAPH;
  }

  getVariableTemplate(address: ModuleAddress, version: string): VariableTemplateEntry[] {
    const { moduleVersion } = this.resolve(address, version);
    return storedJson(moduleVersion.variable_template, VariableTemplateSchema, 'variable_template') ?? [];
  }

  /**
   * Storage key of the zip built next to the canonical archive
   */
  sourceZipRef(address: ModuleAddress, version: string): { key: string; filename: string } {
    const { namespace, moduleProvider, moduleVersion } = this.resolve(address, version);
    return {
      key: StorageLayout.moduleArchive(
        namespace.name,
        moduleProvider.module_name,
        moduleProvider.provider_name,
        moduleVersion.version,
        'zip'
      ),
      filename: `${moduleProvider.module_name}-${moduleProvider.provider_name}-${moduleVersion.version}.zip`,
    };
  }

  private async readFileBlob(blobRef: string | null): Promise<Buffer> {
    if (blobRef === null) {
      throw new NotFoundError('File content is missing');
    }
    return this.deps.storage.readBlob(blobRef);
  }
}
