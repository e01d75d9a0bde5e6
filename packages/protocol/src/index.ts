/**
 * @terrashelf/protocol
 *
 * Type-only package describing the Terraform Registry wire contract as served
 * by this registry. Field names are bit-exact with what `terraform init` reads.
 */

/**
 * Service discovery document (GET /.well-known/terraform.json)
 */
export interface ServiceDiscovery {
  'modules.v1': string;
  'providers.v1': string;
  'login.v1'?: TerraformLoginService;
}

/**
 * `terraform login` service block
 */
export interface TerraformLoginService {
  client: string;
  grant_types: string[];
  authz: string;
  token: string;
  ports: [number, number];
}

/**
 * Token endpoint response for `terraform login`
 */
export interface TerraformTokenResponse {
  access_token: string;
  token_type: 'bearer';
  expires_in: number;
}

// ===== Modules =====

export interface ModuleInput {
  name: string;
  type: string;
  description: string | null;
  default: unknown;
  required: boolean;
}

export interface ModuleOutput {
  name: string;
  description: string | null;
}

export interface ModuleProviderDependency {
  name: string;
  namespace: string;
  source: string;
  version: string;
}

export interface ModuleResource {
  name: string;
  type: string;
}

/**
 * Resource graph in adjacency form, produced at ingestion from `terraform graph`
 */
export interface ModuleGraph {
  nodes: Array<{ id: string; label: string; type: 'resource' | 'data' | 'module' | 'provider' | 'var' | 'output' | 'local' | 'other' }>;
  edges: Array<{ source: string; target: string }>;
}

/**
 * Root module, submodule or example as embedded in module detail responses
 */
export interface ModuleSpecs {
  path: string;
  name: string;
  readme: string;
  empty: boolean;
  inputs: ModuleInput[];
  outputs: ModuleOutput[];
  dependencies: unknown[];
  provider_dependencies: ModuleProviderDependency[];
  resources: ModuleResource[];
}

/**
 * Module version summary used by listing and search
 */
export interface ModuleSummary {
  id: string;
  owner: string;
  namespace: string;
  name: string;
  version: string;
  provider: string;
  description: string;
  source: string;
  published_at: string;
  downloads: number;
  verified: boolean;
  trusted: boolean;
}

/**
 * Full module version detail (GET /v1/modules/:ns/:name/:provider[/:version])
 */
export interface ModuleDetail extends ModuleSummary {
  root: ModuleSpecs;
  submodules: ModuleSpecs[];
  examples: ModuleSpecs[];
  providers: string[];
  versions: string[];
}

/**
 * Submodule or example of a version, as listed under
 * /v1/terrareg/modules/:ns/:name/:provider/:version/{submodules,examples}
 */
export interface SubmoduleLink {
  path: string;
  href: string;
}

export interface SubmoduleDetail extends ModuleSpecs {
  graph_url: string;
  security_issues: number;
  security_results: Array<Record<string, unknown>> | null;
  /** Examples only, when a cost estimate was produced */
  cost_analysis?: Record<string, unknown> | null;
}

export interface ExampleFileEntry {
  filename: string;
  path: string;
  content_href: string;
}

export interface VariableTemplateEntry {
  name: string;
  type?: string;
  required?: boolean;
  quote_value?: boolean;
  additional_help?: string;
  default_value?: unknown;
}

/**
 * Registry-specific version detail: the protocol detail plus the stored
 * analysis (GET /v1/terrareg/modules/:ns/:name/:provider/:version)
 */
export interface TerraregModuleVersionDetail extends ModuleDetail {
  beta: boolean;
  terraform_version: string | null;
  graph_url: string;
  source_zip_url: string;
  security_issues: number;
  security_results: Array<Record<string, unknown>> | null;
  variable_template: VariableTemplateEntry[];
  additional_files: string[];
}

/**
 * Versions listing (GET /v1/modules/:ns/:name/:provider/versions)
 */
export interface ModuleVersionsResponse {
  modules: Array<{
    source: string;
    versions: Array<{
      version: string;
      root: { providers: ModuleProviderDependency[]; dependencies: unknown[] };
      submodules: Array<{ path: string; providers: ModuleProviderDependency[]; dependencies: unknown[] }>;
    }>;
  }>;
}

export interface PaginationMetaWire {
  limit: number;
  current_offset: number;
  next_offset?: number;
  prev_offset?: number;
}

export interface ModuleListResponse {
  meta: PaginationMetaWire;
  modules: ModuleSummary[];
}

// ===== Providers =====

export interface ProviderPlatform {
  os: string;
  arch: string;
}

export interface ProviderVersionsResponse {
  id: string;
  versions: Array<{
    version: string;
    protocols: string[];
    platforms: ProviderPlatform[];
  }>;
  warnings: string[] | null;
}

export interface GpgPublicKey {
  key_id: string;
  ascii_armor: string;
  trust_signature: string;
  source: string;
  source_url: string | null;
}

export interface ProviderDownloadResponse {
  protocols: string[];
  os: string;
  arch: string;
  filename: string;
  download_url: string;
  shasums_url: string;
  shasums_signature_url: string;
  shasum: string;
  signing_keys: { gpg_public_keys: GpgPublicKey[] };
}

/**
 * JSON:API resource for GPG keys (/v2/gpg-keys)
 */
export interface GpgKeyResource {
  type: 'gpg-keys';
  id: string;
  attributes: {
    'ascii-armor': string;
    'created-at': string;
    'key-id': string;
    namespace: string;
    source: string;
    'source-url': string | null;
    'trust-signature': string;
    'updated-at': string;
  };
  links: { self: string };
}

export interface CategoryResource {
  type: 'categories';
  id: string;
  attributes: { name: string; slug: string; 'user-selectable': boolean };
  links: { self: string };
}

// ===== Admin =====

export interface NamespaceSummary {
  name: string;
  display_name: string | null;
  type: 'user' | 'organisation';
  is_auto_verified: boolean;
  trusted: boolean;
}

export interface AnalyticsTokenUsage {
  token: string;
  environment: string | null;
  terraform_version: string | null;
  module_version: string;
  last_download: string;
}

export interface AuditHistoryEntry {
  timestamp: string;
  username: string;
  action: string;
  object_type: string;
  object_id: string;
  old_value: string | null;
  new_value: string | null;
}

/**
 * Result of a module version upload or import
 */
export interface IngestionResponse {
  status: 'Success';
  module_version_id: number;
  published: boolean;
  beta: boolean;
  warnings: string[];
}
