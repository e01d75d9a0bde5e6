/**
 * Configuration schema
 *
 * Environment variables are read as strings and shaped by zod into the two
 * frozen value objects the rest of the registry consumes: `DomainConfig`
 * (policy) and `InfraConfig` (endpoints, secrets, timeouts).
 */

import { z } from 'zod';

const csv = z
  .string()
  .optional()
  .transform(value =>
    (value ?? '')
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0)
  );

const bool = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform(value => {
      if (value === undefined || value.trim() === '') return fallback;
      return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
    });

// Non-numeric input becomes NaN so the positivity check reports it
const int = (fallback: number) =>
  z
    .string()
    .optional()
    .transform(value => (value === undefined || value.trim() === '' ? fallback : Number(value)))
    .pipe(z.number().int({ message: 'must be an integer' }));

const positiveInt = (fallback: number) =>
  int(fallback).pipe(z.number().positive({ message: 'must be greater than zero' }));

const optionalString = z
  .string()
  .optional()
  .transform(value => (value === undefined || value.trim() === '' ? undefined : value.trim()));

export const ModuleHostingModes = ['allow', 'disallow', 'enforce'] as const;
export type ModuleHostingMode = (typeof ModuleHostingModes)[number];

/**
 * Raw environment schema. Names are the documented variable names.
 */
export const EnvironmentSchema = z.object({
  LISTEN_HOST: z.string().default('0.0.0.0'),
  LISTEN_PORT: int(5000).pipe(z.number().min(0).max(65535)),
  PUBLIC_URL: z.string({ required_error: 'PUBLIC_URL is required' }).trim().min(1, 'PUBLIC_URL is required').url(),
  DATABASE_URL: z.string({ required_error: 'DATABASE_URL is required' }).trim().min(1, 'DATABASE_URL is required'),
  DATA_DIRECTORY: z.string().default('./data'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  SECRET_KEY: z.string({ required_error: 'SECRET_KEY is required' }).min(1, 'SECRET_KEY is required'),
  TERRAFORM_PRESIGNED_URL_SECRET: optionalString,
  TERRAFORM_PRESIGNED_URL_MAX_LIFETIME_SECONDS: positiveInt(300),

  ADMIN_AUTHENTICATION_TOKEN: optionalString,
  UPLOAD_API_KEYS: csv,
  PUBLISH_API_KEYS: csv,

  ADMIN_SESSION_EXPIRY_MINS: positiveInt(60),
  SESSION_MAX_TTL_MINS: positiveInt(1440),
  SESSION_CLEANUP_INTERVAL_SECONDS: positiveInt(3600),
  SESSION_COOKIE_NAME: z.string().trim().min(1).default('terrareg_session'),

  ANALYTICS_AUTH_KEYS: csv,
  ANALYTICS_TOKEN_PHRASE: z.string().default('analytics token'),
  ANALYTICS_TOKEN_DESCRIPTION: z.string().default(''),
  ANALYTICS_EXAMPLE_TOKEN: z.string().default('my-tf-application'),
  ANALYTICS_QUEUE_SIZE: positiveInt(1000),
  ANALYTICS_ENQUEUE_TIMEOUT_MS: positiveInt(50),
  ANALYTICS_INTERNAL_EXTRACTION_TOKEN: z.string().default('internal-extraction-analytics-token'),
  ALLOW_UNIDENTIFIED_DOWNLOADS: bool(false),
  ALLOW_UNAUTHENTICATED_ACCESS: bool(true),

  TERRAFORM_INTERNAL_EXTRACTION_TOKEN: optionalString,

  ALLOW_MODULE_HOSTING: z
    .string()
    .optional()
    .transform((value): ModuleHostingMode => {
      const normalised = (value ?? '').trim().toLowerCase();
      return ModuleHostingModes.find(mode => mode === normalised) ?? 'allow';
    }),
  ALLOW_PROVIDER_HOSTING: bool(true),
  AUTO_CREATE_NAMESPACE: bool(true),
  AUTO_CREATE_MODULE_PROVIDER: bool(true),
  AUTO_PUBLISH_MODULE_VERSIONS: bool(false),
  ALLOW_MODULE_VERSION_REINDEX: bool(true),

  TRUSTED_NAMESPACES: csv,
  VERIFIED_MODULE_NAMESPACES: csv,
  TRUSTED_NAMESPACE_LABEL: z.string().default('Trusted'),
  CONTRIBUTED_NAMESPACE_LABEL: z.string().default('Contributed'),
  VERIFIED_MODULE_LABEL: z.string().default('Verified'),
  APPLICATION_NAME: z.string().default('Terraform Registry'),

  // Unprefixed names are accepted as aliases of the TERRAFORM_ timeouts
  TERRAFORM_MODULE_INDEXING_TIMEOUT_SECONDS: optionalString,
  MODULE_INDEXING_TIMEOUT_SECONDS: optionalString,
  TERRAFORM_LOCK_TIMEOUT_SECONDS: optionalString,
  TERRAFORM_STANDARD_REQUEST_TIMEOUT_SECONDS: optionalString,
  STANDARD_REQUEST_TIMEOUT_SECONDS: optionalString,
  TERRAFORM_GIT_CLONE_TIMEOUT_SECONDS: optionalString,
  TERRAFORM_MAX_ARCHIVE_BYTES: positiveInt(100 * 1024 * 1024),

  TERRAFORM_ENABLE_SECURITY_SCANNING: bool(true),
  TERRAFORM_INFRACOST_API_KEY: optionalString,
  TERRAFORM_MODULES_DIRECTORY: z.string().default('modules'),
  TERRAFORM_EXAMPLES_DIRECTORY: z.string().default('examples'),
  TERRAFORM_ADDITIONAL_MODULE_FILES: z.string().default('LICENSE,CHANGELOG.md,RELEASE_NOTES.md'),

  OPENID_CONNECT_ISSUER: optionalString,
  OPENID_CONNECT_CLIENT_ID: optionalString,
  OPENID_CONNECT_CLIENT_SECRET: optionalString,
  OPENID_CONNECT_SCOPES: z.string().default('openid profile email groups'),
  OPENID_CONNECT_LOGIN_TEXT: z.string().default('Login using OpenID Connect'),

  SAML2_ENTITY_ID: optionalString,
  SAML2_IDP_METADATA_URL: optionalString,
  SAML2_PUBLIC_KEY: optionalString,
  SAML2_PRIVATE_KEY: optionalString,
  SAML2_GROUP_ATTRIBUTE: z.string().default('groups'),
  SAML2_LOGIN_TEXT: z.string().default('Login using SAML'),

  TERRAFORM_OIDC_IDP_ENABLED: bool(false),
  TERRAFORM_OIDC_IDP_CLIENT_ID: z.string().default('terraform-cli'),
  TERRAFORM_OIDC_IDP_SESSION_EXPIRY_SECONDS: positiveInt(3600),
});

export type RawEnvironment = z.infer<typeof EnvironmentSchema>;

/**
 * Policy configuration
 */
export interface DomainConfig {
  applicationName: string;
  allowModuleHosting: ModuleHostingMode;
  allowProviderHosting: boolean;
  autoCreateNamespace: boolean;
  autoCreateModuleProvider: boolean;
  autoPublishModuleVersions: boolean;
  allowModuleVersionReindex: boolean;
  allowUnauthenticatedAccess: boolean;
  allowUnidentifiedDownloads: boolean;
  trustedNamespaces: readonly string[];
  verifiedModuleNamespaces: readonly string[];
  labels: {
    trustedNamespace: string;
    contributedNamespace: string;
    verifiedModule: string;
  };
  analytics: {
    tokenPhrase: string;
    tokenDescription: string;
    exampleToken: string;
    internalExtractionToken: string;
  };
  modulesDirectory: string;
  examplesDirectory: string;
  additionalModuleFiles: readonly string[];
  enableSecurityScanning: boolean;
}

export interface AnalyticsAuthKey {
  token: string;
  environment: string | null;
}

export interface OidcSettings {
  issuer: string;
  clientId: string;
  clientSecret: string;
  scopes: readonly string[];
  loginText: string;
}

export interface SamlSettings {
  entityId: string;
  idpMetadataUrl: string;
  publicKey: string;
  privateKey: string;
  groupAttribute: string;
  loginText: string;
}

/**
 * Infrastructure configuration
 */
export interface InfraConfig {
  listenHost: string;
  listenPort: number;
  publicUrl: string;
  databaseUrl: string;
  dataDirectory: string;
  logLevel: RawEnvironment['LOG_LEVEL'];

  /** Decoded SECRET_KEY bytes (>= 32) */
  secretKey: Buffer;
  presignedUrlSecret: Buffer;
  presignedUrlMaxLifetimeSeconds: number;

  adminAuthenticationToken: string | undefined;
  uploadApiKeys: readonly string[];
  publishApiKeys: readonly string[];
  analyticsAuthKeys: readonly AnalyticsAuthKey[];
  internalExtractionToken: string;

  analyticsQueueSize: number;
  analyticsEnqueueTimeoutMs: number;

  sessions: {
    cookieName: string;
    adminSessionExpiryMinutes: number;
    maxTtlMinutes: number;
    cleanupIntervalSeconds: number;
    secureCookies: boolean;
  };

  timeouts: {
    moduleIndexingSeconds: number;
    terraformLockSeconds: number;
    standardRequestSeconds: number;
    gitCloneSeconds: number;
  };
  maxArchiveBytes: number;
  infracostApiKey: string | undefined;

  oidc: OidcSettings | undefined;
  saml: SamlSettings | undefined;
  terraformIdp: {
    enabled: boolean;
    clientId: string;
    sessionExpirySeconds: number;
  };
}

export interface ResolvedConfig {
  domain: DomainConfig;
  infra: InfraConfig;
}
