/**
 * Configuration resolver
 *
 * Reads the process environment once at start-up, validates it and returns
 * frozen domain and infrastructure config. There is no hot reload.
 */

import crypto from 'crypto';
import { ZodError } from 'zod';
import {
  EnvironmentSchema,
  type AnalyticsAuthKey,
  type DomainConfig,
  type InfraConfig,
  type RawEnvironment,
  type ResolvedConfig,
} from './schema.js';
import { logger } from '../utils/logger.js';
import { RegistryError } from '../utils/errors.js';

// Re-export types
export type {
  DomainConfig,
  InfraConfig,
  ResolvedConfig,
  AnalyticsAuthKey,
  OidcSettings,
  SamlSettings,
  ModuleHostingMode,
} from './schema.js';
export { EnvironmentSchema, ModuleHostingModes } from './schema.js';

/** Minimum decoded length of SECRET_KEY */
export const MIN_SECRET_KEY_BYTES = 32;

/**
 * Decode a secret: hex when the whole value is hex, raw UTF-8 bytes otherwise
 */
export function decodeSecret(value: string): Buffer {
  const trimmed = value.trim();
  if (trimmed.length > 0 && trimmed.length % 2 === 0 && /^[0-9a-fA-F]+$/.test(trimmed)) {
    return Buffer.from(trimmed, 'hex');
  }
  return Buffer.from(value, 'utf-8');
}

/**
 * Parse `token:environment` entries. A bare token has no environment.
 */
export function parseAnalyticsAuthKeys(entries: readonly string[]): AnalyticsAuthKey[] {
  return entries.map(entry => {
    const separator = entry.indexOf(':');
    if (separator === -1) {
      return { token: entry, environment: null };
    }
    const environment = entry.slice(separator + 1).trim();
    return { token: entry.slice(0, separator).trim(), environment: environment || null };
  });
}

/**
 * Resolve and validate configuration
 *
 * @param env Environment to read (defaults to process.env)
 * @returns Frozen domain and infrastructure config
 * @throws RegistryError with code `configuration_error` listing every problem
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  let raw: RawEnvironment;
  try {
    raw = EnvironmentSchema.parse(env);
  } catch (error) {
    if (error instanceof ZodError) {
      const problems = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new RegistryError(
        `Invalid configuration: ${problems.join('; ')}`,
        'configuration_error',
        500,
        { problems }
      );
    }
    throw error;
  }

  const problems: string[] = [];

  const secretKey = decodeSecret(raw.SECRET_KEY);
  if (secretKey.length < MIN_SECRET_KEY_BYTES) {
    problems.push(`SECRET_KEY: must decode to at least ${MIN_SECRET_KEY_BYTES} bytes`);
  }

  const timeouts = {
    moduleIndexingSeconds: pickTimeout(
      raw.TERRAFORM_MODULE_INDEXING_TIMEOUT_SECONDS ?? raw.MODULE_INDEXING_TIMEOUT_SECONDS,
      300,
      'TERRAFORM_MODULE_INDEXING_TIMEOUT_SECONDS',
      problems
    ),
    terraformLockSeconds: pickTimeout(
      raw.TERRAFORM_LOCK_TIMEOUT_SECONDS,
      60,
      'TERRAFORM_LOCK_TIMEOUT_SECONDS',
      problems
    ),
    standardRequestSeconds: pickTimeout(
      raw.TERRAFORM_STANDARD_REQUEST_TIMEOUT_SECONDS ?? raw.STANDARD_REQUEST_TIMEOUT_SECONDS,
      30,
      'TERRAFORM_STANDARD_REQUEST_TIMEOUT_SECONDS',
      problems
    ),
    gitCloneSeconds: pickTimeout(
      raw.TERRAFORM_GIT_CLONE_TIMEOUT_SECONDS,
      300,
      'TERRAFORM_GIT_CLONE_TIMEOUT_SECONDS',
      problems
    ),
  };

  const samlConfigured = raw.SAML2_IDP_METADATA_URL !== undefined || raw.SAML2_ENTITY_ID !== undefined;
  if (samlConfigured) {
    for (const name of ['SAML2_ENTITY_ID', 'SAML2_PUBLIC_KEY', 'SAML2_PRIVATE_KEY', 'SAML2_IDP_METADATA_URL'] as const) {
      if (raw[name] === undefined) {
        problems.push(`${name}: required when SAML is configured`);
      }
    }
  }

  if (raw.OPENID_CONNECT_ISSUER !== undefined) {
    if (raw.OPENID_CONNECT_CLIENT_ID === undefined) {
      problems.push('OPENID_CONNECT_CLIENT_ID: required when OPENID_CONNECT_ISSUER is set');
    }
    if (raw.OPENID_CONNECT_CLIENT_SECRET === undefined) {
      problems.push('OPENID_CONNECT_CLIENT_SECRET: required when OPENID_CONNECT_ISSUER is set');
    }
  }

  if (problems.length > 0) {
    throw new RegistryError(
      `Invalid configuration: ${problems.join('; ')}`,
      'configuration_error',
      500,
      { problems }
    );
  }

  let presignedUrlSecret: Buffer;
  if (raw.TERRAFORM_PRESIGNED_URL_SECRET !== undefined) {
    presignedUrlSecret = decodeSecret(raw.TERRAFORM_PRESIGNED_URL_SECRET);
  } else {
    presignedUrlSecret = crypto.randomBytes(32);
    logger.warn('[config] TERRAFORM_PRESIGNED_URL_SECRET not set; using a per-process secret');
  }

  const publicUrl = raw.PUBLIC_URL.replace(/\/+$/, '');

  const domain: DomainConfig = {
    applicationName: raw.APPLICATION_NAME,
    allowModuleHosting: raw.ALLOW_MODULE_HOSTING,
    allowProviderHosting: raw.ALLOW_PROVIDER_HOSTING,
    autoCreateNamespace: raw.AUTO_CREATE_NAMESPACE,
    autoCreateModuleProvider: raw.AUTO_CREATE_MODULE_PROVIDER,
    autoPublishModuleVersions: raw.AUTO_PUBLISH_MODULE_VERSIONS,
    allowModuleVersionReindex: raw.ALLOW_MODULE_VERSION_REINDEX,
    allowUnauthenticatedAccess: raw.ALLOW_UNAUTHENTICATED_ACCESS,
    allowUnidentifiedDownloads: raw.ALLOW_UNIDENTIFIED_DOWNLOADS,
    trustedNamespaces: Object.freeze([...raw.TRUSTED_NAMESPACES]),
    verifiedModuleNamespaces: Object.freeze([...raw.VERIFIED_MODULE_NAMESPACES]),
    labels: Object.freeze({
      trustedNamespace: raw.TRUSTED_NAMESPACE_LABEL,
      contributedNamespace: raw.CONTRIBUTED_NAMESPACE_LABEL,
      verifiedModule: raw.VERIFIED_MODULE_LABEL,
    }),
    analytics: Object.freeze({
      tokenPhrase: raw.ANALYTICS_TOKEN_PHRASE,
      tokenDescription: raw.ANALYTICS_TOKEN_DESCRIPTION,
      exampleToken: raw.ANALYTICS_EXAMPLE_TOKEN,
      internalExtractionToken: raw.ANALYTICS_INTERNAL_EXTRACTION_TOKEN,
    }),
    modulesDirectory: raw.TERRAFORM_MODULES_DIRECTORY,
    examplesDirectory: raw.TERRAFORM_EXAMPLES_DIRECTORY,
    additionalModuleFiles: Object.freeze(
      raw.TERRAFORM_ADDITIONAL_MODULE_FILES.split(',')
        .map(name => name.trim())
        .filter(name => name.length > 0)
    ),
    enableSecurityScanning: raw.TERRAFORM_ENABLE_SECURITY_SCANNING,
  };

  const infra: InfraConfig = {
    listenHost: raw.LISTEN_HOST,
    listenPort: raw.LISTEN_PORT,
    publicUrl,
    databaseUrl: raw.DATABASE_URL,
    dataDirectory: raw.DATA_DIRECTORY,
    logLevel: raw.LOG_LEVEL,
    secretKey,
    presignedUrlSecret,
    presignedUrlMaxLifetimeSeconds: raw.TERRAFORM_PRESIGNED_URL_MAX_LIFETIME_SECONDS,
    adminAuthenticationToken: raw.ADMIN_AUTHENTICATION_TOKEN,
    uploadApiKeys: Object.freeze([...raw.UPLOAD_API_KEYS]),
    publishApiKeys: Object.freeze([...raw.PUBLISH_API_KEYS]),
    analyticsAuthKeys: Object.freeze(parseAnalyticsAuthKeys(raw.ANALYTICS_AUTH_KEYS)),
    internalExtractionToken:
      raw.TERRAFORM_INTERNAL_EXTRACTION_TOKEN ?? crypto.randomBytes(32).toString('base64url'),
    analyticsQueueSize: raw.ANALYTICS_QUEUE_SIZE,
    analyticsEnqueueTimeoutMs: raw.ANALYTICS_ENQUEUE_TIMEOUT_MS,
    sessions: Object.freeze({
      cookieName: raw.SESSION_COOKIE_NAME,
      adminSessionExpiryMinutes: raw.ADMIN_SESSION_EXPIRY_MINS,
      maxTtlMinutes: raw.SESSION_MAX_TTL_MINS,
      cleanupIntervalSeconds: raw.SESSION_CLEANUP_INTERVAL_SECONDS,
      secureCookies: publicUrl.toLowerCase().startsWith('https://'),
    }),
    timeouts: Object.freeze(timeouts),
    maxArchiveBytes: raw.TERRAFORM_MAX_ARCHIVE_BYTES,
    infracostApiKey: raw.TERRAFORM_INFRACOST_API_KEY,
    oidc:
      raw.OPENID_CONNECT_ISSUER !== undefined &&
      raw.OPENID_CONNECT_CLIENT_ID !== undefined &&
      raw.OPENID_CONNECT_CLIENT_SECRET !== undefined
        ? Object.freeze({
            issuer: raw.OPENID_CONNECT_ISSUER.replace(/\/+$/, ''),
            clientId: raw.OPENID_CONNECT_CLIENT_ID,
            clientSecret: raw.OPENID_CONNECT_CLIENT_SECRET,
            scopes: Object.freeze(raw.OPENID_CONNECT_SCOPES.split(/\s+/).filter(Boolean)),
            loginText: raw.OPENID_CONNECT_LOGIN_TEXT,
          })
        : undefined,
    saml:
      raw.SAML2_ENTITY_ID !== undefined &&
      raw.SAML2_IDP_METADATA_URL !== undefined &&
      raw.SAML2_PUBLIC_KEY !== undefined &&
      raw.SAML2_PRIVATE_KEY !== undefined
        ? Object.freeze({
            entityId: raw.SAML2_ENTITY_ID,
            idpMetadataUrl: raw.SAML2_IDP_METADATA_URL,
            publicKey: raw.SAML2_PUBLIC_KEY,
            privateKey: raw.SAML2_PRIVATE_KEY,
            groupAttribute: raw.SAML2_GROUP_ATTRIBUTE,
            loginText: raw.SAML2_LOGIN_TEXT,
          })
        : undefined,
    terraformIdp: Object.freeze({
      enabled: raw.TERRAFORM_OIDC_IDP_ENABLED,
      clientId: raw.TERRAFORM_OIDC_IDP_CLIENT_ID,
      sessionExpirySeconds: raw.TERRAFORM_OIDC_IDP_SESSION_EXPIRY_SECONDS,
    }),
  };

  logger.info('[config] Configuration resolved');
  return Object.freeze({ domain: Object.freeze(domain), infra: Object.freeze(infra) });
}

function pickTimeout(
  value: string | undefined,
  fallback: number,
  name: string,
  problems: string[]
): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    problems.push(`${name}: must be a positive integer`);
    return fallback;
  }
  return parsed;
}
