/**
 * Config resolver tests
 *
 * Defaults, aliases, secret decoding and the aggregated validation error.
 */

import { describe, it, expect } from 'vitest';
import { decodeSecret, parseAnalyticsAuthKeys, resolveConfig } from '../src/config/index.js';
import { RegistryError } from '../src/utils/errors.js';

const SECRET_HEX = 'ab'.repeat(32);

function baseEnv(overrides: Record<string, string> = {}): NodeJS.ProcessEnv {
  return {
    PUBLIC_URL: 'https://registry.example.test/',
    DATABASE_URL: 'sqlite:///tmp/registry-test.db',
    SECRET_KEY: SECRET_HEX,
    TERRAFORM_PRESIGNED_URL_SECRET: 'test-presign-secret',
    ...overrides,
  };
}

function configError(env: NodeJS.ProcessEnv): RegistryError {
  try {
    resolveConfig(env);
  } catch (error) {
    if (error instanceof RegistryError) return error;
    throw error;
  }
  throw new Error('expected resolveConfig to fail');
}

describe('resolveConfig', () => {
  it('should apply defaults', () => {
    const { domain, infra } = resolveConfig(baseEnv());

    expect(infra.listenHost).toBe('0.0.0.0');
    expect(infra.listenPort).toBe(5000);
    expect(infra.publicUrl).toBe('https://registry.example.test');
    expect(infra.presignedUrlMaxLifetimeSeconds).toBe(300);
    expect(infra.sessions).toEqual({
      cookieName: 'terrareg_session',
      adminSessionExpiryMinutes: 60,
      maxTtlMinutes: 1440,
      cleanupIntervalSeconds: 3600,
      secureCookies: true,
    });
    expect(infra.timeouts).toEqual({
      moduleIndexingSeconds: 300,
      terraformLockSeconds: 60,
      standardRequestSeconds: 30,
      gitCloneSeconds: 300,
    });
    expect(infra.oidc).toBeUndefined();
    expect(infra.saml).toBeUndefined();
    expect(infra.terraformIdp.enabled).toBe(false);

    expect(domain.allowModuleHosting).toBe('allow');
    expect(domain.autoCreateNamespace).toBe(true);
    expect(domain.autoPublishModuleVersions).toBe(false);
    expect(domain.allowUnauthenticatedAccess).toBe(true);
    expect(domain.additionalModuleFiles).toEqual(['LICENSE', 'CHANGELOG.md', 'RELEASE_NOTES.md']);
  });

  it('should return frozen objects', () => {
    const config = resolveConfig(baseEnv());
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.domain)).toBe(true);
    expect(Object.isFrozen(config.infra.sessions)).toBe(true);
  });

  it('should only mark cookies secure behind https', () => {
    const { infra } = resolveConfig(baseEnv({ PUBLIC_URL: 'http://localhost:5000' }));
    expect(infra.sessions.secureCookies).toBe(false);
  });

  it('should parse lists and flags', () => {
    const { domain, infra } = resolveConfig(
      baseEnv({
        UPLOAD_API_KEYS: 'test-upload-a, test-upload-b,',
        TRUSTED_NAMESPACES: 'platform',
        AUTO_PUBLISH_MODULE_VERSIONS: 'yes',
        ALLOW_PROVIDER_HOSTING: 'false',
        ALLOW_MODULE_HOSTING: 'DISALLOW',
      })
    );
    expect(infra.uploadApiKeys).toEqual(['test-upload-a', 'test-upload-b']);
    expect(domain.trustedNamespaces).toEqual(['platform']);
    expect(domain.autoPublishModuleVersions).toBe(true);
    expect(domain.allowProviderHosting).toBe(false);
    expect(domain.allowModuleHosting).toBe('disallow');
  });

  it('should fall back to allow for an unknown hosting mode', () => {
    expect(resolveConfig(baseEnv({ ALLOW_MODULE_HOSTING: 'sometimes' })).domain.allowModuleHosting).toBe('allow');
  });

  it('should accept unprefixed timeout aliases with the prefixed name winning', () => {
    expect(resolveConfig(baseEnv({ MODULE_INDEXING_TIMEOUT_SECONDS: '120' })).infra.timeouts.moduleIndexingSeconds).toBe(
      120
    );
    const both = resolveConfig(
      baseEnv({ MODULE_INDEXING_TIMEOUT_SECONDS: '120', TERRAFORM_MODULE_INDEXING_TIMEOUT_SECONDS: '90' })
    );
    expect(both.infra.timeouts.moduleIndexingSeconds).toBe(90);
  });

  it('should configure OIDC when complete', () => {
    const { infra } = resolveConfig(
      baseEnv({
        OPENID_CONNECT_ISSUER: 'https://idp.example.test/',
        OPENID_CONNECT_CLIENT_ID: 'registry',
        OPENID_CONNECT_CLIENT_SECRET: 'test-client-secret',
      })
    );
    expect(infra.oidc?.issuer).toBe('https://idp.example.test');
    expect(infra.oidc?.scopes).toEqual(['openid', 'profile', 'email', 'groups']);
  });

  it('should report every problem at once', () => {
    const error = configError(
      baseEnv({
        SECRET_KEY: 'test-secret',
        TERRAFORM_LOCK_TIMEOUT_SECONDS: 'soon',
        OPENID_CONNECT_ISSUER: 'https://idp.example.test',
      })
    );
    expect(error.code).toBe('configuration_error');
    expect(error.details?.problems).toEqual([
      'SECRET_KEY: must decode to at least 32 bytes',
      'TERRAFORM_LOCK_TIMEOUT_SECONDS: must be a positive integer',
      'OPENID_CONNECT_CLIENT_ID: required when OPENID_CONNECT_ISSUER is set',
      'OPENID_CONNECT_CLIENT_SECRET: required when OPENID_CONNECT_ISSUER is set',
    ]);
  });

  it('should require partial SAML settings to be completed', () => {
    const error = configError(baseEnv({ SAML2_ENTITY_ID: 'registry' }));
    expect(error.details?.problems).toEqual([
      'SAML2_PUBLIC_KEY: required when SAML is configured',
      'SAML2_PRIVATE_KEY: required when SAML is configured',
      'SAML2_IDP_METADATA_URL: required when SAML is configured',
    ]);
  });

  it('should reject missing required variables', () => {
    const env = baseEnv();
    delete env.PUBLIC_URL;
    const error = configError(env);
    expect(error.code).toBe('configuration_error');
    expect(error.message).toContain('PUBLIC_URL');
  });

  it('should reject out-of-range numbers', () => {
    expect(configError(baseEnv({ LISTEN_PORT: '70000' })).code).toBe('configuration_error');
    expect(configError(baseEnv({ ANALYTICS_QUEUE_SIZE: '0' })).code).toBe('configuration_error');
  });
});

describe('config helpers', () => {
  it('should decode hex secrets and keep other values as UTF-8', () => {
    expect(decodeSecret('00ff').equals(Buffer.from([0, 255]))).toBe(true);
    expect(decodeSecret('test-secret').toString('utf-8')).toBe('test-secret');
    expect(decodeSecret('abc').toString('utf-8')).toBe('abc');
  });

  it('should split analytics keys into token and environment', () => {
    expect(parseAnalyticsAuthKeys(['test-key-a:prod', 'test-key-b', 'test-key-c:'])).toEqual([
      { token: 'test-key-a', environment: 'prod' },
      { token: 'test-key-b', environment: null },
      { token: 'test-key-c', environment: null },
    ]);
  });
});
