/**
 * Provider Service
 *
 * Provider registry protocol (versions, platform downloads), GPG keys,
 * categories and the upload of a provider release.
 *
 * A release upload is one zip holding the files a provider's release
 * pipeline produces:
 *
 * ```
 * terraform-provider-<name>_<version>_<os>_<arch>.zip   (one per platform)
 * terraform-provider-<name>_<version>_SHA256SUMS
 * terraform-provider-<name>_<version>_SHA256SUMS.sig
 * terraform-provider-<name>_<version>_manifest.json     (optional)
 * ```
 *
 * Every binary must be listed in SHA256SUMS with a matching digest. The
 * signature is stored as given; Terraform verifies it against the key.
 */

import crypto from 'crypto';
import path from 'path';
import { z } from 'zod';
import {
  ConflictError,
  InvalidInputError,
  NotFoundError,
  StorageLayout,
  deleteGpgKey,
  findOrCreateProvider,
  getGpgKey,
  getGpgKeyById,
  getNamespaceByName,
  getProvider,
  getProviderBinary,
  getProviderVersion,
  insertAuditHistory,
  insertGpgKey,
  insertProviderBinary,
  insertProviderVersion,
  listGpgKeys,
  listProviderBinaries,
  listProviderCategories,
  listProviderVersions,
  logger,
  parseModuleVersion,
  parseProviderBinaryFilename,
  readArchive,
  requireNamespacePermission,
  requireUploadPermission,
  sortVersionsDescending,
  validateNamespaceName,
  validateProviderName,
  type AuthContext,
  type DatabaseClient,
  type DomainConfig,
  type GpgKey,
  type InfraConfig,
  type Namespace,
  type Provider,
  type ProviderVersion,
  type StorageBackend,
  type UrlSigner,
} from '@terrashelf/core';
import type {
  CategoryResource,
  GpgKeyResource,
  GpgPublicKey,
  ProviderDownloadResponse,
  ProviderVersionsResponse,
} from '@terrashelf/protocol';
import { readArmoredPublicKey } from './gpg-armor.js';

const DEFAULT_PROTOCOLS = ['5.0'];

const ProtocolListSchema = z.array(z.string());

const ReleaseManifestSchema = z.object({
  version: z.number().optional(),
  metadata: z
    .object({
      protocol_versions: z.array(z.string().regex(/^\d+\.\d+$/)).min(1),
    })
    .optional(),
});

const SHASUMS_LINE = /^([0-9a-f]{64})\s+\*?(\S+)$/;

export interface ProviderServiceDependencies {
  db: DatabaseClient;
  storage: StorageBackend;
  domain: DomainConfig;
  infra: InfraConfig;
  signer: UrlSigner;
}

export interface ProviderReleaseUpload {
  namespace: string;
  provider: string;
  version: string;
  /** Hex key id of a GPG key already registered in the namespace */
  gpgKeyId: string;
  archive: Buffer;
  actor: AuthContext;
}

export interface GpgKeyInput {
  namespace: string;
  asciiArmor: string;
  /** Must match the key material when given */
  keyId?: string;
  trustSignature?: string;
  source?: string;
  sourceUrl?: string | null;
}

export interface ProviderArtifact {
  data: Buffer;
  contentType: string;
}

export function releaseFilePrefix(provider: string, version: string): string {
  return `terraform-provider-${provider}_${version}`;
}

/**
 * Path of a stored release file served through a presigned URL
 */
export function providerArtifactPath(namespace: string, provider: string, version: string, filename: string): string {
  return `/v1/terrareg/providers/${namespace}/${provider}/${version}/${filename}`;
}

/**
 * Digests by filename; malformed lines are rejected
 */
export function parseShasums(content: string): Map<string, string> {
  const sums = new Map<string, string>();
  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (line === '') continue;
    const match = SHASUMS_LINE.exec(line);
    const digest = match?.[1];
    const filename = match?.[2];
    if (digest === undefined || filename === undefined) {
      throw new InvalidInputError('SHA256SUMS contains a malformed line', { line });
    }
    sums.set(filename, digest);
  }
  return sums;
}

function protocolsOf(version: ProviderVersion): string[] {
  let raw: unknown;
  try {
    raw = JSON.parse(version.protocol_versions);
  } catch (err) {
    logger.warn({ err }, `[providers] Stored protocol list of version ${version.id} is not JSON`);
    return DEFAULT_PROTOCOLS;
  }
  const parsed = ProtocolListSchema.safeParse(raw);
  return parsed.success ? parsed.data : DEFAULT_PROTOCOLS;
}

function actorName(actor: AuthContext): string {
  return actor.username ?? actor.providerType;
}

function toGpgPublicKey(key: GpgKey): GpgPublicKey {
  return {
    key_id: key.key_id,
    ascii_armor: key.ascii_armor,
    trust_signature: key.trust_signature,
    source: key.source,
    source_url: key.source_url,
  };
}

function toGpgKeyResource(key: GpgKey, namespace: Namespace): GpgKeyResource {
  return {
    type: 'gpg-keys',
    id: key.key_id,
    attributes: {
      'ascii-armor': key.ascii_armor,
      'created-at': key.created_at,
      'key-id': key.key_id,
      namespace: namespace.name,
      source: key.source,
      'source-url': key.source_url,
      'trust-signature': key.trust_signature,
      'updated-at': key.updated_at,
    },
    links: { self: `/v2/gpg-keys/${namespace.name}/${key.key_id}` },
  };
}

export class ProviderService {
  constructor(private readonly deps: ProviderServiceDependencies) {}

  // ==========================================================================
  // Registry protocol
  // ==========================================================================

  private requireProvider(namespace: string, name: string): { provider: Provider; namespace: Namespace } {
    const found = getProvider(this.deps.db, namespace, name);
    if (!found) {
      throw new NotFoundError(`Provider not found: ${namespace}/${name}`);
    }
    return found;
  }

  private requireVersion(provider: Provider, namespace: Namespace, version: string): ProviderVersion {
    const row = getProviderVersion(this.deps.db, provider.id, version);
    if (!row) {
      throw new NotFoundError(`Provider version not found: ${namespace.name}/${provider.name} ${version}`);
    }
    return row;
  }

  getVersions(namespaceName: string, name: string): ProviderVersionsResponse {
    const { provider, namespace } = this.requireProvider(namespaceName, name);
    const versions = listProviderVersions(this.deps.db, provider.id);
    const binaries = listProviderBinaries(
      this.deps.db,
      versions.map(version => version.id)
    );

    const byVersion = new Map(versions.map(version => [version.version, version]));
    return {
      id: `${namespace.name}/${provider.name}`,
      versions: sortVersionsDescending(versions.map(version => version.version)).flatMap(versionString => {
        const row = byVersion.get(versionString);
        if (!row) return [];
        return [
          {
            version: row.version,
            protocols: protocolsOf(row),
            platforms: binaries
              .filter(binary => binary.provider_version_id === row.id)
              .map(binary => ({ os: binary.os, arch: binary.arch })),
          },
        ];
      }),
      warnings: null,
    };
  }

  getDownload(namespaceName: string, name: string, version: string, os: string, arch: string): ProviderDownloadResponse {
    const { provider, namespace } = this.requireProvider(namespaceName, name);
    const row = this.requireVersion(provider, namespace, version);
    const binary = getProviderBinary(this.deps.db, row.id, os, arch);
    if (!binary) {
      throw new NotFoundError(`Provider ${namespace.name}/${provider.name} ${version} has no build for ${os}/${arch}`);
    }
    const key = getGpgKeyById(this.deps.db, row.gpg_key_id);
    if (!key) {
      throw new NotFoundError(`Signing key of provider version ${row.id} is missing`);
    }

    const prefix = releaseFilePrefix(provider.name, row.version);
    const signed = (filename: string): string =>
      this.deps.infra.publicUrl +
      this.deps.signer.signPath(providerArtifactPath(namespace.name, provider.name, row.version, filename));

    return {
      protocols: protocolsOf(row),
      os: binary.os,
      arch: binary.arch,
      filename: binary.filename,
      download_url: signed(binary.filename),
      shasums_url: signed(`${prefix}_SHA256SUMS`),
      shasums_signature_url: signed(`${prefix}_SHA256SUMS.sig`),
      shasum: binary.sha256,
      signing_keys: { gpg_public_keys: [toGpgPublicKey(key)] },
    };
  }

  /**
   * Stored release file behind a presigned path; the caller verifies the signature
   */
  async readArtifact(namespaceName: string, name: string, version: string, filename: string): Promise<ProviderArtifact> {
    const { provider, namespace } = this.requireProvider(namespaceName, name);
    const row = this.requireVersion(provider, namespace, version);
    const prefix = releaseFilePrefix(provider.name, row.version);

    if (filename === `${prefix}_SHA256SUMS`) {
      return { data: await this.deps.storage.readBlob(row.shasums_blob_ref), contentType: 'text/plain' };
    }
    if (filename === `${prefix}_SHA256SUMS.sig`) {
      return {
        data: await this.deps.storage.readBlob(row.shasums_signature_blob_ref),
        contentType: 'application/octet-stream',
      };
    }
    const binary = listProviderBinaries(this.deps.db, [row.id]).find(candidate => candidate.filename === filename);
    if (!binary) {
      throw new NotFoundError(`Release file not found: ${filename}`);
    }
    return { data: await this.deps.storage.readBlob(binary.blob_ref), contentType: 'application/zip' };
  }

  listCategories(): CategoryResource[] {
    return listProviderCategories(this.deps.db).map(category => ({
      type: 'categories',
      id: String(category.id),
      attributes: {
        name: category.name,
        slug: category.slug,
        'user-selectable': category.user_selectable,
      },
      links: { self: `/v2/categories/${category.id}` },
    }));
  }

  // ==========================================================================
  // GPG keys
  // ==========================================================================

  listGpgKeys(namespaces: readonly string[]): GpgKeyResource[] {
    return listGpgKeys(this.deps.db, namespaces).map(({ gpgKey, namespace }) => toGpgKeyResource(gpgKey, namespace));
  }

  private requireNamespace(name: string): Namespace {
    const namespace = getNamespaceByName(this.deps.db, name);
    if (!namespace) {
      throw new NotFoundError(`Namespace does not exist: ${name}`);
    }
    return namespace;
  }

  getGpgKey(namespaceName: string, keyId: string): GpgKeyResource {
    const namespace = this.requireNamespace(namespaceName);
    const key = getGpgKey(this.deps.db, namespace.id, keyId);
    if (!key) {
      throw new NotFoundError(`GPG key not found: ${keyId}`);
    }
    return toGpgKeyResource(key, namespace);
  }

  createGpgKey(input: GpgKeyInput, actor: AuthContext): GpgKeyResource {
    validateNamespaceName(input.namespace);
    requireNamespacePermission(actor, 'FULL', input.namespace);
    const namespace = this.requireNamespace(input.namespace);

    const { keyId } = readArmoredPublicKey(input.asciiArmor);
    if (input.keyId !== undefined && input.keyId.toUpperCase() !== keyId) {
      throw new InvalidInputError('key-id does not match the ASCII armor', { expected: keyId });
    }
    if (getGpgKey(this.deps.db, namespace.id, keyId)) {
      throw new ConflictError(`GPG key already exists: ${keyId}`);
    }

    const key = this.deps.db.transaction(tx => {
      const created = insertGpgKey(tx, {
        namespace_id: namespace.id,
        key_id: keyId,
        ascii_armor: input.asciiArmor,
        trust_signature: input.trustSignature ?? '',
        source: input.source ?? '',
        source_url: input.sourceUrl ?? null,
      });
      insertAuditHistory(tx, {
        username: actorName(actor),
        action: 'GPG_KEY_CREATE',
        object_type: 'gpg_key',
        object_id: `${namespace.name}/${keyId}`,
      });
      return created;
    });
    return toGpgKeyResource(key, namespace);
  }

  deleteGpgKey(namespaceName: string, keyId: string, actor: AuthContext): void {
    requireNamespacePermission(actor, 'FULL', namespaceName);
    const namespace = this.requireNamespace(namespaceName);
    const key = getGpgKey(this.deps.db, namespace.id, keyId);
    if (!key) {
      throw new NotFoundError(`GPG key not found: ${keyId}`);
    }

    this.deps.db.transaction(tx => {
      if (!deleteGpgKey(tx, key.id)) {
        throw new ConflictError(`GPG key ${key.key_id} still signs provider versions`);
      }
      insertAuditHistory(tx, {
        username: actorName(actor),
        action: 'GPG_KEY_DELETE',
        object_type: 'gpg_key',
        object_id: `${namespace.name}/${key.key_id}`,
      });
    });
  }

  // ==========================================================================
  // Release upload
  // ==========================================================================

  async uploadVersion(upload: ProviderReleaseUpload): Promise<ProviderVersion> {
    const { namespace: namespaceName, provider: name, actor } = upload;
    if (!this.deps.domain.allowProviderHosting) {
      throw new InvalidInputError('Provider upload is disabled by ALLOW_PROVIDER_HOSTING');
    }
    validateNamespaceName(namespaceName);
    validateProviderName(name);
    const parsed = parseModuleVersion(upload.version);
    requireUploadPermission(actor, namespaceName);

    const namespace = this.requireNamespace(namespaceName);
    const gpgKey = getGpgKey(this.deps.db, namespace.id, upload.gpgKeyId);
    if (!gpgKey) {
      throw new NotFoundError(`GPG key not found in namespace ${namespace.name}: ${upload.gpgKeyId}`);
    }
    const existing = getProvider(this.deps.db, namespace.name, name);
    if (existing && getProviderVersion(this.deps.db, existing.provider.id, parsed.version)) {
      throw new ConflictError(`Provider version already exists: ${namespace.name}/${name} ${parsed.version}`);
    }

    const entries = await readArchive(upload.archive, { maxBytes: this.deps.infra.maxArchiveBytes });
    const files = new Map<string, Buffer>();
    for (const entry of entries) {
      if (entry.type === 'file') files.set(path.posix.basename(entry.path), entry.data);
    }

    const prefix = releaseFilePrefix(name, parsed.version);
    const shasums = files.get(`${prefix}_SHA256SUMS`);
    const signature = files.get(`${prefix}_SHA256SUMS.sig`);
    if (!shasums || !signature) {
      throw new InvalidInputError(`Release must contain ${prefix}_SHA256SUMS and ${prefix}_SHA256SUMS.sig`);
    }
    const sums = parseShasums(shasums.toString('utf-8'));
    const protocols = this.readProtocols(files.get(`${prefix}_manifest.json`));

    const binaries = [...files.entries()]
      .filter(([filename]) => filename.startsWith(`${prefix}_`) && filename.endsWith('.zip'))
      .map(([filename, data]) => {
        const platform = parseProviderBinaryFilename(filename, name, parsed.version);
        const sha256 = crypto.createHash('sha256').update(data).digest('hex');
        const listed = sums.get(filename);
        if (listed === undefined) {
          throw new InvalidInputError(`Binary is not listed in SHA256SUMS: ${filename}`);
        }
        if (listed !== sha256) {
          throw new InvalidInputError(`Checksum mismatch for ${filename}`);
        }
        return { ...platform, filename, sha256, data };
      });
    if (binaries.length === 0) {
      throw new InvalidInputError('Release contains no provider binaries');
    }

    const shasumsKey = StorageLayout.providerShasums(namespace.name, name, parsed.version);
    const signatureKey = StorageLayout.providerShasumsSignature(namespace.name, name, parsed.version);
    await this.deps.storage.putBlob(shasumsKey, shasums);
    await this.deps.storage.putBlob(signatureKey, signature);
    for (const binary of binaries) {
      await this.deps.storage.putBlob(
        StorageLayout.providerBinary(namespace.name, name, parsed.version, binary.os, binary.arch),
        binary.data
      );
    }

    try {
      const row = this.deps.db.transaction(tx => {
        const provider = findOrCreateProvider(tx, namespace, name);
        if (getProviderVersion(tx, provider.id, parsed.version)) {
          throw new ConflictError(`Provider version already exists: ${namespace.name}/${name} ${parsed.version}`);
        }
        const inserted = insertProviderVersion(tx, {
          provider_id: provider.id,
          version: parsed.version,
          beta: parsed.beta,
          gpg_key_id: gpgKey.id,
          protocol_versions: JSON.stringify(protocols),
          shasums_blob_ref: shasumsKey,
          shasums_signature_blob_ref: signatureKey,
        });
        for (const binary of binaries) {
          insertProviderBinary(tx, {
            provider_version_id: inserted.id,
            os: binary.os,
            arch: binary.arch,
            filename: binary.filename,
            sha256: binary.sha256,
            blob_ref: StorageLayout.providerBinary(namespace.name, name, parsed.version, binary.os, binary.arch),
          });
        }
        insertAuditHistory(tx, {
          username: actorName(actor),
          action: 'PROVIDER_VERSION_INDEX',
          object_type: 'provider_version',
          object_id: `${namespace.name}/${name}/${parsed.version}`,
        });
        return inserted;
      });
      logger.info(
        `[providers] Indexed ${namespace.name}/${name} ${parsed.version} with ${binaries.length} platform builds`
      );
      return row;
    } catch (err) {
      await this.deps.storage
        .deletePrefix(StorageLayout.providerVersionPrefix(namespace.name, name, parsed.version))
        .catch(cleanupErr => {
          logger.warn({ err: cleanupErr }, `[providers] Could not remove files of failed upload ${prefix}`);
        });
      throw err;
    }
  }

  private readProtocols(manifest: Buffer | undefined): string[] {
    if (!manifest) return DEFAULT_PROTOCOLS;
    let raw: unknown;
    try {
      raw = JSON.parse(manifest.toString('utf-8'));
    } catch {
      throw new InvalidInputError('Release manifest is not valid JSON');
    }
    const parsed = ReleaseManifestSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidInputError('Release manifest is invalid', { issues: parsed.error.issues.map(i => i.message) });
    }
    return parsed.data.metadata?.protocol_versions ?? DEFAULT_PROTOCOLS;
  }
}
