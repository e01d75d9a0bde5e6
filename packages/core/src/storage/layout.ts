/**
 * Canonical storage layout under the data directory
 *
 * ```
 * modules/<namespace>/<module>/<provider>/<version>/source.{tar.gz|zip}
 * providers/<namespace>/<provider>/<version>/<os>_<arch>.zip
 * upload/<opaque>
 * ```
 */

import { safeJoinPaths } from './safe-join.js';

export type ModuleArchiveFormat = 'tar.gz' | 'zip';

export const StorageLayout = {
  moduleVersionPrefix(namespace: string, module: string, provider: string, version: string): string {
    return safeJoinPaths('modules', namespace, module, provider, version);
  },

  moduleArchive(
    namespace: string,
    module: string,
    provider: string,
    version: string,
    format: ModuleArchiveFormat
  ): string {
    return safeJoinPaths('modules', namespace, module, provider, version, `source.${format}`);
  },

  /** Large module files, keyed by the owning version row so re-ingestion never collides */
  moduleFileBlob(
    namespace: string,
    module: string,
    provider: string,
    version: string,
    moduleVersionId: number,
    filePath: string
  ): string {
    return safeJoinPaths('modules', namespace, module, provider, version, 'files', String(moduleVersionId), filePath);
  },

  moduleFilePrefix(
    namespace: string,
    module: string,
    provider: string,
    version: string,
    moduleVersionId: number
  ): string {
    return safeJoinPaths('modules', namespace, module, provider, version, 'files', String(moduleVersionId));
  },

  providerVersionPrefix(namespace: string, provider: string, version: string): string {
    return safeJoinPaths('providers', namespace, provider, version);
  },

  providerBinary(namespace: string, provider: string, version: string, os: string, arch: string): string {
    return safeJoinPaths('providers', namespace, provider, version, `${os}_${arch}.zip`);
  },

  providerShasums(namespace: string, provider: string, version: string): string {
    return safeJoinPaths('providers', namespace, provider, version, 'SHA256SUMS');
  },

  providerShasumsSignature(namespace: string, provider: string, version: string): string {
    return safeJoinPaths('providers', namespace, provider, version, 'SHA256SUMS.sig');
  },

  upload(opaque: string): string {
    return safeJoinPaths('upload', opaque);
  },
} as const;
