/**
 * Storage abstraction
 *
 * Pluggable blob backends addressed by relative keys built with
 * `safeJoinPaths` / `StorageLayout`. The local filesystem backend is the only
 * one shipped; object stores implement the same interface.
 */

import fs from 'fs/promises';
import { createReadStream } from 'fs';
import path from 'path';
import type { Readable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { safeJoinPaths } from './safe-join.js';
import { readArchive, streamArchiveEntries, type ArchiveEntry } from './archive.js';
import { NotFoundError, RegistryError, StorageUnavailableError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export { safeJoinPaths, hasParentSegment } from './safe-join.js';
export { StorageLayout, type ModuleArchiveFormat } from './layout.js';
export {
  detectArchiveFormat,
  normalizeArchivePath,
  readArchive,
  streamArchiveEntries,
  createTarGz,
  createZip,
  type ArchiveEntry,
  type ArchiveFile,
  type ReadArchiveOptions,
} from './archive.js';

/**
 * Blob storage backend
 */
export interface StorageBackend {
  /** Backend identifier for logs */
  readonly id: string;

  /** Write a blob atomically (tempfile + rename or equivalent) */
  putBlob(key: string, data: Buffer): Promise<void>;

  /** Open a blob for reading; NotFoundError when absent */
  getBlob(key: string): Promise<Readable>;

  /** Read a whole blob into memory; NotFoundError when absent */
  readBlob(key: string): Promise<Buffer>;

  exists(key: string): Promise<boolean>;

  /** Remove a blob or everything under a prefix; missing keys are ignored */
  deletePrefix(key: string): Promise<void>;

  /** Iterate the file entries of an archive stored at `key` */
  streamIntoArchive(key: string, maxBytes: number): AsyncGenerator<ArchiveEntry>;
}

/**
 * Local filesystem backend rooted at the data directory
 */
export class LocalFilesystemStorage implements StorageBackend {
  readonly id = 'local';

  constructor(private readonly rootDir: string) {}

  /**
   * Resolve a key to an absolute path under the root
   */
  resolve(key: string): string {
    return safeJoinPaths(path.resolve(this.rootDir), key);
  }

  async putBlob(key: string, data: Buffer): Promise<void> {
    const target = this.resolve(key);
    const temp = `${target}.tmp-${uuidv4()}`;
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(temp, data, { mode: 0o640 });
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true }).catch(cleanupError => {
        logger.warn({ err: cleanupError }, `[storage] Could not remove temp file for ${key}`);
      });
      throw wrapStorageError(error, `write ${key}`);
    }
  }

  async getBlob(key: string): Promise<Readable> {
    const target = this.resolve(key);
    try {
      const stats = await fs.stat(target);
      if (!stats.isFile()) {
        throw new NotFoundError(`Blob not found: ${key}`);
      }
    } catch (error) {
      throw wrapStorageError(error, `open ${key}`);
    }
    return createReadStream(target);
  }

  async readBlob(key: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.resolve(key));
    } catch (error) {
      throw wrapStorageError(error, `read ${key}`);
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(key));
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw wrapStorageError(error, `stat ${key}`);
    }
  }

  async deletePrefix(key: string): Promise<void> {
    const target = this.resolve(key);
    if (path.resolve(target) === path.resolve(this.rootDir)) {
      throw new StorageUnavailableError('Refusing to delete the storage root');
    }
    try {
      await fs.rm(target, { recursive: true, force: true });
    } catch (error) {
      throw wrapStorageError(error, `delete ${key}`);
    }
  }

  async *streamIntoArchive(key: string, maxBytes: number): AsyncGenerator<ArchiveEntry> {
    const data = await this.readBlob(key);
    yield* streamArchiveEntries(data, { maxBytes });
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function wrapStorageError(error: unknown, action: string): RegistryError {
  if (error instanceof RegistryError) {
    return error;
  }
  if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
    return new NotFoundError(`Blob not found (${action})`);
  }
  logger.error({ err: error }, `[storage] Backend failure during ${action}`);
  return new StorageUnavailableError(`Storage backend failure during ${action}`);
}
