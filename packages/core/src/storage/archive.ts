/**
 * Archive codec
 *
 * Reads gzip-tar and zip archives into memory entries and writes the canonical
 * `source.tar.gz` / `source.zip` artifacts. Every entry path is normalised and
 * checked so that nothing can land outside the extraction root.
 */

import path from 'path';
import zlib from 'zlib';
import { pack as tarPack, extract as tarExtract, type Headers } from 'tar-stream';
import { unzipSync, zipSync, type Zippable } from 'fflate';
import { InvalidInputError, PathTraversalError } from '../utils/errors.js';
import type { ModuleArchiveFormat } from './layout.js';

export interface ArchiveEntry {
  /** Root-relative POSIX path, no leading slash */
  path: string;
  type: 'file' | 'directory';
  mode: number;
  data: Buffer;
}

export interface ArchiveFile {
  path: string;
  data: Buffer;
  mode?: number;
}

export interface ReadArchiveOptions {
  /** Upper bound on the total uncompressed size */
  maxBytes: number;
}

/**
 * Sniff the archive format from magic bytes
 */
export function detectArchiveFormat(data: Buffer): ModuleArchiveFormat | null {
  if (data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b) {
    return 'tar.gz';
  }
  if (
    data.length >= 4 &&
    data[0] === 0x50 &&
    data[1] === 0x4b &&
    (data[2] === 0x03 || data[2] === 0x05) &&
    (data[3] === 0x04 || data[3] === 0x06)
  ) {
    return 'zip';
  }
  return null;
}

/**
 * Normalise an archive entry name.
 *
 * @returns the root-relative path, or null for the root itself
 * @throws PathTraversalError when the entry is absolute or escapes the root
 */
export function normalizeArchivePath(name: string): string | null {
  const unified = name.replace(/\\/g, '/');
  if (unified.startsWith('/') || /^[a-zA-Z]:\//.test(unified)) {
    throw new PathTraversalError(`Archive entry has an absolute path: ${name}`);
  }
  const normalized = path.posix.normalize(unified).replace(/\/+$/, '');
  if (normalized === '..' || normalized.startsWith('../')) {
    throw new PathTraversalError(`Archive entry escapes the extraction root: ${name}`);
  }
  if (normalized === '.' || normalized === '') {
    return null;
  }
  return normalized;
}

/**
 * Read every entry of a gzip-tar or zip archive
 */
export async function readArchive(data: Buffer, options: ReadArchiveOptions): Promise<ArchiveEntry[]> {
  const format = detectArchiveFormat(data);
  if (format === 'tar.gz') {
    return readTarGz(data, options);
  }
  if (format === 'zip') {
    return readZip(data, options);
  }
  throw new InvalidInputError('Archive is neither gzip-compressed tar nor zip');
}

/**
 * Iterate archive entries (files only, directories are implied by paths)
 */
export async function* streamArchiveEntries(
  data: Buffer,
  options: ReadArchiveOptions
): AsyncGenerator<ArchiveEntry> {
  for (const entry of await readArchive(data, options)) {
    if (entry.type === 'file') {
      yield entry;
    }
  }
}

function readTarGz(data: Buffer, options: ReadArchiveOptions): Promise<ArchiveEntry[]> {
  return new Promise<ArchiveEntry[]>((resolve, reject) => {
    const extract = tarExtract();
    const entries: ArchiveEntry[] = [];
    let total = 0;
    let failed = false;

    const fail = (error: Error) => {
      if (failed) return;
      failed = true;
      extract.destroy();
      reject(error);
    };

    extract.on('entry', (header: Headers, stream, next) => {
      let entryPath: string | null;
      try {
        entryPath = normalizeArchivePath(header.name);
        if (header.type === 'symlink' || header.type === 'link') {
          const target = header.linkname ?? '';
          const base = entryPath ? path.posix.dirname(entryPath) : '.';
          const resolved = header.type === 'link' ? target : path.posix.join(base, target);
          normalizeArchivePath(resolved);
        }
      } catch (error) {
        stream.resume();
        fail(error instanceof Error ? error : new Error(String(error)));
        return;
      }

      // Links and special files are not materialised
      if (entryPath === null || (header.type !== 'file' && header.type !== 'directory' && header.type !== 'contiguous-file')) {
        stream.on('end', next);
        stream.resume();
        return;
      }

      if (header.type === 'directory') {
        entries.push({ path: entryPath, type: 'directory', mode: header.mode ?? 0o755, data: Buffer.alloc(0) });
        stream.on('end', next);
        stream.resume();
        return;
      }

      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => {
        total += chunk.length;
        if (total > options.maxBytes) {
          fail(new InvalidInputError(`Archive exceeds the ${options.maxBytes} byte limit`));
          return;
        }
        chunks.push(chunk);
      });
      stream.on('end', () => {
        entries.push({
          path: entryPath ?? '',
          type: 'file',
          mode: header.mode ?? 0o644,
          data: Buffer.concat(chunks),
        });
        next();
      });
    });

    extract.on('finish', () => {
      if (!failed) resolve(entries);
    });
    extract.on('error', (error: Error) => fail(new InvalidInputError(`Unreadable tar archive: ${error.message}`)));

    const gunzip = zlib.createGunzip();
    gunzip.on('error', (error: Error) => fail(new InvalidInputError(`Unreadable gzip stream: ${error.message}`)));
    gunzip.pipe(extract);
    gunzip.end(data);
  });
}

async function readZip(data: Buffer, options: ReadArchiveOptions): Promise<ArchiveEntry[]> {
  let files: Record<string, Uint8Array>;
  // Sizes come from the central directory, so the limit holds before anything inflates
  let declared = 0;
  let oversized = false;
  try {
    files = unzipSync(new Uint8Array(data), {
      filter: file => {
        declared += file.originalSize;
        if (declared > options.maxBytes) oversized = true;
        return !oversized;
      },
    });
  } catch (error) {
    throw new InvalidInputError(
      `Unreadable zip archive: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (oversized) {
    throw new InvalidInputError(`Archive exceeds the ${options.maxBytes} byte limit`);
  }

  const entries: ArchiveEntry[] = [];
  let total = 0;
  for (const [name, content] of Object.entries(files)) {
    const entryPath = normalizeArchivePath(name);
    if (entryPath === null) continue;
    if (name.endsWith('/')) {
      entries.push({ path: entryPath, type: 'directory', mode: 0o755, data: Buffer.alloc(0) });
      continue;
    }
    total += content.length;
    if (total > options.maxBytes) {
      throw new InvalidInputError(`Archive exceeds the ${options.maxBytes} byte limit`);
    }
    entries.push({ path: entryPath, type: 'file', mode: 0o644, data: Buffer.from(content) });
  }
  return entries;
}

/**
 * Build a gzip-compressed tar from files (sorted for reproducible output)
 */
export function createTarGz(files: readonly ArchiveFile[]): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const archive = tarPack();
    const gzip = zlib.createGzip();
    const chunks: Buffer[] = [];

    gzip.on('data', (chunk: Buffer) => chunks.push(chunk));
    gzip.on('end', () => resolve(Buffer.concat(chunks)));
    gzip.on('error', reject);
    archive.on('error', reject);
    archive.pipe(gzip);

    const sorted = [...files].sort((a, b) => a.path.localeCompare(b.path));
    for (const file of sorted) {
      archive.entry({ name: file.path, mode: file.mode ?? 0o644, size: file.data.length }, file.data);
    }
    archive.finalize();
  });
}

/**
 * Build a zip from files
 */
export function createZip(files: readonly ArchiveFile[]): Buffer {
  const zippable: Zippable = {};
  for (const file of files) {
    zippable[file.path] = new Uint8Array(file.data);
  }
  return Buffer.from(zipSync(zippable, { level: 6 }));
}
