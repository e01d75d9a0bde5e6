import fs from 'fs/promises';
import path from 'path';
import { ExternalToolError, InvalidInputError, type ArchiveEntry } from '@terrashelf/core';
import type { SystemCommandService } from './command-service.js';

export interface CloneOptions {
  url: string;
  /** Tag or branch to check out */
  ref: string;
  /** Empty directory to clone into */
  destination: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Render a module provider URL template
 */
export function renderRepositoryUrl(
  template: string,
  address: { namespace: string; module: string; provider: string }
): string {
  return template
    .replaceAll('{namespace}', address.namespace)
    .replaceAll('{module}', address.module)
    .replaceAll('{provider}', address.provider);
}

/**
 * Shallow clone of a single ref
 *
 * @returns the commit SHA that was checked out, when git reports one
 */
export async function cloneRepository(commands: SystemCommandService, options: CloneOptions): Promise<string | null> {
  // Option-like values would be parsed by git as flags
  if (options.url.startsWith('-') || options.ref.startsWith('-')) {
    throw new InvalidInputError('Git URL and ref may not start with "-"');
  }
  // Local paths and transports such as file:// or ext:: are never cloned
  if (!/^(https?|ssh):\/\//i.test(options.url)) {
    throw new InvalidInputError('Git URL must use http, https or ssh');
  }

  const env = { GIT_TERMINAL_PROMPT: '0', GIT_SSH_COMMAND: 'ssh -o BatchMode=yes -o StrictHostKeyChecking=accept-new' };
  const signalOption = options.signal ? { signal: options.signal } : {};

  const clone = await commands.run(
    'git',
    ['clone', '--depth', '1', '--single-branch', '--branch', options.ref, '--', options.url, options.destination],
    { cwd: path.dirname(options.destination), timeoutMs: options.timeoutMs, env, ...signalOption }
  );
  if (clone.exitCode !== 0) {
    throw new ExternalToolError(`git clone failed: ${clone.stderr.trim().slice(0, 500)}`);
  }

  const head = await commands.run('git', ['rev-parse', 'HEAD'], {
    cwd: options.destination,
    timeoutMs: options.timeoutMs,
    env,
    ...signalOption,
  });
  const sha = head.stdout.trim();
  return head.exitCode === 0 && /^[0-9a-f]{40,64}$/.test(sha) ? sha : null;
}

/**
 * Read every regular file under `root` as archive entries. `.git` is skipped
 * and symbolic links are not followed.
 */
export async function readDirectoryTree(root: string, maxBytes: number): Promise<ArchiveEntry[]> {
  const entries: ArchiveEntry[] = [];
  let total = 0;

  const walk = async (relative: string): Promise<void> => {
    const directory = relative === '' ? root : path.join(root, relative);
    for (const dirent of await fs.readdir(directory, { withFileTypes: true })) {
      if (dirent.name === '.git') continue;
      const entryPath = relative === '' ? dirent.name : `${relative}/${dirent.name}`;

      if (dirent.isDirectory()) {
        await walk(entryPath);
      } else if (dirent.isFile()) {
        const absolute = path.join(root, entryPath);
        const [data, stats] = await Promise.all([fs.readFile(absolute), fs.stat(absolute)]);
        total += data.length;
        if (total > maxBytes) {
          throw new InvalidInputError(`Repository exceeds the ${maxBytes} byte limit`);
        }
        entries.push({ path: entryPath, type: 'file', mode: stats.mode & 0o777, data });
      }
    }
  };

  await walk('');
  return entries.sort((a, b) => a.path.localeCompare(b.path));
}
