/**
 * Module source tree
 *
 * Works on the file entries of an extracted archive or clone: applies
 * `.terraformignore`, finds submodules and examples, and reads the metadata
 * file and README descriptions.
 */

import path from 'path';
import { z } from 'zod';
import { logger, type ArchiveEntry } from '@terrashelf/core';

export const TERRAFORM_IGNORE_FILE = '.terraformignore';

/** Exclusions terraform applies whether or not an ignore file exists */
const DEFAULT_IGNORE_PATTERNS = ['**/.git/**', '**/.terraform/**'];

export interface TreeLayout {
  modulesDirectory: string;
  examplesDirectory: string;
}

/**
 * Directory holding at least one `.tf` file
 */
export interface ModuleDirectory {
  path: string;
  readme: string | null;
}

export interface IgnoreRule {
  pattern: string;
  /** `!pattern`: re-include what earlier rules excluded */
  negated: boolean;
  regex: RegExp;
}

/**
 * Pattern lines of a `.terraformignore` file: split on newlines only,
 * trimmed, comments and blank lines dropped
 */
export function parseTerraformIgnore(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

function globToRegExp(glob: string): RegExp {
  let source = '';
  for (let i = 0; i < glob.length; i++) {
    const char = glob.charAt(i);
    if (char === '*' && glob.charAt(i + 1) === '*') {
      if (glob.charAt(i + 2) === '/') {
        source += '(?:.*/)?';
        i += 2;
      } else {
        source += '.*';
        i += 1;
      }
    } else if (char === '*') {
      source += '[^/]*';
    } else if (char === '?') {
      source += '[^/]';
    } else {
      source += char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

/**
 * Compile one ignore pattern the way terraform does: a trailing `/` covers
 * everything below the directory, a leading `/` anchors at the root and any
 * other pattern may match at any depth.
 */
export function compileIgnoreRule(line: string): IgnoreRule {
  let pattern = line;
  const negated = pattern.startsWith('!');
  if (negated) pattern = pattern.slice(1);
  if (pattern.endsWith('/')) pattern = `${pattern}**`;
  pattern = pattern.startsWith('/') ? pattern.slice(1) : `**/${pattern}`;
  return { pattern, negated, regex: globToRegExp(pattern) };
}

/**
 * True when the last rule matching the path, or one of its parent
 * directories, excludes it
 */
export function isIgnored(filePath: string, rules: readonly IgnoreRule[]): boolean {
  const segments = filePath.split('/');
  const candidates = segments.map((_, index) => segments.slice(0, index + 1).join('/'));

  let ignored = false;
  for (const rule of rules) {
    if (candidates.some(candidate => rule.regex.test(candidate))) {
      ignored = !rule.negated;
    }
  }
  return ignored;
}

/**
 * Drop ignored files. The ignore file itself is kept so that archives
 * rebuilt from the tree behave the same way in terraform.
 */
export function applyTerraformIgnore(files: readonly ArchiveEntry[]): ArchiveEntry[] {
  const rules: IgnoreRule[] = DEFAULT_IGNORE_PATTERNS.map(pattern => ({
    pattern,
    negated: false,
    regex: globToRegExp(pattern),
  }));

  const ignoreFile = files.find(file => file.path === TERRAFORM_IGNORE_FILE);
  if (ignoreFile) {
    const patterns = parseTerraformIgnore(ignoreFile.data.toString('utf-8'));
    rules.push(...patterns.map(compileIgnoreRule));
    logger.debug(`[ingest] Applying ${patterns.length} .terraformignore patterns`);
  }
  return files.filter(file => file.path === TERRAFORM_IGNORE_FILE || !isIgnored(file.path, rules));
}

/**
 * Restrict a tree to a sub-directory and re-root it there
 */
export function rerootTree(files: readonly ArchiveEntry[], subdirectory: string | null): ArchiveEntry[] {
  const prefix = (subdirectory ?? '').replace(/^\/+|\/+$/g, '');
  if (prefix === '' || prefix === '.') return [...files];
  return files
    .filter(file => file.path.startsWith(`${prefix}/`))
    .map(file => ({ ...file, path: file.path.slice(prefix.length + 1) }));
}

function isTerraformFile(filePath: string): boolean {
  return filePath.endsWith('.tf');
}

function readmeIn(files: readonly ArchiveEntry[], directory: string): string | null {
  const readmePath = directory === '' ? 'README.md' : `${directory}/README.md`;
  const readme = files.find(file => file.path === readmePath);
  return readme ? readme.data.toString('utf-8') : null;
}

/**
 * Direct children of `parent` that contain a `.tf` file, sorted by path
 */
export function findModuleDirectories(files: readonly ArchiveEntry[], parent: string): ModuleDirectory[] {
  const base = parent.replace(/^\/+|\/+$/g, '');
  const directories = new Set<string>();

  for (const file of files) {
    if (!isTerraformFile(file.path) || !file.path.startsWith(`${base}/`)) continue;
    const directory = path.posix.dirname(file.path);
    // Only files directly inside modules/<name>/ count
    if (path.posix.dirname(directory) === base) {
      directories.add(directory);
    }
  }

  return [...directories].sort().map(directory => ({ path: directory, readme: readmeIn(files, directory) }));
}

export interface ModuleCatalog {
  root: ModuleDirectory;
  submodules: ModuleDirectory[];
  examples: ModuleDirectory[];
}

export function catalogTree(files: readonly ArchiveEntry[], layout: TreeLayout): ModuleCatalog {
  return {
    root: { path: '', readme: readmeIn(files, '') },
    submodules: findModuleDirectories(files, layout.modulesDirectory),
    examples: findModuleDirectories(files, layout.examplesDirectory),
  };
}

/**
 * Terraform files of an example, relative to the repository root
 */
export function exampleFiles(files: readonly ArchiveEntry[], examplePath: string): ArchiveEntry[] {
  return files.filter(
    file => isTerraformFile(file.path) && path.posix.dirname(file.path) === examplePath
  );
}

// ============================================================================
// Metadata
// ============================================================================

export const VariableTemplateSchema = z.array(
  z.object({
    name: z.string(),
    type: z.string().optional(),
    required: z.boolean().optional(),
    quote_value: z.boolean().optional(),
    additional_help: z.string().optional(),
    default_value: z.unknown().optional(),
  })
);

export const MetadataFileSchema = z.object({
  description: z.string().optional(),
  owner: z.string().optional(),
  repo_clone_url: z.string().optional(),
  repo_base_url: z.string().optional(),
  repo_browse_url: z.string().optional(),
  variable_template: VariableTemplateSchema.optional(),
});

export type ModuleMetadata = z.infer<typeof MetadataFileSchema>;

const METADATA_FILES = ['terrareg.json', '.terrareg.json'];

/**
 * Read the first metadata file present at the root
 *
 * @returns parsed metadata and a warning when the file is unusable
 */
export function readMetadata(files: readonly ArchiveEntry[]): { metadata: ModuleMetadata; warning: string | null } {
  for (const name of METADATA_FILES) {
    const file = files.find(entry => entry.path === name);
    if (!file) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(file.data.toString('utf-8'));
    } catch (err) {
      logger.warn({ err }, `[ingest] ${name} is not valid JSON`);
      return { metadata: {}, warning: `${name} is not valid JSON and was ignored` };
    }
    const parsed = MetadataFileSchema.safeParse(raw);
    if (!parsed.success) {
      return { metadata: {}, warning: `${name} has an unexpected shape and was ignored` };
    }
    return { metadata: parsed.data, warning: null };
  }
  return { metadata: {}, warning: null };
}

/**
 * First usable README line, trimmed to whole sentences.
 *
 * Headings and lines with links or e-mail addresses are skipped. Sentences
 * are added while the text stays under 80 characters (130 for the first).
 */
export function descriptionFromReadme(readme: string | null): string | null {
  if (!readme) return null;

  for (const rawLine of readme.split('\n')) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) continue;
    if (line.includes('http://') || line.includes('https://') || line.includes('@')) continue;

    let description = '';
    for (const rawSentence of line.split('. ')) {
      const sentence = rawSentence.trim();
      const next = description === '' ? sentence : `${description}. ${sentence}`;
      if ((next !== '' && next.length >= 80 && description !== '') || (description === '' && next.length >= 130)) {
        break;
      }
      description = next;
    }

    if (description !== '') {
      return description;
    }
  }
  return null;
}
