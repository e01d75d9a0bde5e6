/**
 * Identifier validation
 *
 * Names arrive from URLs and upload forms and end up in storage paths, so
 * every one is checked here before it reaches a repository or StorageLayout.
 */

import { z } from 'zod';
import { InvalidInputError } from '../utils/errors.js';

const IDENTIFIER = /^[0-9a-zA-Z][0-9a-zA-Z\-_]*[0-9A-Za-z]$/;

export const NamespaceNameSchema = z
  .string()
  .regex(
    IDENTIFIER,
    'Namespace name is invalid - it can only contain alpha-numeric characters, hyphens and underscores, and must start/end with an alphanumeric character'
  )
  .refine(name => !name.includes('__'), 'Namespace name is invalid - sequential underscores are not allowed');

export const ModuleNameSchema = z.string().regex(IDENTIFIER, 'Module name is invalid');

export const ProviderNameSchema = z.string().regex(/^[0-9a-z]+$/, 'Provider name is invalid');

export const ProviderOperatingSystems = ['linux', 'darwin', 'windows', 'freebsd', 'openbsd', 'solaris'] as const;
export const ProviderArchitectures = ['amd64', 'arm64', 'arm', '386'] as const;

export type ProviderOperatingSystem = (typeof ProviderOperatingSystems)[number];
export type ProviderArchitecture = (typeof ProviderArchitectures)[number];

function check<T>(schema: z.ZodType<T>, value: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError(result.error.issues[0]?.message ?? 'Invalid value', { value });
  }
  return result.data;
}

/** @throws InvalidInputError */
export function validateNamespaceName(name: string): string {
  return check(NamespaceNameSchema, name);
}

/** @throws InvalidInputError */
export function validateModuleName(name: string): string {
  return check(ModuleNameSchema, name);
}

/** @throws InvalidInputError */
export function validateProviderName(name: string): string {
  return check(ProviderNameSchema, name);
}

/**
 * Validate the (namespace, module, provider) triple of a module address
 */
export function validateModuleAddress(namespace: string, module: string, provider: string): void {
  validateNamespaceName(namespace);
  validateModuleName(module);
  validateProviderName(provider);
}

// ===== Git tag formats =====

const TAG_PLACEHOLDERS = ['{version}', '{major}', '{minor}', '{patch}'] as const;

/**
 * A tag format must contain `{version}` or at least one of `{major}`,
 * `{minor}`, `{patch}`, and no other placeholders.
 *
 * @throws InvalidInputError
 */
export function validateGitTagFormat(format: string): string {
  if (!TAG_PLACEHOLDERS.some(placeholder => format.includes(placeholder))) {
    throw new InvalidInputError(
      'Invalid git tag format. Must contain one placeholder: {version}, {major}, {minor}, {patch}.'
    );
  }
  const unknown = format.match(/\{[^}]*\}/g)?.filter(token => !TAG_PLACEHOLDERS.some(p => p === token)) ?? [];
  if (unknown.length > 0) {
    throw new InvalidInputError(`Invalid git tag format placeholder: ${unknown[0]}`);
  }
  return format;
}

/**
 * Substitute a version into a tag format
 */
export function renderGitTag(
  format: string,
  version: { version: string; major: number; minor: number; patch: number }
): string {
  return format
    .replaceAll('{version}', version.version)
    .replaceAll('{major}', String(version.major))
    .replaceAll('{minor}', String(version.minor))
    .replaceAll('{patch}', String(version.patch));
}

// ===== Provider binaries =====

export interface ProviderBinaryName {
  os: ProviderOperatingSystem;
  arch: ProviderArchitecture;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Parse `terraform-provider-<name>_<version>_<os>_<arch>.zip`
 *
 * @throws InvalidInputError for foreign names, operating systems or architectures
 */
export function parseProviderBinaryFilename(filename: string, provider: string, version: string): ProviderBinaryName {
  const pattern = new RegExp(
    `^${escapeRegExp(`terraform-provider-${provider}_${version}_`)}([0-9a-z]+)_([0-9a-z]+)\\.zip$`
  );
  const match = pattern.exec(filename);
  const osName = match?.[1];
  const archName = match?.[2];
  if (osName === undefined || archName === undefined) {
    throw new InvalidInputError('Provider binary is not a valid name', { filename });
  }
  const os = ProviderOperatingSystems.find(candidate => candidate === osName);
  if (!os) {
    throw new InvalidInputError('Invalid operating system in provider binary', { filename });
  }
  const arch = ProviderArchitectures.find(candidate => candidate === archName);
  if (!arch) {
    throw new InvalidInputError('Invalid architecture in provider binary', { filename });
  }
  return { os, arch };
}
