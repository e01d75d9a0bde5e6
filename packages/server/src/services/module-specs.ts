/**
 * Module specs serialization
 *
 * Builds the `root` / `submodules` / `examples` blocks of module detail
 * responses from the terraform-docs JSON stored at ingestion.
 */

import path from 'path';
import { logger } from '@terrashelf/core';
import type {
  ModuleInput,
  ModuleOutput,
  ModuleProviderDependency,
  ModuleResource,
  ModuleSpecs,
} from '@terrashelf/protocol';
import { TerraformDocsSchema, type TerraformDocs } from '../ingestion/analyzers.js';

/**
 * Parse a stored terraform-docs document; unreadable data counts as empty
 */
export function parseStoredDocs(raw: string | null): TerraformDocs | null {
  if (raw === null) return null;
  try {
    const parsed = TerraformDocsSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch (err) {
    logger.warn({ err }, '[registry] Stored terraform-docs output is not valid JSON');
    return null;
  }
}

function inputsOf(docs: TerraformDocs | null): ModuleInput[] {
  return (docs?.inputs ?? []).map(input => ({
    name: input.name,
    type: input.type ?? 'any',
    description: input.description ?? null,
    default: input.default ?? null,
    required: input.required ?? false,
  }));
}

function outputsOf(docs: TerraformDocs | null): ModuleOutput[] {
  return (docs?.outputs ?? []).map(output => ({
    name: output.name,
    description: output.description ?? null,
  }));
}

/**
 * `hashicorp` is assumed when the provider name carries no namespace
 */
function providerDependenciesOf(docs: TerraformDocs | null): ModuleProviderDependency[] {
  return (docs?.providers ?? []).map(provider => {
    const [first, ...rest] = provider.name.split('/');
    const qualified = rest.length > 0;
    return {
      name: qualified ? rest.join('/') : provider.name,
      namespace: qualified ? (first ?? 'hashicorp') : 'hashicorp',
      source: '',
      version: provider.version ?? '',
    };
  });
}

/** Remote module calls; local `./` and `../` sources are not dependencies */
function dependenciesOf(docs: TerraformDocs | null): Array<{ name: string; source: string; version: string | null }> {
  return (docs?.modules ?? [])
    .filter(call => {
      const source = call.source ?? '';
      return !source.startsWith('./') && !source.startsWith('../');
    })
    .map(call => ({ name: call.name, source: call.source ?? '', version: call.version ?? null }));
}

function resourcesOf(docs: TerraformDocs | null): ModuleResource[] {
  return (docs?.resources ?? []).map(resource => ({ name: resource.name, type: resource.type }));
}

export interface SpecsSource {
  path: string;
  readme_text: string | null;
  terraform_docs: string | null;
}

export function buildModuleSpecs(source: SpecsSource): ModuleSpecs {
  const docs = parseStoredDocs(source.terraform_docs);
  return {
    path: source.path,
    name: source.path === '' ? '' : path.posix.basename(source.path),
    readme: source.readme_text ?? '',
    empty: docs === null,
    inputs: inputsOf(docs),
    outputs: outputsOf(docs),
    dependencies: dependenciesOf(docs),
    provider_dependencies: providerDependenciesOf(docs),
    resources: resourcesOf(docs),
  };
}
