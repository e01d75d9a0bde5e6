/**
 * External analyzers
 *
 * Each analyzer runs one tool through the SystemCommandService and returns a
 * result value. Failures never propagate into the pipeline: the caller
 * records a warning and stores no data for that analyzer.
 */

import { z } from 'zod';
import { logger } from '@terrashelf/core';
import type { ModuleGraph } from '@terrashelf/protocol';
import type { SystemCommandService } from './command-service.js';
import { parseDotGraph } from './graph.js';

export type AnalyzerResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface AnalyzerContext {
  commands: SystemCommandService;
  /** Absolute directory to analyze */
  cwd: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

// ============================================================================
// terraform-docs
// ============================================================================

export const TerraformDocsSchema = z.object({
  header: z.string().nullish(),
  inputs: z
    .array(
      z.object({
        name: z.string(),
        type: z.string().nullish(),
        description: z.string().nullish(),
        default: z.unknown(),
        required: z.boolean().nullish(),
      })
    )
    .nullish(),
  outputs: z
    .array(
      z.object({
        name: z.string(),
        description: z.string().nullish(),
        sensitive: z.boolean().nullish(),
      })
    )
    .nullish(),
  providers: z
    .array(
      z.object({
        name: z.string(),
        alias: z.string().nullish(),
        version: z.string().nullish(),
      })
    )
    .nullish(),
  requirements: z
    .array(
      z.object({
        name: z.string(),
        version: z.string().nullish(),
      })
    )
    .nullish(),
  resources: z
    .array(
      z.object({
        type: z.string(),
        name: z.string(),
        provider: z.string().nullish(),
        source: z.string().nullish(),
        mode: z.string().nullish(),
        version: z.string().nullish(),
      })
    )
    .nullish(),
  modules: z
    .array(
      z.object({
        name: z.string(),
        source: z.string().nullish(),
        version: z.string().nullish(),
      })
    )
    .nullish(),
});

export type TerraformDocs = z.infer<typeof TerraformDocsSchema>;

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function runJsonTool<T>(
  name: string,
  context: AnalyzerContext,
  command: string,
  args: readonly string[],
  schema: z.ZodType<T>,
  env?: Record<string, string>
): Promise<AnalyzerResult<T>> {
  let output: string;
  try {
    const result = await context.commands.run(command, args, {
      cwd: context.cwd,
      timeoutMs: context.timeoutMs,
      ...(env ? { env } : {}),
      ...(context.signal ? { signal: context.signal } : {}),
    });
    if (result.exitCode !== 0) {
      return { ok: false, error: `${name} exited with status ${result.exitCode}: ${result.stderr.trim().slice(0, 500)}` };
    }
    output = result.stdout;
  } catch (error) {
    return { ok: false, error: `${name} failed: ${describeFailure(error)}` };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(output);
  } catch {
    return { ok: false, error: `${name} produced output that is not JSON` };
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: `${name} produced unexpected JSON` };
  }
  return { ok: true, value: parsed.data };
}

export function runTerraformDocs(context: AnalyzerContext): Promise<AnalyzerResult<TerraformDocs>> {
  return runJsonTool('terraform-docs', context, 'terraform-docs', ['json', '--sort=false', '.'], TerraformDocsSchema);
}

// ============================================================================
// tfsec
// ============================================================================

const TfsecOutputSchema = z.object({
  results: z.array(z.record(z.unknown())).nullable(),
});

export type SecurityResults = Array<Record<string, unknown>>;

export async function runTfsec(context: AnalyzerContext): Promise<AnalyzerResult<SecurityResults>> {
  const result = await runJsonTool(
    'tfsec',
    context,
    'tfsec',
    [
      '--ignore-hcl-errors',
      '--format',
      'json',
      '--no-module-downloads',
      '--soft-fail',
      '--no-colour',
      '--include-ignored',
      '--include-passed',
      '--disable-grouping',
      '.',
    ],
    TfsecOutputSchema
  );
  return result.ok ? { ok: true, value: result.value.results ?? [] } : result;
}

// ============================================================================
// infracost
// ============================================================================

const InfracostOutputSchema = z.record(z.unknown());

export type CostBreakdown = Record<string, unknown>;

export function runInfracost(context: AnalyzerContext, apiKey: string): Promise<AnalyzerResult<CostBreakdown>> {
  return runJsonTool(
    'infracost',
    context,
    'infracost',
    ['breakdown', '--path', '.', '--format', 'json', '--no-color'],
    InfracostOutputSchema,
    { INFRACOST_API_KEY: apiKey, INFRACOST_SKIP_UPDATE_CHECK: 'true' }
  );
}

// ============================================================================
// terraform init / graph / version
// ============================================================================

export interface TerraformRunOptions {
  /** Environment for terraform (registry credentials) */
  env: Record<string, string>;
  lockTimeoutSeconds: number;
}

/**
 * Environment variable terraform reads a registry token from
 * (`TF_TOKEN_<host>`, dots as `_`, hyphens as `__`)
 */
export function terraformTokenVariable(publicUrl: string): string {
  const host = new URL(publicUrl).hostname.replace(/-/g, '__').replace(/\./g, '_');
  return `TF_TOKEN_${host}`;
}

async function runTerraform(
  context: AnalyzerContext,
  args: readonly string[],
  options: TerraformRunOptions
): Promise<AnalyzerResult<string>> {
  try {
    const result = await context.commands.run('terraform', args, {
      cwd: context.cwd,
      timeoutMs: context.timeoutMs,
      env: { TF_IN_AUTOMATION: '1', TF_INPUT: '0', ...options.env },
      ...(context.signal ? { signal: context.signal } : {}),
    });
    if (result.exitCode !== 0) {
      return {
        ok: false,
        error: `terraform ${args[0] ?? ''} exited with status ${result.exitCode}: ${result.stderr.trim().slice(0, 500)}`,
      };
    }
    return { ok: true, value: result.stdout };
  } catch (error) {
    return { ok: false, error: `terraform ${args[0] ?? ''} failed: ${describeFailure(error)}` };
  }
}

/**
 * `terraform init` then `terraform graph`, parsed into adjacency JSON
 */
export async function runTerraformGraph(
  context: AnalyzerContext,
  options: TerraformRunOptions
): Promise<AnalyzerResult<ModuleGraph>> {
  const init = await runTerraform(
    context,
    ['init', '-backend=false', '-input=false', `-lock-timeout=${options.lockTimeoutSeconds}s`],
    options
  );
  if (!init.ok) return init;

  const graph = await runTerraform(context, ['graph'], options);
  if (!graph.ok) return graph;

  try {
    return { ok: true, value: parseDotGraph(graph.value) };
  } catch (error) {
    return { ok: false, error: `terraform graph output could not be parsed: ${describeFailure(error)}` };
  }
}

const TerraformVersionSchema = z.object({ terraform_version: z.string() });

export async function runTerraformVersion(
  context: AnalyzerContext,
  options: TerraformRunOptions
): Promise<AnalyzerResult<string>> {
  const output = await runTerraform(context, ['version', '-json'], options);
  if (!output.ok) return output;

  let raw: unknown;
  try {
    raw = JSON.parse(output.value);
  } catch {
    return { ok: false, error: 'terraform version produced output that is not JSON' };
  }
  const parsed = TerraformVersionSchema.safeParse(raw);
  return parsed.success
    ? { ok: true, value: parsed.data.terraform_version }
    : { ok: false, error: 'terraform version produced unexpected JSON' };
}

/**
 * Unwrap an analyzer result, logging and recording failures
 */
export function valueOrWarn<T>(result: AnalyzerResult<T>, subject: string, warnings: string[]): T | null {
  if (result.ok) return result.value;
  logger.warn(`[ingest] ${subject}: ${result.error}`);
  warnings.push(`${subject}: ${result.error}`);
  return null;
}
