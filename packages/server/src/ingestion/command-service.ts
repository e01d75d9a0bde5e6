import { spawn } from 'child_process';
import { ExternalToolError, logger } from '@terrashelf/core';

/**
 * Only these system environment variables reach external tools
 */
export const SAFE_ENV_VARS = ['PATH', 'HOME', 'LANG', 'TZ', 'TMPDIR', 'USER'];

export interface CommandOptions {
  cwd: string;
  timeoutMs: number;
  /** Added on top of the safe environment */
  env?: Record<string, string>;
  /** Aborts the process (indexing deadline, request cancellation) */
  signal?: AbortSignal;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Seam around every external tool the ingestion pipeline runs
 * (git, terraform, terraform-docs, tfsec, infracost).
 */
export interface SystemCommandService {
  /**
   * Run a command to completion
   *
   * @throws ExternalToolError when the command cannot start, times out or is aborted
   */
  run(command: string, args: readonly string[], options: CommandOptions): Promise<CommandResult>;
}

/** Cap on captured output per stream */
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export class ChildProcessCommandService implements SystemCommandService {
  run(command: string, args: readonly string[], options: CommandOptions): Promise<CommandResult> {
    const env: Record<string, string> = {};
    for (const key of SAFE_ENV_VARS) {
      const value = process.env[key];
      if (value) {
        env[key] = value;
      }
    }
    Object.assign(env, options.env ?? {});

    return new Promise<CommandResult>((resolve, reject) => {
      if (options.signal?.aborted) {
        reject(new ExternalToolError(`${command} aborted before start`));
        return;
      }

      const child = spawn(command, [...args], {
        cwd: options.cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let stdoutBytes = 0;
      let stderrBytes = 0;
      let failure: ExternalToolError | null = null;

      const terminate = (error: ExternalToolError) => {
        if (failure) return;
        failure = error;
        child.kill('SIGKILL');
      };

      const timer = setTimeout(() => {
        terminate(new ExternalToolError(`${command} timed out after ${options.timeoutMs}ms`));
      }, options.timeoutMs);
      const onAbort = () => terminate(new ExternalToolError(`${command} aborted`));
      options.signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout.on('data', (chunk: Buffer) => {
        stdoutBytes += chunk.length;
        if (stdoutBytes <= MAX_OUTPUT_BYTES) stdout.push(chunk);
      });
      child.stderr.on('data', (chunk: Buffer) => {
        stderrBytes += chunk.length;
        if (stderrBytes <= MAX_OUTPUT_BYTES) stderr.push(chunk);
      });

      child.on('error', (err: Error) => {
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
        logger.warn({ err }, `[ingest] Could not start ${command}`);
        reject(new ExternalToolError(`${command} could not be started: ${err.message}`));
      });

      child.on('close', (code: number | null) => {
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
        if (failure) {
          reject(failure);
          return;
        }
        resolve({
          exitCode: code ?? 1,
          stdout: Buffer.concat(stdout).toString('utf-8'),
          stderr: Buffer.concat(stderr).toString('utf-8'),
        });
      });
    });
  }
}
