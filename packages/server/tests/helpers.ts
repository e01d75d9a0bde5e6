import os from 'os';
import path from 'path';
import fs from 'fs';
import type { FastifyInstance } from 'fastify';
import {
  createTarGz,
  resolveConfig,
  type ArchiveFile,
  type DatabaseClient,
  type ResolvedConfig,
} from '@terrashelf/core';
import type { FetchFunction, SamlVerifier } from '@terrashelf/authn-session';
import { RegistryServer } from '../src/server.js';
import type { CommandOptions, CommandResult, SystemCommandService } from '../src/ingestion/command-service.js';

export const PUBLIC_URL = 'https://registry.example.test';
export const ADMIN_TOKEN = 'test-admin';
export const UPLOAD_KEY = 'test-upload';
export const PUBLISH_KEY = 'test-publish';
export const IDP_ISSUER = 'https://idp.example.test';

export interface RecordedCommand {
  command: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
}

/**
 * Stands in for git, terraform and the analyzers. Answers in `outputs`, keyed
 * by `<command> <first argument>`, win; otherwise terraform-docs answers with
 * `docs`, a clone writes `repository` into the destination and every other
 * tool exits with status 1, which ingestion turns into a warning.
 */
export class FakeCommandService implements SystemCommandService {
  readonly calls: RecordedCommand[] = [];
  docs: unknown = {
    inputs: [{ name: 'cidr_block', type: 'string', description: 'VPC range', default: null, required: true }],
    outputs: [{ name: 'vpc_id', description: 'Created VPC' }],
    providers: [{ name: 'aws', version: '>= 5.0' }],
    resources: [{ type: 'aws_vpc', name: 'this' }],
    modules: [],
  };
  repository: Record<string, string> = { 'main.tf': 'resource "aws_vpc" "this" {}\n' };
  outputs: Record<string, CommandResult> = {};

  async run(command: string, args: readonly string[], options: CommandOptions): Promise<CommandResult> {
    this.calls.push({ command, args: [...args], cwd: options.cwd, env: { ...(options.env ?? {}) } });

    const scripted = this.outputs[`${command} ${args[0] ?? ''}`];
    if (scripted) {
      return scripted;
    }

    if (command === 'terraform-docs') {
      return { exitCode: 0, stdout: JSON.stringify(this.docs), stderr: '' };
    }
    if (command === 'git' && args[0] === 'clone') {
      const destination = args[args.length - 1] ?? options.cwd;
      for (const [file, content] of Object.entries(this.repository)) {
        const target = path.join(destination, file);
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, content);
      }
      return { exitCode: 0, stdout: '', stderr: '' };
    }
    if (command === 'git' && args[0] === 'rev-parse') {
      return { exitCode: 0, stdout: `${'a'.repeat(40)}\n`, stderr: '' };
    }
    return { exitCode: 1, stdout: '', stderr: `${command} is not available` };
  }
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

/**
 * In-process OpenID Connect provider: any code is accepted and identifies
 * the configured user
 */
export function fakeIdp(user: { sub: string; preferred_username: string; groups: string[] }): FetchFunction {
  return async input => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    if (url === `${IDP_ISSUER}/.well-known/openid-configuration`) {
      return jsonResponse({
        issuer: IDP_ISSUER,
        authorization_endpoint: `${IDP_ISSUER}/authorize`,
        token_endpoint: `${IDP_ISSUER}/token`,
        userinfo_endpoint: `${IDP_ISSUER}/userinfo`,
      });
    }
    if (url === `${IDP_ISSUER}/token`) {
      return jsonResponse({ access_token: 'test-access-token', token_type: 'Bearer', expires_in: 300 });
    }
    if (url === `${IDP_ISSUER}/userinfo`) {
      return jsonResponse(user);
    }
    return jsonResponse({}, 404);
  };
}

export const OIDC_ENV: Record<string, string> = {
  OPENID_CONNECT_ISSUER: IDP_ISSUER,
  OPENID_CONNECT_CLIENT_ID: 'registry',
  OPENID_CONNECT_CLIENT_SECRET: 'test-secret',
};

export interface TestRegistry {
  server: RegistryServer;
  fastify: FastifyInstance;
  db: DatabaseClient;
  config: ResolvedConfig;
  commands: FakeCommandService;
  dataDir: string;
  /** Moves the server clock (sessions, presigned URLs, cleanup) */
  setNow: (now: Date) => void;
}

export interface TestRegistryOptions {
  env?: Record<string, string>;
  oidcFetch?: FetchFunction;
  samlVerifier?: SamlVerifier;
}

export async function startTestRegistry(options: TestRegistryOptions = {}): Promise<TestRegistry> {
  const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'registry-test-'));
  const config = resolveConfig({
    PUBLIC_URL,
    DATABASE_URL: `sqlite:///${path.join(dataDir, 'registry.db')}`,
    DATA_DIRECTORY: path.join(dataDir, 'storage'),
    LOG_LEVEL: 'silent',
    SECRET_KEY: 'ab'.repeat(32),
    TERRAFORM_PRESIGNED_URL_SECRET: 'cd'.repeat(32),
    ADMIN_AUTHENTICATION_TOKEN: ADMIN_TOKEN,
    UPLOAD_API_KEYS: UPLOAD_KEY,
    PUBLISH_API_KEYS: PUBLISH_KEY,
    ...options.env,
  });

  let now = new Date();
  const commands = new FakeCommandService();
  const server = new RegistryServer({
    config,
    commandService: commands,
    clock: () => now,
    analyticsFlushIntervalMs: 60_000,
    ...(options.oidcFetch ? { oidcFetch: options.oidcFetch } : {}),
    ...(options.samlVerifier ? { samlVerifier: options.samlVerifier } : {}),
  });
  await server.initialize();

  return {
    server,
    fastify: server.getServer(),
    db: server.getDatabase(),
    config,
    commands,
    dataDir,
    setNow: value => {
      now = value;
    },
  };
}

export async function stopTestRegistry(registry: TestRegistry | undefined): Promise<void> {
  if (!registry) return;
  await registry.server.stop();
  fs.rmSync(registry.dataDir, { recursive: true, force: true });
}

export function moduleArchive(files: Record<string, string>): Promise<Buffer> {
  const entries: ArchiveFile[] = Object.entries(files).map(([file, content]) => ({
    path: file,
    data: Buffer.from(content),
  }));
  return createTarGz(entries);
}

export async function uploadModule(
  registry: TestRegistry,
  address: string,
  version: string,
  archive: Buffer,
  apiKey = UPLOAD_KEY
): Promise<number> {
  const res = await registry.fastify.inject({
    method: 'POST',
    url: `/v1/terrareg/modules/${address}/${version}/upload`,
    headers: { 'content-type': 'application/gzip', 'x-terrareg-apikey': apiKey },
    payload: archive,
  });
  return res.statusCode;
}

/**
 * Path and query of an absolute registry URL
 */
export function localPath(url: string): string {
  if (!url.startsWith(PUBLIC_URL)) {
    throw new Error(`Not a registry URL: ${url}`);
  }
  return url.slice(PUBLIC_URL.length);
}

/**
 * Value of a cookie set by a response
 */
export function sessionCookieOf(res: { headers: Record<string, unknown> }, name: string): string {
  const header = res.headers['set-cookie'];
  const lines = Array.isArray(header) ? header : [header];
  for (const line of lines) {
    if (typeof line !== 'string') continue;
    const [pair] = line.split(';');
    const separator = pair?.indexOf('=') ?? -1;
    if (pair !== undefined && separator > 0 && pair.slice(0, separator) === name) {
      return decodeURIComponent(pair.slice(separator + 1));
    }
  }
  throw new Error(`Response set no ${name} cookie`);
}

/**
 * Complete an OpenID Connect login against the fake IdP and return the
 * session cookie value
 */
export async function loginWithOidc(registry: TestRegistry): Promise<string> {
  const start = await registry.fastify.inject({ method: 'GET', url: '/openid/login' });
  const location = start.headers.location;
  if (typeof location !== 'string') {
    throw new Error('OpenID Connect login did not redirect');
  }
  const state = new URL(location).searchParams.get('state') ?? '';
  const callback = await registry.fastify.inject({
    method: 'GET',
    url: `/openid/callback?code=test-code&state=${encodeURIComponent(state)}`,
  });
  return sessionCookieOf(callback, registry.config.infra.sessions.cookieName);
}
