import { afterEach, describe, expect, it } from 'vitest';
import { createZip, getModuleProvider, listModuleVersions, readArchive } from '@terrashelf/core';
import {
  ADMIN_TOKEN,
  PUBLISH_KEY,
  localPath,
  moduleArchive,
  startTestRegistry,
  stopTestRegistry,
  uploadModule,
  type TestRegistry,
} from '../helpers.js';

const CLONE_TEMPLATE = 'https://git.example.test/{namespace}/{module}.git';

async function downloadArchive(registry: TestRegistry, address: string, version: string): Promise<Buffer> {
  const download = await registry.fastify.inject({
    method: 'GET',
    url: `/v1/modules/ci__${address}/${version}/download`,
  });
  expect(download.statusCode).toBe(204);
  const archive = await registry.fastify.inject({
    method: 'GET',
    url: localPath(String(download.headers['x-terraform-get'])),
  });
  expect(archive.statusCode).toBe(200);
  return archive.rawPayload;
}

async function createGitProvider(registry: TestRegistry, address: string): Promise<void> {
  const [namespace] = address.split('/');
  const created = await registry.fastify.inject({
    method: 'POST',
    url: '/v1/terrareg/namespaces',
    headers: { 'x-terrareg-apikey': ADMIN_TOKEN },
    payload: { name: namespace },
  });
  expect(created.statusCode).toBe(201);

  const provider = await registry.fastify.inject({
    method: 'POST',
    url: `/v1/terrareg/modules/${address}/create`,
    headers: { 'x-terrareg-apikey': ADMIN_TOKEN },
    payload: { repo_clone_url_template: CLONE_TEMPLATE, git_tag_format: 'v{version}' },
  });
  expect(provider.statusCode).toBe(201);
  expect(provider.json()).toEqual({ status: 'Success', id: address });
}

describe('module ingestion', () => {
  let registry: TestRegistry | undefined;

  afterEach(async () => {
    await stopTestRegistry(registry);
    registry = undefined;
  });

  describe('archive upload', () => {
    it('should keep the previous row and serve the re-uploaded archive', async () => {
      registry = await startTestRegistry();
      const first = await moduleArchive({ 'main.tf': 'resource "aws_vpc" "this" {}\n' });
      const second = await moduleArchive({
        'main.tf': 'resource "aws_vpc" "this" {}\n',
        'outputs.tf': 'output "vpc_id" {}\n',
      });

      expect(await uploadModule(registry, 'platform/vpc/aws', '1.0.0', first)).toBe(204);
      expect(await uploadModule(registry, 'platform/vpc/aws', '1.0.0', second)).toBe(204);

      const found = getModuleProvider(registry.db, 'platform', 'vpc', 'aws');
      expect(found).not.toBeNull();
      const rows = listModuleVersions(registry.db, found?.moduleProvider.id ?? -1);
      expect(rows.map(row => [row.version, row.published])).toEqual([
        ['1.0.0', true],
        ['1.0.0', false],
      ]);

      const served = await downloadArchive(registry, 'platform/vpc/aws', '1.0.0');
      expect(served.equals(second)).toBe(true);
    });

    it('should accept the archive as a multipart form field', async () => {
      registry = await startTestRegistry();
      const archive = createZip([{ path: 'main.tf', data: Buffer.from('resource "aws_vpc" "this" {}\n') }]);
      const boundary = 'terrashelf-form-boundary';
      const form = (field: string) =>
        Buffer.concat([
          Buffer.from(
            `--${boundary}\r\n` +
              `Content-Disposition: form-data; name="${field}"; filename="source.zip"\r\n` +
              'Content-Type: application/zip\r\n\r\n'
          ),
          archive,
          Buffer.from(`\r\n--${boundary}--\r\n`),
        ]);
      const post = (payload: Buffer) =>
        registry?.fastify.inject({
          method: 'POST',
          url: '/v1/terrareg/modules/platform/vpc/aws/1.0.0/upload',
          headers: { 'content-type': `multipart/form-data; boundary=${boundary}`, 'x-terrareg-apikey': ADMIN_TOKEN },
          payload,
        });

      const misnamed = await post(form('archive'));
      expect(misnamed?.statusCode).toBe(400);
      expect(misnamed?.json()).toEqual({ errors: ['Multipart upload must carry the archive in a "file" field'] });

      const uploaded = await post(form('file'));
      expect(uploaded?.statusCode).toBe(204);
      const served = await downloadArchive(registry, 'platform/vpc/aws', '1.0.0');
      const paths = (await readArchive(served, { maxBytes: 1024 * 1024 })).map(entry => entry.path);
      expect(paths).toEqual(['main.tf']);
    });

    it('should rebuild the archive when .terraformignore drops files', async () => {
      registry = await startTestRegistry();
      const uploaded = await moduleArchive({
        '.terraformignore': '*.tfvars\n',
        'main.tf': 'resource "aws_vpc" "this" {}\n',
        'secrets.tfvars': 'password = "test-secret"\n',
      });
      expect(await uploadModule(registry, 'platform/vpc/aws', '1.0.0', uploaded)).toBe(204);

      const served = await downloadArchive(registry, 'platform/vpc/aws', '1.0.0');
      expect(served.equals(uploaded)).toBe(false);
      const paths = (await readArchive(served, { maxBytes: 1024 * 1024 }))
        .filter(entry => entry.type === 'file')
        .map(entry => entry.path)
        .sort();
      expect(paths).toEqual(['.terraformignore', 'main.tf']);
    });

    it('should run the analyzers in every module directory', async () => {
      registry = await startTestRegistry();
      const archive = await moduleArchive({
        'main.tf': 'resource "aws_vpc" "this" {}\n',
        'modules/private/main.tf': 'resource "aws_subnet" "private" {}\n',
      });
      expect(await uploadModule(registry, 'platform/vpc/aws', '1.0.0', archive)).toBe(204);

      const docsCalls = registry.commands.calls.filter(call => call.command === 'terraform-docs');
      expect(docsCalls).toHaveLength(2);
      expect(docsCalls[0]?.args).toEqual(['json', '--sort=false', '.']);
      expect(docsCalls[1]?.cwd.endsWith('modules/private')).toBe(true);
      expect(registry.commands.calls.filter(call => call.command === 'tfsec')).toHaveLength(2);

      const terraformCall = registry.commands.calls.find(call => call.command === 'terraform');
      expect(terraformCall?.env).toMatchObject({
        TF_IN_AUTOMATION: '1',
        TF_TOKEN_registry_example_test: registry.config.infra.internalExtractionToken,
      });
    });

    it('should skip the security scan when it is disabled', async () => {
      registry = await startTestRegistry({ env: { TERRAFORM_ENABLE_SECURITY_SCANNING: 'false' } });
      const archive = await moduleArchive({ 'main.tf': 'resource "aws_vpc" "this" {}\n' });
      expect(await uploadModule(registry, 'platform/vpc/aws', '1.0.0', archive)).toBe(204);
      expect(registry.commands.calls.some(call => call.command === 'tfsec')).toBe(false);
    });

    it('should reject an invalid version', async () => {
      registry = await startTestRegistry();
      const archive = await moduleArchive({ 'main.tf': '' });
      expect(await uploadModule(registry, 'platform/vpc/aws', 'v1.0.0', archive)).toBe(400);
    });

    it('should refuse uploads without upload permission', async () => {
      registry = await startTestRegistry();
      const archive = await moduleArchive({ 'main.tf': '' });
      expect(await uploadModule(registry, 'platform/vpc/aws', '1.0.0', archive, PUBLISH_KEY)).toBe(403);
      expect(await uploadModule(registry, 'platform/vpc/aws', '1.0.0', archive, 'wrong-key')).toBe(401);
    });

    it('should refuse a second upload when re-indexing is disabled', async () => {
      registry = await startTestRegistry({ env: { ALLOW_MODULE_VERSION_REINDEX: 'false' } });
      const archive = await moduleArchive({ 'main.tf': '' });
      expect(await uploadModule(registry, 'platform/vpc/aws', '1.0.0', archive)).toBe(204);
      expect(await uploadModule(registry, 'platform/vpc/aws', '1.0.0', archive)).toBe(409);
    });

    it('should refuse uploads when module hosting is disallowed', async () => {
      registry = await startTestRegistry({ env: { ALLOW_MODULE_HOSTING: 'disallow' } });
      const archive = await moduleArchive({ 'main.tf': '' });
      const res = await registry.fastify.inject({
        method: 'POST',
        url: '/v1/terrareg/modules/platform/vpc/aws/1.0.0/upload',
        headers: { 'content-type': 'application/gzip', 'x-terrareg-apikey': ADMIN_TOKEN },
        payload: archive,
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ errors: ['Module upload is disabled by ALLOW_MODULE_HOSTING'] });
    });
  });

  describe('git import', () => {
    it('should clone the rendered tag and wait for publishing', async () => {
      registry = await startTestRegistry();
      await createGitProvider(registry, 'platform/network/aws');

      const res = await registry.fastify.inject({
        method: 'POST',
        url: '/v1/terrareg/modules/platform/network/aws/import',
        headers: { 'x-terrareg-apikey': ADMIN_TOKEN },
        payload: { git_tag: 'v1.4.0' },
      });
      expect(res.statusCode).toBe(200);
      const body = res.json<{ status: string; published: boolean; beta: boolean; warnings: string[] }>();
      expect(body).toMatchObject({ status: 'Success', published: false, beta: false });
      expect(body.warnings).toEqual([
        'root module tfsec: tfsec exited with status 1: tfsec is not available',
        'root module graph: terraform init exited with status 1: terraform is not available',
        'terraform version: terraform version exited with status 1: terraform is not available',
      ]);

      const clone = registry.commands.calls.find(call => call.command === 'git' && call.args[0] === 'clone');
      expect(clone?.args.slice(0, 8)).toEqual([
        'clone',
        '--depth',
        '1',
        '--single-branch',
        '--branch',
        'v1.4.0',
        '--',
        'https://git.example.test/platform/network.git',
      ]);

      const found = getModuleProvider(registry.db, 'platform', 'network', 'aws');
      const [row] = listModuleVersions(registry.db, found?.moduleProvider.id ?? -1);
      expect(row).toMatchObject({
        version: '1.4.0',
        published: false,
        repo_clone_url: 'https://git.example.test/platform/network.git',
        repo_snapshot_sha: 'a'.repeat(40),
      });

      const hidden = await registry.fastify.inject({ method: 'GET', url: '/v1/modules/platform/network/aws/versions' });
      expect(hidden.json<{ modules: Array<{ versions: unknown[] }> }>().modules[0]?.versions).toEqual([]);

      const publish = await registry.fastify.inject({
        method: 'POST',
        url: '/v1/terrareg/modules/platform/network/aws/1.4.0/publish',
        headers: { 'x-terrareg-apikey': PUBLISH_KEY },
      });
      expect(publish.statusCode).toBe(200);
      expect(publish.json()).toMatchObject({ status: 'Success', version: '1.4.0', published: true, beta: false });

      const visible = await registry.fastify.inject({ method: 'GET', url: '/v1/modules/platform/network/aws/versions' });
      const versions = visible.json<{ modules: Array<{ versions: Array<{ version: string }> }> }>().modules[0]?.versions;
      expect(versions?.map(entry => entry.version)).toEqual(['1.4.0']);
    });

    it('should reject a tag outside the tag format', async () => {
      registry = await startTestRegistry();
      await createGitProvider(registry, 'platform/network/aws');

      const res = await registry.fastify.inject({
        method: 'POST',
        url: '/v1/terrareg/modules/platform/network/aws/import',
        headers: { 'x-terrareg-apikey': ADMIN_TOKEN },
        payload: { git_tag: 'release-1.4.0' },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ errors: ['Git tag release-1.4.0 does not match the tag format v{version}'] });
    });

    it('should need an existing module provider', async () => {
      registry = await startTestRegistry();
      const res = await registry.fastify.inject({
        method: 'POST',
        url: '/v1/terrareg/modules/platform/network/aws/import',
        headers: { 'x-terrareg-apikey': ADMIN_TOKEN },
        payload: { version: '1.0.0' },
      });
      expect(res.statusCode).toBe(404);
    });

    it('should point terraform at the repository when hosting is disallowed', async () => {
      registry = await startTestRegistry({ env: { ALLOW_MODULE_HOSTING: 'disallow', AUTO_PUBLISH_MODULE_VERSIONS: 'true' } });
      await createGitProvider(registry, 'platform/network/aws');
      const imported = await registry.fastify.inject({
        method: 'POST',
        url: '/v1/terrareg/modules/platform/network/aws/import',
        headers: { 'x-terrareg-apikey': ADMIN_TOKEN },
        payload: { version: '1.4.0' },
      });
      expect(imported.json<{ published: boolean }>().published).toBe(true);

      const download = await registry.fastify.inject({
        method: 'GET',
        url: '/v1/modules/ci__platform/network/aws/1.4.0/download',
      });
      expect(download.statusCode).toBe(204);
      expect(download.headers['x-terraform-get']).toBe('git::https://git.example.test/platform/network.git?ref=v1.4.0');
    });
  });

  describe('module provider administration', () => {
    it('should delete a version and its archive', async () => {
      registry = await startTestRegistry();
      const archive = await moduleArchive({ 'main.tf': '' });
      expect(await uploadModule(registry, 'platform/vpc/aws', '1.0.0', archive)).toBe(204);

      const removed = await registry.fastify.inject({
        method: 'DELETE',
        url: '/v1/terrareg/modules/platform/vpc/aws/1.0.0/delete',
        headers: { 'x-terrareg-apikey': ADMIN_TOKEN },
      });
      expect(removed.statusCode).toBe(200);

      const res = await registry.fastify.inject({ method: 'GET', url: '/v1/modules/ci__platform/vpc/aws/1.0.0/download' });
      expect(res.statusCode).toBe(404);
    });

    it('should keep recording downloads after a downloaded version is deleted', async () => {
      registry = await startTestRegistry();
      const archive = await moduleArchive({ 'main.tf': '' });
      expect(await uploadModule(registry, 'platform/vpc/aws', '1.0.0', archive)).toBe(204);
      expect(await uploadModule(registry, 'platform/vpc/aws', '2.0.0', archive)).toBe(204);

      await downloadArchive(registry, 'platform/vpc/aws', '1.0.0');
      const removed = await registry.fastify.inject({
        method: 'DELETE',
        url: '/v1/terrareg/modules/platform/vpc/aws/1.0.0/delete',
        headers: { 'x-terrareg-apikey': ADMIN_TOKEN },
      });
      expect(removed.statusCode).toBe(200);
      await downloadArchive(registry, 'platform/vpc/aws', '2.0.0');

      await registry.server.flushAnalytics();
      await registry.server.flushAnalytics();
      const res = await registry.fastify.inject({
        method: 'GET',
        url: '/v1/terrareg/analytics/platform/vpc/aws',
        headers: { 'x-terrareg-apikey': ADMIN_TOKEN },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json<{ data: Array<{ module_version: string }> }>().data.map(entry => entry.module_version)).toEqual([
        '2.0.0',
      ]);
    });

    it('should only accept repository URLs with a known scheme', async () => {
      registry = await startTestRegistry();
      await createGitProvider(registry, 'platform/network/aws');
      const settings = (payload: Record<string, string>) =>
        registry?.fastify.inject({
          method: 'POST',
          url: '/v1/terrareg/modules/platform/network/aws/settings',
          headers: { 'x-terrareg-apikey': ADMIN_TOKEN },
          payload,
        });

      const clone = await settings({ repo_clone_url_template: 'file:///root/.ssh' });
      expect(clone?.statusCode).toBe(400);
      expect(clone?.json()).toEqual({
        errors: ['repo_clone_url_template: URL contains an unknown scheme (e.g. http/https/ssh)'],
      });

      const browse = await settings({ repo_browse_url_template: 'javascript:alert(1)' });
      expect(browse?.statusCode).toBe(400);
      expect(browse?.json()).toEqual({
        errors: ['repo_browse_url_template: URL does not contain a scheme (e.g. https://)'],
      });

      const base = await settings({ repo_base_url_template: 'ssh://git.example.test/{module}' });
      expect(base?.statusCode).toBe(400);

      const accepted = await settings({ repo_clone_url_template: 'ssh://git@git.example.test/{namespace}/{module}.git' });
      expect(accepted?.statusCode).toBe(200);

      const created = await registry.fastify.inject({
        method: 'POST',
        url: '/v1/terrareg/modules/platform/storage/aws/create',
        headers: { 'x-terrareg-apikey': ADMIN_TOKEN },
        payload: { repo_clone_url_template: 'file:///srv/repos/storage.git' },
      });
      expect(created.statusCode).toBe(400);
    });

    it('should record changes in the audit history', async () => {
      registry = await startTestRegistry();
      const archive = await moduleArchive({ 'main.tf': '' });
      expect(await uploadModule(registry, 'platform/vpc/aws', '1.0.0', archive)).toBe(204);

      const res = await registry.fastify.inject({
        method: 'GET',
        url: '/v1/terrareg/audit-history',
        headers: { 'x-terrareg-apikey': ADMIN_TOKEN },
      });
      expect(res.statusCode).toBe(200);
      const actions = res.json<{ data: Array<{ action: string; username: string }> }>().data.map(entry => entry.action);
      expect(actions).toEqual(
        expect.arrayContaining(['NAMESPACE_CREATE', 'MODULE_PROVIDER_CREATE', 'MODULE_VERSION_INDEX', 'MODULE_VERSION_PUBLISH'])
      );
    });
  });
});
