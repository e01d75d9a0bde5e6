import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { readArchive } from '@terrashelf/core';
import { moduleArchive, startTestRegistry, stopTestRegistry, uploadModule, type TestRegistry } from '../helpers.js';

const BASE = '/v1/terrareg/modules/platform/vpc/aws/1.0.0';

const GRAPH_DOT = ['digraph G {', '  "aws_vpc.this" -> "var.cidr_block";', '}', ''].join('\n');
const GRAPH = {
  nodes: [
    { id: 'aws_vpc.this', label: 'aws_vpc.this', type: 'resource' },
    { id: 'var.cidr_block', label: 'var.cidr_block', type: 'var' },
  ],
  edges: [{ source: 'aws_vpc.this', target: 'var.cidr_block' }],
};
const FINDING = { rule_id: 'AVD-AWS-0178', severity: 'MEDIUM' };

const VPC_FILES = {
  'README.md': '# VPC\n\nCreates a VPC.\n',
  LICENSE: 'Apache License 2.0\n',
  'main.tf': 'resource "aws_vpc" "this" {}\n',
  'terrareg.json': JSON.stringify({ variable_template: [{ name: 'cidr_block', type: 'text', required: true }] }),
  'modules/private/main.tf': 'resource "aws_subnet" "private" {}\n',
  'modules/private/README.md': '# Private subnets\n',
  'examples/basic/main.tf': 'module "vpc" {\n  source = "../../"\n}\n',
  'examples/basic/variables.tf': 'variable "region" {}\n',
};

describe('ingested module content', () => {
  let registry: TestRegistry;

  async function get(url: string) {
    return registry.fastify.inject({ method: 'GET', url });
  }

  beforeAll(async () => {
    registry = await startTestRegistry({ env: { TERRAFORM_INFRACOST_API_KEY: 'test-infracost-key' } });
    registry.commands.outputs = {
      'terraform init': { exitCode: 0, stdout: '', stderr: '' },
      'terraform graph': { exitCode: 0, stdout: GRAPH_DOT, stderr: '' },
      'tfsec --ignore-hcl-errors': { exitCode: 0, stdout: JSON.stringify({ results: [FINDING] }), stderr: '' },
      'infracost breakdown': { exitCode: 0, stdout: JSON.stringify({ totalMonthlyCost: '12.50' }), stderr: '' },
    };
    expect(await uploadModule(registry, 'platform/vpc/aws', '1.0.0', await moduleArchive(VPC_FILES))).toBe(204);

    registry.commands.outputs = {};
    const bare = await moduleArchive({ 'main.tf': 'resource "aws_vpc" "this" {}\n' });
    expect(await uploadModule(registry, 'platform/vpc/aws', '1.1.0', bare)).toBe(204);
  });

  afterAll(async () => {
    await stopTestRegistry(registry);
  });

  describe('version detail', () => {
    it('should carry the stored analysis of the root module', async () => {
      const res = await get(BASE);
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        namespace: 'platform',
        name: 'vpc',
        provider: 'aws',
        version: '1.0.0',
        beta: false,
        terraform_version: null,
        graph_url: `${BASE}/graph/data`,
        source_zip_url: `${BASE}/source.zip`,
        security_issues: 1,
        security_results: [FINDING],
        variable_template: [{ name: 'cidr_block', type: 'text', required: true }],
        additional_files: ['LICENSE'],
      });
    });

    it('should report no findings when nothing was scanned', async () => {
      const res = await get('/v1/terrareg/modules/platform/vpc/aws/1.1.0');
      expect(res.json()).toMatchObject({ security_issues: 0, security_results: null, variable_template: [] });
    });

    it('should answer 404 for a version that was never published', async () => {
      const res = await get('/v1/terrareg/modules/platform/vpc/aws/9.9.9/submodules');
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ errors: ['Not Found'] });
    });
  });

  describe('submodules', () => {
    it('should list submodules with links to their detail', async () => {
      const res = await get(`${BASE}/submodules`);
      expect(res.json()).toEqual([
        { path: 'modules/private', href: `${BASE}/submodules/details/modules/private` },
      ]);
    });

    it('should describe a submodule', async () => {
      const res = await get(`${BASE}/submodules/details/modules/private`);
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        path: 'modules/private',
        name: 'private',
        readme: '# Private subnets\n',
        empty: false,
        outputs: [{ name: 'vpc_id', description: 'Created VPC' }],
        graph_url: `${BASE}/graph/data/submodule/modules/private`,
        security_issues: 1,
        security_results: [FINDING],
      });
      expect(res.json<Record<string, unknown>>()).not.toHaveProperty('cost_analysis');
    });

    it('should answer 404 for an unknown submodule', async () => {
      const res = await get(`${BASE}/submodules/details/modules/public`);
      expect(res.statusCode).toBe(404);
    });
  });

  describe('examples', () => {
    it('should list examples', async () => {
      const res = await get(`${BASE}/examples`);
      expect(res.json()).toEqual([{ path: 'examples/basic', href: `${BASE}/examples/details/examples/basic` }]);
    });

    it('should include the cost estimate of an example', async () => {
      const res = await get(`${BASE}/examples/details/examples/basic`);
      expect(res.json()).toMatchObject({
        path: 'examples/basic',
        name: 'basic',
        graph_url: `${BASE}/graph/data/example/examples/basic`,
        cost_analysis: { totalMonthlyCost: '12.50' },
      });
    });

    it('should list the terraform files of an example', async () => {
      const res = await get(`${BASE}/examples/filelist/examples/basic`);
      expect(res.json()).toEqual([
        {
          filename: 'main.tf',
          path: 'examples/basic/main.tf',
          content_href: `${BASE}/examples/file/examples/basic/main.tf`,
        },
        {
          filename: 'variables.tf',
          path: 'examples/basic/variables.tf',
          content_href: `${BASE}/examples/file/examples/basic/variables.tf`,
        },
      ]);
    });

    it('should serve an example file', async () => {
      const res = await get(`${BASE}/examples/file/examples/basic/main.tf`);
      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('text/plain; charset=utf-8');
      expect(res.body).toBe('module "vpc" {\n  source = "../../"\n}\n');

      const missing = await get(`${BASE}/examples/file/examples/basic/outputs.tf`);
      expect(missing.statusCode).toBe(404);
    });
  });

  describe('graphs', () => {
    it('should serve the graph of the root module, submodules and examples', async () => {
      expect((await get(`${BASE}/graph/data`)).json()).toEqual(GRAPH);
      expect((await get(`${BASE}/graph/data/submodule/modules/private`)).json()).toEqual(GRAPH);
      expect((await get(`${BASE}/graph/data/example/examples/basic`)).json()).toEqual(GRAPH);
    });

    it('should serve an empty graph when none was produced', async () => {
      const res = await get('/v1/terrareg/modules/platform/vpc/aws/1.1.0/graph/data');
      expect(res.json()).toEqual({ nodes: [], edges: [] });
    });
  });

  describe('files', () => {
    it('should serve the variable template', async () => {
      const res = await get(`${BASE}/variable_template`);
      expect(res.json()).toEqual([{ name: 'cidr_block', type: 'text', required: true }]);
    });

    it('should serve additional root files', async () => {
      const res = await get(`${BASE}/files/LICENSE`);
      expect(res.statusCode).toBe(200);
      expect(res.body).toBe('Apache License 2.0\n');
      expect((await get(`${BASE}/files/CHANGELOG.md`)).statusCode).toBe(404);
    });

    it('should serve the source zip', async () => {
      const res = await get(`${BASE}/source.zip`);
      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('application/zip');
      expect(res.headers['content-disposition']).toBe('attachment; filename="vpc-aws-1.0.0.zip"');
      const paths = (await readArchive(res.rawPayload, { maxBytes: 1024 * 1024 })).map(entry => entry.path).sort();
      expect(paths).toEqual([
        'LICENSE',
        'README.md',
        'examples/basic/main.tf',
        'examples/basic/variables.tf',
        'main.tf',
        'modules/private/README.md',
        'modules/private/main.tf',
        'terrareg.json',
      ]);
    });
  });
});
