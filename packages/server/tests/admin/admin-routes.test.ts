import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import {
  ADMIN_TOKEN,
  UPLOAD_KEY,
  startTestRegistry,
  stopTestRegistry,
  type TestRegistry,
} from '../helpers.js';

let registry: TestRegistry;

beforeAll(async () => {
  registry = await startTestRegistry({ env: { TRUSTED_NAMESPACES: 'platform' } });
});

afterAll(async () => {
  await stopTestRegistry(registry);
});

async function createNamespace(name: string, headers: Record<string, string> = { 'x-terrareg-apikey': ADMIN_TOKEN }) {
  return registry.fastify.inject({
    method: 'POST',
    url: '/v1/terrareg/namespaces',
    headers,
    payload: { name, display_name: `${name} team` },
  });
}

describe('namespaces', () => {
  it('should create namespaces as site admin', async () => {
    const res = await createNamespace('platform');
    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({
      name: 'platform',
      display_name: 'platform team',
      type: 'organisation',
      is_auto_verified: false,
      trusted: true,
    });
    expect((await createNamespace('data')).statusCode).toBe(201);
  });

  it('should reject a duplicate namespace', async () => {
    const res = await createNamespace('platform');
    expect(res.statusCode).toBe(409);
  });

  it('should reject an invalid namespace name', async () => {
    const res = await createNamespace('-bad-');
    expect(res.statusCode).toBe(400);
  });

  it('should only let site admins create namespaces', async () => {
    const res = await createNamespace('ops', { 'x-terrareg-apikey': UPLOAD_KEY });
    expect(res.statusCode).toBe(403);
  });

  it('should list namespaces by name with pagination', async () => {
    const res = await registry.fastify.inject({ method: 'GET', url: '/v1/terrareg/namespaces?limit=1' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      meta: { limit: 1, current_offset: 0, next_offset: 1 },
      namespaces: [
        { name: 'data', display_name: 'data team', type: 'organisation', is_auto_verified: false, trusted: false },
      ],
    });
  });
});

describe('audit history', () => {
  it('should show the newest entries first to site admins', async () => {
    const res = await registry.fastify.inject({
      method: 'GET',
      url: '/v1/terrareg/audit-history',
      headers: { 'x-terrareg-apikey': ADMIN_TOKEN },
    });
    expect(res.statusCode).toBe(200);
    const body = res.json<{ data: Array<{ action: string; object_id: string; username: string }> }>();
    expect(body.data.map(entry => [entry.action, entry.object_id])).toEqual([
      ['NAMESPACE_CREATE', 'data'],
      ['NAMESPACE_CREATE', 'platform'],
    ]);
  });

  it('should ask anonymous callers to authenticate', async () => {
    const res = await registry.fastify.inject({ method: 'GET', url: '/v1/terrareg/audit-history' });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ errors: ['Authentication required'] });
  });
});

describe('health and HTTP plumbing', () => {
  it('should report a healthy registry', async () => {
    const res = await registry.fastify.inject({ method: 'GET', url: '/v1/terrareg/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok', database: true, authorization: { status: 'healthy' } });
  });

  it('should set security headers on every response', async () => {
    const res = await registry.fastify.inject({ method: 'GET', url: '/v1/terrareg/health' });
    expect(res.headers['strict-transport-security']).toBe('max-age=31536000; includeSubDomains');
    expect(res.headers['x-content-type-options']).toBe('nosniff');
    expect(res.headers['x-frame-options']).toBe('DENY');
    expect(res.headers['cache-control']).toBe('no-store');
  });

  it('should answer unknown routes with the error envelope', async () => {
    const res = await registry.fastify.inject({ method: 'GET', url: '/v1/unknown' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ errors: ['Not Found'] });
  });
});
