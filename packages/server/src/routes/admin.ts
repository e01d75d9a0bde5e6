/**
 * Registry Admin Routes
 *
 * Audit history, namespace listing and creation, per-module analytics
 * token usage and the health check.
 */

import type { FastifyInstance, FastifyPluginCallback } from 'fastify';
import {
  NotFoundError,
  checkDatabaseHealth,
  getModuleProvider,
  latestTokenUsage,
  listAuditHistory,
  listNamespaces,
  requireSiteAdmin,
  type AuthorizationProvider,
  type DatabaseClient,
  type DomainConfig,
  type Namespace,
} from '@terrashelf/core';
import { paginationQuerySchema } from '@terrashelf/contracts';
import type { AnalyticsTokenUsage, AuditHistoryEntry, NamespaceSummary } from '@terrashelf/protocol';
import type { ModuleAdminService } from '../services/module-admin-service.js';
import type { AnalyticsRecorder } from '../services/analytics-recorder.js';
import { paginationMeta } from '../services/module-registry-service.js';
import { requireReadAccess } from '../http/auth-hook.js';
import { auditHistoryQuerySchema, createNamespaceBodySchema, moduleProviderParamsSchema } from './schemas.js';

export interface AdminRoutesConfig {
  db: DatabaseClient;
  domain: DomainConfig;
  admin: ModuleAdminService;
  analytics: AnalyticsRecorder;
  authorization: AuthorizationProvider;
}

export function namespaceSummary(domain: DomainConfig, namespace: Namespace): NamespaceSummary {
  return {
    name: namespace.name,
    display_name: namespace.display_name,
    type: namespace.type,
    is_auto_verified: domain.verifiedModuleNamespaces.includes(namespace.name),
    trusted: domain.trustedNamespaces.includes(namespace.name),
  };
}

export const adminRoutes: FastifyPluginCallback<AdminRoutesConfig> = (
  fastify: FastifyInstance,
  opts: AdminRoutesConfig,
  done
) => {
  const { db, domain, admin, analytics, authorization } = opts;
  const readAccess = requireReadAccess(domain);

  // ==========================================================================
  // GET /v1/terrareg/audit-history
  // ==========================================================================
  fastify.get('/v1/terrareg/audit-history', async request => {
    requireSiteAdmin(request.auth);
    const { offset, limit } = auditHistoryQuerySchema.parse(request.query);
    const { entries, total } = listAuditHistory(db, { offset, limit });
    const data: AuditHistoryEntry[] = entries.map(row => ({
      timestamp: row.timestamp,
      username: row.username ?? '',
      action: row.action,
      object_type: row.object_type,
      object_id: row.object_id,
      old_value: row.old_value,
      new_value: row.new_value,
    }));
    return { meta: paginationMeta(offset, limit, total), data };
  });

  // ==========================================================================
  // GET /v1/terrareg/namespaces
  // ==========================================================================
  fastify.get('/v1/terrareg/namespaces', { preHandler: readAccess }, async request => {
    const { offset, limit } = paginationQuerySchema.parse(request.query);
    const { namespaces, total } = listNamespaces(db, { offset, limit });
    return {
      meta: paginationMeta(offset, limit, total),
      namespaces: namespaces.map(row => namespaceSummary(domain, row)),
    };
  });

  // ==========================================================================
  // POST /v1/terrareg/namespaces
  // ==========================================================================
  fastify.post('/v1/terrareg/namespaces', async (request, reply) => {
    const body = createNamespaceBodySchema.parse(request.body);
    const namespace = admin.createNamespace(body.name, body.display_name ?? null, request.auth);
    return reply.status(201).send(namespaceSummary(domain, namespace));
  });

  // ==========================================================================
  // GET /v1/terrareg/analytics/:namespace/:name/:provider - latest download per token
  // ==========================================================================
  fastify.get('/v1/terrareg/analytics/:namespace/:name/:provider', { preHandler: readAccess }, async request => {
    const { namespace, name, provider } = moduleProviderParamsSchema.parse(request.params);
    const found = getModuleProvider(db, namespace, name, provider);
    if (!found) {
      throw new NotFoundError(`Module provider not found: ${namespace}/${name}/${provider}`);
    }

    const usage: AnalyticsTokenUsage[] = latestTokenUsage(db, found.moduleProvider.id).map(row => ({
      token: row.analytics_token ?? domain.analytics.exampleToken,
      environment: row.environment,
      terraform_version: row.terraform_version,
      module_version: row.module_version,
      last_download: row.timestamp,
    }));
    return { data: usage };
  });

  // ==========================================================================
  // GET /v1/terrareg/health
  // ==========================================================================
  fastify.get('/v1/terrareg/health', async (_request, reply) => {
    const database = checkDatabaseHealth(db);
    const groups = await authorization.healthCheck();
    const healthy = database && groups.status === 'healthy';
    return reply.status(healthy ? 200 : 503).send({
      status: healthy ? 'ok' : 'degraded',
      database,
      authorization: groups,
      analytics: analytics.getStats(),
    });
  });

  done();
};
