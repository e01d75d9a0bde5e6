/**
 * Module Admin Routes
 *
 * Ingestion (archive upload, git import) and the write operations on
 * module providers and versions under /v1/terrareg/modules.
 */

import type { FastifyInstance, FastifyPluginCallback, FastifyRequest } from 'fastify';
import multipart from '@fastify/multipart';
import { InvalidInputError, type ModuleVersion } from '@terrashelf/core';
import type { IngestionResponse } from '@terrashelf/protocol';
import type { ModuleIngestionService, IngestionOutcome } from '../ingestion/pipeline.js';
import type { ModuleAdminService } from '../services/module-admin-service.js';
import {
  importBodySchema,
  moduleProviderParamsSchema,
  moduleProviderSettingsSchema,
  moduleVersionParamsSchema,
} from './schemas.js';

export interface ModuleAdminRoutesConfig {
  ingestion: ModuleIngestionService;
  admin: ModuleAdminService;
  maxArchiveBytes: number;
}

/** Content types accepted for archive uploads; the format is sniffed */
export const ARCHIVE_CONTENT_TYPES = [
  'application/octet-stream',
  'application/gzip',
  'application/x-gzip',
  'application/x-tar+gzip',
  'application/zip',
];

function ingestionResponse(outcome: IngestionOutcome): IngestionResponse {
  return {
    status: 'Success',
    module_version_id: outcome.moduleVersion.id,
    published: outcome.published,
    beta: outcome.beta,
    warnings: outcome.warnings,
  };
}

/**
 * Archive bytes of an upload: the raw body, or the `file` field of a form
 */
async function uploadedArchive(request: FastifyRequest): Promise<Buffer> {
  if (request.isMultipart()) {
    const file = await request.file();
    if (!file || file.fieldname !== 'file') {
      throw new InvalidInputError('Multipart upload must carry the archive in a "file" field');
    }
    return file.toBuffer();
  }
  return Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
}

function versionSummary(row: ModuleVersion): { id: number; version: string; published: boolean; beta: boolean } {
  return { id: row.id, version: row.version, published: row.published, beta: row.beta };
}

export const moduleAdminRoutes: FastifyPluginCallback<ModuleAdminRoutesConfig> = (
  fastify: FastifyInstance,
  opts: ModuleAdminRoutesConfig,
  done
) => {
  const { ingestion, admin, maxArchiveBytes } = opts;

  fastify.addContentTypeParser(
    ARCHIVE_CONTENT_TYPES,
    { parseAs: 'buffer', bodyLimit: maxArchiveBytes },
    (_request, body, parsed) => {
      parsed(null, body);
    }
  );
  // `curl -F file=@source.zip` form uploads
  void fastify.register(multipart, { limits: { fileSize: maxArchiveBytes, files: 1 } });

  // ==========================================================================
  // POST /v1/terrareg/modules/:namespace/:name/:provider/:version/upload
  // ==========================================================================
  fastify.post('/v1/terrareg/modules/:namespace/:name/:provider/:version/upload', async (request, reply) => {
    const { namespace, name, provider, version } = moduleVersionParamsSchema.parse(request.params);
    const data = await uploadedArchive(request);
    if (data.length === 0) {
      return reply.status(400).send({ errors: ['Request body must be a tar.gz or zip archive'] });
    }

    // Uploads publish immediately and answer without a body
    await ingestion.ingest({
      namespace,
      module: name,
      provider,
      version,
      source: { kind: 'archive', data },
      actor: request.auth,
    });
    return reply.status(204).send();
  });

  // ==========================================================================
  // POST /v1/terrareg/modules/:namespace/:name/:provider/import
  // ==========================================================================
  fastify.post('/v1/terrareg/modules/:namespace/:name/:provider/import', async (request, reply) => {
    const { namespace, name, provider } = moduleProviderParamsSchema.parse(request.params);
    const body = importBodySchema.parse(request.body ?? {});

    const outcome = await ingestion.ingest({
      namespace,
      module: name,
      provider,
      ...(body.version !== undefined ? { version: body.version } : {}),
      source: { kind: 'git', ...(body.git_tag !== undefined ? { gitTag: body.git_tag } : {}) },
      actor: request.auth,
    });
    return reply.status(200).send(ingestionResponse(outcome));
  });

  // ==========================================================================
  // POST /v1/terrareg/modules/:namespace/:name/:provider/:version/publish
  // ==========================================================================
  fastify.post('/v1/terrareg/modules/:namespace/:name/:provider/:version/publish', async request => {
    const { namespace, name, provider, version } = moduleVersionParamsSchema.parse(request.params);
    const row = admin.publishVersion({ namespace, module: name, provider }, version, request.auth);
    return { status: 'Success', ...versionSummary(row) };
  });

  // ==========================================================================
  // DELETE /v1/terrareg/modules/:namespace/:name/:provider/:version/delete
  // ==========================================================================
  fastify.delete('/v1/terrareg/modules/:namespace/:name/:provider/:version/delete', async request => {
    const { namespace, name, provider, version } = moduleVersionParamsSchema.parse(request.params);
    await admin.deleteVersion({ namespace, module: name, provider }, version, request.auth);
    return { status: 'Success' };
  });

  // ==========================================================================
  // POST /v1/terrareg/modules/:namespace/:name/:provider/create
  // ==========================================================================
  fastify.post('/v1/terrareg/modules/:namespace/:name/:provider/create', async (request, reply) => {
    const { namespace, name, provider } = moduleProviderParamsSchema.parse(request.params);
    const settings = moduleProviderSettingsSchema.parse(request.body ?? {});
    const row = admin.createModuleProvider({ namespace, module: name, provider }, settings, request.auth);
    return reply.status(201).send({ status: 'Success', id: `${namespace}/${row.module_name}/${row.provider_name}` });
  });

  // ==========================================================================
  // POST /v1/terrareg/modules/:namespace/:name/:provider/settings
  // ==========================================================================
  fastify.post('/v1/terrareg/modules/:namespace/:name/:provider/settings', async request => {
    const { namespace, name, provider } = moduleProviderParamsSchema.parse(request.params);
    const settings = moduleProviderSettingsSchema.parse(request.body ?? {});
    const row = admin.updateSettings({ namespace, module: name, provider }, settings, request.auth);
    return {
      status: 'Success',
      settings: {
        repo_base_url_template: row.repo_base_url_template,
        repo_clone_url_template: row.repo_clone_url_template,
        repo_browse_url_template: row.repo_browse_url_template,
        git_tag_format: row.git_tag_format,
        git_path: row.git_path,
        verified: row.verified,
      },
    };
  });

  // ==========================================================================
  // DELETE /v1/terrareg/modules/:namespace/:name/:provider/delete
  // ==========================================================================
  fastify.delete('/v1/terrareg/modules/:namespace/:name/:provider/delete', async request => {
    const { namespace, name, provider } = moduleProviderParamsSchema.parse(request.params);
    await admin.deleteModuleProvider({ namespace, module: name, provider }, request.auth);
    return { status: 'Success' };
  });

  done();
};
