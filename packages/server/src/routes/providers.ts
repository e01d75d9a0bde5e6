/**
 * Provider Registry Routes
 *
 * Provider registry protocol (v1), categories and GPG keys (v2), release
 * upload and the presigned release file path.
 */

import type { FastifyInstance, FastifyPluginCallback } from 'fastify';
import { ForbiddenError, logger, type DomainConfig, type UrlSigner } from '@terrashelf/core';
import type { ProviderService } from '../services/provider-service.js';
import { requireReadAccess, requireTerraformAccess } from '../http/auth-hook.js';
import {
  createGpgKeyBodySchema,
  gpgKeyListQuerySchema,
  gpgKeyParamsSchema,
  presignedQuerySchema,
  providerArtifactParamsSchema,
  providerDownloadParamsSchema,
  providerParamsSchema,
  providerUploadQuerySchema,
  providerVersionParamsSchema,
} from './schemas.js';

export interface ProviderRoutesConfig {
  domain: DomainConfig;
  providers: ProviderService;
  signer: UrlSigner;
  maxArchiveBytes: number;
}

export const providerRoutes: FastifyPluginCallback<ProviderRoutesConfig> = (
  fastify: FastifyInstance,
  opts: ProviderRoutesConfig,
  done
) => {
  const { domain, providers, signer, maxArchiveBytes } = opts;
  const readAccess = requireReadAccess(domain);
  const terraformAccess = requireTerraformAccess(domain);

  // Release uploads are raw zip bodies
  fastify.addContentTypeParser(
    ['application/zip', 'application/octet-stream'],
    { parseAs: 'buffer', bodyLimit: maxArchiveBytes },
    (_request, body, parsed) => {
      parsed(null, body);
    }
  );

  // ==========================================================================
  // GET /v1/providers/:namespace/:provider/versions
  // ==========================================================================
  fastify.get('/v1/providers/:namespace/:provider/versions', { preHandler: terraformAccess }, async request => {
    const { namespace, provider } = providerParamsSchema.parse(request.params);
    return providers.getVersions(namespace, provider);
  });

  // ==========================================================================
  // GET /v1/providers/:namespace/:provider/:version/download/:os/:arch
  // ==========================================================================
  fastify.get(
    '/v1/providers/:namespace/:provider/:version/download/:os/:arch',
    { preHandler: terraformAccess },
    async request => {
      const { namespace, provider, version, os, arch } = providerDownloadParamsSchema.parse(request.params);
      return providers.getDownload(namespace, provider, version, os, arch);
    }
  );

  // ==========================================================================
  // GET /v1/terrareg/providers/:namespace/:provider/:version/:filename - presigned
  // ==========================================================================
  fastify.get('/v1/terrareg/providers/:namespace/:provider/:version/:filename', async (request, reply) => {
    const { namespace, provider, version, filename } = providerArtifactParamsSchema.parse(request.params);
    const questionMark = request.url.indexOf('?');
    const path = questionMark === -1 ? request.url : request.url.slice(0, questionMark);
    const verification = signer.verify(path, presignedQuerySchema.parse(request.query));
    if (!verification.valid) {
      logger.debug(`[providers] Rejected presigned release file request: ${verification.reason}`);
      throw new ForbiddenError('Download URL is invalid or has expired');
    }

    const artifact = await providers.readArtifact(namespace, provider, version, filename);
    return reply
      .status(200)
      .header('Content-Type', artifact.contentType)
      .header('Content-Disposition', `attachment; filename="${filename}"`)
      .send(artifact.data);
  });

  // ==========================================================================
  // POST /v1/terrareg/providers/:namespace/:provider/:version/upload
  // ==========================================================================
  fastify.post('/v1/terrareg/providers/:namespace/:provider/:version/upload', async (request, reply) => {
    const { namespace, provider, version } = providerVersionParamsSchema.parse(request.params);
    const { gpg_key_id } = providerUploadQuerySchema.parse(request.query);
    if (!Buffer.isBuffer(request.body)) {
      return reply.status(400).send({ errors: ['Request body must be a zip archive'] });
    }

    const row = await providers.uploadVersion({
      namespace,
      provider,
      version,
      gpgKeyId: gpg_key_id,
      archive: request.body,
      actor: request.auth,
    });
    return reply.status(201).send({ status: 'Success', provider_version_id: row.id, version: row.version });
  });

  // ==========================================================================
  // GET /v2/categories
  // ==========================================================================
  fastify.get('/v2/categories', { preHandler: readAccess }, async () => {
    return { data: providers.listCategories() };
  });

  // ==========================================================================
  // GET /v2/gpg-keys?filter[namespace]=
  // ==========================================================================
  fastify.get('/v2/gpg-keys', { preHandler: readAccess }, async request => {
    const query = gpgKeyListQuerySchema.parse(request.query);
    return { data: providers.listGpgKeys(query['filter[namespace]']) };
  });

  // ==========================================================================
  // GET /v2/gpg-keys/:namespace/:keyId
  // ==========================================================================
  fastify.get('/v2/gpg-keys/:namespace/:keyId', { preHandler: readAccess }, async request => {
    const { namespace, keyId } = gpgKeyParamsSchema.parse(request.params);
    return { data: providers.getGpgKey(namespace, keyId) };
  });

  // ==========================================================================
  // POST /v2/gpg-keys
  // ==========================================================================
  fastify.post('/v2/gpg-keys', async (request, reply) => {
    const { attributes } = createGpgKeyBodySchema.parse(request.body).data;
    const key = providers.createGpgKey(
      {
        namespace: attributes.namespace,
        asciiArmor: attributes['ascii-armor'],
        ...(attributes['key-id'] !== undefined ? { keyId: attributes['key-id'] } : {}),
        ...(attributes['trust-signature'] !== undefined ? { trustSignature: attributes['trust-signature'] } : {}),
        ...(attributes.source !== undefined ? { source: attributes.source } : {}),
        ...(attributes['source-url'] !== undefined ? { sourceUrl: attributes['source-url'] } : {}),
      },
      request.auth
    );
    return reply.status(201).send({ data: key });
  });

  // ==========================================================================
  // DELETE /v2/gpg-keys/:namespace/:keyId
  // ==========================================================================
  fastify.delete('/v2/gpg-keys/:namespace/:keyId', async (request, reply) => {
    const { namespace, keyId } = gpgKeyParamsSchema.parse(request.params);
    providers.deleteGpgKey(namespace, keyId, request.auth);
    return reply.status(204).send();
  });

  done();
};
