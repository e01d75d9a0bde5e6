/**
 * Module Registry Routes
 *
 * Terraform module registry protocol (v1), the signed archive path that
 * `X-Terraform-Get` points at, and the registry's own reads of ingested
 * content (submodules, examples, graphs, variable template, source zip).
 */

import type { FastifyInstance, FastifyPluginCallback, FastifyReply, FastifyRequest } from 'fastify';
import { ForbiddenError, logger, type DomainConfig, type StorageBackend, type UrlSigner } from '@terrashelf/core';
import { splitAnalyticsNamespace } from '@terrashelf/authn-terraform';
import type { ModuleRegistryService } from '../services/module-registry-service.js';
import type { ModuleSearchService } from '../services/module-search-service.js';
import type { FileContent, ModuleContentService } from '../services/module-content-service.js';
import { requireReadAccess, requireTerraformAccess } from '../http/auth-hook.js';
import {
  latestDownloadQuerySchema,
  moduleListQuerySchema,
  moduleParamsSchema,
  moduleProviderParamsSchema,
  moduleSearchQuerySchema,
  moduleVersionParamsSchema,
  moduleVersionPathParamsSchema,
  namespaceParamsSchema,
  presignedQuerySchema,
} from './schemas.js';

export interface ModuleRoutesConfig {
  domain: DomainConfig;
  registry: ModuleRegistryService;
  search: ModuleSearchService;
  content: ModuleContentService;
  storage: StorageBackend;
  signer: UrlSigner;
}

/**
 * Terraform version of the calling CLI, from its header or User-Agent
 */
export function terraformVersionOf(request: FastifyRequest): string | null {
  const header = request.headers['x-terraform-version'];
  if (typeof header === 'string' && header !== '') return header;
  const userAgent = request.headers['user-agent'];
  const match = typeof userAgent === 'string' ? /\bTerraform\/(\d+\.\d+\.\d+\S*)/.exec(userAgent) : null;
  return match?.[1] ?? null;
}

function requestPath(request: FastifyRequest): string {
  const questionMark = request.url.indexOf('?');
  return questionMark === -1 ? request.url : request.url.slice(0, questionMark);
}

function sendFile(reply: FastifyReply, file: FileContent): FastifyReply {
  return reply.status(200).header('Content-Type', `${file.contentType}; charset=utf-8`).send(file.data);
}

export const moduleRoutes: FastifyPluginCallback<ModuleRoutesConfig> = (
  fastify: FastifyInstance,
  opts: ModuleRoutesConfig,
  done
) => {
  const { domain, registry, search, content, storage, signer } = opts;
  const readAccess = requireReadAccess(domain);
  const terraformAccess = requireTerraformAccess(domain);

  // ==========================================================================
  // GET /v1/modules - latest version of every module provider
  // ==========================================================================
  fastify.get('/v1/modules', { preHandler: readAccess }, async request => {
    const query = moduleListQuerySchema.parse(request.query);
    return registry.listModules({
      offset: query.offset,
      limit: query.limit,
      providers: query.provider,
      ...(query.verified !== undefined ? { verified: query.verified } : {}),
    });
  });

  // ==========================================================================
  // GET /v1/modules/search
  // ==========================================================================
  fastify.get('/v1/modules/search', { preHandler: readAccess }, async request => {
    const query = moduleSearchQuerySchema.parse(request.query);
    return search.search({
      q: query.q,
      offset: query.offset,
      limit: query.limit,
      namespaces: query.namespace,
      providers: query.provider,
      ...(query.verified !== undefined ? { verified: query.verified } : {}),
      ...(query.trusted_namespaces !== undefined ? { trustedNamespaces: query.trusted_namespaces } : {}),
      ...(query.contributed !== undefined ? { contributed: query.contributed } : {}),
    });
  });

  // ==========================================================================
  // GET /v1/modules/:namespace - modules of one namespace
  // ==========================================================================
  fastify.get('/v1/modules/:namespace', { preHandler: readAccess }, async request => {
    const { namespace } = namespaceParamsSchema.parse(request.params);
    const query = moduleListQuerySchema.parse(request.query);
    return registry.listModules({
      offset: query.offset,
      limit: query.limit,
      namespaces: [splitAnalyticsNamespace(namespace).namespace],
      providers: query.provider,
      ...(query.verified !== undefined ? { verified: query.verified } : {}),
    });
  });

  // ==========================================================================
  // GET /v1/modules/:namespace/:name - latest version for every provider
  // ==========================================================================
  fastify.get('/v1/modules/:namespace/:name', { preHandler: readAccess }, async request => {
    const { namespace, name } = moduleParamsSchema.parse(request.params);
    const query = moduleListQuerySchema.parse(request.query);
    return registry.listModuleProviders(namespace, name, query.offset, query.limit);
  });

  // ==========================================================================
  // GET /v1/modules/:namespace/:name/:provider/versions
  // ==========================================================================
  fastify.get('/v1/modules/:namespace/:name/:provider/versions', { preHandler: terraformAccess }, async request => {
    const { namespace, name, provider } = moduleProviderParamsSchema.parse(request.params);
    return registry.getVersions({
      namespace: splitAnalyticsNamespace(namespace).namespace,
      module: name,
      provider,
    });
  });

  // ==========================================================================
  // GET /v1/modules/:namespace/:name/:provider/download - latest (or ?version=<constraint>)
  // ==========================================================================
  fastify.get(
    '/v1/modules/:namespace/:name/:provider/download',
    { preHandler: terraformAccess },
    async (request, reply) => {
      const { namespace, name, provider } = moduleProviderParamsSchema.parse(request.params);
      const { version } = latestDownloadQuerySchema.parse(request.query);
      const resolved = registry.resolveVersion(
        { namespace: splitAnalyticsNamespace(namespace).namespace, module: name, provider },
        version ?? null
      );
      // Keep the namespace segment as given so its analytics token survives
      return reply
        .status(302)
        .header('Location', `/v1/modules/${namespace}/${name}/${provider}/${resolved.version}/download`)
        .send();
    }
  );

  // ==========================================================================
  // GET /v1/modules/:namespace/:name/:provider - latest version detail
  // ==========================================================================
  fastify.get('/v1/modules/:namespace/:name/:provider', { preHandler: readAccess }, async request => {
    const { namespace, name, provider } = moduleProviderParamsSchema.parse(request.params);
    return registry.getModuleDetail(
      { namespace: splitAnalyticsNamespace(namespace).namespace, module: name, provider },
      null
    );
  });

  // ==========================================================================
  // GET /v1/modules/:namespace/:name/:provider/:version
  // ==========================================================================
  fastify.get('/v1/modules/:namespace/:name/:provider/:version', { preHandler: readAccess }, async request => {
    const { namespace, name, provider, version } = moduleVersionParamsSchema.parse(request.params);
    return registry.getModuleDetail(
      { namespace: splitAnalyticsNamespace(namespace).namespace, module: name, provider },
      version
    );
  });

  // ==========================================================================
  // GET /v1/modules/:namespace/:name/:provider/:version/download
  // ==========================================================================
  fastify.get(
    '/v1/modules/:namespace/:name/:provider/:version/download',
    { preHandler: terraformAccess },
    async (request, reply) => {
      const { namespace, name, provider, version } = moduleVersionParamsSchema.parse(request.params);
      const location = await registry.resolveDownload(namespace, {
        module: name,
        provider,
        version,
        auth: request.auth,
        terraformVersion: terraformVersionOf(request),
      });
      return reply.status(204).header('X-Terraform-Get', location).send();
    }
  );

  // ==========================================================================
  // GET /v1/terrareg/modules/:namespace/:name/:provider/:version/source.tar.gz - presigned
  // ==========================================================================
  fastify.get('/v1/terrareg/modules/:namespace/:name/:provider/:version/source.tar.gz', async (request, reply) => {
    const { namespace, name, provider, version } = moduleVersionParamsSchema.parse(request.params);
    const verification = signer.verify(requestPath(request), presignedQuerySchema.parse(request.query));
    if (!verification.valid) {
      logger.debug(`[modules] Rejected presigned archive request: ${verification.reason}`);
      throw new ForbiddenError('Download URL is invalid or has expired');
    }

    const key = registry.archiveRef({ namespace, module: name, provider }, version);
    const stream = await storage.getBlob(key);
    return reply
      .status(200)
      .header('Content-Type', 'application/gzip')
      .header('Content-Disposition', `attachment; filename="${name}-${provider}-${version}.tar.gz"`)
      .send(stream);
  });

  // ==========================================================================
  // GET /v1/terrareg/modules/:namespace/:name/:provider/:version - detail with stored analysis
  // ==========================================================================
  fastify.get('/v1/terrareg/modules/:namespace/:name/:provider/:version', { preHandler: readAccess }, async request => {
    const { namespace, name, provider, version } = moduleVersionParamsSchema.parse(request.params);
    const address = { namespace, module: name, provider };
    return content.getVersionDetail(address, version, registry.getModuleDetail(address, version));
  });

  // ==========================================================================
  // GET .../:version/submodules and .../:version/examples
  // ==========================================================================
  fastify.get(
    '/v1/terrareg/modules/:namespace/:name/:provider/:version/submodules',
    { preHandler: readAccess },
    async request => {
      const { namespace, name, provider, version } = moduleVersionParamsSchema.parse(request.params);
      return content.listSubmodules({ namespace, module: name, provider }, version, 'submodule');
    }
  );

  fastify.get(
    '/v1/terrareg/modules/:namespace/:name/:provider/:version/submodules/details/*',
    { preHandler: readAccess },
    async request => {
      const { namespace, name, provider, version, '*': submodulePath } = moduleVersionPathParamsSchema.parse(
        request.params
      );
      return content.getSubmoduleDetail({ namespace, module: name, provider }, version, 'submodule', submodulePath);
    }
  );

  fastify.get(
    '/v1/terrareg/modules/:namespace/:name/:provider/:version/examples',
    { preHandler: readAccess },
    async request => {
      const { namespace, name, provider, version } = moduleVersionParamsSchema.parse(request.params);
      return content.listSubmodules({ namespace, module: name, provider }, version, 'example');
    }
  );

  fastify.get(
    '/v1/terrareg/modules/:namespace/:name/:provider/:version/examples/details/*',
    { preHandler: readAccess },
    async request => {
      const { namespace, name, provider, version, '*': examplePath } = moduleVersionPathParamsSchema.parse(
        request.params
      );
      return content.getSubmoduleDetail({ namespace, module: name, provider }, version, 'example', examplePath);
    }
  );

  fastify.get(
    '/v1/terrareg/modules/:namespace/:name/:provider/:version/examples/filelist/*',
    { preHandler: readAccess },
    async request => {
      const { namespace, name, provider, version, '*': examplePath } = moduleVersionPathParamsSchema.parse(
        request.params
      );
      return content.listExampleFiles({ namespace, module: name, provider }, version, examplePath);
    }
  );

  fastify.get(
    '/v1/terrareg/modules/:namespace/:name/:provider/:version/examples/file/*',
    { preHandler: readAccess },
    async (request, reply) => {
      const { namespace, name, provider, version, '*': filePath } = moduleVersionPathParamsSchema.parse(
        request.params
      );
      return sendFile(reply, await content.getExampleFile({ namespace, module: name, provider }, version, filePath));
    }
  );

  // ==========================================================================
  // GET .../:version/files/* - additional root files
  // ==========================================================================
  fastify.get(
    '/v1/terrareg/modules/:namespace/:name/:provider/:version/files/*',
    { preHandler: readAccess },
    async (request, reply) => {
      const { namespace, name, provider, version, '*': filePath } = moduleVersionPathParamsSchema.parse(
        request.params
      );
      return sendFile(reply, await content.getModuleFile({ namespace, module: name, provider }, version, filePath));
    }
  );

  // ==========================================================================
  // GET .../:version/graph/data[/submodule|example/*]
  // ==========================================================================
  fastify.get(
    '/v1/terrareg/modules/:namespace/:name/:provider/:version/graph/data',
    { preHandler: readAccess },
    async request => {
      const { namespace, name, provider, version } = moduleVersionParamsSchema.parse(request.params);
      return content.getGraph({ namespace, module: name, provider }, version);
    }
  );

  fastify.get(
    '/v1/terrareg/modules/:namespace/:name/:provider/:version/graph/data/submodule/*',
    { preHandler: readAccess },
    async request => {
      const { namespace, name, provider, version, '*': submodulePath } = moduleVersionPathParamsSchema.parse(
        request.params
      );
      const target = { kind: 'submodule', path: submodulePath } as const;
      return content.getGraph({ namespace, module: name, provider }, version, target);
    }
  );

  fastify.get(
    '/v1/terrareg/modules/:namespace/:name/:provider/:version/graph/data/example/*',
    { preHandler: readAccess },
    async request => {
      const { namespace, name, provider, version, '*': examplePath } = moduleVersionPathParamsSchema.parse(
        request.params
      );
      const target = { kind: 'example', path: examplePath } as const;
      return content.getGraph({ namespace, module: name, provider }, version, target);
    }
  );

  // ==========================================================================
  // GET .../:version/variable_template
  // ==========================================================================
  fastify.get(
    '/v1/terrareg/modules/:namespace/:name/:provider/:version/variable_template',
    { preHandler: readAccess },
    async request => {
      const { namespace, name, provider, version } = moduleVersionParamsSchema.parse(request.params);
      return content.getVariableTemplate({ namespace, module: name, provider }, version);
    }
  );

  // ==========================================================================
  // GET .../:version/source.zip
  // ==========================================================================
  fastify.get(
    '/v1/terrareg/modules/:namespace/:name/:provider/:version/source.zip',
    { preHandler: readAccess },
    async (request, reply) => {
      const { namespace, name, provider, version } = moduleVersionParamsSchema.parse(request.params);
      const { key, filename } = content.sourceZipRef({ namespace, module: name, provider }, version);
      const stream = await storage.getBlob(key);
      return reply
        .status(200)
        .header('Content-Type', 'application/zip')
        .header('Content-Disposition', `attachment; filename="${filename}"`)
        .send(stream);
    }
  );

  done();
};
