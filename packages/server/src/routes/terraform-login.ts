/**
 * Terraform Login Routes
 *
 * Service discovery and the identity provider behind `terraform login`.
 * The authorization endpoint approves requests for users holding an SSO
 * session; the issued token carries that user's groups.
 */

import type { FastifyInstance, FastifyPluginCallback } from 'fastify';
import type { ServiceDiscovery } from '@terrashelf/protocol';
import { UnauthorizedError, logger, type InfraConfig } from '@terrashelf/core';
import type { TerraformIdpService } from '@terrashelf/authn-terraform';

export interface TerraformLoginRoutesConfig {
  infra: InfraConfig;
  /** null when TERRAFORM_OIDC_IDP_ENABLED is off */
  idp: TerraformIdpService | null;
  /** Where to send a browser without an SSO session */
  loginPath: string | null;
}

export function serviceDiscovery(infra: InfraConfig, idp: TerraformIdpService | null): ServiceDiscovery {
  const discovery: ServiceDiscovery = {
    'modules.v1': '/v1/modules/',
    'providers.v1': '/v1/providers/',
  };
  if (idp) {
    discovery['login.v1'] = idp.loginService(infra.publicUrl);
  }
  return discovery;
}

export const terraformLoginRoutes: FastifyPluginCallback<TerraformLoginRoutesConfig> = (
  fastify: FastifyInstance,
  opts: TerraformLoginRoutesConfig,
  done
) => {
  const { infra, idp, loginPath } = opts;

  // ==========================================================================
  // GET /.well-known/terraform.json
  // ==========================================================================
  fastify.get('/.well-known/terraform.json', async () => {
    return serviceDiscovery(infra, idp);
  });

  if (!idp) {
    done();
    return;
  }

  // ==========================================================================
  // GET /terraform/oauth/authorization
  // ==========================================================================
  fastify.get('/terraform/oauth/authorization', async (request, reply) => {
    const authorization = idp.parseAuthorizationRequest(request.query);

    const claims = request.auth.claims;
    if (claims.type !== 'oidc' && claims.type !== 'saml') {
      if (loginPath) {
        return reply.redirect(302, `${loginPath}?redirect=${encodeURIComponent(request.url)}`);
      }
      throw new UnauthorizedError('Log in with single sign-on before authorizing terraform');
    }

    const location = idp.approve(authorization, { username: claims.username, groups: claims.groups });
    logger.info(`[terraform-login] Approved terraform login for ${claims.username}`);
    return reply.redirect(302, location);
  });

  // ==========================================================================
  // POST /terraform/oauth/token
  // ==========================================================================
  fastify.post('/terraform/oauth/token', async (request, reply) => {
    const token = await idp.exchange(request.body);
    return reply.status(200).header('Cache-Control', 'no-store').send(token);
  });

  done();
};
