/**
 * Authentication hook
 *
 * Runs the dispatcher once per request and decorates `request.auth`. Bad or
 * missing credentials yield the anonymous context; routes decide what that
 * context may do.
 */

import type { FastifyInstance, FastifyRequest, preHandlerHookHandler } from 'fastify';
import {
  UnauthorizedError,
  ForbiddenError,
  type AuthContext,
  type AuthDispatcher,
  type AuthRequest,
  type DomainConfig,
} from '@terrashelf/core';

declare module 'fastify' {
  interface FastifyRequest {
    auth: AuthContext;
  }
}

function flattenHeaders(headers: FastifyRequest['headers']): Record<string, string | undefined> {
  const flat: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(headers)) {
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

function stringQuery(query: unknown): Record<string, string | undefined> {
  const flat: Record<string, string | undefined> = {};
  if (typeof query !== 'object' || query === null) return flat;
  for (const [name, value] of Object.entries(query)) {
    if (typeof value === 'string') flat[name] = value;
  }
  return flat;
}

/**
 * Dispatcher view of a Fastify request
 */
export function toAuthRequest(request: FastifyRequest): AuthRequest {
  const questionMark = request.url.indexOf('?');
  return {
    headers: flattenHeaders(request.headers),
    cookies: request.cookies,
    query: stringQuery(request.query),
    path: questionMark === -1 ? request.url : request.url.slice(0, questionMark),
  };
}

export function registerAuthHook(fastify: FastifyInstance, dispatcher: AuthDispatcher): void {
  fastify.decorateRequest('auth', null);
  fastify.addHook('onRequest', async request => {
    request.auth = await dispatcher.authenticate(toAuthRequest(request));
  });
}

function requireCapability(
  domain: DomainConfig,
  allowed: (auth: AuthContext) => boolean
): preHandlerHookHandler {
  // eslint-disable-next-line @typescript-eslint/no-misused-promises
  return async (request: FastifyRequest): Promise<void> => {
    if (domain.allowUnauthenticatedAccess) return;
    const auth = request.auth;
    if (allowed(auth)) return;
    if (auth.providerType === 'anonymous') {
      throw new UnauthorizedError('Authentication required');
    }
    throw new ForbiddenError('Access to this endpoint is not permitted for the presented credentials');
  };
}

/**
 * Browsing endpoints, gated by ALLOW_UNAUTHENTICATED_ACCESS
 */
export function requireReadAccess(domain: DomainConfig): preHandlerHookHandler {
  return requireCapability(domain, auth => auth.isAdmin || auth.capabilities.canAccessReadApi);
}

/**
 * Endpoints terraform itself calls, gated by ALLOW_UNAUTHENTICATED_ACCESS
 */
export function requireTerraformAccess(domain: DomainConfig): preHandlerHookHandler {
  return requireCapability(domain, auth => auth.isAdmin || auth.capabilities.canAccessTerraformApi);
}
