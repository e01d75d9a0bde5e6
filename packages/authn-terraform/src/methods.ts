/**
 * Terraform recognizers
 *
 * Recognizers 7, 8 and 9 of the dispatch chain: tokens issued by the
 * `terraform login` identity provider, configured analytics keys, and the
 * token the ingestion pipeline's own `terraform init` presents.
 */

import type {
  AnalyticsAuthKey,
  AuthContext,
  AuthorizationProvider,
  AuthRequest,
  BearerAuthMethod,
  DatabaseExecutor,
  TokenAuthMethod,
} from '@terrashelf/core';
import { createAuthContext, extractBearerToken, logger } from '@terrashelf/core';
import { timingSafeEqual, createHash } from 'crypto';
import { analyticsTokenFromPath } from './analytics-path.js';
import { verifyAccessToken } from './tokens.js';

function constantTimeEquals(a: string, b: string): boolean {
  const left = createHash('sha256').update(a).digest();
  const right = createHash('sha256').update(b).digest();
  return timingSafeEqual(left, right);
}

/**
 * Bearer token issued by the Terraform login identity provider
 */
export class TerraformOidcMethod implements BearerAuthMethod {
  readonly type = 'terraform_oidc';
  readonly capability = 'bearer';

  constructor(
    private readonly db: DatabaseExecutor,
    private readonly enabled: boolean,
    private readonly authorization: AuthorizationProvider,
    private readonly clock: () => Date = () => new Date()
  ) {}

  isEnabled(): boolean {
    return this.enabled;
  }

  async recognize(token: string): Promise<AuthContext | null> {
    const verified = await verifyAccessToken(this.db, token, this.clock());
    if (!verified) return null;

    const permissions = await this.authorization.resolveGroupPermissions(verified.subject.groups);
    return createAuthContext(
      {
        type: 'terraform_oidc',
        tokenId: verified.id,
        username: verified.subject.username,
        groups: verified.subject.groups,
      },
      permissions,
      token
    );
  }
}

/**
 * Configured analytics key, from a bearer token or the module path prefix
 */
export class TerraformAnalyticsKeyMethod implements TokenAuthMethod {
  readonly type = 'terraform_analytics';
  readonly capability = 'token';

  constructor(private readonly keys: readonly AnalyticsAuthKey[]) {}

  isEnabled(): boolean {
    return this.keys.length > 0;
  }

  async recognize(request: AuthRequest): Promise<AuthContext | null> {
    const candidates = [extractBearerToken(request.headers), analyticsTokenFromPath(request.path)];

    for (const candidate of candidates) {
      if (!candidate) continue;
      const key = this.keys.find(configured => constantTimeEquals(configured.token, candidate));
      if (key) {
        logger.debug('[authn-terraform] Analytics key accepted');
        return createAuthContext(
          { type: 'terraform_analytics', analyticsToken: key.token, environment: key.environment },
          undefined,
          candidate
        );
      }
    }
    return null;
  }
}

/**
 * Token presented by the ingestion pipeline when terraform fetches
 * modules from this registry during analysis
 */
export class TerraformInternalExtractionMethod implements BearerAuthMethod {
  readonly type = 'terraform_internal';
  readonly capability = 'bearer';

  constructor(private readonly internalToken: string) {}

  isEnabled(): boolean {
    return this.internalToken.length > 0;
  }

  async recognize(token: string): Promise<AuthContext | null> {
    if (!constantTimeEquals(token, this.internalToken)) return null;
    return createAuthContext({ type: 'terraform_internal' }, undefined, token);
  }
}
