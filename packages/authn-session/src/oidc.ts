/**
 * OpenID Connect client
 *
 * Authorization-code flow with PKCE (RFC 6749 / RFC 7636). The user is
 * identified through the IdP's userinfo endpoint using the access token
 * returned by the code exchange.
 */

import { z } from 'zod';
import type { OidcSettings, SessionClaims } from '@terrashelf/core';
import { logger, UnauthorizedError, RegistryError } from '@terrashelf/core';

const DiscoveryDocumentSchema = z.object({
  issuer: z.string(),
  authorization_endpoint: z.string().url(),
  token_endpoint: z.string().url(),
  userinfo_endpoint: z.string().url(),
});

export type DiscoveryDocument = z.infer<typeof DiscoveryDocumentSchema>;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number().optional(),
  id_token: z.string().optional(),
});

export type OidcTokenResponse = z.infer<typeof TokenResponseSchema>;

const UserInfoSchema = z
  .object({
    sub: z.string().min(1),
    preferred_username: z.string().optional(),
    email: z.string().optional(),
    name: z.string().optional(),
    groups: z.array(z.string()).optional(),
  })
  .passthrough();

export type OidcUserInfo = z.infer<typeof UserInfoSchema>;

export type FetchFunction = typeof fetch;

export interface OidcClientOptions {
  settings: OidcSettings;
  /** Absolute callback URL registered with the IdP */
  redirectUri: string;
  /** Request timeout for IdP calls */
  timeoutMs: number;
  fetch?: FetchFunction;
}

export interface AuthorizationUrlParams {
  state: string;
  codeChallenge: string;
  nonce?: string;
}

/**
 * Map userinfo onto stored session claims
 */
export function oidcSessionClaims(userInfo: OidcUserInfo): SessionClaims {
  return {
    type: 'oidc',
    subject: userInfo.sub,
    username: userInfo.preferred_username ?? userInfo.email ?? userInfo.sub,
    groups: userInfo.groups ?? [],
    claims: { ...userInfo },
  };
}

export class OidcClient {
  private discovery?: DiscoveryDocument;
  private readonly fetchImpl: FetchFunction;

  constructor(private readonly options: OidcClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  get loginText(): string {
    return this.options.settings.loginText;
  }

  /**
   * Fetch (once) the issuer's discovery document
   */
  async discover(): Promise<DiscoveryDocument> {
    if (this.discovery) return this.discovery;

    const url = `${this.options.settings.issuer}/.well-known/openid-configuration`;
    const body = await this.requestJson(url, { method: 'GET', headers: { Accept: 'application/json' } });
    const parsed = DiscoveryDocumentSchema.safeParse(body);
    if (!parsed.success) {
      throw new RegistryError('OpenID Connect discovery document is invalid', 'oidc_discovery_failed', 502);
    }
    this.discovery = parsed.data;
    logger.info(`[authn-session] Loaded OpenID Connect discovery for ${parsed.data.issuer}`);
    return parsed.data;
  }

  async buildAuthorizationUrl(params: AuthorizationUrlParams): Promise<string> {
    const discovery = await this.discover();
    const url = new URL(discovery.authorization_endpoint);
    url.searchParams.set('client_id', this.options.settings.clientId);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('redirect_uri', this.options.redirectUri);
    url.searchParams.set('scope', this.options.settings.scopes.join(' '));
    url.searchParams.set('state', params.state);
    url.searchParams.set('code_challenge', params.codeChallenge);
    url.searchParams.set('code_challenge_method', 'S256');
    if (params.nonce) {
      url.searchParams.set('nonce', params.nonce);
    }
    return url.toString();
  }

  /**
   * Exchange an authorization code for tokens
   *
   * @throws UnauthorizedError when the IdP rejects the code
   */
  async exchangeCode(code: string, codeVerifier: string): Promise<OidcTokenResponse> {
    const discovery = await this.discover();
    const params = new URLSearchParams();
    params.set('grant_type', 'authorization_code');
    params.set('code', code);
    params.set('redirect_uri', this.options.redirectUri);
    params.set('client_id', this.options.settings.clientId);
    params.set('client_secret', this.options.settings.clientSecret);
    params.set('code_verifier', codeVerifier);

    const body = await this.requestJson(discovery.token_endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: params.toString(),
    });
    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UnauthorizedError('OpenID Connect token response is invalid');
    }
    return parsed.data;
  }

  async fetchUserInfo(accessToken: string): Promise<OidcUserInfo> {
    const discovery = await this.discover();
    const body = await this.requestJson(discovery.userinfo_endpoint, {
      method: 'GET',
      headers: { Authorization: `Bearer ${accessToken}`, Accept: 'application/json' },
    });
    const parsed = UserInfoSchema.safeParse(body);
    if (!parsed.success) {
      throw new UnauthorizedError('OpenID Connect userinfo response is invalid');
    }
    return parsed.data;
  }

  /**
   * Complete a login: code exchange, then userinfo
   */
  async completeLogin(code: string, codeVerifier: string): Promise<SessionClaims> {
    const tokens = await this.exchangeCode(code, codeVerifier);
    const userInfo = await this.fetchUserInfo(tokens.access_token);
    logger.info('[authn-session] OpenID Connect login completed');
    return oidcSessionClaims(userInfo);
  }

  private async requestJson(url: string, init: RequestInit): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(this.options.timeoutMs) });
    } catch (err) {
      logger.error({ err }, `[authn-session] OpenID Connect request failed: ${new URL(url).host}`);
      throw new RegistryError('OpenID Connect provider unreachable', 'oidc_unreachable', 502);
    }

    if (!response.ok) {
      logger.warn(`[authn-session] OpenID Connect request returned ${response.status}`);
      throw new UnauthorizedError(`OpenID Connect provider returned ${response.status}`);
    }

    try {
      const data: unknown = await response.json();
      return data;
    } catch (err) {
      logger.warn({ err }, '[authn-session] OpenID Connect response is not JSON');
      throw new UnauthorizedError('OpenID Connect provider returned a non-JSON response');
    }
  }
}
