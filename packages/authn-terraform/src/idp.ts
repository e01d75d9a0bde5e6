/**
 * Terraform login identity provider
 *
 * Implements the authorization-code grant `terraform login` runs against the
 * `login.v1` service: an SSO-authenticated user approves the request, the
 * CLI receives a single-use code on its loopback listener and redeems it,
 * with its PKCE verifier, for an opaque access token.
 */

import crypto from 'crypto';
import { z } from 'zod';
import type { TerraformLoginService, TerraformTokenResponse } from '@terrashelf/protocol';
import {
  consumeAuthorizationCode,
  insertAuthorizationCode,
  isoTimestamp,
  addSeconds,
  logger,
  InvalidInputError,
  UnauthorizedError,
  type DatabaseExecutor,
} from '@terrashelf/core';
import { issueAccessToken, TokenSubjectSchema, type TokenSubject } from './tokens.js';

/** Authorization codes are valid for ten minutes */
export const AUTHORIZATION_CODE_TTL_SECONDS = 600;

/** Loopback ports terraform may listen on */
export const LOGIN_PORTS: [number, number] = [10000, 10010];

export const AuthorizationRequestSchema = z.object({
  client_id: z.string().min(1),
  redirect_uri: z.string().url(),
  response_type: z.literal('code'),
  state: z.string().min(1),
  code_challenge: z.string().min(43).max(128),
  code_challenge_method: z.literal('S256'),
});

export type AuthorizationRequest = z.infer<typeof AuthorizationRequestSchema>;

export const TokenRequestSchema = z.object({
  grant_type: z.literal('authorization_code'),
  code: z.string().min(1),
  code_verifier: z.string().min(43).max(128),
  redirect_uri: z.string().url(),
  client_id: z.string().min(1),
});

export type TokenRequest = z.infer<typeof TokenRequestSchema>;

export interface TerraformIdpOptions {
  clientId: string;
  /** Lifetime of issued access tokens */
  sessionExpirySeconds: number;
  clock?: () => Date;
}

function sha256Hex(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex');
}

function constantTimeEquals(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && crypto.timingSafeEqual(left, right);
}

/**
 * True for http://localhost, 127.0.0.1 or [::1] on a port in LOGIN_PORTS
 */
export function isLoopbackRedirect(redirectUri: string): boolean {
  let url: URL;
  try {
    url = new URL(redirectUri);
  } catch {
    return false;
  }
  if (url.protocol !== 'http:') return false;
  if (!['localhost', '127.0.0.1', '[::1]'].includes(url.hostname)) return false;
  const port = Number(url.port);
  return Number.isInteger(port) && port >= LOGIN_PORTS[0] && port <= LOGIN_PORTS[1];
}

export class TerraformIdpService {
  private readonly clock: () => Date;

  constructor(
    private readonly db: DatabaseExecutor,
    private readonly options: TerraformIdpOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * `login.v1` block for the discovery document
   */
  loginService(publicUrl: string): TerraformLoginService {
    return {
      client: this.options.clientId,
      grant_types: ['authz_code'],
      authz: `${publicUrl}/terraform/oauth/authorization`,
      token: `${publicUrl}/terraform/oauth/token`,
      ports: LOGIN_PORTS,
    };
  }

  /**
   * Validate the query of an authorization request
   *
   * @throws InvalidInputError
   */
  parseAuthorizationRequest(query: unknown): AuthorizationRequest {
    const parsed = AuthorizationRequestSchema.safeParse(query);
    if (!parsed.success) {
      throw new InvalidInputError(
        `Invalid authorization request: ${parsed.error.issues.map(issue => issue.path.join('.')).join(', ')}`
      );
    }
    if (!constantTimeEquals(parsed.data.client_id, this.options.clientId)) {
      throw new InvalidInputError('Unknown client_id');
    }
    if (!isLoopbackRedirect(parsed.data.redirect_uri)) {
      throw new InvalidInputError('redirect_uri must be a loopback address on an allowed port');
    }
    return parsed.data;
  }

  /**
   * Store a single-use code for an approved request
   *
   * @returns URL to redirect the browser to (the CLI's listener)
   */
  approve(request: AuthorizationRequest, subject: TokenSubject): string {
    const now = this.clock();
    const code = crypto.randomBytes(32).toString('base64url');

    insertAuthorizationCode(this.db, {
      code_hash: sha256Hex(code),
      client_id: request.client_id,
      redirect_uri: request.redirect_uri,
      code_challenge: request.code_challenge,
      subject: JSON.stringify(subject),
      expiry: isoTimestamp(addSeconds(now, AUTHORIZATION_CODE_TTL_SECONDS)),
      created_at: isoTimestamp(now),
    });
    logger.info(`[authn-terraform] Issued authorization code for ${subject.username}`);

    const redirect = new URL(request.redirect_uri);
    redirect.searchParams.set('code', code);
    redirect.searchParams.set('state', request.state);
    return redirect.toString();
  }

  /**
   * Redeem a code for an access token
   *
   * @throws InvalidInputError for malformed requests
   * @throws UnauthorizedError for unknown, replayed, expired or mismatched codes
   */
  async exchange(body: unknown): Promise<TerraformTokenResponse> {
    const parsed = TokenRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new InvalidInputError(
        `Invalid token request: ${parsed.error.issues.map(issue => issue.path.join('.')).join(', ')}`
      );
    }
    const request = parsed.data;
    const now = this.clock();

    const row = consumeAuthorizationCode(this.db, sha256Hex(request.code));
    if (!row) {
      throw new UnauthorizedError('Unknown or already used authorization code');
    }
    if (now.getTime() >= new Date(row.expiry).getTime()) {
      throw new UnauthorizedError('Authorization code expired');
    }
    if (row.client_id !== request.client_id || row.redirect_uri !== request.redirect_uri) {
      throw new UnauthorizedError('Authorization code was issued to another client');
    }
    const challenge = crypto.createHash('sha256').update(request.code_verifier).digest('base64url');
    if (!constantTimeEquals(challenge, row.code_challenge)) {
      throw new UnauthorizedError('PKCE verification failed');
    }

    let stored: unknown;
    try {
      stored = JSON.parse(row.subject);
    } catch (err) {
      logger.error({ err }, '[authn-terraform] Authorization code subject is not JSON');
      throw new UnauthorizedError('Authorization code is invalid');
    }
    const subject = TokenSubjectSchema.safeParse(stored);
    if (!subject.success) {
      throw new UnauthorizedError('Authorization code is invalid');
    }

    const issued = await issueAccessToken(this.db, subject.data, this.options.sessionExpirySeconds, now);
    return {
      access_token: issued.token,
      token_type: 'bearer',
      expires_in: this.options.sessionExpirySeconds,
    };
  }
}
