/**
 * Authentication dispatcher
 *
 * Runs the ordered recognizer chain and returns the first context produced
 * by an enabled method, or the anonymous context. The method list is fixed
 * at construction and never mutated, so one dispatcher serves every request.
 */

import type { AuthContext, AuthMethod, AuthRequest, LoadedSession, SessionResolver } from '../spi/index.js';
import { anonymousContext } from './context.js';
import { InvalidSessionCookieError, SessionExpiredError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface AuthDispatcherOptions {
  /** Recognizers in priority order */
  methods: readonly AuthMethod[];
  sessions: SessionResolver;
  cookieName: string;
}

/**
 * Extract the token of an `Authorization: Bearer <token>` header
 */
export function extractBearerToken(headers: AuthRequest['headers']): string | null {
  const header = headers['authorization'];
  if (!header) return null;
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
  return match?.[1] ?? null;
}

export class AuthDispatcher {
  private readonly methods: readonly AuthMethod[];

  constructor(private readonly options: AuthDispatcherOptions) {
    this.methods = Object.freeze([...options.methods]);
  }

  /** Method types in dispatch order */
  get order(): string[] {
    return this.methods.map(method => method.type);
  }

  /**
   * Build the AuthContext for a request. Never throws for bad credentials.
   */
  async authenticate(request: AuthRequest): Promise<AuthContext> {
    const bearer = extractBearerToken(request.headers);
    let session: LoadedSession | null | undefined;

    for (const method of this.methods) {
      if (!method.isEnabled()) continue;

      let context: AuthContext | null = null;
      switch (method.capability) {
        case 'header':
          context = await method.recognize(request.headers);
          break;
        case 'session':
          if (session === undefined) {
            session = await this.loadSession(request);
          }
          if (session) {
            context = await method.recognize(session);
          }
          break;
        case 'bearer':
          if (bearer) {
            context = await method.recognize(bearer);
          }
          break;
        case 'token':
          context = await method.recognize(request);
          break;
      }

      if (context) {
        logger.debug(`[auth] Request authenticated by ${method.type}`);
        return context;
      }
    }

    return anonymousContext();
  }

  /**
   * Decrypt and load the session cookie. Expired or tampered cookies leave
   * the request unauthenticated.
   */
  private async loadSession(request: AuthRequest): Promise<LoadedSession | null> {
    const cookie = request.cookies[this.options.cookieName];
    if (!cookie) return null;
    try {
      return await this.options.sessions.resolveCookie(cookie);
    } catch (error) {
      if (error instanceof SessionExpiredError || error instanceof InvalidSessionCookieError) {
        logger.debug(`[auth] Ignoring session cookie: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}
