/**
 * API key recognizers
 *
 * Recognizers 1, 3 and 4 of the dispatch chain. Each holds only the
 * configured keys; nothing is stored per request.
 */

import type { AuthContext, AuthRequest, HeaderAuthMethod } from '@terrashelf/core';
import { createAuthContext, logger } from '@terrashelf/core';
import { keysMatch, matchesAnyKey, readApiKeyHeader } from './keys.js';

/**
 * Built-in admin: `X-Terrareg-ApiKey` equal to ADMIN_AUTHENTICATION_TOKEN
 */
export class AdminApiKeyMethod implements HeaderAuthMethod {
  readonly type = 'admin_api_key';
  readonly capability = 'header';

  constructor(private readonly adminToken: string | undefined) {}

  isEnabled(): boolean {
    return this.adminToken !== undefined && this.adminToken.length > 0;
  }

  async recognize(headers: AuthRequest['headers']): Promise<AuthContext | null> {
    const presented = readApiKeyHeader(headers);
    if (!presented || !this.adminToken) return null;
    if (!keysMatch(presented, this.adminToken)) return null;

    logger.debug('[authn-apikey] Admin API key accepted');
    return createAuthContext({ type: 'admin_api_key' });
  }
}

abstract class KeyListMethod implements HeaderAuthMethod {
  abstract readonly type: 'upload_api_key' | 'publish_api_key';
  readonly capability = 'header';

  constructor(private readonly keys: readonly string[]) {}

  isEnabled(): boolean {
    return this.keys.some(key => key.length > 0);
  }

  async recognize(headers: AuthRequest['headers']): Promise<AuthContext | null> {
    const presented = readApiKeyHeader(headers);
    if (!presented || !matchesAnyKey(presented, this.keys)) return null;

    logger.debug(`[authn-apikey] ${this.type} accepted`);
    return createAuthContext({ type: this.type });
  }
}

/**
 * Any key of UPLOAD_API_KEYS; may upload to every namespace
 */
export class UploadApiKeyMethod extends KeyListMethod {
  readonly type = 'upload_api_key';
}

/**
 * Any key of PUBLISH_API_KEYS; may publish in every namespace
 */
export class PublishApiKeyMethod extends KeyListMethod {
  readonly type = 'publish_api_key';
}
