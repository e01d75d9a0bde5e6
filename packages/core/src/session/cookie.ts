/**
 * Session cookie cipher
 *
 * AES-256-GCM with key = SHA-256(SECRET_KEY bytes). A cookie is
 * base64url(nonce[12] || ciphertext || tag[16]).
 */

import crypto from 'crypto';
import { z } from 'zod';
import { InvalidSessionCookieError } from '../utils/errors.js';

const NONCE_BYTES = 12;
const TAG_BYTES = 16;

export const CookiePayloadSchema = z.object({
  session_id: z.string().min(1),
});

export type CookiePayload = z.infer<typeof CookiePayloadSchema>;

export class CookieCipher {
  private readonly key: Buffer;

  constructor(secretKey: Buffer) {
    this.key = crypto.createHash('sha256').update(secretKey).digest();
  }

  encrypt(payload: CookiePayload): string {
    const nonce = crypto.randomBytes(NONCE_BYTES);
    const cipher = crypto.createCipheriv('aes-256-gcm', this.key, nonce);
    const encrypted = Buffer.concat([cipher.update(JSON.stringify(payload), 'utf8'), cipher.final()]);
    return Buffer.concat([nonce, encrypted, cipher.getAuthTag()]).toString('base64url');
  }

  /**
   * @throws InvalidSessionCookieError when the value was modified or is malformed
   */
  decrypt(cookie: string): CookiePayload {
    const combined = Buffer.from(cookie, 'base64url');
    if (combined.length < NONCE_BYTES + TAG_BYTES + 1) {
      throw new InvalidSessionCookieError('Session cookie is too short');
    }

    const nonce = combined.subarray(0, NONCE_BYTES);
    const ciphertext = combined.subarray(NONCE_BYTES, combined.length - TAG_BYTES);
    const tag = combined.subarray(combined.length - TAG_BYTES);

    let plaintext: string;
    try {
      const decipher = crypto.createDecipheriv('aes-256-gcm', this.key, nonce);
      decipher.setAuthTag(tag);
      plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
    } catch {
      throw new InvalidSessionCookieError('Session cookie failed authentication');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(plaintext);
    } catch {
      throw new InvalidSessionCookieError('Session cookie payload is not JSON');
    }
    const result = CookiePayloadSchema.safeParse(parsed);
    if (!result.success) {
      throw new InvalidSessionCookieError('Session cookie payload has an unexpected shape');
    }
    return result.data;
  }
}
