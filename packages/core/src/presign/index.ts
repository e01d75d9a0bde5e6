/**
 * Presigned download URLs
 *
 * `<path>?ts=<unix>&exp=<unix>&sig=<hex>` where
 * sig = HMAC-SHA256(secret, path || ts || exp).
 */

import crypto from 'crypto';

export interface PresignedParams {
  ts: number;
  exp: number;
  sig: string;
}

export type PresignVerification =
  | { valid: true }
  | { valid: false; reason: 'malformed' | 'expired' | 'lifetime_exceeded' | 'bad_signature' };

export interface UrlSignerOptions {
  secret: Buffer;
  /** Upper bound on exp - ts */
  maxLifetimeSeconds: number;
  clock?: () => Date;
}

function unixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export class UrlSigner {
  private readonly clock: () => Date;

  constructor(private readonly options: UrlSignerOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  signature(path: string, ts: number, exp: number): string {
    return crypto
      .createHmac('sha256', this.options.secret)
      .update(`${path}${ts}${exp}`)
      .digest('hex');
  }

  /**
   * Sign a path valid for `lifetimeSeconds` (capped at the configured maximum)
   */
  sign(path: string, lifetimeSeconds: number = this.options.maxLifetimeSeconds): PresignedParams {
    const ts = unixSeconds(this.clock());
    const exp = ts + Math.min(lifetimeSeconds, this.options.maxLifetimeSeconds);
    return { ts, exp, sig: this.signature(path, ts, exp) };
  }

  /**
   * Signed path with its query string appended
   */
  signPath(path: string, lifetimeSeconds?: number): string {
    const { ts, exp, sig } = this.sign(path, lifetimeSeconds);
    return `${path}?ts=${ts}&exp=${exp}&sig=${sig}`;
  }

  /**
   * Accept exactly when now <= exp, exp - ts <= max lifetime and the HMAC matches
   */
  verify(
    path: string,
    query: { ts?: string | undefined; exp?: string | undefined; sig?: string | undefined }
  ): PresignVerification {
    if (query.ts === undefined || query.exp === undefined || query.sig === undefined) {
      return { valid: false, reason: 'malformed' };
    }
    if (!/^\d+$/.test(query.ts) || !/^\d+$/.test(query.exp) || !/^[0-9a-f]{64}$/.test(query.sig)) {
      return { valid: false, reason: 'malformed' };
    }
    const ts = Number(query.ts);
    const exp = Number(query.exp);

    const expected = Buffer.from(this.signature(path, ts, exp), 'hex');
    const presented = Buffer.from(query.sig, 'hex');
    if (!crypto.timingSafeEqual(expected, presented)) {
      return { valid: false, reason: 'bad_signature' };
    }
    if (exp - ts > this.options.maxLifetimeSeconds) {
      return { valid: false, reason: 'lifetime_exceeded' };
    }
    if (unixSeconds(this.clock()) > exp) {
      return { valid: false, reason: 'expired' };
    }
    return { valid: true };
  }
}
