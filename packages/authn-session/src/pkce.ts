import crypto from 'crypto';

export interface PkcePair {
  codeVerifier: string;
  codeChallenge: string;
}

/**
 * S256 challenge of a verifier: BASE64URL(SHA256(verifier))
 */
export function pkceChallenge(codeVerifier: string): string {
  return crypto.createHash('sha256').update(codeVerifier).digest('base64url');
}

/**
 * Generate a code verifier (64 random bytes, base64url) and its challenge
 */
export function generatePkcePair(): PkcePair {
  const codeVerifier = crypto.randomBytes(64).toString('base64url');
  return { codeVerifier, codeChallenge: pkceChallenge(codeVerifier) };
}
