/**
 * SAML adapter contract
 *
 * XML signature verification is delegated to an adapter supplied by the
 * deployment; without one the SAML routes answer 401.
 */

import type { SamlSettings, SessionClaims } from '@terrashelf/core';

/**
 * A verified assertion
 */
export interface SamlAssertion {
  nameId: string;
  attributes: Record<string, string[]>;
}

export interface SamlVerifier {
  /**
   * IdP redirect URL for a new login
   *
   * @param relayState Opaque value echoed back to the ACS endpoint
   */
  buildLoginUrl(relayState: string): Promise<string>;

  /**
   * Verify a base64 `SAMLResponse` posted to the ACS endpoint
   *
   * @throws when the signature, audience or validity window does not check out
   */
  verifyResponse(samlResponse: string): Promise<SamlAssertion>;
}

/**
 * Map a verified assertion onto stored session claims
 */
export function samlSessionClaims(assertion: SamlAssertion, settings: Pick<SamlSettings, 'groupAttribute'>): SessionClaims {
  const username =
    assertion.attributes['username']?.[0] ?? assertion.attributes['email']?.[0] ?? assertion.nameId;
  return {
    type: 'saml',
    subject: assertion.nameId,
    username,
    groups: assertion.attributes[settings.groupAttribute] ?? [],
    attributes: assertion.attributes,
  };
}
