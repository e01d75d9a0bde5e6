/**
 * @terrashelf/authn-session
 *
 * Session recognizers (admin, SAML, OpenID Connect), the OpenID Connect
 * authorization-code client and the SAML adapter contract.
 */

export { AdminSessionMethod, SamlSessionMethod, OidcSessionMethod } from './methods.js';
export {
  OidcClient,
  oidcSessionClaims,
  type OidcClientOptions,
  type OidcTokenResponse,
  type OidcUserInfo,
  type DiscoveryDocument,
  type AuthorizationUrlParams,
  type FetchFunction,
} from './oidc.js';
export { samlSessionClaims, type SamlAssertion, type SamlVerifier } from './saml.js';
export { generatePkcePair, pkceChallenge, type PkcePair } from './pkce.js';
