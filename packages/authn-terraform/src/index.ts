/**
 * @terrashelf/authn-terraform
 *
 * Recognizers for credentials presented by the Terraform CLI, and the
 * identity provider behind `terraform login`.
 */

export { TerraformOidcMethod, TerraformAnalyticsKeyMethod, TerraformInternalExtractionMethod } from './methods.js';
export {
  TerraformIdpService,
  AuthorizationRequestSchema,
  TokenRequestSchema,
  AUTHORIZATION_CODE_TTL_SECONDS,
  LOGIN_PORTS,
  isLoopbackRedirect,
  type AuthorizationRequest,
  type TokenRequest,
  type TerraformIdpOptions,
} from './idp.js';
export {
  issueAccessToken,
  verifyAccessToken,
  parseAccessToken,
  ACCESS_TOKEN_PREFIX,
  TokenSubjectSchema,
  type TokenSubject,
  type IssuedAccessToken,
  type VerifiedAccessToken,
} from './tokens.js';
export {
  splitAnalyticsNamespace,
  analyticsTokenFromPath,
  ANALYTICS_TOKEN_SEPARATOR,
  type AnalyticsNamespace,
} from './analytics-path.js';
