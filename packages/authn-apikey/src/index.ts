/**
 * @terrashelf/authn-apikey
 *
 * Admin, upload and publish API key recognizers. All three read the
 * `X-Terrareg-ApiKey` header and compare in constant time.
 */

export { AdminApiKeyMethod, UploadApiKeyMethod, PublishApiKeyMethod } from './methods.js';
export { API_KEY_HEADER, keysMatch, matchesAnyKey, readApiKeyHeader } from './keys.js';
