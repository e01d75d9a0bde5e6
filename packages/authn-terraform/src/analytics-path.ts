/**
 * Analytics token embedded in a module path
 *
 * Terraform sources of the form `registry/<token>__<namespace>/<module>/<provider>`
 * carry a caller-chosen token used to attribute downloads.
 */

export const ANALYTICS_TOKEN_SEPARATOR = '__';

export interface AnalyticsNamespace {
  token: string | null;
  namespace: string;
}

/**
 * Split a namespace path segment into analytics token and namespace
 */
export function splitAnalyticsNamespace(segment: string): AnalyticsNamespace {
  const separator = segment.indexOf(ANALYTICS_TOKEN_SEPARATOR);
  if (separator <= 0) {
    return { token: null, namespace: segment };
  }
  return {
    token: segment.slice(0, separator),
    namespace: segment.slice(separator + ANALYTICS_TOKEN_SEPARATOR.length),
  };
}

const MODULE_PATH = /^\/v1\/modules\/([^/]+)\//;

/**
 * Analytics token of a `/v1/modules/<segment>/...` request path, if any
 */
export function analyticsTokenFromPath(path: string): string | null {
  const match = MODULE_PATH.exec(path);
  const segment = match?.[1];
  if (segment === undefined) return null;
  return splitAnalyticsNamespace(decodeURIComponent(segment)).token;
}
