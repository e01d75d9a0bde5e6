/**
 * Route Schemas
 *
 * Zod schemas for path parameters, query strings and JSON bodies.
 */

import { z } from 'zod';
import { paginationQuerySchema } from '@terrashelf/contracts';

// Repeated query keys arrive as arrays
const stringList = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform(value => (value === undefined ? [] : Array.isArray(value) ? value : [value]).filter(v => v !== ''));

const queryBoolean = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform(value => (value === undefined ? undefined : value === 'true' || value === '1'));

// ==========================================================================
// MODULE PROTOCOL
// ==========================================================================

export const namespaceParamsSchema = z.object({
  namespace: z.string().min(1),
});

export const moduleParamsSchema = namespaceParamsSchema.extend({
  name: z.string().min(1),
});

export const moduleProviderParamsSchema = moduleParamsSchema.extend({
  provider: z.string().min(1),
});

export const moduleVersionParamsSchema = moduleProviderParamsSchema.extend({
  version: z.string().min(1),
});

/** Version routes ending in a repository path (`.../details/*`) */
export const moduleVersionPathParamsSchema = moduleVersionParamsSchema.extend({
  '*': z.string().min(1),
});

export const moduleListQuerySchema = paginationQuerySchema.extend({
  provider: stringList,
  verified: queryBoolean,
});

export const moduleSearchQuerySchema = paginationQuerySchema.extend({
  q: z.string().default(''),
  namespace: stringList,
  provider: stringList,
  verified: queryBoolean,
  trusted_namespaces: queryBoolean,
  contributed: queryBoolean,
});

export const latestDownloadQuerySchema = z.object({
  version: z.string().optional(),
});

export const presignedQuerySchema = z.object({
  ts: z.string().optional(),
  exp: z.string().optional(),
  sig: z.string().optional(),
});

// ==========================================================================
// MODULE ADMIN
// ==========================================================================

export const importBodySchema = z
  .object({
    version: z.string().min(1).optional(),
    git_tag: z.string().min(1).optional(),
  })
  .strict()
  .refine(body => body.version !== undefined || body.git_tag !== undefined, {
    message: 'Either version or git_tag is required',
  });

const URL_SCHEME = /^([A-Za-z][A-Za-z0-9+.-]*):\/\//;

/**
 * URL template restricted to the given schemes
 */
function urlTemplate(schemes: readonly string[]) {
  return z
    .string()
    .superRefine((value, ctx) => {
      const scheme = URL_SCHEME.exec(value)?.[1];
      if (scheme === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `URL does not contain a scheme (e.g. ${schemes[schemes.length - 1]}://)`,
        });
      } else if (!schemes.includes(scheme.toLowerCase())) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `URL contains an unknown scheme (e.g. ${schemes.join('/')})`,
        });
      }
    })
    .nullable()
    .optional();
}

export const CLONE_URL_SCHEMES = ['http', 'https', 'ssh'] as const;
export const BROWSE_URL_SCHEMES = ['http', 'https'] as const;

export const moduleProviderSettingsSchema = z
  .object({
    repo_base_url_template: urlTemplate(BROWSE_URL_SCHEMES),
    repo_clone_url_template: urlTemplate(CLONE_URL_SCHEMES),
    repo_browse_url_template: urlTemplate(BROWSE_URL_SCHEMES),
    git_tag_format: z.string().min(1).optional(),
    git_path: z.string().nullable().optional(),
    verified: z.boolean().optional(),
  })
  .strict();

export const createNamespaceBodySchema = z
  .object({
    name: z.string().min(1),
    display_name: z.string().nullable().optional(),
  })
  .strict();

// ==========================================================================
// PROVIDERS
// ==========================================================================

export const providerParamsSchema = namespaceParamsSchema.extend({
  provider: z.string().min(1),
});

export const providerVersionParamsSchema = providerParamsSchema.extend({
  version: z.string().min(1),
});

export const providerDownloadParamsSchema = providerVersionParamsSchema.extend({
  os: z.string().min(1),
  arch: z.string().min(1),
});

export const providerArtifactParamsSchema = providerVersionParamsSchema.extend({
  filename: z.string().min(1),
});

export const providerUploadQuerySchema = z.object({
  gpg_key_id: z.string().regex(/^[0-9A-Fa-f]{16}$/, 'gpg_key_id must be a 16 digit hex key id'),
});

export const gpgKeyListQuerySchema = z.object({
  'filter[namespace]': z
    .string()
    .optional()
    .transform(value => (value === undefined ? [] : value.split(',').map(v => v.trim()).filter(v => v !== ''))),
});

export const gpgKeyParamsSchema = namespaceParamsSchema.extend({
  keyId: z.string().min(1),
});

export const createGpgKeyBodySchema = z.object({
  data: z.object({
    type: z.literal('gpg-keys'),
    attributes: z.object({
      namespace: z.string().min(1),
      'ascii-armor': z.string().min(1),
      'key-id': z.string().optional(),
      'trust-signature': z.string().optional(),
      source: z.string().optional(),
      'source-url': z.string().url().nullable().optional(),
    }),
  }),
});

// ==========================================================================
// AUTH
// ==========================================================================

export const adminLoginBodySchema = z
  .object({
    admin_token: z.string().min(1).optional(),
  })
  .optional();

export const oidcCallbackQuerySchema = z.object({
  code: z.string().min(1),
  state: z.string().min(1),
});

export const samlAcsBodySchema = z.object({
  SAMLResponse: z.string().min(1),
  RelayState: z.string().optional(),
});

// ==========================================================================
// ADMIN READS
// ==========================================================================

export const auditHistoryQuerySchema = paginationQuerySchema;
