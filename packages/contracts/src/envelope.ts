import { z } from 'zod';

// Error response envelope, as Terraform clients expect it
export const errorEnvelopeSchema = z.object({
  errors: z.array(z.string()).min(1),
});

// Offset pagination block used by module listing and search
export const paginationMetaSchema = z.object({
  limit: z.number().int().positive(),
  current_offset: z.number().int().nonnegative(),
  next_offset: z.number().int().nonnegative().optional(),
  prev_offset: z.number().int().nonnegative().optional(),
});

// Query string accepted by every offset-paginated listing
export const paginationQuerySchema = z.object({
  offset: z.coerce.number().int().catch(0).transform(n => Math.max(0, n)),
  limit: z.coerce
    .number()
    .int()
    .catch(10)
    .transform(n => Math.min(50, Math.max(1, n))),
});

// TypeScript types
export type ErrorEnvelope = z.infer<typeof errorEnvelopeSchema>;
export type PaginationMeta = z.infer<typeof paginationMetaSchema>;
export type PaginationQuery = z.infer<typeof paginationQuerySchema>;
export type PaginatedEnvelope<K extends string, T> = { meta: PaginationMeta } & Record<K, T[]>;
