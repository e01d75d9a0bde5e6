// Wire envelope types and schemas
export {
  errorEnvelopeSchema,
  paginationMetaSchema,
  paginationQuerySchema,
  type ErrorEnvelope,
  type PaginationMeta,
  type PaginationQuery,
  type PaginatedEnvelope,
} from './envelope.js';

// Error kinds
export { ErrorCodes, ErrorKindTable, type ErrorCode } from './error-codes.js';
