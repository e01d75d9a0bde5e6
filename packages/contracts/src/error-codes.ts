export const ErrorCodes = {
  INVALID_INPUT: 'INVALID_INPUT',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  STORAGE_UNAVAILABLE: 'STORAGE_UNAVAILABLE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * HTTP status and fallback wire message for each error kind.
 *
 * `exposeMessage` says whether the thrown error's own message may reach the
 * client; internal failures always answer with the fixed text.
 */
export const ErrorKindTable: Record<
  ErrorCode,
  { status: number; message: string; exposeMessage: boolean }
> = {
  INVALID_INPUT: { status: 400, message: 'Invalid input', exposeMessage: true },
  NOT_FOUND: { status: 404, message: 'Not Found', exposeMessage: false },
  CONFLICT: { status: 409, message: 'Conflict', exposeMessage: true },
  UNAUTHORIZED: { status: 401, message: 'Unauthorized', exposeMessage: true },
  FORBIDDEN: { status: 403, message: 'Forbidden', exposeMessage: true },
  STORAGE_UNAVAILABLE: { status: 503, message: 'Storage unavailable', exposeMessage: false },
  INTERNAL_ERROR: { status: 500, message: 'Internal Error', exposeMessage: false },
};
