/**
 * Custom error classes
 *
 * All registry errors extend RegistryError. The HTTP layer maps `code` onto the
 * wire error table; nothing below the HTTP layer knows about status bodies.
 */

import { ErrorCodes, type ErrorCode } from '@terrashelf/contracts';

export class RegistryError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RegistryError';
  }

  /** Wire kind this error is reported as */
  get kind(): ErrorCode {
    return ErrorCodes.INTERNAL_ERROR;
  }
}

export class InvalidInputError extends RegistryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'invalid_input', 400, details);
    this.name = 'InvalidInputError';
  }

  override get kind(): ErrorCode {
    return ErrorCodes.INVALID_INPUT;
  }
}

export class NotFoundError extends RegistryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'not_found', 404, details);
    this.name = 'NotFoundError';
  }

  override get kind(): ErrorCode {
    return ErrorCodes.NOT_FOUND;
  }
}

export class ConflictError extends RegistryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'conflict', 409, details);
    this.name = 'ConflictError';
  }

  override get kind(): ErrorCode {
    return ErrorCodes.CONFLICT;
  }
}

export class UnauthorizedError extends RegistryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'unauthorized', 401, details);
    this.name = 'UnauthorizedError';
  }

  override get kind(): ErrorCode {
    return ErrorCodes.UNAUTHORIZED;
  }
}

export class ForbiddenError extends RegistryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'forbidden', 403, details);
    this.name = 'ForbiddenError';
  }

  override get kind(): ErrorCode {
    return ErrorCodes.FORBIDDEN;
  }
}

/**
 * A path component tried to leave its base directory, or an archive entry
 * would land outside the extraction root. Never recovered.
 */
export class PathTraversalError extends RegistryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'path_traversal', 400, details);
    this.name = 'PathTraversalError';
  }

  override get kind(): ErrorCode {
    return ErrorCodes.INVALID_INPUT;
  }
}

export class InvalidPathError extends RegistryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'invalid_path', 400, details);
    this.name = 'InvalidPathError';
  }

  override get kind(): ErrorCode {
    return ErrorCodes.INVALID_INPUT;
  }
}

/**
 * Retryable storage backend failure
 */
export class StorageUnavailableError extends RegistryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'storage_unavailable', 503, details);
    this.name = 'StorageUnavailableError';
  }

  override get kind(): ErrorCode {
    return ErrorCodes.STORAGE_UNAVAILABLE;
  }
}

export class ExternalToolError extends RegistryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'external_tool_failed', 500, details);
    this.name = 'ExternalToolError';
  }
}

export class SessionExpiredError extends RegistryError {
  constructor(message = 'Session expired') {
    super(message, 'session_expired', 401);
    this.name = 'SessionExpiredError';
  }

  override get kind(): ErrorCode {
    return ErrorCodes.UNAUTHORIZED;
  }
}

export class InvalidSessionCookieError extends RegistryError {
  constructor(message = 'Invalid session cookie') {
    super(message, 'invalid_session_cookie', 401);
    this.name = 'InvalidSessionCookieError';
  }

  override get kind(): ErrorCode {
    return ErrorCodes.UNAUTHORIZED;
  }
}
