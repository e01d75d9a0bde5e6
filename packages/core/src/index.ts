/**
 * @terrashelf/core
 *
 * Core package exports: configuration, storage, persistence, sessions,
 * authentication dispatch and the pure registry algorithms (versions,
 * constraints, search scoring, presigned URLs).
 */

// Database layer
export * from './db/index.js';

// Schema types
export * from './schema/index.js';

// SPI interfaces
export * from './spi/index.js';

// Configuration
export * from './config/index.js';

// Storage backends and archive handling
export * from './storage/index.js';

// Authentication context, permission checks and dispatch
export * from './auth/context.js';
export * from './auth/permissions.js';
export * from './auth/dispatcher.js';

// Sessions and OAuth state
export * from './session/index.js';

// Presigned download URLs
export * from './presign/index.js';

// Versions, constraints and search scoring
export * from './versions/index.js';
export * from './search/index.js';

// Analytics buffer
export * from './analytics/buffer.js';

// Identifier validation
export * from './validation/index.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/logger.js';
export * from './utils/time.js';
