/**
 * @terrashelf/server
 *
 * HTTP surface of the registry: protocol routes, ingestion, provider hosting
 * and logins.
 */

export { RegistryServer } from './server.js';
export type { ServerOptions } from './server.js';

export * from './ingestion/index.js';
export { ModuleRegistryService, type ModuleAddress } from './services/module-registry-service.js';
export { ModuleSearchService } from './services/module-search-service.js';
export { ModuleContentService } from './services/module-content-service.js';
export { ModuleAdminService } from './services/module-admin-service.js';
export { ProviderService } from './services/provider-service.js';
export { AnalyticsRecorder } from './services/analytics-recorder.js';
export { SessionCleanupManager, type CleanupCounts } from './session/cleanup-manager.js';
export { toErrorResponse } from './http/error-handler.js';
