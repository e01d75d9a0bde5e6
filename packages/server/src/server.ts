import Fastify, { type FastifyInstance } from 'fastify';
import fastifyCookie from '@fastify/cookie';
import fastifyCors from '@fastify/cors';
import fastifyFormbody from '@fastify/formbody';
import path from 'path';
import {
  AuthDispatcher,
  CookieCipher,
  LocalFilesystemStorage,
  SessionService,
  UrlSigner,
  closeDatabase,
  initializeDatabase,
  logger,
  parseDatabaseUrl,
  runMigrations,
  type DatabaseClient,
  type ResolvedConfig,
} from '@terrashelf/core';
import { AdminApiKeyMethod, PublishApiKeyMethod, UploadApiKeyMethod } from '@terrashelf/authn-apikey';
import {
  AdminSessionMethod,
  OidcClient,
  OidcSessionMethod,
  SamlSessionMethod,
  type FetchFunction,
  type SamlVerifier,
} from '@terrashelf/authn-session';
import {
  TerraformAnalyticsKeyMethod,
  TerraformIdpService,
  TerraformInternalExtractionMethod,
  TerraformOidcMethod,
} from '@terrashelf/authn-terraform';
import { LocalGroupAuthorizationProvider } from '@terrashelf/authz-local';
import { ChildProcessCommandService, type SystemCommandService } from './ingestion/command-service.js';
import { ModuleIngestionService } from './ingestion/pipeline.js';
import { AnalyticsRecorder } from './services/analytics-recorder.js';
import { ModuleAdminService } from './services/module-admin-service.js';
import { ModuleRegistryService } from './services/module-registry-service.js';
import { ModuleSearchService } from './services/module-search-service.js';
import { ModuleContentService } from './services/module-content-service.js';
import { ProviderService } from './services/provider-service.js';
import { SessionCleanupManager } from './session/cleanup-manager.js';
import { registerAuthHook } from './http/auth-hook.js';
import { registerErrorHandler } from './http/error-handler.js';
import { moduleRoutes } from './routes/modules.js';
import { moduleAdminRoutes } from './routes/module-admin.js';
import { providerRoutes } from './routes/providers.js';
import { authRoutes } from './routes/auth.js';
import { terraformLoginRoutes } from './routes/terraform-login.js';
import { adminRoutes } from './routes/admin.js';

/**
 * Registry Server
 *
 * Plain HTTP behind a TLS-terminating proxy; PUBLIC_URL decides whether
 * cookies are marked secure. One process owns the database, the storage
 * directory, the analytics buffer and the session cleanup timer.
 */

export interface ServerOptions {
  config: ResolvedConfig;
  /** Replaces the child process runner for git and the analyzers */
  commandService?: SystemCommandService;
  /** SAML XML verification adapter; SAML logins answer 401 without one */
  samlVerifier?: SamlVerifier;
  /** Replaces global fetch for IdP calls */
  oidcFetch?: FetchFunction;
  clock?: () => Date;
  /** Analytics flush period (ms) */
  analyticsFlushIntervalMs?: number;
}

/** Default analytics flush period */
const ANALYTICS_FLUSH_INTERVAL_MS = 10_000;

/** Archive uploads carry a little framing on top of the archive limit */
const BODY_LIMIT_OVERHEAD_BYTES = 64 * 1024;

export class RegistryServer {
  private fastify: FastifyInstance | null = null;
  private db: DatabaseClient | null = null;
  private authz: LocalGroupAuthorizationProvider | null = null;
  private analytics: AnalyticsRecorder | null = null;
  private cleanupManager: SessionCleanupManager | null = null;

  constructor(private readonly options: ServerOptions) {}

  /**
   * Open the database, build the services and register every route
   */
  async initialize(): Promise<void> {
    const { domain, infra } = this.options.config;
    const clock = this.options.clock ?? (() => new Date());
    logger.info(`[server] Initializing ${domain.applicationName}...`);

    this.fastify = Fastify({
      logger: {
        level: infra.logLevel,
      },
      bodyLimit: infra.maxArchiveBytes + BODY_LIMIT_OVERHEAD_BYTES,
    });

    // Database
    const databaseConfig = parseDatabaseUrl(infra.databaseUrl);
    logger.info(`[server] Opening database: ${databaseConfig.sqliteFilePath}`);
    const db = initializeDatabase(databaseConfig);
    runMigrations(db);
    this.db = db;

    // Storage and cryptographic helpers
    const storage = new LocalFilesystemStorage(path.resolve(infra.dataDirectory));
    const sessions = new SessionService(db, new CookieCipher(infra.secretKey), {
      maxTtlSeconds: infra.sessions.maxTtlMinutes * 60,
      clock,
    });
    const signer = new UrlSigner({
      secret: infra.presignedUrlSecret,
      maxLifetimeSeconds: infra.presignedUrlMaxLifetimeSeconds,
      clock,
    });

    // Authorization and authentication
    const authz = new LocalGroupAuthorizationProvider(db);
    await authz.initialize();
    this.authz = authz;

    const dispatcher = new AuthDispatcher({
      methods: [
        new AdminApiKeyMethod(infra.adminAuthenticationToken),
        new AdminSessionMethod(infra.adminAuthenticationToken !== undefined),
        new UploadApiKeyMethod(infra.uploadApiKeys),
        new PublishApiKeyMethod(infra.publishApiKeys),
        new SamlSessionMethod(infra.saml !== undefined, authz),
        new OidcSessionMethod(infra.oidc !== undefined, authz),
        new TerraformOidcMethod(db, infra.terraformIdp.enabled, authz, clock),
        new TerraformAnalyticsKeyMethod(infra.analyticsAuthKeys),
        new TerraformInternalExtractionMethod(infra.internalExtractionToken),
      ],
      sessions,
      cookieName: infra.sessions.cookieName,
    });
    logger.info(`[server] Authentication order: ${dispatcher.order.join(', ')}`);

    const oidc = infra.oidc
      ? new OidcClient({
          settings: infra.oidc,
          redirectUri: `${infra.publicUrl}/openid/callback`,
          timeoutMs: infra.timeouts.standardRequestSeconds * 1000,
          fetch: this.options.oidcFetch,
        })
      : null;
    const saml = infra.saml && this.options.samlVerifier ? this.options.samlVerifier : null;
    if (infra.saml && !saml) {
      logger.warn('[server] SAML is configured but no verifier was supplied; SAML logins are disabled');
    }
    const idp = infra.terraformIdp.enabled
      ? new TerraformIdpService(db, {
          clientId: infra.terraformIdp.clientId,
          sessionExpirySeconds: infra.terraformIdp.sessionExpirySeconds,
          clock,
        })
      : null;

    // Services
    const analytics = new AnalyticsRecorder(db, {
      queueSize: infra.analyticsQueueSize,
      enqueueTimeoutMs: infra.analyticsEnqueueTimeoutMs,
      flushIntervalMs: this.options.analyticsFlushIntervalMs ?? ANALYTICS_FLUSH_INTERVAL_MS,
    });
    analytics.start();
    this.analytics = analytics;

    const registry = new ModuleRegistryService({ db, domain, infra, signer, analytics });
    const search = new ModuleSearchService(db, domain, registry);
    const content = new ModuleContentService({ db, storage });
    const admin = new ModuleAdminService({ db, storage, domain });
    const ingestion = new ModuleIngestionService({
      db,
      storage,
      commands: this.options.commandService ?? new ChildProcessCommandService(),
      domain,
      infra,
    });
    const providers = new ProviderService({ db, storage, domain, infra, signer });

    this.cleanupManager = new SessionCleanupManager(db, {
      intervalMs: infra.sessions.cleanupIntervalSeconds * 1000,
      clock,
    });
    this.cleanupManager.start();

    // HTTP plumbing
    await this.fastify.register(fastifyCookie);
    await this.fastify.register(fastifyFormbody);
    await this.fastify.register(fastifyCors, {
      origin: false, // Default deny
    });

    this.fastify.addHook('onSend', async (_request, reply) => {
      reply.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
      reply.header('X-Content-Type-Options', 'nosniff');
      reply.header('X-Frame-Options', 'DENY');
      if (!reply.hasHeader('Cache-Control')) {
        reply.header('Cache-Control', 'no-store');
      }
    });

    registerErrorHandler(this.fastify);
    registerAuthHook(this.fastify, dispatcher);

    // Routes
    await this.fastify.register(terraformLoginRoutes, {
      infra,
      idp,
      loginPath: oidc ? '/openid/login' : null,
    });
    await this.fastify.register(moduleRoutes, { domain, registry, search, content, storage, signer });
    await this.fastify.register(moduleAdminRoutes, {
      ingestion,
      admin,
      maxArchiveBytes: infra.maxArchiveBytes,
    });
    await this.fastify.register(providerRoutes, {
      domain,
      providers,
      signer,
      maxArchiveBytes: infra.maxArchiveBytes,
    });
    await this.fastify.register(authRoutes, { db, infra, sessions, oidc, saml });
    await this.fastify.register(adminRoutes, { db, domain, admin, analytics, authorization: authz });

    logger.info('[server] Initialization complete');
  }

  async start(): Promise<void> {
    if (!this.fastify) {
      throw new Error('Server not initialized - call initialize() first');
    }

    const { listenHost, listenPort, publicUrl } = this.options.config.infra;
    try {
      await this.fastify.listen({ host: listenHost, port: listenPort });
      logger.info(`[server] Listening on http://${listenHost}:${listenPort} (public URL ${publicUrl})`);
    } catch (err) {
      logger.error({ err }, '[server] Failed to start');
      throw err;
    }
  }

  /**
   * Stop timers, flush analytics, then close HTTP and the database
   */
  async stop(): Promise<void> {
    logger.info('[server] Shutting down...');

    if (this.cleanupManager) {
      this.cleanupManager.stop();
      this.cleanupManager = null;
    }

    if (this.fastify) {
      await this.fastify.close();
      this.fastify = null;
    }

    if (this.analytics) {
      await this.analytics.shutdown();
      this.analytics = null;
    }

    if (this.authz) {
      await this.authz.shutdown();
      this.authz = null;
    }

    if (this.db) {
      closeDatabase(this.db);
      this.db = null;
    }

    logger.info('[server] Shutdown complete');
  }

  getServer(): FastifyInstance {
    if (!this.fastify) {
      throw new Error('Server not initialized');
    }
    return this.fastify;
  }

  getDatabase(): DatabaseClient {
    if (!this.db) {
      throw new Error('Server not initialized');
    }
    return this.db;
  }

  /**
   * Session cleanup sweep on demand
   */
  runCleanup(): ReturnType<SessionCleanupManager['runOnce']> {
    if (!this.cleanupManager) {
      throw new Error('Server not initialized');
    }
    return this.cleanupManager.runOnce();
  }

  /**
   * Write queued analytics now
   */
  async flushAnalytics(): Promise<void> {
    await this.analytics?.flush();
  }
}
