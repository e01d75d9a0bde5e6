/**
 * Session Cleanup Manager
 *
 * Periodic sweep of expired login sessions, OAuth state records and
 * Terraform login codes and tokens. A failed sweep is logged and the timer
 * keeps running.
 */

import {
  deleteExpiredSessions,
  deleteExpiredAuthorizationCodes,
  deleteExpiredAccessTokens,
  logger,
  type DatabaseExecutor,
} from '@terrashelf/core';

export interface SessionCleanupConfig {
  /** Interval between sweeps (ms) */
  intervalMs: number;
  clock?: () => Date;
}

/**
 * Rows removed by one sweep
 */
export interface CleanupCounts {
  sessions: number;
  oauthStates: number;
  authorizationCodes: number;
  accessTokens: number;
}

export class SessionCleanupManager {
  private timer: NodeJS.Timeout | null = null;
  private isRunning = false;
  private readonly clock: () => Date;

  constructor(
    private readonly db: DatabaseExecutor,
    private readonly config: SessionCleanupConfig
  ) {
    this.clock = config.clock ?? (() => new Date());
  }

  start(): void {
    if (this.isRunning) {
      logger.warn('[session-cleanup] Manager already running');
      return;
    }

    this.isRunning = true;
    logger.info(`[session-cleanup] Starting manager (interval: ${this.config.intervalMs}ms)`);

    this.timer = setInterval(() => {
      this.sweep().catch(err => {
        logger.error({ err }, '[session-cleanup] Sweep error');
      });
    }, this.config.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.isRunning) {
      return;
    }

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.isRunning = false;
    logger.info('[session-cleanup] Manager stopped');
  }

  /**
   * Delete everything expired as of now
   */
  runOnce(): CleanupCounts {
    const now = this.clock();
    const counts: CleanupCounts = {
      sessions: deleteExpiredSessions(this.db, 'user', now),
      oauthStates: deleteExpiredSessions(this.db, 'oauth_state', now),
      authorizationCodes: deleteExpiredAuthorizationCodes(this.db, now),
      accessTokens: deleteExpiredAccessTokens(this.db, now),
    };

    const total = counts.sessions + counts.oauthStates + counts.authorizationCodes + counts.accessTokens;
    if (total > 0) {
      logger.info(
        `[session-cleanup] Removed ${counts.sessions} sessions, ${counts.oauthStates} OAuth states, ` +
          `${counts.authorizationCodes} authorization codes, ${counts.accessTokens} access tokens`
      );
    }
    return counts;
  }

  private async sweep(): Promise<void> {
    this.runOnce();
  }
}
