/**
 * Analytics Recorder
 *
 * Download events go through the bounded AnalyticsBuffer and are written in
 * batches. Recording never fails a download.
 */

import {
  AnalyticsBuffer,
  existingModuleVersionIds,
  insertAnalyticsBatch,
  logger,
  type AnalyticsBufferStats,
  type AnalyticsEvent,
  type DatabaseClient,
} from '@terrashelf/core';

export interface AnalyticsRecorderConfig {
  queueSize: number;
  enqueueTimeoutMs: number;
  flushIntervalMs: number;
}

/**
 * Constraint failures repeat on every retry; anything else (a busy or locked
 * database) may pass next time
 */
export function isTransientWriteError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error) || typeof error.code !== 'string') {
    return true;
  }
  return !error.code.startsWith('SQLITE_CONSTRAINT');
}

export class AnalyticsRecorder {
  private readonly buffer: AnalyticsBuffer;

  constructor(
    private readonly db: DatabaseClient,
    config: AnalyticsRecorderConfig
  ) {
    this.buffer = new AnalyticsBuffer(
      {
        size: config.queueSize,
        enqueueTimeoutMs: config.enqueueTimeoutMs,
        flushIntervalMs: config.flushIntervalMs,
        isRetryable: isTransientWriteError,
      },
      async events => this.write(events)
    );
  }

  start(): void {
    this.buffer.start();
  }

  /**
   * Queue a download event; resolves false when it was dropped
   */
  async record(event: AnalyticsEvent): Promise<boolean> {
    const accepted = await this.buffer.enqueue(event);
    if (!accepted) {
      logger.warn(`[analytics] Dropped download event for module version ${event.moduleVersionId}`);
    }
    return accepted;
  }

  flush(): Promise<void> {
    return this.buffer.flush();
  }

  getStats(): AnalyticsBufferStats {
    return this.buffer.getStats();
  }

  /**
   * Stop the timer and write what is still queued
   */
  async shutdown(): Promise<void> {
    await this.buffer.shutdown();
  }

  private write(events: AnalyticsEvent[]): void {
    // Versions deleted since the download was queued
    const existing = existingModuleVersionIds(
      this.db,
      events.map(event => event.moduleVersionId)
    );
    const recordable = events.filter(event => existing.has(event.moduleVersionId));
    if (recordable.length < events.length) {
      logger.info(`[analytics] Skipped ${events.length - recordable.length} events of deleted module versions`);
    }

    const written = insertAnalyticsBatch(
      this.db,
      recordable.map(event => ({
        module_version_id: event.moduleVersionId,
        analytics_token: event.analyticsToken,
        environment: event.environment,
        terraform_version: event.terraformVersion,
        auth_method: event.authMethod,
        timestamp: event.timestamp,
      }))
    );
    logger.debug(`[analytics] Wrote ${written} download events`);
  }
}
