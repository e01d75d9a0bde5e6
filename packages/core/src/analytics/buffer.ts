/**
 * Analytics Buffer
 *
 * Bounded in-memory queue of download events flushed to the database on a
 * timer and on shutdown. Recording is at-most-once: when the queue stays full
 * past the enqueue timeout the event is dropped, and a batch whose flush fails
 * permanently is not retried.
 */

import { logger } from '../utils/logger.js';
import { RegistryError } from '../utils/errors.js';

export interface AnalyticsEvent {
  moduleVersionId: number;
  analyticsToken: string | null;
  environment: string | null;
  terraformVersion: string | null;
  authMethod: string;
  /** ISO 8601 */
  timestamp: string;
}

export interface AnalyticsBufferConfig {
  /** Maximum queued events */
  size: number;
  /** Longest an enqueue waits for space */
  enqueueTimeoutMs: number;
  flushIntervalMs: number;
  /** Events of a failed flush are requeued only when this holds; defaults to always */
  isRetryable?: (error: unknown) => boolean;
}

export interface AnalyticsBufferStats {
  total_received: number;
  total_flushed: number;
  total_dropped: number;
  current_size: number;
  buffer_capacity: number;
}

export type AnalyticsFlushCallback = (events: AnalyticsEvent[]) => Promise<void>;

export class AnalyticsBuffer {
  private buffer: AnalyticsEvent[] = [];
  private waiters: Array<() => void> = [];
  private flushTimer?: NodeJS.Timeout;
  private flushing?: Promise<void>;

  private stats: AnalyticsBufferStats = {
    total_received: 0,
    total_flushed: 0,
    total_dropped: 0,
    current_size: 0,
    buffer_capacity: 0,
  };

  constructor(
    private readonly config: AnalyticsBufferConfig,
    private readonly flushCallback: AnalyticsFlushCallback
  ) {
    this.stats.buffer_capacity = config.size;
  }

  /**
   * Start automatic flush timer
   */
  start(): void {
    if (this.flushTimer) return;

    this.flushTimer = setInterval(() => {
      this.flush().catch(err => {
        logger.error({ err }, '[analytics-buffer] Auto-flush error');
      });
    }, this.config.flushIntervalMs);
    // Never keep the process alive for analytics
    this.flushTimer.unref();
  }

  stop(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = undefined;
    }
  }

  /**
   * Queue an event, waiting at most `enqueueTimeoutMs` for space
   *
   * @returns false when the event was dropped
   */
  async enqueue(event: AnalyticsEvent): Promise<boolean> {
    this.stats.total_received++;

    if (this.buffer.length >= this.config.size) {
      // Ask for a flush and wait for space
      this.flush().catch(err => {
        logger.error({ err }, '[analytics-buffer] Overflow flush error');
      });
      const gotSpace = await this.waitForSpace();
      if (!gotSpace) {
        this.stats.total_dropped++;
        logger.warn('[analytics-buffer] Queue full - analytics event dropped');
        return false;
      }
    }

    this.buffer.push(event);
    this.stats.current_size = this.buffer.length;
    return true;
  }

  private waitForSpace(): Promise<boolean> {
    return new Promise<boolean>(resolve => {
      const waiter = () => {
        clearTimeout(timer);
        resolve(this.buffer.length < this.config.size);
      };
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter(candidate => candidate !== waiter);
        resolve(this.buffer.length < this.config.size);
      }, this.config.enqueueTimeoutMs);
      this.waiters.push(waiter);
    });
  }

  private wakeWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }

  /**
   * Write queued events through the callback. Concurrent calls share one flush.
   */
  flush(): Promise<void> {
    if (!this.flushing) {
      this.flushing = this.doFlush().finally(() => {
        this.flushing = undefined;
      });
    }
    return this.flushing;
  }

  private async doFlush(): Promise<void> {
    if (this.buffer.length === 0) return;

    const events = this.buffer.splice(0, this.buffer.length);
    this.stats.current_size = 0;
    this.wakeWaiters();

    try {
      await this.flushCallback(events);
      this.stats.total_flushed += events.length;
      logger.debug(`[analytics-buffer] Flushed ${events.length} events`);
    } catch (error) {
      // Put back what fits; the rest is lost
      const retryable = this.config.isRetryable?.(error) ?? true;
      const room = retryable ? Math.max(0, this.config.size - this.buffer.length) : 0;
      const requeued = events.slice(0, room);
      if (!retryable) {
        logger.warn(`[analytics-buffer] Dropping ${events.length} events after a permanent flush failure`);
      }
      this.buffer.unshift(...requeued);
      this.stats.total_dropped += events.length - requeued.length;
      this.stats.current_size = this.buffer.length;

      throw new RegistryError(
        `Failed to flush analytics events: ${error instanceof Error ? error.message : String(error)}`,
        'analytics_flush_error'
      );
    }
  }

  getStats(): AnalyticsBufferStats {
    return { ...this.stats };
  }

  /**
   * Stop the timer and flush what is queued
   */
  async shutdown(): Promise<void> {
    this.stop();
    try {
      await this.flush();
    } catch (err) {
      logger.error({ err }, '[analytics-buffer] Final flush failed; queued events lost');
    }
    this.wakeWaiters();
  }
}
