/**
 * Buffered result sink
 *
 * Bounded in-memory ring of decoded payloads, drained to a callback on demand or on an
 * opt-in interval. Overflow drops the oldest event.
 */

import type { ResultSink, SinkEvent } from '../spi/index.js';
import { logger } from '../utils/logger.js';

export interface BufferedResultSinkConfig {
  /** Ring capacity (default: 1,000 events) */
  size?: number;
  /** Flush interval in milliseconds once started (default: 5000ms) */
  flush_interval_ms?: number;
}

export interface BufferedResultSinkStats {
  total_received: number;
  total_flushed: number;
  total_dropped: number;
  current_size: number;
  buffer_capacity: number;
}

export type FlushCallback = (events: SinkEvent[]) => Promise<void>;

export class BufferedResultSink implements ResultSink {
  private buffer: SinkEvent[] = [];
  private readonly size: number;
  private readonly flushIntervalMs: number;
  private flushTimer?: NodeJS.Timeout;

  private stats: BufferedResultSinkStats = {
    total_received: 0,
    total_flushed: 0,
    total_dropped: 0,
    current_size: 0,
    buffer_capacity: 0,
  };

  constructor(
    private readonly flushCallback: FlushCallback,
    config: BufferedResultSinkConfig = {}
  ) {
    this.size = Math.max(1, config.size ?? 1000);
    this.flushIntervalMs = config.flush_interval_ms ?? 5000;
    this.stats.buffer_capacity = this.size;
  }

  /**
   * Start automatic flush timer
   */
  start(): void {
    if (this.flushTimer) {
      return;
    }

    this.flushTimer = setInterval(() => {
      this.flush().catch((err: unknown) => {
        logger.error({ err }, '[result-sink] Auto-flush error');
      });
    }, this.flushIntervalMs);
    this.flushTimer.unref();

    logger.info(`[result-sink] Auto-flush started (interval=${this.flushIntervalMs}ms)`);
  }

  stop(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = undefined;
      logger.info('[result-sink] Auto-flush stopped');
    }
  }

  push(event: SinkEvent): void {
    this.stats.total_received++;

    if (this.buffer.length >= this.size) {
      this.buffer.shift();
      this.stats.total_dropped++;
      logger.warn(`[result-sink] Buffer overflow - dropped oldest event (capacity=${this.size})`);
    }

    this.buffer.push(event);
    this.stats.current_size = this.buffer.length;
  }

  /**
   * Drain buffered events to the callback
   *
   * Events are put back if the callback rejects, and the rejection propagates.
   */
  async flush(): Promise<void> {
    if (this.buffer.length === 0) {
      return;
    }

    const events = this.buffer.splice(0, this.buffer.length);
    this.stats.current_size = 0;

    try {
      await this.flushCallback(events);
      this.stats.total_flushed += events.length;
      logger.debug(`[result-sink] Flushed ${events.length} events`);
    } catch (error) {
      // Events pushed during the callback are newer and stay at the tail
      this.buffer.unshift(...events);
      const excess = this.buffer.length - this.size;
      if (excess > 0) {
        this.buffer.splice(0, excess);
        this.stats.total_dropped += excess;
      }
      this.stats.current_size = this.buffer.length;
      throw error;
    }
  }

  getStats(): BufferedResultSinkStats {
    return { ...this.stats };
  }

  async shutdown(): Promise<void> {
    this.stop();
    await this.flush();
    logger.info('[result-sink] Shutdown complete');
  }
}
