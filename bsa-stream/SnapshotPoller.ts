/**
 * Periodic reader for stream snapshots or aligned frames.
 * Reads on a fixed refresh interval and emits each result; a failing read is
 * logged and emitted as an error without ending the loop.
 */

import { StreamLogger } from '../shared/StreamLogger';
import { TypedEventEmitter } from '../shared/TypedEventEmitter';
import { DEFAULT_REFRESH_INTERVAL_MS, MIN_REFRESH_INTERVAL_MS } from './constants';
import { ConfigurationError } from './errors';

const CATEGORY = 'SNAPSHOT_POLLER';

export interface SnapshotPollerEvents<T> {
  frame: T;
  error: Error;
}

export class SnapshotPoller<T> extends TypedEventEmitter<SnapshotPollerEvents<T>> {
  private timer: NodeJS.Timeout | null = null;
  private intervalMs: number;
  private stopped = false;

  constructor(private readonly read: () => T, intervalMs: number = DEFAULT_REFRESH_INTERVAL_MS) {
    super();
    this.intervalMs = SnapshotPoller.validateInterval(intervalMs);
  }

  start(): void {
    if (this.timer || this.stopped) return;
    this.timer = setInterval(() => this.refreshNow(), this.intervalMs);
  }

  // Stop reading but keep the poller resumable
  pause(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  resume(): void {
    this.start();
  }

  // Final stop: no more reads, resume() becomes a no-op
  stop(): void {
    this.pause();
    this.stopped = true;
  }

  /**
   * Read once and emit. Returns the frame, or null when the read failed.
   */
  refreshNow(): T | null {
    try {
      const frame = this.read();
      this.emit('frame', frame);
      return frame;
    } catch (error) {
      const normalized = error instanceof Error ? error : new Error(String(error));
      StreamLogger.error(CATEGORY, 'Snapshot read failed', normalized);
      this.emit('error', normalized);
      return null;
    }
  }

  setRefreshInterval(intervalMs: number): void {
    this.intervalMs = SnapshotPoller.validateInterval(intervalMs);
    if (this.timer) {
      this.pause();
      this.start();
    }
  }

  get refreshInterval(): number {
    return this.intervalMs;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  private static validateInterval(intervalMs: number): number {
    if (!Number.isFinite(intervalMs) || intervalMs < MIN_REFRESH_INTERVAL_MS) {
      throw new ConfigurationError(`Refresh interval must be at least ${MIN_REFRESH_INTERVAL_MS}ms, got ${intervalMs}`);
    }
    return intervalMs;
  }
}
