/**
 * Biometric Logger
 * Appends blink, head-pose, IP and geo samples to the session audit trail.
 *
 * log() never waits on the sink. Events wait in a bounded per-session buffer until the sink
 * accepts them; when the buffer is full the oldest event is dropped and counted.
 */

import Deque from 'double-ended-queue';
import { BiometricEvent, BiometricEventKind } from '../types/vkyc.types';
import { BiometricSink } from './auditTrailService';

export interface BiometricLoggerOptions {
  bufferSize: number;
  retryMs: number;
  // Window around the server clock in which a client timestamp is believed
  maxClockSkewMs?: number;
  now?: () => number;
}

const DEFAULT_CLOCK_SKEW_MS = 5 * 60 * 1000;

export interface BiometricBufferStats {
  pending: number;
  dropped: number;
  lastSequence: number;
}

interface SessionBuffer {
  queue: Deque<BiometricEvent>;
  sequence: number;
  lastTimestamp: number;
  dropped: number;
  flushing?: Promise<void>;
  retryTimer?: NodeJS.Timeout;
}

export class BiometricLogger {
  private buffers: Map<string, SessionBuffer> = new Map();

  constructor(private readonly sink: BiometricSink, private readonly options: BiometricLoggerOptions) {}

  private now(): number {
    return this.options.now ? this.options.now() : Date.now();
  }

  private buffer(sessionId: string): SessionBuffer {
    let buffer = this.buffers.get(sessionId);
    if (!buffer) {
      buffer = {
        queue: new Deque<BiometricEvent>(this.options.bufferSize),
        sequence: 0,
        lastTimestamp: 0,
        dropped: 0,
      };
      this.buffers.set(sessionId, buffer);
    }
    return buffer;
  }

  /**
   * Client timestamps are kept only when they are safe integers near the server clock
   */
  private eventTime(timestamp: number | undefined): number {
    const now = this.now();
    if (timestamp === undefined || !Number.isSafeInteger(timestamp)) {
      return now;
    }
    const skew = this.options.maxClockSkewMs ?? DEFAULT_CLOCK_SKEW_MS;
    return Math.abs(timestamp - now) <= skew ? timestamp : now;
  }

  /**
   * Record an event. Timestamps are forced to increase strictly within a session.
   */
  log(
    sessionId: string,
    kind: BiometricEventKind,
    payload: Record<string, unknown>,
    timestamp?: number,
  ): BiometricEvent {
    const buffer = this.buffer(sessionId);
    const candidate = this.eventTime(timestamp);

    const event: BiometricEvent = {
      sessionId,
      sequence: ++buffer.sequence,
      kind,
      payload,
      timestamp: Math.max(candidate, buffer.lastTimestamp + 1),
    };
    buffer.lastTimestamp = event.timestamp;

    if (buffer.queue.length >= this.options.bufferSize) {
      buffer.queue.shift();
      buffer.dropped++;
      if (buffer.dropped === 1 || buffer.dropped % 100 === 0) {
        console.warn(`[BiometricLogger] Buffer full for session ${sessionId}: ${buffer.dropped} event(s) dropped`);
      }
    }
    buffer.queue.push(event);

    this.scheduleFlush(sessionId, buffer);
    return event;
  }

  private scheduleFlush(sessionId: string, buffer: SessionBuffer): void {
    if (buffer.flushing || buffer.retryTimer) {
      return;
    }
    buffer.flushing = this.drain(sessionId, buffer).finally(() => {
      buffer.flushing = undefined;
    });
  }

  private async drain(sessionId: string, buffer: SessionBuffer): Promise<void> {
    while (!buffer.queue.isEmpty()) {
      const batch = buffer.queue.toArray();
      const lastSequence = batch[batch.length - 1].sequence;

      try {
        await this.sink.append(sessionId, batch);
      } catch (error) {
        console.warn(
          `[BiometricLogger] Sink unavailable for session ${sessionId}, retrying in ${this.options.retryMs}ms:`,
          error instanceof Error ? error.message : error,
        );
        buffer.retryTimer = setTimeout(() => {
          buffer.retryTimer = undefined;
          this.scheduleFlush(sessionId, buffer);
        }, this.options.retryMs);
        buffer.retryTimer.unref();
        return;
      }

      // Events dropped while the batch was in flight are already gone from the front
      let front = buffer.queue.peekFront();
      while (front && front.sequence <= lastSequence) {
        buffer.queue.shift();
        front = buffer.queue.peekFront();
      }
    }
  }

  /**
   * Try to write everything buffered for a session now. Resolves to whether the buffer is empty.
   */
  async flush(sessionId: string): Promise<boolean> {
    const buffer = this.buffers.get(sessionId);
    if (!buffer) return true;

    if (buffer.flushing) {
      await buffer.flushing;
    }
    if (buffer.retryTimer) {
      clearTimeout(buffer.retryTimer);
      buffer.retryTimer = undefined;
    }
    if (!buffer.queue.isEmpty()) {
      this.scheduleFlush(sessionId, buffer);
      await buffer.flushing;
    }
    return buffer.queue.isEmpty();
  }

  getStats(sessionId: string): BiometricBufferStats {
    const buffer = this.buffers.get(sessionId);
    return {
      pending: buffer ? buffer.queue.length : 0,
      dropped: buffer ? buffer.dropped : 0,
      lastSequence: buffer ? buffer.sequence : 0,
    };
  }

  getDroppedCount(sessionId: string): number {
    return this.getStats(sessionId).dropped;
  }

  /**
   * Final flush for an ended session. Events still unwritten afterwards are reported and released.
   */
  async closeSession(sessionId: string): Promise<BiometricBufferStats> {
    const flushed = await this.flush(sessionId);
    const stats = this.getStats(sessionId);
    const buffer = this.buffers.get(sessionId);

    if (buffer?.retryTimer) {
      clearTimeout(buffer.retryTimer);
    }
    if (!flushed) {
      console.error(`[BiometricLogger] ${stats.pending} event(s) for session ${sessionId} could not be written`);
    }
    this.buffers.delete(sessionId);
    return stats;
  }
}
