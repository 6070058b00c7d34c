/**
 * Recording Manager
 * Buffers a session's media chunks to disk under a hard duration cap, then compresses them.
 *
 * buffering -> finalizing -> done | failed
 *
 * A compression failure marks the recording failed; it never changes the verification outcome.
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import { ErrorCode, RecordingError, TimeoutError, VkycError, errorMessage } from '../errors/vkycErrors';
import { Repository } from '../stores/repository';
import { timeoutAsyncCall } from '../utils/asyncTimeout';
import { MediaChunk, MediaCompressor, RecordingRecord } from '../types/vkyc.types';

export interface RecordingManagerOptions {
  recordingsDir: string;
  capMs: number;
  compressionTimeoutMs: number;
  now?: () => Date;
}

type RecordingManagerEvents = {
  capReached: [sessionId: string];
  finalized: [record: RecordingRecord];
  recordingFailed: [record: RecordingRecord];
};

interface ActiveRecording {
  record: RecordingRecord;
  dir: string;
  chunkPaths: string[];
  capTimer?: NodeJS.Timeout;
  finalizing?: Promise<RecordingRecord>;
}

export class RecordingManager extends EventEmitter<RecordingManagerEvents> {
  private active: Map<string, ActiveRecording> = new Map();

  constructor(
    private readonly records: Repository<RecordingRecord>,
    private readonly compressor: MediaCompressor,
    private readonly options: RecordingManagerOptions,
  ) {
    super();
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }

  private async persist(recording: ActiveRecording): Promise<void> {
    await this.records.put(recording.record.sessionId, recording.record);
  }

  /**
   * Start buffering for a session. Starting twice returns the running recording.
   */
  async start(sessionId: string): Promise<RecordingRecord> {
    const running = this.active.get(sessionId);
    if (running) {
      return structuredClone(running.record);
    }

    const dir = path.join(this.options.recordingsDir, sessionId);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const recording: ActiveRecording = {
      record: {
        sessionId,
        state: 'buffering',
        bufferedMs: 0,
        chunkCount: 0,
        startedAt: this.now(),
        capReached: false,
      },
      dir,
      chunkPaths: [],
    };
    this.active.set(sessionId, recording);

    // Wall-clock bound in case chunk durations under-report
    recording.capTimer = setTimeout(() => {
      recording.capTimer = undefined;
      this.reachCap(recording);
    }, this.options.capMs);
    recording.capTimer.unref();

    await this.persist(recording);
    console.log(`[RecordingManager] Recording started for session ${sessionId} (cap ${this.options.capMs / 1000}s)`);
    return structuredClone(recording.record);
  }

  /**
   * Read chunks from a transport stream until it ends or the recording stops buffering
   */
  async consume(sessionId: string, stream: AsyncIterable<MediaChunk>): Promise<void> {
    for await (const chunk of stream) {
      const accepted = await this.appendChunk(sessionId, chunk);
      if (!accepted && !this.isBuffering(sessionId)) {
        break;
      }
    }
  }

  isBuffering(sessionId: string): boolean {
    return this.active.get(sessionId)?.record.state === 'buffering';
  }

  /**
   * Buffer one chunk. A chunk that would take the recording past the cap is refused and
   * the cap is reached instead.
   */
  async appendChunk(sessionId: string, chunk: MediaChunk): Promise<boolean> {
    const recording = this.active.get(sessionId);
    if (!recording || recording.record.state !== 'buffering') {
      return false;
    }
    if (chunk.data.length === 0 || !Number.isFinite(chunk.durationMs) || chunk.durationMs <= 0) {
      console.warn(`[RecordingManager] Ignoring empty chunk for session ${sessionId}`);
      return false;
    }

    const { record } = recording;
    if (record.bufferedMs + chunk.durationMs > this.options.capMs) {
      this.reachCap(recording);
      return false;
    }

    const filename = `chunk-${record.chunkCount.toString().padStart(4, '0')}.webm`;
    const filepath = path.join(recording.dir, filename);
    fs.writeFileSync(filepath, chunk.data);

    recording.chunkPaths.push(filepath);
    record.chunkCount++;
    record.bufferedMs += chunk.durationMs;
    await this.persist(recording);

    if (record.bufferedMs >= this.options.capMs) {
      this.reachCap(recording);
    }
    return true;
  }

  private reachCap(recording: ActiveRecording): void {
    if (recording.record.state !== 'buffering') {
      return;
    }

    recording.record.capReached = true;
    console.warn(`[RecordingManager] Cap reached for session ${recording.record.sessionId} at ${recording.record.bufferedMs}ms`);

    this.beginFinalize(recording).catch(error => {
      console.error(`[RecordingManager] Finalize failed for session ${recording.record.sessionId}:`, error);
    });
    this.emit('capReached', recording.record.sessionId);
  }

  /**
   * Stop buffering and compress. Concurrent and repeated calls share the same outcome.
   */
  async finalize(sessionId: string): Promise<RecordingRecord | undefined> {
    const recording = this.active.get(sessionId);
    if (!recording) {
      return this.records.get(sessionId);
    }
    return this.beginFinalize(recording);
  }

  private beginFinalize(recording: ActiveRecording): Promise<RecordingRecord> {
    if (!recording.finalizing) {
      if (recording.capTimer) {
        clearTimeout(recording.capTimer);
        recording.capTimer = undefined;
      }
      recording.record.state = 'finalizing';
      recording.finalizing = this.runFinalize(recording);
    }
    return recording.finalizing;
  }

  private async runFinalize(recording: ActiveRecording): Promise<RecordingRecord> {
    const { record } = recording;
    await this.persist(recording);

    try {
      if (recording.chunkPaths.length === 0) {
        throw new RecordingError(ErrorCode.EmptyRecording, 'No media was recorded');
      }

      const controller = new AbortController();
      const { timedOut, result } = await timeoutAsyncCall(
        this.compressor.compress(record.sessionId, recording.chunkPaths, controller.signal),
        this.options.compressionTimeoutMs,
      );
      if (timedOut || !result) {
        // Frees the compressor for the recordings queued behind this one
        controller.abort();
        throw new TimeoutError(ErrorCode.CallTimedOut, `Compression timed out after ${this.options.compressionTimeoutMs}ms`);
      }

      record.state = 'done';
      record.location = result;
      console.log(`[RecordingManager] Recording done for session ${record.sessionId}: ${result}`);
    } catch (error) {
      record.state = 'failed';
      record.error = errorMessage(error);
      if (error instanceof VkycError) {
        record.errorCode = error.code;
      }
      console.error(`[RecordingManager] Recording failed for session ${record.sessionId}: ${record.error}`);
    }

    record.finalizedAt = this.now();
    await this.persist(recording);
    this.active.delete(record.sessionId);

    const snapshot = structuredClone(record);
    if (snapshot.state === 'failed') {
      this.emit('recordingFailed', snapshot);
    }
    this.emit('finalized', snapshot);
    return snapshot;
  }

  async getRecording(sessionId: string): Promise<RecordingRecord | undefined> {
    const recording = this.active.get(sessionId);
    return recording ? structuredClone(recording.record) : this.records.get(sessionId);
  }

  /**
   * Recordings interrupted by a restart cannot be resumed
   */
  async recover(): Promise<number> {
    let interrupted = 0;
    for (const record of await this.records.list()) {
      if (this.active.has(record.sessionId)) continue;
      if (record.state !== 'buffering' && record.state !== 'finalizing') continue;

      record.state = 'failed';
      record.error = 'Interrupted by process restart';
      record.finalizedAt = this.now();
      await this.records.put(record.sessionId, record);
      interrupted++;
    }
    return interrupted;
  }
}
