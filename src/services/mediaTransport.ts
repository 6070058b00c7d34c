/**
 * Media transport
 * The engine never handles audio/video packets itself. It reads recorded chunks from a transport
 * and tells the transport when to start and stop recording.
 */

import { EventEmitter } from 'events';
import { AsyncQueue } from '../utils/asyncQueue';
import { MediaChunk, MediaControlMessage } from '../types/vkyc.types';

export interface MediaTransport {
  openChannel(sessionId: string): AsyncIterable<MediaChunk>;
  sendControl(sessionId: string, message: MediaControlMessage): void;
}

type ChunkUploadEvents = {
  control: [sessionId: string, message: MediaControlMessage];
};

/**
 * Transport fed by chunk uploads from the client's recorder.
 * Control messages are emitted for the signaling layer to forward.
 */
export class ChunkUploadTransport extends EventEmitter<ChunkUploadEvents> implements MediaTransport {
  private streams: Map<string, AsyncQueue<MediaChunk>> = new Map();

  openChannel(sessionId: string): AsyncIterable<MediaChunk> {
    const existing = this.streams.get(sessionId);
    if (existing && !existing.isClosed) {
      return existing;
    }

    const stream = new AsyncQueue<MediaChunk>();
    this.streams.set(sessionId, stream);
    return stream;
  }

  /**
   * Feed an uploaded chunk. Returns false when no stream is open for the session.
   */
  push(sessionId: string, chunk: MediaChunk): boolean {
    const stream = this.streams.get(sessionId);
    return stream ? stream.push(chunk) : false;
  }

  isOpen(sessionId: string): boolean {
    const stream = this.streams.get(sessionId);
    return stream !== undefined && !stream.isClosed;
  }

  closeChannel(sessionId: string): void {
    const stream = this.streams.get(sessionId);
    if (stream) {
      stream.close();
      this.streams.delete(sessionId);
    }
  }

  sendControl(sessionId: string, message: MediaControlMessage): void {
    this.emit('control', sessionId, message);
  }
}
