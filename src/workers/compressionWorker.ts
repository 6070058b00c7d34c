/**
 * Compression Worker
 * Background worker that combines recorded chunks into a single compressed MP4.
 * Uses ffmpeg when available, plain concatenation into WebM otherwise.
 */

import { execFile, spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { ErrorCode, RecordingError } from '../errors/vkycErrors';
import { MediaCompressor } from '../types/vkyc.types';

export interface CompressorOptions {
  outputDir: string;
  ffmpegPath: string;
  crf?: number;
}

interface CompressionJob {
  sessionId: string;
  chunkPaths: string[];
  signal?: AbortSignal;
  resolve: (location: string) => void;
  reject: (error: Error) => void;
}

function abortedError(sessionId: string): RecordingError {
  return new RecordingError(ErrorCode.CompressionFailed, `Compression aborted for session ${sessionId}`);
}

export class FfmpegCompressor implements MediaCompressor {
  private queue: CompressionJob[] = [];
  private isProcessing: boolean = false;
  private ffmpegAvailable: boolean | null = null;

  constructor(private readonly options: CompressorOptions) {
    if (!fs.existsSync(options.outputDir)) {
      fs.mkdirSync(options.outputDir, { recursive: true });
    }
  }

  /**
   * Check if ffmpeg is available
   */
  async checkFfmpeg(): Promise<boolean> {
    if (this.ffmpegAvailable !== null) {
      return this.ffmpegAvailable;
    }

    return new Promise(resolve => {
      execFile(this.options.ffmpegPath, ['-version'], error => {
        this.ffmpegAvailable = !error;
        if (!this.ffmpegAvailable) {
          console.warn('[CompressionWorker] ffmpeg not found. Recordings will be concatenated without compression.');
        } else {
          console.log('[CompressionWorker] ffmpeg detected and available');
        }
        resolve(this.ffmpegAvailable);
      });
    });
  }

  /**
   * Queue a recording for compression. Jobs run one at a time in arrival order.
   * Aborting removes a queued job, or kills ffmpeg for the running one.
   */
  compress(sessionId: string, chunkPaths: string[], signal?: AbortSignal): Promise<string> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortedError(sessionId));
        return;
      }

      const job: CompressionJob = { sessionId, chunkPaths: [...chunkPaths], signal, resolve, reject };
      this.queue.push(job);
      signal?.addEventListener('abort', () => {
        const index = this.queue.indexOf(job);
        if (index !== -1) {
          this.queue.splice(index, 1);
          console.warn(`[CompressionWorker] Dropped queued job for session ${sessionId}`);
          reject(abortedError(sessionId));
        }
      }, { once: true });
      console.log(`[CompressionWorker] Queued session ${sessionId} (${chunkPaths.length} chunks)`);

      this.processQueue().catch(error => {
        console.error('[CompressionWorker] Queue processing stopped:', error);
      });
    });
  }

  getQueueLength(): number {
    return this.queue.length;
  }

  private async processQueue(): Promise<void> {
    if (this.isProcessing) {
      return;
    }

    this.isProcessing = true;
    try {
      let job = this.queue.shift();
      while (job) {
        try {
          job.resolve(await this.compressSession(job.sessionId, job.chunkPaths, job.signal));
        } catch (error) {
          console.error(`[CompressionWorker] Compression failed for session ${job.sessionId}:`, error);
          job.reject(error instanceof Error ? error : new Error(String(error)));
        }
        job = this.queue.shift();
      }
    } finally {
      this.isProcessing = false;
    }
  }

  private async compressSession(sessionId: string, chunkPaths: string[], signal?: AbortSignal): Promise<string> {
    if (chunkPaths.length === 0) {
      throw new RecordingError(ErrorCode.EmptyRecording, 'No recorded chunks to compress');
    }

    const combinedPath = path.join(this.options.outputDir, `${sessionId}.combined.webm`);
    await this.concatenate(chunkPaths, combinedPath);
    console.log(`[CompressionWorker] Combined ${chunkPaths.length} chunks for session ${sessionId}`);

    if (!(await this.checkFfmpeg())) {
      const webmPath = path.join(this.options.outputDir, `${sessionId}.webm`);
      fs.renameSync(combinedPath, webmPath);
      return webmPath;
    }

    const outputPath = path.join(this.options.outputDir, `${sessionId}.mp4`);
    try {
      if (signal?.aborted) {
        throw abortedError(sessionId);
      }
      await this.runFfmpeg(sessionId, combinedPath, outputPath, signal);
    } finally {
      if (fs.existsSync(combinedPath)) {
        fs.unlinkSync(combinedPath);
      }
    }

    if (!fs.existsSync(outputPath)) {
      throw new RecordingError(ErrorCode.CompressionFailed, 'Output video file not created');
    }
    console.log(`[CompressionWorker] Compression completed for session ${sessionId}: ${outputPath}`);
    return outputPath;
  }

  /**
   * MediaRecorder chunks are contiguous data: only the first carries the container headers
   */
  private async concatenate(chunkPaths: string[], outputPath: string): Promise<void> {
    const writeStream = fs.createWriteStream(outputPath);
    for (const chunkPath of chunkPaths) {
      writeStream.write(fs.readFileSync(chunkPath));
    }

    await new Promise<void>((resolve, reject) => {
      writeStream.on('finish', resolve);
      writeStream.on('error', reject);
      writeStream.end();
    });
  }

  private runFfmpeg(sessionId: string, inputPath: string, outputPath: string, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const args = [
        '-i', inputPath,
        '-c:v', 'libx264',
        '-c:a', 'aac',
        '-preset', 'fast',
        '-crf', String(this.options.crf ?? 28),
        '-movflags', '+faststart',
        '-y',
        outputPath,
      ];

      console.log(`[CompressionWorker] Running ffmpeg with args:`, args.join(' '));
      // spawn kills the process when the signal fires
      const ffmpeg = spawn(this.options.ffmpegPath, args, { signal });

      let stderr = '';
      ffmpeg.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      ffmpeg.on('close', code => {
        if (signal?.aborted) {
          reject(abortedError(sessionId));
        } else if (code === 0) {
          resolve();
        } else {
          console.error(`[CompressionWorker] ffmpeg stderr:`, stderr.slice(-2000));
          reject(new RecordingError(ErrorCode.CompressionFailed, `ffmpeg exited with code ${code}`));
        }
      });

      ffmpeg.on('error', error => {
        if (signal?.aborted) {
          console.warn(`[CompressionWorker] ffmpeg killed for session ${sessionId}`);
          reject(abortedError(sessionId));
        } else {
          reject(new RecordingError(ErrorCode.CompressionFailed, error.message));
        }
      });
    });
  }
}
