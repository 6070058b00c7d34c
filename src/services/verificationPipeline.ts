/**
 * Verification Pipeline
 * Runs OCR extraction and registry verification for captured document frames.
 *
 * One job per (session, document type) at a time. The registry is only called once OCR
 * confidence clears the threshold; transient registry failures are retried with backoff,
 * a definitive answer never is.
 */

import retry from 'async-retry';
import { ErrorCode, TimeoutError, VerificationError, errorMessage } from '../errors/vkycErrors';
import { timeoutAsyncCall } from '../utils/asyncTimeout';
import {
  CaptureFrame,
  DocumentType,
  OcrCapability,
  OcrExtraction,
  RegistryCapability,
  RegistryStatus,
  VerificationResult,
} from '../types/vkyc.types';

export interface VerificationPipelineOptions {
  confidenceThreshold: number;
  maxOcrAttempts: number;
  ocrTimeoutMs: number;
  registryMaxAttempts: number;
  registryTimeoutMs: number;
  registryBackoffMs: number;
  registryBackoffMaxMs: number;
}

export type VerificationCallback = (result: VerificationResult) => Promise<void> | void;

interface PipelineJob {
  sessionId: string;
  documentType: DocumentType;
  done: Promise<void>;
  // Set when the session ends while the job runs; its result is then discarded
  cancelled: boolean;
}

type OcrOutcome =
  | { ok: true; extraction: OcrExtraction }
  | { ok: false; reason: string };

// Raised inside the retry loop to stop retrying a cancelled session
class CancelledSignal extends Error {}

export class VerificationPipeline {
  private jobs: Map<string, PipelineJob> = new Map();

  constructor(
    private readonly ocr: OcrCapability,
    private readonly registry: RegistryCapability,
    private readonly options: VerificationPipelineOptions,
  ) {}

  private key(sessionId: string, documentType: DocumentType): string {
    return `${sessionId}:${documentType}`;
  }

  isInFlight(sessionId: string, documentType: DocumentType): boolean {
    return this.jobs.has(this.key(sessionId, documentType));
  }

  /**
   * Accept a frame for asynchronous processing. Returns as soon as the job is queued;
   * the result is delivered through `onResult`.
   */
  submit(frame: CaptureFrame, priorAttempts: number, onResult: VerificationCallback): void {
    const key = this.key(frame.sessionId, frame.documentType);
    if (this.jobs.has(key)) {
      throw new VerificationError(
        ErrorCode.VerificationInProgress,
        `A ${frame.documentType} verification is already running for this session`,
      );
    }

    const job: PipelineJob = {
      sessionId: frame.sessionId,
      documentType: frame.documentType,
      done: Promise.resolve(),
      cancelled: false,
    };
    this.jobs.set(key, job);

    job.done = this.run(job, frame, priorAttempts + 1)
      .then(async result => {
        if (job.cancelled) {
          console.log(`[VerificationPipeline] Discarding ${frame.documentType} result for cancelled session ${frame.sessionId}`);
          return;
        }
        await onResult(result);
      })
      .catch(error => {
        console.error(`[VerificationPipeline] ${frame.documentType} job failed for session ${frame.sessionId}:`, error);
      })
      .finally(() => {
        this.jobs.delete(key);
      });

    console.log(`[VerificationPipeline] Accepted ${frame.documentType} frame for session ${frame.sessionId} (attempt ${priorAttempts + 1})`);
  }

  private async run(job: PipelineJob, frame: CaptureFrame, attempt: number): Promise<VerificationResult> {
    const { sessionId, documentType } = frame;
    const ocrOutcome = await this.extract(frame);
    // The raw image is not kept past OCR
    frame.image = Buffer.alloc(0);

    if (!ocrOutcome.ok || ocrOutcome.extraction.confidence < this.options.confidenceThreshold) {
      const confidence = ocrOutcome.ok ? ocrOutcome.extraction.confidence : undefined;
      const exhausted = attempt >= this.options.maxOcrAttempts;
      const failureCode = ocrOutcome.ok ? ErrorCode.LowConfidence : ErrorCode.OcrFailed;

      console.log(
        `[VerificationPipeline] ${documentType} OCR ${ocrOutcome.ok ? `confidence ${confidence}` : `failed (${ocrOutcome.reason})`} ` +
        `for session ${sessionId}, attempt ${attempt}/${this.options.maxOcrAttempts}`,
      );

      return {
        documentType,
        status: exhausted ? 'failed' : 'recapture_requested',
        extractedFields: ocrOutcome.ok ? ocrOutcome.extraction.fields : {},
        ocrConfidence: confidence,
        attemptCount: attempt,
        // Exhausting attempts is reported as low confidence whichever way the last one went
        failureCode: exhausted ? ErrorCode.LowConfidence : failureCode,
        message: exhausted
          ? 'Document could not be read after the maximum number of attempts'
          : 'Document image unclear, please show the document again',
        updatedAt: new Date(),
      };
    }

    const { fields, confidence } = ocrOutcome.extraction;
    const registryStatus = await this.verifyWithRegistry(job, fields);

    return {
      documentType,
      status: registryStatus,
      extractedFields: fields,
      ocrConfidence: confidence,
      registryStatus,
      attemptCount: attempt,
      failureCode: registryStatus === 'mismatched'
        ? ErrorCode.RegistryMismatch
        : registryStatus === 'unavailable' ? ErrorCode.RegistryUnavailable : undefined,
      message: registryStatus === 'matched'
        ? `${documentType.toUpperCase()} verified`
        : registryStatus === 'mismatched'
          ? `${documentType.toUpperCase()} details do not match the registry record`
          : 'Registry unavailable, queued for manual review',
      updatedAt: new Date(),
    };
  }

  private async extract(frame: CaptureFrame): Promise<OcrOutcome> {
    try {
      const { timedOut, result } = await timeoutAsyncCall(
        this.ocr.extract(frame.image, frame.documentType),
        this.options.ocrTimeoutMs,
      );
      if (timedOut || !result) {
        return { ok: false, reason: 'timeout' };
      }
      return { ok: true, extraction: result };
    } catch (error) {
      return { ok: false, reason: errorMessage(error) };
    }
  }

  /**
   * Registry call with timeout and bounded backoff. Only transient failures
   * (timeouts, thrown errors, `unavailable`) are retried.
   *
   * A timed-out call is asked to abort and then awaited: the next attempt, and the
   * release of the job, wait until it has settled.
   */
  private async verifyWithRegistry(job: PipelineJob, fields: Record<string, string>): Promise<RegistryStatus> {
    const { sessionId, documentType } = job;
    try {
      return await retry<RegistryStatus>(async (bail, attemptNumber) => {
        if (job.cancelled) {
          bail(new CancelledSignal('Session cancelled'));
          return 'unavailable';
        }

        const controller = new AbortController();
        const call = this.registry.verify(fields, documentType, controller.signal);
        const { timedOut, result } = await timeoutAsyncCall(call, this.options.registryTimeoutMs);

        if (timedOut || !result) {
          controller.abort();
          await call.then(() => undefined, () => undefined);
          throw new TimeoutError(ErrorCode.CallTimedOut, `Registry call timed out (attempt ${attemptNumber})`);
        }
        if (result === 'unavailable') {
          throw new Error(`Registry unavailable (attempt ${attemptNumber})`);
        }
        return result;
      }, {
        retries: this.options.registryMaxAttempts - 1,
        factor: 2,
        minTimeout: this.options.registryBackoffMs,
        maxTimeout: this.options.registryBackoffMaxMs,
        randomize: false,
        onRetry: (error: unknown, attemptNumber: number) => {
          console.warn(`[VerificationPipeline] Registry retry ${attemptNumber} for ${documentType} in session ${sessionId}: ${errorMessage(error)}`);
        },
      });
    } catch (error) {
      if (error instanceof CancelledSignal) {
        console.log(`[VerificationPipeline] Registry retries stopped for cancelled session ${sessionId}`);
      } else {
        console.warn(`[VerificationPipeline] Registry gave no definitive answer for ${documentType} in session ${sessionId}`);
      }
      return 'unavailable';
    }
  }

  /**
   * Stop work for a session. In-flight external calls are left to finish; their results are discarded.
   */
  cancelSession(sessionId: string): void {
    let cancelled = 0;
    for (const job of this.jobs.values()) {
      if (job.sessionId === sessionId) {
        job.cancelled = true;
        cancelled++;
      }
    }
    if (cancelled > 0) {
      console.log(`[VerificationPipeline] Session ${sessionId} cancelled with ${cancelled} job(s) in flight`);
    }
  }

  /**
   * Resolves once every job that is currently running has settled
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.jobs.values()).map(job => job.done));
  }
}
