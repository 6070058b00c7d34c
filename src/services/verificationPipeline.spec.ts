import { ErrorCode, VerificationError } from '../errors/vkycErrors';
import { ScriptedOcr, ScriptedRegistry, SlowRegistry, deferred } from '../testUtils/fakes';
import { CaptureFrame, DocumentType, OcrExtraction, VerificationResult } from '../types/vkyc.types';
import { VerificationPipeline, VerificationPipelineOptions } from './verificationPipeline';

const PAN_FIELDS = { name: 'TEST USER', panNumber: 'ABCDE1234F' };
const CONFIDENT: OcrExtraction = { fields: PAN_FIELDS, confidence: 0.9 };
const BLURRY: OcrExtraction = { fields: { name: 'TE5T' }, confidence: 0.4 };

const OPTIONS: VerificationPipelineOptions = {
  confidenceThreshold: 0.6,
  maxOcrAttempts: 3,
  ocrTimeoutMs: 200,
  registryMaxAttempts: 3,
  registryTimeoutMs: 200,
  registryBackoffMs: 0,
  registryBackoffMaxMs: 0,
};

function frame(documentType: DocumentType = 'pan', sessionId = 'session-1'): CaptureFrame {
  return { sessionId, documentType, image: Buffer.from('image-bytes'), capturedAt: new Date() };
}

async function runOnce(pipeline: VerificationPipeline, capture: CaptureFrame, priorAttempts = 0): Promise<VerificationResult[]> {
  const results: VerificationResult[] = [];
  pipeline.submit(capture, priorAttempts, result => {
    results.push(result);
  });
  await pipeline.drain();
  return results;
}

describe('VerificationPipeline', () => {
  it('verifies a confident extraction with the registry', async () => {
    const registry = new ScriptedRegistry(['matched']);
    const pipeline = new VerificationPipeline(new ScriptedOcr([CONFIDENT]), registry, OPTIONS);

    const [result] = await runOnce(pipeline, frame());

    expect(result).toMatchObject({
      documentType: 'pan',
      status: 'matched',
      registryStatus: 'matched',
      extractedFields: PAN_FIELDS,
      ocrConfidence: 0.9,
      attemptCount: 1,
    });
    expect(result.failureCode).toBeUndefined();
    expect(registry.calls).toEqual([PAN_FIELDS]);
  });

  it('discards the image once OCR is done', async () => {
    const pipeline = new VerificationPipeline(new ScriptedOcr([CONFIDENT]), new ScriptedRegistry(['matched']), OPTIONS);
    const capture = frame();

    await runOnce(pipeline, capture);

    expect(capture.image.length).toBe(0);
  });

  it('asks for a re-capture below the confidence threshold and fails after three attempts', async () => {
    const registry = new ScriptedRegistry(['matched']);
    const pipeline = new VerificationPipeline(new ScriptedOcr([BLURRY]), registry, OPTIONS);

    const [first] = await runOnce(pipeline, frame(), 0);
    const [second] = await runOnce(pipeline, frame(), first.attemptCount);
    const [third] = await runOnce(pipeline, frame(), second.attemptCount);

    expect([first.status, second.status, third.status]).toEqual(['recapture_requested', 'recapture_requested', 'failed']);
    expect(third.attemptCount).toBe(3);
    expect(third.failureCode).toBe(ErrorCode.LowConfidence);
    expect(third.ocrConfidence).toBe(0.4);
    expect(registry.calls).toHaveLength(0);
  });

  it('treats an OCR error or timeout as an unreadable attempt', async () => {
    const pipeline = new VerificationPipeline(
      new ScriptedOcr([new Error('ocr down'), 'hang']),
      new ScriptedRegistry(['matched']),
      { ...OPTIONS, ocrTimeoutMs: 20 },
    );

    const [errored] = await runOnce(pipeline, frame());
    const [timedOut] = await runOnce(pipeline, frame(), 1);

    expect(errored).toMatchObject({ status: 'recapture_requested', failureCode: ErrorCode.OcrFailed, attemptCount: 1 });
    expect(timedOut).toMatchObject({ status: 'recapture_requested', failureCode: ErrorCode.OcrFailed, attemptCount: 2 });
  });

  it('reports unavailable after the registry times out on both allowed attempts', async () => {
    const registry = new ScriptedRegistry(['hang']);
    const pipeline = new VerificationPipeline(new ScriptedOcr([CONFIDENT]), registry, {
      ...OPTIONS,
      registryMaxAttempts: 2,
      registryTimeoutMs: 20,
    });

    const [result] = await runOnce(pipeline, frame());

    expect(result.status).toBe('unavailable');
    expect(result.failureCode).toBe(ErrorCode.RegistryUnavailable);
    expect(registry.calls).toHaveLength(2);
    expect(registry.aborted).toBe(2);
    expect(registry.maxInFlight).toBe(1);
  });

  it('retries a transient registry failure', async () => {
    const registry = new ScriptedRegistry([new Error('ECONNRESET'), 'unavailable', 'matched']);
    const pipeline = new VerificationPipeline(new ScriptedOcr([CONFIDENT]), registry, OPTIONS);

    const [result] = await runOnce(pipeline, frame());

    expect(result.status).toBe('matched');
    expect(registry.calls).toHaveLength(3);
  });

  it('never retries a mismatch', async () => {
    const registry = new ScriptedRegistry(['mismatched', 'matched']);
    const pipeline = new VerificationPipeline(new ScriptedOcr([CONFIDENT]), registry, OPTIONS);

    const [result] = await runOnce(pipeline, frame());

    expect(result.status).toBe('mismatched');
    expect(result.failureCode).toBe(ErrorCode.RegistryMismatch);
    expect(registry.calls).toHaveLength(1);
  });

  it('accepts one job per session and document type at a time', async () => {
    const pipeline = new VerificationPipeline(new ScriptedOcr([CONFIDENT]), new ScriptedRegistry(['matched']), OPTIONS);
    const onResult = jest.fn();

    pipeline.submit(frame('pan'), 0, onResult);
    expect(pipeline.isInFlight('session-1', 'pan')).toBe(true);

    const error = (() => {
      try {
        pipeline.submit(frame('pan'), 0, onResult);
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();
    expect(error).toBeInstanceOf(VerificationError);
    expect(error).toMatchObject({ code: ErrorCode.VerificationInProgress });

    // Other document types and sessions are independent
    pipeline.submit(frame('aadhaar'), 0, onResult);
    pipeline.submit(frame('pan', 'session-2'), 0, onResult);
    await pipeline.drain();

    expect(onResult).toHaveBeenCalledTimes(3);
    expect(pipeline.isInFlight('session-1', 'pan')).toBe(false);
  });

  it('discards results for a cancelled session', async () => {
    const gate = deferred<OcrExtraction>();
    const registry = new ScriptedRegistry(['matched']);
    const pipeline = new VerificationPipeline({ extract: () => gate.promise }, registry, OPTIONS);
    const onResult = jest.fn();

    pipeline.submit(frame(), 0, onResult);
    pipeline.cancelSession('session-1');
    gate.resolve(CONFIDENT);
    await pipeline.drain();

    expect(onResult).not.toHaveBeenCalled();
    expect(registry.calls).toHaveLength(0);
  });

  it('forgets a cancelled session once its jobs have settled', async () => {
    const gate = deferred<OcrExtraction>();
    const extractions = [gate.promise, Promise.resolve(CONFIDENT)];
    let extracted = 0;
    const ocr = { extract: () => extractions[Math.min(extracted++, 1)] };
    const pipeline = new VerificationPipeline(ocr, new ScriptedRegistry(['matched']), OPTIONS);
    const first = jest.fn();
    const second = jest.fn();

    pipeline.submit(frame(), 0, first);
    pipeline.cancelSession('session-1');
    gate.resolve(CONFIDENT);
    await pipeline.drain();

    pipeline.submit(frame(), 1, second);
    await pipeline.drain();

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledWith(expect.objectContaining({ status: 'matched', attemptCount: 2 }));
  });

  it('waits for a timed-out registry call that ignores the abort before retrying', async () => {
    const registry = new SlowRegistry(100);
    const pipeline = new VerificationPipeline(new ScriptedOcr([CONFIDENT]), registry, {
      ...OPTIONS,
      registryMaxAttempts: 3,
      registryTimeoutMs: 20,
    });
    const outcomes: Array<{ status: string; inFlight: number }> = [];

    pipeline.submit(frame(), 0, result => {
      outcomes.push({ status: result.status, inFlight: registry.inFlight });
    });
    await pipeline.drain();

    expect(outcomes).toEqual([{ status: 'unavailable', inFlight: 0 }]);
    expect(registry.calls).toBe(3);
    expect(registry.maxInFlight).toBe(1);
    expect(pipeline.isInFlight('session-1', 'pan')).toBe(false);
  });
});
