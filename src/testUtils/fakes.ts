/**
 * In-process stand-ins for the engine's external collaborators
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { VkycConfig, loadConfig } from '../config/vkycConfig';
import { BiometricSink } from '../services/auditTrailService';
import { PeerConnection, ServerMessage } from '../types/signaling.types';
import {
  BiometricEvent,
  DocumentType,
  MediaCompressor,
  OcrCapability,
  OcrExtraction,
  RegistryCapability,
  RegistryStatus,
} from '../types/vkyc.types';

export const T0 = Date.UTC(2030, 0, 1, 9, 0, 0);
export const HOUR = 60 * 60 * 1000;

export class FakeClock {
  constructor(public ms: number = T0) {}

  now = (): Date => new Date(this.ms);

  advance(ms: number): void {
    this.ms += ms;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `vkyc-${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testConfig(dataDir: string, overrides: Partial<VkycConfig> = {}): VkycConfig {
  return {
    ...loadConfig({ VKYC_DATA_DIR: dataDir, VKYC_LINK_BASE_URL: 'https://kyc.example.test' }),
    registryBackoffMs: 0,
    registryBackoffMaxMs: 0,
    ...overrides,
  };
}

/**
 * Poll until the condition holds; real timers only
 */
export async function waitFor(condition: () => boolean, attempts = 200): Promise<void> {
  for (let i = 0; i < attempts; i++) {
    if (condition()) return;
    await new Promise(resolve => setImmediate(resolve));
  }
  throw new Error('Condition not met');
}

export type OcrStep = OcrExtraction | Error | 'hang';

/**
 * Returns the scripted outcomes in order, repeating the last one
 */
export class ScriptedOcr implements OcrCapability {
  calls: DocumentType[] = [];

  constructor(private readonly steps: OcrStep[]) {}

  async extract(_image: Buffer, documentType: DocumentType): Promise<OcrExtraction> {
    const step = this.steps[Math.min(this.calls.length, this.steps.length - 1)];
    this.calls.push(documentType);

    if (step === 'hang') {
      return new Promise<OcrExtraction>(() => undefined);
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

export type RegistryStep = RegistryStatus | Error | 'hang';

export class ScriptedRegistry implements RegistryCapability {
  calls: Array<Record<string, string>> = [];
  aborted = 0;
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly steps: RegistryStep[]) {}

  async verify(fields: Record<string, string>, _documentType: DocumentType, signal?: AbortSignal): Promise<RegistryStatus> {
    const step = this.steps[Math.min(this.calls.length, this.steps.length - 1)];
    this.calls.push(fields);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      if (step === 'hang') {
        return await new Promise<RegistryStatus>((_resolve, reject) => {
          signal?.addEventListener('abort', () => {
            this.aborted++;
            reject(new Error('aborted'));
          });
        });
      }
      if (step instanceof Error) {
        throw step;
      }
      return step;
    } finally {
      this.inFlight--;
    }
  }
}

/**
 * Registry that answers only after a fixed delay and ignores abort signals
 */
export class SlowRegistry implements RegistryCapability {
  calls = 0;
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly delayMs: number, private readonly status: RegistryStatus = 'unavailable') {}

  async verify(): Promise<RegistryStatus> {
    this.calls++;
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise(resolve => setTimeout(resolve, this.delayMs));
    this.inFlight--;
    return this.status;
  }
}

export class FakeCompressor implements MediaCompressor {
  calls: Array<{ sessionId: string; chunkPaths: string[] }> = [];
  pending?: Deferred<string>;
  signals: Array<AbortSignal | undefined> = [];

  constructor(private readonly behaviour: 'succeed' | 'fail' | 'deferred' = 'succeed') {}

  async compress(sessionId: string, chunkPaths: string[], signal?: AbortSignal): Promise<string> {
    this.calls.push({ sessionId, chunkPaths: [...chunkPaths] });
    this.signals.push(signal);
    if (this.behaviour === 'fail') {
      throw new Error('encoder crashed');
    }
    if (this.behaviour === 'deferred') {
      this.pending = deferred<string>();
      return this.pending.promise;
    }
    return `/videos/${sessionId}.mp4`;
  }
}

export class MemorySink implements BiometricSink {
  stored: BiometricEvent[] = [];
  failuresLeft: number;

  constructor(failures = 0) {
    this.failuresLeft = failures;
  }

  async append(_sessionId: string, events: BiometricEvent[]): Promise<void> {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error('sink offline');
    }
    this.stored.push(...events);
  }
}

/**
 * Peer connection that records what it was sent
 */
export class RecordingConnection implements PeerConnection {
  sent: ServerMessage[] = [];
  closed?: { code?: number; reason?: string };
  broken = false;

  send(message: ServerMessage): void {
    if (this.broken) {
      throw new Error('socket gone');
    }
    this.sent.push(message);
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason };
  }

  ofType<T extends ServerMessage['type']>(type: T): Array<Extract<ServerMessage, { type: T }>> {
    return this.sent.filter((message): message is Extract<ServerMessage, { type: T }> => message.type === type);
  }

  types(): Array<ServerMessage['type']> {
    return this.sent.map(message => message.type);
  }
}

/**
 * Read a nested property of a decoded JSON value
 */
export function field(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Object.getOwnPropertyDescriptor(current, key)?.value;
  }
  return current;
}
