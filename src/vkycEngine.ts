/**
 * VKYC Engine
 * Builds every component from the configuration and wires their events together.
 */

import * as path from 'path';
import { VkycConfig } from './config/vkycConfig';
import { ErrorCode } from './errors/vkycErrors';
import { AuditTrailService } from './services/auditTrailService';
import { BiometricLogger } from './services/biometricLogger';
import { LinkIssuer } from './services/linkIssuer';
import { ChunkUploadTransport } from './services/mediaTransport';
import { HttpOcrService } from './services/ocrService';
import { RecordingManager } from './services/recordingManager';
import { DigiLockerRegistryService } from './services/registryService';
import { SignalingHub } from './services/signalingChannel';
import { VerificationPipeline } from './services/verificationPipeline';
import { VkycSessionManager, toUserOutcome } from './services/vkycSessionManager';
import { JsonFileRepository, Repository } from './stores/repository';
import {
  MediaCompressor,
  OcrCapability,
  RecordingRecord,
  RegistryCapability,
  VerificationLink,
  VkycSession,
} from './types/vkyc.types';
import { FfmpegCompressor } from './workers/compressionWorker';

/**
 * Replacements for the default collaborators, mostly for tests
 */
export interface VkycEngineDeps {
  ocr?: OcrCapability;
  registry?: RegistryCapability;
  compressor?: MediaCompressor;
  transport?: ChunkUploadTransport;
  audit?: AuditTrailService;
  linkRepository?: Repository<VerificationLink>;
  sessionRepository?: Repository<VkycSession>;
  recordingRepository?: Repository<RecordingRecord>;
  now?: () => Date;
}

export interface VkycEngine {
  config: VkycConfig;
  links: LinkIssuer;
  sessions: VkycSessionManager;
  pipeline: VerificationPipeline;
  hub: SignalingHub;
  biometrics: BiometricLogger;
  recordings: RecordingManager;
  transport: ChunkUploadTransport;
  audit: AuditTrailService;
  recover(): Promise<void>;
  shutdown(): Promise<void>;
}

export function createVkycEngine(config: VkycConfig, deps: VkycEngineDeps = {}): VkycEngine {
  const now = deps.now;
  const nowMs = now ? () => now().getTime() : Date.now;

  const audit = deps.audit ?? new AuditTrailService(path.join(config.dataDir, 'audit'), nowMs);

  const links = new LinkIssuer(
    deps.linkRepository ?? new JsonFileRepository<VerificationLink>(path.join(config.dataDir, 'links'), 'LinkStore'),
    { baseUrl: config.linkBaseUrl, defaultTtlMs: config.linkTtlMs, now },
  );

  const pipeline = new VerificationPipeline(
    deps.ocr ?? new HttpOcrService({
      panOcrUrl: config.panOcrUrl,
      aadhaarOcrUrl: config.aadhaarOcrUrl,
      timeoutMs: config.ocrTimeoutMs,
    }),
    deps.registry ?? new DigiLockerRegistryService({
      registryUrl: config.registryUrl,
      apiKey: config.registryApiKey,
      timeoutMs: config.registryTimeoutMs,
    }),
    {
      confidenceThreshold: config.ocrConfidenceThreshold,
      maxOcrAttempts: config.ocrMaxAttempts,
      ocrTimeoutMs: config.ocrTimeoutMs,
      registryMaxAttempts: config.registryMaxAttempts,
      registryTimeoutMs: config.registryTimeoutMs,
      registryBackoffMs: config.registryBackoffMs,
      registryBackoffMaxMs: config.registryBackoffMaxMs,
    },
  );

  const sessions = new VkycSessionManager(
    deps.sessionRepository ?? new JsonFileRepository<VkycSession>(path.join(config.dataDir, 'sessions'), 'SessionStore'),
    links,
    pipeline,
    audit,
    {
      requiredDocuments: config.requiredDocuments,
      requiredLivenessPrompts: config.requiredLivenessPrompts,
      scheduledLinkWindowMs: config.scheduledLinkWindowMs,
      expirySweepIntervalMs: config.expirySweepIntervalMs,
      now,
    },
  );

  const biometrics = new BiometricLogger(audit, {
    bufferSize: config.biometricBufferSize,
    retryMs: config.biometricRetryMs,
    maxClockSkewMs: config.biometricClockSkewMs,
    now: now ? nowMs : undefined,
  });

  const hub = new SignalingHub(sessions, biometrics, audit, {
    disconnectGraceMs: config.disconnectGraceMs,
    maxFrameBytes: config.maxFrameBytes,
  });

  const recordings = new RecordingManager(
    deps.recordingRepository ?? new JsonFileRepository<RecordingRecord>(path.join(config.dataDir, 'recording-records'), 'RecordingStore'),
    deps.compressor ?? new FfmpegCompressor({ outputDir: config.videosDir, ffmpegPath: config.ffmpegPath }),
    {
      recordingsDir: config.recordingsDir,
      capMs: config.recordingCapMs,
      compressionTimeoutMs: config.compressionTimeoutMs,
      now,
    },
  );

  const transport = deps.transport ?? new ChunkUploadTransport();

  transport.on('control', (sessionId, message) => {
    hub.get(sessionId)?.sendMediaControl(message);
  });

  sessions.on('started', session => {
    const { sessionId } = session;
    hub.open(sessionId);
    const stream = transport.openChannel(sessionId);

    recordings.start(sessionId)
      .then(() => {
        transport.sendControl(sessionId, { action: 'start_recording', maxDurationMs: config.recordingCapMs });
        return recordings.consume(sessionId, stream);
      })
      .catch(error => {
        console.error(`[VkycEngine] Recording could not run for session ${sessionId}:`, error);
        audit.recordDecision(sessionId, 'alert', 'Recording could not run', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
  });

  sessions.on('verificationUpdated', (session, result) => {
    hub.get(session.sessionId)?.notifyVerification(result);
  });

  sessions.on('ended', session => {
    const { sessionId } = session;
    const outcome = session.terminationReason ? toUserOutcome(session.terminationReason) : 'verification_failed';

    transport.sendControl(sessionId, { action: 'stop_recording' });
    hub.close(sessionId, outcome);
    transport.closeChannel(sessionId);

    recordings.finalize(sessionId).catch(error => {
      console.error(`[VkycEngine] Finalize failed for session ${sessionId}:`, error);
    });

    biometrics.closeSession(sessionId)
      .then(stats => {
        if (stats.dropped > 0 || stats.pending > 0) {
          audit.recordDecision(sessionId, 'alert', 'Biometric events lost', {
            dropped: stats.dropped,
            unwritten: stats.pending,
          });
        }
      })
      .catch(error => {
        console.error(`[VkycEngine] Biometric flush failed for session ${sessionId}:`, error);
      });
  });

  recordings.on('capReached', sessionId => {
    audit.recordDecision(sessionId, 'recording', 'Recording cap reached', { code: ErrorCode.RecordingCapReached });
    sessions.handleRecordingCapReached(sessionId).catch(error => {
      console.error(`[VkycEngine] Could not end session ${sessionId} at recording cap:`, error);
    });
  });

  recordings.on('finalized', record => {
    audit.recordDecision(record.sessionId, 'recording', `Recording ${record.state}`, {
      bufferedMs: record.bufferedMs,
      chunkCount: record.chunkCount,
      capReached: record.capReached,
      location: record.location,
    });
  });

  recordings.on('recordingFailed', record => {
    // Operational alert only; the verification outcome stands
    audit.recordDecision(record.sessionId, 'alert', 'Recording failed', { error: record.error, code: record.errorCode });
  });

  return {
    config,
    links,
    sessions,
    pipeline,
    hub,
    biometrics,
    recordings,
    transport,
    audit,

    async recover(): Promise<void> {
      const interrupted = await recordings.recover();
      if (interrupted > 0) {
        console.warn(`[VkycEngine] ${interrupted} recording(s) interrupted by restart`);
      }
      await sessions.recover(sessionId => hub.hasActiveChannel(sessionId));
    },

    async shutdown(): Promise<void> {
      sessions.stopScheduler();
      await pipeline.drain();
      console.log('[VkycEngine] Shut down');
    },
  };
}
