/**
 * VKYC Configuration
 * Operational parameters read from the environment (.env is loaded by dotenv in server.ts)
 */

import * as path from 'path';
import { DOCUMENT_TYPES, DocumentType, LivenessPrompt } from '../types/vkyc.types';

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

// Hard upper bound for any recording
export const RECORDING_CAP_LIMIT_MS = 10 * MINUTE;

const LIVENESS_PROMPTS: ReadonlyArray<LivenessPrompt> = ['blink', 'turn_left', 'turn_right', 'smile'];

export interface VkycConfig {
  port: number;
  frontendUrl: string;
  linkBaseUrl: string;
  linkTtlMs: number;
  // How long a scheduled occurrence's link stays valid after the scheduled time
  scheduledLinkWindowMs: number;

  requiredDocuments: DocumentType[];
  requiredLivenessPrompts: LivenessPrompt[];

  ocrConfidenceThreshold: number;
  ocrMaxAttempts: number;
  ocrTimeoutMs: number;
  registryMaxAttempts: number;
  registryTimeoutMs: number;
  registryBackoffMs: number;
  registryBackoffMaxMs: number;
  maxFrameBytes: number;

  disconnectGraceMs: number;
  heartbeatIntervalMs: number;

  recordingCapMs: number;
  compressionTimeoutMs: number;
  maxChunkBytes: number;

  biometricBufferSize: number;
  biometricRetryMs: number;
  // Client timestamps further than this from the server clock are replaced by it
  biometricClockSkewMs: number;

  expirySweepIntervalMs: number;

  dataDir: string;
  recordingsDir: string;
  videosDir: string;
  ffmpegPath: string;

  panOcrUrl?: string;
  aadhaarOcrUrl?: string;
  registryUrl?: string;
  registryApiKey?: string;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number, options: { min?: number; max?: number } = {}): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid value for ${key}: "${raw}" is not a number`);
  }
  if (options.min !== undefined && value < options.min) {
    throw new Error(`Invalid value for ${key}: ${value} is below ${options.min}`);
  }
  if (options.max !== undefined && value > options.max) {
    throw new Error(`Invalid value for ${key}: ${value} is above ${options.max}`);
  }
  return value;
}

function readList<T extends string>(env: Env, key: string, allowed: ReadonlyArray<T>, fallback: T[]): T[] {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const values: T[] = [];
  for (const item of raw.split(',').map(part => part.trim().toLowerCase()).filter(Boolean)) {
    const match = allowed.find(candidate => candidate === item);
    if (!match) {
      throw new Error(`Invalid value for ${key}: "${item}" (allowed: ${allowed.join(', ')})`);
    }
    if (!values.includes(match)) {
      values.push(match);
    }
  }
  return values;
}

function readOptional(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Build the configuration from environment variables, falling back to defaults
 */
export function loadConfig(env: Env = process.env): VkycConfig {
  const dataDir = env.VKYC_DATA_DIR || path.join(__dirname, '../../data');

  const recordingCapMs = Math.min(
    readNumber(env, 'RECORDING_CAP_MS', RECORDING_CAP_LIMIT_MS, { min: 1000 }),
    RECORDING_CAP_LIMIT_MS,
  );

  return {
    port: readNumber(env, 'PORT', 3001, { min: 0, max: 65535 }),
    frontendUrl: env.FRONTEND_URL || 'http://localhost:3000',
    linkBaseUrl: (env.VKYC_LINK_BASE_URL || env.FRONTEND_URL || 'http://localhost:3000').replace(/\/+$/, ''),
    linkTtlMs: readNumber(env, 'LINK_TTL_MS', 24 * HOUR, { min: 1000 }),
    scheduledLinkWindowMs: readNumber(env, 'SCHEDULED_LINK_WINDOW_MS', 30 * MINUTE, { min: 1000 }),

    requiredDocuments: readList(env, 'REQUIRED_DOCUMENTS', DOCUMENT_TYPES, [...DOCUMENT_TYPES]),
    requiredLivenessPrompts: readList(env, 'REQUIRED_LIVENESS_PROMPTS', LIVENESS_PROMPTS, ['blink']),

    ocrConfidenceThreshold: readNumber(env, 'OCR_CONFIDENCE_THRESHOLD', 0.6, { min: 0, max: 1 }),
    ocrMaxAttempts: readNumber(env, 'OCR_MAX_ATTEMPTS', 3, { min: 1 }),
    ocrTimeoutMs: readNumber(env, 'OCR_TIMEOUT_MS', 30 * 1000, { min: 1 }),
    registryMaxAttempts: readNumber(env, 'REGISTRY_MAX_ATTEMPTS', 3, { min: 1 }),
    registryTimeoutMs: readNumber(env, 'REGISTRY_TIMEOUT_MS', 30 * 1000, { min: 1 }),
    registryBackoffMs: readNumber(env, 'REGISTRY_BACKOFF_MS', 1000, { min: 0 }),
    registryBackoffMaxMs: readNumber(env, 'REGISTRY_BACKOFF_MAX_MS', 8000, { min: 0 }),
    maxFrameBytes: readNumber(env, 'MAX_FRAME_BYTES', 10 * 1024 * 1024, { min: 1 }),

    disconnectGraceMs: readNumber(env, 'DISCONNECT_GRACE_MS', 30 * 1000, { min: 0 }),
    heartbeatIntervalMs: readNumber(env, 'HEARTBEAT_INTERVAL_MS', 30 * 1000, { min: 1000 }),

    recordingCapMs,
    compressionTimeoutMs: readNumber(env, 'COMPRESSION_TIMEOUT_MS', 5 * MINUTE, { min: 1 }),
    maxChunkBytes: readNumber(env, 'MAX_CHUNK_BYTES', 10 * 1024 * 1024, { min: 1 }),

    biometricBufferSize: readNumber(env, 'BIOMETRIC_BUFFER_SIZE', 1000, { min: 1 }),
    biometricRetryMs: readNumber(env, 'BIOMETRIC_RETRY_MS', 5000, { min: 1 }),
    biometricClockSkewMs: readNumber(env, 'BIOMETRIC_CLOCK_SKEW_MS', 5 * MINUTE, { min: 0 }),

    expirySweepIntervalMs: readNumber(env, 'EXPIRY_SWEEP_INTERVAL_MS', MINUTE, { min: 100 }),

    dataDir,
    recordingsDir: env.RECORDINGS_DIR || path.join(dataDir, 'recordings'),
    videosDir: env.VIDEOS_DIR || path.join(dataDir, 'videos'),
    ffmpegPath: env.FFMPEG_PATH || 'ffmpeg',

    panOcrUrl: readOptional(env, 'PAN_OCR_API'),
    aadhaarOcrUrl: readOptional(env, 'AADHAAR_OCR_API'),
    registryUrl: readOptional(env, 'DIGILOCKER_API'),
    registryApiKey: readOptional(env, 'DIGILOCKER_API_KEY'),
  };
}
