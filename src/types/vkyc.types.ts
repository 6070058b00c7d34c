/**
 * VKYC Types and Interfaces
 * Type definitions shared by the session engine, the pipeline and the API surface
 */

export type SessionState =
  | 'created'
  | 'scheduled'
  | 'ready_to_start'
  | 'in_progress'
  | 'verifying'
  | 'completed'
  | 'failed'
  | 'expired';

export const TERMINAL_STATES: ReadonlyArray<SessionState> = ['completed', 'failed', 'expired'];
export const ACTIVE_STATES: ReadonlyArray<SessionState> = ['in_progress', 'verifying'];

export type SessionMode = 'immediate' | 'scheduled';

export type DocumentType = 'pan' | 'aadhaar';

export const DOCUMENT_TYPES: ReadonlyArray<DocumentType> = ['pan', 'aadhaar'];

/**
 * Internal reason codes kept in the audit trail
 */
export type TerminationReason =
  | 'completed'
  | 'link_expired'
  | 'disconnect_timeout'
  | 'verification_failed'
  | 'registry_mismatch'
  | 'verification_incomplete'
  | 'recording_failed'
  | 'process_restart'
  | 'user_left'
  | 'agent_left'
  | 'agent_terminated';

export type FailureReason = Exclude<TerminationReason, 'completed' | 'link_expired'>;

/**
 * What the end user is told when a session ends
 */
export type UserOutcome = 'completed' | 'expired' | 'disconnected' | 'verification_failed';

export interface VerificationLink {
  token: string;
  customerId: string;
  url: string;
  issuedAt: Date;
  expiresAt: Date;
  consumed: boolean;
  consumedAt?: Date;
  // Set once a session is bound to this link
  sessionId?: string;
  // Set for links issued for a scheduled occurrence
  scheduledAt?: Date;
  supersededBy?: string;
}

export interface LinkResolution {
  token: string;
  customerId: string;
  expiresAt: Date;
  modeOptions: SessionMode[];
  sessionId?: string;
  scheduledAt?: Date;
}

export type LivenessPrompt = 'blink' | 'turn_left' | 'turn_right' | 'smile';

export interface StateTransition {
  from: SessionState;
  to: SessionState;
  at: Date;
  reason?: TerminationReason;
}

export interface VkycSession {
  sessionId: string;
  linkToken: string;
  customerId: string;
  mode?: SessionMode;
  scheduledAt?: Date;
  state: SessionState;
  createdAt: Date;
  updatedAt: Date;
  startedAt?: Date;
  endedAt?: Date;
  terminationReason?: TerminationReason;

  requiredDocuments: DocumentType[];
  verificationResults: Partial<Record<DocumentType, VerificationResult>>;

  // Latest response per liveness prompt
  liveness: Partial<Record<LivenessPrompt, boolean>>;
  biometricsPassed: boolean;

  recordingCapReached: boolean;
  manualReviewRequired: boolean;

  transitions: StateTransition[];
}

export interface CaptureFrame {
  sessionId: string;
  documentType: DocumentType;
  image: Buffer;
  capturedAt: Date;
}

export type RegistryStatus = 'matched' | 'mismatched' | 'unavailable';

export type VerificationStatus =
  | 'pending'
  | 'recapture_requested'
  | 'matched'
  | 'mismatched'
  | 'unavailable'
  | 'failed';

export interface VerificationResult {
  documentType: DocumentType;
  status: VerificationStatus;
  extractedFields: Record<string, string>;
  ocrConfidence?: number;
  registryStatus?: RegistryStatus;
  attemptCount: number;
  failureCode?: string;
  message?: string;
  updatedAt: Date;
}

export type BiometricEventKind = 'blink' | 'head_pose' | 'ip_sample' | 'geo_sample';

export interface BiometricEvent {
  sessionId: string;
  sequence: number;
  kind: BiometricEventKind;
  payload: Record<string, unknown>;
  timestamp: number;
}

export type RecordingState = 'buffering' | 'finalizing' | 'done' | 'failed';

export interface RecordingRecord {
  sessionId: string;
  state: RecordingState;
  bufferedMs: number;
  chunkCount: number;
  startedAt: Date;
  finalizedAt?: Date;
  capReached: boolean;
  location?: string;
  error?: string;
  errorCode?: string;
}

export interface MediaChunk {
  data: Buffer;
  durationMs: number;
}

export type MediaControlAction = 'start_recording' | 'stop_recording';

export interface MediaControlMessage {
  action: MediaControlAction;
  maxDurationMs?: number;
}

// External capabilities

export interface OcrExtraction {
  fields: Record<string, string>;
  confidence: number;
}

export interface OcrCapability {
  extract(image: Buffer, documentType: DocumentType): Promise<OcrExtraction>;
}

export interface RegistryCapability {
  verify(fields: Record<string, string>, documentType: DocumentType, signal?: AbortSignal): Promise<RegistryStatus>;
}

export interface MediaCompressor {
  // An aborted job must stop its encoder and reject
  compress(sessionId: string, chunkPaths: string[], signal?: AbortSignal): Promise<string>;
}

// API Request/Response Types

export interface IssueLinkRequest {
  customerId: string;
  ttlMs?: number;
}

export interface CreateSessionRequest {
  token: string;
}

export interface ChooseModeRequest {
  mode: SessionMode;
  scheduledAt?: string;
}

export interface FailSessionRequest {
  reason?: FailureReason;
}

export interface SessionSummaryResponse {
  success: true;
  session: VkycSession;
  outcome?: UserOutcome;
}

export interface ErrorResponse {
  success: false;
  error: string;
  message: string;
  statusCode: number;
}
