/**
 * Signaling message types
 * Closed set of messages exchanged over a session's signaling channel
 */

import {
  DocumentType,
  LivenessPrompt,
  MediaControlAction,
  UserOutcome,
  VerificationStatus,
} from './vkyc.types';

export type PeerRole = 'user' | 'agent';

export type CallSetupKind = 'offer' | 'answer' | 'ice_candidate';

export type LivenessSignal =
  | { kind: 'prompt'; prompt: LivenessPrompt }
  | { kind: 'response'; prompt: LivenessPrompt; passed: boolean }
  | { kind: 'blink'; count: number }
  | { kind: 'head_pose'; yaw: number; pitch: number; roll: number }
  | { kind: 'ip_sample'; ip: string }
  | { kind: 'geo_sample'; latitude: number; longitude: number; accuracy?: number };

// Client -> server

export interface CallSetupMessage {
  type: 'call_setup';
  kind: CallSetupKind;
  // Forwarded to the other peer without inspection
  payload: unknown;
}

export interface CaptureCommandMessage {
  type: 'capture_command';
  documentType: DocumentType;
}

export interface CaptureSubmissionMessage {
  type: 'capture_submission';
  documentType: DocumentType;
  // Base64 encoded image
  image: string;
  capturedAt?: number;
}

export interface LivenessEventMessage {
  type: 'liveness_event';
  event: LivenessSignal;
  timestamp?: number;
}

export interface HeartbeatMessage {
  type: 'heartbeat';
}

export interface LeaveMessage {
  type: 'leave';
}

export type ClientMessage =
  | CallSetupMessage
  | CaptureCommandMessage
  | CaptureSubmissionMessage
  | LivenessEventMessage
  | HeartbeatMessage
  | LeaveMessage;

export type ClientMessageType = ClientMessage['type'];

// Server -> client

export type ServerMessage =
  | { type: 'call_setup'; from: PeerRole; kind: CallSetupKind; payload: unknown }
  | { type: 'capture_command'; documentType: DocumentType; attempt: number }
  | { type: 'capture_received'; documentType: DocumentType }
  | {
      type: 'verification_update';
      documentType: DocumentType;
      status: VerificationStatus;
      attemptCount: number;
      message: string;
    }
  | { type: 'liveness_event'; from: PeerRole; event: LivenessSignal }
  | { type: 'peer_status'; role: PeerRole; status: 'connected' | 'disconnected' | 'reconnected' | 'left' }
  | { type: 'media_control'; action: MediaControlAction; maxDurationMs?: number }
  | { type: 'session_ended'; outcome: UserOutcome }
  | { type: 'error'; code: string; message: string };

/**
 * Transport-neutral handle to one connected peer
 */
export interface PeerConnection {
  send(message: ServerMessage): void;
  close(code?: number, reason?: string): void;
}
