/**
 * Signaling message validation
 * Raw frames from a peer are parsed into the closed ClientMessage union, one variant at a time,
 * then checked against the sender's role.
 */

import { ChannelError, ErrorCode } from '../errors/vkycErrors';
import {
  CallSetupKind,
  ClientMessage,
  LivenessSignal,
  PeerRole,
} from '../types/signaling.types';
import { DOCUMENT_TYPES, DocumentType, LivenessPrompt } from '../types/vkyc.types';

const CALL_SETUP_KINDS: ReadonlyArray<CallSetupKind> = ['offer', 'answer', 'ice_candidate'];
const LIVENESS_PROMPTS: ReadonlyArray<LivenessPrompt> = ['blink', 'turn_left', 'turn_right', 'smile'];
const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(message: string): ChannelError {
  return new ChannelError(ErrorCode.MalformedMessage, message);
}

function oneOf<T extends string>(value: unknown, allowed: ReadonlyArray<T>, field: string): T {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw malformed(`${field} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

function finiteNumber(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw malformed(`${field} must be a finite number`);
  }
  return value;
}

function optionalNumber(value: unknown, field: string): number | undefined {
  return value === undefined ? undefined : finiteNumber(value, field);
}

function documentType(value: unknown): DocumentType {
  return oneOf(value, DOCUMENT_TYPES, 'documentType');
}

function parseLivenessSignal(value: unknown): LivenessSignal {
  if (!isRecord(value)) {
    throw malformed('event must be an object');
  }

  switch (value.kind) {
    case 'prompt':
      return { kind: 'prompt', prompt: oneOf(value.prompt, LIVENESS_PROMPTS, 'prompt') };
    case 'response':
      if (typeof value.passed !== 'boolean') {
        throw malformed('passed must be a boolean');
      }
      return { kind: 'response', prompt: oneOf(value.prompt, LIVENESS_PROMPTS, 'prompt'), passed: value.passed };
    case 'blink': {
      const count = finiteNumber(value.count, 'count');
      if (count < 0 || !Number.isInteger(count)) {
        throw malformed('count must be a non-negative integer');
      }
      return { kind: 'blink', count };
    }
    case 'head_pose':
      return {
        kind: 'head_pose',
        yaw: finiteNumber(value.yaw, 'yaw'),
        pitch: finiteNumber(value.pitch, 'pitch'),
        roll: finiteNumber(value.roll, 'roll'),
      };
    case 'ip_sample':
      if (typeof value.ip !== 'string' || value.ip.length === 0 || value.ip.length > 64) {
        throw malformed('ip must be a non-empty string');
      }
      return { kind: 'ip_sample', ip: value.ip };
    case 'geo_sample': {
      const latitude = finiteNumber(value.latitude, 'latitude');
      const longitude = finiteNumber(value.longitude, 'longitude');
      if (latitude < -90 || latitude > 90 || longitude < -180 || longitude > 180) {
        throw malformed('latitude/longitude out of range');
      }
      return { kind: 'geo_sample', latitude, longitude, accuracy: optionalNumber(value.accuracy, 'accuracy') };
    }
    default:
      throw malformed(`Unknown liveness event kind: ${String(value.kind)}`);
  }
}

/**
 * Parse a raw frame into a client message
 */
export function parseClientMessage(raw: string | UnknownRecord): ClientMessage {
  let value: unknown = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch {
      throw malformed('Message is not valid JSON');
    }
  }

  if (!isRecord(value)) {
    throw malformed('Message must be a JSON object');
  }

  switch (value.type) {
    case 'call_setup':
      if (value.payload === undefined) {
        throw malformed('call_setup requires a payload');
      }
      return { type: 'call_setup', kind: oneOf(value.kind, CALL_SETUP_KINDS, 'kind'), payload: value.payload };

    case 'capture_command':
      return { type: 'capture_command', documentType: documentType(value.documentType) };

    case 'capture_submission':
      if (typeof value.image !== 'string' || value.image.length === 0 || !BASE64.test(value.image)) {
        throw malformed('image must be a base64 string');
      }
      return {
        type: 'capture_submission',
        documentType: documentType(value.documentType),
        image: value.image,
        capturedAt: optionalNumber(value.capturedAt, 'capturedAt'),
      };

    case 'liveness_event':
      return {
        type: 'liveness_event',
        event: parseLivenessSignal(value.event),
        timestamp: optionalNumber(value.timestamp, 'timestamp'),
      };

    case 'heartbeat':
      return { type: 'heartbeat' };

    case 'leave':
      return { type: 'leave' };

    default:
      throw malformed(`Unknown message type: ${String(value.type)}`);
  }
}

/**
 * Agents drive the call (capture commands, prompts and their verdicts); users submit frames and samples
 */
export function isAllowedFor(role: PeerRole, message: ClientMessage): boolean {
  switch (message.type) {
    case 'call_setup':
    case 'heartbeat':
    case 'leave':
      return true;
    case 'capture_command':
      return role === 'agent';
    case 'capture_submission':
      return role === 'user';
    case 'liveness_event':
      if (message.event.kind === 'prompt' || message.event.kind === 'response') {
        return role === 'agent';
      }
      return role === 'user';
  }
}

export function requireAllowed(role: PeerRole, message: ClientMessage): void {
  if (!isAllowedFor(role, message)) {
    const detail = message.type === 'liveness_event' ? `${message.type}/${message.event.kind}` : message.type;
    throw new ChannelError(ErrorCode.MessageNotAllowed, `${role} may not send ${detail}`);
  }
}
