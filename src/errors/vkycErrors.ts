/**
 * VKYC error taxonomy
 * Every error thrown by the engine carries a stable code for the audit trail and API responses.
 */

/**
 * Error code convention: category_reason
 */
export enum ErrorCode {
  LinkNotFound = 'link_not_found',
  LinkExpired = 'link_expired',
  LinkAlreadyConsumed = 'link_consumed',
  LinkSuperseded = 'link_superseded',

  SessionNotFound = 'transition_session_not_found',
  InvalidTransition = 'transition_invalid',
  ScheduleNotInFuture = 'transition_schedule_not_in_future',
  ScheduleNotReached = 'transition_schedule_not_reached',
  LinkNotExpired = 'transition_link_not_expired',
  VerificationIncomplete = 'transition_verification_incomplete',

  SessionNotActive = 'channel_session_not_active',
  ChannelNotOpen = 'channel_not_open',
  MalformedMessage = 'channel_malformed_message',
  MessageNotAllowed = 'channel_message_not_allowed',
  CaptureNotRequested = 'channel_capture_not_requested',
  PeerUnauthorized = 'channel_peer_unauthorized',
  DisconnectTimeout = 'channel_disconnect_timeout',

  VerificationInProgress = 'verification_in_progress',
  LowConfidence = 'verification_low_confidence',
  OcrFailed = 'verification_ocr_failed',
  RegistryMismatch = 'verification_registry_mismatch',
  RegistryUnavailable = 'verification_registry_unavailable',

  RecordingNotFound = 'recording_not_found',
  EmptyRecording = 'recording_empty',
  CompressionFailed = 'recording_compression_failed',

  RecordingCapReached = 'timeout_recording_cap_reached',
  CallTimedOut = 'timeout_call',
}

export type ErrorCategory = 'link' | 'transition' | 'channel' | 'verification' | 'recording' | 'timeout';

export class VkycError extends Error {
  constructor(public readonly category: ErrorCategory, public readonly code: ErrorCode, message?: string) {
    super(message ? message : code);
    this.name = new.target.name;

    // NOTE: Extending 'Error' breaks prototype chain since TypeScript 2.1.
    // The following line restores prototype chain.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Expired, consumed or unknown links. The link must be re-issued. */
export class LinkError extends VkycError {
  constructor(code: ErrorCode, message?: string) {
    super('link', code, message);
  }
}

/** An operation was attempted from a state that does not allow it. */
export class TransitionError extends VkycError {
  constructor(code: ErrorCode, message?: string) {
    super('transition', code, message);
  }
}

export class ChannelError extends VkycError {
  constructor(code: ErrorCode, message?: string) {
    super('channel', code, message);
  }
}

export class VerificationError extends VkycError {
  constructor(code: ErrorCode, message?: string) {
    super('verification', code, message);
  }
}

/** Non-fatal to the verification outcome; surfaced as an operational alert. */
export class RecordingError extends VkycError {
  constructor(code: ErrorCode, message?: string) {
    super('recording', code, message);
  }
}

export class TimeoutError extends VkycError {
  constructor(code: ErrorCode, message?: string) {
    super('timeout', code, message);
  }
}

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  link: 410,
  transition: 409,
  channel: 400,
  verification: 422,
  recording: 500,
  timeout: 408,
};

/**
 * HTTP status for an error raised by the engine
 */
export function httpStatusFor(error: unknown): number {
  if (!(error instanceof VkycError)) {
    return 500;
  }
  if (error.code === ErrorCode.LinkNotFound || error.code === ErrorCode.SessionNotFound || error.code === ErrorCode.RecordingNotFound) {
    return 404;
  }
  return STATUS_BY_CATEGORY[error.category];
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
