/**
 * Signaling Channel
 * Per-session control channel between the user and the agent.
 *
 * Messages from each peer are handled one at a time in arrival order. Messages for a peer that is
 * away are queued and flushed in order when it comes back; a peer that stays away past the grace
 * period fails the session.
 */

import { ChannelError, ErrorCode, VkycError, errorMessage } from '../errors/vkycErrors';
import {
  ClientMessage,
  LivenessSignal,
  PeerConnection,
  PeerRole,
  ServerMessage,
} from '../types/signaling.types';
import {
  CaptureFrame,
  DocumentType,
  FailureReason,
  LivenessPrompt,
  MediaControlMessage,
  UserOutcome,
  VerificationResult,
} from '../types/vkyc.types';
import { AuditTrailService } from './auditTrailService';
import { BiometricLogger } from './biometricLogger';
import { parseClientMessage, requireAllowed } from './signalingMessages';

/**
 * What the channel needs from the state machine
 */
export interface SessionControlPort {
  isActive(sessionId: string): boolean;
  requestVerification(frame: CaptureFrame): Promise<unknown>;
  recordLivenessResponse(sessionId: string, prompt: LivenessPrompt, passed: boolean): Promise<unknown>;
  failSession(sessionId: string, reason: FailureReason): Promise<unknown>;
}

export interface SignalingChannelOptions {
  disconnectGraceMs: number;
  maxFrameBytes: number;
}

interface PeerSlot {
  connection?: PeerConnection;
  everConnected: boolean;
  outbound: ServerMessage[];
  inbound: Promise<void>;
  graceTimer?: NodeJS.Timeout;
}

function otherRole(role: PeerRole): PeerRole {
  return role === 'user' ? 'agent' : 'user';
}

function samplePayload(event: LivenessSignal): Record<string, unknown> {
  const { kind: _kind, ...payload } = event;
  return payload;
}

export class SignalingChannel {
  private peers: Record<PeerRole, PeerSlot> = {
    user: { everConnected: false, outbound: [], inbound: Promise.resolve() },
    agent: { everConnected: false, outbound: [], inbound: Promise.resolve() },
  };
  // Capture commands that reached the user and have not been answered yet
  private requestedCaptures: Set<DocumentType> = new Set();
  private captureAttempts: Map<DocumentType, number> = new Map();
  private boundAgentId?: string;
  private closed = false;

  constructor(
    readonly sessionId: string,
    private readonly port: SessionControlPort,
    private readonly biometrics: BiometricLogger,
    private readonly audit: AuditTrailService,
    private readonly options: SignalingChannelOptions,
  ) {}

  get isOpen(): boolean {
    return !this.closed;
  }

  isConnected(role: PeerRole): boolean {
    return this.peers[role].connection !== undefined;
  }

  hasConnectedPeer(): boolean {
    return this.isConnected('user') || this.isConnected('agent');
  }

  pendingFor(role: PeerRole): number {
    return this.peers[role].outbound.length;
  }

  get agentId(): string | undefined {
    return this.boundAgentId;
  }

  /**
   * The first agent to join owns the session. The same agent may reconnect; any other is refused.
   */
  bindAgent(agentId: string): void {
    if (this.boundAgentId === agentId) {
      return;
    }
    if (this.boundAgentId !== undefined) {
      console.warn(`[SignalingChannel] Agent ${agentId} refused for session ${this.sessionId}, bound to ${this.boundAgentId}`);
      this.audit.recordDecision(this.sessionId, 'channel', 'Agent takeover refused', {
        code: ErrorCode.PeerUnauthorized,
        agentId,
      });
      throw new ChannelError(ErrorCode.PeerUnauthorized, `Session ${this.sessionId} is handled by another agent`);
    }

    this.boundAgentId = agentId;
    this.audit.recordDecision(this.sessionId, 'channel', 'Agent bound', { agentId });
  }

  /**
   * Attach a peer connection. A second connection for the same role replaces the first.
   */
  attach(role: PeerRole, connection: PeerConnection): void {
    if (this.closed) {
      throw new ChannelError(ErrorCode.ChannelNotOpen, `Channel for session ${this.sessionId} is closed`);
    }

    const slot = this.peers[role];
    if (slot.graceTimer) {
      clearTimeout(slot.graceTimer);
      slot.graceTimer = undefined;
    }
    if (slot.connection && slot.connection !== connection) {
      slot.connection.close(4000, 'Replaced by a new connection');
    }

    const reconnected = slot.everConnected;
    slot.connection = connection;
    slot.everConnected = true;

    console.log(`[SignalingChannel] ${role} ${reconnected ? 'reconnected' : 'connected'} to session ${this.sessionId}`);
    this.deliver(otherRole(role), { type: 'peer_status', role, status: reconnected ? 'reconnected' : 'connected' });

    const queued = slot.outbound.splice(0);
    for (const message of queued) {
      if (!this.transmit(role, message)) {
        // Connection dropped mid-flush; keep the rest in order
        slot.outbound.push(...queued.slice(queued.indexOf(message)));
        break;
      }
    }
  }

  /**
   * Detach a peer after an unexpected disconnect and start its grace period
   */
  detach(role: PeerRole, connection?: PeerConnection): void {
    const slot = this.peers[role];
    if (this.closed || !slot.connection || (connection && slot.connection !== connection)) {
      return;
    }

    slot.connection = undefined;
    console.warn(`[SignalingChannel] ${role} disconnected from session ${this.sessionId}, grace ${this.options.disconnectGraceMs}ms`);
    this.audit.recordDecision(this.sessionId, 'channel', `${role} disconnected`);
    this.deliver(otherRole(role), { type: 'peer_status', role, status: 'disconnected' });

    slot.graceTimer = setTimeout(() => {
      slot.graceTimer = undefined;
      if (this.closed || slot.connection) return;

      console.warn(`[SignalingChannel] ${role} did not reconnect to session ${this.sessionId}`);
      this.audit.recordDecision(this.sessionId, 'channel', `${role} did not reconnect`, {
        code: ErrorCode.DisconnectTimeout,
        graceMs: this.options.disconnectGraceMs,
      });
      this.port.failSession(this.sessionId, 'disconnect_timeout').catch(error => {
        console.error(`[SignalingChannel] Failed to end session ${this.sessionId} after disconnect:`, error);
      });
    }, this.options.disconnectGraceMs);
  }

  /**
   * Handle a raw frame from a peer. Frames from the same peer are processed strictly in order.
   */
  receive(role: PeerRole, raw: string | Record<string, unknown>): Promise<void> {
    const slot = this.peers[role];
    slot.inbound = slot.inbound.then(async () => {
      try {
        await this.handle(role, raw);
      } catch (error) {
        this.reject(role, error);
      }
    });
    return slot.inbound;
  }

  private reject(role: PeerRole, error: unknown): void {
    const code = error instanceof VkycError ? error.code : 'internal_error';
    const message = errorMessage(error);

    if (!(error instanceof VkycError)) {
      console.error(`[SignalingChannel] Unexpected error handling ${role} message in session ${this.sessionId}:`, error);
    } else {
      console.warn(`[SignalingChannel] Rejected ${role} message in session ${this.sessionId}: ${code}`);
    }

    this.audit.recordDecision(this.sessionId, 'channel', `Rejected ${role} message`, { code, message });
    if (this.peers[role].connection) {
      this.transmit(role, { type: 'error', code, message });
    }
  }

  private async handle(role: PeerRole, raw: string | Record<string, unknown>): Promise<void> {
    if (this.closed) {
      throw new ChannelError(ErrorCode.ChannelNotOpen, 'Channel is closed');
    }

    const message = parseClientMessage(raw);
    requireAllowed(role, message);

    if (!this.port.isActive(this.sessionId)) {
      throw new ChannelError(ErrorCode.SessionNotActive, 'Session is not in progress');
    }

    await this.dispatch(role, message);
  }

  private async dispatch(role: PeerRole, message: ClientMessage): Promise<void> {
    switch (message.type) {
      case 'call_setup':
        this.deliver(otherRole(role), { type: 'call_setup', from: role, kind: message.kind, payload: message.payload });
        return;

      case 'capture_command':
        this.sendCaptureCommand(message.documentType);
        return;

      case 'capture_submission':
        await this.acceptSubmission(message.documentType, message.image, message.capturedAt);
        return;

      case 'liveness_event':
        await this.handleLiveness(role, message.event, message.timestamp);
        return;

      case 'heartbeat':
        return;

      case 'leave': {
        console.log(`[SignalingChannel] ${role} left session ${this.sessionId}`);
        this.deliver(otherRole(role), { type: 'peer_status', role, status: 'left' });
        await this.port.failSession(this.sessionId, role === 'user' ? 'user_left' : 'agent_left');
        return;
      }
    }
  }

  private sendCaptureCommand(documentType: DocumentType): void {
    const attempt = (this.captureAttempts.get(documentType) ?? 0) + 1;
    this.captureAttempts.set(documentType, attempt);
    this.deliver('user', { type: 'capture_command', documentType, attempt });
  }

  private async acceptSubmission(documentType: DocumentType, image: string, capturedAt?: number): Promise<void> {
    if (!this.requestedCaptures.has(documentType)) {
      throw new ChannelError(ErrorCode.CaptureNotRequested, `No ${documentType} capture was requested`);
    }

    const buffer = Buffer.from(image, 'base64');
    if (buffer.length === 0 || buffer.length > this.options.maxFrameBytes) {
      throw new ChannelError(ErrorCode.MalformedMessage, `Frame size must be between 1 and ${this.options.maxFrameBytes} bytes`);
    }

    this.requestedCaptures.delete(documentType);
    try {
      await this.port.requestVerification({
        sessionId: this.sessionId,
        documentType,
        image: buffer,
        capturedAt: capturedAt !== undefined ? new Date(capturedAt) : new Date(),
      });
    } catch (error) {
      // The user may submit again for the same command
      this.requestedCaptures.add(documentType);
      throw error;
    }

    this.deliver('user', { type: 'capture_received', documentType });
    this.deliver('agent', { type: 'capture_received', documentType });
  }

  private async handleLiveness(role: PeerRole, event: LivenessSignal, timestamp?: number): Promise<void> {
    switch (event.kind) {
      case 'prompt':
        this.deliver('user', { type: 'liveness_event', from: role, event });
        return;
      case 'response':
        await this.port.recordLivenessResponse(this.sessionId, event.prompt, event.passed);
        this.deliver('user', { type: 'liveness_event', from: role, event });
        return;
      default:
        // Samples are logged without waiting on storage
        this.biometrics.log(this.sessionId, event.kind, samplePayload(event), timestamp);
        this.deliver('agent', { type: 'liveness_event', from: role, event });
    }
  }

  /**
   * Tell both peers about a verification result; a re-capture request is re-sent to the user
   */
  notifyVerification(result: VerificationResult): void {
    if (this.closed) return;

    const update: ServerMessage = {
      type: 'verification_update',
      documentType: result.documentType,
      status: result.status,
      attemptCount: result.attemptCount,
      message: result.message ?? result.status,
    };
    this.deliver('user', update);
    this.deliver('agent', update);

    if (result.status === 'recapture_requested') {
      this.sendCaptureCommand(result.documentType);
    }
  }

  sendMediaControl(control: MediaControlMessage): void {
    if (this.closed) return;
    const message: ServerMessage = { type: 'media_control', ...control };
    this.deliver('user', message);
    this.deliver('agent', message);
  }

  /**
   * Queue for an absent peer, send otherwise
   */
  private deliver(role: PeerRole, message: ServerMessage): void {
    const slot = this.peers[role];
    if (!slot.connection || slot.outbound.length > 0 || !this.transmit(role, message)) {
      slot.outbound.push(message);
    }
  }

  private transmit(role: PeerRole, message: ServerMessage): boolean {
    const connection = this.peers[role].connection;
    if (!connection) return false;

    try {
      connection.send(message);
    } catch (error) {
      console.warn(`[SignalingChannel] Send to ${role} failed in session ${this.sessionId}:`, errorMessage(error));
      return false;
    }

    if (message.type === 'capture_command') {
      this.requestedCaptures.add(message.documentType);
    }
    return true;
  }

  /**
   * Tear the channel down. Connected peers are told the outcome; queued messages are dropped.
   */
  close(outcome: UserOutcome): void {
    if (this.closed) return;
    this.closed = true;

    for (const role of ['user', 'agent'] as const) {
      const slot = this.peers[role];
      if (slot.graceTimer) {
        clearTimeout(slot.graceTimer);
        slot.graceTimer = undefined;
      }
      slot.outbound = [];
      if (slot.connection) {
        this.transmit(role, { type: 'session_ended', outcome });
        slot.connection.close(1000, 'Session ended');
        slot.connection = undefined;
      }
    }
    this.requestedCaptures.clear();

    console.log(`[SignalingChannel] Channel closed for session ${this.sessionId}: ${outcome}`);
  }
}

/**
 * Registry of open channels, one per session
 */
export class SignalingHub {
  private channels: Map<string, SignalingChannel> = new Map();

  constructor(
    private readonly port: SessionControlPort,
    private readonly biometrics: BiometricLogger,
    private readonly audit: AuditTrailService,
    private readonly options: SignalingChannelOptions,
  ) {}

  open(sessionId: string): SignalingChannel {
    const existing = this.channels.get(sessionId);
    if (existing && existing.isOpen) {
      return existing;
    }

    const channel = new SignalingChannel(sessionId, this.port, this.biometrics, this.audit, this.options);
    this.channels.set(sessionId, channel);
    console.log(`[SignalingHub] Channel opened for session ${sessionId}`);
    return channel;
  }

  get(sessionId: string): SignalingChannel | undefined {
    const channel = this.channels.get(sessionId);
    return channel && channel.isOpen ? channel : undefined;
  }

  require(sessionId: string): SignalingChannel {
    const channel = this.get(sessionId);
    if (!channel) {
      throw new ChannelError(ErrorCode.ChannelNotOpen, `No open channel for session ${sessionId}`);
    }
    return channel;
  }

  hasActiveChannel(sessionId: string): boolean {
    const channel = this.get(sessionId);
    return channel !== undefined && channel.hasConnectedPeer();
  }

  close(sessionId: string, outcome: UserOutcome): void {
    const channel = this.channels.get(sessionId);
    if (!channel) return;
    channel.close(outcome);
    this.channels.delete(sessionId);
  }

  closeAll(outcome: UserOutcome): void {
    for (const sessionId of Array.from(this.channels.keys())) {
      this.close(sessionId, outcome);
    }
  }
}
