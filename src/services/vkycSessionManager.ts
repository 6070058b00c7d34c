/**
 * VKYC Session Manager
 * Owns the session lifecycle: link resolution, mode choice, begin, verification, completion and termination.
 *
 * Every mutation of a session runs under that session's lock, so there is a single writer per
 * session. Other components only ever receive snapshots.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { ErrorCode, TransitionError, VerificationError } from '../errors/vkycErrors';
import { Repository } from '../stores/repository';
import { KeyedMutex } from '../utils/keyedMutex';
import {
  ACTIVE_STATES,
  CaptureFrame,
  DocumentType,
  FailureReason,
  LivenessPrompt,
  SessionMode,
  SessionState,
  TERMINAL_STATES,
  TerminationReason,
  UserOutcome,
  VerificationLink,
  VerificationResult,
  VkycSession,
} from '../types/vkyc.types';
import { AuditTrailService } from './auditTrailService';
import { LinkIssuer } from './linkIssuer';
import { VerificationPipeline } from './verificationPipeline';

export interface SessionManagerOptions {
  requiredDocuments: DocumentType[];
  requiredLivenessPrompts: LivenessPrompt[];
  scheduledLinkWindowMs: number;
  expirySweepIntervalMs: number;
  now?: () => Date;
}

type SessionManagerEvents = {
  started: [session: VkycSession];
  ended: [session: VkycSession];
  verificationUpdated: [session: VkycSession, result: VerificationResult];
};

export interface ChooseModeResult {
  session: VkycSession;
  // Fresh link issued for a scheduled occurrence
  link?: VerificationLink;
}

export interface SweepResult {
  activated: number;
  expired: number;
}

export interface SessionStatistics {
  total: number;
  byState: Record<SessionState, number>;
  manualReview: number;
}

export function isTerminal(state: SessionState): boolean {
  return TERMINAL_STATES.includes(state);
}

export function isActiveState(state: SessionState): boolean {
  return ACTIVE_STATES.includes(state);
}

/**
 * Map an internal termination reason onto the category shown to the user
 */
export function toUserOutcome(reason: TerminationReason): UserOutcome {
  switch (reason) {
    case 'completed':
      return 'completed';
    case 'link_expired':
      return 'expired';
    case 'disconnect_timeout':
    case 'process_restart':
    case 'user_left':
    case 'agent_left':
      return 'disconnected';
    case 'verification_failed':
    case 'registry_mismatch':
    case 'verification_incomplete':
    case 'recording_failed':
    case 'agent_terminated':
      return 'verification_failed';
  }
}

export class VkycSessionManager extends EventEmitter<SessionManagerEvents> {
  // Write-through cache of the repository
  private cache: Map<string, VkycSession> = new Map();
  private mutex = new KeyedMutex();
  private sweepTimer?: NodeJS.Timeout;

  constructor(
    private readonly sessions: Repository<VkycSession>,
    private readonly links: LinkIssuer,
    private readonly pipeline: VerificationPipeline,
    private readonly audit: AuditTrailService,
    private readonly options: SessionManagerOptions,
  ) {
    super();
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }

  private snapshot(session: VkycSession): VkycSession {
    return structuredClone(session);
  }

  private async load(sessionId: string): Promise<VkycSession> {
    const cached = this.cache.get(sessionId);
    if (cached) return cached;

    const stored = await this.sessions.get(sessionId);
    if (!stored) {
      throw new TransitionError(ErrorCode.SessionNotFound, `Session not found: ${sessionId}`);
    }
    this.cache.set(sessionId, stored);
    return stored;
  }

  private async save(session: VkycSession): Promise<void> {
    session.updatedAt = this.now();
    this.cache.set(session.sessionId, session);
    await this.sessions.put(session.sessionId, session);
  }

  private transition(session: VkycSession, to: SessionState, reason?: TerminationReason): void {
    const from = session.state;
    session.state = to;
    session.transitions.push({ from, to, at: this.now(), reason });
    this.audit.recordDecision(session.sessionId, 'transition', `${from} -> ${to}`, reason ? { reason } : undefined);
  }

  /**
   * Move a session into a terminal state. Callers hold the session lock.
   */
  private async terminate(session: VkycSession, to: SessionState, reason: TerminationReason): Promise<void> {
    this.transition(session, to, reason);
    session.endedAt = session.endedAt ?? this.now();
    session.terminationReason = reason;
    this.pipeline.cancelSession(session.sessionId);
    await this.save(session);

    console.log(`[VkycSessionManager] Session ${session.sessionId} ended: ${to} (${reason})`);
    this.emit('ended', this.snapshot(session));
  }

  private requireNotTerminal(session: VkycSession, operation: string): void {
    if (isTerminal(session.state)) {
      throw new TransitionError(
        ErrorCode.InvalidTransition,
        `Cannot ${operation}: session ${session.sessionId} is already ${session.state}`,
      );
    }
  }

  private requireActive(session: VkycSession, operation: string): void {
    if (!isActiveState(session.state)) {
      throw new TransitionError(
        ErrorCode.InvalidTransition,
        `Cannot ${operation}: session ${session.sessionId} is ${session.state}`,
      );
    }
  }

  private canComplete(session: VkycSession): boolean {
    const documentsMatched = session.requiredDocuments.every(
      documentType => session.verificationResults[documentType]?.status === 'matched',
    );
    return documentsMatched && session.biometricsPassed;
  }

  private isScheduleDue(session: VkycSession): boolean {
    return session.scheduledAt !== undefined && this.now().getTime() >= session.scheduledAt.getTime();
  }

  /**
   * Create a session from a verification link. A link already bound to a live session
   * returns that session instead of creating a second one.
   */
  async createSession(token: string): Promise<VkycSession> {
    return this.mutex.runExclusive(`link:${token}`, async () => {
      const link = await this.links.requireUsable(token);

      if (link.sessionId) {
        const existing = await this.getSession(link.sessionId);
        if (existing && !isTerminal(existing.state)) {
          if (existing.state === 'scheduled' && this.isScheduleDue(existing)) {
            return this.activateScheduled(existing.sessionId);
          }
          console.log(`[VkycSessionManager] Link already bound to session ${existing.sessionId}`);
          return existing;
        }
      }

      const now = this.now();
      const session: VkycSession = {
        sessionId: uuidv4(),
        linkToken: link.token,
        customerId: link.customerId,
        state: 'created',
        createdAt: now,
        updatedAt: now,
        requiredDocuments: [...this.options.requiredDocuments],
        verificationResults: {},
        liveness: {},
        // Nothing to check when no liveness prompt is required
        biometricsPassed: this.options.requiredLivenessPrompts.length === 0,
        recordingCapReached: false,
        manualReviewRequired: false,
        transitions: [],
      };

      await this.links.bindSession(link.token, session.sessionId);
      await this.save(session);
      this.audit.recordDecision(session.sessionId, 'link', 'Session created from link', {
        customerId: session.customerId,
      });

      console.log(`[VkycSessionManager] Session created: ${session.sessionId} for customer ${session.customerId}`);
      return this.snapshot(session);
    });
  }

  /**
   * Choose immediate or scheduled execution. Scheduling issues a fresh link for the occurrence
   * and supersedes the current one.
   */
  async chooseMode(sessionId: string, mode: SessionMode, scheduledAt?: Date): Promise<ChooseModeResult> {
    return this.mutex.runExclusive(sessionId, async () => {
      const session = await this.load(sessionId);

      if (mode === 'immediate' && session.state === 'ready_to_start' && session.mode === 'immediate') {
        return { session: this.snapshot(session) };
      }
      if (
        mode === 'scheduled' &&
        session.state === 'scheduled' &&
        scheduledAt !== undefined &&
        session.scheduledAt?.getTime() === scheduledAt.getTime()
      ) {
        return { session: this.snapshot(session), link: await this.links.get(session.linkToken) };
      }

      if (session.state !== 'created') {
        throw new TransitionError(
          ErrorCode.InvalidTransition,
          `Cannot choose a mode: session ${sessionId} is ${session.state}`,
        );
      }

      if (mode === 'immediate') {
        session.mode = 'immediate';
        this.transition(session, 'ready_to_start');
        await this.save(session);
        return { session: this.snapshot(session) };
      }

      if (!scheduledAt || Number.isNaN(scheduledAt.getTime()) || scheduledAt.getTime() <= this.now().getTime()) {
        throw new TransitionError(ErrorCode.ScheduleNotInFuture, 'scheduledAt must be in the future');
      }

      const link = await this.links.issue(session.customerId, {
        expiresAt: new Date(scheduledAt.getTime() + this.options.scheduledLinkWindowMs),
        sessionId,
        scheduledAt,
      });
      await this.links.supersede(session.linkToken, link.token);

      session.mode = 'scheduled';
      session.scheduledAt = scheduledAt;
      session.linkToken = link.token;
      this.transition(session, 'scheduled');
      await this.save(session);

      console.log(`[VkycSessionManager] Session ${sessionId} scheduled for ${scheduledAt.toISOString()}`);
      return { session: this.snapshot(session), link };
    });
  }

  /**
   * Promote a scheduled session once its time has come
   */
  async activateScheduled(sessionId: string): Promise<VkycSession> {
    return this.mutex.runExclusive(sessionId, async () => {
      const session = await this.load(sessionId);
      if (session.state === 'ready_to_start') {
        return this.snapshot(session);
      }
      if (session.state !== 'scheduled') {
        throw new TransitionError(
          ErrorCode.InvalidTransition,
          `Cannot activate: session ${sessionId} is ${session.state}`,
        );
      }
      if (!this.isScheduleDue(session)) {
        throw new TransitionError(ErrorCode.ScheduleNotReached, 'The scheduled time has not been reached yet');
      }

      this.transition(session, 'ready_to_start');
      await this.save(session);
      return this.snapshot(session);
    });
  }

  /**
   * Start the call. Consumes the link; listeners of `started` start the recording and open the channel.
   * Repeating the call once the session has started is a no-op.
   */
  async beginSession(sessionId: string): Promise<VkycSession> {
    return this.mutex.runExclusive(sessionId, async () => {
      const session = await this.load(sessionId);

      if (session.startedAt && !isTerminal(session.state)) {
        return this.snapshot(session);
      }
      if (session.state !== 'ready_to_start') {
        throw new TransitionError(
          ErrorCode.InvalidTransition,
          `Cannot begin: session ${sessionId} is ${session.state}`,
        );
      }

      await this.links.requireUsable(session.linkToken);
      await this.links.markConsumed(session.linkToken);

      session.startedAt = this.now();
      this.transition(session, 'in_progress');
      await this.save(session);

      console.log(`[VkycSessionManager] Session ${sessionId} started`);
      this.emit('started', this.snapshot(session));
      return this.snapshot(session);
    });
  }

  /**
   * Hand a captured frame to the verification pipeline. Returns once the frame is accepted.
   */
  async requestVerification(frame: CaptureFrame): Promise<VkycSession> {
    const { sessionId, documentType } = frame;

    return this.mutex.runExclusive(sessionId, async () => {
      const session = await this.load(sessionId);
      this.requireActive(session, 'verify a document');

      const current = session.verificationResults[documentType];
      if (current?.status === 'matched') {
        throw new TransitionError(ErrorCode.InvalidTransition, `${documentType} is already verified`);
      }
      if (current?.status === 'pending' || this.pipeline.isInFlight(sessionId, documentType)) {
        throw new VerificationError(
          ErrorCode.VerificationInProgress,
          `A ${documentType} verification is already running for this session`,
        );
      }

      const priorAttempts = current?.status === 'recapture_requested' ? current.attemptCount : 0;
      session.verificationResults[documentType] = {
        documentType,
        status: 'pending',
        extractedFields: {},
        attemptCount: priorAttempts,
        updatedAt: this.now(),
      };
      if (session.state === 'in_progress') {
        this.transition(session, 'verifying');
      }
      await this.save(session);

      try {
        this.pipeline.submit(frame, priorAttempts, result => this.recordVerificationResult(sessionId, result));
      } catch (error) {
        // Roll back so the document can be submitted again
        if (current) {
          session.verificationResults[documentType] = current;
        } else {
          delete session.verificationResults[documentType];
        }
        await this.save(session);
        throw error;
      }

      return this.snapshot(session);
    });
  }

  /**
   * Completion callback of the verification pipeline
   */
  async recordVerificationResult(sessionId: string, result: VerificationResult): Promise<void> {
    await this.mutex.runExclusive(sessionId, async () => {
      const session = await this.load(sessionId);
      if (isTerminal(session.state)) {
        console.log(`[VkycSessionManager] Ignoring ${result.documentType} result for ended session ${sessionId}`);
        return;
      }

      session.verificationResults[result.documentType] = result;
      if (result.status === 'unavailable') {
        session.manualReviewRequired = true;
      }
      await this.save(session);

      this.audit.recordDecision(sessionId, 'verification_result', `${result.documentType}: ${result.status}`, {
        attemptCount: result.attemptCount,
        ocrConfidence: result.ocrConfidence,
        registryStatus: result.registryStatus,
        failureCode: result.failureCode,
      });
      this.emit('verificationUpdated', this.snapshot(session), structuredClone(result));

      if (result.status === 'failed') {
        await this.terminate(session, 'failed', 'verification_failed');
      } else if (result.status === 'mismatched') {
        await this.terminate(session, 'failed', 'registry_mismatch');
      }
    });
  }

  async recordLivenessResponse(sessionId: string, prompt: LivenessPrompt, passed: boolean): Promise<VkycSession> {
    return this.mutex.runExclusive(sessionId, async () => {
      const session = await this.load(sessionId);
      this.requireActive(session, 'record a liveness response');

      session.liveness[prompt] = passed;
      session.biometricsPassed = this.options.requiredLivenessPrompts.every(
        required => session.liveness[required] === true,
      );
      await this.save(session);

      this.audit.recordDecision(sessionId, 'liveness_response', `${prompt}: ${passed ? 'passed' : 'failed'}`, {
        biometricsPassed: session.biometricsPassed,
      });
      return this.snapshot(session);
    });
  }

  /**
   * Complete a session whose required documents all matched and whose liveness checks passed
   */
  async completeSession(sessionId: string): Promise<VkycSession> {
    return this.mutex.runExclusive(sessionId, async () => {
      const session = await this.load(sessionId);
      if (session.state === 'completed') {
        return this.snapshot(session);
      }
      this.requireNotTerminal(session, 'complete');
      this.requireActive(session, 'complete');

      if (!this.canComplete(session)) {
        const missing = session.requiredDocuments.filter(
          documentType => session.verificationResults[documentType]?.status !== 'matched',
        );
        throw new TransitionError(
          ErrorCode.VerificationIncomplete,
          missing.length > 0
            ? `Documents not verified: ${missing.join(', ')}`
            : 'Liveness checks have not passed',
        );
      }

      await this.terminate(session, 'completed', 'completed');
      return this.snapshot(session);
    });
  }

  /**
   * Fail a session. Failing an ended session is a no-op.
   */
  async failSession(sessionId: string, reason: FailureReason): Promise<VkycSession> {
    return this.mutex.runExclusive(sessionId, async () => {
      const session = await this.load(sessionId);
      if (isTerminal(session.state)) {
        return this.snapshot(session);
      }

      await this.terminate(session, 'failed', reason);
      return this.snapshot(session);
    });
  }

  /**
   * Expire a session whose link lapsed before the call began
   */
  async expireSession(sessionId: string): Promise<VkycSession> {
    return this.mutex.runExclusive(sessionId, async () => {
      const session = await this.load(sessionId);
      if (session.state === 'expired') {
        return this.snapshot(session);
      }
      if (session.state !== 'created' && session.state !== 'scheduled' && session.state !== 'ready_to_start') {
        throw new TransitionError(
          ErrorCode.InvalidTransition,
          `Cannot expire: session ${sessionId} is ${session.state}`,
        );
      }

      const link = await this.links.get(session.linkToken);
      if (link && !this.links.isExpired(link)) {
        throw new TransitionError(ErrorCode.LinkNotExpired, 'The session link has not expired yet');
      }

      await this.terminate(session, 'expired', 'link_expired');
      return this.snapshot(session);
    });
  }

  /**
   * Recording reached its cap: complete when possible, otherwise fail as incomplete
   */
  async handleRecordingCapReached(sessionId: string): Promise<VkycSession> {
    return this.mutex.runExclusive(sessionId, async () => {
      const session = await this.load(sessionId);
      session.recordingCapReached = true;

      if (isTerminal(session.state)) {
        await this.save(session);
        return this.snapshot(session);
      }

      if (isActiveState(session.state) && this.canComplete(session)) {
        await this.terminate(session, 'completed', 'completed');
      } else {
        await this.terminate(session, 'failed', 'verification_incomplete');
      }
      return this.snapshot(session);
    });
  }

  /**
   * Activate due scheduled sessions and expire sessions whose link lapsed
   */
  async expireDueSessions(): Promise<SweepResult> {
    const result: SweepResult = { activated: 0, expired: 0 };

    for (const stored of await this.sessions.list()) {
      const session = this.cache.get(stored.sessionId) ?? stored;
      if (session.state !== 'created' && session.state !== 'scheduled' && session.state !== 'ready_to_start') {
        continue;
      }

      try {
        const link = await this.links.get(session.linkToken);
        if (!link || this.links.isExpired(link)) {
          await this.expireSession(session.sessionId);
          result.expired++;
        } else if (session.state === 'scheduled' && this.isScheduleDue(session)) {
          await this.activateScheduled(session.sessionId);
          result.activated++;
        }
      } catch (error) {
        console.error(`[VkycSessionManager] Sweep failed for session ${session.sessionId}:`, error);
      }
    }

    if (result.activated > 0 || result.expired > 0) {
      console.log(`[VkycSessionManager] Sweep: ${result.activated} activated, ${result.expired} expired`);
    }
    return result;
  }

  startScheduler(): void {
    if (this.sweepTimer) return;

    this.sweepTimer = setInterval(() => {
      this.expireDueSessions().catch(error => {
        console.error('[VkycSessionManager] Scheduler sweep failed:', error);
      });
    }, this.options.expirySweepIntervalMs);
    this.sweepTimer.unref();
  }

  stopScheduler(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  /**
   * After a restart, fail sessions left mid-call without a live channel
   */
  async recover(hasActiveChannel: (sessionId: string) => boolean): Promise<number> {
    let failed = 0;
    for (const session of await this.sessions.list()) {
      this.cache.set(session.sessionId, session);
      if (isActiveState(session.state) && !hasActiveChannel(session.sessionId)) {
        await this.failSession(session.sessionId, 'process_restart');
        failed++;
      }
    }

    console.log(`[VkycSessionManager] Recovery complete: ${failed} session(s) failed after restart`);
    return failed;
  }

  async getSession(sessionId: string): Promise<VkycSession | undefined> {
    const cached = this.cache.get(sessionId);
    if (cached) return this.snapshot(cached);
    return this.sessions.get(sessionId);
  }

  /**
   * Whether the session accepts channel traffic
   */
  isActive(sessionId: string): boolean {
    const session = this.cache.get(sessionId);
    return session !== undefined && isActiveState(session.state);
  }

  async getStatistics(): Promise<SessionStatistics> {
    const byState: Record<SessionState, number> = {
      created: 0,
      scheduled: 0,
      ready_to_start: 0,
      in_progress: 0,
      verifying: 0,
      completed: 0,
      failed: 0,
      expired: 0,
    };
    let manualReview = 0;

    const all = await this.sessions.list();
    for (const session of all) {
      byState[session.state]++;
      if (session.manualReviewRequired) manualReview++;
    }

    return { total: all.length, byState, manualReview };
  }
}
