/**
 * Audit Trail Service
 * Keeps the per-session record of engine decisions and biometric events.
 * Provides the merged timeline for review.
 */

import * as fs from 'fs';
import * as path from 'path';
import { reviveDates } from '../stores/repository';
import { BiometricEvent } from '../types/vkyc.types';

export type AuditDecisionType =
  | 'link'
  | 'transition'
  | 'verification_result'
  | 'liveness_response'
  | 'channel'
  | 'recording'
  | 'alert';

export interface AuditDecision {
  sessionId: string;
  decisionId: string;
  type: AuditDecisionType;
  summary: string;
  details?: Record<string, unknown>;
  timestamp: number;
}

export type TimelineEntryType = 'decision' | 'biometric_event';

export interface TimelineEntry {
  id: string;
  timestamp: number;
  type: TimelineEntryType;
  subType: string;
  data: AuditDecision | BiometricEvent;
}

export interface SessionTimeline {
  sessionId: string;
  timeline: TimelineEntry[];
  decisions: AuditDecision[];
  biometricEvents: BiometricEvent[];
}

/**
 * Destination for biometric events. Implementations may fail; callers retry.
 */
export interface BiometricSink {
  append(sessionId: string, events: BiometricEvent[]): Promise<void>;
}

interface SessionTrail {
  decisions: AuditDecision[];
  biometricEvents: BiometricEvent[];
}

const SESSION_ID = /^[A-Za-z0-9_-]+$/;

export class AuditTrailService implements BiometricSink {
  private trails: Map<string, SessionTrail> = new Map();

  /**
   * @param dir - where trails are persisted; trails stay in memory only when omitted
   */
  constructor(private readonly dir?: string, private readonly now: () => number = Date.now) {
    if (this.dir && !fs.existsSync(this.dir)) {
      fs.mkdirSync(this.dir, { recursive: true });
    }
  }

  private sessionDir(sessionId: string): string | undefined {
    if (!this.dir) return undefined;
    if (!SESSION_ID.test(sessionId)) {
      throw new Error(`[AuditTrail] Invalid session id: ${sessionId}`);
    }
    return path.join(this.dir, sessionId);
  }

  private trail(sessionId: string): SessionTrail {
    let trail = this.trails.get(sessionId);
    if (!trail) {
      trail = this.loadFromDisk(sessionId) ?? { decisions: [], biometricEvents: [] };
      this.trails.set(sessionId, trail);
    }
    return trail;
  }

  private loadFromDisk(sessionId: string): SessionTrail | undefined {
    const sessionDir = this.sessionDir(sessionId);
    if (!sessionDir || !fs.existsSync(sessionDir)) {
      return undefined;
    }

    const decisionsPath = path.join(sessionDir, 'decisions.json');
    const biometricsPath = path.join(sessionDir, 'biometrics.json');
    try {
      return {
        decisions: fs.existsSync(decisionsPath) ? JSON.parse(fs.readFileSync(decisionsPath, 'utf-8'), reviveDates) : [],
        biometricEvents: fs.existsSync(biometricsPath) ? JSON.parse(fs.readFileSync(biometricsPath, 'utf-8')) : [],
      };
    } catch (error) {
      console.error(`[AuditTrail] Failed to load trail for session ${sessionId} from disk:`, error);
      return undefined;
    }
  }

  private persist(sessionId: string, file: 'decisions.json' | 'biometrics.json', records: unknown[]): void {
    const sessionDir = this.sessionDir(sessionId);
    if (!sessionDir) return;

    if (!fs.existsSync(sessionDir)) {
      fs.mkdirSync(sessionDir, { recursive: true });
    }
    const filepath = path.join(sessionDir, file);
    fs.writeFileSync(`${filepath}.tmp`, JSON.stringify(records, null, 2));
    fs.renameSync(`${filepath}.tmp`, filepath);
  }

  /**
   * Save an engine decision. Persistence errors are logged, the in-memory trail keeps the entry.
   */
  recordDecision(
    sessionId: string,
    type: AuditDecisionType,
    summary: string,
    details?: Record<string, unknown>,
  ): AuditDecision {
    const decision: AuditDecision = {
      sessionId,
      decisionId: `dec_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`,
      type,
      summary,
      details,
      timestamp: this.now(),
    };

    const trail = this.trail(sessionId);
    trail.decisions.push(decision);

    try {
      this.persist(sessionId, 'decisions.json', trail.decisions);
    } catch (error) {
      console.error(`[AuditTrail] Failed to persist decision for session ${sessionId}:`, error);
    }

    console.log(`[AuditTrail] ${type}: ${summary} (session ${sessionId})`);
    return decision;
  }

  /**
   * Append biometric events. Throws when the events cannot be persisted so the caller can retry.
   */
  async append(sessionId: string, events: BiometricEvent[]): Promise<void> {
    if (events.length === 0) return;

    const trail = this.trail(sessionId);
    const merged = [...trail.biometricEvents, ...events];
    this.persist(sessionId, 'biometrics.json', merged);
    trail.biometricEvents = merged;
  }

  /**
   * Get merged timeline for a session
   */
  getSessionTimeline(sessionId: string): SessionTimeline | null {
    const trail = this.trails.get(sessionId) ?? this.loadFromDisk(sessionId);
    if (!trail) {
      return null;
    }

    const timeline: TimelineEntry[] = [];

    for (const decision of trail.decisions) {
      timeline.push({
        id: decision.decisionId,
        timestamp: decision.timestamp,
        type: 'decision',
        subType: decision.type,
        data: decision,
      });
    }

    for (const event of trail.biometricEvents) {
      timeline.push({
        id: `bio_${event.sequence}`,
        timestamp: event.timestamp,
        type: 'biometric_event',
        subType: event.kind,
        data: event,
      });
    }

    // Stable sort keeps storage order for equal timestamps
    timeline.sort((a, b) => a.timestamp - b.timestamp);

    return {
      sessionId,
      timeline,
      decisions: [...trail.decisions],
      biometricEvents: [...trail.biometricEvents],
    };
  }
}
