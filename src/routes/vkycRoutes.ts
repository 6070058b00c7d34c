/**
 * VKYC Routes
 * REST API endpoints for links and the session lifecycle
 */

import express, { Request, Response } from 'express';
import { ErrorCode } from '../errors/vkycErrors';
import { isTerminal, toUserOutcome } from '../services/vkycSessionManager';
import {
  FailureReason,
  LinkResolution,
  SessionMode,
  SessionSummaryResponse,
  VerificationLink,
} from '../types/vkyc.types';
import { VkycEngine } from '../vkycEngine';
import { badRequest, readBody, sendError } from './routeHelpers';

const SESSION_MODES: ReadonlyArray<SessionMode> = ['immediate', 'scheduled'];

// Reasons an agent may give when ending a session
const AGENT_FAILURE_REASONS: ReadonlyArray<FailureReason> = [
  'agent_terminated',
  'verification_failed',
  'verification_incomplete',
];

export function createVkycRouter(engine: VkycEngine): express.Router {
  const router = express.Router();
  const { links, sessions, audit } = engine;

  /**
   * POST /vkyc/links
   * Issue a verification link for a customer
   */
  router.post('/links', async (req: Request, res: Response) => {
    try {
      const { customerId, ttlMs } = readBody(req);

      if (typeof customerId !== 'string' || !customerId.trim()) {
        return badRequest(res, 'Missing customerId', 'customerId is required');
      }
      let ttl: number | undefined;
      if (ttlMs !== undefined) {
        if (typeof ttlMs !== 'number' || !Number.isFinite(ttlMs) || ttlMs <= 0) {
          return badRequest(res, 'Invalid ttlMs', 'ttlMs must be a positive number of milliseconds');
        }
        ttl = ttlMs;
      }

      const link: VerificationLink = await links.issue(customerId.trim(), { ttlMs: ttl });
      res.status(201).json({ success: true, link });
    } catch (error) {
      sendError(res, error, 'Error issuing link');
    }
  });

  /**
   * GET /vkyc/links/:token
   * Resolve a link into the mode options offered to the user
   */
  router.get('/links/:token', async (req: Request, res: Response) => {
    try {
      const resolution: LinkResolution = await links.resolve(req.params.token);
      res.json({ success: true, resolution });
    } catch (error) {
      sendError(res, error, 'Error resolving link');
    }
  });

  /**
   * GET /vkyc/statistics
   * Session counts by state
   */
  router.get('/statistics', async (_req: Request, res: Response) => {
    try {
      res.json({ success: true, statistics: await sessions.getStatistics() });
    } catch (error) {
      sendError(res, error, 'Error reading statistics');
    }
  });

  /**
   * POST /vkyc/sessions
   * Create (or return the live) session for a link
   */
  router.post('/sessions', async (req: Request, res: Response) => {
    try {
      const { token } = readBody(req);
      if (typeof token !== 'string' || !token) {
        return badRequest(res, 'Missing token', 'token is required');
      }

      const session = await sessions.createSession(token);
      const response: SessionSummaryResponse = { success: true, session };
      res.status(201).json(response);
    } catch (error) {
      sendError(res, error, 'Error creating session');
    }
  });

  /**
   * POST /vkyc/sessions/:sessionId/mode
   * Choose immediate or scheduled execution
   */
  router.post('/sessions/:sessionId/mode', async (req: Request, res: Response) => {
    try {
      const { mode: rawMode, scheduledAt } = readBody(req);
      const mode = SESSION_MODES.find(candidate => candidate === rawMode);

      if (!mode) {
        return badRequest(res, 'Invalid mode', `mode must be one of: ${SESSION_MODES.join(', ')}`);
      }
      if (mode === 'scheduled' && (typeof scheduledAt !== 'string' || Number.isNaN(Date.parse(scheduledAt)))) {
        return badRequest(res, 'Invalid scheduledAt', 'scheduledAt must be an ISO date for scheduled mode');
      }

      const result = await sessions.chooseMode(
        req.params.sessionId,
        mode,
        typeof scheduledAt === 'string' ? new Date(scheduledAt) : undefined,
      );
      res.json({ success: true, session: result.session, link: result.link });
    } catch (error) {
      sendError(res, error, 'Error choosing mode');
    }
  });

  /**
   * POST /vkyc/sessions/:sessionId/begin
   */
  router.post('/sessions/:sessionId/begin', async (req: Request, res: Response) => {
    try {
      const session = await sessions.beginSession(req.params.sessionId);
      const response: SessionSummaryResponse = { success: true, session };
      res.json(response);
    } catch (error) {
      sendError(res, error, 'Error beginning session');
    }
  });

  /**
   * POST /vkyc/sessions/:sessionId/complete
   */
  router.post('/sessions/:sessionId/complete', async (req: Request, res: Response) => {
    try {
      const session = await sessions.completeSession(req.params.sessionId);
      const response: SessionSummaryResponse = { success: true, session, outcome: 'completed' };
      res.json(response);
    } catch (error) {
      sendError(res, error, 'Error completing session');
    }
  });

  /**
   * POST /vkyc/sessions/:sessionId/fail
   * Agent-initiated termination
   */
  router.post('/sessions/:sessionId/fail', async (req: Request, res: Response) => {
    try {
      const { reason: rawReason } = readBody(req);
      const reason = rawReason === undefined
        ? 'agent_terminated'
        : AGENT_FAILURE_REASONS.find(candidate => candidate === rawReason);

      if (!reason) {
        return badRequest(res, 'Invalid reason', `reason must be one of: ${AGENT_FAILURE_REASONS.join(', ')}`);
      }

      const session = await sessions.failSession(req.params.sessionId, reason);
      const response: SessionSummaryResponse = {
        success: true,
        session,
        outcome: session.terminationReason ? toUserOutcome(session.terminationReason) : undefined,
      };
      res.json(response);
    } catch (error) {
      sendError(res, error, 'Error failing session');
    }
  });

  /**
   * GET /vkyc/sessions/:sessionId
   */
  router.get('/sessions/:sessionId', async (req: Request, res: Response) => {
    try {
      const session = await sessions.getSession(req.params.sessionId);
      if (!session) {
        return res.status(404).json({
          success: false,
          error: ErrorCode.SessionNotFound,
          message: `No session found with ID: ${req.params.sessionId}`,
          statusCode: 404,
        });
      }

      const response: SessionSummaryResponse = {
        success: true,
        session,
        outcome: isTerminal(session.state) && session.terminationReason
          ? toUserOutcome(session.terminationReason)
          : undefined,
      };
      res.json(response);
    } catch (error) {
      sendError(res, error, 'Error getting session');
    }
  });

  /**
   * GET /vkyc/sessions/:sessionId/timeline
   * Decisions and biometric events in time order
   */
  router.get('/sessions/:sessionId/timeline', async (req: Request, res: Response) => {
    try {
      const timeline = audit.getSessionTimeline(req.params.sessionId);
      if (!timeline) {
        return res.status(404).json({
          success: false,
          error: 'Timeline not found',
          message: `No audit trail found for session: ${req.params.sessionId}`,
          statusCode: 404,
        });
      }
      res.json({ success: true, timeline });
    } catch (error) {
      sendError(res, error, 'Error getting timeline');
    }
  });

  return router;
}
