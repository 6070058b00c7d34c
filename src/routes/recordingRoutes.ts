/**
 * Recording Routes
 * Chunk uploads from the client recorder and recording status
 */

import express, { Request, Response } from 'express';
import multer from 'multer';
import { ErrorCode, RecordingError } from '../errors/vkycErrors';
import { VkycEngine } from '../vkycEngine';
import { badRequest, readBody, sendError } from './routeHelpers';

export function createRecordingRouter(engine: VkycEngine): express.Router {
  const router = express.Router();
  const { recordings, transport } = engine;

  // Configure multer for chunk uploads
  const uploadChunk = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: engine.config.maxChunkBytes,
    },
  });

  /**
   * POST /vkyc/sessions/:sessionId/recording/chunks
   * Upload one recorder chunk with its duration
   */
  router.post('/sessions/:sessionId/recording/chunks', uploadChunk.single('chunk'), async (req: Request, res: Response) => {
    try {
      const { sessionId } = req.params;
      const { durationMs: rawDuration } = readBody(req);
      const durationMs = typeof rawDuration === 'string' ? Number(rawDuration) : rawDuration;
      const file = req.file;

      if (!file || file.size === 0) {
        return badRequest(res, 'Missing chunk', 'A non-empty chunk file is required');
      }
      if (typeof durationMs !== 'number' || !Number.isFinite(durationMs) || durationMs <= 0) {
        return badRequest(res, 'Invalid durationMs', 'durationMs must be a positive number');
      }

      if (!transport.push(sessionId, { data: file.buffer, durationMs })) {
        throw new RecordingError(ErrorCode.RecordingNotFound, `No recording is running for session ${sessionId}`);
      }

      res.status(202).json({ success: true, message: 'Chunk accepted' });
    } catch (error) {
      sendError(res, error, 'Error uploading chunk');
    }
  });

  /**
   * GET /vkyc/sessions/:sessionId/recording
   */
  router.get('/sessions/:sessionId/recording', async (req: Request, res: Response) => {
    try {
      const recording = await recordings.getRecording(req.params.sessionId);
      if (!recording) {
        throw new RecordingError(ErrorCode.RecordingNotFound, `No recording found for session ${req.params.sessionId}`);
      }
      res.json({ success: true, recording });
    } catch (error) {
      sendError(res, error, 'Error getting recording');
    }
  });

  return router;
}
