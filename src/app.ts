/**
 * Express application for the VKYC engine
 */

import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { createRecordingRouter } from './routes/recordingRoutes';
import { createVkycRouter } from './routes/vkycRoutes';
import { ErrorResponse } from './types/vkyc.types';
import { VkycEngine } from './vkycEngine';

export function createApp(engine: VkycEngine): express.Express {
  const app = express();

  // Middleware
  app.use(cors({
    origin: engine.config.frontendUrl,
    credentials: true,
  }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'VKYC Session Engine',
    });
  });

  app.use('/vkyc', createVkycRouter(engine));
  app.use('/vkyc', createRecordingRouter(engine));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.path} not found`,
      availableRoutes: [
        'POST /vkyc/links',
        'GET /vkyc/links/:token',
        'POST /vkyc/sessions',
        'POST /vkyc/sessions/:sessionId/mode',
        'POST /vkyc/sessions/:sessionId/begin',
        'POST /vkyc/sessions/:sessionId/complete',
        'POST /vkyc/sessions/:sessionId/fail',
        'GET /vkyc/sessions/:sessionId',
        'GET /vkyc/sessions/:sessionId/timeline',
        'GET /vkyc/sessions/:sessionId/recording',
        'POST /vkyc/sessions/:sessionId/recording/chunks',
        'GET /vkyc/statistics',
      ],
    });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    const statusCode = err instanceof multer.MulterError || err instanceof SyntaxError ? 400 : 500;
    if (statusCode === 500) {
      console.error('Server error:', err);
    }

    const response: ErrorResponse = {
      success: false,
      error: statusCode === 400 ? 'Bad Request' : 'Internal Server Error',
      message: err.message,
      statusCode,
    };
    res.status(statusCode).json(response);
  });

  return app;
}
