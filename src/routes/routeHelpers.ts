/**
 * Shared request/response helpers for the VKYC routes
 */

import { Request, Response } from 'express';
import { VkycError, errorMessage, httpStatusFor } from '../errors/vkycErrors';
import { ErrorResponse } from '../types/vkyc.types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

export function badRequest(res: Response, error: string, message: string): void {
  const response: ErrorResponse = { success: false, error, message, statusCode: 400 };
  res.status(400).json(response);
}

/**
 * Reply with the status and code of an engine error; anything else is a 500
 */
export function sendError(res: Response, error: unknown, context: string): void {
  const statusCode = httpStatusFor(error);
  if (statusCode >= 500) {
    console.error(`[VkycRoutes] ${context}:`, error);
  } else {
    console.warn(`[VkycRoutes] ${context}: ${errorMessage(error)}`);
  }

  const response: ErrorResponse = {
    success: false,
    error: error instanceof VkycError ? error.code : 'Internal server error',
    message: errorMessage(error),
    statusCode,
  };
  res.status(statusCode).json(response);
}
