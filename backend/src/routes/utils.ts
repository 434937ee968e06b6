import type { Response } from 'express';
import type { ZodError } from 'zod';
import type { Logger } from '../utils/logger.js';
import { OrchestratorError, errorMessage } from '../errors.js';

export function sendValidationError(res: Response, error: ZodError): void {
  res.status(400).json({
    error: 'Invalid request',
    details: error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ')
  });
}

/**
 * Maps orchestrator errors to their status code; anything else is a 500
 * carrying `fallback` as the message.
 */
export function sendError(res: Response, error: unknown, fallback: string, logger?: Logger): void {
  if (error instanceof OrchestratorError) {
    res.status(error.status).json({ error: error.message, code: error.code });
    return;
  }
  logger?.error(fallback, error instanceof Error ? error : undefined);
  res.status(500).json({ error: fallback, details: errorMessage(error) });
}
