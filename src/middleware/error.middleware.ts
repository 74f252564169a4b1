import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { AppError } from '../utils/errors.js';
import type { LoggerLike } from '../utils/logger.js';

/**
 * Writes the response for an error raised inside a route handler. Domain
 * errors map to their status; anything else is logged and reported as 500
 * with the given message.
 */
export function sendError(res: Response, error: unknown, log: LoggerLike, fallbackMessage: string): void {
  if (error instanceof AppError) {
    res.status(error.status).json({ error: error.message });
    return;
  }
  if (error instanceof ZodError) {
    res.status(400).json({ error: error.errors });
    return;
  }
  if (error instanceof multer.MulterError) {
    const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    res.status(status).json({ error: error.message });
    return;
  }

  log.error({ error }, fallbackMessage);
  res.status(500).json({ error: fallbackMessage });
}

export function createErrorHandler(log: LoggerLike) {
  return (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    sendError(res, err, log, 'Internal server error');
  };
}
