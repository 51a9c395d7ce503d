import type { NextFunction, Request, Response } from 'express';
import { logger } from '@/services/logger';
import { errorMessage } from '@/utils/errors';

export function notFoundMiddleware(req: Request, res: Response): void {
  res.status(404).json({ error: 'not_found', message: `No route for ${req.method} ${req.path}` });
}

export function errorMiddleware(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  logger.error('http:unhandled_error', { path: req.path, error: errorMessage(err) });
  if (res.headersSent) {
    res.end();
    return;
  }
  res.status(500).json({ error: 'internal_error', message: 'Internal Server Error' });
}
