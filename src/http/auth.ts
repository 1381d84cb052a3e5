import { NextFunction, Request, Response } from 'express';
import { logger } from '../utils/logger';

/**
 * Shared-secret gate on the X-API-Key header. An empty key leaves the
 * routes open.
 */
export function requireApiKey(apiKey: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey || req.get('x-api-key') === apiKey) {
      next();
      return;
    }

    logger.warn({ method: req.method, url: req.originalUrl }, 'Rejected request with invalid API key');
    res.status(401).json({ status: 'error', message: 'invalid api key' });
  };
}
