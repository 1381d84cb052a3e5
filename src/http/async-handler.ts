import { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Forward rejected promises from async route handlers to the error middleware
 */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
