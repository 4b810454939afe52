import type { NextFunction, Request, RequestHandler, Response } from "express";

export type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Express 4 does not catch rejected promises from handlers; route the
 * rejection to the error middleware instead.
 */
export function asyncHandler(handler: AsyncRequestHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}
