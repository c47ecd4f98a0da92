import type { NextFunction, Request, RequestHandler, Response } from "express";

/**
 * Adapt an async route handler for Express 4, forwarding rejections to the error handler.
 * The route's parameter names can be given as `P` to type `req.params`.
 */
export function asyncHandler<P = Record<string, string>>(
  fn: (req: Request<P>, res: Response, next: NextFunction) => Promise<void>
): RequestHandler<P> {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
