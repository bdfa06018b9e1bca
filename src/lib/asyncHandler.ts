import type { NextFunction, Request, RequestHandler, Response } from "express";

/**
 * Forward rejections from an async route handler to the Express error
 * middleware (Express 4 does not await handlers).
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Caller identity. Authentication is a stub: the header is trusted as is.
 */
export function actorFrom(req: Request): string | null {
  const header = req.header("x-user-id");
  const actor = header ? String(header).trim() : "";
  return actor || null;
}
