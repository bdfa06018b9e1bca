import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import { ZodError } from "zod";
import { errorMessage, isExtractionError } from "../lib/errors";
import { logger } from "../lib/logger";

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({
    ok: false,
    error: `Route ${req.method} ${req.path} not found`,
    code: "NOT_FOUND",
  });
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // Express recognizes error middleware by its four parameters
  _next: NextFunction
) {
  if (isExtractionError(err)) {
    return res.status(err.status).json({
      ok: false,
      error: err.message,
      code: err.code,
      ...err.details,
    });
  }

  if (err instanceof ZodError) {
    return res.status(400).json({
      ok: false,
      error: "Invalid request",
      code: "INVALID_REQUEST",
      issues: err.issues.map((i) => ({
        path: i.path.join("."),
        message: i.message,
      })),
    });
  }

  if (err instanceof multer.MulterError) {
    const tooLarge = err.code === "LIMIT_FILE_SIZE";
    return res.status(tooLarge ? 413 : 400).json({
      ok: false,
      error: err.message,
      code: tooLarge ? "FILE_TOO_LARGE" : "INVALID_UPLOAD",
    });
  }

  if (err instanceof SyntaxError) {
    return res
      .status(400)
      .json({ ok: false, error: "Malformed JSON body", code: "INVALID_REQUEST" });
  }

  logger.error(
    { error: errorMessage(err), method: req.method, path: req.path },
    "Unhandled request error"
  );
  return res
    .status(500)
    .json({ ok: false, error: "Internal server error", code: "INTERNAL" });
}
