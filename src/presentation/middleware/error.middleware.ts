import { NextFunction, Request, Response } from "express";
import multer from "multer";
import {
  ConversionError,
  InvalidStateTransitionError,
  JobNotCompleteError,
  NotFoundError,
  errorMessage,
} from "../../domain/errors/conversion.errors";

/**
 * HTTP status for an error raised while serving a request.
 */
export function statusForError(error: unknown): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof JobNotCompleteError || error instanceof InvalidStateTransitionError) return 409;
  if (error instanceof multer.MulterError) {
    return error.code === "LIMIT_FILE_SIZE" ? 413 : 400;
  }
  // Submission-time validation failures (unsupported extension, bad input)
  if (error instanceof ConversionError) return 400;
  return 500;
}

export function sendError(res: Response, error: unknown, fallbackMessage: string): void {
  const status = statusForError(error);
  if (status >= 500) {
    console.error("[ErrorMiddleware] Unhandled error:", error);
  }
  res.status(status).json({ error: errorMessage(error) || fallbackMessage });
}

export function errorMiddleware(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  sendError(res, err, "Internal server error");
}
