import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import { AppError } from "../errors.ts";
import { describeError, logError } from "../utils/logger.ts";

function isBodyParseError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "type" in error && error.type === "entity.parse.failed";
}

/** Writes a domain error as its own status, anything else as a 500 with `fallbackMessage`; the cause is only logged. */
export function sendError(res: Response, error: unknown, fallbackMessage: string): void {
  if (error instanceof AppError) {
    res.status(error.status).json(error.toJSON());
    return;
  }
  logError("request_failed", { message: fallbackMessage, ...describeError(error) });
  res.status(500).json({ message: fallbackMessage, code: "internal_error" });
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ message: `Route ${req.method} ${req.path} not found`, code: "not_found" });
}

export function errorHandler(error: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }
  if (error instanceof multer.MulterError) {
    res.status(400).json({
      message: error.code === "LIMIT_FILE_SIZE" ? "Uploaded file is too large" : error.message,
      code: "upload_error"
    });
    return;
  }
  if (isBodyParseError(error)) {
    res.status(400).json({ message: "Malformed JSON body", code: "bad_request" });
    return;
  }
  sendError(res, error, "Unexpected server error");
}
