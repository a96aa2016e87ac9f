import type { Request, Response } from "express";
import { MulterError } from "multer";
import logger from "./logger";
import {
  AppError,
  PayloadTooLargeError,
  ValidationError,
  isHttpLikeError,
} from "./errors";
import type { ProcessingResult } from "../models/processing.model";

export async function disposeWorkspace(req: Request): Promise<void> {
  if (req.workspace) {
    await req.workspace.dispose();
  }
}

/**
 * Removes the request's temp files, then writes the result as a download.
 */
export async function sendResult(
  req: Request,
  res: Response,
  result: ProcessingResult,
  status = 200,
): Promise<void> {
  await disposeWorkspace(req);

  res.status(status);
  res.attachment(result.filename);
  res.type(result.contentType);
  res.setHeader("Cache-Control", "no-store");
  for (const [name, value] of Object.entries(result.headers ?? {})) {
    res.setHeader(name, value);
  }
  res.send(
    Buffer.from(
      result.data.buffer,
      result.data.byteOffset,
      result.data.byteLength,
    ),
  );
}

/** Removes the request's temp files, then writes JSON. */
export async function sendJson(
  req: Request,
  res: Response,
  body: unknown,
  status = 200,
): Promise<void> {
  await disposeWorkspace(req);
  res.status(status).json(body);
}

export function toAppError(error: unknown, maxFileSizeBytes?: number): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof MulterError) {
    if (error.code === "LIMIT_FILE_SIZE") {
      return new PayloadTooLargeError(tooLargeMessage(maxFileSizeBytes));
    }
    if (error.code === "LIMIT_UNEXPECTED_FILE") {
      return new ValidationError(
        `Unexpected file field: ${error.field ?? "unknown"}`,
      );
    }
    return new ValidationError(error.message);
  }

  if (isHttpLikeError(error) && error.status >= 400 && error.status < 500) {
    return new AppError(
      error.status,
      error.expose === false ? "Bad request" : error.message,
    );
  }

  return new AppError(500, "Internal server error");
}

export function tooLargeMessage(maxBytes?: number): string {
  if (maxBytes === undefined) return "File too large.";
  const mb = Math.round((maxBytes / (1024 * 1024)) * 100) / 100;
  return `File too large. Maximum file size is ${mb}MB.`;
}

/**
 * Single exit for failures: cleans up, logs by severity and answers
 * `{ error }` with the mapped status.
 */
export async function sendError(
  req: Request,
  res: Response,
  error: unknown,
  context: string,
  maxFileSizeBytes?: number,
): Promise<void> {
  await disposeWorkspace(req);

  const appError = toAppError(error, maxFileSizeBytes);
  if (appError.status >= 500) {
    logger.error(`Error in ${context}:`, error);
  } else {
    logger.warn(`Rejected ${context}: ${appError.message}`, {
      requestId: req.requestId,
    });
  }

  if (res.headersSent) {
    return;
  }
  res.status(appError.status).json(appError.toJSON());
}
