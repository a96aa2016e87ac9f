import type { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import logger from "../utils/logger";

export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const started = process.hrtime.bigint();
  req.requestId = uuidv4();
  res.setHeader("X-Request-Id", req.requestId);

  res.on("finish", () => {
    const ms = Number(process.hrtime.bigint() - started) / 1e6;
    logger.info(`${req.method} ${req.path} ${res.statusCode}`, {
      requestId: req.requestId,
      durationMs: Math.round(ms),
    });
  });

  next();
}
