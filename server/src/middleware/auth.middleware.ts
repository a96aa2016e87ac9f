import type { Request, Response, NextFunction, RequestHandler } from "express";
import crypto from "crypto";
import logger from "../utils/logger";

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && crypto.timingSafeEqual(left, right);
}

/** Bearer API key guard for administrative routes. */
export function requireApiKey(expectedToken: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      logger.warn(
        "Authentication failed: missing or invalid authorization header",
      );
      res
        .status(401)
        .json({ error: "Unauthorized: missing or invalid authorization header" });
      return;
    }

    const token = authHeader.substring(7);

    if (!expectedToken) {
      logger.error("SERVER_API_KEY not configured");
      res.status(500).json({ error: "Server configuration error" });
      return;
    }

    if (!safeEqual(token, expectedToken)) {
      logger.warn("Authentication failed: invalid API key");
      res.status(401).json({ error: "Unauthorized: invalid API key" });
      return;
    }

    next();
  };
}
