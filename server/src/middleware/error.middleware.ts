import type { Request, Response, NextFunction } from "express";
import { NotFoundError } from "../utils/errors";
import { sendError } from "../utils/response";

export function notFoundHandler(req: Request, res: Response): void {
  void sendError(req, res, new NotFoundError(), "routing");
}

// Express recognises error middleware by arity, so `next` stays.
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  void sendError(req, res, err, `${req.method} ${req.path}`);
}
