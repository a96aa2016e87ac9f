import fs from "fs/promises";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import multer from "multer";
import type { AppConfig } from "../config";
import logger from "../utils/logger";
import { PayloadTooLargeError, ValidationError } from "../utils/errors";
import { sendError, tooLargeMessage } from "../utils/response";
import { getExtension, hasAllowedExtension } from "../utils/sanitizer";
import { TempWorkspace } from "../utils/temp-workspace";
import type { InputDocument, UploadedFile } from "../models/processing.model";

export interface UploadPolicy {
  /** Multipart field carrying the file(s). */
  field: string;
  maxCount: number;
  /** Extensions accepted at intake. */
  extensions: readonly string[];
  context: string;
}

/**
 * Opens a temp workspace for the request. A `close` listener disposes it
 * if the handler never got to.
 */
export function openWorkspace(config: AppConfig): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    TempWorkspace.create(config.tempDir).then((workspace) => {
      if (res.headersSent) {
        void workspace.dispose();
        return;
      }
      req.workspace = workspace;
      res.on("close", () => {
        void workspace.dispose();
      });
      next();
    }, next);
  };
}

/**
 * Rejects bodies above the request ceiling. A declared Content-Length is
 * checked before a byte is parsed; a chunked body is counted as it arrives
 * and cut off once it passes the ceiling.
 */
export function limitContentLength(config: AppConfig): RequestHandler {
  const ceiling = config.maxContentLengthBytes;

  return (req: Request, res: Response, next: NextFunction) => {
    const reject = () => {
      void sendError(req, res, new PayloadTooLargeError(tooLargeMessage(ceiling)), "upload");
    };

    const declared = parseInt(req.headers["content-length"] ?? "", 10);
    if (Number.isFinite(declared)) {
      if (declared > ceiling) {
        req.resume();
        reject();
        return;
      }
      next();
      return;
    }

    // Stays paused until the multipart parser pipes it.
    req.pause();
    let received = 0;
    const count = (chunk: Buffer) => {
      received += chunk.length;
      if (received > ceiling) {
        req.off("data", count);
        req.unpipe();
        req.resume();
        reject();
      }
    };
    req.on("data", count);
    next();
  };
}

function createMulter(policy: UploadPolicy, config: AppConfig): multer.Multer {
  const storage = multer.diskStorage({
    destination(req, _file, cb) {
      if (!req.workspace) {
        cb(new Error("Upload workspace missing"), "");
        return;
      }
      cb(null, req.workspace.dir);
    },
    filename(req, file, cb) {
      if (!req.workspace) {
        cb(new Error("Upload workspace missing"), "");
        return;
      }
      cb(null, req.workspace.reserveName(file.originalname));
    },
  });

  return multer({
    storage,
    limits: {
      fileSize: config.maxFileSizeBytes,
      files: policy.maxCount,
    },
    fileFilter(_req, file, cb) {
      if (!hasAllowedExtension(file.originalname, policy.extensions)) {
        cb(
          new ValidationError(
            `Invalid file type: ${file.originalname || "(unnamed)"}. Allowed: ${policy.extensions.join(", ")}`,
          ),
        );
        return;
      }
      cb(null, true);
    },
  });
}

/**
 * Intake chain: request ceiling, workspace, multipart parsing with the
 * route's allow-list and per-file ceiling.
 */
export function acceptUploads(
  policy: UploadPolicy,
  config: AppConfig,
): RequestHandler[] {
  const upload = createMulter(policy, config);
  const parse =
    policy.maxCount === 1
      ? upload.single(policy.field)
      : upload.array(policy.field, policy.maxCount);

  const runMulter: RequestHandler = (req, res, next) => {
    if (res.headersSent) return;
    parse(req, res, (err: unknown) => {
      if (res.headersSent) return;
      if (err) {
        void sendError(req, res, err, policy.context, config.maxFileSizeBytes);
        return;
      }
      next();
    });
  };

  return [limitContentLength(config), openWorkspace(config), runMulter];
}

function toUploadedFile(file: Express.Multer.File): UploadedFile {
  return {
    originalName: file.originalname,
    storedName: file.filename,
    path: file.path,
    size: file.size,
    extension: getExtension(file.originalname),
    mimeType: file.mimetype,
  };
}

/**
 * Files multer accepted for this request, in submitted order. Throws when
 * fewer than `minCount` arrived or one of them is empty.
 */
export function getUploadedFiles(
  req: Request,
  minCount = 1,
  shortMessage = "No file uploaded",
): UploadedFile[] {
  const raw: Express.Multer.File[] = [];
  if (req.file) {
    raw.push(req.file);
  }
  if (Array.isArray(req.files)) {
    raw.push(...req.files);
  }

  if (raw.length < minCount) {
    throw new ValidationError(shortMessage);
  }

  const files = raw.map(toUploadedFile);
  for (const file of files) {
    if (file.size === 0) {
      logger.warn(`Empty file: ${file.originalName}`);
      throw new ValidationError(`Empty file: ${file.originalName}`);
    }
  }
  return files;
}

export function getUploadedFile(req: Request): UploadedFile {
  return getUploadedFiles(req)[0];
}

/** Reads an accepted upload into memory for a handler. */
export async function readUpload(file: UploadedFile): Promise<InputDocument> {
  return { name: file.originalName, data: await fs.readFile(file.path) };
}
