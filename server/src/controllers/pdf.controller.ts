import type { Request, Response } from "express";
import Joi from "joi";
import pdfService from "../services/pdf.service";
import { createZip } from "../services/archive.service";
import { getUploadedFile, getUploadedFiles, readUpload } from "../middleware/upload.middleware";
import type { UploadPolicy } from "../middleware/upload.middleware";
import { sendError, sendJson, sendResult } from "../utils/response";
import { validateFields } from "../utils/validation";
import { CONTENT_TYPES, PDF_EXTENSIONS } from "../models/processing.model";
import type { RotationAngle } from "../models/processing.model";

export const MAX_MERGE_FILES = 20;

export const MERGE_POLICY: UploadPolicy = {
  field: "files",
  maxCount: MAX_MERGE_FILES,
  extensions: PDF_EXTENSIONS,
  context: "merge",
};

export function singlePdfPolicy(context: string): UploadPolicy {
  return { field: "file", maxCount: 1, extensions: PDF_EXTENSIONS, context };
}

// Validation schemas
const splitSchema = Joi.object<{ ranges?: string }>({
  ranges: Joi.string().trim().max(500).allow("").optional(),
});

const rotateSchema = Joi.object<{ angle: RotationAngle; pages: string }>({
  angle: Joi.number().valid(90, 180, 270, -90).default(90),
  pages: Joi.string().trim().max(500).default("all"),
});

const encryptSchema = Joi.object<{ password: string; owner_password?: string }>({
  password: Joi.string().min(1).max(128).required(),
  owner_password: Joi.string().max(128).allow("").optional(),
});

const decryptSchema = Joi.object<{ password: string }>({
  password: Joi.string().min(1).max(128).required(),
});

export async function merge(req: Request, res: Response): Promise<void> {
  try {
    const files = getUploadedFiles(
      req,
      2,
      "Please select at least 2 PDF files to merge.",
    );
    const inputs = await Promise.all(files.map(readUpload));
    const data = await pdfService.merge(inputs);

    await sendResult(req, res, {
      filename: "merged.pdf",
      contentType: CONTENT_TYPES.pdf,
      data,
    });
  } catch (error) {
    await sendError(req, res, error, "merge");
  }
}

export async function split(req: Request, res: Response): Promise<void> {
  try {
    const input = await readUpload(getUploadedFile(req));
    const { ranges } = validateFields(splitSchema, req.body);
    const parts = await pdfService.split(input, ranges || undefined);

    await sendResult(req, res, {
      filename: "split_pages.zip",
      contentType: CONTENT_TYPES.zip,
      data: await createZip(parts),
    });
  } catch (error) {
    await sendError(req, res, error, "split");
  }
}

export async function compress(req: Request, res: Response): Promise<void> {
  try {
    const input = await readUpload(getUploadedFile(req));
    const result = await pdfService.compress(input);

    await sendResult(req, res, {
      filename: "compressed.pdf",
      contentType: CONTENT_TYPES.pdf,
      data: result.data,
      headers: {
        "X-Original-Size": String(result.originalSize),
        "X-Output-Size": String(result.outputSize),
      },
    });
  } catch (error) {
    await sendError(req, res, error, "compress");
  }
}

export async function rotate(req: Request, res: Response): Promise<void> {
  try {
    const input = await readUpload(getUploadedFile(req));
    const { angle, pages } = validateFields(rotateSchema, req.body);
    const data = await pdfService.rotate(input, angle, pages);

    await sendResult(req, res, {
      filename: "rotated.pdf",
      contentType: CONTENT_TYPES.pdf,
      data,
    });
  } catch (error) {
    await sendError(req, res, error, "rotate");
  }
}

export async function encrypt(req: Request, res: Response): Promise<void> {
  try {
    const input = await readUpload(getUploadedFile(req));
    const { password, owner_password } = validateFields(encryptSchema, req.body);
    const data = await pdfService.encrypt(input, password, owner_password || undefined);

    await sendResult(req, res, {
      filename: "protected.pdf",
      contentType: CONTENT_TYPES.pdf,
      data,
    });
  } catch (error) {
    await sendError(req, res, error, "encrypt");
  }
}

export async function decrypt(req: Request, res: Response): Promise<void> {
  try {
    const input = await readUpload(getUploadedFile(req));
    const { password } = validateFields(decryptSchema, req.body);
    const data = await pdfService.decrypt(input, password);

    await sendResult(req, res, {
      filename: "decrypted.pdf",
      contentType: CONTENT_TYPES.pdf,
      data,
    });
  } catch (error) {
    await sendError(req, res, error, "decrypt");
  }
}

export async function info(req: Request, res: Response): Promise<void> {
  try {
    const file = getUploadedFile(req);
    const details = await pdfService.info(await readUpload(file));
    await sendJson(req, res, { filename: file.originalName, ...details });
  } catch (error) {
    await sendError(req, res, error, "info");
  }
}
