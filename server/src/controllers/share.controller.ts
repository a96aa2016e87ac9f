import type { Request, Response } from "express";
import Joi from "joi";
import type { AppConfig } from "../config";
import type { ShareService } from "../services/share.service";
import { renderQrPng } from "../services/qr.service";
import { getUploadedFile, readUpload } from "../middleware/upload.middleware";
import type { UploadPolicy } from "../middleware/upload.middleware";
import logger from "../utils/logger";
import { sendError, sendJson, sendResult } from "../utils/response";
import { validateFields } from "../utils/validation";
import { SHARE_EXTENSIONS, contentTypeFor } from "../models/processing.model";
import { toPublicShare } from "../models/share.model";
import type { ShareOptions, ShareRecord } from "../models/share.model";

export const SHARE_POLICY: UploadPolicy = {
  field: "file",
  maxCount: 1,
  extensions: SHARE_EXTENSIONS,
  context: "share upload",
};

export const MAX_TEXT_LENGTH = 100000;

interface ShareFields {
  password?: string;
  expires_hours?: number;
  max_downloads?: number;
  title?: string;
  description?: string;
}

function shareFieldRules(maxExpiryHours: number) {
  return {
    password: Joi.string().max(128).allow("").optional(),
    expires_hours: Joi.number().integer().min(1).max(maxExpiryHours).optional(),
    max_downloads: Joi.number().integer().min(1).optional(),
    title: Joi.string().trim().max(200).allow("").optional(),
    description: Joi.string().trim().max(2000).allow("").optional(),
  };
}

const downloadSchema = Joi.object<{ password?: string }>({
  password: Joi.string().max(128).allow("").optional(),
});

function toShareOptions(fields: ShareFields): ShareOptions {
  return {
    password: fields.password || undefined,
    expiresHours: fields.expires_hours,
    maxDownloads: fields.max_downloads,
    title: fields.title || undefined,
    description: fields.description || undefined,
  };
}

/**
 * Handlers for the sharing routes, bound to one ShareService. Public URLs
 * use PUBLIC_BASE_URL when set, the request's own origin otherwise.
 */
export function createShareController(shareService: ShareService, config: AppConfig) {
  const fileSchema = Joi.object<ShareFields>(shareFieldRules(config.sharing.maxExpiryHours));
  const textSchema = Joi.object<ShareFields & { text: string }>({
    ...shareFieldRules(config.sharing.maxExpiryHours),
    text: Joi.string().min(1).max(MAX_TEXT_LENGTH).required(),
  });

  const baseUrl = (req: Request): string =>
    config.sharing.publicBaseUrl ?? `${req.protocol}://${req.get("host") ?? "localhost"}`;

  const shareUrl = (req: Request, code: string): string => `${baseUrl(req)}/shared/${code}`;

  const created = (req: Request, record: ShareRecord) => ({
    success: true,
    access_code: record.accessCode,
    share_url: shareUrl(req, record.accessCode),
    qr_code_url: `${shareUrl(req, record.accessCode)}/qr`,
    expires_at: record.expiresAt,
    password_protected: record.passwordHash !== null,
    max_downloads: record.maxDownloads,
  });

  async function uploadFile(req: Request, res: Response): Promise<void> {
    try {
      const file = getUploadedFile(req);
      const fields = validateFields(fileSchema, req.body);
      const input = await readUpload(file);

      const record = await shareService.createFileShare(
        {
          originalName: file.originalName,
          contentType: contentTypeFor(file.extension),
          data: Buffer.from(input.data),
        },
        toShareOptions(fields),
      );
      await sendJson(req, res, created(req, record), 201);
    } catch (error) {
      await sendError(req, res, error, "share upload");
    }
  }

  async function shareText(req: Request, res: Response): Promise<void> {
    try {
      const fields = validateFields(textSchema, req.body);
      const record = await shareService.createTextShare(fields.text, toShareOptions(fields));
      await sendJson(req, res, created(req, record), 201);
    } catch (error) {
      await sendError(req, res, error, "text share");
    }
  }

  async function inspect(req: Request, res: Response): Promise<void> {
    try {
      const record = await shareService.inspect(req.params.code);
      await sendJson(req, res, toPublicShare(record));
    } catch (error) {
      await sendError(req, res, error, "share lookup");
    }
  }

  async function download(req: Request, res: Response): Promise<void> {
    try {
      const { password } = validateFields(downloadSchema, req.body);
      const header = req.get("x-share-password");
      const file = await shareService.download(req.params.code, password || header || undefined);

      await sendResult(req, res, {
        filename: file.filename,
        contentType: file.contentType,
        data: file.data,
      });
    } catch (error) {
      await sendError(req, res, error, "share download");
    }
  }

  async function qr(req: Request, res: Response): Promise<void> {
    try {
      const record = await shareService.inspect(req.params.code);
      const png = await renderQrPng(shareUrl(req, record.accessCode));

      res.status(200);
      res.type("png");
      res.setHeader("Cache-Control", "no-store");
      res.send(png);
    } catch (error) {
      await sendError(req, res, error, "share qr");
    }
  }

  async function remove(req: Request, res: Response): Promise<void> {
    try {
      await shareService.delete(req.params.code);
      await sendJson(req, res, { success: true });
    } catch (error) {
      await sendError(req, res, error, "share delete");
    }
  }

  async function list(req: Request, res: Response): Promise<void> {
    try {
      const records = await shareService.list();
      logger.debug(`Listing ${records.length} live shares`);
      await sendJson(req, res, { shares: records.map(toPublicShare) });
    } catch (error) {
      await sendError(req, res, error, "share list");
    }
  }

  return { uploadFile, shareText, inspect, download, qr, remove, list };
}
