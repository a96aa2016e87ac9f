import logger from "../utils/logger";
import {
  ForbiddenError,
  NotFoundError,
  UnauthorizedError,
  hasErrorCode,
} from "../utils/errors";
import { generateAccessCode, normalizeAccessCode } from "../utils/access-code";
import { hashPassword, verifyPassword } from "../utils/password";
import { getExtension, sanitizeFilename } from "../utils/sanitizer";
import { CONTENT_TYPES } from "../models/processing.model";
import { toShareRecord } from "../models/share.model";
import type {
  ShareDownload,
  ShareFileInput,
  ShareOptions,
  ShareRecord,
  ShareRow,
} from "../models/share.model";
import type { DBService, NewShareRow } from "./db.service";
import type { StorageService } from "./storage.service";

const HOUR_MS = 60 * 60 * 1000;
const NOT_FOUND_MESSAGE = "Share not found or expired";

export interface ShareServiceOptions {
  defaultExpiryHours: number;
  now?: () => Date;
  generateCode?: () => string;
  /** Insert attempts before code allocation gives up. */
  maxCodeAttempts?: number;
}

export class ShareService {
  private readonly now: () => Date;
  private readonly generateCode: () => string;
  private readonly maxCodeAttempts: number;
  private readonly defaultExpiryHours: number;

  constructor(
    private readonly db: DBService,
    private readonly storage: StorageService,
    options: ShareServiceOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateCode = options.generateCode ?? (() => generateAccessCode());
    this.maxCodeAttempts = options.maxCodeAttempts ?? 10;
    this.defaultExpiryHours = options.defaultExpiryHours;
  }

  async createFileShare(
    file: ShareFileInput,
    options: ShareOptions = {},
  ): Promise<ShareRecord> {
    const filename = sanitizeFilename(file.originalName);
    const base = await this.baseRow(options);

    const row = await this.insertWithUniqueCode((code) => ({
      ...base,
      access_code: code,
      storage_key: `${code}/${filename}`,
      original_filename: filename,
      file_type: getExtension(filename) || "bin",
      file_size: file.data.byteLength,
      content_type: file.contentType || "application/octet-stream",
      is_text_content: 0,
      text_content: null,
    }));

    try {
      await this.storage.putObject(`${row.access_code}/${filename}`, file.data, row.content_type);
    } catch (error) {
      await this.db.deleteShare(row.access_code);
      throw error;
    }

    logger.info(`Created file share ${row.access_code}`, {
      file: filename,
      bytes: row.file_size,
      expiresAt: row.expires_at,
    });
    return toShareRecord({ ...row, download_count: 0, last_accessed_at: null });
  }

  async createTextShare(text: string, options: ShareOptions = {}): Promise<ShareRecord> {
    const base = await this.baseRow(options);

    const row = await this.insertWithUniqueCode((code) => ({
      ...base,
      access_code: code,
      storage_key: null,
      original_filename: `${sanitizeFilename(options.title, "shared")}.txt`,
      file_type: "text",
      file_size: Buffer.byteLength(text, "utf-8"),
      content_type: CONTENT_TYPES.txt,
      is_text_content: 1,
      text_content: text,
    }));

    logger.info(`Created text share ${row.access_code}`, {
      chars: text.length,
      expiresAt: row.expires_at,
    });
    return toShareRecord({ ...row, download_count: 0, last_accessed_at: null });
  }

  /** The live record behind a code. Expired records are removed on sight. */
  async inspect(code: string): Promise<ShareRecord> {
    const record = await this.findLive(code);
    if (this.isExhausted(record)) {
      throw new NotFoundError(NOT_FOUND_MESSAGE);
    }
    return record;
  }

  async download(code: string, password?: string): Promise<ShareDownload> {
    const record = await this.inspect(code);

    if (record.passwordHash !== null) {
      if (!password) {
        throw new UnauthorizedError("Password required");
      }
      if (!(await verifyPassword(password, record.passwordHash))) {
        logger.warn(`Incorrect password for share ${record.accessCode}`);
        throw new ForbiddenError("Incorrect password");
      }
    }

    let data: Buffer;
    if (record.isText) {
      data = Buffer.from(record.textContent ?? "", "utf-8");
    } else {
      const stored = record.storageKey ? await this.storage.getObject(record.storageKey) : null;
      if (!stored) {
        logger.error(`Stored bytes missing for share ${record.accessCode}`);
        throw new NotFoundError(NOT_FOUND_MESSAGE);
      }
      data = stored;
    }

    // Counted only once the bytes are in hand
    const counted = await this.db.recordDownload(record.accessCode, this.nowIso());
    if (!counted) {
      throw new NotFoundError(NOT_FOUND_MESSAGE);
    }

    logger.info(`Served share ${record.accessCode}`, {
      downloads: record.downloadCount + 1,
    });
    return {
      filename: record.originalFilename,
      contentType: record.isText ? CONTENT_TYPES.txt : record.contentType,
      data,
    };
  }

  async delete(code: string): Promise<void> {
    const row = await this.db.getShare(normalizeAccessCode(code));
    if (!row) {
      throw new NotFoundError(NOT_FOUND_MESSAGE);
    }
    await this.remove(row);
    logger.info(`Deleted share ${row.access_code}`);
  }

  /** Records that can still be served, newest first. */
  async list(): Promise<ShareRecord[]> {
    const nowIso = this.nowIso();
    return (await this.db.listShares())
      .map(toShareRecord)
      .filter((record) => record.expiresAt >= nowIso && !this.isExhausted(record));
  }

  /** Deletes every expired record and its bytes. Returns how many went. */
  async purgeExpired(): Promise<number> {
    const expired = await this.db.listExpired(this.nowIso());
    for (const row of expired) {
      await this.remove(row);
    }
    if (expired.length > 0) {
      logger.info(`Purged ${expired.length} expired shares`);
    }
    return expired.length;
  }

  private async findLive(code: string): Promise<ShareRecord> {
    const accessCode = normalizeAccessCode(code);
    const row = accessCode ? await this.db.getShare(accessCode) : null;
    if (!row) {
      throw new NotFoundError(NOT_FOUND_MESSAGE);
    }

    if (row.expires_at < this.nowIso()) {
      logger.info(`Share ${row.access_code} expired, removing`);
      await this.remove(row);
      throw new NotFoundError(NOT_FOUND_MESSAGE);
    }
    return toShareRecord(row);
  }

  private isExhausted(record: ShareRecord): boolean {
    return record.maxDownloads !== null && record.downloadCount >= record.maxDownloads;
  }

  private async remove(row: ShareRow): Promise<void> {
    if (row.storage_key) {
      try {
        await this.storage.removeObject(row.storage_key);
      } catch (error) {
        logger.warn(`Could not remove stored bytes for ${row.access_code}:`, error);
      }
    }
    await this.db.deleteShare(row.access_code);
  }

  private async baseRow(
    options: ShareOptions,
  ): Promise<Pick<NewShareRow, "title" | "description" | "password_hash" | "max_downloads" | "created_at" | "expires_at">> {
    const created = this.now();
    const hours = options.expiresHours ?? this.defaultExpiryHours;
    return {
      title: options.title?.trim() || null,
      description: options.description?.trim() || null,
      password_hash: options.password ? await hashPassword(options.password) : null,
      max_downloads: options.maxDownloads ?? null,
      created_at: created.toISOString(),
      expires_at: new Date(created.getTime() + hours * HOUR_MS).toISOString(),
    };
  }

  /**
   * Inserts the row built for a fresh code, drawing again when the code is
   * taken. The UNIQUE constraint settles races between the check and the
   * insert.
   */
  private async insertWithUniqueCode(
    build: (code: string) => NewShareRow,
  ): Promise<NewShareRow> {
    for (let attempt = 1; attempt <= this.maxCodeAttempts; attempt++) {
      const code = this.generateCode();
      if (await this.db.accessCodeExists(code)) {
        continue;
      }

      const row = build(code);
      try {
        await this.db.createShare(row);
        return row;
      } catch (error) {
        if (!hasErrorCode(error, "SQLITE_CONSTRAINT")) {
          throw error;
        }
        logger.debug(`Access code collision on insert (attempt ${attempt})`);
      }
    }
    throw new Error("Could not allocate a unique access code");
  }

  private nowIso(): string {
    return this.now().toISOString();
  }
}
