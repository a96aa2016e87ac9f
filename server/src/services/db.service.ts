import sqlite3 from "sqlite3";
import logger from "../utils/logger";
import type { ShareRow } from "../models/share.model";

export type NewShareRow = Omit<ShareRow, "download_count" | "last_accessed_at">;

type Param = string | number | null;

export class DBService {
  private db: sqlite3.Database | null = null;

  async connect(dbPath: string): Promise<void> {
    if (this.db) return;

    this.db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const db = new (sqlite3.verbose().Database)(dbPath, (err) => {
        if (err) {
          logger.error("Could not connect to database", err);
          reject(err);
        } else {
          logger.info(`Connected to database at ${dbPath}`);
          resolve(db);
        }
      });
    });
    await this.init();
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) return;
    this.db = null;

    await new Promise<void>((resolve, reject) => {
      db.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
    logger.info("Database connection closed");
  }

  private async init(): Promise<void> {
    await this.run(`
      CREATE TABLE IF NOT EXISTS shared_files (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        access_code TEXT NOT NULL UNIQUE,
        storage_key TEXT,
        original_filename TEXT NOT NULL,
        file_type TEXT NOT NULL,
        file_size INTEGER NOT NULL,
        content_type TEXT NOT NULL,
        title TEXT,
        description TEXT,
        is_text_content INTEGER NOT NULL DEFAULT 0,
        text_content TEXT,
        password_hash TEXT,
        download_count INTEGER NOT NULL DEFAULT 0,
        max_downloads INTEGER,
        created_at TEXT NOT NULL,
        expires_at TEXT NOT NULL,
        last_accessed_at TEXT
      )
    `);
    await this.run(
      "CREATE INDEX IF NOT EXISTS idx_shared_files_expires ON shared_files(expires_at)",
    );
  }

  async createShare(share: NewShareRow): Promise<void> {
    const sql = `
      INSERT INTO shared_files (
        access_code, storage_key, original_filename, file_type, file_size,
        content_type, title, description, is_text_content, text_content,
        password_hash, max_downloads, created_at, expires_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `;
    await this.run(sql, [
      share.access_code,
      share.storage_key,
      share.original_filename,
      share.file_type,
      share.file_size,
      share.content_type,
      share.title,
      share.description,
      share.is_text_content,
      share.text_content,
      share.password_hash,
      share.max_downloads,
      share.created_at,
      share.expires_at,
    ]);
  }

  async getShare(accessCode: string): Promise<ShareRow | null> {
    return new Promise((resolve, reject) => {
      this.connection.get<ShareRow | undefined>(
        "SELECT * FROM shared_files WHERE access_code = ?",
        [accessCode],
        (err, row) => {
          if (err) reject(err);
          else resolve(row ?? null);
        },
      );
    });
  }

  async accessCodeExists(accessCode: string): Promise<boolean> {
    return (await this.getShare(accessCode)) !== null;
  }

  async listShares(): Promise<ShareRow[]> {
    return this.all("SELECT * FROM shared_files ORDER BY created_at DESC, id DESC");
  }

  async listExpired(nowIso: string): Promise<ShareRow[]> {
    return this.all("SELECT * FROM shared_files WHERE expires_at < ?", [nowIso]);
  }

  /**
   * Counts one download when the share is still live. The check and the
   * increment are one statement, so concurrent downloads cannot exceed the
   * limit. Returns false when nothing was updated.
   */
  async recordDownload(accessCode: string, nowIso: string): Promise<boolean> {
    const changes = await this.run(
      `UPDATE shared_files
         SET download_count = download_count + 1, last_accessed_at = ?
       WHERE access_code = ?
         AND expires_at >= ?
         AND (max_downloads IS NULL OR download_count < max_downloads)`,
      [nowIso, accessCode, nowIso],
    );
    return changes === 1;
  }

  async deleteShare(accessCode: string): Promise<boolean> {
    const changes = await this.run(
      "DELETE FROM shared_files WHERE access_code = ?",
      [accessCode],
    );
    return changes > 0;
  }

  private get connection(): sqlite3.Database {
    if (!this.db) {
      throw new Error("Database not connected");
    }
    return this.db;
  }

  private run(sql: string, params: Param[] = []): Promise<number> {
    return new Promise((resolve, reject) => {
      this.connection.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
        if (err) reject(err);
        else resolve(this.changes);
      });
    });
  }

  private all(sql: string, params: Param[] = []): Promise<ShareRow[]> {
    return new Promise((resolve, reject) => {
      this.connection.all<ShareRow>(sql, params, (err, rows) => {
        if (err) reject(err);
        else resolve(rows);
      });
    });
  }
}

export default new DBService();
