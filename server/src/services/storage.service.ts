import fs from "fs/promises";
import path from "path";
import { Client } from "minio";
import type { Readable } from "stream";
import type { AppConfig, MinioConfig } from "../config";
import logger from "../utils/logger";
import { hasErrorCode } from "../utils/errors";

/** Where shared file bytes live. Keys look like `<code>/<name>`. */
export interface StorageService {
  ensureReady(): Promise<void>;
  putObject(key: string, data: Buffer, contentType: string): Promise<void>;
  /** Null when the object is gone. */
  getObject(key: string): Promise<Buffer | null>;
  removeObject(key: string): Promise<void>;
}

export class LocalStorageService implements StorageService {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async ensureReady(): Promise<void> {
    await fs.mkdir(this.root, { recursive: true });
    logger.info(`Local share storage at ${this.root}`);
  }

  async putObject(key: string, data: Buffer): Promise<void> {
    const target = this.resolveKey(key);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, data);
  }

  async getObject(key: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.resolveKey(key));
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return null;
      }
      throw error;
    }
  }

  async removeObject(key: string): Promise<void> {
    const target = this.resolveKey(key);
    await fs.rm(target, { force: true });

    // drop the per-share directory once it is empty
    const dir = path.dirname(target);
    if (dir !== this.root) {
      const rest = await fs.readdir(dir).catch((): string[] => []);
      if (rest.length === 0) {
        await fs.rm(dir, { recursive: true, force: true });
      }
    }
  }

  private resolveKey(key: string): string {
    const target = path.resolve(this.root, key);
    if (!target.startsWith(this.root + path.sep)) {
      throw new Error(`Storage key escapes the storage root: ${key}`);
    }
    return target;
  }
}

export class MinioStorageService implements StorageService {
  private client: Client;
  private bucket: string;

  constructor(config: MinioConfig) {
    this.client = new Client({
      endPoint: config.endPoint,
      port: config.port,
      useSSL: config.useSSL,
      accessKey: config.accessKey,
      secretKey: config.secretKey,
    });
    this.bucket = config.bucket;
    logger.info(
      `StorageService initialized with endpoint: ${config.endPoint}:${config.port}, bucket: ${this.bucket}`,
    );
  }

  async ensureReady(): Promise<void> {
    try {
      const exists = await this.client.bucketExists(this.bucket);
      if (!exists) {
        await this.client.makeBucket(this.bucket, "us-east-1");
        logger.info(`Bucket created: ${this.bucket}`);
      } else {
        logger.info(`Bucket already exists: ${this.bucket}`);
      }
    } catch (error) {
      logger.error(`Error ensuring bucket ${this.bucket}:`, error);
      throw error;
    }
  }

  async putObject(key: string, data: Buffer, contentType: string): Promise<void> {
    await this.client.putObject(this.bucket, key, data, data.byteLength, {
      "Content-Type": contentType,
    });
    logger.debug(`Stored object ${key}`, { bytes: data.byteLength });
  }

  async getObject(key: string): Promise<Buffer | null> {
    let stream: Readable;
    try {
      stream = await this.client.getObject(this.bucket, key);
    } catch (error) {
      if (hasErrorCode(error, "NoSuchKey") || hasErrorCode(error, "NotFound")) {
        return null;
      }
      logger.error(`Error reading object ${key}:`, error);
      throw error;
    }

    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks);
  }

  async removeObject(key: string): Promise<void> {
    try {
      await this.client.removeObject(this.bucket, key);
    } catch (error) {
      logger.error(`Error removing object ${key}:`, error);
      throw error;
    }
  }
}

export function createStorage(config: AppConfig): StorageService {
  return config.storageDriver === "minio"
    ? new MinioStorageService(config.minio)
    : new LocalStorageService(config.uploadFolder);
}
