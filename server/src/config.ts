import os from "os";
import path from "path";
import Joi from "joi";

export type StorageDriver = "local" | "minio";

export interface MinioConfig {
  endPoint: string;
  port: number;
  useSSL: boolean;
  accessKey: string;
  secretKey: string;
  bucket: string;
}

export interface SharingConfig {
  enabled: boolean;
  publicBaseUrl?: string;
  defaultExpiryHours: number;
  maxExpiryHours: number;
  rateLimitPerMinute: number;
}

export interface AppConfig {
  port: number;
  host: string;
  corsOrigin: string;
  maxFileSizeBytes: number;
  maxContentLengthBytes: number;
  tempDir: string;
  uploadFolder: string;
  databasePath: string;
  storageDriver: StorageDriver;
  minio: MinioConfig;
  sharing: SharingConfig;
  apiKey?: string;
}

interface RawEnv {
  PORT: number;
  HOST: string;
  CORS_ORIGIN: string;
  MAX_FILE_SIZE_MB: number;
  MAX_CONTENT_LENGTH_MB: number;
  TEMP_DIR: string;
  UPLOAD_FOLDER: string;
  DATABASE_URL: string;
  SHARING_ENABLED: boolean;
  PUBLIC_BASE_URL: string;
  SHARE_DEFAULT_EXPIRY_HOURS: number;
  SHARE_MAX_EXPIRY_HOURS: number;
  SHARE_RATE_LIMIT_PER_MINUTE: number;
  STORAGE_DRIVER: StorageDriver;
  MINIO_ENDPOINT: string;
  MINIO_USE_SSL: boolean;
  MINIO_ACCESS_KEY: string;
  MINIO_SECRET_KEY: string;
  MINIO_BUCKET: string;
  SERVER_API_KEY: string;
}

const envSchema = Joi.object<RawEnv>({
  PORT: Joi.number().port().default(5000),
  HOST: Joi.string().default("0.0.0.0"),
  CORS_ORIGIN: Joi.string().default("*"),
  MAX_FILE_SIZE_MB: Joi.number().positive().default(50),
  MAX_CONTENT_LENGTH_MB: Joi.number().positive().default(100),
  TEMP_DIR: Joi.string().allow("").default(""),
  UPLOAD_FOLDER: Joi.string().default("uploads"),
  DATABASE_URL: Joi.string().default("shares.db"),
  SHARING_ENABLED: Joi.boolean().default(true),
  PUBLIC_BASE_URL: Joi.string()
    .uri({ scheme: ["http", "https"] })
    .allow("")
    .default(""),
  SHARE_DEFAULT_EXPIRY_HOURS: Joi.number().integer().min(1).default(24),
  SHARE_MAX_EXPIRY_HOURS: Joi.number().integer().min(1).default(720),
  SHARE_RATE_LIMIT_PER_MINUTE: Joi.number().integer().min(1).default(30),
  STORAGE_DRIVER: Joi.string().valid("local", "minio").default("local"),
  MINIO_ENDPOINT: Joi.string().default("localhost:9000"),
  MINIO_USE_SSL: Joi.boolean().default(false),
  MINIO_ACCESS_KEY: Joi.string().default("minioadmin"),
  MINIO_SECRET_KEY: Joi.string().default("minioadmin"),
  MINIO_BUCKET: Joi.string().default("pdf-toolkit-shares"),
  SERVER_API_KEY: Joi.string().allow("").default(""),
}).unknown(true);

const MB = 1024 * 1024;

/** Accepts a bare path, `sqlite:path`, `sqlite://path` or `:memory:`. */
export function resolveDatabasePath(url: string): string {
  const stripped = url.replace(/^sqlite:(\/\/)?/, "");
  if (stripped === ":memory:") return stripped;
  return path.resolve(stripped);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { error, value } = envSchema.validate(env, { abortEarly: false });
  if (error) {
    throw new Error(`Invalid configuration: ${error.message}`);
  }

  if (value.SHARE_DEFAULT_EXPIRY_HOURS > value.SHARE_MAX_EXPIRY_HOURS) {
    throw new Error(
      "Invalid configuration: SHARE_DEFAULT_EXPIRY_HOURS exceeds SHARE_MAX_EXPIRY_HOURS",
    );
  }

  const [host, portStr] = value.MINIO_ENDPOINT.split(":");

  return {
    port: value.PORT,
    host: value.HOST,
    corsOrigin: value.CORS_ORIGIN,
    maxFileSizeBytes: Math.floor(value.MAX_FILE_SIZE_MB * MB),
    maxContentLengthBytes: Math.floor(value.MAX_CONTENT_LENGTH_MB * MB),
    tempDir: value.TEMP_DIR || os.tmpdir(),
    uploadFolder: path.resolve(value.UPLOAD_FOLDER),
    databasePath: resolveDatabasePath(value.DATABASE_URL),
    storageDriver: value.STORAGE_DRIVER,
    minio: {
      endPoint: host,
      port: parseInt(portStr || "9000", 10),
      useSSL: value.MINIO_USE_SSL,
      accessKey: value.MINIO_ACCESS_KEY,
      secretKey: value.MINIO_SECRET_KEY,
      bucket: value.MINIO_BUCKET,
    },
    sharing: {
      enabled: value.SHARING_ENABLED,
      publicBaseUrl: value.PUBLIC_BASE_URL
        ? value.PUBLIC_BASE_URL.replace(/\/+$/, "")
        : undefined,
      defaultExpiryHours: value.SHARE_DEFAULT_EXPIRY_HOURS,
      maxExpiryHours: value.SHARE_MAX_EXPIRY_HOURS,
      rateLimitPerMinute: value.SHARE_RATE_LIMIT_PER_MINUTE,
    },
    apiKey: value.SERVER_API_KEY || undefined,
  };
}
