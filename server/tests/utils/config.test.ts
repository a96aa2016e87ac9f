/**
 * Unit tests for environment configuration loading
 */

import os from "os";
import path from "path";
import { describe, it, expect } from "vitest";
import { loadConfig, resolveDatabasePath } from "../../src/config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.port).toBe(5000);
    expect(config.host).toBe("0.0.0.0");
    expect(config.maxFileSizeBytes).toBe(50 * 1024 * 1024);
    expect(config.maxContentLengthBytes).toBe(100 * 1024 * 1024);
    expect(config.tempDir).toBe(os.tmpdir());
    expect(config.databasePath).toBe(path.resolve("shares.db"));
    expect(config.storageDriver).toBe("local");
    expect(config.apiKey).toBeUndefined();
    expect(config.sharing).toEqual({
      enabled: true,
      publicBaseUrl: undefined,
      defaultExpiryHours: 24,
      maxExpiryHours: 720,
      rateLimitPerMinute: 30,
    });
  });

  it("converts fractional megabyte ceilings to bytes", () => {
    const config = loadConfig({ MAX_FILE_SIZE_MB: "0.0625" });
    expect(config.maxFileSizeBytes).toBe(65536);
  });

  it("parses flags, URLs and the MinIO endpoint", () => {
    const config = loadConfig({
      SHARING_ENABLED: "false",
      PUBLIC_BASE_URL: "https://files.example.com/",
      MINIO_ENDPOINT: "minio:9100",
      STORAGE_DRIVER: "minio",
      SERVER_API_KEY: "test-secret",
    });

    expect(config.sharing.enabled).toBe(false);
    expect(config.sharing.publicBaseUrl).toBe("https://files.example.com");
    expect(config.minio.endPoint).toBe("minio");
    expect(config.minio.port).toBe(9100);
    expect(config.storageDriver).toBe("minio");
    expect(config.apiKey).toBe("test-secret");
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(/^Invalid configuration/);
    expect(() => loadConfig({ STORAGE_DRIVER: "ftp" })).toThrow(/^Invalid configuration/);
  });

  it("rejects a default expiry above the maximum", () => {
    expect(() =>
      loadConfig({ SHARE_DEFAULT_EXPIRY_HOURS: "48", SHARE_MAX_EXPIRY_HOURS: "24" }),
    ).toThrow("Invalid configuration: SHARE_DEFAULT_EXPIRY_HOURS exceeds SHARE_MAX_EXPIRY_HOURS");
  });
});

describe("resolveDatabasePath", () => {
  it("accepts sqlite URLs and in-memory databases", () => {
    expect(resolveDatabasePath("sqlite:///tmp/shares.db")).toBe("/tmp/shares.db");
    expect(resolveDatabasePath("sqlite::memory:")).toBe(":memory:");
    expect(resolveDatabasePath(":memory:")).toBe(":memory:");
  });
});
