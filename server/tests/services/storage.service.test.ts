/**
 * Unit tests for the local storage driver
 */

import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { LocalStorageService, MinioStorageService, createStorage } from "../../src/services/storage.service";
import { loadConfig } from "../../src/config";

describe("LocalStorageService", () => {
  let root: string;
  let storage: LocalStorageService;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "storage-test-"));
    storage = new LocalStorageService(path.join(root, "shares"));
    await storage.ensureReady();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("stores and reads objects by key", async () => {
    await storage.putObject("ABCD1234/report.pdf", Buffer.from("bytes"));

    const data = await storage.getObject("ABCD1234/report.pdf");
    expect(data?.toString("utf-8")).toBe("bytes");
  });

  it("returns null for a missing object", async () => {
    expect(await storage.getObject("NOPE0000/missing.pdf")).toBeNull();
  });

  it("removes the object and its empty directory", async () => {
    await storage.putObject("ABCD1234/report.pdf", Buffer.from("bytes"));

    await storage.removeObject("ABCD1234/report.pdf");

    expect(await fs.readdir(path.join(root, "shares"))).toEqual([]);
  });

  it("refuses keys that leave the storage root", async () => {
    await expect(storage.putObject("../escape.txt", Buffer.from("x"))).rejects.toThrow(
      "Storage key escapes the storage root: ../escape.txt",
    );
  });
});

describe("createStorage", () => {
  it("picks the driver from configuration", () => {
    expect(createStorage(loadConfig({}))).toBeInstanceOf(LocalStorageService);
    expect(createStorage(loadConfig({ STORAGE_DRIVER: "minio" }))).toBeInstanceOf(MinioStorageService);
  });
});
