/**
 * HTTP tests for sharing: upload, lookup, download, QR and admin routes
 */

import { afterAll, beforeAll, describe, it, expect } from "vitest";
import {
  TEST_API_KEY,
  bodyBuffer,
  bodyText,
  json,
  startTestServer,
  uploadForm,
} from "../helpers/test-server";
import type { TestServer } from "../helpers/test-server";

const HOUR = 60 * 60 * 1000;

function accessCodeOf(body: unknown): string {
  if (typeof body === "object" && body !== null && "access_code" in body && typeof body.access_code === "string") {
    return body.access_code;
  }
  throw new Error("Response carries no access code");
}

describe("share routes", () => {
  let server: TestServer;
  const started = new Date("2026-01-15T12:00:00.000Z");

  beforeAll(async () => {
    server = await startTestServer();
  });

  afterAll(async () => {
    await server.close();
  });

  async function shareFile(fields: Record<string, string> = {}) {
    return server.http.post(
      "/api/share/upload",
      uploadForm("file", [{ name: "report.pdf", data: Buffer.from("%PDF-shared") }], fields),
    );
  }

  it("creates a file share and describes it", async () => {
    server.clock.now = started;
    const res = await shareFile({ title: "Q3", max_downloads: "1", password: "test-secret" });
    const body = json(res.data);
    const code = accessCodeOf(body);

    expect(res.status).toBe(201);
    expect(code).toMatch(/^[A-Z0-9]{8}$/);
    expect(body).toEqual({
      success: true,
      access_code: code,
      share_url: `${server.baseUrl}/shared/${code}`,
      qr_code_url: `${server.baseUrl}/shared/${code}/qr`,
      expires_at: "2026-01-16T12:00:00.000Z",
      password_protected: true,
      max_downloads: 1,
    });

    const meta = await server.http.get(`/shared/${code.toLowerCase()}`);
    expect(meta.status).toBe(200);
    expect(json(meta.data)).toEqual({
      access_code: code,
      title: "Q3",
      description: null,
      filename: "report.pdf",
      file_type: "pdf",
      file_size: 11,
      is_text: false,
      password_protected: true,
      created_at: "2026-01-15T12:00:00.000Z",
      expires_at: "2026-01-16T12:00:00.000Z",
      download_count: 0,
      downloads_remaining: 1,
    });
  });

  it("checks the password, serves once and then stops", async () => {
    server.clock.now = started;
    const code = accessCodeOf(json((await shareFile({ max_downloads: "1", password: "test-secret" })).data));

    const missing = await server.http.get(`/shared/${code}/download`);
    expect(missing.status).toBe(401);
    expect(json(missing.data)).toEqual({ error: "Password required" });

    const wrong = await server.http.get(`/shared/${code}/download`, {
      headers: { "X-Share-Password": "wrong" },
    });
    expect(wrong.status).toBe(403);
    expect(json(wrong.data)).toEqual({ error: "Incorrect password" });

    const ok = await server.http.post(`/shared/${code}/download`, { password: "test-secret" });
    expect(ok.status).toBe(200);
    expect(ok.headers["content-disposition"]).toBe('attachment; filename="report.pdf"');
    expect(ok.headers["content-type"]).toBe("application/pdf");
    expect(bodyText(ok.data)).toBe("%PDF-shared");

    const again = await server.http.post(`/shared/${code}/download`, { password: "test-secret" });
    expect(again.status).toBe(404);
    expect(json(again.data)).toEqual({ error: "Share not found or expired" });
  });

  it("shares text and serves it as a named .txt", async () => {
    server.clock.now = started;
    const created = await server.http.post("/api/share/text", {
      text: "meeting at noon",
      title: "Standup notes",
    });
    expect(created.status).toBe(201);

    const res = await server.http.get(`/shared/${accessCodeOf(json(created.data))}/download`);

    expect(res.status).toBe(200);
    expect(res.headers["content-disposition"]).toBe('attachment; filename="Standup_notes.txt"');
    expect(bodyText(res.data)).toBe("meeting at noon");
  });

  it("accepts multi-byte text up to the character limit", async () => {
    server.clock.now = started;
    const text = "\u20AC".repeat(100000);

    const created = await server.http.post("/api/share/text", { text });
    expect(created.status).toBe(201);

    const res = await server.http.get(`/shared/${accessCodeOf(json(created.data))}/download`);
    expect(bodyText(res.data)).toBe(text);

    const tooLong = await server.http.post("/api/share/text", { text: `${text}x` });
    expect(tooLong.status).toBe(400);
    expect(json(tooLong.data)).toEqual({
      error: "Invalid request fields",
      details: '"text" length must be less than or equal to 100000 characters long',
    });
  });

  it("renders a QR code for the share URL", async () => {
    server.clock.now = started;
    const code = accessCodeOf(json((await shareFile()).data));

    const res = await server.http.get(`/shared/${code}/qr`);

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe("image/png");
    expect([...bodyBuffer(res.data).subarray(0, 4)]).toEqual([0x89, 0x50, 0x4e, 0x47]);
  });

  it("stops serving after the expiry time", async () => {
    server.clock.now = started;
    const code = accessCodeOf(json((await shareFile({ expires_hours: "2" })).data));

    server.clock.now = new Date(started.getTime() + 2 * HOUR);
    expect((await server.http.get(`/shared/${code}`)).status).toBe(200);

    server.clock.now = new Date(started.getTime() + 3 * HOUR);
    const res = await server.http.get(`/shared/${code}`);
    expect(res.status).toBe(404);
    expect(json(res.data)).toEqual({ error: "Share not found or expired" });
  });

  it("validates share options", async () => {
    const res = await shareFile({ expires_hours: "1000" });

    expect(res.status).toBe(400);
    expect(json(res.data)).toEqual({
      error: "Invalid request fields",
      details: '"expires_hours" must be less than or equal to 720',
    });
  });

  it("rejects file types that cannot be shared", async () => {
    const res = await server.http.post(
      "/api/share/upload",
      uploadForm("file", [{ name: "tool.exe", data: Buffer.from("MZ") }]),
    );

    expect(res.status).toBe(400);
    expect(json(res.data)).toEqual({
      error: "Invalid file type: tool.exe. Allowed: pdf, doc, docx, ppt, pptx, txt, csv, png, jpg, jpeg",
    });
  });

  it("protects the admin routes with the API key", async () => {
    server.clock.now = started;
    const code = accessCodeOf(json((await shareFile()).data));

    const anonymous = await server.http.get("/api/share");
    expect(anonymous.status).toBe(401);
    expect(json(anonymous.data)).toEqual({ error: "Unauthorized: missing or invalid authorization header" });

    const badKey = await server.http.get("/api/share", { headers: { Authorization: "Bearer nope" } });
    expect(badKey.status).toBe(401);
    expect(json(badKey.data)).toEqual({ error: "Unauthorized: invalid API key" });

    const auth = { headers: { Authorization: `Bearer ${TEST_API_KEY}` } };
    const listed = await server.http.get("/api/share", auth);
    expect(listed.status).toBe(200);
    expect(json(listed.data)).toHaveProperty("shares");

    const removed = await server.http.delete(`/api/share/${code}`, auth);
    expect(removed.status).toBe(200);
    expect(json(removed.data)).toEqual({ success: true });
    expect((await server.http.get(`/shared/${code}`)).status).toBe(404);
  });
});

describe("sharing disabled", () => {
  it("does not mount the share routes", async () => {
    const server = await startTestServer({ SHARING_ENABLED: "false" });
    try {
      const res = await server.http.get("/shared/ABCD1234");

      expect(res.status).toBe(404);
      expect(json(res.data)).toEqual({ error: "Not found" });
    } finally {
      await server.close();
    }
  });
});
