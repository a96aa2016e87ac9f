import express from "express";
import type { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import type { AppConfig } from "./config";
import type { ShareService } from "./services/share.service";
import * as pdfController from "./controllers/pdf.controller";
import * as convertController from "./controllers/convert.controller";
import * as systemController from "./controllers/system.controller";
import {
  MAX_TEXT_LENGTH,
  SHARE_POLICY,
  createShareController,
} from "./controllers/share.controller";
import { acceptUploads } from "./middleware/upload.middleware";
import { requireApiKey } from "./middleware/auth.middleware";
import { requestLogger } from "./middleware/request-logger.middleware";
import { errorHandler, notFoundHandler } from "./middleware/error.middleware";

const TEXT_SHARE_BODY_LIMIT = MAX_TEXT_LENGTH * 6 + 64 * 1024;

export interface AppDependencies {
  config: AppConfig;
  /** Required for the share routes to be mounted. */
  shareService?: ShareService;
}

export function createApp({ config, shareService }: AppDependencies): Express {
  const app = express();

  // Basic middleware
  app.disable("x-powered-by");
  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(
    cors({
      origin: config.corsOrigin,
      methods: ["GET", "POST", "DELETE"],
      allowedHeaders: ["Content-Type", "Authorization", "X-Share-Password"],
      exposedHeaders: ["Content-Disposition", "X-Original-Size", "X-Output-Size", "X-Request-Id"],
    }),
  );
  app.use(requestLogger);
  // MAX_TEXT_LENGTH characters at up to six JSON bytes each (\u escapes), plus the other fields
  app.use("/api/share/text", express.json({ limit: TEXT_SHARE_BODY_LIMIT }));
  app.use(express.json({ limit: "200kb" }));
  app.use(express.urlencoded({ extended: false, limit: "200kb" }));

  // Public routes
  app.get("/", systemController.catalogue(config.sharing.enabled && shareService !== undefined));
  app.get("/health", systemController.healthCheck);

  // PDF tools; the short paths are kept for older clients
  app.post(
    ["/api/pdf/merge", "/api/merge"],
    ...acceptUploads(pdfController.MERGE_POLICY, config),
    pdfController.merge,
  );
  app.post(
    ["/api/pdf/split", "/api/split"],
    ...acceptUploads(pdfController.singlePdfPolicy("split"), config),
    pdfController.split,
  );
  app.post(
    ["/api/pdf/compress", "/api/compress"],
    ...acceptUploads(pdfController.singlePdfPolicy("compress"), config),
    pdfController.compress,
  );
  app.post(
    ["/api/pdf/rotate", "/api/rotate"],
    ...acceptUploads(pdfController.singlePdfPolicy("rotate"), config),
    pdfController.rotate,
  );
  app.post(
    ["/api/pdf/encrypt", "/api/secure"],
    ...acceptUploads(pdfController.singlePdfPolicy("encrypt"), config),
    pdfController.encrypt,
  );
  app.post(
    ["/api/pdf/decrypt", "/api/decrypt"],
    ...acceptUploads(pdfController.singlePdfPolicy("decrypt"), config),
    pdfController.decrypt,
  );
  app.post(
    "/api/pdf/info",
    ...acceptUploads(pdfController.singlePdfPolicy("info"), config),
    pdfController.info,
  );
  app.post(
    "/api/convert",
    ...acceptUploads(convertController.CONVERT_POLICY, config),
    convertController.convert,
  );

  if (config.sharing.enabled && shareService) {
    const share = createShareController(shareService, config);
    const shareLimiter = rateLimit({
      windowMs: 60 * 1000,
      limit: config.sharing.rateLimitPerMinute,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: "Too many requests, please try again later." },
    });
    const adminOnly = requireApiKey(config.apiKey);

    app.use(["/api/share", "/shared"], shareLimiter);

    app.post("/api/share/upload", ...acceptUploads(SHARE_POLICY, config), share.uploadFile);
    app.post("/api/share/text", share.shareText);
    app.get("/api/share", adminOnly, share.list);
    app.delete("/api/share/:code", adminOnly, share.remove);

    app.get("/shared/:code", share.inspect);
    app.get("/shared/:code/qr", share.qr);
    app.get("/shared/:code/download", share.download);
    app.post("/shared/:code/download", share.download);
  }

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
