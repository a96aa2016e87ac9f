import dotenv from "dotenv";
import type { Server } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import dbService from "./services/db.service";
import { createStorage } from "./services/storage.service";
import { ShareService } from "./services/share.service";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

let server: Server | undefined;

async function startServer(): Promise<void> {
  try {
    const config = loadConfig();

    // Initialize services
    logger.info("Initializing services...");

    let shareService: ShareService | undefined;
    if (config.sharing.enabled) {
      const storage = createStorage(config);
      await storage.ensureReady();
      await dbService.connect(config.databasePath);

      shareService = new ShareService(dbService, storage, {
        defaultExpiryHours: config.sharing.defaultExpiryHours,
      });
      await shareService.purgeExpired();
    } else {
      logger.info("Sharing disabled");
    }

    const app = createApp({ config, shareService });

    // Start HTTP server
    server = app.listen(config.port, config.host, () => {
      logger.info(`Server listening on ${config.host}:${config.port}`);
      logger.info("Server ready to accept requests");
    });
  } catch (error) {
    logger.error("Failed to start server:", error);
    process.exit(1);
  }
}

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down gracefully...`);
  try {
    if (server) {
      const closing = server;
      await new Promise<void>((resolve, reject) => {
        closing.close((err) => (err ? reject(err) : resolve()));
      });
    }
    await dbService.close();
    process.exit(0);
  } catch (error) {
    logger.error("Error during shutdown:", error);
    process.exit(1);
  }
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

void startServer();
