import dotenv from "dotenv";
import { loadConfig } from "./config";
import { createApp } from "./app";
import DBService from "./services/db.service";
import StorageService from "./services/storage.service";
import CatalogService from "./services/catalog.service";
import ParallelDownloader from "./services/parallel-downloader.service";
import FastPathDownloader from "./services/fast-path-downloader.service";
import TieredTransfer from "./services/tiered-transfer.service";
import OrderLifecycleService from "./services/order-lifecycle.service";
import AcquisitionService from "./services/acquisition.service";
import { createRetryPolicy } from "./utils/retry";
import logger, { setLogLevel } from "./utils/logger";

// Load environment variables
dotenv.config();

async function startServer() {
  let db: DBService | null = null;

  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    logger.info("Initializing services...");

    db = await DBService.open(config.database.path);

    const storage = new StorageService({
      ...config.storage,
      partSize: config.downloads.chunkSize,
    });
    await storage.ensureBucket();

    const retryPolicy = createRetryPolicy({
      maxAttempts: config.retry.attempts,
      initialDelayMs: config.retry.minDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
    });

    const catalog = new CatalogService({ ...config.catalog, retryPolicy });

    const transfer = new TieredTransfer([
      new FastPathDownloader({ store: storage, ...config.bulkTransfer }),
      new ParallelDownloader({
        store: storage,
        concurrency: config.downloads.maxConcurrent,
        timeoutMs: config.downloads.timeoutMs,
        retryPolicy,
      }),
    ]);

    const lifecycle = new OrderLifecycleService({ catalog, store: db, transfer });
    const acquisition = new AcquisitionService({
      catalog,
      store: db,
      lifecycle,
      minCoveragePct: config.catalog.minCoveragePct,
      defaultMaxMonths: config.catalog.defaultMaxMonths,
    });

    const app = createApp({ acquisition, apiKey: config.server.apiKey });
    const server = app.listen(config.server.port, "0.0.0.0", () => {
      logger.info(`Server listening on port ${config.server.port}`);
      logger.info("Server ready to accept requests");
    });

    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully...`);
      server.close(() => {
        const closing = db ? db.close() : Promise.resolve();
        closing
          .then(() => process.exit(0))
          .catch((error) => {
            logger.error("Error closing order store:", error);
            process.exit(1);
          });
      });
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
  } catch (error) {
    logger.error("Failed to start server:", error);
    if (db) {
      await db.close().catch((closeError) => logger.error("Error closing order store:", closeError));
    }
    process.exit(1);
  }
}

void startServer();
