import express, { Express } from "express";
import cors from "cors";
import type AcquisitionService from "./services/acquisition.service";
import { createAuthMiddleware } from "./middleware/auth.middleware";
import { errorMiddleware } from "./middleware/error.middleware";
import { createOrderController, healthCheck } from "./controllers/order.controller";
import { createCatalogController } from "./controllers/catalog.controller";
import { createBatchController } from "./controllers/batch.controller";

export interface AppDependencies {
  acquisition: AcquisitionService;
  apiKey?: string;
}

export function createApp({ acquisition, apiKey }: AppDependencies): Express {
  const app = express();
  const auth = createAuthMiddleware(apiKey);
  const orders = createOrderController(acquisition);
  const catalog = createCatalogController(acquisition);
  const batches = createBatchController(acquisition);

  app.use(cors());
  app.use(express.json({ limit: "10mb" }));

  // Public routes
  app.get("/health", healthCheck);

  // Protected routes
  app.post("/scenes/search", auth, catalog.searchScenes);
  app.get("/mosaics", auth, catalog.listMosaics);
  app.post("/mosaics/orders", auth, catalog.orderMosaic);

  app.post("/orders", auth, orders.submitOrder);
  app.get("/orders/pending", auth, orders.listPending);
  app.get("/orders", auth, orders.listOrders);
  app.get("/orders/:jobId", auth, orders.getOrder);
  app.post("/orders/:jobId/check", auth, orders.checkOrder);

  app.post("/batches", auth, batches.submitBatch);
  app.get("/batches", auth, batches.listBatches);
  app.post("/batches/:batchId/check", auth, batches.checkBatch);

  app.get("/stats", auth, orders.stats);

  app.use(errorMiddleware);

  return app;
}
