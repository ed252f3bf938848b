import { once } from "events";
import { Server } from "http";
import axios, { AxiosInstance } from "axios";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createApp } from "./app";
import DBService from "./services/db.service";
import ParallelDownloader from "./services/parallel-downloader.service";
import OrderLifecycleService from "./services/order-lifecycle.service";
import AcquisitionService from "./services/acquisition.service";
import { createRetryPolicy } from "./utils/retry";
import { FakeCatalog } from "./test/catalog";
import { MemoryObjectStore } from "./test/stores";
import { bodyStream, fakeHttp } from "./test/http";
import { AOI, makeScene } from "./test/fixtures";

const API_KEY = "test-secret";

const orderBody = {
  aoiLabel: "AOI_Kisumu_north",
  aoi: AOI,
  startDate: "2024-01-01",
  endDate: "2024-01-31",
};

describe("app", () => {
  let db: DBService;
  let catalog: FakeCatalog;
  let acquisition: AcquisitionService;
  let servers: Server[];
  let client: AxiosInstance;

  async function start(apiKey: string | undefined): Promise<AxiosInstance> {
    const server = createApp({ acquisition, apiKey }).listen(0, "127.0.0.1");
    servers.push(server);
    await once(server, "listening");
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("Server is not listening on a TCP port");
    }
    return axios.create({
      baseURL: `http://127.0.0.1:${address.port}`,
      headers: { Authorization: `Bearer ${API_KEY}` },
      validateStatus: () => true,
    });
  }

  beforeEach(async () => {
    db = await DBService.open(":memory:");
    catalog = new FakeCatalog();
    catalog.scenes = [
      makeScene("s1", "2024-01-02T10:00:00Z"),
      makeScene("s2", "2024-01-03T10:00:00Z"),
      makeScene("s3", "2024-01-09T10:00:00Z"),
    ];
    const { http } = fakeHttp((request) => ({ status: 200, data: bodyStream(request.url) }));
    const transfer = new ParallelDownloader({
      http,
      store: new MemoryObjectStore(),
      concurrency: 2,
      timeoutMs: 1000,
      retryPolicy: createRetryPolicy({ initialDelayMs: 1, maxDelayMs: 2 }),
    });
    acquisition = new AcquisitionService({
      catalog,
      store: db,
      lifecycle: new OrderLifecycleService({ catalog, store: db, transfer }),
      minCoveragePct: 98,
      defaultMaxMonths: 3,
    });
    servers = [];
    client = await start(API_KEY);
  });

  afterEach(async () => {
    for (const server of servers) {
      server.close();
      await once(server, "close");
    }
    await db.close();
  });

  describe("authentication", () => {
    it("should serve health checks without a key", async () => {
      const res = await client.get("/health", { headers: { Authorization: "" } });

      expect(res.status).toBe(200);
      expect(res.data.status).toBe("healthy");
    });

    it("should reject requests without a bearer token", async () => {
      const res = await client.get("/stats", { headers: { Authorization: "" } });

      expect(res.status).toBe(401);
      expect(res.data).toEqual({ error: "Unauthorized: missing or invalid authorization header" });
    });

    it("should reject other authorization schemes", async () => {
      const res = await client.get("/stats", { headers: { Authorization: `Basic ${API_KEY}` } });

      expect(res.status).toBe(401);
      expect(res.data).toEqual({ error: "Unauthorized: missing or invalid authorization header" });
    });

    it("should reject a wrong key", async () => {
      const res = await client.get("/stats", { headers: { Authorization: "Bearer wrong" } });

      expect(res.status).toBe(401);
      expect(res.data).toEqual({ error: "Unauthorized: invalid API key" });
    });

    it("should fail closed when no key is configured", async () => {
      const unconfigured = await start(undefined);

      const res = await unconfigured.get("/stats");

      expect(res.status).toBe(500);
      expect(res.data).toEqual({ error: "Server configuration error" });
    });
  });

  describe("orders", () => {
    it("should submit an order", async () => {
      const res = await client.post("/orders", orderBody);

      expect(res.status).toBe(201);
      expect(res.data).toMatchObject({
        status: "submitted",
        scenesFound: 3,
        order: { jobId: "job-1", aoiLabel: "Kisumu", status: "queued", scenesSelected: 2 },
      });
    });

    it("should reject a body without an AOI", async () => {
      const res = await client.post("/orders", { ...orderBody, aoi: undefined });

      expect(res.status).toBe(400);
      expect(res.data.error).toBe("Invalid request body");
    });

    it("should map date validation failures to 400", async () => {
      const res = await client.post("/orders", { ...orderBody, startDate: "2024-02-30" });

      expect(res.status).toBe(400);
      expect(res.data).toEqual({
        error: "Invalid request",
        details: 'startDate: Invalid calendar date "2024-02-30"',
      });
    });

    it("should reject malformed JSON", async () => {
      const res = await client.post("/orders", "{bad", { headers: { "Content-Type": "application/json" } });

      expect(res.status).toBe(400);
      expect(res.data.error).toBe("Invalid request body");
    });

    it("should list pending orders ahead of job lookups", async () => {
      await client.post("/orders", orderBody);

      const res = await client.get("/orders/pending");

      expect(res.status).toBe(200);
      expect(res.data.count).toBe(1);
      expect(res.data.orders[0].jobId).toBe("job-1");
    });

    it("should answer 404 for unknown orders", async () => {
      const res = await client.get("/orders/missing");

      expect(res.status).toBe(404);
      expect(res.data).toEqual({ error: "Order not found: missing" });
    });

    it("should require exactly one order filter", async () => {
      const none = await client.get("/orders");
      const two = await client.get("/orders", { params: { aoi: "Kisumu", status: "queued" } });

      expect(none.status).toBe(400);
      expect(none.data.error).toBe("Invalid query");
      expect(two.status).toBe(400);
    });

    it("should list orders by status", async () => {
      await client.post("/orders", orderBody);

      const res = await client.get("/orders", { params: { status: "queued" } });

      expect(res.status).toBe(200);
      expect(res.data.count).toBe(1);
    });

    it("should check an order", async () => {
      await client.post("/orders", orderBody);
      catalog.statuses.push({ id: "job-1", state: "running" });

      const res = await client.post("/orders/job-1/check", {});

      expect(res.status).toBe(200);
      expect(res.data).toEqual({
        jobId: "job-1",
        status: "running",
        known: true,
        aoiLabel: "Kisumu",
        errorHints: [],
      });
    });

    it("should report store statistics", async () => {
      await client.post("/orders", orderBody);

      const res = await client.get("/stats");

      expect(res.status).toBe(200);
      expect(res.data).toMatchObject({ totalOrders: 1, pendingOrders: 1, totalScenes: 2 });
    });
  });

  describe("catalog", () => {
    it("should preview a search", async () => {
      const res = await client.post("/scenes/search", {
        aoi: AOI,
        startDate: "2024-01-01",
        endDate: "2024-01-31",
      });

      expect(res.status).toBe(200);
      expect(res.data.selected.map((scene: { id: string }) => scene.id)).toEqual(["s1", "s3"]);
      expect(res.data.bundle).toEqual({ searchBundle: "ortho_analytic_4b_sr", orderBundle: "analytic_sr_udm2" });
    });

    it("should require both ends of a mosaic date filter", async () => {
      const res = await client.get("/mosaics", { params: { start: "2024-01-01" } });

      expect(res.status).toBe(400);
      expect(res.data.error).toBe("Invalid query");
    });

    it("should list mosaics", async () => {
      catalog.mosaics = [{ id: "m1", name: "global_monthly_2024_01_mosaic" }];

      const res = await client.get("/mosaics");

      expect(res.status).toBe(200);
      expect(res.data).toEqual({ mosaics: [{ id: "m1", name: "global_monthly_2024_01_mosaic" }], count: 1 });
    });

    it("should order a mosaic", async () => {
      const res = await client.post("/mosaics/orders", {
        mosaicName: "global_monthly_2024_01_mosaic",
        aoiLabel: "AOI_Kisumu_north",
        aoi: AOI,
      });

      expect(res.status).toBe(201);
      expect(res.data.order).toMatchObject({ kind: "mosaic", aoiLabel: "Kisumu", jobId: "job-1" });
    });
  });

  describe("batches", () => {
    it("should preview a batch on a dry run", async () => {
      const res = await client.post("/batches", {
        rows: [{ aoiLabel: "Kisumu", startDate: "2024-01-01", endDate: "2024-03-31", geometry: AOI }],
        dryRun: true,
      });

      expect(res.status).toBe(200);
      expect(res.data.counts).toEqual({ submitted: 1, skipped: 0, noScenes: 0, failed: 0, invalid: 0 });
    });

    it("should submit a batch", async () => {
      const res = await client.post("/batches", {
        rows: [{ aoiLabel: "Kisumu", startDate: "2024-01-01", endDate: "2024-06-30", geometry: AOI }],
      });

      expect(res.status).toBe(201);
      expect(res.data.counts.submitted).toBe(2);

      const batches = await client.get("/batches");
      expect(batches.data).toEqual({ batches: [{ batchId: res.data.batchId, orderCount: 2 }], count: 1 });
    });

    it("should reject row labels that are not a single path segment", async () => {
      const res = await client.post("/batches", {
        rows: [{ aoiLabel: "../Kisumu", startDate: "2024-01-01", endDate: "2024-03-31", geometry: AOI }],
      });

      expect(res.status).toBe(400);
      expect(res.data.error).toBe("Invalid request body");
      expect(catalog.searches).toEqual([]);
    });

    it("should reject malformed batch ids", async () => {
      const res = await client.post("/batches/not-a-batch/check", {});

      expect(res.status).toBe(400);
      expect(res.data.error).toBe("Invalid batchId format");
    });

    it("should answer 404 for unknown batches", async () => {
      const res = await client.post("/batches/7b0c5a9e-1f4d-4c1e-9a57-2f0a3c6d8e11/check", {});

      expect(res.status).toBe(404);
      expect(res.data).toMatchObject({ found: false, knownBatches: [] });
    });
  });
});
