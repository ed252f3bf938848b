import { describe, it, expect } from "vitest";
import CatalogService from "./catalog.service";
import { createRetryPolicy } from "../utils/retry";
import {
  CatalogQueryError,
  CatalogUnavailableError,
  SubmissionRejectedError,
} from "../utils/errors";
import { fakeHttp, FakeReply, FakeRequest } from "../test/http";
import { AOI } from "../test/fixtures";

const BASE_URL = "https://catalog.test";
const retryPolicy = createRetryPolicy({ initialDelayMs: 1, maxDelayMs: 2 });

function feature(id: string, acquired: string) {
  return { id, geometry: AOI, properties: { acquired, cloud_cover: 0 } };
}

function createCatalog(handler: (request: FakeRequest) => FakeReply) {
  const { http, requests } = fakeHttp(handler);
  const catalog = new CatalogService({
    apiKey: "test-secret",
    baseUrl: `${BASE_URL}/`,
    timeoutMs: 1000,
    paginationDelayMs: 0,
    maxCloudCover: 0,
    retryPolicy,
    http,
  });
  return { catalog, requests };
}

describe("CatalogService", () => {
  it("should require an API key", () => {
    expect(
      () =>
        new CatalogService({
          apiKey: "",
          baseUrl: BASE_URL,
          timeoutMs: 1000,
          paginationDelayMs: 0,
          maxCloudCover: 0,
          retryPolicy,
        }),
    ).toThrow("Catalog API key not configured");
  });

  describe("search", () => {
    it("should follow next links until they run out", async () => {
      const { catalog, requests } = createCatalog((request) => {
        switch (request.url) {
          case `${BASE_URL}/data/v1/quick-search`:
            return {
              status: 200,
              data: {
                features: [feature("s1", "2024-01-02T10:00:00Z"), feature("s2", "2024-01-03T10:00:00Z")],
                _links: { _next: `${BASE_URL}/page/2` },
              },
            };
          case `${BASE_URL}/page/2`:
            return {
              status: 200,
              data: { features: [feature("s3", "2024-01-04T10:00:00Z")], _links: { _next: `${BASE_URL}/page/3` } },
            };
          default:
            return { status: 200, data: { features: [], _links: { _next: null } } };
        }
      });

      const scenes = await catalog.search(AOI, "2024-01-01T00:00:00Z", "2024-01-31T23:59:59Z", "ortho_analytic_4b_sr");

      expect(scenes.map((scene) => scene.id)).toEqual(["s1", "s2", "s3"]);
      expect(scenes[0].acquiredDate).toBe("2024-01-02");
      expect(requests.map((r) => `${r.method} ${r.url}`)).toEqual([
        `POST ${BASE_URL}/data/v1/quick-search`,
        `GET ${BASE_URL}/page/2`,
        `GET ${BASE_URL}/page/3`,
      ]);
    });

    it("should stop after a single page without links", async () => {
      const { catalog, requests } = createCatalog(() => ({
        status: 200,
        data: { features: [feature("only", "2024-01-02T10:00:00Z")] },
      }));

      const scenes = await catalog.search(AOI, "a", "b", "bundle");

      expect(scenes).toHaveLength(1);
      expect(requests).toHaveLength(1);
    });

    it("should drop items without an acquisition time or footprint", async () => {
      const { catalog } = createCatalog(() => ({
        status: 200,
        data: {
          features: [
            feature("kept", "2024-01-02T10:00:00Z"),
            { id: "no-properties", geometry: AOI, properties: {} },
            { id: "no-geometry", geometry: null, properties: { acquired: "2024-01-03T10:00:00Z" } },
          ],
        },
      }));

      const scenes = await catalog.search(AOI, "a", "b", "bundle");

      expect(scenes.map((scene) => scene.id)).toEqual(["kept"]);
    });

    it("should send a composite filter", async () => {
      const { catalog, requests } = createCatalog(() => ({ status: 200, data: { features: [] } }));

      await catalog.search(AOI, "2024-01-01T00:00:00Z", "2024-01-31T23:59:59Z", "ortho_analytic_4b_sr", {
        maxCloudCover: 0.1,
      });

      expect(requests[0].data).toEqual({
        item_types: ["PSScene"],
        filter: {
          type: "AndFilter",
          config: [
            { type: "GeometryFilter", field_name: "geometry", config: AOI },
            {
              type: "DateRangeFilter",
              field_name: "acquired",
              config: { gte: "2024-01-01T00:00:00Z", lte: "2024-01-31T23:59:59Z" },
            },
            { type: "RangeFilter", field_name: "cloud_cover", config: { lte: 0.1 } },
            { type: "AssetFilter", config: ["ortho_analytic_4b_sr"] },
            { type: "StringInFilter", field_name: "quality_category", config: ["standard"] },
          ],
        },
      });
    });

    it("should not retry client errors", async () => {
      const { catalog, requests } = createCatalog(() => ({ status: 400, data: { message: "bad filter" } }));

      const failure = await catalog.search(AOI, "a", "b", "bundle").catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(CatalogQueryError);
      expect(requests).toHaveLength(1);
      if (failure instanceof CatalogQueryError) {
        expect(failure.statusCode).toBe(400);
        expect(failure.body).toEqual({ message: "bad filter" });
      }
    });

    it("should surface CatalogUnavailableError after exhausting retries", async () => {
      const { catalog, requests } = createCatalog(() => ({ status: 503 }));

      await expect(catalog.search(AOI, "a", "b", "bundle")).rejects.toBeInstanceOf(CatalogUnavailableError);
      expect(requests).toHaveLength(3);
    });

    it("should retry transient failures on later pages", async () => {
      let failures = 0;
      const { catalog, requests } = createCatalog((request) => {
        if (request.method === "POST") {
          return { status: 200, data: { features: [], _links: { _next: `${BASE_URL}/page/2` } } };
        }
        if (failures++ === 0) {
          return new Error("socket hang up");
        }
        return { status: 200, data: { features: [feature("late", "2024-01-02T10:00:00Z")] } };
      });

      const scenes = await catalog.search(AOI, "a", "b", "bundle");

      expect(scenes.map((scene) => scene.id)).toEqual(["late"]);
      expect(requests).toHaveLength(3);
    });
  });

  describe("submit", () => {
    it("should submit a clipped scene order and return its id", async () => {
      const { catalog, requests } = createCatalog(() => ({ status: 202, data: { id: "job-1" } }));

      const jobId = await catalog.submit({
        kind: "scene",
        name: "Scene Order Kisumu 2024-01-01 to 2024-01-31",
        itemIds: ["s1", "s2"],
        bundle: "analytic_sr_udm2",
        clipAoi: AOI,
      });

      expect(jobId).toBe("job-1");
      expect(requests[0].url).toBe(`${BASE_URL}/compute/ops/orders/v2`);
      expect(requests[0].data).toEqual({
        name: "Scene Order Kisumu 2024-01-01 to 2024-01-31",
        products: [{ item_ids: ["s1", "s2"], item_type: "PSScene", product_bundle: "analytic_sr_udm2" }],
        tools: [{ clip: { aoi: AOI } }],
      });
    });

    it("should omit the clip tool when no AOI is given", async () => {
      const { catalog, requests } = createCatalog(() => ({ status: 202, data: { id: "job-2" } }));

      await catalog.submit({ kind: "scene", name: "n", itemIds: ["s1"], bundle: "b" });

      expect(requests[0].data).not.toHaveProperty("tools");
    });

    it("should submit a basemap order for mosaics", async () => {
      const { catalog, requests } = createCatalog(() => ({ status: 202, data: { id: "job-3" } }));

      await catalog.submit({ kind: "mosaic", mosaicName: "global_monthly_2024_01_mosaic", aoi: AOI });

      expect(requests[0].data).toEqual({
        name: "Basemap Order global_monthly_2024_01_mosaic",
        source_type: "basemaps",
        products: [{ mosaic_name: "global_monthly_2024_01_mosaic", geometry: AOI }],
        tools: [{ clip: {} }],
      });
    });

    it("should raise SubmissionRejectedError on a rejected submission", async () => {
      const { catalog } = createCatalog(() => ({ status: 400, data: { field: "item_ids" } }));

      const failure = await catalog
        .submit({ kind: "scene", name: "n", itemIds: [], bundle: "b" })
        .catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(SubmissionRejectedError);
      if (failure instanceof SubmissionRejectedError) {
        expect(failure.statusCode).toBe(400);
      }
    });

    it("should reject a response without an id", async () => {
      const { catalog } = createCatalog(() => ({ status: 202, data: {} }));

      await expect(
        catalog.submit({ kind: "scene", name: "n", itemIds: ["s1"], bundle: "b" }),
      ).rejects.toThrow("Submission response did not include a job id");
    });
  });

  describe("status", () => {
    it("should return the remote job state", async () => {
      const { catalog, requests } = createCatalog(() => ({
        status: 200,
        data: { id: "job-1", state: "running" },
      }));

      await expect(catalog.status("job-1")).resolves.toEqual({ id: "job-1", state: "running" });
      expect(requests[0].url).toBe(`${BASE_URL}/compute/ops/orders/v2/job-1`);
    });

    it("should reject a payload without a state", async () => {
      const { catalog } = createCatalog(() => ({ status: 200, data: { id: "job-1" } }));

      await expect(catalog.status("job-1")).rejects.toBeInstanceOf(CatalogQueryError);
    });
  });

  describe("listMosaics", () => {
    const mosaics = [
      { id: "m1", name: "global_monthly_2023_12_mosaic", first_acquired: "2023-12-01T00:00:00.000Z" },
      { id: "m2", name: "global_monthly_2024_01_mosaic", first_acquired: "2024-01-01T00:00:00.000Z" },
      { id: "m3", name: "global_monthly_2024_02_mosaic", first_acquired: "2024-02-01T00:00:00.000Z" },
    ];

    it("should list every page when no bounds are given", async () => {
      const { catalog } = createCatalog((request) =>
        request.url.endsWith("/mosaics")
          ? { status: 200, data: { mosaics: mosaics.slice(0, 2), _links: { _next: `${BASE_URL}/mosaics/2` } } }
          : { status: 200, data: { mosaics: mosaics.slice(2) } },
      );

      const result = await catalog.listMosaics();

      expect(result.map((m) => m.id)).toEqual(["m1", "m2", "m3"]);
    });

    it("should filter on the first-acquired date, inclusive on both ends", async () => {
      const { catalog } = createCatalog(() => ({ status: 200, data: { mosaics } }));

      const result = await catalog.listMosaics("2024-01-01", "2024-02-01");

      expect(result.map((m) => m.id)).toEqual(["m2", "m3"]);
    });
  });
});
