import axios, { AxiosInstance, Method } from "axios";
import logger from "../utils/logger";
import {
  CatalogQueryError,
  CatalogUnavailableError,
  SubmissionRejectedError,
  toError,
} from "../utils/errors";
import { RetryExhaustedError, RetryPolicy, sleep, withRetry } from "../utils/retry";
import type {
  Mosaic,
  MosaicPage,
  PageLinks,
  RemoteJobStatus,
  SearchPage,
  SubmissionRequest,
} from "../models/catalog.model";
import {
  AoiGeometry,
  CatalogFeature,
  Scene,
  SearchFilters,
  toScene,
} from "../models/scene.model";

export interface CatalogServiceOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  paginationDelayMs: number;
  maxCloudCover: number;
  retryPolicy: RetryPolicy;
  /** Pre-built HTTP instance; one with basic auth is created otherwise. */
  http?: AxiosInstance;
}

/** Remote catalog and fulfillment calls the pipeline depends on. */
export interface CatalogClient {
  search(
    aoi: AoiGeometry,
    start: string,
    end: string,
    bundle: string,
    filters?: Partial<SearchFilters>,
  ): Promise<Scene[]>;
  submit(request: SubmissionRequest): Promise<string>;
  status(jobId: string): Promise<RemoteJobStatus>;
  listMosaics(start?: string, end?: string): Promise<Mosaic[]>;
}

const ITEM_TYPE = "PSScene";

class CatalogService implements CatalogClient {
  private http: AxiosInstance;
  private baseUrl: string;
  private paginationDelayMs: number;
  private maxCloudCover: number;
  private retryPolicy: RetryPolicy;

  constructor(options: CatalogServiceOptions) {
    if (!options.apiKey) {
      throw new Error("Catalog API key not configured");
    }

    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.paginationDelayMs = options.paginationDelayMs;
    this.maxCloudCover = options.maxCloudCover;
    this.retryPolicy = options.retryPolicy;
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs,
        auth: { username: options.apiKey, password: "" },
        headers: { "Content-Type": "application/json" },
      });

    logger.info(`CatalogService initialized with base URL: ${this.baseUrl}`);
  }

  /**
   * Searches the catalog and follows `_links._next` until it runs out.
   * `start`/`end` are ISO timestamps, both inclusive.
   */
  async search(
    aoi: AoiGeometry,
    start: string,
    end: string,
    bundle: string,
    filters: Partial<SearchFilters> = {},
  ): Promise<Scene[]> {
    const searchUrl = `${this.baseUrl}/data/v1/quick-search`;
    const itemType = filters.itemType ?? ITEM_TYPE;
    const payload = {
      item_types: [itemType],
      filter: {
        type: "AndFilter",
        config: [
          { type: "GeometryFilter", field_name: "geometry", config: aoi },
          {
            type: "DateRangeFilter",
            field_name: "acquired",
            config: { gte: start, lte: end },
          },
          {
            type: "RangeFilter",
            field_name: "cloud_cover",
            config: { lte: filters.maxCloudCover ?? this.maxCloudCover },
          },
          { type: "AssetFilter", config: [bundle] },
          {
            type: "StringInFilter",
            field_name: "quality_category",
            config: filters.qualityCategories ?? ["standard"],
          },
        ],
      },
    };

    const features = await this.fetchAllPages<SearchPage, CatalogFeature>(
      () => this.request<SearchPage>("POST", searchUrl, payload),
      (page) => page.features,
    );

    logger.info(`Catalog search returned ${features.length} scenes`, {
      start,
      end,
      bundle,
    });

    const scenes: Scene[] = [];
    for (const feature of features) {
      const scene = toScene(feature);
      if (scene) {
        scenes.push(scene);
      } else {
        logger.warn(`Skipping catalog item ${feature.id}: missing geometry or acquisition time`);
      }
    }
    return scenes;
  }

  /** Submits a fulfillment job and returns the id the service assigned. */
  async submit(request: SubmissionRequest): Promise<string> {
    const url = `${this.baseUrl}/compute/ops/orders/v2`;
    const payload =
      request.kind === "scene"
        ? {
            name: request.name,
            products: [
              {
                item_ids: request.itemIds,
                item_type: ITEM_TYPE,
                product_bundle: request.bundle,
              },
            ],
            ...(request.clipAoi ? { tools: [{ clip: { aoi: request.clipAoi } }] } : {}),
          }
        : {
            name: `Basemap Order ${request.mosaicName}`,
            source_type: "basemaps",
            products: [{ mosaic_name: request.mosaicName, geometry: request.aoi }],
            tools: [{ clip: {} }],
          };

    let response: { id?: string };
    try {
      response = await this.request<{ id?: string }>("POST", url, payload);
    } catch (error) {
      if (error instanceof CatalogQueryError) {
        throw new SubmissionRejectedError(
          `Submission rejected: ${error.message}`,
          error.statusCode,
          error.body,
        );
      }
      throw error;
    }

    if (!response.id) {
      throw new SubmissionRejectedError("Submission response did not include a job id");
    }

    logger.info(`Submitted ${request.kind} order ${response.id}`);
    return response.id;
  }

  async status(jobId: string): Promise<RemoteJobStatus> {
    const url = `${this.baseUrl}/compute/ops/orders/v2/${encodeURIComponent(jobId)}`;
    const status = await this.request<RemoteJobStatus>("GET", url);
    if (typeof status.state !== "string") {
      throw new CatalogQueryError(`Status response for ${jobId} has no state`, url);
    }
    return status;
  }

  /**
   * Lists basemap mosaics. With both bounds given, keeps mosaics whose
   * first-acquired date falls inside them (inclusive).
   */
  async listMosaics(start?: string, end?: string): Promise<Mosaic[]> {
    const url = `${this.baseUrl}/basemaps/v1/mosaics`;
    const mosaics = await this.fetchAllPages<MosaicPage, Mosaic>(
      () => this.request<MosaicPage>("GET", url),
      (page) => page.mosaics,
    );

    if (!start || !end) {
      return mosaics;
    }

    return mosaics.filter((mosaic) => {
      const acquired = (mosaic.first_acquired ?? "").slice(0, 10);
      return start <= acquired && acquired <= end;
    });
  }

  private async fetchAllPages<P extends { _links?: PageLinks }, I>(
    firstPage: () => Promise<P>,
    itemsOf: (page: P) => I[] | undefined,
  ): Promise<I[]> {
    const items: I[] = [];
    let page = await firstPage();
    let pageCount = 1;

    for (;;) {
      items.push(...(itemsOf(page) ?? []));

      const next = page._links?._next;
      if (!next) {
        break;
      }

      if (this.paginationDelayMs > 0) {
        await sleep(this.paginationDelayMs);
      }
      page = await this.request<P>("GET", next);
      pageCount++;
    }

    logger.debug(`Fetched ${items.length} items across ${pageCount} pages`);
    return items;
  }

  private async request<T>(method: Method, url: string, data?: unknown): Promise<T> {
    try {
      const response = await withRetry(this.retryPolicy, `${method} ${url}`, () =>
        this.http.request<T>({ method, url, data }),
      );
      return response.data;
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        logger.error(`Catalog request failed: ${method} ${url}`, error.lastError);
        throw new CatalogUnavailableError(url, error.attempts, error.lastError);
      }
      if (axios.isAxiosError(error) && error.response) {
        throw new CatalogQueryError(
          `Catalog request failed with status ${error.response.status}: ${method} ${url}`,
          url,
          error.response.status,
          error.response.data,
        );
      }
      throw toError(error);
    }
  }
}

export default CatalogService;
