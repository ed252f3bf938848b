import { v4 as uuidv4 } from "uuid";
import logger from "../utils/logger";
import { OrderNotFoundError, toError, ValidationError } from "../utils/errors";
import { areaSqKm, assertNonEmptyAoi } from "../utils/geometry";
import { DateChunk, parseIsoDate, subdivideDateRange } from "../utils/dates";
import { resolveBundle } from "../utils/bundles";
import { normalizeAoiName } from "../utils/sanitizer";
import { selectScenes, sortSelection } from "./scene-selector.service";
import OrderLifecycleService, {
  DownloadRequest,
  estimateQuotaHectares,
  OrderCheck,
} from "./order-lifecycle.service";
import type { CatalogClient } from "./catalog.service";
import type { OrderStore } from "./db.service";
import type { Mosaic } from "../models/catalog.model";
import type {
  AoiGeometry,
  BandOption,
  Cadence,
  ProductBundle,
  SelectedScene,
} from "../models/scene.model";
import type {
  BatchSummary,
  Order,
  OrderStats,
  OrderStatus,
} from "../models/order.model";

export interface SearchParams {
  aoi: AoiGeometry;
  startDate: string;
  endDate: string;
  cadence: Cadence;
  bands: BandOption;
  bundleOverride?: string;
  minCoveragePct?: number;
}

export interface SearchPreview {
  bundle: ProductBundle;
  aoiAreaSqKm: number;
  scenesFound: number;
  selected: SelectedScene[];
  quotaHectares: number;
}

export interface OrderParams extends SearchParams {
  aoiLabel: string;
  clip?: boolean;
  skipIfExists?: boolean;
  batchId?: string;
}

export type SubmitOutcome =
  | { status: "submitted"; order: Order; preview: SearchPreview }
  | { status: "skipped"; reason: "completed" | "pending"; existing: Order }
  | { status: "noScenes"; scenesFound: number };

export interface BatchRow {
  aoiLabel: string;
  startDate: string;
  endDate: string;
  geometry: AoiGeometry;
}

export interface BatchParams {
  rows: readonly BatchRow[];
  maxMonths?: number;
  cadence: Cadence;
  bands: BandOption;
  bundleOverride?: string;
  minCoveragePct?: number;
  dryRun?: boolean;
  skipExisting?: boolean;
}

interface RowPlan {
  row: BatchRow;
  aoiLabel: string;
  chunks: DateChunk[];
}

export type ChunkStatus = "submitted" | "skipped" | "noScenes" | "failed" | "invalid";

export interface ChunkOutcome {
  aoiLabel: string;
  startDate: string;
  endDate: string;
  status: ChunkStatus;
  jobId?: string;
  scenesSelected?: number;
  quotaHectares?: number;
  message?: string;
}

export interface BatchReport {
  batchId: string;
  dryRun: boolean;
  outcomes: ChunkOutcome[];
  counts: Record<ChunkStatus, number>;
}

export type BatchBucket = "success" | "partial" | "pending" | "failed" | "cancelled" | "skipped";

export interface BatchOrderCheck {
  jobId: string;
  aoiLabel: string;
  bucket: BatchBucket;
  status: OrderStatus;
  check?: OrderCheck;
  message?: string;
}

export interface BatchCheckReport {
  batchId: string;
  found: boolean;
  orders: BatchOrderCheck[];
  counts: Record<BatchBucket, number>;
  /** Known batches, returned when `batchId` matches none. */
  knownBatches?: BatchSummary[];
}

export interface OrderQuery {
  aoi?: string;
  status?: OrderStatus;
  batchId?: string;
}

export interface AcquisitionOptions {
  catalog: CatalogClient;
  store: OrderStore;
  lifecycle: OrderLifecycleService;
  minCoveragePct: number;
  defaultMaxMonths: number;
}

function chunkCounts(): Record<ChunkStatus, number> {
  return { submitted: 0, skipped: 0, noScenes: 0, failed: 0, invalid: 0 };
}

function bucketCounts(): Record<BatchBucket, number> {
  return { success: 0, partial: 0, pending: 0, failed: 0, cancelled: 0, skipped: 0 };
}

/**
 * User-facing workflows over the pipeline: search preview, single and batch
 * submission, mosaic ordering, and status checks with download.
 */
class AcquisitionService {
  private catalog: CatalogClient;
  private store: OrderStore;
  private lifecycle: OrderLifecycleService;
  private minCoveragePct: number;
  private defaultMaxMonths: number;

  constructor(options: AcquisitionOptions) {
    this.catalog = options.catalog;
    this.store = options.store;
    this.lifecycle = options.lifecycle;
    this.minCoveragePct = options.minCoveragePct;
    this.defaultMaxMonths = options.defaultMaxMonths;
  }

  /** Search and select without submitting. */
  async searchScenes(params: SearchParams): Promise<SearchPreview> {
    const start = parseIsoDate(params.startDate, "startDate");
    parseIsoDate(params.endDate, "endDate");
    assertNonEmptyAoi(params.aoi);

    const bundle = resolveBundle(params.bands, start.getUTCFullYear(), params.bundleOverride);
    return this.preview(params, bundle);
  }

  async submitOrder(params: OrderParams): Promise<SubmitOutcome> {
    const start = parseIsoDate(params.startDate, "startDate");
    parseIsoDate(params.endDate, "endDate");
    const aoiLabel = normalizeAoiName(params.aoiLabel);
    assertNonEmptyAoi(params.aoi, aoiLabel);

    const bundle = resolveBundle(params.bands, start.getUTCFullYear(), params.bundleOverride);
    return this.submitWindow({ ...params, aoiLabel }, bundle, false);
  }

  async submitBatch(params: BatchParams): Promise<BatchReport> {
    const batchId = uuidv4();
    const maxMonths = params.maxMonths ?? this.defaultMaxMonths;
    const dryRun = params.dryRun ?? false;
    const outcomes: ChunkOutcome[] = [];

    logger.info(`Batch ${batchId}: ${params.rows.length} rows, ${maxMonths}-month chunks`, {
      dryRun,
    });

    const plans = params.rows.map((row) => this.planRow(row, maxMonths));

    // eight-band availability is decided once, by the earliest start in the batch
    const startYears = plans.flatMap((plan) =>
      "chunks" in plan ? [parseIsoDate(plan.chunks[0].start).getUTCFullYear()] : [],
    );
    const bundle = resolveBundle(
      params.bands,
      startYears.length ? Math.min(...startYears) : new Date().getUTCFullYear(),
      params.bundleOverride,
    );

    for (const plan of plans) {
      if (!("chunks" in plan)) {
        outcomes.push(plan);
        continue;
      }
      for (const chunk of plan.chunks) {
        const orderParams: OrderParams = {
          aoi: plan.row.geometry,
          aoiLabel: plan.aoiLabel,
          startDate: chunk.start,
          endDate: chunk.end,
          cadence: params.cadence,
          bands: params.bands,
          bundleOverride: params.bundleOverride,
          minCoveragePct: params.minCoveragePct,
          skipIfExists: params.skipExisting,
          batchId,
        };
        outcomes.push(await this.submitChunk(orderParams, bundle, dryRun));
      }
    }

    const counts = chunkCounts();
    for (const outcome of outcomes) counts[outcome.status]++;

    logger.info(`Batch ${batchId} complete`, counts);
    return { batchId, dryRun, outcomes, counts };
  }

  listMosaics(start?: string, end?: string): Promise<Mosaic[]> {
    if (start) parseIsoDate(start, "start");
    if (end) parseIsoDate(end, "end");
    return this.catalog.listMosaics(start, end);
  }

  async orderMosaic(params: {
    mosaicName: string;
    aoiLabel: string;
    aoi: AoiGeometry;
  }): Promise<Order> {
    const aoiLabel = normalizeAoiName(params.aoiLabel);
    assertNonEmptyAoi(params.aoi, aoiLabel);
    return this.lifecycle.submitMosaicOrder({
      mosaicName: params.mosaicName,
      aoiLabel,
      aoi: params.aoi,
      aoiAreaSqKm: areaSqKm(params.aoi),
    });
  }

  checkOrder(jobId: string, request: DownloadRequest): Promise<OrderCheck> {
    return this.lifecycle.check(jobId, request);
  }

  async checkBatch(batchId: string, request: DownloadRequest): Promise<BatchCheckReport> {
    const orders = await this.store.listByBatch(batchId);
    const counts = bucketCounts();

    if (orders.length === 0) {
      logger.warn(`No orders found for batch ${batchId}`);
      return {
        batchId,
        found: false,
        orders: [],
        counts,
        knownBatches: await this.store.listBatches(),
      };
    }

    const checks: BatchOrderCheck[] = [];
    for (const order of orders) {
      const result = await this.checkBatchOrder(order, request);
      counts[result.bucket]++;
      checks.push(result);
    }

    logger.info(`Batch ${batchId} checked`, counts);
    return { batchId, found: true, orders: checks, counts };
  }

  async getOrder(jobId: string): Promise<Order> {
    const order = await this.store.get(jobId);
    if (!order) {
      throw new OrderNotFoundError(jobId);
    }
    return order;
  }

  listOrders(query: OrderQuery): Promise<Order[]> {
    if (query.batchId) return this.store.listByBatch(query.batchId);
    if (query.aoi) return this.store.listByAoi(normalizeAoiName(query.aoi));
    if (query.status) return this.store.listByStatus(query.status);
    throw new ValidationError("One of aoi, status or batchId is required");
  }

  listPending(): Promise<Order[]> {
    return this.store.listPending();
  }

  listBatches(): Promise<BatchSummary[]> {
    return this.store.listBatches();
  }

  stats(): Promise<OrderStats> {
    return this.store.stats();
  }

  private async preview(params: SearchParams, bundle: ProductBundle): Promise<SearchPreview> {
    const scenes = await this.catalog.search(
      params.aoi,
      `${params.startDate}T00:00:00Z`,
      `${params.endDate}T23:59:59Z`,
      bundle.searchBundle,
    );
    const selected = sortSelection(
      selectScenes(
        scenes,
        params.aoi,
        params.cadence,
        params.minCoveragePct ?? this.minCoveragePct,
      ),
    );
    const aoiAreaSqKm = areaSqKm(params.aoi);

    return {
      bundle,
      aoiAreaSqKm,
      scenesFound: scenes.length,
      selected,
      quotaHectares: estimateQuotaHectares(aoiAreaSqKm, selected.length),
    };
  }

  /** Chunks for a batch row, or the `invalid` outcome that replaces them. */
  private planRow(row: BatchRow, maxMonths: number): RowPlan | ChunkOutcome {
    const aoiLabel = normalizeAoiName(row.aoiLabel);
    const invalid = (message: string): ChunkOutcome => ({
      aoiLabel,
      startDate: row.startDate,
      endDate: row.endDate,
      status: "invalid",
      message,
    });

    let chunks: DateChunk[];
    try {
      assertNonEmptyAoi(row.geometry, aoiLabel);
      chunks = subdivideDateRange(row.startDate, row.endDate, maxMonths);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      logger.warn(`Skipping ${aoiLabel}: ${error.message}`);
      return invalid(error.message);
    }

    if (chunks.length === 0) {
      return invalid(`${aoiLabel}: start date is after end date`);
    }
    return { row, aoiLabel, chunks };
  }

  private async submitWindow(
    params: OrderParams,
    bundle: ProductBundle,
    dryRun: boolean,
  ): Promise<SubmitOutcome> {
    if (params.skipIfExists) {
      const dedup = await this.lifecycle.dedup(params.aoiLabel, params.startDate, params.endDate);
      if (dedup.kind !== "none") {
        logger.info(
          `Skipping ${params.aoiLabel} ${params.startDate}..${params.endDate}: ${dedup.kind} order ${dedup.order.jobId}`,
        );
        return { status: "skipped", reason: dedup.kind, existing: dedup.order };
      }
    }

    const preview = await this.preview(params, bundle);
    if (preview.selected.length === 0) {
      logger.warn(
        `No scenes met ${params.minCoveragePct ?? this.minCoveragePct}% coverage for ${params.aoiLabel} (${preview.scenesFound} found)`,
      );
      return { status: "noScenes", scenesFound: preview.scenesFound };
    }

    if (dryRun) {
      return { status: "submitted", order: this.draftOrder(params, bundle, preview), preview };
    }

    const order = await this.lifecycle.submitSceneOrder({
      name: `Scene Order ${params.aoiLabel} ${params.startDate} to ${params.endDate}`,
      aoiLabel: params.aoiLabel,
      startDate: params.startDate,
      endDate: params.endDate,
      itemIds: preview.selected.map((selection) => selection.scene.id),
      bundle,
      bands: params.bands,
      clipAoi: params.clip === false ? undefined : params.aoi,
      aoiAreaSqKm: preview.aoiAreaSqKm,
      scenesFound: preview.scenesFound,
      batchId: params.batchId,
    });
    return { status: "submitted", order, preview };
  }

  private async submitChunk(
    params: OrderParams,
    bundle: ProductBundle,
    dryRun: boolean,
  ): Promise<ChunkOutcome> {
    const base = {
      aoiLabel: params.aoiLabel,
      startDate: params.startDate,
      endDate: params.endDate,
    };

    try {
      const outcome = await this.submitWindow(params, bundle, dryRun);
      switch (outcome.status) {
        case "submitted":
          return {
            ...base,
            status: "submitted",
            jobId: dryRun ? undefined : outcome.order.jobId,
            scenesSelected: outcome.order.scenesSelected,
            quotaHectares: outcome.order.quotaHectares,
            message: dryRun ? "Dry run: not submitted" : undefined,
          };
        case "skipped":
          return {
            ...base,
            status: "skipped",
            jobId: outcome.existing.jobId,
            message: `Existing ${outcome.reason} order`,
          };
        case "noScenes":
          return { ...base, status: "noScenes", message: `${outcome.scenesFound} scenes found` };
      }
    } catch (error) {
      const message = toError(error).message;
      logger.error(`Order failed for ${params.aoiLabel} ${params.startDate}..${params.endDate}: ${message}`);
      return { ...base, status: "failed", message };
    }
  }

  private draftOrder(params: OrderParams, bundle: ProductBundle, preview: SearchPreview): Order {
    return {
      jobId: "",
      aoiLabel: params.aoiLabel,
      kind: "scene",
      startDate: params.startDate,
      endDate: params.endDate,
      status: "queued",
      bands: params.bands,
      productBundle: bundle.searchBundle,
      orderBundle: bundle.orderBundle,
      clipped: params.clip !== false,
      aoiAreaSqKm: preview.aoiAreaSqKm,
      scenesSelected: preview.selected.length,
      scenesFound: preview.scenesFound,
      quotaHectares: preview.quotaHectares,
      batchId: params.batchId,
      createdAt: new Date().toISOString(),
    };
  }

  private async checkBatchOrder(
    order: Order,
    request: DownloadRequest,
  ): Promise<BatchOrderCheck> {
    const base = { jobId: order.jobId, aoiLabel: order.aoiLabel, status: order.status };

    if (order.status === "success" && !request.force) {
      return { ...base, bucket: "skipped", message: "Already completed" };
    }
    if (order.status === "failed" || order.status === "cancelled") {
      return { ...base, bucket: order.status, message: `Order already ${order.status}` };
    }

    try {
      const check = await this.lifecycle.check(order.jobId, request);
      const result = { ...base, status: check.status, check };

      if (check.download && check.download.resultLinks === 0) {
        return { ...result, bucket: "failed", message: "No result links" };
      }
      switch (check.status) {
        case "success":
          return { ...result, bucket: "success" };
        case "partial":
          return { ...result, bucket: "partial" };
        case "queued":
        case "running":
          return { ...result, bucket: "pending" };
        case "failed":
          return { ...result, bucket: "failed", message: check.errorHints.join("; ") || undefined };
        case "cancelled":
          return { ...result, bucket: "cancelled" };
      }
    } catch (error) {
      const message = toError(error).message;
      logger.error(`Status check failed for ${order.jobId}: ${message}`);
      return { ...base, bucket: "failed", message };
    }
  }
}

export default AcquisitionService;
