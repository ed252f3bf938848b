import path from "path";
import logger from "../utils/logger";
import { CatalogQueryError } from "../utils/errors";
import { normalizeAoiName } from "../utils/sanitizer";
import type { CatalogClient } from "./catalog.service";
import type { OrderStore } from "./db.service";
import {
  resultSetFingerprint,
  routeMosaicArtifacts,
  routeSceneArtifacts,
  RoutedArtifact,
  toDownloadTasks,
} from "./artifact-router.service";
import {
  canTransition,
  DedupResult,
  isDownloadable,
  isOrderStatus,
  isPending,
  isTerminal,
  NO_WINDOW,
  Order,
  OrderKind,
  OrderStatus,
} from "../models/order.model";
import type { RemoteJobStatus, ResultLink } from "../models/catalog.model";
import type { AoiGeometry, BandOption, ProductBundle } from "../models/scene.model";
import {
  BulkTransfer,
  Destination,
  DownloadResult,
  DownloadSummary,
  summarize,
} from "../models/download.model";

export const UNKNOWN_AOI = "UnknownAOI";
const UNKNOWN_MOSAIC = "unknown_mosaic";

export interface SceneOrderInput {
  name: string;
  aoiLabel: string;
  startDate: string;
  endDate: string;
  itemIds: readonly string[];
  bundle: ProductBundle;
  bands: BandOption;
  clipAoi?: AoiGeometry;
  aoiAreaSqKm: number;
  scenesFound: number;
  batchId?: string;
}

export interface MosaicOrderInput {
  mosaicName: string;
  aoiLabel: string;
  aoi: AoiGeometry;
  aoiAreaSqKm: number;
}

export interface PollResult {
  order: Order;
  remote: RemoteJobStatus;
  errorHints: string[];
}

export interface DownloadRequest {
  destination: Destination;
  overwrite: boolean;
  /** Re-download a partial order even when its result set is unchanged. */
  force?: boolean;
}

export interface OrderDownload {
  route: OrderKind;
  resultLinks: number;
  /** Partial order whose result set matches the last download. */
  unchanged: boolean;
  imagesFound?: number;
  weeks?: number;
  summary: DownloadSummary;
}

export interface OrderCheck {
  jobId: string;
  status: OrderStatus;
  known: boolean;
  aoiLabel: string;
  errorHints: string[];
  download?: OrderDownload;
}

export interface OrderLifecycleOptions {
  catalog: CatalogClient;
  store: OrderStore;
  transfer: BulkTransfer;
}

const EMPTY_SUMMARY: DownloadSummary = { downloaded: 0, skipped: 0, failed: 0, results: [] };

/** Quota estimate in hectares: km² × scenes × 100. */
export function estimateQuotaHectares(aoiAreaSqKm: number, scenes: number): number {
  return aoiAreaSqKm * scenes * 100;
}

/** Downloadable artifacts of a remote job; empty until results are published. */
export function resultLinks(remote: RemoteJobStatus): ResultLink[] {
  const links: ResultLink[] = [];
  for (const result of remote._links?.results ?? []) {
    if (!result.location) continue;
    links.push({
      url: result.location,
      filename: path.posix.basename(result.name ?? ""),
    });
  }
  return links;
}

/**
 * Submission, status tracking and artifact retrieval for fulfillment jobs.
 * Orders are persisted through the store on every state change.
 */
class OrderLifecycleService {
  private catalog: CatalogClient;
  private store: OrderStore;
  private transfer: BulkTransfer;

  constructor(options: OrderLifecycleOptions) {
    this.catalog = options.catalog;
    this.store = options.store;
    this.transfer = options.transfer;
  }

  /** Latest order for the exact window, classified for resubmission. */
  async dedup(aoiLabel: string, startDate: string, endDate: string): Promise<DedupResult> {
    const completed = await this.store.findByWindow(aoiLabel, startDate, endDate, {
      status: "success",
    });
    if (completed) {
      return { kind: "completed", order: completed };
    }

    const latest = await this.store.findByWindow(aoiLabel, startDate, endDate);
    if (latest && isPending(latest.status)) {
      return { kind: "pending", order: latest };
    }
    return { kind: "none" };
  }

  async submitSceneOrder(input: SceneOrderInput): Promise<Order> {
    const jobId = await this.catalog.submit({
      kind: "scene",
      name: input.name,
      itemIds: input.itemIds,
      bundle: input.bundle.orderBundle,
      clipAoi: input.clipAoi,
    });

    const order: Order = {
      jobId,
      aoiLabel: input.aoiLabel,
      kind: "scene",
      startDate: input.startDate,
      endDate: input.endDate,
      status: "queued",
      bands: input.bands,
      productBundle: input.bundle.searchBundle,
      orderBundle: input.bundle.orderBundle,
      clipped: input.clipAoi !== undefined,
      aoiAreaSqKm: input.aoiAreaSqKm,
      scenesSelected: input.itemIds.length,
      scenesFound: input.scenesFound,
      quotaHectares: estimateQuotaHectares(input.aoiAreaSqKm, input.itemIds.length),
      batchId: input.batchId,
      createdAt: new Date().toISOString(),
    };

    await this.store.save(order);
    logger.info(`Order ${jobId} queued for ${input.aoiLabel} ${input.startDate}..${input.endDate}`);
    return order;
  }

  async submitMosaicOrder(input: MosaicOrderInput): Promise<Order> {
    const jobId = await this.catalog.submit({
      kind: "mosaic",
      mosaicName: input.mosaicName,
      aoi: input.aoi,
    });

    const order: Order = {
      jobId,
      aoiLabel: input.aoiLabel,
      kind: "mosaic",
      startDate: NO_WINDOW,
      endDate: NO_WINDOW,
      status: "queued",
      clipped: true,
      aoiAreaSqKm: input.aoiAreaSqKm,
      mosaicName: input.mosaicName,
      createdAt: new Date().toISOString(),
    };

    await this.store.save(order);
    logger.info(`Mosaic order ${jobId} queued for ${input.aoiLabel} (${input.mosaicName})`);
    return order;
  }

  /**
   * Refreshes the order from the remote state. Remote state names are the
   * local ones; anything else is a query error.
   */
  async poll(order: Order): Promise<PollResult> {
    const remote = await this.catalog.status(order.jobId);
    const status = remote.state;
    if (!isOrderStatus(status)) {
      throw new CatalogQueryError(
        `Unknown state "${status}" for order ${order.jobId}`,
        order.jobId,
      );
    }

    if (!canTransition(order.status, status)) {
      logger.warn(`Unexpected transition for ${order.jobId}: ${order.status} -> ${status}`);
    }

    let refreshed: Order = { ...order, status };
    if (status !== order.status) {
      refreshed = (await this.store.updateStatus(order.jobId, status)) ?? refreshed;
      logger.info(
        `Order ${order.jobId}: ${order.status} -> ${status}${isTerminal(status) ? " (final)" : ""}`,
      );
    }

    const errorHints = remote.error_hints ?? [];
    if (status === "failed") {
      logger.error(`Order ${order.jobId} failed`, { errorHints });
    }

    return { order: refreshed, remote, errorHints };
  }

  /**
   * Polls an order and, once it is downloadable, retrieves its artifacts.
   * Orders missing from the store are still checked, as scene orders under
   * an unknown AOI.
   */
  async check(jobId: string, request: DownloadRequest): Promise<OrderCheck> {
    const stored = await this.store.get(jobId);
    const order: Order = stored ?? {
      jobId,
      aoiLabel: UNKNOWN_AOI,
      kind: "scene",
      startDate: NO_WINDOW,
      endDate: NO_WINDOW,
      status: "queued",
      clipped: false,
      createdAt: new Date().toISOString(),
    };

    const { order: refreshed, remote, errorHints } = await this.poll(order);
    const check: OrderCheck = {
      jobId,
      status: refreshed.status,
      known: stored !== null,
      aoiLabel: stored ? normalizeAoiName(stored.aoiLabel) : UNKNOWN_AOI,
      errorHints,
    };

    if (isDownloadable(refreshed.status)) {
      check.download = await this.download(refreshed, remote, request, stored !== null);
    }
    return check;
  }

  private async download(
    order: Order,
    remote: RemoteJobStatus,
    request: DownloadRequest,
    persisted: boolean,
  ): Promise<OrderDownload> {
    const links = resultLinks(remote);
    const route: OrderKind =
      order.kind === "mosaic" && remote.source_type === "basemaps" ? "mosaic" : "scene";

    if (links.length === 0) {
      logger.warn(`Order ${order.jobId} is ${order.status} but has no result links yet`);
      return { route, resultLinks: 0, unchanged: false, summary: EMPTY_SUMMARY };
    }

    const fingerprint = resultSetFingerprint(links);
    if (
      order.status === "partial" &&
      !request.force &&
      order.downloadedResultSet === fingerprint
    ) {
      logger.info(`Partial order ${order.jobId} unchanged since last download, skipping`);
      return { route, resultLinks: links.length, unchanged: true, summary: EMPTY_SUMMARY };
    }

    const aoiLabel = persisted ? normalizeAoiName(order.aoiLabel) : UNKNOWN_AOI;
    let artifacts: RoutedArtifact[];
    let imagesFound: number | undefined;
    let weeks: number | undefined;

    if (route === "mosaic") {
      artifacts = routeMosaicArtifacts(links, aoiLabel, order.mosaicName ?? UNKNOWN_MOSAIC);
    } else {
      const routing = routeSceneArtifacts(links, aoiLabel, order.bands);
      artifacts = routing.artifacts;
      imagesFound = routing.imagesFound;
      weeks = routing.weeks;
    }

    const tasks = toDownloadTasks(artifacts, request.destination);
    logger.info(`Downloading ${tasks.length} files for order ${order.jobId} via ${this.transfer.name}`);

    const results: DownloadResult[] = [];
    for await (const result of this.transfer.transfer(tasks, {
      destinationKind: request.destination.kind,
      overwrite: request.overwrite,
    })) {
      results.push(result);
    }

    const summary = summarize(results);
    logger.info(
      `Order ${order.jobId}: ${summary.downloaded} downloaded, ${summary.skipped} skipped, ${summary.failed} failed`,
    );

    if (persisted && summary.failed === 0) {
      await this.store.save({ ...order, downloadedResultSet: fingerprint });
    }

    return { route, resultLinks: links.length, unchanged: false, imagesFound, weeks, summary };
  }
}

export default OrderLifecycleService;
