import type { BandOption } from "./scene.model";

export const ORDER_STATUSES = [
  "queued",
  "running",
  "success",
  "partial",
  "failed",
  "cancelled",
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

export type OrderKind = "scene" | "mosaic";

interface StatusTraits {
  /** No further remote progress is expected. */
  readonly terminal: boolean;
  /** Result artifacts may exist and should be fetched. */
  readonly downloadable: boolean;
  /** Needs re-polling. */
  readonly pending: boolean;
}

const STATUS_TRAITS: Record<OrderStatus, StatusTraits> = {
  queued: { terminal: false, downloadable: false, pending: true },
  running: { terminal: false, downloadable: false, pending: true },
  success: { terminal: true, downloadable: true, pending: false },
  partial: { terminal: false, downloadable: true, pending: false },
  failed: { terminal: true, downloadable: false, pending: false },
  cancelled: { terminal: true, downloadable: false, pending: false },
};

const TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  queued: ["queued", "running", "success", "partial", "failed", "cancelled"],
  running: ["running", "success", "partial", "failed", "cancelled"],
  success: ["success"],
  partial: ["partial"],
  failed: ["failed"],
  cancelled: ["cancelled"],
};

export function isOrderStatus(value: unknown): value is OrderStatus {
  return (
    typeof value === "string" &&
    ORDER_STATUSES.some((status) => status === value)
  );
}

export function isTerminal(status: OrderStatus): boolean {
  return STATUS_TRAITS[status].terminal;
}

export function isDownloadable(status: OrderStatus): boolean {
  return STATUS_TRAITS[status].downloadable;
}

export function isPending(status: OrderStatus): boolean {
  return STATUS_TRAITS[status].pending;
}

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Durable order record. The serialized form of this object is the single
 * source of truth in the store; indexed columns are projections of it.
 */
export interface Order {
  jobId: string;
  aoiLabel: string;
  kind: OrderKind;
  startDate: string;
  endDate: string;
  status: OrderStatus;
  bands?: BandOption;
  productBundle?: string;
  orderBundle?: string;
  clipped: boolean;
  aoiAreaSqKm?: number;
  scenesSelected?: number;
  scenesFound?: number;
  quotaHectares?: number;
  batchId?: string;
  mosaicName?: string;
  createdAt: string;
  updatedAt?: string;
  /** Fingerprint of the result set last downloaded for this order. */
  downloadedResultSet?: string;
}

export type DedupResult =
  | { kind: "none" }
  | { kind: "pending"; order: Order }
  | { kind: "completed"; order: Order };

export interface OrderStats {
  totalOrders: number;
  totalBatches: number;
  totalAois: number;
  totalScenes: number;
  totalQuotaHectares: number;
  completedOrders: number;
  pendingOrders: number;
  failedOrders: number;
}

export interface BatchSummary {
  batchId: string;
  orderCount: number;
}

/** Window sentinel for orders that are not date-bounded (mosaics). */
export const NO_WINDOW = "N/A";
