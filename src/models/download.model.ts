export type DestinationKind = "object_store" | "filesystem";

export type Destination =
  | { kind: "object_store" }
  | { kind: "filesystem"; root: string };

export interface DownloadTask {
  sourceUrl: string;
  /** Object key, or absolute path for filesystem destinations. */
  destination: string;
}

export const SKIPPED = "skipped";

export interface DownloadResult {
  success: boolean;
  destination: string;
  /** `SKIPPED` when the destination already existed, otherwise the error message. */
  error?: string;
}

export interface DownloadSummary {
  downloaded: number;
  skipped: number;
  failed: number;
  results: DownloadResult[];
}

export interface BatchOptions {
  destinationKind: DestinationKind;
  overwrite: boolean;
  existsCheck?: (destination: string) => Promise<boolean>;
}

/**
 * One way of moving a batch of artifacts to their destination.
 * Results are yielded as tasks complete.
 */
export interface BulkTransfer {
  readonly name: string;
  isAvailable(kind: DestinationKind): Promise<boolean>;
  transfer(
    tasks: readonly DownloadTask[],
    options: BatchOptions,
  ): AsyncIterable<DownloadResult>;
}

export function isSkipped(result: DownloadResult): boolean {
  return result.error === SKIPPED;
}

export function summarize(results: DownloadResult[]): DownloadSummary {
  let downloaded = 0;
  let skipped = 0;
  let failed = 0;
  for (const result of results) {
    if (isSkipped(result)) skipped++;
    else if (result.success) downloaded++;
    else failed++;
  }
  return { downloaded, skipped, failed, results };
}
