import fs from "fs";
import path from "path";
import { pipeline } from "stream/promises";
import type { Readable } from "stream";
import axios, { AxiosInstance } from "axios";
import logger from "../utils/logger";
import { TransferFailedError, toError } from "../utils/errors";
import { RetryExhaustedError, RetryPolicy, withRetry } from "../utils/retry";
import type { ObjectStore } from "./storage.service";
import {
  BatchOptions,
  BulkTransfer,
  DestinationKind,
  DownloadResult,
  DownloadTask,
  SKIPPED,
} from "../models/download.model";

export interface ParallelDownloaderOptions {
  concurrency: number;
  timeoutMs: number;
  retryPolicy: RetryPolicy;
  store?: ObjectStore;
  http?: AxiosInstance;
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Per-file transfer over a bounded worker pool. Each task is fetched with
 * the retry policy and either streamed into a multipart upload or written
 * to disk. Results come back in completion order; a failed task never
 * cancels its siblings.
 */
class ParallelDownloader implements BulkTransfer {
  readonly name = "parallel";
  private http: AxiosInstance;
  private store?: ObjectStore;
  private concurrency: number;
  private timeoutMs: number;
  private retryPolicy: RetryPolicy;

  constructor(options: ParallelDownloaderOptions) {
    if (options.concurrency < 1) {
      throw new Error(`Concurrency must be at least 1, got ${options.concurrency}`);
    }
    this.http = options.http ?? axios.create({ maxRedirects: 5 });
    this.store = options.store;
    this.concurrency = options.concurrency;
    this.timeoutMs = options.timeoutMs;
    this.retryPolicy = options.retryPolicy;
  }

  async isAvailable(kind: DestinationKind): Promise<boolean> {
    return kind === "filesystem" || this.store !== undefined;
  }

  transfer(tasks: readonly DownloadTask[], options: BatchOptions): AsyncIterable<DownloadResult> {
    return this.downloadBatch(tasks, options);
  }

  async *downloadBatch(
    tasks: readonly DownloadTask[],
    options: BatchOptions,
  ): AsyncGenerator<DownloadResult> {
    const completed: DownloadResult[] = [];
    let wake: (() => void) | null = null;
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < tasks.length) {
        const task = tasks[nextIndex++];
        completed.push(await this.downloadSingle(task, options));
        if (wake) {
          const resolve = wake;
          wake = null;
          resolve();
        }
      }
    };

    const poolSize = Math.min(this.concurrency, tasks.length);
    logger.info(`Downloading ${tasks.length} files with ${poolSize} workers`);
    const workers = Promise.all(Array.from({ length: poolSize }, () => worker()));

    let emitted = 0;
    while (emitted < tasks.length) {
      if (completed.length === 0) {
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
      }
      let result = completed.shift();
      while (result) {
        emitted++;
        yield result;
        result = completed.shift();
      }
    }

    await workers;
  }

  private async downloadSingle(
    task: DownloadTask,
    options: BatchOptions,
  ): Promise<DownloadResult> {
    const { sourceUrl, destination } = task;

    try {
      if (!options.overwrite) {
        const exists = options.existsCheck ?? this.defaultExistsCheck(options.destinationKind);
        if (await exists(destination)) {
          logger.debug(`Skipped (exists): ${destination}`);
          return { success: true, destination, error: SKIPPED };
        }
      }

      await this.download(sourceUrl, destination, options.destinationKind);
      logger.debug(`Downloaded: ${destination}`);
      return { success: true, destination };
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : toError(error);
      const failure = new TransferFailedError(sourceUrl, destination, cause);
      logger.error(failure.message);
      return { success: false, destination, error: failure.message };
    }
  }

  private async download(
    sourceUrl: string,
    destination: string,
    kind: DestinationKind,
  ): Promise<void> {
    const response = await withRetry(this.retryPolicy, `GET ${destination}`, () =>
      this.http.get<Readable>(sourceUrl, {
        responseType: "stream",
        timeout: this.timeoutMs,
      }),
    );

    if (kind === "object_store") {
      if (!this.store) {
        response.data.destroy();
        throw new Error("No object store configured");
      }
      await this.store.uploadStream(response.data, destination);
      return;
    }

    await fs.promises.mkdir(path.dirname(destination), { recursive: true });
    const partial = `${destination}.part`;
    try {
      await pipeline(response.data, fs.createWriteStream(partial));
      await fs.promises.rename(partial, destination);
    } catch (error) {
      await fs.promises.rm(partial, { force: true });
      throw error;
    }
  }

  private defaultExistsCheck(kind: DestinationKind): (destination: string) => Promise<boolean> {
    const store = this.store;
    if (kind === "object_store" && store) {
      return (key) => store.keyExists(key);
    }
    return fileExists;
  }
}

export default ParallelDownloader;
