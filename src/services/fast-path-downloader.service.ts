import { spawn } from "child_process";
import fs from "fs";
import os from "os";
import path from "path";
import logger from "../utils/logger";
import { BulkTransferUnavailableError } from "../utils/errors";
import type { ObjectStore } from "./storage.service";
import {
  BatchOptions,
  BulkTransfer,
  DestinationKind,
  DownloadResult,
  DownloadTask,
  SKIPPED,
} from "../models/download.model";

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  binary: string,
  args: readonly string[],
  options: { timeoutMs: number },
) => Promise<CommandResult>;

/** Runs a binary to completion; rejects if it cannot start or overruns. */
export const spawnRunner: CommandRunner = (binary, args, { timeoutMs }) =>
  new Promise((resolve, reject) => {
    const child = spawn(binary, [...args]);
    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMs);

    child.stdout.on("data", (data) => {
      stdout += data.toString();
    });
    child.stderr.on("data", (data) => {
      stderr += data.toString();
    });

    child.on("error", (error) => {
      clearTimeout(timer);
      reject(new Error(`Failed to spawn ${binary}: ${error.message}`));
    });

    child.on("close", (code) => {
      clearTimeout(timer);
      if (timedOut) {
        reject(new Error(`${binary} timed out after ${timeoutMs}ms`));
        return;
      }
      resolve({ code, stdout, stderr });
    });
  });

export interface FastPathDownloaderOptions {
  store: ObjectStore;
  binary: string;
  workers: number;
  timeoutMs: number;
  runner?: CommandRunner;
  detectTimeoutMs?: number;
}

/** Quotes a manifest argument for the bulk tool's command file. */
function quote(value: string): string {
  return `"${value.replace(/(["\\])/g, "\\$1")}"`;
}

/**
 * Whole-batch transfer through an external bulk copy tool. The tool
 * reports one exit status for the batch, so every task shares it.
 * Only object-store destinations are supported.
 */
class FastPathDownloader implements BulkTransfer {
  readonly name = "fast-path";
  private store: ObjectStore;
  private binary: string;
  private workers: number;
  private timeoutMs: number;
  private detectTimeoutMs: number;
  private runner: CommandRunner;
  private detection: Promise<boolean> | null = null;

  constructor(options: FastPathDownloaderOptions) {
    this.store = options.store;
    this.binary = options.binary;
    this.workers = options.workers;
    this.timeoutMs = options.timeoutMs;
    this.detectTimeoutMs = options.detectTimeoutMs ?? 5000;
    this.runner = options.runner ?? spawnRunner;
  }

  async isAvailable(kind: DestinationKind): Promise<boolean> {
    if (kind !== "object_store") {
      return false;
    }
    if (!this.detection) {
      this.detection = this.detect();
    }
    return this.detection;
  }

  async *transfer(
    tasks: readonly DownloadTask[],
    options: BatchOptions,
  ): AsyncGenerator<DownloadResult> {
    if (options.destinationKind !== "object_store") {
      throw new BulkTransferUnavailableError(
        `${this.name} does not support ${options.destinationKind} destinations`,
      );
    }

    const pending: DownloadTask[] = [];
    const skipped: DownloadResult[] = [];
    const exists = options.existsCheck ?? ((key: string) => this.store.keyExists(key));

    for (const task of tasks) {
      if (!options.overwrite && (await exists(task.destination))) {
        skipped.push({ success: true, destination: task.destination, error: SKIPPED });
      } else {
        pending.push(task);
      }
    }

    yield* skipped;
    if (pending.length === 0) {
      return;
    }

    const result = await this.runBatch(pending);
    if (result.code === 0) {
      logger.info(`${this.binary} transferred ${pending.length} files`);
      for (const task of pending) {
        yield { success: true, destination: task.destination };
      }
      return;
    }

    const message = `${this.binary} exited with code ${result.code}: ${result.stderr.trim()}`;
    logger.error(message);
    for (const task of pending) {
      yield { success: false, destination: task.destination, error: message };
    }
  }

  private async runBatch(tasks: readonly DownloadTask[]): Promise<CommandResult> {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "bulk-transfer-"));
    const manifest = path.join(dir, "manifest.txt");

    try {
      const lines = tasks.map(
        (task) =>
          `cp ${quote(task.sourceUrl)} ${quote(`s3://${this.store.bucket}/${task.destination}`)}`,
      );
      await fs.promises.writeFile(manifest, `${lines.join("\n")}\n`, "utf-8");

      logger.info(`Starting bulk transfer of ${tasks.length} files with ${this.binary}`);
      return await this.runner(
        this.binary,
        ["--numworkers", String(this.workers), "run", manifest],
        { timeoutMs: this.timeoutMs },
      );
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
  }

  private async detect(): Promise<boolean> {
    try {
      const result = await this.runner(this.binary, ["version"], {
        timeoutMs: this.detectTimeoutMs,
      });
      const available = result.code === 0;
      logger.info(`${this.binary} ${available ? "available" : "not available"}`);
      return available;
    } catch (error) {
      logger.warn(`${this.binary} not available:`, error);
      return false;
    }
  }
}

export default FastPathDownloader;
