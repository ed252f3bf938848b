import logger from "../utils/logger";
import {
  BatchOptions,
  BulkTransfer,
  DestinationKind,
  DownloadResult,
  DownloadTask,
} from "../models/download.model";

/**
 * First-available composition of transfer tiers. A tier that is unavailable
 * is passed over; a tier that throws mid-batch hands the tasks it has not
 * reported yet to the next tier.
 */
class TieredTransfer implements BulkTransfer {
  readonly name: string;
  private tiers: readonly BulkTransfer[];

  constructor(tiers: readonly BulkTransfer[]) {
    if (tiers.length === 0) {
      throw new Error("At least one transfer tier is required");
    }
    this.tiers = tiers;
    this.name = tiers.map((tier) => tier.name).join(" > ");
  }

  async isAvailable(kind: DestinationKind): Promise<boolean> {
    for (const tier of this.tiers) {
      if (await tier.isAvailable(kind)) {
        return true;
      }
    }
    return false;
  }

  async *transfer(
    tasks: readonly DownloadTask[],
    options: BatchOptions,
  ): AsyncGenerator<DownloadResult> {
    let remaining = [...tasks];

    for (const tier of this.tiers) {
      if (remaining.length === 0) {
        return;
      }
      if (!(await tier.isAvailable(options.destinationKind))) {
        logger.debug(`Transfer tier ${tier.name} unavailable for ${options.destinationKind}`);
        continue;
      }

      const reported = new Set<string>();
      try {
        for await (const result of tier.transfer(remaining, options)) {
          reported.add(result.destination);
          yield result;
        }
        return;
      } catch (error) {
        remaining = remaining.filter((task) => !reported.has(task.destination));
        logger.warn(
          `Transfer tier ${tier.name} failed, falling back for ${remaining.length} files:`,
          error,
        );
      }
    }

    for (const task of remaining) {
      yield {
        success: false,
        destination: task.destination,
        error: `No transfer tier available for ${options.destinationKind}`,
      };
    }
  }
}

export default TieredTransfer;
