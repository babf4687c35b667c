import { MergeIOError, MergeValidationError, getErrorMessage } from "../errors.js";
import { logLoader } from "../logging.js";
import type { PartitionStore } from "../storage/partitions.js";
import type { PriceTableStorage } from "../storage/prices.js";
import type { MergeReport, RejectedPartition } from "../types/index.js";

/**
 * Merges every partition into the consolidated table. Each symbol's rows are
 * replaced wholesale, so re-running over unchanged partitions leaves the
 * table as it was. Symbols whose partition was removed lose their rows; a
 * partition that merely fails to read keeps the rows already loaded.
 */
export class PriceLoader {
  constructor(
    private readonly partitions: PartitionStore,
    private readonly table: PriceTableStorage
  ) {}

  async load(): Promise<MergeReport> {
    const symbols = await this.partitions.list();
    const removed = await this.partitions.removed();
    const report: MergeReport = {
      partitions: symbols.length,
      loadedSymbols: [],
      removedSymbols: removed,
      acceptedRows: 0,
      rejectedRows: 0,
      duplicateRows: 0,
      rejectedPartitions: [],
      summary: { symbols: 0, rows: 0, firstDate: null, lastDate: null },
    };

    if (symbols.length === 0 && removed.length === 0) {
      logLoader.warn("No partitions found");
      report.summary = await this.readSummary();
      return report;
    }

    logLoader.info(`Loading ${symbols.length} partitions into the price table...`);

    try {
      await this.table.beginStaging();
    } catch (error) {
      throw new MergeIOError(`Cannot prepare merge staging: ${getErrorMessage(error)}`, error);
    }

    for (const symbol of symbols) {
      try {
        const staged = await this.stage(symbol);
        report.loadedSymbols.push(symbol);
        report.acceptedRows += staged.acceptedRows;
        report.rejectedRows += staged.rejectedRows;
        report.duplicateRows += staged.duplicateRows;

        if (staged.rejectedRows > 0 || staged.duplicateRows > 0) {
          logLoader.warn(
            { symbol, rejected: staged.rejectedRows, duplicates: staged.duplicateRows },
            `${symbol}: dropped ${staged.rejectedRows} invalid and ${staged.duplicateRows} duplicate rows`
          );
        }
      } catch (error) {
        const rejection: RejectedPartition = { symbol, message: getErrorMessage(error) };
        report.rejectedPartitions.push(rejection);
        logLoader.error({ symbol, err: error }, `✗ Error loading ${symbol}: ${rejection.message}`);
      }
    }

    if (removed.length > 0) {
      logLoader.info({ symbols: removed }, `Dropping rows of ${removed.length} removed tickers`);
    }

    if (report.loadedSymbols.length > 0 || removed.length > 0) {
      try {
        await this.table.commitStaged(removed);
      } catch (error) {
        throw new MergeIOError(`Failed to merge into the price table: ${getErrorMessage(error)}`, error);
      }
    }

    report.summary = await this.readSummary();

    logLoader.info(
      {
        loaded: report.loadedSymbols.length,
        rejected: report.rejectedPartitions.length,
        acceptedRows: report.acceptedRows,
        rejectedRows: report.rejectedRows,
      },
      `✓ Successfully loaded: ${report.loadedSymbols.length} tickers`
    );
    return report;
  }

  private async stage(symbol: string) {
    try {
      return await this.table.stagePartition(symbol, this.partitions.pathFor(symbol));
    } catch (error) {
      throw new MergeValidationError(symbol, `Cannot read partition for ${symbol}: ${getErrorMessage(error)}`, error);
    }
  }

  private async readSummary() {
    try {
      return await this.table.summary();
    } catch (error) {
      throw new MergeIOError(`Cannot read the price table: ${getErrorMessage(error)}`, error);
    }
  }
}
