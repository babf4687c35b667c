import { FetchError, PartitionWriteError, getErrorMessage } from "../errors.js";
import { logFetch } from "../logging.js";
import { Semaphore } from "../utils/semaphore.js";
import type { PriceFetcher } from "./fetcher.js";
import type { PartitionStore } from "../storage/partitions.js";
import type {
  FetchFailure,
  FetchProgress,
  FetchReport,
  FetchStatus,
  FetchWindow,
  PricePoint,
} from "../types/index.js";

export interface FetchOrchestratorOptions extends FetchWindow {
  concurrency: number;
  /** Re-fetch symbols whose partition already exists. */
  refresh?: boolean;
}

type Outcome =
  | { status: Exclude<FetchStatus, "failed">; rows: number }
  | { status: "failed"; failure: FetchFailure };

/**
 * Runs the fetcher across a universe with at most `concurrency` fetches in
 * flight, writing one partition per successful symbol. Per-symbol failures
 * are collected in the report; nothing short of a configuration error stops
 * the batch.
 */
export class FetchOrchestrator {
  constructor(
    private readonly fetcher: PriceFetcher,
    private readonly partitions: PartitionStore,
    private readonly options: FetchOrchestratorOptions
  ) {}

  async run(
    symbols: string[],
    onProgress?: (progress: FetchProgress) => void
  ): Promise<FetchReport> {
    const startedAt = Date.now();
    const gate = new Semaphore(this.options.concurrency);
    const outcomes = new Map<string, Outcome>();
    let completed = 0;

    const settle = (symbol: string, outcome: Outcome) => {
      outcomes.set(symbol, outcome);
      completed++;
      onProgress?.({
        symbol,
        status: outcome.status,
        completed,
        total: symbols.length,
        ...(outcome.status === "failed"
          ? { error: outcome.failure.message }
          : { rows: outcome.rows }),
      });
    };

    const pending: string[] = [];
    for (const symbol of symbols) {
      if (!this.options.refresh && (await this.partitions.has(symbol))) {
        settle(symbol, { status: "skipped", rows: 0 });
      } else {
        pending.push(symbol);
      }
    }

    logFetch.info(
      { total: symbols.length, skipped: symbols.length - pending.length, toFetch: pending.length },
      `Tickers to fetch: ${pending.length}`
    );

    if (pending.length > 0) {
      this.fetcher.assertCredentials();
      await Promise.all(
        pending.map((symbol) =>
          gate.use(() => this.fetchOne(symbol)).then((outcome) => settle(symbol, outcome))
        )
      );
    }

    const report: FetchReport = {
      total: symbols.length,
      skipped: [],
      succeeded: [],
      empty: [],
      failed: [],
      maxInFlight: gate.maxInUse,
      durationMs: Date.now() - startedAt,
    };

    // Universe order, whatever order the fetches finished in
    for (const symbol of symbols) {
      const outcome = outcomes.get(symbol);
      if (!outcome) continue;
      switch (outcome.status) {
        case "skipped":
          report.skipped.push(symbol);
          break;
        case "succeeded":
          report.succeeded.push(symbol);
          break;
        case "empty":
          report.succeeded.push(symbol);
          report.empty.push(symbol);
          break;
        case "failed":
          report.failed.push(outcome.failure);
          break;
      }
    }

    return report;
  }

  private async fetchOne(symbol: string): Promise<Outcome> {
    let rows: PricePoint[];
    try {
      rows = await this.fetcher.fetch(symbol, {
        startDate: this.options.startDate,
        endDate: this.options.endDate,
      });
    } catch (error) {
      return { status: "failed", failure: toFailure(symbol, error) };
    }

    try {
      if (rows.length === 0) {
        // Nothing to store; a refreshed symbol with no data loses its partition
        if (this.options.refresh) {
          await this.partitions.remove(symbol);
        }
        return { status: "empty", rows: 0 };
      }

      await this.partitions.write(symbol, rows);
      return { status: "succeeded", rows: rows.length };
    } catch (error) {
      return { status: "failed", failure: toFailure(symbol, error) };
    }
  }
}

function toFailure(symbol: string, error: unknown): FetchFailure {
  if (error instanceof FetchError) {
    return { symbol, kind: error.kind, reason: error.reason, message: error.message };
  }
  if (error instanceof PartitionWriteError) {
    return { symbol, kind: "write", reason: "write-failed", message: error.message };
  }
  return { symbol, kind: "transient", reason: "unexpected", message: getErrorMessage(error) };
}
