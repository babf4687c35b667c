import { describe, it, expect } from "vitest";
import { FetchOrchestrator } from "../orchestrator.js";
import { PriceFetcher } from "../fetcher.js";
import { AuthenticationError, FetchError, PartitionWriteError } from "../../errors.js";
import { MemoryPartitionStore, bar, fakeService } from "../../test-utils/fixtures.js";
import type { DataService, FetchProgress, PricePoint } from "../../types/index.js";

const policy = {
  startDate: "2000-01-01",
  maxAttempts: 3,
  baseDelayMs: 0,
  maxDelayMs: 0,
  sleep: async () => {},
};

function orchestrator(
  service: DataService,
  partitions: MemoryPartitionStore,
  options: { concurrency?: number; refresh?: boolean } = {}
) {
  return new FetchOrchestrator(new PriceFetcher(service, policy), partitions, {
    concurrency: options.concurrency ?? 4,
    refresh: options.refresh,
  });
}

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("FetchOrchestrator", () => {
  it("never exceeds the concurrency cap", async () => {
    let active = 0;
    let peak = 0;
    const { service } = fakeService(async (ticker) => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
      return [bar(ticker, "2024-01-02", 10)];
    });
    const symbols = Array.from({ length: 10 }, (_, i) => `T${i}`);

    const report = await orchestrator(service, new MemoryPartitionStore(), { concurrency: 3 }).run(symbols);

    expect(peak).toBe(3);
    expect(report.maxInFlight).toBe(3);
    expect(report.succeeded).toEqual(symbols);
  });

  it("skips symbols that already have a partition", async () => {
    const partitions = new MemoryPartitionStore();
    partitions.data.set("AAPL", [bar("AAPL", "2024-01-02", 10)]);
    const { service, fetchDaily } = fakeService(async (ticker) => [bar(ticker, "2024-01-02", 10)]);

    const report = await orchestrator(service, partitions).run(["AAPL"]);

    expect(fetchDaily).not.toHaveBeenCalled();
    expect(report).toMatchObject({ total: 1, skipped: ["AAPL"], succeeded: [], failed: [] });
  });

  it("re-fetches existing partitions under refresh", async () => {
    const partitions = new MemoryPartitionStore();
    partitions.data.set("AAPL", [bar("AAPL", "2024-01-02", 10)]);
    const { service } = fakeService(async (ticker) => [bar(ticker, "2024-01-02", 11)]);

    const report = await orchestrator(service, partitions, { refresh: true }).run(["AAPL"]);

    expect(report.succeeded).toEqual(["AAPL"]);
    expect(partitions.data.get("AAPL")).toEqual([bar("AAPL", "2024-01-02", 11)]);
  });

  it("collects failures without stopping the batch", async () => {
    const partitions = new MemoryPartitionStore();
    const { service } = fakeService(async (ticker) => {
      if (ticker === "BADSYM") {
        throw new FetchError(ticker, "permanent", "not-found", `Ticker ${ticker} not found`);
      }
      return [bar(ticker, "2024-01-02", 10), bar(ticker, "2024-01-03", 11)];
    });

    const report = await orchestrator(service, partitions).run(["AAPL", "BADSYM"]);

    expect(report.succeeded).toEqual(["AAPL"]);
    expect(report.failed).toEqual([
      { symbol: "BADSYM", kind: "permanent", reason: "not-found", message: "Ticker BADSYM not found" },
    ]);
    expect(await partitions.has("AAPL")).toBe(true);
    expect(await partitions.has("BADSYM")).toBe(false);
  });

  it("reports in universe order whatever order fetches finish in", async () => {
    const latency: Record<string, number> = { SLOW: 20, MID: 10, FAST: 0 };
    const { service } = fakeService(async (ticker) => {
      await delay(latency[ticker] ?? 0);
      return [bar(ticker, "2024-01-02", 10)];
    });
    const finished: string[] = [];

    const report = await orchestrator(service, new MemoryPartitionStore()).run(
      ["SLOW", "MID", "FAST"],
      (progress) => finished.push(progress.symbol)
    );

    expect(finished).toEqual(["FAST", "MID", "SLOW"]);
    expect(report.succeeded).toEqual(["SLOW", "MID", "FAST"]);
  });

  it("emits one progress event per symbol", async () => {
    const partitions = new MemoryPartitionStore();
    partitions.data.set("AAPL", [bar("AAPL", "2024-01-02", 10)]);
    const { service } = fakeService(async (ticker) => [bar(ticker, "2024-01-02", 10)]);
    const events: FetchProgress[] = [];

    await orchestrator(service, partitions, { concurrency: 1 }).run(["AAPL", "MSFT"], (p) => events.push(p));

    expect(events).toEqual([
      { symbol: "AAPL", status: "skipped", completed: 1, total: 2, rows: 0 },
      { symbol: "MSFT", status: "succeeded", completed: 2, total: 2, rows: 1 },
    ]);
  });

  it("counts an empty history as success without writing a partition", async () => {
    const partitions = new MemoryPartitionStore();
    const { service } = fakeService(async () => []);

    const report = await orchestrator(service, partitions).run(["NEWCO"]);

    expect(report.succeeded).toEqual(["NEWCO"]);
    expect(report.empty).toEqual(["NEWCO"]);
    expect(partitions.writes).toEqual([]);
  });

  it("drops the partition when a refresh comes back empty", async () => {
    const partitions = new MemoryPartitionStore();
    partitions.data.set("GONE", [bar("GONE", "2024-01-02", 10)]);
    const { service } = fakeService(async (): Promise<PricePoint[]> => []);

    await orchestrator(service, partitions, { refresh: true }).run(["GONE"]);

    expect(await partitions.has("GONE")).toBe(false);
    expect(await partitions.removed()).toEqual(["GONE"]);
  });

  it("records partition write failures", async () => {
    const partitions = new MemoryPartitionStore();
    partitions.write = async (symbol) => {
      throw new PartitionWriteError(symbol, `Failed to write partition for ${symbol}: disk full`);
    };
    const { service } = fakeService(async (ticker) => [bar(ticker, "2024-01-02", 10)]);

    const report = await orchestrator(service, partitions).run(["AAPL"]);

    expect(report.failed).toEqual([
      {
        symbol: "AAPL",
        kind: "write",
        reason: "write-failed",
        message: "Failed to write partition for AAPL: disk full",
      },
    ]);
  });

  it("requires credentials only when something needs fetching", async () => {
    const partitions = new MemoryPartitionStore();
    partitions.data.set("AAPL", [bar("AAPL", "2024-01-02", 10)]);
    const { service, fetchDaily } = fakeService(async () => [], false);

    await expect(orchestrator(service, partitions).run(["AAPL"])).resolves.toMatchObject({
      skipped: ["AAPL"],
    });
    await expect(orchestrator(service, partitions).run(["AAPL", "MSFT"])).rejects.toBeInstanceOf(
      AuthenticationError
    );
    expect(fetchDaily).not.toHaveBeenCalled();
  });
});
