import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { vi } from "vitest";
import type { PartitionStore } from "../storage/partitions.js";
import type { Config, DataService, PricePoint } from "../types/index.js";

export function bar(ticker: string, date: string, close: number, volume = 1_000_000): PricePoint {
  return {
    ticker,
    date,
    open: close - 1,
    high: close + 2,
    low: close - 2,
    close,
    adjClose: close,
    volume,
  };
}

export function createTempDir(prefix = "price-store-"): { path: string; cleanup: () => void } {
  const path = mkdtempSync(join(tmpdir(), prefix));
  return { path, cleanup: () => rmSync(path, { recursive: true, force: true }) };
}

export function testConfig(dataDir: string, overrides: Partial<Config["fetch"]> = {}): Config {
  return {
    sources: {
      tiingo: {
        apiKey: "test-key",
        baseUrl: "https://api.tiingo.test/tiingo/daily",
        timeoutMs: 1_000,
      },
    },
    storage: {
      dataDir,
      partitionDir: join(dataDir, "stocks"),
      databasePath: join(dataDir, "price.duckdb"),
    },
    fetch: {
      startDate: "2000-01-01",
      concurrency: 4,
      maxAttempts: 3,
      baseDelayMs: 0,
      maxDelayMs: 0,
      ...overrides,
    },
    universe: [{ kind: "inline", symbols: ["AAPL"] }],
  };
}

type Responder = (ticker: string) => Promise<PricePoint[]>;

/** DataService whose answers come from a per-ticker responder. */
export function fakeService(responder: Responder, hasCredentials = true) {
  const fetchDaily = vi.fn((ticker: string, _startDate?: string, _endDate?: string) => responder(ticker));
  const service: DataService = {
    name: "fake",
    hasCredentials: () => hasCredentials,
    fetchDaily,
  };
  return { service, fetchDaily };
}

/** In-memory partitions for orchestrator tests; not loadable by PriceLoader. */
export class MemoryPartitionStore implements PartitionStore {
  readonly data = new Map<string, PricePoint[]>();
  readonly writes: string[] = [];
  private readonly tombstones = new Set<string>();

  async has(symbol: string): Promise<boolean> {
    return (this.data.get(symbol)?.length ?? 0) > 0;
  }

  async list(): Promise<string[]> {
    return [...this.data.keys()].sort();
  }

  pathFor(symbol: string): string {
    return `memory://${symbol}`;
  }

  async write(symbol: string, rows: PricePoint[]): Promise<void> {
    this.writes.push(symbol);
    this.data.set(symbol, rows);
    this.tombstones.delete(symbol);
  }

  async remove(symbol: string): Promise<void> {
    this.data.delete(symbol);
    this.tombstones.add(symbol);
  }

  async removed(): Promise<string[]> {
    return [...this.tombstones].sort();
  }
}
