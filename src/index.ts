import { TiingoService } from "./services/tiingo.js";
import { PriceFetcher } from "./services/fetcher.js";
import { FetchOrchestrator } from "./services/orchestrator.js";
import { PriceLoader } from "./services/loader.js";
import { loadUniverse, resolveUniverse } from "./services/universe.js";
import { getRecentPrices } from "./services/query.js";
import { ParquetPartitionStore, type PartitionStore } from "./storage/partitions.js";
import { PriceTableStorage } from "./storage/prices.js";
import { existsSync } from "fs";
import { resolveApiKey } from "./config.js";
import { ConfigurationError } from "./errors.js";
import type {
  Config,
  DataService,
  FetchProgress,
  FetchReport,
  MergeReport,
  PricePoint,
  TableSummary,
  TickerActivity,
} from "./types/index.js";

export interface PriceStoreDeps {
  service?: DataService;
  partitions?: PartitionStore;
  sleep?: (ms: number) => Promise<void>;
}

export interface FetchOptions {
  symbols?: string[];
  refresh?: boolean;
  startDate?: string;
  endDate?: string;
  concurrency?: number;
  onProgress?: (progress: FetchProgress) => void;
}

export interface UpdateOptions extends FetchOptions {
  fetchOnly?: boolean;
  loadOnly?: boolean;
}

export interface UpdateResult {
  fetch?: FetchReport;
  merge?: MergeReport;
}

/**
 * One pipeline run: universe → fetch → partitions → merge. Everything the run
 * needs comes from the Config it is constructed with.
 */
export class PriceStore {
  readonly config: Config;
  private partitionStore: PartitionStore;
  private parquet: ParquetPartitionStore | null = null;
  private table: PriceTableStorage | null = null;
  private fetcher: PriceFetcher | null = null;
  private readonly deps: PriceStoreDeps;

  constructor(config: Config, deps: PriceStoreDeps = {}) {
    this.config = config;
    this.deps = deps;

    if (deps.partitions) {
      this.partitionStore = deps.partitions;
    } else {
      this.parquet = new ParquetPartitionStore(config.storage.partitionDir);
      this.partitionStore = this.parquet;
    }
  }

  async init(): Promise<void> {
    await this.parquet?.init();
  }

  /** Explicit symbols win over the configured ticker lists. */
  async universe(symbols?: string[]): Promise<string[]> {
    if (symbols && symbols.length > 0) {
      return resolveUniverse([symbols]);
    }
    return loadUniverse(this.config.universe);
  }

  async fetch(options: FetchOptions = {}): Promise<FetchReport> {
    const symbols = await this.universe(options.symbols);
    const orchestrator = new FetchOrchestrator(this.getFetcher(), this.partitionStore, {
      concurrency: options.concurrency ?? this.config.fetch.concurrency,
      refresh: options.refresh ?? false,
      startDate: options.startDate,
      endDate: options.endDate,
    });
    return orchestrator.run(symbols, options.onProgress);
  }

  async load(): Promise<MergeReport> {
    const table = await this.openTable();
    return new PriceLoader(this.partitionStore, table).load();
  }

  async update(options: UpdateOptions = {}): Promise<UpdateResult> {
    const result: UpdateResult = {};
    if (!options.loadOnly) {
      result.fetch = await this.fetch(options);
    }
    if (!options.fetchOnly) {
      result.merge = await this.load();
    }
    return result;
  }

  async summary(): Promise<TableSummary> {
    return (await this.openTable()).summary();
  }

  async recentActivity(limit = 5): Promise<TickerActivity[]> {
    return (await this.openTable()).recentActivity(limit);
  }

  async recentPrices(ticker: string, days = 10): Promise<PricePoint[]> {
    return getRecentPrices(await this.openTable(), ticker, days);
  }

  async close(): Promise<void> {
    await this.parquet?.close();
    await this.table?.close();
    this.table = null;
  }

  // Credentials are only read once a fetch is requested
  private getFetcher(): PriceFetcher {
    if (!this.fetcher) {
      const { tiingo } = this.config.sources;
      const service =
        this.deps.service ??
        new TiingoService({
          apiKey: resolveApiKey(this.config),
          baseUrl: tiingo.baseUrl,
          timeoutMs: tiingo.timeoutMs,
        });

      this.fetcher = new PriceFetcher(service, {
        startDate: this.config.fetch.startDate,
        maxAttempts: this.config.fetch.maxAttempts,
        baseDelayMs: this.config.fetch.baseDelayMs,
        maxDelayMs: this.config.fetch.maxDelayMs,
        sleep: this.deps.sleep,
      });
    }
    return this.fetcher;
  }

  private async openTable(): Promise<PriceTableStorage> {
    if (!this.table) {
      const table = new PriceTableStorage(this.config.storage.databasePath);
      await table.init();
      this.table = table;
    }
    return this.table;
  }
}

/** Read-only handle on the consolidated table, for analysis code. */
export async function openPriceTable(config: Config): Promise<PriceTableStorage> {
  if (!existsSync(config.storage.databasePath)) {
    throw new ConfigurationError(
      `Price database not found at ${config.storage.databasePath}. Run: price-store update`
    );
  }
  const table = new PriceTableStorage(config.storage.databasePath, { readOnly: true });
  await table.init();
  return table;
}

// Export everything for library usage
export * from "./types/index.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./services/tiingo.js";
export * from "./services/fetcher.js";
export * from "./services/orchestrator.js";
export * from "./services/loader.js";
export * from "./services/universe.js";
export * from "./services/query.js";
export * from "./storage/base.js";
export * from "./storage/partitions.js";
export * from "./storage/prices.js";
export * from "./utils/semaphore.js";
